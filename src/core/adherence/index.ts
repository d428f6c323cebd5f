export {
  ADHERENCE_WINDOW_DAYS,
  ADHERENT_RESPONSE,
  ResponseLogEntrySchema,
  type ResponseLogEntry,
  type ResponseLog,
  type AdherenceSummary,
  computeAdherence,
} from './aggregator.js';
