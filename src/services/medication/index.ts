export { ReminderRepository, type ReminderDay } from './reminder-repository.js';
export {
  type ReminderUpdate,
  type MedicationServiceConfig,
  DEFAULT_MEDICATION_SERVICE_CONFIG,
  MedicationReminderService,
  createMedicationReminderService,
} from './reminder-service.js';
export {
  type ReminderResponseInput,
  type RecordedResponse,
  ResponseLogService,
} from './response-log.js';
export { AdherenceService } from './adherence-service.js';
export {
  type ReminderWithStatus,
  type CaregiverReminderDay,
  type CaregiverReminderView,
  NO_RESPONSE,
  CaregiverViewService,
} from './caregiver-view.js';
