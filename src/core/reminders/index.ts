export * from './types.js';
export {
  DEFAULT_REMINDER_SPAN_DAYS,
  type IdFactory,
  parseWeekdays,
  expandReminder,
  buildOccurrences,
  responseKey,
} from './expander.js';
export { normalizeReminderSet, compareScanOrder, orderReminderSet } from './normalize.js';
export { isListRemindersRequest, formatReminderList } from './format.js';
