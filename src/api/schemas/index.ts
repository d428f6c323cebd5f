// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS INDEX — API Request Validation Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export {
  IdSchema,
  ISODateSchema,
  DateOrTimestampSchema,
  ReminderTimeSchema,
  MedicineNameSchema,
  WeekdayTagsSchema,
} from './common.js';

export {
  ReminderSpecSchema,
  CreateRemindersSchema,
  ReminderUpdateSchema,
  UpdateRemindersSchema,
  ReminderOccurrenceParamsSchema,
  ReminderIdParamSchema,
  ReminderResponseSchema,

  type ReminderSpecRequest,
  type CreateRemindersRequest,
  type ReminderUpdateRequest,
  type UpdateRemindersRequest,
  type ReminderResponseRequest,
} from './reminders.js';

export {
  EngagementRequestSchema,
  ChatRequestSchema,

  type EngagementRequest,
  type ChatRequest,
} from './engagement.js';

export {
  UpdateUserDetailsSchema,
  MedicineInputSchema,
  AddMedicinesSchema,
  MedicineIdParamSchema,
  SetCaregiversSchema,
  UserIdParamSchema,
  PushTokenSchema,

  type UpdateUserDetailsRequest,
  type AddMedicinesRequest,
  type SetCaregiversRequest,
  type PushTokenRequest,
} from './users.js';
