// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT PATHS — Per-User Layout
// ═══════════════════════════════════════════════════════════════════════════════
//
//   users/{uid}/user_details
//   users/{uid}/push_token
//   users/{uid}/caregivers
//   users/{uid}/voice_history
//   users/{uid}/imp_ask_question
//   users/{uid}/health_track/medicines
//   users/{uid}/health_track/medicine_responses/{reminderId}   (log)
//   users/{uid}/medicine_reminders/{date}/{reminderId}
//
// ═══════════════════════════════════════════════════════════════════════════════

import { docPath } from './documents.js';

export const USERS_ROOT = 'users';

export const userPaths = {
  details: (uid: string) => docPath(USERS_ROOT, uid, 'user_details'),
  pushToken: (uid: string) => docPath(USERS_ROOT, uid, 'push_token'),
  caregivers: (uid: string) => docPath(USERS_ROOT, uid, 'caregivers'),
  voiceHistory: (uid: string) => docPath(USERS_ROOT, uid, 'voice_history'),
  importantQuestions: (uid: string) => docPath(USERS_ROOT, uid, 'imp_ask_question'),
  medicines: (uid: string) => docPath(USERS_ROOT, uid, 'health_track', 'medicines'),
  responses: (uid: string, reminderId: string) =>
    docPath(USERS_ROOT, uid, 'health_track', 'medicine_responses', reminderId),
  reminderRoot: (uid: string) => docPath(USERS_ROOT, uid, 'medicine_reminders'),
  reminderDay: (uid: string, date: string) => docPath(USERS_ROOT, uid, 'medicine_reminders', date),
  reminder: (uid: string, date: string, reminderId: string) =>
    docPath(USERS_ROOT, uid, 'medicine_reminders', date, reminderId),
} as const;
