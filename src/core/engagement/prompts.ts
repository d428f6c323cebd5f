// ═══════════════════════════════════════════════════════════════════════════════
// PROMPTS — Question Templates and Text-Generation Prompts
// ═══════════════════════════════════════════════════════════════════════════════

import type { MedicineReminder } from '../reminders/index.js';
import { formatClockTime, greetingForHour, type LocalInstant } from '../time/index.js';
import type { TopicChoice } from './topics.js';
import type { ConversationTurn, UserProfile } from './types.js';

/** Number of recent turns handed to the text generator. */
export const CONTEXT_TURNS = 5;

function displayName(profile: UserProfile): string {
  return profile.name?.trim() || 'there';
}

function medicineLabel(reminder: MedicineReminder): string {
  return reminder.medicineName ?? 'medication';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FIXED QUESTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function medicationQuestion(profile: UserProfile, reminder: MedicineReminder): string {
  return `Hey ${displayName(profile)}, it's time for your ${medicineLabel(reminder)}. Have you taken it yet?`;
}

export function postReminderQuestion(profile: UserProfile, reminder: MedicineReminder): string {
  return `Hi ${displayName(profile)}, did you take your ${medicineLabel(reminder)} earlier today at ${reminder.time ?? ''}?`;
}

export function refillQuestion(profile: UserProfile, reminder: MedicineReminder): string {
  return `Hey ${displayName(profile)}, your ${medicineLabel(reminder)} is due for a refill soon. Have you planned to get it refilled?`;
}

export function greetingMessage(profile: UserProfile, now: LocalInstant): string {
  const period = greetingForHour(now.hour);
  return `Good ${period}, ${displayName(profile)}!`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// GENERATED TEXT
// ─────────────────────────────────────────────────────────────────────────────────

function profileContext(profile: UserProfile, reminders: Iterable<MedicineReminder>, now: LocalInstant): string {
  const name = displayName(profile);
  const age = profile.age !== undefined ? String(profile.age) : 'unknown';
  const hobbies = profile.hobbies || 'no hobbies specified';

  const medicines = profile.medicines.length > 0
    ? profile.medicines.map(m => `${m.medicineName ?? 'unknown'} (${m.dosage ?? 'unknown'})`).join(', ')
    : 'no medications recorded';

  const reminderParts: string[] = [];
  for (const reminder of reminders) {
    if (reminder.time) reminderParts.push(`${medicineLabel(reminder)} at ${reminder.time}`);
  }
  const reminderSummary = reminderParts.length > 0 ? reminderParts.join(', ') : 'no reminders set';

  const lines = [
    `You are a caring, warm companion for ${name}, who is ${age} years old and enjoys ${hobbies}.`,
    profile.medicalHistory ? `Their medical history includes: ${profile.medicalHistory}.` : '',
    `They take: ${medicines}.`,
    `Their medicine reminders today: ${reminderSummary}.`,
    `It is ${greetingForHour(now.hour)}, ${formatClockTime(now)} local time.`,
  ];
  return lines.filter(Boolean).join(' ');
}

export function directReplyPrompt(
  profile: UserProfile,
  reminders: Iterable<MedicineReminder>,
  reply: string,
  now: LocalInstant
): string {
  return [
    profileContext(profile, reminders, now),
    `Their latest message is: "${reply}".`,
    'Reply with a short, supportive response (not a question) that draws on their details where relevant.',
    'Only ask something back if the message needs clarification. Return only the response text.',
  ].join(' ');
}

export function chatPrompt(
  profile: UserProfile,
  reminders: Iterable<MedicineReminder>,
  message: string,
  now: LocalInstant
): string {
  return [
    profileContext(profile, reminders, now),
    `They wrote: "${message}".`,
    'Answer as a caring friend, drawing on their details where relevant. Do not greet them unless they greeted you.',
    'Return only the response text.',
  ].join(' ');
}

export function categoryQuestionPrompt(
  profile: UserProfile,
  reminders: Iterable<MedicineReminder>,
  topic: TopicChoice,
  now: LocalInstant
): string {
  return [
    profileContext(profile, reminders, now),
    `Ask ${displayName(profile)} one light, friendly question about "${topic.category}", specifically "${topic.subcategory}".`,
    'Personalize it with their hobbies or age, and do not repeat anything asked earlier in the conversation.',
    'Do not ask about taking or refilling medication. Return only the question.',
  ].join(' ');
}

/**
 * Newest turns handed to the generator alongside a prompt.
 */
export function contextTurns(history: readonly ConversationTurn[]): ConversationTurn[] {
  return history.slice(-CONTEXT_TURNS);
}
