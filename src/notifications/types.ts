// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATION TYPES — Push Delivery to Device Tokens
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One push message addressed to a device token.
 */
export interface PushNotification {
  readonly token: string;
  readonly title: string;
  readonly body: string;
  readonly data?: Readonly<Record<string, string>>;
}

/**
 * Push delivery. Implementations never throw: a failed delivery is logged
 * and reported as `false`.
 */
export interface Notifier {
  send(token: string, title: string, body: string, data?: Readonly<Record<string, string>>): Promise<boolean>;
}

/** Titles used across the service. */
export const NOTIFICATION_TITLES = {
  reminderResponse: 'Medicine Reminder Update',
  newQuestion: 'New Question',
} as const;
