// ═══════════════════════════════════════════════════════════════════════════════
// NOTIFICATIONS MODULE — Push Delivery
// ═══════════════════════════════════════════════════════════════════════════════

export type { PushNotification, Notifier } from './types.js';
export { NOTIFICATION_TITLES } from './types.js';

export {
  GatewayPushNotifier,
  LogOnlyNotifier,
  MockNotifier,
  createNotifier,
} from './providers.js';
