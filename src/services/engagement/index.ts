export { type UserLock, KeyedLock } from './keyed-lock.js';
export {
  type LeaseLockConfig,
  DEFAULT_LEASE_LOCK_CONFIG,
  LeaseLock,
  LockTimeoutError,
  createUserLock,
} from './lease-lock.js';
export { EngagementStateStore } from './state-store.js';
export {
  type EngagementServiceDeps,
  EngagementService,
  createEngagementService,
} from './engagement-service.js';
export {
  type TickReport,
  type EngagementSchedulerDeps,
  EngagementScheduler,
  createEngagementScheduler,
} from './scheduler.js';
export { type ChatServiceDeps, ChatService } from './chat-service.js';
