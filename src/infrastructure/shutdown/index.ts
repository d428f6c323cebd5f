export {
  type ShutdownPriority,
  PRIORITY_ORDER,
  type ShutdownHookFn,
  type ShutdownHook,
  type HookResult,
  type ShutdownResult,
  ShutdownRegistry,
  createServerCloseHook,
  createDisconnectHook,
} from './hooks.js';

export {
  type ShutdownConfig,
  type ShutdownOutcome,
  DEFAULT_SHUTDOWN_CONFIG,
  ShutdownHandler,
} from './handler.js';
