// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  type RequestLogData,
  LOG_LEVELS,
  configureLogger,
  getLogger,
  resetLogger,
  logRequest,
} from './logger.js';

export {
  type LoggingContext,
  runWithLoggingContext,
  getLoggingContext,
  setContextUserId,
} from './context.js';

export {
  type RedactionOptions,
  redact,
  redactString,
} from './redaction.js';
