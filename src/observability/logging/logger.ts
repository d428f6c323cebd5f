// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled Logging with Context & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON output for production, pretty-print for development
// - Request id / user id injected from AsyncLocalStorage
// - PII and secret redaction
// - Component-based child loggers
//
// Usage:
//   const logger = getLogger({ component: 'engagement' });
//   logger.info('Question asked', { userId, intent });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../../config/index.js';
import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  redactPII?: boolean;
  redactionOptions?: RedactionOptions;
  serviceName?: string;
  environment?: string;
  timestamp?: boolean;
  /** Receives every formatted line; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

export interface LoggerOptions {
  component?: string;
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  isLevelEnabled(level: LogLevel): boolean;
}

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  userId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

function defaultConfig(): LoggerConfig {
  const config = loadConfig();
  return {
    pretty: !config.env.isProduction,
    redactPII: config.logging.redactPII,
    serviceName: 'care-companion',
    environment: config.env.environment,
    timestamp: true,
  };
}

let globalConfig: LoggerConfig | null = null;

function currentConfig(): LoggerConfig {
  if (!globalConfig) {
    globalConfig = defaultConfig();
  }
  return globalConfig;
}

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...currentConfig(), ...config };
  rootLogger = null;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getEffectiveLevel(): LogLevel {
  const configured = currentConfig().level;
  if (configured) return configured;

  const { logging } = loadConfig();
  const envLevel = logging.level?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return logging.debugMode ? 'debug' : 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const config = currentConfig();

  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: config.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: config.serviceName,
    env: config.environment,
    ...(component && { component }),
    ...getLoggingContext(),
    ...context,
  };

  if (config.redactPII) {
    return redact(entry, config.redactionOptions);
  }

  return entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component', 'requestId']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const requestIdStr = typeof entry.requestId === 'string' ? `[${entry.requestId.slice(0, 8)}]` : '';

  const contextFields = Object.fromEntries(
    Object.entries(entry).filter(([key]) => !STANDARD_FIELDS.has(key))
  );
  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${time}${RESET} ${COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${requestIdStr}${componentStr} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const config = currentConfig();
  const line = config.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (config.sink) {
    config.sink(level, line);
    return;
  }

  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;
  const levelNum = LOG_LEVELS[getEffectiveLevel()];

  const log = (
    level: LogLevel,
    message: string,
    context: Record<string, unknown> = {},
    error?: unknown
  ): void => {
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }

    const errorContext = error !== undefined ? formatError(error) : {};
    const entry = formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component);
    writeLog(level, entry);
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
    fatal: (message, error, context) => log('fatal', message, context, error),

    child: (childOptions: LoggerOptions): ILogger => createLoggerImpl({
      component: childOptions.component ?? component,
      context: { ...baseContext, ...childOptions.context },
    }),

    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({ component: 'http' });
  const message = `${data.method} ${data.path} ${data.statusCode}`;

  const context: Record<string, unknown> = {
    method: data.method,
    path: data.path,
    statusCode: data.statusCode,
    durationMs: data.duration,
  };
  if (data.userId) context.userId = data.userId;

  if (data.statusCode >= 500) {
    logger.error(message, undefined, context);
  } else if (data.statusCode >= 400) {
    logger.warn(message, context);
  } else {
    logger.info(message, context);
  }
}
