// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for the Care Companion Backend
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

export function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOptionalNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'staging' | 'production';

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isStaging: boolean;
  isDevelopment: boolean;
}

function toEnvironment(value: string): Environment {
  if (value === 'production' || value === 'staging') return value;
  return 'development';
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const env = toEnvironment(envString('NODE_ENV', 'development'));

  return {
    environment: env,
    isProduction: env === 'production',
    isStaging: env === 'staging',
    isDevelopment: env === 'development',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ServerConfig {
  port: number;
  apiPrefix: string;
}

export function loadServerConfig(): ServerConfig {
  return {
    port: envNumber('PORT', 3000),
    apiPrefix: envString('API_PREFIX', '/api/v1'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGAGEMENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface EngagementConfig {
  /** IANA zone every "today" and "now" is computed in */
  timezone: string;
  maxHistoryLength: number;
  maxReplyLength: number;
  medicationWindowMinutes: number;
  exactWindowMinutes: number;
  refillThresholdDays: number;
  /** Max reminder specs accepted per create/update request */
  maxRemindersPerRequest: number;
  /** Set to make category selection reproducible */
  randomSeed?: number;
}

export function loadEngagementConfig(): EngagementConfig {
  return {
    timezone: envString('CARE_TIMEZONE', 'Asia/Kolkata'),
    maxHistoryLength: envNumber('MAX_HISTORY_LENGTH', 50),
    maxReplyLength: envNumber('MAX_REPLY_LENGTH', 1000),
    medicationWindowMinutes: envNumber('MEDICATION_WINDOW_MINUTES', 60),
    exactWindowMinutes: envNumber('EXACT_WINDOW_MINUTES', 1),
    refillThresholdDays: envNumber('REFILL_THRESHOLD_DAYS', 3),
    maxRemindersPerRequest: envNumber('MAX_REMINDERS_PER_REQUEST', 7),
    randomSeed: envOptionalNumber('RANDOM_SEED'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM
// ─────────────────────────────────────────────────────────────────────────────────

export interface LlmConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  mockProviderOnly: boolean;
}

export function loadLlmConfig(): LlmConfig {
  return {
    apiKey: process.env.OPENAI_API_KEY || undefined,
    model: envString('OPENAI_MODEL', 'gpt-4o-mini'),
    timeoutMs: envNumber('LLM_TIMEOUT_MS', 8000),
    maxTokens: envNumber('LLM_MAX_TOKENS', 200),
    mockProviderOnly: envBool('USE_MOCK_PROVIDER', false),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEDULER
// ─────────────────────────────────────────────────────────────────────────────────

export interface SchedulerConfig {
  enabled: boolean;
  intervalMs: number;
  concurrency: number;
}

export function loadSchedulerConfig(): SchedulerConfig {
  return {
    enabled: envBool('SCHEDULER_ENABLED', true),
    intervalMs: envNumber('SCHEDULER_INTERVAL_MS', 3 * 60 * 60 * 1000),
    concurrency: Math.max(1, envNumber('SCHEDULER_CONCURRENCY', 4)),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE
// ─────────────────────────────────────────────────────────────────────────────────

export interface StorageConfig {
  /** Absent = in-memory store */
  redisUrl?: string;
  keyPrefix: string;
}

export function loadStorageConfig(): StorageConfig {
  return {
    redisUrl: process.env.REDIS_URL || undefined,
    keyPrefix: envString('REDIS_KEY_PREFIX', 'care:'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFICATIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface NotificationConfig {
  /** Push gateway endpoint. Absent = notifications are only logged. */
  gatewayUrl?: string;
  gatewayKey?: string;
  timeoutMs: number;
}

export function loadNotificationConfig(): NotificationConfig {
  return {
    gatewayUrl: process.env.PUSH_GATEWAY_URL || undefined,
    gatewayKey: process.env.PUSH_GATEWAY_KEY || undefined,
    timeoutMs: envNumber('PUSH_TIMEOUT_MS', 5000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export interface LoggingConfig {
  level?: string;
  debugMode: boolean;
  redactPII: boolean;
}

export function loadLoggingConfig(): LoggingConfig {
  return {
    level: process.env.LOG_LEVEL || undefined,
    debugMode: envBool('DEBUG', false),
    redactPII: envBool('REDACT_PII', true),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface CareConfig {
  env: EnvironmentConfig;
  server: ServerConfig;
  engagement: EngagementConfig;
  llm: LlmConfig;
  scheduler: SchedulerConfig;
  storage: StorageConfig;
  notifications: NotificationConfig;
  logging: LoggingConfig;
}

let cachedConfig: CareConfig | null = null;

export function loadConfig(): CareConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    server: loadServerConfig(),
    engagement: loadEngagementConfig(),
    llm: loadLlmConfig(),
    scheduler: loadSchedulerConfig(),
    storage: loadStorageConfig(),
    notifications: loadNotificationConfig(),
    logging: loadLoggingConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): CareConfig {
  cachedConfig = null;
  return loadConfig();
}
