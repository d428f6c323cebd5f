// ═══════════════════════════════════════════════════════════════════════════════
// RESULT — Expected Failures as Values
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a value or an expected failure. Services return these for outcomes a
 * caller must handle (a missing reminder, a bad date); thrown errors are left
 * for faults.
 *
 * @example
 * ```typescript
 * const result = await reminders.deleteReminder(userId, date, reminderId);
 * if (!result.ok) throw fromAppError(result.error);
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Create a success Result with no value (void).
 */
export function okVoid(): Ok<void> {
  return { ok: true, value: undefined };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TYPE GUARDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Check if a Result is Ok.
 */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

/**
 * Check if a Result is Err.
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON ERROR TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Standard application error with code and context.
 */
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;
}

/**
 * Create an AppError.
 */
export function appError(
  code: string,
  message: string,
  options?: { cause?: Error; context?: Record<string, unknown> }
): AppError {
  return {
    code,
    message,
    cause: options?.cause,
    context: options?.context,
  };
}

/**
 * Codes carried by AppError; the HTTP layer maps each to a status.
 */
export const ErrorCode = {
  // Validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Access
  FORBIDDEN: 'FORBIDDEN',

  // Not found
  NOT_FOUND: 'NOT_FOUND',
  REMINDER_NOT_FOUND: 'REMINDER_NOT_FOUND',

  // External services
  PROVIDER_ERROR: 'PROVIDER_ERROR',
  TIMEOUT: 'TIMEOUT',
  STORE_ERROR: 'STORE_ERROR',
  NOTIFICATION_ERROR: 'NOTIFICATION_ERROR',

  // Internal
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type AppResult<T> = Result<T, AppError>;

export type AsyncAppResult<T> = AsyncResult<T, AppError>;
