// ═══════════════════════════════════════════════════════════════════════════════
// REDACTION — Strip PII and Secrets from Log Entries
// ═══════════════════════════════════════════════════════════════════════════════

export interface RedactionOptions {
  /** Extra field names (case-insensitive substrings) to mask entirely */
  sensitiveKeys?: readonly string[];
  /** Depth after which nested values are replaced */
  maxDepth?: number;
}

const DEFAULT_SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

const PII_PATTERNS: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  { pattern: /\+?\d{1,3}[-.\s]?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g, replacement: '[PHONE]' },
  { pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, replacement: '[CARD]' },
];

export function redactString(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function isSensitiveKey(key: string, sensitiveKeys: readonly string[]): boolean {
  const lower = key.toLowerCase();
  return sensitiveKeys.some(k => lower.includes(k));
}

function redactValue(value: unknown, sensitiveKeys: readonly string[], depth: number, maxDepth: number): unknown {
  if (depth > maxDepth) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return redactString(value);
  }

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, sensitiveKeys, depth + 1, maxDepth));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, sensitiveKeys)
        ? '[REDACTED]'
        : redactValue(inner, sensitiveKeys, depth + 1, maxDepth);
    }
    return result;
  }

  return value;
}

/**
 * Redact a log entry. Top-level bookkeeping fields are left untouched.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const sensitiveKeys = [...DEFAULT_SENSITIVE_KEYS, ...(options.sensitiveKeys ?? [])];
  const maxDepth = options.maxDepth ?? 5;
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(entry)) {
    if (key === 'time' || key === 'level' || key === 'levelNum' || key === 'requestId') {
      result[key] = value;
    } else if (isSensitiveKey(key, sensitiveKeys)) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactValue(value, sensitiveKeys, 1, maxDepth);
    }
  }

  return result;
}
