// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Environment Helpers and Section Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  envBool,
  envNumber,
  envString,
  loadConfig,
  loadEngagementConfig,
  loadSchedulerConfig,
  reloadConfig,
} from '../index.js';

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
});

afterEach(() => {
  process.env = originalEnv;
  reloadConfig();
});

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('environment helpers', () => {
  it('reads booleans', () => {
    process.env.FLAG_A = 'TRUE';
    process.env.FLAG_B = '0';
    expect(envBool('FLAG_A')).toBe(true);
    expect(envBool('FLAG_B', true)).toBe(false);
    expect(envBool('FLAG_MISSING', true)).toBe(true);
  });

  it('falls back for non-numeric numbers', () => {
    process.env.NUM_A = '42';
    process.env.NUM_B = 'forty';
    expect(envNumber('NUM_A', 1)).toBe(42);
    expect(envNumber('NUM_B', 7)).toBe(7);
  });

  it('reads strings', () => {
    process.env.STR_A = 'value';
    expect(envString('STR_A', 'fallback')).toBe('value');
    expect(envString('MISSING', 'fallback')).toBe('fallback');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadEngagementConfig', () => {
  it('uses the documented defaults', () => {
    delete process.env.CARE_TIMEZONE;
    delete process.env.RANDOM_SEED;
    delete process.env.MAX_HISTORY_LENGTH;

    const config = loadEngagementConfig();
    expect(config.timezone).toBe('Asia/Kolkata');
    expect(config.maxHistoryLength).toBe(50);
    expect(config.refillThresholdDays).toBe(3);
    expect(config.randomSeed).toBeUndefined();
  });

  it('reads an optional seed', () => {
    process.env.RANDOM_SEED = '1234';
    expect(loadEngagementConfig().randomSeed).toBe(1234);

    process.env.RANDOM_SEED = 'abc';
    expect(loadEngagementConfig().randomSeed).toBeUndefined();
  });
});

describe('loadSchedulerConfig', () => {
  it('never drops concurrency below one', () => {
    process.env.SCHEDULER_CONCURRENCY = '0';
    expect(loadSchedulerConfig().concurrency).toBe(1);
  });
});

describe('loadConfig', () => {
  it('caches until reloaded', () => {
    process.env.PORT = '8080';
    const first = reloadConfig();
    process.env.PORT = '9090';

    expect(loadConfig()).toBe(first);
    expect(loadConfig().server.port).toBe(8080);
    expect(reloadConfig().server.port).toBe(9090);
  });

  it('treats unknown environments as development', () => {
    process.env.NODE_ENV = 'qa';
    const config = reloadConfig();
    expect(config.env.environment).toBe('development');
    expect(config.env.isDevelopment).toBe(true);
  });

  it('leaves the push gateway unset by default', () => {
    delete process.env.PUSH_GATEWAY_URL;
    delete process.env.PUSH_GATEWAY_KEY;
    delete process.env.PUSH_TIMEOUT_MS;
    expect(reloadConfig().notifications).toEqual({ gatewayUrl: undefined, gatewayKey: undefined, timeoutMs: 5000 });
  });
});
