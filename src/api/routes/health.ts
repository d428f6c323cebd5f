// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import { getLogger } from '../../observability/logging/index.js';
import { RedisStore, type KeyValueStore } from '../../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    storage: ComponentHealth & { type: 'redis' | 'memory' };
    memory: ComponentHealth;
  };
}

export interface ReadinessCheck {
  ready: boolean;
  timestamp: string;
  checks: {
    storage: boolean;
  };
}

export const SERVICE_VERSION = '1.0.0';
const HEALTH_KEY = 'health:ping';
const SLOW_STORAGE_MS = 1000;

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(store: KeyValueStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    const marker = String(start);
    await store.set(HEALTH_KEY, marker);
    const result = await store.get(HEALTH_KEY);

    if (result === null) {
      return { status: 'degraded', message: 'Write succeeded but read failed' };
    }

    const latency = Date.now() - start;
    if (latency > SLOW_STORAGE_MS) {
      return { status: 'degraded', latency, message: 'High latency' };
    }

    return { status: 'up', latency };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

function checkMemory(): ComponentHealth {
  const used = process.memoryUsage();
  const heapUsedMB = Math.round(used.heapUsed / 1024 / 1024);
  const heapTotalMB = Math.round(used.heapTotal / 1024 / 1024);
  const usagePercent = (used.heapUsed / used.heapTotal) * 100;

  if (usagePercent > 90) {
    return {
      status: 'degraded',
      message: `High memory usage: ${heapUsedMB}MB / ${heapTotalMB}MB (${usagePercent.toFixed(1)}%)`,
    };
  }

  return { status: 'up', message: `${heapUsedMB}MB / ${heapTotalMB}MB` };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(store: KeyValueStore): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── LIVENESS ───
  router.get('/health', async (_req: Request, res: Response) => {
    const storageHealth = await checkStorage(store);
    const memoryHealth = checkMemory();

    const allUp = storageHealth.status === 'up' && memoryHealth.status === 'up';
    const anyDown = storageHealth.status === 'down';

    const health: HealthCheck = {
      status: anyDown ? 'unhealthy' : (allUp ? 'healthy' : 'degraded'),
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      uptime: process.uptime(),
      checks: {
        storage: { ...storageHealth, type: store instanceof RedisStore ? 'redis' : 'memory' },
        memory: memoryHealth,
      },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', {
        status: health.status,
        storage: storageHealth.status,
        memory: memoryHealth.status,
      });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // ─── READINESS ───
  router.get('/ready', async (_req: Request, res: Response) => {
    const storageHealth = await checkStorage(store);

    const ready: ReadinessCheck = {
      ready: storageHealth.status !== 'down',
      timestamp: new Date().toISOString(),
      checks: { storage: storageHealth.status !== 'down' },
    };

    if (!ready.ready) {
      logger.error('Readiness check failed', undefined, {
        storage: storageHealth.status,
        message: storageHealth.message,
      });
    }

    res.status(ready.ready ? 200 : 503).json(ready);
  });

  return router;
}
