// ═══════════════════════════════════════════════════════════════════════════════
// ADHERENCE ROUTES
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { AdherenceService } from '../../services/medication/index.js';
import { asyncHandler } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';

export function createAdherenceRouter(adherence: AdherenceService, clock: () => LocalInstant): Router {
  const router = Router();

  // GET /adherence
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const now = clock();
      const summary = await adherence.getSummary(currentUserId(req), now);
      res.json({ date: now.date, ...summary });
    })
  );

  return router;
}
