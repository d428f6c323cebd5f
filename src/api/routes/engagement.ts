// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT ROUTES — On-Demand Proactive Talk
// ═══════════════════════════════════════════════════════════════════════════════
//
//   POST /engagement   { reply?: string }
//
// Without a reply the caller gets the next proactive question; with one, the
// reply is recorded and answered.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { EngagementService } from '../../services/engagement/index.js';
import { asyncHandler, fromAppError } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';
import { EngagementRequestSchema } from '../schemas/index.js';

export function createEngagementRouter(engagement: EngagementService, clock: () => LocalInstant): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const body = EngagementRequestSchema.parse(req.body ?? {});

      const result = await engagement.engage(userId, body.reply, clock());
      if (!result.ok) throw fromAppError(result.error);

      const decision = result.value;
      res.json({
        message: decision.content,
        intent: decision.intent,
        type: decision.turnType,
        isCategoryQuestion: decision.isCategoryQuestion,
        category: decision.category ?? null,
        subcategory: decision.subcategory ?? null,
        reminderId: decision.reminderId ?? null,
        timestamp: decision.timestamp,
      });
    })
  );

  return router;
}
