// ═══════════════════════════════════════════════════════════════════════════════
// CHAT ROUTES — Free-Form Conversation
// ═══════════════════════════════════════════════════════════════════════════════
//
//   POST /chat   { message?: string }
//
// Shares the conversation log with /engagement. An empty log or "hello" is
// answered with a greeting first.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { ChatService } from '../../services/engagement/index.js';
import { asyncHandler, fromAppError } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';
import { ChatRequestSchema } from '../schemas/index.js';

export function createChatRouter(chat: ChatService, clock: () => LocalInstant): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { message } = ChatRequestSchema.parse(req.body ?? {});

      const result = await chat.chat(userId, message, clock());
      if (!result.ok) throw fromAppError(result.error);

      res.json({
        response: result.value.response,
        greeted: result.value.greeted,
        timestamp: result.value.timestamp,
      });
    })
  );

  return router;
}
