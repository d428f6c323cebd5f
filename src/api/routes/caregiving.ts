// ═══════════════════════════════════════════════════════════════════════════════
// CAREGIVING ROUTES — A Caregiver's Read-Only View of a User
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { CaregiverViewService } from '../../services/medication/index.js';
import { asyncHandler, fromAppError } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';
import { UserIdParamSchema } from '../schemas/index.js';

export function createCaregivingRouter(view: CaregiverViewService): Router {
  const router = Router();

  // GET /caregiving/:userId/reminders
  router.get(
    '/:userId/reminders',
    asyncHandler(async (req: Request, res: Response) => {
      const caregiverId = currentUserId(req);
      const { userId } = UserIdParamSchema.parse(req.params);

      const result = await view.getRemindersWithStatus(caregiverId, userId);
      if (!result.ok) throw fromAppError(result.error);

      res.json(result.value);
    })
  );

  return router;
}
