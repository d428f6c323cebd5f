// ═══════════════════════════════════════════════════════════════════════════════
// REMINDER ROUTES — Medicine Reminder Occurrences and Responses
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /reminders                          Create 1..N reminder specs
//   GET    /reminders                          All occurrences by date
//   GET    /reminders/upcoming                 Dates from today on
//   GET    /reminders/completed                Completed occurrences
//   GET    /reminders/missed                   Past, never completed
//   PATCH  /reminders                          Update 1..N occurrences
//   DELETE /reminders/:date/:reminderId        Delete one occurrence
//   POST   /reminders/:reminderId/responses    Record a response
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { MedicationReminderService, ResponseLogService } from '../../services/medication/index.js';
import { asyncHandler, fromAppError } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';
import {
  CreateRemindersSchema,
  ReminderIdParamSchema,
  ReminderOccurrenceParamsSchema,
  ReminderResponseSchema,
  UpdateRemindersSchema,
} from '../schemas/index.js';

export interface ReminderRouterDeps {
  readonly reminders: MedicationReminderService;
  readonly responses: ResponseLogService;
  readonly clock: () => LocalInstant;
}

export function createReminderRouter(deps: ReminderRouterDeps): Router {
  const router = Router();
  const { reminders, responses, clock } = deps;

  // ─── CREATE ───
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const body = CreateRemindersSchema.parse(req.body);

      const result = await reminders.createReminders(userId, body.reminders, clock());
      if (!result.ok) throw fromAppError(result.error);

      res.status(201).json({ reminders: result.value });
    })
  );

  // ─── LISTS ───
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      res.json({ days: await reminders.listAll(currentUserId(req)) });
    })
  );

  router.get(
    '/upcoming',
    asyncHandler(async (req: Request, res: Response) => {
      res.json({ days: await reminders.listUpcoming(currentUserId(req), clock().date) });
    })
  );

  router.get(
    '/completed',
    asyncHandler(async (req: Request, res: Response) => {
      res.json({ days: await reminders.listCompleted(currentUserId(req)) });
    })
  );

  router.get(
    '/missed',
    asyncHandler(async (req: Request, res: Response) => {
      res.json({ days: await reminders.listMissed(currentUserId(req), clock().date) });
    })
  );

  // ─── UPDATE ───
  router.patch(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const body = UpdateRemindersSchema.parse(req.body);

      const result = await reminders.updateReminders(userId, body.updates, clock());
      if (!result.ok) throw fromAppError(result.error);

      res.json({ reminders: result.value });
    })
  );

  // ─── DELETE ───
  router.delete(
    '/:date/:reminderId',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { date, reminderId } = ReminderOccurrenceParamsSchema.parse(req.params);

      const result = await reminders.deleteReminder(userId, date, reminderId);
      if (!result.ok) throw fromAppError(result.error);

      res.json({ deleted: true, date, reminderId });
    })
  );

  // ─── RESPONSES ───
  router.post(
    '/:reminderId/responses',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { reminderId } = ReminderIdParamSchema.parse(req.params);
      const body = ReminderResponseSchema.parse(req.body);

      const recorded = await responses.record(userId, { reminderId, ...body }, clock());

      res.status(201).json(recorded);
    })
  );

  return router;
}
