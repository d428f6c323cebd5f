// ═══════════════════════════════════════════════════════════════════════════════
// USER ROUTES — Profile, Medicines, Caregivers and Push Token
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { ProfileStore } from '../../services/users/index.js';
import { asyncHandler, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import { currentUserId } from '../middleware/request-context.js';
import {
  AddMedicinesSchema,
  MedicineIdParamSchema,
  PushTokenSchema,
  SetCaregiversSchema,
  UpdateUserDetailsSchema,
} from '../schemas/index.js';

export function createUserRouter(profiles: ProfileStore, clock: () => LocalInstant): Router {
  const router = Router();

  // ─────────────────────────────────────────────────────────────────────────────
  // DETAILS
  // ─────────────────────────────────────────────────────────────────────────────

  // GET /users/me
  router.get(
    '/me',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const details = await profiles.getDetails(userId);
      if (!details) throw new NotFoundError('User details');

      res.json({ userId, details });
    })
  );

  // PATCH /users/me
  router.patch(
    '/me',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const changes = UpdateUserDetailsSchema.parse(req.body);

      const details = await profiles.updateDetails(userId, changes);

      res.json({ details });
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // MEDICINES
  // ─────────────────────────────────────────────────────────────────────────────

  // GET /users/me/medicines
  router.get(
    '/me/medicines',
    asyncHandler(async (req: Request, res: Response) => {
      const medicines = await profiles.listMedicines(currentUserId(req));
      res.json({ medicines });
    })
  );

  // POST /users/me/medicines
  router.post(
    '/me/medicines',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { medicines } = AddMedicinesSchema.parse(req.body);

      const added = await profiles.addMedicines(userId, medicines, clock().iso);

      res.status(201).json({ medicines: added });
    })
  );

  // DELETE /users/me/medicines/:medicineId
  router.delete(
    '/me/medicines/:medicineId',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { medicineId } = MedicineIdParamSchema.parse(req.params);

      const deleted = await profiles.deleteMedicine(userId, medicineId);
      if (!deleted) throw new NotFoundError('Medicine', medicineId);

      res.json({ deleted: true, medicineId });
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // CAREGIVERS AND PUSH TOKEN
  // ─────────────────────────────────────────────────────────────────────────────

  // GET /users/me/caregivers
  router.get(
    '/me/caregivers',
    asyncHandler(async (req: Request, res: Response) => {
      const caregivers = await profiles.getCaregivers(currentUserId(req));
      res.json({ caregivers });
    })
  );

  // PUT /users/me/caregivers
  router.put(
    '/me/caregivers',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const body = SetCaregiversSchema.parse(req.body);
      if (body.caregivers.includes(userId)) {
        throw new ValidationError('A user cannot be their own caregiver');
      }

      const caregivers = await profiles.setCaregivers(userId, body.caregivers);

      res.json({ caregivers });
    })
  );

  // PUT /users/me/push-token
  router.put(
    '/me/push-token',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = currentUserId(req);
      const { token } = PushTokenSchema.parse(req.body);

      await profiles.setPushToken(userId, token);

      res.json({ success: true });
    })
  );

  return router;
}
