// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   app.use('/', createHealthRouter(store));
//   app.use('/api/v1', createApiRouter(deps));
//
// Every /api/v1 route requires the caller's user id.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';

import type { LocalInstant } from '../../core/time/index.js';
import type { ChatService, EngagementService } from '../../services/engagement/index.js';
import type {
  AdherenceService,
  CaregiverViewService,
  MedicationReminderService,
  ResponseLogService,
} from '../../services/medication/index.js';
import type { ProfileStore } from '../../services/users/index.js';
import { requireUser } from '../middleware/request-context.js';
import { createAdherenceRouter } from './adherence.js';
import { createCaregivingRouter } from './caregiving.js';
import { createChatRouter } from './chat.js';
import { createEngagementRouter } from './engagement.js';
import { createReminderRouter } from './reminders.js';
import { createUserRouter } from './users.js';

export { createHealthRouter, checkStorage, SERVICE_VERSION } from './health.js';
export { createReminderRouter, type ReminderRouterDeps } from './reminders.js';
export { createAdherenceRouter } from './adherence.js';
export { createEngagementRouter } from './engagement.js';
export { createUserRouter } from './users.js';
export { createChatRouter } from './chat.js';
export { createCaregivingRouter } from './caregiving.js';

export interface ApiRouterDeps {
  readonly reminders: MedicationReminderService;
  readonly responses: ResponseLogService;
  readonly adherence: AdherenceService;
  readonly engagement: EngagementService;
  readonly chat: ChatService;
  readonly caregiverView: CaregiverViewService;
  readonly profiles: ProfileStore;
  /** Current instant in the care time zone */
  readonly clock: () => LocalInstant;
}

export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();

  router.use(requireUser);

  router.use('/reminders', createReminderRouter(deps));
  router.use('/adherence', createAdherenceRouter(deps.adherence, deps.clock));
  router.use('/engagement', createEngagementRouter(deps.engagement, deps.clock));
  router.use('/chat', createChatRouter(deps.chat, deps.clock));
  router.use('/users', createUserRouter(deps.profiles, deps.clock));
  router.use('/caregiving', createCaregivingRouter(deps.caregiverView));

  return router;
}
