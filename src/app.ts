// ═══════════════════════════════════════════════════════════════════════════════
// APPLICATION — Service Wiring and Express App
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express, type Request, type Response, type NextFunction } from 'express';

import { errorHandler, NotFoundError } from './api/middleware/error-handler.js';
import { requestContext } from './api/middleware/request-context.js';
import { createApiRouter, createHealthRouter } from './api/routes/index.js';
import type { CareConfig } from './config/index.js';
import { loadTopicTaxonomy, type TextGenerator } from './core/engagement/index.js';
import { toLocalInstant, type LocalInstant } from './core/time/index.js';
import { createRandomSource } from './core/weighting/index.js';
import { createNotifier, type Notifier } from './notifications/index.js';
import {
  ChatService,
  createEngagementScheduler,
  createEngagementService,
  EngagementStateStore,
  KeyedLock,
  type EngagementScheduler,
  type EngagementService,
  type UserLock,
} from './services/engagement/index.js';
import { createTextGenerator } from './services/llm/index.js';
import {
  AdherenceService,
  CaregiverViewService,
  createMedicationReminderService,
  ReminderRepository,
  ResponseLogService,
  type MedicationReminderService,
} from './services/medication/index.js';
import { createProfileStore, type ProfileStore } from './services/users/index.js';
import type { DocumentStore, KeyValueStore } from './storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICES
// ─────────────────────────────────────────────────────────────────────────────────

export interface CareServices {
  readonly reminders: MedicationReminderService;
  readonly responses: ResponseLogService;
  readonly adherence: AdherenceService;
  readonly engagement: EngagementService;
  readonly chat: ChatService;
  readonly caregiverView: CaregiverViewService;
  readonly profiles: ProfileStore;
  readonly scheduler: EngagementScheduler;
  readonly clock: () => LocalInstant;
}

export interface ServiceOverrides {
  readonly textGenerator?: TextGenerator;
  readonly notifier?: Notifier;
  readonly clock?: () => LocalInstant;
  /** Per-user conversation lock; in-process when absent */
  readonly lock?: UserLock;
}

export function createServices(
  config: CareConfig,
  docs: DocumentStore,
  overrides: ServiceOverrides = {}
): CareServices {
  const { engagement: engagementConfig } = config;
  const clock = overrides.clock ?? (() => toLocalInstant(new Date(), engagementConfig.timezone));
  const notifier = overrides.notifier ?? createNotifier(config.notifications);

  const profiles = createProfileStore(docs);
  const reminders = createMedicationReminderService(new ReminderRepository(docs), {
    maxPerRequest: engagementConfig.maxRemindersPerRequest,
  });
  const responses = new ResponseLogService(docs, profiles, notifier, reminders);
  const adherence = new AdherenceService(reminders, responses);
  const caregiverView = new CaregiverViewService(reminders, responses, profiles);

  // Engagement and chat write the same conversation log, so they share one lock.
  const stateStore = new EngagementStateStore(docs);
  const textGenerator = overrides.textGenerator ?? createTextGenerator(config.llm);
  const lock = overrides.lock ?? new KeyedLock();

  const engagement = createEngagementService({
    stateStore,
    reminders,
    profiles,
    textGenerator,
    random: createRandomSource(engagementConfig.randomSeed),
    taxonomy: loadTopicTaxonomy(),
    lock,
    decisionConfig: {
      maxHistory: engagementConfig.maxHistoryLength,
      maxReplyLength: engagementConfig.maxReplyLength,
      medicationWindowMinutes: engagementConfig.medicationWindowMinutes,
      exactWindowMinutes: engagementConfig.exactWindowMinutes,
      refillThresholdDays: engagementConfig.refillThresholdDays,
    },
  });

  const chat = new ChatService({
    stateStore,
    reminders,
    profiles,
    textGenerator,
    lock,
    config: {
      maxHistory: engagementConfig.maxHistoryLength,
      maxReplyLength: engagementConfig.maxReplyLength,
    },
  });

  const scheduler = createEngagementScheduler({
    engagement,
    profiles,
    notifier,
    config: config.scheduler,
    clock,
  });

  return { reminders, responses, adherence, engagement, chat, caregiverView, profiles, scheduler, clock };
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPRESS APP
// ─────────────────────────────────────────────────────────────────────────────────

export function createApp(config: CareConfig, store: KeyValueStore, services: CareServices): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use(express.json({ limit: '100kb' }));

  app.use(createHealthRouter(store));
  app.use(config.server.apiPrefix, createApiRouter(services));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
