// ═══════════════════════════════════════════════════════════════════════════════
// ENGAGEMENT AND CHAT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

/**
 * Reply length is enforced by the engagement engine against its configured
 * limit; an absent or blank reply asks for a proactive question.
 */
export const EngagementRequestSchema = z.object({
  reply: z.string().optional(),
});

/**
 * Free-form chat; an absent message only returns the greeting or last turn.
 */
export const ChatRequestSchema = z.object({
  message: z.string().optional(),
});

export type EngagementRequest = z.infer<typeof EngagementRequestSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
