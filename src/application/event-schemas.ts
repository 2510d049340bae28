import { z } from 'zod';

/**
 * Zod schemas for the payload fields the agent reads from events.
 *
 * Schemas pass unknown keys through: the service may add fields at any
 * time and handlers only ever declare what they use.
 */
export const baseEventSchema = z.object({
  type: z.string().min(1),
  id: z.string().optional(),
  tenantId: z.string().optional(),
}).passthrough();

export const pongEventSchema = baseEventSchema.extend({
  type: z.literal('PongEvent'),
  message: z.string().optional(),
});

export type PongEvent = z.infer<typeof pongEventSchema>;

export const legalCaseReadyEventSchema = baseEventSchema.extend({
  type: z.literal('LegalCaseReadyEvent'),
  legalCaseId: z.string().min(1),
  legalCaseUrl: z.string().optional(),
});

export type LegalCaseReadyEvent = z.infer<typeof legalCaseReadyEventSchema>;

export const sourceFileReadyEventSchema = baseEventSchema.extend({
  type: z.literal('SourceFileReadyEvent'),
  sourceFileId: z.string().min(1),
  legalCaseId: z.string().optional(),
});

export type SourceFileReadyEvent = z.infer<typeof sourceFileReadyEventSchema>;

export const sourceFileFailedEventSchema = baseEventSchema.extend({
  type: z.literal('SourceFileFailedEvent'),
  sourceFileId: z.string().min(1),
  legalCaseId: z.string().optional(),
});

export type SourceFileFailedEvent = z.infer<typeof sourceFileFailedEventSchema>;
