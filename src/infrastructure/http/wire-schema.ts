import { z } from 'zod';
import type { AgentEvent } from '../../domain/index.js';

/**
 * An event as serialized by the service.
 *
 * The discriminator travels in `c` and may carry a leading marker
 * (".PongEvent"); the dispatcher strips it. Every other field is payload.
 */
export const wireEventSchema = z.object({
  c: z.string(),
  id: z.string().nullish(),
}).passthrough();

export type WireEvent = z.infer<typeof wireEventSchema>;

export const heartbeatResponseSchema = z.object({
  events: z.array(wireEventSchema).nullish(),
}).passthrough();

/**
 * Moves the wire discriminator to `type`; a null id counts as absent.
 *
 * `type` is reserved for the discriminator: a payload field of that name
 * is replaced by the value of `c`.
 */
export function toAgentEvent(wire: WireEvent): AgentEvent {
  const { c, id, ...fields } = wire;
  return id ? { ...fields, type: c, id } : { ...fields, type: c };
}
