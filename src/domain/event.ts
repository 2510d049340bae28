/**
 * Core domain types for events delivered by the remote service.
 *
 * These types define the shape of an event as it flows through the
 * agent. They carry no framework dependencies.
 */

/**
 * An event received on a heartbeat.
 *
 * `type` is the discriminator used for handler lookup. On the wire it may
 * carry a single leading marker character; see `normalizeEvent()`.
 *
 * `id` is the acknowledgment token. Informational events carry none and
 * can never be acknowledged.
 *
 * Every other field is type-specific payload.
 */
export interface AgentEvent {
  readonly type: string;
  readonly id?: string | undefined;
  readonly [field: string]: unknown;
}

/** An event that can be passed back to `acknowledge`. */
export type AcknowledgeableEvent = AgentEvent & { readonly id: string };

/**
 * Consumer-supplied callback bound to one event type.
 * A thrown error or rejected promise counts as a handler failure.
 */
export type EventHandler = (event: AgentEvent) => void | Promise<void>;

/** Narrows an event to one that carries a non-empty id. */
export function hasEventId(event: AgentEvent): event is AcknowledgeableEvent {
  return typeof event.id === 'string' && event.id.length > 0;
}
