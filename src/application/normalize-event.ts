import type { AgentEvent } from '../domain/index.js';

/**
 * The wire serialization may prefix the discriminator with a single
 * non-alphanumeric marker (".PongEvent"). Only the first character is
 * ever stripped.
 */
const TYPE_MARKER = /^[^A-Za-z0-9]/;

/** Returns the canonical type name for a raw discriminator value. */
export function canonicalTypeName(raw: string): string {
  return raw.replace(TYPE_MARKER, '');
}

/**
 * Returns a copy of the event with its `type` canonicalized.
 *
 * Purely structural: the input is not mutated, every other field is
 * carried over as-is, and the resulting type is not checked against the
 * known type names.
 */
export function normalizeEvent<E extends AgentEvent>(event: E): E {
  return { ...event, type: canonicalTypeName(event.type) };
}
