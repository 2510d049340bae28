import type { z } from 'zod';
import type { EventHandler } from '../domain/index.js';

/**
 * Wraps a handler so the event is validated before it runs.
 *
 * A payload that doesn't match `schema` throws a ZodError, which the
 * dispatcher treats like any other handler failure: logged, isolated,
 * and the event is still acknowledged.
 */
export function typedHandler<S extends z.ZodTypeAny>(
  schema: S,
  handle: (event: z.output<S>) => void | Promise<void>,
): EventHandler {
  return (event) => handle(schema.parse(event));
}
