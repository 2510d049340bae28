import type { EventHandler } from '../domain/index.js';

/** Handlers keyed by canonical event type name. */
export type EventHandlers =
  | ReadonlyMap<string, EventHandler>
  | Readonly<Record<string, EventHandler | undefined>>;

/**
 * Immutable lookup from event type name to its handler.
 *
 * The mapping is copied at construction, so the caller can't add or
 * replace handlers once a dispatcher holds the registry. Build the full
 * map before starting the loop; events that arrive for a type with no
 * handler are only logged.
 */
export class HandlerRegistry {
  private readonly handlers: ReadonlyMap<string, EventHandler>;

  constructor(handlers: EventHandlers) {
    const entries = isMap(handlers) ? [...handlers.entries()] : Object.entries(handlers);
    const copy = new Map<string, EventHandler>();
    for (const [type, handler] of entries) {
      if (handler) copy.set(type, handler);
    }
    this.handlers = copy;
  }

  lookup(type: string): EventHandler | undefined {
    return this.handlers.get(type);
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  /** Registered type names, in registration order. */
  types(): string[] {
    return [...this.handlers.keys()];
  }

  get size(): number {
    return this.handlers.size;
  }
}

export function createHandlerRegistry(handlers: EventHandlers): HandlerRegistry {
  return new HandlerRegistry(handlers);
}

function isMap(
  handlers: EventHandlers,
): handlers is ReadonlyMap<string, EventHandler> {
  return handlers instanceof Map;
}
