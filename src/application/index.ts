export { canonicalTypeName, normalizeEvent } from './normalize-event.js';
export { HandlerRegistry, createHandlerRegistry } from './handler-registry.js';
export type { EventHandlers } from './handler-registry.js';
export {
  EventDispatcher,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HANDLER_TIMEOUT_MS,
} from './event-dispatcher.js';
export type {
  EventDispatcherOptions,
  DispatcherState,
  DispatcherStatus,
  CycleReport,
} from './event-dispatcher.js';
export { TimeoutError, withTimeout } from './with-timeout.js';
export { typedHandler } from './typed-handler.js';
export {
  baseEventSchema,
  pongEventSchema,
  legalCaseReadyEventSchema,
  sourceFileReadyEventSchema,
  sourceFileFailedEventSchema,
} from './event-schemas.js';
export type {
  PongEvent,
  LegalCaseReadyEvent,
  SourceFileReadyEvent,
  SourceFileFailedEvent,
} from './event-schemas.js';
export { createDefaultHandlers } from './default-handlers.js';
export { runConnectivityCheck } from './connectivity-check.js';
export type { ConnectivityCheckOptions, ConnectivityCheckResult } from './connectivity-check.js';
