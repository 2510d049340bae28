export type { AgentEvent, AcknowledgeableEvent, EventHandler } from './event.js';
export { hasEventId } from './event.js';
export { KNOWN_EVENT_TYPES, isKnownEventType } from './event-types.js';
export type { EventTypeName } from './event-types.js';
export type {
  EventTransport,
  HeartbeatRequest,
  HeartbeatResponse,
  AcknowledgeRequest,
  PingRequest,
} from './transport.js';
