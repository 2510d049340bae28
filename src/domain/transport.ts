import type { AgentEvent } from './event.js';

export interface HeartbeatRequest {
  /** Version string of the running agent, reported on every heartbeat. */
  readonly clientVersion: string;
}

export interface HeartbeatResponse {
  /** Absent or empty when nothing is queued. */
  readonly events?: readonly AgentEvent[] | undefined;
}

export interface AcknowledgeRequest {
  readonly eventId: string;
}

export interface PingRequest {
  readonly message: string;
}

/**
 * Request/response channel to the remote service.
 *
 * Every method rejects on failure; the dispatcher decides what a failure
 * means for the current cycle.
 */
export interface EventTransport {
  heartbeat(request: HeartbeatRequest): Promise<HeartbeatResponse>;
  acknowledge(request: AcknowledgeRequest): Promise<void>;
  /** Asks the service to queue a `PongEvent` for this agent. */
  ping(request: PingRequest): Promise<void>;
}
