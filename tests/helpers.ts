import { vi } from 'vitest';
import type {
  AcknowledgeRequest,
  AgentEvent,
  EventTransport,
  HeartbeatRequest,
  HeartbeatResponse,
  PingRequest,
} from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** In-process transport; every call succeeds with no events unless overridden. */
export function fakeTransport() {
  return {
    heartbeat: vi
      .fn<(request: HeartbeatRequest) => Promise<HeartbeatResponse>>()
      .mockResolvedValue({ events: [] }),
    acknowledge: vi
      .fn<(request: AcknowledgeRequest) => Promise<void>>()
      .mockResolvedValue(undefined),
    ping: vi
      .fn<(request: PingRequest) => Promise<void>>()
      .mockResolvedValue(undefined),
  } satisfies EventTransport;
}

/** Heartbeat response carrying the given events. */
export function heartbeatResponse(events: AgentEvent[]): HeartbeatResponse {
  return { events };
}

/** A promise plus the functions that settle it. */
export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
