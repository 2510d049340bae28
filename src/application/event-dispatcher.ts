import type { Logger } from 'pino';
import type { AgentEvent, EventTransport } from '../domain/index.js';
import { hasEventId } from '../domain/index.js';
import type { HandlerRegistry } from './handler-registry.js';
import { normalizeEvent } from './normalize-event.js';
import { withTimeout } from './with-timeout.js';

/** Default pause between two heartbeats: 10 minutes. */
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 10 * 60 * 1000;

/** Default budget for a single handler invocation: 5 minutes. */
export const DEFAULT_HANDLER_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * idle     → never started
 * running  → timer armed or a cycle in flight
 * stopping → stop requested while a cycle was in flight
 * stopped  → no timer, no cycle; `start()` may be called again
 */
export type DispatcherState = 'idle' | 'running' | 'stopping' | 'stopped';

/** Outcome of one heartbeat → dispatch → acknowledge round. */
export interface CycleReport {
  heartbeatOk: boolean;
  received: number;
  handled: number;
  unhandled: number;
  handlerFailures: number;
  acknowledged: number;
  acknowledgeFailures: number;
  missingId: number;
}

export interface DispatcherStatus {
  state: DispatcherState;
  intervalMs: number;
  cycles: number;
  lastHeartbeatAt: Date | null;
  lastSuccessfulHeartbeatAt: Date | null;
  consecutiveHeartbeatFailures: number;
  lastCycle: CycleReport | null;
}

export interface EventDispatcherOptions {
  transport: EventTransport;
  registry: HandlerRegistry;
  log: Logger;
  /** Reported to the service on every heartbeat. */
  clientVersion: string;
  intervalMs?: number | undefined;
  /** 0 disables the bound. */
  handlerTimeoutMs?: number | undefined;
  /** Runs once, after the first successful heartbeat. */
  onReady?: (() => void | Promise<void>) | undefined;
}

function emptyReport(heartbeatOk: boolean): CycleReport {
  return {
    heartbeatOk,
    received: 0,
    handled: 0,
    unhandled: 0,
    handlerFailures: 0,
    acknowledged: 0,
    acknowledgeFailures: 0,
    missingId: 0,
  };
}

/**
 * Heartbeat-driven event loop.
 *
 * Each cycle polls the transport, normalizes the returned events,
 * dispatches them one by one to their handlers and then acknowledges
 * every event that carries an id, whether or not its handler succeeded.
 *
 * Failure boundaries:
 * - heartbeat failure → logged, the next scheduled cycle retries
 * - handler failure   → logged, isolated to that event
 * - ack failure       → logged, left to server-side redelivery
 *
 * Nothing inside a cycle ends the loop; only `stop()` does. The next
 * timer is armed after a cycle completes, so two cycles never overlap.
 */
export class EventDispatcher {
  private readonly transport: EventTransport;
  private readonly registry: HandlerRegistry;
  private readonly log: Logger;
  private readonly clientVersion: string;
  private readonly intervalMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly onReady: (() => void | Promise<void>) | undefined;

  private state: DispatcherState = 'idle';
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | null = null;
  private readyNotified = false;

  private cycles = 0;
  private lastHeartbeatAt: Date | null = null;
  private lastSuccessfulHeartbeatAt: Date | null = null;
  private consecutiveHeartbeatFailures = 0;
  private lastCycle: CycleReport | null = null;

  constructor(options: EventDispatcherOptions) {
    this.transport = options.transport;
    this.registry = options.registry;
    this.log = options.log;
    this.clientVersion = options.clientVersion;
    this.intervalMs = options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
    this.onReady = options.onReady;
  }

  /** Starts the loop. The first heartbeat is sent immediately. */
  start(): void {
    if (this.state === 'running') {
      this.log.warn('Event dispatcher already running, ignoring start()');
      return;
    }

    if (this.state === 'stopping') {
      // The in-flight cycle re-arms the timer when it completes.
      this.state = 'running';
      this.log.info('Event dispatcher resumed before in-flight cycle completed');
      return;
    }

    this.state = 'running';
    this.log.info(
      { intervalMs: this.intervalMs, handlerTypes: this.registry.types() },
      'Event dispatcher started',
    );

    if (this.inFlight) {
      // A runOnce() cycle is still on the wire; it starts the loop when done.
      this.log.info('First heartbeat deferred until the in-flight cycle completes');
      return;
    }
    this.tick();
  }

  /**
   * Stops the loop. Safe to call at any time and any number of times.
   *
   * A pending timer is cleared. A cycle already in flight runs to the end,
   * acknowledgments included, but schedules nothing afterwards.
   */
  stop(): void {
    clearTimeout(this.timer);
    this.timer = undefined;

    switch (this.state) {
      case 'running':
        this.state = this.inFlight ? 'stopping' : 'stopped';
        this.log.info({ cycleInFlight: this.inFlight !== null }, 'Event dispatcher stopping');
        break;
      case 'idle':
        this.state = 'stopped';
        break;
      case 'stopping':
      case 'stopped':
        break;
    }
  }

  /** Resolves once no cycle is in flight. */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  /**
   * Runs a single cycle outside the timer loop.
   *
   * Meant for one-shot tools and tests; rejects while the loop itself is
   * running or another cycle is in flight, so that two cycles never
   * overlap. `start()` called meanwhile sends its first heartbeat once this
   * cycle completes.
   */
  async runOnce(): Promise<CycleReport> {
    if (this.state === 'running' || this.state === 'stopping') {
      throw new Error(`runOnce() is not available while the dispatcher is ${this.state}`);
    }
    if (this.inFlight) {
      throw new Error('runOnce() is not available while another cycle is in flight');
    }

    const cycle = this.runCycle(false);
    // The caller sees the outcome through `cycle`; this chain only tracks it.
    this.inFlight = cycle
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        this.inFlight = null;
        this.afterOneShot();
      });
    return cycle;
  }

  status(): DispatcherStatus {
    return {
      state: this.state,
      intervalMs: this.intervalMs,
      cycles: this.cycles,
      lastHeartbeatAt: this.lastHeartbeatAt,
      lastSuccessfulHeartbeatAt: this.lastSuccessfulHeartbeatAt,
      consecutiveHeartbeatFailures: this.consecutiveHeartbeatFailures,
      lastCycle: this.lastCycle,
    };
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  private tick(): void {
    this.timer = undefined;
    this.inFlight = this.runCycle(true)
      .then(() => undefined)
      .catch((err: unknown) => {
        // runCycle() has its own error boundaries; this is the last line.
        this.log.error({ err }, 'Unexpected error in heartbeat cycle');
      })
      .finally(() => {
        this.inFlight = null;
        this.afterCycle();
      });
  }

  private afterCycle(): void {
    if (this.state === 'running') {
      this.timer = setTimeout(() => this.tick(), this.intervalMs);
      return;
    }
    if (this.state === 'stopping') {
      this.state = 'stopped';
      this.log.info('Event dispatcher stopped');
    }
  }

  /** Picks up a `start()` or `stop()` that arrived during a runOnce() cycle. */
  private afterOneShot(): void {
    if (this.state === 'running') {
      this.tick();
      return;
    }
    if (this.state === 'stopping') {
      this.state = 'stopped';
      this.log.info('Event dispatcher stopped');
    }
  }

  /** True once `stop()` has been observed by the loop. */
  private stopRequested(): boolean {
    return this.state === 'stopping' || this.state === 'stopped';
  }

  // ---------------------------------------------------------------------------
  // One cycle
  // ---------------------------------------------------------------------------

  private async runCycle(fromLoop: boolean): Promise<CycleReport> {
    this.lastHeartbeatAt = new Date();

    let events: readonly AgentEvent[];
    try {
      const response = await this.transport.heartbeat({ clientVersion: this.clientVersion });
      events = response.events ?? [];
    } catch (err: unknown) {
      this.consecutiveHeartbeatFailures++;
      if (fromLoop && this.stopRequested()) {
        this.log.debug({ err }, 'Heartbeat failed after stop, not reporting');
      } else {
        this.log.error(
          { err, consecutiveFailures: this.consecutiveHeartbeatFailures },
          'Heartbeat failed',
        );
      }
      return this.finishCycle(emptyReport(false));
    }

    this.consecutiveHeartbeatFailures = 0;
    this.lastSuccessfulHeartbeatAt = new Date();
    await this.notifyReady();

    const report = emptyReport(true);
    if (events.length === 0) {
      this.log.debug('Heartbeat returned no events');
      return this.finishCycle(report);
    }

    report.received = events.length;
    this.log.info({ count: events.length }, `Received ${events.length} event(s)`);

    const normalized = events.map((event) => normalizeEvent(event));

    await this.dispatchAll(normalized, report);
    await this.acknowledgeAll(normalized, report);

    this.log.debug({ report }, 'Heartbeat cycle completed');
    return this.finishCycle(report);
  }

  private finishCycle(report: CycleReport): CycleReport {
    this.cycles++;
    this.lastCycle = report;
    return report;
  }

  /** Sequential, in transport order. One failure never blocks the next event. */
  private async dispatchAll(events: readonly AgentEvent[], report: CycleReport): Promise<void> {
    for (const event of events) {
      const handler = this.registry.lookup(event.type);
      if (!handler) {
        report.unhandled++;
        this.log.info({ type: event.type, eventId: event.id }, `Unhandled event type: ${event.type}`);
        continue;
      }

      try {
        // Promise.resolve().then() turns a synchronous throw into a rejection.
        await withTimeout(
          Promise.resolve().then(() => handler(event)),
          this.handlerTimeoutMs,
          `Handler for ${event.type}`,
        );
        report.handled++;
      } catch (err: unknown) {
        report.handlerFailures++;
        this.log.error(
          { err, type: event.type, eventId: event.id },
          `Handler error for ${event.type}`,
        );
      }
    }
  }

  /**
   * Fans out one acknowledgment per event with an id and waits for all of
   * them. Each call settles on its own; a rejection never cancels the rest.
   */
  private async acknowledgeAll(events: readonly AgentEvent[], report: CycleReport): Promise<void> {
    const ackable = events.filter(hasEventId);

    await Promise.all(
      ackable.map(async (event) => {
        try {
          await this.transport.acknowledge({ eventId: event.id });
          report.acknowledged++;
        } catch (err: unknown) {
          report.acknowledgeFailures++;
          this.log.error(
            { err, eventId: event.id, type: event.type },
            `Failed to acknowledge event ${event.id}`,
          );
        }
      }),
    );

    for (const event of events) {
      if (!hasEventId(event)) {
        report.missingId++;
        this.log.error({ type: event.type }, `Event missing id (type: ${event.type}), cannot acknowledge`);
      }
    }
  }

  private async notifyReady(): Promise<void> {
    if (this.readyNotified || !this.onReady) return;
    this.readyNotified = true;
    try {
      await this.onReady();
    } catch (err: unknown) {
      this.log.warn({ err }, 'onReady hook failed');
    }
  }
}
