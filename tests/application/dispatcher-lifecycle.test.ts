import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventDispatcher } from '../../src/application/event-dispatcher.js';
import type { EventDispatcherOptions } from '../../src/application/event-dispatcher.js';
import { createHandlerRegistry } from '../../src/application/handler-registry.js';
import type { HeartbeatResponse } from '../../src/domain/index.js';
import { deferred, fakeLogger, fakeTransport, heartbeatResponse } from '../helpers.js';

const INTERVAL_MS = 60_000;

describe('EventDispatcher lifecycle', () => {
  let log: ReturnType<typeof fakeLogger>;
  let transport: ReturnType<typeof fakeTransport>;
  let dispatcher: EventDispatcher;

  function create(overrides: Partial<EventDispatcherOptions> = {}): EventDispatcher {
    dispatcher = new EventDispatcher({
      transport,
      registry: createHandlerRegistry({}),
      log,
      clientVersion: '1.0.0-test',
      intervalMs: INTERVAL_MS,
      ...overrides,
    });
    return dispatcher;
  }

  /** Lets pending promise chains settle without moving the clock. */
  async function settle(): Promise<void> {
    await vi.advanceTimersByTimeAsync(0);
  }

  beforeEach(() => {
    vi.useFakeTimers();
    log = fakeLogger();
    transport = fakeTransport();
  });

  afterEach(() => {
    dispatcher.stop();
    vi.useRealTimers();
  });

  describe('start()', () => {
    it('sends the first heartbeat immediately', () => {
      create().start();

      expect(transport.heartbeat).toHaveBeenCalledTimes(1);
      expect(dispatcher.status().state).toBe('running');
    });

    it('sends the next heartbeat one interval after the cycle completes', async () => {
      create().start();
      await settle();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
      expect(transport.heartbeat).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
    });

    it('keeps polling after a failed heartbeat', async () => {
      transport.heartbeat.mockRejectedValueOnce(new Error('offline'));
      create().start();
      await settle();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ consecutiveFailures: 1 }),
        'Heartbeat failed',
      );
      expect(dispatcher.status().consecutiveHeartbeatFailures).toBe(0);
    });

    it('never overlaps cycles when a heartbeat outlasts the interval', async () => {
      const slow = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(slow.promise);
      create().start();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);
      expect(transport.heartbeat).toHaveBeenCalledTimes(1);

      slow.resolve({ events: [] });
      await settle();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
    });

    it('warns and ignores a second start() while running', async () => {
      create().start();
      dispatcher.start();
      await settle();

      expect(log.warn).toHaveBeenCalledWith('Event dispatcher already running, ignoring start()');
      expect(transport.heartbeat).toHaveBeenCalledTimes(1);
    });

    it('can be started again after stop()', async () => {
      create().start();
      await settle();
      dispatcher.stop();
      expect(dispatcher.status().state).toBe('stopped');

      dispatcher.start();

      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
      expect(dispatcher.status().state).toBe('running');
    });

    it('resumes when start() follows stop() before the in-flight cycle finished', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      create().start();
      dispatcher.stop();
      expect(dispatcher.status().state).toBe('stopping');

      dispatcher.start();
      expect(log.info).toHaveBeenCalledWith(
        'Event dispatcher resumed before in-flight cycle completed',
      );

      pending.resolve({ events: [] });
      await settle();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
      expect(dispatcher.status().state).toBe('running');
    });
  });

  describe('stop()', () => {
    it('prevents any further heartbeat', async () => {
      create().start();
      dispatcher.stop();
      await dispatcher.whenIdle();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 5);

      expect(transport.heartbeat).toHaveBeenCalledTimes(1);
      expect(dispatcher.status().state).toBe('stopped');
    });

    it('is a no-op before start() and when repeated', () => {
      create();
      dispatcher.stop();
      dispatcher.stop();

      expect(dispatcher.status().state).toBe('stopped');
      expect(transport.heartbeat).not.toHaveBeenCalled();
    });

    it('lets the in-flight cycle finish its acknowledgments', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      create().start();

      dispatcher.stop();
      pending.resolve(
        heartbeatResponse([
          { type: 'PongEvent', id: 'evt-1' },
          { type: 'PongEvent', id: 'evt-2' },
        ]),
      );
      await dispatcher.whenIdle();

      expect(transport.acknowledge).toHaveBeenCalledWith({ eventId: 'evt-1' });
      expect(transport.acknowledge).toHaveBeenCalledWith({ eventId: 'evt-2' });
      expect(dispatcher.status().state).toBe('stopped');
      expect(log.info).toHaveBeenCalledWith('Event dispatcher stopped');
    });

    it('does not report a heartbeat that fails after stop()', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      create().start();

      dispatcher.stop();
      pending.reject(new Error('socket hang up'));
      await dispatcher.whenIdle();

      expect(log.error).not.toHaveBeenCalled();
      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        'Heartbeat failed after stop, not reporting',
      );
    });
  });

  describe('onReady', () => {
    it('runs once, after the first successful heartbeat', async () => {
      const onReady = vi.fn();
      transport.heartbeat.mockRejectedValueOnce(new Error('offline'));
      create({ onReady }).start();
      await settle();
      expect(onReady).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      expect(transport.heartbeat).toHaveBeenCalledTimes(3);
      expect(onReady).toHaveBeenCalledTimes(1);
    });

    it('logs a failing hook and keeps the loop alive', async () => {
      const onReady = vi.fn().mockRejectedValue(new Error('ping failed'));
      create({ onReady }).start();
      await settle();

      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        'onReady hook failed',
      );
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
    });
  });

  describe('runOnce()', () => {
    it('rejects while the loop is running', async () => {
      create().start();

      await expect(dispatcher.runOnce()).rejects.toThrow(
        'runOnce() is not available while the dispatcher is running',
      );
    });

    it('is available again once the loop has stopped', async () => {
      create().start();
      dispatcher.stop();
      await dispatcher.whenIdle();

      const report = await dispatcher.runOnce();

      expect(report.heartbeatOk).toBe(true);
      expect(transport.heartbeat).toHaveBeenCalledTimes(2);
    });

    it('rejects while another runOnce() cycle is in flight', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      const once = create().runOnce();

      await expect(dispatcher.runOnce()).rejects.toThrow(
        'runOnce() is not available while another cycle is in flight',
      );
      expect(transport.heartbeat).toHaveBeenCalledTimes(1);

      pending.resolve({ events: [] });
      await once;
    });

    it('keeps whenIdle() pending until the cycle completes', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      const once = create().runOnce();

      let idle = false;
      const waiting = dispatcher.whenIdle().then(() => {
        idle = true;
      });
      await settle();
      expect(idle).toBe(false);

      pending.resolve({ events: [] });
      await once;
      await waiting;
      expect(idle).toBe(true);
    });

    it('defers start() until the in-flight cycle completes', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      const once = create().runOnce();

      dispatcher.start();
      expect(transport.heartbeat).toHaveBeenCalledTimes(1);
      expect(dispatcher.status().state).toBe('running');
      expect(log.info).toHaveBeenCalledWith(
        'First heartbeat deferred until the in-flight cycle completes',
      );

      pending.resolve({ events: [] });
      await once;
      await settle();
      expect(transport.heartbeat).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(transport.heartbeat).toHaveBeenCalledTimes(3);
    });

    it('honours stop() after a deferred start()', async () => {
      const pending = deferred<HeartbeatResponse>();
      transport.heartbeat.mockReturnValueOnce(pending.promise);
      const once = create().runOnce();

      dispatcher.start();
      dispatcher.stop();
      expect(dispatcher.status().state).toBe('stopping');

      pending.resolve({ events: [] });
      await once;
      await dispatcher.whenIdle();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 2);

      expect(transport.heartbeat).toHaveBeenCalledTimes(1);
      expect(dispatcher.status().state).toBe('stopped');
    });
  });

  it('records cycle statistics across the loop', async () => {
    transport.heartbeat.mockResolvedValueOnce(
      heartbeatResponse([{ type: 'PongEvent', id: 'evt-1' }]),
    );
    create().start();
    await settle();
    await vi.advanceTimersByTimeAsync(INTERVAL_MS);

    const status = dispatcher.status();
    expect(status.cycles).toBe(2);
    expect(status.intervalMs).toBe(INTERVAL_MS);
    expect(status.lastCycle).toEqual({
      heartbeatOk: true,
      received: 0,
      handled: 0,
      unhandled: 0,
      handlerFailures: 0,
      acknowledged: 0,
      acknowledgeFailures: 0,
      missingId: 0,
    });
  });
});
