import type { Logger } from 'pino';
import type { EventTransport } from '../domain/index.js';
import { hasEventId } from '../domain/index.js';
import { normalizeEvent } from './normalize-event.js';

export interface ConnectivityCheckOptions {
  clientVersion: string;
  message?: string | undefined;
  maxAttempts?: number | undefined;
  /** Pause between the ping and the first heartbeat. */
  initialDelayMs?: number | undefined;
  /** Pause between two heartbeats. */
  pollIntervalMs?: number | undefined;
}

export interface ConnectivityCheckResult {
  attempts: number;
  pongEventId: string;
}

const DEFAULT_MAX_ATTEMPTS = 10;
const DEFAULT_INITIAL_DELAY_MS = 1000;
const DEFAULT_POLL_INTERVAL_MS = 5000;

/**
 * End-to-end probe: authenticates, asks the service for a `PongEvent`
 * and polls heartbeats until it arrives.
 *
 * Only the `PongEvent` is acknowledged. Every other event in the
 * responses is left alone so that an agent running against the same
 * account still receives it once the server redelivers it.
 *
 * Rejects when the ping or a heartbeat fails, when the `PongEvent` has no
 * id, or when no `PongEvent` arrives within `maxAttempts` heartbeats.
 */
export async function runConnectivityCheck(
  transport: EventTransport,
  log: Logger,
  options: ConnectivityCheckOptions,
): Promise<ConnectivityCheckResult> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

  log.info('Sending debug ping');
  await transport.ping({ message: options.message ?? 'connectivity-check' });

  await sleep(options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const response = await transport.heartbeat({ clientVersion: options.clientVersion });
    const events = (response.events ?? []).map((event) => normalizeEvent(event));

    log.info(
      { attempt, maxAttempts, count: events.length },
      `Heartbeat attempt ${attempt}/${maxAttempts}: ${events.length} event(s)`,
    );

    const pong = events.find((event) => event.type === 'PongEvent');
    if (pong) {
      if (!hasEventId(pong)) {
        throw new Error('PongEvent missing id');
      }
      await transport.acknowledge({ eventId: pong.id });
      return { attempts: attempt, pongEventId: pong.id };
    }

    if (attempt < maxAttempts) {
      await sleep(pollIntervalMs);
    }
  }

  throw new Error(`No PongEvent after ${maxAttempts} attempts`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
