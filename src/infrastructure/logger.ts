import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Root logger for the agent process.
 *
 * Components never build their own; they take a `Logger` (or a child of
 * this one) as a dependency.
 */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ name: 'heartbeat-agent', level });
}
