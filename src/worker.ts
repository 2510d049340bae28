import Fastify from 'fastify';
import {
  EventDispatcher,
  createDefaultHandlers,
  createHandlerRegistry,
} from './application/index.js';
import {
  AgentApiClient,
  OAuthTokenProvider,
  createLogger,
  loadConfig,
} from './infrastructure/index.js';
import { statusRoutes } from './interfaces/http/index.js';

/**
 * Standalone agent process.
 *
 * Polls the service for queued events, dispatches them to the default
 * handlers and acknowledges them. A small HTTP server exposes liveness,
 * readiness and status for the container runtime.
 *
 * Run with `node --env-file=.env dist/worker.js` to load settings from a
 * local .env file.
 */
const log = createLogger();

/** Upper bound for waiting on an in-flight cycle during shutdown. */
const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
  const config = loadConfig();

  const tokens = new OAuthTokenProvider({
    authUrl: config.authUrl,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    audience: config.authAudience,
  });

  const api = new AgentApiClient({
    apiUrl: config.apiUrl,
    tokens,
    tenantId: config.tenantId,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const registry = createHandlerRegistry(
    createDefaultHandlers(log.child({ component: 'handlers' })),
  );

  const dispatcher = new EventDispatcher({
    transport: api,
    registry,
    log: log.child({ component: 'dispatcher' }),
    clientVersion: config.clientVersion,
    intervalMs: config.heartbeatIntervalMs,
    handlerTimeoutMs: config.handlerTimeoutMs,
    onReady: config.pingOnStart
      ? async () => {
          log.info('Requesting a PongEvent');
          await api.ping({ message: 'agent-started' });
        }
      : undefined,
  });

  const server = Fastify({
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
  });

  await server.register(statusRoutes, {
    source: dispatcher,
    staleAfterMs: config.heartbeatIntervalMs * 3,
  });

  await server.listen({ host: config.statusHost, port: config.statusPort });

  log.info(
    {
      apiUrl: config.apiUrl,
      tenantId: config.tenantId,
      clientVersion: config.clientVersion,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
    },
    'Agent starting',
  );

  // Handlers are registered before the first heartbeat, so no early event
  // is acknowledged without reaching its handler.
  dispatcher.start();

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down agent...');

    dispatcher.stop();

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      graceTimer = setTimeout(() => {
        log.warn({ graceMs: SHUTDOWN_GRACE_MS }, 'In-flight cycle did not finish in time');
        resolve();
      }, SHUTDOWN_GRACE_MS);
    });
    await Promise.race([dispatcher.whenIdle(), grace]);
    clearTimeout(graceTimer);

    await server.close();
    log.info('Agent stopped');
    process.exit(0);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Agent failed to start');
  process.exit(1);
});
