import { runConnectivityCheck } from './application/index.js';
import {
  AgentApiClient,
  OAuthTokenProvider,
  createLogger,
  loadConfig,
} from './infrastructure/index.js';

/**
 * Connectivity smoke check for deployment pipelines.
 *
 * Authenticates, sends a debug ping and polls heartbeats until the
 * PongEvent arrives, then acknowledges it. Exits 0 on success, 1 otherwise.
 * Pipelines grep for "Pong received" and "Validation successful".
 *
 * Unlike the worker, this only acknowledges the PongEvent; see
 * runConnectivityCheck().
 */
const log = createLogger();

async function main(): Promise<void> {
  const config = loadConfig();

  const api = new AgentApiClient({
    apiUrl: config.apiUrl,
    tokens: new OAuthTokenProvider({
      authUrl: config.authUrl,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      audience: config.authAudience,
    }),
    tenantId: config.tenantId,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const result = await runConnectivityCheck(api, log, {
    clientVersion: config.clientVersion,
    message: 'ci-validation',
    pollIntervalMs: Math.min(config.heartbeatIntervalMs, 10_000),
  });

  log.info({ attempts: result.attempts, eventId: result.pongEventId }, 'Pong received');
  log.info('Validation successful');
}

main().catch((err: unknown) => {
  log.error({ err }, 'Validation failed');
  process.exit(1);
});
