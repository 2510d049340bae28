export { loadConfig, readClientVersion, ConfigError, CONFIG_DEFAULTS } from './config.js';
export type { AgentConfig } from './config.js';
export { createLogger } from './logger.js';
export {
  AgentApiClient,
  OAuthTokenProvider,
  TransportError,
  isRetryableStatus,
  heartbeatResponseSchema,
  wireEventSchema,
  toAgentEvent,
} from './http/index.js';
export type {
  AgentApiClientOptions,
  AccessTokenSource,
  OAuthTokenProviderOptions,
  TransportOperation,
  WireEvent,
} from './http/index.js';
