export { AgentApiClient } from './agent-api-client.js';
export type { AgentApiClientOptions } from './agent-api-client.js';
export { OAuthTokenProvider } from './token-provider.js';
export type { AccessTokenSource, OAuthTokenProviderOptions } from './token-provider.js';
export { TransportError, isRetryableStatus } from './errors.js';
export type { TransportOperation } from './errors.js';
export { heartbeatResponseSchema, wireEventSchema, toAgentEvent } from './wire-schema.js';
export type { WireEvent } from './wire-schema.js';
