import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Central configuration, validated from environment variables.
 *
 * Only `loadConfig()` reads `process.env` for agent settings; everything
 * else receives the resulting `AgentConfig`.
 */
export interface AgentConfig {
  /** OAuth 2.0 token endpoint base URL. */
  authUrl: string;
  /** API base URL, without the `/agents/v1` prefix the client adds itself. */
  apiUrl: string;
  clientId: string;
  clientSecret: string;
  authAudience: string | undefined;
  /** Sent as X-Tenant-ID when set. */
  tenantId: string | undefined;
  heartbeatIntervalMs: number;
  /** 0 disables the handler bound. */
  handlerTimeoutMs: number;
  requestTimeoutMs: number;
  statusHost: string;
  statusPort: number;
  /** Ask the service for a PongEvent once the first heartbeat succeeds. */
  pingOnStart: boolean;
  /** Version reported on every heartbeat; read from package.json. */
  clientVersion: string;
}

export const CONFIG_DEFAULTS = {
  heartbeatIntervalMs: 10 * 60 * 1000,
  handlerTimeoutMs: 5 * 60 * 1000,
  requestTimeoutMs: 30 * 1000,
  statusHost: '0.0.0.0',
  statusPort: 8085,
} as const;

const TENANTS_PREFIX = 'AGENT_TENANTS_';

const envSchema = z.object({
  AGENT_AUTH_URL: z.string().url(),
  AGENT_API_URL: z.string().url().transform((url) => url.replace(/\/agents\/v1\/?$/, '')),
  AGENT_CLIENT_ID: z.string(),
  AGENT_CLIENT_SECRET: z.string(),
  AGENT_AUTH_AUDIENCE: z.string().optional(),
  TENANT_ID: z.string().optional(),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STATUS_HOST: z.string().optional(),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  PING_ON_START: z.enum(['true', 'false']).optional(),
});

/** Raised when the environment is missing or has invalid agent settings. */
export class ConfigError extends Error {
  /** Offending variable names, in schema order. */
  readonly variables: string[];

  constructor(variables: string[], details: string) {
    super(`Missing or invalid environment variables: ${details}`);
    this.name = 'ConfigError';
    this.variables = variables;
  }
}

const packageSchema = z.object({ version: z.string().min(1) });

let cachedVersion: string | undefined;

/** Version of this package, as declared in package.json. */
export function readClientVersion(): string {
  if (cachedVersion === undefined) {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    cachedVersion = packageSchema.parse(JSON.parse(raw)).version;
  }
  return cachedVersion;
}

/**
 * Validates the environment and builds the agent configuration.
 *
 * Empty strings count as unset. Every problem is reported at once in the
 * thrown ConfigError; nothing falls back silently on an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues
      .map((issue) => `${String(issue.path[0])} (${issue.message})`)
      .join(', ');
    throw new ConfigError(variables, details);
  }

  const e = parsed.data;
  return {
    authUrl: e.AGENT_AUTH_URL,
    apiUrl: e.AGENT_API_URL,
    clientId: e.AGENT_CLIENT_ID,
    clientSecret: e.AGENT_CLIENT_SECRET,
    authAudience: e.AGENT_AUTH_AUDIENCE,
    tenantId: e.TENANT_ID ?? firstTenant(present),
    heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS ?? CONFIG_DEFAULTS.heartbeatIntervalMs,
    handlerTimeoutMs: e.HANDLER_TIMEOUT_MS ?? CONFIG_DEFAULTS.handlerTimeoutMs,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS ?? CONFIG_DEFAULTS.requestTimeoutMs,
    statusHost: e.STATUS_HOST ?? CONFIG_DEFAULTS.statusHost,
    statusPort: e.STATUS_PORT ?? CONFIG_DEFAULTS.statusPort,
    pingOnStart: e.PING_ON_START === 'true',
    clientVersion: readClientVersion(),
  };
}

/** Multi-tenant setups name one variable per tenant: AGENT_TENANTS_<NAME>=<id>. */
function firstTenant(env: Record<string, string>): string | undefined {
  return Object.entries(env).find(([key]) => key.startsWith(TENANTS_PREFIX))?.[1];
}
