import type {
  AcknowledgeRequest,
  EventTransport,
  HeartbeatRequest,
  HeartbeatResponse,
  PingRequest,
} from '../../domain/index.js';
import { TransportError, isRetryableStatus } from './errors.js';
import type { TransportOperation } from './errors.js';
import type { AccessTokenSource } from './token-provider.js';
import { heartbeatResponseSchema, toAgentEvent } from './wire-schema.js';

export interface AgentApiClientOptions {
  /** Base URL without the `/agents/v1` prefix. */
  apiUrl: string;
  tokens: AccessTokenSource;
  tenantId?: string | undefined;
  requestTimeoutMs?: number | undefined;
}

const API_PREFIX = '/agents/v1';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
/** How much of an error response body ends up in the error message. */
const MAX_ERROR_BODY = 500;

/**
 * HTTP implementation of the EventTransport port.
 *
 * Every call is a JSON POST carrying a bearer token and, when configured,
 * the X-Tenant-ID header. Every failure (network, timeout, non-2xx,
 * malformed body) rejects with a TransportError.
 */
export class AgentApiClient implements EventTransport {
  private readonly baseUrl: string;
  private readonly tokens: AccessTokenSource;
  private readonly tenantId: string | undefined;
  private readonly requestTimeoutMs: number;

  constructor(options: AgentApiClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, '') + API_PREFIX;
    this.tokens = options.tokens;
    this.tenantId = options.tenantId;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async heartbeat(request: HeartbeatRequest): Promise<HeartbeatResponse> {
    const body = await this.post('heartbeat', '/events/heartbeat', {
      agentSdkVersion: request.clientVersion,
    });

    // An empty body means nothing is queued.
    const parsed = heartbeatResponseSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new TransportError('Malformed heartbeat response', {
        operation: 'heartbeat',
        retryable: false,
        cause: parsed.error,
      });
    }

    return { events: parsed.data.events?.map(toAgentEvent) };
  }

  async acknowledge(request: AcknowledgeRequest): Promise<void> {
    await this.post('acknowledge', '/events/acknowledge', { eventId: request.eventId });
  }

  async ping(request: PingRequest): Promise<void> {
    await this.post('ping', '/events/ping', { message: request.message });
  }

  /** Sends one request; resolves with the parsed JSON body, or undefined when empty. */
  private async post(
    operation: TransportOperation,
    path: string,
    payload: Record<string, unknown>,
  ): Promise<unknown> {
    const token = await this.tokens.getAccessToken();

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      Authorization: `Bearer ${token}`,
    };
    if (this.tenantId) {
      headers['X-Tenant-ID'] = this.tenantId;
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      text = await response.text();
    } catch (err: unknown) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new TransportError(
        timedOut
          ? `${operation} request timed out after ${this.requestTimeoutMs}ms`
          : `${operation} request failed`,
        { operation, retryable: true, cause: err },
      );
    }

    if (!response.ok) {
      const detail = text.slice(0, MAX_ERROR_BODY);
      throw new TransportError(
        `${operation} failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`,
        { operation, status: response.status, retryable: isRetryableStatus(response.status) },
      );
    }

    if (text.trim() === '') return undefined;

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err: unknown) {
      throw new TransportError(`${operation} returned a non-JSON body`, {
        operation,
        status: response.status,
        retryable: false,
        cause: err,
      });
    }
  }
}
