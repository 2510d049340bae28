export type TransportOperation = 'heartbeat' | 'acknowledge' | 'ping' | 'token';

export interface TransportErrorOptions {
  operation: TransportOperation;
  status?: number | undefined;
  /** Whether the same call may succeed later without changes. */
  retryable: boolean;
  cause?: unknown;
}

/** A call to the remote service failed. */
export class TransportError extends Error {
  readonly operation: TransportOperation;
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, options: TransportErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.operation = options.operation;
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

/** 408, 429 and every 5xx are worth another attempt on a later cycle. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
