export type AdapterErrorKind =
  | 'timeout'
  | 'rate_limited'
  | 'unavailable'
  | 'invalid_request'
  | 'auth'
  | 'content_policy'
  | 'unknown';

/**
 * Error raised by a provider adapter. `retryable` decides whether the
 * executor keeps trying the same provider.
 */
export class AdapterError extends Error {
  constructor(
    message: string,
    readonly kind: AdapterErrorKind,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AdapterError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AdapterError ? error.retryable : true;
}
