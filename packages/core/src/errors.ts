/**
 * Chart pipeline errors
 *
 * Every failure that can reach a caller is a ChartError with a kind.
 * The message of a ChartError is always safe to show to the caller;
 * anything sensitive goes in `cause` and is only ever logged.
 */

export type ErrorKind =
  | 'Unauthorized'
  | 'InvalidArgument'
  | 'UnknownAsset'
  | 'TooManyRequests'
  | 'DataUnavailable'
  | 'RenderError'
  | 'Timeout'
  | 'Internal';

export interface ChartErrorOptions {
  cause?: unknown;
  retryAfterMs?: number;
}

export class ChartError extends Error {
  readonly kind: ErrorKind;
  readonly retryAfterMs?: number;

  constructor(kind: ErrorKind, message: string, options: ChartErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ChartError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Raised by market data providers. Carries the HTTP status and response body
 * for server-side logs; never forwarded to callers.
 */
export class ProviderError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, status?: number, body?: string) {
    super(message);
    this.name = 'ProviderError';
    this.status = status;
    this.body = body;
  }
}

export function isChartError(error: unknown, kind?: ErrorKind): error is ChartError {
  return error instanceof ChartError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Race a promise against a timer. The timer is always cleared; a result that
 * arrives after the timeout is dropped.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  if (!Number.isFinite(ms) || ms <= 0) return promise;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
