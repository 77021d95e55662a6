import { AppError } from './AppError';

/**
 * Transient Fetch Error
 * Rate limit, 5xx or network hiccup. Retried inside RetryingFetcher and never
 * surfaced to callers on its own.
 */
export class TransientFetchError extends AppError {
  public readonly endpoint: string;
  public readonly status?: number;

  constructor(endpoint: string, detail: string, status?: number) {
    super(`Transient failure on ${endpoint}: ${detail}`, 'FETCH_TRANSIENT');
    this.endpoint = endpoint;
    this.status = status;
    Object.setPrototypeOf(this, TransientFetchError.prototype);
  }
}

export type TerminalFetchReason = 'fatal-status' | 'exhausted';

/**
 * Terminal Fetch Error
 * Non-retryable HTTP status, or retry budget exhausted
 */
export class TerminalFetchError extends AppError {
  public readonly endpoint: string;
  public readonly attempts: number;
  public readonly reason: TerminalFetchReason;
  public readonly status?: number;

  constructor(
    endpoint: string,
    attempts: number,
    reason: TerminalFetchReason,
    options: { status?: number; cause?: unknown } = {}
  ) {
    const message =
      reason === 'exhausted'
        ? `Request to ${endpoint} failed after ${attempts} attempts`
        : `Request to ${endpoint} failed with status ${options.status} (attempt ${attempts})`;
    super(message, 'FETCH_TERMINAL');
    this.endpoint = endpoint;
    this.attempts = attempts;
    this.reason = reason;
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, TerminalFetchError.prototype);
  }
}
