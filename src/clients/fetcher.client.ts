import { AxiosInstance, isAxiosError } from 'axios';
import { FETCH_POLICY } from '@/config/etlRules';
import { TerminalFetchError, TransientFetchError } from '@/errors';
import { IMetrics } from '@/interfaces/IMetrics';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { sleep as defaultSleep } from '@/utils/sleep';

const logger = createLogger('RetryingFetcher');

export type QueryParams = Record<string, string | number>;

export interface RetryPolicy {
  maxAttempts: number;
  backoffBase: number;
  jitterMin: number;
  jitterMax: number;
  minWaitSeconds: number;
  transientStatuses: readonly number[];
}

export interface RetryingFetcherOptions {
  policy?: Partial<RetryPolicy>;
  metrics?: IMetrics;
  /** Waits the given number of milliseconds */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform random in [0, 1) */
  random?: () => number;
}

/**
 * Retry loop states
 *
 * attempting(n) → succeeded        on 200
 * attempting(n) → attempting(n+1)  on a transient failure with budget left
 * attempting(n) → exhausted        on a transient failure at the bound
 * A fatal status leaves the machine by throwing.
 */
export type FetchState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'succeeded'; attempt: number; data: unknown }
  | { kind: 'exhausted'; attempts: number; lastFailure: TransientFetchError };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: FETCH_POLICY.MAX_ATTEMPTS,
  backoffBase: FETCH_POLICY.BACKOFF_BASE,
  jitterMin: FETCH_POLICY.JITTER_MIN,
  jitterMax: FETCH_POLICY.JITTER_MAX,
  minWaitSeconds: FETCH_POLICY.MIN_WAIT_SECONDS,
  transientStatuses: FETCH_POLICY.TRANSIENT_STATUSES,
};

/**
 * Retrying Fetcher
 * GETs JSON from the market-data API, retrying rate limits, 5xx and network
 * failures with exponential backoff and jitter.
 *
 * Callers only ever see the parsed body or a TerminalFetchError.
 */
export class RetryingFetcher {
  private readonly policy: RetryPolicy;
  private readonly metrics: IMetrics;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly http: AxiosInstance,
    options: RetryingFetcherOptions = {}
  ) {
    this.policy = resolvePolicy(options.policy);
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * GET `endpoint` (relative to the client's base URL) and return the parsed body
   *
   * @throws TerminalFetchError on a non-retryable status or after the retry budget
   */
  async fetch(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    let state: FetchState = { kind: 'attempting', attempt: 0 };

    while (state.kind === 'attempting') {
      state = await this.attempt(endpoint, params, state.attempt);
    }

    if (state.kind === 'succeeded') {
      return state.data;
    }

    this.metrics.incrementCounter('fetch.failures', 1, { reason: 'exhausted' });
    logger.error(
      { endpoint, attempts: state.attempts, lastFailure: state.lastFailure.message },
      'Retry budget exhausted'
    );
    throw new TerminalFetchError(endpoint, state.attempts, 'exhausted', {
      status: state.lastFailure.status,
      cause: state.lastFailure,
    });
  }

  /**
   * Seconds to wait after a transient failure on the given 0-based attempt
   */
  computeWaitSeconds(attempt: number): number {
    const { backoffBase, jitterMin, jitterMax, minWaitSeconds } = this.policy;
    const jitter = jitterMin + this.random() * (jitterMax - jitterMin);
    return Math.max(minWaitSeconds, Math.pow(backoffBase, attempt) * jitter);
  }

  private async attempt(
    endpoint: string,
    params: QueryParams,
    attempt: number
  ): Promise<FetchState> {
    this.metrics.incrementCounter('fetch.requests');

    let failure: TransientFetchError;
    try {
      const response = await this.http.get<unknown>(endpoint, { params });

      if (response.status === 200) {
        logger.debug({ endpoint, attempt }, 'Request succeeded');
        return { kind: 'succeeded', attempt, data: response.data };
      }

      if (!this.policy.transientStatuses.includes(response.status)) {
        this.metrics.incrementCounter('fetch.failures', 1, { reason: 'fatal-status' });
        logger.error({ endpoint, status: response.status }, 'Non-retryable response status');
        throw new TerminalFetchError(endpoint, attempt + 1, 'fatal-status', {
          status: response.status,
        });
      }

      failure = new TransientFetchError(endpoint, `status ${response.status}`, response.status);
    } catch (error) {
      if (error instanceof TerminalFetchError) {
        throw error;
      }
      failure = new TransientFetchError(endpoint, describeNetworkError(error));
    }

    const attemptsMade = attempt + 1;
    if (attemptsMade >= this.policy.maxAttempts) {
      return { kind: 'exhausted', attempts: attemptsMade, lastFailure: failure };
    }

    const waitSeconds = this.computeWaitSeconds(attempt);
    this.metrics.incrementCounter('fetch.retries', 1, {
      status: failure.status ?? 'network',
    });
    logger.warn(
      { endpoint, attempt: attemptsMade, status: failure.status, waitSeconds },
      `${failure.message}. Retrying in ${waitSeconds.toFixed(1)}s`
    );
    await this.sleep(waitSeconds * 1000);

    return { kind: 'attempting', attempt: attemptsMade };
  }
}

/**
 * Fill unset policy fields from the defaults; an explicit `undefined` counts as unset
 */
function resolvePolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    backoffBase: overrides.backoffBase ?? DEFAULT_RETRY_POLICY.backoffBase,
    jitterMin: overrides.jitterMin ?? DEFAULT_RETRY_POLICY.jitterMin,
    jitterMax: overrides.jitterMax ?? DEFAULT_RETRY_POLICY.jitterMax,
    minWaitSeconds: overrides.minWaitSeconds ?? DEFAULT_RETRY_POLICY.minWaitSeconds,
    transientStatuses: overrides.transientStatuses ?? DEFAULT_RETRY_POLICY.transientStatuses,
  };
}

function describeNetworkError(error: unknown): string {
  if (isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
