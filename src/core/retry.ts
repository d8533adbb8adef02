import { logger } from './logger.js';
import { RetryBudgetExhaustedError, describeError } from './errors.js';
import type { FetchFailure, FetchFailureKind, PageResult, RawPage } from '../pipeline/types.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  capDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  capDelayMs: 30000,
  jitterMs: 500,
};

export type RetryState = 'Attempting' | 'Retrying' | 'Success' | 'Failed' | 'Cancelled';

export type RetryOutcome =
  | { state: 'Success'; page: RawPage; attempts: number }
  | { state: 'Failed'; failure: FetchFailure; attempts: number; exhausted: boolean; error?: RetryBudgetExhaustedError }
  | { state: 'Cancelled'; attempts: number };

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const RETRYABLE: ReadonlySet<FetchFailureKind> = new Set(['RateLimited', 'Transient']);

export function isRetryable(kind: FetchFailureKind): boolean {
  return RETRYABLE.has(kind);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Exponential part of the wait before retry number `attempt` (0-based)
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.capDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
}

/**
 * Wraps one page fetch with exponential backoff and a bounded attempt budget.
 *
 * Waits never shrink from one retry to the next, so a capped delay with a
 * small jitter draw cannot undercut the wait that preceded it.
 */
export class RetryController {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY, deps: RetryDeps = {}) {
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  async execute(
    attempt: () => Promise<PageResult>,
    options: { signal?: AbortSignal; context?: string } = {}
  ): Promise<RetryOutcome> {
    const { maxAttempts } = this.policy;
    let previousWait = 0;
    let lastFailure: FetchFailure | null = null;

    for (let n = 0; n < maxAttempts; n++) {
      if (options.signal?.aborted) {
        this.transition('Cancelled', n, options.context);
        return { state: 'Cancelled', attempts: n };
      }

      this.transition('Attempting', n + 1, options.context);
      const result = await this.invoke(attempt);

      if (result.ok) {
        this.transition('Success', n + 1, options.context);
        return { state: 'Success', page: result.page, attempts: n + 1 };
      }

      lastFailure = result.failure;
      if (!isRetryable(result.failure.kind)) {
        this.transition('Failed', n + 1, options.context);
        return { state: 'Failed', failure: result.failure, attempts: n + 1, exhausted: false };
      }

      if (n === maxAttempts - 1) break;

      const wait = this.nextWait(n, previousWait, result.failure.retryAfterMs);
      previousWait = wait;

      logger.warn(`Attempt ${n + 1} failed (${result.failure.kind}), retrying in ${Math.round(wait)}ms: ${result.failure.message}`, {
        context: options.context,
      });
      this.transition('Retrying', n + 1, options.context);
      await this.sleep(wait);
    }

    const failure: FetchFailure = lastFailure ?? { kind: 'Transient', message: 'No attempt was made' };
    const error = new RetryBudgetExhaustedError(
      `Retry budget exhausted after ${maxAttempts} attempts (last: ${failure.kind})`,
      maxAttempts
    );
    this.transition('Failed', maxAttempts, options.context);
    logger.error(error.message, { context: options.context });
    return { state: 'Failed', failure, attempts: maxAttempts, exhausted: true, error };
  }

  nextWait(attempt: number, previousWait: number, retryAfterMs?: number): number {
    let wait = backoffDelay(this.policy, attempt) + this.random() * this.policy.jitterMs;

    if (retryAfterMs !== undefined) {
      wait = Math.max(wait, Math.min(retryAfterMs, this.policy.capDelayMs));
    }

    return Math.max(wait, previousWait);
  }

  private async invoke(attempt: () => Promise<PageResult>): Promise<PageResult> {
    try {
      return await attempt();
    } catch (error) {
      return { ok: false, failure: { kind: 'Transient', message: describeError(error) } };
    }
  }

  private transition(state: RetryState, attempt: number, context?: string): void {
    logger.debug(`Retry controller -> ${state}`, { attempt, context });
  }
}
