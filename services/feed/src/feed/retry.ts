import type { AttemptResult } from '../contracts/feedStore';

export interface RetryPolicy {
  /** 0 = unbounded. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 0,
  baseDelayMs: 1,
  maxDelayMs: 50,
};

/** Fills unset fields from the defaults; an explicit `undefined` counts as unset. */
export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };
}

export type LoopResult =
  | { result: 'committed'; attempts: number }
  | { result: 'missing'; attempts: number }
  | { result: 'exhausted'; attempts: number };

/** Full-jitter exponential backoff: uniform in [0, min(maxDelay, base * 2^(n-1))). */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `attempt` until it commits or reports a missing precondition.
 * Store errors propagate untouched.
 */
export async function compareAndSwap(
  policy: RetryPolicy,
  attempt: () => Promise<AttemptResult>,
  onConflict?: (attempts: number, delayMs: number) => void,
): Promise<LoopResult> {
  for (let attempts = 1; ; attempts++) {
    const outcome = await attempt();
    if (outcome !== 'conflict') {
      return { result: outcome, attempts };
    }
    if (policy.maxAttempts > 0 && attempts >= policy.maxAttempts) {
      return { result: 'exhausted', attempts };
    }
    const delayMs = backoffDelay(policy, attempts);
    onConflict?.(attempts, delayMs);
    if (delayMs > 0) await sleep(delayMs);
  }
}
