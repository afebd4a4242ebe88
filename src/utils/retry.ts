import type { Logger } from 'pino';
import { resolved, unavailable, type Resolution } from '../types/resolution.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  retries: number;
  /** Fixed pause between attempts; no backoff growth, no jitter */
  delayMs: number;
  /** Per-request timeout, applied to each attempt separately */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  delayMs: 2000,
  timeoutMs: 20000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` until `isSuccess` accepts its result or the policy's attempts
 * are spent. A thrown error counts as a failed attempt.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  isSuccess: (result: T) => boolean,
  policy: RetryPolicy,
  log: Logger,
  label: string,
): Promise<Resolution<T>> {
  const attempts = Math.max(1, policy.retries);
  let reason = 'no attempt made';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const result = await operation();
      if (isSuccess(result)) return resolved(result);
      reason = `${label}: rejected ${describeResult(result)}`;
      log.warn({ attempt, attempts }, reason);
    } catch (err) {
      reason = `${label}: ${err instanceof Error ? err.message : String(err)}`;
      log.error({ attempt, attempts, err }, reason);
    }

    if (attempt < attempts && policy.delayMs > 0) {
      await sleep(policy.delayMs);
    }
  }

  return unavailable(reason);
}

function describeResult(result: unknown): string {
  if (result && typeof result === 'object' && 'status' in result) {
    return `response (status ${String(result.status)})`;
  }
  return 'response';
}
