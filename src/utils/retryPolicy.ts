/**
 * src/utils/retryPolicy.ts
 *
 * Bounded retry for outbound calls.
 *
 * Backoff formula:
 *   delay = min(baseMs × multiplier^(attempt-1) + random × jitterMs, maxMs)
 *
 * A policy is three things: how many attempts, how long to wait after a given
 * failed attempt, and which errors are worth another try. The AI extractor
 * builds one from env; anything else that goes over the network can reuse it.
 */

import { sleep as defaultSleep } from './sleep.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
    maxAttempts: number;
    /** Wait after failed attempt `attempt` (1-indexed). */
    backoffMs(attempt: number, error: unknown): number;
    isRetryable(error: unknown): boolean;
}

export interface BackoffOptions {
    baseMs: number;
    maxMs: number;
    multiplier?: number;
    jitterMs?: number;
}

export interface RetryHooks {
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (info: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
}

// ─── Backoff ──────────────────────────────────────────────────────────────────

export function exponentialBackoff(
    { baseMs, maxMs, multiplier = 2, jitterMs = 0 }: BackoffOptions,
    random: () => number = Math.random
): (attempt: number) => number {
    return (attempt: number) => {
        const exp = baseMs * Math.pow(multiplier, Math.max(0, attempt - 1));
        return Math.round(Math.min(exp + random() * jitterMs, maxMs));
    };
}

// ─── Runner ───────────────────────────────────────────────────────────────────

/**
 * Runs `operation` until it resolves, the error is not retryable, or
 * `maxAttempts` is used up. Rethrows the last error in the latter two cases.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    hooks: RetryHooks = {}
): Promise<T> {
    const sleep = hooks.sleep ?? defaultSleep;
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (err) {
            if (attempt >= maxAttempts || !policy.isRetryable(err)) {
                throw err;
            }
            const delayMs = policy.backoffMs(attempt, err);
            hooks.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
            await sleep(delayMs);
        }
    }
}
