// src/orchestration-core/L3/Retry.ts
import type { Clock } from '../L0/Clock.js';
import { TransientError, describeError } from '../Errors.js';

export interface RetryPolicy {
    /** Total attempts, first one included. */
    maxAttempts: number;
    initialDelayMs: number;
    backoffFactor: number;
}

export interface BackoffPolicy {
    minIntervalMs: number;
    maxIntervalMs: number;
    factor: number;
}

/**
 * Delay before retry number `retry` (1-based). Deterministic: no jitter.
 */
export function retryDelay(policy: RetryPolicy, retry: number): number {
    return policy.initialDelayMs * Math.pow(policy.backoffFactor, retry - 1);
}

/**
 * Next poll interval: back to the minimum on a state change, otherwise grow up to the maximum.
 */
export function nextInterval(policy: BackoffPolicy, current: number, changed: boolean): number {
    if (changed) return policy.minIntervalMs;
    return Math.min(Math.max(current, policy.minIntervalMs) * policy.factor, policy.maxIntervalMs);
}

export const isTransient = (err: unknown): boolean => err instanceof TransientError;

export async function executeWithRetry<T>(
    fn: () => Promise<T>,
    policy: RetryPolicy,
    clock: Clock,
    label: string,
    shouldRetry: (err: unknown) => boolean = isTransient
): Promise<T> {
    let attempt = 1;
    for (;;) {
        try {
            return await fn();
        } catch (err) {
            if (attempt >= policy.maxAttempts || !shouldRetry(err)) {
                throw err;
            }
            const delay = retryDelay(policy, attempt);
            console.warn(`[Retry] ${label}: attempt ${attempt}/${policy.maxAttempts} failed (${describeError(err)}). Retrying in ${delay}ms...`);
            attempt++;
            await clock.sleep(delay);
        }
    }
}
