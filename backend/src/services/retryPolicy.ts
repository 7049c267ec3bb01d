import { sleep } from "../utils/async";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

export interface RetryPolicy {
    /** Total time budget across all attempts and waits. */
    maxElapsedMs: number;
    /** Delay before the first retry. */
    baseDelayMs: number;
    multiplier: number;
    /** Cap on a single delay, before jitter. */
    maxDelayMs: number;
}

export interface RetryAttempt {
    /** 1-based number of the retry about to be made. */
    attempt: number;
    delayMs: number;
    error: unknown;
}

export interface RetryHooks {
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    random?: () => number;
    onRetry?: (retry: RetryAttempt) => void;
}

const JITTER_RATIO = 0.1;

/** A stale now-playing notice is worth little; give up quickly. */
export const NOW_PLAYING_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
    maxElapsedMs: 10_000,
    baseDelayMs: 500,
    multiplier: 2,
    maxDelayMs: 8_000,
});

/** A dropped scrobble is lost for good, so it gets a longer budget. */
export const SCROBBLE_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
    maxElapsedMs: 30_000,
    baseDelayMs: 500,
    multiplier: 2,
    maxDelayMs: 8_000,
});

function assertValidPolicy(policy: RetryPolicy): void {
    if (!(policy.baseDelayMs > 0) || !(policy.multiplier >= 1)) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Invalid retry policy: baseDelayMs must be > 0 and multiplier >= 1",
            { baseDelayMs: policy.baseDelayMs, multiplier: policy.multiplier }
        );
    }
}

/**
 * Exponential backoff with jitter for the retry after failed attempt
 * `attempt` (0-based).
 */
export function calculateBackoff(
    policy: RetryPolicy,
    attempt: number,
    random: () => number = Math.random
): number {
    const exponentialDelay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
    const capped = Math.min(exponentialDelay, policy.maxDelayMs);
    return Math.round(capped + capped * JITTER_RATIO * random());
}

/**
 * Run `operation` until it succeeds or the next wait would exceed the
 * policy's budget, in which case the last error is rethrown.
 */
export async function retryWithBackoff<T>(
    policy: RetryPolicy,
    operation: (attempt: number) => Promise<T>,
    hooks: RetryHooks = {}
): Promise<T> {
    assertValidPolicy(policy);
    const wait = hooks.sleep ?? sleep;
    const now = hooks.now ?? Date.now;
    const random = hooks.random ?? Math.random;

    const startedAt = now();
    let waitedMs = 0;

    for (let attempt = 0; ; attempt += 1) {
        try {
            return await operation(attempt);
        } catch (error) {
            const delayMs = calculateBackoff(policy, attempt, random);
            const spentMs = Math.max(now() - startedAt, waitedMs);
            if (spentMs + delayMs > policy.maxElapsedMs) {
                throw error;
            }

            hooks.onRetry?.({ attempt: attempt + 1, delayMs, error });
            await wait(delayMs);
            waitedMs += delayMs;
        }
    }
}
