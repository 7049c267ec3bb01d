/**
 * Async helpers used by the retry loop
 */

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

