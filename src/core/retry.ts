/**
 * Retry — Exponential backoff for transient failures.
 */

export interface RetryOptions {
    /** Total attempts, including the first one. */
    attempts: number;
    /** Delay before the second attempt; doubled for every further one. */
    baseDelayMs: number;
    /** Stops retrying (and cuts a pending delay short) once aborted. */
    signal?: AbortSignal;
    /** Errors for which this returns false are rethrown at once. */
    shouldRetry?: (error: unknown) => boolean;
    /** Called before each delay. */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
    return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Wait for `ms`, or less if the signal aborts first.
 * Resolves to false when the wait was cut short.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

/**
 * Run `fn` until it succeeds or the attempts run out; the last error is rethrown.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const { attempts, baseDelayMs, signal, shouldRetry = () => true, onRetry } = options;
    if (attempts < 1) throw new RangeError(`attempts must be at least 1, got ${attempts}`);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            if (attempt >= attempts || !shouldRetry(err) || signal?.aborted) throw err;
            const delayMs = backoffDelay(attempt, baseDelayMs);
            onRetry?.(err, attempt, delayMs);
            if (!(await sleep(delayMs, signal))) throw err;
        }
    }
}
