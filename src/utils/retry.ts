import Logger from './logger';

export interface RetryOptions {
    maxAttempts?: number; // total attempts including the first
    baseDelayMs?: number;
    maxDelayMs?: number;
    signal?: AbortSignal;
    shouldRetry?: (error: unknown) => boolean;
}

/**
 * Runs `fn` with exponential backoff and jitter. Stops immediately when the
 * signal fires or `shouldRetry` rejects the error; the last error is rethrown.
 */
export async function retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const { maxAttempts = 3, baseDelayMs = 100, maxDelayMs = 2000, signal, shouldRetry = () => true } = options;

    let attempt = 1;
    const jitter = () => Math.random() * 50;

    while (true) {
        try {
            return await fn(attempt);
        } catch (err) {
            if (attempt >= maxAttempts || signal?.aborted || !shouldRetry(err)) {
                throw err;
            }

            const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + jitter();
            Logger.debug(`Retryable error on attempt ${attempt}/${maxAttempts}, retrying in ${Math.round(delay)}ms`);

            await sleep(delay, signal);
            attempt += 1;
        }
    }
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
