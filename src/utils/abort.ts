// Cancellation helpers: nested timeouts and abort-aware promise racing

import Logger from './logger';
import { errorMessage } from './errors';

export interface AbortScope {
    readonly signal: AbortSignal;
    /** Aborts the scope (no-op once aborted). */
    abort(reason?: unknown): void;
    /** Clears the timer and detaches from the parent signal. */
    dispose(): void;
}

/**
 * A child signal that aborts when the parent does or when `timeoutMs`
 * elapses, whichever comes first.
 */
export function createAbortScope(
    parent: AbortSignal | undefined,
    timeoutMs: number,
    timeoutReason: () => unknown,
): AbortScope {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    const timer = setTimeout(() => controller.abort(timeoutReason()), timeoutMs);

    return {
        signal: controller.signal,
        abort(reason?: unknown) {
            if (!controller.signal.aborted) controller.abort(reason);
        },
        dispose() {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}

/**
 * Settles with `work`, or rejects with the signal's reason as soon as it
 * aborts. A late rejection from `work` is only logged.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        void work.catch((error: unknown) => Logger.debug(`Late failure after abort: ${errorMessage(error)}`));
        return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
    });
}
