import { cancelledError } from './errors';

/**
 * Run `task` with its own AbortController, aborted when `timeoutMs` elapses
 * or when `parent` aborts. The returned promise settles with the timeout or
 * cancellation error even if the task ignores its signal.
 */
export function runWithTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    options: { parent?: AbortSignal; onTimeout: () => Error; what: string }
): Promise<T> {
    const { parent, onTimeout, what } = options;
    if (parent?.aborted) {
        return Promise.reject(cancelledError(what));
    }

    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | null = null;
    let onParentAbort: (() => void) | null = null;

    const guard = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
            const error = onTimeout();
            controller.abort(error);
            reject(error);
        }, timeoutMs);

        if (parent) {
            onParentAbort = () => {
                const error = cancelledError(what);
                controller.abort(error);
                reject(error);
            };
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    });

    return Promise.race([task(controller.signal), guard]).finally(() => {
        if (timeoutId) clearTimeout(timeoutId);
        if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
    });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(cancelledError('wait'));
            return;
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        const onAbort = () => {
            clearTimeout(timer);
            reject(cancelledError('wait'));
        };
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
