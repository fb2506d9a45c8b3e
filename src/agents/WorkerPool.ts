/**
 * Keyed Worker Pool - bounded concurrency where tasks sharing any key run
 * one at a time, in submission order.
 */

import { cancelledError } from '../utils/errors';

interface QueueEntry {
    readonly keys: readonly string[];
    start(): void;
    cancel(): void;
}

export class KeyedWorkerPool {
    private readonly queue: QueueEntry[] = [];
    private readonly busyKeys = new Set<string>();
    private active = 0;

    constructor(private readonly concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new Error(`Pool concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    get activeCount(): number {
        return this.active;
    }

    get queuedCount(): number {
        return this.queue.length;
    }

    /**
     * Queue `task`. An abort while queued removes it and rejects with
     * ACTION_CANCELLED; once started the task observes the signal itself.
     */
    submit<T>(keys: readonly string[], task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            if (signal?.aborted) {
                reject(cancelledError('action'));
                return;
            }

            const onAbort = () => entry.cancel();
            const entry: QueueEntry = {
                keys: [...new Set(keys)],
                start: () => {
                    signal?.removeEventListener('abort', onAbort);
                    this.active++;
                    entry.keys.forEach((key) => this.busyKeys.add(key));
                    void task()
                        .then(resolve, reject)
                        .finally(() => {
                            this.active--;
                            entry.keys.forEach((key) => this.busyKeys.delete(key));
                            this.pump();
                        });
                },
                cancel: () => {
                    const index = this.queue.indexOf(entry);
                    if (index === -1) return;
                    this.queue.splice(index, 1);
                    reject(cancelledError('action'));
                    this.pump();
                },
            };

            signal?.addEventListener('abort', onAbort, { once: true });
            this.queue.push(entry);
            this.pump();
        });
    }

    private pump(): void {
        // Keys held by running tasks, plus keys of earlier queued tasks that
        // could not start, so later tasks never overtake them.
        const reserved = new Set(this.busyKeys);
        let index = 0;
        while (index < this.queue.length && this.active < this.concurrency) {
            const entry = this.queue[index];
            if (entry.keys.some((key) => reserved.has(key))) {
                entry.keys.forEach((key) => reserved.add(key));
                index++;
                continue;
            }
            this.queue.splice(index, 1);
            entry.keys.forEach((key) => reserved.add(key));
            entry.start();
        }
    }
}
