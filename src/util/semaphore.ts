import { toError } from './error';

/**
 * Counting semaphore. Waiters are served in arrival order.
 *
 * Usage:
 *   const release = await sem.acquire();
 *   try { ... } finally { release(); }
 */
export class Semaphore {
    private _available: number;
    private _waiters: Array<() => void> = [];

    constructor(readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
        }
        this._available = limit;
    }

    get available(): number {
        return this._available;
    }

    get waiting(): number {
        return this._waiters.length;
    }

    /**
     * Wait for a permit. Aborting `signal` while queued removes the waiter
     * and rejects with the abort reason.
     */
    acquire(signal?: AbortSignal): Promise<() => void> {
        if (signal?.aborted) {
            return Promise.reject(toError(signal.reason));
        }
        if (this._available > 0) {
            this._available--;
            return Promise.resolve(this._releaser());
        }
        return new Promise((resolve, reject) => {
            const onAbort = () => {
                const idx = this._waiters.indexOf(waiter);
                if (idx !== -1) this._waiters.splice(idx, 1);
                reject(toError(signal?.reason));
            };
            const waiter = () => {
                signal?.removeEventListener('abort', onAbort);
                resolve(this._releaser());
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this._waiters.push(waiter);
        });
    }

    /** Run `fn` holding one permit; `fn` never starts once `signal` aborted */
    async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const release = await this.acquire(signal);
        try {
            signal?.throwIfAborted();
            return await fn();
        } finally {
            release();
        }
    }

    private _releaser(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this._waiters.shift();
            if (next) {
                next();
            } else {
                this._available++;
            }
        };
    }
}
