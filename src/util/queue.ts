/**
 * Unbounded async FIFO with a terminal failure state.
 * `shift()` suspends until an item is pushed or the queue fails; items
 * pushed before the failure are still delivered first.
 */
export class AsyncQueue<T> {
    private _items: T[] = [];
    private _waiters: Array<{ resolve: (item: T) => void; reject: (err: Error) => void }> = [];
    private _error?: Error;

    get size(): number {
        return this._items.length;
    }

    get failed(): boolean {
        return this._error !== undefined;
    }

    push(item: T): boolean {
        if (this._error) return false;
        const waiter = this._waiters.shift();
        if (waiter) {
            waiter.resolve(item);
        } else {
            this._items.push(item);
        }
        return true;
    }

    shift(): Promise<T> {
        if (this._items.length > 0) {
            const [item] = this._items.splice(0, 1);
            return Promise.resolve(item);
        }
        if (this._error) {
            return Promise.reject(this._error);
        }
        return new Promise<T>((resolve, reject) => {
            this._waiters.push({ resolve, reject });
        });
    }

    /** Fail the queue: current and future waiters reject with `err` once drained */
    fail(err: Error): void {
        if (this._error) return;
        this._error = err;
        for (const waiter of this._waiters.splice(0)) {
            waiter.reject(err);
        }
    }
}
