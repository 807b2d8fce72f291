/**
 * @file Exponential backoff with jitter.
 * Tracks consecutive failures and yields the delay before the next attempt.
 */

export class BackoffOptions {
    readonly maxTries: number = 5; // attempts before giving up
    readonly baseDelay: number = 1000; // delay before the first retry
    readonly maxDelay: number = 30000; // cap for a single delay
    readonly multiplier: number = 2;
    readonly jitter: number = 0.1; // fraction of the delay added at random

    constructor(opts?: Readonly<Partial<BackoffOptions>>) {
        if (opts) {
            Object.assign(this, opts);
        }
    }
}

export class Backoff {
    private readonly _opts: BackoffOptions;
    private _failures = 0;

    constructor(opts?: Readonly<Partial<BackoffOptions>>) {
        this._opts = new BackoffOptions(opts);
    }

    get failures(): number {
        return this._failures;
    }

    get exhausted(): boolean {
        return this._failures >= this._opts.maxTries;
    }

    get options(): BackoffOptions {
        return this._opts;
    }

    /** Count a failure and return the new failure count */
    markFailure(): number {
        return ++this._failures;
    }

    reset(): void {
        this._failures = 0;
    }

    /**
     * Delay before attempt number `attempt` (1-based), without jitter.
     * min(baseDelay * multiplier^(attempt-1), maxDelay)
     */
    baseDelayFor(attempt: number): number {
        const { baseDelay, multiplier, maxDelay } = this._opts;
        return Math.min(baseDelay * multiplier ** Math.max(attempt - 1, 0), maxDelay);
    }

    // when retrying call this to get the next delay timeout
    nextDelay(random: () => number = Math.random): number {
        const delay = this.baseDelayFor(this._failures);
        return delay + random() * this._opts.jitter * delay;
    }
}
