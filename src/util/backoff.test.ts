import { deepEqual, equal, ok } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { Backoff } from './backoff';

describe('Backoff', () => {
    test('delays double up to the cap', () => {
        const backoff = new Backoff({ baseDelay: 100, maxDelay: 500, jitter: 0 });
        const delays: number[] = [];
        for (let i = 0; i < 5; i++) {
            backoff.markFailure();
            delays.push(backoff.nextDelay());
        }
        deepEqual(delays, [100, 200, 400, 500, 500]);
    });

    test('jitter adds up to its fraction of the delay', () => {
        const backoff = new Backoff({ baseDelay: 1000, jitter: 0.1 });
        backoff.markFailure();
        equal(backoff.nextDelay(() => 0), 1000);
        equal(backoff.nextDelay(() => 0.5), 1050);
        ok(backoff.nextDelay() <= 1100);
    });

    test('exhausted after maxTries failures', () => {
        const backoff = new Backoff({ maxTries: 2 });
        equal(backoff.exhausted, false);
        equal(backoff.markFailure(), 1);
        equal(backoff.markFailure(), 2);
        equal(backoff.exhausted, true);
        backoff.reset();
        equal(backoff.failures, 0);
        equal(backoff.exhausted, false);
    });

    test('zero tries is exhausted from the start', () => {
        equal(new Backoff({ maxTries: 0 }).exhausted, true);
    });

    test('custom multiplier', () => {
        const backoff = new Backoff({ baseDelay: 10, multiplier: 3, maxDelay: 1000 });
        deepEqual([1, 2, 3].map((n) => backoff.baseDelayFor(n)), [10, 30, 90]);
    });
});
