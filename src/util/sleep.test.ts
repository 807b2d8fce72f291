import { ok, rejects, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { sleep, sleepUnlessAborted } from './sleep';

describe('sleep', () => {
    test('should delay execution', async () => {
        const start = Date.now();
        await sleep(50);
        const elapsed = Date.now() - start;
        ok(elapsed >= 45, `Expected at least 50ms, got ${elapsed}ms`);
    });

    test('rejects when aborted', async () => {
        const ac = new AbortController();
        const pending = sleep(1000, undefined, { signal: ac.signal });
        ac.abort();
        await rejects(pending, { name: 'AbortError' });
    });
});

describe('sleepUnlessAborted', () => {
    test('resolves true after the delay', async () => {
        strictEqual(await sleepUnlessAborted(5, new AbortController().signal), true);
    });

    test('resolves false when aborted midway', async () => {
        const ac = new AbortController();
        const pending = sleepUnlessAborted(1000, ac.signal);
        ac.abort();
        strictEqual(await pending, false);
    });

    test('resolves false at once when already aborted', async () => {
        strictEqual(await sleepUnlessAborted(1000, AbortSignal.abort()), false);
    });
});
