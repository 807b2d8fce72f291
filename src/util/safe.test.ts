import { deepEqual, equal, ok, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { safe, safeSync } from './safe';

describe('safe', () => {
    test('resolves to a data tuple', async () => {
        const [data, err] = await safe(Promise.resolve(5));
        strictEqual(data, 5);
        strictEqual(err, undefined);
    });

    test('rejection becomes the error slot', async () => {
        const [data, err] = await safe(Promise.reject(new Error('nope')));
        strictEqual(data, undefined);
        equal(err?.message, 'nope');
    });

    test('non-errors are wrapped', async () => {
        const [, err] = await safe(Promise.reject('text'));
        ok(err instanceof Error);
        equal(err.message, 'text');
    });

    test('functions that throw synchronously are caught', async () => {
        const [, err] = await safe((): Promise<number> => {
            throw new Error('sync');
        });
        equal(err?.message, 'sync');
    });

    test('functions returning promises are awaited', async () => {
        deepEqual(await safe(async () => 'ok'), ['ok', undefined]);
    });
});

describe('safeSync', () => {
    test('returns value or error', () => {
        deepEqual(safeSync(() => JSON.parse('{"a":1}')), [{ a: 1 }, undefined]);
        const [data, err] = safeSync(() => JSON.parse('{'));
        strictEqual(data, undefined);
        ok(err instanceof SyntaxError);
    });
});
