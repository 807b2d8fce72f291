import { deepEqual, equal, rejects, throws } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { Semaphore } from './semaphore';

describe('Semaphore', () => {
    test('rejects a bad limit', () => {
        throws(() => new Semaphore(0), RangeError);
        throws(() => new Semaphore(1.5), RangeError);
    });

    test('waiters are served in order', async () => {
        const sem = new Semaphore(1);
        const order: string[] = [];
        const first = await sem.acquire();
        equal(sem.available, 0);

        const a = sem.acquire().then((release) => {
            order.push('a');
            release();
        });
        const b = sem.acquire().then((release) => {
            order.push('b');
            release();
        });
        equal(sem.waiting, 2);

        first();
        await Promise.all([a, b]);
        deepEqual(order, ['a', 'b']);
        equal(sem.available, 1);
    });

    test('an aborted waiter leaves the queue', async () => {
        const sem = new Semaphore(1);
        const release = await sem.acquire();
        const ac = new AbortController();
        const queued = sem.acquire(ac.signal);
        equal(sem.waiting, 1);
        ac.abort('gave up');
        await rejects(queued, { message: 'gave up' });
        equal(sem.waiting, 0);
        release();
        equal(sem.available, 1);
    });

    test('run never starts fn after an abort', async () => {
        const sem = new Semaphore(1);
        let runs = 0;
        await rejects(
            sem.run(async () => {
                runs++;
            }, AbortSignal.abort('too late')),
            { message: 'too late' },
        );
        equal(runs, 0);
        equal(sem.available, 1);
    });

    test('release is idempotent', async () => {
        const sem = new Semaphore(2);
        const release = await sem.acquire();
        release();
        release();
        equal(sem.available, 2);
    });

    test('run limits concurrency', async () => {
        const sem = new Semaphore(2);
        let active = 0;
        let peak = 0;
        const work = () =>
            sem.run(async () => {
                active++;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setTimeout(resolve, 5));
                active--;
                return active;
            });
        await Promise.all([work(), work(), work(), work(), work()]);
        equal(peak, 2);
        equal(sem.available, 2);
    });

    test('run releases on failure', async () => {
        const sem = new Semaphore(1);
        await sem.run(async () => {
            throw new Error('fail');
        }).catch(() => undefined);
        equal(sem.available, 1);
    });
});
