import { deepEqual, ok, rejects, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { createLogger, nullTransport } from '../../util/logger';
import { createMemoryPair } from '../transport/memory';
import { Channel, type ChannelHandlers } from './channel';
import { ConnectionLostError } from './errors';
import type { JSONRPCNotification } from './types';

const log = createLogger('test:channel', 'DEBUG', nullTransport);

function setup(handlers: Partial<ChannelHandlers> = {}) {
    const [local, remote] = createMemoryPair();
    const notifications: JSONRPCNotification[] = [];
    const channel = new Channel(
        local,
        {
            request: async () => ({}),
            notification: (msg) => notifications.push(msg),
            ...handlers,
        },
        { log },
    ).start();
    const send = (msg: unknown) => remote.send(typeof msg === 'string' ? msg : JSON.stringify(msg));
    const next = async (): Promise<unknown> => JSON.parse(await remote.receive());
    return { channel, remote, notifications, send, next };
}

describe('Channel', () => {
    test('correlates an outbound request with its reply', async () => {
        const { channel, send, next } = setup();
        const outcome = channel.call('echo', { a: 1 });
        deepEqual(await next(), { jsonrpc: '2.0', id: 1, method: 'echo', params: { a: 1 } });
        await send({ jsonrpc: '2.0', id: 1, result: { a: 1 } });
        deepEqual(await outcome, { kind: 'result', value: { a: 1 } });
        strictEqual(channel.pending, 0);
        channel.close();
    });

    test('answers peer requests with the handler result', async () => {
        const { channel, send, next } = setup({
            request: async (req) => (req.method === 'empty' ? undefined : { got: req.params }),
        });
        await send({ jsonrpc: '2.0', id: 7, method: 'look', params: { q: 'x' } });
        deepEqual(await next(), { jsonrpc: '2.0', id: 7, result: { got: { q: 'x' } } });
        await send({ jsonrpc: '2.0', id: 'e', method: 'empty' });
        deepEqual(await next(), { jsonrpc: '2.0', id: 'e', result: {} });
        channel.close();
    });

    test('a throwing handler becomes an error response', async () => {
        const { channel, send, next } = setup({
            request: async () => {
                throw new Error('bad input');
            },
        });
        await send({ jsonrpc: '2.0', id: 3, method: 'fail' });
        deepEqual(await next(), { jsonrpc: '2.0', id: 3, error: { code: -32010, message: 'bad input' } });
        channel.close();
    });

    test('undecodable frames get a parse error with a null id', async () => {
        const invalid: string[] = [];
        const { channel, send, next } = setup({ invalid: (err) => invalid.push(err.message) });
        await send('{not json');
        const reply = await next();
        ok(typeof reply === 'object' && reply !== null && 'error' in reply && 'id' in reply);
        strictEqual(reply.id, null);
        deepEqual(invalid, ['Parse error']);
        strictEqual(channel.closed, false);
        channel.close();
    });

    test('notifications go to the handler and get no reply', async () => {
        const { channel, notifications, send, next } = setup();
        await send({ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } });
        await send({ jsonrpc: '2.0', id: 1, method: 'ping' });
        deepEqual(await next(), { jsonrpc: '2.0', id: 1, result: {} });
        deepEqual(notifications, [{ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } }]);
        channel.close();
    });

    test('a batch is answered with one frame of replies', async () => {
        const { channel, notifications, send, next } = setup({
            request: async (req) => ({ method: req.method }),
        });
        await send([
            { jsonrpc: '2.0', id: 1, method: 'a' },
            { jsonrpc: '2.0', method: 'note' },
            { jsonrpc: '2.0', id: 2, method: 'b' },
        ]);
        const replies = await next();
        ok(Array.isArray(replies));
        strictEqual(replies.length, 2);
        deepEqual(
            [...replies].sort((x: { id: number }, y: { id: number }) => x.id - y.id),
            [
                { jsonrpc: '2.0', id: 1, result: { method: 'a' } },
                { jsonrpc: '2.0', id: 2, result: { method: 'b' } },
            ],
        );
        strictEqual(notifications.length, 1);
        channel.close();
    });

    test('a cancelled peer request gets no reply', async () => {
        const aborted: unknown[] = [];
        const { channel, send, next } = setup({
            request: (req, signal) => {
                if (req.method === 'ping') return Promise.resolve({});
                return new Promise((_resolve, reject) => {
                    signal.addEventListener('abort', () => {
                        aborted.push(signal.reason);
                        reject(new Error('aborted'));
                    });
                });
            },
        });
        await send({ jsonrpc: '2.0', id: 5, method: 'slow' });
        await send({ jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 5, reason: 'changed my mind' } });
        await send({ jsonrpc: '2.0', id: 6, method: 'ping' });
        deepEqual(await next(), { jsonrpc: '2.0', id: 6, result: {} });
        deepEqual(aborted, ['changed my mind']);
        channel.close();
    });

    test('a duplicate in-flight request id is rejected', async () => {
        let release: () => void = () => {};
        const { channel, send, next } = setup({
            request: () =>
                new Promise((resolve) => {
                    release = () => resolve({ done: true });
                }),
        });
        await send({ jsonrpc: '2.0', id: 5, method: 'slow' });
        await send({ jsonrpc: '2.0', id: 5, method: 'slow' });
        deepEqual(await next(), { jsonrpc: '2.0', id: 5, error: { code: -32600, message: 'duplicate request id: 5' } });
        release();
        deepEqual(await next(), { jsonrpc: '2.0', id: 5, result: { done: true } });
        channel.close();
    });

    test('a timed-out request sends a cancellation', async () => {
        const { channel, next } = setup();
        const outcome = channel.call('slow', undefined, { timeout: 20 });
        deepEqual(await next(), { jsonrpc: '2.0', id: 1, method: 'slow' });
        const result = await outcome;
        strictEqual(result.kind, 'timeout');
        deepEqual(await next(), {
            jsonrpc: '2.0',
            method: 'notifications/cancelled',
            params: { requestId: 1, reason: 'Request timed out after 20ms: slow' },
        });
        channel.close();
    });

    test('outbound batch resolves outcomes in item order', async () => {
        const { channel, send, next } = setup();
        const outcomes = channel.batch([
            { method: 'first' },
            { method: 'note', notification: true },
            { method: 'second', params: { n: 2 } },
        ]);
        deepEqual(await next(), [
            { jsonrpc: '2.0', id: 1, method: 'first' },
            { jsonrpc: '2.0', method: 'note' },
            { jsonrpc: '2.0', id: 2, method: 'second', params: { n: 2 } },
        ]);
        await send([
            { jsonrpc: '2.0', id: 2, result: 'two' },
            { jsonrpc: '2.0', id: 1, result: 'one' },
        ]);
        deepEqual(await outcomes, [
            { kind: 'result', value: 'one' },
            { kind: 'result', value: 'two' },
        ]);
        channel.close();
    });

    test('an already-aborted call never reaches the peer', async () => {
        const { channel, send, next } = setup();
        const outcome = await channel.call('effect', undefined, { signal: AbortSignal.abort('too late') });
        strictEqual(outcome.kind, 'cancelled');

        const ping = channel.call('ping');
        deepEqual(await next(), { jsonrpc: '2.0', id: 2, method: 'ping' });
        await send({ jsonrpc: '2.0', id: 2, result: {} });
        strictEqual((await ping).kind, 'result');
        channel.close();
    });

    test('an already-aborted batch sends only its notifications', async () => {
        const { channel, next } = setup();
        const outcomes = await channel.batch(
            [{ method: 'effect' }, { method: 'note', notification: true }],
            { signal: AbortSignal.abort() },
        );
        deepEqual(
            outcomes.map((o) => o.kind),
            ['cancelled'],
        );
        deepEqual(await next(), [{ jsonrpc: '2.0', method: 'note' }]);
        channel.close();
    });

    test('close settles pending calls and ends the peer', async () => {
        const closed: string[] = [];
        const { channel, remote, next } = setup({ closed: (reason) => closed.push(reason.message) });
        const outcome = channel.call('never');
        await next();
        channel.close(new ConnectionLostError('shutting down'));
        channel.close(new ConnectionLostError('again'));

        const result = await outcome;
        strictEqual(result.kind, 'connection-lost');
        strictEqual(result.error.message, 'shutting down');
        strictEqual((await channel.done).message, 'shutting down');
        deepEqual(closed, ['shutting down']);
        await rejects(remote.receive());
    });

    test('peer loss closes the channel', async () => {
        const { channel, remote } = setup();
        const outcome = channel.call('never');
        remote.drop('wire cut');
        const reason = await channel.done;
        strictEqual(reason.message, 'wire cut');
        strictEqual((await outcome).kind, 'connection-lost');
    });
});
