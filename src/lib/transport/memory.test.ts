import { ok, rejects, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { TransportClosedError, TransportError } from '../protocol/errors';
import { createMemoryPair, MemoryListener } from './memory';

describe('MemoryTransport', () => {
    test('frames flow both ways in order', async () => {
        const [a, b] = createMemoryPair();
        await a.send('one');
        await a.send('two');
        await b.send('back');
        strictEqual(await b.receive(), 'one');
        strictEqual(await b.receive(), 'two');
        strictEqual(await a.receive(), 'back');
    });

    test('receive waits for the next frame', async () => {
        const [a, b] = createMemoryPair();
        const next = b.receive();
        await a.send('late');
        strictEqual(await next, 'late');
    });

    test('closing one end fails the other after buffered frames', async () => {
        const [a, b] = createMemoryPair();
        await a.send('last words');
        await a.close();
        strictEqual(a.closed, true);
        strictEqual(b.closed, true);
        strictEqual(await b.receive(), 'last words');
        await rejects(b.receive(), TransportClosedError);
        await rejects(b.send('x'), TransportClosedError);
    });

    test('drop fails pending receives on both ends', async () => {
        const [a, b] = createMemoryPair();
        const pendingA = a.receive();
        const pendingB = b.receive();
        a.drop('reset by test');
        await rejects(pendingA, (err) => err instanceof TransportError && err.message === 'reset by test');
        await rejects(pendingB, TransportError);
    });
});

describe('MemoryListener', () => {
    test('accepts one transport per connect', async () => {
        const listener = new MemoryListener();
        const client1 = listener.connect();
        const client2 = listener.connect();
        const server1 = await listener.acceptPeer();
        const server2 = await listener.acceptPeer();
        await client1.send('from 1');
        await client2.send('from 2');
        strictEqual(await server1.receive(), 'from 1');
        strictEqual(await server2.receive(), 'from 2');
    });

    test('close stops accepting', async () => {
        const listener = new MemoryListener();
        const pending = listener.acceptPeer();
        await listener.close();
        await rejects(pending, TransportClosedError);
        ok(listener.kind === 'memory');
    });
});
