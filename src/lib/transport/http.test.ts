import { deepEqual, rejects, strictEqual } from 'node:assert/strict';
import { after, before, describe, test } from 'node:test';
import { TransportError } from '../protocol/errors';
import { formatEvent, HttpClientTransport, HttpListener, readEvents } from './http';

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
    const encoder = new TextEncoder();
    return new ReadableStream({
        start(controller) {
            for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
            controller.close();
        },
    });
}

describe('readEvents', () => {
    test('parses events across chunk boundaries', async () => {
        const events: Array<{ event: string; data: string }> = [];
        for await (const event of readEvents(streamOf('event: endpoint\ndata: /message?sessionId=1\n\n:ping\n\nda', 'ta: {"a":1}\r\n\r\n'))) {
            events.push(event);
        }
        deepEqual(events, [
            { event: 'endpoint', data: '/message?sessionId=1' },
            { event: 'message', data: '{"a":1}' },
        ]);
    });

    test('joins multi-line data', async () => {
        const events: Array<{ event: string; data: string }> = [];
        for await (const event of readEvents(streamOf('data: a\ndata: b\n\n'))) {
            events.push(event);
        }
        deepEqual(events, [{ event: 'message', data: 'a\nb' }]);
    });
});

describe('formatEvent', () => {
    test('writes one data line per frame line', async () => {
        const text = formatEvent('message', '{"a":\n1}');
        strictEqual(text, 'event: message\ndata: {"a":\ndata: 1}\n\n');
        const events: Array<{ event: string; data: string }> = [];
        for await (const event of readEvents(streamOf(text))) {
            events.push(event);
        }
        deepEqual(events, [{ event: 'message', data: '{"a":\n1}' }]);
    });
});

describe('HTTP transport', () => {
    let listener: HttpListener;

    before(async () => {
        listener = await HttpListener.listen({ port: 0, host: '127.0.0.1', keepAlive: 0 });
    });

    after(async () => {
        await listener.close();
    });

    test('exchanges frames over SSE and POST', async () => {
        const client = await HttpClientTransport.connect(listener.url);
        const server = await listener.acceptPeer();
        strictEqual(client.endpoint.pathname, '/message');
        strictEqual(listener.sessions, 1);

        await client.send('{"jsonrpc":"2.0","id":1,"method":"ping"}');
        strictEqual(await server.receive(), '{"jsonrpc":"2.0","id":1,"method":"ping"}');

        await server.send('{"jsonrpc":"2.0","id":1,"result":{}}');
        strictEqual(await client.receive(), '{"jsonrpc":"2.0","id":1,"result":{}}');

        await server.send('{"jsonrpc":"2.0",\n"method":"note"}');
        strictEqual(await client.receive(), '{"jsonrpc":"2.0",\n"method":"note"}');

        await client.close();
        await rejects(server.receive(), TransportError);
        strictEqual(listener.sessions, 0);
    });

    test('posts to an unknown session are refused', async () => {
        const res = await fetch(`${listener.url}/message?sessionId=nope`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: '{}',
        });
        strictEqual(res.status, 404);
        deepEqual(await res.json(), { error: 'unknown session' });
    });

    test('posts without a session id are refused', async () => {
        const res = await fetch(`${listener.url}/message`, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: '{}',
        });
        strictEqual(res.status, 400);
    });
});
