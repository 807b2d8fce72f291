import { rejects, strictEqual } from 'node:assert/strict';
import { after, before, describe, test } from 'node:test';
import { TransportError } from '../protocol/errors';
import { WebSocketListener, WebSocketTransport } from './websocket';

describe('WebSocket transport', () => {
    let listener: WebSocketListener;

    before(async () => {
        listener = await WebSocketListener.listen({ port: 0, host: '127.0.0.1' });
    });

    after(async () => {
        await listener.close();
    });

    test('exchanges frames with an accepted peer', async () => {
        const client = await WebSocketTransport.connect(`ws://127.0.0.1:${listener.port}`);
        const server = await listener.acceptPeer();

        await client.send('{"jsonrpc":"2.0","id":1,"method":"ping"}');
        strictEqual(await server.receive(), '{"jsonrpc":"2.0","id":1,"method":"ping"}');

        await server.send('{"jsonrpc":"2.0","id":1,"result":{}}');
        strictEqual(await client.receive(), '{"jsonrpc":"2.0","id":1,"result":{}}');

        await client.close();
        await rejects(server.receive(), TransportError);
    });

    test('connect fails when nothing listens', async () => {
        await rejects(WebSocketTransport.connect('ws://127.0.0.1:1'), TransportError);
    });
});
