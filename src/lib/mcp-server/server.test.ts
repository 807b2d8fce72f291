import { deepEqual, rejects, strictEqual, throws } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { setImmediate } from 'node:timers/promises';
import { createLogger, nullTransport } from '../../util/logger';
import { TransportError } from '../protocol/errors';
import { createMemoryPair, MemoryListener } from '../transport/memory';
import { MCPServer } from './server';

const log = createLogger('test:server', 'DEBUG', nullTransport);

const initialize = JSON.stringify({
    jsonrpc: '2.0',
    id: 1,
    method: 'initialize',
    params: { protocolVersion: '2025-03-26', capabilities: {}, clientInfo: { name: 'c', version: '1' } },
});

describe('MCPServer', () => {
    test('serves every peer a listener accepts', async () => {
        const server = new MCPServer({ name: 's', version: '1' }, log);
        const listener = new MemoryListener();
        const accepting = server.listen(listener);

        const first = listener.connect();
        const second = listener.connect();
        await first.send(initialize);
        await second.send(initialize);
        deepEqual(JSON.parse(await first.receive()).id, 1);
        deepEqual(JSON.parse(await second.receive()).id, 1);
        strictEqual(server.connections.length, 2);

        await server.close();
        await accepting;
        await rejects(first.receive(), TransportError);
        await rejects(second.receive(), TransportError);
        strictEqual(server.connections.length, 0);
    });

    test('forgets a connection once its peer goes away', async () => {
        const server = new MCPServer({}, log);
        const [client, serverEnd] = createMemoryPair();
        const conn = server.connect(serverEnd);
        strictEqual(server.connections.length, 1);
        await client.close();
        await conn.done;
        await setImmediate();
        strictEqual(server.connections.length, 0);
        await server.close();
    });

    test('refuses new connections after close', async () => {
        const server = new MCPServer({}, log);
        await server.close();
        const [, serverEnd] = createMemoryPair();
        throws(() => server.connect(serverEnd), TransportError);
    });

    test('close is idempotent', async () => {
        const server = new MCPServer({}, log);
        await server.close();
        await server.close();
        strictEqual(server.connections.length, 0);
    });
});
