import { registerOwnCapabilities } from '../controller/mcp-controller';
import { MCPServer } from '../lib/mcp-server/server';
import { HttpListener } from '../lib/transport/http';
import { stdioTransport } from '../lib/transport/stream';
import type { Listener } from '../lib/transport/types';
import { WebSocketListener } from '../lib/transport/websocket';
import { atExit } from '../util/at-exit';
import { Env } from '../util/env';
import { createLogger, useStderr } from '../util/logger';
import type { ServeTransport } from './args';

export interface ServeOptions {
    transport: ServeTransport;
    port?: number;
    host?: string;
}

/**
 * Serve the demo capabilities until the peer goes away (stdio) or the
 * process is told to stop.
 */
export async function runServe({ transport, port, host }: ServeOptions): Promise<void> {
    // stdout carries frames
    if (transport === 'stdio') useStderr();

    const log = createLogger('mcp:serve');
    const server = registerOwnCapabilities(new MCPServer());
    atExit(() => server.close());

    if (transport === 'stdio') {
        const conn = server.connect(stdioTransport());
        const reason = await conn.done;
        log.info(`stdio session ended: ${reason.message}`);
        await server.close();
        return;
    }

    const listener: Listener =
        transport === 'ws'
            ? await WebSocketListener.listen({ port: port ?? Env.get('PORT', 3000, 0, 65535), host })
            : await HttpListener.listen({ port, host });
    log.info(`serving ${server.options.name} ${server.options.version} over ${transport}`);
    await server.listen(listener);
}
