import { MCPClient } from '../lib/mcp-client/client';
import { HttpClientTransport } from '../lib/transport/http';
import { ProcessTransport } from '../lib/transport/stream';
import type { TransportFactory } from '../lib/transport/types';
import { WebSocketTransport } from '../lib/transport/websocket';
import { useStderr } from '../util/logger';
import type { Target } from './args';

export function transportFactory(target: Target): TransportFactory {
    switch (target.kind) {
        case 'ws':
            return () => WebSocketTransport.connect(target.url);
        case 'http':
            return () => HttpClientTransport.connect(target.url);
        case 'spawn':
            return () => ProcessTransport.spawn(target.command, target.args);
    }
}

// one-shot commands: no heartbeat, no reconnect, results alone on stdout
async function open(target: Target, timeout: number): Promise<MCPClient> {
    useStderr();
    return MCPClient.connect(transportFactory(target), {
        requestTimeout: timeout,
        heartbeatInterval: 0,
        backoff: { maxTries: 0 },
    });
}

export async function runTools(target: Target, timeout: number): Promise<void> {
    const client = await open(target, timeout);
    try {
        const tools = await client.listTools();
        for (const tool of tools) {
            console.log(tool.description ? `${tool.name}\t${tool.description}` : tool.name);
        }
    } finally {
        await client.close();
    }
}

/** Prints the tool's text content; a tool error sets the exit code */
export async function runCall(target: Target, tool: string, args: Record<string, unknown>, timeout: number): Promise<number> {
    const client = await open(target, timeout);
    try {
        const result = await client.callTool(tool, args);
        for (const item of result.content) {
            console.log(item.type === 'text' ? item.text : JSON.stringify(item));
        }
        return result.isError ? 1 : 0;
    } finally {
        await client.close();
    }
}
