/**
 * Health check tool
 * Returns server health status
 */

import { z } from 'zod';
import type { MCPServer } from '../../lib/mcp-server/server';
import { defineTool, textResult } from '../../lib/mcp-server/types';

export function registerHealthTool(server: MCPServer): void {
    server.registry.tools.register(
        defineTool({
            name: 'health',
            description: 'Check server health status',
            inputSchema: { type: 'object', properties: {} },
            args: z.object({}),
            call: async () => {
                const result = {
                    status: 'ok',
                    connections: server.connections.length,
                    uptime: Math.round(process.uptime()),
                    timestamp: new Date().toISOString(),
                };
                return textResult(JSON.stringify(result, null, 2));
            },
        }),
    );
}
