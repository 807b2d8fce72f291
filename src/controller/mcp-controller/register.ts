/**
 * Registers the built-in demo capabilities on a server.
 */

import type { MCPServer } from '../../lib/mcp-server/server';
import { registerBasicTools } from './basic-tools';
import { registerFormatNumberTool } from './format-number-tool';
import { registerHealthTool } from './health-tool';
import { registerPrompts } from './prompts';
import { registerResources } from './resources';

export function registerOwnCapabilities(server: MCPServer): MCPServer {
    registerHealthTool(server);
    registerBasicTools(server);
    registerFormatNumberTool(server);
    registerResources(server);
    registerPrompts(server);
    return server;
}
