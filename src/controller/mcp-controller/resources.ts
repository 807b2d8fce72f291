/**
 * Demo resources: a static server-info document and a greeting template.
 */

import type { MCPServer } from '../../lib/mcp-server/server';

export const SERVER_INFO_URI = 'server://info';

export function registerResources(server: MCPServer): void {
    server.registry.resources.register({
        definition: {
            uri: SERVER_INFO_URI,
            name: 'Server info',
            description: 'Name, version and registered capabilities',
            mimeType: 'application/json',
        },
        read: async () => {
            const { registry, options } = server;
            const info = {
                name: options.name,
                version: options.version,
                tools: registry.tools.list().map((tool) => tool.name),
                prompts: registry.prompts.list().map((prompt) => prompt.name),
            };
            return [{ uri: SERVER_INFO_URI, mimeType: 'application/json', text: JSON.stringify(info) }];
        },
    });

    server.registry.resourceTemplates.register({
        definition: { uriTemplate: 'greeting://{name}', name: 'Greeting', mimeType: 'text/plain' },
        read: async (uri, vars) => [{ uri, mimeType: 'text/plain', text: `Hello, ${decodeURIComponent(vars.name)}!` }],
    });
}
