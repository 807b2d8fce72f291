import type { MCPServer } from '../../lib/mcp-server/server';

export function registerPrompts(server: MCPServer): void {
    server.registry.prompts.register({
        definition: {
            name: 'greet',
            description: 'Ask for a greeting addressed to someone',
            arguments: [
                { name: 'name', description: 'who to greet', required: true },
                { name: 'style', description: 'e.g. formal, friendly (default)' },
            ],
        },
        get: async ({ name, style = 'friendly' }) => ({
            description: `Greeting for ${name}`,
            messages: [{ role: 'user', content: { type: 'text', text: `Write a ${style} greeting for ${name}.` } }],
        }),
    });
}
