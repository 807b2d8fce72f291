/**
 * Small tools for trying out a connection: echo, add and countdown.
 */

import { z } from 'zod';
import type { MCPServer } from '../../lib/mcp-server/server';
import { defineTool, textResult } from '../../lib/mcp-server/types';
import { sleep } from '../../util/sleep';

export function registerBasicTools(server: MCPServer): void {
    const { tools } = server.registry;

    tools.register(
        defineTool({
            name: 'echo',
            description: 'Return the message unchanged',
            inputSchema: { type: 'object', properties: { message: { type: 'string' } }, required: ['message'] },
            args: z.object({ message: z.string() }),
            call: async ({ message }) => textResult(message),
        }),
    );

    tools.register(
        defineTool({
            name: 'add',
            description: 'Add two numbers',
            inputSchema: {
                type: 'object',
                properties: { a: { type: 'number' }, b: { type: 'number' } },
                required: ['a', 'b'],
            },
            args: z.object({ a: z.number(), b: z.number() }),
            call: async ({ a, b }) => textResult(String(a + b)),
        }),
    );

    // long running: reports progress and stops when cancelled
    tools.register(
        defineTool({
            name: 'countdown',
            description: 'Count down, one step per interval, reporting progress',
            inputSchema: {
                type: 'object',
                properties: {
                    steps: { type: 'integer', minimum: 1, maximum: 100 },
                    interval: { type: 'integer', minimum: 0, maximum: 10000, description: 'milliseconds, default 1000' },
                },
                required: ['steps'],
            },
            args: z.object({
                steps: z.number().int().min(1).max(100),
                interval: z.number().int().min(0).max(10000).default(1000),
            }),
            call: async ({ steps, interval }, ctx) => {
                for (let done = 1; done <= steps; done++) {
                    await sleep(interval, undefined, { signal: ctx.signal });
                    await ctx.progress(done, steps, `${steps - done} left`);
                }
                return textResult('liftoff');
            },
        }),
    );
}
