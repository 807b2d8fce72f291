/**
 * Number formatting tool
 * Formats numbers according to locale (IETF BCP 47 format)
 */

import { z } from 'zod';
import type { MCPServer } from '../../lib/mcp-server/server';
import { defineTool, textResult } from '../../lib/mcp-server/types';

const args = z.object({
    number: z.number().refine((n) => digitsOf(n) <= 15, 'Number must have at most 15 digits'),
    locale: z.string().regex(/^[a-z]{2,3}(-[A-Z]{2})?$/, 'Locale must be in IETF BCP 47 format (e.g., en-US, de-DE)'),
});

function digitsOf(n: number): number {
    const abs = Math.abs(n);
    return abs < 1 ? 1 : Math.floor(Math.log10(abs)) + 1;
}

export function registerFormatNumberTool(server: MCPServer): void {
    server.registry.tools.register(
        defineTool({
            name: 'format_number',
            description: 'Format a number according to a specific locale (IETF BCP 47 format like en-US, de-DE)',
            inputSchema: {
                type: 'object',
                properties: {
                    number: { type: 'number', description: 'Number to format (1-15 digits, positive or negative)' },
                    locale: { type: 'string', description: 'Locale in IETF BCP 47 format (e.g., en-US, de-DE, fr-FR)' },
                },
                required: ['number', 'locale'],
            },
            args,
            call: async ({ number, locale }) => {
                // well-formed tags can still be unknown to Intl
                try {
                    const formatted = new Intl.NumberFormat(locale).format(number);
                    return textResult(JSON.stringify({ formatted, number, locale }, null, 2));
                } catch (error) {
                    return textResult(`Error: ${error instanceof Error ? error.message : 'Unknown error formatting number'}`, true);
                }
            },
        }),
    );
}
