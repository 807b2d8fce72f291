/**
 * Command line parsing. Pure: no I/O, so it can be tested directly.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ErrorEx } from '../util/error';
import { safeSync } from '../util/safe';

export class UsageError extends ErrorEx {}

export type ServeTransport = 'stdio' | 'ws' | 'http';

export type Target = { kind: 'ws'; url: string } | { kind: 'http'; url: string } | { kind: 'spawn'; command: string; args: string[] };

export type Command =
    | { cmd: 'help' }
    | { cmd: 'serve'; transport: ServeTransport; port?: number; host?: string }
    | { cmd: 'tools'; target: Target; timeout: number }
    | { cmd: 'call'; target: Target; tool: string; args: Record<string, unknown>; timeout: number };

const portSchema = z.coerce.number().int().min(0).max(65535);
const timeoutSchema = z.coerce.number().int().min(1);
const toolArgsSchema = z.record(z.unknown());

export function parseCommand(argv: string[]): Command {
    const { positionals, values } = parseArgs({
        args: argv,
        options: {
            help: { type: 'boolean', short: 'h', default: false },
            transport: { type: 'string', short: 't', default: 'stdio' },
            port: { type: 'string', short: 'p' },
            host: { type: 'string' },
            spawn: { type: 'string' },
            timeout: { type: 'string', default: '30000' },
        },
        allowPositionals: true,
    });

    const [command, ...rest] = positionals;
    if (values.help || !command) return { cmd: 'help' };

    switch (command) {
        case 'serve': {
            const transport = values.transport;
            if (transport !== 'stdio' && transport !== 'ws' && transport !== 'http') {
                throw new UsageError(`unknown transport: ${transport}`);
            }
            return {
                cmd: 'serve',
                transport,
                ...(values.port !== undefined && { port: parseNumber(portSchema, values.port, 'port') }),
                ...(values.host !== undefined && { host: values.host }),
            };
        }

        case 'tools':
        case 'call': {
            const [target, remaining] = parseTarget(values.spawn, rest);
            const timeout = parseNumber(timeoutSchema, values.timeout, 'timeout');
            if (command === 'tools') {
                return { cmd: 'tools', target, timeout };
            }
            const [tool, json] = remaining;
            if (!tool) throw new UsageError('missing tool name');
            return { cmd: 'call', target, tool, args: parseToolArgs(json), timeout };
        }

        default:
            throw new UsageError(`unknown command: ${command}`);
    }
}

/**
 * `--spawn "cmd args"` or a ws:// / http:// url as the first positional.
 * Returns the target and the positionals left after it.
 */
export function parseTarget(spawn: string | undefined, positionals: string[]): [Target, string[]] {
    if (spawn !== undefined) {
        const [command, ...args] = spawn.split(/\s+/).filter(Boolean);
        if (!command) throw new UsageError('--spawn needs a command');
        return [{ kind: 'spawn', command, args }, positionals];
    }
    const [url, ...remaining] = positionals;
    if (!url) throw new UsageError('missing server url or --spawn');
    const [parsed, err] = safeSync(() => new URL(url));
    if (err) throw new UsageError(`invalid url: ${url}`);
    switch (parsed.protocol) {
        case 'ws:':
        case 'wss:':
            return [{ kind: 'ws', url }, remaining];
        case 'http:':
        case 'https:':
            return [{ kind: 'http', url }, remaining];
        default:
            throw new UsageError(`unsupported url scheme: ${parsed.protocol}`);
    }
}

/** Tool arguments as a JSON object; absent means `{}` */
export function parseToolArgs(json: string | undefined): Record<string, unknown> {
    if (json === undefined) return {};
    const [value, err] = safeSync((): unknown => JSON.parse(json));
    if (err) throw new UsageError(`tool arguments are not valid JSON: ${err.message}`);
    const parsed = toolArgsSchema.safeParse(value);
    if (!parsed.success) throw new UsageError('tool arguments must be a JSON object');
    return parsed.data;
}

function parseNumber(schema: z.ZodType<number, z.ZodTypeDef, unknown>, raw: string, name: string): number {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) throw new UsageError(`invalid ${name}: ${raw}`);
    return parsed.data;
}
