/**
 * Capability contracts and server configuration.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { Env } from '../../util/env';
import type { Logger } from '../../util/logger';
import { InvalidParamsError } from '../protocol/errors';
import { describeIssues } from '../protocol/codec';
import type {
    LoggingLevel,
    PromptDefinition,
    PromptResult,
    ResourceContents,
    ResourceDefinition,
    ResourceTemplate,
    ToolDefinition,
    ToolResult,
} from '../protocol/types';
import type { ServerConnection } from './connection';

/**
 * Passed to every capability handler invocation.
 */
export interface RequestContext {
    /** aborted when the client cancels the request or the connection closes */
    readonly signal: AbortSignal;
    readonly connection: ServerConnection;
    readonly log: Logger;
    /** no-op unless the request carried a progress token */
    progress(progress: number, total?: number, message?: string): Promise<void>;
}

export interface Tool {
    readonly definition: ToolDefinition;
    call(args: Record<string, unknown>, ctx: RequestContext): Promise<ToolResult>;
}

export interface Resource {
    readonly definition: ResourceDefinition;
    read(ctx: RequestContext): Promise<ResourceContents[]>;
}

export interface ResourceTemplateHandler {
    readonly definition: ResourceTemplate;
    read(uri: string, vars: Record<string, string>, ctx: RequestContext): Promise<ResourceContents[]>;
}

export interface Prompt {
    readonly definition: PromptDefinition;
    get(args: Record<string, string>, ctx: RequestContext): Promise<PromptResult>;
}

export interface ToolSpec<A> extends ToolDefinition {
    /** validates `arguments` before `call` runs */
    args: ZodType<A, ZodTypeDef, unknown>;
    call(args: A, ctx: RequestContext): Promise<ToolResult>;
}

/**
 * Build a Tool whose arguments are checked with a zod schema.
 * A mismatch is answered with InvalidParams.
 */
export function defineTool<A>({ args, call, ...definition }: ToolSpec<A>): Tool {
    return {
        definition,
        async call(raw, ctx) {
            const parsed = args.safeParse(raw);
            if (!parsed.success) {
                throw new InvalidParamsError(`invalid arguments for ${definition.name}: ${describeIssues(parsed.error)}`);
            }
            return call(parsed.data, ctx);
        },
    };
}

/** Plain text tool result */
export function textResult(text: string, isError?: boolean): ToolResult {
    return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

/**
 * Server configuration.
 *
 * Environment variables:
 * MCP_MAX_CONCURRENT_REQUESTS: handler invocations running at once per connection. Default: 100.
 * MCP_MAX_PROTOCOL_VIOLATIONS: violations before a connection is closed, 0 = never. Default: 0.
 * MCP_REQUEST_TIMEOUT: timeout of server-initiated requests in ms. Default: 30000.
 * MCP_LOG_LEVEL: initial threshold of log notifications sent to clients. Default: info.
 */
export class ServerOptions {
    readonly name: string = Env.appName;
    readonly version: string = Env.appVersion;
    readonly instructions?: string;
    readonly maxConcurrentRequests: number = Env.get('MCP_MAX_CONCURRENT_REQUESTS', 100, 1);
    readonly maxProtocolViolations: number = Env.get('MCP_MAX_PROTOCOL_VIOLATIONS', 0, 0);
    readonly requestTimeout: number = Env.get('MCP_REQUEST_TIMEOUT', 30000, 0);
    readonly logLevel: LoggingLevel = toLoggingLevel(Env.get('MCP_LOG_LEVEL', 'info'));

    constructor(opts?: Readonly<Partial<ServerOptions>>) {
        if (opts) {
            Object.assign(this, opts);
        }
    }
}

export function loadServerConfig(overrides?: Readonly<Partial<ServerOptions>>): ServerOptions {
    return new ServerOptions(overrides);
}

export const LOGGING_LEVELS: readonly LoggingLevel[] = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'];

function toLoggingLevel(value: string): LoggingLevel {
    return LOGGING_LEVELS.find((level) => level === value.toLowerCase()) ?? 'info';
}

/** true when `level` is at or above `threshold` */
export function atLeast(level: LoggingLevel, threshold: LoggingLevel): boolean {
    return LOGGING_LEVELS.indexOf(level) >= LOGGING_LEVELS.indexOf(threshold);
}
