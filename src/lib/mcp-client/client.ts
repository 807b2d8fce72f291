/**
 * @file Typed helpers over a ClientSession, one per protocol method.
 * Results are validated with the protocol schemas before they are returned.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '../../util/logger';
import type { RequestOptions } from '../protocol/channel';
import { describeIssues } from '../protocol/codec';
import { InvalidEnvelopeError } from '../protocol/errors';
import {
    type InitializeResult,
    listPromptsResultSchema,
    listResourcesResultSchema,
    listResourceTemplatesResultSchema,
    listToolsResultSchema,
    type LoggingLevel,
    Method,
    type Params,
    type PromptDefinition,
    type PromptResult,
    promptResultSchema,
    type ResourceContents,
    type ResourceDefinition,
    resourceReadResultSchema,
    type ResourceTemplate,
    type ToolDefinition,
    type ToolResult,
    toolResultSchema,
} from '../protocol/types';
import type { TransportFactory } from '../transport/types';
import { ClientSession } from './session';
import type { SessionOptions } from './types';

export class MCPClient {
    constructor(readonly session: ClientSession) {}

    /** Open a session and wrap it */
    static async connect(factory: TransportFactory, opts?: Readonly<Partial<SessionOptions>>, log?: Logger): Promise<MCPClient> {
        const session = new ClientSession(opts, log);
        await session.connect(factory);
        return new MCPClient(session);
    }

    get server(): InitializeResult | undefined {
        return this.session.server;
    }

    async ping(opts?: RequestOptions): Promise<void> {
        await this.session.request(Method.PING, undefined, opts);
    }

    async listTools(opts?: RequestOptions): Promise<ToolDefinition[]> {
        return (await this._request(listToolsResultSchema, Method.TOOLS_LIST, undefined, opts)).tools;
    }

    /**
     * Call a tool. A tool that reports failure in its result (`isError`)
     * resolves normally; protocol errors reject.
     */
    callTool(name: string, args: Record<string, unknown> = {}, opts?: RequestOptions & { progressToken?: string | number }): Promise<ToolResult> {
        const params: Params = { name, arguments: args };
        if (opts?.progressToken !== undefined) {
            params._meta = { progressToken: opts.progressToken };
        }
        return this._request(toolResultSchema, Method.TOOLS_CALL, params, opts);
    }

    async listResources(opts?: RequestOptions): Promise<ResourceDefinition[]> {
        return (await this._request(listResourcesResultSchema, Method.RESOURCES_LIST, undefined, opts)).resources;
    }

    async listResourceTemplates(opts?: RequestOptions): Promise<ResourceTemplate[]> {
        return (await this._request(listResourceTemplatesResultSchema, Method.RESOURCES_TEMPLATES_LIST, undefined, opts))
            .resourceTemplates;
    }

    async readResource(uri: string, opts?: RequestOptions): Promise<ResourceContents[]> {
        return (await this._request(resourceReadResultSchema, Method.RESOURCES_READ, { uri }, opts)).contents;
    }

    async subscribe(uri: string, opts?: RequestOptions): Promise<void> {
        await this.session.request(Method.RESOURCES_SUBSCRIBE, { uri }, opts);
    }

    async unsubscribe(uri: string, opts?: RequestOptions): Promise<void> {
        await this.session.request(Method.RESOURCES_UNSUBSCRIBE, { uri }, opts);
    }

    async listPrompts(opts?: RequestOptions): Promise<PromptDefinition[]> {
        return (await this._request(listPromptsResultSchema, Method.PROMPTS_LIST, undefined, opts)).prompts;
    }

    getPrompt(name: string, args: Record<string, string> = {}, opts?: RequestOptions): Promise<PromptResult> {
        return this._request(promptResultSchema, Method.PROMPTS_GET, { name, arguments: args }, opts);
    }

    async setLogLevel(level: LoggingLevel, opts?: RequestOptions): Promise<void> {
        await this.session.request(Method.LOGGING_SET_LEVEL, { level }, opts);
    }

    close(): Promise<void> {
        return this.session.disconnect();
    }

    private async _request<T>(
        schema: ZodType<T, ZodTypeDef, unknown>,
        method: string,
        params?: Params,
        opts?: RequestOptions,
    ): Promise<T> {
        const result = await this.session.request(method, params, opts);
        const parsed = schema.safeParse(result);
        if (!parsed.success) {
            throw new InvalidEnvelopeError(`invalid ${method} result: ${describeIssues(parsed.error)}`, null);
        }
        return parsed.data;
    }
}
