/**
 * One client connection on the server side.
 *
 * awaiting-handshake -> serving -> closing
 *
 * Only `initialize` is accepted before the handshake; everything else is
 * answered with NotInitialized. Requests are dispatched concurrently (bounded
 * by a semaphore) so a slow handler never blocks the receive loop.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../util/logger';
import { Semaphore } from '../../util/semaphore';
import { Channel, type RequestOptions } from '../protocol/channel';
import { parseParams } from '../protocol/codec';
import {
    CapabilityNotFoundError,
    ConnectionLostError,
    InvalidParamsError,
    MethodNotFoundError,
    NotInitializedError,
    ProtocolViolationError,
} from '../protocol/errors';
import {
    type ClientCapabilities,
    type Implementation,
    type InitializeResult,
    initializeParamsSchema,
    type JSONRPCNotification,
    type JSONRPCRequest,
    LATEST_PROTOCOL_VERSION,
    type ListRootsResult,
    listRootsResultSchema,
    type LoggingLevel,
    Method,
    metaSchema,
    type Params,
    promptGetParamsSchema,
    type RequestId,
    resourceReadParamsSchema,
    setLevelParamsSchema,
    SUPPORTED_PROTOCOL_VERSIONS,
    subscribeParamsSchema,
    toolCallParamsSchema,
} from '../protocol/types';
import type { Transport } from '../transport/types';
import type { CapabilityRegistry } from './registry';
import { atLeast, type RequestContext, type ServerOptions } from './types';

export type ConnectionState = 'awaiting-handshake' | 'serving' | 'closing';

/** What a connection needs from the server that owns it */
export interface ServerContext {
    readonly registry: CapabilityRegistry;
    readonly options: ServerOptions;
    readonly log: Logger;
}

export class ServerConnection {
    readonly id = randomUUID().slice(0, 8);
    readonly log: Logger;
    private readonly _channel: Channel;
    private readonly _limit: Semaphore;
    private readonly _subscriptions = new Set<string>();
    private _state: ConnectionState = 'awaiting-handshake';
    private _initialized = false;
    private _violations = 0;
    private _logLevel: LoggingLevel;
    private _client?: { info: Implementation; capabilities: ClientCapabilities; protocolVersion: string };

    constructor(
        transport: Transport,
        private readonly _ctx: ServerContext,
    ) {
        this.log = _ctx.log.scoped(transport.kind);
        this._limit = new Semaphore(_ctx.options.maxConcurrentRequests);
        this._logLevel = _ctx.options.logLevel;
        this._channel = new Channel(
            transport,
            {
                request: (req, signal) => this._onRequest(req, signal),
                notification: (msg) => this._onNotification(msg),
                invalid: () => this._violation('undecodable frame'),
                closed: (reason) => {
                    this._state = 'closing';
                    this.log.info(`${this.id}: connection closed: ${reason.message}`);
                },
            },
            { requestTimeout: _ctx.options.requestTimeout, log: this.log },
        );
    }

    get state(): ConnectionState {
        return this._state;
    }

    /** true once the client sent `notifications/initialized` */
    get initialized(): boolean {
        return this._initialized;
    }

    get clientInfo(): Implementation | undefined {
        return this._client?.info;
    }

    get clientCapabilities(): ClientCapabilities | undefined {
        return this._client?.capabilities;
    }

    get protocolVersion(): string | undefined {
        return this._client?.protocolVersion;
    }

    get logLevel(): LoggingLevel {
        return this._logLevel;
    }

    /** Resolves with the reason once the connection is gone */
    get done(): Promise<Error> {
        return this._channel.done;
    }

    start(): this {
        this.log.info(`${this.id}: connection opened`);
        this._channel.start();
        return this;
    }

    close(reason = 'server closed the connection'): void {
        this._state = 'closing';
        this._channel.close(new ConnectionLostError(reason));
    }

    isSubscribed(uri: string): boolean {
        return this._subscriptions.has(uri);
    }

    /** Send a notification; dropped unless serving */
    async notify(method: string, params?: Params): Promise<void> {
        if (this._state !== 'serving') return;
        await this._channel.notify(method, params);
    }

    /**
     * Send a `notifications/message` log entry if the client's level admits it.
     */
    async sendLog(level: LoggingLevel, data: unknown, logger?: string): Promise<void> {
        if (!atLeast(level, this._logLevel)) return;
        await this.notify(Method.MESSAGE, logger ? { level, logger, data } : { level, data });
    }

    /** Server-initiated request to the client */
    request(method: string, params?: Params, opts?: RequestOptions): Promise<unknown> {
        if (this._state !== 'serving') {
            return Promise.reject(new ConnectionLostError(`connection is ${this._state}`));
        }
        return this._channel.request(method, params, opts);
    }

    async listRoots(opts?: RequestOptions): Promise<ListRootsResult> {
        return listRootsResultSchema.parse(await this.request(Method.ROOTS_LIST, undefined, opts));
    }

    private async _onRequest(req: JSONRPCRequest, signal: AbortSignal): Promise<unknown> {
        if (req.method === Method.INITIALIZE) {
            return this._initialize(req);
        }
        if (this._state === 'awaiting-handshake') {
            this._violation(`${req.method} before initialize`);
            throw new NotInitializedError(req.method);
        }
        if (req.method === Method.PING) {
            return {};
        }
        return this._limit.run(() => this._dispatch(req, signal), signal);
    }

    private _initialize(req: JSONRPCRequest): InitializeResult {
        if (this._state !== 'awaiting-handshake') {
            this._violation('repeated initialize');
            throw new ProtocolViolationError('initialize may only be sent once');
        }
        const params = parseParams(initializeParamsSchema, req.params, req.method);
        const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(params.protocolVersion)
            ? params.protocolVersion
            : LATEST_PROTOCOL_VERSION;

        this._client = { info: params.clientInfo, capabilities: params.capabilities, protocolVersion };
        this._state = 'serving';
        this.log.info(`${this.id}: handshake with ${params.clientInfo.name} ${params.clientInfo.version} (protocol ${protocolVersion})`);

        const { name, version, instructions } = this._ctx.options;
        const result: InitializeResult = {
            protocolVersion,
            capabilities: {
                tools: { listChanged: true },
                resources: { subscribe: true, listChanged: true },
                prompts: { listChanged: true },
                logging: {},
            },
            serverInfo: { name, version },
        };
        if (instructions) result.instructions = instructions;
        return result;
    }

    private async _dispatch(req: JSONRPCRequest, signal: AbortSignal): Promise<unknown> {
        const { registry } = this._ctx;
        const ctx = this._context(req, signal);

        switch (req.method) {
            case Method.TOOLS_LIST:
                return { tools: registry.tools.list() };

            case Method.TOOLS_CALL: {
                const params = parseParams(toolCallParamsSchema, req.params, req.method);
                const tool = registry.tools.get(params.name);
                if (!tool) throw new CapabilityNotFoundError('tool', params.name);
                return tool.call(params.arguments ?? {}, ctx);
            }

            case Method.RESOURCES_LIST:
                return { resources: registry.resources.list() };

            case Method.RESOURCES_TEMPLATES_LIST:
                return { resourceTemplates: registry.resourceTemplates.list() };

            case Method.RESOURCES_READ: {
                const { uri } = parseParams(resourceReadParamsSchema, req.params, req.method);
                const resource = registry.resources.get(uri);
                if (resource) {
                    return { contents: await resource.read(ctx) };
                }
                const matched = registry.matchTemplate(uri);
                if (matched) {
                    return { contents: await matched.template.read(uri, matched.vars, ctx) };
                }
                throw new CapabilityNotFoundError('resource', uri);
            }

            case Method.RESOURCES_SUBSCRIBE: {
                const { uri } = parseParams(subscribeParamsSchema, req.params, req.method);
                this._subscriptions.add(uri);
                return {};
            }

            case Method.RESOURCES_UNSUBSCRIBE: {
                const { uri } = parseParams(subscribeParamsSchema, req.params, req.method);
                this._subscriptions.delete(uri);
                return {};
            }

            case Method.PROMPTS_LIST:
                return { prompts: registry.prompts.list() };

            case Method.PROMPTS_GET: {
                const params = parseParams(promptGetParamsSchema, req.params, req.method);
                const prompt = registry.prompts.get(params.name);
                if (!prompt) throw new CapabilityNotFoundError('prompt', params.name);
                const args = params.arguments ?? {};
                const missing = prompt.definition.arguments?.find((arg) => arg.required && args[arg.name] === undefined);
                if (missing) {
                    throw new InvalidParamsError(`missing required argument: ${missing.name}`);
                }
                return prompt.get(args, ctx);
            }

            case Method.LOGGING_SET_LEVEL: {
                const { level } = parseParams(setLevelParamsSchema, req.params, req.method);
                this._logLevel = level;
                return {};
            }

            default:
                throw new MethodNotFoundError(req.method);
        }
    }

    private _context(req: JSONRPCRequest, signal: AbortSignal): RequestContext {
        const meta = metaSchema.safeParse(req.params?._meta);
        const token: RequestId | undefined = meta.success ? meta.data.progressToken : undefined;
        return {
            signal,
            connection: this,
            log: this.log,
            progress: async (progress, total, message) => {
                if (token === undefined || signal.aborted) return;
                await this.notify(Method.PROGRESS, {
                    progressToken: token,
                    progress,
                    ...(total !== undefined && { total }),
                    ...(message !== undefined && { message }),
                });
            },
        };
    }

    private _onNotification(msg: JSONRPCNotification): void {
        if (this._state === 'awaiting-handshake') {
            this.log.warn(`${this.id}: dropping ${msg.method} received before initialize`);
            return;
        }
        switch (msg.method) {
            case Method.INITIALIZED:
                this._initialized = true;
                this.log.debug(`${this.id}: client confirmed initialization`);
                break;
            default:
                this.log.debug(`${this.id}: ignoring notification ${msg.method}`);
        }
    }

    private _violation(what: string): void {
        this._violations++;
        this.log.warn(`${this.id}: protocol violation #${this._violations}: ${what}`);
        const max = this._ctx.options.maxProtocolViolations;
        if (max > 0 && this._violations >= max) {
            // let the error reply go out first
            setImmediate(() => this.close(`too many protocol violations (${this._violations})`));
        }
    }
}
