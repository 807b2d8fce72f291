/**
 * ClientSession: one logical connection to a server that survives carrier loss.
 *
 * disconnected -> connecting -> handshaking -> ready <-> degraded
 *                                 ready | degraded -> reconnecting -> connecting ...
 *                                 reconnecting -> disconnected (gave up)
 *
 * On loss every pending request settles with `connection-lost` before the
 * first reconnect attempt is scheduled. In-flight requests are never re-sent.
 * `disconnect()` stops the session for good and never reconnects.
 */

import { Backoff } from '../../util/backoff';
import { toError } from '../../util/error';
import { createLogger, type Logger } from '../../util/logger';
import { sleepUnlessAborted } from '../../util/sleep';
import { type BatchItem, Channel, type RequestOptions } from '../protocol/channel';
import { describeIssues } from '../protocol/codec';
import { type Outcome, unwrap } from '../protocol/correlator';
import { ConnectionLostError, HandshakeError, McpError, MethodNotFoundError } from '../protocol/errors';
import {
    type InitializeResult,
    initializeResultSchema,
    type JSONRPCRequest,
    Method,
    type Params,
    type Root,
    SUPPORTED_PROTOCOL_VERSIONS,
} from '../protocol/types';
import type { TransportFactory } from '../transport/types';
import {
    ConnectedEvent,
    DisconnectedEvent,
    NotificationEvent,
    ReconnectingEvent,
    type RequestHandler,
    SessionErrorEvent,
    SessionOptions,
    type SessionState,
    StateEvent,
} from './types';

export class ClientSession extends EventTarget {
    readonly options: SessionOptions;
    readonly log: Logger;
    private readonly _backoff: Backoff;
    private readonly _handlers = new Map<string, RequestHandler>();
    private _state: SessionState = 'disconnected';
    private _channel?: Channel;
    private _factory?: TransportFactory;
    private _server?: InitializeResult;
    private _lifecycle = new AbortController();

    constructor(opts?: Readonly<Partial<SessionOptions>>, log: Logger = createLogger('mcp:client')) {
        super();
        this.options = new SessionOptions(opts);
        this.log = log;
        this._backoff = new Backoff(this.options.backoff);
    }

    get state(): SessionState {
        return this._state;
    }

    /** true while requests can be sent (ready or degraded) */
    get ready(): boolean {
        return this._state === 'ready' || this._state === 'degraded';
    }

    /** Result of the last successful handshake */
    get server(): InitializeResult | undefined {
        return this._server;
    }

    get pending(): number {
        return this._channel?.pending ?? 0;
    }

    /**
     * Open the session. `factory` builds a fresh transport for the first
     * connection and for every reconnect attempt. Rejects when the first
     * connection or its handshake fails; there is no retry at this point.
     */
    async connect(factory: TransportFactory): Promise<InitializeResult> {
        if (this._state !== 'disconnected') {
            throw new McpError(`session is already ${this._state}`);
        }
        this._factory = factory;
        this._lifecycle = new AbortController();
        this._backoff.reset();
        try {
            return await this._attempt(factory, this._lifecycle.signal);
        } catch (err) {
            this._setState('disconnected');
            throw err;
        }
    }

    /** Close the session for good. Pending requests settle with `connection-lost` */
    async disconnect(reason = 'session disconnected'): Promise<void> {
        this._lifecycle.abort();
        const channel = this._channel;
        this._channel = undefined;
        const error = new ConnectionLostError(reason);
        channel?.close(error);
        if (this._state !== 'disconnected') {
            this._setState('disconnected');
            this.log.info(`disconnected: ${reason}`);
            this.dispatchEvent(new DisconnectedEvent(error, true));
        }
        if (channel) await channel.done;
    }

    /**
     * Send a request and wait for its outcome. Never rejects; when the session
     * is not ready the outcome is `connection-lost` at once.
     */
    call(method: string, params?: Params, opts?: RequestOptions): Promise<Outcome> {
        const channel = this._usable();
        if (!channel) {
            return Promise.resolve({ kind: 'connection-lost', error: new ConnectionLostError(`session is ${this._state}`) });
        }
        return channel.call(method, params, opts);
    }

    /** Send a request; resolves with the result or rejects with a typed error */
    async request(method: string, params?: Params, opts?: RequestOptions): Promise<unknown> {
        return unwrap(await this.call(method, params, opts));
    }

    async notify(method: string, params?: Params): Promise<void> {
        const channel = this._usable();
        if (!channel) {
            throw new ConnectionLostError(`session is ${this._state}`);
        }
        await channel.notify(method, params);
    }

    /** One outcome per request item, in item order */
    batch(items: readonly BatchItem[], opts?: RequestOptions): Promise<Outcome[]> {
        const channel = this._usable();
        if (!channel) {
            const error = new ConnectionLostError(`session is ${this._state}`);
            return Promise.resolve(items.filter((item) => !item.notification).map((): Outcome => ({ kind: 'connection-lost', error })));
        }
        return channel.batch(items, opts);
    }

    /**
     * Answer a server-initiated request (`roots/list`, `sampling/createMessage`).
     * Unhandled methods are answered with MethodNotFound.
     */
    setRequestHandler(method: string, handler: RequestHandler): this {
        this._handlers.set(method, handler);
        return this;
    }

    /** Serve a fixed list of roots to the server */
    setRoots(roots: Root[]): this {
        return this.setRequestHandler(Method.ROOTS_LIST, async () => ({ roots }));
    }

    private _usable(): Channel | undefined {
        return this.ready ? this._channel : undefined;
    }

    private _setState(next: SessionState): void {
        const previous = this._state;
        if (previous === next) return;
        this._state = next;
        this.log.debug(`state ${previous} -> ${next}`);
        this.dispatchEvent(new StateEvent(next, previous));
    }

    /** One full connect sequence: transport, handshake, heartbeat */
    private async _attempt(factory: TransportFactory, lifecycle: AbortSignal): Promise<InitializeResult> {
        this._setState('connecting');
        const transport = await factory();
        if (lifecycle.aborted) {
            await transport.close();
            throw new ConnectionLostError('session disconnected');
        }

        const channel: Channel = new Channel(
            transport,
            {
                request: (req, signal) => this._onRequest(req, signal),
                notification: (msg) => this.dispatchEvent(new NotificationEvent(msg)),
                closed: (reason) => this._onClosed(channel, reason),
            },
            { requestTimeout: this.options.requestTimeout, log: this.log },
        );
        this._channel = channel;
        channel.start();

        this._setState('handshaking');
        const { protocolVersion, capabilities, clientInfo, handshakeTimeout } = this.options;
        const outcome = await channel.call(Method.INITIALIZE, { protocolVersion, capabilities, clientInfo }, { timeout: handshakeTimeout });
        if (outcome.kind !== 'result') {
            throw this._abandon(channel, new HandshakeError(`handshake failed: ${outcome.error.message}`));
        }
        const parsed = initializeResultSchema.safeParse(outcome.value);
        if (!parsed.success) {
            throw this._abandon(channel, new HandshakeError(`invalid initialize result: ${describeIssues(parsed.error)}`));
        }
        const server = parsed.data;
        if (!SUPPORTED_PROTOCOL_VERSIONS.includes(server.protocolVersion)) {
            throw this._abandon(channel, new HandshakeError(`unsupported protocol version: ${server.protocolVersion}`));
        }
        try {
            await channel.notify(Method.INITIALIZED);
        } catch (err) {
            throw this._abandon(channel, new HandshakeError(toError(err)));
        }
        if (lifecycle.aborted || channel.closed) {
            throw this._abandon(channel, new ConnectionLostError('connection closed during handshake'));
        }

        this._server = server;
        this._backoff.reset();
        this._setState('ready');
        this.log.info(`connected to ${server.serverInfo.name} ${server.serverInfo.version} (protocol ${server.protocolVersion})`);
        this._startHeartbeat(channel);
        this.dispatchEvent(new ConnectedEvent(server));
        return server;
    }

    private _abandon(channel: Channel, err: Error): Error {
        if (this._channel === channel) this._channel = undefined;
        channel.close(err);
        return err;
    }

    private async _onRequest(req: JSONRPCRequest, signal: AbortSignal): Promise<unknown> {
        if (req.method === Method.PING) return {};
        const handler = this._handlers.get(req.method);
        if (!handler) throw new MethodNotFoundError(req.method);
        return handler(req.params ?? {}, signal);
    }

    private _onClosed(channel: Channel, reason: Error): void {
        if (this._channel !== channel) return;
        this._channel = undefined;
        // a loss during connect is reported by the attempt itself
        if (!this.ready) return;
        this.log.warn(`connection lost: ${reason.message}`);
        this.dispatchEvent(new SessionErrorEvent(reason));
        this._reconnect(reason).catch((err: unknown) => this.log.error('reconnect loop failed:', err));
    }

    private async _reconnect(reason: Error): Promise<void> {
        const factory = this._factory;
        const lifecycle = this._lifecycle.signal;
        const { maxTries } = this._backoff.options;
        let last = reason;

        while (factory && !lifecycle.aborted && !this._backoff.exhausted) {
            this._setState('reconnecting');
            const attempt = this._backoff.markFailure();
            const delay = this._backoff.nextDelay();
            this.log.info(`reconnect attempt ${attempt}/${maxTries} in ${Math.round(delay)}ms`);
            this.dispatchEvent(new ReconnectingEvent(attempt, delay));
            if (!(await sleepUnlessAborted(delay, lifecycle))) return;
            try {
                await this._attempt(factory, lifecycle);
                return;
            } catch (err) {
                if (lifecycle.aborted) return;
                last = toError(err);
                this.log.warn(`reconnect attempt ${attempt} failed: ${last.message}`);
                this.dispatchEvent(new SessionErrorEvent(last));
            }
        }
        if (lifecycle.aborted) return;

        const error = new ConnectionLostError(`gave up after ${this._backoff.failures} reconnect attempt(s): ${last.message}`);
        this._lifecycle.abort();
        this._setState('disconnected');
        this.log.error(error.message);
        this.dispatchEvent(new DisconnectedEvent(error, false));
    }

    private _startHeartbeat(channel: Channel): void {
        if (this.options.heartbeatInterval <= 0) return;
        const stop = new AbortController();
        channel.done.then(
            () => stop.abort(),
            () => stop.abort(),
        );
        this._heartbeat(channel, stop.signal).catch((err: unknown) => this.log.error('heartbeat failed:', err));
    }

    /**
     * Ping every interval. A pong missing after half the grace window marks
     * the session degraded; missing after the whole window closes the
     * connection, which starts reconnection.
     */
    private async _heartbeat(channel: Channel, signal: AbortSignal): Promise<void> {
        const { heartbeatInterval, heartbeatGrace } = this.options;
        while (await sleepUnlessAborted(heartbeatInterval, signal)) {
            const late = setTimeout(() => {
                if (this._channel === channel && this._state === 'ready') {
                    this.log.warn(`ping unanswered after ${Math.round(heartbeatGrace / 2)}ms`);
                    this._setState('degraded');
                }
            }, heartbeatGrace / 2);
            const outcome = await channel.call(Method.PING, undefined, { timeout: heartbeatGrace, signal });
            clearTimeout(late);

            switch (outcome.kind) {
                case 'result':
                case 'error': // any reply proves the peer is alive
                    if (this._channel === channel && this._state === 'degraded') {
                        this._setState('ready');
                    }
                    break;
                case 'timeout':
                    channel.close(new ConnectionLostError(`heartbeat: no pong within ${heartbeatGrace}ms`));
                    return;
                default:
                    return;
            }
        }
    }
}
