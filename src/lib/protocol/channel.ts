/**
 * Channel: one live connection over a Transport, shared by both ends.
 *
 * Owns the receive loop, the outbound id space and the Request Correlator.
 * Replies go to the correlator; requests and notifications go to the
 * handlers. Incoming requests run concurrently, off the receive loop.
 */

import { createLogger, type Logger } from '../../util/logger';
import { toError } from '../../util/error';
import type { Transport } from '../transport/types';
import { type BatchMember, decode, encode, isBatch } from './codec';
import { type Outcome, Correlator, unwrap } from './correlator';
import { ConnectionLostError, DecodeError, ProtocolViolationError, toErrorObject } from './errors';
import {
    cancelledParamsSchema,
    type Envelope,
    isNotification,
    isRequest,
    type JSONRPCErrorResponse,
    type JSONRPCNotification,
    type JSONRPCRequest,
    JSONRPC_VERSION,
    Method,
    type Params,
    type Reply,
    type RequestId,
} from './types';

export interface ChannelHandlers {
    /**
     * Handle a peer request. The returned value becomes the result, a thrown
     * error becomes an ErrorResponse. `signal` aborts when the peer cancels.
     */
    request(req: JSONRPCRequest, signal: AbortSignal): Promise<unknown>;
    notification(msg: JSONRPCNotification): void;
    /** A frame that failed to decode; it has already been answered */
    invalid?(err: DecodeError): void;
    /** Called once when the channel is torn down */
    closed?(reason: Error): void;
}

export interface RequestOptions {
    /** milliseconds; falls back to the channel default, 0 disables */
    timeout?: number;
    signal?: AbortSignal;
}

export interface ChannelOptions {
    requestTimeout?: number;
    log?: Logger;
}

export type BatchItem =
    | { method: string; params?: Params; notification?: false }
    | { method: string; params?: Params; notification: true };

export class Channel {
    readonly log: Logger;
    private readonly _correlator: Correlator;
    private readonly _inflight = new Map<RequestId, AbortController>();
    private readonly _requestTimeout: number;
    private _nextId = 1;
    private _closeReason?: Error;
    private readonly _done: Promise<Error>;
    private _finish: (reason: Error) => void = () => {};

    constructor(
        readonly transport: Transport,
        private readonly _handlers: ChannelHandlers,
        { requestTimeout = 30000, log = createLogger('mcp:channel') }: ChannelOptions = {},
    ) {
        this.log = log;
        this._requestTimeout = requestTimeout;
        this._correlator = new Correlator(log);
        this._done = new Promise((resolve) => {
            this._finish = resolve;
        });
    }

    get closed(): boolean {
        return this._closeReason !== undefined;
    }

    get pending(): number {
        return this._correlator.size;
    }

    /** Resolves with the teardown reason once the channel is closed */
    get done(): Promise<Error> {
        return this._done;
    }

    /** Start the receive loop */
    start(): this {
        this._receiveLoop().catch((err: unknown) => this.close(toError(err)));
        return this;
    }

    /**
     * Send a request and wait for its outcome. Never rejects.
     */
    call(method: string, params?: Params, opts: RequestOptions = {}): Promise<Outcome> {
        const id = this._nextId++;
        const outcome = this._register(id, method, opts);
        // already cancelled: settled locally, the peer never sees it
        if (!opts.signal?.aborted) {
            this._send(request(id, method, params));
        }
        return outcome;
    }

    /** Send a request; resolves with the result, rejects with the outcome's error */
    async request(method: string, params?: Params, opts?: RequestOptions): Promise<unknown> {
        return unwrap(await this.call(method, params, opts));
    }

    notify(method: string, params?: Params): Promise<void> {
        const msg: JSONRPCNotification = params ? { jsonrpc: JSONRPC_VERSION, method, params } : { jsonrpc: JSONRPC_VERSION, method };
        return this.transport.send(encode(msg));
    }

    /**
     * Send several messages as one batch frame. Resolves with one outcome per
     * request item, in item order (notifications are skipped). With an
     * already-aborted signal only the notifications are sent.
     */
    batch(items: readonly BatchItem[], opts: RequestOptions = {}): Promise<Outcome[]> {
        const aborted = opts.signal?.aborted === true;
        const envelopes: Envelope[] = [];
        const outcomes: Promise<Outcome>[] = [];
        for (const item of items) {
            if (item.notification) {
                envelopes.push(item.params ? { jsonrpc: JSONRPC_VERSION, method: item.method, params: item.params } : { jsonrpc: JSONRPC_VERSION, method: item.method });
            } else {
                const id = this._nextId++;
                outcomes.push(this._register(id, item.method, opts));
                if (!aborted) envelopes.push(request(id, item.method, item.params));
            }
        }
        if (envelopes.length) {
            this._sendFrame(encode(envelopes));
        }
        return Promise.all(outcomes);
    }

    /**
     * Tear down: every pending waiter settles with `connection-lost`, the
     * transport is closed and in-flight handlers are aborted. Idempotent.
     */
    close(reason: Error = new ConnectionLostError('Connection closed')): void {
        if (this._closeReason) return;
        this._closeReason = reason;
        this._correlator.failAll(reason.message);
        for (const controller of this._inflight.values()) {
            controller.abort(reason);
        }
        this._inflight.clear();
        this.transport.close().catch((err: unknown) => this.log.debug('transport close:', err));
        this._handlers.closed?.(reason);
        this._finish(reason);
    }

    private _register(id: RequestId, method: string, { timeout = this._requestTimeout, signal }: RequestOptions) {
        return this._correlator.register(id, {
            method,
            timeout,
            signal,
            onAbandon: (abandoned, outcome) => {
                if (this.closed) return;
                this.notify(Method.CANCELLED, { requestId: abandoned, reason: outcome.error.message }).catch((err: unknown) =>
                    this.log.debug(`could not send cancellation for ${String(abandoned)}:`, err),
                );
            },
        });
    }

    private _send(msg: Envelope): void {
        this._sendFrame(encode(msg));
    }

    // a failed write is fatal for the connection
    private _sendFrame(frame: string): void {
        if (this.closed) {
            this.log.debug('not sending on a closed channel');
            return;
        }
        this.transport.send(frame).catch((err: unknown) => {
            this.log.warn('send failed:', err);
            this.close(toError(err));
        });
    }

    private async _receiveLoop(): Promise<void> {
        while (!this.closed) {
            let frame: string;
            try {
                frame = await this.transport.receive();
            } catch (err) {
                this.close(toError(err));
                return;
            }
            this._onFrame(frame);
        }
    }

    private _onFrame(frame: string): void {
        const [decoded, err] = decode(frame);
        if (err) {
            this.log.warn(`undecodable frame (${err.message})`);
            this._handlers.invalid?.(err);
            this._send(errorReply(err.id, err));
            return;
        }

        if (!isBatch(decoded)) {
            this._onEnvelope(decoded).then(
                (reply) => {
                    if (reply) this._send(reply);
                },
                (e: unknown) => this.log.error('dispatch failed:', e),
            );
            return;
        }

        this._onBatch(decoded).catch((e: unknown) => this.log.error('batch dispatch failed:', e));
    }

    private async _onBatch(members: BatchMember[]): Promise<void> {
        const replies: Reply[] = [];
        await Promise.all(
            members.map(async (member) => {
                const reply = member instanceof DecodeError ? errorReply(member.id, member) : await this._onEnvelope(member);
                if (reply) replies.push(reply);
            }),
        );
        if (replies.length && !this.closed) {
            this._sendFrame(encode(replies));
        }
    }

    /** Route one envelope; resolves with the reply to send back, if any */
    private async _onEnvelope(msg: Envelope): Promise<Reply | undefined> {
        if (isRequest(msg)) {
            return this._onRequest(msg);
        }
        if (isNotification(msg)) {
            this._onNotification(msg);
            return undefined;
        }
        // responses are never answered
        this._correlator.resolve(msg);
        return undefined;
    }

    private async _onRequest(req: JSONRPCRequest): Promise<Reply | undefined> {
        if (this._inflight.has(req.id)) {
            return errorReply(req.id, new ProtocolViolationError(`duplicate request id: ${String(req.id)}`));
        }
        const controller = new AbortController();
        this._inflight.set(req.id, controller);
        try {
            const result = await this._handlers.request(req, controller.signal);
            if (controller.signal.aborted) return undefined;
            return { jsonrpc: JSONRPC_VERSION, id: req.id, result: result ?? {} };
        } catch (err) {
            // a cancelled request gets no reply
            if (controller.signal.aborted) return undefined;
            return errorReply(req.id, err);
        } finally {
            if (this._inflight.get(req.id) === controller) this._inflight.delete(req.id);
        }
    }

    private _onNotification(msg: JSONRPCNotification): void {
        if (msg.method === Method.CANCELLED) {
            const parsed = cancelledParamsSchema.safeParse(msg.params);
            if (!parsed.success) {
                this.log.warn('ignoring malformed cancellation');
                return;
            }
            const controller = this._inflight.get(parsed.data.requestId);
            if (controller) {
                this.log.debug(`peer cancelled request ${String(parsed.data.requestId)}`);
                controller.abort(parsed.data.reason ?? 'Request cancelled');
            }
            return;
        }
        try {
            this._handlers.notification(msg);
        } catch (err) {
            this.log.warn(`notification ${msg.method} failed:`, err);
        }
    }
}

function request(id: RequestId, method: string, params?: Params): JSONRPCRequest {
    return params ? { jsonrpc: JSONRPC_VERSION, id, method, params } : { jsonrpc: JSONRPC_VERSION, id, method };
}

function errorReply(id: RequestId | null, err: unknown): JSONRPCErrorResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error: toErrorObject(err) };
}
