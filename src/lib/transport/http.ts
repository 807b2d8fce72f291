/**
 * HTTP + server-sent events carrier.
 *
 * Server: a fastify app with
 *   GET  /sse                      event stream; the first event is `endpoint`
 *                                  carrying the POST url, every frame after it
 *                                  is sent as `event: message`
 *   POST /message?sessionId=<id>   one inbound frame per request, 202 Accepted
 *
 * Client: `fetch` for both directions.
 */

import { randomUUID } from 'node:crypto';
import type { ServerResponse } from 'node:http';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { Env } from '../../util/env';
import { createLogger } from '../../util/logger';
import { AsyncQueue } from '../../util/queue';
import { TransportClosedError, TransportError } from '../protocol/errors';
import { BaseTransport } from './base';
import type { Listener, Transport } from './types';

export const SSE_PATH = '/sse';
export const MESSAGE_PATH = '/message';

/** One `text/event-stream` event; each frame line gets its own `data:` line */
export function formatEvent(event: string, data: string): string {
    const lines = data.split(/\r\n|\r|\n/).map((line) => `data: ${line}\n`);
    return `event: ${event}\n${lines.join('')}\n`;
}

const messageQuerySchema = z.object({ sessionId: z.string().min(1) });

/** Server end of one SSE session */
class SseSessionTransport extends BaseTransport {
    private _keepAlive?: NodeJS.Timeout;

    constructor(
        readonly sessionId: string,
        private readonly _res: ServerResponse,
        keepAliveMs: number,
        private readonly _onClose: (sessionId: string) => void,
    ) {
        super('sse');
        _res.once('close', () => this.fail(new TransportClosedError('event stream closed by peer')));
        if (keepAliveMs > 0) {
            this._keepAlive = setInterval(() => {
                if (!_res.destroyed) _res.write(':ping\n\n');
            }, keepAliveMs);
            this._keepAlive.unref();
        }
    }

    /** Frame received through POST */
    deliver(frame: string): void {
        this.push(frame);
    }

    writeEvent(event: string, data: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this._res.destroyed) {
                reject(new TransportClosedError('event stream closed'));
                return;
            }
            this._res.write(formatEvent(event, data), (err) => (err ? reject(new TransportError(err)) : resolve()));
        });
    }

    protected _write(frame: string): Promise<void> {
        return this.writeEvent('message', frame);
    }

    protected async _close(): Promise<void> {
        clearInterval(this._keepAlive);
        this._onClose(this.sessionId);
        if (!this._res.writableEnded) this._res.end();
    }
}

export interface HttpListenerOptions {
    port?: number;
    host?: string;
    /** interval of `:ping` comments on idle streams; 0 disables */
    keepAlive?: number;
    bodyLimit?: number;
}

/**
 * Accepts one peer per `GET /sse` stream.
 */
export class HttpListener implements Listener {
    readonly kind = 'http';
    private readonly _log = createLogger('mcp:listener:http');
    private readonly _accepted = new AsyncQueue<Transport>();
    private readonly _sessions = new Map<string, SseSessionTransport>();

    private constructor(
        readonly app: FastifyInstance,
        private readonly _keepAlive: number,
    ) {
        this._routes();
    }

    static async listen({
        port = Env.get('PORT', 3000, 0, 65535),
        host = Env.get('HOST', '127.0.0.1'),
        keepAlive = 30000,
        bodyLimit = Env.get('MCP_HTTP_BODY_LIMIT', 4 * 1024 * 1024, 1024),
    }: HttpListenerOptions = {}): Promise<HttpListener> {
        const app = Fastify({ logger: false, bodyLimit });
        const listener = new HttpListener(app, keepAlive);
        await app.listen({ port, host });
        listener._log.info(`listening on ${listener.url}`);
        return listener;
    }

    get port(): number {
        const address = this.app.server.address();
        return address && typeof address === 'object' ? address.port : 0;
    }

    get url(): string {
        const address = this.app.server.address();
        if (address && typeof address === 'object') {
            const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
            return `http://${host}:${address.port}`;
        }
        return String(address);
    }

    get sessions(): number {
        return this._sessions.size;
    }

    acceptPeer(): Promise<Transport> {
        return this._accepted.shift();
    }

    async close(): Promise<void> {
        this._accepted.fail(new TransportClosedError('listener closed'));
        await Promise.all(Array.from(this._sessions.values(), (session) => session.close()));
        await this.app.close();
    }

    private _routes(): void {
        const { app } = this;

        // frames are decoded by the protocol layer, keep the raw text
        app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
            done(null, String(body));
        });

        app.get(SSE_PATH, (request, reply) => {
            if (this._accepted.failed) {
                reply.code(503).send({ error: 'listener closed' });
                return;
            }
            const sessionId = randomUUID();
            reply.hijack();
            reply.raw.writeHead(200, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                Connection: 'keep-alive',
            });

            const session = new SseSessionTransport(sessionId, reply.raw, this._keepAlive, (id) => this._sessions.delete(id));
            this._sessions.set(sessionId, session);
            this._log.info(`accepted peer ${request.ip} session ${sessionId}`);

            session.writeEvent('endpoint', `${MESSAGE_PATH}?sessionId=${sessionId}`).then(
                () => this._accepted.push(session),
                (err: unknown) => {
                    this._log.warn(`session ${sessionId} dropped before accept:`, err);
                    return session.close();
                },
            );
        });

        app.post(MESSAGE_PATH, async (request, reply) => {
            const query = messageQuerySchema.safeParse(request.query);
            if (!query.success) {
                return reply.code(400).send({ error: 'missing sessionId' });
            }
            const session = this._sessions.get(query.data.sessionId);
            if (!session) {
                return reply.code(404).send({ error: 'unknown session' });
            }
            if (typeof request.body !== 'string' || request.body.length === 0) {
                return reply.code(400).send({ error: 'expected a JSON body' });
            }
            session.deliver(request.body);
            return reply.code(202).send('Accepted');
        });
    }
}

export interface HttpClientOptions {
    headers?: Record<string, string>;
    /** milliseconds to wait for the `endpoint` event */
    timeout?: number;
}

interface SseEvent {
    event: string;
    data: string;
}

/**
 * Client end: reads the event stream, posts frames to the announced endpoint.
 */
export class HttpClientTransport extends BaseTransport {
    private constructor(
        readonly endpoint: URL,
        private readonly _abort: AbortController,
        private readonly _headers: Record<string, string>,
    ) {
        super('http');
    }

    static async connect(url: string | URL, { headers = {}, timeout = 10000 }: HttpClientOptions = {}): Promise<HttpClientTransport> {
        const base = new URL(url);
        const abort = new AbortController();
        const timer = setTimeout(() => abort.abort(new TransportError(`no endpoint event within ${timeout}ms`)), timeout);

        try {
            const res = await fetch(new URL(SSE_PATH, base), {
                headers: { ...headers, accept: 'text/event-stream' },
                signal: abort.signal,
            });
            if (!res.ok || !res.body) {
                throw new TransportError(`event stream request failed: HTTP ${res.status}`);
            }

            const events = readEvents(res.body);
            const first = await events.next();
            if (first.done || first.value.event !== 'endpoint') {
                throw new TransportError('event stream did not announce an endpoint');
            }

            const transport = new HttpClientTransport(new URL(first.value.data, base), abort, headers);
            transport._pump(events);
            return transport;
        } catch (err) {
            abort.abort();
            throw err instanceof TransportError ? err : new TransportError(err);
        } finally {
            clearTimeout(timer);
        }
    }

    private _pump(events: AsyncGenerator<SseEvent>): void {
        const run = async () => {
            for await (const { event, data } of events) {
                if (event === 'message') this.push(data);
            }
            this.fail(new TransportClosedError('event stream ended'));
        };
        run().catch((err: unknown) => this.fail(err));
    }

    protected async _write(frame: string): Promise<void> {
        let res: Response;
        try {
            res = await fetch(this.endpoint, {
                method: 'POST',
                headers: { ...this._headers, 'content-type': 'application/json' },
                body: frame,
                signal: this._abort.signal,
            });
        } catch (err) {
            throw new TransportError(err);
        }
        // drain so the connection can be reused
        await res.arrayBuffer();
        if (!res.ok) {
            const err = new TransportError(`POST ${this.endpoint.pathname} failed: HTTP ${res.status}`);
            // the session is gone on the server side, nothing more will arrive
            if (res.status === 404) this.fail(err);
            throw err;
        }
    }

    protected async _close(): Promise<void> {
        this._abort.abort();
    }
}

/**
 * Parse a `text/event-stream` body into events.
 */
export async function* readEvents(stream: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent> {
    const reader = stream.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let event = 'message';
    let data: string[] = [];

    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) break;

            buffer += decoder.decode(value, { stream: true });
            const lines = buffer.split('\n');
            buffer = lines.pop() ?? '';

            for (const raw of lines) {
                const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
                if (line.startsWith(':')) continue; // keep-alive comment
                if (line === '') {
                    if (data.length) yield { event, data: data.join('\n') };
                    event = 'message';
                    data = [];
                } else if (line.startsWith('event:')) {
                    event = line.slice(6).trim();
                } else if (line.startsWith('data:')) {
                    data.push(line.slice(5).replace(/^ /, ''));
                }
            }
        }
    } finally {
        reader.releaseLock();
    }
}
