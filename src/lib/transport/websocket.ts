import WebSocket, { type ClientOptions, WebSocketServer } from 'ws';
import { AsyncQueue } from '../../util/queue';
import { createLogger } from '../../util/logger';
import { TransportClosedError, TransportError } from '../protocol/errors';
import { BaseTransport } from './base';
import type { Listener, Transport } from './types';

/**
 * Full-duplex carrier: one WebSocket message per frame.
 */
export class WebSocketTransport extends BaseTransport {
    constructor(private readonly _socket: WebSocket) {
        super('ws');
        _socket.on('message', (data) => this.push(rawToString(data)));
        _socket.once('close', (code, reason) =>
            this.fail(new TransportClosedError(`socket closed (${code}${reason.length ? `: ${reason.toString()}` : ''})`)),
        );
        _socket.on('error', (err) => this.fail(new TransportError(err)));
    }

    static connect(url: string | URL, options?: ClientOptions): Promise<WebSocketTransport> {
        return new Promise((resolve, reject) => {
            const socket = new WebSocket(url, options);
            const onError = (err: Error) => reject(new TransportError(err));
            socket.once('error', onError);
            socket.once('open', () => {
                socket.off('error', onError);
                resolve(new WebSocketTransport(socket));
            });
        });
    }

    protected _write(frame: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this._socket.readyState !== WebSocket.OPEN) {
                reject(new TransportClosedError('socket not open'));
                return;
            }
            this._socket.send(frame, (err) => (err ? reject(new TransportError(err)) : resolve()));
        });
    }

    protected async _close(): Promise<void> {
        if (this._socket.readyState === WebSocket.OPEN || this._socket.readyState === WebSocket.CONNECTING) {
            this._socket.close(1000);
        }
    }
}

export interface WebSocketListenerOptions {
    port?: number;
    host?: string;
    path?: string;
}

/**
 * Accepts WebSocket peers; every connection becomes a WebSocketTransport.
 */
export class WebSocketListener implements Listener {
    readonly kind = 'ws';
    private readonly _log = createLogger('mcp:listener:ws');
    private readonly _accepted = new AsyncQueue<Transport>();

    private constructor(private readonly _server: WebSocketServer) {
        _server.on('connection', (socket, req) => {
            this._log.info(`accepted peer ${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? ''}`);
            const transport = new WebSocketTransport(socket);
            if (!this._accepted.push(transport)) {
                socket.close(1001);
            }
        });
        _server.on('error', (err) => {
            this._log.error('ws server error:', err.message);
            this._accepted.fail(new TransportError(err));
        });
    }

    static listen({ port = 0, host, path }: WebSocketListenerOptions = {}): Promise<WebSocketListener> {
        return new Promise((resolve, reject) => {
            const server = new WebSocketServer({ port, host, path });
            server.once('error', (err) => reject(new TransportError(err)));
            server.once('listening', () => resolve(new WebSocketListener(server)));
        });
    }

    get port(): number {
        const address = this._server.address();
        return typeof address === 'string' ? 0 : address.port;
    }

    acceptPeer(): Promise<Transport> {
        return this._accepted.shift();
    }

    close(): Promise<void> {
        this._accepted.fail(new TransportClosedError('listener closed'));
        for (const client of this._server.clients) {
            client.terminate();
        }
        return new Promise((resolve, reject) => {
            this._server.close((err) => (err ? reject(new TransportError(err)) : resolve()));
        });
    }
}

function rawToString(data: WebSocket.RawData): string {
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    return Buffer.from(data).toString('utf8');
}
