import { AsyncQueue } from '../../util/queue';
import { TransportClosedError } from '../protocol/errors';
import { BaseTransport } from './base';
import type { Listener, Transport } from './types';

/**
 * In-process carrier. Frames written on one end are received on the other.
 */
export class MemoryTransport extends BaseTransport {
    private _peer?: MemoryTransport;

    constructor() {
        super('memory');
    }

    /** Simulate an abrupt carrier loss on both ends */
    drop(reason = 'connection reset'): void {
        const peer = this._peer;
        this.fail(new TransportClosedError(reason));
        peer?.fail(new TransportClosedError(reason));
    }

    protected async _write(frame: string): Promise<void> {
        const peer = this._peer;
        if (!peer || peer.closed) {
            throw new TransportClosedError('peer closed');
        }
        peer.push(frame);
    }

    protected async _close(): Promise<void> {
        this._peer?.fail(new TransportClosedError('peer closed'));
    }

    static pair(): [MemoryTransport, MemoryTransport] {
        const a = new MemoryTransport();
        const b = new MemoryTransport();
        a._peer = b;
        b._peer = a;
        return [a, b];
    }
}

export function createMemoryPair(): [MemoryTransport, MemoryTransport] {
    return MemoryTransport.pair();
}

/**
 * In-process listener: `connect()` returns the client end and queues the
 * server end for `acceptPeer()`.
 */
export class MemoryListener implements Listener {
    readonly kind = 'memory';
    private _accepted = new AsyncQueue<Transport>();

    connect(): MemoryTransport {
        if (this._accepted.failed) {
            throw new TransportClosedError('listener closed');
        }
        const [client, server] = MemoryTransport.pair();
        this._accepted.push(server);
        return client;
    }

    acceptPeer(): Promise<Transport> {
        return this._accepted.shift();
    }

    async close(): Promise<void> {
        this._accepted.fail(new TransportClosedError('listener closed'));
    }
}
