import { AsyncQueue } from '../../util/queue';
import { createLogger, type Logger } from '../../util/logger';
import { TransportClosedError, TransportError } from '../protocol/errors';
import type { Transport } from './types';

/**
 * Common plumbing for carriers: an inbound frame queue and a single write
 * chain. Subclasses implement `_write` and `_close`, and feed the queue with
 * `push` / `fail` from their carrier callbacks.
 */
export abstract class BaseTransport implements Transport {
    protected readonly log: Logger;
    private _inbound = new AsyncQueue<string>();
    private _writes: Promise<void> = Promise.resolve();
    private _closed = false;

    constructor(readonly kind: string) {
        this.log = createLogger(`mcp:transport:${kind}`);
    }

    get closed(): boolean {
        return this._closed;
    }

    send(frame: string): Promise<void> {
        if (this._closed) {
            return Promise.reject(new TransportClosedError());
        }
        const write = this._writes.then(() => {
            if (this._closed) throw new TransportClosedError();
            return this._write(frame);
        });
        // the chain only orders writes; each caller sees its own failure
        this._writes = write.then(
            () => undefined,
            () => undefined,
        );
        return write;
    }

    receive(): Promise<string> {
        return this._inbound.shift();
    }

    async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        this._inbound.fail(new TransportClosedError());
        await this._close();
    }

    /** Deliver an inbound frame */
    protected push(frame: string): void {
        if (!this._inbound.push(frame)) {
            this.log.debug('dropping frame received after close');
        }
    }

    /** The carrier went away. Buffered frames are still delivered first */
    protected fail(err: unknown): void {
        if (this._closed) return;
        this._closed = true;
        this._inbound.fail(err instanceof TransportError ? err : new TransportError(err));
        this._close().catch((closeErr: unknown) => this.log.debug('close after failure:', closeErr));
    }

    protected abstract _write(frame: string): Promise<void>;
    protected abstract _close(): Promise<void>;
}
