/**
 * Request correlator: matches outstanding request identifiers to waiters.
 *
 * Every registered waiter settles exactly once, with whichever of these fires
 * first: the matching reply (`resolve`), its deadline, its abort signal, or
 * `failAll` on connection teardown. Later attempts are no-ops.
 */

import { createLogger, type Logger } from '../../util/logger';
import { ConnectionLostError, McpError, RequestCancelledError, RequestTimeoutError, ResponseError } from './errors';
import type { Reply, RequestId } from './types';

export type Outcome<T = unknown> =
    | { kind: 'result'; value: T }
    | { kind: 'error'; error: ResponseError }
    | { kind: 'timeout'; error: RequestTimeoutError }
    | { kind: 'cancelled'; error: RequestCancelledError }
    | { kind: 'connection-lost'; error: ConnectionLostError };

export type FailedOutcome = Exclude<Outcome, { kind: 'result' }>;

export interface WaiterOptions {
    /** method name, for diagnostics */
    method?: string;
    /** milliseconds; 0 disables the deadline */
    timeout?: number;
    /** aborting settles the waiter with a `cancelled` outcome */
    signal?: AbortSignal;
    /** called when the deadline or the signal settled the waiter locally */
    onAbandon?: (id: RequestId, outcome: FailedOutcome) => void;
}

interface Pending {
    method: string;
    settle: (outcome: Outcome) => void;
    timer?: NodeJS.Timeout;
    detach?: () => void;
}

export class DuplicateRequestIdError extends McpError {
    constructor(id: RequestId) {
        super(`request id already outstanding: ${String(id)}`, undefined, 'EDUPLICATE');
    }
}

/** Unwrap an outcome: the value, or throw the outcome's error */
export function unwrap<T>(outcome: Outcome<T>): T {
    if (outcome.kind === 'result') return outcome.value;
    throw outcome.error;
}

export class Correlator {
    private _pending = new Map<RequestId, Pending>();
    private _closed?: ConnectionLostError;

    constructor(private _log: Logger = createLogger('mcp:correlator')) {}

    get size(): number {
        return this._pending.size;
    }

    get closed(): boolean {
        return this._closed !== undefined;
    }

    has(id: RequestId): boolean {
        return this._pending.has(id);
    }

    /**
     * Register a waiter for `id`. Must be called before the request is handed
     * to the transport so an immediate reply cannot be missed.
     */
    register(id: RequestId, opts: WaiterOptions = {}): Promise<Outcome> {
        if (this._pending.has(id)) {
            throw new DuplicateRequestIdError(id);
        }
        const method = opts.method ?? 'request';

        if (this._closed) {
            return Promise.resolve({ kind: 'connection-lost', error: this._closed });
        }
        if (opts.signal?.aborted) {
            return Promise.resolve({ kind: 'cancelled', error: new RequestCancelledError(reasonOf(opts.signal)) });
        }

        return new Promise<Outcome>((settle) => {
            const entry: Pending = { method, settle };

            const abandon = (outcome: FailedOutcome) => {
                if (this._take(id) !== entry) return;
                entry.settle(outcome);
                opts.onAbandon?.(id, outcome);
            };

            if (opts.timeout && opts.timeout > 0) {
                const timeout = opts.timeout;
                entry.timer = setTimeout(() => {
                    this._log.debug(`request ${String(id)} (${method}) timed out after ${timeout}ms`);
                    abandon({ kind: 'timeout', error: new RequestTimeoutError(method, timeout) });
                }, timeout);
            }

            const signal = opts.signal;
            if (signal) {
                const onAbort = () =>
                    abandon({ kind: 'cancelled', error: new RequestCancelledError(reasonOf(signal)) });
                signal.addEventListener('abort', onAbort, { once: true });
                entry.detach = () => signal.removeEventListener('abort', onAbort);
            }

            this._pending.set(id, entry);
        });
    }

    /**
     * Deliver a reply. Returns false (and logs) when no waiter matches.
     */
    resolve(reply: Reply): boolean {
        if (reply.id === null) {
            this._log.warn('dropping error reply without id:', reply.error.message);
            return false;
        }
        const entry = this._take(reply.id);
        if (!entry) {
            this._log.warn(`dropping reply for unknown request id ${String(reply.id)}`);
            return false;
        }
        entry.settle('error' in reply ? { kind: 'error', error: ResponseError.from(reply.error) } : { kind: 'result', value: reply.result });
        return true;
    }

    /**
     * Settle every pending waiter with `connection-lost`. Waiters registered
     * afterwards settle the same way at once.
     */
    failAll(reason = 'Connection lost'): number {
        if (this._closed) return 0;
        this._closed = new ConnectionLostError(reason);
        const entries = Array.from(this._pending.keys());
        for (const id of entries) {
            this._take(id)?.settle({ kind: 'connection-lost', error: this._closed });
        }
        if (entries.length) {
            this._log.info(`failed ${entries.length} pending request(s): ${reason}`);
        }
        return entries.length;
    }

    private _take(id: RequestId): Pending | undefined {
        const entry = this._pending.get(id);
        if (!entry) return undefined;
        this._pending.delete(id);
        if (entry.timer) clearTimeout(entry.timer);
        entry.detach?.();
        return entry;
    }
}

function reasonOf(signal: AbortSignal): string {
    const { reason } = signal;
    if (typeof reason === 'string') return reason;
    if (reason instanceof Error && reason.name !== 'AbortError') return reason.message;
    return 'Request cancelled';
}
