/**
 * Carrier contract shared by clients and servers.
 *
 * A Transport moves opaque text frames; it never looks inside them.
 * A failed `receive()` is terminal for the instance: callers tear the
 * connection down and build a new Transport to reconnect.
 */
export interface Transport {
    /** carrier name, for logs */
    readonly kind: string;
    readonly closed: boolean;
    /** Queue one frame for writing; writes never interleave */
    send(frame: string): Promise<void>;
    /** Next inbound frame. Rejects with a TransportError once the carrier is gone */
    receive(): Promise<string>;
    close(): Promise<void>;
}

/** Server side of a carrier: hands out one Transport per accepted peer */
export interface Listener {
    readonly kind: string;
    /** Next accepted peer. Rejects with a TransportError once the listener is closed */
    acceptPeer(): Promise<Transport>;
    close(): Promise<void>;
}

/** Builds a fresh Transport for every (re)connection attempt */
export type TransportFactory = () => Promise<Transport>;
