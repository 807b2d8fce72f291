/**
 * Client session configuration and lifecycle events.
 */

import type { BackoffOptions } from '../../util/backoff';
import { Env } from '../../util/env';
import type { ClientCapabilities, Implementation, InitializeResult, JSONRPCNotification, Params } from '../protocol/types';
import { LATEST_PROTOCOL_VERSION } from '../protocol/types';

export type SessionState = 'disconnected' | 'connecting' | 'handshaking' | 'ready' | 'degraded' | 'reconnecting';

/** Answers a server-initiated request; the returned value becomes the result */
export type RequestHandler = (params: Params, signal: AbortSignal) => Promise<unknown>;

/**
 * Session configuration.
 *
 * Environment variables:
 * MCP_REQUEST_TIMEOUT: default request timeout in ms, 0 = none. Default: 30000.
 * MCP_HANDSHAKE_TIMEOUT: initialize timeout in ms. Default: 10000.
 * MCP_HEARTBEAT_INTERVAL: ms between pings, 0 = no heartbeat. Default: 30000.
 * MCP_HEARTBEAT_GRACE: ms a ping may stay unanswered before the connection counts as lost. Default: 5000.
 * MCP_RECONNECT_TRIES: reconnect attempts after a loss, 0 = never. Default: 5.
 * MCP_RECONNECT_DELAY: delay before the first attempt in ms. Default: 1000.
 * MCP_RECONNECT_MAX_DELAY: cap for a single delay in ms. Default: 30000.
 */
export class SessionOptions {
    readonly clientInfo: Implementation = { name: Env.appName, version: Env.appVersion };
    readonly capabilities: ClientCapabilities = {};
    readonly protocolVersion: string = LATEST_PROTOCOL_VERSION;
    readonly requestTimeout: number = Env.get('MCP_REQUEST_TIMEOUT', 30000, 0);
    readonly handshakeTimeout: number = Env.get('MCP_HANDSHAKE_TIMEOUT', 10000, 1);
    readonly heartbeatInterval: number = Env.get('MCP_HEARTBEAT_INTERVAL', 30000, 0);
    readonly heartbeatGrace: number = Env.get('MCP_HEARTBEAT_GRACE', 5000, 1);
    readonly backoff: Readonly<Partial<BackoffOptions>> = {
        maxTries: Env.get('MCP_RECONNECT_TRIES', 5, 0),
        baseDelay: Env.get('MCP_RECONNECT_DELAY', 1000, 0),
        maxDelay: Env.get('MCP_RECONNECT_MAX_DELAY', 30000, 0),
    };

    constructor(opts?: Readonly<Partial<SessionOptions>>) {
        if (opts) {
            Object.assign(this, opts);
        }
    }
}

export function loadSessionConfig(overrides?: Readonly<Partial<SessionOptions>>): SessionOptions {
    return new SessionOptions(overrides);
}

export class StateEvent extends Event {
    constructor(
        readonly state: SessionState,
        readonly previous: SessionState,
    ) {
        super('state');
    }
}

export class ConnectedEvent extends Event {
    constructor(readonly server: InitializeResult) {
        super('connected');
    }
}

export class ReconnectingEvent extends Event {
    constructor(
        readonly attempt: number,
        readonly delay: number,
    ) {
        super('reconnecting');
    }
}

/** The session reached `disconnected`; `manual` is false when it gave up reconnecting */
export class DisconnectedEvent extends Event {
    constructor(
        readonly reason: Error,
        readonly manual: boolean,
    ) {
        super('disconnected');
    }
}

export class NotificationEvent extends Event {
    constructor(readonly message: JSONRPCNotification) {
        super('notification');
    }
}

export class SessionErrorEvent extends Event {
    constructor(readonly error: Error) {
        super('error');
    }
}
