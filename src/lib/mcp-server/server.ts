/**
 * MCPServer: owns a capability registry and the live connections serving it.
 */

import { createLogger, type Logger } from '../../util/logger';
import { toError } from '../../util/error';
import { TransportError } from '../protocol/errors';
import { type LoggingLevel, Method } from '../protocol/types';
import type { Listener, Transport } from '../transport/types';
import { ServerConnection, type ServerContext } from './connection';
import { CapabilityRegistry, type Namespace, type RegistryChange, RegistryChangeEvent } from './registry';
import { ServerOptions } from './types';

const LIST_CHANGED: Record<Namespace, string> = {
    tools: Method.TOOLS_LIST_CHANGED,
    resources: Method.RESOURCES_LIST_CHANGED,
    resourceTemplates: Method.RESOURCES_LIST_CHANGED,
    prompts: Method.PROMPTS_LIST_CHANGED,
};

export class MCPServer implements ServerContext {
    readonly registry = new CapabilityRegistry();
    readonly options: ServerOptions;
    readonly log: Logger;
    private readonly _connections = new Set<ServerConnection>();
    private readonly _listeners = new Set<Listener>();
    private _closed = false;

    constructor(opts?: Readonly<Partial<ServerOptions>>, log: Logger = createLogger('mcp:server')) {
        this.options = new ServerOptions(opts);
        this.log = log;
        this.registry.addEventListener('change', (e) => {
            if (e instanceof RegistryChangeEvent) this._onRegistryChange(e.change);
        });
    }

    get connections(): ServerConnection[] {
        return Array.from(this._connections);
    }

    /** Serve one peer over `transport`. The connection is removed once it closes */
    connect(transport: Transport): ServerConnection {
        if (this._closed) {
            throw new TransportError('server is closed');
        }
        const conn = new ServerConnection(transport, this);
        this._connections.add(conn);
        conn.done.then(
            () => this._connections.delete(conn),
            (err: unknown) => this.log.error('connection teardown failed:', err),
        );
        return conn.start();
    }

    /**
     * Accept peers until the listener closes. Resolves when the accept loop ends.
     */
    async listen(listener: Listener): Promise<void> {
        this._listeners.add(listener);
        this.log.info(`accepting ${listener.kind} peers`);
        try {
            while (!this._closed) {
                let transport: Transport;
                try {
                    transport = await listener.acceptPeer();
                } catch (err) {
                    if (!this._closed) this.log.warn(`${listener.kind} listener stopped:`, toError(err).message);
                    return;
                }
                this.connect(transport);
            }
        } finally {
            this._listeners.delete(listener);
        }
    }

    /** Send `notifications/resources/updated` to connections subscribed to `uri` */
    async notifyResourceUpdated(uri: string): Promise<void> {
        await this._broadcast(Method.RESOURCES_UPDATED, { uri }, (conn) => conn.isSubscribed(uri));
    }

    /** Send a log notification to every connection whose level admits it */
    async sendLog(level: LoggingLevel, data: unknown, logger?: string): Promise<void> {
        await Promise.all(this.connections.map((conn) => conn.sendLog(level, data, logger)));
    }

    async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;
        await Promise.all(Array.from(this._listeners, (listener) => listener.close()));
        const connections = this.connections;
        for (const conn of connections) {
            conn.close();
        }
        await Promise.all(connections.map((conn) => conn.done));
        this.log.info('server closed');
    }

    private _onRegistryChange({ namespace, name, action }: RegistryChange): void {
        this.log.debug(`${action} ${namespace}/${name}`);
        this._broadcast(LIST_CHANGED[namespace]).catch((err: unknown) => this.log.warn('list_changed broadcast failed:', err));
    }

    private async _broadcast(method: string, params?: Record<string, unknown>, filter?: (conn: ServerConnection) => boolean) {
        const targets = this.connections.filter((conn) => conn.state === 'serving' && (!filter || filter(conn)));
        const results = await Promise.allSettled(targets.map((conn) => conn.notify(method, params)));
        for (const result of results) {
            if (result.status === 'rejected') {
                this.log.debug(`${method} not delivered:`, result.reason);
            }
        }
    }
}
