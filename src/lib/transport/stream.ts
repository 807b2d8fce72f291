import { type ChildProcess, type SpawnOptions, spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { TransportClosedError, TransportError } from '../protocol/errors';
import { BaseTransport } from './base';
import { LineSplitter } from './framing';

export interface StreamTransportOptions {
    kind?: string;
    /** end the output stream and destroy the input on close */
    ownsStreams?: boolean;
}

/**
 * Newline-delimited frames over a readable/writable pair (pipes, sockets, stdio).
 */
export class StreamTransport extends BaseTransport {
    private readonly _splitter = new LineSplitter();
    private readonly _ownsStreams: boolean;

    constructor(
        private readonly _input: Readable,
        private readonly _output: Writable,
        { kind = 'stream', ownsStreams = true }: StreamTransportOptions = {},
    ) {
        super(kind);
        this._ownsStreams = ownsStreams;
        _input.on('data', this._onData);
        _input.once('end', this._onEnd);
        _input.once('error', this._onError);
        _output.once('error', this._onError);
    }

    private _onData = (chunk: Buffer | string) => {
        for (const line of this._splitter.push(chunk)) {
            this.push(line);
        }
    };

    private _onEnd = () => {
        for (const line of this._splitter.flush()) {
            this.push(line);
        }
        this.fail(new TransportClosedError('end of stream'));
    };

    private _onError = (err: Error) => this.fail(new TransportError(err));

    protected _write(frame: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this._output.write(`${frame}\n`, (err) => (err ? reject(new TransportError(err)) : resolve()));
        });
    }

    protected async _close(): Promise<void> {
        this._input.off('data', this._onData);
        this._input.off('end', this._onEnd);
        if (this._ownsStreams) {
            this._input.destroy();
            if (!this._output.writableEnded && !this._output.destroyed) {
                await new Promise<void>((resolve) => this._output.end(() => resolve()));
            }
        } else {
            this._input.pause();
        }
    }
}

/** Frames on this process's stdin/stdout. Logging must go to stderr */
export function stdioTransport(): StreamTransport {
    return new StreamTransport(process.stdin, process.stdout, { kind: 'stdio', ownsStreams: false });
}

/**
 * Spawns a server process and talks to it over its stdio.
 * Closing the transport terminates the child.
 */
export class ProcessTransport extends StreamTransport {
    private constructor(readonly child: ChildProcess & { stdin: Writable; stdout: Readable }) {
        super(child.stdout, child.stdin, { kind: 'process' });
        child.once('exit', (code, signal) =>
            this.fail(new TransportClosedError(`process exited (${signal ?? `code ${code ?? 0}`})`)),
        );
    }

    static spawn(command: string, args: string[] = [], options: SpawnOptions = {}): Promise<ProcessTransport> {
        return new Promise((resolve, reject) => {
            const child = spawn(command, args, { ...options, stdio: ['pipe', 'pipe', 'inherit'] });
            const { stdin, stdout } = child;
            if (!stdin || !stdout) {
                child.kill();
                reject(new TransportError(`failed to open stdio of ${command}`));
                return;
            }
            child.once('error', (err) => reject(new TransportError(err)));
            child.once('spawn', () => resolve(new ProcessTransport(Object.assign(child, { stdin, stdout }))));
        });
    }

    protected async _close(): Promise<void> {
        await super._close();
        if (this.child.exitCode === null && this.child.signalCode === null) {
            this.child.kill();
        }
    }
}
