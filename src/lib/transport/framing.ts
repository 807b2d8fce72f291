/**
 * Newline-delimited framing for byte streams.
 * Empty lines are skipped and a trailing `\r` is dropped.
 */
export class LineSplitter {
    private _buffer = '';
    private _decoder = new TextDecoder();

    push(chunk: Uint8Array | string): string[] {
        this._buffer += typeof chunk === 'string' ? chunk : this._decoder.decode(chunk, { stream: true });
        const lines = this._buffer.split('\n');
        this._buffer = lines.pop() ?? '';
        return lines.map(trimCr).filter((line) => line.length > 0);
    }

    /** Whatever is left once the stream ended */
    flush(): string[] {
        const rest = trimCr(this._buffer + this._decoder.decode());
        this._buffer = '';
        return rest.trim().length > 0 ? [rest] : [];
    }
}

function trimCr(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}
