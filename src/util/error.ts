/**
 * ErrorEx is the base of every error this package throws. It behaves like a
 * native Error, keeps a proper prototype chain for instanceof checks, and
 * serializes with JSON.stringify.
 *
 * Usage:
 *   class ExampleError extends ErrorEx {}
 *   throw new ExampleError('bad things');
 *   throw new ExampleError(err); // wraps another error, keeps its stack
 */
export class ErrorEx extends Error {
    constructor(
        err: unknown, // catch "e" is unknown
        public readonly errno?: number,
        public readonly code?: string,
    ) {
        super(messageOf(err));

        if (err instanceof Error) {
            if (err.stack) this.stack = err.stack;
            this.cause = err;
        }
        // restore prototype chain
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON(): Record<string, unknown> {
        return { name: this.name, message: this.message, errno: this.errno, code: this.code };
    }

    /**
     * Custom inspect for Node.js console logging: shows just the message.
     */
    [Symbol.for('nodejs.util.inspect.custom')](): string {
        return `[${this.name}] ${this.message}`;
    }
}

function messageOf(err: unknown): string {
    if (typeof err === 'string') return err;
    if (err instanceof Error) return err.message;
    if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return 'Unknown error';
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new ErrorEx(err);
}
