/**
 * Error taxonomy of the protocol engine.
 *
 * Per-request errors (ProtocolError and subclasses) map onto a wire error
 * object through `toErrorObject`. Connection-scoped errors (TransportError,
 * ConnectionLostError) never travel on the wire.
 */

import { ErrorEx } from '../../util/error';
import { ErrorCode, type ErrorObject, type RequestId } from './types';

/**
 * McpError - base class for everything the protocol engine throws.
 *
 * Usage:
 *   throw new McpError('Server not found');
 *   throw new McpError(err); // wraps another error
 */
export class McpError extends ErrorEx {}

/**
 * An error with a wire code. `errno` carries the numeric code,
 * `code` the symbolic name when it is a known ErrorCode.
 */
export class ProtocolError extends McpError {
    constructor(
        message: string,
        readonly rpcCode: number,
        readonly data?: unknown,
    ) {
        super(message, rpcCode, ErrorCode[rpcCode]);
    }

    toErrorObject(): ErrorObject {
        return this.data === undefined
            ? { code: this.rpcCode, message: this.message }
            : { code: this.rpcCode, message: this.message, data: this.data };
    }
}

/** Bytes that did not decode. `id` is whatever identifier could be recovered. */
export class DecodeError extends ProtocolError {
    constructor(
        message: string,
        rpcCode: number,
        readonly id: RequestId | null = null,
        data?: unknown,
    ) {
        super(message, rpcCode, data);
    }
}

export class ParseError extends DecodeError {
    constructor(detail?: string) {
        super('Parse error', ErrorCode.PARSE_ERROR, null, detail);
    }
}

export class InvalidEnvelopeError extends DecodeError {
    constructor(message: string, id: RequestId | null = null) {
        super(message, ErrorCode.INVALID_REQUEST, id);
    }
}

export class MethodNotFoundError extends ProtocolError {
    constructor(readonly method: string) {
        super(`method not found: ${method}`, ErrorCode.METHOD_NOT_FOUND);
    }
}

export class InvalidParamsError extends ProtocolError {
    constructor(message: string, data?: unknown) {
        super(message, ErrorCode.INVALID_PARAMS, data);
    }
}

export type CapabilityKind = 'tool' | 'resource' | 'prompt';

const NOT_FOUND_CODES: Record<CapabilityKind, ErrorCode> = {
    tool: ErrorCode.TOOL_NOT_FOUND,
    resource: ErrorCode.RESOURCE_NOT_FOUND,
    prompt: ErrorCode.PROMPT_NOT_FOUND,
};

export class CapabilityNotFoundError extends ProtocolError {
    constructor(
        readonly kind: CapabilityKind,
        readonly capability: string,
    ) {
        super(`${kind} not found: ${capability}`, NOT_FOUND_CODES[kind]);
    }
}

export class NotInitializedError extends ProtocolError {
    constructor(method: string) {
        super(`server not initialized: ${method} received before initialize`, ErrorCode.NOT_INITIALIZED);
    }
}

/** A request that breaks the protocol lifecycle (e.g. a second initialize) */
export class ProtocolViolationError extends ProtocolError {
    constructor(message: string) {
        super(message, ErrorCode.INVALID_REQUEST);
    }
}

/**
 * Thrown by capability handlers to report a failure with detail.
 * Any other thrown Error is reported the same way, without detail.
 */
export class ApplicationError extends ProtocolError {
    constructor(message: string, data?: unknown, code: number = ErrorCode.APPLICATION_ERROR) {
        super(message, code, data);
    }
}

export class RequestCancelledError extends ProtocolError {
    constructor(reason = 'Request cancelled') {
        super(reason, ErrorCode.REQUEST_CANCELLED);
    }
}

/** An ErrorResponse received from the peer */
export class ResponseError extends ProtocolError {
    static from(error: ErrorObject): ResponseError {
        return new ResponseError(error.message, error.code, error.data);
    }
}

/** Local, caller-scoped: no reply arrived before the deadline */
export class RequestTimeoutError extends McpError {
    constructor(
        readonly method: string,
        readonly timeout: number,
    ) {
        super(`Request timed out after ${timeout}ms: ${method}`, undefined, 'ETIMEDOUT');
    }
}

/** Connection-scoped: the connection carrying the request went away */
export class ConnectionLostError extends McpError {
    constructor(reason = 'Connection lost') {
        super(reason, undefined, 'ECONNLOST');
    }
}

/** Carrier-level failure; terminal for the transport instance */
export class TransportError extends McpError {}

export class TransportClosedError extends TransportError {
    constructor(message = 'Transport closed') {
        super(message, undefined, 'ECLOSED');
    }
}

export class HandshakeError extends McpError {}

export class DuplicateNameError extends McpError {
    constructor(namespace: string, name: string) {
        super(`${namespace} already registered: ${name}`, undefined, 'EDUPLICATE');
    }
}

/**
 * Wire error object for anything a handler may throw.
 */
export function toErrorObject(err: unknown): ErrorObject {
    if (err instanceof ProtocolError) {
        return err.toErrorObject();
    }
    if (err instanceof Error) {
        return { code: ErrorCode.APPLICATION_ERROR, message: err.message };
    }
    return { code: ErrorCode.INTERNAL_ERROR, message: String(err) };
}
