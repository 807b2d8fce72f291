/**
 * Message codec: envelopes and batches to and from text frames. No I/O.
 *
 * Kinds are told apart by the presence of `method` and `id`:
 *   method + id  -> request
 *   method only  -> notification
 *   error        -> error response (id may be null)
 *   result + id  -> response
 * A JSON array is a batch; every member is classified on its own.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { DecodeError, InvalidEnvelopeError, InvalidParamsError, ParseError } from './errors';
import {
    type Envelope,
    errorResponseSchema,
    JSONRPC_VERSION,
    notificationSchema,
    type RequestId,
    requestSchema,
    responseSchema,
} from './types';

export type Frame = string | Uint8Array;
export type BatchMember = Envelope | DecodeError;
export type Decoded = Envelope | BatchMember[];
export type DecodeResult = [Decoded, undefined] | [undefined, DecodeError];

const decoder = new TextDecoder();

export function encode(msg: Envelope | readonly Envelope[]): string {
    return JSON.stringify(msg);
}

export function decode(frame: Frame): DecodeResult {
    const text = typeof frame === 'string' ? frame : decoder.decode(frame);

    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        return [undefined, new ParseError(err instanceof Error ? err.message : undefined)];
    }

    if (Array.isArray(value)) {
        if (value.length === 0) {
            return [undefined, new InvalidEnvelopeError('empty batch')];
        }
        return [value.map(classify), undefined];
    }

    const msg = classify(value);
    return msg instanceof DecodeError ? [undefined, msg] : [msg, undefined];
}

export function isBatch(decoded: Decoded): decoded is BatchMember[] {
    return Array.isArray(decoded);
}

/**
 * Classify one parsed JSON value as an envelope.
 */
export function classify(value: unknown): Envelope | InvalidEnvelopeError {
    if (!isObject(value)) {
        return new InvalidEnvelopeError('envelope must be an object');
    }

    const id = recoverId(value);
    if (value.jsonrpc !== JSONRPC_VERSION) {
        return new InvalidEnvelopeError(`invalid jsonrpc version: ${String(value.jsonrpc)}`, id);
    }

    if ('method' in value) {
        return 'id' in value ? check(requestSchema, value, id) : check(notificationSchema, value, id);
    }
    if ('error' in value) {
        return check(errorResponseSchema, value, id);
    }
    if ('result' in value) {
        return check(responseSchema, value, id);
    }
    if ('id' in value) {
        return new InvalidEnvelopeError('missing method', id);
    }
    return new InvalidEnvelopeError('unrecognized envelope');
}

function check(schema: ZodType<Envelope>, value: Record<string, unknown>, id: RequestId | null) {
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : new InvalidEnvelopeError(describeIssues(parsed.error), id);
}

/**
 * Validate method params; a mismatch throws InvalidParams.
 */
export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: unknown, method: string): T {
    const parsed = schema.safeParse(params ?? {});
    if (!parsed.success) {
        throw new InvalidParamsError(`invalid params for ${method}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

/** First issue as `path: message` */
export function describeIssues(error: ZodError): string {
    const [issue] = error.issues;
    if (!issue) return 'invalid envelope';
    return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function recoverId(value: Record<string, unknown>): RequestId | null {
    const { id } = value;
    return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
