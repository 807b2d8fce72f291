import { deepEqual, ok, strictEqual } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { classify, decode, encode, isBatch } from './codec';
import { DecodeError, InvalidEnvelopeError, ParseError } from './errors';
import { type Envelope, ErrorCode, isErrorResponse, isNotification, isRequest, isResponse } from './types';

describe('codec', () => {
    test('decodes the four envelope kinds', () => {
        const cases: Array<[string, (msg: Envelope) => boolean]> = [
            ['{"jsonrpc":"2.0","id":1,"method":"ping"}', isRequest],
            ['{"jsonrpc":"2.0","method":"notifications/initialized"}', isNotification],
            ['{"jsonrpc":"2.0","id":"a","result":{}}', isResponse],
            ['{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}', isErrorResponse],
        ];
        for (const [frame, guard] of cases) {
            const [msg, err] = decode(frame);
            strictEqual(err, undefined, frame);
            ok(msg && !isBatch(msg) && guard(msg), frame);
        }
    });

    test('round-trips envelopes and a mixed batch', () => {
        const batch: Envelope[] = [
            { jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'echo', arguments: { msg: 'hi' } } },
            { jsonrpc: '2.0', method: 'notifications/progress', params: { progressToken: 't', progress: 1 } },
            { jsonrpc: '2.0', id: 'x', result: { tools: [] } },
            { jsonrpc: '2.0', id: 2, error: { code: -32601, message: 'method not found: bogus', data: { hint: 1 } } },
        ];
        for (const msg of batch) {
            deepEqual(decode(encode(msg)), [msg, undefined]);
        }
        deepEqual(decode(encode(batch)), [batch, undefined]);
    });

    test('accepts a null result', () => {
        deepEqual(decode('{"jsonrpc":"2.0","id":3,"result":null}'), [{ jsonrpc: '2.0', id: 3, result: null }, undefined]);
    });

    test('decodes bytes', () => {
        const [msg] = decode(new TextEncoder().encode('{"jsonrpc":"2.0","id":7,"method":"ping"}'));
        deepEqual(msg, { jsonrpc: '2.0', id: 7, method: 'ping' });
    });

    test('invalid JSON is a ParseError without id', () => {
        const [msg, err] = decode('{"jsonrpc":"2.0","id":1,');
        strictEqual(msg, undefined);
        ok(err instanceof ParseError);
        strictEqual(err.id, null);
        strictEqual(err.rpcCode, ErrorCode.PARSE_ERROR);
        strictEqual(err.message, 'Parse error');
    });

    test('structural errors keep the recoverable id', () => {
        const [, missingMethod] = decode('{"jsonrpc":"2.0","id":5}');
        ok(missingMethod instanceof InvalidEnvelopeError);
        strictEqual(missingMethod.id, 5);
        strictEqual(missingMethod.message, 'missing method');
        strictEqual(missingMethod.rpcCode, ErrorCode.INVALID_REQUEST);

        const [, badVersion] = decode('{"jsonrpc":"1.0","id":"q","method":"ping"}');
        ok(badVersion instanceof InvalidEnvelopeError);
        strictEqual(badVersion.id, 'q');
        strictEqual(badVersion.message, 'invalid jsonrpc version: 1.0');

        const [, badParams] = decode('{"jsonrpc":"2.0","id":9,"method":"ping","params":[1]}');
        ok(badParams instanceof InvalidEnvelopeError);
        strictEqual(badParams.id, 9);
        ok(badParams.message.startsWith('params: '), badParams.message);
    });

    test('non-object values are invalid envelopes', () => {
        const [, err] = decode('42');
        ok(err instanceof InvalidEnvelopeError);
        strictEqual(err.message, 'envelope must be an object');
        strictEqual(err.id, null);

        ok(classify({ jsonrpc: '2.0' }) instanceof InvalidEnvelopeError);
    });

    test('empty batch is invalid', () => {
        const [msg, err] = decode('[]');
        strictEqual(msg, undefined);
        ok(err instanceof InvalidEnvelopeError);
        strictEqual(err.message, 'empty batch');
    });

    test('batch members are classified on their own', () => {
        const [decoded, err] = decode('[{"jsonrpc":"2.0","id":1,"method":"ping"},{"id":2},3]');
        strictEqual(err, undefined);
        ok(decoded && isBatch(decoded));
        strictEqual(decoded.length, 3);
        deepEqual(decoded[0], { jsonrpc: '2.0', id: 1, method: 'ping' });
        const second = decoded[1];
        ok(second instanceof DecodeError);
        strictEqual(second.id, 2);
        strictEqual(second.message, 'invalid jsonrpc version: undefined');
        ok(decoded[2] instanceof InvalidEnvelopeError);
    });
});
