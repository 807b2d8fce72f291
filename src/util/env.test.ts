import { equal } from 'node:assert/strict';
import { afterEach, beforeEach, describe, test } from 'node:test';

import { Env } from './env';

describe('env', () => {
    let save: NodeJS.ProcessEnv;
    beforeEach(() => {
        save = { ...process.env };
    });
    afterEach(() => {
        for (const key of Object.keys(process.env)) {
            if (!(key in save)) delete process.env[key];
        }
        Object.assign(process.env, save);
    });

    test('app name and version fall back to package metadata', () => {
        delete process.env.APP_NAME;
        delete process.env.APP_VERSION;
        process.env.npm_package_name = 'mcp-test';
        process.env.npm_package_version = '1.2.3';
        equal(Env.appName, 'mcp-test');
        equal(Env.appVersion, '1.2.3');

        process.env.APP_NAME = 'override';
        equal(Env.appName, 'override');
    });

    test('numbers are parsed and clamped', () => {
        process.env.TEST_NUM = '42';
        equal(Env.get('TEST_NUM', 1), 42);
        equal(Env.get('TEST_NUM', 1, 0, 10), 10);
        equal(Env.get('TEST_NUM', 1, 50), 50);
        process.env.TEST_NUM = 'abc';
        equal(Env.get('TEST_NUM', 7), 7);
        process.env.TEST_NUM = '';
        equal(Env.get('TEST_NUM', 8), 8);
        delete process.env.TEST_NUM;
        equal(Env.get('TEST_NUM', 9), 9);
    });

    test('booleans accept true and 1', () => {
        process.env.TEST_BOOL = 'TRUE';
        equal(Env.get('TEST_BOOL', false), true);
        process.env.TEST_BOOL = '1';
        equal(Env.get('TEST_BOOL', false), true);
        process.env.TEST_BOOL = 'no';
        equal(Env.get('TEST_BOOL', true), false);
        process.env.TEST_BOOL = '';
        equal(Env.get('TEST_BOOL', true), true);
    });

    test('strings default and clamp lexically', () => {
        delete process.env.TEST_STR;
        equal(Env.get('TEST_STR', 'info'), 'info');
        process.env.TEST_STR = 'b';
        equal(Env.get('TEST_STR', 'x'), 'b');
        equal(Env.get('TEST_STR', 'x', 'c'), 'c');
        equal(Env.get('TEST_STR', 'x', '', 'a'), 'a');
    });
});
