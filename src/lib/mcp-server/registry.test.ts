import { deepEqual, strictEqual, throws } from 'node:assert/strict';
import { describe, test } from 'node:test';
import { DuplicateNameError } from '../protocol/errors';
import { CapabilityRegistry, matchUriTemplate, type RegistryChange, RegistryChangeEvent } from './registry';
import { type Tool, textResult } from './types';

function tool(name: string, text = name): Tool {
    return {
        definition: { name, inputSchema: { type: 'object' } },
        call: async () => textResult(text),
    };
}

describe('CapabilityRegistry', () => {
    test('rejects a duplicate name and keeps the first handler', () => {
        const registry = new CapabilityRegistry();
        const first = tool('echo', 'first');
        registry.tools.register(first);
        throws(() => registry.tools.register(tool('echo', 'second')), (err) => {
            return err instanceof DuplicateNameError && err.message === 'tool already registered: echo';
        });
        strictEqual(registry.tools.size, 1);
        strictEqual(registry.tools.get('echo'), first);
    });

    test('unregister then register replaces a handler', () => {
        const registry = new CapabilityRegistry();
        const first = tool('echo');
        registry.tools.register(first);
        strictEqual(registry.tools.unregister('echo'), true);
        strictEqual(registry.tools.unregister('echo'), false);
        const second = tool('echo');
        registry.tools.register(second);
        strictEqual(registry.tools.get('echo'), second);
    });

    test('lists in insertion order as a snapshot', () => {
        const registry = new CapabilityRegistry();
        registry.tools.register(tool('b'));
        registry.tools.register(tool('a'));
        const listed = registry.tools.list();
        registry.tools.register(tool('c'));
        deepEqual(
            listed.map((d) => d.name),
            ['b', 'a'],
        );
        deepEqual(
            registry.tools.list().map((d) => d.name),
            ['b', 'a', 'c'],
        );
    });

    test('namespaces are independent', () => {
        const registry = new CapabilityRegistry();
        registry.tools.register(tool('x'));
        registry.prompts.register({ definition: { name: 'x' }, get: async () => ({ messages: [] }) });
        strictEqual(registry.tools.size, 1);
        strictEqual(registry.prompts.size, 1);
    });

    test('emits a change event per mutation', () => {
        const registry = new CapabilityRegistry();
        const changes: RegistryChange[] = [];
        registry.addEventListener('change', (e) => {
            if (e instanceof RegistryChangeEvent) changes.push(e.change);
        });
        registry.tools.register(tool('t'));
        registry.tools.unregister('t');
        registry.tools.unregister('t');
        deepEqual(changes, [
            { namespace: 'tools', name: 't', action: 'register' },
            { namespace: 'tools', name: 't', action: 'unregister' },
        ]);
    });

    test('finds the first matching resource template', () => {
        const registry = new CapabilityRegistry();
        const read = async () => [];
        registry.resourceTemplates.register({ definition: { uriTemplate: 'file:///{+path}', name: 'files' }, read });
        registry.resourceTemplates.register({ definition: { uriTemplate: 'file:///etc/{name}', name: 'etc' }, read });
        const matched = registry.matchTemplate('file:///etc/hosts');
        strictEqual(matched?.template.definition.name, 'files');
        deepEqual(matched?.vars, { path: 'etc/hosts' });
        strictEqual(registry.matchTemplate('http://x'), undefined);
    });
});

describe('matchUriTemplate', () => {
    test('simple variables match one segment', () => {
        deepEqual(matchUriTemplate('users://{org}/{id}', 'users://acme/7'), { org: 'acme', id: '7' });
        strictEqual(matchUriTemplate('users://{id}', 'users://a/b'), undefined);
    });

    test('literal parts are matched exactly', () => {
        deepEqual(matchUriTemplate('db://t.{table}', 'db://t.orders'), { table: 'orders' });
        strictEqual(matchUriTemplate('db://t.{table}', 'db://tXorders'), undefined);
    });
});
