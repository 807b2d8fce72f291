/**
 * Capability registry: named tools, resources, resource templates and prompts.
 *
 * Each namespace rejects a second registration under a taken name; callers
 * replace a capability by unregistering it first. `list` returns a snapshot
 * in insertion order, and a handler fetched with `get` stays usable after
 * it is unregistered, so in-flight calls are never cut short.
 */

import { DuplicateNameError } from '../protocol/errors';
import type { Prompt, Resource, ResourceTemplateHandler, Tool } from './types';

export type Namespace = 'tools' | 'resources' | 'resourceTemplates' | 'prompts';

export interface RegistryChange {
    namespace: Namespace;
    name: string;
    action: 'register' | 'unregister';
}

export class RegistryChangeEvent extends Event {
    constructor(readonly change: RegistryChange) {
        super('change');
    }
}

interface Described {
    readonly definition: object;
}

export class CapabilitySet<T extends Described> {
    private readonly _items = new Map<string, T>();

    constructor(
        readonly namespace: Namespace,
        private readonly _label: string,
        private readonly _nameOf: (item: T) => string,
        private readonly _changed: (change: RegistryChange) => void,
    ) {}

    get size(): number {
        return this._items.size;
    }

    register(item: T): this {
        const name = this._nameOf(item);
        if (this._items.has(name)) {
            throw new DuplicateNameError(this._label, name);
        }
        this._items.set(name, item);
        this._changed({ namespace: this.namespace, name, action: 'register' });
        return this;
    }

    unregister(name: string): boolean {
        if (!this._items.delete(name)) return false;
        this._changed({ namespace: this.namespace, name, action: 'unregister' });
        return true;
    }

    get(name: string): T | undefined {
        return this._items.get(name);
    }

    has(name: string): boolean {
        return this._items.has(name);
    }

    list(): T['definition'][] {
        return Array.from(this._items.values(), (item) => item.definition);
    }

    values(): T[] {
        return Array.from(this._items.values());
    }
}

/**
 * Owned by one server. Dispatches a RegistryChangeEvent after every
 * register/unregister.
 */
export class CapabilityRegistry extends EventTarget {
    private readonly _emit = (change: RegistryChange): void => {
        this.dispatchEvent(new RegistryChangeEvent(change));
    };

    readonly tools = new CapabilitySet<Tool>('tools', 'tool', (t) => t.definition.name, this._emit);
    readonly resources = new CapabilitySet<Resource>('resources', 'resource', (r) => r.definition.uri, this._emit);
    readonly resourceTemplates = new CapabilitySet<ResourceTemplateHandler>(
        'resourceTemplates',
        'resource template',
        (r) => r.definition.uriTemplate,
        this._emit,
    );
    readonly prompts = new CapabilitySet<Prompt>('prompts', 'prompt', (p) => p.definition.name, this._emit);

    /**
     * First resource template matching `uri`, with the extracted variables.
     */
    matchTemplate(uri: string): { template: ResourceTemplateHandler; vars: Record<string, string> } | undefined {
        for (const template of this.resourceTemplates.values()) {
            const vars = matchUriTemplate(template.definition.uriTemplate, uri);
            if (vars) return { template, vars };
        }
        return undefined;
    }
}

/**
 * Match a uri against a level-1 URI template. `{name}` matches one path
 * segment, `{+name}` matches the rest including slashes.
 */
export function matchUriTemplate(template: string, uri: string): Record<string, string> | undefined {
    const names: string[] = [];
    let pattern = '^';
    let last = 0;
    for (const m of template.matchAll(/\{(\+?)([A-Za-z0-9_]+)\}/g)) {
        pattern += escapeRegExp(template.slice(last, m.index));
        pattern += m[1] ? '(.+)' : '([^/]+)';
        names.push(m[2]);
        last = (m.index ?? 0) + m[0].length;
    }
    pattern += `${escapeRegExp(template.slice(last))}$`;

    const match = new RegExp(pattern).exec(uri);
    if (!match) return undefined;
    const vars: Record<string, string> = {};
    names.forEach((name, i) => {
        vars[name] = match[i + 1] ?? '';
    });
    return vars;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
