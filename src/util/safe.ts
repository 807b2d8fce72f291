/**
 * based on safe-await library code.
 * makes it easier to use async/await without try/catch blocks:
 * returns a [data, err] tuple.
 *
 * @example
 * const [tools, err] = await safe(client.listTools());
 * if (err) log.warn('listing failed', err);
 */
export function safe<T>(promiseOrFn: Promise<T> | (() => Promise<T>)): Promise<[T, undefined] | [undefined, Error]> {
    if (typeof promiseOrFn === 'function') {
        try {
            return safe(promiseOrFn());
        } catch (err) {
            return Promise.resolve([undefined, err instanceof Error ? err : new Error(String(err))]);
        }
    }
    return promiseOrFn.then(
        (data): [T, undefined] => [data, undefined],
        (err: unknown): [undefined, Error] => [undefined, err instanceof Error ? err : new Error(String(err))],
    );
}

/**
 * Synchronous counterpart of safe().
 *
 * @example
 * const [data, err] = safeSync(() => JSON.parse(text));
 */
export function safeSync<T>(fn: () => T): [T, undefined] | [undefined, Error] {
    try {
        return [fn(), undefined];
    } catch (err) {
        return [undefined, err instanceof Error ? err : new Error(String(err))];
    }
}
