import { setTimeout } from 'node:timers/promises';

/**
 * shorthand to timer's setTimeout.
 * Usage: await sleep(1000);
 * Pass `{ signal }` to wake early; the promise then rejects with an AbortError.
 */
export const sleep = setTimeout;

/**
 * Sleep that resolves `false` instead of rejecting when the signal aborts.
 * Used by background loops that must stop quietly on shutdown.
 */
export async function sleepUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    try {
        await setTimeout(ms, undefined, { signal });
        return true;
    } catch (err) {
        if (signal.aborted) return false;
        throw err;
    }
}
