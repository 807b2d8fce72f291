//
// graceful termination for long running commands (`serve`).
// callbacks registered with atExit() run last-in-first-out on SIGINT/SIGTERM,
// bounded by AT_TERMINATE_TIMEOUT milliseconds (default 1000).
// the first call also installs handlers for uncaught errors.
//

import { Env } from './env';
import { createLogger } from './logger';

export type AtExit = (sig?: NodeJS.Signals) => void | Promise<void>;
const cbs: AtExit[] = [];
const log = createLogger('at-exit');

/**
 * Exit handler: runs every registered callback, then exits.
 * Exits anyway once the timeout elapses.
 */
export function makeExitHandler(code: number, sig: NodeJS.Signals, exit: (code: number) => void = (c) => process.exit(c)) {
    return async (): Promise<void> => {
        log.warn(`Exiting on ${sig}...`);

        const to = setTimeout(() => {
            log.warn(`Exiting on ${sig} timeout. Killing process.`);
            exit(code);
        }, Env.get('AT_TERMINATE_TIMEOUT', 1000, 1)).unref();

        const waitings: Promise<void>[] = [];
        let cb: AtExit | undefined;
        while ((cb = cbs.pop())) {
            const name = cb.name;
            try {
                const rc = cb(sig);
                if (rc instanceof Promise) {
                    waitings.push(rc.catch((e: unknown) => log.warn(`atExit error in '${name}':`, e)));
                }
            } catch (e) {
                log.warn(`atExit error in '${name}':`, e);
            }
        }

        await Promise.all(waitings);
        clearTimeout(to);
        exit(code);
    };
}

// on error we just err-out and terminate
function makeErrorHandler(reason: string) {
    return (err: unknown) => {
        log.error(reason, err instanceof Error ? (err.stack ?? err.message) : err);
        process.exit(9); // 9 = EBADF equivalent
    };
}

// remove a callback; returns true when it was registered
function remove(cb: AtExit): boolean {
    const n = cbs.indexOf(cb);
    if (n >= 0) cbs.splice(n, 1);
    return n >= 0;
}

let installed = false;

/**
 * Graceful termination function: last-in-first-out.
 * returns a callback that can later be called to remove the handler.
 */
export function atExit(cb: AtExit): () => boolean {
    if (!installed) {
        installed = true;
        process.once('uncaughtException', makeErrorHandler('Unexpected Error'));
        process.once('unhandledRejection', makeErrorHandler('Unhandled Promise'));
        process.once('SIGTERM', makeExitHandler(0, 'SIGTERM'));
        process.once('SIGINT', makeExitHandler(0, 'SIGINT'));
    }

    cbs.push(cb);
    return () => remove(cb);
}
