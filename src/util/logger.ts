import cluster from 'node:cluster';
import inspector from 'node:inspector';
import path from 'node:path';
import process from 'node:process';
import { format, styleText } from 'node:util';

/**
 * Scoped logger used by every protocol component.
 * - log levels (will not output below the set level)
 * - JSON output with context, or colored lines when a debugger is attached
 * - batched async writes through SpeedStd
 *
 * Configuration environment variables:
 * LOG_LEVEL: minimum level that is logged. Default: "INFO".
 * LOG_NAME: default scope. Default: pid and cluster role.
 * LOG_FORMAT: "json" or "line". Default: json unless a debugger is attached.
 * LOG_ADD_TIME: "true" adds a timestamp to each entry. Default: false.
 * APP_NAME: application name included in JSON entries.
 */

// RFC5424: syslog levels
export enum LogLevel {
    EMERGENCY = 0,
    ALERT = 1,
    CRITICAL = 2,
    ERROR = 3,
    WARNING = 4,
    NOTICE = 5,
    INFO = 6,
    DEBUG = 7,
}

type Chalk = Parameters<typeof styleText>[0];
export type ChalkFn = typeof styleText;
export type LogFn = (...params: unknown[]) => void;
export type Formatter = (this: LoggerConf, lvl: LogLevel, fn: LogFn, chalk: Chalk, ...params: unknown[]) => void;
export type Transport = { log: LogFn; error: LogFn };

export type LoggerOptions = Partial<
    Omit<LoggerConf, 'level' | 'formatter'> & {
        level: LogLevel | keyof typeof LogLevel;
        formatter: Formatter | 'json' | 'line';
    }
>;

const registrar = new Map<string, Logger>();

export class LoggerConf {
    level: LogLevel;
    readonly scope: string;
    readonly addTime: boolean;
    readonly chalkFn: ChalkFn;
    readonly formatter: Formatter;
    readonly app: string;

    constructor({
        scope = LoggerConf._defName(),
        level = process.env.LOG_LEVEL ?? LogLevel.INFO,
        addTime = (process.env.LOG_ADD_TIME ?? 'false').toLowerCase() === 'true',
        formatter = (process.env.LOG_FORMAT ?? (isDebuggerAttached() ? 'line' : 'json')).toLowerCase() === 'json'
            ? jsonFn
            : lineFn,
        chalkFn = styleText,
        app = process.env.APP_NAME ?? path.basename(process.execPath),
    }: Omit<LoggerOptions, 'level'> & { level?: string | number } = {}) {
        this.scope = scope;
        this.level = LoggerConf.normalizeLevel(level);
        this.addTime = addTime;
        this.chalkFn = chalkFn;
        this.formatter = formatter === 'json' ? jsonFn : formatter === 'line' ? lineFn : formatter;
        this.app = app;
    }

    private static _defName() {
        const name = process.env.LOG_NAME ?? process.env.LOGNAME;
        return name || `${process.pid}:${cluster.isWorker ? (cluster.worker?.id ?? 'worker') : 'main'}`;
    }

    // LOG_LEVEL can be a number 0-7 or a level name (e.g. "warn", "DEBUG")
    static normalizeLevel(level: string | number): LogLevel {
        if (typeof level === 'number') {
            return level >= LogLevel.EMERGENCY && level <= LogLevel.DEBUG ? level : LogLevel.INFO;
        }
        const name = (LoggerConf.MAP[level.toLowerCase()] ?? level).toUpperCase();
        const numeric = Number(name);
        if (Number.isInteger(numeric) && numeric >= LogLevel.EMERGENCY && numeric <= LogLevel.DEBUG) {
            return numeric;
        }
        const named = LogLevel[name as keyof typeof LogLevel];
        return named ?? LogLevel.INFO;
    }

    // map some constant strings from other logging libraries
    static readonly MAP: Record<string, string> = {
        warn: 'WARNING',
        informational: 'INFO',
        log: 'INFO',
        verbose: 'DEBUG',
        silly: 'DEBUG',
        trace: 'DEBUG',
    };
}

export interface Logger {
    readonly log: LogFn;
    readonly error: LogFn;
    readonly warn: LogFn;
    readonly info: LogFn;
    readonly debug: LogFn;
    readonly trace: LogFn;
    readonly notice: LogFn;
    readonly warning: LogFn;
    readonly alert: LogFn;
    readonly crit: LogFn;
    readonly critical: LogFn;
    readonly emerg: LogFn;
    readonly conf: LoggerConf;
    level: LogLevel;
    scoped(name: string, level?: LogLevel): Logger;
}

let _attached: boolean | undefined;
export function isDebuggerAttached(): boolean {
    return (_attached ??=
        typeof process === 'object' &&
        typeof process.debugPort === 'number' &&
        process.debugPort !== 0 &&
        typeof inspector.url() === 'string');
}

interface LogEntry {
    message: string;
    ctx: string;
    level: string;
    // biome-ignore lint/style/useNamingConvention: common log format
    process_id: number;
    // biome-ignore lint/style/useNamingConvention: common log format
    app_name: string;
    timestamp?: string;
}

function jsonFn(this: LoggerConf, lvl: LogLevel, fn: LogFn, _chalk: Chalk, ...params: unknown[]) {
    if (lvl <= this.level) {
        const entry: LogEntry = {
            message: format(...params),
            ctx: this.scope,
            level: LogLevel[lvl],
            process_id: process.pid,
            app_name: this.app,
        };
        if (this.addTime) entry.timestamp = new Date().toISOString();
        fn(entry);
    }
}

function lineFn(this: LoggerConf, lvl: LogLevel, fn: LogFn, chalk: Chalk, ...params: unknown[]) {
    if (lvl <= this.level) {
        const time = this.addTime ? `${new Date().toISOString()} ` : '';
        const scope = this.scope ? `[${this.scope}] ` : '';
        fn(this.chalkFn(chalk, `${time}${scope}${format(...params)}`));
    }
}

function scoped(this: Logger, sub: string, level?: LogLevel): Logger {
    return createLogger(`${this.conf.scope}.${sub}`, level ?? this.level, baseOf.get(this));
}

const baseOf = new WeakMap<Logger, Transport>();

/**
 * Creates (or returns the registered) logger for a scope.
 * @param scope logger name, defaults to process name
 * @param level defaults to LOG_LEVEL or INFO
 * @param base output transport, defaults to a SpeedStd on stdout/stderr
 */
export function createLogger(
    scope?: string,
    level?: LoggerOptions['level'],
    base?: Transport,
    options: LoggerOptions = {},
): Logger {
    const conf = new LoggerConf({ ...options, scope: scope ?? options.scope, level: level ?? options.level });
    const existing = registrar.get(conf.scope);
    if (existing) {
        if (level !== undefined) existing.level = conf.level;
        return existing;
    }

    // when debugging use the console so breakpoints show output in order
    const transport: Transport = base ?? (isDebuggerAttached() ? console : defaultTransport());
    const { log, error } = transport;
    if (typeof log !== 'function' || typeof error !== 'function') {
        throw new TypeError('Base logger must have log and error methods');
    }

    const out = (lvl: LogLevel, fn: LogFn, chalk: Chalk): LogFn => conf.formatter.bind(conf, lvl, fn, chalk);

    const logger: Logger = {
        log: out(LogLevel.INFO, log, 'blue'),
        error: out(LogLevel.ERROR, error, 'red'),
        warn: out(LogLevel.WARNING, log, 'yellow'),
        info: out(LogLevel.INFO, log, 'blue'),
        debug: out(LogLevel.DEBUG, log, 'grey'),
        trace: out(LogLevel.DEBUG, log, 'grey'),
        emerg: out(LogLevel.EMERGENCY, error, 'red'),
        alert: out(LogLevel.ALERT, error, 'red'),
        crit: out(LogLevel.CRITICAL, error, 'red'),
        critical: out(LogLevel.CRITICAL, error, 'red'),
        warning: out(LogLevel.WARNING, log, 'yellow'),
        notice: out(LogLevel.NOTICE, log, 'blue'),
        conf,
        get level() {
            return conf.level;
        },
        set level(lv: LogLevel) {
            conf.level = LoggerConf.normalizeLevel(lv);
        },
        scoped(name: string, lv?: LogLevel) {
            return scoped.call(logger, name, lv);
        },
    };

    baseOf.set(logger, transport);
    registrar.set(conf.scope, logger);
    return logger;
}

/**
 * SpeedStd batches log lines and writes them asynchronously.
 * Consecutive lines for the same stream are grouped into one write.
 */
export class SpeedStd implements Transport {
    protected groups: { err: boolean; txts: (object | string)[] }[] = [];
    protected timer: NodeJS.Timeout | undefined;
    log: LogFn = (...txt) => this._out(false, txt);
    error: LogFn = (...txt) => this._out(true, txt);

    constructor(
        protected stdout: NodeJS.WritableStream = process.stdout,
        protected stderr: NodeJS.WritableStream = process.stderr,
        protected interval = 50,
        protected flushMax = 100,
    ) {}

    private _out(err: boolean, params: unknown[]): void {
        const txt = params.length === 1 && typeof params[0] === 'object' && params[0] !== null ? params[0] : format(...params);
        const last = this.groups[this.groups.length - 1];
        if (last && last.err === err) {
            last.txts.push(txt);
        } else {
            this.groups.push({ err, txts: [txt] });
        }
        if (!this.timer) {
            this.timer = setInterval(() => this.flush(), this.interval);
            this.timer.unref();
        }
        if (this.groups.length >= this.flushMax) {
            this.flush();
        }
    }

    /** Send everything, including info output, to stderr from now on */
    redirectToStderr(): void {
        this.flush();
        this.stdout = this.stderr;
    }

    flush(): void {
        let group: (typeof this.groups)[0] | undefined;
        while ((group = this.groups.shift())) {
            const stream = group.err ? this.stderr : this.stdout;
            const txt = `${group.txts.map((v) => (typeof v === 'string' ? v : JSON.stringify(v))).join('\n')}\n`;
            stream.write(txt);
        }
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }
}

let _default: SpeedStd | undefined;
function defaultTransport(): SpeedStd {
    if (!_default) {
        const speedy = new SpeedStd();
        process.on('exit', () => speedy.flush());
        _default = speedy;
    }
    return _default;
}

/**
 * Route the default log output to stderr.
 * Used when stdout carries protocol frames (stdio serving).
 */
export function useStderr(): void {
    defaultTransport().redirectToStderr();
}

/** Transport that drops everything, for tests and `--quiet` */
export const nullTransport: Transport = { log: () => {}, error: () => {} };

