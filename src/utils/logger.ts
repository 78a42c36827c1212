/**
 * pagechat Logger — levelled, coloured logging with per-component prefixes.
 *
 * Every line goes to stderr so that command output on stdout (summaries,
 * JSON documents, answers) can be piped without log noise.
 */

import chalk from "chalk";

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export type LogFields = Record<string, string | number | boolean | undefined>;

const LEVEL_LABELS: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: chalk.dim("DEBUG"),
    [LogLevel.INFO]: chalk.cyan("INFO "),
    [LogLevel.WARN]: chalk.yellow("WARN "),
    [LogLevel.ERROR]: chalk.red("ERROR"),
    [LogLevel.SILENT]: "",
};

/** Parse a level name; unknown names yield `undefined`. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
    switch (name?.trim().toUpperCase()) {
        case "DEBUG": return LogLevel.DEBUG;
        case "INFO": return LogLevel.INFO;
        case "WARN": return LogLevel.WARN;
        case "ERROR": return LogLevel.ERROR;
        case "SILENT": return LogLevel.SILENT;
        default: return undefined;
    }
}

function formatFields(fields: LogFields): string {
    return Object.entries(fields)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${chalk.dim(`${key}=`)}${String(value)}`)
        .join(" ");
}

export class Logger {
    private readonly prefix: string;

    constructor(prefix: string, private readonly levelOf: () => LogLevel = () => globalLevel) {
        this.prefix = prefix;
    }

    get level(): LogLevel {
        return this.levelOf();
    }

    private write(level: LogLevel, msg: string, fields?: LogFields): void {
        if (this.levelOf() > level) return;
        const ts = new Date().toISOString().slice(11, 23);
        const extra = fields ? formatFields(fields) : "";
        const line = `${chalk.dim(ts)} ${LEVEL_LABELS[level]} ${chalk.dim("[")}${chalk.bold(this.prefix)}${chalk.dim("]")} ${msg}`;
        console.error(extra ? `${line} ${extra}` : line);
    }

    debug(msg: string, fields?: LogFields): void {
        this.write(LogLevel.DEBUG, msg, fields);
    }

    info(msg: string, fields?: LogFields): void {
        this.write(LogLevel.INFO, msg, fields);
    }

    warn(msg: string, fields?: LogFields): void {
        this.write(LogLevel.WARN, msg, fields);
    }

    error(msg: string, fields?: LogFields): void {
        this.write(LogLevel.ERROR, msg, fields);
    }

    child(prefix: string): Logger {
        return new Logger(`${this.prefix}:${prefix}`, this.levelOf);
    }
}

/** Global log level — PAGECHAT_LOG_LEVEL or setGlobalLogLevel(). */
let globalLevel = parseLogLevel(process.env.PAGECHAT_LOG_LEVEL) ?? LogLevel.INFO;

/**
 * Loggers read the global level on every call, so a level set after a module
 * created its logger (e.g. from a CLI flag) still applies.
 */
export function createLogger(prefix: string): Logger {
    return new Logger(prefix);
}

export function setGlobalLogLevel(level: LogLevel): void {
    globalLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
    return globalLevel;
}
