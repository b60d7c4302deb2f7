/**
 * Resolution logging.
 * Each parse stage logs under its source, one line per value it applies:
 *
 *   [layerflag] env: APP_API_TOKEN=[REDACTED] -> --api-token
 *   [layerflag] config: port=8080 -> -p, --port
 *
 * LAYERFLAG_LOG_LEVEL picks the level (silent, debug, trace; default silent),
 * LAYERFLAG_LOG_PREFIX the line prefix.
 */

import { maskValue } from './sensitive.js';

export type LogLevel = 'silent' | 'debug' | 'trace';

/** Where a log line comes from: one of the parse stages, or dispatch. */
export type LogSource = 'args' | 'env' | 'config' | 'command';

export interface ResolutionLogger {
    readonly source: LogSource;
    debug(message: string): void;
    trace(message: string): void;
    /**
     * Logs a value applied under key, masked when the key or value looks
     * secret. flagName is appended when it differs from the key.
     */
    assigned(level: Exclude<LogLevel, 'silent'>, key: string, value: string, flagName?: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    debug: 1,
    trace: 2
};

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'silent';

if (typeof process !== 'undefined' && process.env.LAYERFLAG_LOG_LEVEL) {
    const envLevel = process.env.LAYERFLAG_LOG_LEVEL.toLowerCase();
    if (isLogLevel(envLevel)) {
        currentLevel = envLevel;
    }
}

const PREFIX = process.env.LAYERFLAG_LOG_PREFIX || '[layerflag]';

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

class ConsoleResolutionLogger implements ResolutionLogger {
    constructor(public readonly source: LogSource) { }

    debug(message: string): void {
        if (this.enabled('debug')) {
            console.debug(this.format(message));
        }
    }

    trace(message: string): void {
        if (this.enabled('trace')) {
            console.log(this.format(message));
        }
    }

    assigned(level: Exclude<LogLevel, 'silent'>, key: string, value: string, flagName?: string): void {
        if (!this.enabled(level)) {
            return;
        }
        const target = flagName === undefined || flagName === key ? '' : ` -> ${flagName}`;
        this[level](`${key}=${maskValue(key, value)}${target}`);
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
    }

    private format(message: string): string {
        return `${PREFIX} ${this.source}: ${message}`;
    }
}

const loggers = new Map<LogSource, ResolutionLogger>();

export function getLogger(source: LogSource): ResolutionLogger {
    let logger = loggers.get(source);
    if (!logger) {
        logger = new ConsoleResolutionLogger(source);
        loggers.set(source, logger);
    }
    return logger;
}
