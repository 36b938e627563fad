/**
 * Scoped console logger.
 *
 * Every module creates its own scope (`createLogger('ingest')`); output is
 * prefixed with that scope and filtered by one process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Record<string, unknown>;

export interface LogSink {
    debug(message: string, data?: LogData): void;
    info(message: string, data?: LogData): void;
    warn(message: string, data?: LogData): void;
    error(message: string, data?: LogData): void;
}

export interface Logger {
    readonly scope: string;
    debug(message: string, data?: LogData): void;
    info(message: string, data?: LogData): void;
    /** Info-level line marking a completed unit of work. */
    success(message: string, data?: LogData): void;
    warn(message: string, data?: LogData): void;
    error(message: string, data?: LogData): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const consoleSink: LogSink = {
    debug: (message, data) => (data ? console.debug(message, data) : console.debug(message)),
    info: (message, data) => (data ? console.info(message, data) : console.info(message)),
    warn: (message, data) => (data ? console.warn(message, data) : console.warn(message)),
    error: (message, data) => (data ? console.error(message, data) : console.error(message)),
};

let currentLevel: LogLevel = 'info';
let currentSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/** Redirect output; pass nothing to restore the console. */
export function setLogSink(sink?: LogSink): void {
    currentSink = sink ?? consoleSink;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
    const prefix = `[${scope}]`;
    return {
        scope,
        debug(message, data) {
            if (enabled('debug')) currentSink.debug(`${prefix} ${message}`, data);
        },
        info(message, data) {
            if (enabled('info')) currentSink.info(`${prefix} ${message}`, data);
        },
        success(message, data) {
            if (enabled('info')) currentSink.info(`${prefix} ✓ ${message}`, data);
        },
        warn(message, data) {
            if (enabled('warn')) currentSink.warn(`${prefix} ${message}`, data);
        },
        error(message, data) {
            if (enabled('error')) currentSink.error(`${prefix} ${message}`, data);
        },
    };
}
