/**
 * Keyfold - Logging
 *
 * All output goes to stderr. Debug and info lines only appear in verbose mode.
 */

import { LOG_PREFIX, VERBOSE_ENV } from './constants.js';

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFn = (message: string, context?: LogContext) => void;

export interface Logger {
    readonly debug: LogFn;
    readonly info: LogFn;
    readonly warn: LogFn;
    readonly error: LogFn;
}

export interface LoggerOptions {
    /** Emit debug and info lines (default: KEYFOLD_VERBOSE) */
    verbose?: boolean;
    /** Prepended to every message as `prefix: ` */
    prefix?: string;
}

/** Options accepted by every public entry point that logs */
export interface LoggingOptions {
    logger?: Logger;
    verbose?: boolean;
}

export function verboseFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
    const value = env[VERBOSE_ENV]?.trim().toLowerCase();
    return value === '1' || value === 'true';
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const verbose = options.verbose ?? verboseFromEnv();
    const prefix = options.prefix ?? LOG_PREFIX;

    const emit = (level: LogLevel, message: string, context?: LogContext): void => {
        if (!verbose && (level === 'debug' || level === 'info')) return;

        const write = level === 'warn' ? console.warn : console.error;
        const line = prefix ? `${prefix}: ${message}` : message;
        if (context && Object.keys(context).length > 0) {
            write(line, context);
            return;
        }
        write(line);
    };

    return {
        debug: (message, context) => emit('debug', message, context),
        info: (message, context) => emit('info', message, context),
        warn: (message, context) => emit('warn', message, context),
        error: (message, context) => emit('error', message, context),
    };
}

const noop: LogFn = () => {};

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};

export function resolveLogger(options: LoggingOptions = {}): Logger {
    return options.logger ?? createLogger({ verbose: options.verbose });
}
