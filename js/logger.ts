/**
 * @fileoverview Logging
 * Leveled, module-scoped console logging for the payroll run.
 *
 * Level comes from PAYROLL_LOG_LEVEL, then PAYROLL_DEBUG=true, then NODE_ENV
 * (WARN in production, INFO otherwise). Data arguments are sanitized so
 * credentials and free-text notes never reach the console.
 */

import { ENV_KEYS } from './constants.js';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

interface LoggerConfig {
    minLevel: LogLevel;
    /** Prefix lines with an ISO timestamp */
    timestamps: boolean;
    /** Prefix lines with the module name */
    showModule: boolean;
}

type ConsoleSink = (message: string, ...data: unknown[]) => void;

/** Keys (lowercased substrings) whose values are replaced wholesale */
const REDACTED_KEYS = ['token', 'password', 'secret', 'dsn', 'email', 'authorization', 'note'];

/** Opaque runs long enough to be a key or token */
const OPAQUE_RUN = /[a-zA-Z0-9]{32,}/g;

const LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'NONE'] as const;

const LEVEL_ALIASES: Record<string, LogLevel> = {
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARN: LogLevel.WARN,
    WARNING: LogLevel.WARN,
    ERROR: LogLevel.ERROR,
    NONE: LogLevel.NONE,
    SILENT: LogLevel.NONE,
};

/**
 * Parses a level name such as "warn" (any case).
 * Returns null for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
    if (!value) return null;
    return LEVEL_ALIASES[value.trim().toUpperCase()] ?? null;
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
    const explicit = parseLogLevel(env[ENV_KEYS.LOG_LEVEL]);
    if (explicit !== null) return explicit;
    if (env[ENV_KEYS.DEBUG] === 'true') return LogLevel.DEBUG;
    return env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO;
}

let config: LoggerConfig = {
    minLevel: levelFromEnv(process.env),
    timestamps: true,
    showModule: true,
};

export function configureLogger(overrides: Partial<LoggerConfig>): void {
    config = { ...config, ...overrides };
}

export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

/**
 * Builds the line prefix, e.g. "[WARN] [Calc] hello".
 */
export function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
    const prefix = [
        config.timestamps ? `[${new Date().toISOString()}]` : null,
        `[${LEVEL_NAMES[level]}]`,
        config.showModule && module ? `[${module}]` : null,
    ].filter((part): part is string => part !== null);

    return [...prefix, message].join(' ');
}

/**
 * Redacts sensitive values from data about to be logged.
 */
export function sanitize(data: unknown): unknown {
    if (typeof data === 'string') return data.replace(OPAQUE_RUN, '[REDACTED]');
    if (Array.isArray(data)) return data.map(sanitize);
    if (typeof data !== 'object' || data === null) return data;

    return Object.fromEntries(
        Object.entries(data).map(([key, value]) => {
            const lowerKey = key.toLowerCase();
            const hidden = REDACTED_KEYS.some((fragment) => lowerKey.includes(fragment));
            return [key, hidden ? '[REDACTED]' : sanitize(value)];
        })
    );
}

function sinkFor(level: LogLevel): ConsoleSink | null {
    switch (level) {
        case LogLevel.DEBUG:
        case LogLevel.INFO:
            return console.log;
        case LogLevel.WARN:
            return console.warn;
        case LogLevel.ERROR:
            return console.error;
        default:
            return null;
    }
}

function write(level: LogLevel, module: string, message: string, data: unknown[]): void {
    if (level < config.minLevel) return;
    const sink = sinkFor(level);
    sink?.(formatMessage(level, module, message), ...data.map(sanitize));
}

export interface Logger {
    debug(message: string, ...data: unknown[]): void;
    info(message: string, ...data: unknown[]): void;
    warn(message: string, ...data: unknown[]): void;
    error(message: string, ...data: unknown[]): void;
    /** Starts a named timer (DEBUG only) */
    time(label: string): void;
    /** Logs the elapsed milliseconds of a timer at DEBUG and clears it */
    timeEnd(label: string): void;
}

/**
 * Creates a logger that tags every line with `module`.
 */
export function createLogger(module: string): Logger {
    const timers = new Map<string, number>();

    return {
        debug: (message, ...data) => write(LogLevel.DEBUG, module, message, data),
        info: (message, ...data) => write(LogLevel.INFO, module, message, data),
        warn: (message, ...data) => write(LogLevel.WARN, module, message, data),
        error: (message, ...data) => write(LogLevel.ERROR, module, message, data),
        time: (label) => {
            if (isDebugEnabled()) timers.set(label, performance.now());
        },
        timeEnd: (label) => {
            const startedAt = timers.get(label);
            if (startedAt === undefined) return;
            timers.delete(label);
            write(LogLevel.DEBUG, module, `${label}: ${(performance.now() - startedAt).toFixed(1)}ms`, []);
        },
    };
}
