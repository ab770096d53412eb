/**
 * @fileoverview Error Reporting
 * Sends failed payroll runs to Sentry, scrubbed of credentials and employee
 * names. Reporting stays off until `initErrorReporting` gets a DSN; until then
 * every call here only writes to the local log.
 */

import * as Sentry from '@sentry/node';
import type { Breadcrumb, Event, SeverityLevel } from '@sentry/node';
import { createLogger } from './logger.js';

const logger = createLogger('ErrorReporting');

// ==================== TYPES ====================

export interface SentryConfig {
    /** Project DSN; empty or a `__PLACEHOLDER__` leaves reporting off */
    dsn: string;
    /** e.g. 'production' */
    environment: string;
    /** Package version the events are tagged with */
    release: string;
    debug?: boolean;
    /** Fraction of error events sent, 0 to 1 */
    sampleRate?: number;
}

/**
 * Where a failure happened and what the operator was told.
 */
export interface ErrorContext {
    module?: string;
    operation?: string;
    /** Extra fields; scrubbed before they are attached */
    metadata?: Record<string, unknown>;
    /** Title shown to the person running payroll */
    userMessage?: string;
    level?: SeverityLevel;
}

// ==================== STATE ====================

let sentryInitialized = false;

// ==================== SCRUBBING ====================

const REDACTED = '[REDACTED]';

/** Credentials, DSNs and e-mail addresses inside free text */
const SECRET_TEXT = [
    /Bearer\s+[^\s]*/gi,
    /(?:token|password|secret|api[_-]?key)["\s:=]+[^"'\s,}]*/gi,
    /https?:\/\/[^@\s]+@[^\s]+/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
];

/** Keys (lowercased substrings) whose values never leave the process */
const SECRET_KEYS = ['token', 'password', 'secret', 'key', 'email', 'dsn', 'note'];

export function scrubSensitiveData(text: string): string {
    return SECRET_TEXT.reduce((scrubbed, pattern) => scrubbed.replace(pattern, REDACTED), text);
}

function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') return scrubSensitiveData(value);
    if (Array.isArray(value)) return value.map(scrubValue);
    if (typeof value === 'object' && value !== null) {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Copies `obj` with secret keys redacted, employee ids hashed and every
 * nested string scrubbed.
 */
export function scrubRecord(obj: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(obj).map(([key, value]) => {
            const lowerKey = key.toLowerCase();
            if (SECRET_KEYS.some((fragment) => lowerKey.includes(fragment))) return [key, REDACTED];
            if (lowerKey === 'employeeid' && typeof value === 'string') return [key, hashString(value)];
            return [key, scrubValue(value)];
        })
    );
}

function scrubBreadcrumb(breadcrumb: Breadcrumb): Breadcrumb {
    if (breadcrumb.message) breadcrumb.message = scrubSensitiveData(breadcrumb.message);
    if (breadcrumb.data) breadcrumb.data = scrubRecord(breadcrumb.data);
    return breadcrumb;
}

/**
 * Scrubs an outgoing Sentry event in place: exception text, stack file
 * names, breadcrumbs, request URL and extras.
 */
export function scrubEvent<T extends Event>(event: T): T {
    const target: Event = event;

    for (const exception of target.exception?.values ?? []) {
        if (exception.value) exception.value = scrubSensitiveData(exception.value);
        for (const frame of exception.stacktrace?.frames ?? []) {
            if (frame.filename) frame.filename = scrubSensitiveData(frame.filename);
        }
    }
    target.breadcrumbs?.forEach(scrubBreadcrumb);
    if (target.request?.url) target.request.url = scrubSensitiveData(target.request.url);
    if (target.extra) target.extra = scrubRecord(target.extra);

    return event;
}

// ==================== INITIALIZATION ====================

function isConfiguredDsn(dsn: string): boolean {
    return dsn.length > 0 && !dsn.startsWith('__');
}

/**
 * Starts Sentry once per process. Later calls return the current state.
 *
 * @returns true when reporting is active
 */
export function initErrorReporting(config: SentryConfig): boolean {
    if (sentryInitialized) return true;

    if (!isConfiguredDsn(config.dsn)) {
        logger.debug('No Sentry DSN configured; reporting to the local log only');
        return false;
    }

    try {
        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1,
            beforeSend: (event) => scrubEvent(event),
            beforeBreadcrumb: (breadcrumb) =>
                breadcrumb.category === 'console' && breadcrumb.level === 'debug' ? null : scrubBreadcrumb(breadcrumb),
        });
    } catch (error) {
        logger.warn('Sentry failed to start; reporting to the local log only', error);
        return false;
    }

    sentryInitialized = true;
    logger.info('Sentry initialized', { environment: config.environment, release: config.release });
    return true;
}

// ==================== ERROR REPORTING ====================

/**
 * Runs `capture` inside a Sentry scope tagged from `context`.
 * Does nothing until Sentry is initialized.
 */
function captureInScope(context: ErrorContext | undefined, what: string, capture: () => void): void {
    if (!sentryInitialized) return;

    try {
        Sentry.withScope((scope) => {
            if (context?.level) scope.setLevel(context.level);
            if (context?.module) scope.setTag('module', context.module);
            if (context?.operation) scope.setTag('operation', context.operation);
            if (context?.metadata) scope.setExtras(scrubRecord(context.metadata));
            if (context?.userMessage) scope.setExtra('user_message', context.userMessage);
            capture();
        });
    } catch (sentryError) {
        logger.warn(`Failed to report ${what} to Sentry:`, sentryError);
    }
}

/**
 * Reports an error: always to the local log, and to Sentry when enabled.
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const errorObj = typeof error === 'string' ? new Error(error) : error;
    logger.error(`[${context?.module ?? 'App'}] ${context?.operation ?? 'Error'}:`, errorObj.message);

    captureInScope(context, 'error', () => Sentry.captureException(errorObj));
}

/**
 * Reports a non-error event, such as a run that finished with warnings.
 */
export function reportMessage(
    message: string,
    level: SeverityLevel = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const text = `[${context?.module ?? 'App'}] ${message}`;
    if (level === 'error' || level === 'fatal') {
        logger.error(text);
    } else {
        logger.warn(text);
    }

    captureInScope({ ...context, level }, 'message', () => Sentry.captureMessage(scrubSensitiveData(message)));
}

/**
 * Leaves a scrubbed trail entry that later reports carry.
 */
export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    if (!sentryInitialized) return;

    Sentry.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a of `str` as lowercase hex.
 */
export function hashString(str: string): string {
    let hash = FNV_OFFSET_BASIS;
    for (let i = 0; i < str.length; i++) {
        hash = Math.imul(hash ^ str.charCodeAt(i), FNV_PRIME);
    }
    return (hash >>> 0).toString(16);
}

/**
 * Waits for queued events to be sent; call before the process exits.
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentryInitialized) return true;

    try {
        return await Sentry.flush(timeout);
    } catch (error) {
        logger.warn('Failed to flush error reports:', error);
        return false;
    }
}
