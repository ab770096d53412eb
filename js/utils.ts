/**
 * @fileoverview Shared helpers: the PayrollError type, input validation,
 * error classification, rounding, CSV text and date-key arithmetic.
 */

import { ERROR_MESSAGES, ERROR_TYPES, type ErrorType, type FriendlyError } from './constants.js';

// ==================== ERRORS ====================

/**
 * Error thrown when a run has to be aborted.
 * Carries the structured, user-friendly description alongside the usual stack.
 */
export class PayrollError extends Error {
    readonly friendly: FriendlyError;
    /** Index of the offending record, when one record is to blame */
    readonly recordIndex: number | null;

    constructor(message: string, type: ErrorType, recordIndex: number | null = null) {
        super(message);
        this.name = 'PayrollError';
        this.recordIndex = recordIndex;
        this.friendly = createUserFriendlyError(this, type);
    }

    get type(): string {
        return this.friendly.type;
    }
}

/**
 * Creates a validation error for a malformed record.
 * @param message - The error message.
 * @param recordIndex - Index of the offending record.
 */
export function createValidationError(message: string, recordIndex: number | null = null): PayrollError {
    return new PayrollError(message, ERROR_TYPES.VALIDATION, recordIndex);
}

/**
 * Creates an error for an inconsistent run configuration.
 */
export function createConfigurationError(message: string): PayrollError {
    return new PayrollError(message, ERROR_TYPES.CONFIGURATION);
}

// ==================== INPUT VALIDATION ====================

/**
 * Returns the trimmed value of a required text field.
 * @throws PayrollError (VALIDATION_ERROR) for a non-string or blank value.
 */
export function validateString(value: unknown, field: string, recordIndex: number | null = null): string {
    if (typeof value !== 'string') {
        throw createValidationError(`${field} must be a non-empty string`, recordIndex);
    }
    const text = value.trim();
    if (!text) {
        throw createValidationError(`${field} cannot be empty`, recordIndex);
    }
    return text;
}

/**
 * Returns a required calendar date in YYYY-MM-DD form.
 * @throws PayrollError (VALIDATION_ERROR) for anything else, 2025-02-30 included.
 */
export function validateDateKey(value: unknown, field: string, recordIndex: number | null = null): string {
    const dateKey = validateString(value, field, recordIndex);
    if (!IsoUtils.isDateKey(dateKey)) {
        throw createValidationError(`${field} must be a valid date (YYYY-MM-DD), got "${dateKey}"`, recordIndex);
    }
    return dateKey;
}

/**
 * Checks an inclusive date range such as the pay period.
 * @param context - Prefix for the error message, e.g. "Pay period".
 * @throws PayrollError (CONFIGURATION_ERROR) when a bound is missing or the range is inverted.
 */
export function validateDateRange(range: { start: string; end: string } | null | undefined, context: string): boolean {
    if (!range || !IsoUtils.isDateKey(range.start) || !IsoUtils.isDateKey(range.end)) {
        throw createConfigurationError(`${context} must have start and end dates (YYYY-MM-DD)`);
    }
    if (range.start > range.end) {
        throw createConfigurationError(`${context} starts after it ends (${range.start} > ${range.end})`);
    }
    return true;
}

// ==================== ERROR CLASSIFICATION ====================

const IO_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR', 'EPERM']);

/**
 * Maps any thrown value to one of the ERROR_TYPES.
 *
 * PayrollErrors keep their own type, file-system failures are IO errors and
 * unparsable JSON counts as invalid input.
 */
export function classifyError(error: unknown): ErrorType {
    if (error instanceof PayrollError) {
        return Object.values(ERROR_TYPES).find((type) => type === error.friendly.type) ?? ERROR_TYPES.UNKNOWN;
    }
    if (error instanceof Error && 'code' in error && typeof error.code === 'string' && IO_ERROR_CODES.has(error.code)) {
        return ERROR_TYPES.IO;
    }
    if (error instanceof SyntaxError) {
        return ERROR_TYPES.VALIDATION;
    }
    return ERROR_TYPES.UNKNOWN;
}

/**
 * Wraps an error with the title, message and suggested action shown to the
 * person running payroll.
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const original = typeof error === 'string' ? new Error(error) : error;
    const errorType = type ?? classifyError(original);
    const { title, message, action } = ERROR_MESSAGES[errorType];

    return {
        type: errorType,
        title,
        message,
        action,
        originalError: original,
        timestamp: new Date().toISOString(),
        stack: original.stack,
    };
}

// ==================== NUMBERS AND TEXT ====================

/**
 * Half-up rounding that absorbs binary drift (1.005 → 1.01 at 2 decimals).
 * Non-finite input rounds to 0.
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const factor = 10 ** decimals;
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Quotes a CSV field when it holds a quote, comma or line break.
 */
export function escapeCsv(value: unknown): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Hours as a fixed-decimal string, e.g. 8.5 → "8.50". Missing or NaN → "0.00".
 */
export function formatHoursDecimal(hours: number | null | undefined, decimals = 2): string {
    if (hours === null || hours === undefined || Number.isNaN(hours)) return (0).toFixed(decimals);
    return round(hours, decimals).toFixed(decimals);
}

/**
 * Dollars with two decimals, e.g. 59.2 → "59.20".
 */
export function formatAmount(amount: number): string {
    return round(amount, 2).toFixed(2);
}

/**
 * Stable sort: equal keys keep their relative order.
 */
export function stableSortBy<T>(items: readonly T[], compare: (a: T, b: T) => number): T[] {
    return items
        .map((item, position) => ({ item, position }))
        .sort((a, b) => compare(a.item, b.item) || a.position - b.position)
        .map(({ item }) => item);
}

/**
 * Compares two strings by code unit, independent of locale.
 */
export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

// ==================== DATE KEYS ====================

const MS_PER_HOUR = 60 * 60 * 1000;
const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar arithmetic on YYYY-MM-DD keys. Every Date here is UTC midnight,
 * so the host time zone never moves a day.
 */
export const IsoUtils = {
    toISODate(date: Date | null | undefined): string {
        if (!date) return '';
        return date.toISOString().slice(0, 10);
    },

    /** UTC midnight of the key, or null when it is not YYYY-MM-DD. */
    parseDate(dateKey: string | null | undefined): Date | null {
        if (!dateKey || !DATE_KEY_PATTERN.test(dateKey)) return null;
        const date = new Date(`${dateKey}T00:00:00Z`);
        return Number.isNaN(date.getTime()) ? null : date;
    },

    /** True for a real calendar date in YYYY-MM-DD form (rejects 2025-02-30). */
    isDateKey(value: unknown): value is string {
        if (typeof value !== 'string') return false;
        const date = IsoUtils.parseDate(value);
        return date !== null && IsoUtils.toISODate(date) === value;
    },

    /** Shifts a key by whole days; '' for an invalid key. */
    addDays(dateKey: string, days: number): string {
        const date = IsoUtils.parseDate(dateKey);
        if (!date) return '';
        date.setUTCDate(date.getUTCDate() + days);
        return IsoUtils.toISODate(date);
    },

    /** Inclusive range check. */
    isWithin(dateKey: string, start: string, end: string): boolean {
        return dateKey >= start && dateKey <= end;
    },

    hoursBetween(start: Date, end: Date): number {
        return (end.getTime() - start.getTime()) / MS_PER_HOUR;
    },
};
