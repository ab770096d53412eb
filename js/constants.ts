/**
 * @fileoverview Application Constants
 * Business constants, fixed labels and error message configuration shared
 * across the payroll finisher.
 */

import type { FriendlyError } from './types.js';

// ==================== ERROR TRACKING ====================

/**
 * Environment variable holding the Sentry DSN.
 * Leave unset to disable error reporting.
 */
export const SENTRY_DSN_ENV = 'PAYROLL_SENTRY_DSN';

/**
 * Environment variables read by the runtime configuration.
 */
export const ENV_KEYS = {
    /** Sentry DSN */
    SENTRY_DSN: SENTRY_DSN_ENV,
    /** Sentry environment name */
    SENTRY_ENVIRONMENT: 'PAYROLL_SENTRY_ENVIRONMENT',
    /** Debug flag ("true" enables DEBUG logging) */
    DEBUG: 'PAYROLL_DEBUG',
    /** Explicit log level (debug, info, warn, error, none) */
    LOG_LEVEL: 'PAYROLL_LOG_LEVEL',
    /** "false" drops the timestamp prefix from log lines */
    LOG_TIMESTAMPS: 'PAYROLL_LOG_TIMESTAMPS',
} as const;

// ==================== PAYROLL CONSTANTS ====================

/**
 * Fixed business rules.
 */
export const PAYROLL_CONSTANTS = {
    /** Cumulative regular hours per biweekly period before overtime starts. */
    OVERTIME_THRESHOLD_HOURS: 88,
    /** Ceiling on entitlement-eligible hours (two full biweekly periods). */
    ENTITLEMENT_HOURS_CAP: 176,
    /** Pay periods represented by a lookback window. */
    ENTITLEMENT_DIVISOR: 20,
    /** Dollars per PHP hour. */
    ENTITLEMENT_HOURLY_RATE: 30,
    /** Vacation percentage when no note says otherwise. */
    DEFAULT_VACATION_PERCENT: 0.04,
    /** Hourly rate of the "Regular" rate code. */
    REGULAR_HOURLY_RATE: 17.6,
    /** Weekly cap on union-payable hours. */
    UNION_WEEKLY_CAP_HOURS: 44,
    /** Union contribution per payable hour. */
    UNION_RATE_PER_HOUR: 0.8,
    /** Days in a union week. */
    UNION_WEEK_DAYS: 7,
    /** Decimal places of output hours and amounts. */
    OUTPUT_DECIMALS: 2,
} as const;

/**
 * Exact labels matched by downstream consumers. Whitespace is significant.
 */
export const RATE_CODE_LABELS = {
    REGULAR: 'Regular',
    REGULAR_OVERTIME: 'Hourly Overtime /STAT',
    SPECIAL_RATE_VALUE: '21.75',
    SPECIAL_RATE_OVERTIME: '21.75 Rate OT/STAT',
    OVERTIME_SUFFIX: ' OT/ STAT',
    PHP: 'PHP (Holiday)',
} as const;

/**
 * Suffixes stripped before an overtime suffix is appended.
 */
export const EXISTING_OVERTIME_SUFFIXES = [' OT/  STAT', ' OT/ STAT', ' OT/STAT'] as const;

/**
 * Default markers written on every output line.
 */
export const OUTPUT_DEFAULTS = {
    CUSTOMER: 'TOTAL',
    SERVICE_ITEM: 'Labor',
    CLASS_NAME: '',
    BILLABLE: 'N',
    NOTES: '',
} as const;

/**
 * Column headers of the payroll import file.
 */
export const PAYROLL_CSV_HEADERS = [
    'Name',
    'Transaction Date',
    'Customer',
    'Service Item',
    'Payroll Item',
    'Duration',
    'Class',
    'Billable',
    'Notes',
] as const;

/**
 * Column headers of the union contribution report.
 */
export const UNION_CSV_HEADERS = [
    'Name',
    'Week 1 Hours',
    'Week 1 Payable',
    'Week 2 Hours',
    'Week 2 Payable',
    'Total Payable',
    'Total Cost',
] as const;

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    VALIDATION: 'VALIDATION_ERROR',
    CONFIGURATION: 'CONFIGURATION_ERROR',
    IO: 'IO_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: FriendlyError['action'];
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.VALIDATION]: {
        title: 'Invalid Shift Record',
        message: 'A shift record is missing a required field. Fix the export and run again.',
        action: 'fix-input',
    },
    [ERROR_TYPES.CONFIGURATION]: {
        title: 'Invalid Run Configuration',
        message: 'The pay period or holiday settings are inconsistent.',
        action: 'fix-config',
    },
    [ERROR_TYPES.IO]: {
        title: 'File Error',
        message: 'The input file could not be read or the output could not be written.',
        action: 'fix-input',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred while finishing the payroll.',
        action: 'none',
    },
};

// Re-export types for convenience
export type { FriendlyError };
