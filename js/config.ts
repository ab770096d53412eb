/**
 * @fileoverview Run Configuration
 *
 * Validates the caller's pay period, holiday list and output options into a
 * RunConfig, and reads process-level settings (logging, error reporting) from
 * the environment.
 *
 * ## Validation
 * - Pay period: both dates present, start <= end
 * - Each holiday: valid date, lookback window start <= end
 * - When holidays are configured, at least one must fall inside the pay
 *   period, since PHP lines are dated to the earliest in-period holiday
 *
 * Failures throw a CONFIGURATION_ERROR before any record is processed.
 */

import { ENV_KEYS, OUTPUT_DEFAULTS } from './constants.js';
import { LogLevel, parseLogLevel } from './logger.js';
import { IsoUtils, createConfigurationError, validateDateRange } from './utils.js';
import type { DateRange, OutputOptions, RunConfig, StatutoryHolidayConfig } from './types.js';

/**
 * Process-level settings read from the environment.
 */
export interface RuntimeSettings {
    /** Sentry DSN; empty disables error reporting */
    sentryDsn: string;
    /** Sentry environment name */
    environment: string;
    /** Application version reported to Sentry */
    release: string;
    /** Explicit log level, if one was configured */
    logLevel: LogLevel | null;
    /** Prefix log lines with a timestamp */
    logTimestamps: boolean;
}

/**
 * Reads runtime settings from an environment map (defaults to process.env).
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
    const explicitLevel = parseLogLevel(env[ENV_KEYS.LOG_LEVEL]);
    return {
        sentryDsn: (env[ENV_KEYS.SENTRY_DSN] || '').trim(),
        environment: env[ENV_KEYS.SENTRY_ENVIRONMENT] || env.NODE_ENV || 'development',
        release: env.npm_package_version || 'unknown',
        logLevel: explicitLevel ?? (env[ENV_KEYS.DEBUG] === 'true' ? LogLevel.DEBUG : null),
        logTimestamps: env[ENV_KEYS.LOG_TIMESTAMPS] !== 'false',
    };
}

function validateHoliday(holiday: StatutoryHolidayConfig, position: number): StatutoryHolidayConfig {
    const context = `Holiday ${position}`;
    if (!holiday || !IsoUtils.isDateKey(holiday.date)) {
        throw createConfigurationError(`${context} must have a valid date (YYYY-MM-DD)`);
    }
    validateDateRange({ start: holiday.lookbackStart, end: holiday.lookbackEnd }, `${context} (${holiday.date}) lookback window`);
    return {
        date: holiday.date,
        lookbackStart: holiday.lookbackStart,
        lookbackEnd: holiday.lookbackEnd,
        ...(holiday.name ? { name: holiday.name } : {}),
    };
}

/**
 * Builds a validated RunConfig.
 *
 * @throws PayrollError (CONFIGURATION_ERROR) on inconsistent settings.
 */
export function createRunConfig(
    payPeriod: DateRange,
    holidays: readonly StatutoryHolidayConfig[] = [],
    options: OutputOptions = {}
): RunConfig {
    validateDateRange(payPeriod, 'Pay period');

    if (!Array.isArray(holidays)) {
        throw createConfigurationError('Holidays must be an array');
    }
    const validated = holidays.map(validateHoliday);

    if (
        validated.length > 0 &&
        !validated.some((holiday) => IsoUtils.isWithin(holiday.date, payPeriod.start, payPeriod.end))
    ) {
        throw createConfigurationError(
            `None of the configured holidays falls inside the pay period ${payPeriod.start} to ${payPeriod.end}`
        );
    }

    return {
        payPeriod: { start: payPeriod.start, end: payPeriod.end },
        holidays: validated,
        statutoryDates: new Set(validated.map((holiday) => holiday.date)),
        customer: options.customer ?? OUTPUT_DEFAULTS.CUSTOMER,
        serviceItem: options.serviceItem ?? OUTPUT_DEFAULTS.SERVICE_ITEM,
    };
}
