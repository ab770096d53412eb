/**
 * @fileoverview Main Entry Point / Controller
 * Wraps the calculation engine with runtime setup, logging, breadcrumbs and
 * error reporting.
 *
 * ## Data Flow
 *
 * ```
 * PayrollInput
 *     │
 *     ▼
 * calculatePayroll()          (calc.ts, pure)
 *     │   ├─ createRunConfig / normalizeShiftRecords
 *     │   ├─ segmentShift → allocateEmployeeHours
 *     │   ├─ calculateHolidayEntitlement
 *     │   ├─ buildOutputLines
 *     │   └─ calculateUnionBenefits
 *     ▼
 * PayrollResult ──► buildPayrollCsv / buildUnionCsv (export.ts)
 * ```
 *
 * ## Key Functions
 * - `initRuntime()` - Applies environment settings (logging, Sentry)
 * - `runPayroll()` - One run with logging and error reporting
 */

import { calculatePayroll } from './calc.js';
import { loadRuntimeSettings, type RuntimeSettings } from './config.js';
import { addBreadcrumb, initErrorReporting, reportError, reportMessage } from './error-reporting.js';
import { configureLogger, createLogger, setLogLevel } from './logger.js';
import { PayrollError, classifyError } from './utils.js';
import type { PayrollInput, PayrollResult } from './types.js';

const logger = createLogger('Main');

/**
 * Applies process-level settings: log level, log format and error reporting.
 *
 * @returns Whether Sentry reporting is active.
 */
export function initRuntime(settings: RuntimeSettings = loadRuntimeSettings()): boolean {
    if (settings.logLevel !== null) {
        setLogLevel(settings.logLevel);
    }
    configureLogger({ timestamps: settings.logTimestamps });
    return initErrorReporting({
        dsn: settings.sentryDsn,
        environment: settings.environment,
        release: settings.release,
    });
}

/**
 * Runs one payroll classification.
 *
 * Failures are reported (locally and to Sentry when configured) and rethrown
 * so the caller decides how to exit.
 */
export function runPayroll(input: PayrollInput): PayrollResult {
    const recordCount = Array.isArray(input?.records) ? input.records.length : 0;
    addBreadcrumb('payroll', 'Run started', {
        records: recordCount,
        payPeriodStart: input?.payPeriod?.start,
        payPeriodEnd: input?.payPeriod?.end,
        holidays: input?.holidays?.length ?? 0,
    });
    logger.info(`Processing ${recordCount} records`);
    logger.time('calculatePayroll');

    try {
        const result = calculatePayroll(input);

        for (const warning of result.warnings) {
            logger.warn(warning);
        }
        // Warning texts name employees; only the count leaves the process.
        if (result.warnings.length > 0) {
            reportMessage(`Run finished with ${result.warnings.length} warning(s)`, 'warning', {
                module: 'Main',
                operation: 'runPayroll',
                metadata: { warnings: result.warnings.length },
            });
        }
        logger.info('Run complete', result.statistics);
        addBreadcrumb('payroll', 'Run complete', {
            outputLines: result.statistics.outputLines,
            employees: result.statistics.employeesProcessed,
        });
        return result;
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        reportError(err, {
            module: 'Main',
            operation: 'runPayroll',
            level: err instanceof PayrollError ? 'warning' : 'error',
            metadata: {
                errorType: classifyError(err),
                recordIndex: err instanceof PayrollError ? err.recordIndex : null,
            },
            userMessage: err instanceof PayrollError ? err.friendly.title : undefined,
        });
        throw err;
    } finally {
        logger.timeEnd('calculatePayroll');
    }
}
