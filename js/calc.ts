/**
 * @fileoverview Calculation Engine - Payroll Hour Classification
 *
 * This module implements the core business logic of the payroll finisher.
 * It is completely side-effect free: no file access, no logging, no network.
 * All calculations are deterministic - the same inputs produce the same
 * outputs regardless of input order.
 *
 * ## Module Responsibility
 * - Segment shifts at calendar midnight (via segmenter.ts)
 * - Allocate each employee's hours to regular, overtime and statutory-premium
 *   buckets against the biweekly threshold
 * - Pass already-finished OT/STAT/PHP lines through untouched
 * - Hand the buckets, the PHP entitlement and the union report to their
 *   builders and collect run statistics
 *
 * ## Data Flow
 * Input: PayrollInput (records, pay period, holidays, optional time details)
 * Processing:
 *   1. Validate configuration and normalize records (private copies)
 *   2. Drop zero/missing-duration rows
 *   3. Group pay-period rows by employee, segment each shift
 *   4. Sort each employee's segments by date and allocate (threshold algorithm)
 *   5. Compute PHP entitlement over the lookback windows (entitlement.ts)
 *   6. Consolidate into one line per (employee, rate-code) (aggregate.ts)
 *   7. Compute the union report over the pay period (union.ts)
 * Output: PayrollResult (lines, statistics, unionLines, warnings)
 *
 * ## Threshold Algorithm
 * For each employee, segments are processed in ascending date order (ties
 * keep input order) with a local accumulator starting at 0:
 *   - Statutory segment: all hours to the statutory bucket under the
 *     overtime label; accumulator unchanged
 *   - accumulator + hours <= 88: all regular
 *   - accumulator >= 88: all overtime
 *   - otherwise: split at 88
 *   - accumulator += hours (non-statutory only)
 *
 * @see allocateEmployeeHours - The threshold algorithm
 * @see calculatePayroll - Main entry point
 */

import { buildOutputLines, type EmployeeAllocation } from './aggregate.js';
import { createRunConfig } from './config.js';
import { PAYROLL_CONSTANTS, RATE_CODE_LABELS } from './constants.js';
import { calculateHolidayEntitlement, selectPhpLineDate } from './entitlement.js';
import { buildTimeDetailLookup, normalizeShiftRecords } from './normalize.js';
import { isWorkedClassification, overtimeVariant } from './rate-codes.js';
import { segmentShift } from './segmenter.js';
import { calculateUnionBenefits } from './union.js';
import { IsoUtils, createValidationError, round, stableSortBy } from './utils.js';
import {
    CLASSIFICATIONS,
    type EmployeeBuckets,
    type HourBucket,
    type NormalizedRecord,
    type OutputLine,
    type PayrollInput,
    type PayrollResult,
    type RunStatistics,
    type SegmentedHours,
} from './types.js';

// ============================================================================
// SEGMENTATION
// ============================================================================

/**
 * Splits records into dated segments ready for allocation.
 *
 * Worked rows go through the midnight segmenter. Already-finished rows are
 * kept whole on their nominal date: they are never re-split.
 */
export function segmentRecords(
    records: readonly NormalizedRecord[],
    statutoryDates: ReadonlySet<string>
): SegmentedHours[] {
    const segmented: SegmentedHours[] = [];

    for (const record of records) {
        if (!(record.duration > 0)) continue;

        if (!isWorkedClassification(record.classification)) {
            segmented.push({
                date: record.date,
                hours: record.duration,
                isStatutory: false,
                recordIndex: record.index,
                segmentIndex: 0,
                rateCode: record.rateCode,
                classification: record.classification,
            });
            continue;
        }

        const segments = segmentShift(
            record.date,
            record.startTime,
            record.endTime,
            record.duration,
            statutoryDates
        );
        segments.forEach((segment, segmentIndex) => {
            segmented.push({
                ...segment,
                recordIndex: record.index,
                segmentIndex,
                rateCode: record.rateCode,
                classification: record.classification,
            });
        });
    }

    return segmented;
}

// ============================================================================
// ALLOCATION
// ============================================================================

function addHours(bucket: HourBucket, code: string, hours: number): void {
    bucket.set(code, (bucket.get(code) || 0) + hours);
}

/**
 * Creates an empty set of buckets.
 */
export function createEmptyBuckets(): EmployeeBuckets {
    return {
        regular: new Map(),
        overtime: new Map(),
        statutory: new Map(),
        passthrough: new Map(),
    };
}

/**
 * Allocates one employee's segments to regular, overtime, statutory-premium
 * and passthrough buckets.
 *
 * The segments are sorted here, so callers may pass them in any order.
 * Buckets hold unrounded hours; rounding happens when lines are built.
 *
 * @param segments - One employee's segmented hours.
 * @param threshold - Cumulative regular hours before overtime starts.
 *
 * @example
 * // 85 hours already worked, then a 10-hour shift
 * allocateEmployeeHours([...eightyFive, tenHourShift])
 * // → regular '20 Rate': 88, overtime '20 Rate OT/ STAT': 7
 */
export function allocateEmployeeHours(
    segments: readonly SegmentedHours[],
    threshold: number = PAYROLL_CONSTANTS.OVERTIME_THRESHOLD_HOURS
): EmployeeBuckets {
    const buckets = createEmptyBuckets();

    const ordered = stableSortBy(segments, (a, b) => {
        if (a.date !== b.date) return a.date < b.date ? -1 : 1;
        if (a.recordIndex !== b.recordIndex) return a.recordIndex - b.recordIndex;
        return a.segmentIndex - b.segmentIndex;
    });

    let cumulative = 0;

    for (const segment of ordered) {
        const hours = segment.hours;
        if (!(hours > 0)) continue;

        // Already-finished data: keep the label, never re-split.
        if (!isWorkedClassification(segment.classification)) {
            const existing = buckets.passthrough.get(segment.rateCode);
            buckets.passthrough.set(segment.rateCode, {
                hours: (existing?.hours || 0) + hours,
                classification: existing?.classification ?? segment.classification,
            });
            continue;
        }

        if (segment.isStatutory) {
            addHours(buckets.statutory, overtimeVariant(segment.rateCode), hours);
            continue;
        }

        if (cumulative + hours <= threshold) {
            addHours(buckets.regular, segment.rateCode, hours);
        } else if (cumulative >= threshold) {
            addHours(buckets.overtime, overtimeVariant(segment.rateCode), hours);
        } else {
            const regularPortion = threshold - cumulative;
            addHours(buckets.regular, segment.rateCode, regularPortion);
            addHours(buckets.overtime, overtimeVariant(segment.rateCode), hours - regularPortion);
        }

        cumulative += hours;
    }

    return buckets;
}

// ============================================================================
// STATISTICS
// ============================================================================

function sumBucket(bucket: HourBucket): number {
    let total = 0;
    for (const hours of bucket.values()) total += hours;
    return total;
}

function buildStatistics(
    allocations: readonly EmployeeAllocation[],
    entitlements: ReadonlyMap<string, number>,
    lines: readonly OutputLine[],
    inputRows: number,
    skippedRows: number
): RunStatistics {
    let regularHours = 0;
    let overtimeHours = 0;
    let statutoryHours = 0;
    let entitlementHours = 0;
    let passthroughHours = 0;

    for (const { buckets } of allocations) {
        regularHours += sumBucket(buckets.regular);
        overtimeHours += sumBucket(buckets.overtime);
        statutoryHours += sumBucket(buckets.statutory);
        for (const { hours, classification } of buckets.passthrough.values()) {
            if (classification === CLASSIFICATIONS.ENTITLEMENT) {
                entitlementHours += hours;
            } else {
                passthroughHours += hours;
            }
        }
    }
    for (const hours of entitlements.values()) {
        entitlementHours += hours;
    }

    const employeesProcessed = new Set(lines.map((line) => line.employeeId)).size;
    const reductionPercent = inputRows > 0 ? round(100 - (lines.length / inputRows) * 100, 2) : 0;

    return {
        employeesProcessed,
        inputRows,
        skippedRows,
        outputLines: lines.length,
        regularHours: round(regularHours, 2),
        overtimeHours: round(overtimeHours, 2),
        statutoryHours: round(statutoryHours, 2),
        entitlementHours: round(entitlementHours, 2),
        passthroughHours: round(passthroughHours, 2),
        reductionPercent,
    };
}

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Runs the full classification over one pay period.
 *
 * ## Steps
 * 1. Configuration is validated first; inconsistent settings abort the run.
 * 2. Records are normalized into private copies; a malformed record aborts
 *    the run with its index in the message.
 * 3. Rows with a missing or zero duration are dropped from everything.
 * 4. Pay-period rows are segmented and allocated per employee.
 * 5. PHP entitlement is computed from all rows (lookback windows usually
 *    precede the pay period). An employee whose input already holds a
 *    finished PHP line gets no second one.
 * 6. The union report is computed from the pay-period rows.
 *
 * @param input - Records and configuration.
 * @returns Consolidated lines sorted by employee then rate-code, statistics,
 *   union lines and non-fatal warnings.
 * @throws PayrollError on a structural or configuration problem.
 *
 * @example
 * const result = calculatePayroll({
 *   records,
 *   payPeriod: { start: '2025-12-14', end: '2025-12-27' },
 *   holidays: [{ date: '2025-12-25', lookbackStart: '2025-11-16', lookbackEnd: '2025-12-13' }],
 * });
 */
export function calculatePayroll(input: PayrollInput): PayrollResult {
    if (typeof input !== 'object' || input === null) {
        throw createValidationError('Payroll input must be an object');
    }
    const config = createRunConfig(input.payPeriod, input.holidays, input.options);
    const timeLookup = buildTimeDetailLookup(input.timeDetails);
    const records = normalizeShiftRecords(input.records, timeLookup);

    const qualifying = records.filter((record) => record.duration > 0);
    const skippedRows = records.length - qualifying.length;

    // Lookback history feeds the entitlement only.
    const inPeriod = qualifying.filter((record) =>
        IsoUtils.isWithin(record.date, config.payPeriod.start, config.payPeriod.end)
    );

    // === GROUP PAY-PERIOD ROWS BY EMPLOYEE ===
    const byEmployee = new Map<string, NormalizedRecord[]>();
    for (const record of inPeriod) {
        const list = byEmployee.get(record.employeeId) || [];
        list.push(record);
        byEmployee.set(record.employeeId, list);
    }

    // === ALLOCATE PER EMPLOYEE ===
    const allocations: EmployeeAllocation[] = [];
    for (const [employeeId, employeeRecords] of byEmployee) {
        const segments = segmentRecords(employeeRecords, config.statutoryDates);
        const firstDate = employeeRecords.reduce(
            (earliest, record) => (record.date < earliest ? record.date : earliest),
            employeeRecords[0].date
        );
        allocations.push({ employeeId, firstDate, buckets: allocateEmployeeHours(segments) });
    }

    // === ENTITLEMENT ===
    const entitlementResult = calculateHolidayEntitlement(qualifying, config.holidays);
    const phpDate = selectPhpLineDate(config.holidays, config.payPeriod);
    // A finished PHP line already carries the entitlement; it stays as it is.
    const finishedPhp = new Set(
        allocations
            .filter(({ buckets }) => buckets.passthrough.has(RATE_CODE_LABELS.PHP))
            .map(({ employeeId }) => employeeId)
    );
    const entitlements = new Map<string, number>();
    for (const [employeeId, summary] of entitlementResult.byEmployee) {
        if (summary.totalHours > 0 && !finishedPhp.has(employeeId)) {
            entitlements.set(employeeId, summary.totalHours);
        }
    }

    const lines = buildOutputLines(allocations, entitlements, phpDate, config);
    const unionLines = calculateUnionBenefits(inPeriod);

    return {
        lines,
        statistics: buildStatistics(allocations, entitlements, lines, qualifying.length, skippedRows),
        unionLines,
        warnings: entitlementResult.warnings,
    };
}
