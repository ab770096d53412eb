/**
 * @fileoverview Output Aggregator
 *
 * Consolidates each employee's buckets into one line per (employee, rate-code).
 * This is the only place hours are rounded.
 */

import { OUTPUT_DEFAULTS, PAYROLL_CONSTANTS, RATE_CODE_LABELS } from './constants.js';
import { compareCodeUnits, round, stableSortBy } from './utils.js';
import {
    CLASSIFICATIONS,
    type Classification,
    type EmployeeBuckets,
    type HourBucket,
    type OutputLine,
    type RunConfig,
} from './types.js';

/**
 * Allocation result for one employee.
 */
export interface EmployeeAllocation {
    employeeId: string;
    /** Earliest in-period date with a positive duration */
    firstDate: string;
    buckets: EmployeeBuckets;
}

interface PendingLine {
    hours: number;
    classification: Classification;
}

/**
 * Orders lines by employee then rate-code, by code unit.
 */
export function compareOutputLines(a: OutputLine, b: OutputLine): number {
    return compareCodeUnits(a.employeeId, b.employeeId) || compareCodeUnits(a.rateCode, b.rateCode);
}

function mergeBucket(target: Map<string, PendingLine>, bucket: HourBucket, classification: Classification): void {
    for (const [code, hours] of bucket) {
        const existing = target.get(code);
        if (existing) {
            existing.hours += hours;
        } else {
            target.set(code, { hours, classification });
        }
    }
}

function createLine(
    employeeId: string,
    date: string,
    rateCode: string,
    pending: PendingLine,
    config: RunConfig
): OutputLine {
    return {
        employeeId,
        date,
        customer: config.customer,
        serviceItem: config.serviceItem,
        rateCode,
        hours: round(pending.hours, PAYROLL_CONSTANTS.OUTPUT_DECIMALS),
        classification: pending.classification,
        className: OUTPUT_DEFAULTS.CLASS_NAME,
        billable: OUTPUT_DEFAULTS.BILLABLE,
        notes: OUTPUT_DEFAULTS.NOTES,
    };
}

/**
 * Builds the consolidated, sorted output lines.
 *
 * Hours under the same label from several buckets are summed; the line keeps
 * the classification of the first bucket that used the label (regular,
 * overtime, statutory, passthrough). A finished "PHP (Holiday)" line is kept
 * as it is and computed hours are never added to it. PHP lines take the PHP
 * date, so a rerun over finished output reproduces them.
 *
 * @param allocations - Per-employee buckets from the allocator.
 * @param entitlements - Employee → positive PHP hours.
 * @param phpDate - Date for PHP lines. Null only when no holiday is
 *   configured, in which case `entitlements` is empty and a finished PHP
 *   line keeps the employee's first date.
 */
export function buildOutputLines(
    allocations: readonly EmployeeAllocation[],
    entitlements: ReadonlyMap<string, number>,
    phpDate: string | null,
    config: RunConfig
): OutputLine[] {
    const lines: OutputLine[] = [];
    const allocated = new Set<string>();

    for (const { employeeId, firstDate, buckets } of allocations) {
        allocated.add(employeeId);

        const pending = new Map<string, PendingLine>();
        mergeBucket(pending, buckets.regular, CLASSIFICATIONS.REGULAR);
        mergeBucket(pending, buckets.overtime, CLASSIFICATIONS.OVERTIME);
        mergeBucket(pending, buckets.statutory, CLASSIFICATIONS.STATUTORY);
        for (const [code, entry] of buckets.passthrough) {
            const existing = pending.get(code);
            if (existing) {
                existing.hours += entry.hours;
            } else {
                pending.set(code, { hours: entry.hours, classification: entry.classification });
            }
        }

        const entitlementHours = entitlements.get(employeeId) || 0;
        if (entitlementHours > 0 && phpDate !== null && !pending.has(RATE_CODE_LABELS.PHP)) {
            mergeBucket(pending, new Map([[RATE_CODE_LABELS.PHP, entitlementHours]]), CLASSIFICATIONS.ENTITLEMENT);
        }

        for (const [code, entry] of pending) {
            const date = phpDate !== null && code === RATE_CODE_LABELS.PHP ? phpDate : firstDate;
            lines.push(createLine(employeeId, date, code, entry, config));
        }
    }

    // Employees who only earned PHP from the lookback window.
    if (phpDate !== null) {
        for (const [employeeId, hours] of entitlements) {
            if (allocated.has(employeeId) || !(hours > 0)) continue;
            lines.push(
                createLine(
                    employeeId,
                    phpDate,
                    RATE_CODE_LABELS.PHP,
                    { hours, classification: CLASSIFICATIONS.ENTITLEMENT },
                    config
                )
            );
        }
    }

    return stableSortBy(lines, compareOutputLines);
}
