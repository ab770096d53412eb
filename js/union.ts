/**
 * @fileoverview Union Benefit Calculator
 *
 * Weekly-capped union contribution per employee. The two weeks are split at
 * one global boundary (earliest row date + 6 days) shared by every employee.
 */

import { PAYROLL_CONSTANTS } from './constants.js';
import { IsoUtils, compareCodeUnits, round } from './utils.js';
import type { NormalizedRecord, UnionBenefitLine } from './types.js';

/**
 * Last date of week 1, or null when no row has a positive duration.
 */
export function unionWeekOneEnd(records: readonly NormalizedRecord[]): string | null {
    let earliest: string | null = null;
    for (const record of records) {
        if (!(record.duration > 0)) continue;
        if (earliest === null || record.date < earliest) earliest = record.date;
    }
    return earliest === null ? null : IsoUtils.addDays(earliest, PAYROLL_CONSTANTS.UNION_WEEK_DAYS - 1);
}

/**
 * Computes one union line per employee with positive-duration rows.
 *
 * Every row counts regardless of its classification: the contribution is
 * owed on hours present, whatever they were paid as.
 *
 * @example
 * // 50 hours in week 1, 30 in week 2
 * // → { week1Payable: 44, week2Payable: 30, totalPayable: 74, totalCost: 59.2 }
 */
export function calculateUnionBenefits(records: readonly NormalizedRecord[]): UnionBenefitLine[] {
    const week1End = unionWeekOneEnd(records);
    if (week1End === null) return [];

    const totals = new Map<string, { week1: number; week2: number }>();
    for (const record of records) {
        if (!(record.duration > 0)) continue;
        const entry = totals.get(record.employeeId) || { week1: 0, week2: 0 };
        if (record.date <= week1End) {
            entry.week1 += record.duration;
        } else {
            entry.week2 += record.duration;
        }
        totals.set(record.employeeId, entry);
    }

    const cap = PAYROLL_CONSTANTS.UNION_WEEKLY_CAP_HOURS;
    const decimals = PAYROLL_CONSTANTS.OUTPUT_DECIMALS;

    return [...totals.entries()]
        .sort(([a], [b]) => compareCodeUnits(a, b))
        .map(([employeeId, { week1, week2 }]) => {
            const week1Payable = Math.min(week1, cap);
            const week2Payable = Math.min(week2, cap);
            const totalPayable = week1Payable + week2Payable;
            return {
                employeeId,
                week1Actual: round(week1, decimals),
                week1Payable: round(week1Payable, decimals),
                week2Actual: round(week2, decimals),
                week2Payable: round(week2Payable, decimals),
                totalPayable: round(totalPayable, decimals),
                totalCost: round(totalPayable * PAYROLL_CONSTANTS.UNION_RATE_PER_HOUR, decimals),
            };
        });
}
