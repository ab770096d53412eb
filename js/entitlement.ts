/**
 * @fileoverview Holiday Entitlement Calculator (PHP)
 *
 * Public holiday pay is derived from what an employee earned over a lookback
 * window before the holiday, not from hours worked on the holiday itself.
 *
 * ## Formula (per holiday)
 * 1. Worked rows (UNCLASSIFIED/REGULAR) dated inside the lookback window
 * 2. hours = min(sum, 176)
 * 3. rate = rate of the most frequent rate-code (ties: first occurrence)
 * 4. wages = hours × rate
 * 5. dollars = wages × (1 + vacation) / 20, vacation = highest note percentage
 * 6. entitlement hours = dollars / 30
 *
 * An employee with no rows in a window contributes 0 for that holiday.
 */

import { PAYROLL_CONSTANTS } from './constants.js';
import { isWorkedClassification, rateFor } from './rate-codes.js';
import { IsoUtils } from './utils.js';
import { maxVacationPercent } from './vacation.js';
import type { DateRange, HolidayEntitlement, NormalizedRecord, StatutoryHolidayConfig } from './types.js';

/**
 * One employee's entitlement across every configured holiday.
 */
export interface EmployeeEntitlementSummary {
    /** Sum of the per-holiday hours, unrounded */
    totalHours: number;
    holidays: HolidayEntitlement[];
}

export interface EntitlementResult {
    byEmployee: Map<string, EmployeeEntitlementSummary>;
    /** Notices about qualifying hours that could not be priced */
    warnings: string[];
}

/**
 * Most frequent rate-code among the rows; the earliest row wins a tie.
 */
export function representativeRateCode(records: readonly NormalizedRecord[]): string | null {
    const counts = new Map<string, number>();
    for (const record of records) {
        counts.set(record.rateCode, (counts.get(record.rateCode) || 0) + 1);
    }

    let best: string | null = null;
    let bestCount = 0;
    // Map iteration follows first insertion, so a strict > keeps the first on ties.
    for (const [code, count] of counts) {
        if (count > bestCount) {
            best = code;
            bestCount = count;
        }
    }
    return best;
}

function emptyEntitlement(holidayDate: string): HolidayEntitlement {
    return {
        holidayDate,
        qualifyingHours: 0,
        cappedHours: 0,
        rate: 0,
        wages: 0,
        vacationPercent: PAYROLL_CONSTANTS.DEFAULT_VACATION_PERCENT,
        dollars: 0,
        hours: 0,
    };
}

/**
 * Entitlement of one employee for one holiday.
 *
 * @param records - That employee's rows, in input order.
 *
 * @example
 * // 200 hours of '20 Rate' in the window, no vacation note
 * calculateEmployeeEntitlement(rows, holiday)
 * // → { cappedHours: 176, rate: 20, wages: 3520, dollars: 183.04, hours: 6.1013... }
 */
export function calculateEmployeeEntitlement(
    records: readonly NormalizedRecord[],
    holiday: StatutoryHolidayConfig
): HolidayEntitlement {
    const qualifying = records.filter(
        (record) =>
            record.duration > 0 &&
            isWorkedClassification(record.classification) &&
            IsoUtils.isWithin(record.date, holiday.lookbackStart, holiday.lookbackEnd)
    );
    if (qualifying.length === 0) return emptyEntitlement(holiday.date);

    const qualifyingHours = qualifying.reduce((sum, record) => sum + record.duration, 0);
    const cappedHours = Math.min(qualifyingHours, PAYROLL_CONSTANTS.ENTITLEMENT_HOURS_CAP);
    const rate = rateFor(representativeRateCode(qualifying));
    const wages = cappedHours * rate;
    const vacationPercent = maxVacationPercent(qualifying.map((record) => record.note));
    const dollars = (wages * (1 + vacationPercent)) / PAYROLL_CONSTANTS.ENTITLEMENT_DIVISOR;

    return {
        holidayDate: holiday.date,
        qualifyingHours,
        cappedHours,
        rate,
        wages,
        vacationPercent,
        dollars,
        hours: dollars / PAYROLL_CONSTANTS.ENTITLEMENT_HOURLY_RATE,
    };
}

/**
 * Entitlement of every employee for every configured holiday.
 *
 * Only employees with at least one row appear in the map; those with no
 * rows in any window get a zero total.
 */
export function calculateHolidayEntitlement(
    records: readonly NormalizedRecord[],
    holidays: readonly StatutoryHolidayConfig[]
): EntitlementResult {
    const byEmployee = new Map<string, EmployeeEntitlementSummary>();
    const warnings: string[] = [];
    if (holidays.length === 0) return { byEmployee, warnings };

    const grouped = new Map<string, NormalizedRecord[]>();
    for (const record of records) {
        const list = grouped.get(record.employeeId) || [];
        list.push(record);
        grouped.set(record.employeeId, list);
    }

    for (const [employeeId, employeeRecords] of grouped) {
        const perHoliday = holidays.map((holiday) => calculateEmployeeEntitlement(employeeRecords, holiday));

        for (const entry of perHoliday) {
            if (entry.cappedHours > 0 && entry.rate === 0) {
                warnings.push(
                    `${employeeId}: no hourly rate for lookback hours before ${entry.holidayDate}; entitlement is 0`
                );
            }
        }

        byEmployee.set(employeeId, {
            totalHours: perHoliday.reduce((sum, entry) => sum + entry.hours, 0),
            holidays: perHoliday,
        });
    }

    return { byEmployee, warnings };
}

/**
 * Date written on PHP lines: the earliest configured holiday inside the pay
 * period, or null when there is none.
 */
export function selectPhpLineDate(
    holidays: readonly StatutoryHolidayConfig[],
    payPeriod: DateRange
): string | null {
    let earliest: string | null = null;
    for (const holiday of holidays) {
        if (!IsoUtils.isWithin(holiday.date, payPeriod.start, payPeriod.end)) continue;
        if (earliest === null || holiday.date < earliest) earliest = holiday.date;
    }
    return earliest;
}
