/**
 * @fileoverview Export Module
 * Serializes payroll lines and the union report to CSV text.
 * Includes security measures against CSV injection.
 */

import { PAYROLL_CSV_HEADERS, UNION_CSV_HEADERS } from './constants.js';
import { escapeCsv, formatAmount, formatHoursDecimal } from './utils.js';
import type { OutputLine, UnionBenefitLine } from './types.js';

/**
 * Sanitizes a string to prevent CSV formula injection.
 * If a field starts with =, +, -, @, tab, or carriage return, Excel/Sheets might execute it.
 * We prepend a single quote to force it to be treated as text.
 *
 * @param str - The string to sanitize.
 * @returns Sanitized string safe for CSV.
 */
export function sanitizeFormulaInjection(str: string | null | undefined): string {
    if (!str) return '';
    const value = String(str);
    if (/^[=+\-@\t\r]/.test(value)) {
        return "'" + value;
    }
    return value;
}

function textCell(value: string): string {
    return escapeCsv(sanitizeFormulaInjection(value));
}

function toCsv(headers: readonly string[], rows: string[][]): string {
    return [headers.join(','), ...rows.map((row) => row.join(','))].join('\n') + '\n';
}

/**
 * Builds the payroll import file, one row per output line, in the given order.
 *
 * @example
 * buildPayrollCsv([line])
 * // Name,Transaction Date,Customer,Service Item,Payroll Item,Duration,Class,Billable,Notes
 * // Alice,2025-12-14,TOTAL,Labor,20 Rate,88.00,,N,
 */
export function buildPayrollCsv(lines: readonly OutputLine[]): string {
    const rows = lines.map((line) => [
        textCell(line.employeeId),
        line.date,
        textCell(line.customer),
        textCell(line.serviceItem),
        textCell(line.rateCode),
        formatHoursDecimal(line.hours),
        textCell(line.className),
        line.billable,
        textCell(line.notes),
    ]);
    return toCsv(PAYROLL_CSV_HEADERS, rows);
}

/**
 * Builds the union contribution report.
 */
export function buildUnionCsv(lines: readonly UnionBenefitLine[]): string {
    const rows = lines.map((line) => [
        textCell(line.employeeId),
        formatHoursDecimal(line.week1Actual),
        formatHoursDecimal(line.week1Payable),
        formatHoursDecimal(line.week2Actual),
        formatHoursDecimal(line.week2Payable),
        formatHoursDecimal(line.totalPayable),
        formatAmount(line.totalCost),
    ]);
    return toCsv(UNION_CSV_HEADERS, rows);
}
