import { describe, expect, it } from '@jest/globals';
import { calculatePayroll } from '../../js/calc.js';
import { buildPayrollCsv } from '../../js/export.js';
import { PayrollError } from '../../js/utils.js';
import { CLASSIFICATIONS, type OutputLine, type PayrollInput, type ShiftRecord } from '../../js/types.js';
import { dailyRecords } from '../helpers/records.js';

const PAY_PERIOD = { start: '2025-12-14', end: '2025-12-27' };
const CHRISTMAS = { date: '2025-12-25', lookbackStart: '2025-11-16', lookbackEnd: '2025-12-13', name: 'Christmas' };

function periodRecords(): ShiftRecord[] {
    return [
        ...dailyRecords('Alice', '2025-11-16', 25, 8),
        ...dailyRecords('Alice', '2025-12-14', 10, 8),
        { employeeId: 'Alice', date: '2025-12-24', startTime: '20:00', endTime: '04:00', duration: 8, rateCode: '20 Rate' },
        { employeeId: 'Alice', date: '2025-12-26', duration: 8, rateCode: '20 Rate' },
        { employeeId: 'Alice', date: '2025-12-27', duration: 2, rateCode: '20 Rate OT/ STAT' },
        { employeeId: 'Alice', date: '2025-12-20', duration: 0, rateCode: '20 Rate' },
        { employeeId: 'Bob', date: '2025-12-15', duration: 7.5, rateCode: 'Regular' },
        { employeeId: 'Bob', date: '2025-12-16', duration: 7.5, rateCode: 'Regular' },
    ];
}

function periodInput(records: ShiftRecord[] = periodRecords()): PayrollInput {
    return { records, payPeriod: PAY_PERIOD, holidays: [CHRISTMAS] };
}

/** Finished output fed back in as input rows */
function asRecords(lines: readonly OutputLine[]): ShiftRecord[] {
    return lines.map((line) => ({
        employeeId: line.employeeId,
        date: line.date,
        duration: line.hours,
        rateCode: line.rateCode,
        classification: line.classification,
    }));
}

describe('full pay-period run', () => {
    const result = calculatePayroll(periodInput());

    it('consolidates each employee into one line per rate-code', () => {
        expect(result.lines.map((line) => [line.employeeId, line.date, line.rateCode, line.hours, line.classification])).toEqual([
            ['Alice', '2025-12-14', '20 Rate', 88, CLASSIFICATIONS.REGULAR],
            ['Alice', '2025-12-14', '20 Rate OT/ STAT', 10, CLASSIFICATIONS.OVERTIME],
            ['Alice', '2025-12-25', 'PHP (Holiday)', 6.1, CLASSIFICATIONS.ENTITLEMENT],
            ['Bob', '2025-12-15', 'Regular', 15, CLASSIFICATIONS.REGULAR],
        ]);
    });

    it('reports run statistics', () => {
        expect(result.statistics).toEqual({
            employeesProcessed: 2,
            inputRows: 40,
            skippedRows: 1,
            outputLines: 4,
            regularHours: 103,
            overtimeHours: 4,
            statutoryHours: 4,
            entitlementHours: 6.1,
            passthroughHours: 2,
            reductionPercent: 90,
        });
        expect(result.warnings).toEqual([]);
    });

    it('splits union hours into the two pay-period weeks', () => {
        expect(result.unionLines).toEqual([
            {
                employeeId: 'Alice',
                week1Actual: 56,
                week1Payable: 44,
                week2Actual: 42,
                week2Payable: 42,
                totalPayable: 86,
                totalCost: 68.8,
            },
            {
                employeeId: 'Bob',
                week1Actual: 15,
                week1Payable: 15,
                week2Actual: 0,
                week2Payable: 0,
                totalPayable: 15,
                totalCost: 12,
            },
        ]);
    });

    it('writes the import file in line order', () => {
        expect(buildPayrollCsv(result.lines).split('\n').slice(1)).toEqual([
            'Alice,2025-12-14,TOTAL,Labor,20 Rate,88.00,,N,',
            'Alice,2025-12-14,TOTAL,Labor,20 Rate OT/ STAT,10.00,,N,',
            'Alice,2025-12-25,TOTAL,Labor,PHP (Holiday),6.10,,N,',
            'Bob,2025-12-15,TOTAL,Labor,Regular,15.00,,N,',
            '',
        ]);
    });

    it('does not depend on input order', () => {
        const reversed = calculatePayroll(periodInput(periodRecords().reverse()));

        expect(reversed.lines).toEqual(result.lines);
        expect(reversed.unionLines).toEqual(result.unionLines);
    });

    it('reproduces finished output when run again', () => {
        const finished = asRecords(result.lines);

        expect(calculatePayroll(periodInput(finished)).lines).toEqual(result.lines);
    });

    it('keeps finished lines unchanged when rerun with the lookback history', () => {
        const finished = asRecords(result.lines);
        const rerun = calculatePayroll(periodInput([...dailyRecords('Alice', '2025-11-16', 25, 8), ...finished]));

        expect(rerun.lines).toEqual(result.lines);
        expect(rerun.statistics.entitlementHours).toBe(6.1);
    });

    it('leaves lookback history out of the union weeks', () => {
        const records = [...dailyRecords('Dana', '2025-11-16', 28, 8), ...dailyRecords('Dana', '2025-12-14', 14, 5)];

        expect(calculatePayroll(periodInput(records)).unionLines).toEqual([
            {
                employeeId: 'Dana',
                week1Actual: 35,
                week1Payable: 35,
                week2Actual: 35,
                week2Payable: 35,
                totalPayable: 70,
                totalCost: 56,
            },
        ]);
    });

    it('rejects holidays outside the pay period', () => {
        const run = () =>
            calculatePayroll({
                records: periodRecords(),
                payPeriod: PAY_PERIOD,
                holidays: [{ date: '2026-01-01', lookbackStart: '2025-12-01', lookbackEnd: '2025-12-28' }],
            });

        expect(run).toThrow(PayrollError);
        expect(run).toThrow(
            'None of the configured holidays falls inside the pay period 2025-12-14 to 2025-12-27'
        );
    });
});
