import { beforeAll, describe, expect, it, jest } from '@jest/globals';
import { addBreadcrumb, initErrorReporting, reportError, reportMessage } from '../../js/error-reporting.js';
import { LogLevel, formatMessage, setLogLevel } from '../../js/logger.js';
import { initRuntime, runPayroll } from '../../js/main.js';
import { PayrollError } from '../../js/utils.js';

jest.mock('../../js/error-reporting.js');

const PERIOD = { start: '2025-12-14', end: '2025-12-27' };

beforeAll(() => {
    setLogLevel(LogLevel.NONE);
});

describe('initRuntime', () => {
    it('applies the log settings and passes the DSN on', () => {
        const active = initRuntime({
            sentryDsn: '',
            environment: 'test',
            release: '1.0.0',
            logLevel: LogLevel.NONE,
            logTimestamps: false,
        });

        expect(active).toBe(false);
        expect(initErrorReporting).toHaveBeenCalledWith({ dsn: '', environment: 'test', release: '1.0.0' });
        expect(formatMessage(LogLevel.INFO, 'Main', 'hello')).toBe('[INFO] [Main] hello');
    });
});

describe('runPayroll', () => {
    it('returns the engine result and leaves breadcrumbs', () => {
        const result = runPayroll({
            records: [{ employeeId: 'Alice', date: '2025-12-15', duration: 8, rateCode: 'Regular' }],
            payPeriod: PERIOD,
        });

        expect(result.lines.map((line) => [line.employeeId, line.rateCode, line.hours])).toEqual([['Alice', 'Regular', 8]]);
        expect(addBreadcrumb).toHaveBeenCalledWith('payroll', 'Run started', {
            records: 1,
            payPeriodStart: '2025-12-14',
            payPeriodEnd: '2025-12-27',
            holidays: 0,
        });
        expect(addBreadcrumb).toHaveBeenCalledWith('payroll', 'Run complete', { outputLines: 1, employees: 1 });
        expect(reportError).not.toHaveBeenCalled();
        expect(reportMessage).not.toHaveBeenCalled();
    });

    it('reports the warning count of a run', () => {
        runPayroll({
            records: [
                { employeeId: 'Alice', date: '2025-12-01', duration: 8, rateCode: 'Supervisor' },
                { employeeId: 'Alice', date: '2025-12-15', duration: 8, rateCode: 'Supervisor' },
            ],
            payPeriod: PERIOD,
            holidays: [{ date: '2025-12-25', lookbackStart: '2025-11-16', lookbackEnd: '2025-12-13' }],
        });

        expect(reportMessage).toHaveBeenCalledWith('Run finished with 1 warning(s)', 'warning', {
            module: 'Main',
            operation: 'runPayroll',
            metadata: { warnings: 1 },
        });
    });

    it('reports and rethrows a malformed record', () => {
        const run = () =>
            runPayroll({
                records: [{ employeeId: 'Alice', date: '2025-12-15', duration: -2, rateCode: 'Regular' }],
                payPeriod: PERIOD,
            });

        expect(run).toThrow(PayrollError);
        expect(reportError).toHaveBeenCalledWith(
            expect.objectContaining({ message: 'Record 0: duration must be a non-negative number, got -2' }),
            {
                module: 'Main',
                operation: 'runPayroll',
                level: 'warning',
                metadata: { errorType: 'VALIDATION_ERROR', recordIndex: 0 },
                userMessage: 'Invalid Shift Record',
            }
        );
    });
});
