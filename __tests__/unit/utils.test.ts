import { describe, expect, it } from '@jest/globals';
import {
    IsoUtils,
    PayrollError,
    classifyError,
    compareCodeUnits,
    createConfigurationError,
    createUserFriendlyError,
    escapeCsv,
    formatAmount,
    formatHoursDecimal,
    round,
    stableSortBy,
    validateDateKey,
    validateString,
} from '../../js/utils.js';

describe('validation', () => {
    it('trims required strings', () => {
        expect(validateString('  Alice ', 'employeeId')).toBe('Alice');
    });

    it('names the field and record on failure', () => {
        expect(() => validateString('  ', 'Record 2: employeeId', 2)).toThrow('Record 2: employeeId cannot be empty');
        expect(() => validateString(42, 'Record 2: employeeId', 2)).toThrow(
            'Record 2: employeeId must be a non-empty string'
        );
        expect(() => validateDateKey('2025-02-30', 'Record 0: date', 0)).toThrow(
            'Record 0: date must be a valid date (YYYY-MM-DD), got "2025-02-30"'
        );
    });
});

describe('classifyError', () => {
    it('keeps the type of a PayrollError', () => {
        const error = createConfigurationError('bad period');

        expect(error).toBeInstanceOf(PayrollError);
        expect(classifyError(error)).toBe('CONFIGURATION_ERROR');
        expect(error.friendly.title).toBe('Invalid Run Configuration');
    });

    it('recognises file-system and JSON failures', () => {
        const missing = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });

        expect(classifyError(missing)).toBe('IO_ERROR');
        expect(classifyError(new SyntaxError('Unexpected token'))).toBe('VALIDATION_ERROR');
        expect(classifyError(new Error('boom'))).toBe('UNKNOWN_ERROR');
    });

    it('builds a friendly error from a message', () => {
        const friendly = createUserFriendlyError('boom');

        expect(friendly.type).toBe('UNKNOWN_ERROR');
        expect(friendly.title).toBe('Unexpected Error');
        expect(friendly.originalError).toEqual(new Error('boom'));
    });
});

describe('numbers and text', () => {
    it('rounds half up without binary drift', () => {
        expect(round(1.005, 2)).toBe(1.01);
        expect(round(6.101333, 2)).toBe(6.1);
        expect(round(Number.NaN)).toBe(0);
    });

    it('formats hours and amounts', () => {
        expect(formatHoursDecimal(8.5)).toBe('8.50');
        expect(formatHoursDecimal(undefined)).toBe('0.00');
        expect(formatAmount(59.2)).toBe('59.20');
    });

    it('quotes CSV fields only when needed', () => {
        expect(escapeCsv('20 Rate')).toBe('20 Rate');
        expect(escapeCsv('Smith, Jane')).toBe('"Smith, Jane"');
        expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
        expect(escapeCsv(null)).toBe('');
    });

    it('sorts stably by code unit', () => {
        const sorted = stableSortBy(
            [
                { code: 'b', n: 1 },
                { code: 'a', n: 2 },
                { code: 'b', n: 3 },
                { code: 'B', n: 4 },
            ],
            (x, y) => compareCodeUnits(x.code, y.code)
        );

        expect(sorted.map(({ n }) => n)).toEqual([4, 2, 1, 3]);
    });
});

describe('IsoUtils', () => {
    it('accepts only real calendar dates', () => {
        expect(IsoUtils.isDateKey('2024-02-29')).toBe(true);
        expect(IsoUtils.isDateKey('2025-02-29')).toBe(false);
        expect(IsoUtils.isDateKey('2025-1-05')).toBe(false);
        expect(IsoUtils.isDateKey('')).toBe(false);
    });

    it('adds days across month and year ends', () => {
        expect(IsoUtils.addDays('2025-12-31', 1)).toBe('2026-01-01');
        expect(IsoUtils.addDays('2025-03-01', -1)).toBe('2025-02-28');
        expect(IsoUtils.addDays('not a date', 1)).toBe('');
    });

    it('measures hours between instants', () => {
        const start = new Date('2025-12-24T20:00:00Z');
        const end = new Date('2025-12-25T00:00:00Z');

        expect(IsoUtils.hoursBetween(start, end)).toBe(4);
        expect(IsoUtils.isWithin('2025-12-25', '2025-12-14', '2025-12-27')).toBe(true);
    });
});
