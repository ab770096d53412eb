import { describe, expect, it } from '@jest/globals';
import { createRunConfig, loadRuntimeSettings } from '../../js/config.js';
import { ERROR_TYPES } from '../../js/constants.js';
import { LogLevel } from '../../js/logger.js';
import { PayrollError } from '../../js/utils.js';

const PERIOD = { start: '2025-12-14', end: '2025-12-27' };
const CHRISTMAS = { date: '2025-12-25', lookbackStart: '2025-11-16', lookbackEnd: '2025-12-13' };

function configError(fn: () => unknown): PayrollError {
    try {
        fn();
    } catch (error) {
        if (error instanceof PayrollError) return error;
        throw error;
    }
    throw new Error('expected a PayrollError');
}

describe('createRunConfig', () => {
    it('builds a config with default output markers', () => {
        const config = createRunConfig(PERIOD, [CHRISTMAS]);

        expect(config.payPeriod).toEqual(PERIOD);
        expect([...config.statutoryDates]).toEqual(['2025-12-25']);
        expect(config.customer).toBe('TOTAL');
        expect(config.serviceItem).toBe('Labor');
    });

    it('accepts no holidays at all', () => {
        expect(createRunConfig(PERIOD).holidays).toEqual([]);
    });

    it('applies output overrides', () => {
        const config = createRunConfig(PERIOD, [], { customer: 'Site 4', serviceItem: 'Field' });
        expect(config.customer).toBe('Site 4');
        expect(config.serviceItem).toBe('Field');
    });

    it('rejects an inverted pay period', () => {
        const error = configError(() => createRunConfig({ start: '2025-12-27', end: '2025-12-14' }));
        expect(error.type).toBe(ERROR_TYPES.CONFIGURATION);
        expect(error.message).toBe('Pay period starts after it ends (2025-12-27 > 2025-12-14)');
    });

    it('rejects an inverted lookback window', () => {
        const error = configError(() =>
            createRunConfig(PERIOD, [{ date: '2025-12-25', lookbackStart: '2025-12-13', lookbackEnd: '2025-11-16' }])
        );
        expect(error.message).toBe(
            'Holiday 0 (2025-12-25) lookback window starts after it ends (2025-12-13 > 2025-11-16)'
        );
    });

    it('rejects holidays when none falls inside the pay period', () => {
        const error = configError(() =>
            createRunConfig(PERIOD, [{ date: '2025-11-11', lookbackStart: '2025-10-12', lookbackEnd: '2025-11-08' }])
        );
        expect(error.type).toBe(ERROR_TYPES.CONFIGURATION);
        expect(error.message).toBe('None of the configured holidays falls inside the pay period 2025-12-14 to 2025-12-27');
    });

    it('accepts out-of-period holidays alongside an in-period one', () => {
        const config = createRunConfig(PERIOD, [
            { date: '2025-11-11', lookbackStart: '2025-10-12', lookbackEnd: '2025-11-08' },
            CHRISTMAS,
        ]);
        expect(config.statutoryDates.has('2025-11-11')).toBe(true);
        expect(config.statutoryDates.has('2025-12-25')).toBe(true);
    });
});

describe('loadRuntimeSettings', () => {
    it('reads the DSN and an explicit level', () => {
        expect(
            loadRuntimeSettings({
                PAYROLL_SENTRY_DSN: ' https://public@example.invalid/1 ',
                PAYROLL_LOG_LEVEL: 'warn',
            })
        ).toEqual({
            sentryDsn: 'https://public@example.invalid/1',
            environment: 'development',
            release: 'unknown',
            logLevel: LogLevel.WARN,
            logTimestamps: true,
        });
    });

    it('turns log timestamps off only for "false"', () => {
        expect(loadRuntimeSettings({ PAYROLL_LOG_TIMESTAMPS: 'false' }).logTimestamps).toBe(false);
        expect(loadRuntimeSettings({ PAYROLL_LOG_TIMESTAMPS: '0' }).logTimestamps).toBe(true);
    });

    it('maps the debug flag to DEBUG', () => {
        expect(loadRuntimeSettings({ PAYROLL_DEBUG: 'true' }).logLevel).toBe(LogLevel.DEBUG);
    });

    it('prefers the explicit level over the debug flag', () => {
        expect(loadRuntimeSettings({ PAYROLL_DEBUG: 'true', PAYROLL_LOG_LEVEL: 'error' }).logLevel).toBe(LogLevel.ERROR);
    });

    it('leaves the level unset and takes the environment name from NODE_ENV', () => {
        const settings = loadRuntimeSettings({ NODE_ENV: 'production', PAYROLL_SENTRY_ENVIRONMENT: '' });
        expect(settings.logLevel).toBeNull();
        expect(settings.environment).toBe('production');
        expect(settings.sentryDsn).toBe('');
    });
});
