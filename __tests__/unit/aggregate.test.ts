import { describe, expect, it } from '@jest/globals';
import { buildOutputLines, compareOutputLines, type EmployeeAllocation } from '../../js/aggregate.js';
import { createEmptyBuckets } from '../../js/calc.js';
import { createRunConfig } from '../../js/config.js';
import { CLASSIFICATIONS, type OutputLine } from '../../js/types.js';

const config = createRunConfig({ start: '2025-12-14', end: '2025-12-27' });

function allocation(employeeId: string, firstDate: string, fill: (buckets: EmployeeAllocation['buckets']) => void): EmployeeAllocation {
    const buckets = createEmptyBuckets();
    fill(buckets);
    return { employeeId, firstDate, buckets };
}

function line(employeeId: string, rateCode: string, hours: number, date: string, classification: OutputLine['classification']): OutputLine {
    return {
        employeeId,
        date,
        customer: 'TOTAL',
        serviceItem: 'Labor',
        rateCode,
        hours,
        classification,
        className: '',
        billable: 'N',
        notes: '',
    };
}

describe('buildOutputLines', () => {
    it('merges buckets into one line per rate-code', () => {
        const bob = allocation('Bob', '2025-12-14', (buckets) => {
            buckets.regular.set('20 Rate', 88);
            buckets.overtime.set('20 Rate OT/ STAT', 7.25);
            buckets.statutory.set('20 Rate OT/ STAT', 8);
        });

        expect(buildOutputLines([bob], new Map(), null, config)).toEqual([
            line('Bob', '20 Rate', 88, '2025-12-14', CLASSIFICATIONS.REGULAR),
            line('Bob', '20 Rate OT/ STAT', 15.25, '2025-12-14', CLASSIFICATIONS.OVERTIME),
        ]);
    });

    it('keeps a statutory-only line classified as statutory', () => {
        const amy = allocation('Amy', '2025-12-24', (buckets) => {
            buckets.regular.set('Regular', 4);
            buckets.statutory.set('Hourly Overtime /STAT', 4);
        });

        expect(buildOutputLines([amy], new Map(), null, config)[0]).toEqual(
            line('Amy', 'Hourly Overtime /STAT', 4, '2025-12-24', CLASSIFICATIONS.STATUTORY)
        );
    });

    it('rounds hours to two decimals', () => {
        const amy = allocation('Amy', '2025-12-14', (buckets) => {
            buckets.regular.set('Regular', 7.333333);
        });

        expect(buildOutputLines([amy], new Map(), null, config)[0].hours).toBe(7.33);
    });

    it('adds the PHP line on the holiday date', () => {
        const bob = allocation('Bob', '2025-12-14', (buckets) => {
            buckets.regular.set('20 Rate', 40);
        });

        const lines = buildOutputLines([bob], new Map([['Bob', 6.1013333]]), '2025-12-25', config);

        expect(lines).toEqual([
            line('Bob', '20 Rate', 40, '2025-12-14', CLASSIFICATIONS.REGULAR),
            line('Bob', 'PHP (Holiday)', 6.1, '2025-12-25', CLASSIFICATIONS.ENTITLEMENT),
        ]);
    });

    it('keeps a finished PHP line instead of adding computed hours to it', () => {
        const bob = allocation('Bob', '2025-12-14', (buckets) => {
            buckets.passthrough.set('PHP (Holiday)', { hours: 2, classification: CLASSIFICATIONS.ENTITLEMENT });
        });

        const lines = buildOutputLines([bob], new Map([['Bob', 3.5]]), '2025-12-25', config);

        expect(lines).toEqual([line('Bob', 'PHP (Holiday)', 2, '2025-12-25', CLASSIFICATIONS.ENTITLEMENT)]);
    });

    it('emits PHP for employees without pay-period hours', () => {
        const lines = buildOutputLines([], new Map([['Cy', 1.25]]), '2025-12-25', config);

        expect(lines).toEqual([line('Cy', 'PHP (Holiday)', 1.25, '2025-12-25', CLASSIFICATIONS.ENTITLEMENT)]);
    });

    it('dates a finished PHP line to the first shift when no holiday is configured', () => {
        const bob = allocation('Bob', '2025-12-14', (buckets) => {
            buckets.passthrough.set('PHP (Holiday)', { hours: 2, classification: CLASSIFICATIONS.ENTITLEMENT });
        });

        expect(buildOutputLines([bob], new Map(), null, config)).toEqual([
            line('Bob', 'PHP (Holiday)', 2, '2025-12-14', CLASSIFICATIONS.ENTITLEMENT),
        ]);
    });

    it('sorts by employee then rate-code by code unit', () => {
        const bob = allocation('Bob', '2025-12-14', (buckets) => {
            buckets.regular.set('b Rate', 1);
            buckets.regular.set('Regular', 1);
            buckets.regular.set('20 Rate', 1);
        });
        const amy = allocation('Amy', '2025-12-15', (buckets) => {
            buckets.regular.set('Regular', 1);
        });

        const lines = buildOutputLines([bob, amy], new Map(), null, config);

        expect(lines.map((entry) => `${entry.employeeId}/${entry.rateCode}`)).toEqual([
            'Amy/Regular',
            'Bob/20 Rate',
            'Bob/Regular',
            'Bob/b Rate',
        ]);
    });

    it('writes configured output markers', () => {
        const custom = createRunConfig({ start: '2025-12-14', end: '2025-12-27' }, [], { customer: 'Site 4', serviceItem: 'Field' });
        const amy = allocation('Amy', '2025-12-15', (buckets) => {
            buckets.regular.set('Regular', 1);
        });

        const [first] = buildOutputLines([amy], new Map(), null, custom);

        expect(first.customer).toBe('Site 4');
        expect(first.serviceItem).toBe('Field');
    });
});

describe('compareOutputLines', () => {
    it('orders by employee before rate-code', () => {
        const a = line('A', 'Z', 1, '2025-12-14', CLASSIFICATIONS.REGULAR);
        const b = line('B', 'A', 1, '2025-12-14', CLASSIFICATIONS.REGULAR);
        expect(compareOutputLines(a, b)).toBe(-1);
        expect(compareOutputLines(b, a)).toBe(1);
        expect(compareOutputLines(a, a)).toBe(0);
    });
});
