/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the payroll finisher.
 */

// ==================== INPUT TYPES ====================

/**
 * How a payroll line has been classified.
 *
 * Assigned exactly once while records are normalized. Anything other than
 * `UNCLASSIFIED` or `REGULAR` is already-finished data and is passed through.
 */
export const CLASSIFICATIONS = {
    UNCLASSIFIED: 'UNCLASSIFIED',
    REGULAR: 'REGULAR',
    OVERTIME: 'OVERTIME',
    STATUTORY: 'STATUTORY',
    ENTITLEMENT: 'ENTITLEMENT',
} as const;

export type Classification = typeof CLASSIFICATIONS[keyof typeof CLASSIFICATIONS];

/**
 * A single attendance/shift row handed over by the spreadsheet normalizer.
 */
export interface ShiftRecord {
    /** Employee identifier (the "Name" column of the export) */
    employeeId: string;
    /** Transaction date (YYYY-MM-DD) */
    date: string;
    /** Clock-in time of day, e.g. "20:00" or "8:00 PM" */
    startTime?: string | null;
    /** Clock-out time of day */
    endTime?: string | null;
    /** Hours worked; missing or zero excludes the row */
    duration?: number | null;
    /** Payroll item label, e.g. "21.75 Rate" */
    rateCode: string;
    /** Free-text note (may carry a vacation percentage) */
    note?: string | null;
    /** Explicit classification; derived from the label when absent */
    classification?: Classification;
}

/**
 * Optional start/end pair for an (employee, date), supplied by a separate
 * time-detail export.
 */
export interface TimeDetail {
    employeeId: string;
    date: string;
    startTime?: string | null;
    endTime?: string | null;
}

/**
 * Inclusive date range (YYYY-MM-DD).
 */
export interface DateRange {
    /** Start date (YYYY-MM-DD) */
    start: string;
    /** End date (YYYY-MM-DD) */
    end: string;
}

/**
 * A statutory holiday and the lookback window its entitlement is based on.
 */
export interface StatutoryHolidayConfig {
    /** Holiday date (YYYY-MM-DD) */
    date: string;
    /** First day of the lookback window (inclusive) */
    lookbackStart: string;
    /** Last day of the lookback window (inclusive) */
    lookbackEnd: string;
    /** Display name, e.g. "Thanksgiving" */
    name?: string;
}

/**
 * Overridable markers written on every output line.
 */
export interface OutputOptions {
    customer?: string;
    serviceItem?: string;
}

/**
 * Everything one payroll run needs.
 */
export interface PayrollInput {
    records: ShiftRecord[];
    payPeriod: DateRange;
    holidays?: StatutoryHolidayConfig[];
    timeDetails?: TimeDetail[];
    options?: OutputOptions;
}

// ==================== NORMALIZED TYPES ====================

/**
 * Private, validated copy of a ShiftRecord.
 */
export interface NormalizedRecord {
    /** Position in the caller's array (used for tie-breaking and diagnostics) */
    index: number;
    employeeId: string;
    date: string;
    startTime: string | null;
    endTime: string | null;
    /** Positive hours, or 0 when the row is to be skipped */
    duration: number;
    rateCode: string;
    note: string | null;
    classification: Classification;
}

/**
 * Validated run configuration.
 */
export interface RunConfig {
    payPeriod: DateRange;
    holidays: StatutoryHolidayConfig[];
    /** Holiday dates used to flag statutory segments */
    statutoryDates: Set<string>;
    customer: string;
    serviceItem: string;
}

// ==================== ENGINE TYPES ====================

/**
 * One calendar-day slice of a shift.
 */
export interface ShiftSegment {
    date: string;
    hours: number;
    isStatutory: boolean;
}

/**
 * A segment tagged with the record it came from, ready for allocation.
 */
export interface SegmentedHours extends ShiftSegment {
    recordIndex: number;
    segmentIndex: number;
    rateCode: string;
    classification: Classification;
}

/**
 * Rate-code → hours.
 */
export type HourBucket = Map<string, number>;

/**
 * Result of allocating one employee's hours.
 */
export interface EmployeeBuckets {
    regular: HourBucket;
    overtime: HourBucket;
    statutory: HourBucket;
    /** Already-finished lines, keyed by their own label */
    passthrough: Map<string, { hours: number; classification: Classification }>;
}

/**
 * Per-holiday entitlement breakdown for one employee.
 */
export interface HolidayEntitlement {
    holidayDate: string;
    qualifyingHours: number;
    cappedHours: number;
    rate: number;
    wages: number;
    vacationPercent: number;
    dollars: number;
    hours: number;
}

// ==================== OUTPUT TYPES ====================

/**
 * A consolidated payroll line, one per (employee, rate-code).
 */
export interface OutputLine {
    employeeId: string;
    /** Representative date (YYYY-MM-DD) */
    date: string;
    customer: string;
    serviceItem: string;
    rateCode: string;
    /** Hours rounded to 2 decimals */
    hours: number;
    classification: Classification;
    className: string;
    billable: 'N';
    notes: string;
}

/**
 * Weekly-capped union contribution for one employee.
 */
export interface UnionBenefitLine {
    employeeId: string;
    week1Actual: number;
    week1Payable: number;
    week2Actual: number;
    week2Payable: number;
    totalPayable: number;
    totalCost: number;
}

/**
 * Run counters.
 */
export interface RunStatistics {
    /** Employees with at least one output line */
    employeesProcessed: number;
    /** Records with a positive duration */
    inputRows: number;
    /** Records dropped for a missing or zero duration */
    skippedRows: number;
    outputLines: number;
    regularHours: number;
    overtimeHours: number;
    statutoryHours: number;
    /** Computed PHP hours plus passthrough PHP lines */
    entitlementHours: number;
    /** Passthrough OT/STAT lines */
    passthroughHours: number;
    /** How much smaller the output is than the input, in percent */
    reductionPercent: number;
}

/**
 * Complete result of one run.
 */
export interface PayrollResult {
    lines: OutputLine[];
    statistics: RunStatistics;
    unionLines: UnionBenefitLine[];
    /** Non-fatal notices (unrateable codes and the like) */
    warnings: string[];
}

// ==================== ERROR TYPES ====================

/**
 * User-friendly error object.
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    /** User-friendly error title */
    title: string;
    /** User-friendly error message */
    message: string;
    /** Suggested action ('fix-input', 'fix-config', 'none') */
    action: 'fix-input' | 'fix-config' | 'none';
    /** Original error object */
    originalError?: Error | string;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
