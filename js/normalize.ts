/**
 * @fileoverview Record Normalization
 *
 * Turns caller-owned shift records into private, validated copies the engine
 * can work on. Structural problems (no employee, no date, a negative duration)
 * abort the run with a diagnostic naming the record; data problems (no
 * duration, unusable times) are left for the engine's documented fallbacks.
 *
 * Classification happens here, once: an explicit `classification` wins,
 * otherwise the label's OT/STAT/PHP markers decide.
 */

import { classifyRateCode } from './rate-codes.js';
import { createValidationError, validateDateKey, validateString } from './utils.js';
import { CLASSIFICATIONS, type Classification, type NormalizedRecord, type TimeDetail } from './types.js';

type TimeLookup = ReadonlyMap<string, { startTime: string | null; endTime: string | null }>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isClassification(value: unknown): value is Classification {
    return Object.values(CLASSIFICATIONS).some((classification) => classification === value);
}

function optionalString(value: unknown, field: string, index: number | null): string | null {
    if (value === null || value === undefined) return null;
    if (typeof value !== 'string') {
        throw createValidationError(`${field} must be a string`, index);
    }
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

function normalizeDuration(value: unknown, index: number): number {
    if (value === null || value === undefined) return 0;
    if (typeof value !== 'number') {
        throw createValidationError(`Record ${index}: duration must be a number`, index);
    }
    if (Number.isNaN(value)) return 0;
    if (!Number.isFinite(value) || value < 0) {
        throw createValidationError(`Record ${index}: duration must be a non-negative number, got ${value}`, index);
    }
    return value;
}

/**
 * Key used to match time details with records.
 */
export function timeDetailKey(employeeId: string, date: string): string {
    return `${employeeId}__${date}`;
}

/**
 * Indexes the optional time-detail feed by (employee, date).
 * Later entries for the same key replace earlier ones.
 */
export function buildTimeDetailLookup(details: readonly TimeDetail[] | null | undefined): TimeLookup {
    const lookup = new Map<string, { startTime: string | null; endTime: string | null }>();
    (details || []).forEach((detail, position) => {
        if (!isRecord(detail)) {
            throw createValidationError(`Time detail ${position} is not an object`);
        }
        const employeeId = validateString(detail.employeeId, `Time detail ${position}: employeeId`);
        const date = validateDateKey(detail.date, `Time detail ${position}: date`);
        lookup.set(timeDetailKey(employeeId, date), {
            startTime: optionalString(detail.startTime, `Time detail ${position}: startTime`, null),
            endTime: optionalString(detail.endTime, `Time detail ${position}: endTime`, null),
        });
    });
    return lookup;
}

/**
 * Validates and copies one record.
 *
 * @throws PayrollError (VALIDATION_ERROR) naming the record index.
 */
export function normalizeShiftRecord(raw: unknown, index: number, timeLookup?: TimeLookup): NormalizedRecord {
    if (!isRecord(raw)) {
        throw createValidationError(`Record ${index} is not an object`, index);
    }

    const employeeId = validateString(raw.employeeId, `Record ${index}: employeeId`, index);
    const date = validateDateKey(raw.date, `Record ${index}: date`, index);
    const rateCode = validateString(raw.rateCode, `Record ${index}: rateCode`, index);
    const duration = normalizeDuration(raw.duration, index);
    const note = optionalString(raw.note, `Record ${index}: note`, index);

    let startTime = optionalString(raw.startTime, `Record ${index}: startTime`, index);
    let endTime = optionalString(raw.endTime, `Record ${index}: endTime`, index);
    if (startTime === null && endTime === null) {
        const detail = timeLookup?.get(timeDetailKey(employeeId, date));
        if (detail) {
            startTime = detail.startTime;
            endTime = detail.endTime;
        }
    }

    let classification: Classification;
    if (raw.classification === undefined || raw.classification === null) {
        classification = classifyRateCode(rateCode);
    } else if (isClassification(raw.classification)) {
        classification = raw.classification;
    } else {
        throw createValidationError(
            `Record ${index}: unknown classification "${String(raw.classification)}"`,
            index
        );
    }

    return { index, employeeId, date, startTime, endTime, duration, rateCode, note, classification };
}

/**
 * Validates and copies every record. The caller's array and objects are not touched.
 */
export function normalizeShiftRecords(records: unknown, timeLookup?: TimeLookup): NormalizedRecord[] {
    if (!Array.isArray(records)) {
        throw createValidationError('Records must be an array');
    }
    return records.map((raw: unknown, index) => normalizeShiftRecord(raw, index, timeLookup));
}
