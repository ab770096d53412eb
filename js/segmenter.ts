/**
 * @fileoverview Shift Segmenter
 *
 * Splits one shift into calendar-day segments so hours worked after midnight
 * land on the day they were actually worked (which matters when that day is a
 * statutory holiday).
 *
 * ## Modes
 * - **Timed**: both start and end times parse. The end instant moves to the
 *   next day when the end time is earlier than the start time. Each calendar
 *   day crossed gets the wall-clock hours inside it, unrounded.
 * - **Degraded**: a time is missing or unparsable, or start equals end. The
 *   whole recorded duration goes to the nominal date.
 *
 * Dates are handled as UTC calendar days, so there are no DST gaps or
 * doubled hours.
 */

import { IsoUtils } from './utils.js';
import type { ShiftSegment } from './types.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

/** 20:00, 8:05:30 */
const TIME_24H_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
/** 8:00 PM, 12:30:00am */
const TIME_12H_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([ap])\.?m\.?$/i;

/**
 * Parses a time of day into seconds after midnight.
 * Returns null for anything it does not recognise.
 *
 * @example
 * parseTimeOfDay('20:00')    // → 72000
 * parseTimeOfDay('8:00 PM')  // → 72000
 * parseTimeOfDay('25:00')    // → null
 */
export function parseTimeOfDay(value: string | null | undefined): number | null {
    if (!value) return null;
    const trimmed = value.trim();

    const match12 = trimmed.match(TIME_12H_PATTERN);
    if (match12) {
        const hours = Number(match12[1]);
        const minutes = Number(match12[2]);
        const seconds = Number(match12[3] ?? '0');
        if (hours < 1 || hours > 12 || minutes > 59 || seconds > 59) return null;
        const isPm = match12[4].toLowerCase() === 'p';
        const hours24 = (hours % 12) + (isPm ? 12 : 0);
        return hours24 * 3600 + minutes * 60 + seconds;
    }

    const match24 = trimmed.match(TIME_24H_PATTERN);
    if (match24) {
        const hours = Number(match24[1]);
        const minutes = Number(match24[2]);
        const seconds = Number(match24[3] ?? '0');
        if (hours > 23 || minutes > 59 || seconds > 59) return null;
        return hours * 3600 + minutes * 60 + seconds;
    }

    return null;
}

function atSeconds(dateKey: string, seconds: number): Date | null {
    const midnight = IsoUtils.parseDate(dateKey);
    if (!midnight) return null;
    return new Date(midnight.getTime() + seconds * 1000);
}

function singleSegment(date: string, totalHours: number, statutoryDates: ReadonlySet<string>): ShiftSegment[] {
    if (!(totalHours > 0)) return [];
    return [{ date, hours: totalHours, isStatutory: statutoryDates.has(date) }];
}

/**
 * Splits a shift into (date, hours, isStatutory) segments.
 *
 * @param date - Nominal shift date (YYYY-MM-DD).
 * @param startTime - Clock-in time of day, if known.
 * @param endTime - Clock-out time of day, if known.
 * @param totalHours - Recorded duration, used when the times are unusable.
 * @param statutoryDates - Configured holiday dates.
 *
 * @example
 * segmentShift('2025-12-24', '20:00', '04:00', 8, new Set(['2025-12-25']))
 * // → [
 * //   { date: '2025-12-24', hours: 4, isStatutory: false },
 * //   { date: '2025-12-25', hours: 4, isStatutory: true },
 * // ]
 */
export function segmentShift(
    date: string,
    startTime: string | null | undefined,
    endTime: string | null | undefined,
    totalHours: number,
    statutoryDates: ReadonlySet<string>
): ShiftSegment[] {
    const startSeconds = parseTimeOfDay(startTime);
    const endSeconds = parseTimeOfDay(endTime);

    if (startSeconds === null || endSeconds === null || startSeconds === endSeconds) {
        return singleSegment(date, totalHours, statutoryDates);
    }

    const start = atSeconds(date, startSeconds);
    const crossesMidnight = endSeconds < startSeconds;
    const end = atSeconds(date, endSeconds + (crossesMidnight ? SECONDS_PER_DAY : 0));
    if (!start || !end) {
        return singleSegment(date, totalHours, statutoryDates);
    }

    const segments: ShiftSegment[] = [];
    let cursor = start;
    while (cursor < end) {
        const dayKey = IsoUtils.toISODate(cursor);
        const nextMidnight = atSeconds(IsoUtils.addDays(dayKey, 1), 0);
        if (!nextMidnight) break;

        const sliceEnd = nextMidnight < end ? nextMidnight : end;
        const hours = IsoUtils.hoursBetween(cursor, sliceEnd);
        if (hours > 0) {
            segments.push({ date: dayKey, hours, isStatutory: statutoryDates.has(dayKey) });
        }
        cursor = sliceEnd;
    }

    return segments;
}
