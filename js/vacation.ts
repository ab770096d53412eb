/**
 * @fileoverview Vacation Percent Extractor
 * Reads a vacation percentage out of a free-text note ("6% vac", "vacation 10 percent").
 */

import { PAYROLL_CONSTANTS } from './constants.js';

const PERCENT_PATTERN = /(\d+(?:\.\d+)?)\s*(?:%|percent\b)/i;

/**
 * Returns the fraction written in the note, or null when there is none.
 *
 * @example
 * findVacationPercent('6% vacation') // → 0.06
 * findVacationPercent('no vac pay')  // → null
 */
export function findVacationPercent(note: string | null | undefined): number | null {
    if (!note) return null;
    const match = note.match(PERCENT_PATTERN);
    if (!match) return null;
    const value = parseFloat(match[1]);
    return Number.isFinite(value) ? value / 100 : null;
}

/**
 * Like findVacationPercent, falling back to the 4% default.
 */
export function extractVacationPercent(note: string | null | undefined): number {
    return findVacationPercent(note) ?? PAYROLL_CONSTANTS.DEFAULT_VACATION_PERCENT;
}

/**
 * Highest percentage found across several notes; the default when none carry one.
 */
export function maxVacationPercent(notes: Iterable<string | null | undefined>): number {
    let max: number | null = null;
    for (const note of notes) {
        const found = findVacationPercent(note);
        if (found !== null && (max === null || found > max)) {
            max = found;
        }
    }
    return max ?? PAYROLL_CONSTANTS.DEFAULT_VACATION_PERCENT;
}
