/**
 * @fileoverview Rate Code Interpreter
 *
 * Rate codes ("Payroll Item" labels) are opaque keys in the payroll import
 * file, but a few of them carry meaning this module knows how to read:
 *
 * - the hourly rate behind a label (`rateFor`)
 * - the label overtime and statutory-premium hours are booked under
 *   (`overtimeVariant`)
 * - whether a label is already a finished OT/STAT/PHP line
 *   (`classifyRateCode`)
 *
 * The overtime labels are exact-match business rules consumed downstream by
 * string equality. They are kept as an ordered rule list below; a new label
 * format needs a new rule, not a smarter regex.
 */

import { EXISTING_OVERTIME_SUFFIXES, PAYROLL_CONSTANTS, RATE_CODE_LABELS } from './constants.js';
import { CLASSIFICATIONS, type Classification } from './types.js';

// ==================== RATES ====================

/** "21.75 Rate", "18_Rate", "23.50-rate" ... */
const NUMERIC_RATE_PATTERN = /^\s*(\d+(?:\.\d+)?)[\s_-]+rate\b/i;

/**
 * True for the literal "Regular" label (case-insensitive).
 */
export function isRegularCode(code: string): boolean {
    return code.trim().toLowerCase() === RATE_CODE_LABELS.REGULAR.toLowerCase();
}

/**
 * Maps a rate-code label to its hourly rate.
 *
 * @example
 * rateFor('Regular')     // → 17.6
 * rateFor('21.75 Rate')  // → 21.75
 * rateFor('Supervisor')  // → 0 (unrateable)
 */
export function rateFor(code: string | null | undefined): number {
    if (!code) return 0;
    if (isRegularCode(code)) return PAYROLL_CONSTANTS.REGULAR_HOURLY_RATE;

    const match = code.match(NUMERIC_RATE_PATTERN);
    if (!match) return 0;

    const rate = parseFloat(match[1]);
    return Number.isFinite(rate) ? rate : 0;
}

// ==================== CLASSIFICATION ====================

/**
 * Whole-token markers of already-finished lines, in precedence order.
 * Case-sensitive so ordinary words ("Hotel", "status") never match.
 */
const CLASSIFICATION_MARKERS: ReadonlyArray<{ pattern: RegExp; classification: Classification }> = [
    { pattern: /\bPHP\b/, classification: CLASSIFICATIONS.ENTITLEMENT },
    { pattern: /\bOT\b/, classification: CLASSIFICATIONS.OVERTIME },
    { pattern: /\bSTAT\b/, classification: CLASSIFICATIONS.STATUTORY },
];

/**
 * Derives the classification implied by a label.
 *
 * @example
 * classifyRateCode('21.75 Rate')            // → 'UNCLASSIFIED'
 * classifyRateCode('21.75 Rate OT/ STAT')   // → 'OVERTIME'
 * classifyRateCode('Hourly Overtime /STAT') // → 'STATUTORY'
 * classifyRateCode('PHP (Holiday)')         // → 'ENTITLEMENT'
 */
export function classifyRateCode(code: string): Classification {
    for (const marker of CLASSIFICATION_MARKERS) {
        if (marker.pattern.test(code)) return marker.classification;
    }
    return CLASSIFICATIONS.UNCLASSIFIED;
}

/**
 * True when hours under this classification are base worked hours.
 */
export function isWorkedClassification(classification: Classification): boolean {
    return classification === CLASSIFICATIONS.UNCLASSIFIED || classification === CLASSIFICATIONS.REGULAR;
}

// ==================== OVERTIME LABELS ====================

interface OvertimeRule {
    name: string;
    matches: (code: string) => boolean;
    apply: (code: string) => string;
}

/**
 * Removes one trailing OT/STAT suffix so it is not applied twice.
 */
export function stripOvertimeSuffix(code: string): string {
    for (const suffix of EXISTING_OVERTIME_SUFFIXES) {
        if (code.endsWith(suffix)) {
            return code.slice(0, -suffix.length);
        }
    }
    return code;
}

const OVERTIME_RULES: readonly OvertimeRule[] = [
    {
        name: 'regular',
        matches: isRegularCode,
        apply: () => RATE_CODE_LABELS.REGULAR_OVERTIME,
    },
    {
        name: 'special-rate',
        matches: (code) =>
            code.includes(RATE_CODE_LABELS.SPECIAL_RATE_VALUE) &&
            classifyRateCode(code) !== CLASSIFICATIONS.OVERTIME,
        apply: () => RATE_CODE_LABELS.SPECIAL_RATE_OVERTIME,
    },
    {
        name: 'suffix',
        matches: () => true,
        apply: (code) => `${stripOvertimeSuffix(code)}${RATE_CODE_LABELS.OVERTIME_SUFFIX}`,
    },
];

/**
 * Produces the label overtime and statutory-premium hours are booked under.
 *
 * @example
 * overtimeVariant('Regular')             // → 'Hourly Overtime /STAT'
 * overtimeVariant('21.75 Rate')          // → '21.75 Rate OT/STAT'
 * overtimeVariant('23.50 Rate')          // → '23.50 Rate OT/ STAT'
 * overtimeVariant('23.50 Rate OT/ STAT') // → '23.50 Rate OT/ STAT'
 */
export function overtimeVariant(code: string): string {
    const rule = OVERTIME_RULES.find((candidate) => candidate.matches(code));
    // The last rule always matches.
    return rule ? rule.apply(code) : `${code}${RATE_CODE_LABELS.OVERTIME_SUFFIX}`;
}
