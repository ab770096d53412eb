#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point
 *
 * Usage: payroll-finisher <input.json> [--out payroll.csv] [--union union.csv]
 *
 * Reads a JSON PayrollInput, writes the payroll import CSV (stdout when --out
 * is absent) and, when asked, the union report, then prints run statistics to
 * stderr. Exits with 1 on any error.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { flushErrorReports } from './error-reporting.js';
import { buildPayrollCsv, buildUnionCsv } from './export.js';
import { createLogger } from './logger.js';
import { initRuntime, runPayroll } from './main.js';
import { PayrollError, classifyError, createUserFriendlyError } from './utils.js';
import type { PayrollInput, RunStatistics } from './types.js';

const logger = createLogger('CLI');

export const USAGE = 'Usage: payroll-finisher <input.json> [--out payroll.csv] [--union union.csv]';

/**
 * Side effects the CLI performs, replaceable in tests.
 */
export interface CliIO {
    readFile: (path: string) => Promise<string>;
    writeFile: (path: string, content: string) => Promise<void>;
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

const defaultIO: CliIO = {
    readFile: (path) => readFile(path, 'utf8'),
    writeFile: (path, content) => writeFile(path, content, 'utf8'),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
};

export interface CliOptions {
    input: string;
    out: string | null;
    union: string | null;
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * @throws TypeError on unknown options or a missing input path.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args: [...argv],
        options: {
            out: { type: 'string', short: 'o' },
            union: { type: 'string', short: 'u' },
        },
        allowPositionals: true,
    });

    if (positionals.length !== 1) {
        throw new TypeError(USAGE);
    }

    return {
        input: positionals[0],
        out: values.out ?? null,
        union: values.union ?? null,
    };
}

/**
 * Renders run statistics as aligned "label: value" lines.
 */
export function formatStatistics(stats: RunStatistics): string {
    const rows: Array<[string, string]> = [
        ['Employees', String(stats.employeesProcessed)],
        ['Input rows', String(stats.inputRows)],
        ['Skipped rows', String(stats.skippedRows)],
        ['Output lines', String(stats.outputLines)],
        ['Regular hours', stats.regularHours.toFixed(2)],
        ['Overtime hours', stats.overtimeHours.toFixed(2)],
        ['Statutory hours', stats.statutoryHours.toFixed(2)],
        ['PHP hours', stats.entitlementHours.toFixed(2)],
        ['Passthrough hours', stats.passthroughHours.toFixed(2)],
        ['Reduction', `${stats.reductionPercent.toFixed(2)}%`],
    ];
    const width = Math.max(...rows.map(([label]) => label.length));
    return rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`).join('\n') + '\n';
}

function describeError(error: unknown): string {
    if (error instanceof PayrollError) {
        return `${error.friendly.title}: ${error.message}`;
    }
    if (error instanceof TypeError && error.message === USAGE) {
        return USAGE;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    const friendly = createUserFriendlyError(err, classifyError(err));
    return `${friendly.title}: ${err.message}`;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
    try {
        const options = parseCliArgs(argv);

        const text = await io.readFile(options.input);
        const input: PayrollInput = JSON.parse(text);
        const result = runPayroll(input);

        const payrollCsv = buildPayrollCsv(result.lines);
        if (options.out) {
            await io.writeFile(options.out, payrollCsv);
            logger.info(`Wrote ${result.lines.length} lines to ${options.out}`);
        } else {
            io.stdout(payrollCsv);
        }

        if (options.union) {
            await io.writeFile(options.union, buildUnionCsv(result.unionLines));
            logger.info(`Wrote ${result.unionLines.length} union lines to ${options.union}`);
        }

        io.stderr(formatStatistics(result.statistics));
        return 0;
    } catch (error) {
        io.stderr(describeError(error) + '\n');
        return 1;
    }
}

if (require.main === module) {
    initRuntime();
    runCli(process.argv.slice(2))
        .then(async (code) => {
            await flushErrorReports();
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.error('Unhandled failure', error);
            process.exitCode = 1;
        });
}
