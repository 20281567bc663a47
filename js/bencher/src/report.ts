import fs from 'fs';
import path from 'path';
import {
    array,
    bigint,
    coerce,
    create,
    string,
    type,
    StructError,
} from 'superstruct';
import { BenchError, BenchErrorCode } from './errors';
import { logger } from './logger';

export const MARKDOWN_FILE = 'compute_units.md';
export const JSON_FILE = 'compute_units.json';

/** Mean compute units of one named bench. */
export interface BenchResult {
    name: string;
    mean: bigint;
}

const BigIntFromString = coerce(bigint(), string(), value => BigInt(value));

const ReportResult = type({
    results: array(type({ name: string(), mean: BigIntFromString })),
});

function formatUnits(units: bigint): string {
    return units.toLocaleString('en-US');
}

/**
 * `+n` or `-n` against the previous mean, `--` when equal and `- new -`
 * without one.
 */
export function formatDelta(mean: bigint, previous?: bigint): string {
    if (previous === undefined) return '- new -';
    const delta = mean - previous;
    if (delta === 0n) return '--';
    return delta > 0n ? `+${formatUnits(delta)}` : formatUnits(delta);
}

/**
 * The markdown table for one run, and whether any mean differs from
 * `previous`.
 */
export function renderTable(
    results: readonly BenchResult[],
    previous: ReadonlyMap<string, bigint>,
    date: Date,
): { table: string; changed: boolean } {
    let changed = false;
    const rows = results.map(({ name, mean }) => {
        const delta = formatDelta(mean, previous.get(name));
        if (delta !== '--') changed = true;
        return `| ${name} | ${mean} | ${delta} |`;
    });
    const table = [
        `#### Compute Units: ${date.toISOString()}`,
        '',
        '| Name | Mean | Delta |',
        '|------|------|-------|',
        ...rows,
        '',
        '',
    ].join('\n');
    return { table, changed };
}

/** Means recorded by the last run in `outDir`; empty when there was none. */
export function readPreviousResults(outDir: string): Map<string, bigint> {
    const file = path.join(outDir, JSON_FILE);
    if (!fs.existsSync(file)) return new Map();
    let parsed: { results: BenchResult[] };
    try {
        parsed = create(JSON.parse(fs.readFileSync(file, 'utf8')), ReportResult);
    } catch (error) {
        const reason =
            error instanceof StructError || error instanceof SyntaxError
                ? error.message
                : String(error);
        throw new BenchError(
            BenchErrorCode.INVALID_REPORT,
            'readPreviousResults',
            `${file}: ${reason}`,
        );
    }
    return new Map(parsed.results.map(({ name, mean }) => [name, mean]));
}

/**
 * Prepends this run's table to `compute_units.md` when a mean changed and
 * rewrites `compute_units.json`. Returns whether the table was written.
 */
export function writeResults(
    outDir: string,
    results: readonly BenchResult[],
    date: Date,
): boolean {
    const previous = readPreviousResults(outDir);
    const { table, changed } = renderTable(results, previous, date);
    fs.mkdirSync(outDir, { recursive: true });

    if (changed) {
        const markdown = path.join(outDir, MARKDOWN_FILE);
        const existing = fs.existsSync(markdown)
            ? fs.readFileSync(markdown, 'utf8')
            : '';
        fs.writeFileSync(markdown, table + existing);
        logger.info('compute unit table written', { file: markdown });
    } else {
        logger.info('compute units unchanged', { outDir });
    }

    const json = {
        results: results.map(({ name, mean }) => ({ name, mean: mean.toString() })),
    };
    fs.writeFileSync(path.join(outDir, JSON_FILE), JSON.stringify(json, null, 2));
    return changed;
}
