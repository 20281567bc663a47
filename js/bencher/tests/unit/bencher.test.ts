import { describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PublicKey, SystemProgram } from '@solana/web3.js';
import {
    KeyedAccount,
    LoaderOutcome,
    ProgramHarness,
    systemAccount,
} from '@svm-harness/harness';
import {
    BenchError,
    BenchErrorCode,
    ComputeUnitBencher,
    formatDelta,
    JSON_FILE,
    MARKDOWN_FILE,
    readPreviousResults,
    renderTable,
} from '../../src';

const loader = {
    invoke: (): LoaderOutcome => {
        throw new Error('no program image should run');
    },
};
const harness = new ProgramHarness({ loader });
const payer = new PublicKey(new Uint8Array(32).fill(1));
const target = new PublicKey(new Uint8Array(32).fill(2));
const date = new Date('2026-01-02T03:04:05.000Z');

const transferBench = (lamports: number) => ({
    name: 'transfer',
    instruction: SystemProgram.transfer({ fromPubkey: payer, toPubkey: target, lamports }),
    accounts: [
        [payer, systemAccount(100n)],
        [target, systemAccount(0n)],
    ] satisfies KeyedAccount[],
});

const outDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'bencher-'));
const read = (dir: string, file: string) =>
    fs.readFileSync(path.join(dir, file), 'utf8');

describe('formatDelta', () => {
    it('formats changes with thousands separators', () => {
        expect(formatDelta(1_500n, 100n)).toBe('+1,400');
        expect(formatDelta(100n, 1_500n)).toBe('-1,400');
        expect(formatDelta(100n, 100n)).toBe('--');
        expect(formatDelta(100n)).toBe('- new -');
    });
});

describe('renderTable', () => {
    it('renders one row per bench under a dated heading', () => {
        expect(
            renderTable(
                [
                    { name: 'transfer', mean: 150n },
                    { name: 'create', mean: 2_000n },
                ],
                new Map([['transfer', 150n]]),
                date,
            ),
        ).toEqual({
            table: [
                '#### Compute Units: 2026-01-02T03:04:05.000Z',
                '',
                '| Name | Mean | Delta |',
                '|------|------|-------|',
                '| transfer | 150 | -- |',
                '| create | 2000 | - new - |',
                '',
                '',
            ].join('\n'),
            changed: true,
        });
    });
});

describe('ComputeUnitBencher', () => {
    it('writes the report of a first run', () => {
        const dir = outDir();
        const results = new ComputeUnitBencher({
            harness,
            outDir: dir,
            iterations: 3,
            now: () => date,
        })
            .bench(transferBench(10))
            .execute();

        expect(results).toEqual([{ name: 'transfer', mean: 150n }]);
        expect(read(dir, MARKDOWN_FILE)).toBe(
            [
                '#### Compute Units: 2026-01-02T03:04:05.000Z',
                '',
                '| Name | Mean | Delta |',
                '|------|------|-------|',
                '| transfer | 150 | - new - |',
                '',
                '',
            ].join('\n'),
        );
        expect(readPreviousResults(dir)).toEqual(new Map([['transfer', 150n]]));
    });

    it('leaves the markdown alone when nothing changed', () => {
        const dir = outDir();
        const bencher = new ComputeUnitBencher({ harness, outDir: dir, now: () => date });
        bencher.bench(transferBench(10)).execute();
        const first = read(dir, MARKDOWN_FILE);

        bencher.execute();

        expect(read(dir, MARKDOWN_FILE)).toBe(first);
    });

    it('prepends a table with deltas when a mean moved', () => {
        const dir = outDir();
        fs.writeFileSync(
            path.join(dir, JSON_FILE),
            JSON.stringify({ results: [{ name: 'transfer', mean: '1200' }] }),
        );
        fs.writeFileSync(path.join(dir, MARKDOWN_FILE), 'older\n');

        new ComputeUnitBencher({ harness, outDir: dir, now: () => date })
            .bench(transferBench(10))
            .execute();

        expect(read(dir, MARKDOWN_FILE).split('\n').slice(4)).toEqual([
            '| transfer | 150 | -1,050 |',
            '',
            'older',
            '',
        ]);
    });

    it('rejects a malformed previous report', () => {
        const dir = outDir();
        fs.writeFileSync(path.join(dir, JSON_FILE), '{"results": [{"name": 1}]}');

        expect(() => readPreviousResults(dir)).toThrow(BenchErrorCode.INVALID_REPORT);
    });

    it('fails a bench that must pass', () => {
        const bencher = new ComputeUnitBencher({
            harness,
            outDir: outDir(),
            mustPass: true,
        }).bench(transferBench(101));

        expect(() => bencher.execute()).toThrow(
            'BENCH_FAILED: transfer: failure (custom program error: 0x1)',
        );
    });

    it('rejects a non-positive iteration count', () => {
        expect(() => new ComputeUnitBencher({ harness, iterations: 0 })).toThrow(
            BenchError,
        );
    });
});
