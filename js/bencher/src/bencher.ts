import type { TransactionInstruction } from '@solana/web3.js';
import {
    AccountStoreInput,
    formatOutcome,
    ProgramHarness,
} from '@svm-harness/harness';
import { BenchError, BenchErrorCode } from './errors';
import { logger } from './logger';
import { BenchResult, writeResults } from './report';

export interface Bench {
    name: string;
    instruction: TransactionInstruction;
    accounts: AccountStoreInput;
}

export interface ComputeUnitBencherOptions {
    harness: ProgramHarness;
    /** Defaults to `benches`. */
    outDir?: string;
    /** Throw a `BenchError` when any run fails. */
    mustPass?: boolean;
    /** Runs per bench; defaults to 25. */
    iterations?: number;
    /** Date stamped on the report. */
    now?: () => Date;
}

/**
 * Measures the compute units of named instructions and keeps a running
 * report of them in `outDir`.
 *
 * ```ts
 * new ComputeUnitBencher({ harness, mustPass: true })
 *     .bench({ name: 'transfer', instruction, accounts })
 *     .execute();
 * ```
 */
export class ComputeUnitBencher {
    private readonly harness: ProgramHarness;
    private readonly outDir: string;
    private readonly mustPass: boolean;
    private readonly iterations: number;
    private readonly now: () => Date;
    private readonly benches: Bench[] = [];

    constructor(options: ComputeUnitBencherOptions) {
        const iterations = options.iterations ?? 25;
        if (!Number.isInteger(iterations) || iterations < 1) {
            throw new BenchError(
                BenchErrorCode.INVALID_OPTIONS,
                'ComputeUnitBencher',
                `iterations must be a positive integer, got ${iterations}`,
            );
        }
        this.harness = options.harness;
        this.outDir = options.outDir ?? 'benches';
        this.mustPass = options.mustPass ?? false;
        this.iterations = iterations;
        this.now = options.now ?? (() => new Date());
    }

    bench(bench: Bench): this {
        this.benches.push(bench);
        return this;
    }

    /** Mean compute units of every bench, in the order they were added. */
    measure(): BenchResult[] {
        return this.benches.map(({ name, instruction, accounts }) => {
            let total = 0n;
            for (let i = 0; i < this.iterations; i++) {
                const result = this.harness.processInstruction(instruction, accounts);
                if (this.mustPass && result.programResult.status === 'failure') {
                    throw new BenchError(
                        BenchErrorCode.BENCH_FAILED,
                        'measure',
                        `${name}: ${formatOutcome(result.programResult)}`,
                    );
                }
                total += result.computeUnitsConsumed;
            }
            const mean = total / BigInt(this.iterations);
            logger.debug('bench measured', { name, mean: mean.toString() });
            return { name, mean };
        });
    }

    /** Measures every bench and updates the report. */
    execute(): BenchResult[] {
        const results = this.measure();
        writeResults(this.outDir, results, this.now());
        return results;
    }
}
