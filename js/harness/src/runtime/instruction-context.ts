import type { PublicKey, TransactionInstruction } from '@solana/web3.js';
import type { ComputeBudget } from '../config/compute-budget';
import type { FeatureSet } from '../config/feature-set';
import type { Sysvars } from '../config/sysvars';
import {
    ExecutionFault,
    Fault,
    formatFault,
    InstructionErrorName,
} from '../result';
import type { Account } from '../state/account';

/**
 * One account of the running instruction. `account` is live: processors
 * mutate it in place. Duplicate references share one object.
 */
export interface InstructionAccount {
    readonly pubkey: PublicKey;
    readonly isSigner: boolean;
    readonly isWritable: boolean;
    readonly account: Account;
}

/**
 * What a builtin processor sees of the instruction it runs.
 */
export interface InstructionContext {
    readonly programId: PublicKey;
    readonly data: Uint8Array;
    /** In the order of the instruction's account metas. */
    readonly accounts: readonly InstructionAccount[];
    readonly computeBudget: ComputeBudget;
    readonly featureSet: FeatureSet;
    readonly sysvars: Sysvars;
    /** Nesting level: 1 for the top-level instruction. */
    readonly stackHeight: number;

    /** Throws a compute budget fault once the meter runs dry. */
    consumeComputeUnits(units: bigint): void;
    remainingComputeUnits(): bigint;
    log(message: string): void;
    setReturnData(data: Uint8Array): void;
    getReturnData(): { programId: PublicKey; data: Uint8Array } | undefined;
    /**
     * Runs `instruction` as a cross-program invocation. `signerSeeds` sign
     * for addresses derived from the calling program.
     */
    invoke(
        instruction: TransactionInstruction,
        signerSeeds?: readonly (readonly Uint8Array[])[],
    ): void;
}

/**
 * Thrown inside the pipeline to end the running instruction with `fault`.
 */
export class ProcessorError extends Error {
    readonly fault: ExecutionFault;

    constructor(fault: ExecutionFault) {
        super(formatFault(fault));
        this.fault = fault;
    }

    static custom(code: number): ProcessorError {
        return new ProcessorError(Fault.programError(code));
    }

    static instruction(name: InstructionErrorName): ProcessorError {
        return new ProcessorError(Fault.instructionError(name));
    }
}

/**
 * The account at `index`, or `NotEnoughAccountKeys`.
 */
export function accountAt(
    context: InstructionContext,
    index: number,
): InstructionAccount {
    const account = context.accounts[index];
    if (!account) throw ProcessorError.instruction('NotEnoughAccountKeys');
    return account;
}
