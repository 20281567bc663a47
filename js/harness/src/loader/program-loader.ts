import type { AccountMeta, PublicKey } from '@solana/web3.js';
import type { ComputeBudget } from '../config/compute-budget';
import type { FeatureSet } from '../config/feature-set';
import type { Sysvars } from '../config/sysvars';
import type { ElfProgram, ProgramRegistry } from '../programs/registry';
import type { ExecutionFault } from '../result';
import type { Account, KeyedAccount } from '../state/account';

export interface LoaderAccount {
    pubkey: PublicKey;
    isSigner: boolean;
    isWritable: boolean;
    account: Account;
}

/**
 * One execution request for a program image.
 */
export interface LoaderInvocation {
    programId: PublicKey;
    program: ElfProgram;
    /** Distinct accounts of the instruction, flags merged. */
    accounts: LoaderAccount[];
    /** The instruction's account metas as written. */
    instructionAccounts: AccountMeta[];
    data: Uint8Array;
    /** Units left on the meter. */
    computeUnitLimit: bigint;
    computeBudget: ComputeBudget;
    featureSet: FeatureSet;
    sysvars: Sysvars;
    /** Every registered program, for cross-program invocations. */
    programs: ProgramRegistry;
}

export type LoaderOutcome =
    | {
          status: 'success';
          accounts: KeyedAccount[];
          returnData: Uint8Array;
          computeUnitsConsumed: bigint;
          logs: string[];
      }
    | {
          status: 'failure';
          fault: ExecutionFault;
          computeUnitsConsumed: bigint;
          logs: string[];
      };

/**
 * Executes program images. The pipeline hands it an invocation and takes
 * back mutated accounts or a fault; how the image runs is up to the
 * implementation.
 */
export interface ProgramLoader {
    invoke(invocation: LoaderInvocation): LoaderOutcome;
}
