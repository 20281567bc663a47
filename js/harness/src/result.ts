import { PublicKey } from '@solana/web3.js';
import {
    Account,
    accountsEqual,
    bytesEqual,
    cloneAccount,
    KeyedAccount,
} from './state/account';

/**
 * Runtime instruction error names, in discriminant order.
 */
export const INSTRUCTION_ERROR_NAMES = [
    'GenericError',
    'InvalidArgument',
    'InvalidInstructionData',
    'InvalidAccountData',
    'AccountDataTooSmall',
    'InsufficientFunds',
    'IncorrectProgramId',
    'MissingRequiredSignature',
    'AccountAlreadyInitialized',
    'UninitializedAccount',
    'UnbalancedInstruction',
    'ModifiedProgramId',
    'ExternalAccountLamportSpend',
    'ExternalAccountDataModified',
    'ReadonlyLamportChange',
    'ReadonlyDataModified',
    'DuplicateAccountIndex',
    'ExecutableModified',
    'RentEpochModified',
    'NotEnoughAccountKeys',
    'AccountDataSizeChanged',
    'AccountNotExecutable',
    'AccountBorrowFailed',
    'AccountBorrowOutstanding',
    'DuplicateAccountOutOfSync',
    'Custom',
    'InvalidError',
    'ExecutableDataModified',
    'ExecutableLamportChange',
    'ExecutableAccountNotRentExempt',
    'UnsupportedProgramId',
    'CallDepth',
    'MissingAccount',
    'ReentrancyNotAllowed',
    'MaxSeedLengthExceeded',
    'InvalidSeeds',
    'InvalidRealloc',
    'ComputationalBudgetExceeded',
    'PrivilegeEscalation',
    'ProgramEnvironmentSetupFailure',
    'ProgramFailedToComplete',
    'ProgramFailedToCompile',
    'Immutable',
    'IncorrectAuthority',
    'BorshIoError',
    'AccountNotRentExempt',
    'InvalidAccountOwner',
    'ArithmeticOverflow',
    'UnsupportedSysvar',
    'IllegalOwner',
    'MaxAccountsDataAllocationsExceeded',
    'MaxAccountsExceeded',
    'MaxInstructionTraceLengthExceeded',
    'BuiltinProgramsMustConsumeComputeUnits',
] as const;

export type InstructionErrorName = (typeof INSTRUCTION_ERROR_NAMES)[number];

export function isInstructionErrorName(
    name: string,
): name is InstructionErrorName {
    return INSTRUCTION_ERROR_NAMES.some(known => known === name);
}

/**
 * Why an instruction failed. `writabilityViolation` is raised when a
 * program changes an account the instruction did not mark writable; its
 * `pubkey` is null when the runtime that caught the write does not say
 * which account it was. `missingAccount` only ends instruction chains.
 */
export type ExecutionFault =
    | { kind: 'unknownProgram'; programId: PublicKey }
    | { kind: 'programError'; code: number }
    | { kind: 'instructionError'; name: InstructionErrorName }
    | { kind: 'computeBudgetExceeded' }
    | { kind: 'writabilityViolation'; pubkey: PublicKey | null }
    | { kind: 'vmFault'; message: string }
    | { kind: 'missingAccount'; pubkey: PublicKey };

export type ProgramOutcome =
    | { status: 'success' }
    | { status: 'failure'; fault: ExecutionFault };

export const Fault = {
    unknownProgram: (programId: PublicKey): ExecutionFault => ({
        kind: 'unknownProgram',
        programId,
    }),
    programError: (code: number): ExecutionFault => ({
        kind: 'programError',
        code,
    }),
    instructionError: (name: InstructionErrorName): ExecutionFault =>
        name === 'Custom'
            ? { kind: 'programError', code: 0 }
            : { kind: 'instructionError', name },
    computeBudgetExceeded: (): ExecutionFault => ({
        kind: 'computeBudgetExceeded',
    }),
    writabilityViolation: (pubkey: PublicKey | null = null): ExecutionFault => ({
        kind: 'writabilityViolation',
        pubkey,
    }),
    vmFault: (message: string): ExecutionFault => ({ kind: 'vmFault', message }),
    missingAccount: (pubkey: PublicKey): ExecutionFault => ({
        kind: 'missingAccount',
        pubkey,
    }),
};

export const SUCCESS: ProgramOutcome = { status: 'success' };

export function failure(fault: ExecutionFault): ProgramOutcome {
    return { status: 'failure', fault };
}

export function faultsEqual(a: ExecutionFault, b: ExecutionFault): boolean {
    switch (a.kind) {
        case 'unknownProgram':
            return b.kind === a.kind && b.programId.equals(a.programId);
        case 'programError':
            return b.kind === a.kind && b.code === a.code;
        case 'instructionError':
            return b.kind === a.kind && b.name === a.name;
        case 'computeBudgetExceeded':
            return b.kind === a.kind;
        case 'writabilityViolation':
            return (
                b.kind === a.kind &&
                (a.pubkey === null || b.pubkey === null
                    ? a.pubkey === b.pubkey
                    : b.pubkey.equals(a.pubkey))
            );
        case 'vmFault':
            return b.kind === a.kind && b.message === a.message;
        case 'missingAccount':
            return b.kind === a.kind && b.pubkey.equals(a.pubkey);
    }
}

export function outcomesEqual(a: ProgramOutcome, b: ProgramOutcome): boolean {
    if (a.status === 'success' || b.status === 'success') {
        return a.status === b.status;
    }
    return faultsEqual(a.fault, b.fault);
}

export function formatFault(fault: ExecutionFault): string {
    switch (fault.kind) {
        case 'unknownProgram':
            return `unknown program ${fault.programId.toBase58()}`;
        case 'programError':
            return `custom program error: 0x${fault.code.toString(16)}`;
        case 'instructionError':
            return `instruction error: ${fault.name}`;
        case 'computeBudgetExceeded':
            return 'exceeded compute budget';
        case 'writabilityViolation':
            return fault.pubkey
                ? `account ${fault.pubkey.toBase58()} modified but not writable`
                : 'read-only account modified';
        case 'vmFault':
            return `vm fault: ${fault.message}`;
        case 'missingAccount':
            return `account ${fault.pubkey.toBase58()} missing`;
    }
}

export function formatOutcome(outcome: ProgramOutcome): string {
    return outcome.status === 'success'
        ? 'success'
        : `failure (${formatFault(outcome.fault)})`;
}

/**
 * The runtime instruction error a fault corresponds to.
 * `writabilityViolation` maps to `ReadonlyDataModified` and `vmFault` to
 * `ProgramFailedToComplete`.
 */
export function faultToInstructionError(
    fault: ExecutionFault,
): { name: InstructionErrorName; customCode: number } {
    switch (fault.kind) {
        case 'unknownProgram':
            return { name: 'UnsupportedProgramId', customCode: 0 };
        case 'programError':
            return { name: 'Custom', customCode: fault.code };
        case 'instructionError':
            return { name: fault.name, customCode: 0 };
        case 'computeBudgetExceeded':
            return { name: 'ComputationalBudgetExceeded', customCode: 0 };
        case 'writabilityViolation':
            return { name: 'ReadonlyDataModified', customCode: 0 };
        case 'vmFault':
            return { name: 'ProgramFailedToComplete', customCode: 0 };
        case 'missingAccount':
            return { name: 'MissingAccount', customCode: 0 };
    }
}

export function instructionErrorToFault(
    name: InstructionErrorName,
    customCode: number,
): ExecutionFault {
    switch (name) {
        case 'Custom':
            return Fault.programError(customCode);
        case 'ComputationalBudgetExceeded':
            return Fault.computeBudgetExceeded();
        default:
            return Fault.instructionError(name);
    }
}

export interface InstructionResult {
    programResult: ProgramOutcome;
    computeUnitsConsumed: bigint;
    returnData: Uint8Array;
    logs: string[];
    /**
     * Every account the instruction references, once each, in the order
     * of first reference.
     */
    resultingAccounts: KeyedAccount[];
}

export interface ChainResult extends InstructionResult {
    /** Results of the steps that ran, in order. */
    steps: InstructionResult[];
    /** Index of the step that failed or was aborted, if any. */
    abortedAt?: number;
}

export function getResultingAccount(
    result: Pick<InstructionResult, 'resultingAccounts'>,
    pubkey: PublicKey,
): Account | undefined {
    const entry = result.resultingAccounts.find(([key]) => key.equals(pubkey));
    return entry ? cloneAccount(entry[1]) : undefined;
}

/**
 * Equality of everything a deterministic run reproduces: outcome, units,
 * return data and resulting accounts. Logs are left out.
 */
export function resultsEqual(a: InstructionResult, b: InstructionResult): boolean {
    return (
        outcomesEqual(a.programResult, b.programResult) &&
        a.computeUnitsConsumed === b.computeUnitsConsumed &&
        bytesEqual(a.returnData, b.returnData) &&
        a.resultingAccounts.length === b.resultingAccounts.length &&
        a.resultingAccounts.every(([key, account], i) => {
            const [otherKey, otherAccount] = b.resultingAccounts[i];
            return key.equals(otherKey) && accountsEqual(account, otherAccount);
        })
    );
}
