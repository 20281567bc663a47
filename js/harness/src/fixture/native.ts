import { Buffer } from 'buffer';
import { TransactionInstruction } from '@solana/web3.js';
import {
    Fixture,
    FixtureAccount,
    FixtureProgramResult,
    FixtureResultKind,
    FixtureSysvars,
} from '@svm-harness/fixture';
import type { Environment } from '../config/environment';
import { FeatureSet } from '../config/feature-set';
import type { Sysvars } from '../config/sysvars';
import { FixtureAdapterError, FixtureAdapterErrorCode } from '../errors';
import {
    failure,
    Fault,
    InstructionResult,
    isInstructionErrorName,
    ProgramOutcome,
    SUCCESS,
} from '../result';
import type { KeyedAccount } from '../state/account';

/**
 * One instruction call as a fixture describes it: the environment it ran
 * in, its inputs and the result it produced.
 */
export interface ParsedFixture {
    environment: Environment;
    instruction: TransactionInstruction;
    accounts: KeyedAccount[];
    result: InstructionResult;
}

export function toFixtureAccount([pubkey, account]: KeyedAccount): FixtureAccount {
    return {
        pubkey,
        lamports: account.lamports,
        data: Uint8Array.from(account.data),
        owner: account.owner,
        executable: account.executable,
        rentEpoch: account.rentEpoch,
    };
}

export function fromFixtureAccount(account: FixtureAccount): KeyedAccount {
    return [
        account.pubkey,
        {
            lamports: account.lamports,
            data: Uint8Array.from(account.data),
            owner: account.owner,
            executable: account.executable,
            rentEpoch: account.rentEpoch,
        },
    ];
}

export function toFixtureProgramResult(
    outcome: ProgramOutcome,
): FixtureProgramResult {
    const result = (
        kind: FixtureResultKind,
        fields: Partial<Omit<FixtureProgramResult, 'kind'>> = {},
    ): FixtureProgramResult => ({
        kind,
        code: fields.code ?? 0,
        pubkey: fields.pubkey ?? null,
        message: fields.message ?? '',
    });
    if (outcome.status === 'success') return result(FixtureResultKind.Success);
    const { fault } = outcome;
    switch (fault.kind) {
        case 'unknownProgram':
            return result(FixtureResultKind.UnknownProgram, {
                pubkey: fault.programId,
            });
        case 'programError':
            return result(FixtureResultKind.ProgramError, { code: fault.code });
        case 'instructionError':
            return result(FixtureResultKind.InstructionError, {
                message: fault.name,
            });
        case 'computeBudgetExceeded':
            return result(FixtureResultKind.ComputeBudgetExceeded);
        case 'writabilityViolation':
            return result(FixtureResultKind.WritabilityViolation, {
                pubkey: fault.pubkey,
            });
        case 'vmFault':
            return result(FixtureResultKind.VmFault, { message: fault.message });
        case 'missingAccount':
            return result(FixtureResultKind.MissingAccount, {
                pubkey: fault.pubkey,
            });
    }
}

export function fromFixtureProgramResult(
    result: FixtureProgramResult,
): ProgramOutcome {
    const invalid = (message: string): never => {
        throw new FixtureAdapterError(
            FixtureAdapterErrorCode.INVALID_RESULT,
            'fromFixtureProgramResult',
            message,
        );
    };
    const pubkey = () =>
        result.pubkey ?? invalid(`${FixtureResultKind[result.kind]} needs a pubkey`);

    switch (result.kind) {
        case FixtureResultKind.Success:
            return SUCCESS;
        case FixtureResultKind.UnknownProgram:
            return failure(Fault.unknownProgram(pubkey()));
        case FixtureResultKind.ProgramError:
            return failure(Fault.programError(result.code));
        case FixtureResultKind.InstructionError:
            return isInstructionErrorName(result.message)
                ? failure(Fault.instructionError(result.message))
                : invalid(`Unknown instruction error ${result.message}`);
        case FixtureResultKind.ComputeBudgetExceeded:
            return failure(Fault.computeBudgetExceeded());
        case FixtureResultKind.WritabilityViolation:
            return failure(Fault.writabilityViolation(result.pubkey));
        case FixtureResultKind.VmFault:
            return failure(Fault.vmFault(result.message));
        case FixtureResultKind.MissingAccount:
            return failure(Fault.missingAccount(pubkey()));
    }
}

function toFixtureSysvars(sysvars: Sysvars): FixtureSysvars {
    return {
        clock: { ...sysvars.clock },
        epochRewards: { ...sysvars.epochRewards },
        epochSchedule: { ...sysvars.epochSchedule },
        rent: { ...sysvars.rent },
        slotHashes: sysvars.slotHashes.map(entry => ({ ...entry })),
        stakeHistory: sysvars.stakeHistory.map(entry => ({ ...entry })),
    };
}

/**
 * Captures one call as a native fixture. `accounts` are the inputs the
 * instruction ran against.
 */
export function buildFixture(
    environment: Environment,
    instruction: TransactionInstruction,
    accounts: readonly KeyedAccount[],
    result: InstructionResult,
): Fixture {
    const program = environment.programs.get(instruction.programId);
    return {
        metadata: {
            entrypoint: program?.name ?? instruction.programId.toBase58(),
        },
        input: {
            computeBudget: { ...environment.computeBudget },
            featureSet: environment.featureSet.activeFeatures(),
            sysvars: toFixtureSysvars(environment.sysvars),
            programId: instruction.programId,
            instructionAccounts: instruction.keys.map(meta => ({ ...meta })),
            instructionData: Uint8Array.from(instruction.data),
            accounts: accounts.map(toFixtureAccount),
        },
        output: {
            computeUnitsConsumed: result.computeUnitsConsumed,
            programResult: toFixtureProgramResult(result.programResult),
            returnData: Uint8Array.from(result.returnData),
            resultingAccounts: result.resultingAccounts.map(toFixtureAccount),
        },
    };
}

/**
 * Reads a native fixture against `base`. Compute budget, features and
 * sysvars come from the fixture; programs and search paths from `base`.
 */
export function parseFixture(fixture: Fixture, base: Environment): ParsedFixture {
    const { input, output } = fixture;
    const environment = base
        .withComputeBudget({ ...input.computeBudget })
        .withFeatureSet(FeatureSet.fromActive(input.featureSet))
        .withSysvars(base.sysvars.with({ ...input.sysvars }));
    return {
        environment,
        instruction: new TransactionInstruction({
            programId: input.programId,
            keys: input.instructionAccounts.map(meta => ({ ...meta })),
            data: Buffer.from(input.instructionData),
        }),
        accounts: input.accounts.map(fromFixtureAccount),
        result: {
            programResult: fromFixtureProgramResult(output.programResult),
            computeUnitsConsumed: output.computeUnitsConsumed,
            returnData: Uint8Array.from(output.returnData),
            logs: [],
            resultingAccounts: output.resultingAccounts.map(fromFixtureAccount),
        },
    };
}
