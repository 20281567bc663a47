import { Buffer } from 'buffer';
import { PublicKey, TransactionInstruction } from '@solana/web3.js';
import type {
    InterchangeAccountState,
    InterchangeFixture,
} from '@svm-harness/fixture';
import type { Environment } from '../config/environment';
import { FEATURES, featureIdToU64, FeatureSet } from '../config/feature-set';
import { FixtureAdapterError, FixtureAdapterErrorCode } from '../errors';
import { logger } from '../logger';
import { keyedAccountForProgram } from '../programs/accounts';
import {
    failure,
    faultToInstructionError,
    INSTRUCTION_ERROR_NAMES,
    InstructionResult,
    instructionErrorToFault,
    ProgramOutcome,
    SUCCESS,
} from '../result';
import { accountsEqual, KeyedAccount } from '../state/account';
import type { ParsedFixture } from './native';

const FEATURES_BY_ID = new Map(
    Object.values(FEATURES).map(feature => [featureIdToU64(feature), feature]),
);

function toAccountState([address, account]: KeyedAccount): InterchangeAccountState {
    return {
        address,
        lamports: account.lamports,
        data: Uint8Array.from(account.data),
        executable: account.executable,
        rentEpoch: account.rentEpoch,
        owner: account.owner,
        seedAddress: null,
    };
}

function fromAccountState(state: InterchangeAccountState): KeyedAccount {
    return [
        state.address,
        {
            lamports: state.lamports,
            data: Uint8Array.from(state.data),
            owner: state.owner,
            executable: state.executable,
            rentEpoch: state.rentEpoch,
        },
    ];
}

/**
 * The outcome as the interchange layout can express it: every fault
 * becomes the runtime instruction error it corresponds to.
 */
export function normalizeInterchangeOutcome(outcome: ProgramOutcome): ProgramOutcome {
    if (outcome.status === 'success') return SUCCESS;
    const { name, customCode } = faultToInstructionError(outcome.fault);
    return failure(instructionErrorToFault(name, customCode));
}

function resultCode(outcome: ProgramOutcome): { result: number; customError: number } {
    if (outcome.status === 'success') return { result: 0, customError: 0 };
    const { name, customCode } = faultToInstructionError(outcome.fault);
    return {
        result: INSTRUCTION_ERROR_NAMES.indexOf(name) + 1,
        customError: customCode,
    };
}

function outcomeFromCode(result: number, customError: number): ProgramOutcome {
    if (result === 0) return SUCCESS;
    const name = INSTRUCTION_ERROR_NAMES[result - 1];
    if (name === undefined) {
        throw new FixtureAdapterError(
            FixtureAdapterErrorCode.INVALID_RESULT,
            'parseInterchangeFixture',
            `Result code ${result} is not an instruction error`,
        );
    }
    return failure(instructionErrorToFault(name, customError));
}

/**
 * Captures one call in the interchange layout. The program account is
 * added when the inputs lack it; only accounts the call changed are kept
 * in the effects.
 */
export function buildInterchangeFixture(
    environment: Environment,
    instruction: TransactionInstruction,
    accounts: readonly KeyedAccount[],
    result: InstructionResult,
): InterchangeFixture {
    const { programId } = instruction;
    const inputs = [...accounts];
    const program = environment.programs.get(programId);
    if (program && !inputs.some(([pubkey]) => pubkey.equals(programId))) {
        inputs.push(keyedAccountForProgram(program, environment.sysvars.rent));
    }
    const indexOf = (pubkey: PublicKey) =>
        inputs.findIndex(([address]) => address.equals(pubkey));

    const modified = result.resultingAccounts.filter(([pubkey, account]) => {
        const input = inputs.find(([address]) => address.equals(pubkey));
        return !input || !accountsEqual(input[1], account);
    });
    const limit = environment.computeBudget.computeUnitLimit;
    const consumed = result.computeUnitsConsumed;

    return {
        metadata: { entrypoint: program?.name ?? programId.toBase58() },
        input: {
            programId,
            accounts: inputs.map(toAccountState),
            instructionAccounts: instruction.keys.map(meta => ({
                index: indexOf(meta.pubkey),
                isWritable: meta.isWritable,
                isSigner: meta.isSigner,
            })),
            data: Uint8Array.from(instruction.data),
            computeUnitsAvailable: limit,
            slot: environment.sysvars.clock.slot,
            features: environment.featureSet
                .activeFeatures()
                .map(featureIdToU64),
        },
        output: {
            ...resultCode(result.programResult),
            modifiedAccounts: modified.map(toAccountState),
            computeUnitsAvailable: consumed > limit ? 0n : limit - consumed,
            returnData: Uint8Array.from(result.returnData),
        },
    };
}

/**
 * Reads an interchange fixture against `base`. The compute unit limit,
 * the slot and the catalogued features come from the fixture; unknown
 * feature ids are skipped. The expected result lists the modified
 * accounts only.
 */
export function parseInterchangeFixture(
    fixture: InterchangeFixture,
    base: Environment,
): ParsedFixture {
    const { input, output } = fixture;
    const features: PublicKey[] = [];
    for (const id of input.features) {
        const feature = FEATURES_BY_ID.get(id);
        if (feature) {
            features.push(feature);
        } else {
            logger.warn('unknown feature id in interchange fixture', {
                featureId: id.toString(),
            });
        }
    }

    let environment = base
        .withComputeUnitLimit(input.computeUnitsAvailable)
        .withFeatureSet(FeatureSet.fromActive(features));
    if (input.slot !== environment.sysvars.clock.slot) {
        environment = environment.warpToSlot(input.slot);
    }

    const keys = input.instructionAccounts.map(({ index, isSigner, isWritable }) => {
        const account = input.accounts[index];
        if (!account) {
            throw new FixtureAdapterError(
                FixtureAdapterErrorCode.INVALID_ACCOUNT_INDEX,
                'parseInterchangeFixture',
                `Instruction account index ${index} is out of range`,
            );
        }
        return { pubkey: account.address, isSigner, isWritable };
    });
    const remaining = output.computeUnitsAvailable;

    return {
        environment,
        instruction: new TransactionInstruction({
            programId: input.programId,
            keys,
            data: Buffer.from(input.data),
        }),
        accounts: input.accounts.map(fromAccountState),
        result: {
            programResult: outcomeFromCode(output.result, output.customError),
            computeUnitsConsumed:
                remaining > input.computeUnitsAvailable
                    ? 0n
                    : input.computeUnitsAvailable - remaining,
            returnData: Uint8Array.from(output.returnData),
            logs: [],
            resultingAccounts: output.modifiedAccounts.map(fromAccountState),
        },
    };
}
