import { Buffer } from 'buffer';
import { PublicKey } from '@solana/web3.js';
import {
    array,
    bigint,
    boolean,
    coerce,
    create,
    enums,
    instance,
    integer,
    nullable,
    number,
    string,
    type,
    Struct,
    StructError,
} from 'superstruct';
import {
    Fixture,
    FixtureAccount,
    FixtureResultKind,
    InterchangeAccountState,
    InterchangeFixture,
} from './types';
import { FixtureError, FixtureErrorCode } from './errors';

/**
 * @internal
 */
const PublicKeyFromString = coerce(
    instance(PublicKey),
    string(),
    value => new PublicKey(value),
);

/**
 * @internal
 * u64 and i64 values travel as decimal strings.
 */
const BigIntFromString = coerce(bigint(), string(), value => BigInt(value));

/**
 * @internal
 */
const BytesFromBase64 = coerce(
    instance(Uint8Array),
    string(),
    value => new Uint8Array(Buffer.from(value, 'base64')),
);

const RESULT_KIND_NAMES = [
    'Success',
    'UnknownProgram',
    'ProgramError',
    'InstructionError',
    'ComputeBudgetExceeded',
    'WritabilityViolation',
    'VmFault',
    'MissingAccount',
] as const;

const FixtureAccountResult = type({
    pubkey: PublicKeyFromString,
    lamports: BigIntFromString,
    data: BytesFromBase64,
    owner: PublicKeyFromString,
    executable: boolean(),
    rentEpoch: BigIntFromString,
});

const FixtureResult = type({
    metadata: type({ entrypoint: string() }),
    input: type({
        computeBudget: type({
            computeUnitLimit: BigIntFromString,
            heapSize: integer(),
            maxInstructionStackDepth: integer(),
            maxInstructionTraceLength: integer(),
            invokeUnits: BigIntFromString,
            cpiBytesPerUnit: BigIntFromString,
            maxCpiInstructionSize: integer(),
        }),
        featureSet: array(PublicKeyFromString),
        sysvars: type({
            clock: type({
                slot: BigIntFromString,
                epochStartTimestamp: BigIntFromString,
                epoch: BigIntFromString,
                leaderScheduleEpoch: BigIntFromString,
                unixTimestamp: BigIntFromString,
            }),
            epochRewards: type({
                distributionStartingBlockHeight: BigIntFromString,
                numPartitions: BigIntFromString,
                parentBlockhash: BytesFromBase64,
                totalPoints: BigIntFromString,
                totalRewards: BigIntFromString,
                distributedRewards: BigIntFromString,
                active: boolean(),
            }),
            epochSchedule: type({
                slotsPerEpoch: BigIntFromString,
                leaderScheduleSlotOffset: BigIntFromString,
                warmup: boolean(),
                firstNormalEpoch: BigIntFromString,
                firstNormalSlot: BigIntFromString,
            }),
            rent: type({
                lamportsPerByteYear: BigIntFromString,
                exemptionThreshold: number(),
                burnPercent: integer(),
            }),
            slotHashes: array(
                type({ slot: BigIntFromString, hash: BytesFromBase64 }),
            ),
            stakeHistory: array(
                type({
                    epoch: BigIntFromString,
                    effective: BigIntFromString,
                    activating: BigIntFromString,
                    deactivating: BigIntFromString,
                }),
            ),
        }),
        programId: PublicKeyFromString,
        instructionAccounts: array(
            type({
                pubkey: PublicKeyFromString,
                isSigner: boolean(),
                isWritable: boolean(),
            }),
        ),
        instructionData: BytesFromBase64,
        accounts: array(FixtureAccountResult),
    }),
    output: type({
        computeUnitsConsumed: BigIntFromString,
        programResult: type({
            kind: enums(RESULT_KIND_NAMES),
            code: integer(),
            pubkey: nullable(PublicKeyFromString),
            message: string(),
        }),
        returnData: BytesFromBase64,
        resultingAccounts: array(FixtureAccountResult),
    }),
});

const InterchangeAccountResult = type({
    address: PublicKeyFromString,
    lamports: BigIntFromString,
    data: BytesFromBase64,
    executable: boolean(),
    rentEpoch: BigIntFromString,
    owner: PublicKeyFromString,
    seedAddress: nullable(
        type({
            base: PublicKeyFromString,
            seed: string(),
            owner: PublicKeyFromString,
        }),
    ),
});

const InterchangeFixtureResult = type({
    metadata: type({ entrypoint: string() }),
    input: type({
        programId: PublicKeyFromString,
        accounts: array(InterchangeAccountResult),
        instructionAccounts: array(
            type({
                index: integer(),
                isWritable: boolean(),
                isSigner: boolean(),
            }),
        ),
        data: BytesFromBase64,
        computeUnitsAvailable: BigIntFromString,
        slot: BigIntFromString,
        features: array(BigIntFromString),
    }),
    output: type({
        result: integer(),
        customError: integer(),
        modifiedAccounts: array(InterchangeAccountResult),
        computeUnitsAvailable: BigIntFromString,
        returnData: BytesFromBase64,
    }),
});

function parseJson<T, S>(
    text: string,
    schema: Struct<T, S>,
    functionName: string,
): T {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new FixtureError(
            FixtureErrorCode.INVALID_JSON,
            functionName,
            error instanceof Error ? error.message : String(error),
        );
    }
    try {
        return create(value, schema);
    } catch (error) {
        if (error instanceof StructError) {
            throw new FixtureError(
                FixtureErrorCode.INVALID_JSON,
                functionName,
                `${error.path.join('.')}: ${error.message}`,
            );
        }
        throw error;
    }
}

const base64 = (bytes: Uint8Array): string =>
    Buffer.from(bytes).toString('base64');

function accountToJson(account: FixtureAccount) {
    return {
        pubkey: account.pubkey.toBase58(),
        lamports: account.lamports.toString(),
        data: base64(account.data),
        owner: account.owner.toBase58(),
        executable: account.executable,
        rentEpoch: account.rentEpoch.toString(),
    };
}

/**
 * Serializes a fixture as pretty-printed JSON. Integers wider than 53 bits
 * are written as decimal strings, byte strings as base64 and addresses as
 * base58.
 */
export function fixtureToJson(fixture: Fixture): string {
    const { input, output } = fixture;
    const { clock, epochRewards, epochSchedule, rent } = input.sysvars;
    const budget = input.computeBudget;
    const json = {
        metadata: { entrypoint: fixture.metadata.entrypoint },
        input: {
            computeBudget: {
                computeUnitLimit: budget.computeUnitLimit.toString(),
                heapSize: budget.heapSize,
                maxInstructionStackDepth: budget.maxInstructionStackDepth,
                maxInstructionTraceLength: budget.maxInstructionTraceLength,
                invokeUnits: budget.invokeUnits.toString(),
                cpiBytesPerUnit: budget.cpiBytesPerUnit.toString(),
                maxCpiInstructionSize: budget.maxCpiInstructionSize,
            },
            featureSet: input.featureSet.map(feature => feature.toBase58()),
            sysvars: {
                clock: {
                    slot: clock.slot.toString(),
                    epochStartTimestamp: clock.epochStartTimestamp.toString(),
                    epoch: clock.epoch.toString(),
                    leaderScheduleEpoch: clock.leaderScheduleEpoch.toString(),
                    unixTimestamp: clock.unixTimestamp.toString(),
                },
                epochRewards: {
                    distributionStartingBlockHeight:
                        epochRewards.distributionStartingBlockHeight.toString(),
                    numPartitions: epochRewards.numPartitions.toString(),
                    parentBlockhash: base64(epochRewards.parentBlockhash),
                    totalPoints: epochRewards.totalPoints.toString(),
                    totalRewards: epochRewards.totalRewards.toString(),
                    distributedRewards:
                        epochRewards.distributedRewards.toString(),
                    active: epochRewards.active,
                },
                epochSchedule: {
                    slotsPerEpoch: epochSchedule.slotsPerEpoch.toString(),
                    leaderScheduleSlotOffset:
                        epochSchedule.leaderScheduleSlotOffset.toString(),
                    warmup: epochSchedule.warmup,
                    firstNormalEpoch: epochSchedule.firstNormalEpoch.toString(),
                    firstNormalSlot: epochSchedule.firstNormalSlot.toString(),
                },
                rent: {
                    lamportsPerByteYear: rent.lamportsPerByteYear.toString(),
                    exemptionThreshold: rent.exemptionThreshold,
                    burnPercent: rent.burnPercent,
                },
                slotHashes: input.sysvars.slotHashes.map(entry => ({
                    slot: entry.slot.toString(),
                    hash: base64(entry.hash),
                })),
                stakeHistory: input.sysvars.stakeHistory.map(entry => ({
                    epoch: entry.epoch.toString(),
                    effective: entry.effective.toString(),
                    activating: entry.activating.toString(),
                    deactivating: entry.deactivating.toString(),
                })),
            },
            programId: input.programId.toBase58(),
            instructionAccounts: input.instructionAccounts.map(meta => ({
                pubkey: meta.pubkey.toBase58(),
                isSigner: meta.isSigner,
                isWritable: meta.isWritable,
            })),
            instructionData: base64(input.instructionData),
            accounts: input.accounts.map(accountToJson),
        },
        output: {
            computeUnitsConsumed: output.computeUnitsConsumed.toString(),
            programResult: {
                kind: FixtureResultKind[output.programResult.kind],
                code: output.programResult.code,
                pubkey: output.programResult.pubkey?.toBase58() ?? null,
                message: output.programResult.message,
            },
            returnData: base64(output.returnData),
            resultingAccounts: output.resultingAccounts.map(accountToJson),
        },
    };
    return JSON.stringify(json, null, 2);
}

export function fixtureFromJson(text: string): Fixture {
    const parsed = parseJson(text, FixtureResult, 'fixtureFromJson');
    const { programResult } = parsed.output;
    return {
        metadata: parsed.metadata,
        input: parsed.input,
        output: {
            ...parsed.output,
            programResult: {
                ...programResult,
                kind: FixtureResultKind[programResult.kind],
            },
        },
    };
}

function interchangeAccountToJson(account: InterchangeAccountState) {
    return {
        address: account.address.toBase58(),
        lamports: account.lamports.toString(),
        data: base64(account.data),
        executable: account.executable,
        rentEpoch: account.rentEpoch.toString(),
        owner: account.owner.toBase58(),
        seedAddress: account.seedAddress
            ? {
                  base: account.seedAddress.base.toBase58(),
                  seed: account.seedAddress.seed,
                  owner: account.seedAddress.owner.toBase58(),
              }
            : null,
    };
}

export function interchangeFixtureToJson(fixture: InterchangeFixture): string {
    const { input, output } = fixture;
    const json = {
        metadata: { entrypoint: fixture.metadata.entrypoint },
        input: {
            programId: input.programId.toBase58(),
            accounts: input.accounts.map(interchangeAccountToJson),
            instructionAccounts: input.instructionAccounts,
            data: base64(input.data),
            computeUnitsAvailable: input.computeUnitsAvailable.toString(),
            slot: input.slot.toString(),
            features: input.features.map(feature => feature.toString()),
        },
        output: {
            result: output.result,
            customError: output.customError,
            modifiedAccounts: output.modifiedAccounts.map(
                interchangeAccountToJson,
            ),
            computeUnitsAvailable: output.computeUnitsAvailable.toString(),
            returnData: base64(output.returnData),
        },
    };
    return JSON.stringify(json, null, 2);
}

export function interchangeFixtureFromJson(text: string): InterchangeFixture {
    return parseJson(
        text,
        InterchangeFixtureResult,
        'interchangeFixtureFromJson',
    );
}
