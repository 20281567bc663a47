import { Buffer } from 'buffer';
import type { PublicKey } from '@solana/web3.js';
import {
    struct,
    u8,
    u32,
    u64,
    i64,
    u128,
    f64,
    bool,
    vec,
    vecU8,
    str,
    option,
    publicKey,
    Layout,
} from '@coral-xyz/borsh';
import BN from 'bn.js';
import {
    Fixture,
    FixtureAccount,
    FixtureAccountMeta,
    FixtureContext,
    FixtureEffects,
    FixtureResultKind,
    FixtureSysvars,
} from './types';
import { FixtureError, FixtureErrorCode } from './errors';

/* Borsh records mirror the fixture types with BN in place of bigint. */

type AccountRecord = {
    pubkey: PublicKey;
    lamports: BN;
    data: Buffer;
    owner: PublicKey;
    executable: boolean;
    rentEpoch: BN;
};

type AccountMetaRecord = FixtureAccountMeta;

type ComputeBudgetRecord = {
    computeUnitLimit: BN;
    heapSize: number;
    maxInstructionStackDepth: number;
    maxInstructionTraceLength: number;
    invokeUnits: BN;
    cpiBytesPerUnit: BN;
    maxCpiInstructionSize: number;
};

type SysvarsRecord = {
    clock: {
        slot: BN;
        epochStartTimestamp: BN;
        epoch: BN;
        leaderScheduleEpoch: BN;
        unixTimestamp: BN;
    };
    epochRewards: {
        distributionStartingBlockHeight: BN;
        numPartitions: BN;
        parentBlockhash: Buffer;
        totalPoints: BN;
        totalRewards: BN;
        distributedRewards: BN;
        active: boolean;
    };
    epochSchedule: {
        slotsPerEpoch: BN;
        leaderScheduleSlotOffset: BN;
        warmup: boolean;
        firstNormalEpoch: BN;
        firstNormalSlot: BN;
    };
    rent: {
        lamportsPerByteYear: BN;
        exemptionThreshold: number;
        burnPercent: number;
    };
    slotHashes: { slot: BN; hash: Buffer }[];
    stakeHistory: {
        epoch: BN;
        effective: BN;
        activating: BN;
        deactivating: BN;
    }[];
};

type FixtureRecord = {
    metadata: { entrypoint: string };
    input: {
        computeBudget: ComputeBudgetRecord;
        featureSet: PublicKey[];
        sysvars: SysvarsRecord;
        programId: PublicKey;
        instructionAccounts: AccountMetaRecord[];
        instructionData: Buffer;
        accounts: AccountRecord[];
    };
    output: {
        computeUnitsConsumed: BN;
        programResult: {
            kind: number;
            code: number;
            pubkey: PublicKey | null;
            message: string;
        };
        returnData: Buffer;
        resultingAccounts: AccountRecord[];
    };
};

export const FixtureAccountLayout = struct(
    [
        publicKey('pubkey'),
        u64('lamports'),
        vecU8('data'),
        publicKey('owner'),
        bool('executable'),
        u64('rentEpoch'),
    ],
    'account',
);

export const FixtureAccountMetaLayout = struct(
    [publicKey('pubkey'), bool('isSigner'), bool('isWritable')],
    'accountMeta',
);

export const FixtureComputeBudgetLayout = struct(
    [
        u64('computeUnitLimit'),
        u32('heapSize'),
        u32('maxInstructionStackDepth'),
        u32('maxInstructionTraceLength'),
        u64('invokeUnits'),
        u64('cpiBytesPerUnit'),
        u32('maxCpiInstructionSize'),
    ],
    'computeBudget',
);

export const FixtureSysvarsLayout = struct(
    [
        struct(
            [
                u64('slot'),
                i64('epochStartTimestamp'),
                u64('epoch'),
                u64('leaderScheduleEpoch'),
                i64('unixTimestamp'),
            ],
            'clock',
        ),
        struct(
            [
                u64('distributionStartingBlockHeight'),
                u64('numPartitions'),
                vecU8('parentBlockhash'),
                u128('totalPoints'),
                u64('totalRewards'),
                u64('distributedRewards'),
                bool('active'),
            ],
            'epochRewards',
        ),
        struct(
            [
                u64('slotsPerEpoch'),
                u64('leaderScheduleSlotOffset'),
                bool('warmup'),
                u64('firstNormalEpoch'),
                u64('firstNormalSlot'),
            ],
            'epochSchedule',
        ),
        struct(
            [
                u64('lamportsPerByteYear'),
                f64('exemptionThreshold'),
                u8('burnPercent'),
            ],
            'rent',
        ),
        vec(struct([u64('slot'), vecU8('hash')]), 'slotHashes'),
        vec(
            struct([
                u64('epoch'),
                u64('effective'),
                u64('activating'),
                u64('deactivating'),
            ]),
            'stakeHistory',
        ),
    ],
    'sysvars',
);

export const FixtureLayout: Layout<FixtureRecord> = struct([
    struct([str('entrypoint')], 'metadata'),
    struct(
        [
            FixtureComputeBudgetLayout,
            vec(publicKey(), 'featureSet'),
            FixtureSysvarsLayout,
            publicKey('programId'),
            vec(FixtureAccountMetaLayout, 'instructionAccounts'),
            vecU8('instructionData'),
            vec(FixtureAccountLayout, 'accounts'),
        ],
        'input',
    ),
    struct(
        [
            u64('computeUnitsConsumed'),
            struct(
                [
                    u8('kind'),
                    u32('code'),
                    option(publicKey(), 'pubkey'),
                    str('message'),
                ],
                'programResult',
            ),
            vecU8('returnData'),
            vec(FixtureAccountLayout, 'resultingAccounts'),
        ],
        'output',
    ),
]);

const toBN = (value: bigint): BN => new BN(value.toString());
const toBigInt = (value: BN): bigint => BigInt(value.toString());
const toBuffer = (bytes: Uint8Array): Buffer => Buffer.from(bytes);
const toBytes = (buffer: Buffer): Uint8Array => new Uint8Array(buffer);

/** Upper bound of the encoded size: fixed overhead plus every byte string. */
function encodedSizeHint(byteLengths: number[], records: number): number {
    const bytes = byteLengths.reduce((sum, len) => sum + len, 0);
    return 64 * 1024 + bytes + records * 256;
}

function accountToRecord(account: FixtureAccount): AccountRecord {
    return {
        pubkey: account.pubkey,
        lamports: toBN(account.lamports),
        data: toBuffer(account.data),
        owner: account.owner,
        executable: account.executable,
        rentEpoch: toBN(account.rentEpoch),
    };
}

function accountFromRecord(record: AccountRecord): FixtureAccount {
    return {
        pubkey: record.pubkey,
        lamports: toBigInt(record.lamports),
        data: toBytes(record.data),
        owner: record.owner,
        executable: record.executable,
        rentEpoch: toBigInt(record.rentEpoch),
    };
}

function sysvarsToRecord(sysvars: FixtureSysvars): SysvarsRecord {
    const { clock, epochRewards, epochSchedule, rent } = sysvars;
    return {
        clock: {
            slot: toBN(clock.slot),
            epochStartTimestamp: toBN(clock.epochStartTimestamp),
            epoch: toBN(clock.epoch),
            leaderScheduleEpoch: toBN(clock.leaderScheduleEpoch),
            unixTimestamp: toBN(clock.unixTimestamp),
        },
        epochRewards: {
            distributionStartingBlockHeight: toBN(
                epochRewards.distributionStartingBlockHeight,
            ),
            numPartitions: toBN(epochRewards.numPartitions),
            parentBlockhash: toBuffer(epochRewards.parentBlockhash),
            totalPoints: toBN(epochRewards.totalPoints),
            totalRewards: toBN(epochRewards.totalRewards),
            distributedRewards: toBN(epochRewards.distributedRewards),
            active: epochRewards.active,
        },
        epochSchedule: {
            slotsPerEpoch: toBN(epochSchedule.slotsPerEpoch),
            leaderScheduleSlotOffset: toBN(
                epochSchedule.leaderScheduleSlotOffset,
            ),
            warmup: epochSchedule.warmup,
            firstNormalEpoch: toBN(epochSchedule.firstNormalEpoch),
            firstNormalSlot: toBN(epochSchedule.firstNormalSlot),
        },
        rent: {
            lamportsPerByteYear: toBN(rent.lamportsPerByteYear),
            exemptionThreshold: rent.exemptionThreshold,
            burnPercent: rent.burnPercent,
        },
        slotHashes: sysvars.slotHashes.map(entry => ({
            slot: toBN(entry.slot),
            hash: toBuffer(entry.hash),
        })),
        stakeHistory: sysvars.stakeHistory.map(entry => ({
            epoch: toBN(entry.epoch),
            effective: toBN(entry.effective),
            activating: toBN(entry.activating),
            deactivating: toBN(entry.deactivating),
        })),
    };
}

function sysvarsFromRecord(record: SysvarsRecord): FixtureSysvars {
    const { clock, epochRewards, epochSchedule, rent } = record;
    return {
        clock: {
            slot: toBigInt(clock.slot),
            epochStartTimestamp: toBigInt(clock.epochStartTimestamp),
            epoch: toBigInt(clock.epoch),
            leaderScheduleEpoch: toBigInt(clock.leaderScheduleEpoch),
            unixTimestamp: toBigInt(clock.unixTimestamp),
        },
        epochRewards: {
            distributionStartingBlockHeight: toBigInt(
                epochRewards.distributionStartingBlockHeight,
            ),
            numPartitions: toBigInt(epochRewards.numPartitions),
            parentBlockhash: toBytes(epochRewards.parentBlockhash),
            totalPoints: toBigInt(epochRewards.totalPoints),
            totalRewards: toBigInt(epochRewards.totalRewards),
            distributedRewards: toBigInt(epochRewards.distributedRewards),
            active: epochRewards.active,
        },
        epochSchedule: {
            slotsPerEpoch: toBigInt(epochSchedule.slotsPerEpoch),
            leaderScheduleSlotOffset: toBigInt(
                epochSchedule.leaderScheduleSlotOffset,
            ),
            warmup: epochSchedule.warmup,
            firstNormalEpoch: toBigInt(epochSchedule.firstNormalEpoch),
            firstNormalSlot: toBigInt(epochSchedule.firstNormalSlot),
        },
        rent: {
            lamportsPerByteYear: toBigInt(rent.lamportsPerByteYear),
            exemptionThreshold: rent.exemptionThreshold,
            burnPercent: rent.burnPercent,
        },
        slotHashes: record.slotHashes.map(entry => ({
            slot: toBigInt(entry.slot),
            hash: toBytes(entry.hash),
        })),
        stakeHistory: record.stakeHistory.map(entry => ({
            epoch: toBigInt(entry.epoch),
            effective: toBigInt(entry.effective),
            activating: toBigInt(entry.activating),
            deactivating: toBigInt(entry.deactivating),
        })),
    };
}

function contextToRecord(input: FixtureContext): FixtureRecord['input'] {
    const budget = input.computeBudget;
    return {
        computeBudget: {
            computeUnitLimit: toBN(budget.computeUnitLimit),
            heapSize: budget.heapSize,
            maxInstructionStackDepth: budget.maxInstructionStackDepth,
            maxInstructionTraceLength: budget.maxInstructionTraceLength,
            invokeUnits: toBN(budget.invokeUnits),
            cpiBytesPerUnit: toBN(budget.cpiBytesPerUnit),
            maxCpiInstructionSize: budget.maxCpiInstructionSize,
        },
        featureSet: input.featureSet,
        sysvars: sysvarsToRecord(input.sysvars),
        programId: input.programId,
        instructionAccounts: input.instructionAccounts,
        instructionData: toBuffer(input.instructionData),
        accounts: input.accounts.map(accountToRecord),
    };
}

function contextFromRecord(record: FixtureRecord['input']): FixtureContext {
    const budget = record.computeBudget;
    return {
        computeBudget: {
            computeUnitLimit: toBigInt(budget.computeUnitLimit),
            heapSize: budget.heapSize,
            maxInstructionStackDepth: budget.maxInstructionStackDepth,
            maxInstructionTraceLength: budget.maxInstructionTraceLength,
            invokeUnits: toBigInt(budget.invokeUnits),
            cpiBytesPerUnit: toBigInt(budget.cpiBytesPerUnit),
            maxCpiInstructionSize: budget.maxCpiInstructionSize,
        },
        featureSet: record.featureSet,
        sysvars: sysvarsFromRecord(record.sysvars),
        programId: record.programId,
        instructionAccounts: record.instructionAccounts.map(meta => ({
            pubkey: meta.pubkey,
            isSigner: meta.isSigner,
            isWritable: meta.isWritable,
        })),
        instructionData: toBytes(record.instructionData),
        accounts: record.accounts.map(accountFromRecord),
    };
}

function effectsToRecord(output: FixtureEffects): FixtureRecord['output'] {
    return {
        computeUnitsConsumed: toBN(output.computeUnitsConsumed),
        programResult: { ...output.programResult },
        returnData: toBuffer(output.returnData),
        resultingAccounts: output.resultingAccounts.map(accountToRecord),
    };
}

function isResultKind(kind: number): kind is FixtureResultKind {
    return typeof FixtureResultKind[kind] === 'string';
}

function effectsFromRecord(record: FixtureRecord['output']): FixtureEffects {
    const { kind, code, pubkey, message } = record.programResult;
    if (!isResultKind(kind)) {
        throw new FixtureError(
            FixtureErrorCode.DECODE_FAILED,
            'decodeFixture',
            `Unknown program result kind ${kind}`,
        );
    }
    return {
        computeUnitsConsumed: toBigInt(record.computeUnitsConsumed),
        programResult: { kind, code, pubkey, message },
        returnData: toBytes(record.returnData),
        resultingAccounts: record.resultingAccounts.map(accountFromRecord),
    };
}

/**
 * Encodes a fixture in its borsh binary form.
 */
export function encodeFixture(fixture: Fixture): Buffer {
    const { input, output } = fixture;
    const byteLengths = [
        input.instructionData.length,
        output.returnData.length,
        ...input.accounts.map(account => account.data.length),
        ...output.resultingAccounts.map(account => account.data.length),
        fixture.metadata.entrypoint.length,
        output.programResult.message.length,
    ];
    const records =
        input.accounts.length +
        output.resultingAccounts.length +
        input.instructionAccounts.length +
        input.featureSet.length +
        input.sysvars.slotHashes.length +
        input.sysvars.stakeHistory.length;
    const buffer = Buffer.alloc(encodedSizeHint(byteLengths, records));
    const len = FixtureLayout.encode(
        {
            metadata: { entrypoint: fixture.metadata.entrypoint },
            input: contextToRecord(input),
            output: effectsToRecord(output),
        },
        buffer,
    );
    return Buffer.from(buffer.subarray(0, len));
}

/**
 * Decodes a fixture from its borsh binary form.
 */
export function decodeFixture(bytes: Uint8Array): Fixture {
    let record: FixtureRecord;
    try {
        record = FixtureLayout.decode(Buffer.from(bytes));
    } catch (error) {
        throw new FixtureError(
            FixtureErrorCode.DECODE_FAILED,
            'decodeFixture',
            error instanceof Error ? error.message : String(error),
        );
    }
    return {
        metadata: { entrypoint: record.metadata.entrypoint },
        input: contextFromRecord(record.input),
        output: effectsFromRecord(record.output),
    };
}
