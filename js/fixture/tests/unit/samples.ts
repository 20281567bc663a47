import { PublicKey } from '@solana/web3.js';
import { FixtureResultKind } from '../../src';
import type { Fixture, InterchangeFixture } from '../../src';

export const key = (seed: number) =>
    new PublicKey(new Uint8Array(32).fill(seed));

export function sampleFixture(): Fixture {
    const programId = key(9);
    return {
        metadata: { entrypoint: 'process_instruction' },
        input: {
            computeBudget: {
                computeUnitLimit: 200_000n,
                heapSize: 32 * 1024,
                maxInstructionStackDepth: 5,
                maxInstructionTraceLength: 64,
                invokeUnits: 1000n,
                cpiBytesPerUnit: 250n,
                maxCpiInstructionSize: 1280,
            },
            featureSet: [key(20), key(21)],
            sysvars: {
                clock: {
                    slot: 42n,
                    epochStartTimestamp: -5n,
                    epoch: 1n,
                    leaderScheduleEpoch: 2n,
                    unixTimestamp: 1_700_000_000n,
                },
                epochRewards: {
                    distributionStartingBlockHeight: 7n,
                    numPartitions: 3n,
                    parentBlockhash: new Uint8Array(32).fill(4),
                    totalPoints: 2n ** 100n,
                    totalRewards: 500n,
                    distributedRewards: 100n,
                    active: true,
                },
                epochSchedule: {
                    slotsPerEpoch: 432_000n,
                    leaderScheduleSlotOffset: 432_000n,
                    warmup: false,
                    firstNormalEpoch: 0n,
                    firstNormalSlot: 0n,
                },
                rent: {
                    lamportsPerByteYear: 3480n,
                    exemptionThreshold: 2.0,
                    burnPercent: 50,
                },
                slotHashes: [
                    { slot: 41n, hash: new Uint8Array(32).fill(1) },
                    { slot: 40n, hash: new Uint8Array(32).fill(2) },
                ],
                stakeHistory: [
                    {
                        epoch: 0n,
                        effective: 10n,
                        activating: 20n,
                        deactivating: 30n,
                    },
                ],
            },
            programId,
            instructionAccounts: [
                { pubkey: key(1), isSigner: true, isWritable: true },
                { pubkey: key(2), isSigner: false, isWritable: false },
            ],
            instructionData: new Uint8Array([1, 2, 3]),
            accounts: [
                {
                    pubkey: key(1),
                    lamports: 1_000n,
                    data: new Uint8Array([5, 6]),
                    owner: programId,
                    executable: false,
                    rentEpoch: 0n,
                },
                {
                    pubkey: key(2),
                    lamports: 2_000n,
                    data: new Uint8Array(),
                    owner: key(0),
                    executable: false,
                    rentEpoch: 18_446_744_073_709_551_615n,
                },
            ],
        },
        output: {
            computeUnitsConsumed: 1_234n,
            programResult: {
                kind: FixtureResultKind.ProgramError,
                code: 7,
                pubkey: null,
                message: '',
            },
            returnData: new Uint8Array([9]),
            resultingAccounts: [
                {
                    pubkey: key(1),
                    lamports: 1_000n,
                    data: new Uint8Array([5, 6]),
                    owner: programId,
                    executable: false,
                    rentEpoch: 0n,
                },
            ],
        },
    };
}

export function sampleInterchangeFixture(): InterchangeFixture {
    return {
        metadata: { entrypoint: 'process_instruction' },
        input: {
            programId: key(9),
            accounts: [
                {
                    address: key(1),
                    lamports: 10n,
                    data: new Uint8Array([1]),
                    executable: false,
                    rentEpoch: 0n,
                    owner: key(9),
                    seedAddress: { base: key(3), seed: 'vault', owner: key(9) },
                },
            ],
            instructionAccounts: [{ index: 0, isWritable: true, isSigner: false }],
            data: new Uint8Array([4, 4]),
            computeUnitsAvailable: 1_400_000n,
            slot: 12n,
            features: [1n, 2n ** 63n],
        },
        output: {
            result: 26,
            customError: 3,
            modifiedAccounts: [],
            computeUnitsAvailable: 1_399_000n,
            returnData: new Uint8Array(),
        },
    };
}
