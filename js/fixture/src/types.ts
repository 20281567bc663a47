import type { PublicKey } from '@solana/web3.js';

/**
 * Account state as stored in a fixture.
 */
export interface FixtureAccount {
    pubkey: PublicKey;
    lamports: bigint;
    data: Uint8Array;
    owner: PublicKey;
    executable: boolean;
    rentEpoch: bigint;
}

export interface FixtureAccountMeta {
    pubkey: PublicKey;
    isSigner: boolean;
    isWritable: boolean;
}

export interface FixtureComputeBudget {
    computeUnitLimit: bigint;
    heapSize: number;
    maxInstructionStackDepth: number;
    maxInstructionTraceLength: number;
    invokeUnits: bigint;
    cpiBytesPerUnit: bigint;
    maxCpiInstructionSize: number;
}

export interface FixtureClock {
    slot: bigint;
    epochStartTimestamp: bigint;
    epoch: bigint;
    leaderScheduleEpoch: bigint;
    unixTimestamp: bigint;
}

export interface FixtureEpochRewards {
    distributionStartingBlockHeight: bigint;
    numPartitions: bigint;
    parentBlockhash: Uint8Array;
    totalPoints: bigint;
    totalRewards: bigint;
    distributedRewards: bigint;
    active: boolean;
}

export interface FixtureEpochSchedule {
    slotsPerEpoch: bigint;
    leaderScheduleSlotOffset: bigint;
    warmup: boolean;
    firstNormalEpoch: bigint;
    firstNormalSlot: bigint;
}

export interface FixtureRent {
    lamportsPerByteYear: bigint;
    exemptionThreshold: number;
    burnPercent: number;
}

export interface FixtureSlotHash {
    slot: bigint;
    hash: Uint8Array;
}

export interface FixtureStakeHistoryEntry {
    epoch: bigint;
    effective: bigint;
    activating: bigint;
    deactivating: bigint;
}

export interface FixtureSysvars {
    clock: FixtureClock;
    epochRewards: FixtureEpochRewards;
    epochSchedule: FixtureEpochSchedule;
    rent: FixtureRent;
    slotHashes: FixtureSlotHash[];
    stakeHistory: FixtureStakeHistoryEntry[];
}

/**
 * Everything needed to replay one instruction.
 */
export interface FixtureContext {
    computeBudget: FixtureComputeBudget;
    /** Addresses of the active features. */
    featureSet: PublicKey[];
    sysvars: FixtureSysvars;
    programId: PublicKey;
    instructionAccounts: FixtureAccountMeta[];
    instructionData: Uint8Array;
    accounts: FixtureAccount[];
}

export enum FixtureResultKind {
    Success = 0,
    UnknownProgram = 1,
    ProgramError = 2,
    InstructionError = 3,
    ComputeBudgetExceeded = 4,
    WritabilityViolation = 5,
    VmFault = 6,
    MissingAccount = 7,
}

/**
 * Program result in fixture form. `code` carries the custom error code,
 * `pubkey` the offending account and `message` the instruction error name
 * or the vm fault message, depending on `kind`.
 */
export interface FixtureProgramResult {
    kind: FixtureResultKind;
    code: number;
    pubkey: PublicKey | null;
    message: string;
}

export interface FixtureEffects {
    computeUnitsConsumed: bigint;
    programResult: FixtureProgramResult;
    returnData: Uint8Array;
    resultingAccounts: FixtureAccount[];
}

export interface FixtureMetadata {
    entrypoint: string;
}

export interface Fixture {
    metadata: FixtureMetadata;
    input: FixtureContext;
    output: FixtureEffects;
}

/** Seed derivation of an account address in an interchange fixture. */
export interface InterchangeSeedAddress {
    base: PublicKey;
    seed: string;
    owner: PublicKey;
}

export interface InterchangeAccountState {
    address: PublicKey;
    lamports: bigint;
    data: Uint8Array;
    executable: boolean;
    rentEpoch: bigint;
    owner: PublicKey;
    seedAddress: InterchangeSeedAddress | null;
}

export interface InterchangeInstructionAccount {
    /** Index into {@link InterchangeContext.accounts}. */
    index: number;
    isWritable: boolean;
    isSigner: boolean;
}

export interface InterchangeContext {
    programId: PublicKey;
    accounts: InterchangeAccountState[];
    instructionAccounts: InterchangeInstructionAccount[];
    data: Uint8Array;
    computeUnitsAvailable: bigint;
    slot: bigint;
    /** Feature ids: the first eight bytes of the feature address, little endian. */
    features: bigint[];
}

export interface InterchangeEffects {
    /** Instruction error discriminant plus one, zero on success. */
    result: number;
    customError: number;
    modifiedAccounts: InterchangeAccountState[];
    computeUnitsAvailable: bigint;
    returnData: Uint8Array;
}

export interface InterchangeFixture {
    metadata: FixtureMetadata;
    input: InterchangeContext;
    output: InterchangeEffects;
}
