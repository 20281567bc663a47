import { Buffer } from 'buffer';
import { PublicKey } from '@solana/web3.js';
import {
    array,
    bool,
    f64,
    i64,
    Layout,
    struct,
    u128,
    u64,
    u8,
} from '@coral-xyz/borsh';
import BN from 'bn.js';
import { SYSVAR_IDS, SYSVAR_OWNER_ID } from '../constants';
import { ConfigurationError, ConfigurationErrorCode } from '../errors';
import { logger } from '../logger';
import type { Account, KeyedAccount } from '../state/account';

export interface Clock {
    slot: bigint;
    epochStartTimestamp: bigint;
    epoch: bigint;
    leaderScheduleEpoch: bigint;
    unixTimestamp: bigint;
}

export interface Rent {
    lamportsPerByteYear: bigint;
    exemptionThreshold: number;
    burnPercent: number;
}

export interface EpochSchedule {
    slotsPerEpoch: bigint;
    leaderScheduleSlotOffset: bigint;
    warmup: boolean;
    firstNormalEpoch: bigint;
    firstNormalSlot: bigint;
}

export interface EpochRewards {
    distributionStartingBlockHeight: bigint;
    numPartitions: bigint;
    parentBlockhash: Uint8Array;
    totalPoints: bigint;
    totalRewards: bigint;
    distributedRewards: bigint;
    active: boolean;
}

export interface SlotHash {
    slot: bigint;
    hash: Uint8Array;
}

export interface StakeHistoryEntry {
    epoch: bigint;
    effective: bigint;
    activating: bigint;
    deactivating: bigint;
}

export interface SysvarValues {
    clock: Clock;
    epochRewards: EpochRewards;
    epochSchedule: EpochSchedule;
    lastRestartSlot: bigint;
    rent: Rent;
    /** Most recent slot first. */
    slotHashes: SlotHash[];
    stakeHistory: StakeHistoryEntry[];
}

export const SLOT_HASHES_MAX_ENTRIES = 512;
export const MINIMUM_SLOTS_PER_EPOCH = 32n;
export const DEFAULT_SLOTS_PER_EPOCH = 432_000n;
/** Bytes of account metadata the rent computation charges for. */
export const ACCOUNT_STORAGE_OVERHEAD = 128n;

export function defaultRent(): Rent {
    return {
        lamportsPerByteYear: 3480n,
        exemptionThreshold: 2.0,
        burnPercent: 50,
    };
}

/**
 * Lamports an account of `dataLength` bytes needs to be rent exempt.
 */
export function minimumBalance(rent: Rent, dataLength: number): bigint {
    const bytes = ACCOUNT_STORAGE_OVERHEAD + BigInt(dataLength);
    return BigInt(
        Math.floor(Number(bytes * rent.lamportsPerByteYear) * rent.exemptionThreshold),
    );
}

function nextPowerOfTwo(value: bigint): bigint {
    let power = 1n;
    while (power < value) power <<= 1n;
    return power;
}

function trailingZeros(value: bigint): bigint {
    let zeros = 0n;
    while (value > 0n && (value & 1n) === 0n) {
        value >>= 1n;
        zeros++;
    }
    return zeros;
}

/**
 * An epoch schedule. With `warmup`, epochs start at
 * {@link MINIMUM_SLOTS_PER_EPOCH} slots and double until they reach
 * `slotsPerEpoch`.
 */
export function customEpochSchedule(
    slotsPerEpoch: bigint,
    leaderScheduleSlotOffset: bigint,
    warmup: boolean,
): EpochSchedule {
    if (slotsPerEpoch < MINIMUM_SLOTS_PER_EPOCH) {
        throw new ConfigurationError(
            ConfigurationErrorCode.INVALID_SYSVAR,
            'customEpochSchedule',
            `slotsPerEpoch must be at least ${MINIMUM_SLOTS_PER_EPOCH}`,
        );
    }
    if (!warmup) {
        return {
            slotsPerEpoch,
            leaderScheduleSlotOffset,
            warmup,
            firstNormalEpoch: 0n,
            firstNormalSlot: 0n,
        };
    }
    const firstNormalEpoch =
        trailingZeros(nextPowerOfTwo(slotsPerEpoch)) -
        trailingZeros(MINIMUM_SLOTS_PER_EPOCH);
    return {
        slotsPerEpoch,
        leaderScheduleSlotOffset,
        warmup,
        firstNormalEpoch,
        firstNormalSlot:
            ((1n << firstNormalEpoch) - 1n) * MINIMUM_SLOTS_PER_EPOCH,
    };
}

export function epochScheduleWithoutWarmup(): EpochSchedule {
    return customEpochSchedule(
        DEFAULT_SLOTS_PER_EPOCH,
        DEFAULT_SLOTS_PER_EPOCH,
        false,
    );
}

/** Returns `[epoch, slotIndex]` of `slot`. */
export function getEpochAndSlotIndex(
    schedule: EpochSchedule,
    slot: bigint,
): [bigint, bigint] {
    if (slot < schedule.firstNormalSlot) {
        const epoch =
            trailingZeros(nextPowerOfTwo(slot + MINIMUM_SLOTS_PER_EPOCH + 1n)) -
            trailingZeros(MINIMUM_SLOTS_PER_EPOCH) -
            1n;
        const epochLength =
            1n << (epoch + trailingZeros(MINIMUM_SLOTS_PER_EPOCH));
        return [epoch, slot - (epochLength - MINIMUM_SLOTS_PER_EPOCH)];
    }
    const normalSlotIndex = slot - schedule.firstNormalSlot;
    return [
        schedule.firstNormalEpoch + normalSlotIndex / schedule.slotsPerEpoch,
        normalSlotIndex % schedule.slotsPerEpoch,
    ];
}

export function getEpoch(schedule: EpochSchedule, slot: bigint): bigint {
    return getEpochAndSlotIndex(schedule, slot)[0];
}

export function getLeaderScheduleEpoch(
    schedule: EpochSchedule,
    slot: bigint,
): bigint {
    if (slot < schedule.firstNormalSlot) {
        return getEpoch(schedule, slot) + 1n;
    }
    const leaderScheduleSlot =
        slot - schedule.firstNormalSlot + schedule.leaderScheduleSlotOffset;
    return (
        schedule.firstNormalEpoch + leaderScheduleSlot / schedule.slotsPerEpoch
    );
}

/**
 * Inserts or replaces the hash of `slot`, keeping the list ordered newest
 * first and at most {@link SLOT_HASHES_MAX_ENTRIES} long.
 */
export function addSlotHash(
    slotHashes: readonly SlotHash[],
    slot: bigint,
    hash: Uint8Array,
): SlotHash[] {
    const next = [...slotHashes];
    const existing = next.findIndex(entry => entry.slot === slot);
    if (existing >= 0) {
        next[existing] = { slot, hash };
    } else {
        const position = next.findIndex(entry => entry.slot < slot);
        next.splice(position < 0 ? next.length : position, 0, { slot, hash });
    }
    return next.slice(0, SLOT_HASHES_MAX_ENTRIES);
}

const ZERO_HASH = new Uint8Array(32);

const toBN = (value: bigint): BN => new BN(value.toString());

interface ClockRecord {
    slot: BN;
    epochStartTimestamp: BN;
    epoch: BN;
    leaderScheduleEpoch: BN;
    unixTimestamp: BN;
}

interface RentRecord {
    lamportsPerByteYear: BN;
    exemptionThreshold: number;
    burnPercent: number;
}

interface EpochScheduleRecord {
    slotsPerEpoch: BN;
    leaderScheduleSlotOffset: BN;
    warmup: boolean;
    firstNormalEpoch: BN;
    firstNormalSlot: BN;
}

interface EpochRewardsRecord {
    distributionStartingBlockHeight: BN;
    numPartitions: BN;
    parentBlockhash: number[];
    totalPoints: BN;
    totalRewards: BN;
    distributedRewards: BN;
    active: boolean;
}

interface SlotHashRecord {
    slot: BN;
    hash: number[];
}

interface StakeHistoryEntryRecord {
    epoch: BN;
    effective: BN;
    activating: BN;
    deactivating: BN;
}

interface U64Record {
    value: BN;
}

const ClockLayout: Layout<ClockRecord> = struct([
    u64('slot'),
    i64('epochStartTimestamp'),
    u64('epoch'),
    u64('leaderScheduleEpoch'),
    i64('unixTimestamp'),
]);

const RentLayout: Layout<RentRecord> = struct([
    u64('lamportsPerByteYear'),
    f64('exemptionThreshold'),
    u8('burnPercent'),
]);

const EpochScheduleLayout: Layout<EpochScheduleRecord> = struct([
    u64('slotsPerEpoch'),
    u64('leaderScheduleSlotOffset'),
    bool('warmup'),
    u64('firstNormalEpoch'),
    u64('firstNormalSlot'),
]);

const EpochRewardsLayout: Layout<EpochRewardsRecord> = struct([
    u64('distributionStartingBlockHeight'),
    u64('numPartitions'),
    array(u8(), 32, 'parentBlockhash'),
    u128('totalPoints'),
    u64('totalRewards'),
    u64('distributedRewards'),
    bool('active'),
]);

const SlotHashLayout: Layout<SlotHashRecord> = struct([
    u64('slot'),
    array(u8(), 32, 'hash'),
]);

const StakeHistoryEntryLayout: Layout<StakeHistoryEntryRecord> = struct([
    u64('epoch'),
    u64('effective'),
    u64('activating'),
    u64('deactivating'),
]);

const U64Layout: Layout<U64Record> = struct([u64('value')]);

const toBigInt = (value: BN): bigint => BigInt(value.toString());

/** Undefined when `data` is shorter than one value of `layout`. */
function decodeWith<T>(layout: Layout<T>, data: Uint8Array): T | undefined {
    if (data.length < layout.span) return undefined;
    return layout.decode(Buffer.from(data));
}

/** Undefined when `data` holds fewer items than its length prefix. */
function decodeSequence<T>(layout: Layout<T>, data: Uint8Array): T[] | undefined {
    const length = decodeWith(U64Layout, data);
    if (!length || length.value.bitLength() > 32) return undefined;
    const count = length.value.toNumber();
    if (data.length < 8 + count * layout.span) return undefined;
    const buffer = Buffer.from(data);
    return Array.from({ length: count }, (_, i) =>
        layout.decode(buffer, 8 + i * layout.span),
    );
}

function encodeWith<T>(layout: Layout<T>, value: T, span: number): Buffer {
    const buffer = Buffer.alloc(span);
    const len = layout.encode(value, buffer);
    return Buffer.from(buffer.subarray(0, len));
}

/** Sequences carry a u64 length prefix in account data. */
function encodeSequence<T>(
    layout: Layout<T>,
    items: readonly T[],
    itemSpan: number,
): Buffer {
    return Buffer.concat([
        encodeWith(U64Layout, { value: new BN(items.length) }, 8),
        ...items.map(item => encodeWith(layout, item, itemSpan)),
    ]);
}

function decodeClock(data: Uint8Array): Clock | undefined {
    const record = decodeWith(ClockLayout, data);
    return (
        record && {
            slot: toBigInt(record.slot),
            epochStartTimestamp: toBigInt(record.epochStartTimestamp),
            epoch: toBigInt(record.epoch),
            leaderScheduleEpoch: toBigInt(record.leaderScheduleEpoch),
            unixTimestamp: toBigInt(record.unixTimestamp),
        }
    );
}

function decodeRent(data: Uint8Array): Rent | undefined {
    const record = decodeWith(RentLayout, data);
    return (
        record && {
            lamportsPerByteYear: toBigInt(record.lamportsPerByteYear),
            exemptionThreshold: record.exemptionThreshold,
            burnPercent: record.burnPercent,
        }
    );
}

function decodeEpochSchedule(data: Uint8Array): EpochSchedule | undefined {
    const record = decodeWith(EpochScheduleLayout, data);
    return (
        record && {
            slotsPerEpoch: toBigInt(record.slotsPerEpoch),
            leaderScheduleSlotOffset: toBigInt(record.leaderScheduleSlotOffset),
            warmup: record.warmup,
            firstNormalEpoch: toBigInt(record.firstNormalEpoch),
            firstNormalSlot: toBigInt(record.firstNormalSlot),
        }
    );
}

function decodeEpochRewards(data: Uint8Array): EpochRewards | undefined {
    const record = decodeWith(EpochRewardsLayout, data);
    return (
        record && {
            distributionStartingBlockHeight: toBigInt(
                record.distributionStartingBlockHeight,
            ),
            numPartitions: toBigInt(record.numPartitions),
            parentBlockhash: Uint8Array.from(record.parentBlockhash),
            totalPoints: toBigInt(record.totalPoints),
            totalRewards: toBigInt(record.totalRewards),
            distributedRewards: toBigInt(record.distributedRewards),
            active: record.active,
        }
    );
}

function decodeLastRestartSlot(data: Uint8Array): bigint | undefined {
    const record = decodeWith(U64Layout, data);
    return record && toBigInt(record.value);
}

function decodeSlotHashes(data: Uint8Array): SlotHash[] | undefined {
    return decodeSequence(SlotHashLayout, data)?.map(entry => ({
        slot: toBigInt(entry.slot),
        hash: Uint8Array.from(entry.hash),
    }));
}

function decodeStakeHistory(data: Uint8Array): StakeHistoryEntry[] | undefined {
    return decodeSequence(StakeHistoryEntryLayout, data)?.map(entry => ({
        epoch: toBigInt(entry.epoch),
        effective: toBigInt(entry.effective),
        activating: toBigInt(entry.activating),
        deactivating: toBigInt(entry.deactivating),
    }));
}

type SysvarDecoders = {
    [K in keyof SysvarValues]: (data: Uint8Array) => SysvarValues[K] | undefined;
};

const SYSVAR_NAMES: readonly (keyof SysvarValues)[] = [
    'clock',
    'epochRewards',
    'epochSchedule',
    'lastRestartSlot',
    'rent',
    'slotHashes',
    'stakeHistory',
];

function sysvarName(pubkey: PublicKey): keyof SysvarValues | undefined {
    return SYSVAR_NAMES.find(name => SYSVAR_IDS[name].equals(pubkey));
}

const SYSVAR_DECODERS: SysvarDecoders = {
    clock: decodeClock,
    epochRewards: decodeEpochRewards,
    epochSchedule: decodeEpochSchedule,
    lastRestartSlot: decodeLastRestartSlot,
    rent: decodeRent,
    slotHashes: decodeSlotHashes,
    stakeHistory: decodeStakeHistory,
};

/**
 * Sysvar values plus their account encodings. Instances are immutable; the
 * `with*` methods return updated copies.
 */
export class Sysvars {
    readonly clock: Clock;
    readonly epochRewards: EpochRewards;
    readonly epochSchedule: EpochSchedule;
    readonly lastRestartSlot: bigint;
    readonly rent: Rent;
    readonly slotHashes: readonly SlotHash[];
    readonly stakeHistory: readonly StakeHistoryEntry[];

    constructor(values: SysvarValues) {
        Sysvars.validate(values);
        this.clock = { ...values.clock };
        this.epochRewards = { ...values.epochRewards };
        this.epochSchedule = { ...values.epochSchedule };
        this.lastRestartSlot = values.lastRestartSlot;
        this.rent = { ...values.rent };
        this.slotHashes = values.slotHashes.map(entry => ({ ...entry }));
        this.stakeHistory = values.stakeHistory.map(entry => ({ ...entry }));
    }

    static default(): Sysvars {
        const clock: Clock = {
            slot: 0n,
            epochStartTimestamp: 0n,
            epoch: 0n,
            leaderScheduleEpoch: 0n,
            unixTimestamp: 0n,
        };
        return new Sysvars({
            clock,
            epochRewards: {
                distributionStartingBlockHeight: 0n,
                numPartitions: 0n,
                parentBlockhash: ZERO_HASH,
                totalPoints: 0n,
                totalRewards: 0n,
                distributedRewards: 0n,
                active: false,
            },
            epochSchedule: epochScheduleWithoutWarmup(),
            lastRestartSlot: 0n,
            rent: defaultRent(),
            slotHashes: Array.from(
                { length: SLOT_HASHES_MAX_ENTRIES },
                (_, i) => ({ slot: i === 0 ? clock.slot : 0n, hash: ZERO_HASH }),
            ),
            stakeHistory: [
                {
                    epoch: clock.epoch,
                    effective: 0n,
                    activating: 0n,
                    deactivating: 0n,
                },
            ],
        });
    }

    private static validate(values: SysvarValues): void {
        const fail = (message: string): never => {
            throw new ConfigurationError(
                ConfigurationErrorCode.INVALID_SYSVAR,
                'Sysvars',
                message,
            );
        };
        const { rent, epochSchedule, epochRewards } = values;
        if (!Number.isFinite(rent.exemptionThreshold) || rent.exemptionThreshold < 0) {
            fail('rent.exemptionThreshold must be a finite, non-negative number');
        }
        if (rent.burnPercent < 0 || rent.burnPercent > 100) {
            fail('rent.burnPercent must be between 0 and 100');
        }
        if (epochSchedule.slotsPerEpoch < MINIMUM_SLOTS_PER_EPOCH) {
            fail(`epochSchedule.slotsPerEpoch must be at least ${MINIMUM_SLOTS_PER_EPOCH}`);
        }
        if (epochRewards.parentBlockhash.length !== 32) {
            fail('epochRewards.parentBlockhash must be 32 bytes');
        }
        if (values.slotHashes.some(entry => entry.hash.length !== 32)) {
            fail('slot hashes must be 32 bytes');
        }
        if (values.slotHashes.length > SLOT_HASHES_MAX_ENTRIES) {
            fail(`at most ${SLOT_HASHES_MAX_ENTRIES} slot hashes are kept`);
        }
    }

    values(): SysvarValues {
        return {
            clock: this.clock,
            epochRewards: this.epochRewards,
            epochSchedule: this.epochSchedule,
            lastRestartSlot: this.lastRestartSlot,
            rent: this.rent,
            slotHashes: [...this.slotHashes],
            stakeHistory: [...this.stakeHistory],
        };
    }

    with(values: Partial<SysvarValues>): Sysvars {
        return new Sysvars({ ...this.values(), ...values });
    }

    /**
     * These sysvars with each sysvar account in `accounts` read in place of
     * the configured value. Accounts whose data does not decode to a valid
     * value leave it as configured.
     */
    withAccountOverrides(accounts: readonly KeyedAccount[]): Sysvars {
        let sysvars: Sysvars = this;
        for (const [pubkey, account] of accounts) {
            const name = sysvarName(pubkey);
            if (!name) continue;
            sysvars = sysvars.withDecoded(name, account.data);
        }
        return sysvars;
    }

    private withDecoded<K extends keyof SysvarValues>(
        name: K,
        data: Uint8Array,
    ): Sysvars {
        const decoder: SysvarDecoders[K] = SYSVAR_DECODERS[name];
        const value = decoder(data);
        if (value === undefined) {
            logger.debug('sysvar account does not decode', { sysvar: name });
            return this;
        }
        const values: Partial<SysvarValues> = {};
        values[name] = value;
        try {
            return this.with(values);
        } catch (error) {
            if (!(error instanceof ConfigurationError)) throw error;
            logger.debug('sysvar account holds an invalid value', {
                sysvar: name,
                error: error.message,
            });
            return this;
        }
    }

    withClock(clock: Clock): Sysvars {
        return this.with({ clock });
    }

    withRent(rent: Rent): Sysvars {
        return this.with({ rent });
    }

    withEpochSchedule(epochSchedule: EpochSchedule): Sysvars {
        return this.with({ epochSchedule });
    }

    minimumBalance(dataLength: number): bigint {
        return minimumBalance(this.rent, dataLength);
    }

    /**
     * Moves the clock to `slot` and fills slot hashes up to the slot before
     * it. Epochs follow the epoch schedule; timestamps reset to zero.
     */
    warpToSlot(slot: bigint): Sysvars {
        const slotDelta = slot > this.clock.slot ? slot - this.clock.slot : 0n;
        const clock: Clock = {
            slot,
            epochStartTimestamp: 0n,
            epoch: getEpoch(this.epochSchedule, slot),
            leaderScheduleEpoch: getLeaderScheduleEpoch(this.epochSchedule, slot),
            unixTimestamp: 0n,
        };

        let slotHashes: SlotHash[];
        const maxEntries = BigInt(SLOT_HASHES_MAX_ENTRIES);
        if (slotDelta > maxEntries) {
            slotHashes = [];
            for (let s = slot - 1n; s >= slot - maxEntries; s--) {
                slotHashes.push({ slot: s, hash: ZERO_HASH });
            }
        } else {
            slotHashes = [...this.slotHashes];
            const mostRecent = slotHashes.length > 0 ? slotHashes[0].slot : 0n;
            for (let s = mostRecent; s < slot; s++) {
                slotHashes = addSlotHash(slotHashes, s, ZERO_HASH);
            }
        }
        return this.with({ clock, slotHashes });
    }

    clockData(): Buffer {
        const { clock } = this;
        return encodeWith(
            ClockLayout,
            {
                slot: toBN(clock.slot),
                epochStartTimestamp: toBN(clock.epochStartTimestamp),
                epoch: toBN(clock.epoch),
                leaderScheduleEpoch: toBN(clock.leaderScheduleEpoch),
                unixTimestamp: toBN(clock.unixTimestamp),
            },
            40,
        );
    }

    rentData(): Buffer {
        const { rent } = this;
        return encodeWith(
            RentLayout,
            {
                lamportsPerByteYear: toBN(rent.lamportsPerByteYear),
                exemptionThreshold: rent.exemptionThreshold,
                burnPercent: rent.burnPercent,
            },
            17,
        );
    }

    epochScheduleData(): Buffer {
        const schedule = this.epochSchedule;
        return encodeWith(
            EpochScheduleLayout,
            {
                slotsPerEpoch: toBN(schedule.slotsPerEpoch),
                leaderScheduleSlotOffset: toBN(schedule.leaderScheduleSlotOffset),
                warmup: schedule.warmup,
                firstNormalEpoch: toBN(schedule.firstNormalEpoch),
                firstNormalSlot: toBN(schedule.firstNormalSlot),
            },
            33,
        );
    }

    epochRewardsData(): Buffer {
        const rewards = this.epochRewards;
        return encodeWith(
            EpochRewardsLayout,
            {
                distributionStartingBlockHeight: toBN(
                    rewards.distributionStartingBlockHeight,
                ),
                numPartitions: toBN(rewards.numPartitions),
                parentBlockhash: Array.from(rewards.parentBlockhash),
                totalPoints: toBN(rewards.totalPoints),
                totalRewards: toBN(rewards.totalRewards),
                distributedRewards: toBN(rewards.distributedRewards),
                active: rewards.active,
            },
            81,
        );
    }

    lastRestartSlotData(): Buffer {
        return encodeWith(U64Layout, { value: toBN(this.lastRestartSlot) }, 8);
    }

    slotHashesData(): Buffer {
        return encodeSequence(
            SlotHashLayout,
            this.slotHashes.map(entry => ({
                slot: toBN(entry.slot),
                hash: Array.from(entry.hash),
            })),
            40,
        );
    }

    stakeHistoryData(): Buffer {
        return encodeSequence(
            StakeHistoryEntryLayout,
            this.stakeHistory.map(entry => ({
                epoch: toBN(entry.epoch),
                effective: toBN(entry.effective),
                activating: toBN(entry.activating),
                deactivating: toBN(entry.deactivating),
            })),
            32,
        );
    }

    private sysvarAccount(id: PublicKey, data: Buffer): KeyedAccount {
        const account: Account = {
            lamports: this.minimumBalance(data.length),
            data: new Uint8Array(data),
            owner: SYSVAR_OWNER_ID,
            executable: false,
            rentEpoch: 0n,
        };
        return [id, account];
    }

    keyedAccountForClockSysvar(): KeyedAccount {
        return this.sysvarAccount(SYSVAR_IDS.clock, this.clockData());
    }

    keyedAccountForEpochRewardsSysvar(): KeyedAccount {
        return this.sysvarAccount(
            SYSVAR_IDS.epochRewards,
            this.epochRewardsData(),
        );
    }

    keyedAccountForEpochScheduleSysvar(): KeyedAccount {
        return this.sysvarAccount(
            SYSVAR_IDS.epochSchedule,
            this.epochScheduleData(),
        );
    }

    keyedAccountForLastRestartSlotSysvar(): KeyedAccount {
        return this.sysvarAccount(
            SYSVAR_IDS.lastRestartSlot,
            this.lastRestartSlotData(),
        );
    }

    keyedAccountForRentSysvar(): KeyedAccount {
        return this.sysvarAccount(SYSVAR_IDS.rent, this.rentData());
    }

    keyedAccountForSlotHashesSysvar(): KeyedAccount {
        return this.sysvarAccount(SYSVAR_IDS.slotHashes, this.slotHashesData());
    }

    keyedAccountForStakeHistorySysvar(): KeyedAccount {
        return this.sysvarAccount(
            SYSVAR_IDS.stakeHistory,
            this.stakeHistoryData(),
        );
    }
}
