import type { PublicKey, VersionedTransaction } from '@solana/web3.js';
import { FeatureSet as SvmFeatureSet, LiteSVM } from 'litesvm';
import type { FeatureSet } from '../config/feature-set';
import type { Clock, EpochSchedule, Rent } from '../config/sysvars';

/** Account shape the backend reads and writes. */
export interface SvmAccountInfo {
    lamports: number;
    data: Uint8Array;
    owner: PublicKey;
    executable: boolean;
    rentEpoch?: number;
}

/*
 * Shapes of the values `sendTransaction` returns, as litesvm declares
 * them. The loader reads them structurally.
 */

export interface SvmTransactionReturnData {
    programId(): Uint8Array;
    data(): Uint8Array;
}

export interface SvmTransactionMetadata {
    logs(): string[];
    computeUnitsConsumed(): bigint;
    returnData(): SvmTransactionReturnData;
}

/** `InstructionErrorCustom` */
export interface SvmInstructionErrorCustom {
    readonly code: number;
}

/** `InstructionErrorBorshIO` */
export interface SvmInstructionErrorBorshIO {
    readonly msg: string;
}

/**
 * An `InstructionErrorFieldless` discriminant, which skips the two
 * variants with fields, or one of those variants.
 */
export type SvmInstructionError =
    | number
    | SvmInstructionErrorCustom
    | SvmInstructionErrorBorshIO;

/** `TransactionErrorInstructionError` */
export interface SvmTransactionErrorInstructionError {
    readonly index: number;
    err(): SvmInstructionError;
}

/** A fieldless transaction error discriminant or an instruction error. */
export type SvmTransactionError = number | SvmTransactionErrorInstructionError;

export interface SvmFailedTransactionMetadata {
    err(): SvmTransactionError;
    meta(): SvmTransactionMetadata;
}

export type SvmTransactionResult =
    | SvmTransactionMetadata
    | SvmFailedTransactionMetadata;

/**
 * The part of LiteSVM the loader relies on.
 */
export interface SvmBackend {
    addProgram(programId: PublicKey, programBytes: Uint8Array): void;
    setAccount(address: PublicKey, account: SvmAccountInfo): void;
    getAccount(address: PublicKey): SvmAccountInfo | null;
    airdrop(address: PublicKey, lamports: bigint): unknown;
    latestBlockhash(): string;
    warpToSlot(slot: bigint): void;
    setClock(clock: Clock): void;
    setRent(rent: Rent): void;
    setEpochSchedule(schedule: EpochSchedule): void;
    setLastRestartSlot(slot: bigint): void;
    withFeatureSet(featureSet: FeatureSet): void;
    sendTransaction(tx: VersionedTransaction): unknown;
}

export type SvmBackendFactory = () => SvmBackend;

/**
 * {@link SvmBackend} over a LiteSVM instance. Signature checks are off;
 * the loader signs with a throwaway fee payer.
 */
export class LiteSvmBackend implements SvmBackend {
    private readonly svm = new LiteSVM().withSigverify(false);

    addProgram(programId: PublicKey, programBytes: Uint8Array): void {
        this.svm.addProgram(programId, programBytes);
    }

    setAccount(address: PublicKey, account: SvmAccountInfo): void {
        this.svm.setAccount(address, account);
    }

    getAccount(address: PublicKey): SvmAccountInfo | null {
        return this.svm.getAccount(address);
    }

    airdrop(address: PublicKey, lamports: bigint): unknown {
        return this.svm.airdrop(address, lamports);
    }

    latestBlockhash(): string {
        return this.svm.latestBlockhash();
    }

    warpToSlot(slot: bigint): void {
        this.svm.warpToSlot(slot);
    }

    setClock(clock: Clock): void {
        const current = this.svm.getClock();
        current.slot = clock.slot;
        current.epochStartTimestamp = clock.epochStartTimestamp;
        current.epoch = clock.epoch;
        current.leaderScheduleEpoch = clock.leaderScheduleEpoch;
        current.unixTimestamp = clock.unixTimestamp;
        this.svm.setClock(current);
    }

    setRent(rent: Rent): void {
        const current = this.svm.getRent();
        current.lamportsPerByteYear = rent.lamportsPerByteYear;
        current.exemptionThreshold = rent.exemptionThreshold;
        current.burnPercent = rent.burnPercent;
        this.svm.setRent(current);
    }

    setEpochSchedule(schedule: EpochSchedule): void {
        const current = this.svm.getEpochSchedule();
        current.slotsPerEpoch = schedule.slotsPerEpoch;
        current.leaderScheduleSlotOffset = schedule.leaderScheduleSlotOffset;
        current.warmup = schedule.warmup;
        current.firstNormalEpoch = schedule.firstNormalEpoch;
        current.firstNormalSlot = schedule.firstNormalSlot;
        this.svm.setEpochSchedule(current);
    }

    setLastRestartSlot(slot: bigint): void {
        this.svm.setLastRestartSlot(slot);
    }

    /**
     * LiteSVM takes a whole feature set, not single gates: every feature
     * when all catalogued features are active, its defaults otherwise.
     */
    withFeatureSet(featureSet: FeatureSet): void {
        this.svm.withFeatureSet(
            featureSet.allCataloguedActive()
                ? SvmFeatureSet.allEnabled()
                : new SvmFeatureSet(),
        );
    }

    sendTransaction(tx: VersionedTransaction): unknown {
        return this.svm.sendTransaction(tx);
    }
}

export function createLiteSvmBackend(): SvmBackend {
    return new LiteSvmBackend();
}
