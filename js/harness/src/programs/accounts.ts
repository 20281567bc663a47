import { Buffer } from 'buffer';
import { PublicKey } from '@solana/web3.js';
import {
    BPF_LOADER_DEPRECATED_ID,
    BPF_LOADER_ID,
    BPF_LOADER_UPGRADEABLE_ID,
    NATIVE_LOADER_ID,
} from '../constants';
import { defaultRent, minimumBalance, Rent } from '../config/sysvars';
import type { Account, KeyedAccount } from '../state/account';
import { programOwner, RegisteredProgram } from './registry';

/** Upgradeable loader state tags. */
const PROGRAM_STATE_TAG = 2;
const PROGRAM_DATA_STATE_TAG = 3;

/** Tag, slot and optional upgrade authority ahead of the ELF bytes. */
export const PROGRAM_DATA_METADATA_SIZE = 4 + 8 + 1 + 32;

function rentExempt(data: Uint8Array, owner: PublicKey, executable: boolean, rent: Rent): Account {
    return {
        lamports: minimumBalance(rent, data.length),
        data,
        owner,
        executable,
        rentEpoch: 0n,
    };
}

/**
 * The account of a builtin program: its name as data, owned by the native
 * loader.
 */
export function keyedAccountForBuiltinProgram(
    programId: PublicKey,
    name: string,
    rent: Rent = defaultRent(),
): KeyedAccount {
    return [
        programId,
        rentExempt(new Uint8Array(Buffer.from(name, 'utf8')), NATIVE_LOADER_ID, true, rent),
    ];
}

/** Program account for the non-upgradeable loaders: the ELF is the data. */
export function createProgramAccountLoaderV2(
    elf: Uint8Array,
    loader: PublicKey = BPF_LOADER_ID,
    rent: Rent = defaultRent(),
): Account {
    return rentExempt(Uint8Array.from(elf), loader, true, rent);
}

export function createProgramAccountLoaderV1(
    elf: Uint8Array,
    rent: Rent = defaultRent(),
): Account {
    return createProgramAccountLoaderV2(elf, BPF_LOADER_DEPRECATED_ID, rent);
}

export function programDataAddress(programId: PublicKey): PublicKey {
    return PublicKey.findProgramAddressSync(
        [programId.toBuffer()],
        BPF_LOADER_UPGRADEABLE_ID,
    )[0];
}

/** Upgradeable program account pointing at its program data account. */
export function createProgramAccountLoaderV3(
    programId: PublicKey,
    rent: Rent = defaultRent(),
): Account {
    const data = Buffer.alloc(4 + 32);
    data.writeUInt32LE(PROGRAM_STATE_TAG, 0);
    programDataAddress(programId).toBuffer().copy(data, 4);
    return rentExempt(new Uint8Array(data), BPF_LOADER_UPGRADEABLE_ID, true, rent);
}

/** Program data account: metadata (slot 0, no upgrade authority), then the ELF. */
export function createProgramDataAccountLoaderV3(
    elf: Uint8Array,
    rent: Rent = defaultRent(),
): Account {
    const data = Buffer.alloc(PROGRAM_DATA_METADATA_SIZE + elf.length);
    data.writeUInt32LE(PROGRAM_DATA_STATE_TAG, 0);
    Buffer.from(elf).copy(data, PROGRAM_DATA_METADATA_SIZE);
    return rentExempt(new Uint8Array(data), BPF_LOADER_UPGRADEABLE_ID, false, rent);
}

export function createProgramAccountPairLoaderV3(
    programId: PublicKey,
    elf: Uint8Array,
    rent: Rent = defaultRent(),
): [Account, Account] {
    return [
        createProgramAccountLoaderV3(programId, rent),
        createProgramDataAccountLoaderV3(elf, rent),
    ];
}

/**
 * The executable account a registered program appears as when an
 * instruction references it.
 */
export function keyedAccountForProgram(
    program: RegisteredProgram,
    rent: Rent = defaultRent(),
): KeyedAccount {
    if (program.kind !== 'elf') {
        return keyedAccountForBuiltinProgram(program.programId, program.name, rent);
    }
    if (program.loader.equals(BPF_LOADER_UPGRADEABLE_ID)) {
        return [program.programId, createProgramAccountLoaderV3(program.programId, rent)];
    }
    return [
        program.programId,
        createProgramAccountLoaderV2(program.elf, programOwner(program), rent),
    ];
}
