import { PublicKey } from '@solana/web3.js';
import { SYSTEM_PROGRAM_ID } from '../constants';

/**
 * Account state the harness reads and writes. Lamports and rent epoch are
 * u64 values.
 */
export interface Account {
    lamports: bigint;
    data: Uint8Array;
    owner: PublicKey;
    executable: boolean;
    rentEpoch: bigint;
}

export type KeyedAccount = [PublicKey, Account];

/**
 * Creates an account. Omitted fields take the values of an empty
 * system-owned account.
 */
export function createAccount(fields: Partial<Account> = {}): Account {
    return {
        lamports: fields.lamports ?? 0n,
        data: fields.data ?? new Uint8Array(),
        owner: fields.owner ?? SYSTEM_PROGRAM_ID,
        executable: fields.executable ?? false,
        rentEpoch: fields.rentEpoch ?? 0n,
    };
}

/** A system-owned account holding `lamports` and no data. */
export function systemAccount(lamports: bigint): Account {
    return createAccount({ lamports });
}

export function cloneAccount(account: Account): Account {
    return {
        lamports: account.lamports,
        data: Uint8Array.from(account.data),
        owner: account.owner,
        executable: account.executable,
        rentEpoch: account.rentEpoch,
    };
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

export function accountsEqual(a: Account, b: Account): boolean {
    return (
        a.lamports === b.lamports &&
        a.owner.equals(b.owner) &&
        a.executable === b.executable &&
        a.rentEpoch === b.rentEpoch &&
        bytesEqual(a.data, b.data)
    );
}

/**
 * True for the state the runtime leaves behind once an account is closed:
 * no lamports, no data, owned by the system program.
 */
export function isClosed(account: Account): boolean {
    return (
        account.lamports === 0n &&
        account.data.length === 0 &&
        account.owner.equals(SYSTEM_PROGRAM_ID)
    );
}
