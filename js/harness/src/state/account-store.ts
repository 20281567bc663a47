import { PublicKey } from '@solana/web3.js';
import { Account, KeyedAccount, cloneAccount } from './account';

export type AccountStoreInput = AccountStore | readonly KeyedAccount[];

/**
 * Ordered map from address to account. Accounts are cloned on the way in
 * and on the way out, so callers never share state with the store.
 */
export class AccountStore {
    private readonly entries = new Map<string, KeyedAccount>();

    static from(input: AccountStoreInput): AccountStore {
        if (input instanceof AccountStore) return input.clone();
        const store = new AccountStore();
        store.merge(input);
        return store;
    }

    get size(): number {
        return this.entries.size;
    }

    has(pubkey: PublicKey): boolean {
        return this.entries.has(pubkey.toBase58());
    }

    get(pubkey: PublicKey): Account | undefined {
        const entry = this.entries.get(pubkey.toBase58());
        return entry ? cloneAccount(entry[1]) : undefined;
    }

    /** Inserts or replaces; a replaced entry keeps its position. */
    set(pubkey: PublicKey, account: Account): void {
        this.entries.set(pubkey.toBase58(), [pubkey, cloneAccount(account)]);
    }

    merge(accounts: readonly KeyedAccount[]): void {
        for (const [pubkey, account] of accounts) {
            this.set(pubkey, account);
        }
    }

    toKeyedAccounts(): KeyedAccount[] {
        return [...this.entries.values()].map(([pubkey, account]) => [
            pubkey,
            cloneAccount(account),
        ]);
    }

    clone(): AccountStore {
        const store = new AccountStore();
        store.merge([...this.entries.values()]);
        return store;
    }
}
