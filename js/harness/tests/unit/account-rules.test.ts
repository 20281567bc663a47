import { describe, expect, it } from 'vitest';
import {
    AccountChange,
    createAccount,
    Fault,
    verifyAccountChanges,
} from '../../src';
import { key, WRITER_ID } from './programs';

const other = key(90);

const change = (fields: Partial<AccountChange>): AccountChange => ({
    pubkey: key(10),
    isWritable: true,
    pre: createAccount({ lamports: 100n, owner: WRITER_ID }),
    post: createAccount({ lamports: 100n, owner: WRITER_ID }),
    ...fields,
});

describe('verifyAccountChanges', () => {
    it('accepts an unchanged account', () => {
        expect(verifyAccountChanges(WRITER_ID, [change({})])).toBeUndefined();
    });

    it('flags any change to a read-only account first', () => {
        expect(
            verifyAccountChanges(WRITER_ID, [
                change({
                    isWritable: false,
                    post: createAccount({ lamports: 100n, owner: WRITER_ID, rentEpoch: 1n }),
                }),
            ]),
        ).toEqual(Fault.writabilityViolation(key(10)));
    });

    it('lets only the owner debit lamports', () => {
        expect(
            verifyAccountChanges(other, [
                change({ post: createAccount({ lamports: 90n, owner: WRITER_ID }) }),
                change({
                    pubkey: key(11),
                    pre: createAccount({ lamports: 0n, owner: other }),
                    post: createAccount({ lamports: 10n, owner: other }),
                }),
            ]),
        ).toEqual(Fault.instructionError('ExternalAccountLamportSpend'));
    });

    it('lets only the owner modify data', () => {
        expect(
            verifyAccountChanges(other, [
                change({
                    pre: createAccount({ owner: WRITER_ID, data: new Uint8Array([1]) }),
                    post: createAccount({ owner: WRITER_ID, data: new Uint8Array([2]) }),
                }),
            ]),
        ).toEqual(Fault.instructionError('ExternalAccountDataModified'));
    });

    it('requires zeroed data to change the owner', () => {
        expect(
            verifyAccountChanges(WRITER_ID, [
                change({
                    pre: createAccount({ owner: WRITER_ID, data: new Uint8Array([1]) }),
                    post: createAccount({ owner: other, data: new Uint8Array([1]) }),
                }),
            ]),
        ).toEqual(Fault.instructionError('ModifiedProgramId'));
    });

    it('keeps the executable flag fixed', () => {
        expect(
            verifyAccountChanges(WRITER_ID, [
                change({ post: createAccount({ lamports: 100n, owner: WRITER_ID, executable: true }) }),
            ]),
        ).toEqual(Fault.instructionError('ExecutableModified'));
    });

    it('requires lamports to balance', () => {
        expect(
            verifyAccountChanges(WRITER_ID, [
                change({ post: createAccount({ lamports: 150n, owner: WRITER_ID }) }),
            ]),
        ).toEqual(Fault.instructionError('UnbalancedInstruction'));
    });
});
