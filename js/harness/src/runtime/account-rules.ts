import type { PublicKey } from '@solana/web3.js';
import { Account, accountsEqual, bytesEqual } from '../state/account';
import { ExecutionFault, Fault } from '../result';

export interface AccountChange {
    pubkey: PublicKey;
    isWritable: boolean;
    pre: Account;
    post: Account;
}

const isZeroed = (data: Uint8Array) => data.every(byte => byte === 0);

/**
 * Checks what `programId` did to the accounts of one instruction. A
 * read-only account that changed in any field is a writability violation;
 * the remaining rules are the runtime's ownership rules.
 */
export function verifyAccountChanges(
    programId: PublicKey,
    changes: readonly AccountChange[],
): ExecutionFault | undefined {
    const readonlyChange = changes.find(
        change => !change.isWritable && !accountsEqual(change.pre, change.post),
    );
    if (readonlyChange) return Fault.writabilityViolation(readonlyChange.pubkey);

    for (const { isWritable, pre, post } of changes) {
        const ownedByProgram = pre.owner.equals(programId);
        if (!pre.owner.equals(post.owner)) {
            if (!isWritable || pre.executable || !ownedByProgram || !isZeroed(post.data)) {
                return Fault.instructionError('ModifiedProgramId');
            }
        }
        if (post.lamports < pre.lamports && !ownedByProgram) {
            return Fault.instructionError('ExternalAccountLamportSpend');
        }
        if (pre.data.length !== post.data.length && !ownedByProgram) {
            return Fault.instructionError('AccountDataSizeChanged');
        }
        if (!bytesEqual(pre.data, post.data) && !ownedByProgram) {
            return Fault.instructionError('ExternalAccountDataModified');
        }
        if (pre.executable !== post.executable) {
            return Fault.instructionError('ExecutableModified');
        }
        if (pre.rentEpoch !== post.rentEpoch) {
            return Fault.instructionError('RentEpochModified');
        }
    }

    const sum = (pick: (change: AccountChange) => bigint) =>
        changes.reduce((total, change) => total + pick(change), 0n);
    if (sum(change => change.pre.lamports) !== sum(change => change.post.lamports)) {
        return Fault.instructionError('UnbalancedInstruction');
    }
    return undefined;
}
