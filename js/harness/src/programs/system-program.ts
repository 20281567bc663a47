import { Buffer } from 'buffer';
import { PublicKey } from '@solana/web3.js';
import { Layout, publicKey, struct, u32, u64 } from '@coral-xyz/borsh';
import { sha256 } from '@noble/hashes/sha256';
import BN from 'bn.js';
import {
    BUILTIN_DEFAULT_COMPUTE_UNITS,
    MAX_PERMITTED_DATA_LENGTH,
    MAX_SEED_LENGTH,
    SYSTEM_PROGRAM_ID,
} from '../constants';
import {
    accountAt,
    InstructionAccount,
    InstructionContext,
    ProcessorError,
} from '../runtime/instruction-context';
import type { BuiltinProgram } from './registry';

/** Custom error codes of the system program. */
export enum SystemError {
    AccountAlreadyInUse = 0,
    ResultWithNegativeLamports = 1,
    InvalidProgramId = 2,
    InvalidAccountDataLength = 3,
    MaxSeedLengthExceeded = 4,
    AddressWithSeedMismatch = 5,
}

export enum SystemInstructionTag {
    CreateAccount = 0,
    Assign = 1,
    Transfer = 2,
    CreateAccountWithSeed = 3,
    Allocate = 8,
    AllocateWithSeed = 9,
    AssignWithSeed = 10,
    TransferWithSeed = 11,
}

const TagLayout: Layout<{ tag: number }> = struct([u32('tag')]);
const U64Layout: Layout<{ value: BN }> = struct([u64('value')]);
const PublicKeyLayout: Layout<{ value: PublicKey }> = struct([
    publicKey('value'),
]);

/**
 * Cursor over bincode instruction data. Seeds are strings with a u64
 * length prefix.
 */
class InstructionDataReader {
    private offset = 0;

    constructor(private readonly buffer: Buffer) {}

    tag(): number {
        return this.read(TagLayout, 4).tag;
    }

    u64(): bigint {
        return BigInt(this.read(U64Layout, 8).value.toString());
    }

    publicKey(): PublicKey {
        return this.read(PublicKeyLayout, 32).value;
    }

    seed(): string {
        const length = this.u64();
        const end = this.offset + Number(length);
        if (end > this.buffer.length) {
            throw ProcessorError.instruction('InvalidInstructionData');
        }
        const seed = this.buffer.subarray(this.offset, end).toString('utf8');
        this.offset = end;
        return seed;
    }

    private read<T>(layout: Layout<T>, span: number): T {
        if (this.offset + span > this.buffer.length) {
            throw ProcessorError.instruction('InvalidInstructionData');
        }
        const value = layout.decode(this.buffer, this.offset);
        this.offset += span;
        return value;
    }
}

/**
 * Address derived from `base`, `seed` and `owner`, as the system program
 * derives it.
 */
export function createWithSeed(
    base: PublicKey,
    seed: string,
    owner: PublicKey,
): PublicKey {
    if (Buffer.byteLength(seed, 'utf8') > MAX_SEED_LENGTH) {
        throw ProcessorError.custom(SystemError.MaxSeedLengthExceeded);
    }
    return new PublicKey(
        sha256(
            Buffer.concat([
                base.toBuffer(),
                Buffer.from(seed, 'utf8'),
                owner.toBuffer(),
            ]),
        ),
    );
}

interface Authority {
    /** Address whose signature authorizes the change. */
    address: PublicKey;
    signers: ReadonlySet<string>;
}

function authorize({ address, signers }: Authority): void {
    if (!signers.has(address.toBase58())) {
        throw ProcessorError.instruction('MissingRequiredSignature');
    }
}

function checkSeedAddress(
    address: PublicKey,
    base: PublicKey,
    seed: string,
    owner: PublicKey,
): void {
    if (!createWithSeed(base, seed, owner).equals(address)) {
        throw ProcessorError.custom(SystemError.AddressWithSeedMismatch);
    }
}

function allocate(
    target: InstructionAccount,
    space: bigint,
    authority: Authority,
): void {
    authorize(authority);
    const { account } = target;
    if (account.data.length > 0 || !account.owner.equals(SYSTEM_PROGRAM_ID)) {
        throw ProcessorError.custom(SystemError.AccountAlreadyInUse);
    }
    if (space > BigInt(MAX_PERMITTED_DATA_LENGTH)) {
        throw ProcessorError.custom(SystemError.InvalidAccountDataLength);
    }
    account.data = new Uint8Array(Number(space));
}

function assign(
    target: InstructionAccount,
    owner: PublicKey,
    authority: Authority,
): void {
    if (target.account.owner.equals(owner)) return;
    authorize(authority);
    target.account.owner = owner;
}

function transferVerified(
    from: InstructionAccount,
    to: InstructionAccount,
    lamports: bigint,
): void {
    if (from.account.data.length > 0) {
        throw ProcessorError.instruction('InvalidArgument');
    }
    if (lamports > from.account.lamports) {
        throw ProcessorError.custom(SystemError.ResultWithNegativeLamports);
    }
    from.account.lamports -= lamports;
    to.account.lamports += lamports;
}

function createAccount(
    context: InstructionContext,
    from: InstructionAccount,
    to: InstructionAccount,
    lamports: bigint,
    space: bigint,
    owner: PublicKey,
    authority: Authority,
    signers: ReadonlySet<string>,
): void {
    if (to.account.lamports > 0n) {
        throw ProcessorError.custom(SystemError.AccountAlreadyInUse);
    }
    allocate(to, space, authority);
    assign(to, owner, authority);
    authorize({ address: from.pubkey, signers });
    transferVerified(from, to, lamports);
}

/**
 * The system program: account creation, allocation, assignment and
 * lamport transfers.
 */
export function processSystemInstruction(context: InstructionContext): void {
    context.consumeComputeUnits(BUILTIN_DEFAULT_COMPUTE_UNITS);
    const reader = new InstructionDataReader(Buffer.from(context.data));
    const signers = new Set(
        context.accounts
            .filter(account => account.isSigner)
            .map(account => account.pubkey.toBase58()),
    );
    const own = (account: InstructionAccount): Authority => ({
        address: account.pubkey,
        signers,
    });

    switch (reader.tag()) {
        case SystemInstructionTag.CreateAccount: {
            const lamports = reader.u64();
            const space = reader.u64();
            const owner = reader.publicKey();
            const from = accountAt(context, 0);
            const to = accountAt(context, 1);
            createAccount(context, from, to, lamports, space, owner, own(to), signers);
            return;
        }
        case SystemInstructionTag.Assign: {
            const owner = reader.publicKey();
            const target = accountAt(context, 0);
            assign(target, owner, own(target));
            return;
        }
        case SystemInstructionTag.Transfer: {
            const lamports = reader.u64();
            const from = accountAt(context, 0);
            const to = accountAt(context, 1);
            authorize(own(from));
            transferVerified(from, to, lamports);
            return;
        }
        case SystemInstructionTag.CreateAccountWithSeed: {
            const base = reader.publicKey();
            const seed = reader.seed();
            const lamports = reader.u64();
            const space = reader.u64();
            const owner = reader.publicKey();
            const from = accountAt(context, 0);
            const to = accountAt(context, 1);
            checkSeedAddress(to.pubkey, base, seed, owner);
            createAccount(context, from, to, lamports, space, owner, { address: base, signers }, signers);
            return;
        }
        case SystemInstructionTag.Allocate: {
            const space = reader.u64();
            const target = accountAt(context, 0);
            allocate(target, space, own(target));
            return;
        }
        case SystemInstructionTag.AllocateWithSeed: {
            const base = reader.publicKey();
            const seed = reader.seed();
            const space = reader.u64();
            const owner = reader.publicKey();
            const target = accountAt(context, 0);
            checkSeedAddress(target.pubkey, base, seed, owner);
            allocate(target, space, { address: base, signers });
            assign(target, owner, { address: base, signers });
            return;
        }
        case SystemInstructionTag.AssignWithSeed: {
            const base = reader.publicKey();
            const seed = reader.seed();
            const owner = reader.publicKey();
            const target = accountAt(context, 0);
            checkSeedAddress(target.pubkey, base, seed, owner);
            assign(target, owner, { address: base, signers });
            return;
        }
        case SystemInstructionTag.TransferWithSeed: {
            const lamports = reader.u64();
            const seed = reader.seed();
            const fromOwner = reader.publicKey();
            const from = accountAt(context, 0);
            const base = accountAt(context, 1);
            const to = accountAt(context, 2);
            authorize(own(base));
            checkSeedAddress(from.pubkey, base.pubkey, seed, fromOwner);
            transferVerified(from, to, lamports);
            return;
        }
        default:
            throw ProcessorError.instruction('InvalidInstructionData');
    }
}

export const SYSTEM_PROGRAM: BuiltinProgram = {
    kind: 'builtin',
    programId: SYSTEM_PROGRAM_ID,
    name: 'system_program',
    processor: processSystemInstruction,
};
