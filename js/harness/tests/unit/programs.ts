import { Buffer } from 'buffer';
import {
    PublicKey,
    SystemProgram,
    TransactionInstruction,
} from '@solana/web3.js';
import { Environment, InstructionContext } from '../../src';

export const key = (seed: number) =>
    new PublicKey(new Uint8Array(32).fill(seed));

export const WRITER_ID = key(200);
export const ECHO_ID = key(201);
export const INVOKER_ID = key(202);
export const RECURSOR_ID = key(203);
export const RELAY_A_ID = key(204);
export const RELAY_B_ID = key(205);

/** Writes `data[0]` into the first byte of every account. Costs 100 units. */
export function processWriter(context: InstructionContext): void {
    context.consumeComputeUnits(100n);
    for (const { account } of context.accounts) {
        if (account.data.length > 0) account.data[0] = context.data[0];
    }
}

/** Logs "echo" and returns its instruction data. Costs 10 units. */
export function processEcho(context: InstructionContext): void {
    context.consumeComputeUnits(10n);
    context.log('echo');
    context.setReturnData(context.data);
}

/**
 * Transfers `u64 lamports` from account 0 to account 1 through the system
 * program. Any bytes after the amount are a seed followed by a bump and
 * sign for account 0.
 */
export function processInvoker(context: InstructionContext): void {
    const data = Buffer.from(context.data);
    const lamports = data.readBigUInt64LE(0);
    const rest = data.subarray(8);
    const signerSeeds =
        rest.length > 0
            ? [[rest.subarray(0, rest.length - 1), rest.subarray(rest.length - 1)]]
            : [];
    context.invoke(
        SystemProgram.transfer({
            fromPubkey: context.accounts[0].pubkey,
            toPubkey: context.accounts[1].pubkey,
            lamports,
        }),
        signerSeeds,
    );
}

/** Invokes itself `data[0]` more times. */
export function processRecursor(context: InstructionContext): void {
    const remaining = context.data[0] ?? 0;
    if (remaining === 0) return;
    context.invoke(
        new TransactionInstruction({
            programId: RECURSOR_ID,
            keys: [],
            data: Buffer.from([remaining - 1]),
        }),
    );
}

/** Invokes the program named by the first 32 data bytes with the rest. */
export function processRelay(context: InstructionContext): void {
    if (context.data.length < 32) return;
    context.invoke(
        new TransactionInstruction({
            programId: new PublicKey(context.data.subarray(0, 32)),
            keys: [],
            data: Buffer.from(context.data.subarray(32)),
        }),
    );
}

/** The default environment plus every test program. */
export function testEnvironment(): Environment {
    return Environment.default()
        .withBuiltin(WRITER_ID, 'writer', processWriter)
        .withBuiltin(ECHO_ID, 'echo', processEcho)
        .withBuiltin(INVOKER_ID, 'invoker', processInvoker)
        .withBuiltin(RECURSOR_ID, 'recursor', processRecursor)
        .withBuiltin(RELAY_A_ID, 'relay_a', processRelay)
        .withBuiltin(RELAY_B_ID, 'relay_b', processRelay);
}

export function invokerData(lamports: bigint, seed?: Uint8Array, bump?: number) {
    const amount = Buffer.alloc(8);
    amount.writeBigUInt64LE(lamports);
    return seed === undefined || bump === undefined
        ? amount
        : Buffer.concat([amount, Buffer.from(seed), Buffer.from([bump])]);
}
