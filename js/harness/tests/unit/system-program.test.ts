import { describe, expect, it } from 'vitest';
import { Buffer } from 'buffer';
import {
    PublicKey,
    SystemProgram,
    TransactionInstruction,
} from '@solana/web3.js';
import {
    createAccount,
    createWithSeed,
    Fault,
    getResultingAccount,
    KeyedAccount,
    LoaderOutcome,
    ProgramHarness,
    SystemError,
    systemAccount,
} from '../../src';
import { key, WRITER_ID } from './programs';

const loader = {
    invoke: (): LoaderOutcome => {
        throw new Error('no program image should run');
    },
};
const harness = new ProgramHarness({ loader });
const payer = key(1);
const target = key(2);

describe('system program', () => {
    it('creates an account owned by the requested program', () => {
        const result = harness.processInstruction(
            SystemProgram.createAccount({
                fromPubkey: payer,
                newAccountPubkey: target,
                lamports: 1_000_000,
                space: 16,
                programId: WRITER_ID,
            }),
            [
                [payer, systemAccount(5_000_000n)],
                [target, systemAccount(0n)],
            ],
        );

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(150n);
        expect(getResultingAccount(result, payer)?.lamports).toBe(4_000_000n);
        expect(getResultingAccount(result, target)).toEqual(
            createAccount({
                lamports: 1_000_000n,
                data: new Uint8Array(16),
                owner: WRITER_ID,
            }),
        );
    });

    it('refuses a target that already holds lamports', () => {
        const instruction = SystemProgram.createAccount({
            fromPubkey: payer,
            newAccountPubkey: target,
            lamports: 1_000,
            space: 0,
            programId: WRITER_ID,
        });
        const accounts: KeyedAccount[] = [
            [payer, systemAccount(5_000n)],
            [target, systemAccount(1n)],
        ];

        expect(harness.processInstruction(instruction, accounts).programResult).toEqual({
            status: 'failure',
            fault: Fault.programError(SystemError.AccountAlreadyInUse),
        });
    });

    it('requires the sender to sign a transfer', () => {
        const instruction = SystemProgram.transfer({
            fromPubkey: payer,
            toPubkey: target,
            lamports: 10,
        });
        instruction.keys[0].isSigner = false;
        const result = harness.processInstruction(instruction, [
            [payer, systemAccount(100n)],
            [target, systemAccount(0n)],
        ]);

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('MissingRequiredSignature'),
        });
    });

    it('fails a transfer larger than the balance with a custom error', () => {
        const result = harness.processInstruction(
            SystemProgram.transfer({ fromPubkey: payer, toPubkey: target, lamports: 101 }),
            [
                [payer, systemAccount(100n)],
                [target, systemAccount(0n)],
            ],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.programError(SystemError.ResultWithNegativeLamports),
        });
        expect(result.logs[1]).toBe(
            'Program 11111111111111111111111111111111 failed: custom program error: 0x1',
        );
    });

    it('rejects a transfer from an account that holds data', () => {
        const result = harness.processInstruction(
            SystemProgram.transfer({ fromPubkey: payer, toPubkey: target, lamports: 1 }),
            [
                [payer, createAccount({ lamports: 100n, data: new Uint8Array(4) })],
                [target, systemAccount(0n)],
            ],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('InvalidArgument'),
        });
    });

    it('fails with too few accounts', () => {
        const result = harness.processInstruction(
            new TransactionInstruction({
                programId: SystemProgram.programId,
                keys: [{ pubkey: payer, isSigner: true, isWritable: true }],
                data: Buffer.from([2, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0]),
            }),
            [[payer, systemAccount(100n)]],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('NotEnoughAccountKeys'),
        });
    });

    it('rejects an unknown instruction', () => {
        const result = harness.processInstruction(
            new TransactionInstruction({
                programId: SystemProgram.programId,
                keys: [],
                data: Buffer.from([99, 0, 0, 0]),
            }),
            [],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('InvalidInstructionData'),
        });
    });

    it('allocates and assigns a seed-derived account', () => {
        const base = key(3);
        const seed = 'harness';
        const derived = createWithSeed(base, seed, WRITER_ID);
        const result = harness.processInstruction(
            SystemProgram.allocate({
                accountPubkey: derived,
                basePubkey: base,
                seed,
                space: 8,
                programId: WRITER_ID,
            }),
            [
                [derived, systemAccount(0n)],
                [base, systemAccount(0n)],
            ],
        );

        expect(result.programResult).toEqual({ status: 'success' });
        expect(getResultingAccount(result, derived)?.owner.equals(WRITER_ID)).toBe(true);
        expect(getResultingAccount(result, derived)?.data).toEqual(new Uint8Array(8));
    });

    it('derives the same address as web3.js', async () => {
        const base = key(3);
        expect(
            createWithSeed(base, 'harness', WRITER_ID).equals(
                await PublicKey.createWithSeed(base, 'harness', WRITER_ID),
            ),
        ).toBe(true);
    });

    it('rejects seeds longer than 32 bytes', () => {
        expect(() => createWithSeed(key(3), 'x'.repeat(33), WRITER_ID)).toThrow(
            'custom program error: 0x4',
        );
    });
});
