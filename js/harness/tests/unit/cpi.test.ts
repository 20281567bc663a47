import { describe, expect, it } from 'vitest';
import { Buffer } from 'buffer';
import {
    PublicKey,
    SystemProgram,
    TransactionInstruction,
} from '@solana/web3.js';
import {
    defaultComputeBudget,
    Fault,
    getResultingAccount,
    KeyedAccount,
    LoaderOutcome,
    ProgramHarness,
    systemAccount,
} from '../../src';
import {
    invokerData,
    INVOKER_ID,
    key,
    RECURSOR_ID,
    RELAY_A_ID,
    RELAY_B_ID,
    testEnvironment,
} from './programs';

const loader = {
    invoke: (): LoaderOutcome => {
        throw new Error('no program image should run');
    },
};
const harness = new ProgramHarness({ environment: testEnvironment(), loader });

const VAULT_SEED = Buffer.from('vault');
const [vault, vaultBump] = PublicKey.findProgramAddressSync([VAULT_SEED], INVOKER_ID);
const recipient = key(7);

const invoke = (data: Buffer, vaultIsSigner = false) =>
    new TransactionInstruction({
        programId: INVOKER_ID,
        keys: [
            { pubkey: vault, isSigner: vaultIsSigner, isWritable: true },
            { pubkey: recipient, isSigner: false, isWritable: true },
        ],
        data,
    });

const accounts = (): KeyedAccount[] => [
    [vault, systemAccount(10_000n)],
    [recipient, systemAccount(0n)],
];

describe('cross-program invocation', () => {
    it('signs for a program derived address with the caller seeds', () => {
        const result = harness.processInstruction(
            invoke(invokerData(4_000n, VAULT_SEED, vaultBump)),
            accounts(),
        );

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(1_150n);
        expect(getResultingAccount(result, vault)?.lamports).toBe(6_000n);
        expect(getResultingAccount(result, recipient)?.lamports).toBe(4_000n);
        expect(result.logs).toEqual([
            `Program ${INVOKER_ID.toBase58()} invoke [1]`,
            'Program 11111111111111111111111111111111 invoke [2]',
            'Program 11111111111111111111111111111111 success',
            `Program ${INVOKER_ID.toBase58()} success`,
        ]);
    });

    it('refuses to escalate a signer privilege without seeds', () => {
        const result = harness.processInstruction(
            invoke(invokerData(4_000n)),
            accounts(),
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('PrivilegeEscalation'),
        });
        expect(getResultingAccount(result, vault)?.lamports).toBe(10_000n);
    });

    it('passes a signer through when the caller holds it', () => {
        const result = harness.processInstruction(
            invoke(invokerData(4_000n), true),
            accounts(),
        );

        expect(result.programResult).toEqual({ status: 'success' });
        expect(getResultingAccount(result, recipient)?.lamports).toBe(4_000n);
    });

    it('rejects seeds that derive a different address', () => {
        const result = harness.processInstruction(
            invoke(invokerData(4_000n, Buffer.from('other'), vaultBump)),
            accounts(),
        );

        expect(result.programResult.status).toBe('failure');
    });

    it('allows direct self recursion within the stack depth', () => {
        const result = harness.processInstruction(
            new TransactionInstruction({
                programId: RECURSOR_ID,
                keys: [],
                data: Buffer.from([3]),
            }),
            [],
        );

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(3_000n);
    });

    it('fails past the maximum stack depth', () => {
        const result = harness.processInstruction(
            new TransactionInstruction({
                programId: RECURSOR_ID,
                keys: [],
                data: Buffer.from([10]),
            }),
            [],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('CallDepth'),
        });
        expect(result.computeUnitsConsumed).toBe(5_000n);
    });

    it('rejects reentrancy through another program', () => {
        const result = harness.processInstruction(
            new TransactionInstruction({
                programId: RELAY_A_ID,
                keys: [],
                data: Buffer.concat([RELAY_B_ID.toBuffer(), RELAY_A_ID.toBuffer()]),
            }),
            [],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('ReentrancyNotAllowed'),
        });
    });

    it('rejects invocation data above the size limit', () => {
        const small = new ProgramHarness({
            environment: testEnvironment().withComputeBudget({
                ...defaultComputeBudget(),
                maxCpiInstructionSize: 10,
            }),
            loader,
        });
        const result = small.processInstruction(
            new TransactionInstruction({
                programId: RELAY_A_ID,
                keys: [],
                data: Buffer.concat([RELAY_B_ID.toBuffer(), Buffer.alloc(20)]),
            }),
            [],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('InvalidArgument'),
        });
    });

    it('requires callee accounts to be passed to the caller', () => {
        const leakerId = key(210);
        const outsider = key(99);
        const leaky = harness.withEnvironment(
            testEnvironment().withBuiltin(leakerId, 'leaker', context =>
                context.invoke(
                    SystemProgram.transfer({
                        fromPubkey: context.accounts[0].pubkey,
                        toPubkey: outsider,
                        lamports: 1,
                    }),
                ),
            ),
        );
        const result = leaky.processInstruction(
            new TransactionInstruction({
                programId: leakerId,
                keys: [{ pubkey: vault, isSigner: true, isWritable: true }],
                data: Buffer.from([]),
            }),
            [[vault, systemAccount(10_000n)]],
        );

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.instructionError('MissingAccount'),
        });
        expect(result.computeUnitsConsumed).toBe(1_000n);
    });
});
