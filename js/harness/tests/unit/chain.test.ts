import { describe, expect, it } from 'vitest';
import { SystemProgram } from '@solana/web3.js';
import {
    AccountStore,
    Check,
    CheckFailureError,
    Fault,
    getResultingAccount,
    KeyedAccount,
    LoaderOutcome,
    ProgramHarness,
    systemAccount,
} from '../../src';
import { key } from './programs';

const harness = new ProgramHarness({
    loader: {
        invoke: (): LoaderOutcome => {
            throw new Error('no program image should run');
        },
    },
});

const [alice, bob, carol, dave] = [key(1), key(2), key(3), key(4)];

const transfer = (from: typeof alice, to: typeof alice, lamports: number) =>
    SystemProgram.transfer({ fromPubkey: from, toPubkey: to, lamports });

const accounts: KeyedAccount[] = [alice, bob, carol, dave].map(pubkey => [
    pubkey,
    systemAccount(500_000_000n),
]);

const instructions = [
    transfer(alice, bob, 100_000_000),
    transfer(bob, carol, 50_000_000),
    transfer(bob, dave, 50_000_000),
];

describe('ProgramHarness.processInstructionChain', () => {
    it('threads account state through every step', () => {
        const result = harness.processInstructionChain(instructions, accounts);

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.abortedAt).toBeUndefined();
        expect(result.steps).toHaveLength(3);
        expect(result.computeUnitsConsumed).toBe(450n);
        expect(result.resultingAccounts.map(([, account]) => account.lamports)).toEqual([
            400_000_000n,
            450_000_000n,
            550_000_000n,
            550_000_000n,
        ]);
    });

    it('matches folding single instructions by hand', () => {
        const store = AccountStore.from(accounts);
        for (const instruction of instructions) {
            const step = harness.processInstruction(instruction, store);
            store.merge(step.resultingAccounts);
        }
        const chained = harness.processInstructionChain(instructions, accounts);

        expect(chained.resultingAccounts).toEqual(store.toKeyedAccounts());
    });

    it('succeeds with the input accounts when empty', () => {
        const result = harness.processInstructionChain([], accounts);

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(0n);
        expect(result.steps).toEqual([]);
        expect(result.resultingAccounts).toEqual(accounts);
    });

    it('aborts on an account missing from the running store', () => {
        const stranger = key(9);
        const result = harness.processInstructionChain(
            [transfer(alice, bob, 1_000), transfer(stranger, bob, 1_000)],
            accounts,
        );

        expect(result.abortedAt).toBe(1);
        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.missingAccount(stranger),
        });
        expect(result.steps).toHaveLength(1);
        expect(getResultingAccount(result, alice)?.lamports).toBe(499_999_000n);
    });

    it('stops at the first failed step and keeps earlier steps applied', () => {
        const result = harness.processInstructionChain(
            [
                transfer(alice, bob, 1_000),
                transfer(carol, dave, 900_000_000),
                transfer(alice, bob, 1_000),
            ],
            accounts,
        );

        expect(result.abortedAt).toBe(1);
        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.programError(1),
        });
        expect(result.steps).toHaveLength(2);
        expect(result.computeUnitsConsumed).toBe(300n);
        expect(getResultingAccount(result, alice)?.lamports).toBe(499_999_000n);
        expect(getResultingAccount(result, carol)?.lamports).toBe(500_000_000n);
    });
});

describe('ProgramHarness.processAndValidateInstructionChain', () => {
    it('checks every step against the running store', () => {
        const result = harness.processAndValidateInstructionChain(
            [
                {
                    instruction: instructions[0],
                    checks: [
                        Check.success(),
                        Check.account(alice, { lamports: 400_000_000n }),
                        Check.account(dave, { lamports: 500_000_000n }),
                    ],
                },
                {
                    instruction: instructions[1],
                    checks: [Check.account(bob, { lamports: 550_000_000n })],
                },
                {
                    instruction: instructions[2],
                    checks: [
                        Check.account(bob, { lamports: 450_000_000n }),
                        Check.account(carol, { lamports: 550_000_000n }),
                        Check.account(dave, { lamports: 550_000_000n }),
                    ],
                },
            ],
            accounts,
        );

        expect(result.steps).toHaveLength(3);
    });

    it('names the step whose checks failed and runs no further', () => {
        const call = () =>
            harness.processAndValidateInstructionChain(
                [
                    { instruction: instructions[0], checks: [Check.success()] },
                    {
                        instruction: instructions[1],
                        checks: [Check.account(carol, { lamports: 1n })],
                    },
                    {
                        instruction: instructions[2],
                        checks: [Check.computeUnits(0n)],
                    },
                ],
                accounts,
            );

        expect(call).toThrow(CheckFailureError);
        expect(call).toThrow(
            [
                'CHECKS_FAILED: step 1: 1 check failed',
                `  - account ${carol.toBase58()} lamports: expected 1, got 550000000`,
            ].join('\n'),
        );
    });
});
