import { describe, expect, it } from 'vitest';
import { SystemProgram } from '@solana/web3.js';
import {
    interchangeFixtureCodec,
    nativeFixtureCodec,
} from '@svm-harness/fixture';
import {
    buildFixture,
    buildInterchangeFixture,
    CheckFailureError,
    FixtureAdapterError,
    FixtureAdapterErrorCode,
    FixtureCheck,
    KeyedAccount,
    LoaderOutcome,
    ProgramHarness,
    systemAccount,
    SYSTEM_PROGRAM_ID,
} from '../../src';
import { key } from './programs';

const loader = {
    invoke: (): LoaderOutcome => {
        throw new Error('no program image should run');
    },
};
const harness = new ProgramHarness({ loader });
const payer = key(1);
const target = key(2);

const transfer = (lamports: number) =>
    SystemProgram.transfer({ fromPubkey: payer, toPubkey: target, lamports });

const accounts = (): KeyedAccount[] => [
    [payer, systemAccount(100n)],
    [target, systemAccount(0n)],
];

function nativeFixture(lamports: number) {
    const instruction = transfer(lamports);
    const result = harness.processInstruction(instruction, accounts());
    return nativeFixtureCodec.decode(
        nativeFixtureCodec.encode(
            buildFixture(harness.environment, instruction, accounts(), result),
        ),
    );
}

function interchangeFixture(lamports: number) {
    const instruction = transfer(lamports);
    const result = harness.processInstruction(instruction, accounts());
    return interchangeFixtureCodec.decode(
        interchangeFixtureCodec.encode(
            buildInterchangeFixture(harness.environment, instruction, accounts(), result),
        ),
    );
}

describe('native fixtures', () => {
    it('records the call it was built from', () => {
        const fixture = nativeFixture(42);

        expect(fixture.metadata.entrypoint).toBe('system_program');
        expect(fixture.output.computeUnitsConsumed).toBe(150n);
        expect(fixture.output.resultingAccounts.map(account => account.lamports)).toEqual([
            58n,
            42n,
        ]);
    });

    it('replays and validates', () => {
        const result = harness.processAndValidateFixture(nativeFixture(42));
        expect(result.computeUnitsConsumed).toBe(150n);
    });

    it('replays a failed call', () => {
        expect(() => harness.processAndValidateFixture(nativeFixture(101))).not.toThrow();
    });

    it('reports effects that differ from the recording', () => {
        const fixture = nativeFixture(42);
        fixture.output.resultingAccounts[1].lamports = 1n;

        expect(() => harness.processAndValidateFixture(fixture)).toThrow(
            [
                'CHECKS_FAILED: fixture: 1 check failed',
                `  - account ${target.toBase58()} lamports: expected 1, got 42`,
            ].join('\n'),
        );
    });

    it('compares only the selected effects', () => {
        const fixture = nativeFixture(42);
        fixture.output.resultingAccounts[1].lamports = 1n;
        fixture.output.computeUnitsConsumed = 7n;

        expect(() =>
            harness.processAndPartiallyValidateFixture(fixture, [
                FixtureCheck.programResult(),
                FixtureCheck.onlyResultingAccounts([payer]),
            ]),
        ).not.toThrow();
        expect(() =>
            harness.processAndPartiallyValidateFixture(fixture, [
                FixtureCheck.allResultingAccountsExcept([payer], {
                    data: true,
                    lamports: false,
                    owner: true,
                    space: true,
                }),
            ]),
        ).not.toThrow();
        expect(() =>
            harness.processAndPartiallyValidateFixture(fixture, [
                FixtureCheck.computeUnits(),
            ]),
        ).toThrow(CheckFailureError);
    });

    it('runs in the environment the fixture records', () => {
        const fixture = nativeFixture(42);
        fixture.input.computeBudget.computeUnitLimit = 100n;

        expect(harness.processFixture(fixture).programResult).toEqual({
            status: 'failure',
            fault: { kind: 'computeBudgetExceeded' },
        });
    });
});

describe('interchange fixtures', () => {
    it('adds the program account and keeps only modified accounts', () => {
        const fixture = interchangeFixture(42);

        expect(fixture.input.accounts.map(account => account.address.toBase58())).toEqual([
            payer.toBase58(),
            target.toBase58(),
            SYSTEM_PROGRAM_ID.toBase58(),
        ]);
        expect(fixture.input.instructionAccounts.map(account => account.index)).toEqual([
            0, 1,
        ]);
        expect(fixture.output.modifiedAccounts).toHaveLength(2);
        expect(fixture.output.computeUnitsAvailable).toBe(1_400_000n - 150n);
    });

    it('records a custom error as its code', () => {
        const fixture = interchangeFixture(101);

        expect(fixture.output.result).toBe(26);
        expect(fixture.output.customError).toBe(1);
        expect(fixture.output.modifiedAccounts).toEqual([]);
    });

    it('replays and validates', () => {
        expect(
            harness.processAndValidateInterchangeFixture(interchangeFixture(42))
                .computeUnitsConsumed,
        ).toBe(150n);
        expect(() =>
            harness.processAndValidateInterchangeFixture(interchangeFixture(101)),
        ).not.toThrow();
    });

    it('skips feature ids it does not know', () => {
        const fixture = interchangeFixture(42);
        fixture.input.features.push(42n);

        expect(() => harness.processAndValidateInterchangeFixture(fixture)).not.toThrow();
    });

    it('rejects an instruction account index out of range', () => {
        const fixture = interchangeFixture(42);
        fixture.input.instructionAccounts[0].index = 9;

        let error: unknown;
        try {
            harness.processInterchangeFixture(fixture);
        } catch (caught) {
            error = caught;
        }
        expect(error).toBeInstanceOf(FixtureAdapterError);
        if (!(error instanceof FixtureAdapterError)) return;
        expect(error.code).toBe(FixtureAdapterErrorCode.INVALID_ACCOUNT_INDEX);
    });
});
