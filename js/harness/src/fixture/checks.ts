import type { PublicKey } from '@solana/web3.js';
import { AccountExpectation, Check } from '../checks';
import type { InstructionResult } from '../result';
import type { KeyedAccount } from '../state/account';

/** Account fields a fixture comparison looks at. */
export interface AccountFieldSelection {
    data: boolean;
    lamports: boolean;
    owner: boolean;
    space: boolean;
}

export const ALL_ACCOUNT_FIELDS: AccountFieldSelection = {
    data: true,
    lamports: true,
    owner: true,
    space: true,
};

/**
 * One part of a fixture's effects to compare against a run.
 */
export type FixtureCheck =
    | { kind: 'computeUnits' }
    | { kind: 'programResult' }
    | { kind: 'returnData' }
    | { kind: 'allResultingAccounts'; fields: AccountFieldSelection }
    | {
          kind: 'onlyResultingAccounts';
          addresses: PublicKey[];
          fields: AccountFieldSelection;
      }
    | {
          kind: 'allResultingAccountsExcept';
          ignoreAddresses: PublicKey[];
          fields: AccountFieldSelection;
      };

export const FixtureCheck = {
    computeUnits: (): FixtureCheck => ({ kind: 'computeUnits' }),
    programResult: (): FixtureCheck => ({ kind: 'programResult' }),
    returnData: (): FixtureCheck => ({ kind: 'returnData' }),
    allResultingAccounts: (
        fields: AccountFieldSelection = ALL_ACCOUNT_FIELDS,
    ): FixtureCheck => ({ kind: 'allResultingAccounts', fields }),
    onlyResultingAccounts: (
        addresses: PublicKey[],
        fields: AccountFieldSelection = ALL_ACCOUNT_FIELDS,
    ): FixtureCheck => ({ kind: 'onlyResultingAccounts', addresses, fields }),
    allResultingAccountsExcept: (
        ignoreAddresses: PublicKey[],
        fields: AccountFieldSelection = ALL_ACCOUNT_FIELDS,
    ): FixtureCheck => ({
        kind: 'allResultingAccountsExcept',
        ignoreAddresses,
        fields,
    }),
};

/** Every effect of a fixture: the checks a full validation runs. */
export function allFixtureChecks(): FixtureCheck[] {
    return [
        FixtureCheck.programResult(),
        FixtureCheck.computeUnits(),
        FixtureCheck.returnData(),
        FixtureCheck.allResultingAccounts(),
    ];
}

function accountCheck(
    [pubkey, account]: KeyedAccount,
    fields: AccountFieldSelection,
): Check {
    const expect: AccountExpectation = {};
    if (fields.data) expect.data = account.data;
    if (fields.lamports) expect.lamports = account.lamports;
    if (fields.owner) expect.owner = account.owner;
    if (fields.space) expect.space = account.data.length;
    return Check.account(pubkey, expect);
}

const includes = (addresses: readonly PublicKey[], pubkey: PublicKey) =>
    addresses.some(address => address.equals(pubkey));

/**
 * Turns fixture checks into result checks, taking expected values from
 * the fixture's effects.
 */
export function resolveFixtureChecks(
    expected: InstructionResult,
    checks: readonly FixtureCheck[],
): Check[] {
    const accounts = (keep: (pubkey: PublicKey) => boolean) =>
        expected.resultingAccounts.filter(([pubkey]) => keep(pubkey));
    return checks.flatMap((check): Check[] => {
        switch (check.kind) {
            case 'computeUnits':
                return [Check.computeUnits(expected.computeUnitsConsumed)];
            case 'programResult':
                return [Check.outcome(expected.programResult)];
            case 'returnData':
                return [Check.returnData(expected.returnData)];
            case 'allResultingAccounts':
                return accounts(() => true).map(entry =>
                    accountCheck(entry, check.fields),
                );
            case 'onlyResultingAccounts':
                return accounts(pubkey => includes(check.addresses, pubkey)).map(
                    entry => accountCheck(entry, check.fields),
                );
            case 'allResultingAccountsExcept':
                return accounts(
                    pubkey => !includes(check.ignoreAddresses, pubkey),
                ).map(entry => accountCheck(entry, check.fields));
        }
    });
}
