import { Buffer } from 'buffer';
import type { PublicKey } from '@solana/web3.js';
import { CheckFailureError, CheckMismatch } from './errors';
import {
    ExecutionFault,
    failure,
    formatOutcome,
    InstructionResult,
    outcomesEqual,
    ProgramOutcome,
    SUCCESS,
} from './result';
import { Account, bytesEqual, isClosed } from './state/account';

/**
 * Expected state of one resulting account. Only the fields that are set
 * are compared.
 */
export interface AccountExpectation {
    lamports?: bigint;
    owner?: PublicKey;
    data?: Uint8Array;
    /** `bytes` must appear in the account data at `offset`. */
    dataSlice?: { offset: number; bytes: Uint8Array };
    executable?: boolean;
    rentEpoch?: bigint;
    space?: number;
    closed?: boolean;
}

export type Check =
    | { kind: 'success' }
    | { kind: 'outcome'; outcome: ProgramOutcome }
    | { kind: 'computeUnits'; units: bigint }
    | { kind: 'returnData'; data: Uint8Array }
    | { kind: 'account'; pubkey: PublicKey; expect: AccountExpectation }
    | { kind: 'logsContain'; message: string };

export const Check = {
    success: (): Check => ({ kind: 'success' }),
    outcome: (outcome: ProgramOutcome): Check => ({ kind: 'outcome', outcome }),
    err: (fault: ExecutionFault): Check => ({
        kind: 'outcome',
        outcome: failure(fault),
    }),
    computeUnits: (units: bigint): Check => ({ kind: 'computeUnits', units }),
    returnData: (data: Uint8Array): Check => ({
        kind: 'returnData',
        data: Uint8Array.from(data),
    }),
    account: (pubkey: PublicKey, expect: AccountExpectation): Check => ({
        kind: 'account',
        pubkey,
        expect,
    }),
    logsContain: (message: string): Check => ({ kind: 'logsContain', message }),
};

const SHOWN_BYTES = 32;

/** Hex with a `0x` prefix; long values are cut after 32 bytes. */
export function formatBytes(bytes: Uint8Array): string {
    const hex = Buffer.from(bytes.subarray(0, SHOWN_BYTES)).toString('hex');
    return bytes.length > SHOWN_BYTES
        ? `0x${hex}... (${bytes.length} bytes)`
        : `0x${hex}`;
}

function checkAccount(
    pubkey: PublicKey,
    account: Account | undefined,
    expect: AccountExpectation,
): CheckMismatch[] {
    const name = `account ${pubkey.toBase58()}`;
    if (!account) {
        return [{ subject: name, expected: 'present', actual: 'absent' }];
    }
    const mismatches: CheckMismatch[] = [];
    const compare = (field: string, expected: string, actual: string) => {
        if (expected !== actual) {
            mismatches.push({ subject: `${name} ${field}`, expected, actual });
        }
    };

    if (expect.lamports !== undefined) {
        compare('lamports', expect.lamports.toString(), account.lamports.toString());
    }
    if (expect.owner !== undefined) {
        compare('owner', expect.owner.toBase58(), account.owner.toBase58());
    }
    if (expect.data !== undefined && !bytesEqual(expect.data, account.data)) {
        mismatches.push({
            subject: `${name} data`,
            expected: formatBytes(expect.data),
            actual: formatBytes(account.data),
        });
    }
    if (expect.dataSlice !== undefined) {
        const { offset, bytes } = expect.dataSlice;
        const slice = account.data.subarray(offset, offset + bytes.length);
        if (offset + bytes.length > account.data.length) {
            mismatches.push({
                subject: `${name} data[${offset}..${offset + bytes.length}]`,
                expected: formatBytes(bytes),
                actual: `data of ${account.data.length} bytes`,
            });
        } else if (!bytesEqual(slice, bytes)) {
            mismatches.push({
                subject: `${name} data[${offset}..${offset + bytes.length}]`,
                expected: formatBytes(bytes),
                actual: formatBytes(slice),
            });
        }
    }
    if (expect.executable !== undefined) {
        compare('executable', String(expect.executable), String(account.executable));
    }
    if (expect.rentEpoch !== undefined) {
        compare('rent epoch', expect.rentEpoch.toString(), account.rentEpoch.toString());
    }
    if (expect.space !== undefined) {
        compare('space', String(expect.space), String(account.data.length));
    }
    if (expect.closed !== undefined) {
        const state = (closed: boolean) => (closed ? 'closed' : 'open');
        compare('state', state(expect.closed), state(isClosed(account)));
    }
    return mismatches;
}

function evaluateCheck(result: InstructionResult, check: Check): CheckMismatch[] {
    switch (check.kind) {
        case 'success':
        case 'outcome': {
            const expected = check.kind === 'success' ? SUCCESS : check.outcome;
            return outcomesEqual(expected, result.programResult)
                ? []
                : [
                      {
                          subject: 'program result',
                          expected: formatOutcome(expected),
                          actual: formatOutcome(result.programResult),
                      },
                  ];
        }
        case 'computeUnits':
            return check.units === result.computeUnitsConsumed
                ? []
                : [
                      {
                          subject: 'compute units',
                          expected: check.units.toString(),
                          actual: result.computeUnitsConsumed.toString(),
                      },
                  ];
        case 'returnData':
            return bytesEqual(check.data, result.returnData)
                ? []
                : [
                      {
                          subject: 'return data',
                          expected: formatBytes(check.data),
                          actual: formatBytes(result.returnData),
                      },
                  ];
        case 'account': {
            const entry = result.resultingAccounts.find(([pubkey]) =>
                pubkey.equals(check.pubkey),
            );
            return checkAccount(check.pubkey, entry?.[1], check.expect);
        }
        case 'logsContain':
            return result.logs.some(line => line.includes(check.message))
                ? []
                : [
                      {
                          subject: 'logs',
                          expected: `a line containing "${check.message}"`,
                          actual: `${result.logs.length} log line(s), none matching`,
                      },
                  ];
    }
}

/** Every mismatch between `result` and `checks`, in check order. */
export function evaluateChecks(
    result: InstructionResult,
    checks: readonly Check[],
): CheckMismatch[] {
    return checks.flatMap(check => evaluateCheck(result, check));
}

/**
 * Throws one `CheckFailureError` listing every failed check.
 */
export function validateResult(
    result: InstructionResult,
    checks: readonly Check[],
    context?: string,
): void {
    const mismatches = evaluateChecks(result, checks);
    if (mismatches.length > 0) {
        throw new CheckFailureError('validateResult', mismatches, context);
    }
}

/**
 * Checks that hold when `actual` matches `expected` in outcome, compute
 * units, return data and every account `expected` lists.
 */
export function checksFromResult(expected: InstructionResult): Check[] {
    return [
        Check.outcome(expected.programResult),
        Check.computeUnits(expected.computeUnitsConsumed),
        Check.returnData(expected.returnData),
        ...expected.resultingAccounts.map(([pubkey, account]) =>
            Check.account(pubkey, {
                lamports: account.lamports,
                owner: account.owner,
                data: account.data,
                executable: account.executable,
                rentEpoch: account.rentEpoch,
            }),
        ),
    ];
}

export function compareResults(
    expected: InstructionResult,
    actual: InstructionResult,
): CheckMismatch[] {
    return evaluateChecks(actual, checksFromResult(expected));
}
