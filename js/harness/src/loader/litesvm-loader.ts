import { Buffer } from 'buffer';
import {
    ComputeBudgetProgram,
    Keypair,
    TransactionInstruction,
    TransactionMessage,
    VersionedTransaction,
} from '@solana/web3.js';
import {
    BUILTIN_DEFAULT_COMPUTE_UNITS,
    COMPUTE_BUDGET_PROGRAM_ID,
    SYSTEM_PROGRAM_ID,
} from '../constants';
import { MAX_COMPUTE_UNIT_LIMIT, MIN_HEAP_SIZE } from '../config/compute-budget';
import { logger } from '../logger';
import {
    ExecutionFault,
    Fault,
    INSTRUCTION_ERROR_NAMES,
    instructionErrorToFault,
} from '../result';
import type { Account, KeyedAccount } from '../state/account';
import {
    createLiteSvmBackend,
    SvmAccountInfo,
    SvmBackendFactory,
} from './litesvm-backend';
import type {
    LoaderAccount,
    LoaderInvocation,
    LoaderOutcome,
    ProgramLoader,
} from './program-loader';

const FEE_PAYER_LAMPORTS = 1_000_000_000n;
/** Discriminants of litesvm's fieldless instruction errors. */
const FIELDLESS_INSTRUCTION_ERRORS = INSTRUCTION_ERROR_NAMES.filter(
    name => name !== 'Custom' && name !== 'BorshIoError',
);
const MAX_SAFE_U64 = BigInt(Number.MAX_SAFE_INTEGER);

/** Calls `obj[name]()` when it is a method; undefined otherwise. */
function callMethod(obj: unknown, name: string): unknown {
    if (typeof obj !== 'object' || obj === null) return undefined;
    const method: unknown = Reflect.get(obj, name);
    return typeof method === 'function' ? Reflect.apply(method, obj, []) : undefined;
}

function readProperty(obj: unknown, name: string): unknown {
    return typeof obj === 'object' && obj !== null ? Reflect.get(obj, name) : undefined;
}

function toBigInt(value: unknown): bigint {
    return typeof value === 'bigint' || typeof value === 'number'
        ? BigInt(value)
        : 0n;
}

function readLogs(meta: unknown): string[] {
    const logs = callMethod(meta, 'logs');
    if (!Array.isArray(logs)) return [];
    const budgetProgram = `Program ${COMPUTE_BUDGET_PROGRAM_ID.toBase58()} `;
    return logs
        .filter((line): line is string => typeof line === 'string')
        .filter(line => !line.startsWith(budgetProgram));
}

function readReturnData(meta: unknown): Uint8Array {
    const data = callMethod(callMethod(meta, 'returnData'), 'data');
    return data instanceof Uint8Array ? Uint8Array.from(data) : new Uint8Array();
}

function isBorshIoError(instructionError: object): boolean {
    return (
        typeof readProperty(instructionError, 'msg') === 'string' ||
        instructionError.constructor.name === 'InstructionErrorBorshIO'
    );
}

/**
 * Maps a LiteSVM transaction error onto a fault. Instruction errors are a
 * fieldless discriminant, a custom code or a borsh I/O error.
 */
export function mapTransactionError(error: unknown): ExecutionFault {
    const instructionError = callMethod(error, 'err');
    if (instructionError === undefined) {
        return Fault.vmFault(`transaction error ${String(error)}`);
    }
    if (typeof instructionError === 'number') {
        const name = FIELDLESS_INSTRUCTION_ERRORS[instructionError];
        if (name) return instructionErrorToFault(name, 0);
    } else if (typeof instructionError === 'object' && instructionError !== null) {
        const code = readProperty(instructionError, 'code');
        if (typeof code === 'number') return Fault.programError(code);
        if (isBorshIoError(instructionError)) {
            return Fault.instructionError('BorshIoError');
        }
    }
    return Fault.vmFault(`instruction error ${String(instructionError)}`);
}

/**
 * The runtime rejects writes to read-only accounts itself. The fault names
 * the account when only one read-only account could have been written.
 */
function attributeReadonlyWrite(
    fault: ExecutionFault,
    accounts: readonly LoaderAccount[],
): ExecutionFault {
    if (
        fault.kind !== 'instructionError' ||
        (fault.name !== 'ReadonlyDataModified' && fault.name !== 'ReadonlyLamportChange')
    ) {
        return fault;
    }
    const readonly = accounts.filter(
        ({ isWritable, account }) => !isWritable && !account.executable,
    );
    return Fault.writabilityViolation(readonly.length === 1 ? readonly[0].pubkey : null);
}

/** LiteSVM takes lamports and rent epochs as doubles. */
function findUnrepresentable(accounts: readonly LoaderAccount[]): ExecutionFault | undefined {
    for (const { pubkey, account } of accounts) {
        if (account.executable) continue;
        for (const field of ['lamports', 'rentEpoch'] as const) {
            if (account[field] > MAX_SAFE_U64) {
                return Fault.vmFault(
                    `${field} ${account[field]} of ${pubkey.toBase58()} exceeds ${MAX_SAFE_U64}`,
                );
            }
        }
    }
    return undefined;
}

function toSvmAccount(account: Account): SvmAccountInfo {
    return {
        lamports: Number(account.lamports),
        data: Uint8Array.from(account.data),
        owner: account.owner,
        executable: account.executable,
        rentEpoch: Number(account.rentEpoch),
    };
}

function fromSvmAccount(info: SvmAccountInfo | null): Account {
    if (!info) {
        return {
            lamports: 0n,
            data: new Uint8Array(),
            owner: SYSTEM_PROGRAM_ID,
            executable: false,
            rentEpoch: 0n,
        };
    }
    return {
        lamports: BigInt(info.lamports),
        data: Uint8Array.from(info.data),
        owner: info.owner,
        executable: info.executable,
        rentEpoch: BigInt(info.rentEpoch ?? 0),
    };
}

/**
 * Runs program images in a fresh LiteSVM instance per invocation. The
 * instance gets the invocation's feature set and sysvars, every registered
 * image is deployed so cross-program invocations resolve, the
 * instruction's accounts are written, and the instruction is sent behind
 * a compute-budget instruction that carries the remaining units. The
 * compute-budget instructions' own cost is taken off the reported units.
 */
export class LiteSvmLoader implements ProgramLoader {
    private readonly createBackend: SvmBackendFactory;

    constructor(createBackend: SvmBackendFactory = createLiteSvmBackend) {
        this.createBackend = createBackend;
    }

    invoke(invocation: LoaderInvocation): LoaderOutcome {
        const unrepresentable = findUnrepresentable(invocation.accounts);
        if (unrepresentable) {
            return {
                status: 'failure',
                fault: unrepresentable,
                computeUnitsConsumed: 0n,
                logs: [],
            };
        }

        const svm = this.createBackend();
        svm.withFeatureSet(invocation.featureSet);
        for (const program of invocation.programs.elfPrograms()) {
            svm.addProgram(program.programId, program.elf);
        }
        const { sysvars } = invocation;
        if (sysvars.clock.slot > 0n) svm.warpToSlot(sysvars.clock.slot);
        svm.setClock(sysvars.clock);
        svm.setRent(sysvars.rent);
        svm.setEpochSchedule(sysvars.epochSchedule);
        svm.setLastRestartSlot(sysvars.lastRestartSlot);

        for (const { pubkey, account } of invocation.accounts) {
            if (account.executable) continue;
            svm.setAccount(pubkey, toSvmAccount(account));
        }

        const payer = Keypair.generate();
        svm.airdrop(payer.publicKey, FEE_PAYER_LAMPORTS);

        const prelude: TransactionInstruction[] = [
            ComputeBudgetProgram.setComputeUnitLimit({
                units: Number(
                    this.clampLimit(
                        invocation.computeUnitLimit + BUILTIN_DEFAULT_COMPUTE_UNITS,
                    ),
                ),
            }),
        ];
        if (invocation.computeBudget.heapSize !== MIN_HEAP_SIZE) {
            prelude.push(
                ComputeBudgetProgram.requestHeapFrame({
                    bytes: invocation.computeBudget.heapSize,
                }),
            );
        }
        const preludeUnits = BigInt(prelude.length) * BUILTIN_DEFAULT_COMPUTE_UNITS;

        const instruction = new TransactionInstruction({
            programId: invocation.programId,
            keys: invocation.instructionAccounts,
            data: Buffer.from(invocation.data),
        });
        const message = new TransactionMessage({
            payerKey: payer.publicKey,
            recentBlockhash: svm.latestBlockhash(),
            instructions: [...prelude, instruction],
        }).compileToV0Message();
        const tx = new VersionedTransaction(message);
        tx.sign([payer]);

        logger.debug('sending instruction to LiteSVM', {
            programId: invocation.programId.toBase58(),
            accounts: invocation.accounts.length,
        });
        const result = svm.sendTransaction(tx);

        if (typeof callMethod(result, 'err') !== 'undefined') {
            const meta = callMethod(result, 'meta');
            const consumed = toBigInt(callMethod(meta, 'computeUnitsConsumed'));
            return {
                status: 'failure',
                fault: attributeReadonlyWrite(
                    mapTransactionError(callMethod(result, 'err')),
                    invocation.accounts,
                ),
                computeUnitsConsumed: this.programUnits(consumed, preludeUnits),
                logs: readLogs(meta),
            };
        }

        const consumed = toBigInt(callMethod(result, 'computeUnitsConsumed'));
        const accounts: KeyedAccount[] = invocation.accounts.map(
            ({ pubkey, account }) => [
                pubkey,
                account.executable ? account : fromSvmAccount(svm.getAccount(pubkey)),
            ],
        );
        return {
            status: 'success',
            accounts,
            returnData: readReturnData(result),
            computeUnitsConsumed: this.programUnits(consumed, preludeUnits),
            logs: readLogs(result),
        };
    }

    private clampLimit(units: bigint): bigint {
        return units > MAX_COMPUTE_UNIT_LIMIT ? MAX_COMPUTE_UNIT_LIMIT : units;
    }

    private programUnits(consumed: bigint, preludeUnits: bigint): bigint {
        return consumed > preludeUnits ? consumed - preludeUnits : 0n;
    }
}
