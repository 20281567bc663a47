import { Buffer } from 'buffer';
import {
    AccountMeta,
    PublicKey,
    TransactionInstruction,
} from '@solana/web3.js';
import type { ComputeBudget } from '../config/compute-budget';
import type { FeatureSet } from '../config/feature-set';
import type { Sysvars } from '../config/sysvars';
import type { ProgramLoader } from '../loader/program-loader';
import type {
    BuiltinProgram,
    ElfProgram,
    ProgramRegistry,
} from '../programs/registry';
import { ExecutionFault, Fault, formatFault } from '../result';
import { Account, cloneAccount } from '../state/account';
import { verifyAccountChanges } from './account-rules';
import {
    InstructionAccount,
    InstructionContext,
    ProcessorError,
} from './instruction-context';

export interface InvokeContextOptions {
    computeBudget: ComputeBudget;
    featureSet: FeatureSet;
    sysvars: Sysvars;
    programs: ProgramRegistry;
    loader: ProgramLoader;
    /** Live accounts of the call, keyed by base58 address. */
    accounts: Map<string, Account>;
}

interface Frame {
    programId: PublicKey;
    /** Account state at the start of the frame, refreshed after each CPI. */
    pre: Map<string, Account>;
}

/**
 * Merges duplicate metas into one per address; flags are OR'd and the
 * first reference fixes the position.
 */
export function mergeAccountMetas(metas: readonly AccountMeta[]): AccountMeta[] {
    const merged = new Map<string, AccountMeta>();
    for (const meta of metas) {
        const key = meta.pubkey.toBase58();
        const existing = merged.get(key);
        merged.set(key, {
            pubkey: meta.pubkey,
            isSigner: meta.isSigner || (existing?.isSigner ?? false),
            isWritable: meta.isWritable || (existing?.isWritable ?? false),
        });
    }
    return [...merged.values()];
}

/**
 * The metas in instruction order, each carrying the merged flags of its
 * address.
 */
function withMergedFlags(metas: readonly AccountMeta[]): AccountMeta[] {
    const merged = new Map(
        mergeAccountMetas(metas).map(meta => [meta.pubkey.toBase58(), meta]),
    );
    return metas.map(meta => {
        const flags = merged.get(meta.pubkey.toBase58());
        return {
            pubkey: meta.pubkey,
            isSigner: flags?.isSigner ?? meta.isSigner,
            isWritable: flags?.isWritable ?? meta.isWritable,
        };
    });
}

/**
 * Ephemeral execution scope of one top-level instruction: the compute
 * meter, the log collector, return data, the invocation stack and the
 * live accounts. Dropped once the result is assembled.
 */
export class InvokeContext {
    private readonly options: InvokeContextOptions;
    private remaining: bigint;
    private readonly logs: string[] = [];
    private returnData: { programId: PublicKey; data: Uint8Array } | undefined;
    private readonly frames: Frame[] = [];
    private traceLength = 0;

    constructor(options: InvokeContextOptions) {
        this.options = options;
        this.remaining = options.computeBudget.computeUnitLimit;
    }

    get computeUnitsConsumed(): bigint {
        return this.options.computeBudget.computeUnitLimit - this.remaining;
    }

    get logMessages(): string[] {
        return [...this.logs];
    }

    get returnDataBytes(): Uint8Array {
        return this.returnData ? Uint8Array.from(this.returnData.data) : new Uint8Array();
    }

    /**
     * Runs a top-level instruction. Returns the fault that ended it, or
     * undefined on success.
     */
    processInstruction(
        programId: PublicKey,
        metas: readonly AccountMeta[],
        data: Uint8Array,
    ): ExecutionFault | undefined {
        try {
            this.execute(programId, withMergedFlags(metas), data);
            return undefined;
        } catch (error) {
            if (error instanceof ProcessorError) return error.fault;
            throw error;
        }
    }

    private consume(units: bigint): void {
        if (units > this.remaining) {
            this.remaining = 0n;
            throw new ProcessorError(Fault.computeBudgetExceeded());
        }
        this.remaining -= units;
    }

    private liveAccount(pubkey: PublicKey): Account {
        const account = this.options.accounts.get(pubkey.toBase58());
        if (!account) {
            throw new ProcessorError(Fault.missingAccount(pubkey));
        }
        return account;
    }

    private execute(
        programId: PublicKey,
        metas: AccountMeta[],
        data: Uint8Array,
    ): void {
        const { computeBudget, programs } = this.options;
        this.traceLength += 1;
        if (this.traceLength > computeBudget.maxInstructionTraceLength) {
            throw ProcessorError.instruction('MaxInstructionTraceLengthExceeded');
        }
        const program = programs.get(programId);
        if (!program) {
            throw new ProcessorError(Fault.unknownProgram(programId));
        }

        const unique = mergeAccountMetas(metas);
        const frame: Frame = {
            programId,
            pre: new Map(
                unique.map(meta => [
                    meta.pubkey.toBase58(),
                    cloneAccount(this.liveAccount(meta.pubkey)),
                ]),
            ),
        };
        const depth = this.frames.length + 1;
        const lifecycleLogs = program.kind === 'builtin';
        const id = programId.toBase58();

        if (lifecycleLogs) this.logs.push(`Program ${id} invoke [${depth}]`);
        this.frames.push(frame);
        this.returnData = undefined;
        try {
            if (program.kind === 'builtin') {
                this.runBuiltin(program, metas, data, depth);
            } else if (program.kind === 'precompile') {
                program.verify(Uint8Array.from(data), this.options.featureSet);
            } else {
                this.runElf(program, unique, metas, data);
            }
            const fault = verifyAccountChanges(
                programId,
                unique.map(meta => {
                    const key = meta.pubkey.toBase58();
                    const live = this.liveAccount(meta.pubkey);
                    return {
                        pubkey: meta.pubkey,
                        isWritable: meta.isWritable,
                        pre: frame.pre.get(key) ?? live,
                        post: live,
                    };
                }),
            );
            if (fault) throw new ProcessorError(fault);
        } catch (error) {
            const processorError =
                error instanceof ProcessorError
                    ? error
                    : new ProcessorError(
                          Fault.vmFault(
                              error instanceof Error ? error.message : String(error),
                          ),
                      );
            // Program images log their own failure line.
            if (lifecycleLogs) {
                this.logs.push(`Program ${id} failed: ${formatFault(processorError.fault)}`);
            }
            throw processorError;
        } finally {
            this.frames.pop();
        }
        if (lifecycleLogs) this.logs.push(`Program ${id} success`);
    }

    private runBuiltin(
        program: BuiltinProgram,
        metas: AccountMeta[],
        data: Uint8Array,
        depth: number,
    ): void {
        const { computeBudget, featureSet, sysvars } = this.options;
        const programId = program.programId;
        const accounts: InstructionAccount[] = metas.map(meta => ({
            pubkey: meta.pubkey,
            isSigner: meta.isSigner,
            isWritable: meta.isWritable,
            account: this.liveAccount(meta.pubkey),
        }));
        const context: InstructionContext = {
            programId,
            data: Uint8Array.from(data),
            accounts,
            computeBudget,
            featureSet,
            sysvars,
            stackHeight: depth,
            consumeComputeUnits: units => this.consume(units),
            remainingComputeUnits: () => this.remaining,
            log: message => {
                this.logs.push(`Program log: ${message}`);
            },
            setReturnData: returnData => {
                this.returnData = { programId, data: Uint8Array.from(returnData) };
                this.logs.push(
                    `Program return: ${programId.toBase58()} ${Buffer.from(
                        returnData,
                    ).toString('base64')}`,
                );
            },
            getReturnData: () =>
                this.returnData
                    ? {
                          programId: this.returnData.programId,
                          data: Uint8Array.from(this.returnData.data),
                      }
                    : undefined,
            invoke: (instruction, signerSeeds = []) =>
                this.invoke(programId, metas, instruction, signerSeeds),
        };
        program.processor(context);
    }

    private runElf(
        program: ElfProgram,
        unique: AccountMeta[],
        metas: AccountMeta[],
        data: Uint8Array,
    ): void {
        const { computeBudget, featureSet, sysvars, programs, loader } = this.options;
        const outcome = loader.invoke({
            programId: program.programId,
            program,
            accounts: unique.map(meta => ({
                pubkey: meta.pubkey,
                isSigner: meta.isSigner,
                isWritable: meta.isWritable,
                account: cloneAccount(this.liveAccount(meta.pubkey)),
            })),
            instructionAccounts: metas.map(meta => ({ ...meta })),
            data: Uint8Array.from(data),
            computeUnitLimit: this.remaining,
            computeBudget,
            featureSet,
            sysvars,
            programs,
        });
        this.logs.push(...outcome.logs);
        this.consume(outcome.computeUnitsConsumed);
        if (outcome.status === 'failure') {
            throw new ProcessorError(outcome.fault);
        }
        const referenced = new Set(unique.map(meta => meta.pubkey.toBase58()));
        for (const [pubkey, account] of outcome.accounts) {
            if (!referenced.has(pubkey.toBase58())) continue;
            Object.assign(this.liveAccount(pubkey), cloneAccount(account));
        }
        if (outcome.returnData.length > 0) {
            this.returnData = {
                programId: program.programId,
                data: Uint8Array.from(outcome.returnData),
            };
        }
    }

    private invoke(
        callerProgramId: PublicKey,
        callerMetas: AccountMeta[],
        instruction: TransactionInstruction,
        signerSeeds: readonly (readonly Uint8Array[])[],
    ): void {
        const { computeBudget } = this.options;
        if (instruction.data.length > computeBudget.maxCpiInstructionSize) {
            throw ProcessorError.instruction('InvalidArgument');
        }
        this.consume(
            computeBudget.invokeUnits +
                BigInt(instruction.data.length) / computeBudget.cpiBytesPerUnit,
        );
        if (this.frames.length + 1 > computeBudget.maxInstructionStackDepth) {
            throw ProcessorError.instruction('CallDepth');
        }
        const calleeId = instruction.programId;
        const onStack = this.frames.some(frame => frame.programId.equals(calleeId));
        const caller = this.frames[this.frames.length - 1];
        if (onStack && !caller.programId.equals(calleeId)) {
            throw ProcessorError.instruction('ReentrancyNotAllowed');
        }

        const signers = signerSeeds.map(seeds => {
            try {
                return PublicKey.createProgramAddressSync(
                    seeds.map(seed => Buffer.from(seed)),
                    callerProgramId,
                );
            } catch {
                throw ProcessorError.instruction('InvalidSeeds');
            }
        });
        const callerFlags = new Map(
            mergeAccountMetas(callerMetas).map(meta => [meta.pubkey.toBase58(), meta]),
        );
        const calleeMetas = withMergedFlags(instruction.keys);
        for (const meta of mergeAccountMetas(calleeMetas)) {
            const callerMeta = callerFlags.get(meta.pubkey.toBase58());
            if (!callerMeta) {
                throw ProcessorError.instruction('MissingAccount');
            }
            if (meta.isWritable && !callerMeta.isWritable) {
                throw ProcessorError.instruction('PrivilegeEscalation');
            }
            const signedBySeeds = signers.some(signer => signer.equals(meta.pubkey));
            if (meta.isSigner && !callerMeta.isSigner && !signedBySeeds) {
                throw ProcessorError.instruction('PrivilegeEscalation');
            }
        }

        this.execute(calleeId, calleeMetas, new Uint8Array(instruction.data));

        // The callee's changes are settled; the caller is checked from here on.
        for (const meta of calleeMetas) {
            const key = meta.pubkey.toBase58();
            caller.pre.set(key, cloneAccount(this.liveAccount(meta.pubkey)));
        }
    }
}
