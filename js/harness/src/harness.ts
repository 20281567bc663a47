import type { PublicKey, TransactionInstruction } from '@solana/web3.js';
import type { Fixture, InterchangeFixture } from '@svm-harness/fixture';
import { Check, evaluateChecks, validateResult } from './checks';
import { Environment } from './config/environment';
import { CheckFailureError } from './errors';
import {
    allFixtureChecks,
    FixtureCheck,
    resolveFixtureChecks,
} from './fixture/checks';
import type { InstructionObserver } from './fixture/ejector';
import {
    normalizeInterchangeOutcome,
    parseInterchangeFixture,
} from './fixture/interchange';
import { parseFixture, ParsedFixture } from './fixture/native';
import { LiteSvmLoader } from './loader/litesvm-loader';
import type { ProgramLoader } from './loader/program-loader';
import {
    ChainResult,
    failure,
    Fault,
    InstructionResult,
    SUCCESS,
} from './result';
import {
    findMissingAccount,
    processInstruction,
} from './runtime/process-instruction';
import { mergeAccountMetas } from './runtime/invoke-context';
import { AccountStore, AccountStoreInput } from './state/account-store';
import type { KeyedAccount } from './state/account';

export interface ProgramHarnessOptions {
    /** Defaults to `Environment.default()`. */
    environment?: Environment;
    /** Runs program images; defaults to a `LiteSvmLoader`. */
    loader?: ProgramLoader;
    observers?: InstructionObserver[];
}

/** An instruction of a validating chain and the checks its result must pass. */
export interface ChainStep {
    instruction: TransactionInstruction;
    checks: Check[];
}

/**
 * Runs instructions against caller-supplied accounts. The harness keeps no
 * account state between calls; every call starts from the accounts it is
 * given.
 */
export class ProgramHarness {
    readonly environment: Environment;
    private readonly loader: ProgramLoader;
    private readonly observers: InstructionObserver[];

    constructor(options: ProgramHarnessOptions = {}) {
        this.environment = options.environment ?? Environment.default();
        this.loader = options.loader ?? new LiteSvmLoader();
        this.observers = [...(options.observers ?? [])];
    }

    /** A harness whose environment has `<programName>.so` registered. */
    static forProgram(
        programId: PublicKey,
        programName: string,
        options: Omit<ProgramHarnessOptions, 'environment'> = {},
    ): ProgramHarness {
        return new ProgramHarness({
            ...options,
            environment: Environment.forProgram(programId, programName),
        });
    }

    /** Same loader and observers, different environment. */
    withEnvironment(environment: Environment): ProgramHarness {
        return new ProgramHarness({
            environment,
            loader: this.loader,
            observers: this.observers,
        });
    }

    private run(
        environment: Environment,
        instruction: TransactionInstruction,
        store: AccountStore,
    ): InstructionResult {
        const result = processInstruction(environment, this.loader, instruction, store);
        if (this.observers.length > 0) {
            const accounts = mergeAccountMetas(instruction.keys).flatMap(
                ({ pubkey }): KeyedAccount[] => {
                    const account = store.get(pubkey);
                    return account ? [[pubkey, account]] : [];
                },
            );
            for (const observer of this.observers) {
                observer.onInstruction({ environment, instruction, accounts, result });
            }
        }
        return result;
    }

    /**
     * Runs one instruction. Throws an `InstructionValidationError` when an
     * account the instruction references is not in `accounts`; program
     * failures are reported in the result.
     */
    processInstruction(
        instruction: TransactionInstruction,
        accounts: AccountStoreInput,
    ): InstructionResult {
        return this.run(this.environment, instruction, AccountStore.from(accounts));
    }

    /** Runs one instruction and throws a `CheckFailureError` on any mismatch. */
    processAndValidateInstruction(
        instruction: TransactionInstruction,
        accounts: AccountStoreInput,
        checks: readonly Check[],
    ): InstructionResult {
        const result = this.processInstruction(instruction, accounts);
        validateResult(result, checks);
        return result;
    }

    /**
     * Runs instructions in order, each against the accounts the previous
     * ones left behind. Stops at the first failed step; a step referencing
     * an unknown account aborts the chain with a `missingAccount` fault.
     * Steps are not atomic: earlier steps stay applied.
     */
    processInstructionChain(
        instructions: readonly TransactionInstruction[],
        accounts: AccountStoreInput,
    ): ChainResult {
        return this.runChain(
            instructions.map(instruction => ({ instruction, checks: [] })),
            accounts,
            'processInstructionChain',
        );
    }

    /**
     * Runs a chain, checking each step's result right after it runs. The
     * first failing step ends the chain with a `CheckFailureError`.
     */
    processAndValidateInstructionChain(
        steps: readonly ChainStep[],
        accounts: AccountStoreInput,
    ): ChainResult {
        return this.runChain(steps, accounts, 'processAndValidateInstructionChain');
    }

    private runChain(
        steps: readonly ChainStep[],
        accounts: AccountStoreInput,
        functionName: string,
    ): ChainResult {
        const store = AccountStore.from(accounts);
        const results: InstructionResult[] = [];
        let computeUnitsConsumed = 0n;
        const finish = (last?: InstructionResult, abortedAt?: number): ChainResult => ({
            programResult: last?.programResult ?? SUCCESS,
            computeUnitsConsumed,
            returnData: last?.returnData ?? new Uint8Array(),
            logs: last?.logs ?? [],
            resultingAccounts: store.toKeyedAccounts(),
            steps: results,
            ...(abortedAt === undefined ? {} : { abortedAt }),
        });

        for (const [index, { instruction, checks }] of steps.entries()) {
            const missing = findMissingAccount(this.environment, instruction, store);
            if (missing) {
                return finish(
                    {
                        programResult: failure(Fault.missingAccount(missing)),
                        computeUnitsConsumed: 0n,
                        returnData: new Uint8Array(),
                        logs: [],
                        resultingAccounts: [],
                    },
                    index,
                );
            }
            const result = this.run(this.environment, instruction, store);
            results.push(result);
            computeUnitsConsumed += result.computeUnitsConsumed;
            store.merge(result.resultingAccounts);

            const mismatches = evaluateChecks(
                { ...result, resultingAccounts: store.toKeyedAccounts() },
                checks,
            );
            if (mismatches.length > 0) {
                throw new CheckFailureError(functionName, mismatches, `step ${index}`);
            }
            if (result.programResult.status === 'failure') {
                return finish(result, index);
            }
        }
        return finish(results[results.length - 1]);
    }

    private runParsed(parsed: ParsedFixture): InstructionResult {
        return this.run(
            parsed.environment,
            parsed.instruction,
            AccountStore.from(parsed.accounts),
        );
    }

    /** Runs a native fixture's instruction in the fixture's environment. */
    processFixture(fixture: Fixture): InstructionResult {
        return this.runParsed(parseFixture(fixture, this.environment));
    }

    processAndValidateFixture(fixture: Fixture): InstructionResult {
        return this.processAndPartiallyValidateFixture(fixture, allFixtureChecks());
    }

    /** Runs a native fixture and compares the selected effects. */
    processAndPartiallyValidateFixture(
        fixture: Fixture,
        checks: readonly FixtureCheck[],
    ): InstructionResult {
        const parsed = parseFixture(fixture, this.environment);
        const result = this.runParsed(parsed);
        validateResult(result, resolveFixtureChecks(parsed.result, checks), 'fixture');
        return result;
    }

    processInterchangeFixture(fixture: InterchangeFixture): InstructionResult {
        return this.runParsed(parseInterchangeFixture(fixture, this.environment));
    }

    processAndValidateInterchangeFixture(
        fixture: InterchangeFixture,
    ): InstructionResult {
        return this.processAndPartiallyValidateInterchangeFixture(
            fixture,
            allFixtureChecks(),
        );
    }

    /**
     * Runs an interchange fixture and compares the selected effects. The
     * outcome is compared as the interchange layout records it.
     */
    processAndPartiallyValidateInterchangeFixture(
        fixture: InterchangeFixture,
        checks: readonly FixtureCheck[],
    ): InstructionResult {
        const parsed = parseInterchangeFixture(fixture, this.environment);
        const result = this.runParsed(parsed);
        validateResult(
            {
                ...result,
                programResult: normalizeInterchangeOutcome(result.programResult),
            },
            resolveFixtureChecks(parsed.result, checks),
            'interchange fixture',
        );
        return result;
    }
}
