import type { PublicKey, TransactionInstruction } from '@solana/web3.js';
import type { Environment } from '../config/environment';
import {
    InstructionValidationError,
    InstructionValidationErrorCode,
} from '../errors';
import type { ProgramLoader } from '../loader/program-loader';
import { logger } from '../logger';
import { keyedAccountForProgram } from '../programs/accounts';
import { failure, InstructionResult, SUCCESS } from '../result';
import { AccountStore } from '../state/account-store';
import { cloneAccount, KeyedAccount } from '../state/account';
import { InvokeContext, mergeAccountMetas } from './invoke-context';

/**
 * First key of `instruction` the store cannot resolve. The program id may
 * be missing when it is registered; it is stubbed in that case.
 */
export function findMissingAccount(
    environment: Environment,
    instruction: TransactionInstruction,
    store: AccountStore,
): PublicKey | undefined {
    return instruction.keys
        .map(meta => meta.pubkey)
        .find(
            pubkey =>
                !store.has(pubkey) &&
                !(
                    pubkey.equals(instruction.programId) &&
                    environment.programs.has(pubkey)
                ),
        );
}

/**
 * Runs one instruction against `store` without changing it. Throws an
 * `InstructionValidationError` before anything runs when an account is
 * missing; every other failure is reported in the result.
 */
export function processInstruction(
    environment: Environment,
    loader: ProgramLoader,
    instruction: TransactionInstruction,
    store: AccountStore,
): InstructionResult {
    const missing = findMissingAccount(environment, instruction, store);
    if (missing) {
        throw new InstructionValidationError(
            InstructionValidationErrorCode.ACCOUNT_MISSING,
            'processInstruction',
            `Account ${missing.toBase58()} is referenced by the instruction but missing from the account store`,
        );
    }

    const inputs: KeyedAccount[] = [];
    for (const { pubkey } of mergeAccountMetas(instruction.keys)) {
        const stored = store.get(pubkey);
        const program = environment.programs.get(pubkey);
        if (stored) {
            inputs.push([pubkey, stored]);
        } else if (program) {
            inputs.push(keyedAccountForProgram(program, environment.sysvars.rent));
        }
    }
    const live: KeyedAccount[] = inputs.map(([pubkey, account]) => [
        pubkey,
        cloneAccount(account),
    ]);

    const context = new InvokeContext({
        computeBudget: environment.computeBudget,
        featureSet: environment.featureSet,
        sysvars: environment.sysvars.withAccountOverrides(inputs),
        programs: environment.programs,
        loader,
        accounts: new Map(
            live.map(([pubkey, account]) => [pubkey.toBase58(), account]),
        ),
    });
    const fault = context.processInstruction(
        instruction.programId,
        instruction.keys,
        new Uint8Array(instruction.data),
    );

    // A failed instruction commits nothing.
    const settled = fault ? inputs : live;
    const result: InstructionResult = {
        programResult: fault ? failure(fault) : SUCCESS,
        computeUnitsConsumed: context.computeUnitsConsumed,
        returnData: context.returnDataBytes,
        logs: context.logMessages,
        resultingAccounts: settled.map(([pubkey, account]) => [
            pubkey,
            cloneAccount(account),
        ]),
    };
    logger.debug('instruction processed', {
        programId: instruction.programId.toBase58(),
        status: result.programResult.status,
        computeUnitsConsumed: result.computeUnitsConsumed.toString(),
    });
    return result;
}
