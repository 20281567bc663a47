import type { TransactionInstruction } from '@solana/web3.js';
import {
    dumpToBlobFile,
    dumpToJsonFile,
    FixtureCodec,
    interchangeFixtureCodec,
    nativeFixtureCodec,
} from '@svm-harness/fixture';
import type { Environment } from '../config/environment';
import { logger } from '../logger';
import type { InstructionResult } from '../result';
import type { KeyedAccount } from '../state/account';
import { buildInterchangeFixture } from './interchange';
import { buildFixture } from './native';

/** One finished instruction call, as observers see it. */
export interface ObservedInstruction {
    environment: Environment;
    instruction: TransactionInstruction;
    /** The accounts the instruction ran against. */
    accounts: KeyedAccount[];
    result: InstructionResult;
}

/**
 * Called after every instruction a harness processes, chain steps
 * included.
 */
export interface InstructionObserver {
    onInstruction(call: ObservedInstruction): void;
}

export interface EjectionTarget {
    blobDir?: string;
    jsonDir?: string;
}

export interface FixtureEjectorOptions {
    native?: EjectionTarget;
    interchange?: EjectionTarget;
}

function eject<F>(fixture: F, target: EjectionTarget, codec: FixtureCodec<F>) {
    if (target.blobDir) dumpToBlobFile(fixture, target.blobDir, codec);
    if (target.jsonDir) dumpToJsonFile(fixture, target.jsonDir, codec);
}

/**
 * Writes every observed call as a fixture file, in the native layout, the
 * interchange layout or both.
 */
export class FixtureEjector implements InstructionObserver {
    constructor(private readonly options: FixtureEjectorOptions) {}

    onInstruction({ environment, instruction, accounts, result }: ObservedInstruction) {
        const { native, interchange } = this.options;
        if (native) {
            eject(
                buildFixture(environment, instruction, accounts, result),
                native,
                nativeFixtureCodec,
            );
        }
        if (interchange) {
            eject(
                buildInterchangeFixture(environment, instruction, accounts, result),
                interchange,
                interchangeFixtureCodec,
            );
        }
    }
}

/**
 * Builds an ejector from `EJECT_FIXTURES` and `EJECT_FIXTURES_JSON` (native
 * layout) and `EJECT_FIXTURES_INTERCHANGE` and
 * `EJECT_FIXTURES_INTERCHANGE_JSON`. Undefined when none is set.
 */
export function fixtureEjectorFromEnv(
    env: Record<string, string | undefined>,
): FixtureEjector | undefined {
    const target = (blobDir?: string, jsonDir?: string) =>
        blobDir || jsonDir ? { blobDir, jsonDir } : undefined;
    const options: FixtureEjectorOptions = {
        native: target(env.EJECT_FIXTURES, env.EJECT_FIXTURES_JSON),
        interchange: target(
            env.EJECT_FIXTURES_INTERCHANGE,
            env.EJECT_FIXTURES_INTERCHANGE_JSON,
        ),
    };
    if (!options.native && !options.interchange) return undefined;
    logger.info('fixture ejection enabled', {
        native: options.native,
        interchange: options.interchange,
    });
    return new FixtureEjector(options);
}
