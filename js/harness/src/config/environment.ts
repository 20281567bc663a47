import { PublicKey } from '@solana/web3.js';
import { BPF_LOADER_UPGRADEABLE_ID } from '../constants';
import { logger } from '../logger';
import { COMPUTE_BUDGET_PROGRAM } from '../programs/compute-budget-program';
import { ED25519_PROGRAM } from '../programs/ed25519-program';
import { defaultProgramSearchPaths, loadProgramElf } from '../programs/file';
import { BuiltinProcessor, ProgramRegistry } from '../programs/registry';
import { SECP256K1_PROGRAM } from '../programs/secp256k1-program';
import { SYSTEM_PROGRAM } from '../programs/system-program';
import {
    ComputeBudget,
    defaultComputeBudget,
    validateComputeBudget,
} from './compute-budget';
import { FeatureSet } from './feature-set';
import { Sysvars } from './sysvars';

export interface EnvironmentConfig {
    computeBudget: ComputeBudget;
    featureSet: FeatureSet;
    sysvars: Sysvars;
    programs: ProgramRegistry;
    programSearchPaths: readonly string[];
}

/**
 * Everything an instruction runs against apart from its accounts: compute
 * budget, feature set, sysvars and the registered programs. Immutable;
 * every `with*` method returns a new environment.
 */
export class Environment {
    readonly computeBudget: ComputeBudget;
    readonly featureSet: FeatureSet;
    readonly sysvars: Sysvars;
    readonly programs: ProgramRegistry;
    readonly programSearchPaths: readonly string[];

    constructor(config: EnvironmentConfig) {
        this.computeBudget = validateComputeBudget(config.computeBudget);
        this.featureSet = config.featureSet;
        this.sysvars = config.sysvars;
        this.programs = config.programs;
        this.programSearchPaths = [...config.programSearchPaths];
    }

    /**
     * Default budget, every known feature, default sysvars, the system and
     * compute-budget programs, and the ed25519 and secp256k1 precompiles.
     */
    static default(): Environment {
        return new Environment({
            computeBudget: defaultComputeBudget(),
            featureSet: FeatureSet.allEnabled(),
            sysvars: Sysvars.default(),
            programs: ProgramRegistry.of([
                SYSTEM_PROGRAM,
                COMPUTE_BUDGET_PROGRAM,
                ED25519_PROGRAM,
                SECP256K1_PROGRAM,
            ]),
            programSearchPaths: defaultProgramSearchPaths(),
        });
    }

    /**
     * The default environment plus `<programName>.so`, owned by the
     * upgradeable loader.
     */
    static forProgram(programId: PublicKey, programName: string): Environment {
        return Environment.default().withProgram(programId, programName);
    }

    private update(changes: Partial<EnvironmentConfig>): Environment {
        return new Environment({
            computeBudget: this.computeBudget,
            featureSet: this.featureSet,
            sysvars: this.sysvars,
            programs: this.programs,
            programSearchPaths: this.programSearchPaths,
            ...changes,
        });
    }

    withComputeBudget(computeBudget: ComputeBudget): Environment {
        return this.update({ computeBudget });
    }

    /** Replaces only the given compute budget fields. */
    withComputeUnitLimit(computeUnitLimit: bigint): Environment {
        return this.update({
            computeBudget: { ...this.computeBudget, computeUnitLimit },
        });
    }

    withFeatureSet(featureSet: FeatureSet): Environment {
        return this.update({ featureSet });
    }

    withSysvars(sysvars: Sysvars): Environment {
        return this.update({ sysvars });
    }

    withProgramSearchPaths(programSearchPaths: readonly string[]): Environment {
        return this.update({ programSearchPaths });
    }

    warpToSlot(slot: bigint): Environment {
        return this.update({ sysvars: this.sysvars.warpToSlot(slot) });
    }

    /**
     * Loads `<programName>.so` from the search paths and registers it.
     * Throws a `ConfigurationError` when the file is missing or unreadable.
     */
    withProgram(
        programId: PublicKey,
        programName: string,
        loader: PublicKey = BPF_LOADER_UPGRADEABLE_ID,
    ): Environment {
        const elf = loadProgramElf(programName, this.programSearchPaths);
        logger.info('program loaded', {
            programId: programId.toBase58(),
            programName,
            bytes: elf.length,
        });
        return this.withProgramElf(programId, elf, loader, programName);
    }

    withProgramElf(
        programId: PublicKey,
        elf: Uint8Array,
        loader: PublicKey = BPF_LOADER_UPGRADEABLE_ID,
        name: string = programId.toBase58(),
    ): Environment {
        return this.update({
            programs: this.programs.with({
                kind: 'elf',
                programId,
                name,
                elf: Uint8Array.from(elf),
                loader,
            }),
        });
    }

    withBuiltin(
        programId: PublicKey,
        name: string,
        processor: BuiltinProcessor,
    ): Environment {
        return this.update({
            programs: this.programs.with({
                kind: 'builtin',
                programId,
                name,
                processor,
            }),
        });
    }
}
