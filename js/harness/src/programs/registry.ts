import { PublicKey } from '@solana/web3.js';
import type { FeatureSet } from '../config/feature-set';
import { NATIVE_LOADER_ID } from '../constants';
import type { InstructionContext } from '../runtime/instruction-context';

/**
 * Entrypoint of a program that runs in process. It reads and mutates the
 * accounts of `context` and reports failure by throwing a
 * `ProcessorError`.
 */
export type BuiltinProcessor = (context: InstructionContext) => void;

export interface BuiltinProgram {
    kind: 'builtin';
    programId: PublicKey;
    name: string;
    processor: BuiltinProcessor;
}

/**
 * Checks the data of a precompile instruction, throwing a
 * `ProcessorError` when it does not verify.
 */
export type PrecompileVerifier = (data: Uint8Array, featureSet: FeatureSet) => void;

/** A signature verifier that runs without an invoke frame or compute cost. */
export interface PrecompileProgram {
    kind: 'precompile';
    programId: PublicKey;
    name: string;
    verify: PrecompileVerifier;
}

export interface ElfProgram {
    kind: 'elf';
    programId: PublicKey;
    name: string;
    elf: Uint8Array;
    /** The loader that owns the program account. */
    loader: PublicKey;
}

export type RegisteredProgram = BuiltinProgram | PrecompileProgram | ElfProgram;

export function programOwner(program: RegisteredProgram): PublicKey {
    return program.kind === 'elf' ? program.loader : NATIVE_LOADER_ID;
}

/**
 * Programs the pipeline can run, keyed by program id. Instances are
 * immutable; `with` returns an extended copy.
 */
export class ProgramRegistry {
    private constructor(
        private readonly programs: ReadonlyMap<string, RegisteredProgram>,
    ) {}

    static empty(): ProgramRegistry {
        return new ProgramRegistry(new Map());
    }

    static of(programs: readonly RegisteredProgram[]): ProgramRegistry {
        return programs.reduce(
            (registry, program) => registry.with(program),
            ProgramRegistry.empty(),
        );
    }

    get(programId: PublicKey): RegisteredProgram | undefined {
        return this.programs.get(programId.toBase58());
    }

    has(programId: PublicKey): boolean {
        return this.programs.has(programId.toBase58());
    }

    /** Adds `program`, replacing any program with the same id. */
    with(program: RegisteredProgram): ProgramRegistry {
        const programs = new Map(this.programs);
        programs.set(program.programId.toBase58(), program);
        return new ProgramRegistry(programs);
    }

    list(): RegisteredProgram[] {
        return [...this.programs.values()];
    }

    elfPrograms(): ElfProgram[] {
        return this.list().filter(
            (program): program is ElfProgram => program.kind === 'elf',
        );
    }
}
