import { ConfigurationError, ConfigurationErrorCode } from '../errors';

export interface ComputeBudget {
    /** Units one top-level instruction may consume. */
    computeUnitLimit: bigint;
    /** Program heap size in bytes. */
    heapSize: number;
    /** Deepest nesting of cross-program invocations, top level included. */
    maxInstructionStackDepth: number;
    /** Most instructions, nested ones included, one call may run. */
    maxInstructionTraceLength: number;
    /** Units charged for each cross-program invocation. */
    invokeUnits: bigint;
    /** Bytes of invocation data covered by one compute unit. */
    cpiBytesPerUnit: bigint;
    /** Largest instruction data a cross-program invocation may carry. */
    maxCpiInstructionSize: number;
}

export const MAX_COMPUTE_UNIT_LIMIT = 1_400_000n;
export const MIN_HEAP_SIZE = 32 * 1024;
export const MAX_HEAP_SIZE = 256 * 1024;

export function defaultComputeBudget(): ComputeBudget {
    return {
        computeUnitLimit: MAX_COMPUTE_UNIT_LIMIT,
        heapSize: MIN_HEAP_SIZE,
        maxInstructionStackDepth: 5,
        maxInstructionTraceLength: 64,
        invokeUnits: 1000n,
        cpiBytesPerUnit: 250n,
        maxCpiInstructionSize: 1280,
    };
}

export function validateComputeBudget(budget: ComputeBudget): ComputeBudget {
    const fail = (message: string): never => {
        throw new ConfigurationError(
            ConfigurationErrorCode.INVALID_COMPUTE_BUDGET,
            'validateComputeBudget',
            message,
        );
    };
    if (budget.computeUnitLimit < 0n) {
        fail('computeUnitLimit must not be negative');
    }
    if (
        budget.heapSize < MIN_HEAP_SIZE ||
        budget.heapSize > MAX_HEAP_SIZE ||
        budget.heapSize % 1024 !== 0
    ) {
        fail(
            `heapSize must be a multiple of 1024 between ${MIN_HEAP_SIZE} and ${MAX_HEAP_SIZE}`,
        );
    }
    if (budget.maxInstructionStackDepth < 1) {
        fail('maxInstructionStackDepth must be at least 1');
    }
    if (budget.maxInstructionTraceLength < 1) {
        fail('maxInstructionTraceLength must be at least 1');
    }
    if (budget.cpiBytesPerUnit <= 0n) {
        fail('cpiBytesPerUnit must be positive');
    }
    if (budget.invokeUnits < 0n || budget.maxCpiInstructionSize < 0) {
        fail('invokeUnits and maxCpiInstructionSize must not be negative');
    }
    return { ...budget };
}
