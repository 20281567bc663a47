import { ProcessorError } from '../runtime/instruction-context';

/** Custom error codes a precompile fails with. */
export enum PrecompileError {
    InvalidPublicKey = 0,
    InvalidRecoveryId = 1,
    InvalidSignature = 2,
    InvalidDataOffsets = 3,
    InvalidInstructionDataSize = 4,
}

export function precompileError(error: PrecompileError): ProcessorError {
    return ProcessorError.custom(error);
}

/**
 * `size` bytes at `offset` of `source`, or `outOfRange` when they run past
 * its end.
 */
export function dataSlice(
    source: Uint8Array,
    offset: number,
    size: number,
    outOfRange: PrecompileError,
): Uint8Array {
    const end = offset + size;
    if (end > source.length) throw precompileError(outOfRange);
    return source.subarray(offset, end);
}
