import { Buffer } from 'buffer';
import { Ed25519Program } from '@solana/web3.js';
import { ed25519 } from '@noble/curves/ed25519';
import { FEATURES, FeatureSet } from '../config/feature-set';
import { dataSlice, PrecompileError, precompileError } from './precompile';
import type { PrecompileProgram } from './registry';

const SIGNATURE_OFFSETS_START = 2;
const SIGNATURE_OFFSETS_SERIALIZED_SIZE = 14;
const SIGNATURE_SERIALIZED_SIZE = 64;
const PUBKEY_SERIALIZED_SIZE = 32;
/** Instruction index that points at the verifying instruction itself. */
const CURRENT_INSTRUCTION = 0xffff;

interface Ed25519SignatureOffsets {
    signatureOffset: number;
    signatureInstructionIndex: number;
    publicKeyOffset: number;
    publicKeyInstructionIndex: number;
    messageDataOffset: number;
    messageDataSize: number;
    messageInstructionIndex: number;
}

function readOffsets(data: Buffer, start: number): Ed25519SignatureOffsets {
    return {
        signatureOffset: data.readUInt16LE(start),
        signatureInstructionIndex: data.readUInt16LE(start + 2),
        publicKeyOffset: data.readUInt16LE(start + 4),
        publicKeyInstructionIndex: data.readUInt16LE(start + 6),
        messageDataOffset: data.readUInt16LE(start + 8),
        messageDataSize: data.readUInt16LE(start + 10),
        messageInstructionIndex: data.readUInt16LE(start + 12),
    };
}

/**
 * Only the verifying instruction is visible, as index 0 or
 * {@link CURRENT_INSTRUCTION}.
 */
function slice(
    data: Uint8Array,
    instructionIndex: number,
    offset: number,
    size: number,
): Uint8Array {
    if (instructionIndex !== CURRENT_INSTRUCTION && instructionIndex !== 0) {
        throw precompileError(PrecompileError.InvalidDataOffsets);
    }
    return dataSlice(data, offset, size, PrecompileError.InvalidDataOffsets);
}

/**
 * Verifies every ed25519 signature the instruction lists. Verification is
 * strict while `ed25519PrecompileVerifyStrict` is active.
 */
export function verifyEd25519Instruction(
    data: Uint8Array,
    featureSet: FeatureSet,
): void {
    if (data.length < SIGNATURE_OFFSETS_START) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    const count = data[0];
    if (count === 0 && data.length > SIGNATURE_OFFSETS_START) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    if (data.length < SIGNATURE_OFFSETS_START + count * SIGNATURE_OFFSETS_SERIALIZED_SIZE) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    const zip215 = !featureSet.isActive(FEATURES.ed25519PrecompileVerifyStrict);
    const buffer = Buffer.from(data);

    for (let i = 0; i < count; i++) {
        const offsets = readOffsets(
            buffer,
            SIGNATURE_OFFSETS_START + i * SIGNATURE_OFFSETS_SERIALIZED_SIZE,
        );
        const signature = slice(
            data,
            offsets.signatureInstructionIndex,
            offsets.signatureOffset,
            SIGNATURE_SERIALIZED_SIZE,
        );
        const publicKey = slice(
            data,
            offsets.publicKeyInstructionIndex,
            offsets.publicKeyOffset,
            PUBKEY_SERIALIZED_SIZE,
        );
        try {
            ed25519.ExtendedPoint.fromHex(publicKey);
        } catch (error) {
            throw precompileError(PrecompileError.InvalidPublicKey);
        }
        const message = slice(
            data,
            offsets.messageInstructionIndex,
            offsets.messageDataOffset,
            offsets.messageDataSize,
        );
        if (!ed25519.verify(signature, message, publicKey, { zip215 })) {
            throw precompileError(PrecompileError.InvalidSignature);
        }
    }
}

export const ED25519_PROGRAM: PrecompileProgram = {
    kind: 'precompile',
    programId: Ed25519Program.programId,
    name: 'ed25519_program',
    verify: verifyEd25519Instruction,
};
