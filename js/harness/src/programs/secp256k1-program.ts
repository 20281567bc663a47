import { Buffer } from 'buffer';
import { Secp256k1Program } from '@solana/web3.js';
import { secp256k1 } from '@noble/curves/secp256k1';
import { keccak_256 } from '@noble/hashes/sha3';
import { FEATURES, FeatureSet } from '../config/feature-set';
import { dataSlice, PrecompileError, precompileError } from './precompile';
import type { PrecompileProgram } from './registry';

const DATA_START = 1;
const SIGNATURE_OFFSETS_SERIALIZED_SIZE = 11;
const SIGNATURE_SERIALIZED_SIZE = 64;
const HASHED_PUBKEY_SERIALIZED_SIZE = 20;
/** The verifying instruction is the only one visible. */
const INSTRUCTION_COUNT = 1;

interface Secp256k1SignatureOffsets {
    signatureOffset: number;
    signatureInstructionIndex: number;
    ethAddressOffset: number;
    ethAddressInstructionIndex: number;
    messageDataOffset: number;
    messageDataSize: number;
    messageInstructionIndex: number;
}

function readOffsets(data: Buffer, start: number): Secp256k1SignatureOffsets {
    return {
        signatureOffset: data.readUInt16LE(start),
        signatureInstructionIndex: data.readUInt8(start + 2),
        ethAddressOffset: data.readUInt16LE(start + 3),
        ethAddressInstructionIndex: data.readUInt8(start + 5),
        messageDataOffset: data.readUInt16LE(start + 6),
        messageDataSize: data.readUInt16LE(start + 8),
        messageInstructionIndex: data.readUInt8(start + 10),
    };
}

function slice(
    data: Uint8Array,
    instructionIndex: number,
    offset: number,
    size: number,
): Uint8Array {
    if (instructionIndex >= INSTRUCTION_COUNT) {
        throw precompileError(PrecompileError.InvalidDataOffsets);
    }
    return dataSlice(data, offset, size, PrecompileError.InvalidSignature);
}

/** Last 20 bytes of the keccak-256 hash of an uncompressed public key. */
export function ethAddressOf(publicKey: Uint8Array): Uint8Array {
    return keccak_256(publicKey.subarray(1)).subarray(12);
}

type Secp256k1Signature = ReturnType<typeof secp256k1.Signature.fromCompact>;

function parseSignature(bytes: Uint8Array): Secp256k1Signature {
    try {
        return secp256k1.Signature.fromCompact(bytes);
    } catch (error) {
        throw precompileError(PrecompileError.InvalidSignature);
    }
}

function recoverEthAddress(
    signature: Secp256k1Signature,
    recoveryId: number,
    message: Uint8Array,
): Uint8Array {
    try {
        const point = signature
            .addRecoveryBit(recoveryId)
            .recoverPublicKey(keccak_256(message));
        return ethAddressOf(point.toRawBytes(false));
    } catch (error) {
        throw precompileError(PrecompileError.InvalidSignature);
    }
}

/**
 * Recovers the signer of every secp256k1 signature the instruction lists
 * and compares it with the expected Ethereum address.
 */
export function verifySecp256k1Instruction(
    data: Uint8Array,
    featureSet: FeatureSet,
): void {
    if (data.length === 0) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    const count = data[0];
    const failOnBadCount =
        featureSet.isActive(FEATURES.libsecp256k1FailOnBadCount) ||
        featureSet.isActive(FEATURES.libsecp256k1FailOnBadCount2);
    if (failOnBadCount && count === 0 && data.length > DATA_START) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    if (data.length < DATA_START + count * SIGNATURE_OFFSETS_SERIALIZED_SIZE) {
        throw precompileError(PrecompileError.InvalidInstructionDataSize);
    }
    const buffer = Buffer.from(data);

    for (let i = 0; i < count; i++) {
        const offsets = readOffsets(
            buffer,
            DATA_START + i * SIGNATURE_OFFSETS_SERIALIZED_SIZE,
        );
        if (offsets.signatureInstructionIndex >= INSTRUCTION_COUNT) {
            throw precompileError(PrecompileError.InvalidInstructionDataSize);
        }
        // The recovery id follows the signature.
        const signatureEnd = offsets.signatureOffset + SIGNATURE_SERIALIZED_SIZE;
        if (signatureEnd >= data.length) {
            throw precompileError(PrecompileError.InvalidSignature);
        }
        const signature = parseSignature(
            data.subarray(offsets.signatureOffset, signatureEnd),
        );
        const recoveryId = data[signatureEnd];
        if (recoveryId > 3) {
            throw precompileError(PrecompileError.InvalidRecoveryId);
        }
        const ethAddress = slice(
            data,
            offsets.ethAddressInstructionIndex,
            offsets.ethAddressOffset,
            HASHED_PUBKEY_SERIALIZED_SIZE,
        );
        const message = slice(
            data,
            offsets.messageInstructionIndex,
            offsets.messageDataOffset,
            offsets.messageDataSize,
        );
        const recovered = recoverEthAddress(signature, recoveryId, message);
        if (!Buffer.from(recovered).equals(Buffer.from(ethAddress))) {
            throw precompileError(PrecompileError.InvalidSignature);
        }
    }
}

export const SECP256K1_PROGRAM: PrecompileProgram = {
    kind: 'precompile',
    programId: Secp256k1Program.programId,
    name: 'secp256k1_program',
    verify: verifySecp256k1Instruction,
};
