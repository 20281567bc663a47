import { describe, expect, it } from 'vitest';
import { Buffer } from 'buffer';
import {
    Ed25519Program,
    Keypair,
    Secp256k1Program,
    TransactionInstruction,
} from '@solana/web3.js';
import {
    ExecutionFault,
    Fault,
    FeatureSet,
    LoaderOutcome,
    PrecompileError,
    ProcessorError,
    ProgramHarness,
    verifyEd25519Instruction,
    verifySecp256k1Instruction,
} from '../../src';

const loader = {
    invoke: (): LoaderOutcome => {
        throw new Error('no program image should run');
    },
};
const harness = new ProgramHarness({ loader });
const message = Buffer.from('hello');

const faultOf = (verify: () => void): ExecutionFault | undefined => {
    try {
        verify();
    } catch (error) {
        if (error instanceof ProcessorError) return error.fault;
        throw error;
    }
    return undefined;
};

const withData = (instruction: TransactionInstruction, data: Buffer) =>
    new TransactionInstruction({
        programId: instruction.programId,
        keys: instruction.keys,
        data,
    });

describe('ed25519 precompile', () => {
    const signer = Keypair.fromSeed(new Uint8Array(32).fill(7));
    const instruction = Ed25519Program.createInstructionWithPrivateKey({
        privateKey: signer.secretKey,
        message,
    });
    // offsets (16) | public key (32) | signature (64) | message
    const PUBLIC_KEY_OFFSET = 16;
    const MESSAGE_OFFSET = 112;

    it('verifies without an invoke frame or compute cost', () => {
        const result = harness.processInstruction(instruction, []);

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(0n);
        expect(result.logs).toEqual([]);
    });

    it('fails a signature over another message', () => {
        const data = Buffer.from(instruction.data);
        data[MESSAGE_OFFSET] ^= 1;
        const result = harness.processInstruction(withData(instruction, data), []);

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.programError(PrecompileError.InvalidSignature),
        });
        expect(result.logs).toEqual([]);
    });

    it('rejects a public key that is not a curve point', () => {
        const data = Buffer.from(instruction.data);
        data.fill(0xff, PUBLIC_KEY_OFFSET, PUBLIC_KEY_OFFSET + 31);
        data[PUBLIC_KEY_OFFSET + 31] = 0x7f;

        expect(faultOf(() => verifyEd25519Instruction(data, FeatureSet.allEnabled()))).toEqual(
            Fault.programError(PrecompileError.InvalidPublicKey),
        );
    });

    it('only reads the verifying instruction', () => {
        const data = Buffer.from(instruction.data);
        data.writeUInt16LE(1, 4);

        expect(faultOf(() => verifyEd25519Instruction(data, FeatureSet.allEnabled()))).toEqual(
            Fault.programError(PrecompileError.InvalidDataOffsets),
        );
    });

    it('checks the data size against the signature count', () => {
        const features = FeatureSet.allEnabled();

        expect(faultOf(() => verifyEd25519Instruction(Uint8Array.from([1]), features))).toEqual(
            Fault.programError(PrecompileError.InvalidInstructionDataSize),
        );
        expect(faultOf(() => verifyEd25519Instruction(Uint8Array.from([1, 0]), features))).toEqual(
            Fault.programError(PrecompileError.InvalidInstructionDataSize),
        );
        expect(
            faultOf(() => verifyEd25519Instruction(Uint8Array.from([0, 0, 0]), features)),
        ).toEqual(Fault.programError(PrecompileError.InvalidInstructionDataSize));
        expect(faultOf(() => verifyEd25519Instruction(Uint8Array.from([0, 0]), features))).toBe(
            undefined,
        );
    });
});

describe('secp256k1 precompile', () => {
    const instruction = Secp256k1Program.createInstructionWithPrivateKey({
        privateKey: new Uint8Array(32).fill(1),
        message,
    });
    // count (1) | offsets (11) | eth address (20) | signature (64) | recovery id | message
    const RECOVERY_ID_OFFSET = 96;
    const MESSAGE_OFFSET = 97;

    it('verifies without an invoke frame or compute cost', () => {
        const result = harness.processInstruction(instruction, []);

        expect(result.programResult).toEqual({ status: 'success' });
        expect(result.computeUnitsConsumed).toBe(0n);
        expect(result.logs).toEqual([]);
    });

    it('fails when the recovered signer has another address', () => {
        const data = Buffer.from(instruction.data);
        data[MESSAGE_OFFSET] ^= 1;
        const result = harness.processInstruction(withData(instruction, data), []);

        expect(result.programResult).toEqual({
            status: 'failure',
            fault: Fault.programError(PrecompileError.InvalidSignature),
        });
    });

    it('rejects a recovery id above 3', () => {
        const data = Buffer.from(instruction.data);
        data[RECOVERY_ID_OFFSET] = 4;

        expect(faultOf(() => verifySecp256k1Instruction(data, FeatureSet.allEnabled()))).toEqual(
            Fault.programError(PrecompileError.InvalidRecoveryId),
        );
    });

    it('only reads the verifying instruction', () => {
        const data = Buffer.from(instruction.data);
        data[6] = 1;

        expect(faultOf(() => verifySecp256k1Instruction(data, FeatureSet.allEnabled()))).toEqual(
            Fault.programError(PrecompileError.InvalidDataOffsets),
        );
    });

    it('rejects trailing data after a zero count while the gate is active', () => {
        const data = Uint8Array.from([0, 1]);

        expect(faultOf(() => verifySecp256k1Instruction(data, FeatureSet.allEnabled()))).toEqual(
            Fault.programError(PrecompileError.InvalidInstructionDataSize),
        );
        expect(faultOf(() => verifySecp256k1Instruction(data, FeatureSet.empty()))).toBe(
            undefined,
        );
        expect(
            faultOf(() => verifySecp256k1Instruction(new Uint8Array(), FeatureSet.empty())),
        ).toEqual(Fault.programError(PrecompileError.InvalidInstructionDataSize));
    });
});
