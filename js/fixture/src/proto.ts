import { Buffer } from 'buffer';
import path from 'path';
import { PublicKey } from '@solana/web3.js';
import { loadSync } from 'protobufjs';
import {
    array,
    bigint,
    boolean,
    coerce,
    create,
    instance,
    integer,
    nullable,
    refine,
    string,
    type,
    Infer,
    StructError,
} from 'superstruct';
import type {
    InterchangeAccountState,
    InterchangeFixture,
} from './types';
import { FixtureError, FixtureErrorCode } from './errors';

const PROTO_FILE = path.join(__dirname, '../proto/invoke.proto');

const InstrFixture = loadSync(PROTO_FILE).lookupType(
    'org.solana.sealevel.v1.InstrFixture',
);

/*
 * Decoded messages are read as plain objects, u64 values as decimal
 * strings and bytes as base64, then validated here.
 */

const PublicKeyBytes = refine(
    string(),
    'PublicKeyBytes',
    value => Buffer.from(value, 'base64').length === 32,
);

const PublicKeyFromBase64 = coerce(
    instance(PublicKey),
    PublicKeyBytes,
    value => new PublicKey(Buffer.from(value, 'base64')),
);

const BigIntFromString = coerce(bigint(), string(), value => BigInt(value));

const BytesFromBase64 = coerce(
    instance(Uint8Array),
    string(),
    value => new Uint8Array(Buffer.from(value, 'base64')),
);

const Utf8FromBase64 = coerce(string(), string(), value =>
    Buffer.from(value, 'base64').toString('utf8'),
);

const AcctStateMessage = type({
    address: PublicKeyFromBase64,
    lamports: BigIntFromString,
    data: BytesFromBase64,
    executable: boolean(),
    rentEpoch: BigIntFromString,
    owner: PublicKeyFromBase64,
    seedAddr: nullable(
        type({
            base: PublicKeyFromBase64,
            seed: Utf8FromBase64,
            owner: PublicKeyFromBase64,
        }),
    ),
});

const InstrFixtureMessage = type({
    metadata: nullable(type({ fnEntrypoint: string() })),
    input: type({
        programId: PublicKeyFromBase64,
        accounts: array(AcctStateMessage),
        instrAccounts: array(
            type({
                index: integer(),
                isWritable: boolean(),
                isSigner: boolean(),
            }),
        ),
        data: BytesFromBase64,
        cuAvail: BigIntFromString,
        slotContext: nullable(type({ slot: BigIntFromString })),
        epochContext: nullable(
            type({
                features: nullable(type({ features: array(BigIntFromString) })),
            }),
        ),
    }),
    output: type({
        result: integer(),
        customErr: integer(),
        modifiedAccounts: array(AcctStateMessage),
        cuAvail: BigIntFromString,
        returnData: BytesFromBase64,
    }),
});

function accountToMessage(account: InterchangeAccountState) {
    return {
        address: account.address.toBytes(),
        lamports: account.lamports.toString(),
        data: account.data,
        executable: account.executable,
        rentEpoch: account.rentEpoch.toString(),
        owner: account.owner.toBytes(),
        seedAddr: account.seedAddress && {
            base: account.seedAddress.base.toBytes(),
            seed: Buffer.from(account.seedAddress.seed, 'utf8'),
            owner: account.seedAddress.owner.toBytes(),
        },
    };
}

function accountFromMessage(
    message: Infer<typeof AcctStateMessage>,
): InterchangeAccountState {
    return {
        address: message.address,
        lamports: message.lamports,
        data: message.data,
        executable: message.executable,
        rentEpoch: message.rentEpoch,
        owner: message.owner,
        seedAddress: message.seedAddr && { ...message.seedAddr },
    };
}

/**
 * Encodes an interchange fixture as an `InstrFixture` protobuf message.
 */
export function encodeInterchangeFixture(fixture: InterchangeFixture): Buffer {
    const { input, output } = fixture;
    const message = InstrFixture.fromObject({
        metadata: { fnEntrypoint: fixture.metadata.entrypoint },
        input: {
            programId: input.programId.toBytes(),
            accounts: input.accounts.map(accountToMessage),
            instrAccounts: input.instructionAccounts.map(account => ({
                ...account,
            })),
            data: input.data,
            cuAvail: input.computeUnitsAvailable.toString(),
            slotContext: { slot: input.slot.toString() },
            epochContext: {
                features: {
                    features: input.features.map(feature => feature.toString()),
                },
            },
        },
        output: {
            result: output.result,
            customErr: output.customError,
            modifiedAccounts: output.modifiedAccounts.map(accountToMessage),
            cuAvail: output.computeUnitsAvailable.toString(),
            returnData: output.returnData,
        },
    });
    return Buffer.from(InstrFixture.encode(message).finish());
}

export function decodeInterchangeFixture(
    bytes: Uint8Array,
): InterchangeFixture {
    const fail = (message: string): never => {
        throw new FixtureError(
            FixtureErrorCode.DECODE_FAILED,
            'decodeInterchangeFixture',
            message,
        );
    };
    let decoded: Infer<typeof InstrFixtureMessage>;
    try {
        const object = InstrFixture.toObject(InstrFixture.decode(bytes), {
            longs: String,
            bytes: String,
            defaults: true,
        });
        decoded = create(object, InstrFixtureMessage);
    } catch (error) {
        if (error instanceof StructError) {
            return fail(`${error.path.join('.')}: ${error.message}`);
        }
        return fail(error instanceof Error ? error.message : String(error));
    }
    const { input, output } = decoded;
    return {
        metadata: { entrypoint: decoded.metadata?.fnEntrypoint ?? '' },
        input: {
            programId: input.programId,
            accounts: input.accounts.map(accountFromMessage),
            instructionAccounts: input.instrAccounts.map(account => ({
                index: account.index,
                isWritable: account.isWritable,
                isSigner: account.isSigner,
            })),
            data: input.data,
            computeUnitsAvailable: input.cuAvail,
            slot: input.slotContext?.slot ?? 0n,
            features: input.epochContext?.features?.features ?? [],
        },
        output: {
            result: output.result,
            customError: output.customErr,
            modifiedAccounts: output.modifiedAccounts.map(accountFromMessage),
            computeUnitsAvailable: output.cuAvail,
            returnData: output.returnData,
        },
    };
}
