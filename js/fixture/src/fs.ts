import fs from 'fs';
import path from 'path';
import bs58 from 'bs58';
import { keccak_256 } from '@noble/hashes/sha3';
import type { Fixture, InterchangeFixture } from './types';
import { decodeFixture, encodeFixture } from './layout';
import { decodeInterchangeFixture, encodeInterchangeFixture } from './proto';
import {
    fixtureFromJson,
    fixtureToJson,
    interchangeFixtureFromJson,
    interchangeFixtureToJson,
} from './json';
import { FixtureError, FixtureErrorCode } from './errors';
import { logger } from './logger';

export const BLOB_EXTENSION = '.fix';
export const JSON_EXTENSION = '.json';

/**
 * A fixture layout: how to turn it into bytes or JSON and back.
 */
export interface FixtureCodec<F> {
    encode(fixture: F): Uint8Array;
    decode(bytes: Uint8Array): F;
    toJson(fixture: F): string;
    fromJson(text: string): F;
}

export const nativeFixtureCodec: FixtureCodec<Fixture> = {
    encode: encodeFixture,
    decode: decodeFixture,
    toJson: fixtureToJson,
    fromJson: fixtureFromJson,
};

export const interchangeFixtureCodec: FixtureCodec<InterchangeFixture> = {
    encode: encodeInterchangeFixture,
    decode: decodeInterchangeFixture,
    toJson: interchangeFixtureToJson,
    fromJson: interchangeFixtureFromJson,
};

/** Keccak-256 of the encoded fixture. */
export function fixtureHash(encoded: Uint8Array): Uint8Array {
    return keccak_256(encoded);
}

/**
 * File stem shared by the blob and JSON dumps of a fixture:
 * `instr-<base58 hash>`.
 */
export function fixtureFileStem(encoded: Uint8Array): string {
    return `instr-${bs58.encode(fixtureHash(encoded))}`;
}

function writeFile(dir: string, fileName: string, contents: Uint8Array | string) {
    fs.mkdirSync(dir, { recursive: true });
    const filePath = path.join(dir, fileName);
    fs.writeFileSync(filePath, contents);
    logger.info('fixture written', { path: filePath });
    return filePath;
}

function checkExtension(filePath: string, extension: string, functionName: string) {
    if (path.extname(filePath) !== extension) {
        throw new FixtureError(
            FixtureErrorCode.INVALID_FILE_EXTENSION,
            functionName,
            `Expected a ${extension} file, got ${filePath}`,
        );
    }
}

/**
 * Writes the binary form of a fixture to `dir` and returns the file path.
 */
export function dumpToBlobFile<F>(
    fixture: F,
    dir: string,
    codec: FixtureCodec<F>,
): string {
    const encoded = codec.encode(fixture);
    return writeFile(
        dir,
        `${fixtureFileStem(encoded)}${BLOB_EXTENSION}`,
        encoded,
    );
}

/**
 * Writes the JSON form of a fixture to `dir`. The file name hashes the
 * binary form, so both dumps of one fixture share a stem.
 */
export function dumpToJsonFile<F>(
    fixture: F,
    dir: string,
    codec: FixtureCodec<F>,
): string {
    const encoded = codec.encode(fixture);
    return writeFile(
        dir,
        `${fixtureFileStem(encoded)}${JSON_EXTENSION}`,
        codec.toJson(fixture),
    );
}

export function loadFromBlobFile<F>(
    filePath: string,
    codec: FixtureCodec<F>,
): F {
    checkExtension(filePath, BLOB_EXTENSION, 'loadFromBlobFile');
    return codec.decode(new Uint8Array(fs.readFileSync(filePath)));
}

export function loadFromJsonFile<F>(
    filePath: string,
    codec: FixtureCodec<F>,
): F {
    checkExtension(filePath, JSON_EXTENSION, 'loadFromJsonFile');
    return codec.fromJson(fs.readFileSync(filePath, 'utf8'));
}

/**
 * Lists the fixture files (blob or JSON) directly inside `dir`, sorted.
 */
export function listFixtureFiles(dir: string): string[] {
    return fs
        .readdirSync(dir)
        .filter(name =>
            [BLOB_EXTENSION, JSON_EXTENSION].includes(path.extname(name)),
        )
        .sort()
        .map(name => path.join(dir, name));
}
