import { describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    BPF_LOADER_UPGRADEABLE_ID,
    ConfigurationError,
    ConfigurationErrorCode,
    defaultComputeBudget,
    defaultProgramSearchPaths,
    Environment,
    FEATURES,
    featureIdToU64,
    FeatureSet,
    keyedAccountForProgram,
    minimumBalance,
    defaultRent,
    programDataAddress,
    Sysvars,
    SYSVAR_IDS,
    systemAccount,
} from '../../src';
import { key } from './programs';

describe('Environment', () => {
    it('registers the built-in programs and precompiles by default', () => {
        const names = Environment.default()
            .programs.list()
            .map(program => program.name);
        expect(names).toEqual([
            'system_program',
            'compute_budget_program',
            'ed25519_program',
            'secp256k1_program',
        ]);
    });

    it('never changes the receiver', () => {
        const base = Environment.default();
        const next = base.withComputeUnitLimit(10_000n).warpToSlot(50n);

        expect(base.computeBudget.computeUnitLimit).toBe(1_400_000n);
        expect(base.sysvars.clock.slot).toBe(0n);
        expect(next.computeBudget.computeUnitLimit).toBe(10_000n);
        expect(next.sysvars.clock.slot).toBe(50n);
    });

    it('rejects an invalid compute budget', () => {
        expect(() =>
            Environment.default().withComputeBudget({
                ...defaultComputeBudget(),
                heapSize: 1000,
            }),
        ).toThrow(ConfigurationErrorCode.INVALID_COMPUTE_BUDGET);
    });

    it('loads a program image from the search path', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harness-programs-'));
        fs.writeFileSync(path.join(dir, 'counter.so'), Buffer.from([0x7f, 0x45]));
        const environment = Environment.default()
            .withProgramSearchPaths([dir])
            .withProgram(key(60), 'counter');
        const program = environment.programs.get(key(60));

        expect(program?.kind).toBe('elf');
        if (program?.kind !== 'elf') return;
        expect(program.elf).toEqual(new Uint8Array([0x7f, 0x45]));
        expect(program.loader.equals(BPF_LOADER_UPGRADEABLE_ID)).toBe(true);
    });

    it('throws a configuration error for a missing program image', () => {
        let error: unknown;
        try {
            Environment.default().withProgramSearchPaths([]).withProgram(key(60), 'absent');
        } catch (caught) {
            error = caught;
        }
        expect(error).toBeInstanceOf(ConfigurationError);
        if (!(error instanceof ConfigurationError)) return;
        expect(error.code).toBe(ConfigurationErrorCode.PROGRAM_FILE_NOT_FOUND);
    });

    it('reads the search paths from an explicit environment record', () => {
        expect(
            defaultProgramSearchPaths({ BPF_OUT_DIR: '/bpf', SBF_OUT_DIR: '/sbf' }),
        ).toEqual(['tests/fixtures', '/bpf', '/sbf', process.cwd()]);
        expect(defaultProgramSearchPaths({})).toEqual(['tests/fixtures', process.cwd()]);
    });
});

describe('FeatureSet', () => {
    it('activates and deactivates without mutation', () => {
        const all = FeatureSet.allEnabled();
        const fewer = all.deactivate(FEATURES.ed25519PrecompileVerifyStrict);

        expect(all.isActive(FEATURES.ed25519PrecompileVerifyStrict)).toBe(true);
        expect(all.allCataloguedActive()).toBe(true);
        expect(fewer.isActive(FEATURES.ed25519PrecompileVerifyStrict)).toBe(false);
        expect(fewer.allCataloguedActive()).toBe(false);
        expect(fewer.activate(FEATURES.ed25519PrecompileVerifyStrict, 9n).activationSlot(
            FEATURES.ed25519PrecompileVerifyStrict,
        )).toBe(9n);
    });

    it('rejects a negative activation slot', () => {
        expect(() => FeatureSet.empty().activate(key(1), -1n)).toThrow(
            ConfigurationErrorCode.INVALID_FEATURE,
        );
    });

    it('derives the u64 id from the first eight address bytes', () => {
        expect(featureIdToU64(key(1))).toBe(0x0101010101010101n);
        expect(featureIdToU64(FEATURES.ed25519PrecompileVerifyStrict)).toBe(
            10495550516822450953n,
        );
    });
});

describe('Sysvars', () => {
    const sysvars = Sysvars.default();

    it('computes the rent exempt minimum', () => {
        expect(minimumBalance(defaultRent(), 0)).toBe(890_880n);
        expect(sysvars.minimumBalance(165)).toBe(2_039_280n);
    });

    it('encodes the rent sysvar', () => {
        expect([...sysvars.rentData()]).toEqual([
            0x98, 0x0d, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x40, 50,
        ]);
    });

    it('encodes the clock sysvar', () => {
        const data = sysvars.warpToSlot(1_000n).clockData();
        expect(data).toHaveLength(40);
        expect(data.readBigUInt64LE(0)).toBe(1_000n);
        expect(data.readBigUInt64LE(24)).toBe(1n);
    });

    it('warps the clock and rolls slot hashes', () => {
        const warped = sysvars.warpToSlot(1_000n);

        expect(warped.clock.epoch).toBe(0n);
        expect(warped.clock.leaderScheduleEpoch).toBe(1n);
        expect(warped.slotHashes).toHaveLength(512);
        expect(warped.slotHashes[0].slot).toBe(999n);
        expect(warped.slotHashes[511].slot).toBe(488n);
    });

    it('keeps the slot hash list bounded on short warps', () => {
        const warped = sysvars.warpToSlot(10n);

        expect(warped.slotHashes).toHaveLength(512);
        expect(warped.slotHashes[0].slot).toBe(9n);
    });

    it('prefixes slot hashes with their count', () => {
        const data = sysvars.slotHashesData();
        expect(data.readBigUInt64LE(0)).toBe(512n);
        expect(data).toHaveLength(8 + 512 * 40);
    });

    it('builds rent exempt sysvar accounts', () => {
        const [address, account] = sysvars.keyedAccountForRentSysvar();

        expect(address.equals(SYSVAR_IDS.rent)).toBe(true);
        expect(account.data).toHaveLength(17);
        expect(account.lamports).toBe(sysvars.minimumBalance(17));
    });

    it('reads sysvar accounts in place of the configured values', () => {
        const clock = { ...sysvars.clock, unixTimestamp: 1_700_000_000n };
        const stakeHistory = [
            { epoch: 3n, effective: 10n, activating: 2n, deactivating: 1n },
        ];
        const overridden = sysvars.withAccountOverrides([
            sysvars.withClock(clock).keyedAccountForClockSysvar(),
            sysvars.with({ stakeHistory }).keyedAccountForStakeHistorySysvar(),
            [key(5), systemAccount(1n)],
        ]);

        expect(overridden.clock).toEqual(clock);
        expect(overridden.stakeHistory).toEqual(stakeHistory);
        expect(overridden.rent).toEqual(sysvars.rent);
    });

    it('keeps the configured value when a sysvar account does not decode', () => {
        const [clockId, clockAccount] = sysvars.keyedAccountForClockSysvar();
        const [rentId, rentAccount] = sysvars.keyedAccountForRentSysvar();
        const badRent = Uint8Array.from(rentAccount.data);
        badRent[16] = 200;
        const [hashesId, hashesAccount] = sysvars.keyedAccountForSlotHashesSysvar();

        const overridden = sysvars.withAccountOverrides([
            [clockId, { ...clockAccount, data: new Uint8Array(8) }],
            [rentId, { ...rentAccount, data: badRent }],
            [hashesId, { ...hashesAccount, data: hashesAccount.data.subarray(0, 48) }],
        ]);

        expect(overridden.clock).toEqual(sysvars.clock);
        expect(overridden.rent).toEqual(sysvars.rent);
        expect(overridden.slotHashes).toEqual(sysvars.slotHashes);
    });

    it('rejects an epoch schedule shorter than the minimum', () => {
        expect(() =>
            sysvars.withEpochSchedule({ ...sysvars.epochSchedule, slotsPerEpoch: 8n }),
        ).toThrow(ConfigurationErrorCode.INVALID_SYSVAR);
    });
});

describe('program accounts', () => {
    it('stubs an upgradeable program with its program data address', () => {
        const [address, account] = keyedAccountForProgram({
            kind: 'elf',
            programId: key(61),
            name: 'counter',
            elf: new Uint8Array([1]),
            loader: BPF_LOADER_UPGRADEABLE_ID,
        });

        expect(address.equals(key(61))).toBe(true);
        expect(account.executable).toBe(true);
        expect([...account.data.subarray(0, 4)]).toEqual([2, 0, 0, 0]);
        expect(Buffer.from(account.data.subarray(4)).equals(
            programDataAddress(key(61)).toBuffer(),
        )).toBe(true);
    });
});
