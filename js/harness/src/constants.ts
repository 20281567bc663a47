import {
    ComputeBudgetProgram,
    PublicKey,
    SystemProgram,
    SYSVAR_CLOCK_PUBKEY,
    SYSVAR_EPOCH_SCHEDULE_PUBKEY,
    SYSVAR_RENT_PUBKEY,
    SYSVAR_SLOT_HASHES_PUBKEY,
    SYSVAR_STAKE_HISTORY_PUBKEY,
} from '@solana/web3.js';

export const SYSTEM_PROGRAM_ID = SystemProgram.programId;
export const COMPUTE_BUDGET_PROGRAM_ID = ComputeBudgetProgram.programId;

export const NATIVE_LOADER_ID = new PublicKey(
    'NativeLoader1111111111111111111111111111111',
);
export const BPF_LOADER_DEPRECATED_ID = new PublicKey(
    'BPFLoader1111111111111111111111111111111111',
);
export const BPF_LOADER_ID = new PublicKey(
    'BPFLoader2111111111111111111111111111111111',
);
export const BPF_LOADER_UPGRADEABLE_ID = new PublicKey(
    'BPFLoaderUpgradeab1e11111111111111111111111',
);

export const SYSVAR_OWNER_ID = new PublicKey(
    'Sysvar1111111111111111111111111111111111111',
);
export const SYSVAR_IDS = {
    clock: SYSVAR_CLOCK_PUBKEY,
    epochRewards: new PublicKey('SysvarEpochRewards1111111111111111111111111'),
    epochSchedule: SYSVAR_EPOCH_SCHEDULE_PUBKEY,
    lastRestartSlot: new PublicKey(
        'SysvarLastRestartS1ot1111111111111111111111',
    ),
    rent: SYSVAR_RENT_PUBKEY,
    slotHashes: SYSVAR_SLOT_HASHES_PUBKEY,
    stakeHistory: SYSVAR_STAKE_HISTORY_PUBKEY,
} as const;

/** Units charged by the system and compute-budget programs. */
export const BUILTIN_DEFAULT_COMPUTE_UNITS = 150n;

/** Largest account data size the runtime permits, in bytes. */
export const MAX_PERMITTED_DATA_LENGTH = 10 * 1024 * 1024;

export const MAX_SEED_LENGTH = 32;
