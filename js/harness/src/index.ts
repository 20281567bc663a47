export * from './constants';
export * from './errors';
export * from './state/account';
export * from './state/account-store';
export * from './config/compute-budget';
export * from './config/feature-set';
export * from './config/sysvars';
export * from './config/environment';
export * from './programs/registry';
export * from './programs/accounts';
export * from './programs/file';
export * from './programs/system-program';
export * from './programs/compute-budget-program';
export * from './programs/precompile';
export * from './programs/ed25519-program';
export * from './programs/secp256k1-program';
export * from './runtime/instruction-context';
export * from './runtime/account-rules';
export * from './runtime/invoke-context';
export * from './runtime/process-instruction';
export * from './loader/program-loader';
export * from './loader/litesvm-backend';
export * from './loader/litesvm-loader';
export * from './result';
export * from './checks';
export * from './fixture/native';
export * from './fixture/interchange';
export * from './fixture/checks';
export * from './fixture/ejector';
export * from './harness';
