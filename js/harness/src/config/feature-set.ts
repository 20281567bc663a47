import { Buffer } from 'buffer';
import { PublicKey } from '@solana/web3.js';
import { ConfigurationError, ConfigurationErrorCode } from '../errors';

/**
 * Runtime feature gates the built-in programs consult, under their
 * on-chain feature addresses.
 */
export const FEATURES = {
    /** ed25519 signatures are checked with strict (RFC 8032) verification. */
    ed25519PrecompileVerifyStrict: new PublicKey(
        'ed9tNscbWLYBooxWA7FE2B5KHWs8A6sxfY8EzezEcoo',
    ),
    /** secp256k1 instructions declaring no signatures carry no more data. */
    libsecp256k1FailOnBadCount: new PublicKey(
        '8aXvSuopd1PUj7UhehfXJRg6619RHp8ZvwTyyJHdUYsj',
    ),
    libsecp256k1FailOnBadCount2: new PublicKey(
        '54KAoNiUERNoWWUhTWWwXgym94gzoXFVnHyQwPA18V9A',
    ),
} as const;

export type FeatureName = keyof typeof FEATURES;

/**
 * The u64 id a feature goes by in interchange fixtures: the first eight
 * bytes of its address, little endian.
 */
export function featureIdToU64(feature: PublicKey): bigint {
    return Buffer.from(feature.toBytes()).readBigUInt64LE(0);
}

/**
 * Set of active features, keyed by feature address, each with its
 * activation slot. Instances are immutable.
 */
export class FeatureSet {
    private constructor(private readonly active: ReadonlyMap<string, bigint>) {}

    static empty(): FeatureSet {
        return new FeatureSet(new Map());
    }

    /** Every feature in {@link FEATURES}, active since slot 0. */
    static allEnabled(): FeatureSet {
        return FeatureSet.fromActive(Object.values(FEATURES));
    }

    static fromActive(features: readonly PublicKey[]): FeatureSet {
        return new FeatureSet(
            new Map(features.map(feature => [feature.toBase58(), 0n])),
        );
    }

    isActive(feature: PublicKey): boolean {
        return this.active.has(feature.toBase58());
    }

    activationSlot(feature: PublicKey): bigint | undefined {
        return this.active.get(feature.toBase58());
    }

    activate(feature: PublicKey, slot: bigint = 0n): FeatureSet {
        if (slot < 0n) {
            throw new ConfigurationError(
                ConfigurationErrorCode.INVALID_FEATURE,
                'FeatureSet.activate',
                `Activation slot of ${feature.toBase58()} must not be negative`,
            );
        }
        const active = new Map(this.active);
        active.set(feature.toBase58(), slot);
        return new FeatureSet(active);
    }

    deactivate(feature: PublicKey): FeatureSet {
        const active = new Map(this.active);
        active.delete(feature.toBase58());
        return new FeatureSet(active);
    }

    /** Whether every feature in {@link FEATURES} is active. */
    allCataloguedActive(): boolean {
        return Object.values(FEATURES).every(feature => this.isActive(feature));
    }

    activeFeatures(): PublicKey[] {
        return [...this.active.keys()].map(key => new PublicKey(key));
    }
}
