// IMPORTS
// ================================================================================================
import type { StarkOptions, HashDomain } from 'rescue-semaphore';
import type { HashAlgorithm } from '@guildofweavers/merkle';
import { isPowerOf2 } from './utils';

// FIELD PARAMETERS
// ================================================================================================
export const MODULUS = 2n**64n - 2n**32n + 1n;
export const GENERATOR = 7n;

// RESCUE PARAMETERS
// ================================================================================================
export const STATE_WIDTH = 12;
export const CAPACITY = 4;
export const DIGEST_SIZE = 4;
export const ROUNDS = 7;
export const ALPHA = 7n;

/** Seed for deriving round constants */
export const ROUND_CONSTANT_SEED = 'rescue-semaphore:round-constants';

// HASH DOMAINS
// ================================================================================================
export const PUBLIC_KEY_DOMAIN: HashDomain = {
    name    : 'public-key',
    capacity: [4n, 0n, 0n, 0n]
};

export const MERKLE_DOMAIN: HashDomain = {
    name    : 'merkle',
    capacity: [8n, 0n, 0n, 0n]
};

export const NULLIFIER_DOMAIN: HashDomain = {
    name    : 'nullifier',
    capacity: [8n, 0n, 0n, 1n]
};

export const TOPIC_DOMAIN_TAG = 2n;

// ACCESS SET
// ================================================================================================
export const MAX_TREE_DEPTH = 20;

/** Leaf for unused slots of the key tree; no private key is known to hash to it */
export const PADDING_LEAF: readonly bigint[] = [0n, 0n, 0n, 0n];

// STARK OPTIONS
// ================================================================================================
export const DEFAULT_QUERY_COUNT = 40;
export const MAX_QUERY_COUNT = 128;
export const MAX_EXTENSION_FACTOR = 32;

const HASH_ALGORITHMS: HashAlgorithm[] = ['sha256', 'blake2s256'];
const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha256';

/** Digest size of every supported hash algorithm, in bytes */
export const HASH_DIGEST_SIZE = 32;

// PUBLIC FUNCTIONS
// ================================================================================================
export function buildStarkOptions(options: Partial<StarkOptions> | undefined, maxConstraintDegree: number): StarkOptions {

    const compositionFactor = 2**Math.ceil(Math.log2(maxConstraintDegree));
    const minExtensionFactor = 2 * compositionFactor;

    // extension factor
    const extensionFactor = (options ? options.extensionFactor : undefined) || minExtensionFactor;
    if (extensionFactor < 2 || extensionFactor > MAX_EXTENSION_FACTOR || !Number.isInteger(extensionFactor)) {
        throw new TypeError(`Extension factor must be an integer between 2 and ${MAX_EXTENSION_FACTOR}`);
    }

    if (!isPowerOf2(extensionFactor)) {
        throw new TypeError(`Extension factor must be a power of 2`);
    }

    if (extensionFactor < minExtensionFactor) {
        throw new TypeError(`Extension factor must be at least ${minExtensionFactor} for constraints of degree ${maxConstraintDegree}`);
    }

    // spot checks
    const queryCount = (options ? options.queryCount : undefined) || DEFAULT_QUERY_COUNT;
    if (queryCount < 1 || queryCount > MAX_QUERY_COUNT || !Number.isInteger(queryCount)) {
        throw new TypeError(`Query count must be an integer between 1 and ${MAX_QUERY_COUNT}`);
    }

    // hash function
    const hashAlgorithm = (options ? options.hashAlgorithm : undefined) || DEFAULT_HASH_ALGORITHM;
    if (!HASH_ALGORITHMS.includes(hashAlgorithm)) {
        throw new TypeError(`Hash algorithm ${hashAlgorithm} is not supported`);
    }

    return { extensionFactor, queryCount, hashAlgorithm };
}
