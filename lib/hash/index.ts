// IMPORTS
// ================================================================================================
import type { Digest } from 'rescue-semaphore';
import { Rescue } from './Rescue';
import {
    MODULUS, STATE_WIDTH, CAPACITY, DIGEST_SIZE, ROUNDS, ALPHA, ROUND_CONSTANT_SEED,
    PUBLIC_KEY_DOMAIN, MERKLE_DOMAIN, NULLIFIER_DOMAIN, TOPIC_DOMAIN_TAG
} from '../config';
import { WitnessError } from '../errors';

// RE-EXPORTS
// ================================================================================================
export { Rescue, mulMatrixVector } from './Rescue';
export type { RescueParams } from './Rescue';
export { MerkleTree } from './MerkleTree';

// MODULE VARIABLES
// ================================================================================================
const BYTES_PER_ELEMENT = 7;

export const rescue = new Rescue({
    modulus     : MODULUS,
    stateWidth  : STATE_WIDTH,
    capacity    : CAPACITY,
    digestSize  : DIGEST_SIZE,
    rounds      : ROUNDS,
    alpha       : ALPHA,
    seed        : ROUND_CONSTANT_SEED
});

export const field = rescue.field;

// PUBLIC FUNCTIONS
// ================================================================================================
export function hashPublicKey(privKey: readonly bigint[]): Digest {
    return rescue.hash(PUBLIC_KEY_DOMAIN, privKey);
}

export function merge(left: readonly bigint[], right: readonly bigint[]): Digest {
    return rescue.hash(MERKLE_DOMAIN, [...left, ...right]);
}

export function hashNullifier(privKey: readonly bigint[], topicHash: readonly bigint[]): Digest {
    return rescue.hash(NULLIFIER_DOMAIN, [...privKey, ...topicHash]);
}

/** Absorbs the UTF-8 bytes of the topic followed by their count */
export function hashTopic(topic: string): Digest {
    if (!isWellFormedTopic(topic)) {
        throw new WitnessError('InvalidTopic', 'Signal topic must be well-formed Unicode text');
    }
    const bytes = Buffer.from(topic, 'utf8');
    const elements = bytesToElements(bytes);
    elements.push(BigInt(bytes.length));
    return rescue.sponge(elements, TOPIC_DOMAIN_TAG);
}

/** Lone surrogates are replaced during UTF-8 encoding, so such topics do not survive a round trip */
export function isWellFormedTopic(topic: string): boolean {
    return Buffer.from(topic, 'utf8').toString('utf8') === topic;
}

/** Packs bytes into field elements, 7 bytes per element in little-endian order */
export function bytesToElements(bytes: Buffer): bigint[] {
    const result: bigint[] = [];
    for (let offset = 0; offset < bytes.length; offset += BYTES_PER_ELEMENT) {
        let chunk = bytes.subarray(offset, offset + BYTES_PER_ELEMENT);
        let value = 0n;
        for (let i = chunk.length - 1; i >= 0; i--) {
            value = (value << 8n) | BigInt(chunk[i]);
        }
        result.push(value);
    }
    return result;
}
