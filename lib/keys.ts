// IMPORTS
// ================================================================================================
import * as crypto from 'crypto';
import type { PrivKey as IPrivKey, PubKey as IPubKey } from 'rescue-semaphore';
import { MODULUS, DIGEST_SIZE } from './config';
import { hashPublicKey } from './hash';
import { readBigInt, digestToHex, digestsEqual } from './utils';
import { WitnessError } from './errors';

// MODULE VARIABLES
// ================================================================================================
const KEY_BYTES = DIGEST_SIZE * 8;

// PRIVATE KEY
// ================================================================================================
export class PrivKey implements IPrivKey {

    readonly elements: readonly bigint[];

    constructor(elements: bigint[]) {
        this.elements = validateElements(elements, 'Private key');
    }

    static generate(): PrivKey {
        return new PrivKey(reduce(bytesToLimbs(crypto.randomBytes(KEY_BYTES))));
    }

    static parse(hex: string): PrivKey {
        return new PrivKey(reduce(bytesToLimbs(parseHex(hex, 'Private key'))));
    }

    getPublicKey(): PubKey {
        return new PubKey(hashPublicKey(this.elements));
    }

    toString(): string {
        return digestToHex(this.elements);
    }
}

// PUBLIC KEY
// ================================================================================================
export class PubKey implements IPubKey {

    readonly elements: readonly bigint[];

    constructor(elements: bigint[]) {
        this.elements = validateElements(elements, 'Public key');
    }

    static parse(hex: string): PubKey {
        const elements = bytesToLimbs(parseHex(hex, 'Public key'));
        for (let element of elements) {
            if (element >= MODULUS) {
                throw new WitnessError('InvalidKey', `Public key element ${element} is not a valid field element`);
            }
        }
        return new PubKey(elements);
    }

    equals(other: PubKey): boolean {
        return digestsEqual(this.elements, other.elements);
    }

    toString(): string {
        return digestToHex(this.elements);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function parseHex(hex: string, name: string): Buffer {
    if (typeof hex !== 'string' || !/^[0-9a-fA-F]*$/.test(hex) || hex.length !== KEY_BYTES * 2) {
        throw new WitnessError('InvalidKey', `${name} must be a ${KEY_BYTES}-byte hex string`);
    }
    return Buffer.from(hex, 'hex');
}

/** Splits bytes into 8-byte little-endian limbs */
function bytesToLimbs(bytes: Buffer): bigint[] {
    const result = new Array<bigint>(DIGEST_SIZE);
    for (let i = 0; i < DIGEST_SIZE; i++) {
        result[i] = readBigInt(bytes, i * 8, 8);
    }
    return result;
}

function reduce(limbs: bigint[]): bigint[] {
    return limbs.map(limb => limb % MODULUS);
}

function validateElements(elements: bigint[], name: string): readonly bigint[] {
    if (!Array.isArray(elements) || elements.length !== DIGEST_SIZE) {
        throw new WitnessError('InvalidKey', `${name} must consist of ${DIGEST_SIZE} field elements`);
    }
    for (let element of elements) {
        if (typeof element !== 'bigint' || element < 0n || element >= MODULUS) {
            throw new WitnessError('InvalidKey', `${name} element ${String(element)} is not a valid field element`);
        }
    }
    return Object.freeze(elements.slice());
}
