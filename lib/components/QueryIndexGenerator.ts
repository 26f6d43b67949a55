// IMPORTS
// ================================================================================================
import * as crypto from 'crypto';
import type { StarkOptions } from 'rescue-semaphore';

// CLASS DEFINITION
// ================================================================================================
export class QueryIndexGenerator {

    readonly queryCount : number;

    constructor(options: StarkOptions) {
        this.queryCount = options.queryCount;
    }

    /**
     * Derives distinct query positions from all commitments made by the prover; positions are
     * returned in ascending order.
     */
    getQueryPositions(commitments: readonly Buffer[], domainSize: number): number[] {
        const seed = Buffer.concat(commitments.slice());
        const count = Math.min(this.queryCount, domainSize);
        return getPseudorandomIndexes(seed, count, domainSize);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function getPseudorandomIndexes(seed: Buffer, count: number, max: number): number[] {
    if (max < count) throw new Error(`Cannot select ${count} unique pseudorandom indexes from ${max} values`);

    const maxIterations = count * 1000;
    const modulus = BigInt(max);
    const indexes = new Set<number>();

    const state = sha256(seed);
    const counter = Buffer.alloc(4);
    for (let i = 0; i < maxIterations; i++) {
        counter.writeUInt32LE(i, 0);
        let index = Number(toBigInt(sha256(Buffer.concat([state, counter]))) % modulus);
        if (indexes.has(index)) continue;           // if the index is already in the list, skip it
        indexes.add(index);
        if (indexes.size >= count) break;           // if we have enough indexes, break the loop
    }

    // if we couldn't generate enough indexes within max iterations, throw an error
    if (indexes.size < count) throw new Error(`Could not generate ${count} pseudorandom indexes`);

    return Array.from(indexes).sort((a, b) => a - b);
}

function sha256(value: Buffer): Buffer {
    return crypto.createHash('sha256').update(value).digest();
}

function toBigInt(buffer: Buffer): bigint {
    return BigInt('0x' + buffer.toString('hex'));
}
