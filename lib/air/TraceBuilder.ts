// IMPORTS
// ================================================================================================
import type { Digest, MerklePath, PublicInputs, Witness } from 'rescue-semaphore';
import { Rescue, rescue as defaultRescue, hashTopic, isWellFormedTopic } from '../hash';
import { PUBLIC_KEY_DOMAIN, MERKLE_DOMAIN, NULLIFIER_DOMAIN, MODULUS, DIGEST_SIZE } from '../config';
import { WitnessError } from '../errors';
import {
    CYCLE_LENGTH, TRACE_WIDTH, MERKLE_LANE, NULLIFIER_LANE, MERKLE_LEFT, NULLIFIER_KEY, INDEX_BIT,
    getTraceLength, getRootStep
} from './layout';

// INTERFACES
// ================================================================================================
export type TracePadding = 'zero' | 'random';

export interface TraceOptions {
    /** How idle cycles of the nullifier lane are seeded; defaults to 'zero' */
    readonly padding?   : TracePadding;

    /** Permutation to unroll; defaults to the library's Rescue instance */
    readonly hash?      : Rescue;
}

export interface SemaphoreTrace {

    /** Trace values, one array per column */
    readonly columns    : bigint[][];
    readonly length     : number;
    readonly inputs     : PublicInputs;
}

// PUBLIC FUNCTIONS
// ================================================================================================
/**
 * Lays out the execution trace for a signal: the Merkle lane derives the member's public key and
 * climbs the tree to the root, while the nullifier lane hashes the private key together with the
 * topic hash.
 */
export function buildTrace(witness: Witness, depth: number, options: TraceOptions = {}): SemaphoreTrace {
    const hash = options.hash || defaultRescue;
    const padding = options.padding || 'zero';
    validateWitness(witness, depth);

    const length = getTraceLength(depth);
    const cycles = length / CYCLE_LENGTH;
    const columns = new Array<bigint[]>(TRACE_WIDTH);
    for (let i = 0; i < TRACE_WIDTH; i++) {
        columns[i] = new Array<bigint>(length).fill(0n);
    }

    const privKey = witness.privKey.elements;
    const topicHash = hashTopic(witness.topic);
    const zeroDigest = new Array<bigint>(DIGEST_SIZE).fill(0n);

    // Merkle lane: public key derivation followed by one merge per level
    let state = hash.initState(PUBLIC_KEY_DOMAIN, privKey);
    for (let cycle = 0; cycle < cycles; cycle++) {
        let bit = 0;
        if (cycle > 0) {
            let level = cycle - 1;
            let accumulated = hash.digest(state);
            let sibling: readonly bigint[] = zeroDigest;
            if (level < depth) {
                bit = witness.path[level].bit;
                sibling = witness.path[level].sibling;
            }
            let input = (bit === 0) ? [...accumulated, ...sibling] : [...sibling, ...accumulated];
            state = hash.initState(MERKLE_DOMAIN, input);
        }

        for (let step = cycle * CYCLE_LENGTH; step < (cycle + 1) * CYCLE_LENGTH; step++) {
            columns[INDEX_BIT][step] = BigInt(bit);
        }
        state = writeCycle(columns, MERKLE_LANE, cycle, state, hash);
    }

    // nullifier lane: a single hash in the first cycle, idle permutations afterwards
    let nState = hash.initState(NULLIFIER_DOMAIN, [...privKey, ...topicHash]);
    const nullifier = hash.digest(writeCycle(columns, NULLIFIER_LANE, 0, nState, hash));
    for (let cycle = 1; cycle < cycles; cycle++) {
        nState = new Array<bigint>(hash.stateWidth);
        for (let i = 0; i < nState.length; i++) {
            nState[i] = (padding === 'random') ? hash.field.rand() : 0n;
        }
        writeCycle(columns, NULLIFIER_LANE, cycle, nState, hash);
    }

    const rootStep = getRootStep(depth);
    const root = readDigest(columns, MERKLE_LEFT, rootStep);

    return { columns, length, inputs: { root, topicHash, nullifier } };
}

/**
 * Writes one permutation into the columns of a lane, starting from the provided state at the
 * first row of the cycle; returns the state at the last row of the cycle.
 */
export function writeCycle(columns: bigint[][], lane: number, cycle: number, initial: readonly bigint[], hash: Rescue = defaultRescue): bigint[] {
    const state = initial.slice();
    const start = cycle * CYCLE_LENGTH;
    writeState(columns, lane, start, state);
    for (let round = 0; round < hash.rounds; round++) {
        hash.applyRound(state, round);
        writeState(columns, lane, start + round + 1, state);
    }
    return state;
}

export function readDigest(columns: readonly (readonly bigint[])[], column: number, step: number): Digest {
    const result = new Array<bigint>(DIGEST_SIZE);
    for (let i = 0; i < DIGEST_SIZE; i++) {
        result[i] = columns[column + i][step];
    }
    return result;
}

/** Returns the private key held by the nullifier lane at the first row */
export function readNullifierKey(columns: readonly (readonly bigint[])[]): Digest {
    return readDigest(columns, NULLIFIER_KEY, 0);
}

// HELPER FUNCTIONS
// ================================================================================================
function writeState(columns: bigint[][], lane: number, step: number, state: readonly bigint[]) {
    for (let i = 0; i < state.length; i++) {
        columns[lane + i][step] = state[i];
    }
}

function validateWitness(witness: Witness, depth: number) {
    if (!Number.isInteger(depth) || depth < 1) {
        throw new TypeError('Tree depth must be a positive integer');
    }

    if (typeof witness.topic !== 'string') {
        throw new WitnessError('InvalidTopic', 'Signal topic must be a string');
    }
    if (!isWellFormedTopic(witness.topic)) {
        throw new WitnessError('InvalidTopic', 'Signal topic must be well-formed Unicode text');
    }

    const path: MerklePath = witness.path;
    if (!Array.isArray(path) || path.length !== depth) {
        throw new WitnessError('WitnessLengthMismatch', `Merkle path must contain exactly ${depth} nodes`);
    }

    const leafIndex = witness.leafIndex;
    if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= 2**depth) {
        throw new WitnessError('IndexOutOfRange', `Leaf index ${leafIndex} is outside of a tree of depth ${depth}`);
    }

    for (let level = 0; level < depth; level++) {
        let { sibling, bit } = path[level];
        if (bit !== ((leafIndex >> level) & 1)) {
            throw new WitnessError('PathMismatch', `Direction bit at level ${level} does not match leaf index ${leafIndex}`);
        }
        if (!Array.isArray(sibling) || sibling.length !== DIGEST_SIZE) {
            throw new WitnessError('PathMismatch', `Sibling at level ${level} must consist of ${DIGEST_SIZE} elements`);
        }
        for (let element of sibling) {
            if (typeof element !== 'bigint' || element < 0n || element >= MODULUS) {
                throw new WitnessError('PathMismatch', `Sibling at level ${level} contains an invalid field element`);
            }
        }
    }
}
