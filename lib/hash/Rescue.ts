// IMPORTS
// ================================================================================================
import { FiniteField, createPrimeField } from '@guildofweavers/galois';
import type { HashDomain } from 'rescue-semaphore';

// INTERFACES
// ================================================================================================
export interface RescueParams {
    readonly modulus    : bigint;
    readonly stateWidth : number;
    readonly capacity   : number;
    readonly digestSize : number;
    readonly rounds     : number;
    readonly alpha      : bigint;

    /** Seed from which round constants are derived */
    readonly seed       : string;
}

// CLASS DEFINITION
// ================================================================================================
/**
 * Rescue-Prime permutation. Every round applies the alpha S-box, MDS mixing, and the first set of
 * round constants, followed by the inverse S-box, MDS mixing, and the second set of constants.
 */
export class Rescue {

    readonly field      : FiniteField;
    readonly modulus    : bigint;
    readonly alpha      : bigint;
    readonly invAlpha   : bigint;
    readonly stateWidth : number;
    readonly capacity   : number;
    readonly digestSize : number;
    readonly rounds     : number;

    readonly mds        : bigint[][];
    readonly invMds     : bigint[][];
    readonly ark1       : bigint[][];
    readonly ark2       : bigint[][];

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(params: RescueParams) {
        if (params.capacity < 1 || params.capacity >= params.stateWidth) {
            throw new TypeError(`Capacity must be between 1 and ${params.stateWidth - 1}`);
        }
        if (params.digestSize < 1 || params.digestSize > params.stateWidth - params.capacity) {
            throw new TypeError(`Digest size cannot exceed the rate of the permutation`);
        }
        if (BigInt(2 * params.stateWidth) >= params.modulus) {
            throw new TypeError(`State width is too large for the field`);
        }

        this.field = createPrimeField(params.modulus);
        this.modulus = params.modulus;
        this.alpha = params.alpha;
        this.invAlpha = modInverse(params.alpha, params.modulus - 1n);
        this.stateWidth = params.stateWidth;
        this.capacity = params.capacity;
        this.digestSize = params.digestSize;
        this.rounds = params.rounds;

        this.mds = buildCauchyMatrix(this.field, this.stateWidth);
        this.invMds = invertMatrix(this.field, this.mds);

        const constants = this.field.prng(Buffer.from(params.seed), 2 * this.rounds * this.stateWidth).toValues();
        this.ark1 = new Array<bigint[]>(this.rounds);
        this.ark2 = new Array<bigint[]>(this.rounds);
        for (let r = 0, offset = 0; r < this.rounds; r++) {
            this.ark1[r] = constants.slice(offset, offset + this.stateWidth); offset += this.stateWidth;
            this.ark2[r] = constants.slice(offset, offset + this.stateWidth); offset += this.stateWidth;
        }
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get rate(): number {
        return this.stateWidth - this.capacity;
    }

    // PERMUTATION
    // --------------------------------------------------------------------------------------------
    permute(state: readonly bigint[]): bigint[] {
        this.validateState(state);
        const result = state.slice();
        for (let r = 0; r < this.rounds; r++) {
            this.applyRound(result, r);
        }
        return result;
    }

    invPermute(state: readonly bigint[]): bigint[] {
        this.validateState(state);
        const result = state.slice();
        for (let r = this.rounds - 1; r >= 0; r--) {
            this.applyInvRound(result, r);
        }
        return result;
    }

    applyRound(state: bigint[], round: number): void {
        this.applySbox(state, this.alpha);
        this.applyMds(state, this.mds);
        this.addConstants(state, this.ark1[round]);

        this.applySbox(state, this.invAlpha);
        this.applyMds(state, this.mds);
        this.addConstants(state, this.ark2[round]);
    }

    applyInvRound(state: bigint[], round: number): void {
        this.subConstants(state, this.ark2[round]);
        this.applyMds(state, this.invMds);
        this.applySbox(state, this.alpha);

        this.subConstants(state, this.ark1[round]);
        this.applyMds(state, this.invMds);
        this.applySbox(state, this.invAlpha);
    }

    // HASHING
    // --------------------------------------------------------------------------------------------
    /** Builds the initial state for a single permutation: domain capacity followed by the input */
    initState(domain: HashDomain, input: readonly bigint[]): bigint[] {
        if (domain.capacity.length !== this.capacity) {
            throw new TypeError(`Domain ${domain.name} must specify ${this.capacity} capacity elements`);
        }
        if (input.length > this.rate) {
            throw new TypeError(`Input cannot have more than ${this.rate} elements`);
        }

        const state = new Array<bigint>(this.stateWidth).fill(this.field.zero);
        for (let i = 0; i < this.capacity; i++) {
            state[i] = domain.capacity[i];
        }
        for (let i = 0; i < input.length; i++) {
            state[this.capacity + i] = input[i];
        }
        return state;
    }

    /** Hashes at most one rate worth of elements under the specified domain */
    hash(domain: HashDomain, input: readonly bigint[]): bigint[] {
        const state = this.permute(this.initState(domain, input));
        return this.digest(state);
    }

    /** Absorbs any number of elements; the element count goes into the first capacity element */
    sponge(elements: readonly bigint[], domainTag: bigint): bigint[] {
        const state = new Array<bigint>(this.stateWidth).fill(this.field.zero);
        state[0] = BigInt(elements.length) % this.modulus;
        state[this.capacity - 1] = this.field.add(state[this.capacity - 1], domainTag);

        let i = 0;
        for (let element of elements) {
            let position = this.capacity + i;
            state[position] = this.field.add(state[position], element);
            i++;
            if (i === this.rate) {
                this.permuteInPlace(state);
                i = 0;
            }
        }

        if (i > 0 || elements.length === 0) {
            this.permuteInPlace(state);
        }

        return this.digest(state);
    }

    digest(state: readonly bigint[]): bigint[] {
        return state.slice(this.capacity, this.capacity + this.digestSize);
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private permuteInPlace(state: bigint[]) {
        for (let r = 0; r < this.rounds; r++) {
            this.applyRound(state, r);
        }
    }

    private applySbox(state: bigint[], power: bigint) {
        for (let i = 0; i < state.length; i++) {
            state[i] = this.field.exp(state[i], power);
        }
    }

    private applyMds(state: bigint[], matrix: bigint[][]) {
        const result = mulMatrixVector(this.field, matrix, state);
        for (let i = 0; i < state.length; i++) {
            state[i] = result[i];
        }
    }

    private addConstants(state: bigint[], constants: bigint[]) {
        for (let i = 0; i < state.length; i++) {
            state[i] = this.field.add(state[i], constants[i]);
        }
    }

    private subConstants(state: bigint[], constants: bigint[]) {
        for (let i = 0; i < state.length; i++) {
            state[i] = this.field.sub(state[i], constants[i]);
        }
    }

    private validateState(state: readonly bigint[]) {
        if (state.length !== this.stateWidth) {
            throw new TypeError(`Permutation state must contain exactly ${this.stateWidth} elements`);
        }
    }
}

// HELPER FUNCTIONS
// ================================================================================================
export function mulMatrixVector(field: FiniteField, matrix: readonly (readonly bigint[])[], vector: readonly bigint[]): bigint[] {
    const result = new Array<bigint>(matrix.length);
    for (let i = 0; i < matrix.length; i++) {
        let s = field.zero;
        for (let j = 0; j < vector.length; j++) {
            s = field.add(s, field.mul(matrix[i][j], vector[j]));
        }
        result[i] = s;
    }
    return result;
}

/** M[i][j] = 1 / (i + j + 1); every square sub-matrix of a Cauchy matrix is non-singular */
function buildCauchyMatrix(field: FiniteField, size: number): bigint[][] {
    const result = new Array<bigint[]>(size);
    for (let i = 0; i < size; i++) {
        result[i] = new Array<bigint>(size);
        for (let j = 0; j < size; j++) {
            result[i][j] = field.inv(BigInt(i + j + 1));
        }
    }
    return result;
}

function invertMatrix(field: FiniteField, matrix: bigint[][]): bigint[][] {
    const size = matrix.length;

    // augment the matrix with identity
    const m = matrix.map((row, i) => {
        const identity = new Array<bigint>(size).fill(field.zero);
        identity[i] = field.one;
        return [...row, ...identity];
    });

    for (let col = 0; col < size; col++) {
        let pivot = col;
        while (pivot < size && m[pivot][col] === field.zero) pivot++;
        if (pivot === size) throw new Error('Matrix is not invertible');
        [m[col], m[pivot]] = [m[pivot], m[col]];

        const inv = field.inv(m[col][col]);
        for (let j = 0; j < 2 * size; j++) {
            m[col][j] = field.mul(m[col][j], inv);
        }

        for (let row = 0; row < size; row++) {
            if (row === col || m[row][col] === field.zero) continue;
            let factor = m[row][col];
            for (let j = 0; j < 2 * size; j++) {
                m[row][j] = field.sub(m[row][j], field.mul(factor, m[col][j]));
            }
        }
    }

    return m.map(row => row.slice(size));
}

function modInverse(value: bigint, modulus: bigint): bigint {
    let [a, b] = [value % modulus, modulus];
    let [x0, x1] = [1n, 0n];
    while (b !== 0n) {
        const q = a / b;
        [a, b] = [b, a - q * b];
        [x0, x1] = [x1, x0 - q * x1];
    }
    if (a !== 1n) {
        throw new TypeError(`S-box power ${value} is not invertible in this field`);
    }
    return ((x0 % modulus) + modulus) % modulus;
}
