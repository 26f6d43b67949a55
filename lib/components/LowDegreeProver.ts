// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { LowDegreeProof, FriComponent, LogFunction } from 'rescue-semaphore';
import { MerkleTree, Hash, BatchMerkleProof } from '@guildofweavers/merkle';
import { EvaluationDomain } from './EvaluationDomain';
import { writeValues, readValues } from '../utils';
import { StarkError } from '../errors';

// MODULE VARIABLES
// ================================================================================================
const MAX_REMAINDER_LENGTH = 256;
const FOLDING_FACTOR = 4;

// INTERFACES
// ================================================================================================
/** Columns and Merkle trees built by the prover before query positions are known */
export interface FriCommitment {
    readonly columns    : readonly (readonly bigint[])[];
    readonly trees      : readonly MerkleTree[];
    readonly remainder  : readonly bigint[];
}

// CLASS DEFINITION
// ================================================================================================
/**
 * FRI with quartic folding. Every column is committed as rows of 4 values which share the same
 * 4th power of x; a row is folded into a single value of the next column by interpolating its
 * values and evaluating the result at a pseudo-random point derived from the column's root.
 */
export class LowDegreeProver {

    private readonly field          : FiniteField;
    private readonly domain         : EvaluationDomain;
    private readonly rowSize        : number;
    private readonly hash           : Hash;
    private readonly log            : LogFunction;

    /** Powers of the inverse of the 4th root of unity */
    private readonly quarticRoots   : bigint[];
    private readonly inv4           : bigint;

    // CONSTRUCTORS
    // --------------------------------------------------------------------------------------------
    constructor(domain: EvaluationDomain, hash: Hash, logger: LogFunction) {
        this.field = domain.field;
        this.domain = domain;
        this.rowSize = this.field.elementSize * FOLDING_FACTOR;
        this.hash = hash;
        this.log = logger;

        const root = this.field.exp(domain.rootOfUnity, BigInt(domain.size / FOLDING_FACTOR));
        const invRoot = this.field.inv(root);
        this.quarticRoots = [this.field.one];
        for (let i = 1; i < FOLDING_FACTOR; i++) {
            this.quarticRoots.push(this.field.mul(this.quarticRoots[i - 1], invRoot));
        }
        this.inv4 = this.field.inv(BigInt(FOLDING_FACTOR));
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    /** Number of folds applied before the remainder is small enough to be sent in full */
    get layerCount(): number {
        let count = 0, length = this.domain.size;
        do {
            length = length / FOLDING_FACTOR;
            count++;
        } while (length > MAX_REMAINDER_LENGTH);
        return count;
    }

    // PROVER METHODS
    // --------------------------------------------------------------------------------------------
    commit(lcValues: readonly bigint[]): FriCommitment {
        const columns: (readonly bigint[])[] = [];
        const trees: MerkleTree[] = [];

        let column = lcValues;
        let offset = this.domain.offset;
        let root = this.domain.rootOfUnity;
        for (let depth = 0; depth < this.layerCount; depth++) {

            // put rows of the column into a Merkle tree
            let tree = MerkleTree.create(this.hashRows(column), this.hash);
            columns.push(column);
            trees.push(tree);

            // fold the column using a pseudo-random point derived from its root
            let alpha = this.field.prng(tree.root);
            column = this.foldColumn(column, alpha, offset, root);
            offset = this.field.exp(offset, BigInt(FOLDING_FACTOR));
            root = this.field.exp(root, BigInt(FOLDING_FACTOR));
            this.log(`Computed FRI layer at depth ${depth}`);
        }

        this.log(`Computed FRI remainder of ${column.length} values`);
        return { columns, trees, remainder: column };
    }

    query(commitment: FriCommitment, positions: readonly number[]): LowDegreeProof {
        const proofs: BatchMerkleProof[] = [];

        let columnPositions = positions;
        for (let depth = 0; depth < commitment.columns.length; depth++) {
            let column = commitment.columns[depth];
            let rows = getRows(columnPositions, column.length);
            let proof = commitment.trees[depth].proveBatch(rows);
            proof.values = rows.map(r => this.rowToBuffer(column, r));
            proofs.push(proof);
            columnPositions = rows;
        }

        const components: FriComponent[] = [];
        for (let depth = 1; depth < commitment.trees.length; depth++) {
            components.push({ columnRoot: commitment.trees[depth].root, columnProof: proofs[depth] });
        }

        this.log(`Computed ${proofs[0].values.length} linear combination spot checks`);
        return {
            lcRoot      : commitment.trees[0].root,
            lcProof     : proofs[0],
            components  : components,
            remainder   : commitment.remainder.slice()
        };
    }

    // VERIFIER METHODS
    // --------------------------------------------------------------------------------------------
    /**
     * Checks that opened rows of the first column agree with the provided linear combination
     * values, that every fold is consistent with the next column, and that the remainder has
     * degree below maxDegree / 4^layerCount.
     */
    verify(proof: LowDegreeProof, lcValues: ReadonlyMap<number, bigint>, maxDegree: number): boolean {

        const layerCount = this.layerCount;
        if (proof.components.length !== layerCount - 1) {
            throw new StarkError(`Low degree proof must contain ${layerCount - 1} components`);
        }

        const roots = [proof.lcRoot, ...proof.components.map(c => c.columnRoot)];
        const proofs = [proof.lcProof, ...proof.components.map(c => c.columnProof)];

        let expected = lcValues;
        let columnLength = this.domain.size;
        let offset = this.domain.offset;
        let root = this.domain.rootOfUnity;

        for (let depth = 0; depth < layerCount; depth++) {
            let rowCount = columnLength / FOLDING_FACTOR;
            let rows = getRows(Array.from(expected.keys()), columnLength);

            // verify Merkle proof for the column
            let columnProof = proofs[depth];
            if (columnProof.values.length !== rows.length) {
                throw new StarkError(`Number of opened rows is incorrect at depth ${depth}`);
            }
            let rowValues = columnProof.values.map(buffer => this.parseRow(buffer));
            if (!MerkleTree.verifyBatch(roots[depth], rows, this.rehash(columnProof), this.hash)) {
                throw new StarkError(`Verification of column Merkle proof failed at depth ${depth}`);
            }

            // opened values must match the values expected from the previous column
            for (let [position, value] of expected) {
                let row = rowValues[rows.indexOf(position % rowCount)];
                if (row[Math.floor(position / rowCount)] !== value) {
                    throw new StarkError(depth === 0
                        ? `Verification of linear combination correctness failed`
                        : `Column values are inconsistent with folded values at depth ${depth}`);
                }
            }

            // fold each opened row to get the values expected in the next column
            let alpha = this.field.prng(roots[depth]);
            let folded = new Map<number, bigint>();
            for (let i = 0; i < rows.length; i++) {
                let x = this.field.mul(offset, this.field.exp(root, BigInt(rows[i])));
                folded.set(rows[i], this.foldRow(rowValues[i], this.field.inv(x), alpha));
            }

            expected = folded;
            columnLength = rowCount;
            offset = this.field.exp(offset, BigInt(FOLDING_FACTOR));
            root = this.field.exp(root, BigInt(FOLDING_FACTOR));
        }

        // verify the remainder
        if (proof.remainder.length !== columnLength) {
            throw new StarkError(`Remainder must contain exactly ${columnLength} values`);
        }
        for (let [position, value] of expected) {
            if (proof.remainder[position] !== value) {
                throw new StarkError(`Remainder values are inconsistent with the last column`);
            }
        }

        const remainderDegree = Math.floor(maxDegree / FOLDING_FACTOR**layerCount);
        this.verifyRemainder(proof.remainder, remainderDegree, root);

        return true;
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private foldColumn(column: readonly bigint[], alpha: bigint, offset: bigint, root: bigint): bigint[] {
        const rowCount = column.length / FOLDING_FACTOR;

        // inverses of x = offset * root^r for every row r
        const invRoot = this.field.inv(root);
        let xInverse = this.field.inv(offset);

        const result = new Array<bigint>(rowCount);
        const row = new Array<bigint>(FOLDING_FACTOR);
        for (let r = 0; r < rowCount; r++) {
            for (let j = 0; j < FOLDING_FACTOR; j++) {
                row[j] = column[r + j * rowCount];
            }
            result[r] = this.foldRow(row, xInverse, alpha);
            xInverse = this.field.mul(xInverse, invRoot);
        }
        return result;
    }

    /**
     * Row values are evaluations of P at x * i^j, where i is the 4th root of unity; the inverse DFT
     * recovers c_k * x^k for the coefficients c_k of P, and P(alpha) = sum(c_k * x^k * (alpha / x)^k).
     */
    private foldRow(values: readonly bigint[], xInverse: bigint, alpha: bigint): bigint {
        const field = this.field;
        const z = field.mul(alpha, xInverse);

        let result = field.zero, power = field.one;
        for (let k = 0; k < FOLDING_FACTOR; k++) {
            let s = field.zero;
            for (let j = 0; j < FOLDING_FACTOR; j++) {
                s = field.add(s, field.mul(values[j], this.quarticRoots[(j * k) % FOLDING_FACTOR]));
            }
            result = field.add(result, field.mul(s, power));
            power = field.mul(power, z);
        }
        return field.mul(result, this.inv4);
    }

    private verifyRemainder(remainder: readonly bigint[], maxDegree: number, root: bigint) {
        const roots = this.field.getPowerSeries(root, remainder.length);
        const poly = this.field.interpolateRoots(roots, this.field.newVectorFrom(remainder.slice()));
        for (let i = maxDegree; i < poly.length; i++) {
            if (poly.getValue(i) !== this.field.zero) {
                throw new StarkError(`Remainder is not a valid degree ${maxDegree - 1} polynomial`);
            }
        }
    }

    private hashRows(column: readonly bigint[]): Buffer[] {
        const rowCount = column.length / FOLDING_FACTOR;
        const result = new Array<Buffer>(rowCount);
        for (let r = 0; r < rowCount; r++) {
            result[r] = this.hash.digest(this.rowToBuffer(column, r));
        }
        return result;
    }

    private rowToBuffer(column: readonly bigint[], row: number): Buffer {
        const rowCount = column.length / FOLDING_FACTOR;
        const values = new Array<bigint>(FOLDING_FACTOR);
        for (let j = 0; j < FOLDING_FACTOR; j++) {
            values[j] = column[row + j * rowCount];
        }
        return writeValues(values, this.field.elementSize);
    }

    private parseRow(buffer: Buffer): bigint[] {
        if (buffer.byteLength !== this.rowSize) {
            throw new StarkError(`Column row must be exactly ${this.rowSize} bytes`);
        }
        return readValues(buffer, this.field.elementSize);
    }

    private rehash(proof: BatchMerkleProof): BatchMerkleProof {
        return rehashMerkleProofValues(proof, this.hash);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
/** Returns sorted indexes of rows which contain the specified positions of a column */
export function getRows(positions: readonly number[], columnLength: number): number[] {
    const rowCount = columnLength / FOLDING_FACTOR;
    const result = new Set<number>();
    for (let position of positions) {
        result.add(position % rowCount);
    }
    return Array.from(result).sort((a, b) => a - b);
}

/** Returns all positions of a column which share rows with the specified positions */
export function getRowPositions(positions: readonly number[], columnLength: number): number[] {
    const rowCount = columnLength / FOLDING_FACTOR;
    const result: number[] = [];
    for (let row of getRows(positions, columnLength)) {
        for (let j = 0; j < FOLDING_FACTOR; j++) {
            result.push(row + j * rowCount);
        }
    }
    return result.sort((a, b) => a - b);
}

export function rehashMerkleProofValues(proof: BatchMerkleProof, hash: Hash): BatchMerkleProof {
    return {
        values  : proof.values.map(value => hash.digest(value)),
        nodes   : proof.nodes,
        depth   : proof.depth
    };
}
