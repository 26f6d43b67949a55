// IMPORTS
// ================================================================================================
import type { Digest, MerklePath } from 'rescue-semaphore';
import { digestsEqual } from '../utils';

// INTERFACES
// ================================================================================================
export interface MergeFunction {
    (left: readonly bigint[], right: readonly bigint[]): Digest;
}

// CLASS DEFINITION
// ================================================================================================
export class MerkleTree {

    readonly depth  : number;
    readonly nodes  : Digest[];

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    /**
     * Builds a tree of the specified depth; leaf slots beyond the provided leaves are filled with
     * the padding leaf.
     */
    constructor(leaves: readonly Digest[], depth: number, merge: MergeFunction, padding: Digest) {
        if (!Number.isInteger(depth) || depth < 1) {
            throw new TypeError('Tree depth must be a positive integer');
        }

        const leafCount = 2**depth;
        if (leaves.length > leafCount) {
            throw new TypeError(`A tree of depth ${depth} cannot hold ${leaves.length} leaves`);
        }

        this.depth = depth;
        this.nodes = new Array<Digest>(2 * leafCount);
        for (let i = 0; i < leafCount; i++) {
            this.nodes[leafCount + i] = (i < leaves.length ? leaves[i] : padding).slice();
        }
        for (let i = leafCount - 1; i > 0; i--) {
            this.nodes[i] = merge(this.nodes[i * 2], this.nodes[i * 2 + 1]);
        }
        this.nodes[0] = [];
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    get root(): Digest {
        return this.nodes[1].slice();
    }

    get capacity(): number {
        return 2**this.depth;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    getLeaf(index: number): Digest {
        return this.nodes[this.capacity + index].slice();
    }

    prove(index: number): MerklePath {
        let position = index + this.capacity;
        const path: MerklePath = [];
        while (position > 1) {
            path.push({ sibling: this.nodes[position ^ 1].slice(), bit: position & 1 });
            position = position >> 1;
        }
        return path;
    }

    static verify(root: readonly bigint[], leaf: readonly bigint[], path: MerklePath, merge: MergeFunction): boolean {
        let v: Digest = leaf.slice();
        for (let { sibling, bit } of path) {
            v = (bit === 0) ? merge(v, sibling) : merge(sibling, v);
        }
        return digestsEqual(root, v);
    }
}
