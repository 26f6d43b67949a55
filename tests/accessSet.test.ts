import { describe, it, expect } from 'vitest';
import { createAccessSet, PrivKey, PubKey, WitnessError } from '../index';
import { MerkleTree, merge, hashPublicKey } from '../lib/hash';
import { PADDING_LEAF } from '../lib/config';

// HELPERS
// ================================================================================================
function makeKeys(count: number): PrivKey[] {
    const result: PrivKey[] = [];
    for (let i = 0; i < count; i++) {
        let value = BigInt(i + 1);
        result.push(new PrivKey([value, value * 2n, value * 3n, value * 4n]));
    }
    return result;
}

function getWitnessCode(fn: () => unknown): string | undefined {
    try {
        fn();
    }
    catch (error) {
        if (error instanceof WitnessError) return error.code;
        throw error;
    }
    return undefined;
}

// TESTS
// ================================================================================================
describe('MerkleTree', () => {
    const leaves = [[1n, 0n, 0n, 0n], [2n, 0n, 0n, 0n], [3n, 0n, 0n, 0n]];
    const tree = new MerkleTree(leaves, 2, merge, PADDING_LEAF.slice());

    it('should pad missing leaves with the padding leaf', () => {
        const expected = merge(merge(leaves[0], leaves[1]), merge(leaves[2], PADDING_LEAF));
        expect(tree.root).toEqual(expected);
        expect(tree.getLeaf(3)).toEqual([0n, 0n, 0n, 0n]);
    });

    it('should produce paths from the leaf up to the root', () => {
        const path = tree.prove(2);
        expect(path).toEqual([
            { sibling: [0n, 0n, 0n, 0n], bit: 0 },
            { sibling: merge(leaves[0], leaves[1]), bit: 1 }
        ]);
        expect(MerkleTree.verify(tree.root, leaves[2], path, merge)).toBe(true);
        expect(MerkleTree.verify(tree.root, leaves[1], path, merge)).toBe(false);
    });

    it('should reject more leaves than the tree can hold', () => {
        expect(() => new MerkleTree([...leaves, ...leaves], 2, merge, PADDING_LEAF.slice()))
            .toThrow('A tree of depth 2 cannot hold 6 leaves');
    });
});

describe('Keys', () => {
    it('should parse private keys from hex', () => {
        const hex = '01' + '00'.repeat(15) + '02' + '00'.repeat(15);
        const key = PrivKey.parse(hex);
        expect(key.elements).toEqual([1n, 0n, 2n, 0n]);
        expect(key.toString()).toBe(hex);
    });

    it('should derive public keys with the public key hash', () => {
        const key = new PrivKey([5n, 6n, 7n, 8n]);
        expect(key.getPublicKey().elements).toEqual(hashPublicKey([5n, 6n, 7n, 8n]));
    });

    it('should round-trip public keys through hex', () => {
        const pubKey = new PrivKey([5n, 6n, 7n, 8n]).getPublicKey();
        expect(PubKey.parse(pubKey.toString()).equals(pubKey)).toBe(true);
    });

    it('should reject malformed keys', () => {
        expect(getWitnessCode(() => PrivKey.parse('not-a-key'))).toBe('InvalidKey');
        expect(getWitnessCode(() => PubKey.parse('ff'.repeat(8) + '00'.repeat(24)))).toBe('InvalidKey');
        expect(getWitnessCode(() => new PrivKey([1n, 2n, 3n]))).toBe('InvalidKey');
        expect(getWitnessCode(() => new PrivKey([1n, 2n, 3n, -4n]))).toBe('InvalidKey');
    });

    it('should generate distinct keys', () => {
        expect(PrivKey.generate().toString()).not.toBe(PrivKey.generate().toString());
    });
});

describe('AccessSet', () => {
    const privKeys = makeKeys(3);
    const pubKeys = privKeys.map(key => key.getPublicKey());

    it('should pick the smallest depth which fits all keys', () => {
        expect(createAccessSet(pubKeys, {}, null).depth).toBe(2);
        expect(createAccessSet(pubKeys.slice(0, 1), {}, null).depth).toBe(1);
        expect(createAccessSet(pubKeys.slice(0, 2), {}, null).depth).toBe(1);
    });

    it('should build the root from public keys', () => {
        const set = createAccessSet(pubKeys, {}, null);
        const leaves = pubKeys.map(key => key.elements.slice());
        const expected = merge(merge(leaves[0], leaves[1]), merge(leaves[2], PADDING_LEAF));
        expect(set.root).toEqual(expected);
        expect(set.size).toBe(3);
    });

    it('should use a fixed depth when one is provided', () => {
        const set = createAccessSet(pubKeys, { depth: 4 }, null);
        expect(set.depth).toBe(4);
        expect(set.pathFor(0)).toHaveLength(4);
    });

    it('should return paths which lead to the root', () => {
        const set = createAccessSet(pubKeys, {}, null);
        const path = set.pathFor(1);
        expect(path.map(node => node.bit)).toEqual([1, 0]);
        expect(MerkleTree.verify(set.root, pubKeys[1].elements, path, merge)).toBe(true);
    });

    it('should look up members by public key', () => {
        const set = createAccessSet(pubKeys, {}, null);
        expect(set.indexOf(pubKeys[2])).toBe(2);
        expect(set.indexOf(new PrivKey([9n, 9n, 9n, 9n]).getPublicKey())).toBe(-1);
    });

    it('should reject paths for indexes outside of the member list', () => {
        const set = createAccessSet(pubKeys, {}, null);
        expect(getWitnessCode(() => set.pathFor(3))).toBe('InvalidIndex');
        expect(getWitnessCode(() => set.pathFor(-1))).toBe('InvalidIndex');
    });

    it('should refuse to sign for keys outside of the set', () => {
        const set = createAccessSet(pubKeys, {}, null);
        expect(getWitnessCode(() => set.makeSignal(new PrivKey([9n, 9n, 9n, 9n]), 'topic'))).toBe('NotAMember');
    });

    it('should validate its options', () => {
        expect(() => createAccessSet([], {}, null)).toThrow('Access set must contain at least one public key');
        expect(() => createAccessSet(pubKeys, { depth: 1 }, null)).toThrow('A tree of depth 1 cannot hold 3 public keys');
        expect(() => createAccessSet(pubKeys, { depth: 21 }, null)).toThrow('Tree depth must be an integer between 1 and 20');
    });
});
