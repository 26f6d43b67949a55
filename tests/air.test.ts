import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createAccessSet, PrivKey } from '../index';
import { SemaphoreAir, ConstraintAllocator, buildTrace, writeCycle, readDigest, layout } from '../lib/air';
import { rescue, hashNullifier } from '../lib/hash';
import { MODULUS, MERKLE_DOMAIN, PUBLIC_KEY_DOMAIN } from '../lib/config';

// FIXTURES
// ================================================================================================
const member = new PrivKey([101n, 102n, 103n, 104n]);
const other = new PrivKey([201n, 202n, 203n, 204n]);
const accessSet = createAccessSet([member.getPublicKey(), other.getPublicKey()], {}, null);
const air = new SemaphoreAir(accessSet.depth);
const topic = 'treasury-proposal';

function buildMemberTrace() {
    return buildTrace({ privKey: member, path: accessSet.pathFor(0), leafIndex: 0, topic }, accessSet.depth);
}

function labelsOf(failures: readonly { label: string }[]): string[] {
    return failures.map(f => f.label);
}

// CONSTRAINT LAYOUT
// ================================================================================================
describe('SemaphoreAir constraints', () => {

    it('should give every constraint its own index', () => {
        const indexes = air.constraints.map(c => c.index);
        expect(new Set(indexes).size).toBe(indexes.length);
        expect(indexes).toEqual(Array.from({ length: 61 }, (_, i) => i));

        const labels = air.constraints.map(c => c.label);
        expect(new Set(labels).size).toBe(labels.length);
    });

    it('should declare 37 transition and 24 boundary constraints', () => {
        expect(air.constraints.filter(c => c.kind === 'transition')).toHaveLength(37);
        expect(air.constraints.filter(c => c.kind === 'boundary')).toHaveLength(24);
        expect(air.maxConstraintDegree).toBe(8);
    });

    it('should give every assertion a distinct boundary slot', () => {
        const trace = buildMemberTrace();
        const assertions = air.buildAssertions(trace.inputs);
        expect(assertions).toHaveLength(24);
        expect(new Set(assertions.map(a => a.index)).size).toBe(24);
        for (let a of assertions) {
            expect(air.constraints[a.index].kind).toBe('boundary');
        }
    });

    it('should assert the root at the last row of the last tree level', () => {
        const trace = buildMemberTrace();
        const roots = air.buildAssertions(trace.inputs).filter(a => air.constraints[a.index].label.startsWith('merkle.root'));
        expect(roots.map(a => [a.column, a.step])).toEqual([[4, 15], [5, 15], [6, 15], [7, 15]]);
        expect(roots.map(a => a.value)).toEqual(accessSet.root);
    });

    it('should have one periodic column for the round mask, 24 for round constants, and the first row selector', () => {
        expect(air.periodicColumns).toHaveLength(26);
        expect(air.periodicColumns[0]).toEqual([1n, 1n, 1n, 1n, 1n, 1n, 1n, 0n]);
        expect(air.periodicColumns[25]).toHaveLength(air.traceLength);
        expect(air.periodicColumns[25][0]).toBe(1n);
    });

    it('should reject public inputs of the wrong size', () => {
        const trace = buildMemberTrace();
        expect(() => air.buildAssertions({ ...trace.inputs, nullifier: [1n, 2n] }))
            .toThrow('Public input nullifier must consist of 4 field elements');
    });
});

describe('ConstraintAllocator', () => {
    it('should hand out sequential indexes', () => {
        const allocator = new ConstraintAllocator();
        expect(allocator.allocate('a', 'transition', 2)).toBe(0);
        expect(allocator.allocateMany('b', 3, 'boundary', 1)).toEqual([1, 2, 3]);
        expect(allocator.constraints.map(c => c.label)).toEqual(['a', 'b[0]', 'b[1]', 'b[2]']);
        expect(allocator.count).toBe(4);
    });

    it('should refuse to allocate the same check twice', () => {
        const allocator = new ConstraintAllocator();
        allocator.allocate('capacity', 'boundary', 1);
        expect(() => allocator.allocate('capacity', 'boundary', 1)).toThrow('Constraint capacity has already been allocated');
    });

    it('should refuse to allocate after being sealed', () => {
        const allocator = new ConstraintAllocator();
        allocator.allocate('a', 'transition', 2);
        const constraints = allocator.seal();
        expect(constraints).toHaveLength(1);
        expect(() => allocator.allocate('b', 'transition', 2)).toThrow('allocator has been sealed');
    });
});

// COMPLETENESS
// ================================================================================================
describe('SemaphoreAir completeness', () => {
    it('should accept traces of every member on any topic', () => {
        const element = fc.bigInt({ min: 0n, max: MODULUS - 1n });
        const key = fc.tuple(element, element, element, element);

        fc.assert(fc.property(fc.array(key, { minLength: 1, maxLength: 5 }), fc.nat(), fc.string(), (keys, seed, topic) => {
            const privKeys = keys.map(k => new PrivKey(k.slice()));
            const set = createAccessSet(privKeys.map(k => k.getPublicKey()), {}, null);
            const index = seed % privKeys.length;

            const trace = buildTrace({ privKey: privKeys[index], path: set.pathFor(index), leafIndex: index, topic }, set.depth, { padding: 'random' });
            expect(trace.inputs.root).toEqual(set.root);
            expect(set.air.checkTrace(trace.columns, trace.inputs)).toEqual([]);
        }), { numRuns: 15 });
    });
});

// SOUNDNESS
// ================================================================================================
describe('SemaphoreAir soundness', () => {

    it('should reject a nullifier lane started from a different capacity', () => {
        const trace = buildMemberTrace();
        const forged = rescue.initState({ name: 'forged', capacity: [9n, 0n, 0n, 1n] }, [...member.elements, ...trace.inputs.topicHash]);
        const output = writeCycle(trace.columns, layout.NULLIFIER_LANE, 0, forged);
        const nullifier = rescue.digest(output);

        expect(air.checkTrace(trace.columns, { ...trace.inputs, nullifier })).toEqual([
            { index: 45, label: 'nullifier.capacity[0]@0', step: 0 }
        ]);
    });

    it('should reject a tree level started from a different capacity', () => {
        const trace = buildMemberTrace();
        const accumulated = readDigest(trace.columns, layout.MERKLE_LEFT, 7);
        const sibling = accessSet.pathFor(0)[0].sibling;
        const forged = rescue.initState({ name: 'forged', capacity: [9n, 0n, 0n, 0n] }, [...accumulated, ...sibling]);
        const root = rescue.digest(writeCycle(trace.columns, layout.MERKLE_LANE, 1, forged));

        expect(air.checkTrace(trace.columns, { ...trace.inputs, root })).toEqual([
            { index: 24, label: 'merkle.capacity[0]', step: 7 }
        ]);
    });

    it('should reject a nullifier derived from a key other than the member key', () => {
        const trace = buildMemberTrace();
        const initial = rescue.initState({ name: 'nullifier', capacity: [8n, 0n, 0n, 1n] }, [...other.elements, ...trace.inputs.topicHash]);
        writeCycle(trace.columns, layout.NULLIFIER_LANE, 0, initial);
        const nullifier = hashNullifier(other.elements, trace.inputs.topicHash);

        expect(air.checkTrace(trace.columns, { ...trace.inputs, nullifier })).toEqual([
            { index: 33, label: 'nullifier.keyBinding[0]', step: 0 },
            { index: 34, label: 'nullifier.keyBinding[1]', step: 0 },
            { index: 35, label: 'nullifier.keyBinding[2]', step: 0 },
            { index: 36, label: 'nullifier.keyBinding[3]', step: 0 }
        ]);
    });

    it('should reject a chosen nullifier explained by an inverted preimage', () => {
        const trace = buildMemberTrace();
        const nullifier = [1n, 2n, 3n, 4n];
        const preimage = rescue.invPermute([5n, 6n, 7n, 8n, ...nullifier, 9n, 10n, 11n, 12n]);
        const output = writeCycle(trace.columns, layout.NULLIFIER_LANE, 0, preimage);
        expect(rescue.digest(output)).toEqual(nullifier);

        expect(labelsOf(air.checkTrace(trace.columns, { ...trace.inputs, nullifier }))).toEqual([
            'nullifier.keyBinding[0]', 'nullifier.keyBinding[1]', 'nullifier.keyBinding[2]', 'nullifier.keyBinding[3]',
            'nullifier.capacity[0]@0', 'nullifier.capacity[1]@0', 'nullifier.capacity[2]@0', 'nullifier.capacity[3]@0',
            'nullifier.topic[0]@0', 'nullifier.topic[1]@0', 'nullifier.topic[2]@0', 'nullifier.topic[3]@0'
        ]);
    });

    it('should reject a path with a modified sibling', () => {
        const path = accessSet.pathFor(1);
        const sibling = path[0].sibling.slice();
        sibling[2] = (sibling[2] + 1n) % MODULUS;
        const tampered = [{ sibling, bit: path[0].bit }];

        const trace = buildTrace({ privKey: other, path: tampered, leafIndex: 1, topic }, accessSet.depth);
        expect(trace.inputs.root).not.toEqual(accessSet.root);
        expect(air.checkTrace(trace.columns, { ...trace.inputs, root: accessSet.root })).toEqual([
            { index: 57, label: 'merkle.root[0]@15', step: 15 },
            { index: 58, label: 'merkle.root[1]@15', step: 15 },
            { index: 59, label: 'merkle.root[2]@15', step: 15 },
            { index: 60, label: 'merkle.root[3]@15', step: 15 }
        ]);
    });

    it('should reject an accumulated hash placed on the side its index bit does not select', () => {
        const trace = buildMemberTrace();
        expect(trace.columns[layout.INDEX_BIT][8]).toBe(0n);

        const accumulated = readDigest(trace.columns, layout.MERKLE_LEFT, 7);
        const sibling = accessSet.pathFor(0)[0].sibling;
        const swapped = rescue.initState(MERKLE_DOMAIN, [...sibling, ...accumulated]);
        const root = rescue.digest(writeCycle(trace.columns, layout.MERKLE_LANE, 1, swapped));

        expect(air.checkTrace(trace.columns, { ...trace.inputs, root })).toEqual([
            { index: 28, label: 'merkle.carry[0]', step: 7 },
            { index: 29, label: 'merkle.carry[1]', step: 7 },
            { index: 30, label: 'merkle.carry[2]', step: 7 },
            { index: 31, label: 'merkle.carry[3]', step: 7 }
        ]);
    });

    it('should reject a public key derived with a nonzero rate tail', () => {
        const trace = buildMemberTrace();
        const tailed = rescue.initState(PUBLIC_KEY_DOMAIN, [...member.elements, 5n, 0n, 0n, 0n]);
        const leaf = rescue.digest(writeCycle(trace.columns, layout.MERKLE_LANE, 0, tailed));

        const sibling = accessSet.pathFor(0)[0].sibling;
        const merged = rescue.initState(MERKLE_DOMAIN, [...leaf, ...sibling]);
        const root = rescue.digest(writeCycle(trace.columns, layout.MERKLE_LANE, 1, merged));

        expect(trace.columns[layout.MERKLE_RIGHT][0]).toBe(5n);
        expect(air.checkTrace(trace.columns, { ...trace.inputs, root })).toEqual([
            { index: 41, label: 'merkle.rate[0]@0', step: 0 }
        ]);
    });

    it('should reject an index bit which is not binary', () => {
        const trace = buildMemberTrace();
        for (let step = 8; step < 16; step++) {
            trace.columns[layout.INDEX_BIT][step] = 2n;
        }
        const failures = air.checkTrace(trace.columns, trace.inputs);
        expect(failures.filter(f => f.step === 7).map(f => f.label)).toContain('merkle.bit');
    });

    it('should reject a skipped round', () => {
        const trace = buildMemberTrace();
        for (let i = 0; i < 12; i++) {
            trace.columns[layout.MERKLE_LANE + i][3] = trace.columns[layout.MERKLE_LANE + i][2];
        }
        const failures = air.checkTrace(trace.columns, trace.inputs);
        expect(failures.some(f => f.step === 2 && f.label.startsWith('merkle.round'))).toBe(true);
    });
});
