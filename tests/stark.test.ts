import { describe, it, expect } from 'vitest';
import { PrivKey, Stark, StarkError, ConstraintViolation, createAccessSet } from '../index';
import { SemaphoreAir, buildTrace, writeCycle, layout } from '../lib/air';
import { rescue } from '../lib/hash';

// FIXTURES
// ================================================================================================
const member = new PrivKey([7n, 77n, 777n, 7777n]);
const accessSet = createAccessSet([member.getPublicKey(), new PrivKey([1n, 1n, 1n, 1n]).getPublicKey()], {}, null);
const air = new SemaphoreAir(accessSet.depth);
const stark = new Stark(air, { queryCount: 24 });
const topic = 'release-1.2';

function buildMemberTrace() {
    return buildTrace({ privKey: member, path: accessSet.pathFor(0), leafIndex: 0, topic }, accessSet.depth);
}

// TESTS
// ================================================================================================
describe('Stark', () => {

    const trace = buildMemberTrace();
    const assertions = air.buildAssertions(trace.inputs);
    const proof = stark.prove(assertions, trace.columns);

    it('should use the smallest extension factor which fits constraint degree', () => {
        expect(stark.options).toEqual({ extensionFactor: 16, queryCount: 24, hashAlgorithm: 'sha256' });
        expect(stark.domain.size).toBe(256);
        expect(stark.securityLevel).toBe(24);
    });

    it('should verify a proof of a valid trace', () => {
        expect(stark.verify(assertions, proof)).toBe(true);
    });

    it('should verify a proof after serialization', () => {
        const buffer = stark.serialize(proof);
        expect(buffer.byteLength).toBe(stark.sizeOf(proof));
        expect(stark.verify(assertions, stark.parse(buffer))).toBe(true);
    });

    it('should refuse to parse a truncated proof', () => {
        const buffer = stark.serialize(proof);
        expect(() => stark.parse(buffer.subarray(0, 20))).toThrow('Buffer is too short: 32 bytes expected, 20 available');
        expect(() => stark.parse(buffer.subarray(0, buffer.byteLength - 1)))
            .toThrow(`Buffer is too short: ${buffer.byteLength} bytes expected, ${buffer.byteLength - 1} available`);
    });

    it('should reject a proof against different public inputs', () => {
        const other = air.buildAssertions({ ...trace.inputs, nullifier: [1n, 2n, 3n, 4n] });
        expect(() => stark.verify(other, proof)).toThrow(StarkError);
    });

    it('should reject a proof with a tampered trace opening', () => {
        const values = proof.traceProof.values.map(value => Buffer.from(value));
        values[0][0] ^= 1;
        const tampered = { ...proof, traceProof: { ...proof.traceProof, values } };
        expect(() => stark.verify(assertions, tampered)).toThrow('Verification of evaluation Merkle proof failed');
    });

    it('should refuse to prove a trace which violates constraints', () => {
        const forged = buildMemberTrace();
        const initial = rescue.initState({ name: 'forged', capacity: [9n, 0n, 0n, 1n] }, [...member.elements, ...forged.inputs.topicHash]);
        const nullifier = rescue.digest(writeCycle(forged.columns, layout.NULLIFIER_LANE, 0, initial));
        const forgedAssertions = air.buildAssertions({ ...forged.inputs, nullifier });

        try {
            stark.prove(forgedAssertions, forged.columns);
            expect.unreachable('proof should not be generated');
        }
        catch (error) {
            expect(error).toBeInstanceOf(ConstraintViolation);
            if (error instanceof ConstraintViolation) {
                expect(error.failures).toEqual([{ index: 45, label: 'nullifier.capacity[0]@0', step: 0 }]);
                expect(error.message).toBe(`Constraint 45 (nullifier.capacity[0]@0) didn't evaluate to 0 at step 0`);
            }
        }
    });

    it('should reject a proof built over a trace with a forged nullifier capacity', () => {
        const forged = buildMemberTrace();
        const initial = rescue.initState({ name: 'forged', capacity: [9n, 0n, 0n, 1n] }, [...member.elements, ...forged.inputs.topicHash]);
        const nullifier = rescue.digest(writeCycle(forged.columns, layout.NULLIFIER_LANE, 0, initial));
        const forgedAssertions = air.buildAssertions({ ...forged.inputs, nullifier });

        const forgedProof = stark.generateProof(forgedAssertions, forged.columns);
        expect(() => stark.verify(forgedAssertions, forgedProof)).toThrow(StarkError);
    });

    it('should reject a proof built over a trace with an unbound nullifier key', () => {
        const forged = buildMemberTrace();
        const nullifier = [11n, 12n, 13n, 14n];
        const preimage = rescue.invPermute([8n, 0n, 0n, 1n, ...nullifier, ...forged.inputs.topicHash]);
        writeCycle(forged.columns, layout.NULLIFIER_LANE, 0, preimage);
        const forgedAssertions = air.buildAssertions({ ...forged.inputs, nullifier });

        const forgedProof = stark.generateProof(forgedAssertions, forged.columns);
        expect(() => stark.verify(forgedAssertions, forgedProof)).toThrow(StarkError);
    });

    it('should reject invalid assertions', () => {
        const transition = { index: 0, column: 0, step: 0, value: 0n };
        expect(() => stark.verify([transition], proof)).toThrow('does not refer to a boundary constraint');
        expect(() => stark.verify([], proof)).toThrow('At least one assertion must be provided');
    });
});
