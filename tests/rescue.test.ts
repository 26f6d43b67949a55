import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Rescue, rescue, field, mulMatrixVector, hashTopic, hashNullifier, bytesToElements, isWellFormedTopic } from '../lib/hash';
import { MODULUS, MERKLE_DOMAIN, NULLIFIER_DOMAIN, PUBLIC_KEY_DOMAIN } from '../lib/config';

const element = fc.bigInt({ min: 0n, max: MODULUS - 1n });
const digest = fc.tuple(element, element, element, element);

describe('Rescue', () => {
    describe('toy instance over F(11)', () => {
        const toy = new Rescue({
            modulus     : 11n,
            stateWidth  : 2,
            capacity    : 1,
            digestSize  : 1,
            rounds      : 3,
            alpha       : 3n,
            seed        : 'toy-rescue'
        });

        it('should derive the inverse S-box power', () => {
            expect(toy.invAlpha).toBe(7n);
        });

        it('should be a bijection over all states', () => {
            const outputs = new Set<string>();
            for (let a = 0n; a < 11n; a++) {
                for (let b = 0n; b < 11n; b++) {
                    let result = toy.permute([a, b]);
                    outputs.add(result.join(','));
                    expect(toy.invPermute(result)).toEqual([a, b]);
                }
            }
            expect(outputs.size).toBe(121);
        });
    });

    describe('toy nullifier over F(11)', () => {
        const toy = new Rescue({
            modulus     : 11n,
            stateWidth  : 4,
            capacity    : 1,
            digestSize  : 3,
            rounds      : 3,
            alpha       : 3n,
            seed        : 'toy'
        });
        const domain = { name: 'toy-nullifier', capacity: [1n] };

        it('should give every key a distinct nullifier on every topic', () => {
            for (let topic = 0n; topic < 11n; topic++) {
                const nullifiers = new Set<string>();
                for (let key = 0n; key < 11n; key++) {
                    nullifiers.add(toy.hash(domain, [key, topic]).join(','));
                }
                expect(nullifiers.size).toBe(11);
            }
        });

        it('should give a key a distinct nullifier on every topic', () => {
            for (let key = 0n; key < 11n; key++) {
                const nullifiers = new Set<string>();
                for (let topic = 0n; topic < 11n; topic++) {
                    nullifiers.add(toy.hash(domain, [key, topic]).join(','));
                }
                expect(nullifiers.size).toBe(11);
            }
        });
    });

    describe('signal instance', () => {
        it('should use 7 as the S-box power', () => {
            expect(rescue.alpha).toBe(7n);
            expect(rescue.invAlpha).toBe(10540996611094048183n);
        });

        it('should have 12 elements of state with 4 of capacity', () => {
            expect(rescue.stateWidth).toBe(12);
            expect(rescue.capacity).toBe(4);
            expect(rescue.rate).toBe(8);
            expect(rescue.rounds).toBe(7);
            expect(rescue.ark1).toHaveLength(7);
            expect(rescue.ark2[6]).toHaveLength(12);
        });

        it('should invert the MDS matrix', () => {
            for (let i = 0; i < rescue.stateWidth; i++) {
                let column = rescue.mds.map(row => row[i]);
                let expected = new Array<bigint>(rescue.stateWidth).fill(0n);
                expected[i] = 1n;
                expect(mulMatrixVector(field, rescue.invMds, column)).toEqual(expected);
            }
        });

        it('should undo the permutation with the inverse permutation', () => {
            fc.assert(fc.property(fc.array(element, { minLength: 12, maxLength: 12 }), state => {
                expect(rescue.invPermute(rescue.permute(state))).toEqual(state);
            }), { numRuns: 20 });
        });

        it('should reject states of the wrong width', () => {
            expect(() => rescue.permute([1n, 2n, 3n])).toThrow('Permutation state must contain exactly 12 elements');
        });

        it('should place the domain constant into the capacity', () => {
            const state = rescue.initState(MERKLE_DOMAIN, [1n, 2n]);
            expect(state).toEqual([8n, 0n, 0n, 0n, 1n, 2n, 0n, 0n, 0n, 0n, 0n, 0n]);
        });

        it('should reject inputs longer than the rate', () => {
            const input = new Array<bigint>(9).fill(1n);
            expect(() => rescue.initState(MERKLE_DOMAIN, input)).toThrow('Input cannot have more than 8 elements');
        });

        it('should separate hash domains', () => {
            const input = [1n, 2n, 3n, 4n, 5n, 6n, 7n, 8n];
            const merkle = rescue.hash(MERKLE_DOMAIN, input);
            const nullifier = rescue.hash(NULLIFIER_DOMAIN, input);
            const publicKey = rescue.hash(PUBLIC_KEY_DOMAIN, input);
            expect(merkle).not.toEqual(nullifier);
            expect(merkle).not.toEqual(publicKey);
            expect(nullifier).not.toEqual(publicKey);
        });
    });
});

describe('Nullifier', () => {
    it('should be the same for the same key and topic', () => {
        fc.assert(fc.property(digest, fc.string(), (key, topic) => {
            expect(hashNullifier(key, hashTopic(topic))).toEqual(hashNullifier(key, hashTopic(topic)));
        }), { numRuns: 10 });
    });

    it('should differ for different keys on the same topic', () => {
        fc.assert(fc.property(digest, digest, (key1, key2) => {
            fc.pre(key1.join() !== key2.join());
            const topicHash = hashTopic('election-2024');
            expect(hashNullifier(key1, topicHash)).not.toEqual(hashNullifier(key2, topicHash));
        }), { numRuns: 10 });
    });
});

describe('Topic hashing', () => {
    it('should pack 7 bytes into every element', () => {
        const bytes = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(bytesToElements(bytes)).toEqual([0x07060504030201n, 8n]);
    });

    it('should distinguish topics which differ only in length', () => {
        expect(hashTopic('')).not.toEqual(hashTopic('\u0000'));
        expect(hashTopic('vote')).not.toEqual(hashTopic('vote\u0000'));
    });

    it('should refuse topics which do not survive UTF-8 encoding', () => {
        expect(isWellFormedTopic('vote\uD800')).toBe(false);
        expect(isWellFormedTopic('vote\uFFFD')).toBe(true);
        expect(() => hashTopic('vote\uD800')).toThrow('Signal topic must be well-formed Unicode text');
    });

    it('should produce 4 field elements', () => {
        const result = hashTopic('a topic that is longer than a single rate of the permutation');
        expect(result).toHaveLength(4);
        for (let value of result) {
            expect(value < MODULUS).toBe(true);
        }
    });
});
