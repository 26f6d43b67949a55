import { describe, it, expect } from 'vitest';
import { buildStarkOptions } from '../lib/config';

describe('buildStarkOptions', () => {

    it('should fill in defaults', () => {
        expect(buildStarkOptions(undefined, 8)).toEqual({ extensionFactor: 16, queryCount: 40, hashAlgorithm: 'sha256' });
        expect(buildStarkOptions({}, 3)).toEqual({ extensionFactor: 8, queryCount: 40, hashAlgorithm: 'sha256' });
    });

    it('should keep valid options', () => {
        const options = buildStarkOptions({ extensionFactor: 32, queryCount: 64, hashAlgorithm: 'blake2s256' }, 8);
        expect(options).toEqual({ extensionFactor: 32, queryCount: 64, hashAlgorithm: 'blake2s256' });
    });

    it('should reject extension factors which are too small for the constraint degree', () => {
        expect(() => buildStarkOptions({ extensionFactor: 8 }, 8))
            .toThrow('Extension factor must be at least 16 for constraints of degree 8');
    });

    it('should reject extension factors which are not powers of 2', () => {
        expect(() => buildStarkOptions({ extensionFactor: 24 }, 8)).toThrow('Extension factor must be a power of 2');
    });

    it('should reject extension factors outside of the allowed range', () => {
        expect(() => buildStarkOptions({ extensionFactor: 64 }, 8))
            .toThrow('Extension factor must be an integer between 2 and 32');
    });

    it('should reject query counts outside of the allowed range', () => {
        expect(() => buildStarkOptions({ queryCount: 200 }, 8)).toThrow('Query count must be an integer between 1 and 128');
        expect(() => buildStarkOptions({ queryCount: 2.5 }, 8)).toThrow('Query count must be an integer between 1 and 128');
    });
});
