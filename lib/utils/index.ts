// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';

// RE-EXPORTS
// ================================================================================================
export { writeMerkleProof, readMerkleProof, readBytes, ensureLength } from './serialization';
export { sizeOf } from './sizeof';
export { Logger, noopLogger } from './Logger';

// CONSTANTS
// ================================================================================================
const MASK_64B = 0xFFFFFFFFFFFFFFFFn;

// MATH
// ================================================================================================
export function isPowerOf2(value: number | bigint): boolean {
    if (typeof value === 'bigint') {
        return (value !== 0n) && (value & (value - 1n)) === 0n;
    }
    else {
        return (value !== 0) && (value & (value - 1)) === 0;
    }
}

/**
 * Inverts all values using a single field inversion (Montgomery's trick); none of the values
 * may be zero.
 */
export function batchInverse(field: FiniteField, values: bigint[]): bigint[] {
    const result = new Array<bigint>(values.length);

    let acc = field.one;
    for (let i = 0; i < values.length; i++) {
        result[i] = acc;
        acc = field.mul(acc, values[i]);
    }

    acc = field.inv(acc);
    for (let i = values.length - 1; i >= 0; i--) {
        result[i] = field.mul(result[i], acc);
        acc = field.mul(acc, values[i]);
    }

    return result;
}

// BIGINT-BUFFER CONVERSIONS
// ================================================================================================
export function readBigInt(buffer: Buffer, offset: number, elementSize: number): bigint {
    const blocks = elementSize >> 3;
    let value = 0n;
    for (let i = 0n; i < blocks; i++) {
        value = (buffer.readBigUInt64LE(offset) << (64n * i)) | value;
        offset += 8;
    }
    return value;
}

export function writeBigInt(value: bigint, buffer: Buffer, offset: number, elementSize: number): number {
    const limbCount = elementSize >> 3;
    for (let i = 0; i < limbCount; i++) {
        buffer.writeBigUInt64LE(value & MASK_64B, offset);
        value = value >> 64n;
        offset += 8;
    }
    return offset;
}

export function writeValues(values: readonly bigint[], elementSize: number): Buffer {
    const buffer = Buffer.allocUnsafe(values.length * elementSize);
    let offset = 0;
    for (let value of values) {
        offset = writeBigInt(value, buffer, offset, elementSize);
    }
    return buffer;
}

export function readValues(buffer: Buffer, elementSize: number): bigint[] {
    const count = Math.floor(buffer.byteLength / elementSize);
    const result = new Array<bigint>(count);
    for (let i = 0, offset = 0; i < count; i++, offset += elementSize) {
        result[i] = readBigInt(buffer, offset, elementSize);
    }
    return result;
}

// DIGESTS
// ================================================================================================
export function digestToHex(digest: readonly bigint[]): string {
    return writeValues(digest, 8).toString('hex');
}

export function digestsEqual(a: readonly bigint[], b: readonly bigint[]): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

// OTHER
// ================================================================================================
export function noop() {};
