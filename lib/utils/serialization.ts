// IMPORTS
// ================================================================================================
import type { BatchMerkleProof } from '@guildofweavers/merkle';
import { MAX_ARRAY_LENGTH, MAX_MATRIX_COLUMN_LENGTH } from './sizeof';

// INTERFACES
// ================================================================================================
const enum ColumnType {
    node = 0, leaf = 1
}

// MERKLE PROOFS
// ================================================================================================
export function writeMerkleProof(buffer: Buffer, offset: number, proof: BatchMerkleProof, leafSize: number): number {
    offset = writeArray(buffer, offset, proof.values);
    offset = writeMatrix(buffer, offset, proof.nodes, leafSize);
    offset = buffer.writeUInt8(proof.depth, offset);
    return offset;
}

export function readMerkleProof(buffer: Buffer, offset: number, leafSize: number, nodeSize: number) {

    const valuesInfo = readArray(buffer, offset, leafSize); offset = valuesInfo.offset;
    const nodesInfo = readMatrix(buffer, offset, leafSize, nodeSize); offset = nodesInfo.offset;
    ensureLength(buffer, offset, 1);
    const depth = buffer.readUInt8(offset); offset += 1;

    const proof: BatchMerkleProof = {
        values  : valuesInfo.values,
        nodes   : nodesInfo.matrix,
        depth   : depth
    };

    return { proof, offset };
}

// ARRAYS
// ================================================================================================
export function writeArray(buffer: Buffer, offset: number, array: Buffer[]) {

    // 2 bytes for the array size
    if (array.length > MAX_ARRAY_LENGTH) {
        throw new Error(`Array length (${array.length}) cannot exceed ${MAX_ARRAY_LENGTH}`);
    }
    offset = buffer.writeUInt16LE(array.length, offset);

    for (let i = 0; i < array.length; i++) {
        offset += array[i].copy(buffer, offset);
    }

    return offset;
}

export function readArray(buffer: Buffer, offset: number, elementSize: number) {

    ensureLength(buffer, offset, 2);
    const arrayLength = buffer.readUInt16LE(offset);
    offset += 2;

    const values = new Array<Buffer>(arrayLength);
    for (let i = 0; i < arrayLength; i++, offset += elementSize) {
        values[i] = readBytes(buffer, offset, elementSize);
    }

    return { values, offset };
}

// MATRIXES
// ================================================================================================
export function writeMatrix(buffer: Buffer, offset: number, matrix: Buffer[][], leafSize: number): number {

    // 2 bytes for the number of columns
    offset = buffer.writeUInt16LE(matrix.length, offset);

    // then write lengths and value type of each column (1 byte each, max 127)
    for (let i = 0; i < matrix.length; i++) {
        let column = matrix[i];
        let length = column.length;
        if (length > MAX_MATRIX_COLUMN_LENGTH) {
            throw new Error(`Matrix column length (${length}) cannot exceed ${MAX_MATRIX_COLUMN_LENGTH}`);
        }

        // column type is stored as least significant bit
        let type = (length > 0 && column[0].byteLength === leafSize)
            ? ColumnType.leaf
            : ColumnType.node;
        offset = buffer.writeUInt8((length << 1) | type, offset);
    }

    // then write the actual values
    for (let i = 0; i < matrix.length; i++) {
        let column = matrix[i];
        for (let j = 0; j < column.length; j++) {
            offset += column[j].copy(buffer, offset);
        }
    }

    return offset;
}

export function readMatrix(buffer: Buffer, offset: number, leafSize: number, nodeSize: number) {

    ensureLength(buffer, offset, 2);
    const columnCount = buffer.readUInt16LE(offset);
    offset += 2;
    ensureLength(buffer, offset, columnCount);

    const matrix = new Array<Buffer[]>(columnCount);
    const columnTypes = new Array<number>(columnCount);
    for (let i = 0; i < columnCount; i++, offset += 1) {
        let lengthAndType = buffer.readUInt8(offset);

        matrix[i] = new Array<Buffer>(lengthAndType >>> 1);
        columnTypes[i] = lengthAndType & 1;
    }

    for (let i = 0; i < columnCount; i++) {
        let column = matrix[i];

        // set first element type based on column type
        let firstElementSize = columnTypes[i] === ColumnType.leaf ? leafSize : nodeSize;

        for (let j = 0; j < column.length; j++) {
            let elementSize = (j === 0) ? firstElementSize : nodeSize;
            column[j] = readBytes(buffer, offset, elementSize);
            offset += elementSize;
        }
    }

    return { matrix, offset };
}

// BOUNDS
// ================================================================================================
export function ensureLength(buffer: Buffer, offset: number, length: number): void {
    if (buffer.byteLength < offset + length) {
        throw new Error(`Buffer is too short: ${offset + length} bytes expected, ${buffer.byteLength} available`);
    }
}

/** Copies bytes out of the buffer so that the result does not share memory with it */
export function readBytes(buffer: Buffer, offset: number, length: number): Buffer {
    ensureLength(buffer, offset, length);
    return Buffer.from(buffer.subarray(offset, offset + length));
}
