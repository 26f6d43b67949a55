// IMPORTS
// ================================================================================================
import type { StarkProof } from 'rescue-semaphore';
import type { BatchMerkleProof } from '@guildofweavers/merkle';

// MODULE VARIABLES
// ================================================================================================
export const MAX_ARRAY_LENGTH = 2**16 - 1;
export const MAX_MATRIX_COLUMN_LENGTH = 127;

// PUBLIC FUNCTIONS
// ================================================================================================
export function sizeOf(proof: StarkProof, fieldElementSize: number, hashDigestSize: number) {

    let size = hashDigestSize;  // traceRoot

    // traceProof
    const traceProof = sizeOfMerkleProof(proof.traceProof);
    size += traceProof.total;

    // ldProof
    let ldProof = 1; // ld component count

    const lcProof = sizeOfMerkleProof(proof.ldProof.lcProof);
    ldProof += lcProof.total + hashDigestSize; // + lc root

    const ldLevels: { total: number }[] = [];
    for (let component of proof.ldProof.components) {
        let column = sizeOfMerkleProof(component.columnProof);
        let total = column.total + hashDigestSize; // + column root
        ldProof += total;
        ldLevels.push({ total });
    }

    let ldRemainder = proof.ldProof.remainder.length * fieldElementSize;
    ldRemainder += 2; // 2 bytes for remainder length

    ldLevels.push({ total: ldRemainder });
    ldProof += ldRemainder;
    size += ldProof;

    return { traceProof, ldProof: { lcProof, levels: ldLevels, total: ldProof }, total: size };
}

export function sizeOfMerkleProof(proof: BatchMerkleProof) {
    const values = sizeOfArray(proof.values);
    const nodes = sizeOfMatrix(proof.nodes);
    return { values, nodes, total: values + nodes + 1 }; // +1 for tree depth
}

// HELPER FUNCTIONS
// ================================================================================================
function sizeOfArray(array: Buffer[]): number {
    if (array.length === 0) {
        throw new Error(`Array cannot be zero-length`);
    }
    else if (array.length > MAX_ARRAY_LENGTH) {
        throw new Error(`Array length (${array.length}) cannot exceed ${MAX_ARRAY_LENGTH}`);
    }

    let size = 2; // 2 bytes for array length
    for (let i = 0; i < array.length; i++) {
        size += array[i].length;
    }
    return size;
}

function sizeOfMatrix(matrix: Buffer[][]): number {

    if (matrix.length > MAX_ARRAY_LENGTH) {
        throw new Error(`Matrix column count (${matrix.length}) cannot exceed ${MAX_ARRAY_LENGTH}`);
    }

    let size = 2;           // 2 bytes for number of columns
    size += matrix.length;  // 1 byte for length and type of each column

    for (let i = 0; i < matrix.length; i++) {
        let column = matrix[i];
        let columnLength = column.length;
        if (columnLength > MAX_MATRIX_COLUMN_LENGTH) {
            throw new Error(`Matrix column length (${columnLength}) cannot exceed ${MAX_MATRIX_COLUMN_LENGTH}`);
        }

        for (let j = 0; j < columnLength; j++) {
            size += column[j].length;
        }
    }

    return size;
}
