// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { StarkProof, FriComponent, Signal, Digest } from 'rescue-semaphore';
import { MAX_ARRAY_LENGTH } from './utils/sizeof';
import { DIGEST_SIZE } from './config';
import * as utils from './utils';

// INTERFACES
// ================================================================================================
interface SerializerConfig {
    readonly field      : FiniteField;
    readonly traceWidth : number;
}

// MODULE VARIABLES
// ================================================================================================
const MAX_TOPIC_LENGTH = 2**16 - 1;

// CLASS DEFINITION
// ================================================================================================
export class Serializer {

    readonly fieldElementSize   : number;
    readonly traceWidth         : number;
    readonly hashDigestSize     : number;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(config: SerializerConfig, hashDigestSize: number) {
        this.fieldElementSize = config.field.elementSize;
        this.traceWidth = config.traceWidth;
        this.hashDigestSize = hashDigestSize;
    }

    // PROOF SERIALIZER
    // --------------------------------------------------------------------------------------------
    serializeProof(proof: StarkProof): Buffer {

        const size = utils.sizeOf(proof, this.fieldElementSize, this.hashDigestSize);
        const buffer = Buffer.allocUnsafe(size.total);

        // root
        let offset = proof.traceRoot.copy(buffer, 0);

        // traceProof
        const traceLeafSize = this.traceWidth * this.fieldElementSize;
        offset = utils.writeMerkleProof(buffer, offset, proof.traceProof, traceLeafSize);

        // ldProof
        const ldLeafSize = this.fieldElementSize * 4;
        offset += proof.ldProof.lcRoot.copy(buffer, offset);
        offset = utils.writeMerkleProof(buffer, offset, proof.ldProof.lcProof, ldLeafSize);

        offset = buffer.writeUInt8(proof.ldProof.components.length, offset);
        for (let component of proof.ldProof.components) {
            offset += component.columnRoot.copy(buffer, offset);
            offset = utils.writeMerkleProof(buffer, offset, component.columnProof, ldLeafSize);
        }

        const remainder = proof.ldProof.remainder;
        if (remainder.length > MAX_ARRAY_LENGTH) {
            throw new Error(`Remainder length (${remainder.length}) cannot exceed ${MAX_ARRAY_LENGTH}`);
        }
        offset = buffer.writeUInt16LE(remainder.length, offset);
        for (let value of remainder) {
            offset = utils.writeBigInt(value, buffer, offset, this.fieldElementSize);
        }

        return buffer;
    }

    // PROOF PARSER
    // --------------------------------------------------------------------------------------------
    parseProof(buffer: Buffer): StarkProof {
        return this.readProof(buffer, 0).proof;
    }

    // SIGNAL SERIALIZER
    // --------------------------------------------------------------------------------------------
    /** topic length (2 bytes), topic, root, nullifier, proof */
    serializeSignal(signal: Signal): Buffer {
        const topic = Buffer.from(signal.topic, 'utf8');
        if (topic.byteLength > MAX_TOPIC_LENGTH) {
            throw new Error(`Topic length (${topic.byteLength}) cannot exceed ${MAX_TOPIC_LENGTH} bytes`);
        }

        const header = Buffer.allocUnsafe(2);
        header.writeUInt16LE(topic.byteLength, 0);

        return Buffer.concat([
            header,
            topic,
            this.writeDigest(signal.root),
            this.writeDigest(signal.nullifier),
            this.serializeProof(signal.proof)
        ]);
    }

    parseSignal(buffer: Buffer): Signal {
        utils.ensureLength(buffer, 0, 2);
        const topicLength = buffer.readUInt16LE(0);
        let offset = 2;
        utils.ensureLength(buffer, offset, topicLength);
        const topic = buffer.toString('utf8', offset, offset + topicLength);
        offset += topicLength;

        const root = this.readDigest(buffer, offset); offset += this.digestByteSize;
        const nullifier = this.readDigest(buffer, offset); offset += this.digestByteSize;

        const { proof, offset: end } = this.readProof(buffer, offset);
        if (end !== buffer.byteLength) {
            throw new Error(`Signal buffer has ${buffer.byteLength - end} unexpected trailing bytes`);
        }

        return { topic, root, nullifier, proof };
    }

    // PRIVATE METHODS
    // --------------------------------------------------------------------------------------------
    private get digestByteSize(): number {
        return DIGEST_SIZE * this.fieldElementSize;
    }

    private writeDigest(digest: Digest): Buffer {
        if (digest.length !== DIGEST_SIZE) {
            throw new Error(`Digest must consist of ${DIGEST_SIZE} field elements`);
        }
        return utils.writeValues(digest, this.fieldElementSize);
    }

    private readDigest(buffer: Buffer, offset: number): Digest {
        if (buffer.byteLength < offset + this.digestByteSize) {
            throw new Error('Signal buffer is too short');
        }
        return utils.readValues(buffer.subarray(offset, offset + this.digestByteSize), this.fieldElementSize);
    }

    private readProof(buffer: Buffer, offset: number): { proof: StarkProof, offset: number } {

        // root
        const traceRoot = utils.readBytes(buffer, offset, this.hashDigestSize);
        offset += this.hashDigestSize;

        // traceProof
        const traceLeafSize = this.traceWidth * this.fieldElementSize;
        const traceProof = utils.readMerkleProof(buffer, offset, traceLeafSize, this.hashDigestSize);
        offset = traceProof.offset;

        // ldProof
        const ldLeafSize = this.fieldElementSize * 4;
        const lcRoot = utils.readBytes(buffer, offset, this.hashDigestSize);
        offset += this.hashDigestSize;
        const lcProof = utils.readMerkleProof(buffer, offset, ldLeafSize, this.hashDigestSize);
        offset = lcProof.offset;

        utils.ensureLength(buffer, offset, 1);
        const componentCount = buffer.readUInt8(offset); offset += 1;
        const friComponents = new Array<FriComponent>(componentCount);
        for (let i = 0; i < componentCount; i++) {
            let columnRoot = utils.readBytes(buffer, offset, this.hashDigestSize);
            offset += this.hashDigestSize;
            let columnProofInfo = utils.readMerkleProof(buffer, offset, ldLeafSize, this.hashDigestSize);
            offset = columnProofInfo.offset;
            friComponents[i] = { columnRoot, columnProof: columnProofInfo.proof };
        }

        utils.ensureLength(buffer, offset, 2);
        const remainderLength = buffer.readUInt16LE(offset); offset += 2;
        utils.ensureLength(buffer, offset, remainderLength * this.fieldElementSize);
        const remainder = new Array<bigint>(remainderLength);
        for (let i = 0; i < remainderLength; i++, offset += this.fieldElementSize) {
            remainder[i] = utils.readBigInt(buffer, offset, this.fieldElementSize);
        }

        const proof: StarkProof = {
            traceRoot   : traceRoot,
            traceProof  : traceProof.proof,
            ldProof: {
                lcRoot      : lcRoot,
                lcProof     : lcProof.proof,
                components  : friComponents,
                remainder   : remainder
            }
        };

        return { proof, offset };
    }
}
