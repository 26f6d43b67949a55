// IMPORTS
// ================================================================================================
import type { Air, Assertion, StarkProof, StarkOptions, LowDegreeProof, Logger } from 'rescue-semaphore';
import { MerkleTree, Hash, createHash } from '@guildofweavers/merkle';
import {
    EvaluationDomain, TracePolynomial, CompositionPolynomial, LowDegreeProver, QueryIndexGenerator,
    getCombinationDegree, getRowPositions, rehashMerkleProofValues
} from './components';
import { checkTrace } from './air';
import { buildStarkOptions, GENERATOR } from './config';
import { sizeOf, writeValues, readValues, noopLogger, noop } from './utils';
import { Serializer } from './Serializer';
import { StarkError, ConstraintViolation } from './errors';

// CLASS DEFINITION
// ================================================================================================
export class Stark {

    readonly air                : Air;
    readonly options            : StarkOptions;
    readonly hash               : Hash;
    readonly domain             : EvaluationDomain;

    readonly indexGenerator     : QueryIndexGenerator;
    readonly serializer         : Serializer;
    readonly logger             : Logger;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(air: Air, options: Partial<StarkOptions> = {}, logger: Logger = noopLogger) {

        this.air = air;
        this.options = buildStarkOptions(options, air.maxConstraintDegree);
        this.hash = createHash(this.options.hashAlgorithm);
        this.domain = new EvaluationDomain(air.field, air.traceLength, this.options.extensionFactor, GENERATOR);

        this.indexGenerator = new QueryIndexGenerator(this.options);
        this.serializer = new Serializer(air, this.hash.digestSize);
        this.logger = logger;
    }

    // ACCESSORS
    // --------------------------------------------------------------------------------------------
    get securityLevel(): number {

        // every query reduces the chance of accepting a far-from-low-degree function
        const rate = this.domain.size / getCombinationDegree(this.air);
        const qs = Math.log2(rate) * this.indexGenerator.queryCount;

        // collision resistance of hash function
        const hs = this.hash.digestSize * 4;

        return Math.floor(Math.min(qs, hs));
    }

    // PROVER
    // --------------------------------------------------------------------------------------------
    /** Checks the execution trace against all constraints, and proves it if every one holds */
    prove(assertions: readonly Assertion[], executionTrace: readonly (readonly bigint[])[]): StarkProof {
        const failures = checkTrace(this.air, executionTrace, assertions);
        if (failures.length > 0) {
            throw new ConstraintViolation(failures);
        }
        return this.generateProof(assertions, executionTrace);
    }

    /** Builds a proof without checking the execution trace first */
    generateProof(assertions: readonly Assertion[], executionTrace: readonly (readonly bigint[])[]): StarkProof {

        const log = this.logger.start('Starting STARK computation');

        // 0 ----- validate parameters
        validateAssertions(this.air, assertions);
        if (executionTrace.length !== this.air.traceWidth) {
            throw new TypeError(`Execution trace must have exactly ${this.air.traceWidth} columns`);
        }

        // 1 ----- compute P(x) polynomials and low-degree extend them
        const pEvaluations = new TracePolynomial(this.domain).evaluate(executionTrace);
        log('Low-degree extended execution trace over evaluation domain');

        // 2 ----- build merkle tree for evaluations of P(x)
        const eValues = new Array<Buffer>(this.domain.size);
        for (let position = 0; position < eValues.length; position++) {
            eValues[position] = this.hash.digest(this.mergeValues(pEvaluations, position));
        }
        const eTree = MerkleTree.create(eValues, this.hash);
        log('Built evaluation merkle tree');

        // 3 ----- compute random linear combination of constraint quotients and P(x)
        const cLogger = this.logger.sub('Computing composition polynomial');
        const cPoly = new CompositionPolynomial(this.air, assertions, eTree.root, this.domain);
        const lEvaluations = cPoly.evaluateAll(pEvaluations, cLogger);
        this.logger.done(cLogger);
        log('Computed linear combination of constraints and trace polynomials');

        // 4 ----- commit to low degree proof layers
        const ldLogger = this.logger.sub('Computing low degree proof');
        const ldProver = new LowDegreeProver(this.domain, this.hash, ldLogger);
        let ldProof: LowDegreeProof;
        try {
            const commitment = ldProver.commit(lEvaluations);

            // 5 ----- derive query positions from all commitments
            const seeds = [eTree.root, ...commitment.trees.map(t => t.root), this.writeRemainder(commitment.remainder)];
            const positions = this.indexGenerator.getQueryPositions(seeds, this.domain.size);
            ldProof = ldProver.query(commitment, positions);
            this.logger.done(ldLogger);
            log('Computed low-degree proof');
        }
        catch (error) {
            throw new StarkError('Low degree proof failed', error);
        }

        // 6 ----- query evaluation tree at positions of all opened rows
        const positions = this.getQueryPositions(eTree.root, ldProof);
        const augmentedPositions = this.getAugmentedPositions(positions);
        const eProof = eTree.proveBatch(augmentedPositions);
        eProof.values = augmentedPositions.map(position => this.mergeValues(pEvaluations, position));
        log(`Computed ${augmentedPositions.length} evaluation spot checks`);

        this.logger.done(log, 'STARK computed');

        // build and return the proof object
        return {
            traceRoot   : eTree.root,
            traceProof  : eProof,
            ldProof     : ldProof
        };
    }

    // VERIFIER
    // --------------------------------------------------------------------------------------------
    verify(assertions: readonly Assertion[], proof: StarkProof): boolean {

        const log = this.logger.start('Starting STARK verification');

        // 0 ----- validate parameters
        validateAssertions(this.air, assertions);

        // 1 ----- set up composition polynomial
        const eRoot = proof.traceRoot;
        const cPoly = new CompositionPolynomial(this.air, assertions, eRoot, this.domain);
        log('Set up evaluation context');

        // 2 ----- compute positions for evaluation spot-checks
        const positions = this.getQueryPositions(eRoot, proof.ldProof);
        const augmentedPositions = this.getAugmentedPositions(positions);
        log(`Computed positions for evaluation spot checks`);

        // 3 ----- decode evaluation spot-checks
        if (proof.traceProof.values.length !== augmentedPositions.length) {
            throw new StarkError(`Number of evaluation spot checks is incorrect`);
        }
        const pEvaluations = new Map<number, bigint[]>();
        for (let i = 0; i < augmentedPositions.length; i++) {
            pEvaluations.set(augmentedPositions[i], this.parseValues(proof.traceProof.values[i]));
        }
        log(`Decoded evaluation spot checks`);

        // 4 ----- verify merkle proof for evaluation tree
        try {
            const evProof = rehashMerkleProofValues(proof.traceProof, this.hash);
            if (!MerkleTree.verifyBatch(eRoot, augmentedPositions, evProof, this.hash)) {
                throw new StarkError(`Verification of evaluation Merkle proof failed`);
            }
        }
        catch (error) {
            if (error instanceof StarkError) throw error;
            throw new StarkError(`Verification of evaluation Merkle proof failed`, error);
        }
        log(`Verified evaluation merkle proof`);

        // 5 ----- compute linear combinations at every position of the opened rows
        const lcValues = new Map<number, bigint>();
        for (let position of positions) {
            let x = this.domain.getPoint(position);
            let pValues = getEvaluations(pEvaluations, position);
            let nValues = getEvaluations(pEvaluations, this.domain.getNextPosition(position));
            lcValues.set(position, cPoly.evaluateAt(x, pValues, nValues));
        }
        log(`Computed linear combination at ${positions.length} positions`);

        // 6 ----- verify low-degree proof
        try {
            const ldProver = new LowDegreeProver(this.domain, this.hash, noop);
            ldProver.verify(proof.ldProof, lcValues, cPoly.combinationDegree);
        }
        catch (error) {
            throw new StarkError('Verification of low degree failed', error);
        }
        log(`Verified low-degree proof`);

        this.logger.done(log, 'STARK verified');
        return true;
    }

    // UTILITIES
    // --------------------------------------------------------------------------------------------
    sizeOf(proof: StarkProof): number {
        const size = sizeOf(proof, this.air.field.elementSize, this.hash.digestSize);
        return size.total;
    }

    serialize(proof: StarkProof): Buffer {
        return this.serializer.serializeProof(proof);
    }

    parse(buffer: Buffer): StarkProof {
        return this.serializer.parseProof(buffer);
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    /** Positions of every value in the opened rows of the linear combination */
    private getQueryPositions(traceRoot: Buffer, ldProof: LowDegreeProof): number[] {
        const seeds = [
            traceRoot,
            ldProof.lcRoot,
            ...ldProof.components.map(c => c.columnRoot),
            this.writeRemainder(ldProof.remainder)
        ];
        const queries = this.indexGenerator.getQueryPositions(seeds, this.domain.size);
        return getRowPositions(queries, this.domain.size);
    }

    private getAugmentedPositions(positions: readonly number[]): number[] {
        const augmentedPositionSet = new Set<number>();
        for (let position of positions) {
            augmentedPositionSet.add(position);
            augmentedPositionSet.add(this.domain.getNextPosition(position));
        }
        return Array.from(augmentedPositionSet).sort((a, b) => a - b);
    }

    private mergeValues(values: readonly (readonly bigint[])[], position: number): Buffer {
        const row = new Array<bigint>(values.length);
        for (let i = 0; i < values.length; i++) {
            row[i] = values[i][position];
        }
        return writeValues(row, this.air.field.elementSize);
    }

    private parseValues(buffer: Buffer): bigint[] {
        const elementSize = this.air.field.elementSize;
        if (buffer.byteLength !== this.air.traceWidth * elementSize) {
            throw new StarkError(`Evaluation spot check must contain ${this.air.traceWidth} values`);
        }
        return readValues(buffer, elementSize);
    }

    private writeRemainder(remainder: readonly bigint[]): Buffer {
        return writeValues(remainder, this.air.field.elementSize);
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function getEvaluations(evaluations: Map<number, bigint[]>, position: number): bigint[] {
    const values = evaluations.get(position);
    if (!values) {
        throw new StarkError(`Evaluation spot check for position ${position} is missing`);
    }
    return values;
}

function validateAssertions(air: Air, assertions: readonly Assertion[]) {
    if (!Array.isArray(assertions)) throw new TypeError('Assertions parameter must be an array');
    if (assertions.length === 0) throw new TypeError('At least one assertion must be provided');

    const seen = new Set<number>();
    for (let a of assertions) {
        let descriptor = air.constraints[a.index];
        if (!descriptor || descriptor.kind !== 'boundary') {
            throw new TypeError(`Invalid assertion: index ${a.index} does not refer to a boundary constraint`);
        }
        if (seen.has(a.index)) {
            throw new TypeError(`Invalid assertion: index ${a.index} is used more than once`);
        }
        seen.add(a.index);

        // make sure column references are correct
        if (a.column < 0 || a.column >= air.traceWidth) {
            throw new TypeError(`Invalid assertion: column ${a.column} is outside of the execution trace`);
        }

        // make sure steps are correct
        if (a.step < 0 || a.step >= air.traceLength) {
            throw new TypeError(`Invalid assertion: step ${a.step} is outside of execution trace`);
        }
    }
}
