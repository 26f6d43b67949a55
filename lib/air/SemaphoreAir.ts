// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type {
    Air, Assertion, ConstraintDescriptor, ConstraintFailure, EvaluationFrame, PublicInputs, HashDomain
} from 'rescue-semaphore';
import { Rescue, rescue as defaultRescue, mulMatrixVector } from '../hash';
import { PUBLIC_KEY_DOMAIN, MERKLE_DOMAIN, NULLIFIER_DOMAIN, DIGEST_SIZE } from '../config';
import { ConstraintAllocator } from './ConstraintAllocator';
import { checkTrace } from './checkTrace';
import {
    CYCLE_LENGTH, TRACE_WIDTH, MERKLE_LANE, MERKLE_CAPACITY, MERKLE_LEFT, MERKLE_RIGHT, NULLIFIER_LANE,
    NULLIFIER_CAPACITY, NULLIFIER_KEY, NULLIFIER_TOPIC, NULLIFIER_OUTPUT, INDEX_BIT, getTraceLength, getRootStep
} from './layout';

// INTERFACES
// ================================================================================================
type PublicValue = (inputs: PublicInputs) => bigint;

interface AssertionSlot {
    readonly index  : number;
    readonly column : number;
    readonly step   : number;
    readonly value  : PublicValue;
}

interface TransitionIndexes {
    readonly merkleRound    : number[];
    readonly nullifierRound : number[];
    readonly merkleCapacity : number[];
    readonly carry          : number[];
    readonly bit            : number;
    readonly keyBinding     : number[];
}

// MODULE VARIABLES
// ================================================================================================
const ROUND_MASK_COLUMN = 0;
const ARK1_COLUMN = 1;

// CLASS DEFINITION
// ================================================================================================
/**
 * Constraint system for a signal trace. Transition constraints force both lanes to be honest
 * unrollings of the permutation, pin the Merkle capacity at every level start, carry the
 * accumulated hash into the slot selected by the index bit, and bind the nullifier lane's key
 * to the key from which the membership leaf is derived. Boundary constraints pin the remaining
 * capacities and tie the trace to the public inputs.
 */
export class SemaphoreAir implements Air {

    readonly field                  : FiniteField;
    readonly depth                  : number;
    readonly traceWidth             : number;
    readonly traceLength            : number;
    readonly constraints            : readonly ConstraintDescriptor[];
    readonly periodicColumns        : readonly (readonly bigint[])[];
    readonly maxConstraintDegree    : number;

    private readonly hash           : Rescue;
    private readonly transitions    : TransitionIndexes;
    private readonly slots          : readonly AssertionSlot[];
    private readonly ark2Column     : number;
    private readonly firstRowColumn : number;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(depth: number, hash: Rescue = defaultRescue) {
        if (!Number.isInteger(depth) || depth < 1) {
            throw new TypeError('Tree depth must be a positive integer');
        }
        if (hash.stateWidth * 2 + 1 !== TRACE_WIDTH || hash.rounds + 1 !== CYCLE_LENGTH) {
            throw new TypeError('Permutation parameters do not match the trace layout');
        }

        this.hash = hash;
        this.field = hash.field;
        this.depth = depth;
        this.traceWidth = TRACE_WIDTH;
        this.traceLength = getTraceLength(depth);

        const width = hash.stateWidth;
        const roundDegree = Number(hash.alpha) + 1;
        const allocator = new ConstraintAllocator();

        // transition constraints
        this.transitions = {
            merkleRound     : allocator.allocateMany('merkle.round', width, 'transition', roundDegree),
            nullifierRound  : allocator.allocateMany('nullifier.round', width, 'transition', roundDegree),
            merkleCapacity  : allocator.allocateMany('merkle.capacity', hash.capacity, 'transition', 2),
            carry           : allocator.allocateMany('merkle.carry', DIGEST_SIZE, 'transition', 3),
            bit             : allocator.allocate('merkle.bit', 'transition', 3),
            keyBinding      : allocator.allocateMany('nullifier.keyBinding', DIGEST_SIZE, 'transition', 2)
        };

        // boundary constraints
        const rootStep = getRootStep(depth);
        const slots: AssertionSlot[] = [];
        const addSlots = (label: string, column: number, step: number, values: PublicValue[]) => {
            values.forEach((value, i) => {
                let index = allocator.allocate(`${label}[${i}]@${step}`, 'boundary', 1);
                slots.push({ index, column: column + i, step, value });
            });
        };

        addSlots('merkle.capacity', MERKLE_CAPACITY, 0, constants(PUBLIC_KEY_DOMAIN));
        addSlots('merkle.rate', MERKLE_RIGHT, 0, new Array<PublicValue>(DIGEST_SIZE).fill(() => 0n));
        addSlots('nullifier.capacity', NULLIFIER_CAPACITY, 0, constants(NULLIFIER_DOMAIN));
        addSlots('nullifier.topic', NULLIFIER_TOPIC, 0, digestValues(inputs => inputs.topicHash));
        addSlots('nullifier.output', NULLIFIER_OUTPUT, CYCLE_LENGTH - 1, digestValues(inputs => inputs.nullifier));
        addSlots('merkle.root', MERKLE_LEFT, rootStep, digestValues(inputs => inputs.root));

        this.slots = slots;
        this.constraints = allocator.seal();
        this.maxConstraintDegree = this.constraints.reduce((max, c) => Math.max(max, c.degree), 0);

        // periodic columns: round mask, round constants, and the first row selector
        const mask = new Array<bigint>(CYCLE_LENGTH).fill(this.field.one);
        mask[CYCLE_LENGTH - 1] = this.field.zero;

        const ark1 = buildConstantColumns(hash.ark1, width);
        const ark2 = buildConstantColumns(hash.ark2, width);

        const firstRow = new Array<bigint>(this.traceLength).fill(this.field.zero);
        firstRow[0] = this.field.one;

        this.periodicColumns = [mask, ...ark1, ...ark2, firstRow];
        this.ark2Column = ARK1_COLUMN + width;
        this.firstRowColumn = ARK1_COLUMN + 2 * width;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    /** Builds boundary assertions which tie the trace to the provided public inputs */
    buildAssertions(inputs: PublicInputs): Assertion[] {
        validateInputs(inputs);
        return this.slots.map(slot => ({
            index   : slot.index,
            column  : slot.column,
            step    : slot.step,
            value   : slot.value(inputs)
        }));
    }

    /** Returns all constraints which do not hold over the provided trace */
    checkTrace(columns: readonly (readonly bigint[])[], inputs: PublicInputs): ConstraintFailure[] {
        return checkTrace(this, columns, this.buildAssertions(inputs));
    }

    evaluateTransition(frame: EvaluationFrame, result: bigint[]): void {
        const field = this.field;
        const { current, next, periodic } = frame;
        const t = this.transitions;

        const mask = periodic[ROUND_MASK_COLUMN];
        const notMask = field.sub(field.one, mask);
        const ark1 = periodic.slice(ARK1_COLUMN, ARK1_COLUMN + this.hash.stateWidth);
        const ark2 = periodic.slice(this.ark2Column, this.ark2Column + this.hash.stateWidth);
        const firstRow = periodic[this.firstRowColumn];

        // permutation rounds in both lanes
        this.evaluateRound(current, next, MERKLE_LANE, mask, ark1, ark2, t.merkleRound, result);
        this.evaluateRound(current, next, NULLIFIER_LANE, mask, ark1, ark2, t.nullifierRound, result);

        // every merge starts from the Merkle domain capacity
        for (let j = 0; j < t.merkleCapacity.length; j++) {
            let diff = field.sub(next[MERKLE_CAPACITY + j], MERKLE_DOMAIN.capacity[j]);
            result[t.merkleCapacity[j]] = field.mul(notMask, diff);
        }

        // accumulated hash goes left when the next level's bit is 0, and right otherwise
        const bit = next[INDEX_BIT];
        const notBit = field.sub(field.one, bit);
        for (let j = 0; j < t.carry.length; j++) {
            let accumulated = current[MERKLE_LEFT + j];
            let left = field.mul(notBit, field.sub(next[MERKLE_LEFT + j], accumulated));
            let right = field.mul(bit, field.sub(next[MERKLE_RIGHT + j], accumulated));
            result[t.carry[j]] = field.mul(notMask, field.add(left, right));
        }

        result[t.bit] = field.mul(notMask, field.sub(field.mul(bit, bit), bit));

        // key fed into the nullifier hash is the key from which the leaf is derived
        for (let j = 0; j < t.keyBinding.length; j++) {
            let diff = field.sub(current[NULLIFIER_KEY + j], current[MERKLE_LEFT + j]);
            result[t.keyBinding[j]] = field.mul(firstRow, diff);
        }
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private evaluateRound(current: readonly bigint[], next: readonly bigint[], lane: number, mask: bigint,
        ark1: readonly bigint[], ark2: readonly bigint[], indexes: readonly number[], result: bigint[]): void {

        const field = this.field;
        const width = this.hash.stateWidth;

        // forward half: MDS * state^alpha + ARK1
        const powered = new Array<bigint>(width);
        for (let i = 0; i < width; i++) {
            powered[i] = field.exp(current[lane + i], this.hash.alpha);
        }
        const forward = mulMatrixVector(field, this.hash.mds, powered);

        // backward half: (MDS^-1 * (next - ARK2))^alpha
        const shifted = new Array<bigint>(width);
        for (let i = 0; i < width; i++) {
            shifted[i] = field.sub(next[lane + i], ark2[i]);
        }
        const backward = mulMatrixVector(field, this.hash.invMds, shifted);

        for (let i = 0; i < width; i++) {
            let lhs = field.add(forward[i], ark1[i]);
            let rhs = field.exp(backward[i], this.hash.alpha);
            result[indexes[i]] = field.mul(mask, field.sub(lhs, rhs));
        }
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function constants(domain: HashDomain): PublicValue[] {
    return domain.capacity.map(value => () => value);
}

function digestValues(source: (inputs: PublicInputs) => readonly bigint[]): PublicValue[] {
    const result = new Array<PublicValue>(DIGEST_SIZE);
    for (let i = 0; i < DIGEST_SIZE; i++) {
        result[i] = inputs => source(inputs)[i];
    }
    return result;
}

/** Transposes per-round constants into one column per state element; the last row of a cycle is 0 */
function buildConstantColumns(roundConstants: readonly (readonly bigint[])[], width: number): bigint[][] {
    const result = new Array<bigint[]>(width);
    for (let i = 0; i < width; i++) {
        result[i] = new Array<bigint>(CYCLE_LENGTH).fill(0n);
        for (let r = 0; r < roundConstants.length; r++) {
            result[i][r] = roundConstants[r][i];
        }
    }
    return result;
}

function validateInputs(inputs: PublicInputs) {
    for (let name of ['root', 'topicHash', 'nullifier'] as const) {
        let value = inputs[name];
        if (!Array.isArray(value) || value.length !== DIGEST_SIZE) {
            throw new TypeError(`Public input ${name} must consist of ${DIGEST_SIZE} field elements`);
        }
    }
}
