// IMPORTS
// ================================================================================================
import type { FiniteField, Vector } from '@guildofweavers/galois';
import { isPowerOf2 } from '../utils';

// CLASS DEFINITION
// ================================================================================================
/**
 * Execution domain is the group of traceLength-th roots of unity; evaluation domain is a coset of
 * the group of (traceLength * extensionFactor)-th roots of unity shifted by the offset, so that it
 * never intersects the execution domain.
 */
export class EvaluationDomain {

    readonly field              : FiniteField;
    readonly traceLength        : number;
    readonly extensionFactor    : number;
    readonly size               : number;
    readonly offset             : bigint;

    /** Generator of the evaluation domain roots */
    readonly rootOfUnity        : bigint;

    /** Generator of the execution domain; equals rootOfUnity^extensionFactor */
    readonly traceRootOfUnity   : bigint;

    private executionRoots?     : Vector;
    private evaluationRoots?    : Vector;
    private evaluationPoints?   : bigint[];

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(field: FiniteField, traceLength: number, extensionFactor: number, offset: bigint) {
        if (!isPowerOf2(traceLength)) {
            throw new TypeError('Trace length must be a power of 2');
        }
        if (!isPowerOf2(extensionFactor)) {
            throw new TypeError('Extension factor must be a power of 2');
        }

        this.field = field;
        this.traceLength = traceLength;
        this.extensionFactor = extensionFactor;
        this.size = traceLength * extensionFactor;
        this.offset = offset;

        this.rootOfUnity = field.getRootOfUnity(this.size);
        this.traceRootOfUnity = field.exp(this.rootOfUnity, BigInt(extensionFactor));
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    /** Powers of the trace root of unity */
    get executionDomain(): Vector {
        if (!this.executionRoots) {
            this.executionRoots = this.field.getPowerSeries(this.traceRootOfUnity, this.traceLength);
        }
        return this.executionRoots;
    }

    /** Powers of the evaluation root of unity, without the offset */
    get roots(): Vector {
        if (!this.evaluationRoots) {
            this.evaluationRoots = this.field.getPowerSeries(this.rootOfUnity, this.size);
        }
        return this.evaluationRoots;
    }

    /** Points of the evaluation domain: offset * rootOfUnity^i */
    get points(): readonly bigint[] {
        if (!this.evaluationPoints) {
            const roots = this.roots.toValues();
            this.evaluationPoints = roots.map(root => this.field.mul(this.offset, root));
        }
        return this.evaluationPoints;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    getPoint(position: number): bigint {
        return this.field.mul(this.offset, this.field.exp(this.rootOfUnity, BigInt(position)));
    }

    /** Returns the point of the execution domain which corresponds to the specified step */
    getStepPoint(step: number): bigint {
        return this.field.exp(this.traceRootOfUnity, BigInt(step));
    }

    /** Returns position of the point at which the next step of the trace is evaluated */
    getNextPosition(position: number): number {
        return (position + this.extensionFactor) % this.size;
    }

    /**
     * Evaluates a polynomial over offset^k * roots, where roots is a group of roots of unity;
     * the polynomial must not have more coefficients than there are roots.
     */
    evaluateOverCoset(poly: readonly bigint[], roots: Vector, shift: bigint): bigint[] {
        const scaled = new Array<bigint>(poly.length);
        let power = this.field.one;
        for (let i = 0; i < poly.length; i++) {
            scaled[i] = this.field.mul(poly[i], power);
            power = this.field.mul(power, shift);
        }
        return this.field.evalPolyAtRoots(this.field.newVectorFrom(scaled), roots).toValues();
    }
}
