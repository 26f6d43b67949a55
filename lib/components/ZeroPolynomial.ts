// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import { EvaluationDomain } from './EvaluationDomain';
import { batchInverse } from '../utils';

// CLASS DEFINITION
// ================================================================================================
/** Z(x) = (x^n - 1) / (x - x_last); vanishes at every step of the trace except the last one */
export class ZeroPolynomial {

    readonly field          : FiniteField;
    readonly traceLength    : bigint;
    readonly xAtLastStep    : bigint;

    private readonly domain : EvaluationDomain;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(domain: EvaluationDomain) {
        this.field = domain.field;
        this.domain = domain;
        this.traceLength = BigInt(domain.traceLength);
        this.xAtLastStep = domain.getStepPoint(domain.traceLength - 1);
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    evaluateAt(x: bigint): bigint {
        const xToTheSteps = this.field.exp(x, this.traceLength);
        const numValue = this.field.sub(xToTheSteps, this.field.one);
        const denValue = this.field.sub(x, this.xAtLastStep);
        return this.field.div(numValue, denValue);
    }

    /** Returns 1 / Z(x) for every point of the evaluation domain */
    evaluateInverses(): bigint[] {
        const field = this.field;
        const points = this.domain.points;

        // x^n takes only extensionFactor distinct values over the evaluation domain
        const cycle = this.domain.extensionFactor;
        const numerators = new Array<bigint>(cycle);
        for (let i = 0; i < cycle; i++) {
            numerators[i] = field.sub(field.exp(points[i], this.traceLength), field.one);
        }
        const numInverses = batchInverse(field, numerators);

        const result = new Array<bigint>(points.length);
        for (let i = 0; i < points.length; i++) {
            result[i] = field.mul(field.sub(points[i], this.xAtLastStep), numInverses[i % cycle]);
        }
        return result;
    }
}
