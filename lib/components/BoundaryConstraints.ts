// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { Assertion } from 'rescue-semaphore';
import { EvaluationDomain } from './EvaluationDomain';
import { batchInverse } from '../utils';

// CLASS DEFINITION
// ================================================================================================
/**
 * Each assertion becomes its own quotient B(x) = (P(x) - v) / (x - x_step), where P(x) is the
 * polynomial of the asserted column.
 */
export class BoundaryConstraints {

    readonly field          : FiniteField;
    readonly assertions     : readonly Assertion[];

    /** x coordinate of every asserted step */
    private readonly steps  : Map<number, bigint>;
    private readonly domain : EvaluationDomain;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(assertions: readonly Assertion[], domain: EvaluationDomain) {
        this.field = domain.field;
        this.domain = domain;
        this.assertions = assertions;

        this.steps = new Map();
        for (let a of assertions) {
            if (!this.steps.has(a.step)) {
                this.steps.set(a.step, domain.getStepPoint(a.step));
            }
        }
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    get count(): number {
        return this.assertions.length;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    /** Returns 1 / (x - x_step) for each asserted step at the provided point */
    getDivisorsAt(x: bigint): Map<number, bigint> {
        const result = new Map<number, bigint>();
        for (let [step, xs] of this.steps) {
            result.set(step, this.field.inv(this.field.sub(x, xs)));
        }
        return result;
    }

    /** Returns 1 / (x - x_step) for each asserted step over the entire evaluation domain */
    getDivisors(): Map<number, bigint[]> {
        const points = this.domain.points;
        const result = new Map<number, bigint[]>();
        for (let [step, xs] of this.steps) {
            let denominators = points.map(x => this.field.sub(x, xs));
            result.set(step, batchInverse(this.field, denominators));
        }
        return result;
    }

    /** B(x) for a single assertion, given the asserted column's value and the step divisor at x */
    evaluate(assertion: Assertion, pValue: bigint, divisor: bigint): bigint {
        return this.field.mul(this.field.sub(pValue, assertion.value), divisor);
    }
}
