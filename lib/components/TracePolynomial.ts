// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import { EvaluationDomain } from './EvaluationDomain';

// CLASS DEFINITION
// ================================================================================================
export class TracePolynomial {

    readonly field      : FiniteField;
    readonly domain     : EvaluationDomain;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(domain: EvaluationDomain) {
        this.field = domain.field;
        this.domain = domain;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    /** Interpolates each column over the execution domain and extends it to the evaluation domain */
    evaluate(executionTrace: readonly (readonly bigint[])[]): bigint[][] {

        const columnCount = executionTrace.length;
        const executionDomain = this.domain.executionDomain;

        // for each column in the execution trace, compute a polynomial and low-degree extend it
        const result = new Array<bigint[]>(columnCount);
        for (let column = 0; column < columnCount; column++) {
            let values = this.field.newVectorFrom(executionTrace[column].slice());
            let p = this.field.interpolateRoots(executionDomain, values).toValues();
            result[column] = this.domain.evaluateOverCoset(p, this.domain.roots, this.domain.offset);
        }

        return result;
    }
}
