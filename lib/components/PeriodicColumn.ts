// IMPORTS
// ================================================================================================
import type { FiniteField, Vector } from '@guildofweavers/galois';
import { EvaluationDomain } from './EvaluationDomain';
import { isPowerOf2 } from '../utils';

// CLASS DEFINITION
// ================================================================================================
/**
 * A column whose values repeat every `period` steps. The values are interpolated over the
 * period-th roots of unity, so the column's value at x is P(x^(traceLength / period)).
 */
export class PeriodicColumn {

    readonly field          : FiniteField;
    readonly period         : number;
    readonly stretch        : bigint;
    readonly poly           : Vector;

    private readonly domain : EvaluationDomain;
    private extendedValues? : bigint[];

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(values: readonly bigint[], domain: EvaluationDomain) {
        if (values.length < 2 || !isPowerOf2(values.length)) {
            throw new TypeError('Period of a periodic column must be a power of 2 greater than 1');
        }
        if (values.length > domain.traceLength) {
            throw new TypeError('Period of a periodic column cannot exceed trace length');
        }

        this.field = domain.field;
        this.domain = domain;
        this.period = values.length;
        this.stretch = BigInt(domain.traceLength / values.length);

        const g = this.field.exp(domain.traceRootOfUnity, this.stretch);
        const roots = this.field.getPowerSeries(g, this.period);
        this.poly = this.field.interpolateRoots(roots, this.field.newVectorFrom(values.slice()));
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    /** Returns the column value at the specified position of the evaluation domain */
    getValue(position: number): bigint {
        const values = this.getExtendedValues();
        return values[position % values.length];
    }

    getValueAt(x: bigint): bigint {
        const xp = this.field.exp(x, this.stretch);
        return this.field.evalPolyAt(this.poly, xp);
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    /**
     * The column repeats every period * extensionFactor positions of the evaluation domain, so
     * only one cycle of extended values is kept.
     */
    private getExtendedValues(): bigint[] {
        if (!this.extendedValues) {
            const cycleLength = this.period * this.domain.extensionFactor;
            const root = this.field.exp(this.domain.rootOfUnity, this.stretch);
            const roots = this.field.getPowerSeries(root, cycleLength);
            const shift = this.field.exp(this.domain.offset, this.stretch);
            this.extendedValues = this.domain.evaluateOverCoset(this.poly.toValues(), roots, shift);
        }
        return this.extendedValues;
    }
}
