// IMPORTS
// ================================================================================================
import type { FiniteField } from '@guildofweavers/galois';
import type { Air, Assertion, ConstraintDescriptor, LogFunction } from 'rescue-semaphore';
import { EvaluationDomain } from './EvaluationDomain';
import { BoundaryConstraints } from './BoundaryConstraints';
import { ZeroPolynomial } from './ZeroPolynomial';
import { PeriodicColumn } from './PeriodicColumn';
import { StarkError } from '../errors';

// INTERFACES
// ================================================================================================
interface Term {
    /** coefficient applied to the term as is */
    readonly a          : bigint;

    /** coefficient applied to the term multiplied by x^exponent */
    readonly b          : bigint;

    /** raises the degree bound of the term to combinationDegree - 1 */
    readonly exponent   : bigint;
}

interface PointContext {
    readonly current        : readonly bigint[];
    readonly next           : readonly bigint[];
    readonly periodic       : readonly bigint[];
    readonly zInverse       : bigint;
    readonly divisors       : (step: number) => bigint;
    readonly power          : (exponent: bigint) => bigint;
}

// CLASS DEFINITION
// ================================================================================================
/**
 * Random linear combination of transition quotients, boundary quotients and trace polynomials.
 * Every term has its own pair of coefficients, taken by constraint index, and its degree is
 * adjusted so that an honest combination has degree below combinationDegree.
 */
export class CompositionPolynomial {

    readonly field                  : FiniteField;
    readonly combinationDegree      : number;

    private readonly air            : Air;
    private readonly domain         : EvaluationDomain;
    private readonly transitions    : readonly ConstraintDescriptor[];
    private readonly bPoly          : BoundaryConstraints;
    private readonly zPoly          : ZeroPolynomial;
    private readonly periodic       : readonly PeriodicColumn[];

    private readonly cTerms         : readonly Term[];
    private readonly pTerms         : readonly Term[];

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(air: Air, assertions: readonly Assertion[], seed: Buffer, domain: EvaluationDomain) {
        this.field = air.field;
        this.air = air;
        this.domain = domain;

        const n = air.traceLength;
        this.combinationDegree = getCombinationDegree(air);

        this.transitions = air.constraints.filter(c => c.kind === 'transition');
        this.bPoly = new BoundaryConstraints(assertions, domain);
        this.zPoly = new ZeroPolynomial(domain);
        this.periodic = air.periodicColumns.map(values => new PeriodicColumn(values, domain));

        // draw a pair of coefficients for every constraint and every trace column
        const termCount = air.constraints.length + air.traceWidth;
        const coefficients = this.field.prng(seed, 2 * termCount).toValues();
        const target = this.combinationDegree - 1;

        this.cTerms = air.constraints.map((c, i) => {
            if (c.index !== i) throw new StarkError(`Constraint ${c.label} is out of order`);
            let bound = (c.kind === 'transition') ? (c.degree - 1) * (n - 1) : n - 2;
            return buildTerm(coefficients, i, target - bound);
        });

        const pTerms = new Array<Term>(air.traceWidth);
        for (let i = 0; i < air.traceWidth; i++) {
            pTerms[i] = buildTerm(coefficients, air.constraints.length + i, target - (n - 1));
        }
        this.pTerms = pTerms;
    }

    // PROOF METHODS
    // --------------------------------------------------------------------------------------------
    /** Evaluates the combination over the entire evaluation domain */
    evaluateAll(pEvaluations: readonly (readonly bigint[])[], log: LogFunction): bigint[] {
        const field = this.field;
        const domain = this.domain;
        const points = domain.points;

        const zInverses = this.zPoly.evaluateInverses();
        const divisors = this.bPoly.getDivisors();
        log('Computed Z(x) and boundary divisor inverses');

        // x^e for every degree adjustment, computed as offset^e * (rootOfUnity^e)^i
        const powers = new Map<bigint, bigint[]>();
        for (let term of [...this.cTerms, ...this.pTerms]) {
            if (powers.has(term.exponent)) continue;
            let seed = field.exp(domain.rootOfUnity, term.exponent);
            let shift = field.exp(domain.offset, term.exponent);
            let series = field.getPowerSeries(seed, domain.size).toValues();
            powers.set(term.exponent, series.map(v => field.mul(v, shift)));
        }
        log('Computed degree adjustment powers');

        const width = this.air.traceWidth;
        const current = new Array<bigint>(width);
        const next = new Array<bigint>(width);
        const periodic = new Array<bigint>(this.periodic.length);
        const result = new Array<bigint>(points.length);

        for (let position = 0; position < points.length; position++) {
            let nextPosition = domain.getNextPosition(position);
            for (let i = 0; i < width; i++) {
                current[i] = pEvaluations[i][position];
                next[i] = pEvaluations[i][nextPosition];
            }
            for (let i = 0; i < periodic.length; i++) {
                periodic[i] = this.periodic[i].getValue(position);
            }

            result[position] = this.combine({
                current, next, periodic,
                zInverse    : zInverses[position],
                divisors    : step => getValue(divisors, step)[position],
                power       : exponent => getValue(powers, exponent)[position]
            });
        }
        log('Combined constraint quotients with trace polynomials');

        return result;
    }

    // VERIFICATION METHODS
    // --------------------------------------------------------------------------------------------
    /** Evaluates the combination at a single point given trace values at x and at the next step */
    evaluateAt(x: bigint, current: readonly bigint[], next: readonly bigint[]): bigint {
        const zValue = this.zPoly.evaluateAt(x);
        const divisors = this.bPoly.getDivisorsAt(x);
        const periodic = this.periodic.map(column => column.getValueAt(x));

        return this.combine({
            current, next, periodic,
            zInverse    : this.field.inv(zValue),
            divisors    : step => getValue(divisors, step),
            power       : exponent => this.field.exp(x, exponent)
        });
    }

    // HELPER METHODS
    // --------------------------------------------------------------------------------------------
    private combine(point: PointContext): bigint {
        const field = this.field;

        // transition constraints divided by Z(x)
        const qValues = new Array<bigint>(this.air.constraints.length).fill(field.zero);
        this.air.evaluateTransition({ current: point.current, next: point.next, periodic: point.periodic }, qValues);

        let result = field.zero;
        for (let c of this.transitions) {
            let value = field.mul(qValues[c.index], point.zInverse);
            result = field.add(result, this.applyTerm(this.cTerms[c.index], value, point));
        }

        // boundary constraints, each with its own divisor
        for (let a of this.bPoly.assertions) {
            let value = this.bPoly.evaluate(a, point.current[a.column], point.divisors(a.step));
            result = field.add(result, this.applyTerm(this.cTerms[a.index], value, point));
        }

        // trace polynomials
        for (let i = 0; i < this.pTerms.length; i++) {
            result = field.add(result, this.applyTerm(this.pTerms[i], point.current[i], point));
        }

        return result;
    }

    private applyTerm(term: Term, value: bigint, point: PointContext): bigint {
        const factor = this.field.add(term.a, this.field.mul(term.b, point.power(term.exponent)));
        return this.field.mul(value, factor);
    }
}

// PUBLIC FUNCTIONS
// ================================================================================================
/** Smallest power of 2 multiple of trace length which bounds the degree of every adjusted term */
export function getCombinationDegree(air: Air): number {
    let maxDegree = 1;
    for (let c of air.constraints) {
        if (c.degree > maxDegree) maxDegree = c.degree;
    }
    return 2**Math.ceil(Math.log2(maxDegree)) * air.traceLength;
}

// HELPER FUNCTIONS
// ================================================================================================

function buildTerm(coefficients: readonly bigint[], index: number, exponent: number): Term {
    if (exponent < 0) {
        throw new StarkError(`Degree of composition term ${index} exceeds combination degree`);
    }
    return { a: coefficients[2 * index], b: coefficients[2 * index + 1], exponent: BigInt(exponent) };
}

function getValue<K, V>(map: Map<K, V>, key: K): V {
    const value = map.get(key);
    if (value === undefined) {
        throw new StarkError(`Composition value for ${String(key)} is missing`);
    }
    return value;
}
