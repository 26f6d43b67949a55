// IMPORTS
// ================================================================================================
import type { Air, Assertion, ConstraintFailure } from 'rescue-semaphore';

// PUBLIC FUNCTIONS
// ================================================================================================
/**
 * Evaluates every constraint of the AIR over the execution trace and returns the ones which do not
 * hold; transition constraints are checked on all steps except the last one.
 */
export function checkTrace(air: Air, columns: readonly (readonly bigint[])[], assertions: readonly Assertion[]): ConstraintFailure[] {
    if (columns.length !== air.traceWidth) {
        throw new TypeError(`Execution trace must have exactly ${air.traceWidth} columns`);
    }
    for (let column of columns) {
        if (column.length !== air.traceLength) {
            throw new TypeError(`Every column of the execution trace must have ${air.traceLength} steps`);
        }
    }

    const failures: ConstraintFailure[] = [];
    const transitions = air.constraints.filter(c => c.kind === 'transition');
    const result = new Array<bigint>(air.constraints.length).fill(air.field.zero);

    const current = new Array<bigint>(air.traceWidth);
    const next = new Array<bigint>(air.traceWidth);
    const periodic = new Array<bigint>(air.periodicColumns.length);

    for (let step = 0; step < air.traceLength - 1; step++) {
        for (let i = 0; i < air.traceWidth; i++) {
            current[i] = columns[i][step];
            next[i] = columns[i][step + 1];
        }
        for (let i = 0; i < periodic.length; i++) {
            let values = air.periodicColumns[i];
            periodic[i] = values[step % values.length];
        }

        air.evaluateTransition({ current, next, periodic }, result);
        for (let c of transitions) {
            if (result[c.index] !== air.field.zero) {
                failures.push({ index: c.index, label: c.label, step });
            }
        }
    }

    for (let a of assertions) {
        let descriptor = air.constraints[a.index];
        if (!descriptor || descriptor.kind !== 'boundary') {
            throw new TypeError(`Assertion index ${a.index} does not refer to a boundary constraint`);
        }
        if (a.column < 0 || a.column >= air.traceWidth || a.step < 0 || a.step >= air.traceLength) {
            throw new TypeError(`Assertion ${descriptor.label} refers to a cell outside of the execution trace`);
        }
        if (columns[a.column][a.step] !== a.value) {
            failures.push({ index: a.index, label: descriptor.label, step: a.step });
        }
    }

    return failures.sort((a, b) => (a.step - b.step) || (a.index - b.index));
}
