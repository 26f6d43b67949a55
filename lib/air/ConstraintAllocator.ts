// IMPORTS
// ================================================================================================
import type { ConstraintDescriptor, ConstraintKind } from 'rescue-semaphore';

// CLASS DEFINITION
// ================================================================================================
/**
 * Hands out constraint indexes. Every constraint of an AIR, transition or boundary, must take its
 * slot from the same allocator so that no two checks end up folded into the same composition term.
 */
export class ConstraintAllocator {

    private readonly descriptors    : ConstraintDescriptor[];
    private readonly labels         : Set<string>;
    private sealed                  : boolean;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor() {
        this.descriptors = [];
        this.labels = new Set();
        this.sealed = false;
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    get count(): number {
        return this.descriptors.length;
    }

    get constraints(): readonly ConstraintDescriptor[] {
        return this.descriptors;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    allocate(label: string, kind: ConstraintKind, degree: number): number {
        if (this.sealed) {
            throw new Error(`Cannot allocate constraint ${label}: allocator has been sealed`);
        }
        if (this.labels.has(label)) {
            throw new Error(`Constraint ${label} has already been allocated`);
        }
        if (!Number.isInteger(degree) || degree < 1) {
            throw new TypeError(`Degree of constraint ${label} must be a positive integer`);
        }

        const index = this.descriptors.length;
        this.descriptors.push(Object.freeze({ index, label, kind, degree }));
        this.labels.add(label);
        return index;
    }

    /** Allocates a contiguous group of constraints labeled `${label}[i]` */
    allocateMany(label: string, count: number, kind: ConstraintKind, degree: number): number[] {
        const result = new Array<number>(count);
        for (let i = 0; i < count; i++) {
            result[i] = this.allocate(`${label}[${i}]`, kind, degree);
        }
        return result;
    }

    /** Prevents further allocation and returns the full list of descriptors */
    seal(): readonly ConstraintDescriptor[] {
        this.sealed = true;
        return Object.freeze(this.descriptors.slice());
    }
}
