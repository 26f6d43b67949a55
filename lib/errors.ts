// IMPORTS
// ================================================================================================
import type { ConstraintFailure } from 'rescue-semaphore';

// BASE ERROR
// ================================================================================================
export class StarkError extends Error {

    constructor(message: string, cause?: unknown) {
        if (cause instanceof Error) {
            super(`${message}: ${cause.message}`);
        }
        else if (cause !== undefined) {
            super(`${message}: ${String(cause)}`);
        }
        else {
            super(message);
        }
        this.name = new.target.name;
    }
}

// WITNESS ERRORS
// ================================================================================================
export type WitnessErrorCode =
    | 'WitnessLengthMismatch'
    | 'IndexOutOfRange'
    | 'PathMismatch'
    | 'InvalidIndex'
    | 'InvalidKey'
    | 'InvalidTopic'
    | 'NotAMember';

/** Raised before any trace is built when the private witness is malformed */
export class WitnessError extends StarkError {

    readonly code: WitnessErrorCode;

    constructor(code: WitnessErrorCode, message: string) {
        super(message);
        this.code = code;
    }
}

// PROVING ERRORS
// ================================================================================================
export class ConstraintViolation extends StarkError {

    readonly failures: readonly ConstraintFailure[];

    constructor(failures: readonly ConstraintFailure[]) {
        const first = failures[0];
        const message = first
            ? `Constraint ${first.index} (${first.label}) didn't evaluate to 0 at step ${first.step}`
            : 'Execution trace violates constraints';
        super(failures.length > 1 ? `${message} (and ${failures.length - 1} more)` : message);
        this.failures = failures;
    }
}

// VERIFICATION ERRORS
// ================================================================================================

/** Signal was rejected; the reason is intentionally not included */
export class VerificationFailure extends StarkError {

    constructor() {
        super('Signal verification failed');
    }
}

export class ReplayRejection extends StarkError {

    readonly topic: string;

    constructor(topic: string) {
        super(`Nullifier has already been used for topic '${topic}'`);
        this.topic = topic;
    }
}
