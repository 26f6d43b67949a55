// IMPORTS
// ================================================================================================
import { STATE_WIDTH, CAPACITY, DIGEST_SIZE, ROUNDS } from '../config';

// CYCLES
// ================================================================================================
/** Rows per hash invocation: the initial state followed by the state after each round */
export const CYCLE_LENGTH = ROUNDS + 1;

export const MIN_TRACE_LENGTH = 16;

// MERKLE LANE
// ================================================================================================
export const MERKLE_LANE = 0;
export const MERKLE_CAPACITY = MERKLE_LANE;
export const MERKLE_RATE = MERKLE_LANE + CAPACITY;

/** Left operand of a merge; holds the accumulated hash when the level's bit is 0 */
export const MERKLE_LEFT = MERKLE_RATE;

/** Right operand of a merge; holds the accumulated hash when the level's bit is 1 */
export const MERKLE_RIGHT = MERKLE_RATE + DIGEST_SIZE;

// NULLIFIER LANE
// ================================================================================================
export const NULLIFIER_LANE = MERKLE_LANE + STATE_WIDTH;
export const NULLIFIER_CAPACITY = NULLIFIER_LANE;
export const NULLIFIER_KEY = NULLIFIER_LANE + CAPACITY;
export const NULLIFIER_TOPIC = NULLIFIER_KEY + DIGEST_SIZE;

/** Digest of the nullifier hash at the last row of the first cycle */
export const NULLIFIER_OUTPUT = NULLIFIER_KEY;

// OTHER COLUMNS
// ================================================================================================
export const INDEX_BIT = NULLIFIER_LANE + STATE_WIDTH;
export const TRACE_WIDTH = INDEX_BIT + 1;

// PUBLIC FUNCTIONS
// ================================================================================================
export function getTraceLength(depth: number): number {
    const steps = CYCLE_LENGTH * (depth + 1);
    return Math.max(MIN_TRACE_LENGTH, 2**Math.ceil(Math.log2(steps)));
}

/** Last row of the cycle which produces the root of the tree */
export function getRootStep(depth: number): number {
    return CYCLE_LENGTH * (depth + 1) - 1;
}
