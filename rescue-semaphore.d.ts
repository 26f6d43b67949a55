declare module 'rescue-semaphore' {

    // IMPORTS
    // --------------------------------------------------------------------------------------------
    import { FiniteField } from '@guildofweavers/galois';
    import { HashAlgorithm, BatchMerkleProof } from '@guildofweavers/merkle';

    // RE-EXPORTS
    // --------------------------------------------------------------------------------------------
    export { FiniteField, createPrimeField } from '@guildofweavers/galois';
    export { HashAlgorithm, BatchMerkleProof } from '@guildofweavers/merkle';

    // PUBLIC FUNCTIONS
    // --------------------------------------------------------------------------------------------

    /**
     * Creates an access set for the provided public keys.
     * @param publicKeys Public keys of all members of the group.
     * @param options Tree depth and security options for the STARK used to prove signals.
     * @param logger Optional logger; defaults to console logging; set to null to disable.
     */
    export function createAccessSet(publicKeys: PubKey[], options?: Partial<AccessSetOptions>, logger?: Logger | null): AccessSet;

    /** Writes a signal (including its proof) into a buffer */
    export function serializeSignal(signal: Signal): Buffer;

    /** Reads a signal from the provided buffer */
    export function parseSignal(buffer: Buffer): Signal;

    // FIELD ELEMENTS
    // --------------------------------------------------------------------------------------------

    /** Output of the hash function: 4 field elements */
    export type Digest = bigint[];

    /** Capacity portion of the permutation state which separates one use of the hash from another */
    export interface HashDomain {
        readonly name       : string;
        readonly capacity   : readonly bigint[];
    }

    // KEYS
    // --------------------------------------------------------------------------------------------
    export class PrivKey {

        /** Private key elements; 4 field elements */
        readonly elements: readonly bigint[];

        /** Creates a private key from 4 field elements */
        constructor(elements: bigint[]);

        /** Generates a random private key */
        static generate(): PrivKey;

        /** Parses a private key from a 32-byte hex string */
        static parse(hex: string): PrivKey;

        /** Derives the public key for this private key */
        getPublicKey(): PubKey;

        toString(): string;
    }

    export class PubKey {

        /** Public key elements; 4 field elements */
        readonly elements: readonly bigint[];

        constructor(elements: bigint[]);

        /** Parses a public key from a 32-byte hex string */
        static parse(hex: string): PubKey;

        equals(other: PubKey): boolean;
        toString(): string;
    }

    // ACCESS SET
    // --------------------------------------------------------------------------------------------
    export interface AccessSetOptions {

        /** Depth of the key tree; defaults to the smallest depth which fits all keys */
        readonly depth: number;

        /** Security options for the STARK used to prove signals */
        readonly stark: Partial<StarkOptions>;

        /** Whether the console logger also reports prover sub-steps; defaults to true */
        readonly detailedLog: boolean;
    }

    export class AccessSet {

        /** Root of the Merkle tree built from member public keys */
        readonly root: Digest;

        /** Depth of the Merkle tree */
        readonly depth: number;

        /** Number of members in the set */
        readonly size: number;

        /**
         * Returns a Merkle path for the member at the specified index.
         * @param index Index of the member's leaf; must be smaller than the member count.
         */
        pathFor(index: number): MerklePath;

        /** Returns index of the provided public key, or -1 if the key is not in the set */
        indexOf(publicKey: PubKey): number;

        /**
         * Creates a signal on the specified topic and a STARK proof that the signal was created by
         * a member of this set.
         * @param privKey Private key of a member.
         * @param topic Topic of the signal.
         */
        makeSignal(privKey: PrivKey, topic: string): Signal;

        /**
         * Verifies a signal against the specified topic; throws VerificationFailure if the signal
         * is not valid.
         */
        verifySignal(topic: string, signal: Signal): boolean;
    }

    /** Ordered sequence of nodes from the leaf level up to the root */
    export type MerklePath = MerklePathNode[];

    export interface MerklePathNode {

        /** Hash of the sibling node at this level */
        readonly sibling: Digest;

        /** 0 when the accumulated hash is the left child at this level, 1 otherwise */
        readonly bit: number;
    }

    // SIGNALS
    // --------------------------------------------------------------------------------------------
    export interface Signal {
        readonly topic      : string;
        readonly root       : Digest;
        readonly nullifier  : Digest;
        readonly proof      : StarkProof;
    }

    export interface NullifierRegistry {

        /** Returns true if the nullifier has already been recorded for the topic */
        has(topic: string, nullifier: Digest): boolean;

        /** Records the nullifier for the topic; throws ReplayRejection if it was seen before */
        record(topic: string, nullifier: Digest): void;
    }

    export class MemoryNullifierRegistry implements NullifierRegistry {
        readonly size: number;
        has(topic: string, nullifier: Digest): boolean;
        record(topic: string, nullifier: Digest): void;
    }

    // SEMAPHORE AIR
    // --------------------------------------------------------------------------------------------
    export interface PublicInputs {

        /** Root of the access set tree */
        readonly root       : Digest;

        /** Hash of the signal topic */
        readonly topicHash  : Digest;

        /** Nullifier claimed by the signal */
        readonly nullifier  : Digest;
    }

    export interface Witness {
        readonly privKey    : PrivKey;
        readonly path       : MerklePath;
        readonly leafIndex  : number;
        readonly topic      : string;
    }

    export class SemaphoreAir implements Air {
        readonly field              : FiniteField;
        readonly depth              : number;
        readonly traceWidth         : number;
        readonly traceLength        : number;
        readonly constraints        : readonly ConstraintDescriptor[];
        readonly periodicColumns    : readonly (readonly bigint[])[];
        readonly maxConstraintDegree: number;

        /** Creates the constraint system for signals from a tree of the specified depth */
        constructor(depth: number);

        /** Builds boundary assertions which tie a trace to the provided public inputs */
        buildAssertions(inputs: PublicInputs): Assertion[];

        /** Returns all constraints which do not hold over the provided trace */
        checkTrace(columns: readonly (readonly bigint[])[], inputs: PublicInputs): ConstraintFailure[];

        evaluateTransition(frame: EvaluationFrame, result: bigint[]): void;
    }

    /** Lays out the execution trace of a signal for a tree of the specified depth */
    export function buildTrace(witness: Witness, depth: number): { columns: bigint[][], length: number, inputs: PublicInputs };

    // STARK
    // --------------------------------------------------------------------------------------------
    export class Stark {

        readonly air            : Air;
        readonly options        : StarkOptions;
        readonly securityLevel  : number;

        constructor(air: Air, options?: Partial<StarkOptions>, logger?: Logger);

        /** Checks the trace against all constraints and proves it; throws ConstraintViolation otherwise */
        prove(assertions: readonly Assertion[], executionTrace: readonly (readonly bigint[])[]): StarkProof;

        /** Verifies the proof against the provided assertions; throws StarkError if it is not valid */
        verify(assertions: readonly Assertion[], proof: StarkProof): boolean;

        sizeOf(proof: StarkProof): number;
        serialize(proof: StarkProof): Buffer;
        parse(buffer: Buffer): StarkProof;
    }

    export interface StarkOptions {
        /**
         * Execution trace extension factor; defaults to the smallest power of 2 greater than 2x
         * of the composition blow-up factor
         */
        readonly extensionFactor: number;

        /** Number of spot checks of the execution trace and the low degree proof; defaults to 40 */
        readonly queryCount: number;

        /** Hash algorithm for Merkle trees; defaults to sha256 */
        readonly hashAlgorithm: HashAlgorithm;
    }

    export interface StarkProof {
        traceRoot   : Buffer;
        traceProof  : BatchMerkleProof;
        ldProof     : LowDegreeProof;
    }

    export interface LowDegreeProof {
        lcRoot      : Buffer;
        lcProof     : BatchMerkleProof;
        components  : FriComponent[];
        remainder   : bigint[];
    }

    export interface FriComponent {
        columnRoot  : Buffer;
        columnProof : BatchMerkleProof;
    }

    // CONSTRAINTS
    // --------------------------------------------------------------------------------------------
    export type ConstraintKind = 'transition' | 'boundary';

    export interface ConstraintDescriptor {

        /** Position of the constraint in the composition; unique across all constraints */
        readonly index      : number;

        /** Human-readable name of the check */
        readonly label      : string;
        readonly kind       : ConstraintKind;

        /** Degree of the constraint expressed in multiples of trace length */
        readonly degree     : number;
    }

    export interface Assertion {

        /** index of the constraint slot taken by this assertion */
        readonly index      : number;

        /** trace column to which the assertion applies */
        readonly column     : number;

        /** step in the execution trace */
        readonly step       : number;

        /** value that the column should have at the specified step */
        readonly value      : bigint;
    }

    export interface EvaluationFrame {
        readonly current    : readonly bigint[];
        readonly next       : readonly bigint[];
        readonly periodic   : readonly bigint[];
    }

    export interface Air {
        readonly field              : FiniteField;
        readonly traceWidth         : number;
        readonly traceLength        : number;
        readonly constraints        : readonly ConstraintDescriptor[];

        /** Highest degree among all constraints */
        readonly maxConstraintDegree: number;

        /** Values of each periodic column over a single period; period lengths must be powers of 2 */
        readonly periodicColumns    : readonly (readonly bigint[])[];

        /**
         * Evaluates transition constraints for a pair of consecutive rows; each result is written
         * into the slot given by the constraint's index.
         */
        evaluateTransition(frame: EvaluationFrame, result: bigint[]): void;
    }

    export interface ConstraintFailure {
        readonly index  : number;
        readonly label  : string;
        readonly step   : number;
    }

    // ERRORS
    // --------------------------------------------------------------------------------------------
    export class StarkError extends Error {
        constructor(message: string, cause?: unknown);
    }

    export type WitnessErrorCode = 'WitnessLengthMismatch' | 'IndexOutOfRange' | 'PathMismatch'
        | 'InvalidIndex' | 'InvalidKey' | 'InvalidTopic' | 'NotAMember';

    export class WitnessError extends StarkError {
        readonly code: WitnessErrorCode;
    }

    export class ConstraintViolation extends StarkError {
        readonly failures: readonly ConstraintFailure[];
    }

    export class VerificationFailure extends StarkError {}

    export class ReplayRejection extends StarkError {
        readonly topic: string;
    }

    // UTILITIES
    // --------------------------------------------------------------------------------------------
    export interface Logger {
        start(message?: string, prefix?: string) : LogFunction;
        sub(message?: string): LogFunction;
        done(log: LogFunction, message?: string): void;
    }

    export type LogFunction = (message: string) => void;
}
