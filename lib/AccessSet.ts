// IMPORTS
// ================================================================================================
import type {
    AccessSet as IAccessSet, AccessSetOptions, PrivKey, PubKey, Digest, MerklePath, Signal, Logger
} from 'rescue-semaphore';
import { MerkleTree, merge, hashTopic, isWellFormedTopic } from './hash';
import { SemaphoreAir, buildTrace } from './air';
import { Stark } from './Stark';
import { MAX_TREE_DEPTH, PADDING_LEAF, DIGEST_SIZE, MODULUS } from './config';
import { digestsEqual, noopLogger } from './utils';
import { WitnessError, VerificationFailure } from './errors';

// CLASS DEFINITION
// ================================================================================================
export class AccessSet implements IAccessSet {

    readonly depth      : number;
    readonly size       : number;
    readonly air        : SemaphoreAir;
    readonly stark      : Stark;

    private readonly tree   : MerkleTree;
    private readonly logger : Logger;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(publicKeys: readonly PubKey[], options: Partial<AccessSetOptions> = {}, logger: Logger = noopLogger) {
        if (!Array.isArray(publicKeys) || publicKeys.length === 0) {
            throw new TypeError('Access set must contain at least one public key');
        }

        const minDepth = Math.max(1, Math.ceil(Math.log2(publicKeys.length)));
        const depth = (options.depth === undefined) ? minDepth : options.depth;
        if (!Number.isInteger(depth) || depth < 1 || depth > MAX_TREE_DEPTH) {
            throw new TypeError(`Tree depth must be an integer between 1 and ${MAX_TREE_DEPTH}`);
        }
        if (depth < minDepth) {
            throw new TypeError(`A tree of depth ${depth} cannot hold ${publicKeys.length} public keys`);
        }

        const log = logger.start('Building access set');
        const leaves = publicKeys.map(key => key.elements.slice());
        this.tree = new MerkleTree(leaves, depth, merge, PADDING_LEAF.slice());
        log(`Built key tree of depth ${depth} for ${publicKeys.length} members`);

        this.depth = depth;
        this.size = publicKeys.length;
        this.air = new SemaphoreAir(depth);
        this.stark = new Stark(this.air, options.stark, logger);
        this.logger = logger;
        logger.done(log, 'Access set ready');
    }

    // PUBLIC ACCESSORS
    // --------------------------------------------------------------------------------------------
    get root(): Digest {
        return this.tree.root;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    pathFor(index: number): MerklePath {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            throw new WitnessError('InvalidIndex', `Member index ${index} is not in the range [0, ${this.size})`);
        }
        return this.tree.prove(index);
    }

    indexOf(publicKey: PubKey): number {
        for (let i = 0; i < this.size; i++) {
            if (digestsEqual(this.tree.getLeaf(i), publicKey.elements)) return i;
        }
        return -1;
    }

    makeSignal(privKey: PrivKey, topic: string): Signal {
        const leafIndex = this.indexOf(privKey.getPublicKey());
        if (leafIndex < 0) {
            throw new WitnessError('NotAMember', 'Public key of the provided private key is not in the access set');
        }

        const log = this.logger.start(`Making signal on topic '${topic}'`);
        const path = this.pathFor(leafIndex);
        const trace = buildTrace({ privKey, path, leafIndex, topic }, this.depth);
        log(`Built execution trace of ${trace.length} steps`);

        const assertions = this.air.buildAssertions(trace.inputs);
        const proof = this.stark.prove(assertions, trace.columns);
        this.logger.done(log, 'Signal created');

        return { topic, root: trace.inputs.root, nullifier: trace.inputs.nullifier, proof };
    }

    verifySignal(topic: string, signal: Signal): boolean {
        const log = this.logger.start(`Verifying signal on topic '${topic}'`);
        try {
            if (signal.topic !== topic) {
                throw new TypeError('Signal topic does not match');
            }
            if (!isWellFormedTopic(topic)) {
                throw new TypeError('Signal topic is not well-formed Unicode text');
            }
            if (!digestsEqual(signal.root, this.tree.root)) {
                throw new TypeError('Signal root does not match access set root');
            }
            validateDigest(signal.nullifier);

            const inputs = { root: this.tree.root, topicHash: hashTopic(topic), nullifier: signal.nullifier.slice() };
            const assertions = this.air.buildAssertions(inputs);
            this.stark.verify(assertions, signal.proof);
        }
        catch (error) {
            this.logger.done(log, `Signal rejected: ${error instanceof Error ? error.message : String(error)}`);
            throw new VerificationFailure();
        }

        this.logger.done(log, 'Signal verified');
        return true;
    }
}

// HELPER FUNCTIONS
// ================================================================================================
function validateDigest(digest: Digest) {
    if (!Array.isArray(digest) || digest.length !== DIGEST_SIZE) {
        throw new TypeError(`Nullifier must consist of ${DIGEST_SIZE} field elements`);
    }
    for (let element of digest) {
        if (typeof element !== 'bigint' || element < 0n || element >= MODULUS) {
            throw new TypeError('Nullifier contains an invalid field element');
        }
    }
}
