// IMPORTS
// ================================================================================================
import type { NullifierRegistry, Digest } from 'rescue-semaphore';
import { digestToHex } from './utils';
import { ReplayRejection } from './errors';

// CLASS DEFINITION
// ================================================================================================
/** Keeps seen nullifiers in memory, keyed by topic */
export class MemoryNullifierRegistry implements NullifierRegistry {

    private readonly topics : Map<string, Set<string>>;
    private count           : number;

    constructor() {
        this.topics = new Map();
        this.count = 0;
    }

    get size(): number {
        return this.count;
    }

    has(topic: string, nullifier: Digest): boolean {
        const seen = this.topics.get(topic);
        return seen !== undefined && seen.has(digestToHex(nullifier));
    }

    record(topic: string, nullifier: Digest): void {
        let seen = this.topics.get(topic);
        if (seen === undefined) {
            seen = new Set();
            this.topics.set(topic, seen);
        }

        const key = digestToHex(nullifier);
        if (seen.has(key)) {
            throw new ReplayRejection(topic);
        }
        seen.add(key);
        this.count++;
    }
}
