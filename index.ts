// IMPORTS
// ================================================================================================
import type { AccessSetOptions, PubKey, Signal, Logger } from 'rescue-semaphore';
import { AccessSet } from './lib/AccessSet';
import { Serializer } from './lib/Serializer';
import { TRACE_WIDTH } from './lib/air/layout';
import { field } from './lib/hash';
import { HASH_DIGEST_SIZE } from './lib/config';
import { Logger as ConsoleLogger, noopLogger } from './lib/utils';

// RE-EXPORTS
// ================================================================================================
export { AccessSet } from './lib/AccessSet';
export { PrivKey, PubKey } from './lib/keys';
export { MemoryNullifierRegistry } from './lib/NullifierRegistry';
export { Stark } from './lib/Stark';
export { SemaphoreAir, ConstraintAllocator, buildTrace, checkTrace } from './lib/air';
export { Rescue, rescue, field, hashPublicKey, hashNullifier, hashTopic, merge } from './lib/hash';
export { StarkError, WitnessError, ConstraintViolation, VerificationFailure, ReplayRejection } from './lib/errors';
export { createPrimeField } from '@guildofweavers/galois';

// MODULE VARIABLES
// ================================================================================================
const signalSerializer = new Serializer({ field, traceWidth: TRACE_WIDTH }, HASH_DIGEST_SIZE);

// PUBLIC FUNCTIONS
// ================================================================================================
export function createAccessSet(publicKeys: PubKey[], options?: Partial<AccessSetOptions>, logger?: Logger | null): AccessSet {
    if (logger === null) {
        logger = noopLogger;
    }
    else if (logger === undefined) {
        logger = new ConsoleLogger(options ? options.detailedLog : undefined);
    }

    return new AccessSet(publicKeys, options, logger);
}

export function serializeSignal(signal: Signal): Buffer {
    return signalSerializer.serializeSignal(signal);
}

export function parseSignal(buffer: Buffer): Signal {
    return signalSerializer.parseSignal(buffer);
}
