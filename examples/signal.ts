// IMPORTS
// ================================================================================================
import {
    PrivKey, createAccessSet, serializeSignal, parseSignal, MemoryNullifierRegistry, ReplayRejection
} from '../index';

// ACCESS SET PARAMETERS
// ================================================================================================
const memberCount = 6;
const topic = 'proposal-17';

// create keys for all members, and an access set from their public keys
const privKeys = new Array<PrivKey>(memberCount);
for (let i = 0; i < memberCount; i++) {
    privKeys[i] = PrivKey.generate();
}
const accessSet = createAccessSet(privKeys.map(key => key.getPublicKey()), { stark: { queryCount: 48 }, detailedLog: false });
console.log(`Access set of depth ${accessSet.depth} for ${accessSet.size} members`);

// TESTING
// ================================================================================================
// member 3 signals on the topic
const signal = accessSet.makeSignal(privKeys[3], topic);
console.log('-'.repeat(20));

// send the signal over the wire, and verify it on the other side
const buffer = serializeSignal(signal);
const received = parseSignal(buffer);
accessSet.verifySignal(topic, received);
console.log('-'.repeat(20));
console.log(`Signal size: ${Math.round(buffer.byteLength / 1024 * 100) / 100} KB`);
console.log(`Security level: ${accessSet.stark.securityLevel} bits`);

// the same member signaling again on the same topic produces the same nullifier
const registry = new MemoryNullifierRegistry();
registry.record(topic, received.nullifier);

const repeated = accessSet.makeSignal(privKeys[3], topic);
try {
    registry.record(topic, repeated.nullifier);
}
catch (error) {
    if (!(error instanceof ReplayRejection)) throw error;
    console.log(`Second signal rejected: ${error.message}`);
}
