// RE-EXPORTS
// ================================================================================================
export { SemaphoreAir } from './SemaphoreAir';
export { ConstraintAllocator } from './ConstraintAllocator';
export { checkTrace } from './checkTrace';
export { buildTrace, writeCycle, readDigest, readNullifierKey } from './TraceBuilder';
export type { TraceOptions, TracePadding, SemaphoreTrace } from './TraceBuilder';
export * as layout from './layout';
