export { EvaluationDomain } from './EvaluationDomain';
export { TracePolynomial } from './TracePolynomial';
export { PeriodicColumn } from './PeriodicColumn';
export { ZeroPolynomial } from './ZeroPolynomial';
export { BoundaryConstraints } from './BoundaryConstraints';
export { CompositionPolynomial, getCombinationDegree } from './CompositionPolynomial';
export { LowDegreeProver, getRowPositions, rehashMerkleProofValues } from './LowDegreeProver';
export type { FriCommitment } from './LowDegreeProver';
export { QueryIndexGenerator } from './QueryIndexGenerator';
