export { ProbabilisticSet } from './ProbabilisticSet'
export type { ProbabilisticSetOptions, ProbabilisticSetStats } from './ProbabilisticSet'
export { BitVector, byteLengthFor } from './bits'
export { MAX_SIZE, resolveProbeCount, toProbeStrategy, validateSize } from './params'
export type { ProbeStrategy, ProbeCountOptions } from './params'
export { encodeSnapshot, decodeSnapshot, decodeSnapshotHeader } from './snapshot'
export type { SnapshotHeader } from './snapshot'
