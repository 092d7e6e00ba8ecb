// =============================================================================
// rseq-midi - Container Module
// =============================================================================

export { readContainer } from './reader'
export type { ReadContainerOptions } from './reader'
export { LabelTable, EMPTY_LABELS } from './labels'
export { RSEQ_TAG, RSEQ_MAGIC, CHUNK } from './types'
export type { RseqHeader, RseqContainer, ChunkDescriptor, ChunkTag } from './types'
