// =============================================================================
// rseq-midi - Container Types
// =============================================================================

import type { LabelTable } from './labels'

/** Tag of the top-level header, in file byte order. */
export const RSEQ_TAG = 'RSEQ'

/** Byte-order marker and version, read big-endian. */
export const RSEQ_MAGIC = 0xFEFF0100

/**
 * Sub-chunk tags.
 */
export const CHUNK = {
  /** Bytecode region */
  DATA: 'DATA',
  /** Offset labels */
  LABL: 'LABL'
} as const

export type ChunkTag = typeof CHUNK[keyof typeof CHUNK]

/**
 * Top-level header fields.
 */
export interface RseqHeader {
  tag: string
  magic: number
  /** Total file size as declared */
  size: number
  /** Header size in bytes; sub-chunks start this far from the container start */
  headerSize: number
  /** Number of sub-chunks */
  chunkCount: number
}

/**
 * A sub-chunk seen while walking the container.
 */
export interface ChunkDescriptor {
  tag: string
  /** Absolute offset of the chunk start */
  offset: number
  /** Declared size including tag and size fields */
  size: number
}

/**
 * Everything the scheduler needs from a parsed container.
 */
export interface RseqContainer {
  header: RseqHeader
  chunks: ChunkDescriptor[]
  /** Absolute offset of the bytecode region */
  dataOffset: number
  labels: LabelTable
}
