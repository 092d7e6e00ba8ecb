// =============================================================================
// rseq-midi - VM Types
// =============================================================================

import type { LabelTable } from '../container/labels'
import type { ResolvedDecoderOptions } from '../options'

/**
 * The only way a track reaches another track: starting it.
 */
export interface TrackHost {
  start(index: number, address: number): void
}

/**
 * Read-only context shared by every track of one run.
 */
export interface TrackContext {
  /** Absolute offset of the bytecode region */
  dataOffset: number
  labels: LabelTable
  options: ResolvedDecoderOptions
  host: TrackHost
}

/**
 * Output of one track after the run.
 */
export interface TrackOutput {
  index: number
  /** Delta-timed event stream, empty if the track never ran */
  data: Uint8Array
}

/**
 * Result of running the scheduler to quiescence.
 */
export interface SchedulerResult {
  /** One entry per track slot, in index order */
  tracks: TrackOutput[]
  /** Full passes over the track slots */
  passes: number
  /** Instructions executed across all tracks */
  steps: number
}
