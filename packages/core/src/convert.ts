// =============================================================================
// rseq-midi - Conversion Entry Point
// =============================================================================

import type { DecoderOptions } from './options'
import { resolveDecoderOptions } from './options'
import { readContainer } from './container/reader'
import { Scheduler } from './vm/scheduler'
import { buildMidiFile } from './export/midi'
import { OUTPUT_PPQ } from './vm/constants'

/**
 * A track that made it into the output file.
 */
export interface ConvertedTrack {
  /** Track slot (and MIDI channel) 0-15 */
  index: number
  /** Length of the track's event stream */
  byteLength: number
}

export interface ConversionResult {
  /** Complete Standard MIDI File */
  midi: Uint8Array
  /** Number of MTrk chunks in `midi` */
  trackCount: number
  /** Emitted tracks in file order */
  tracks: ConvertedTrack[]
}

/**
 * Convert an RSEQ file image to a format 1 Standard MIDI File.
 *
 * @throws ContainerInvalidError if the container header is invalid
 * @throws MissingRequiredChunkError if the container has no DATA chunk
 *
 * @example
 * ```typescript
 * const { midi, tracks } = convertRseq(bytes, { ignoreJumps: true })
 * ```
 */
export function convertRseq(bytes: Uint8Array, options: DecoderOptions = {}): ConversionResult {
  const resolved = resolveDecoderOptions(options)
  const container = readContainer(bytes, { logger: resolved.logger })
  const { tracks } = new Scheduler(bytes, container, resolved).run()

  const emitted = tracks.filter((track) => track.data.length > 0)
  const midi = buildMidiFile(emitted.map((track) => track.data), { ppq: OUTPUT_PPQ })

  return {
    midi,
    trackCount: emitted.length,
    tracks: emitted.map((track) => ({ index: track.index, byteLength: track.data.length }))
  }
}
