// =============================================================================
// rseq-midi - MIDI File Writer
// =============================================================================

import {
  writeUint16BE,
  writeUint32BE,
  writeAscii,
  concatArrays
} from './midi-utils'
import { OUTPUT_PPQ } from '../vm/constants'

/**
 * Options for MIDI file assembly.
 */
export interface MidiFileOptions {
  /**
   * Pulses (ticks) per quarter note.
   * @default 96
   */
  ppq?: number
}

/**
 * Build a format 1 Standard MIDI File from raw track event streams.
 *
 * Each buffer must already hold delta-timed events ending in an
 * end-of-track meta event. Empty buffers are left out, and the header's
 * track count only counts the ones written.
 *
 * @example
 * ```typescript
 * const { tracks } = new Scheduler(bytes, container).run()
 * const midi = buildMidiFile(tracks.map((t) => t.data))
 * ```
 */
export function buildMidiFile(tracks: readonly Uint8Array[], options: MidiFileOptions = {}): Uint8Array {
  const ppq = options.ppq ?? OUTPUT_PPQ
  const nonEmpty = tracks.filter((track) => track.length > 0)

  const chunks: Uint8Array[] = [buildHeaderChunk(1, nonEmpty.length, ppq)]
  for (const track of nonEmpty) {
    chunks.push(buildTrackChunk(track))
  }

  return concatArrays(...chunks)
}

function buildHeaderChunk(format: 0 | 1, trackCount: number, ppq: number): Uint8Array {
  return concatArrays(
    writeAscii('MThd'),           // Chunk ID
    writeUint32BE(6),             // Chunk length (always 6 for header)
    writeUint16BE(format),        // Format type
    writeUint16BE(trackCount),    // Number of tracks
    writeUint16BE(ppq)            // Time division (PPQ)
  )
}

function buildTrackChunk(trackData: Uint8Array): Uint8Array {
  return concatArrays(
    writeAscii('MTrk'),              // Chunk ID
    writeUint32BE(trackData.length), // Chunk length
    trackData                        // Track data
  )
}
