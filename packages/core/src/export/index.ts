// =============================================================================
// rseq-midi - Export Module Public API
// =============================================================================

// --- MIDI File ---
export { buildMidiFile } from './midi'
export type { MidiFileOptions } from './midi'

// --- Utilities ---
export {
  // VLQ encoding
  writeVLQ,
  VLQ_MAX,

  // Value conversion
  tempoToMicrosPerQuarter,
  signedBendToMidi
} from './midi-utils'
