// =============================================================================
// rseq-midi - Sequence Bytecode Constants
// =============================================================================
// All bytecode values use hexadecimal notation to match the on-disk format.

/**
 * Number of independently schedulable tracks (one per MIDI channel).
 */
export const TRACK_COUNT = 16

/**
 * Output tick resolution (pulses per quarter note).
 */
export const OUTPUT_PPQ = 96

/**
 * Microseconds per minute, used to turn the sequence tempo into the
 * MIDI microseconds-per-quarter-note value.
 */
export const MICROSECONDS_PER_MINUTE = 60_000_000

/**
 * Center value of the 14-bit MIDI pitch bend range.
 */
export const PITCH_BEND_CENTER = 0x2000

// =============================================================================
// Opcodes
// =============================================================================

/**
 * Sequence opcodes. Any selector below 0x80 is an implicit note-on whose
 * selector is the key.
 */
export const OP = {
  // --- Flow ---
  /** WAIT ticks:vlq - Advance the track clock */
  WAIT: 0x80,
  /** PROGRAM prg:u8 [bank:u8 [bank:u8]] - Program change */
  PROGRAM: 0x81,
  /** SPLIT track:u8 offset:u24 - Start another track */
  SPLIT: 0x88,
  /** JUMP offset:u24 - Forward jump or loop-back */
  JUMP: 0x89,
  /** CALL offset:u24 - Single-level subroutine call */
  CALL: 0x8A,

  // --- Single-byte parameters ---
  /** UNKNOWN_B0 arg:u8 - No known meaning */
  UNKNOWN_B0: 0xB0,
  PAN: 0xC0,
  VOLUME: 0xC1,
  MASTER_VOLUME: 0xC2,
  /** TRANSPOSE semitones:s8 */
  TRANSPOSE: 0xC3,
  /** PITCH_BEND amount:s8 */
  PITCH_BEND: 0xC4,
  PITCH_BEND_RANGE: 0xC5,
  PRIORITY: 0xC6,
  POLYPHONY: 0xC7,
  TIE: 0xC8,
  PORTAMENTO_CONTROL: 0xC9,
  MOD_DEPTH: 0xCA,
  MOD_SPEED: 0xCB,
  MOD_TYPE: 0xCC,
  MOD_RANGE: 0xCD,
  PORTAMENTO: 0xCE,
  PORTAMENTO_TIME: 0xCF,
  ATTACK: 0xD0,
  DECAY: 0xD1,
  SUSTAIN: 0xD2,
  RELEASE: 0xD3,
  /** LOOP_START - Marker, no arguments */
  LOOP_START: 0xD4,
  EXPRESSION: 0xD5,
  PRINT: 0xD6,
  UNKNOWN_D8: 0xD8,
  UNKNOWN_D9: 0xD9,
  UNKNOWN_DA: 0xDA,
  UNKNOWN_DB: 0xDB,

  // --- Two-byte parameters ---
  MOD_DELAY: 0xE0,
  /** TEMPO bpm:u16 */
  TEMPO: 0xE1,
  SWEEP: 0xE3,

  // --- Structure ---
  /** LOOP_END - Marker, no arguments */
  LOOP_END: 0xFC,
  /** RETURN - Return from CALL */
  RETURN: 0xFD,
  /** TRACK_USAGE mask:u16 - One bit per track used */
  TRACK_USAGE: 0xFE,
  /** END - End of track */
  END: 0xFF
} as const

// =============================================================================
// MIDI Status Bytes
// =============================================================================

export const STATUS = {
  NOTE_ON: 0x90,
  CONTROL_CHANGE: 0xB0,
  PROGRAM_CHANGE: 0xC0,
  PITCH_BEND: 0xE0,
  META: 0xFF
} as const

// =============================================================================
// MIDI Controllers
// =============================================================================

export const CC = {
  MODULATION: 1,
  PORTAMENTO_TIME: 5,
  DATA_ENTRY: 6,
  VOLUME: 7,
  PAN: 10,
  EXPRESSION: 11,
  /** General purpose 1, carries modulation delay in debug mode */
  MOD_DELAY: 16,
  /** General purpose 2, carries modulation speed in debug mode */
  MOD_SPEED: 17,
  /** General purpose 3, carries modulation range in debug mode */
  MOD_RANGE: 18,
  /** Modulation LSB, reused for modulation type in debug mode */
  MOD_TYPE: 33,
  /** Data entry LSB, carries the argument of a debug pair */
  DEBUG_VALUE: 38,
  /** Volume LSB, reused for master volume */
  MASTER_VOLUME: 39,
  PORTAMENTO: 65,
  RELEASE: 72,
  ATTACK: 73,
  PORTAMENTO_CONTROL: 84,
  /** Effects 1 depth, reused for sustain level in debug mode */
  SUSTAIN: 91,
  NRPN_LSB: 98,
  NRPN_MSB: 99,
  RPN_LSB: 100,
  RPN_MSB: 101,
  /** 0 = loop start, 1 = loop end */
  LOOP_MARKER: 111,
  /** Carries the opcode (low 7 bits) of a debug pair */
  DEBUG_COMMAND: 112
} as const

// =============================================================================
// MIDI Meta Event Types
// =============================================================================

export const META = {
  /** Empty text events carry deltas too long for one VLQ */
  TEXT: 0x01,
  MARKER: 0x06,
  END_OF_TRACK: 0x2F,
  SET_TEMPO: 0x51
} as const

// =============================================================================
// Non-Registered Parameters
// =============================================================================

/**
 * NRPN addresses written by parameter opcodes (CC 99 = msb, CC 98 = lsb).
 */
export const NRPN = {
  TRANSPOSE: { msb: 0x02, lsb: 0x00 },
  DECAY: { msb: 0x64, lsb: 0x01 }
} as const

export type NrpnAddress = typeof NRPN[keyof typeof NRPN]

// =============================================================================
// Type Exports
// =============================================================================

export type OpCode = typeof OP[keyof typeof OP]
export type ControllerNumber = typeof CC[keyof typeof CC]
