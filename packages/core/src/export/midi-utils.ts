// =============================================================================
// rseq-midi - MIDI Export Utilities
// =============================================================================

import { MICROSECONDS_PER_MINUTE, PITCH_BEND_CENTER } from '../vm/constants'

/** Largest value a standard 4-byte VLQ can hold (2^28 - 1). */
export const VLQ_MAX = 0x0FFFFFFF

// =============================================================================
// Variable Length Quantity (VLQ) Encoding
// =============================================================================

/**
 * Encode a number as a Variable Length Quantity (VLQ).
 * VLQ is MIDI's way of encoding variable-length integers.
 *
 * Each byte: bit 7 = continuation flag (1 = more bytes follow), bits 0-6 = value
 * Standard files stop at 4 bytes (28-bit value); larger 32-bit values take a
 * fifth byte.
 *
 * @param value - The value to encode (0 to 2^32 - 1)
 * @returns Uint8Array containing the VLQ bytes
 */
export function writeVLQ(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xFFFFFFFF) {
    throw new Error(`VLQ value must be a non-negative 32-bit integer: ${value}`)
  }

  // Handle zero case
  if (value === 0) {
    return new Uint8Array([0])
  }

  // Work from LSB to MSB
  const bytes: number[] = []
  let remaining = value

  // Last byte (LSB) has continuation bit = 0
  bytes.unshift(remaining & 0x7F)
  remaining >>>= 7

  // Preceding bytes have continuation bit = 1
  while (remaining > 0) {
    bytes.unshift((remaining & 0x7F) | 0x80)
    remaining >>>= 7
  }

  return new Uint8Array(bytes)
}

// =============================================================================
// Binary Writing Utilities
// =============================================================================

/**
 * Write a 16-bit big-endian unsigned integer.
 */
export function writeUint16BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >> 8) & 0xFF,
    value & 0xFF
  ])
}

/**
 * Write a 24-bit big-endian unsigned integer (for tempo).
 */
export function writeUint24BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >> 16) & 0xFF,
    (value >> 8) & 0xFF,
    value & 0xFF
  ])
}

/**
 * Write a 32-bit big-endian unsigned integer.
 */
export function writeUint32BE(value: number): Uint8Array {
  return new Uint8Array([
    (value >>> 24) & 0xFF,
    (value >>> 16) & 0xFF,
    (value >>> 8) & 0xFF,
    value & 0xFF
  ])
}

/**
 * Write ASCII string as bytes.
 */
export function writeAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length)
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0x7F
  }
  return bytes
}

/**
 * Concatenate multiple Uint8Arrays into one.
 */
export function concatArrays(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
  const result = new Uint8Array(totalLength)
  let offset = 0
  for (const arr of arrays) {
    result.set(arr, offset)
    offset += arr.length
  }
  return result
}

// =============================================================================
// Value Conversion
// =============================================================================

/**
 * Convert a sequence tempo (quarter notes per minute) to MIDI microseconds
 * per quarter note. Integer division, as the sequence format stores whole
 * tempos.
 *
 * @returns Microseconds per quarter note, or null for a tempo of zero
 */
export function tempoToMicrosPerQuarter(tempo: number): number | null {
  if (tempo <= 0) return null
  return Math.floor(MICROSECONDS_PER_MINUTE / tempo)
}

/**
 * Convert a signed 8-bit bend amount (-128..127) to MIDI pitch bend
 * (0..16383, 8192 = center).
 */
export function signedBendToMidi(amount: number): number {
  const clamped = Math.max(-128, Math.min(127, amount))
  return PITCH_BEND_CENTER + clamped * 64
}
