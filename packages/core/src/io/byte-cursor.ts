// =============================================================================
// rseq-midi - Byte Cursor
// =============================================================================
// Seekable big-endian reader over an immutable byte array. The read position
// belongs to the cursor value, so every caller owns its own position.

/**
 * Sequential reader over a byte array.
 *
 * Reads past the end of the data yield zero bytes and set `overran`, so a
 * truncated instruction decodes with zeroed arguments instead of throwing.
 */
export class ByteCursor {
  private position: number
  private overrunCount = 0

  constructor(
    private readonly bytes: Uint8Array,
    offset: number = 0
  ) {
    this.position = offset
  }

  /** Current absolute read position. */
  get offset(): number {
    return this.position
  }

  /** Total length of the underlying data. */
  get length(): number {
    return this.bytes.length
  }

  /** True when the position is at or past the end of the data. */
  get atEnd(): boolean {
    return this.position >= this.bytes.length
  }

  /** True if any read since the last `seek` ran past the end of the data. */
  get overran(): boolean {
    return this.overrunCount > 0
  }

  /**
   * Move to an absolute position. Clears the overrun flag.
   */
  seek(offset: number): this {
    this.position = offset
    this.overrunCount = 0
    return this
  }

  skip(count: number): this {
    this.position += count
    return this
  }

  u8(): number {
    if (this.position >= this.bytes.length || this.position < 0) {
      this.position++
      this.overrunCount++
      return 0
    }
    return this.bytes[this.position++]
  }

  /** Signed 8-bit value. */
  s8(): number {
    const value = this.u8()
    return value & 0x80 ? value - 0x100 : value
  }

  u16be(): number {
    return (this.u8() << 8) | this.u8()
  }

  u24be(): number {
    return (this.u8() << 16) | (this.u8() << 8) | this.u8()
  }

  u32be(): number {
    // >>> 0 keeps the result unsigned
    return ((this.u8() << 24) | (this.u8() << 16) | (this.u8() << 8) | this.u8()) >>> 0
  }

  /**
   * Variable-length quantity: 7 bits per byte, high bit set on every byte
   * but the last. The result wraps to 32 bits, so an overlong run of
   * continuation bytes keeps only its low 32 bits.
   */
  varLen(): number {
    let value = 0
    for (;;) {
      const byte = this.u8()
      value = ((value << 7) | (byte & 0x7F)) >>> 0
      if ((byte & 0x80) === 0) {
        return value
      }
    }
  }

  /**
   * Read `count` raw bytes. Missing bytes past the end are zero.
   */
  bytesOf(count: number): Uint8Array {
    const out = new Uint8Array(count)
    for (let i = 0; i < count; i++) {
      out[i] = this.u8()
    }
    return out
  }

  /**
   * Read a 4-character chunk tag in file byte order.
   */
  tag(): string {
    return String.fromCharCode(this.u8(), this.u8(), this.u8(), this.u8())
  }

  /**
   * Read `count` bytes as a Latin-1 string.
   */
  latin1(count: number): string {
    return decodeLatin1(this.bytesOf(count))
  }
}

/**
 * Decode bytes one character per byte.
 */
export function decodeLatin1(data: Uint8Array): string {
  let text = ''
  for (let i = 0; i < data.length; i++) {
    text += String.fromCharCode(data[i])
  }
  return text
}

/**
 * Encode a string one byte per character (code points above 0xFF are
 * truncated to their low byte).
 */
export function encodeLatin1(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length)
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i) & 0xFF
  }
  return bytes
}
