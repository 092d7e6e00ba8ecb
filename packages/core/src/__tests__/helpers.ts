// =============================================================================
// rseq-midi - Test Fixtures
// =============================================================================

import type { Logger } from '../logger'

/** Header size written by `buildRseq`. */
export const HEADER_SIZE = 0x10

/** Offset of the DATA chunk's base field from the chunk start. */
export const DATA_BASE = 0x0C

/** Absolute offset of the bytecode region in files built by `buildRseq`. */
export const DATA_OFFSET = HEADER_SIZE + DATA_BASE

export interface LabelFixture {
  /** Bytecode-relative offset */
  offset: number
  text: string
}

export interface RseqFixture {
  /** Bytecode region contents */
  code: number[]
  labels?: LabelFixture[]
  /** Store label records in the reverse of their table order */
  reverseLabelRecords?: boolean
  /** Chunks written before DATA, as raw tag + payload */
  extraChunks?: Array<{ tag: string; payload: number[] }>
  /** Replace the header tag */
  tag?: string
  /** Replace the header magic */
  magic?: number
  /** Leave the DATA chunk out */
  omitData?: boolean
}

// =============================================================================
// Byte Helpers
// =============================================================================

export function u16(value: number): number[] {
  return [(value >> 8) & 0xFF, value & 0xFF]
}

export function u24(value: number): number[] {
  return [(value >> 16) & 0xFF, (value >> 8) & 0xFF, value & 0xFF]
}

export function u32(value: number): number[] {
  return [(value >>> 24) & 0xFF, (value >>> 16) & 0xFF, (value >>> 8) & 0xFF, value & 0xFF]
}

export function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0))
}

/**
 * Sequence-format variable-length quantity.
 */
export function vlq(value: number): number[] {
  const bytes = [value & 0x7F]
  let remaining = Math.floor(value / 128)
  while (remaining > 0) {
    bytes.unshift((remaining & 0x7F) | 0x80)
    remaining = Math.floor(remaining / 128)
  }
  return bytes
}

// =============================================================================
// Container Builder
// =============================================================================

function chunk(tag: string, payload: number[]): number[] {
  return [...ascii(tag), ...u32(payload.length + 8), ...payload]
}

function labelChunk(labels: LabelFixture[], reverse: boolean): number[] {
  const records = labels.map((label) => [
    ...u32(label.offset),
    ...u32(label.text.length),
    ...ascii(label.text)
  ])
  const stored = reverse ? [...records].reverse() : records

  // Record offsets are relative to the byte after the chunk size field
  let position = 4 + labels.length * 4
  const positions = new Map<number[], number>()
  for (const record of stored) {
    positions.set(record, position)
    position += record.length
  }

  const table = records.flatMap((record) => u32(positions.get(record) ?? 0))
  return chunk('LABL', [...u32(labels.length), ...table, ...stored.flat()])
}

/**
 * Build an RSEQ file image around a bytecode region.
 * The DATA chunk always starts right after the header, so the bytecode
 * sits at `DATA_OFFSET`.
 */
export function buildRseq(fixture: RseqFixture): Uint8Array {
  const chunks: number[][] = []

  if (!fixture.omitData) {
    chunks.push(chunk('DATA', [...u32(DATA_BASE), ...fixture.code]))
  }
  for (const extra of fixture.extraChunks ?? []) {
    chunks.push(chunk(extra.tag, extra.payload))
  }
  if (fixture.labels !== undefined) {
    chunks.push(labelChunk(fixture.labels, fixture.reverseLabelRecords ?? false))
  }

  const body = chunks.flat()
  const header = [
    ...ascii(fixture.tag ?? 'RSEQ'),
    ...u32(fixture.magic ?? 0xFEFF0100),
    ...u32(HEADER_SIZE + body.length),
    ...u16(HEADER_SIZE),
    ...u16(chunks.length)
  ]

  return Uint8Array.from([...header, ...body])
}

// =============================================================================
// Logging
// =============================================================================

export interface RecordingLogger extends Logger {
  lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string }>
  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[]
}

/**
 * Logger that keeps every line for assertions.
 */
export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = []
  return {
    lines,
    messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
    debug: (message) => { lines.push({ level: 'debug', message }) },
    info: (message) => { lines.push({ level: 'info', message }) },
    warn: (message) => { lines.push({ level: 'warn', message }) },
    error: (message) => { lines.push({ level: 'error', message }) }
  }
}
