// =============================================================================
// rseq-midi - RSEQ Container Reader
// =============================================================================

import type { Logger } from '../logger'
import type { ChunkDescriptor, RseqContainer, RseqHeader } from './types'
import { silentLogger } from '../logger'
import { ByteCursor } from '../io/byte-cursor'
import { ContainerInvalidError, MissingRequiredChunkError } from '../errors'
import { EMPTY_LABELS, LabelTable } from './labels'
import { CHUNK, RSEQ_MAGIC, RSEQ_TAG } from './types'

/** Tag and size fields that open every sub-chunk. */
const CHUNK_PREAMBLE_SIZE = 8

export interface ReadContainerOptions {
  /** Absolute offset of the container start (default: 0) */
  start?: number
  logger?: Logger
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Validate an RSEQ container and locate its bytecode region and labels.
 *
 * @throws ContainerInvalidError if the header tag or magic does not match
 * @throws MissingRequiredChunkError if no DATA chunk is present
 */
export function readContainer(
  source: Uint8Array,
  options: ReadContainerOptions = {}
): RseqContainer {
  const { start = 0, logger = silentLogger } = options
  const cursor = new ByteCursor(source, start)

  const header = readHeader(cursor)
  logger.debug(
    `[Container] RSEQ chunk OK: size=${header.size} bytes, ` +
      `header=${header.headerSize} bytes, blocks=${header.chunkCount}`
  )

  cursor.seek(start + header.headerSize)

  const chunks: ChunkDescriptor[] = []
  let dataOffset: number | null = null
  let labels = EMPTY_LABELS

  for (let i = 0; i < header.chunkCount; i++) {
    const chunkStart = cursor.offset
    const tag = cursor.tag()
    const size = cursor.u32be()
    chunks.push({ tag, offset: chunkStart, size })

    if (tag === CHUNK.DATA) {
      const relative = cursor.u32be()
      dataOffset = chunkStart + relative
      logger.debug(
        `[Container] Have DATA chunk: size=${size} bytes, ` +
          `offset=${relative} (relative), seq=${dataOffset} (absolute)`
      )
    } else if (tag === CHUNK.LABL) {
      labels = readLabels(cursor, chunkStart)
      logger.debug(`[Container] Read ${labels.size} labels`)
    } else {
      logger.debug(`[Container] Skipping ${JSON.stringify(tag)} chunk (${size} bytes)`)
    }

    cursor.seek(chunkStart + Math.max(size, CHUNK_PREAMBLE_SIZE))
  }

  if (dataOffset === null) {
    throw new MissingRequiredChunkError(CHUNK.DATA)
  }

  return { header, chunks, dataOffset, labels }
}

// =============================================================================
// Header
// =============================================================================

function readHeader(cursor: ByteCursor): RseqHeader {
  const header: RseqHeader = {
    tag: cursor.tag(),
    magic: cursor.u32be(),
    size: cursor.u32be(),
    headerSize: cursor.u16be(),
    chunkCount: cursor.u16be()
  }

  if (cursor.overran || header.tag !== RSEQ_TAG || header.magic !== RSEQ_MAGIC) {
    throw new ContainerInvalidError(header.tag, header.magic)
  }

  return header
}

// =============================================================================
// Labels
// =============================================================================

/**
 * Resolve the LABL indirection table. Each entry points (relative to the
 * byte after the chunk's size field) at a record of
 * { bytecode offset: u32, length: u32, text: length bytes }.
 * Entries are keyed by the bytecode offset the record names, whatever order
 * the records are stored in.
 */
function readLabels(cursor: ByteCursor, chunkStart: number): LabelTable {
  const base = chunkStart + CHUNK_PREAMBLE_SIZE
  const count = cursor.u32be()

  const recordOffsets: number[] = []
  for (let i = 0; i < count && !cursor.overran; i++) {
    recordOffsets.push(base + cursor.u32be())
  }

  const entries: Array<[number, string]> = []
  for (const recordOffset of recordOffsets) {
    cursor.seek(recordOffset)
    const bytecodeOffset = cursor.u32be()
    const length = Math.min(cursor.u32be(), Math.max(0, cursor.length - cursor.offset))
    entries.push([bytecodeOffset, cursor.latin1(length)])
  }

  return new LabelTable(entries)
}
