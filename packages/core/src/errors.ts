// =============================================================================
// rseq-midi - Errors
// =============================================================================

/**
 * Base class for every error the converter reports for a single input.
 */
export class RseqError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RseqError'
  }
}

/**
 * Error thrown when the top-level header does not carry the RSEQ tag and
 * byte-order magic, or is too short to hold them.
 */
export class ContainerInvalidError extends RseqError {
  constructor(
    public readonly tag: string,
    public readonly magic: number
  ) {
    super(
      `Invalid RSEQ file (bad RSEQ chunk): ` +
        `tag='${tag}', magic=0x${magic.toString(16).toUpperCase().padStart(8, '0')}`
    )
    this.name = 'ContainerInvalidError'
  }
}

/**
 * Error thrown when a chunk needed for decoding is absent.
 */
export class MissingRequiredChunkError extends RseqError {
  constructor(public readonly chunk: string) {
    super(`Not enough data to decode with (missing ${chunk} chunk)`)
    this.name = 'MissingRequiredChunkError'
  }
}

/**
 * Error thrown when an input file cannot be read.
 */
export class InputOpenFailedError extends RseqError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Couldn't open file ${path}: ${reason}`)
    this.name = 'InputOpenFailedError'
  }
}

/**
 * Error thrown when the converted file cannot be written.
 */
export class OutputOpenFailedError extends RseqError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Cannot open output MIDI file ${path}: ${reason}`)
    this.name = 'OutputOpenFailedError'
  }
}
