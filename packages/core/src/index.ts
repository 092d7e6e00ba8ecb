// =============================================================================
// @rseq-midi/core - Public API
// RSEQ container reader, sequence interpreter and MIDI writer
// =============================================================================

// --- Conversion ---
export { convertRseq } from './convert'
export type { ConversionResult, ConvertedTrack } from './convert'

// --- Configuration ---
export { DEFAULT_DECODER_OPTIONS, resolveDecoderOptions } from './options'
export type { DecoderOptions, ResolvedDecoderOptions } from './options'

// --- Logging ---
export { consoleLogger, silentLogger, createConsoleLogger } from './logger'
export type { Logger, LogLevel } from './logger'

// --- Errors ---
export {
  RseqError,
  ContainerInvalidError,
  MissingRequiredChunkError,
  InputOpenFailedError,
  OutputOpenFailedError
} from './errors'

// --- Binary Input ---
export { ByteCursor, decodeLatin1, encodeLatin1 } from './io/byte-cursor'

// --- Container ---
export * from './container/index'

// --- Interpreter ---
export * from './vm/index'

// --- MIDI Output ---
export * from './export/index'

