// =============================================================================
// rseq-midi - Decoder Options
// =============================================================================

import type { Logger } from './logger'
import { consoleLogger } from './logger'

/**
 * Decoder configuration, passed explicitly to the scheduler.
 */
export interface DecoderOptions {
  /** Write a marker for each jump but keep decoding after it (default: false) */
  ignoreJumps?: boolean
  /** Write debug controllers for commands without a MIDI mapping (default: false) */
  debugControllers?: boolean
  /** Log destination (default: console) */
  logger?: Logger
}

export type ResolvedDecoderOptions = Required<DecoderOptions>

export const DEFAULT_DECODER_OPTIONS: ResolvedDecoderOptions = {
  ignoreJumps: false,
  debugControllers: false,
  logger: consoleLogger
}

/**
 * Fill in defaults for every option left unset.
 */
export function resolveDecoderOptions(options: DecoderOptions = {}): ResolvedDecoderOptions {
  return {
    ignoreJumps: options.ignoreJumps ?? DEFAULT_DECODER_OPTIONS.ignoreJumps,
    debugControllers: options.debugControllers ?? DEFAULT_DECODER_OPTIONS.debugControllers,
    logger: options.logger ?? DEFAULT_DECODER_OPTIONS.logger
  }
}
