/**
 * @rseq-midi/node - File Conversion
 *
 * Reads an RSEQ file, converts it and writes the MIDI file beside it.
 */

import * as fs from 'fs'
import * as path from 'path'
import {
  convertRseq,
  InputOpenFailedError,
  OutputOpenFailedError
} from '@rseq-midi/core'
import type { ConversionResult, DecoderOptions } from '@rseq-midi/core'

export interface ConvertFileOptions extends DecoderOptions {
  /** Destination path (default: derived from the input path) */
  outputPath?: string
}

export interface ConvertFileResult extends ConversionResult {
  inputPath: string
  outputPath: string
}

/**
 * Replace the last extension of the file name with `.mid`, or append
 * `.mid` when the file name has none.
 *
 * @example
 * ```typescript
 * deriveOutputPath('music/seq_title.rseq') // 'music/seq_title.mid'
 * deriveOutputPath('music/seq_title')      // 'music/seq_title.mid'
 * ```
 */
export function deriveOutputPath(inputPath: string): string {
  const ext = path.extname(inputPath)
  const stem = ext === '' ? inputPath : inputPath.slice(0, -ext.length)
  return `${stem}.mid`
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Convert one RSEQ file to a Standard MIDI File on disk.
 *
 * @throws InputOpenFailedError if the input cannot be read
 * @throws ContainerInvalidError / MissingRequiredChunkError for a bad container
 * @throws OutputOpenFailedError if the output cannot be written
 */
export function convertFile(inputPath: string, options: ConvertFileOptions = {}): ConvertFileResult {
  const { outputPath = deriveOutputPath(inputPath), ...decoderOptions } = options

  let bytes: Uint8Array
  try {
    bytes = fs.readFileSync(inputPath)
  } catch (error) {
    throw new InputOpenFailedError(inputPath, reasonOf(error))
  }

  const result = convertRseq(bytes, decoderOptions)

  try {
    fs.writeFileSync(outputPath, result.midi)
  } catch (error) {
    throw new OutputOpenFailedError(outputPath, reasonOf(error))
  }

  return { ...result, inputPath, outputPath }
}
