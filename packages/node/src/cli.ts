/**
 * @rseq-midi/node - Command Line
 *
 * rseq2midi [-i] [-d] [-w] [-v] file1.rseq [file2.rseq ...]
 */

import * as path from 'path'
import {
  consoleLogger,
  createConsoleLogger,
  InputOpenFailedError
} from '@rseq-midi/core'
import type { DecoderOptions, Logger } from '@rseq-midi/core'
import { convertFile } from './convert-file'
import { FileWatcher } from './FileWatcher'

export const USAGE = [
  'Usage: rseq2midi [-i] [-d] [-w] [-v] file1.rseq [file2.rseq ...]',
  '  -i  ignore jump commands',
  '  -d  write debug controllers for commands without a MIDI mapping',
  '  -w  watch the inputs and reconvert on change',
  '  -v  log decoder diagnostics'
].join('\n')

// =============================================================================
// Arguments
// =============================================================================

export interface CliArgs {
  ignoreJumps: boolean
  debugControllers: boolean
  watch: boolean
  verbose: boolean
  files: string[]
}

export type ParseResult =
  | { ok: true; args: CliArgs }
  | { ok: false; message: string }

/**
 * Parse command-line arguments. Options are only recognised before the
 * first file; everything from the first file on is a file.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const args: CliArgs = {
    ignoreJumps: false,
    debugControllers: false,
    watch: false,
    verbose: false,
    files: []
  }

  let index = 0
  for (; index < argv.length; index++) {
    const arg = argv[index]
    if (!arg.startsWith('-')) break

    switch (arg) {
      case '-i':
        args.ignoreJumps = true
        break
      case '-d':
        args.debugControllers = true
        break
      case '-w':
        args.watch = true
        break
      case '-v':
        args.verbose = true
        break
      default:
        return { ok: false, message: `Unknown option: ${arg}` }
    }
  }

  args.files = argv.slice(index)
  if (args.files.length === 0) {
    return { ok: false, message: 'No input files' }
  }

  return { ok: true, args }
}

// =============================================================================
// Conversion
// =============================================================================

/**
 * Convert one file, reporting progress and failures. Never throws.
 *
 * @returns Whether the file was converted
 */
export function convertAndReport(inputPath: string, options: DecoderOptions, logger: Logger): boolean {
  logger.info(`${inputPath}:`)

  try {
    const result = convertFile(inputPath, options)
    for (const track of result.tracks) {
      logger.info(`  Track ${String(track.index).padStart(2, '0')} OK`)
    }
    return true
  } catch (error) {
    if (error instanceof InputOpenFailedError) {
      logger.error("  Couldn't open file")
    } else {
      logger.error(`  ${error instanceof Error ? error.message : String(error)}`)
    }
    return false
  }
}

export interface CliRun {
  exitCode: number
  /** Set in watch mode; the caller owns stopping it */
  watcher: FileWatcher | null
}

/**
 * Run the converter over the given arguments.
 *
 * @param argv - Arguments after the program name
 * @param logger - Destination for progress lines (default: console)
 */
export function runCli(argv: readonly string[], logger: Logger = consoleLogger): CliRun {
  const parsed = parseArgs(argv)
  if (!parsed.ok) {
    logger.error(parsed.message)
    logger.error(USAGE)
    return { exitCode: 1, watcher: null }
  }

  const { args } = parsed
  const options: DecoderOptions = {
    ignoreJumps: args.ignoreJumps,
    debugControllers: args.debugControllers,
    logger: args.verbose ? createConsoleLogger('debug') : logger
  }

  for (const file of args.files) {
    convertAndReport(file, options, logger)
  }

  if (!args.watch) {
    return { exitCode: 0, watcher: null }
  }

  const extensions = [...new Set(args.files.map((file) => path.extname(file).toLowerCase()))]
  const watcher = new FileWatcher({ extensions, logger })
  watcher.on('change', (filePath) => {
    convertAndReport(filePath, options, logger)
  })
  for (const file of args.files) {
    watcher.add(file)
  }
  watcher.start()
  logger.info(`Watching ${args.files.length} file(s) for changes`)

  return { exitCode: 0, watcher }
}
