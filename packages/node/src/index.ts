/**
 * @rseq-midi/node
 *
 * Node.js file conversion, command line and watch mode for rseq-midi.
 * Requires Node.js 20+.
 */

export { FileWatcher } from './FileWatcher'
export type { FileWatcherOptions, Watcher, ChangeHandler } from './FileWatcher'
export { convertFile, deriveOutputPath } from './convert-file'
export type { ConvertFileOptions, ConvertFileResult } from './convert-file'
export { runCli, parseArgs, convertAndReport, USAGE } from './cli'
export type { CliArgs, CliRun, ParseResult } from './cli'
