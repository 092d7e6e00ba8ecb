#!/usr/bin/env node
/**
 * @rseq-midi/node - rseq2midi executable
 */

import { consoleLogger } from '@rseq-midi/core'
import { runCli } from '../cli'

const { exitCode, watcher } = runCli(process.argv.slice(2))

if (watcher === null) {
  process.exitCode = exitCode
} else {
  process.once('SIGINT', () => {
    watcher.stop().then(
      () => process.exit(exitCode),
      (error: unknown) => {
        consoleLogger.error(`[FileWatcher] Failed to stop: ${error instanceof Error ? error.message : String(error)}`)
        process.exit(1)
      }
    )
  })
}
