/**
 * @rseq-midi/node - Test Utilities
 */

import * as fs from 'fs'
import * as path from 'path'
import * as os from 'os'

export { buildRseq, createRecordingLogger } from '../../../core/src/__tests__/helpers'

/**
 * Create a temporary directory for testing.
 */
export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `rseq-midi-${prefix}-`))
}

/**
 * Clean up temporary directory.
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * Wait for a specified time.
 */
export function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Poll until `check` passes or the timeout runs out.
 */
export async function waitFor(check: () => boolean, timeout = 3000, interval = 25): Promise<void> {
  const deadline = Date.now() + timeout
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeout}ms`)
    }
    await wait(interval)
  }
}

/** One-track sequence: program 5, note 60 for a quarter note, end. */
export const SIMPLE_SEQUENCE = [0x81, 0x05, 0x3C, 0x64, 0x60, 0x80, 0x60, 0xFF]
