/**
 * @rseq-midi/node - FileWatcher
 *
 * File system watcher using chokidar.
 *
 * BEHAVIOR: When a watched file is added or changed, the file PATH is
 * passed to registered handlers. Sequence files are binary, so reading
 * them is left to the handler.
 */

import * as path from 'path'
import { watch } from 'chokidar'
import type { FSWatcher } from 'chokidar'
import { consoleLogger } from '@rseq-midi/core'
import type { Logger } from '@rseq-midi/core'

// =============================================================================
// Watcher Interface
// =============================================================================

export type ChangeHandler = (filePath: string) => void

export interface Watcher {
  on(event: 'change', handler: ChangeHandler): void
  start(): void
  stop(): Promise<void>
  add?(path: string): void
  remove?(path: string): void
}

// =============================================================================
// Types
// =============================================================================

/**
 * FileWatcher configuration options.
 */
export interface FileWatcherOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounce?: number

  /** File extensions to watch (default: ['.rseq', '.brseq']) */
  extensions?: string[]

  /** Patterns to ignore (glob patterns) */
  ignore?: string[]

  /** Whether to emit for files already present when watching starts (default: false) */
  emitOnAdd?: boolean

  /** Log destination (default: console) */
  logger?: Logger
}

// =============================================================================
// Debounce Utility
// =============================================================================

interface Debounced {
  (): void
  cancel(): void
}

/**
 * Create a debounced function.
 */
function debounce(fn: () => void, delay: number): Debounced {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = () => {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  const cancel = () => {
    if (timeoutId) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  return Object.assign(debounced, { cancel })
}

// =============================================================================
// FileWatcher Implementation
// =============================================================================

/**
 * File watcher using chokidar.
 *
 * Watches files for changes and emits their paths to handlers, once per
 * file per debounce window.
 *
 * @example
 * ```typescript
 * import { FileWatcher } from '@rseq-midi/node'
 *
 * const watcher = new FileWatcher({ extensions: ['.rseq'] })
 * watcher.on('change', (filePath) => {
 *   convertFile(filePath)
 * })
 * watcher.add('./sequences')
 * watcher.start()
 * ```
 */
export class FileWatcher implements Watcher {
  private watcher: FSWatcher | null = null
  private handlers = new Set<ChangeHandler>()
  private options: Required<FileWatcherOptions>
  private started = false
  private pendingPaths = new Set<string>()
  private debouncedEmit: Debounced

  constructor(options: FileWatcherOptions = {}) {
    this.options = {
      debounce: options.debounce ?? 300,
      extensions: options.extensions ?? ['.rseq', '.brseq'],
      ignore: options.ignore ?? ['**/node_modules/**', '**/.git/**'],
      emitOnAdd: options.emitOnAdd ?? false,
      logger: options.logger ?? consoleLogger
    }

    // Create debounced emit function that processes accumulated paths
    this.debouncedEmit = debounce(() => {
      const paths = [...this.pendingPaths]
      this.pendingPaths.clear()
      for (const filePath of paths) {
        this.emitPath(filePath)
      }
    }, this.options.debounce)

    // Initialize chokidar watcher
    this.watcher = watch([], {
      ignored: this.options.ignore,
      persistent: true,
      ignoreInitial: !this.options.emitOnAdd
    })

    // Handle file add events (new files)
    this.watcher.on('add', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    // Handle file change events (modified files)
    this.watcher.on('change', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    this.watcher.on('error', (error: Error) => {
      this.options.logger.error(`[FileWatcher] Error: ${error.message}`)
    })
  }

  /**
   * Register a handler for file changes.
   * Handler receives the path of the changed file.
   */
  on(event: 'change', handler: ChangeHandler): void {
    if (event === 'change') {
      this.handlers.add(handler)
    }
  }

  /**
   * Start watching for file changes.
   */
  start(): void {
    this.started = true
  }

  /**
   * Stop watching and release the underlying file handles.
   */
  async stop(): Promise<void> {
    this.started = false
    this.debouncedEmit.cancel()
    this.pendingPaths.clear()
    this.handlers.clear()

    if (this.watcher) {
      const watcher = this.watcher
      this.watcher = null
      await watcher.close()
    }
  }

  /**
   * Add a file or directory to watch.
   */
  add(watchPath: string): void {
    if (this.watcher) {
      this.watcher.add(watchPath)
    }
  }

  /**
   * Remove a file or directory from watch list.
   */
  remove(watchPath: string): void {
    if (this.watcher) {
      this.watcher.unwatch(watchPath)
    }
  }

  /**
   * Check if a file should be watched based on extension.
   */
  private shouldWatch(filePath: string): boolean {
    const ext = path.extname(filePath).toLowerCase()
    return this.options.extensions.includes(ext)
  }

  /**
   * Queue a path for debounced processing.
   */
  private queuePath(filePath: string): void {
    this.pendingPaths.add(filePath)
    this.debouncedEmit()
  }

  /**
   * Pass a path to every handler. A throwing handler is logged and does
   * not stop the others.
   */
  private emitPath(filePath: string): void {
    for (const handler of this.handlers) {
      try {
        handler(filePath)
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.options.logger.warn(`[FileWatcher] Handler failed for ${filePath}: ${message}`)
      }
    }
  }
}
