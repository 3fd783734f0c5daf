/**
 * @ksynth/node - DumpWatcher
 *
 * File system watcher using chokidar.
 *
 * When a .syx file is added or changed, reads it, decodes every message
 * and passes the decoded results (not the raw bytes) to registered handlers.
 */

import * as path from 'path'
import { watch } from 'chokidar'
import type { FSWatcher } from 'chokidar'
import type { DecodeOptions, Result } from '@ksynth/core'
import { loadDumpFile } from './syx'
import type { DecodedMessage } from './syx'

// =============================================================================
// Types
// =============================================================================

/**
 * A file whose messages were decoded after a change.
 */
export interface DumpFile {
  readonly path: string
  readonly messages: readonly Result<DecodedMessage>[]
}

export type DumpHandler = (file: DumpFile) => void

/**
 * DumpWatcher configuration options.
 */
export interface DumpWatcherOptions {
  /** Debounce delay in milliseconds (default: 300) */
  debounce?: number

  /** File extensions to watch (default: ['.syx']) */
  extensions?: string[]

  /** Patterns to ignore (glob patterns) */
  ignore?: string[]

  /** Whether to read files found when a path is added (default: false) */
  readOnAdd?: boolean

  /** Options passed to every decode */
  decode?: DecodeOptions
}

// =============================================================================
// Debounce Utility
// =============================================================================

interface Debounced {
  (): void
  cancel(): void
}

function debounce(fn: () => void, delay: number): Debounced {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  return Object.assign(debounced, {
    cancel(): void {
      if (timeoutId) {
        clearTimeout(timeoutId)
        timeoutId = null
      }
    }
  })
}

// =============================================================================
// DumpWatcher Implementation
// =============================================================================

/**
 * Watches directories of SysEx dumps and emits what they decode to.
 *
 * @example
 * ```typescript
 * import { DumpWatcher } from '@ksynth/node'
 *
 * const watcher = new DumpWatcher({ decode: { checksum: 'strict' } })
 * watcher.on('change', ({ path, messages }) => {
 *   console.log(path, messages.filter(m => m.ok).length)
 * })
 * watcher.add('./patches')
 * watcher.start()
 * ```
 */
export class DumpWatcher {
  private watcher: FSWatcher | null = null
  private handlers = new Set<DumpHandler>()
  private options: Required<DumpWatcherOptions>
  private started = false
  private pendingPaths = new Set<string>()
  private debouncedEmit: Debounced

  constructor(options: DumpWatcherOptions = {}) {
    this.options = {
      debounce: options.debounce ?? 300,
      extensions: (options.extensions ?? ['.syx']).map(ext => ext.toLowerCase()),
      ignore: options.ignore ?? ['**/node_modules/**', '**/.git/**'],
      readOnAdd: options.readOnAdd ?? false,
      decode: options.decode ?? {}
    }

    this.debouncedEmit = debounce(() => {
      const paths = [...this.pendingPaths]
      this.pendingPaths.clear()
      for (const filePath of paths) {
        void this.emitDumps(filePath)
      }
    }, this.options.debounce)

    this.watcher = watch([], {
      ignored: this.options.ignore,
      persistent: true,
      ignoreInitial: !this.options.readOnAdd
    })

    this.watcher.on('add', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    this.watcher.on('change', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    this.watcher.on('error', (error: Error) => {
      console.error('[DumpWatcher] Error:', error.message)
    })
  }

  /**
   * Register a handler for decoded files.
   */
  on(event: 'change', handler: DumpHandler): void {
    if (event === 'change') {
      this.handlers.add(handler)
    }
  }

  start(): void {
    this.started = true
  }

  /**
   * Stop watching and release the underlying watcher.
   */
  async stop(): Promise<void> {
    this.started = false
    this.debouncedEmit.cancel()
    this.pendingPaths.clear()
    this.handlers.clear()

    const watcher = this.watcher
    this.watcher = null
    if (watcher) {
      await watcher.close()
    }
  }

  /**
   * Add a file or directory to watch.
   */
  add(watchPath: string): void {
    this.watcher?.add(watchPath)
  }

  remove(watchPath: string): void {
    this.watcher?.unwatch(watchPath)
  }

  private shouldWatch(filePath: string): boolean {
    return this.options.extensions.includes(path.extname(filePath).toLowerCase())
  }

  private queuePath(filePath: string): void {
    this.pendingPaths.add(filePath)
    this.debouncedEmit()
  }

  /**
   * Decode a file and emit it to all handlers.
   */
  private async emitDumps(filePath: string): Promise<void> {
    let messages: Result<DecodedMessage>[]
    try {
      messages = await loadDumpFile(filePath, this.options.decode)
    } catch (error) {
      // Deleted between event and read, or not readable
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[DumpWatcher] Failed to read ${filePath}: ${message}`)
      return
    }

    if (!this.started) {
      return
    }
    for (const handler of this.handlers) {
      handler({ path: filePath, messages })
    }
  }
}
