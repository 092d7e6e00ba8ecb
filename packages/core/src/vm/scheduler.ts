// =============================================================================
// rseq-midi - Multi-Track Scheduler
// =============================================================================

import type { RseqContainer } from '../container/types'
import type { DecoderOptions, ResolvedDecoderOptions } from '../options'
import type { SchedulerResult, TrackContext, TrackHost } from './types'
import { resolveDecoderOptions } from '../options'
import { ByteCursor } from '../io/byte-cursor'
import { TRACK_COUNT } from './constants'
import { TrackMachine } from './track'

/**
 * Round-robin driver for the sixteen track machines.
 *
 * Each pass steps every active track exactly once, in index order. A track
 * started during a pass is stepped in that same pass if its slot comes later.
 * Passes repeat until one finds nothing active.
 *
 * @example
 * ```typescript
 * const container = readContainer(bytes)
 * const { tracks } = new Scheduler(bytes, container, { ignoreJumps: true }).run()
 * ```
 */
export class Scheduler implements TrackHost {
  private readonly options: ResolvedDecoderOptions
  private readonly cursor: ByteCursor
  private readonly machines: TrackMachine[]

  constructor(
    source: Uint8Array,
    private readonly container: RseqContainer,
    options: DecoderOptions = {}
  ) {
    this.options = resolveDecoderOptions(options)
    this.cursor = new ByteCursor(source)

    const context: TrackContext = {
      dataOffset: container.dataOffset,
      labels: container.labels,
      options: this.options,
      host: this
    }

    this.machines = Array.from({ length: TRACK_COUNT }, (_, index) => new TrackMachine(index, context))
  }

  /** Track machines in index order. */
  get tracks(): readonly TrackMachine[] {
    return this.machines
  }

  /**
   * Start (or restart) a track at an absolute source offset.
   * Indices outside the track range are ignored.
   */
  start(index: number, address: number): void {
    const machine = this.machines[index]
    if (machine === undefined) {
      this.options.logger.warn(`[Scheduler] no track ${index} to start`)
      return
    }
    machine.start(address)
  }

  /**
   * Run every track to completion.
   */
  run(): SchedulerResult {
    this.start(0, this.container.dataOffset)

    let passes = 0
    let steps = 0

    for (;;) {
      let anyActive = false
      for (const machine of this.machines) {
        if (!machine.isActive) continue
        anyActive = true
        machine.step(this.cursor)
        steps++
      }
      if (!anyActive) break
      passes++
    }

    this.options.logger.debug(`[Scheduler] finished after ${passes} passes, ${steps} steps`)

    return {
      tracks: this.machines.map((machine) => ({ index: machine.index, data: machine.output() })),
      passes,
      steps
    }
  }
}
