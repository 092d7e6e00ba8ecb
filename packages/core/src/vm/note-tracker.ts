// =============================================================================
// rseq-midi - Note Lifetime Tracker
// =============================================================================

/**
 * A sounding note waiting for its note-off.
 */
export interface PendingNote {
  key: number
  /** Absolute track tick at which the note ends */
  end: number
}

/**
 * Called for each note that ends inside a wait.
 *
 * @param key - Key of the ending note
 * @param gap - Ticks between the previous release point and this note's end
 */
export type ReleaseHandler = (key: number, gap: number) => void

/**
 * Result of advancing the clock through a wait.
 */
export interface WaitResult {
  /** Track clock after the full wait */
  clock: number
  /** Ticks left after the last release, not yet written as a delta */
  remaining: number
}

/**
 * Per-track ordered collection of sounding notes.
 */
export class NoteTracker {
  private notes: PendingNote[] = []

  get size(): number {
    return this.notes.length
  }

  /** Snapshot of pending notes in their current order. */
  pending(): readonly PendingNote[] {
    return [...this.notes]
  }

  add(key: number, end: number): void {
    this.notes.push({ key, end })
  }

  /**
   * Advance from `clock` by `ticks`, releasing every note that ends on or
   * before the target tick in end-tick order. Notes with equal end ticks
   * are released in the order they were added.
   */
  wait(ticks: number, clock: number, onRelease: ReleaseHandler): WaitResult {
    const target = clock + ticks
    // Array.prototype.sort is stable, which keeps ties in list order
    this.notes.sort((a, b) => a.end - b.end)

    let current = clock
    let remaining = ticks
    while (this.notes.length > 0 && this.notes[0].end <= target) {
      const note = this.notes.shift()
      if (note === undefined) break

      const gap = note.end - current
      onRelease(note.key, gap)
      current += gap
      remaining -= gap
    }

    return { clock: current + remaining, remaining }
  }

  /**
   * Remove every pending note and return their keys in current list order.
   */
  drain(): number[] {
    const keys = this.notes.map((note) => note.key)
    this.notes = []
    return keys
  }

  clear(): void {
    this.notes = []
  }
}
