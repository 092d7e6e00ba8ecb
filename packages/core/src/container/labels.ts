// =============================================================================
// rseq-midi - Label Table
// =============================================================================

/**
 * Read-only mapping from bytecode-relative offset to label text.
 * Built once while reading the container, then shared by every track.
 */
export class LabelTable {
  private readonly labels: ReadonlyMap<number, string>

  constructor(entries: Iterable<readonly [number, string]> = []) {
    const labels = new Map<number, string>()
    for (const [offset, text] of entries) {
      // Last write wins on a repeated offset
      labels.set(offset, text)
    }
    this.labels = labels
  }

  get size(): number {
    return this.labels.size
  }

  get(offset: number): string | undefined {
    return this.labels.get(offset)
  }

  has(offset: number): boolean {
    return this.labels.has(offset)
  }

  /**
   * Entries in ascending offset order.
   */
  entries(): Array<[number, string]> {
    return [...this.labels.entries()].sort((a, b) => a[0] - b[0])
  }
}

/** Table with no labels, used when the container has no LABL chunk. */
export const EMPTY_LABELS = new LabelTable()
