// =============================================================================
// rseq-midi - Note Tracker Tests
// =============================================================================

import { NoteTracker } from '../vm/note-tracker'

function releases(tracker: NoteTracker, ticks: number, clock: number) {
  const released: Array<[number, number]> = []
  const result = tracker.wait(ticks, clock, (key, gap) => {
    released.push([key, gap])
  })
  return { released, ...result }
}

describe('NoteTracker', () => {
  it('releases notes in end-tick order with gaps between them', () => {
    const tracker = new NoteTracker()
    tracker.add(60, 48)
    tracker.add(62, 24)

    const { released, clock, remaining } = releases(tracker, 48, 0)

    expect(released).toEqual([[62, 24], [60, 24]])
    expect(clock).toBe(48)
    expect(remaining).toBe(0)
    expect(tracker.size).toBe(0)
  })

  it('releases notes with equal end ticks in insertion order', () => {
    const tracker = new NoteTracker()
    tracker.add(64, 10)
    tracker.add(60, 10)
    tracker.add(67, 10)

    const { released } = releases(tracker, 10, 0)

    expect(released).toEqual([[64, 10], [60, 0], [67, 0]])
  })

  it('keeps notes that end after the wait', () => {
    const tracker = new NoteTracker()
    tracker.add(60, 100)

    const first = releases(tracker, 30, 0)
    expect(first.released).toEqual([])
    expect(first.clock).toBe(30)
    expect(first.remaining).toBe(30)
    expect(tracker.pending()).toEqual([{ key: 60, end: 100 }])

    const second = releases(tracker, 80, 30)
    expect(second.released).toEqual([[60, 70]])
    expect(second.clock).toBe(110)
    expect(second.remaining).toBe(10)
  })

  it('releases a note ending exactly on the target tick', () => {
    const tracker = new NoteTracker()
    tracker.add(72, 96)

    const { released, remaining } = releases(tracker, 96, 0)
    expect(released).toEqual([[72, 96]])
    expect(remaining).toBe(0)
  })

  it('releases a zero-length note on a zero wait', () => {
    const tracker = new NoteTracker()
    tracker.add(50, 0)

    expect(releases(tracker, 0, 0).released).toEqual([[50, 0]])
  })

  it('advances by the full wait when nothing is pending', () => {
    const tracker = new NoteTracker()

    expect(releases(tracker, 20, 5)).toEqual({ released: [], clock: 25, remaining: 20 })
  })

  it('drains keys in list order', () => {
    const tracker = new NoteTracker()
    tracker.add(60, 200)
    tracker.add(55, 100)

    expect(tracker.drain()).toEqual([60, 55])
    expect(tracker.size).toBe(0)
  })
})
