// =============================================================================
// rseq-midi - Scheduler Tests
// =============================================================================

import { readContainer } from '../container/reader'
import { Scheduler } from '../vm/scheduler'
import { buildRseq, createRecordingLogger, DATA_OFFSET, u24 } from './helpers'

function schedule(code: number[]) {
  const bytes = buildRseq({ code })
  const logger = createRecordingLogger()
  const scheduler = new Scheduler(bytes, readContainer(bytes), { logger })
  return { scheduler, logger }
}

describe('Scheduler', () => {
  it('starts track 0 at the bytecode region', () => {
    const { scheduler } = schedule([0xFF])
    const result = scheduler.run()

    expect(result.tracks).toHaveLength(16)
    expect(Array.from(result.tracks[0].data)).toEqual([0x00, 0xFF, 0x2F, 0x00])
    expect(result.tracks.slice(1).every((track) => track.data.length === 0)).toBe(true)
    expect(result.passes).toBe(1)
    expect(result.steps).toBe(1)
  })

  it('steps a split track in the same pass when its slot comes later', () => {
    const { scheduler } = schedule([
      0x88, 0x01, ...u24(8), // split track 1 to offset 8
      0x80, 0x10,            // wait 16
      0xFF,
      0xC1, 0x50,            // volume 80
      0xFF
    ])
    const result = scheduler.run()

    expect(result.passes).toBe(3)
    expect(result.steps).toBe(5)
    expect(Array.from(result.tracks[0].data)).toEqual([0x10, 0xFF, 0x2F, 0x00])
    expect(Array.from(result.tracks[1].data)).toEqual([0x00, 0xB1, 0x07, 0x50, 0x00, 0xFF, 0x2F, 0x00])
  })

  it('restarts the splitting track when it splits to itself', () => {
    const { scheduler } = schedule([
      0x81, 0x01,
      0x88, 0x00, ...u24(7),
      0x81, 0x02,
      0xFF
    ])
    const result = scheduler.run()

    expect(Array.from(result.tracks[0].data)).toEqual([0x00, 0xC0, 0x02, 0x00, 0xFF, 0x2F, 0x00])
  })

  it('resets an already running track that is split to again', () => {
    const { scheduler } = schedule([
      0x88, 0x01, ...u24(13), // split track 1 to offset 13
      0x80, 0x04,             // wait 4
      0x88, 0x01, ...u24(19), // split track 1 again, to offset 19
      0xFF,
      0x3C, 0x64, 0x60,       // offset 13: note 60 for 96 ticks
      0x80, 0x10,             // wait 16
      0xFF,
      0xC1, 0x50,             // offset 19: volume 80
      0xFF
    ])
    const result = scheduler.run()
    const [issuer, target] = scheduler.tracks

    expect(Array.from(result.tracks[1].data)).toEqual([0x00, 0xB1, 0x07, 0x50, 0x00, 0xFF, 0x2F, 0x00])
    expect(target.clock).toBe(0)
    expect(target.pendingNotes).toEqual([])
    expect(issuer.clock).toBe(4)
    expect(Array.from(result.tracks[0].data)).toEqual([0x04, 0xFF, 0x2F, 0x00])
    expect(result.passes).toBe(4)
    expect(result.steps).toBe(8)
  })

  it('ignores a split to a track that does not exist', () => {
    const { scheduler, logger } = schedule([0x88, 0x10, ...u24(0), 0xFF])
    const result = scheduler.run()

    expect(logger.messages('warn')).toEqual(['[Track 00] split to invalid track 16 ignored'])
    expect(result.tracks.filter((track) => track.data.length > 0)).toHaveLength(1)
  })

  it('ignores a direct start of an out-of-range track', () => {
    const { scheduler, logger } = schedule([0xFF])
    scheduler.start(20, DATA_OFFSET)

    expect(logger.messages('warn')).toEqual(['[Scheduler] no track 20 to start'])
  })

  it('interleaves tracks one instruction per pass', () => {
    const { scheduler } = schedule([
      0x88, 0x02, ...u24(10), // split track 2 to offset 10
      0x81, 0x01,
      0x81, 0x02,
      0xFF,
      0x81, 0x03,
      0xFF
    ])
    scheduler.run()

    const [first, , third] = scheduler.tracks
    expect(first.isActive).toBe(false)
    expect(third.isActive).toBe(false)
    expect(Array.from(third.output())).toEqual([0x00, 0xC2, 0x03, 0x00, 0xFF, 0x2F, 0x00])
  })
})
