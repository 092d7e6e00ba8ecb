// =============================================================================
// rseq-midi - Conversion Tests
// =============================================================================

import { convertRseq } from '../convert'
import { silentLogger } from '../logger'
import { ContainerInvalidError, MissingRequiredChunkError } from '../errors'
import { buildRseq, u24 } from './helpers'
import { countTrack, markersOf, readMidi } from './midi-reader'

describe('convertRseq', () => {
  it('converts a single-track sequence with a label', () => {
    const bytes = buildRseq({
      code: [0x81, 0x05, 0x3C, 0x64, 0x60, 0x80, 0x60, 0xFF],
      labels: [{ offset: 2, text: 'theme' }]
    })

    const result = convertRseq(bytes, { logger: silentLogger })

    expect(result.trackCount).toBe(1)
    expect(result.tracks).toEqual([{ index: 0, byteLength: 24 }])
    expect(Array.from(result.midi)).toEqual([
      // MThd: format 1, one track, 96 ticks per quarter
      0x4D, 0x54, 0x68, 0x64, 0, 0, 0, 6, 0, 1, 0, 1, 0, 96,
      // MTrk
      0x4D, 0x54, 0x72, 0x6B, 0, 0, 0, 24,
      0x00, 0xC0, 0x05,
      0x00, 0xFF, 0x06, 0x05, 0x74, 0x68, 0x65, 0x6D, 0x65,
      0x00, 0x90, 0x3C, 0x64,
      0x60, 0x90, 0x3C, 0x00,
      0x00, 0xFF, 0x2F, 0x00
    ])
  })

  it('writes tracks in index order and leaves out silent ones', () => {
    const bytes = buildRseq({
      code: [
        0x88, 0x03, ...u24(11), // split track 3 to offset 11
        0x3C, 0x50, 0x18,       // note 60, 24 ticks
        0x80, 0x18,
        0xFF,
        0x43, 0x50, 0x0C,       // note 67, 12 ticks
        0x80, 0x0C,
        0xFF
      ]
    })

    const result = convertRseq(bytes, { logger: silentLogger })
    expect(result.tracks.map((track) => track.index)).toEqual([0, 3])

    const file = readMidi(result.midi)
    expect(file.format).toBe(1)
    expect(file.ppq).toBe(96)
    expect(file.tracks.map(countTrack).map((track) => [track.channel, track.noteOns, track.noteOffs, track.endTick])).toEqual([
      [0, 1, 1, 24],
      [3, 1, 1, 12]
    ])
  })

  it('passes the decoder options to every track', () => {
    const bytes = buildRseq({ code: [0x89, ...u24(6), 0x81, 0x09, 0xFF] })

    const taken = readMidi(convertRseq(bytes, { logger: silentLogger }).midi)
    const ignored = readMidi(convertRseq(bytes, { logger: silentLogger, ignoreJumps: true }).midi)

    expect(markersOf(taken.tracks[0])).toEqual(['Jump (forwards, taken)'])
    expect(markersOf(ignored.tracks[0])).toEqual(['Jump (forwards, ignored)'])
  })

  it('rejects invalid containers', () => {
    expect(() => convertRseq(buildRseq({ code: [0xFF], tag: 'SSEQ' }), { logger: silentLogger }))
      .toThrow(ContainerInvalidError)
    expect(() => convertRseq(buildRseq({ code: [], omitData: true }), { logger: silentLogger }))
      .toThrow(MissingRequiredChunkError)
  })
})
