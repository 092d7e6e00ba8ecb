// =============================================================================
// rseq-midi - Track Event Writer
// =============================================================================

import type { Logger } from '../logger'
import { silentLogger } from '../logger'
import { VLQ_MAX, writeVLQ, writeUint24BE } from '../export/midi-utils'
import { encodeLatin1 } from '../io/byte-cursor'
import { CC, META, STATUS } from './constants'

/**
 * Appends delta-timed MIDI events to one track's byte stream.
 *
 * Waits accumulate into a pending delta that is written in front of the
 * next event, so consecutive waits with nothing between them collapse into
 * a single delta.
 */
export class TrackWriter {
  private data: number[] = []
  private pendingDelta = 0

  constructor(
    public readonly channel: number,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Bytes written so far. */
  get length(): number {
    return this.data.length
  }

  /** Ticks waited since the last event. */
  get pendingTicks(): number {
    return this.pendingDelta
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.data)
  }

  clear(): void {
    this.data = []
    this.pendingDelta = 0
  }

  wait(ticks: number): void {
    this.pendingDelta += ticks
  }

  // ===========================================================================
  // Raw Events
  // ===========================================================================

  /**
   * Write the pending delta, then a channel status and its data bytes.
   * Data bytes are masked to 7 bits.
   */
  event(status: number, ...data: number[]): void {
    this.flushDelta()
    this.data.push((status & 0xF0) | (this.channel & 0x0F))
    for (const byte of data) {
      this.data.push(byte & 0x7F)
    }
  }

  /**
   * Write the pending delta, then a meta event.
   */
  meta(type: number, payload: Uint8Array): void {
    this.flushDelta()
    this.data.push(STATUS.META, type & 0x7F)
    this.push(writeVLQ(payload.length))
    this.push(payload)
  }

  // ===========================================================================
  // Channel Messages
  // ===========================================================================

  noteOn(key: number, velocity: number): void {
    this.event(STATUS.NOTE_ON, key, velocity)
  }

  /**
   * Note-off, written as a note-on with velocity 0.
   */
  noteOff(key: number): void {
    this.event(STATUS.NOTE_ON, key, 0)
  }

  controller(controller: number, value: number): void {
    this.event(STATUS.CONTROL_CHANGE, controller, value)
  }

  program(program: number): void {
    this.event(STATUS.PROGRAM_CHANGE, program)
  }

  /**
   * @param value - 14-bit bend (0-16383, 8192 = center)
   */
  pitchBend(value: number): void {
    const clamped = Math.max(0, Math.min(0x3FFF, value))
    this.event(STATUS.PITCH_BEND, clamped & 0x7F, clamped >> 7)
  }

  /**
   * Registered parameter preamble: RPN MSB then LSB.
   */
  rpn(msb: number, lsb: number): void {
    this.controller(CC.RPN_MSB, msb)
    this.controller(CC.RPN_LSB, lsb)
  }

  /**
   * Non-registered parameter write: NRPN MSB, LSB, then data entry.
   */
  nrpn(msb: number, lsb: number, value: number): void {
    this.controller(CC.NRPN_MSB, msb)
    this.controller(CC.NRPN_LSB, lsb)
    this.controller(CC.DATA_ENTRY, value)
  }

  // ===========================================================================
  // Meta Events
  // ===========================================================================

  marker(text: string): void {
    this.meta(META.MARKER, encodeLatin1(text))
  }

  tempo(microsPerQuarter: number): void {
    this.meta(META.SET_TEMPO, writeUint24BE(Math.min(microsPerQuarter, 0xFFFFFF)))
  }

  endOfTrack(): void {
    this.meta(META.END_OF_TRACK, new Uint8Array(0))
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Write the pending delta. A delta too large for a 4-byte VLQ is split
   * across empty text meta events so the total time is kept.
   */
  private flushDelta(): void {
    if (this.pendingDelta > VLQ_MAX) {
      const total = this.pendingDelta
      let fillers = 0
      while (this.pendingDelta > VLQ_MAX) {
        this.push(writeVLQ(VLQ_MAX))
        this.data.push(STATUS.META, META.TEXT, 0x00)
        this.pendingDelta -= VLQ_MAX
        fillers++
      }
      this.logger.warn(
        `[Track ${String(this.channel).padStart(2, '0')}] delta of ${total} ticks ` +
          `split across ${fillers + 1} events`
      )
    }
    this.push(writeVLQ(this.pendingDelta))
    this.pendingDelta = 0
  }

  private push(bytes: Uint8Array): void {
    for (const byte of bytes) {
      this.data.push(byte)
    }
  }
}
