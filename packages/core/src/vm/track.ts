// =============================================================================
// rseq-midi - Track Virtual Machine
// =============================================================================

import type { ByteCursor } from '../io/byte-cursor'
import type { Logger } from '../logger'
import type { NrpnAddress } from './constants'
import type { PendingNote } from './note-tracker'
import type { TrackContext } from './types'
import { CC, NRPN, OP, TRACK_COUNT } from './constants'
import { NoteTracker } from './note-tracker'
import { TrackWriter } from './track-writer'
import { signedBendToMidi, tempoToMicrosPerQuarter } from '../export/midi-utils'

/**
 * Format a number as upper-case hex for log lines.
 */
function hex(value: number, width = 2): string {
  return value.toString(16).toUpperCase().padStart(width, '0')
}

/**
 * Interpreter for one track's instruction stream.
 *
 * A track is inactive until `start`, runs one instruction per `step`, and
 * goes inactive again at end-of-track or a loop-back jump. It can be
 * started again at any time, by itself or by another track.
 */
export class TrackMachine {
  private active = false
  private transposeValue = 0
  private rpnReady = false
  private readPosition = 0
  private clockTicks = 0
  private returnTo = 0

  private readonly notes = new NoteTracker()
  private readonly writer: TrackWriter
  private readonly tag: string

  constructor(
    public readonly index: number,
    private readonly context: TrackContext
  ) {
    this.writer = new TrackWriter(index, context.options.logger)
    this.tag = `[Track ${String(index).padStart(2, '0')}]`
  }

  private get logger(): Logger {
    return this.context.options.logger
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get isActive(): boolean {
    return this.active
  }

  /** Absolute source offset of the next instruction. */
  get position(): number {
    return this.readPosition
  }

  /** Ticks since the track was started. */
  get clock(): number {
    return this.clockTicks
  }

  get transpose(): number {
    return this.transposeValue
  }

  /** Whether the registered-parameter preamble has been written. */
  get rpnPrimed(): boolean {
    return this.rpnReady
  }

  /** Saved return offset, 0 when no call is pending. */
  get returnOffset(): number {
    return this.returnTo
  }

  get pendingNotes(): readonly PendingNote[] {
    return this.notes.pending()
  }

  /** Event stream written so far. */
  output(): Uint8Array {
    return this.writer.bytes()
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Activate the track at an absolute source offset, discarding any
   * output, pending notes and call state from a previous run.
   */
  start(address: number): void {
    this.active = true
    this.transposeValue = 0
    this.rpnReady = false
    this.readPosition = address
    this.clockTicks = 0
    this.returnTo = 0
    this.notes.clear()
    this.writer.clear()
    this.logger.debug(`${this.tag} started from 0x${hex(address)}`)
  }

  /**
   * Release every sounding note, write end-of-track and deactivate.
   */
  end(): void {
    for (const key of this.notes.drain()) {
      this.writer.noteOff(key)
    }
    this.writer.endOfTrack()
    this.active = false
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Decode and apply one instruction at the track's position.
   * The cursor is repositioned here; the caller only supplies it.
   */
  step(cursor: ByteCursor): void {
    if (!this.active) return

    if (this.readPosition >= cursor.length) {
      this.logger.warn(`${this.tag} ran past end of data at 0x${hex(this.readPosition)}`)
      this.end()
      return
    }

    cursor.seek(this.readPosition)

    const label = this.context.labels.get(this.readPosition - this.context.dataOffset)
    if (label !== undefined) {
      this.writer.marker(label)
    }

    const opcode = cursor.u8()
    this.execute(opcode, cursor)

    if (cursor.overran) {
      this.logger.warn(`${this.tag} command ${hex(opcode)} read past end of data`)
    }

    this.readPosition = cursor.offset
  }

  private execute(opcode: number, cursor: ByteCursor): void {
    // Implicit note-on: the selector is the key
    if (opcode < 0x80) {
      const velocity = cursor.u8()
      const duration = cursor.varLen()
      this.writer.noteOn(opcode, velocity)
      this.notes.add(opcode, this.clockTicks + duration)
      return
    }

    const { options } = this.context

    switch (opcode) {
      // --- Flow ---
      case OP.WAIT:
        this.wait(cursor.varLen())
        break

      case OP.PROGRAM: {
        let value = cursor.u8()
        this.writer.program(value & 0x7F)
        // Up to two bank-select continuation bytes
        if (value & 0x80) value = cursor.u8()
        if (value & 0x80) cursor.u8()
        break
      }

      case OP.SPLIT: {
        const target = cursor.u8()
        const address = this.context.dataOffset + cursor.u24be()
        if (target >= TRACK_COUNT) {
          this.logger.warn(`${this.tag} split to invalid track ${target} ignored`)
          break
        }
        this.context.host.start(target, address)
        if (target === this.index) {
          cursor.seek(address)
        }
        break
      }

      case OP.JUMP:
        this.jump(this.context.dataOffset + cursor.u24be(), cursor)
        break

      case OP.CALL: {
        const address = this.context.dataOffset + cursor.u24be()
        this.returnTo = cursor.offset
        this.logger.debug(`${this.tag} call to 0x${hex(address)}`)
        cursor.seek(address)
        break
      }

      case OP.RETURN:
        if (this.returnTo !== 0) {
          cursor.seek(this.returnTo)
          this.returnTo = 0
        }
        break

      case OP.END:
        this.logger.debug(
          `${this.tag} end at 0x${hex(cursor.offset - 1 - this.context.dataOffset)}`
        )
        this.end()
        break

      // --- Mapped controllers ---
      case OP.PAN:
        this.writer.controller(CC.PAN, cursor.u8())
        break

      case OP.VOLUME:
        this.writer.controller(CC.VOLUME, cursor.u8())
        break

      case OP.MASTER_VOLUME:
        this.writer.controller(CC.MASTER_VOLUME, cursor.u8())
        break

      case OP.EXPRESSION:
        this.writer.controller(CC.EXPRESSION, cursor.u8())
        break

      case OP.MOD_DEPTH:
        this.writer.controller(CC.MODULATION, cursor.u8())
        break

      case OP.PORTAMENTO_CONTROL:
        this.writer.controller(CC.PORTAMENTO_CONTROL, cursor.u8())
        break

      case OP.PORTAMENTO:
        this.writer.controller(CC.PORTAMENTO, cursor.u8())
        break

      case OP.PORTAMENTO_TIME:
        this.writer.controller(CC.PORTAMENTO_TIME, cursor.u8())
        break

      case OP.LOOP_START:
        this.writer.controller(CC.LOOP_MARKER, 0)
        break

      case OP.LOOP_END:
        this.writer.controller(CC.LOOP_MARKER, 1)
        break

      case OP.TRANSPOSE: {
        const raw = cursor.u8()
        this.transposeValue = raw & 0x80 ? raw - 0x100 : raw
        this.writeNrpn(NRPN.TRANSPOSE, raw)
        break
      }

      case OP.PITCH_BEND:
        this.writer.pitchBend(signedBendToMidi(cursor.s8()))
        break

      case OP.PITCH_BEND_RANGE: {
        const range = cursor.u8()
        if (!this.rpnReady) {
          this.writer.rpn(0, 0)
          this.rpnReady = true
        }
        this.writer.controller(CC.DATA_ENTRY, range)
        break
      }

      case OP.TEMPO: {
        const tempo = cursor.u16be()
        const micros = tempoToMicrosPerQuarter(tempo)
        if (micros === null) {
          this.logger.warn(`${this.tag} tempo of 0 ignored`)
          break
        }
        this.writer.tempo(micros)
        break
      }

      // --- Debug-only mappings ---
      case OP.MOD_SPEED:
        this.debugController(CC.MOD_SPEED, cursor.u8())
        break

      case OP.MOD_TYPE:
        this.debugController(CC.MOD_TYPE, cursor.u8())
        break

      case OP.MOD_RANGE:
        this.debugController(CC.MOD_RANGE, cursor.u8())
        break

      case OP.ATTACK:
        this.debugController(CC.ATTACK, cursor.u8())
        break

      case OP.SUSTAIN:
        this.debugController(CC.SUSTAIN, cursor.u8())
        break

      case OP.RELEASE:
        this.debugController(CC.RELEASE, cursor.u8())
        break

      case OP.DECAY: {
        const value = cursor.u8()
        if (options.debugControllers) {
          this.writeNrpn(NRPN.DECAY, value)
        }
        break
      }

      case OP.MOD_DELAY:
        this.debugController(CC.MOD_DELAY, cursor.u16be() & 0x7F)
        break

      case OP.SWEEP:
      case OP.TRACK_USAGE:
        cursor.u16be()
        this.debugController(CC.DEBUG_COMMAND, opcode & 0x7F)
        break

      // --- No mapping: opcode/argument pair in debug mode ---
      case OP.UNKNOWN_B0:
      case OP.PRIORITY:
      case OP.POLYPHONY:
      case OP.TIE:
      case OP.PRINT:
      case OP.UNKNOWN_D8:
      case OP.UNKNOWN_D9:
      case OP.UNKNOWN_DA:
      case OP.UNKNOWN_DB:
        this.debugPair(opcode, cursor.u8())
        break

      default:
        // Argument width unknown: nothing is skipped
        this.logger.warn(
          `${this.tag} unknown command ${hex(opcode)} at 0x${hex(cursor.offset - 1)}`
        )
        break
    }
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Advance the clock, writing note-offs for every note that ends inside
   * the wait. Whatever is left after the last note-off stays pending and
   * becomes part of the next event's delta.
   */
  private wait(ticks: number): void {
    const { clock, remaining } = this.notes.wait(ticks, this.clockTicks, (key, gap) => {
      this.writer.wait(gap)
      this.writer.noteOff(key)
    })
    this.clockTicks = clock
    this.writer.wait(remaining)
  }

  /**
   * Forward jumps are taken; backward jumps close a loop and end the
   * track, since loop counts are not modelled. With `ignoreJumps` neither
   * happens and decoding continues after the jump.
   */
  private jump(address: number, cursor: ByteCursor): void {
    const forwards = address > cursor.offset
    const direction = forwards ? 'forwards' : 'backwards'
    const outcome = this.context.options.ignoreJumps
      ? 'ignored'
      : forwards ? 'taken' : 'Track End'

    this.logger.debug(`${this.tag} jump (${direction}) to 0x${hex(address)}`)
    this.writer.marker(`Jump (${direction}, ${outcome})`)

    if (this.context.options.ignoreJumps) return

    if (forwards) {
      cursor.seek(address)
    } else {
      this.end()
    }
  }

  private writeNrpn(address: NrpnAddress, value: number): void {
    this.writer.nrpn(address.msb, address.lsb, value)
    this.rpnReady = false
  }

  private debugController(controller: number, value: number): void {
    if (this.context.options.debugControllers) {
      this.writer.controller(controller, value)
    }
  }

  private debugPair(opcode: number, value: number): void {
    if (this.context.options.debugControllers) {
      this.writer.controller(CC.DEBUG_COMMAND, opcode & 0x7F)
      this.writer.controller(CC.DEBUG_VALUE, value)
    }
  }
}
