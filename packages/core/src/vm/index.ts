// =============================================================================
// rseq-midi - VM Module
// =============================================================================

export { Scheduler } from './scheduler'
export { TrackMachine } from './track'
export { TrackWriter } from './track-writer'
export { NoteTracker } from './note-tracker'
export type { PendingNote, ReleaseHandler, WaitResult } from './note-tracker'
export type { TrackHost, TrackContext, TrackOutput, SchedulerResult } from './types'
export {
  TRACK_COUNT,
  OUTPUT_PPQ,
  OP,
  CC,
  STATUS,
  META,
  NRPN
} from './constants'
export type { OpCode, ControllerNumber, NrpnAddress } from './constants'
