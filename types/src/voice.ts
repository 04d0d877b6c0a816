/**
 * Narration and dictation types shared between the daemon and its clients
 */

/**
 * Options accepted by a narration request
 */
export interface NarrationOptions {
  /** Terminate the active narration before queuing this one */
  interrupt?: boolean
  /** Number of times the text is spoken (minimum 1) */
  repeatCount?: number
}

/**
 * Identifier of a speech backend, in fallback priority order
 */
export type SpeechBackendName =
  | 'wave-file'
  | 'script-helper'
  | 'speech-command'
  | 'in-process'

/**
 * Follow-up dictation subsystem state
 */
export type FollowUpState = 'idle' | 'listening'

/**
 * Why a dictation loop stopped accumulating chunks
 */
export type DictationEnd = 'timeout' | 'submit'

/**
 * Result of one dictation session
 */
export type DictationOutcome =
  | { status: 'canceled' }
  | {
      status: 'completed'
      /** Heard chunks joined with single spaces, or null when nothing was heard */
      transcript: string | null
      endedBy: DictationEnd
    }

/**
 * One sine tone of an audio cue
 */
export interface CueTone {
  /** Frequency in Hz */
  frequency: number
  /** Duration in milliseconds */
  durationMs: number
}
