/**
 * Speech backend contract
 *
 * @module services/speech-backends/types
 */

import type { SpeechBackendName } from "@screen-narrator/types";
import type {
  CommandTemplate,
  ProcessSlot,
} from "../../execution/process/index.js";
import type { Signal } from "../cancellation.js";

export type { CommandTemplate };

/**
 * Shared state handed to a backend for one narration attempt
 */
export interface SpeechContext {
  /** Slot holding the live narration process */
  slot: ProcessSlot;
  /** Set by stop(); a backend seeing it must end playback and report success */
  suppression: Signal;
  /** True once a newer narration asked to interrupt this one */
  isInterrupted(): boolean;
}

/**
 * One way of turning text into audible speech
 */
export interface SpeechBackend {
  readonly name: SpeechBackendName;

  /**
   * Speak `text` once.
   *
   * @returns true when the text was spoken (or playback was stopped on
   * request); false when the backend is unavailable here
   * @throws SpeechBackendError when the backend ran and failed
   */
  attempt(text: string, ctx: SpeechContext): Promise<boolean>;

  /** Stop in-process playback, if the backend has any */
  stop?(): void;
}

export function isStopRequested(ctx: SpeechContext): boolean {
  return ctx.suppression.isSet() || ctx.isInterrupted();
}
