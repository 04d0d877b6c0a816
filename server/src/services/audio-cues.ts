/**
 * Audio cues
 *
 * Short tone patterns that tell the user what the assistant is doing
 * without speech.
 *
 * @module services/audio-cues
 */

import type { CueTone } from "@screen-narrator/types";
import { runProcess } from "../execution/process/index.js";

export type CueName =
  | "captureAdmitted"
  | "followUpAdmitted"
  | "denied"
  | "error"
  | "cancel"
  | "stop"
  | "captured"
  | "ready"
  | "recordingStart"
  | "recordingStop"
  | "submit"
  | "tick"
  | "credentialRequested"
  | "credentialSaved";

const tones = (...pairs: Array<[number, number]>): CueTone[] =>
  pairs.map(([frequency, durationMs]) => ({ frequency, durationMs }));

export const CUES: Record<CueName, CueTone[]> = {
  captureAdmitted: tones([740, 60], [900, 70]),
  followUpAdmitted: tones([760, 60], [1040, 80]),
  denied: tones([420, 90], [380, 90]),
  error: tones([420, 90], [380, 90], [340, 90]),
  cancel: tones([460, 70], [390, 90], [320, 110]),
  stop: tones([500, 70], [420, 90]),
  captured: tones([1100, 70]),
  ready: tones([1250, 90], [1500, 120]),
  recordingStart: tones([1320, 140], [1560, 170]),
  recordingStop: tones([900, 80], [1060, 100]),
  submit: tones([980, 90], [1180, 110]),
  tick: tones([980, 70]),
  credentialRequested: tones([950, 70], [1200, 90]),
  credentialSaved: tones([1200, 90], [1450, 120]),
};

/** Pause between tones of one pattern */
const TONE_GAP_MS = 40;

/**
 * Interface for cue players
 */
export interface AudioCuePlayer {
  /** Play a tone pattern. Never rejects. */
  play(pattern: CueTone[]): Promise<void>;
}

/**
 * Plays tones through PowerShell's console beep on Windows and rings the
 * terminal bell elsewhere.
 */
export class SystemCuePlayer implements AudioCuePlayer {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly bell: NodeJS.WritableStream = process.stdout
  ) {}

  async play(pattern: CueTone[]): Promise<void> {
    if (pattern.length === 0) {
      return;
    }

    if (this.platform !== "win32") {
      this.bell.write("\x07");
      return;
    }

    const script = pattern
      .map(
        ({ frequency, durationMs }) =>
          `[console]::beep(${Math.round(frequency)}, ${Math.round(durationMs)}); Start-Sleep -Milliseconds ${TONE_GAP_MS}`
      )
      .join("; ");
    const result = await runProcess(null, {
      command: "powershell",
      args: ["-NoProfile", "-Command", script],
      timeoutMs: 5000,
    });
    if (result.error || result.status !== 0) {
      console.warn(
        `[cues] Beep failed: ${result.error?.message ?? result.stderr.trim()}`
      );
    }
  }
}
