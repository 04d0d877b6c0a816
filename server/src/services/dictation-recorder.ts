/**
 * Dictation Recorder
 *
 * Records a spoken follow-up question as a series of short transcription
 * attempts, so the user can send it early instead of waiting for the
 * maximum duration.
 *
 * @module services/dictation-recorder
 */

import type { DictationEnd, DictationOutcome } from "@screen-narrator/types";
import { delay } from "../execution/process/index.js";
import type { CancellationToken, Signal } from "./cancellation.js";
import type { TranscriptionProvider } from "./transcription-provider.js";

export interface DictationRequest {
  maxDurationSeconds: number;
  chunkSeconds: number;
  cancelToken: CancellationToken;
  /** Set when the user asks to send the question now */
  submitSignal: Signal;
}

export interface DictationRecorderOptions {
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

export class DictationRecorder {
  private readonly now: () => number;

  constructor(
    private readonly provider: TranscriptionProvider,
    options: DictationRecorderOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async record(request: DictationRequest): Promise<DictationOutcome> {
    const { maxDurationSeconds, chunkSeconds, cancelToken, submitSignal } =
      request;
    const chunks: string[] = [];
    const startedAt = this.now();
    let endedBy: DictationEnd = "timeout";

    if (!this.provider.isAvailable()) {
      return { status: "completed", transcript: null, endedBy };
    }

    for (;;) {
      const remaining = maxDurationSeconds - (this.now() - startedAt) / 1000;
      if (remaining <= 0) {
        break;
      }
      if (cancelToken.isSet()) {
        return { status: "canceled" };
      }
      if (submitSignal.isSet()) {
        endedBy = "submit";
        break;
      }

      const chunk = await this.provider.transcribe(
        Math.min(chunkSeconds, remaining),
        { cancelToken, submitSignal }
      );
      if (cancelToken.isSet()) {
        return { status: "canceled" };
      }

      const text = chunk?.trim();
      if (text) {
        chunks.push(text);
        console.log(`[dictation] Heard: ${text}`);
      }
      if (submitSignal.isSet()) {
        endedBy = "submit";
        break;
      }
      // Let timers and I/O run between attempts
      await delay(0);
    }

    return {
      status: "completed",
      transcript: chunks.length > 0 ? chunks.join(" ") : null,
      endedBy,
    };
  }
}
