/**
 * Tests for chunked follow-up dictation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CancellationToken, Signal } from "../../../src/services/cancellation.js";
import { DictationRecorder } from "../../../src/services/dictation-recorder.js";
import type {
  TranscriptionProvider,
  TranscriptionSignals,
} from "../../../src/services/transcription-provider.js";

type ChunkScript = (
  timeoutSeconds: number,
  signals: TranscriptionSignals
) => string | null;

/**
 * Provider whose chunks each take their full timeout on a fake clock
 */
class ScriptedProvider implements TranscriptionProvider {
  timeouts: number[] = [];
  nowMs = 0;
  available = true;

  constructor(private readonly script: ChunkScript[]) {}

  async transcribe(
    timeoutSeconds: number,
    signals: TranscriptionSignals
  ): Promise<string | null> {
    const step = this.script[this.timeouts.length];
    this.timeouts.push(timeoutSeconds);
    this.nowMs += timeoutSeconds * 1000;
    return step ? step(timeoutSeconds, signals) : null;
  }

  async cancelActive(): Promise<boolean> {
    return false;
  }

  isAvailable(): boolean {
    return this.available;
  }
}

/**
 * Provider that hears nothing and answers at once, on the real clock
 */
class SilentProvider implements TranscriptionProvider {
  calls = 0;

  async transcribe(): Promise<string | null> {
    this.calls += 1;
    return null;
  }

  async cancelActive(): Promise<boolean> {
    return false;
  }

  isAvailable(): boolean {
    return true;
  }
}

describe("DictationRecorder", () => {
  let cancelToken: CancellationToken;
  let submitSignal: Signal;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    cancelToken = new CancellationToken();
    submitSignal = new Signal();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  function recorderFor(provider: ScriptedProvider) {
    return new DictationRecorder(provider, { now: () => provider.nowMs });
  }

  it("stops at the maximum duration and joins heard chunks", async () => {
    const provider = new ScriptedProvider([
      () => "what is",
      () => null,
      () => "  on my screen ",
      () => "",
    ]);

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 10,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(provider.timeouts).toEqual([3, 3, 3, 1]);
    expect(outcome).toEqual({
      status: "completed",
      transcript: "what is on my screen",
      endedBy: "timeout",
    });
    expect(logSpy).toHaveBeenCalledWith("[dictation] Heard: what is");
    expect(logSpy).toHaveBeenCalledWith("[dictation] Heard: on my screen");
  });

  it("keeps the chunk that was in flight when submit arrived", async () => {
    const provider = new ScriptedProvider([
      () => "read the",
      (_timeout, signals) => {
        signals.submitSignal.set();
        return "error message";
      },
      () => "never heard",
    ]);

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 30,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(provider.timeouts).toEqual([3, 3]);
    expect(outcome).toEqual({
      status: "completed",
      transcript: "read the error message",
      endedBy: "submit",
    });
  });

  it("returns immediately when submit is already set", async () => {
    const provider = new ScriptedProvider([]);
    submitSignal.set();

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 30,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(provider.timeouts).toEqual([]);
    expect(outcome).toEqual({
      status: "completed",
      transcript: null,
      endedBy: "submit",
    });
  });

  it("discards everything on cancel", async () => {
    const provider = new ScriptedProvider([
      () => "first words",
      () => {
        cancelToken.set();
        return "more words";
      },
    ]);

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 30,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(outcome).toEqual({ status: "canceled" });
  });

  it("reports no transcript when nothing was heard", async () => {
    const provider = new ScriptedProvider([]);

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 6,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(provider.timeouts).toEqual([3, 3]);
    expect(outcome).toEqual({
      status: "completed",
      transcript: null,
      endedBy: "timeout",
    });
  });

  it("skips recording when no recognizer is available", async () => {
    const provider = new ScriptedProvider([() => "never heard"]);
    provider.available = false;

    const outcome = await recorderFor(provider).record({
      maxDurationSeconds: 30,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });

    expect(provider.timeouts).toEqual([]);
    expect(outcome).toEqual({
      status: "completed",
      transcript: null,
      endedBy: "timeout",
    });
  });

  it("honors a cancel from a timer while attempts return at once", async () => {
    const provider = new SilentProvider();
    const timer = setTimeout(() => cancelToken.set(), 20);

    const outcome = await new DictationRecorder(provider).record({
      maxDurationSeconds: 2,
      chunkSeconds: 3,
      cancelToken,
      submitSignal,
    });
    clearTimeout(timer);

    expect(outcome).toEqual({ status: "canceled" });
    expect(provider.calls).toBeGreaterThan(0);
  });
});
