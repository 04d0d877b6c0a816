/**
 * Transcription Provider
 *
 * One bounded microphone transcription attempt per call. The recognizer is
 * an external command tracked in a process slot so that cancel and submit
 * can end the attempt early.
 *
 * @module services/transcription-provider
 */

import {
  fillPlaceholders,
  formatProcessError,
  ProcessSlot,
  runProcess,
} from "../execution/process/index.js";
import {
  TranscriptionCanceledError,
  TranscriptionTimeoutError,
} from "../errors/assistant-errors.js";
import type { Signal } from "./cancellation.js";

export interface TranscriptionSignals {
  cancelToken: Signal;
  submitSignal: Signal;
}

/**
 * Interface for transcription providers
 */
export interface TranscriptionProvider {
  /**
   * Listen for up to `timeoutSeconds` and return what was heard.
   *
   * @returns trimmed transcript, or null when nothing usable was heard or the
   * attempt was canceled or submitted early
   */
  transcribe(
    timeoutSeconds: number,
    signals: TranscriptionSignals
  ): Promise<string | null>;

  /**
   * Terminate the live attempt from another task.
   *
   * @returns true if an attempt was running
   */
  cancelActive(): Promise<boolean>;

  /**
   * Whether a recognizer is configured at all
   */
  isAvailable(): boolean;
}

/** Minimum hard deadline for one attempt */
const MIN_DEADLINE_SECONDS = 12;

/** Slack added to the requested timeout before the attempt is killed */
const DEADLINE_SLACK_SECONDS = 5;

const WINDOWS_DICTATION = [
  "Add-Type -AssemblyName System.Speech;",
  "$recognizer = New-Object System.Speech.Recognition.SpeechRecognitionEngine;",
  "$recognizer.SetInputToDefaultAudioDevice();",
  "$grammar = New-Object System.Speech.Recognition.DictationGrammar;",
  "$recognizer.LoadGrammar($grammar);",
  "$result = $recognizer.Recognize([TimeSpan]::FromSeconds({seconds}));",
  "if ($result -ne $null) {",
  "  [Console]::OutputEncoding = [System.Text.Encoding]::UTF8;",
  "  Write-Output $result.Text",
  "}",
].join(" ");

/**
 * Default recognizer command line for a platform, or null when the platform
 * has no built-in dictation command
 */
export function getDefaultTranscriptionCommand(
  platform: NodeJS.Platform = process.platform
): string[] | null {
  if (platform === "win32") {
    return ["powershell", "-NoProfile", "-Command", WINDOWS_DICTATION];
  }
  return null;
}

/**
 * Hard deadline for one attempt: max(timeout + 5 s, 12 s)
 */
export function transcriptionDeadlineMs(timeoutSeconds: number): number {
  return (
    Math.max(timeoutSeconds + DEADLINE_SLACK_SECONDS, MIN_DEADLINE_SECONDS) *
    1000
  );
}

export interface ProcessTranscriptionConfig {
  /** Command line with an optional `{seconds}` placeholder; null = unavailable */
  command: string[] | null;
  slot?: ProcessSlot;
}

export class ProcessTranscriptionProvider implements TranscriptionProvider {
  private readonly slot: ProcessSlot;
  private warnedUnavailable = false;

  constructor(private readonly config: ProcessTranscriptionConfig) {
    this.slot = config.slot ?? new ProcessSlot("transcription");
  }

  async transcribe(
    timeoutSeconds: number,
    signals: TranscriptionSignals
  ): Promise<string | null> {
    try {
      return await this.runAttempt(timeoutSeconds, signals);
    } catch (error) {
      if (error instanceof TranscriptionCanceledError) {
        console.log(`[transcription] ${error.message}`);
        return null;
      }
      if (error instanceof TranscriptionTimeoutError) {
        console.error(`[transcription] ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  cancelActive(): Promise<boolean> {
    return this.slot.terminate();
  }

  isAvailable(): boolean {
    const available = (this.config.command?.length ?? 0) > 0;
    if (!available && !this.warnedUnavailable) {
      this.warnedUnavailable = true;
      console.warn(
        "[transcription] No recognizer configured. Set NARRATOR_TRANSCRIBE_COMMAND to enable follow-up questions."
      );
    }
    return available;
  }

  private async runAttempt(
    timeoutSeconds: number,
    { cancelToken, submitSignal }: TranscriptionSignals
  ): Promise<string | null> {
    const commandLine = this.config.command;
    if (!commandLine || !this.isAvailable()) {
      return null;
    }
    if (cancelToken.isSet()) {
      throw new TranscriptionCanceledError("cancel");
    }
    if (submitSignal.isSet()) {
      throw new TranscriptionCanceledError("submit");
    }

    const [command, ...args] = commandLine;
    const deadlineMs = transcriptionDeadlineMs(timeoutSeconds);
    const seconds = String(Math.max(1, Math.ceil(timeoutSeconds)));

    const stopAttempt = () => {
      void this.slot.terminate();
    };
    const unsubscribeCancel = cancelToken.onSet(stopAttempt);
    const unsubscribeSubmit = submitSignal.onSet(stopAttempt);
    const startedAt = Date.now();

    const result = await runProcess(this.slot, {
      command,
      args: fillPlaceholders(args, { seconds }),
      timeoutMs: deadlineMs,
    }).finally(() => {
      unsubscribeCancel();
      unsubscribeSubmit();
    });

    if (cancelToken.isSet()) {
      throw new TranscriptionCanceledError("cancel");
    }
    if (submitSignal.isSet()) {
      throw new TranscriptionCanceledError("submit");
    }
    if (result.terminated) {
      if (Date.now() - startedAt >= deadlineMs) {
        throw new TranscriptionTimeoutError(deadlineMs);
      }
      throw new TranscriptionCanceledError("cancel");
    }
    if (result.error || result.status !== 0) {
      console.error(
        `[transcription] Microphone transcription failed: ${result.error?.message ?? formatProcessError(result.status, result.signal)} ${result.stderr.trim()}`.trim()
      );
      return null;
    }

    const transcript = result.stdout.trim();
    return transcript || null;
  }
}
