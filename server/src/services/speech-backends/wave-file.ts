/**
 * Wave File Speech Backend
 *
 * Renders the text to a temporary .wav file, then plays it with a separate
 * player process for the rendered duration plus a guard margin. Playback is
 * polled so a stop request can cut it short.
 *
 * @module services/speech-backends/wave-file
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  delay,
  fillPlaceholders,
  formatProcessError,
  generateId,
  isCommandAvailable,
  runProcess,
} from "../../execution/process/index.js";
import { SpeechBackendError } from "../../errors/assistant-errors.js";
import { readWaveDurationMs } from "../../utils/wav.js";
import type { WaveFileProfile } from "./profiles.js";
import {
  isStopRequested,
  type SpeechBackend,
  type SpeechContext,
} from "./types.js";

const POLL_INTERVAL_MS = 50;

export interface WaveFileBackendConfig {
  profile: WaveFileProfile | null;
  /** Assumed duration when the rendered header is unreadable */
  fallbackDurationMs: number;
  /** Time allowed past the rendered duration before the player is stopped */
  guardMs: number;
  /** Directory for rendered files (default: OS temp dir) */
  tempDir?: string;
}

export class WaveFileBackend implements SpeechBackend {
  readonly name = "wave-file" as const;

  constructor(private readonly config: WaveFileBackendConfig) {}

  async attempt(text: string, ctx: SpeechContext): Promise<boolean> {
    if (isStopRequested(ctx)) {
      return true;
    }

    const profile = this.config.profile;
    if (
      !profile ||
      !(await isCommandAvailable(profile.render.command)) ||
      !(await isCommandAvailable(profile.player.command))
    ) {
      return false;
    }

    const wavPath = path.join(
      this.config.tempDir ?? os.tmpdir(),
      `${generateId("narrator_tts")}.wav`
    );
    const env = { NARRATOR_TTS_WAV_PATH: wavPath };

    try {
      const render = await runProcess(ctx.slot, {
        command: profile.render.command,
        args: fillPlaceholders(profile.render.args, { wav: wavPath }),
        input: text,
        env,
      });
      if (isStopRequested(ctx)) {
        return true;
      }
      if (render.error || render.status !== 0) {
        throw new SpeechBackendError(
          this.name,
          render.error?.message ??
            formatProcessError(render.status, render.signal),
          { stderr: render.stderr.trim() }
        );
      }

      const durationMs = await this.readDuration(wavPath);
      const playback = runProcess(ctx.slot, {
        command: profile.player.command,
        args: fillPlaceholders(profile.player.args, { wav: wavPath }),
        env,
      });
      const state = { finished: false };
      void playback.then(() => {
        state.finished = true;
      });

      const deadline = Date.now() + durationMs + this.config.guardMs;
      while (!state.finished) {
        if (isStopRequested(ctx)) {
          await ctx.slot.terminate();
          await playback;
          console.log("[speech] Speech interrupted during wave playback");
          return true;
        }
        if (Date.now() >= deadline) {
          await ctx.slot.terminate();
          break;
        }
        await delay(POLL_INTERVAL_MS);
      }

      const played = await playback;
      if (played.error) {
        throw new SpeechBackendError(this.name, played.error.message);
      }
      if (!played.terminated && played.status !== 0) {
        throw new SpeechBackendError(
          this.name,
          formatProcessError(played.status, played.signal),
          { stderr: played.stderr.trim() }
        );
      }
      console.log("[speech] Speech backend: wave-file");
      return true;
    } finally {
      await fs.rm(wavPath, { force: true });
    }
  }

  private async readDuration(wavPath: string): Promise<number> {
    try {
      const duration = readWaveDurationMs(await fs.readFile(wavPath));
      if (duration !== null) {
        return duration;
      }
      console.warn(
        `[speech] Unreadable wave header, assuming ${this.config.fallbackDurationMs}ms`
      );
    } catch (error) {
      console.warn(
        `[speech] Could not read rendered file: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return this.config.fallbackDurationMs;
  }
}
