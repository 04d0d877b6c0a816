/**
 * Speech Command Backend
 *
 * One-shot platform speech command with the text on stdin.
 *
 * @module services/speech-backends/speech-command
 */

import {
  formatProcessError,
  isCommandAvailable,
  runProcess,
} from "../../execution/process/index.js";
import { SpeechBackendError } from "../../errors/assistant-errors.js";
import {
  isStopRequested,
  type CommandTemplate,
  type SpeechBackend,
  type SpeechContext,
} from "./types.js";

export class SpeechCommandBackend implements SpeechBackend {
  readonly name = "speech-command" as const;

  constructor(private readonly command: CommandTemplate | null) {}

  async attempt(text: string, ctx: SpeechContext): Promise<boolean> {
    if (isStopRequested(ctx)) {
      return true;
    }
    if (!this.command || !(await isCommandAvailable(this.command.command))) {
      return false;
    }

    const result = await runProcess(ctx.slot, {
      command: this.command.command,
      args: this.command.args,
      input: text,
    });

    if (isStopRequested(ctx)) {
      console.log("[speech] Speech interrupted during command playback");
      return true;
    }
    if (result.error || result.status !== 0) {
      throw new SpeechBackendError(
        this.name,
        result.error?.message ??
          formatProcessError(result.status, result.signal),
        { stderr: result.stderr.trim() }
      );
    }
    console.log("[speech] Speech backend: speech-command");
    return true;
  }
}
