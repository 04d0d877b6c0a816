/**
 * Script Helper Speech Backend
 *
 * Pipes the text into a small helper script written once to the temp dir.
 *
 * @module services/speech-backends/script-helper
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  fillPlaceholders,
  formatProcessError,
  isCommandAvailable,
  runProcess,
} from "../../execution/process/index.js";
import { SpeechBackendError } from "../../errors/assistant-errors.js";
import type { ScriptHelperProfile } from "./profiles.js";
import {
  isStopRequested,
  type SpeechBackend,
  type SpeechContext,
} from "./types.js";

export interface ScriptHelperBackendConfig {
  profile: ScriptHelperProfile | null;
  /** Directory for the helper script (default: OS temp dir) */
  tempDir?: string;
}

export class ScriptHelperBackend implements SpeechBackend {
  readonly name = "script-helper" as const;
  private scriptPath: string | null = null;

  constructor(private readonly config: ScriptHelperBackendConfig) {}

  async attempt(text: string, ctx: SpeechContext): Promise<boolean> {
    if (isStopRequested(ctx)) {
      return true;
    }

    const profile = this.config.profile;
    if (!profile || !(await isCommandAvailable(profile.interpreter.command))) {
      return false;
    }

    const script = await this.ensureScript(profile);
    const result = await runProcess(ctx.slot, {
      command: profile.interpreter.command,
      args: fillPlaceholders(profile.interpreter.args, { script }),
      input: text,
    });

    if (isStopRequested(ctx)) {
      console.log("[speech] Speech interrupted during helper playback");
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
    console.log("[speech] Speech backend: script-helper");
    return true;
  }

  private async ensureScript(profile: ScriptHelperProfile): Promise<string> {
    if (this.scriptPath) {
      return this.scriptPath;
    }
    const scriptPath = path.join(
      this.config.tempDir ?? os.tmpdir(),
      profile.fileName
    );
    await fs.writeFile(scriptPath, profile.source, {
      encoding: "utf-8",
      mode: 0o700,
    });
    this.scriptPath = scriptPath;
    return scriptPath;
  }
}
