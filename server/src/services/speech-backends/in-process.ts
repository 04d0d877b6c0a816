/**
 * In-process speech engine backend (last resort)
 *
 * @module services/speech-backends/in-process
 */

import {
  isStopRequested,
  type SpeechBackend,
  type SpeechContext,
} from "./types.js";

/**
 * A speech engine living inside this process
 */
export interface SpeechEngine {
  say(text: string): Promise<void>;
  stop(): void;
}

/**
 * Writes the narration to the terminal so the text is never lost when no
 * speech command works.
 */
export class TerminalSpeechEngine implements SpeechEngine {
  async say(text: string): Promise<void> {
    console.log(`[narration] ${text}`);
  }

  stop(): void {}
}

export class InProcessEngineBackend implements SpeechBackend {
  readonly name = "in-process" as const;

  constructor(private readonly engine: SpeechEngine = new TerminalSpeechEngine()) {}

  async attempt(text: string, ctx: SpeechContext): Promise<boolean> {
    if (isStopRequested(ctx)) {
      return true;
    }
    await this.engine.say(text);
    console.log("[speech] Speech backend: in-process");
    return true;
  }

  stop(): void {
    this.engine.stop();
  }
}
