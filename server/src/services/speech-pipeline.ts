/**
 * Speech Pipeline
 *
 * Serializes all narration in the process and walks the backend chain for
 * each utterance. Narration never rejects: backend failures are logged and
 * fall through to the next backend.
 *
 * @module services/speech-pipeline
 */

import { Mutex } from "async-mutex";
import type { NarrationOptions } from "@screen-narrator/types";
import { ProcessSlot } from "../execution/process/index.js";
import { Signal } from "./cancellation.js";
import type { SpeechBackend, SpeechContext } from "./speech-backends/index.js";

export class SpeechPipeline {
  /** Set by stop(); narration is a no-op until resume() */
  readonly suppression = new Signal();
  private readonly lock = new Mutex();
  private readonly slot: ProcessSlot;
  private generation = 0;

  constructor(
    private readonly backends: SpeechBackend[],
    slot: ProcessSlot = new ProcessSlot("narration")
  ) {
    this.slot = slot;
  }

  /**
   * Speak `text`, waiting for any narration already in progress.
   *
   * With `interrupt`, the narration currently playing is cut off first and
   * abandons its remaining repeats.
   */
  async speak(text: string, options: NarrationOptions = {}): Promise<void> {
    const repeatCount = Math.max(1, Math.floor(options.repeatCount ?? 1));

    if (this.suppression.isSet()) {
      console.log("[speech] Speech suppressed due to active stop request");
      return;
    }

    if (options.interrupt && this.lock.isLocked()) {
      this.generation += 1;
      await this.interruptActive();
    }

    await this.lock.runExclusive(async () => {
      const generation = this.generation;
      const ctx: SpeechContext = {
        slot: this.slot,
        suppression: this.suppression,
        isInterrupted: () => this.generation !== generation,
      };

      for (let i = 0; i < repeatCount; i++) {
        if (this.suppression.isSet() || ctx.isInterrupted()) {
          break;
        }
        if (!(await this.speakOnce(text, ctx))) {
          console.error(
            `[speech] All speech backends failed; narration skipped: "${text}"`
          );
        }
      }
    });
  }

  /**
   * Stop current narration and suppress queued narration until resume()
   */
  async stop(): Promise<void> {
    this.suppression.set();
    await this.interruptActive();
  }

  /**
   * Allow narration again after stop()
   */
  resume(): void {
    this.suppression.clear();
  }

  isSpeaking(): boolean {
    return this.lock.isLocked();
  }

  private async interruptActive(): Promise<void> {
    for (const backend of this.backends) {
      backend.stop?.();
    }
    await this.slot.terminate();
  }

  /**
   * Try each backend in order.
   *
   * @returns false when every backend failed or was unavailable
   */
  private async speakOnce(text: string, ctx: SpeechContext): Promise<boolean> {
    for (const backend of this.backends) {
      if (this.suppression.isSet() || ctx.isInterrupted()) {
        return true;
      }
      try {
        if (await backend.attempt(text, ctx)) {
          return true;
        }
        console.log(`[speech] ${backend.name} unavailable, trying next backend`);
      } catch (error) {
        console.error(
          `[speech] ${backend.name} failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    return false;
  }
}
