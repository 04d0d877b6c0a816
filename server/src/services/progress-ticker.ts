/**
 * Progress Ticker
 *
 * Plays the working tick at a fixed interval while a task waits on the
 * model. Owned by the task that starts it: stop() resolves only after the
 * loop has exited.
 *
 * @module services/progress-ticker
 */

import { CUES, type AudioCuePlayer } from "./audio-cues.js";
import { Signal } from "./cancellation.js";

export class ProgressTicker {
  private readonly stopped = new Signal();
  private loop: Promise<void> | null = null;

  constructor(
    private readonly cues: AudioCuePlayer,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.loop || this.stopped.isSet()) {
      return;
    }
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.stopped.set();
    if (this.loop) {
      await this.loop;
    }
  }

  isRunning(): boolean {
    return this.loop !== null && !this.stopped.isSet();
  }

  private async run(): Promise<void> {
    while (!this.stopped.isSet()) {
      await this.cues.play(CUES.tick);
      await this.sleep(this.intervalMs);
    }
  }

  /**
   * Wait `ms`, or less if stop() is called
   */
  private sleep(ms: number): Promise<void> {
    if (this.stopped.isSet()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      const unsubscribe = this.stopped.onSet(done);
      function done() {
        clearTimeout(timer);
        unsubscribe();
        resolve();
      }
    });
  }
}
