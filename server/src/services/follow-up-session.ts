/**
 * Follow-up session state
 *
 * The follow-up trigger means "start" while idle and "send now" while
 * listening. This holds that state and the submit signal the dictation loop
 * watches.
 *
 * @module services/follow-up-session
 */

import type { FollowUpState } from "@screen-narrator/types";
import { Signal } from "./cancellation.js";

export class FollowUpSession {
  readonly submitSignal = new Signal();
  private current: FollowUpState = "idle";

  state(): FollowUpState {
    return this.current;
  }

  isListening(): boolean {
    return this.current === "listening";
  }

  /**
   * idle -> listening, with a fresh submit signal
   */
  beginListening(): void {
    this.submitSignal.clear();
    this.current = "listening";
  }

  /**
   * Ask the listening session to send what it has.
   *
   * @returns false when not listening
   */
  requestSubmit(): boolean {
    if (this.current !== "listening") {
      return false;
    }
    this.submitSignal.set();
    return true;
  }

  /**
   * listening -> idle once recording has stopped
   */
  finishListening(): void {
    this.current = "idle";
  }

  /**
   * End any recording now (cancel and shutdown)
   */
  abort(): void {
    this.submitSignal.set();
    this.current = "idle";
  }

  /**
   * Back to idle with a cleared submit signal (task cleanup)
   */
  reset(): void {
    this.current = "idle";
    this.submitSignal.clear();
  }
}
