/**
 * Cancellation and speech suppression signals
 *
 * Both are sticky boolean flags shared by reference between the trigger
 * handlers and the running task. Setting is idempotent; only the owner of a
 * task session clears them.
 *
 * @module services/cancellation
 */

export type SignalListener = () => void;

export class Signal {
  private flag = false;
  private listeners = new Set<SignalListener>();

  /**
   * Raise the flag. Listeners run on the clear-to-set transition only.
   */
  set(): void {
    if (this.flag) {
      return;
    }
    this.flag = true;
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        console.error("[signal] Listener failed:", error);
      }
    }
  }

  clear(): void {
    this.flag = false;
  }

  isSet(): boolean {
    return this.flag;
  }

  /**
   * Register a listener for the next set transitions.
   *
   * @returns unsubscribe function
   */
  onSet(listener: SignalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Cancellation request for the running task session.
 *
 * Cooperative: checking it is the task's job. Cleared only when a new task
 * is admitted.
 */
export class CancellationToken extends Signal {}
