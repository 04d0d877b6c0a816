/**
 * Task Gate
 *
 * Single-flight admission for assistant tasks. At most one task runs at a
 * time; a trigger waits a bounded time for the gate and is denied otherwise.
 *
 * @module services/task-gate
 */

import { E_TIMEOUT, Mutex, withTimeout, type MutexInterface } from "async-mutex";
import type { TaskName } from "@screen-narrator/types";

export class TaskGate {
  private readonly mutex = new Mutex();
  private releaser: MutexInterface.Releaser | null = null;
  private active: TaskName | null = null;

  /**
   * Try to take the gate for `taskName`, waiting at most `timeoutMs`
   * (0 = no wait).
   *
   * @returns true when admitted; the caller must call release() when done
   */
  async tryAdmit(taskName: TaskName, timeoutMs: number): Promise<boolean> {
    let releaser: MutexInterface.Releaser;

    if (timeoutMs <= 0) {
      if (this.mutex.isLocked()) {
        return false;
      }
      releaser = await this.mutex.acquire();
    } else {
      try {
        releaser = await withTimeout(this.mutex, timeoutMs).acquire();
      } catch (error) {
        if (error === E_TIMEOUT) {
          return false;
        }
        throw error;
      }
    }

    this.releaser = releaser;
    this.active = taskName;
    return true;
  }

  /**
   * Release the gate. Calling it while the gate is free has no effect.
   */
  release(): void {
    const releaser = this.releaser;
    this.releaser = null;
    this.active = null;
    if (releaser) {
      releaser();
    }
  }

  /**
   * Name of the admitted task, or null when idle
   */
  activeTaskName(): TaskName | null {
    return this.active;
  }

  /**
   * Forget the active task name without releasing the gate (shutdown)
   */
  clearActiveName(): void {
    this.active = null;
  }

  isBusy(): boolean {
    return this.mutex.isLocked();
  }
}
