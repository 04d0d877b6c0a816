/**
 * Process Slot
 *
 * A single-writer handle on "the" live process of one kind (the active
 * narration process, the active transcription process). The task that spawns
 * the process tracks it here; any other task may terminate it.
 *
 * @module execution/process/slot
 */

import type { ChildProcess } from "child_process";

/** Grace period between SIGTERM and SIGKILL */
const DEFAULT_TERMINATE_GRACE_MS = 2000;

/** Wait after SIGKILL before giving up on the exit event */
const KILL_WAIT_MS = 1000;

/**
 * True once the child has exited or was killed by a signal
 */
export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Wait for a child to exit, at most `timeoutMs`.
 *
 * @returns true if the child exited within the timeout
 */
function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.removeListener("exit", onExit);
      resolve(false);
    }, timeoutMs);
    child.once("exit", onExit);
  });
}

/**
 * Terminate a child process: SIGTERM, then SIGKILL if it is still running
 * after the grace period. Safe to call on an exited process.
 */
export async function terminateChild(
  child: ChildProcess,
  graceMs: number = DEFAULT_TERMINATE_GRACE_MS
): Promise<void> {
  if (hasExited(child)) {
    return;
  }

  child.kill("SIGTERM");
  if (await waitForExit(child, graceMs)) {
    return;
  }

  console.warn(
    `[process] pid ${child.pid ?? "?"} ignored SIGTERM, sending SIGKILL`
  );
  child.kill("SIGKILL");
  await waitForExit(child, KILL_WAIT_MS);
}

export class ProcessSlot {
  private current: ChildProcess | null = null;
  private readonly terminated = new WeakSet<ChildProcess>();

  constructor(
    readonly name: string,
    private readonly graceMs: number = DEFAULT_TERMINATE_GRACE_MS
  ) {}

  /**
   * Make `child` the slot's live process.
   *
   * @returns release function; it clears the slot only if it still holds `child`
   */
  track(child: ChildProcess): () => void {
    this.current = child;
    return () => {
      if (this.current === child) {
        this.current = null;
      }
    };
  }

  /**
   * Whether a tracked process is still running
   */
  isActive(): boolean {
    return this.current !== null && !hasExited(this.current);
  }

  /**
   * Whether `child` was terminated through this slot
   */
  wasTerminated(child: ChildProcess): boolean {
    return this.terminated.has(child);
  }

  /**
   * Terminate the live process, if any.
   *
   * @returns true if a running process was terminated
   */
  async terminate(): Promise<boolean> {
    const child = this.current;
    if (!child || hasExited(child)) {
      return false;
    }

    this.terminated.add(child);
    console.log(`[process] Terminating active ${this.name} process`);
    await terminateChild(child, this.graceMs);
    return true;
  }
}
