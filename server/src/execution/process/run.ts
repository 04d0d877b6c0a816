/**
 * Run a one-shot external process to completion.
 *
 * @module execution/process/run
 */

import { spawn, type ChildProcess } from "child_process";
import type { ProcessResult, ProcessSpec } from "./types.js";
import { ProcessSlot, terminateChild } from "./slot.js";

/**
 * Spawn `spec`, feed it `spec.input`, and resolve with its output once the
 * stdio streams have closed. Never rejects: spawn failures are reported
 * through `result.error`.
 *
 * While running, the process is tracked in `slot` (when given) so another
 * task can terminate it.
 *
 * @example
 * ```typescript
 * const result = await runProcess(narrationSlot, {
 *   command: 'espeak-ng',
 *   args: ['--stdin'],
 *   input: 'Hello',
 * });
 * if (result.status === 0) {
 *   console.log('spoken');
 * }
 * ```
 */
export function runProcess(
  slot: ProcessSlot | null,
  spec: ProcessSpec
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(spec.command, spec.args, {
        stdio: ["pipe", "pipe", "pipe"],
        env: { ...process.env, ...spec.env },
        windowsHide: true,
      });
    } catch (error) {
      resolve({
        status: null,
        signal: null,
        stdout: "",
        stderr: "",
        terminated: false,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    const release = slot ? slot.track(child) : () => undefined;
    let stdout = "";
    let stderr = "";
    let spawnError: Error | undefined;
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | null = null;

    const finish = (
      status: number | null,
      signal: NodeJS.Signals | null
    ) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      release();
      resolve({
        status,
        signal,
        stdout,
        stderr,
        terminated: timedOut || (slot?.wasTerminated(child) ?? false),
        error: spawnError,
      });
    };

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.once("error", (error: Error) => {
      spawnError = error;
      finish(null, null);
    });
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      finish(code, signal);
    });

    if (spec.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        void terminateChild(child);
      }, spec.timeoutMs);
    }

    // A process that exits without reading stdin closes the pipe (EPIPE).
    child.stdin?.on("error", (error: Error) => {
      stderr += `[stdin] ${error.message}\n`;
    });
    child.stdin?.end(spec.input ?? "");
  });
}
