/**
 * Process Layer Types
 *
 * Types for the short-lived external processes the assistant drives:
 * speech renderers, audio players, recognizers and screenshot tools.
 *
 * @module execution/process/types
 */

/**
 * Command line of a one-shot external process
 */
export interface ProcessSpec {
  /** Executable name or path (resolved through PATH) */
  command: string;

  /** Command-line arguments */
  args: string[];

  /** Text written to stdin before it is closed */
  input?: string;

  /** Extra environment variables merged over process.env */
  env?: Record<string, string>;

  /** Maximum run time in milliseconds before the process is terminated */
  timeoutMs?: number;
}

/**
 * Outcome of a finished process
 *
 * `status` is null when the process was killed by a signal or never started;
 * `error` is set when spawning failed (e.g. ENOENT).
 */
export interface ProcessResult {
  status: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** True when the process was terminated by us (slot terminate or timeout) */
  terminated: boolean;
  error?: Error;
}

/**
 * A command line whose arguments may contain `{name}` placeholders
 */
export interface CommandTemplate {
  command: string;
  args: string[];
}
