/**
 * Process Layer Utilities
 *
 * @module execution/process/utils
 */

import { customAlphabet } from "nanoid";
import which from "which";

const nanoid = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 10);

/**
 * Generate a unique ID with a prefix
 *
 * @example
 * ```typescript
 * const id = generateId('narrator_tts');
 * // Returns: 'narrator_tts-a1b2c3d4e5'
 * ```
 */
export function generateId(prefix: string): string {
  return `${prefix}-${nanoid()}`;
}

/**
 * Format error message from process exit
 *
 * @param exitCode - Process exit code
 * @param signal - Signal that terminated the process
 */
export function formatProcessError(
  exitCode: number | null,
  signal: string | null
): string {
  if (signal) {
    return `Process terminated by signal: ${signal}`;
  }
  if (exitCode !== null && exitCode !== 0) {
    return `Process exited with code: ${exitCode}`;
  }
  return "Process exited unexpectedly";
}

/**
 * Resolve after the given number of milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Replace `{name}` placeholders in command-line arguments
 *
 * @example
 * ```typescript
 * fillPlaceholders(['-w', '{wav}'], { wav: '/tmp/a.wav' });
 * // Returns: ['-w', '/tmp/a.wav']
 * ```
 */
export function fillPlaceholders(
  args: readonly string[],
  values: Record<string, string>
): string[] {
  return args.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (match: string, key: string) =>
      Object.hasOwn(values, key) ? values[key] : match
    )
  );
}

/**
 * Check whether an executable can be found on PATH
 */
export async function isCommandAvailable(command: string): Promise<boolean> {
  try {
    await which(command);
    return true;
  } catch {
    return false;
  }
}
