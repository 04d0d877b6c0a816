/**
 * Process Layer - Public API
 *
 * @module execution/process
 */

export type { ProcessSpec, ProcessResult, CommandTemplate } from "./types.js";
export { ProcessSlot, terminateChild, hasExited } from "./slot.js";
export { runProcess } from "./run.js";
export {
  generateId,
  formatProcessError,
  delay,
  fillPlaceholders,
  isCommandAvailable,
} from "./utils.js";
