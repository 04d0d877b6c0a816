/**
 * Trigger commands, task names and status payloads of the assistant daemon
 */

import type { FollowUpState } from "./voice.js";

/**
 * Logical trigger commands (physical hotkeys map onto these)
 */
export type AssistantCommand =
  | "capture"
  | "follow-up-toggle"
  | "stop-speech"
  | "cancel-task"
  | "set-credential"
  | "next-detail"
  | "previous-detail"
  | "shutdown";

/**
 * Name of the task holding the single-flight gate
 */
export type TaskName = "capture" | "follow-up" | "navigate";

/**
 * Immediate result of handling a trigger
 *
 * - admitted: a task was admitted and is running in the background
 * - denied: another task holds the gate
 * - submitted: a listening follow-up was told to send now
 * - stopped: narration was stopped
 * - canceled: the cancel request was delivered
 * - started: an ungated background action was started
 * - shutting-down: shutdown is in progress
 */
export type TriggerOutcome =
  | "admitted"
  | "denied"
  | "submitted"
  | "stopped"
  | "canceled"
  | "started"
  | "shutting-down";

/**
 * Snapshot returned by GET /api/status
 */
export interface AssistantStatus {
  running: boolean;
  activeTask: TaskName | null;
  followUp: FollowUpState;
  speaking: boolean;
  credentialConfigured: boolean;
  detailCount: number;
  detailIndex: number;
}

/**
 * Response envelope used by every daemon route
 */
export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  message?: string;
}

/**
 * Payload of POST /api/commands/:command
 */
export interface CommandResult {
  command: AssistantCommand;
  outcome: TriggerOutcome;
}
