/**
 * Shared type contracts of screen-narrator
 */

export type {
  AssistantCommand,
  TaskName,
  TriggerOutcome,
  AssistantStatus,
  ApiResponse,
  CommandResult,
} from "./assistant.js";

export type {
  NarrationOptions,
  SpeechBackendName,
  FollowUpState,
  DictationEnd,
  DictationOutcome,
  CueTone,
} from "./voice.js";
