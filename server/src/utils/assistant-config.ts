/**
 * Assistant Configuration
 *
 * Runtime settings come from NARRATOR_* environment variables with defaults;
 * explicit overrides (CLI flags, tests) win over both.
 *
 * @module utils/assistant-config
 */

import * as os from "os";
import * as path from "path";

export interface AssistantConfig {
  /** Port of the local command surface */
  port: number;
  /** Interface the command surface binds to */
  host: string;
  /** JSON file holding the encrypted API key */
  configPath: string;
  /** Inference model name */
  model: string;
  /** Base URL of the inference API */
  inferenceBaseUrl: string;
  /** Bounded wait for task admission */
  admitTimeoutMs: number;
  /** Hard ceiling on follow-up recording */
  dictationMaxSeconds: number;
  /** Length of one transcription attempt */
  dictationChunkSeconds: number;
  /** Playback duration assumed when a rendered file's header is unreadable */
  waveFallbackDurationMs: number;
  /** Extra time allowed after the rendered duration before the player is stopped */
  playbackGuardMs: number;
  /** Interval between progress ticks while waiting for inference */
  progressIntervalMs: number;
  /** Delay between the farewell and process exit */
  exitGraceMs: number;
  /** Recognizer command override; `{seconds}` is replaced by the attempt length */
  transcriptionCommand: string[] | null;
  /** Bind single keys on the controlling terminal */
  keyBindings: boolean;
  /** Speak the instructions on start */
  welcome: boolean;
}

export const DEFAULT_PORT = 4799;

/**
 * Directory for the config file.
 *
 * - Windows: %APPDATA%/screen-narrator
 * - macOS/Linux: $XDG_CONFIG_HOME/screen-narrator or ~/.config/screen-narrator
 */
export function getConfigDirectory(): string {
  if (process.platform === "win32") {
    const appData =
      process.env.APPDATA || path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appData, "screen-narrator");
  }

  const configHome =
    process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, "screen-narrator");
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[config] Ignoring invalid ${name}=${raw}`);
    return fallback;
  }
  return value;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }
  return raw !== "false" && raw !== "0";
}

/**
 * Parse a command given as a JSON array of strings
 */
export function parseCommandList(raw: string | undefined): string[] | null {
  if (!raw) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      Array.isArray(parsed) &&
      parsed.length > 0 &&
      parsed.every((part): part is string => typeof part === "string")
    ) {
      return parsed;
    }
  } catch (error) {
    console.warn(
      `[config] Command is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
  console.warn("[config] Command must be a non-empty JSON array of strings");
  return null;
}

/**
 * Get assistant configuration
 *
 * @param overrides - Values that take precedence over the environment
 */
export function getAssistantConfig(
  overrides: Partial<AssistantConfig> = {}
): AssistantConfig {
  const defaults: AssistantConfig = {
    port: readNumber("NARRATOR_PORT", DEFAULT_PORT),
    host: process.env.NARRATOR_HOST || "127.0.0.1",
    configPath:
      process.env.NARRATOR_CONFIG_PATH ||
      path.join(getConfigDirectory(), "config.json"),
    model: process.env.NARRATOR_MODEL || "gemini-2.5-flash",
    inferenceBaseUrl:
      process.env.NARRATOR_INFERENCE_URL ||
      "https://generativelanguage.googleapis.com/v1beta",
    admitTimeoutMs: readNumber("NARRATOR_ADMIT_TIMEOUT_MS", 800),
    dictationMaxSeconds: readNumber("NARRATOR_DICTATION_MAX_SECONDS", 30),
    dictationChunkSeconds: readNumber("NARRATOR_DICTATION_CHUNK_SECONDS", 3),
    waveFallbackDurationMs: readNumber("NARRATOR_WAVE_FALLBACK_MS", 8000),
    playbackGuardMs: readNumber("NARRATOR_PLAYBACK_GUARD_MS", 750),
    progressIntervalMs: readNumber("NARRATOR_PROGRESS_INTERVAL_MS", 1200),
    exitGraceMs: readNumber("NARRATOR_EXIT_GRACE_MS", 200),
    transcriptionCommand: parseCommandList(
      process.env.NARRATOR_TRANSCRIBE_COMMAND
    ),
    keyBindings: readFlag("NARRATOR_KEYS", true),
    welcome: readFlag("NARRATOR_WELCOME", true),
  };

  return { ...defaults, ...overrides };
}
