/**
 * Speech backends, in fallback priority order
 *
 * @module services/speech-backends
 */

import { getSpeechProfile } from "./profiles.js";
import { InProcessEngineBackend, type SpeechEngine } from "./in-process.js";
import { ScriptHelperBackend } from "./script-helper.js";
import { SpeechCommandBackend } from "./speech-command.js";
import type { SpeechBackend } from "./types.js";
import { WaveFileBackend } from "./wave-file.js";

export type { SpeechBackend, SpeechContext, CommandTemplate } from "./types.js";
export { getSpeechProfile } from "./profiles.js";
export type {
  SpeechProfile,
  WaveFileProfile,
  ScriptHelperProfile,
} from "./profiles.js";
export { WaveFileBackend } from "./wave-file.js";
export { ScriptHelperBackend } from "./script-helper.js";
export { SpeechCommandBackend } from "./speech-command.js";
export {
  InProcessEngineBackend,
  TerminalSpeechEngine,
  type SpeechEngine,
} from "./in-process.js";

export interface SpeechBackendOptions {
  platform?: NodeJS.Platform;
  waveFallbackDurationMs: number;
  playbackGuardMs: number;
  engine?: SpeechEngine;
}

/**
 * Build the default backend chain for a platform
 */
export function createSpeechBackends(options: SpeechBackendOptions): SpeechBackend[] {
  const profile = getSpeechProfile(options.platform);
  return [
    new WaveFileBackend({
      profile: profile.waveFile,
      fallbackDurationMs: options.waveFallbackDurationMs,
      guardMs: options.playbackGuardMs,
    }),
    new ScriptHelperBackend({ profile: profile.scriptHelper }),
    new SpeechCommandBackend(profile.speechCommand),
    new InProcessEngineBackend(options.engine),
  ];
}
