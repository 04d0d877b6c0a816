/**
 * Per-platform speech command profiles
 *
 * @module services/speech-backends/profiles
 */

import type { CommandTemplate } from "./types.js";

export interface WaveFileProfile {
  /** Renders stdin text to `{wav}` (also exported as NARRATOR_TTS_WAV_PATH) */
  render: CommandTemplate;
  /** Plays `{wav}` and exits when playback ends */
  player: CommandTemplate;
}

export interface ScriptHelperProfile {
  /** Runs `{script}` with the text on stdin */
  interpreter: CommandTemplate;
  fileName: string;
  source: string;
}

export interface SpeechProfile {
  waveFile: WaveFileProfile | null;
  scriptHelper: ScriptHelperProfile | null;
  speechCommand: CommandTemplate | null;
}

const POWERSHELL_RENDER = [
  "Add-Type -AssemblyName System.Speech;",
  "$s = New-Object System.Speech.Synthesis.SpeechSynthesizer;",
  "$s.Volume = 100;",
  "$s.Rate = -1;",
  "$text = [Console]::In.ReadToEnd();",
  "$s.SetOutputToWaveFile($env:NARRATOR_TTS_WAV_PATH);",
  "$s.Speak($text);",
  "$s.Dispose();",
].join(" ");

const POWERSHELL_PLAY =
  "(New-Object Media.SoundPlayer $env:NARRATOR_TTS_WAV_PATH).PlaySync();";

const POWERSHELL_SPEAK = [
  "Add-Type -AssemblyName System.Speech;",
  "$s = New-Object System.Speech.Synthesis.SpeechSynthesizer;",
  "$s.SetOutputToDefaultAudioDevice();",
  "$s.Volume = 100;",
  "$s.Rate = -1;",
  "$text = [Console]::In.ReadToEnd();",
  "$s.Speak($text);",
].join(" ");

const SAPI_HELPER = [
  'Set voice = CreateObject("SAPI.SpVoice")',
  'Set audio = CreateObject("SAPI.SpMMAudioOut")',
  "audio.DeviceId = 0",
  "audio.Volume = 100",
  "Set voice.AudioOutputStream = audio",
  "voice.Volume = 100",
  "voice.Rate = -1",
  "text = WScript.StdIn.ReadAll",
  "voice.Speak text",
  "",
].join("\r\n");

const PROFILES: Record<"win32" | "darwin" | "linux", SpeechProfile> = {
  win32: {
    waveFile: {
      render: {
        command: "powershell",
        args: ["-NoProfile", "-Command", POWERSHELL_RENDER],
      },
      player: {
        command: "powershell",
        args: ["-NoProfile", "-Command", POWERSHELL_PLAY],
      },
    },
    scriptHelper: {
      interpreter: { command: "cscript.exe", args: ["//NoLogo", "{script}"] },
      fileName: "narrator_speech.vbs",
      source: SAPI_HELPER,
    },
    speechCommand: {
      command: "powershell",
      args: ["-NoProfile", "-Command", POWERSHELL_SPEAK],
    },
  },
  darwin: {
    waveFile: {
      render: {
        command: "say",
        args: ["-o", "{wav}", "--data-format=LEI16@22050", "-f", "-"],
      },
      player: { command: "afplay", args: ["{wav}"] },
    },
    scriptHelper: {
      interpreter: { command: "/bin/sh", args: ["{script}"] },
      fileName: "narrator_speech.sh",
      source: '#!/bin/sh\nexec say -r 175 -f -\n',
    },
    speechCommand: { command: "say", args: ["-f", "-"] },
  },
  linux: {
    waveFile: {
      render: { command: "espeak-ng", args: ["-w", "{wav}", "--stdin"] },
      player: { command: "aplay", args: ["-q", "{wav}"] },
    },
    scriptHelper: {
      interpreter: { command: "/bin/sh", args: ["{script}"] },
      fileName: "narrator_speech.sh",
      source: '#!/bin/sh\ntext=$(cat)\nexec spd-say --wait -- "$text"\n',
    },
    speechCommand: { command: "espeak-ng", args: ["--stdin"] },
  },
};

/**
 * Speech commands for a platform. Unknown platforms use the linux profile.
 */
export function getSpeechProfile(
  platform: NodeJS.Platform = process.platform
): SpeechProfile {
  if (platform === "win32" || platform === "darwin") {
    return PROFILES[platform];
  }
  return PROFILES.linux;
}
