/**
 * Assistant runtime
 *
 * Wires the orchestration core to its platform collaborators and exposes it
 * through the local HTTP surface and terminal key bindings.
 *
 * @module runtime
 */

import * as http from "http";
import type { AssistantCommand } from "@screen-narrator/types";
import { createApp } from "./app.js";
import { KEY_HELP, TerminalKeyBindings } from "./keyboard/terminal-keys.js";
import { SystemCuePlayer, type AudioCuePlayer } from "./services/audio-cues.js";
import {
  ScreenCaptureProvider,
  type CaptureProvider,
} from "./services/capture-provider.js";
import {
  TerminalCredentialPrompt,
  type CredentialPrompt,
} from "./services/credential-prompt.js";
import {
  ConfigCredentialStore,
  type CredentialStore,
} from "./services/credential-store.js";
import { DetailCursor } from "./services/detail-cursor.js";
import { DictationRecorder } from "./services/dictation-recorder.js";
import {
  GeminiInferenceProvider,
  type InferenceProvider,
} from "./services/inference-provider.js";
import { Orchestrator } from "./services/orchestrator.js";
import {
  createSpeechBackends,
  type SpeechBackend,
} from "./services/speech-backends/index.js";
import { SpeechPipeline } from "./services/speech-pipeline.js";
import { TaskGate } from "./services/task-gate.js";
import {
  getDefaultTranscriptionCommand,
  ProcessTranscriptionProvider,
  type TranscriptionProvider,
} from "./services/transcription-provider.js";
import type { AssistantConfig } from "./utils/assistant-config.js";

/**
 * Replacements for platform collaborators (tests, embedding)
 */
export interface RuntimeOverrides {
  backends?: SpeechBackend[];
  capture?: CaptureProvider;
  inference?: InferenceProvider;
  transcription?: TranscriptionProvider;
  credentials?: CredentialStore;
  prompt?: CredentialPrompt;
  cues?: AudioCuePlayer;
  exit?: (code: number) => void;
  notify?: (message: string) => void;
}

export interface AssistantRuntime {
  config: AssistantConfig;
  orchestrator: Orchestrator;
  speech: SpeechPipeline;
  prompt: CredentialPrompt;
}

export function createAssistantRuntime(
  config: AssistantConfig,
  overrides: RuntimeOverrides = {}
): AssistantRuntime {
  const speech = new SpeechPipeline(
    overrides.backends ??
      createSpeechBackends({
        waveFallbackDurationMs: config.waveFallbackDurationMs,
        playbackGuardMs: config.playbackGuardMs,
      })
  );
  const transcription =
    overrides.transcription ??
    new ProcessTranscriptionProvider({
      command: config.transcriptionCommand ?? getDefaultTranscriptionCommand(),
    });
  const prompt = overrides.prompt ?? new TerminalCredentialPrompt();

  const orchestrator = new Orchestrator({
    gate: new TaskGate(),
    speech,
    cursor: new DetailCursor(),
    recorder: new DictationRecorder(transcription),
    transcription,
    capture: overrides.capture ?? new ScreenCaptureProvider(),
    inference:
      overrides.inference ??
      new GeminiInferenceProvider({
        baseUrl: config.inferenceBaseUrl,
        model: config.model,
      }),
    credentials: overrides.credentials ?? new ConfigCredentialStore(config.configPath),
    prompt,
    cues: overrides.cues ?? new SystemCuePlayer(),
    settings: config,
    exit: overrides.exit,
    notify: overrides.notify,
  });

  return { config, orchestrator, speech, prompt };
}

/**
 * Usage text printed (and spoken) on start
 */
export function buildInstructions(config: AssistantConfig, keys: boolean): string {
  const lines = ["Welcome to Screen Narrator.", "", "Instructions:"];
  if (keys) {
    for (const [key, action] of KEY_HELP) {
      lines.push(`  - Press ${key} to ${action}.`);
    }
  }
  lines.push(
    "  - From other programs or OS hotkeys run: screen-narrator send <command>.",
    "  - You will hear periodic ticks while analysis is in progress.",
    "  - If the API key is missing, you will be prompted and it will be encrypted automatically.",
    `  - Config file: '${config.configPath}'.`,
    `  - Command surface: http://${config.host}:${config.port}`
  );
  return lines.join("\n");
}

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const errorHandler = (err: NodeJS.ErrnoException) => {
      server.removeListener("listening", listeningHandler);
      reject(err);
    };
    const listeningHandler = () => {
      server.removeListener("error", errorHandler);
      resolve();
    };
    server.once("error", errorHandler);
    server.once("listening", listeningHandler);
    server.listen(port, host);
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => {
      console.log("[server] HTTP server closed");
      resolve();
    });
  });
}

export interface RunningAssistant extends AssistantRuntime {
  server: http.Server;
  port: number;
  keys: TerminalKeyBindings | null;
}

/**
 * Start the assistant: bind the command surface, hook up the keys, greet
 * the user and ask for the API key when it is missing.
 *
 * @throws Error when another instance already holds the port
 */
export async function startAssistantServer(
  config: AssistantConfig,
  overrides: RuntimeOverrides = {}
): Promise<RunningAssistant> {
  const runtime = createAssistantRuntime(config, overrides);
  const { orchestrator, speech, prompt } = runtime;
  await orchestrator.initialize();

  const server = http.createServer(createApp(orchestrator));
  try {
    await listen(server, config.port, config.host);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      throw new Error(
        `Screen Narrator is already running on port ${config.port}. Close the other instance first.`
      );
    }
    throw err;
  }
  const address = server.address();
  const port =
    typeof address === "object" && address !== null ? address.port : config.port;
  console.log(`[server] Command surface listening on http://${config.host}:${port}`);
  orchestrator.onShutdown(() => closeServer(server));

  const dispatch = (command: AssistantCommand) => {
    orchestrator
      .dispatch(command)
      .then((outcome) => console.log(`[keys] ${command}: ${outcome}`))
      .catch((error: unknown) =>
        console.error(`[keys] Failed to handle ${command}:`, error)
      );
  };

  let keys: TerminalKeyBindings | null = null;
  if (config.keyBindings) {
    const bindings = new TerminalKeyBindings(dispatch);
    if (bindings.start()) {
      keys = bindings;
      if (prompt instanceof TerminalCredentialPrompt) {
        prompt.attachKeyboard(bindings);
      }
      orchestrator.onShutdown(() => bindings.stop());
    }
  }

  const instructions = buildInstructions(config, keys !== null);
  console.log(instructions);
  if (config.welcome) {
    void speech.speak(instructions);
  }
  orchestrator.requestMissingCredential();

  registerShutdownSignals(orchestrator);

  return { ...runtime, server, port, keys };
}

/**
 * Shut down without a farewell on SIGINT or SIGTERM. The listeners stay
 * attached until the process exits, so repeated signals during cleanup are
 * no-ops.
 */
export function registerShutdownSignals(orchestrator: Orchestrator): void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`[server] Received ${signal}`);
    orchestrator.shutdown({ farewell: false });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
