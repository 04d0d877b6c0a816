/**
 * Assistant Orchestrator
 *
 * Maps triggers (hotkeys, HTTP commands) onto task sessions. Capture,
 * follow-up and detail navigation are single-flight through the task gate;
 * stop, cancel, credential and shutdown triggers are not gated.
 *
 * Every trigger returns as soon as its outcome is known. Task bodies run in
 * the background and are tracked so whenIdle() can wait for them.
 *
 * @module services/orchestrator
 */

import type {
  AssistantCommand,
  AssistantStatus,
  CueTone,
  TaskName,
  TriggerOutcome,
} from "@screen-narrator/types";
import {
  AdmissionDeniedError,
  AssistantError,
  CredentialMissingError,
  TaskCanceledError,
  describeTaskError,
} from "../errors/assistant-errors.js";
import { delay } from "../execution/process/index.js";
import type { AssistantConfig } from "../utils/assistant-config.js";
import { CUES, type AudioCuePlayer } from "./audio-cues.js";
import { CancellationToken } from "./cancellation.js";
import type { CaptureProvider } from "./capture-provider.js";
import type { CredentialPrompt } from "./credential-prompt.js";
import type { CredentialStore } from "./credential-store.js";
import type { DetailCursor, StepDirection } from "./detail-cursor.js";
import type { DictationRecorder } from "./dictation-recorder.js";
import { FollowUpSession } from "./follow-up-session.js";
import {
  buildFollowUpPrompt,
  DESCRIBE_PROMPT,
  REQUEST_CANCELED,
  type InferenceProvider,
} from "./inference-provider.js";
import { buildSummary, splitSections } from "./narration-text.js";
import { ProgressTicker } from "./progress-ticker.js";
import type { SpeechPipeline } from "./speech-pipeline.js";
import type { TaskGate } from "./task-gate.js";
import type { TranscriptionProvider } from "./transcription-provider.js";

export const NAVIGATION_HINT =
  "Press the right arrow for the next detail. Press the left arrow for the previous detail.";

export const FOLLOW_UP_INSTRUCTIONS =
  "Recording mode. Ask your follow-up question after the beep. Trigger follow-up again to send immediately.";

export const NOT_UNDERSTOOD =
  "I could not understand the question. Please trigger follow-up and try again.";

export const NO_DETAILS = "No details available yet. Capture the screen first.";

export const FAREWELL = "Exiting screen narrator. Goodbye.";

export type OrchestratorSettings = Pick<
  AssistantConfig,
  | "admitTimeoutMs"
  | "dictationMaxSeconds"
  | "dictationChunkSeconds"
  | "progressIntervalMs"
  | "exitGraceMs"
  | "configPath"
>;

export interface OrchestratorDeps {
  gate: TaskGate;
  speech: SpeechPipeline;
  cursor: DetailCursor;
  recorder: DictationRecorder;
  transcription: TranscriptionProvider;
  capture: CaptureProvider;
  inference: InferenceProvider;
  credentials: CredentialStore;
  prompt: CredentialPrompt;
  cues: AudioCuePlayer;
  settings: OrchestratorSettings;
  /** Ends the process after shutdown (default: process.exit) */
  exit?: (code: number) => void;
  /** Prints a user-facing line (default: console.log) */
  notify?: (message: string) => void;
}

export type ShutdownHook = () => void | Promise<void>;

/**
 * Child tasks owned by one task session; disposed before the gate is
 * released
 */
class TaskScope {
  private readonly tickers: ProgressTicker[] = [];

  constructor(
    private readonly cues: AudioCuePlayer,
    private readonly intervalMs: number
  ) {}

  startProgress(): ProgressTicker {
    const ticker = new ProgressTicker(this.cues, this.intervalMs);
    this.tickers.push(ticker);
    ticker.start();
    return ticker;
  }

  async dispose(): Promise<void> {
    await Promise.all(this.tickers.map((ticker) => ticker.stop()));
  }
}

interface AdmissionPlan {
  task: TaskName;
  /** Cue played once admitted */
  cue: CueTone[] | null;
  /** Printed once admitted */
  announce: string | null;
  /** Printed when the gate stays busy (default names the active task) */
  deniedMessage?: string;
  /** Whether admission starts a new cancellable session */
  resetsToken: boolean;
  body: (scope: TaskScope) => Promise<void>;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export class Orchestrator {
  readonly cancelToken = new CancellationToken();
  readonly followUp = new FollowUpSession();
  private credential: string | null = null;
  private running = true;
  private readonly tasks = new Set<Promise<void>>();
  private readonly shutdownHooks: ShutdownHook[] = [];
  private readonly exit: (code: number) => void;
  private readonly notify: (message: string) => void;

  constructor(private readonly deps: OrchestratorDeps) {
    this.exit = deps.exit ?? ((code) => process.exit(code));
    this.notify = deps.notify ?? ((message) => console.log(message));
  }

  /**
   * Load the stored credential
   */
  async initialize(): Promise<void> {
    this.credential = await this.deps.credentials.get();
  }

  hasCredential(): boolean {
    return this.credential !== null;
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): AssistantStatus {
    return {
      running: this.running,
      activeTask: this.deps.gate.activeTaskName(),
      followUp: this.followUp.state(),
      speaking: this.deps.speech.isSpeaking(),
      credentialConfigured: this.credential !== null,
      detailCount: this.deps.cursor.sections().length,
      detailIndex: this.deps.cursor.currentIndex(),
    };
  }

  /**
   * Register cleanup to run during shutdown (key bindings, HTTP server)
   */
  onShutdown(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Resolve once every background task has finished
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  dispatch(command: AssistantCommand): Promise<TriggerOutcome> {
    switch (command) {
      case "capture":
        return this.capture();
      case "follow-up-toggle":
        return this.toggleFollowUp();
      case "stop-speech":
        return this.stopSpeech();
      case "cancel-task":
        return this.cancelTask();
      case "set-credential":
        return this.setCredential();
      case "next-detail":
        return this.nextDetail();
      case "previous-detail":
        return this.previousDetail();
      case "shutdown":
        return Promise.resolve(this.shutdown());
    }
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  capture(): Promise<TriggerOutcome> {
    return this.admit({
      task: "capture",
      cue: CUES.captureAdmitted,
      announce: "Hotkey detected: capturing screen...",
      resetsToken: true,
      body: (scope) => this.runCapture(scope),
    });
  }

  async toggleFollowUp(): Promise<TriggerOutcome> {
    if (!this.running) {
      return "shutting-down";
    }
    if (this.followUp.requestSubmit()) {
      await this.deps.transcription.cancelActive();
      this.notify("Stopping recording and sending your follow-up question...");
      this.playCue(CUES.submit);
      return "submitted";
    }
    return this.admit({
      task: "follow-up",
      cue: CUES.followUpAdmitted,
      announce: "Follow-up requested: preparing voice recording...",
      resetsToken: true,
      body: (scope) => this.runFollowUp(scope),
    });
  }

  async stopSpeech(): Promise<TriggerOutcome> {
    console.log("[orchestrator] Speech stop requested");
    await this.deps.speech.stop();
    this.notify("Speech stopped. You can trigger the next action now.");
    this.playCue(CUES.stop);
    return "stopped";
  }

  /**
   * Cancel the running task. The task itself releases the gate once it
   * notices.
   */
  async cancelTask(): Promise<TriggerOutcome> {
    const activeTask = this.deps.gate.activeTaskName();
    this.cancelToken.set();
    this.followUp.abort();
    this.deps.inference.cancelActive();
    await this.deps.transcription.cancelActive();
    await this.deps.speech.stop();

    if (activeTask) {
      console.log(`[orchestrator] Task cancel requested. Active task: ${activeTask}`);
      this.notify(`${capitalize(activeTask)} task canceled. Ready for next command.`);
    } else {
      console.log("[orchestrator] Task cancel requested with no active task");
      this.notify("No capture task was running. Speech was stopped.");
    }
    this.playCue(CUES.cancel);
    return "canceled";
  }

  async setCredential(): Promise<TriggerOutcome> {
    if (!this.running) {
      return "shutting-down";
    }
    await this.deps.speech.stop();
    this.deps.speech.resume();
    this.track(
      this.guard("set-credential", async () => {
        console.log("[orchestrator] API key update requested");
        this.playCue(CUES.credentialRequested);
        await this.ensureCredential(true);
      })
    );
    return "started";
  }

  /**
   * Prompt for the credential in the background when none is stored
   */
  requestMissingCredential(): void {
    if (this.credential || !this.running) {
      return;
    }
    this.track(
      this.guard("credential prompt", async () => {
        await this.ensureCredential(false);
      })
    );
  }

  nextDetail(): Promise<TriggerOutcome> {
    return this.navigate(1);
  }

  previousDetail(): Promise<TriggerOutcome> {
    return this.navigate(-1);
  }

  /**
   * Stop everything and exit. Only the first call has an effect.
   */
  shutdown(options: { farewell?: boolean } = {}): TriggerOutcome {
    if (!this.running) {
      return "shutting-down";
    }
    this.running = false;
    console.log("[orchestrator] Shutdown requested. Exiting application.");

    this.cancelToken.set();
    this.followUp.abort();
    this.deps.inference.cancelActive();
    this.deps.gate.clearActiveName();

    this.track(
      this.guard("shutdown", async () => {
        await this.deps.transcription.cancelActive();
        for (const hook of this.shutdownHooks) {
          try {
            await hook();
          } catch (error) {
            console.error("[orchestrator] Shutdown hook failed:", error);
          }
        }
        if (options.farewell ?? true) {
          await this.deps.speech.stop();
          this.deps.speech.resume();
          await this.deps.speech.speak(FAREWELL);
        }
        await delay(this.deps.settings.exitGraceMs);
        this.exit(0);
      })
    );
    return "shutting-down";
  }

  /**
   * Store a key supplied through the command surface. The confirmation is
   * narrated in the background.
   *
   * @returns false when the key could not be saved
   */
  async submitCredential(key: string): Promise<boolean> {
    const { saved, announcement } = await this.storeCredential(key, true);
    this.track(
      this.guard("credential announcement", () =>
        this.deps.speech.speak(announcement)
      )
    );
    return saved !== null;
  }

  // ---------------------------------------------------------------------------
  // Task bodies
  // ---------------------------------------------------------------------------

  private async runCapture(scope: TaskScope): Promise<void> {
    console.log("[orchestrator] Capture task started");
    this.throwIfCanceled("capture", "start");
    const credential = await this.requireCredential();
    this.throwIfCanceled("capture", "credential check");

    const image = await this.deps.capture.capture();
    this.throwIfCanceled("capture", "screenshot");
    this.playCue(CUES.captured);

    this.notify("Analyzing screenshot. Please wait...");
    const ticker = scope.startProgress();
    const description = await this.deps.inference.query(
      credential,
      image,
      DESCRIBE_PROMPT,
      this.cancelToken
    );
    await ticker.stop();
    this.throwIfCanceled("capture", "analysis", description);

    console.log(`[orchestrator] Gemini description: ${description}`);
    this.notify(`Description: ${description}`);
    this.deps.cursor.load(splitSections(description));
    const summary = buildSummary(description);

    this.notify("Speaking summary now...");
    this.playCue(CUES.ready);
    await this.deps.speech.speak("Summary is ready.", { interrupt: true });
    await this.deps.speech.speak(`Summary. ${summary}`);
    await this.deps.speech.speak(NAVIGATION_HINT);
  }

  private async runFollowUp(scope: TaskScope): Promise<void> {
    console.log("[orchestrator] Follow-up task started");
    this.throwIfCanceled("follow-up", "start");
    const credential = await this.requireCredential();

    await this.deps.speech.speak(FOLLOW_UP_INSTRUCTIONS);
    this.throwIfCanceled("follow-up", "instructions");

    this.notify("Follow-up recording started. Speak now, then trigger follow-up again to send.");
    this.followUp.beginListening();
    await this.deps.cues.play(CUES.recordingStart);
    const outcome = await this.deps.recorder.record({
      maxDurationSeconds: this.deps.settings.dictationMaxSeconds,
      chunkSeconds: this.deps.settings.dictationChunkSeconds,
      cancelToken: this.cancelToken,
      submitSignal: this.followUp.submitSignal,
    });
    this.followUp.finishListening();
    await this.deps.cues.play(CUES.recordingStop);

    if (outcome.status === "canceled") {
      throw new TaskCanceledError("follow-up", "recording");
    }
    this.throwIfCanceled("follow-up", "recording");
    if (!outcome.transcript) {
      this.notify(NOT_UNDERSTOOD);
      await this.deps.speech.speak(NOT_UNDERSTOOD);
      this.playCue(CUES.denied);
      return;
    }

    const question = outcome.transcript;
    console.log(`[orchestrator] Follow-up transcript: ${question}`);
    this.notify(`Follow-up question: ${question}`);

    const image = await this.deps.capture.capture();
    this.throwIfCanceled("follow-up", "screenshot");
    this.playCue(CUES.captured);

    this.notify("Analyzing follow-up question. Please wait...");
    const ticker = scope.startProgress();
    const answer = await this.deps.inference.query(
      credential,
      image,
      buildFollowUpPrompt(question),
      this.cancelToken
    );
    await ticker.stop();
    this.throwIfCanceled("follow-up", "analysis", answer);

    console.log(`[orchestrator] Follow-up answer: ${answer}`);
    this.notify(`Follow-up answer: ${answer}`);
    this.playCue(CUES.ready);
    await this.deps.speech.speak(answer, { interrupt: true });
  }

  private navigate(direction: StepDirection): Promise<TriggerOutcome> {
    return this.admit({
      task: "navigate",
      cue: null,
      announce: null,
      deniedMessage: "Action still in progress. Please try again.",
      resetsToken: false,
      body: async () => {
        const step = this.deps.cursor.step(direction);
        const message = step
          ? `Detail ${step.index + 1} of ${step.total}. ${step.text}`
          : NO_DETAILS;
        this.notify(message);
        await this.deps.speech.speak(message);
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Admission and task lifecycle
  // ---------------------------------------------------------------------------

  private async admit(plan: AdmissionPlan): Promise<TriggerOutcome> {
    if (!this.running) {
      return "shutting-down";
    }

    await this.deps.speech.stop();
    const admitted = await this.deps.gate.tryAdmit(
      plan.task,
      this.deps.settings.admitTimeoutMs
    );
    if (!admitted) {
      console.log(`[orchestrator] ${plan.task} trigger denied`);
      this.notify(plan.deniedMessage ?? this.busyMessage());
      this.playCue(CUES.denied);
      return "denied";
    }

    this.deps.speech.resume();
    if (plan.resetsToken) {
      this.cancelToken.clear();
    }
    if (plan.task === "follow-up") {
      this.followUp.reset();
    }
    if (plan.cue) {
      this.playCue(plan.cue);
    }
    if (plan.announce) {
      this.notify(plan.announce);
    }

    this.track(this.runTask(plan));
    return "admitted";
  }

  /**
   * Run a task body; never rejects. The gate is released only after the
   * scope's child tasks have stopped.
   */
  private async runTask(plan: AdmissionPlan): Promise<void> {
    const scope = new TaskScope(this.deps.cues, this.deps.settings.progressIntervalMs);
    try {
      await plan.body(scope);
    } catch (error) {
      await this.handleTaskError(plan.task, error);
    } finally {
      await scope.dispose();
      if (plan.task === "follow-up") {
        this.followUp.reset();
      }
      this.deps.gate.release();
    }
  }

  private async handleTaskError(task: TaskName, error: unknown): Promise<void> {
    if (error instanceof TaskCanceledError) {
      console.log(`[orchestrator] ${error.message}`);
      this.notify(`${capitalize(task)} canceled.`);
      return;
    }

    const message = describeTaskError(error);
    if (error instanceof AssistantError) {
      console.error(`[orchestrator] ${task} failed (${error.code}): ${error.message}`);
    } else {
      console.error(`[orchestrator] Unexpected error in ${task} task:`, error);
    }
    this.notify(message);
    this.playCue(CUES.error);
    await this.deps.speech.speak(message);
  }

  /**
   * Run an ungated background action, logging anything it throws
   */
  private async guard(name: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(`[orchestrator] ${name} failed:`, error);
    }
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task);
    void task.finally(() => {
      this.tasks.delete(task);
    });
  }

  private throwIfCanceled(task: TaskName, stage: string, answer?: string): void {
    if (this.cancelToken.isSet() || answer === REQUEST_CANCELED) {
      throw new TaskCanceledError(task, stage);
    }
  }

  private busyMessage(): string {
    const denial = new AdmissionDeniedError(this.deps.gate.activeTaskName());
    return `${capitalize(denial.message)}. Cancel it to start something new.`;
  }

  private playCue(pattern: CueTone[]): void {
    void this.deps.cues.play(pattern);
  }

  // ---------------------------------------------------------------------------
  // Credentials
  // ---------------------------------------------------------------------------

  private async requireCredential(): Promise<string> {
    const credential = await this.ensureCredential(false);
    if (!credential) {
      throw new CredentialMissingError();
    }
    return credential;
  }

  /**
   * Return the credential, prompting for it when missing (or always when
   * `force` is set)
   */
  private async ensureCredential(force: boolean): Promise<string | null> {
    if (this.credential && !force) {
      return this.credential;
    }

    await this.deps.speech.speak(
      force
        ? "API key update requested. Please enter your Gemini API key now."
        : "Gemini API key is not configured. Please enter it now."
    );
    const entered = await this.deps.prompt.prompt(
      `Enter your Gemini API key. It will be encrypted in: ${this.deps.settings.configPath}`
    );

    if (!entered) {
      if (force) {
        this.notify("API key update canceled. Existing value unchanged.");
        await this.deps.speech.speak("API key update canceled.");
        this.playCue(CUES.denied);
      } else {
        this.notify(
          `No API key provided. You can set it later in '${this.deps.settings.configPath}'.`
        );
      }
      return this.credential;
    }

    const { saved, announcement } = await this.storeCredential(entered, force);
    await this.deps.speech.speak(announcement);
    return saved ?? this.credential;
  }

  private async storeCredential(
    key: string,
    update: boolean
  ): Promise<{ saved: string | null; announcement: string }> {
    const saved = await this.deps.credentials.set(key);
    if (!saved) {
      this.notify(`Failed to save API key in '${this.deps.settings.configPath}'.`);
      this.playCue(CUES.error);
      return {
        saved: null,
        announcement: "Failed to save API key. Please update config.json manually.",
      };
    }

    this.credential = saved;
    this.notify(`API key saved and encrypted in '${this.deps.settings.configPath}'.`);
    this.playCue(CUES.credentialSaved);
    return {
      saved,
      announcement: update
        ? "API key updated successfully."
        : "API key saved successfully.",
    };
  }
}
