/**
 * Custom error classes for assistant task failures
 *
 * Every error raised inside a task body is one of these (or an unexpected
 * Error). All of them are handled at the task boundary; none reaches the
 * trigger surface.
 */

/**
 * Base class for assistant errors
 */
export class AssistantError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Another task holds the single-flight gate
 */
export class AdmissionDeniedError extends AssistantError {
  constructor(activeTask: string | null) {
    super(
      activeTask
        ? `${activeTask} task already in progress`
        : 'Another task is already in progress',
      'ADMISSION_DENIED',
      { activeTask }
    );
  }
}

/**
 * The user canceled the running task
 */
export class TaskCanceledError extends AssistantError {
  constructor(taskName: string, stage: string) {
    super(`${taskName} task canceled during ${stage}`, 'TASK_CANCELED', {
      taskName,
      stage,
    });
  }
}

/**
 * Screen capture failed
 */
export class CaptureError extends AssistantError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'CAPTURE_FAILED', details);
  }
}

/**
 * The inference request failed for a reason other than cancellation
 */
export class InferenceError extends AssistantError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INFERENCE_FAILED', details);
  }
}

/**
 * A transcription attempt ran past its hard deadline
 */
export class TranscriptionTimeoutError extends AssistantError {
  constructor(timeoutMs: number) {
    super(`Transcription timed out after ${timeoutMs}ms`, 'TRANSCRIPTION_TIMEOUT', {
      timeoutMs,
    });
  }
}

/**
 * A transcription attempt was stopped by cancel or submit
 */
export class TranscriptionCanceledError extends AssistantError {
  constructor(reason: 'cancel' | 'submit') {
    super(`Transcription stopped by ${reason}`, 'TRANSCRIPTION_CANCELED', { reason });
  }
}

/**
 * One speech backend failed; the pipeline falls through to the next one
 */
export class SpeechBackendError extends AssistantError {
  constructor(backend: string, message: string, details: Record<string, unknown> = {}) {
    super(`${backend}: ${message}`, 'SPEECH_BACKEND_FAILED', { backend, ...details });
  }
}

/**
 * No API key is configured and the user did not provide one
 */
export class CredentialMissingError extends AssistantError {
  constructor() {
    super(
      'API key is still missing. Please provide it when prompted, or update config.json and try again.',
      'CREDENTIAL_MISSING'
    );
  }
}

/**
 * Map an error caught at the task boundary to the sentence narrated to the user
 */
export function describeTaskError(error: unknown): string {
  if (error instanceof CredentialMissingError) {
    return error.message;
  }
  if (error instanceof CaptureError) {
    return `Failed to take screenshot: ${error.message}`;
  }
  if (error instanceof InferenceError) {
    return `Error describing image: ${error.message}`;
  }
  return 'Something went wrong. Please try again.';
}
