/**
 * Inference Provider
 *
 * Sends a screenshot and a prompt to a multimodal model and returns the
 * streamed answer as one string.
 *
 * @module services/inference-provider
 */

import { InferenceError } from "../errors/assistant-errors.js";
import type { CancellationToken } from "./cancellation.js";

/** Returned instead of an answer when the request was canceled */
export const REQUEST_CANCELED = "Request canceled.";

/** Returned when the model produced no text */
export const NO_DESCRIPTION = "No description returned.";

export const DESCRIBE_PROMPT = "Describe this screenshot for a blind user.";

/**
 * Prompt for a spoken follow-up question about the current screen
 */
export function buildFollowUpPrompt(question: string): string {
  return (
    "You are assisting a blind user. " +
    "Answer the user's question using only this screenshot. " +
    "Be clear, concise, and practical. " +
    `User question: ${question}`
  );
}

/**
 * Interface for inference providers
 */
export interface InferenceProvider {
  /**
   * @returns the answer text, REQUEST_CANCELED when `cancelToken` was set,
   * or NO_DESCRIPTION when the model returned nothing
   * @throws InferenceError when the request fails
   */
  query(
    credential: string,
    image: Buffer,
    prompt: string,
    cancelToken: CancellationToken
  ): Promise<string>;

  /**
   * Abort the in-flight request, if any
   *
   * @returns true if a request was aborted
   */
  cancelActive(): boolean;
}

export interface GeminiInferenceConfig {
  /** API base URL, e.g. https://generativelanguage.googleapis.com/v1beta */
  baseUrl: string;
  model: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Collect the text parts of one streamed generateContent response
 */
export function extractCandidateText(payload: unknown): string {
  if (!isRecord(payload)) {
    return "";
  }

  let text = "";
  for (const candidate of asList(payload.candidates)) {
    if (!isRecord(candidate) || !isRecord(candidate.content)) {
      continue;
    }
    for (const part of asList(candidate.content.parts)) {
      if (isRecord(part) && typeof part.text === "string") {
        text += part.text;
      }
    }
  }
  return text;
}

/**
 * Gemini provider over the REST streaming endpoint (server-sent events)
 */
export class GeminiInferenceProvider implements InferenceProvider {
  private activeController: AbortController | null = null;

  constructor(private readonly config: GeminiInferenceConfig) {}

  async query(
    credential: string,
    image: Buffer,
    prompt: string,
    cancelToken: CancellationToken
  ): Promise<string> {
    if (cancelToken.isSet()) {
      return REQUEST_CANCELED;
    }

    const controller = new AbortController();
    this.activeController = controller;
    const unsubscribe = cancelToken.onSet(() => controller.abort());

    try {
      const response = await fetch(
        `${this.config.baseUrl}/models/${this.config.model}:streamGenerateContent?alt=sse`,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-goog-api-key": credential,
          },
          body: JSON.stringify({
            contents: [
              {
                role: "user",
                parts: [
                  { text: prompt },
                  {
                    inline_data: {
                      mime_type: "image/png",
                      data: image.toString("base64"),
                    },
                  },
                ],
              },
            ],
          }),
          signal: controller.signal,
        }
      );

      if (!response.ok) {
        const errorText = await response.text();
        throw new InferenceError(
          `Gemini API error (${response.status}): ${errorText || response.statusText}`,
          { statusCode: response.status }
        );
      }
      if (!response.body) {
        throw new InferenceError("Gemini API returned an empty body");
      }

      let answer = "";
      for await (const event of this.readEvents(response.body)) {
        if (cancelToken.isSet()) {
          console.log("[inference] Gemini request canceled by user");
          return REQUEST_CANCELED;
        }
        answer += extractCandidateText(event);
      }

      if (cancelToken.isSet()) {
        console.log("[inference] Gemini request canceled after stream");
        return REQUEST_CANCELED;
      }
      return answer.trim() || NO_DESCRIPTION;
    } catch (error) {
      if (cancelToken.isSet() || controller.signal.aborted) {
        console.log("[inference] Gemini request aborted after user cancel");
        return REQUEST_CANCELED;
      }
      if (error instanceof InferenceError) {
        throw error;
      }
      throw new InferenceError(
        error instanceof Error ? error.message : String(error)
      );
    } finally {
      unsubscribe();
      if (this.activeController === controller) {
        this.activeController = null;
      }
    }
  }

  cancelActive(): boolean {
    const controller = this.activeController;
    if (!controller) {
      return false;
    }
    controller.abort();
    console.log("[inference] Canceled active Gemini request");
    return true;
  }

  /**
   * Parse `data:` lines of a server-sent event stream as JSON
   */
  private async *readEvents(
    body: ReadableStream<Uint8Array>
  ): AsyncGenerator<unknown> {
    const decoder = new TextDecoder();
    const reader = body.getReader();
    let buffer = "";

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        buffer += decoder.decode(value, { stream: true });

        let newline = buffer.indexOf("\n");
        while (newline !== -1) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          const event = this.parseDataLine(line);
          if (event !== undefined) {
            yield event;
          }
          newline = buffer.indexOf("\n");
        }
      }

      const event = this.parseDataLine(buffer.trim());
      if (event !== undefined) {
        yield event;
      }
    } finally {
      reader.releaseLock();
    }
  }

  private parseDataLine(line: string): unknown {
    if (!line.startsWith("data:")) {
      return undefined;
    }
    const data = line.slice(5).trim();
    if (!data || data === "[DONE]") {
      return undefined;
    }
    try {
      return JSON.parse(data);
    } catch {
      throw new InferenceError(`Malformed stream event: ${data.slice(0, 80)}`);
    }
  }
}
