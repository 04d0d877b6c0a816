/**
 * Credential Prompt
 *
 * Asks for the API key on the controlling terminal without echoing it.
 *
 * @module services/credential-prompt
 */

import * as readline from "readline";
import { Writable } from "stream";

/**
 * Interface for credential prompts
 */
export interface CredentialPrompt {
  /**
   * @param reason - Line shown before the question
   * @returns the entered key (trimmed), or null when nothing was entered or
   * no terminal is attached
   */
  prompt(reason: string): Promise<string | null>;
}

/**
 * Something reading the same input that must step aside while prompting
 */
export interface PausableInput {
  pause(): void;
  resume(): void;
}

export interface TerminalCredentialPromptOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
}

export class TerminalCredentialPrompt implements CredentialPrompt {
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;
  private keyboard: PausableInput | null = null;

  constructor(options: TerminalCredentialPromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /**
   * Key bindings to pause while the question is open
   */
  attachKeyboard(keyboard: PausableInput | null): void {
    this.keyboard = keyboard;
  }

  async prompt(reason: string): Promise<string | null> {
    if (!this.input.isTTY) {
      console.warn("[credentials] No terminal attached; cannot prompt for the API key");
      return null;
    }

    this.keyboard?.pause();
    try {
      this.output.write(`${reason}\n`);
      const answer = await this.askHidden("Gemini API key (input hidden): ");
      return answer.trim() || null;
    } finally {
      this.keyboard?.resume();
    }
  }

  private askHidden(question: string): Promise<string> {
    const target = this.output;
    let muted = false;
    const output = new Writable({
      write(chunk: Buffer | string, encoding: BufferEncoding, callback) {
        if (!muted) {
          target.write(chunk, encoding);
        }
        callback();
      },
    });

    const rl = readline.createInterface({
      input: this.input,
      output,
      terminal: true,
    });

    return new Promise((resolve) => {
      rl.question(question, (answer) => {
        rl.close();
        target.write("\n");
        resolve(answer);
      });
      muted = true;
    });
  }
}
