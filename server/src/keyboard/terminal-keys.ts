/**
 * Terminal key bindings
 *
 * Single-key triggers read from the controlling terminal in raw mode.
 *
 * @module keyboard/terminal-keys
 */

import * as readline from "readline";
import type { AssistantCommand } from "@screen-narrator/types";
import type { PausableInput } from "../services/credential-prompt.js";

export const KEY_HELP: ReadonlyArray<[string, string]> = [
  ["c", "capture the screen and hear a summary"],
  ["f", "start a voice follow-up question; press again to send it"],
  ["s", "stop current speech"],
  ["x", "cancel the current capture or follow-up task"],
  ["k", "set or update the Gemini API key"],
  ["right / down", "next detail"],
  ["left / up", "previous detail"],
  ["q / ctrl+c", "exit"],
];

/**
 * Map a keypress to its trigger command
 */
export function commandForKey(key: readline.Key): AssistantCommand | null {
  if (key.ctrl && key.name === "c") {
    return "shutdown";
  }
  if (key.ctrl || key.meta) {
    return null;
  }
  switch (key.name) {
    case "c":
      return "capture";
    case "f":
      return "follow-up-toggle";
    case "s":
      return "stop-speech";
    case "x":
      return "cancel-task";
    case "k":
      return "set-credential";
    case "right":
    case "down":
      return "next-detail";
    case "left":
    case "up":
      return "previous-detail";
    case "q":
      return "shutdown";
    default:
      return null;
  }
}

export class TerminalKeyBindings implements PausableInput {
  private active = false;
  private paused = false;

  constructor(
    private readonly onCommand: (command: AssistantCommand) => void,
    private readonly input: NodeJS.ReadStream = process.stdin
  ) {}

  /**
   * Start listening.
   *
   * @returns false when the input is not a terminal
   */
  start(): boolean {
    if (this.active) {
      return true;
    }
    if (!this.input.isTTY) {
      console.warn("[keys] stdin is not a terminal; key bindings disabled");
      return false;
    }
    readline.emitKeypressEvents(this.input);
    this.input.setRawMode(true);
    this.input.on("keypress", this.handleKeypress);
    this.input.resume();
    this.active = true;
    return true;
  }

  /**
   * Hand the terminal to another reader (e.g. the credential prompt)
   */
  pause(): void {
    if (!this.active || this.paused) {
      return;
    }
    this.paused = true;
    this.input.off("keypress", this.handleKeypress);
    this.input.setRawMode(false);
  }

  resume(): void {
    if (!this.active || !this.paused) {
      return;
    }
    this.paused = false;
    this.input.setRawMode(true);
    this.input.on("keypress", this.handleKeypress);
    this.input.resume();
  }

  stop(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.paused = false;
    this.input.off("keypress", this.handleKeypress);
    this.input.setRawMode(false);
    this.input.pause();
  }

  private handleKeypress = (_text: string | undefined, key: readline.Key | undefined) => {
    if (!key) {
      return;
    }
    const command = commandForKey(key);
    if (command) {
      this.onCommand(command);
    }
  };
}
