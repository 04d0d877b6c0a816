/**
 * Tests for the terminal API key prompt
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import * as readline from "readline";
import { PassThrough } from "stream";
import { TerminalCredentialPrompt } from "../../../src/services/credential-prompt.js";

vi.mock("readline", () => ({
  createInterface: vi.fn(),
}));

function fakeTerminal(isTTY: boolean) {
  const input = Object.assign(new PassThrough(), { isTTY });
  const output = new PassThrough();
  const written: string[] = [];
  vi.spyOn(output, "write").mockImplementation((chunk: unknown) => {
    written.push(String(chunk));
    return true;
  });
  return {
    input: input as unknown as NodeJS.ReadStream,
    output: output as unknown as NodeJS.WriteStream,
    written,
  };
}

describe("TerminalCredentialPrompt", () => {
  let answer: string;
  let close: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    answer = "  test-secret  ";
    close = vi.fn();
    vi.mocked(readline.createInterface).mockReturnValue({
      question: (_query: string, callback: (value: string) => void) => {
        callback(answer);
      },
      close,
    } as unknown as readline.Interface);
  });

  it("returns the trimmed key and pauses the key bindings meanwhile", async () => {
    const terminal = fakeTerminal(true);
    const keyboard = { pause: vi.fn(), resume: vi.fn() };
    const prompt = new TerminalCredentialPrompt(terminal);
    prompt.attachKeyboard(keyboard);

    await expect(prompt.prompt("Enter your Gemini API key.")).resolves.toBe(
      "test-secret"
    );

    expect(keyboard.pause).toHaveBeenCalledTimes(1);
    expect(keyboard.resume).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(terminal.written).toEqual(["Enter your Gemini API key.\n", "\n"]);
  });

  it("returns null for a blank answer", async () => {
    answer = "   ";
    const prompt = new TerminalCredentialPrompt(fakeTerminal(true));

    await expect(prompt.prompt("Enter your Gemini API key.")).resolves.toBeNull();
  });

  it("does not prompt without a terminal", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const prompt = new TerminalCredentialPrompt(fakeTerminal(false));

    await expect(prompt.prompt("Enter your Gemini API key.")).resolves.toBeNull();

    expect(readline.createInterface).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(
      "[credentials] No terminal attached; cannot prompt for the API key"
    );
    warn.mockRestore();
  });
});
