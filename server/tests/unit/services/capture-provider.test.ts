/**
 * Tests for the screenshot capture provider
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { spawn, type ChildProcess } from "child_process";
import { isCommandAvailable } from "../../../src/execution/process/utils.js";
import {
  getCaptureCommands,
  ScreenCaptureProvider,
} from "../../../src/services/capture-provider.js";
import { CaptureError } from "../../../src/errors/assistant-errors.js";
import { MockChildProcess } from "../helpers/mock-child-process.js";

vi.mock("child_process", () => ({
  spawn: vi.fn(),
}));

vi.mock("../../../src/execution/process/utils.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../../src/execution/process/utils.js")>()),
  isCommandAvailable: vi.fn(async () => true),
}));

type Screenshot = { content: string | null; exitCode: number; stderr?: string };

describe("ScreenCaptureProvider", () => {
  let tempDir: string;
  let screenshot: Screenshot;
  let writtenTo: string[];

  const commands = [
    { command: "gnome-screenshot", args: ["-f", "{png}"] },
    { command: "grim", args: ["{png}"] },
  ];

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "narrator-capture-"));
    screenshot = { content: "PNGDATA", exitCode: 0 };
    writtenTo = [];

    vi.mocked(spawn).mockImplementation((...params: unknown[]) => {
      const child = new MockChildProcess();
      const args = Array.isArray(params[1]) ? params[1].map(String) : [];
      const target = args[args.length - 1];
      setImmediate(() => {
        const write =
          screenshot.content === null
            ? Promise.resolve()
            : fs.writeFile(target, screenshot.content);
        void write.then(() => {
          writtenTo.push(target);
          if (screenshot.stderr) {
            child.stderr.emit("data", Buffer.from(screenshot.stderr));
          }
          child.exitWith(screenshot.exitCode);
        });
      });
      return child as unknown as ChildProcess;
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("captures with the first available command and removes the file", async () => {
    vi.mocked(isCommandAvailable).mockImplementation(
      async (command: string) => command === "grim"
    );
    const provider = new ScreenCaptureProvider({ commands, tempDir });

    const image = await provider.capture();

    expect(image.toString()).toBe("PNGDATA");
    expect(spawn).toHaveBeenCalledWith(
      "grim",
      [writtenTo[0]],
      expect.objectContaining({
        env: expect.objectContaining({ NARRATOR_CAPTURE_PATH: writtenTo[0] }),
      })
    );
    expect(path.basename(writtenTo[0])).toMatch(
      /^narrator_capture-[0-9a-z]{10}\.png$/
    );
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
  });

  it("fails when no screenshot command exists", async () => {
    vi.mocked(isCommandAvailable).mockResolvedValue(false);
    const provider = new ScreenCaptureProvider({ commands, tempDir });

    const error = await provider.capture().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CaptureError);
    expect(error).toMatchObject({
      message: "no screenshot command is available",
      details: { tried: ["gnome-screenshot", "grim"] },
    });
    expect(spawn).not.toHaveBeenCalled();
  });

  it("reports the command's error output", async () => {
    vi.mocked(isCommandAvailable).mockResolvedValue(true);
    screenshot = { content: null, exitCode: 1, stderr: "cannot open display\n" };
    const provider = new ScreenCaptureProvider({ commands, tempDir });

    await expect(provider.capture()).rejects.toThrow(
      new CaptureError("cannot open display")
    );
  });

  it("fails when the command wrote nothing", async () => {
    vi.mocked(isCommandAvailable).mockResolvedValue(true);
    screenshot = { content: null, exitCode: 0 };
    const provider = new ScreenCaptureProvider({ commands, tempDir });

    await expect(provider.capture()).rejects.toThrow(
      /^screenshot file was not written: /
    );
  });

  it("fails for an empty image", async () => {
    vi.mocked(isCommandAvailable).mockResolvedValue(true);
    screenshot = { content: "", exitCode: 0 };
    const provider = new ScreenCaptureProvider({ commands, tempDir });

    await expect(provider.capture()).rejects.toThrow("screenshot file is empty");
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
  });
});

describe("getCaptureCommands", () => {
  it("uses screencapture on macOS", () => {
    expect(getCaptureCommands("darwin")).toEqual([
      { command: "screencapture", args: ["-x", "-t", "png", "{png}"] },
    ]);
  });

  it("tries several tools on Linux", () => {
    expect(getCaptureCommands("linux").map((entry) => entry.command)).toEqual([
      "gnome-screenshot",
      "grim",
      "import",
    ]);
  });
});
