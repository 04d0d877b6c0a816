/**
 * Tests for server command handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { EventEmitter } from "events";
import { spawn, type ChildProcess } from "child_process";
import {
  buildServerEnv,
  handleServerStart,
  SERVER_BINARY,
} from "../../../src/cli/server-commands.js";

vi.mock("child_process", () => ({
  spawn: vi.fn(),
}));

class FakeServerProcess extends EventEmitter {
  kill = vi.fn(() => true);
}

describe("Server Commands", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let child: FakeServerProcess;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.clearAllMocks();
    child = new FakeServerProcess();
    vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
    process.exitCode = undefined;
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    child.emit("exit", 0, null);
    process.exitCode = undefined;
  });

  describe("buildServerEnv", () => {
    it("maps options onto daemon environment variables", () => {
      const env = buildServerEnv(
        { port: "5001", keys: false, quiet: true },
        { PATH: "/usr/bin" }
      );

      expect(env).toEqual({
        PATH: "/usr/bin",
        NARRATOR_PORT: "5001",
        NARRATOR_KEYS: "false",
        NARRATOR_WELCOME: "false",
      });
    });

    it("leaves defaults to the daemon", () => {
      expect(buildServerEnv({ keys: true }, { PATH: "/usr/bin" })).toEqual({
        PATH: "/usr/bin",
      });
    });
  });

  describe("handleServerStart", () => {
    it("spawns the daemon with inherited stdio", () => {
      const started = handleServerStart({ port: "5002", keys: false });

      expect(started).toBe(child);
      expect(spawn).toHaveBeenCalledWith(
        SERVER_BINARY,
        [],
        expect.objectContaining({
          stdio: "inherit",
          env: expect.objectContaining({
            NARRATOR_PORT: "5002",
            NARRATOR_KEYS: "false",
          }),
        })
      );
    });

    it("rejects an invalid port without spawning", () => {
      const started = handleServerStart({ port: "99999" });

      expect(started).toBeNull();
      expect(spawn).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining("Invalid port: 99999")
      );
      expect(process.exitCode).toBe(1);
    });

    it("explains a missing server binary", () => {
      handleServerStart({});
      const error: NodeJS.ErrnoException = new Error("spawn ENOENT");
      error.code = "ENOENT";
      child.emit("error", error);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining(`${SERVER_BINARY} is not installed`)
      );
      expect(process.exitCode).toBe(1);
    });

    it("propagates a non-zero daemon exit code", () => {
      handleServerStart({});
      child.emit("exit", 3, null);

      expect(process.exitCode).toBe(3);
    });

    it("forwards SIGINT to the daemon until it exits", () => {
      const before = process.listenerCount("SIGINT");
      handleServerStart({});

      expect(process.listenerCount("SIGINT")).toBe(before + 1);
      process.emit("SIGINT", "SIGINT");
      expect(child.kill).toHaveBeenCalledWith("SIGINT");

      child.emit("exit", 0, null);
      expect(process.listenerCount("SIGINT")).toBe(before);
    });
  });
});
