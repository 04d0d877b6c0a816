/**
 * Tests for the assistant configuration getters
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as path from "path";
import {
  getAssistantConfig,
  getConfigDirectory,
  parseCommandList,
} from "../../../src/utils/assistant-config.js";

describe("assistant-config", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe("getAssistantConfig", () => {
    it("reads NARRATOR_* variables", () => {
      vi.stubEnv("NARRATOR_PORT", "5123");
      vi.stubEnv("NARRATOR_ADMIT_TIMEOUT_MS", "250");
      vi.stubEnv("NARRATOR_KEYS", "false");
      vi.stubEnv("NARRATOR_WELCOME", "0");
      vi.stubEnv("NARRATOR_CONFIG_PATH", "/tmp/narrator/config.json");
      vi.stubEnv("NARRATOR_TRANSCRIBE_COMMAND", '["listen","{seconds}"]');

      const config = getAssistantConfig();

      expect(config.port).toBe(5123);
      expect(config.admitTimeoutMs).toBe(250);
      expect(config.keyBindings).toBe(false);
      expect(config.welcome).toBe(false);
      expect(config.configPath).toBe("/tmp/narrator/config.json");
      expect(config.transcriptionCommand).toEqual(["listen", "{seconds}"]);
    });

    it("falls back to defaults for invalid numbers", () => {
      vi.stubEnv("NARRATOR_DICTATION_MAX_SECONDS", "soon");
      vi.stubEnv("NARRATOR_EXIT_GRACE_MS", "-5");

      const config = getAssistantConfig();

      expect(config.dictationMaxSeconds).toBe(30);
      expect(config.exitGraceMs).toBe(200);
      expect(console.warn).toHaveBeenCalledWith(
        "[config] Ignoring invalid NARRATOR_DICTATION_MAX_SECONDS=soon"
      );
    });

    it("lets overrides win over the environment", () => {
      vi.stubEnv("NARRATOR_PORT", "5123");

      const config = getAssistantConfig({ port: 6000, welcome: false });

      expect(config.port).toBe(6000);
      expect(config.welcome).toBe(false);
    });
  });

  describe("getConfigDirectory", () => {
    it.skipIf(process.platform === "win32")(
      "uses XDG_CONFIG_HOME when set",
      () => {
        vi.stubEnv("XDG_CONFIG_HOME", "/tmp/xdg");

        expect(getConfigDirectory()).toBe(path.join("/tmp/xdg", "screen-narrator"));
      }
    );
  });

  describe("parseCommandList", () => {
    it("accepts a non-empty JSON array of strings", () => {
      expect(parseCommandList('["a","b"]')).toEqual(["a", "b"]);
    });

    it("rejects anything else", () => {
      expect(parseCommandList(undefined)).toBeNull();
      expect(parseCommandList("[]")).toBeNull();
      expect(parseCommandList("[1]")).toBeNull();
      expect(parseCommandList("listen --now")).toBeNull();
      expect(console.warn).toHaveBeenLastCalledWith(
        expect.stringContaining("[config] Command is not valid JSON:")
      );
    });
  });
});
