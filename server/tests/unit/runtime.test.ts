import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  buildInstructions,
  registerShutdownSignals,
} from "../../src/runtime.js";
import { getAssistantConfig } from "../../src/utils/assistant-config.js";
import { createHarness, type Harness } from "./helpers/orchestrator-harness.js";

describe("buildInstructions", () => {
  const config = getAssistantConfig({
    host: "127.0.0.1",
    port: 4799,
    configPath: "/tmp/narrator/config.json",
  });

  it("lists key bindings when they are enabled", () => {
    const text = buildInstructions(config, true);
    const lines = text.split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "Welcome to Screen Narrator.",
      "",
      "Instructions:",
      "  - Press c to capture the screen and hear a summary.",
    ]);
    expect(lines[lines.length - 1]).toBe("  - Command surface: http://127.0.0.1:4799");
  });

  it("leaves key bindings out otherwise", () => {
    const lines = buildInstructions(config, false).split("\n");

    expect(lines[3]).toBe(
      "  - From other programs or OS hotkeys run: screen-narrator send <command>."
    );
    expect(lines).toContain("  - Config file: '/tmp/narrator/config.json'.");
  });
});

describe("registerShutdownSignals", () => {
  let added: { SIGINT: NodeJS.SignalsListener[]; SIGTERM: NodeJS.SignalsListener[] };
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    for (const listener of added.SIGINT) {
      process.removeListener("SIGINT", listener);
    }
    for (const listener of added.SIGTERM) {
      process.removeListener("SIGTERM", listener);
    }
    logSpy.mockRestore();
  });

  function register(h: Harness) {
    const before = {
      SIGINT: process.listeners("SIGINT"),
      SIGTERM: process.listeners("SIGTERM"),
    };
    registerShutdownSignals(h.orchestrator);
    added = {
      SIGINT: process
        .listeners("SIGINT")
        .filter((listener) => !before.SIGINT.includes(listener)),
      SIGTERM: process
        .listeners("SIGTERM")
        .filter((listener) => !before.SIGTERM.includes(listener)),
    };
  }

  it("shuts down once and stays attached for repeated interrupts", async () => {
    const h = createHarness();
    register(h);
    expect(added.SIGINT).toHaveLength(1);
    expect(added.SIGTERM).toHaveLength(1);

    added.SIGINT[0]("SIGINT");
    added.SIGINT[0]("SIGINT");
    await h.orchestrator.whenIdle();

    expect(h.orchestrator.isRunning()).toBe(false);
    expect(h.spoken).toEqual([]);
    expect(h.exit).toHaveBeenCalledTimes(1);
    expect(process.listeners("SIGINT")).toContain(added.SIGINT[0]);
    expect(logSpy).toHaveBeenCalledWith("[server] Received SIGINT");
  });

  it("shuts down on SIGTERM", async () => {
    const h = createHarness();
    register(h);

    added.SIGTERM[0]("SIGTERM");
    await h.orchestrator.whenIdle();

    expect(h.exit).toHaveBeenCalledWith(0);
  });
});
