import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Express } from "express";
import request from "supertest";
import { createApp } from "../../../src/app.js";
import {
  createHarness,
  untilCanceled,
  waitFor,
  type Harness,
} from "../helpers/orchestrator-harness.js";

describe("Commands API Routes", () => {
  let h: Harness;
  let app: Express;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    h = createHarness();
    await h.orchestrator.initialize();
    app = createApp(h.orchestrator);
  });

  afterEach(async () => {
    await h.orchestrator.whenIdle();
    vi.restoreAllMocks();
  });

  describe("POST /api/commands/:command", () => {
    it("should report the outcome of a command", async () => {
      const response = await request(app).post("/api/commands/stop-speech");

      expect(response.status).toBe(202);
      expect(response.body).toEqual({
        success: true,
        data: { command: "stop-speech", outcome: "stopped" },
      });
    });

    it("should report a denied trigger as an outcome", async () => {
      h.inference.respond = (token) => untilCanceled(token);

      const first = await request(app).post("/api/commands/capture");
      await waitFor(() => h.inference.prompts.length === 1);
      const second = await request(app).post("/api/commands/capture");
      const cancel = await request(app).post("/api/commands/cancel-task");

      expect(first.body.data).toEqual({ command: "capture", outcome: "admitted" });
      expect(second.status).toBe(202);
      expect(second.body.data).toEqual({ command: "capture", outcome: "denied" });
      expect(cancel.body.data).toEqual({
        command: "cancel-task",
        outcome: "canceled",
      });
    });

    it("should reject unknown commands", async () => {
      const response = await request(app).post("/api/commands/explode");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        data: null,
        message:
          "Unknown command: explode. Expected one of: capture, follow-up-toggle, stop-speech, cancel-task, set-credential, next-detail, previous-detail, shutdown",
      });
    });

    it("should return 500 when dispatch fails", async () => {
      vi.spyOn(h.orchestrator, "dispatch").mockRejectedValueOnce(
        new Error("boom")
      );

      const response = await request(app).post("/api/commands/capture");

      expect(response.status).toBe(500);
      expect(response.body.message).toBe("Failed to dispatch capture");
    });

    it("should shut the assistant down", async () => {
      const response = await request(app).post("/api/commands/shutdown");
      await h.orchestrator.whenIdle();

      expect(response.body.data).toEqual({
        command: "shutdown",
        outcome: "shutting-down",
      });
      expect(h.exit).toHaveBeenCalledWith(0);
    });
  });
});
