import { describe, it, expect, afterEach, vi } from "vitest";
import request from "supertest";
import { createApp } from "../../src/app.js";
import { createHarness } from "./helpers/orchestrator-harness.js";

describe("createApp", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should answer the health check", async () => {
    const response = await request(createApp(createHarness().orchestrator)).get(
      "/health"
    );

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });

  it("should return a JSON 404 for unknown API routes", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    const response = await request(createApp(createHarness().orchestrator)).get(
      "/api/nothing"
    );

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      data: null,
      message: "API endpoint not found: GET /api/nothing",
    });
  });
});
