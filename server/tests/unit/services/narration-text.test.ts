/**
 * Tests for narration text helpers
 */

import { describe, it, expect } from "vitest";
import {
  buildSummary,
  normalizeForSpeech,
  splitSections,
} from "../../../src/services/narration-text.js";

describe("normalizeForSpeech", () => {
  it("drops markup characters and collapses whitespace", () => {
    expect(normalizeForSpeech("**Title**\n# Header   `code`")).toBe(
      "Title Header code"
    );
  });

  it("returns an empty string for markup only", () => {
    expect(normalizeForSpeech(" ** __ ")).toBe("");
  });
});

describe("splitSections", () => {
  it("splits on sentence boundaries", () => {
    expect(splitSections("First part. Second part! Third part?")).toEqual([
      "First part.",
      "Second part!",
      "Third part?",
    ]);
  });

  it("keeps text without punctuation as one section", () => {
    expect(splitSections("a settings dialog")).toEqual(["a settings dialog"]);
  });

  it("never returns an empty list", () => {
    expect(splitSections("   ")).toEqual(["No details available."]);
  });

  it("splits across line breaks", () => {
    expect(splitSections("A window.\n\n* A button.")).toEqual([
      "A window.",
      "A button.",
    ]);
  });
});

describe("buildSummary", () => {
  it("keeps the first two sentences", () => {
    expect(buildSummary("One. Two. Three.")).toBe("One. Two.");
  });

  it("returns a single sentence unchanged", () => {
    expect(buildSummary("Only one.")).toBe("Only one.");
  });

  it("falls back when the text is empty", () => {
    expect(buildSummary("")).toBe("No description returned.");
  });
});
