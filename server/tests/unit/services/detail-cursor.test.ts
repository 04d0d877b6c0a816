/**
 * Tests for detail section navigation
 */

import { describe, it, expect } from "vitest";
import { DetailCursor } from "../../../src/services/detail-cursor.js";

describe("DetailCursor", () => {
  it("returns null when nothing is loaded", () => {
    const cursor = new DetailCursor();
    expect(cursor.step(1)).toBeNull();
    expect(cursor.step(-1)).toBeNull();
  });

  it("starts at the first section when moving forward", () => {
    const cursor = new DetailCursor();
    cursor.load(["A.", "B.", "C."]);

    expect(cursor.step(1)).toEqual({ index: 0, total: 3, text: "A." });
  });

  it("starts at the last section when moving back", () => {
    const cursor = new DetailCursor();
    cursor.load(["A.", "B.", "C."]);

    expect(cursor.step(-1)).toEqual({ index: 2, total: 3, text: "C." });
  });

  it("clamps at both ends", () => {
    const cursor = new DetailCursor();
    cursor.load(["A.", "B."]);

    const forward = [cursor.step(1), cursor.step(1), cursor.step(1)];
    expect(forward.map((step) => step?.index)).toEqual([0, 1, 1]);

    const back = [cursor.step(-1), cursor.step(-1), cursor.step(-1)];
    expect(back.map((step) => step?.index)).toEqual([0, 0, 0]);
  });

  it("keeps the index inside the bounds for any step sequence", () => {
    const cursor = new DetailCursor();
    cursor.load(["A.", "B.", "C.", "D."]);
    const moves: Array<1 | -1> = [1, 1, -1, 1, 1, 1, 1, -1, -1, -1, -1, -1, 1];

    for (const move of moves) {
      const step = cursor.step(move);
      expect(step).not.toBeNull();
      expect(step?.index).toBeGreaterThanOrEqual(0);
      expect(step?.index).toBeLessThan(4);
    }
  });

  it("resets the position on load", () => {
    const cursor = new DetailCursor();
    cursor.load(["A.", "B."]);
    cursor.step(1);
    cursor.step(1);

    cursor.load(["X.", "Y.", "Z."]);

    expect(cursor.currentIndex()).toBe(-1);
    expect(cursor.sections()).toEqual(["X.", "Y.", "Z."]);
    expect(cursor.step(1)?.text).toBe("X.");
  });
});
