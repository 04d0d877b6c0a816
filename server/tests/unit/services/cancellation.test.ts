/**
 * Tests for Signal and CancellationToken
 */

import { describe, it, expect, vi } from "vitest";
import { CancellationToken, Signal } from "../../../src/services/cancellation.js";

describe("Signal", () => {
  it("is idempotent and notifies once per transition", () => {
    const signal = new Signal();
    const listener = vi.fn();
    signal.onSet(listener);

    signal.set();
    signal.set();
    expect(listener).toHaveBeenCalledTimes(1);

    signal.clear();
    expect(signal.isSet()).toBe(false);
    signal.set();
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it("stops notifying after unsubscribe", () => {
    const signal = new Signal();
    const listener = vi.fn();
    const unsubscribe = signal.onSet(listener);

    unsubscribe();
    signal.set();

    expect(listener).not.toHaveBeenCalled();
  });

  it("keeps notifying other listeners when one throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const signal = new Signal();
    const after = vi.fn();
    signal.onSet(() => {
      throw new Error("boom");
    });
    signal.onSet(after);

    signal.set();

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "[signal] Listener failed:",
      expect.any(Error)
    );
    errorSpy.mockRestore();
  });
});

describe("CancellationToken", () => {
  it("stays set until cleared", () => {
    const token = new CancellationToken();
    token.set();
    expect(token.isSet()).toBe(true);
    expect(token.isSet()).toBe(true);
    token.clear();
    expect(token.isSet()).toBe(false);
  });
});
