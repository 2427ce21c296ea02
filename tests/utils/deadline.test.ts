/**
 * @fileoverview Tests for deadline and abort-signal bounds.
 */

import { describe, it, expect } from "vitest";
import { setTimeout as delay } from "node:timers/promises";
import { withDeadline, withSignal } from "../../src/utils/deadline.js";
import { CancelledError, TimeoutError } from "../../src/utils/errors.js";

describe("withDeadline", () => {
  it("resolves with work that finishes first", async () => {
    await expect(withDeadline(Promise.resolve(7), Date.now() + 1000, "late")).resolves.toBe(7);
  });

  it("passes through a rejection that comes first", async () => {
    await expect(withDeadline(Promise.reject(new Error("boom")), Date.now() + 1000, "late")).rejects.toThrow("boom");
  });

  it("rejects with TimeoutError once the deadline passes", async () => {
    const work = delay(200).then(() => "done");
    const bounded = withDeadline(work, Date.now() + 20, "Call passed its deadline");

    await expect(bounded).rejects.toBeInstanceOf(TimeoutError);
    await expect(bounded).rejects.toThrow("Call passed its deadline");
    await expect(work).resolves.toBe("done");
  });

  it("rejects at once for a deadline in the past", async () => {
    await expect(withDeadline(delay(10), Date.now() - 1, "already late")).rejects.toThrow("already late");
  });
});

describe("withSignal", () => {
  it("returns the work unchanged without a signal", () => {
    const work = Promise.resolve(1);
    expect(withSignal(work, undefined)).toBe(work);
  });

  it("rejects with CancelledError when the signal aborts first", async () => {
    const controller = new AbortController();
    const bounded = withSignal(delay(200), controller.signal);
    controller.abort();
    await expect(bounded).rejects.toBeInstanceOf(CancelledError);
  });

  it("rejects at once for an aborted signal", async () => {
    await expect(withSignal(Promise.resolve(1), AbortSignal.abort())).rejects.toThrow("Dispatch cancelled");
  });

  it("resolves when the work wins", async () => {
    await expect(withSignal(Promise.resolve("ok"), new AbortController().signal)).resolves.toBe("ok");
  });
});
