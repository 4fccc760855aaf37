import { describe, it, expect, vi } from "vitest";
import { SerialLock, StoreTimeoutError, withTimeout } from "../../src/utils/async.js";

describe("withTimeout", () => {
  it("resolves with the value when the call is fast", async () => {
    expect(await withTimeout(async () => 7, 50, "lookup")).toBe(7);
  });

  it("rejects with StoreTimeoutError when the call hangs", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(() => new Promise<number>(() => {}), 100, "session lookup");
    const assertion = expect(pending).rejects.toThrow(StoreTimeoutError);

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
    await expect(pending).rejects.toThrow("session lookup timed out after 100ms");
    vi.useRealTimers();
  });
});

describe("SerialLock", () => {
  it("runs sections one after another and survives a failure", async () => {
    const lock = new SerialLock();
    const order: string[] = [];

    const first = lock.run(async () => {
      await Promise.resolve();
      order.push("first");
      throw new Error("first failed");
    });
    const second = lock.run(async () => {
      order.push("second");
      return 2;
    });

    await expect(first).rejects.toThrow("first failed");
    expect(await second).toBe(2);
    expect(order).toEqual(["first", "second"]);
    expect(lock.queued).toBe(0);
  });
});
