import { describe, it, expect, vi, afterEach } from "vitest";
import { Mutex } from "../src/lock.js";
import { LockError } from "../src/errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("Mutex", () => {
  it("grants the lock immediately when free", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked).toBe(true);
    release();
    expect(mutex.isLocked).toBe(false);
  });

  it("hands the lock over in arrival order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = await mutex.acquire();
    const second = mutex.acquire().then((release) => {
      order.push("second");
      release();
    });
    const third = mutex.acquire().then((release) => {
      order.push("third");
      release();
    });
    expect(mutex.waiting).toBe(2);

    order.push("first");
    first();
    await Promise.all([second, third]);

    expect(order).toEqual(["first", "second", "third"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiter = mutex.acquire();

    release();
    release();
    const next = await waiter;

    expect(mutex.isLocked).toBe(true);
    next();
    expect(mutex.isLocked).toBe(false);
  });

  it("times out a waiter with LockError", async () => {
    vi.useFakeTimers();
    const mutex = new Mutex();
    await mutex.acquire();

    const waiter = mutex.acquire(50);
    vi.advanceTimersByTime(50);

    await expect(waiter).rejects.toThrow(
      "Timed out after 50ms waiting for the client lock",
    );
    expect(mutex.waiting).toBe(0);
  });

  it("rejects every waiter on demand", async () => {
    const mutex = new Mutex();
    await mutex.acquire();
    const a = mutex.acquire();
    const b = mutex.acquire();

    mutex.rejectWaiting(new LockError("closed"));

    await expect(a).rejects.toBeInstanceOf(LockError);
    await expect(b).rejects.toThrow("closed");
    expect(mutex.isLocked).toBe(true);
  });

  it("runExclusive releases after a failure", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => Promise.reject(new Error("boom"))),
    ).rejects.toThrow("boom");
    expect(mutex.isLocked).toBe(false);
  });
});
