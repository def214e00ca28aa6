import { describe, it, expect } from "vitest";
import { ExchangeLock } from "../../src/client/lock.js";
import { RequestIdSequence } from "../../src/client/ids.js";
import { LockTimeoutError } from "../../src/shared/errors.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ExchangeLock", () => {
  it("runs holders one at a time in arrival order", async () => {
    const lock = new ExchangeLock();
    const events: string[] = [];
    const gate = deferred();

    const a = lock.runExclusive(async () => {
      events.push("a:start");
      await gate.promise;
      events.push("a:end");
    });
    const b = lock.runExclusive(async () => {
      events.push("b");
    });
    const c = lock.runExclusive(async () => {
      events.push("c");
    });

    expect(lock.held).toBe(true);
    expect(lock.queued).toBe(2);
    gate.resolve();
    await Promise.all([a, b, c]);

    expect(events).toEqual(["a:start", "a:end", "b", "c"]);
    expect(lock.held).toBe(false);
  });

  it("returns the holder's value", async () => {
    const lock = new ExchangeLock();
    await expect(lock.runExclusive(async () => 42)).resolves.toBe(42);
  });

  it("releases when the holder throws", async () => {
    const lock = new ExchangeLock();
    await expect(
      lock.runExclusive(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(lock.held).toBe(false);
    await expect(lock.runExclusive(async () => "next")).resolves.toBe("next");
  });

  it("gives up waiting after the timeout", async () => {
    const lock = new ExchangeLock();
    const gate = deferred();
    const holder = lock.runExclusive(() => gate.promise);

    const waiting = lock.runExclusive(async () => "never", 20);
    await expect(waiting).rejects.toThrow(new LockTimeoutError(20));
    await expect(waiting).rejects.toThrow("Timed out after 20ms waiting for the connection");
    expect(lock.queued).toBe(0);

    gate.resolve();
    await holder;
    expect(lock.held).toBe(false);
  });

  it("does not time out once the lock is granted", async () => {
    const lock = new ExchangeLock();
    await expect(lock.runExclusive(async () => "free", 1)).resolves.toBe("free");
  });
});

describe("RequestIdSequence", () => {
  it("starts at 1 and increases by one", () => {
    const ids = new RequestIdSequence();
    expect(ids.current).toBe(0);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([1, 2, 3]);
    expect(ids.current).toBe(3);
  });
});
