import { describe, it, expect } from "vitest";
import { NamespaceLock } from "../utils/namespace-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("NamespaceLock", () => {
  it("runs work for one namespace in order", async () => {
    const lock = new NamespaceLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.runExclusive("ns", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("ns", async () => {
      order.push("second");
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("runs different namespaces concurrently", async () => {
    const lock = new NamespaceLock();
    const gate = deferred();
    const order: string[] = [];

    const a = lock.runExclusive("a", async () => {
      await gate.promise;
      order.push("a");
    });
    const b = lock.runExclusive("b", async () => {
      order.push("b");
    });

    await b;
    expect(order).toEqual(["b"]);
    gate.resolve();
    await a;
    expect(order).toEqual(["b", "a"]);
  });

  it("keeps going after a rejected task", async () => {
    const lock = new NamespaceLock();
    const failed = lock.runExclusive("ns", async () => {
      throw new Error("boom");
    });
    const next = lock.runExclusive("ns", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("forgets idle namespaces", async () => {
    const lock = new NamespaceLock();
    await lock.runExclusive("ns", async () => 1);
    await tick();
    expect(lock.activeNamespaces).toBe(0);
  });
});
