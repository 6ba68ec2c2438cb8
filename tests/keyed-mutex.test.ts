import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/agent/keyed-mutex.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs calls for the same key one after another", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.run("u1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.run("u1", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(mutex.isLocked("u1")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not make different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const done: string[] = [];

    const slow = mutex.run("u1", async () => {
      await gate.promise;
      done.push("u1");
    });
    await mutex.run("u2", async () => {
      done.push("u2");
    });

    expect(done).toEqual(["u2"]);
    gate.resolve();
    await slow;
    expect(done).toEqual(["u2", "u1"]);
  });

  it("releases the key when the task throws", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.run("u1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(mutex.run("u1", async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked("u1")).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
