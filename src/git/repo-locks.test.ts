import { describe, expect, it } from "vitest";

import { RepoLocks } from "./repo-locks.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("RepoLocks", () => {
  it("runs operations on the same repository one at a time", async () => {
    const locks = new RepoLocks();
    const order: string[] = [];
    const gate = deferred();
    const started = deferred();

    const first = locks.withLock("/repo/a", async () => {
      order.push("first:start");
      started.resolve();
      await gate.promise;
      order.push("first:end");
    });
    const second = locks.withLock("/repo/a/", async () => {
      order.push("second:start");
    });

    await started.promise;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("lets different repositories proceed independently", async () => {
    const locks = new RepoLocks();
    const gate = deferred();
    const order: string[] = [];

    const blocked = locks.withLock("/repo/a", async () => {
      await gate.promise;
      order.push("a");
    });
    await locks.withLock("/repo/b", async () => {
      order.push("b");
    });

    gate.resolve();
    await blocked;

    expect(order).toEqual(["b", "a"]);
  });

  it("releases the lock when the operation throws", async () => {
    const locks = new RepoLocks();

    await expect(
      locks.withLock("/repo/a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(locks.withLock("/repo/a", async () => "next")).resolves.toBe("next");
  });
});
