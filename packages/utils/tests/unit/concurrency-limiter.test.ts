import { describe, expect, test } from "vitest";

import { createConcurrencyLimiter } from "../../src/concurrency-limiter";

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const flush = async (): Promise<void> => {
  for (let i = 0; i < 10; i++) await Promise.resolve();
};

describe("createConcurrencyLimiter", () => {
  test("should run at most N calls at once and start queued calls in order", async () => {
    const limit = createConcurrencyLimiter(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const started: number[] = [];

    const results = gates.map((gate, i) =>
      limit(() => {
        started.push(i);
        return gate.promise;
      }),
    );
    await flush();

    expect(started).toEqual([0, 1]);
    expect(limit.activeCount()).toBe(2);
    expect(limit.pendingCount()).toBe(1);

    gates[0]?.resolve(10);
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[1]?.resolve(11);
    gates[2]?.resolve(12);
    expect(await Promise.all(results)).toEqual([10, 11, 12]);
    expect(limit.activeCount()).toBe(0);
  });

  test("should release the slot when a call rejects or throws", async () => {
    const limit = createConcurrencyLimiter(1);

    await expect(limit(() => Promise.reject(new Error("venue down")))).rejects.toThrow("venue down");
    await expect(
      limit(() => {
        throw new Error("sync");
      }),
    ).rejects.toThrow("sync");

    expect(await limit(() => Promise.resolve("ok"))).toBe("ok");
    expect(limit.activeCount()).toBe(0);
  });

  test("should treat a limit below 1 as 1", async () => {
    const limit = createConcurrencyLimiter(0);
    const gate = deferred<void>();

    const first = limit(() => gate.promise);
    const second = limit(() => Promise.resolve());
    await flush();

    expect(limit.activeCount()).toBe(1);
    expect(limit.pendingCount()).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);
  });
});
