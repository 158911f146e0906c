import { describe, expect, it } from "vitest";
import { SemaphoreLimiter } from "./semaphore-limiter.js";

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, resolve: () => release() };
}

const flush = () => new Promise((r) => setImmediate(r));

describe("SemaphoreLimiter", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new SemaphoreLimiter(0)).toThrow(RangeError);
    expect(() => new SemaphoreLimiter(1.5)).toThrow(RangeError);
  });

  it("runs tasks immediately while permits are free", async () => {
    const limiter = new SemaphoreLimiter(2);
    const result = await limiter.run(async () => "done");
    expect(result).toBe("done");
    expect(limiter.active).toBe(0);
    expect(limiter.available).toBe(2);
  });

  it("never runs more than capacity tasks at once", async () => {
    const limiter = new SemaphoreLimiter(3);
    let running = 0;
    let maxRunning = 0;

    const tasks = Array.from({ length: 20 }, () =>
      limiter.run(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 1));
        running--;
      }),
    );
    await Promise.all(tasks);

    expect(maxRunning).toBe(3);
    expect(limiter.peak).toBe(3);
    expect(limiter.active).toBe(0);
  });

  it("queues waiters in FIFO order", async () => {
    const limiter = new SemaphoreLimiter(1);
    const gate = deferred();
    const order: number[] = [];

    const first = limiter.run(() => gate.promise);
    const second = limiter.run(async () => {
      order.push(2);
    });
    const third = limiter.run(async () => {
      order.push(3);
    });

    expect(limiter.pending).toBe(2);
    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual([2, 3]);
  });

  it("releases the permit when the task rejects", async () => {
    const limiter = new SemaphoreLimiter(1);

    await expect(
      limiter.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(limiter.active).toBe(0);
    await expect(limiter.run(async () => 1)).resolves.toBe(1);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const limiter = new SemaphoreLimiter(1);
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(limiter.run(async () => 1, controller.signal)).rejects.toThrow("cancelled");
    expect(limiter.active).toBe(0);
  });

  it("removes an aborted waiter without leaking permits", async () => {
    const limiter = new SemaphoreLimiter(1);
    const gate = deferred();
    const controller = new AbortController();
    let ran = false;

    const holder = limiter.run(() => gate.promise);
    const waiting = limiter.run(async () => {
      ran = true;
    }, controller.signal);

    controller.abort(new Error("circuit open"));
    await expect(waiting).rejects.toThrow("circuit open");
    expect(limiter.pending).toBe(0);

    gate.resolve();
    await holder;
    await flush();

    expect(ran).toBe(false);
    expect(limiter.active).toBe(0);
    expect(limiter.available).toBe(1);
  });

  it("hands a released permit directly to the next waiter", async () => {
    const limiter = new SemaphoreLimiter(1);
    const gate = deferred();
    const second = deferred();

    const first = limiter.run(() => gate.promise);
    const next = limiter.run(() => second.promise);

    gate.resolve();
    await first;
    expect(limiter.active).toBe(1);
    expect(limiter.pending).toBe(0);

    second.resolve();
    await next;
    expect(limiter.active).toBe(0);
  });
});
