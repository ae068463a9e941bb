import { describe, it, expect } from "vitest";

import { SerialQueue } from "../../src/core/serial-queue.js";

describe("SerialQueue", () => {
  it("runs a task immediately when idle", () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    queue.run(() => order.push("a"));
    expect(order).toEqual(["a"]);
    expect(queue.busy).toBe(false);
  });

  it("defers tasks submitted from inside a running task", () => {
    const queue = new SerialQueue();
    const order: string[] = [];
    queue.run(() => {
      order.push("outer start");
      queue.run(() => order.push("inner"));
      order.push("outer end");
    });
    expect(order).toEqual(["outer start", "outer end", "inner"]);
  });

  it("keeps submission order for nested submissions", () => {
    const queue = new SerialQueue();
    const order: number[] = [];
    queue.run(() => {
      queue.run(() => {
        order.push(2);
        queue.run(() => order.push(4));
      });
      queue.run(() => order.push(3));
      order.push(1);
    });
    expect(order).toEqual([1, 2, 3, 4]);
  });

  it("logs a failing task and keeps going", () => {
    const logs: string[] = [];
    const queue = new SerialQueue((m) => logs.push(m));
    const order: string[] = [];
    queue.run(() => {
      queue.run(() => {
        throw new Error("boom");
      });
      queue.run(() => order.push("after"));
    });
    expect(logs).toEqual(["[queue] task failed: boom"]);
    expect(order).toEqual(["after"]);
    expect(queue.busy).toBe(false);
  });
});
