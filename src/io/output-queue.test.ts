import { describe, expect, it } from "vitest";
import { OutputQueue } from "./output-queue.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

async function drain<T>(queue: OutputQueue<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of queue) {
    items.push(item);
  }
  return items;
}

describe("OutputQueue", () => {
  it("delivers items in push order", async () => {
    const queue = new OutputQueue<number>(2);
    const consumed = drain(queue);
    for (let i = 1; i <= 5; i++) {
      await queue.push(i);
    }
    queue.close();
    expect(await consumed).toEqual([1, 2, 3, 4, 5]);
  });

  it("blocks the producer while full", async () => {
    const queue = new OutputQueue<string>(1);
    expect(await queue.push("a")).toBe(true);

    let settled = false;
    const second = queue.push("b").then((ok) => {
      settled = true;
      return ok;
    });
    await tick();
    expect(settled).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.next()).toEqual({ done: false, value: "a" });
    expect(await second).toBe(true);
    expect(queue.size).toBe(1);
  });

  it("drains buffered items after close", async () => {
    const queue = new OutputQueue<string>(4);
    await queue.push("x");
    await queue.push("y");
    queue.close();
    expect(await drain(queue)).toEqual(["x", "y"]);
  });

  it("releases a blocked producer on cancel", async () => {
    const queue = new OutputQueue<string>(1);
    await queue.push("a");
    const blocked = queue.push("b");
    await tick();
    queue.cancel();
    expect(await blocked).toBe(false);
    expect(queue.size).toBe(0);
    expect(queue.isCancelled).toBe(true);
    expect(await queue.push("c")).toBe(false);
  });

  it("ends a waiting consumer on cancel", async () => {
    const queue = new OutputQueue<string>(1);
    const pending = queue.next();
    queue.cancel();
    expect(await pending).toEqual({ done: true, value: undefined });
  });

  it("rejects push after close", async () => {
    const queue = new OutputQueue<string>(1);
    queue.close();
    await expect(queue.push("late")).rejects.toThrow("push after close()");
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new OutputQueue(0)).toThrow(RangeError);
  });
});
