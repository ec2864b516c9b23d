import { QueueFullError } from "agentry-shared";
import { ExecutionQueue } from "./queue";

describe("ExecutionQueue", () => {
  it("hands out run ids in FIFO order", async () => {
    const queue = new ExecutionQueue(3);
    queue.offer("a");
    queue.offer("b");

    expect(await queue.take()).toBe("a");
    expect(await queue.take()).toBe("b");
  });

  it("fails fast when full", () => {
    const queue = new ExecutionQueue(1);
    queue.offer("a");

    expect(() => queue.offer("b")).toThrow(QueueFullError);
    expect(() => queue.offer("b")).toThrow("Execution queue is full (capacity 1)");
  });

  it("counts reservations against the capacity", () => {
    const queue = new ExecutionQueue(1);
    const reservation = queue.reserve();

    expect(() => queue.reserve()).toThrow(QueueFullError);

    reservation.release();
    expect(() => queue.reserve()).not.toThrow();
  });

  it("commits a reservation once", async () => {
    const queue = new ExecutionQueue(2);
    const reservation = queue.reserve();
    reservation.commit("a");
    reservation.commit("b");
    reservation.release();

    expect(queue.size).toBe(1);
    expect(await queue.take()).toBe("a");
  });

  it("wakes a waiting taker", async () => {
    const queue = new ExecutionQueue(1);
    const taken = queue.take();

    queue.offer("a");

    await expect(taken).resolves.toBe("a");
    expect(queue.size).toBe(0);
  });

  it("removes a queued id", () => {
    const queue = new ExecutionQueue(3);
    queue.offer("a");
    queue.offer("b");

    expect(queue.remove("a")).toBe(true);
    expect(queue.remove("a")).toBe(false);
    expect(queue.has("b")).toBe(true);
    expect(queue.size).toBe(1);
  });

  it("releases waiters on close and stops handing out work", async () => {
    const queue = new ExecutionQueue(2);
    const waiting = queue.take();

    queue.close();

    await expect(waiting).resolves.toBeNull();
    expect(() => queue.offer("a")).toThrow(QueueFullError);
    await expect(queue.take()).resolves.toBeNull();
  });

  it("reports the ids left queued on close", () => {
    const queue = new ExecutionQueue(3);
    queue.offer("a");
    queue.offer("b");

    expect(queue.close()).toEqual(["a", "b"]);
    expect(queue.size).toBe(2);
  });
});
