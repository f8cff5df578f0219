import { EventBuffer } from "./event-buffer.js";

type TestEvent = { type: "delta"; value: string } | { type: "done" };

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("EventBuffer", () => {
  describe("push", () => {
    it("should add events to buffer", () => {
      const buffer = new EventBuffer<TestEvent>();
      buffer.push({ type: "delta", value: "first" });
      buffer.push({ type: "done" });

      expect(buffer.length).toBe(2);
      expect(buffer.getBuffer()).toEqual([{ type: "delta", value: "first" }, { type: "done" }]);
    });

    it("should notify subscribers", () => {
      const buffer = new EventBuffer<TestEvent>();
      const received: TestEvent[] = [];

      buffer.on((event) => received.push(event));
      buffer.push({ type: "delta", value: "first" });

      expect(received).toEqual([{ type: "delta", value: "first" }]);
    });

    it("should not push after close", () => {
      const buffer = new EventBuffer<TestEvent>();
      buffer.push({ type: "delta", value: "first" });
      buffer.close();
      buffer.push({ type: "delta", value: "second" });

      expect(buffer.length).toBe(1);
    });

    it("should stop notifying after unsubscribe", () => {
      const buffer = new EventBuffer<TestEvent>();
      const received: TestEvent[] = [];

      const unsubscribe = buffer.on((event) => received.push(event));
      buffer.push({ type: "delta", value: "a" });
      unsubscribe();
      buffer.push({ type: "delta", value: "b" });

      expect(received).toEqual([{ type: "delta", value: "a" }]);
      expect(buffer.listenerCount).toBe(0);
    });
  });

  describe("capacity", () => {
    it("should keep only the newest events", () => {
      const buffer = new EventBuffer<number>({ capacity: 2 });
      buffer.push(1);
      buffer.push(2);
      buffer.push(3);

      expect(buffer.getBuffer()).toEqual([2, 3]);
      expect(buffer.dropped).toBe(1);
    });

    it("should retain nothing with capacity 0 but still notify", () => {
      const buffer = new EventBuffer<number>({ capacity: 0 });
      const received: number[] = [];
      buffer.on((event) => received.push(event));
      buffer.push(1);

      expect(buffer.length).toBe(0);
      expect(received).toEqual([1]);
    });
  });

  describe("onReplay", () => {
    it("should deliver history then live events", () => {
      const buffer = new EventBuffer<number>();
      buffer.push(1);
      const received: number[] = [];

      buffer.onReplay((event) => received.push(event));
      buffer.push(2);

      expect(received).toEqual([1, 2]);
    });
  });

  describe("async iteration", () => {
    it("should replay history and follow until close", async () => {
      const buffer = new EventBuffer<number>();
      buffer.push(1);

      const done = collect(buffer);
      buffer.push(2);
      buffer.push(3);
      buffer.close();

      expect(await done).toEqual([1, 2, 3]);
    });

    it("should not miss events pushed between follow() and the first read", async () => {
      const buffer = new EventBuffer<number>({ capacity: 0 });
      const events = buffer.follow();

      buffer.push(1);
      buffer.push(2);
      buffer.close();

      expect(await collect(events)).toEqual([1, 2]);
    });

    it("should throw the buffer error after draining", async () => {
      const buffer = new EventBuffer<number>();
      buffer.push(1);
      buffer.error(new Error("boom"));

      const received: number[] = [];
      await expect(async () => {
        for await (const event of buffer) received.push(event);
      }).rejects.toThrow("boom");
      expect(received).toEqual([1]);
    });

    it("should detach when the reader returns early", async () => {
      const buffer = new EventBuffer<number>();
      buffer.push(1);

      for await (const event of buffer) {
        expect(event).toBe(1);
        break;
      }

      expect(buffer.listenerCount).toBe(0);
    });

    it("should support several independent readers", async () => {
      const buffer = new EventBuffer<number>();
      const first = collect(buffer);
      const second = collect(buffer);

      buffer.push(7);
      buffer.close();

      expect(await first).toEqual([7]);
      expect(await second).toEqual([7]);
    });
  });

  describe("release", () => {
    it("should drop history and listeners and close", async () => {
      const buffer = new EventBuffer<number>();
      buffer.push(1);
      buffer.on(() => undefined);

      buffer.release();

      expect(buffer.length).toBe(0);
      expect(buffer.listenerCount).toBe(0);
      expect(buffer.closed).toBe(true);
      expect(await collect(buffer)).toEqual([]);
    });
  });
});
