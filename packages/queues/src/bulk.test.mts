import { describe, expect, it } from "vitest";

import {
  bulkDequeue,
  bulkEnqueue,
  dequeueAll,
  enqueueAll,
  transfer,
} from "./bulk.mjs";
import { some } from "./option.mjs";
import { createTestQueue } from "./test-utils.mjs";

describe("bulk helpers", () => {
  describe("bulkEnqueue", () => {
    it("should return 0 when the queue is full", () => {
      const { queue } = createTestQueue<number>(2);
      queue.enqueue(1);
      queue.enqueue(2);

      expect(bulkEnqueue(queue, [3, 4])).toBe(0);
      expect(queue.toArray()).toEqual([1, 2]);
    });

    it("should return 0 for an empty source", () => {
      const { queue } = createTestQueue<number>(2);
      expect(bulkEnqueue(queue, [])).toBe(0);
      expect(queue.isEmpty()).toBe(true);
    });

    it("should stop at the physical end of the store", () => {
      const { queue } = createTestQueue<number>(4);
      queue.bulkEnqueue([0, 0, 0]);
      queue.bulkDequeue([0, 0, 0]);

      // cursor at index 3: one contiguous slot before wrapping
      expect(bulkEnqueue(queue, [1, 2, 3])).toBe(1);
      expect(bulkEnqueue(queue, [1, 2, 3], 1)).toBe(2);
      expect(queue.toArray()).toEqual([1, 2, 3]);
    });

    it("should read from array-like sources", () => {
      const { queue } = createTestQueue<number>(4);
      const bytes = Uint8Array.from([9, 8, 7]);

      expect(bulkEnqueue(queue, bytes)).toBe(3);
      expect(queue.toArray()).toEqual([9, 8, 7]);
    });
  });

  describe("bulkDequeue", () => {
    it("should return 0 when the queue is empty", () => {
      const { queue } = createTestQueue<number>(2);
      const target = [0, 0];

      expect(bulkDequeue(queue, target)).toBe(0);
      expect(target).toEqual([0, 0]);
    });

    it("should fill at most the room left in the target", () => {
      const { queue } = createTestQueue<number>(4);
      queue.bulkEnqueue([1, 2, 3, 4]);
      const target = [0, 0, 0];

      expect(bulkDequeue(queue, target, 1)).toBe(2);
      expect(target).toEqual([0, 1, 2]);
      expect(queue.toArray()).toEqual([3, 4]);
    });
  });

  describe("enqueueAll / dequeueAll", () => {
    it("should cross the wrap boundary in both directions", () => {
      const { queue } = createTestQueue<string>(4);
      queue.bulkEnqueue(["x", "y", "z"]);
      queue.bulkDequeue(["", "", ""]);

      expect(enqueueAll(queue, ["a", "b", "c", "d"])).toBe(4);
      expect(queue.isFull()).toBe(true);
      expect(dequeueAll(queue)).toEqual(["a", "b", "c", "d"]);
      expect(queue.isEmpty()).toBe(true);
    });

    it("should report how many items fit", () => {
      const { queue } = createTestQueue<number>(3);

      expect(enqueueAll(queue, [1, 2, 3, 4, 5])).toBe(3);
      expect(queue.toArray()).toEqual([1, 2, 3]);
    });

    it("should append to an existing target", () => {
      const { queue } = createTestQueue<number>(3);
      queue.bulkEnqueue([2, 3]);
      const target = [1];

      expect(dequeueAll(queue, target)).toBe(target);
      expect(target).toEqual([1, 2, 3]);
    });

    it("should behave like the same single-item enqueues", () => {
      const items = [5, 6, 7, 8, 9];
      const { queue: single } = createTestQueue<number>(4);
      const { queue: bulk } = createTestQueue<number>(4);
      for (const q of [single, bulk]) {
        q.enqueue(0);
        q.enqueue(0);
        q.dequeue();
        q.dequeue();
      }

      const accepted = items.filter((item) => single.enqueue(item)).length;
      const written = enqueueAll(bulk, items);

      expect(written).toBe(accepted);
      expect(bulk.amountQueued()).toBe(single.amountQueued());
      expect(dequeueAll(bulk)).toEqual(dequeueAll(single));
    });
  });

  describe("transfer", () => {
    it("should move every item when the sink has room", () => {
      const { queue: source } = createTestQueue<number>(4);
      const { queue: sink } = createTestQueue<number>(8);
      source.bulkEnqueue([1, 2]);
      source.dequeue();
      enqueueAll(source, [3, 4, 5]);

      expect(transfer(source, sink)).toBe(4);
      expect(source.isEmpty()).toBe(true);
      expect(sink.toArray()).toEqual([2, 3, 4, 5]);
    });

    it("should stop when the sink is full", () => {
      const { queue: source } = createTestQueue<number>(4);
      const { queue: sink } = createTestQueue<number>(2);
      source.bulkEnqueue([1, 2, 3]);

      expect(transfer(source, sink)).toBe(2);
      expect(sink.toArray()).toEqual([1, 2]);
      expect(source.dequeue()).toEqual(some(3));
    });

    it("should honour a limit", () => {
      const { queue: source } = createTestQueue<number>(4);
      const { queue: sink } = createTestQueue<number>(4);
      source.bulkEnqueue([1, 2, 3]);

      expect(transfer(source, sink, 2)).toBe(2);
      expect(source.toArray()).toEqual([3]);
      expect(sink.toArray()).toEqual([1, 2]);
    });

    it("should move nothing within one queue", () => {
      const { queue } = createTestQueue<number>(4);
      queue.bulkEnqueue([1, 2]);

      expect(transfer(queue, queue)).toBe(0);
      expect(queue.toArray()).toEqual([1, 2]);
    });
  });
});
