/**
 * Randomized operation sequences checked against a plain array model.
 * Seeds are fixed so every run replays the same sequences.
 */

import { describe, expect, it } from "vitest";

import { bulkDequeue, bulkEnqueue } from "./bulk.mjs";
import { isSome } from "./option.mjs";
import { createRandom, createTestQueue } from "./test-utils.mjs";

type Operation =
  | { kind: "enqueue"; item: number }
  | { kind: "dequeue" }
  | { kind: "bulkEnqueue"; items: number[] }
  | { kind: "bulkDequeue"; room: number };

const randomOperation = (
  random: ReturnType<typeof createRandom>,
): Operation => {
  switch (random.int(4)) {
    case 0:
      return { kind: "enqueue", item: random.int(256) };
    case 1:
      return { kind: "dequeue" };
    case 2:
      return {
        kind: "bulkEnqueue",
        items: Array.from({ length: random.int(12) }, () => random.int(256)),
      };
    default:
      return { kind: "bulkDequeue", room: random.int(12) };
  }
};

describe("FixedQueue against an array model", () => {
  it.each([
    { seed: 1, capacity: 1 },
    { seed: 7, capacity: 3 },
    { seed: 42, capacity: 8 },
    { seed: 1337, capacity: 17 },
    { seed: 2024, capacity: 64 },
  ])(
    "should match the model for seed $seed and capacity $capacity",
    ({ seed, capacity }) => {
      const random = createRandom(seed);
      const { queue } = createTestQueue<number>(capacity);
      const model: number[] = [];

      for (let step = 0; step < 2000; step++) {
        const operation = randomOperation(random);

        switch (operation.kind) {
          case "enqueue": {
            const wasFull = model.length === capacity;
            const accepted = queue.enqueue(operation.item);
            expect(accepted).toBe(!wasFull);
            if (accepted) {
              model.push(operation.item);
            }
            break;
          }
          case "dequeue": {
            const result = queue.dequeue();
            const expected = model.shift();
            expect(isSome(result)).toBe(expected !== undefined);
            if (isSome(result)) {
              expect(result.value).toBe(expected);
            }
            break;
          }
          case "bulkEnqueue": {
            const written = bulkEnqueue(queue, operation.items);
            expect(written).toBeLessThanOrEqual(capacity - model.length);
            model.push(...operation.items.slice(0, written));
            break;
          }
          case "bulkDequeue": {
            const target = new Array<number>(operation.room).fill(-1);
            const read = bulkDequeue(queue, target);
            expect(read).toBeLessThanOrEqual(operation.room);
            expect(target.slice(0, read)).toEqual(model.splice(0, read));
            break;
          }
        }

        expect(queue.amountQueued()).toBe(model.length);
        expect(queue.amountQueued() + queue.amountFree()).toBe(capacity);
        expect(queue.amountQueued()).toBeGreaterThanOrEqual(0);
        expect(queue.amountQueued()).toBeLessThanOrEqual(capacity);
      }

      expect(queue.toArray()).toEqual(model);
    },
  );

  it("should dequeue exactly what was enqueued, in order", () => {
    const random = createRandom(99);
    const { queue } = createTestQueue<number>(32);
    const items = Array.from({ length: 32 }, () => random.int(1000));

    for (const item of items) {
      expect(queue.enqueue(item)).toBe(true);
    }
    const dequeued: number[] = [];
    for (let i = 0; i < items.length; i++) {
      const result = queue.dequeue();
      if (isSome(result)) {
        dequeued.push(result.value);
      }
    }

    expect(dequeued).toEqual(items);
    expect(queue.isEmpty()).toBe(true);
  });
});
