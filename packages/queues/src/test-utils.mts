/**
 * Test utilities for @bulk-queues/queues
 *
 * Shared helpers for building queues with observable loggers and for
 * driving seeded randomized operation sequences.
 */

import { vi } from "vitest";

import type { BaseLogger } from "@bulk-queues/logger";
import type { Mock } from "vitest";

import { FixedQueue } from "./fixed-queue.mjs";

import type { FixedQueueOptions } from "./config.mjs";

export type MockLogger = {
  [K in keyof BaseLogger]: Mock<BaseLogger[K]>;
};

/**
 * Create a logger whose every level is a vi.fn()
 */
export function createMockLogger(): MockLogger {
  return {
    trace: vi.fn<BaseLogger["trace"]>(),
    debug: vi.fn<BaseLogger["debug"]>(),
    info: vi.fn<BaseLogger["info"]>(),
    warn: vi.fn<BaseLogger["warn"]>(),
    error: vi.fn<BaseLogger["error"]>(),
    fatal: vi.fn<BaseLogger["fatal"]>(),
  };
}

/**
 * Create a checked queue with a mock logger unless overridden
 *
 * @example
 * ```typescript
 * const { queue, logger } = createTestQueue<number>(4);
 * ```
 */
export function createTestQueue<T>(
  capacity: number,
  overrides: FixedQueueOptions = {},
): { queue: FixedQueue<T>; logger: MockLogger } {
  const logger = createMockLogger();
  const queue = new FixedQueue<T>(capacity, {
    checks: true,
    logger,
    ...overrides,
  });
  return { queue, logger };
}

/**
 * Deterministic PRNG (mulberry32) so randomized tests replay exactly
 */
export function createRandom(seed: number): {
  next: () => number;
  int: (maxExclusive: number) => number;
} {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    next,
    int: (maxExclusive) => Math.floor(next() * maxExclusive),
  };
}
