/**
 * Fixed-capacity ring buffer implementing the {@link Queue} contract.
 *
 * The backing store is allocated once, at construction, and never grows.
 * Occupied slots form one logical run starting at the read cursor that may
 * wrap past the physical end of the store once.
 *
 * Cursor and amount bookkeeping is O(1) for every operation. Dequeued and
 * consumed slots are also released so the store holds no references to
 * items that left the queue, which makes `consumeRead(count)` O(count).
 */

import { inspect } from "node:util";

import type { InspectOptions } from "node:util";

import { bulkDequeue, bulkEnqueue } from "./bulk.mjs";
import { resolveQueueConfig } from "./config.mjs";
import { ContractViolationError, InvalidCapacityError } from "./errors.mjs";
import { none, some } from "./option.mjs";
import { ReadableSlots, WritableSlots } from "./window.mjs";

import type { FixedQueueOptions, ResolvedQueueConfig } from "./config.mjs";
import type { ContractViolation } from "./errors.mjs";
import type { Option } from "./option.mjs";
import type { Queue } from "./queue.mjs";
import type {
  ReadableWindow,
  WindowGuard,
  WritableWindow,
} from "./window.mjs";

export class FixedQueue<T> implements Queue<T> {
  readonly capacity: number;
  private readonly slots: T[];
  private readonly config: ResolvedQueueConfig;
  private readonly guard: WindowGuard;
  /** index of the head item */
  private read = 0;
  /** number of occupied slots */
  private amount = 0;
  /** bumped on every mutation; windows from older epochs are stale */
  private epoch = 0;
  private exposedWritable = 0;
  private exposedReadable = 0;

  constructor(capacity: number, options: FixedQueueOptions = {}) {
    this.config = resolveQueueConfig(options);
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      const error = new InvalidCapacityError(this.config.name, capacity);
      this.config.logger.error(error, { queue: this.config.name });
      throw error;
    }

    this.capacity = capacity;
    this.slots = new Array<T>(capacity);
    this.guard = {
      checks: this.config.checks,
      isLive: (epoch) => epoch === this.epoch,
      fail: (violation, detail, context) =>
        this.violate(violation, detail, context),
    };

    this.config.logger.debug("queue created", {
      queue: this.config.name,
      capacity,
      checks: this.config.checks,
    });
  }

  get name(): string {
    return this.config.name;
  }

  amountQueued(): number {
    return this.amount;
  }

  amountFree(): number {
    return this.capacity - this.amount;
  }

  isEmpty(): boolean {
    return this.amount === 0;
  }

  isFull(): boolean {
    return this.amount === this.capacity;
  }

  enqueue(item: T): boolean {
    if (this.amount === this.capacity) {
      return false;
    }
    this.slots[this.writeIndex()] = item;
    this.amount++;
    this.touch();
    return true;
  }

  dequeue(): Option<T> {
    if (this.amount === 0) {
      return none();
    }
    const item = this.slots[this.read];
    this.vacate(this.read, 1);
    this.read = (this.read + 1) % this.capacity;
    this.amount--;
    this.touch();
    return some(item);
  }

  exposeWritable(): WritableWindow<T> {
    const length = this.writableRun();
    this.exposedWritable = length;
    return new WritableSlots(
      this.slots,
      this.writeIndex(),
      length,
      this.epoch,
      this.guard,
    );
  }

  commitWritten(count: number): void {
    const accepted = this.acceptCount(
      count,
      this.exposedWritable,
      "commit-exceeds-window",
      "writable",
    );
    if (accepted === 0) {
      return;
    }
    this.amount += accepted;
    this.touch();
  }

  exposeReadable(): ReadableWindow<T> {
    const length = this.readableRun();
    this.exposedReadable = length;
    return new ReadableSlots(
      this.slots,
      this.read,
      length,
      this.epoch,
      this.guard,
    );
  }

  consumeRead(count: number): void {
    const accepted = this.acceptCount(
      count,
      this.exposedReadable,
      "consume-exceeds-window",
      "readable",
    );
    if (accepted === 0) {
      return;
    }
    this.vacate(this.read, accepted);
    this.read = (this.read + accepted) % this.capacity;
    this.amount -= accepted;
    this.touch();
  }

  /**
   * Single expose/write/commit cycle. See {@link bulkEnqueue}.
   */
  bulkEnqueue(items: ArrayLike<T>, offset = 0): number {
    return bulkEnqueue(this, items, offset);
  }

  /**
   * Single expose/copy/consume cycle. See {@link bulkDequeue}.
   */
  bulkDequeue(target: T[], targetOffset = 0, limit?: number): number {
    return bulkDequeue(this, target, targetOffset, limit);
  }

  /**
   * Queued items, head first. Does not mutate the queue.
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.amount; i++) {
      items.push(this.slots[(this.read + i) % this.capacity]);
    }
    return items;
  }

  toString(): string {
    const data = this.toArray().map((item) => String(item)).join(", ");
    return `${this.config.name} { capacity: ${this.capacity}, len: ${this.amount}, data: [${data}] }`;
  }

  [inspect.custom](_depth: number, options: InspectOptions): string {
    return `${this.config.name} { capacity: ${this.capacity}, len: ${this.amount}, data: ${inspect(this.toArray(), options)} }`;
  }

  private writeIndex(): number {
    return (this.read + this.amount) % this.capacity;
  }

  /**
   * Whether the occupied run ends before the physical end of the store,
   * i.e. the free run that follows it wraps instead.
   */
  private isDataContiguous(): boolean {
    return this.read + this.amount < this.capacity;
  }

  private readableRun(): number {
    return this.isDataContiguous() ? this.amount : this.capacity - this.read;
  }

  private writableRun(): number {
    return this.isDataContiguous()
      ? this.capacity - this.writeIndex()
      : this.read - this.writeIndex();
  }

  // release references so dequeued items can be collected
  private vacate(start: number, count: number): void {
    for (let i = start; i < start + count; i++) {
      delete this.slots[i];
    }
  }

  private touch(): void {
    this.epoch++;
    this.exposedWritable = 0;
    this.exposedReadable = 0;
  }

  /**
   * Validate a commit/consume count against the window it refers to.
   * Unchecked queues clamp instead of failing.
   */
  private acceptCount(
    count: number,
    exposed: number,
    exceeded: ContractViolation,
    kind: "writable" | "readable",
  ): number {
    if (this.config.checks) {
      if (!Number.isSafeInteger(count) || count < 0) {
        this.violate(
          "invalid-count",
          `count must be a non-negative integer, got ${String(count)}`,
          { window: kind, count },
        );
      }
      if (count > exposed) {
        this.violate(
          exceeded,
          `${String(count)} exceeds the exposed ${kind} window of ${exposed}`,
          { window: kind, count, exposed },
        );
      }
      return count;
    }
    return count > 0 ? Math.min(Math.floor(count), exposed) : 0;
  }

  private violate(
    violation: ContractViolation,
    detail: string,
    context?: Record<string, unknown>,
  ): never {
    const error = new ContractViolationError(
      this.config.name,
      violation,
      detail,
      context,
    );
    this.config.logger.fatal(error, { queue: this.config.name, violation });
    throw error;
  }
}

/**
 * Create a {@link FixedQueue}. Throws {@link InvalidCapacityError} unless
 * `capacity` is a positive safe integer.
 */
export function createFixedQueue<T>(
  capacity: number,
  options?: FixedQueueOptions,
): FixedQueue<T> {
  return new FixedQueue<T>(capacity, options);
}
