/**
 * Windows are borrowed views onto a contiguous run of a queue's backing
 * store. They read and write the store in place, so bulk transfers need no
 * intermediate array.
 *
 * A window is only valid until the next mutating call on the queue that
 * exposed it. Checked queues enforce this through an epoch counter.
 */

import type { ContractViolation } from "./errors.mjs";

/**
 * A run of free slots exposed for direct writing.
 */
export interface WritableWindow<T> {
  readonly length: number;

  /**
   * Store `item` in the slot at `index` (0-based within the window)
   */
  set(index: number, item: T): void;

  /**
   * Copy as many of `items[offset..]` as fit into the window, starting at
   * its first slot.
   * @returns the number of items written
   */
  write(items: ArrayLike<T>, offset?: number): number;
}

/**
 * A run of occupied slots exposed for direct reading, head first.
 */
export interface ReadableWindow<T> extends Iterable<T> {
  readonly length: number;

  get(index: number): T;

  /**
   * Copy up to `count` items into `target` starting at `targetOffset`.
   * @returns the number of items copied
   */
  copyTo(target: T[], targetOffset?: number, count?: number): number;

  toArray(): T[];
}

/**
 * What a window needs from the queue that exposed it
 * @internal
 */
export interface WindowGuard {
  readonly checks: boolean;
  isLive(epoch: number): boolean;
  fail(
    violation: ContractViolation,
    detail: string,
    context?: Record<string, unknown>,
  ): never;
}

abstract class SlotWindow<T> {
  constructor(
    protected readonly slots: T[],
    protected readonly start: number,
    readonly length: number,
    private readonly epoch: number,
    protected readonly guard: WindowGuard,
  ) {}

  protected abstract readonly kind: "writable" | "readable";

  protected assertLive(): void {
    if (this.guard.checks && !this.guard.isLive(this.epoch)) {
      this.guard.fail(
        "stale-window",
        `${this.kind} window used after the queue was mutated`,
        { window: this.kind },
      );
    }
  }

  /**
   * @returns whether `index` lies inside the window; unchecked queues get
   * false instead of a failure
   */
  protected acceptIndex(index: number): boolean {
    this.assertLive();
    if (Number.isInteger(index) && index >= 0 && index < this.length) {
      return true;
    }
    if (this.guard.checks) {
      this.guard.fail(
        "index-out-of-range",
        `index ${String(index)} is outside the ${this.kind} window of length ${this.length}`,
        { window: this.kind, index, length: this.length },
      );
    }
    return false;
  }

  /**
   * Offsets may point one past the end, which makes the copy empty.
   */
  protected assertOffset(offset: number, bound: number): void {
    if (
      this.guard.checks &&
      !(Number.isInteger(offset) && offset >= 0 && offset <= bound)
    ) {
      this.guard.fail(
        "index-out-of-range",
        `offset ${String(offset)} is outside 0..${bound}`,
        { window: this.kind, offset, bound },
      );
    }
  }
}

export class WritableSlots<T>
  extends SlotWindow<T>
  implements WritableWindow<T>
{
  protected readonly kind = "writable";

  set(index: number, item: T): void {
    // out-of-window writes would land on queued items or past capacity
    if (!this.acceptIndex(index)) {
      return;
    }
    this.slots[this.start + index] = item;
  }

  write(items: ArrayLike<T>, offset = 0): number {
    this.assertLive();
    this.assertOffset(offset, items.length);
    const available = items.length - offset;
    const count = available > 0 ? Math.min(this.length, available) : 0;
    for (let i = 0; i < count; i++) {
      this.slots[this.start + i] = items[offset + i];
    }
    return count;
  }
}

export class ReadableSlots<T>
  extends SlotWindow<T>
  implements ReadableWindow<T>
{
  protected readonly kind = "readable";

  get(index: number): T {
    this.acceptIndex(index);
    return this.slots[this.start + index];
  }

  copyTo(target: T[], targetOffset = 0, count = this.length): number {
    this.assertLive();
    this.assertOffset(targetOffset, target.length);
    if (this.guard.checks && (Number.isNaN(count) || count < 0)) {
      this.guard.fail(
        "invalid-count",
        `copy count must be a non-negative number, got ${String(count)}`,
        { window: this.kind, count },
      );
    }
    const amount = count > 0 ? Math.min(this.length, Math.floor(count)) : 0;
    for (let i = 0; i < amount; i++) {
      target[targetOffset + i] = this.slots[this.start + i];
    }
    return amount;
  }

  toArray(): T[] {
    this.assertLive();
    return this.slots.slice(this.start, this.start + this.length);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.get(i);
    }
  }
}
