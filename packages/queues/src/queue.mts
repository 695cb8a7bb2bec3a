/**
 * The contract shared by every queue variant.
 *
 * All operations are synchronous and infallible. A full queue refuses
 * single enqueues with `false` and exposes an empty writable window; an
 * empty queue dequeues `none()` and exposes an empty readable window.
 *
 * Bulk transfers are split into an expose step (no mutation) and a
 * commit/consume step (no data movement). The caller copies items through
 * the window in between:
 *
 * @example
 * ```typescript
 * const slots = queue.exposeWritable();
 * const written = slots.write(chunk);
 * queue.commitWritten(written);
 *
 * const items = queue.exposeReadable();
 * const read = items.copyTo(out, out.length);
 * queue.consumeRead(read);
 * ```
 *
 * A window only covers the run of slots up to the physical end of the
 * backing store, so moving everything may take two cycles. See
 * {@link enqueueAll} and {@link dequeueAll}.
 */

import type { Option } from "./option.mjs";
import type { ReadableWindow, WritableWindow } from "./window.mjs";

export interface Queue<T> {
  /** Fixed for bounded variants */
  readonly capacity: number;

  /** Number of items currently queued */
  amountQueued(): number;

  /** `capacity - amountQueued()` */
  amountFree(): number;

  /**
   * Append `item` at the tail.
   * @returns false, leaving the queue untouched, when there is no free slot
   */
  enqueue(item: T): boolean;

  /**
   * Remove the head item. `none()` when the queue is empty.
   */
  dequeue(): Option<T>;

  /**
   * Expose the next contiguous run of free slots. Its length never exceeds
   * `amountFree()` and is 0 when the queue is full.
   */
  exposeWritable(): WritableWindow<T>;

  /**
   * Mark the first `count` slots of the most recent writable window as
   * filled. `count` must not exceed that window's length; 0 is a no-op.
   */
  commitWritten(count: number): void;

  /**
   * Expose the next contiguous run of queued items. Its length never
   * exceeds `amountQueued()` and is 0 when the queue is empty.
   */
  exposeReadable(): ReadableWindow<T>;

  /**
   * Drop the first `count` items of the most recent readable window.
   * `count` must not exceed that window's length; 0 is a no-op.
   */
  consumeRead(count: number): void;
}
