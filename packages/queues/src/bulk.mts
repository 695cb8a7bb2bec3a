/**
 * Bulk helpers built purely on the {@link Queue} contract, so they work for
 * any queue variant.
 */

import type { Queue } from "./queue.mjs";

/**
 * Enqueue items from `items[offset..]` in a single expose/write/commit cycle.
 *
 * Stops at the physical end of the backing store, so the result may be
 * less than both the free space and the items offered.
 *
 * @returns how many items were enqueued, 0 when the queue is full
 */
export function bulkEnqueue<T>(
  queue: Queue<T>,
  items: ArrayLike<T>,
  offset = 0,
): number {
  const slots = queue.exposeWritable();
  if (slots.length === 0) {
    return 0;
  }
  const written = slots.write(items, offset);
  queue.commitWritten(written);
  return written;
}

/**
 * Dequeue into `target` starting at `targetOffset` in a single
 * expose/copy/consume cycle.
 *
 * `limit` defaults to the room left in `target`, so an empty array receives
 * nothing unless a limit is passed.
 *
 * @returns how many items were dequeued, 0 when the queue is empty
 */
export function bulkDequeue<T>(
  queue: Queue<T>,
  target: T[],
  targetOffset = 0,
  limit: number = target.length - targetOffset,
): number {
  const items = queue.exposeReadable();
  if (items.length === 0) {
    return 0;
  }
  const read = items.copyTo(target, targetOffset, limit);
  queue.consumeRead(read);
  return read;
}

/**
 * Enqueue as many of `items` as fit, crossing the wrap boundary if needed.
 *
 * @returns how many items were enqueued; the rest did not fit
 */
export function enqueueAll<T>(queue: Queue<T>, items: ArrayLike<T>): number {
  let offset = 0;
  while (offset < items.length) {
    const written = bulkEnqueue(queue, items, offset);
    if (written === 0) {
      break;
    }
    offset += written;
  }
  return offset;
}

/**
 * Drain the queue, appending every item to `target` head first.
 */
export function dequeueAll<T>(queue: Queue<T>, target: T[] = []): T[] {
  while (bulkDequeue(queue, target, target.length, Infinity) > 0) {
    // each pass moves one contiguous run
  }
  return target;
}

/**
 * Move items from `source` to `sink` window to window, without an
 * intermediate array, until the source is empty, the sink is full or
 * `limit` items have moved.
 *
 * Moving within a single queue is meaningless and moves nothing.
 *
 * @returns how many items moved
 */
export function transfer<T>(
  source: Queue<T>,
  sink: Queue<T>,
  limit = Infinity,
): number {
  if (source === sink) {
    return 0;
  }

  let moved = 0;
  while (moved < limit) {
    const items = source.exposeReadable();
    const slots = sink.exposeWritable();
    const count = Math.min(
      items.length,
      slots.length,
      Math.floor(limit - moved),
    );
    if (count <= 0) {
      break;
    }

    for (let i = 0; i < count; i++) {
      slots.set(i, items.get(i));
    }
    sink.commitWritten(count);
    source.consumeRead(count);
    moved += count;
  }
  return moved;
}
