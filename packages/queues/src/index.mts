/**
 * Non-blocking, infallible bounded queues with bulk enqueue and dequeue
 *
 * @packageDocumentation
 */

export type { Queue } from "./queue.mjs";
export { FixedQueue, createFixedQueue } from "./fixed-queue.mjs";
export type { ReadableWindow, WritableWindow } from "./window.mjs";
export {
  bulkDequeue,
  bulkEnqueue,
  dequeueAll,
  enqueueAll,
  transfer,
} from "./bulk.mjs";
export {
  getOrElse,
  isNone,
  isSome,
  none,
  some,
  toUndefined,
} from "./option.mjs";
export type { None, Option, Some } from "./option.mjs";
export {
  ContractViolationError,
  InvalidCapacityError,
  QueueError,
} from "./errors.mjs";
export type { ContractViolation, QueueErrorCode } from "./errors.mjs";
export {
  DEFAULT_QUEUE_NAME,
  QUEUE_ENV,
  parseBooleanFlag,
  resolveQueueConfig,
} from "./config.mjs";
export type {
  FixedQueueOptions,
  QueueEnvironment,
  QueueLogLevel,
  ResolvedQueueConfig,
} from "./config.mjs";
