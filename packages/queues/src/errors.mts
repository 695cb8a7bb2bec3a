/**
 * Error classes for queue misuse.
 *
 * None of these describe an operating condition: a full or empty queue is
 * reported through `false`, `none()` and zero-length windows. What lands
 * here is a programming defect in the caller.
 */

export type QueueErrorCode = "INVALID_CAPACITY" | "CONTRACT_VIOLATION";

/**
 * Base error class for all queue errors
 */
export class QueueError extends Error {
  constructor(
    message: string,
    public readonly code: QueueErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "QueueError";

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown at construction when the capacity is not a positive safe integer
 */
export class InvalidCapacityError extends QueueError {
  constructor(
    public readonly queueName: string,
    public readonly capacity: unknown,
  ) {
    super(
      `[${queueName}] capacity must be a positive safe integer, got ${String(capacity)}`,
      "INVALID_CAPACITY",
      { queueName, capacity },
    );
    this.name = "InvalidCapacityError";
  }
}

export type ContractViolation =
  | "commit-exceeds-window"
  | "consume-exceeds-window"
  | "invalid-count"
  | "stale-window"
  | "index-out-of-range";

/**
 * Thrown by checked queues when a caller breaks the expose/commit protocol
 */
export class ContractViolationError extends QueueError {
  constructor(
    public readonly queueName: string,
    public readonly violation: ContractViolation,
    detail: string,
    context: Record<string, unknown> = {},
  ) {
    super(`[${queueName}] ${detail}`, "CONTRACT_VIOLATION", {
      queueName,
      violation,
      ...context,
    });
    this.name = "ContractViolationError";
  }
}
