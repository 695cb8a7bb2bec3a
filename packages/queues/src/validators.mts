/**
 * Option validation for queue constructors
 */

import { isBaseLogger } from "@bulk-queues/logger";

import type { BaseLogger } from "@bulk-queues/logger";

/**
 * Validates constructor options with consistent error messages
 * and assertion signatures for type narrowing
 */
export class OptionsValidator {
  constructor(private readonly componentName: string) {}

  /**
   * Validates that a string is non-empty
   * Throws TypeError if empty or not a string
   */
  requireNonEmptyString(
    field: string,
    value: unknown,
  ): asserts value is string {
    if (typeof value !== "string" || value.trim() === "") {
      throw new TypeError(
        `[${this.componentName}] ${field} must be a non-empty string, got ${typeof value}`,
      );
    }
  }

  requireBoolean(field: string, value: unknown): asserts value is boolean {
    if (typeof value !== "boolean") {
      throw new TypeError(
        `[${this.componentName}] ${field} must be a boolean, got ${typeof value}`,
      );
    }
  }

  /**
   * Validates that a value implements every logger level
   */
  requireLogger(field: string, value: unknown): asserts value is BaseLogger {
    if (!isBaseLogger(value)) {
      throw new TypeError(
        `[${this.componentName}] ${field} must implement trace, debug, info, warn, error and fatal`,
      );
    }
  }

  /**
   * Validates that a value is one of the allowed strings
   */
  requireOneOf<TAllowed extends string>(
    field: string,
    value: unknown,
    allowed: readonly TAllowed[],
  ): asserts value is TAllowed {
    if (!allowed.some((candidate) => candidate === value)) {
      throw new TypeError(
        `[${this.componentName}] ${field} must be one of ${allowed.join(", ")}, got ${String(value)}`,
      );
    }
  }
}
