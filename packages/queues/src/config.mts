/**
 * Configuration for queue instances
 *
 * Explicit options win over environment variables, which win over the
 * defaults derived from `NODE_ENV`.
 */

import { loggerFactory } from "@bulk-queues/logger";

import type { BaseLogger } from "@bulk-queues/logger";

import { OptionsValidator } from "./validators.mjs";

export const QUEUE_ENV = {
  /** "true" / "1" enables contract checks, "false" / "0" disables them */
  checks: "BULK_QUEUES_CHECKS",
  /** pino level for the shared default logger */
  logLevel: "BULK_QUEUES_LOG_LEVEL",
} as const;

export const DEFAULT_QUEUE_NAME = "FixedQueue";

const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type QueueLogLevel = (typeof LOG_LEVELS)[number];

export interface FixedQueueOptions {
  /** Label used in log lines and error messages (default: "FixedQueue") */
  name?: string;

  /**
   * Detect expose/commit protocol violations and stale windows, throwing
   * {@link ContractViolationError}. Defaults to on outside production.
   */
  checks?: boolean;

  /** Logger for construction and violation events */
  logger?: BaseLogger;
}

export interface ResolvedQueueConfig {
  name: string;
  checks: boolean;
  logger: BaseLogger;
}

export type QueueEnvironment = Readonly<Record<string, string | undefined>>;

const sharedLoggers = new Map<QueueLogLevel, BaseLogger>();

/**
 * Logger used by queues that were not handed one, shared per level.
 * Silent unless `BULK_QUEUES_LOG_LEVEL` says otherwise.
 */
export function getDefaultLogger(
  env: QueueEnvironment = process.env,
): BaseLogger {
  const validator: OptionsValidator = new OptionsValidator("bulk-queues");
  const level = env[QUEUE_ENV.logLevel] ?? "silent";
  validator.requireOneOf(QUEUE_ENV.logLevel, level, LOG_LEVELS);

  let logger = sharedLoggers.get(level);
  if (logger === undefined) {
    logger = loggerFactory({ name: "bulk-queues", level }).logger;
    sharedLoggers.set(level, logger);
  }
  return logger;
}

/**
 * @internal test hook
 */
export function resetDefaultLogger(): void {
  sharedLoggers.clear();
}

/**
 * Parses "true"/"1"/"false"/"0" (case-insensitive). Anything else, including
 * an unset variable, yields undefined.
 */
export function parseBooleanFlag(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      return undefined;
  }
}

export function resolveQueueConfig(
  options: FixedQueueOptions = {},
  env: QueueEnvironment = process.env,
): ResolvedQueueConfig {
  const name = options.name ?? DEFAULT_QUEUE_NAME;
  const validator: OptionsValidator = new OptionsValidator(
    typeof name === "string" && name.trim() !== "" ? name : DEFAULT_QUEUE_NAME,
  );
  validator.requireNonEmptyString("name", name);

  let checks = options.checks;
  if (checks === undefined) {
    checks =
      parseBooleanFlag(env[QUEUE_ENV.checks]) ??
      env.NODE_ENV !== "production";
  }
  validator.requireBoolean("checks", checks);

  const logger = options.logger ?? getDefaultLogger(env);
  validator.requireLogger("logger", logger);

  return { name, checks, logger };
}
