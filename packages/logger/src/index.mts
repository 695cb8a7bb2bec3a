import { isMainThread, parentPort } from "node:worker_threads";
import { pino } from "pino";

import type { DestinationStream, Logger, LoggerOptions } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export const LOGGER_LEVELS: readonly LoggerLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export interface LoggerFactoryOptions extends LoggerOptions {
  /**
   * Where pino writes its lines. Defaults to stdout.
   */
  destination?: DestinationStream;
}

/**
 * This logger can be used
 * in both the main thread and worker threads.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const { destination, ...pinoOptions } = options;
  const pinoLogger: Logger =
    destination === undefined
      ? pino(pinoOptions)
      : pino(pinoOptions, destination);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      if (!pinoLogger.isLevelEnabled(level)) {
        return;
      }
      //If inside a worker thread
      if (!isMainThread) {
        const postMessage: WorkerLoggerPostMessageType = {
          type: "message",
          level,
          message,
          meta,
        };
        //NOTE: only structured-cloneable meta survives the hop to the parent
        parentPort?.postMessage(postMessage);

        return;
      }
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

/**
 * Narrow an arbitrary value to a {@link BaseLogger}.
 */
export const isBaseLogger = (value: unknown): value is BaseLogger => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return LOGGER_LEVELS.every(
    (level) => typeof Reflect.get(value, level) === "function",
  );
};

export default loggerFactory;
