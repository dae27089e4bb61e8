// Structured logging with pino
// Supports: child loggers, log levels, pretty printing, file output

import pino, { type Logger as PinoLogger } from "pino";
import type { LoggingConfig } from "./config.js";

/** Log context data */
export interface LogContext {
  [key: string]: unknown;
}

/** Logger interface that our code uses */
export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
  level: string;
}

/** Log levels in order of verbosity */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Wrap pino logger to match our interface */
function wrapPinoLogger(pinoLogger: PinoLogger): Logger {
  return {
    trace: (msg, ctx) => (ctx ? pinoLogger.trace(ctx, msg) : pinoLogger.trace(msg)),
    debug: (msg, ctx) => (ctx ? pinoLogger.debug(ctx, msg) : pinoLogger.debug(msg)),
    info: (msg, ctx) => (ctx ? pinoLogger.info(ctx, msg) : pinoLogger.info(msg)),
    warn: (msg, ctx) => (ctx ? pinoLogger.warn(ctx, msg) : pinoLogger.warn(msg)),
    error: (msg, ctx) => (ctx ? pinoLogger.error(ctx, msg) : pinoLogger.error(msg)),
    fatal: (msg, ctx) => (ctx ? pinoLogger.fatal(ctx, msg) : pinoLogger.fatal(msg)),
    child: (bindings) => wrapPinoLogger(pinoLogger.child(bindings)),
    get level() {
      return pinoLogger.level;
    },
    set level(value: string) {
      pinoLogger.level = value;
    },
  };
}

/** Logger options for creating new loggers */
export interface CreateLoggerOptions {
  /** Logger name (appears in logs as `component`) */
  name: string;
  /** Log level */
  level?: LoggingConfig["level"];
  /** Additional bindings for all log entries */
  bindings?: LogContext;
}

/** Global root logger instance */
let rootLogger: PinoLogger | null = null;

function createDefaultRoot(): PinoLogger {
  return pino({
    name: "taskguard",
    level: process.env.LOG_LEVEL ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Initialize the root logger with configuration. Plain JSON on stdout is
 * written in-thread; pretty printing and file output go through transports.
 */
export function initLogger(config: LoggingConfig): Logger {
  const options: pino.LoggerOptions = {
    name: "taskguard",
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      env: process.env.NODE_ENV ?? "development",
    },
  };

  if (!config.pretty && !config.file) {
    rootLogger = pino(options);
    return wrapPinoLogger(rootLogger);
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (config.pretty) {
    targets.push({
      target: "pino-pretty",
      level: config.level === "silent" ? "fatal" : config.level,
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss.l",
        ignore: "pid,hostname",
        messageFormat: "{component} | {msg}",
      },
    });
  } else {
    targets.push({
      target: "pino/file",
      level: config.level === "silent" ? "fatal" : config.level,
      options: { destination: 1 }, // stdout
    });
  }

  if (config.file) {
    targets.push({
      target: "pino/file",
      level: config.level === "silent" ? "fatal" : config.level,
      options: { destination: config.file, mkdir: true },
    });
  }

  rootLogger = pino({ ...options, transport: { targets } });

  return wrapPinoLogger(rootLogger);
}

/** Create a child logger from the root logger */
export function createLogger(options: CreateLoggerOptions): Logger {
  if (!rootLogger) {
    rootLogger = createDefaultRoot();
  }

  const childLogger = rootLogger.child({
    component: options.name,
    ...options.bindings,
  });

  if (options.level) {
    childLogger.level = options.level;
  }

  return wrapPinoLogger(childLogger);
}

/** Get the root logger (initializes with defaults if not set) */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createDefaultRoot();
  }
  return wrapPinoLogger(rootLogger);
}

/** Flush all pending log writes */
export function flushLogs(): void {
  rootLogger?.flush();
}

/** Check if a level is enabled */
export function isLevelEnabled(logger: Logger, level: LogLevel): boolean {
  if (logger.level === "silent") return false;
  const currentIndex = LOG_LEVELS.findIndex((candidate) => candidate === logger.level);
  const checkIndex = LOG_LEVELS.indexOf(level);
  return checkIndex >= currentIndex;
}
