/**
 * Pino Logger Factory
 *
 * Structured logging for the conversion core. Registries and the runtime take
 * a RuntimeLogger so callers can swap in their own sink.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  /** Minimum level written */
  level?: LogLevel;
  /** Route output through pino-pretty */
  pretty?: boolean;
  /** Bindings included in every line */
  base?: Record<string, unknown>;
  /** Custom transport (ignored when a destination is given) */
  transport?: LoggerOptions["transport"];
  /** Write synchronously to this stream instead of stdout */
  destination?: DestinationStream;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: readLevel(process.env.DOCWEAVE_LOG_LEVEL),
  pretty: process.env.DOCWEAVE_LOG_PRETTY === "true" || process.env.DOCWEAVE_LOG_PRETTY === "1",
  base: {
    service: "docweave",
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLevel(value: string | undefined): LogLevel {
  if (value && isLogLevel(value)) {
    return value;
  }
  return "info";
}

export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.destination) {
    return pino(options, mergedConfig.destination);
  }

  if (mergedConfig.pretty && !mergedConfig.transport) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  } else if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  }

  return pino(options);
}

export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err) {
        logger.error(err, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

let defaultLogger: RuntimeLogger | null = null;

export function getLogger(): RuntimeLogger {
  if (!defaultLogger) {
    defaultLogger = createRuntimeLogger();
  }
  return defaultLogger;
}

/**
 * Replace the process-wide default logger, e.g. after loading configuration.
 */
export function setLogger(logger: RuntimeLogger | null): void {
  defaultLogger = logger;
}
