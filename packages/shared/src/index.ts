/**
 * @docweave/shared
 *
 * Error taxonomy, logging and configuration shared by every docweave package.
 */

export {
  ConfigurationError,
  DependencyError,
  DependencyResolutionError,
  DocweaveError,
  FormatDetectionError,
  formatErrorMessage,
  ParsingError,
  TransformError,
  ValidationError,
} from "./errors";
export type { MissingDependencyInfo, MissingDependencyReason } from "./errors";

export { createLogger, createRuntimeLogger, getLogger, isLogLevel, setLogger } from "./logger";
export type { LogLevel, Logger, LoggerConfig, RuntimeLogger } from "./logger";

export {
  DEFAULT_CONFIG,
  DEFAULT_INSPECT_BYTES,
  DEFAULT_PREFIX_BYTES,
  loadConfig,
  resolveConfig,
} from "./config";
export type { DetectionLimits, DocweaveConfig, LoadConfigOptions } from "./config";

export { assertNever, isNonEmptyString, isPlainRecord, isRecord } from "./typeGuards";
