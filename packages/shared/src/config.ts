/**
 * Runtime Configuration
 *
 * Values come from an optional YAML/JSON file, overridden by DOCWEAVE_*
 * environment variables, and are validated with zod before use.
 */

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "./errors";
import type { LogLevel } from "./logger";
import { isPlainRecord } from "./typeGuards";

export const DEFAULT_PREFIX_BYTES = 8 * 1024;
export const DEFAULT_INSPECT_BYTES = 256 * 1024;

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const detectionSchema = z
  .object({
    prefixBytes: z.number().int().positive().max(1024 * 1024),
    inspectBytes: z.number().int().positive().max(64 * 1024 * 1024),
  })
  .strict()
  .refine((value) => value.inspectBytes >= value.prefixBytes, {
    message: "inspectBytes must be at least prefixBytes",
    path: ["inspectBytes"],
  });

const configSchema = z
  .object({
    logLevel: logLevelSchema,
    logPretty: z.boolean(),
    detection: detectionSchema,
    plugins: z.array(z.string().min(1)),
  })
  .strict();

export interface DetectionLimits {
  prefixBytes: number;
  inspectBytes: number;
}

export interface DocweaveConfig {
  logLevel: LogLevel;
  logPretty: boolean;
  detection: DetectionLimits;
  plugins: string[];
}

export const DEFAULT_CONFIG: DocweaveConfig = {
  logLevel: "info",
  logPretty: false,
  detection: {
    prefixBytes: DEFAULT_PREFIX_BYTES,
    inspectBytes: DEFAULT_INSPECT_BYTES,
  },
  plugins: [],
};

export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env) */
  env?: Record<string, string | undefined>;
  /** Path to a YAML or JSON configuration file */
  file?: string;
  /** Values applied after the file and before the environment */
  overrides?: Record<string, unknown>;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocweaveConfig> {
  const fileValues = options.file ? await readConfigFile(options.file) : {};
  return resolveConfig(fileValues, options.overrides ?? {}, options.env ?? process.env);
}

/**
 * Merge raw configuration layers and validate the result.
 */
export function resolveConfig(
  fileValues: Record<string, unknown>,
  overrides: Record<string, unknown>,
  env: Record<string, string | undefined>
): DocweaveConfig {
  const merged = mergeLayers(mergeLayers(mergeLayers({}, toRecord(DEFAULT_CONFIG)), fileValues), overrides);
  const withEnv = mergeLayers(merged, readEnvOverrides(env));

  const parsed = configSchema.safeParse(withEnv);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : undefined;
    const detail = issue ? issue.message : parsed.error.message;
    throw new ValidationError(
      "config",
      `Invalid configuration${field ? ` at ${field}` : ""}: ${detail}`,
      field
    );
  }
  return parsed.data;
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  const text = await fs.readFile(file, "utf8");
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new ValidationError("config", `Configuration file ${file} is not valid YAML or JSON`, undefined, {
      cause: error,
    });
  }
  if (data === null || data === undefined) {
    return {};
  }
  if (!isPlainRecord(data)) {
    throw new ValidationError("config", `Configuration file ${file} must contain a mapping`);
  }
  return data;
}

function readEnvOverrides(env: Record<string, string | undefined>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const detection: Record<string, unknown> = {};

  if (env.DOCWEAVE_LOG_LEVEL !== undefined) {
    result.logLevel = env.DOCWEAVE_LOG_LEVEL;
  }
  if (env.DOCWEAVE_LOG_PRETTY !== undefined) {
    result.logPretty = readBooleanFlag(env.DOCWEAVE_LOG_PRETTY);
  }
  if (env.DOCWEAVE_DETECTION_PREFIX_BYTES !== undefined) {
    detection.prefixBytes = readNumber(env.DOCWEAVE_DETECTION_PREFIX_BYTES);
  }
  if (env.DOCWEAVE_DETECTION_INSPECT_BYTES !== undefined) {
    detection.inspectBytes = readNumber(env.DOCWEAVE_DETECTION_INSPECT_BYTES);
  }
  if (Object.keys(detection).length > 0) {
    result.detection = detection;
  }
  if (env.DOCWEAVE_PLUGINS !== undefined) {
    result.plugins = env.DOCWEAVE_PLUGINS.split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  return result;
}

function readBooleanFlag(value: string): boolean {
  return value === "true" || value === "1";
}

function readNumber(value: string): number | string {
  const parsed = Number(value);
  // Keep the raw string so validation reports the offending value.
  return Number.isNaN(parsed) ? value : parsed;
}

function mergeLayers(base: Record<string, unknown>, layer: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    const current = result[key];
    if (isPlainRecord(current) && isPlainRecord(value)) {
      result[key] = mergeLayers(current, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function toRecord(config: DocweaveConfig): Record<string, unknown> {
  return {
    logLevel: config.logLevel,
    logPretty: config.logPretty,
    detection: { ...config.detection },
    plugins: [...config.plugins],
  };
}
