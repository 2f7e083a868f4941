/**
 * Transform Metadata
 *
 * Describes a transform for registration: identity, ordering hints and the
 * parameters its factory accepts. Parameter specs compile to a zod schema so
 * every value is checked before a transformer is created.
 */

import type { Document } from "@docweave/ast";
import { ValidationError } from "@docweave/shared";
import { z } from "zod";

// ============================================================================
// Parameters
// ============================================================================

export type ScalarParameterType = "string" | "integer" | "number" | "boolean";
export type ParameterType = ScalarParameterType | "list";

export type ScalarValue = string | number | boolean;
export type ParameterValue = ScalarValue | readonly ScalarValue[];

export interface ParameterSpec {
  type: ParameterType;
  /** Value used when the caller omits the parameter */
  default?: ParameterValue;
  required?: boolean;
  choices?: readonly ScalarValue[];
  /** Element type for list parameters */
  elementType?: ScalarParameterType;
  /** Returns true, or a message describing why the value is rejected */
  validate?: (value: ParameterValue) => boolean | string;
  help?: string;
}

export type TransformParams = Record<string, ParameterValue | undefined>;

// ============================================================================
// Metadata
// ============================================================================

export interface Transformer {
  transform(document: Document): Document;
}

export interface TransformMetadata {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  /** Transforms that must run before this one */
  readonly dependencies: readonly string[];
  /** Lower runs first among transforms whose dependencies are met */
  readonly priority: number;
  readonly tags: readonly string[];
  readonly version: string;
  readonly author?: string;
  create(params: TransformParams): Transformer;
}

export interface TransformDefinition {
  name: string;
  description: string;
  parameters?: Record<string, ParameterSpec>;
  dependencies?: readonly string[];
  priority?: number;
  tags?: readonly string[];
  version?: string;
  author?: string;
  create: (params: TransformParams) => Transformer;
}

export const DEFAULT_TRANSFORM_PRIORITY = 100;

/**
 * Fill metadata defaults and check the definition.
 *
 * @example
 * defineTransform({
 *   name: "heading-offset",
 *   description: "Shift heading levels",
 *   parameters: { offset: { type: "integer", default: 1 } },
 *   create: (params) => new HeadingOffset(readNumber(params, "offset")),
 * });
 */
export function defineTransform(definition: TransformDefinition): TransformMetadata {
  const metadata: TransformMetadata = {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters ?? {},
    dependencies: definition.dependencies ?? [],
    priority: definition.priority ?? DEFAULT_TRANSFORM_PRIORITY,
    tags: definition.tags ?? [],
    version: definition.version ?? "1.0.0",
    author: definition.author,
    create: definition.create,
  };
  validateMetadata(metadata);
  return metadata;
}

/**
 * Structural checks run at definition and registration time.
 */
export function validateMetadata(metadata: TransformMetadata): void {
  if (!metadata.name.trim()) {
    throw new ValidationError("transform", "Transform name must not be empty", "name");
  }
  if (!Number.isInteger(metadata.priority) || metadata.priority < 0) {
    throw new ValidationError(
      metadata.name,
      `Priority of transform '${metadata.name}' must be a non-negative integer, got ${metadata.priority}`,
      "priority"
    );
  }
  if (metadata.dependencies.includes(metadata.name)) {
    throw new ValidationError(metadata.name, `Transform '${metadata.name}' depends on itself`, "dependencies");
  }
  for (const [key, spec] of Object.entries(metadata.parameters)) {
    if (spec.default !== undefined) {
      const result = parameterSchema(spec).safeParse(spec.default);
      if (!result.success) {
        throw new ValidationError(
          metadata.name,
          `Default of parameter '${key}' for transform '${metadata.name}' is invalid: ${firstMessage(result.error)}`,
          key
        );
      }
    }
  }
}

// ============================================================================
// Validation
// ============================================================================

function scalarSchema(type: ScalarParameterType | undefined): z.ZodType<ScalarValue> {
  switch (type) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    default:
      return z.union([z.string(), z.number(), z.boolean()]);
  }
}

function parameterSchema(spec: ParameterSpec): z.ZodType<ParameterValue> {
  const base: z.ZodType<ParameterValue> =
    spec.type === "list" ? z.array(scalarSchema(spec.elementType)) : scalarSchema(spec.type);

  return base.superRefine((value, ctx) => {
    const { choices, validate } = spec;
    if (choices && !isChoice(value, choices)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be one of ${choices.map((choice) => JSON.stringify(choice)).join(", ")}`,
      });
      return;
    }
    if (validate) {
      const verdict = validate(value);
      if (verdict !== true) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: typeof verdict === "string" ? verdict : `validation failed for ${JSON.stringify(value)}`,
        });
      }
    }
  });
}

function isChoice(value: ParameterValue, choices: readonly ScalarValue[]): boolean {
  if (Array.isArray(value)) {
    return value.every((entry) => choices.includes(entry));
  }
  return choices.some((choice) => choice === value);
}

function firstMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? error.message;
}

/**
 * Check raw parameters against the transform's specs and fill defaults.
 */
export function validateParams(metadata: TransformMetadata, raw: Record<string, unknown> = {}): TransformParams {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, spec] of Object.entries(metadata.parameters)) {
    const schema = parameterSchema(spec);
    shape[key] = spec.required ? schema : schema.optional();
  }

  const parsed = z.object(shape).strict().safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    let field = issue ? issue.path.join(".") : "";
    let message = issue ? issue.message : parsed.error.message;
    if (issue?.code === z.ZodIssueCode.unrecognized_keys) {
      field = issue.keys[0] ?? "";
      message = "unknown parameter";
    } else if (issue?.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
      message = "parameter is required";
    }
    throw new ValidationError(
      metadata.name,
      `Invalid parameter '${field}' for transform '${metadata.name}': ${message}`,
      field
    );
  }

  const params: TransformParams = {};
  for (const [key, spec] of Object.entries(metadata.parameters)) {
    const value = parsed.data[key];
    params[key] = isParameterValue(value) ? value : spec.default;
  }
  return params;
}

function isParameterValue(value: unknown): value is ParameterValue {
  if (Array.isArray(value)) {
    return value.every(isScalar);
  }
  return isScalar(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

// ============================================================================
// Typed access to validated parameters
// ============================================================================

function invalidParam(key: string, expected: string): ValidationError {
  return new ValidationError("transform", `Parameter '${key}' must be ${expected}`, key);
}

export function readString(params: TransformParams, key: string): string {
  const value = params[key];
  if (typeof value !== "string") {
    throw invalidParam(key, "a string");
  }
  return value;
}

export function readOptionalString(params: TransformParams, key: string): string | undefined {
  return params[key] === undefined ? undefined : readString(params, key);
}

export function readNumber(params: TransformParams, key: string): number {
  const value = params[key];
  if (typeof value !== "number") {
    throw invalidParam(key, "a number");
  }
  return value;
}

export function readBoolean(params: TransformParams, key: string): boolean {
  const value = params[key];
  if (typeof value !== "boolean") {
    throw invalidParam(key, "a boolean");
  }
  return value;
}

export function readStringList(params: TransformParams, key: string): string[] {
  const value = params[key];
  if (!Array.isArray(value)) {
    throw invalidParam(key, "a list of strings");
  }
  const strings: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw invalidParam(key, "a list of strings");
    }
    strings.push(entry);
  }
  return strings;
}
