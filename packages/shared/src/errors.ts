/**
 * Conversion Error Types
 *
 * Every failure raised by the conversion core extends DocweaveError and names
 * the identifier it is about (format, transform, dependency or field).
 */

export class DocweaveError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DocweaveError";
  }
}

/**
 * No registered format matches the input, or an explicit format hint names an
 * unregistered format.
 */
export class FormatDetectionError extends DocweaveError {
  readonly input: string;
  readonly candidates: readonly string[];

  constructor(input: string, message?: string, candidates: readonly string[] = []) {
    super(message ?? `Unable to detect format of ${input}`);
    this.name = "FormatDetectionError";
    this.input = input;
    this.candidates = candidates;
  }
}

export type MissingDependencyReason = "not-installed" | "version-mismatch";

export interface MissingDependencyInfo {
  packageName: string;
  moduleName: string;
  versionRange: string;
  reason: MissingDependencyReason;
  installedVersion?: string;
}

export class DependencyError extends DocweaveError {
  readonly format: string;
  readonly missing: readonly MissingDependencyInfo[];
  readonly remediation: string;

  constructor(format: string, missing: readonly MissingDependencyInfo[], remediation: string) {
    const names = missing.map((dep) => describeMissing(dep)).join(", ");
    super(`Format '${format}' is missing dependencies: ${names}. ${remediation}`);
    this.name = "DependencyError";
    this.format = format;
    this.missing = missing;
    this.remediation = remediation;
  }
}

function describeMissing(dep: MissingDependencyInfo): string {
  if (dep.reason === "version-mismatch") {
    return `${dep.packageName} (installed ${dep.installedVersion ?? "unknown"}, requires ${dep.versionRange})`;
  }
  return dep.versionRange ? `${dep.packageName}${dep.versionRange}` : dep.packageName;
}

/**
 * A parser or renderer reference could not be resolved.
 */
export class ConfigurationError extends DocweaveError {
  readonly format?: string;
  readonly reference?: string;

  constructor(
    message: string,
    details: { format?: string; reference?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ConfigurationError";
    this.format = details.format;
    this.reference = details.reference;
  }
}

export class ValidationError extends DocweaveError {
  readonly subject: string;
  readonly field?: string;

  constructor(subject: string, message: string, field?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
    this.subject = subject;
    this.field = field;
  }
}

/**
 * Malformed serialized AST or structural failure while reading a document.
 */
export class ParsingError extends DocweaveError {
  readonly field?: string;

  constructor(message: string, field?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParsingError";
    this.field = field;
  }
}

export class DependencyResolutionError extends DocweaveError {
  readonly transform: string;
  readonly cycle?: readonly string[];

  constructor(transform: string, message: string, cycle?: readonly string[]) {
    super(message);
    this.name = "DependencyResolutionError";
    this.transform = transform;
    this.cycle = cycle;
  }
}

export class TransformError extends DocweaveError {
  readonly transform: string;

  constructor(transform: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Transform '${transform}' failed${reason}`, options);
    this.name = "TransformError";
    this.transform = transform;
  }
}

export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
