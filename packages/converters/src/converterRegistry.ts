/**
 * Converter Registry
 *
 * Holds converter metadata by format name, runs format detection over the
 * registered set and resolves parser/renderer references on demand.
 */

import {
  ConfigurationError,
  DependencyError,
  type DetectionLimits,
  FormatDetectionError,
  type MissingDependencyInfo,
  type RuntimeLogger,
  ValidationError,
  getLogger,
  isRecord,
} from "@docweave/shared";
import { type ModuleProbe, NodeModuleProbe, checkDependencies, formatRemediation } from "./dependencyChecker";
import { FormatDetector } from "./formatDetector";
import { DEFAULT_DETECTION_LIMITS, type InputProbe, describeInput, openProbe } from "./probe";
import { normalizeMagicPattern } from "./signatures";
import type {
  ComponentReference,
  ComponentRole,
  ConverterMetadata,
  ConverterRegistration,
  DetectionHints,
  DetectionResult,
  DocumentInput,
  Parser,
  Renderer,
} from "./types";

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface ConverterRegistryOptions {
  logger?: RuntimeLogger;
  /** Availability probe for declared dependencies */
  moduleProbe?: ModuleProbe;
  detection?: DetectionLimits;
  /** Loader for `<module>#<export>` references */
  importModule?: ModuleImporter;
}

export function isParser(value: unknown): value is Parser {
  return isRecord(value) && typeof value.parse === "function";
}

export function isRenderer(value: unknown): value is Renderer {
  return (
    isRecord(value) && (typeof value.render === "function" || typeof value.renderToString === "function")
  );
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

export class ConverterRegistry {
  private readonly converters = new Map<string, ConverterMetadata>();
  private readonly components = new Map<string, unknown>();
  private readonly loaded = new Map<string, unknown>();
  private readonly logger: RuntimeLogger;
  private readonly moduleProbe: ModuleProbe;
  private readonly importModule: ModuleImporter;
  private readonly detector: FormatDetector;
  readonly limits: DetectionLimits;

  constructor(options: ConverterRegistryOptions = {}) {
    this.logger = options.logger ?? getLogger().child({ module: "converter-registry" });
    this.moduleProbe = options.moduleProbe ?? new NodeModuleProbe();
    this.importModule = options.importModule ?? defaultImporter;
    this.limits = options.detection ?? DEFAULT_DETECTION_LIMITS;
    this.detector = new FormatDetector(() => this.entries(), this.logger);
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a converter. A second registration under the same name replaces
   * the first and keeps its place in registration order.
   */
  register(registration: ConverterRegistration): ConverterMetadata {
    const metadata = normalizeRegistration(registration);
    if (this.converters.has(metadata.formatName)) {
      this.logger.warn("Converter already registered; replacing", { format: metadata.formatName });
      this.dropLoaded(metadata.formatName);
    }
    this.converters.set(metadata.formatName, metadata);
    this.logger.debug("Registered converter", {
      format: metadata.formatName,
      extensions: Array.from(metadata.extensions),
      priority: metadata.priority,
    });
    return metadata;
  }

  unregister(formatName: string): boolean {
    const removed = this.converters.delete(formatName);
    if (removed) {
      for (const key of Array.from(this.components.keys())) {
        if (key.startsWith(`${formatName}/`)) {
          this.components.delete(key);
        }
      }
      this.dropLoaded(formatName);
    }
    return removed;
  }

  /**
   * Make a component available to bare-name references of one format.
   */
  provide(namespace: string, name: string, component: Parser | Renderer): void {
    this.components.set(`${namespace}/${name}`, component);
  }

  has(formatName: string): boolean {
    return this.converters.has(formatName);
  }

  get(formatName: string): ConverterMetadata | undefined {
    return this.converters.get(formatName);
  }

  /** Registered format names, sorted */
  list(): string[] {
    return Array.from(this.converters.keys()).sort();
  }

  /** Registered converters in registration order */
  entries(): ConverterMetadata[] {
    return Array.from(this.converters.values());
  }

  clear(): void {
    this.converters.clear();
    this.components.clear();
    this.loaded.clear();
  }

  // ==========================================================================
  // Detection
  // ==========================================================================

  async detect(input: DocumentInput, hints: DetectionHints = {}): Promise<DetectionResult> {
    const probe = await openProbe(input, this.limits);
    try {
      return await this.detectProbe(probe, hints, describeInput(input, hints.filename));
    } finally {
      await probe.close();
    }
  }

  async detectFormat(input: DocumentInput, hints: DetectionHints = {}): Promise<string> {
    const result = await this.detect(input, hints);
    return result.format;
  }

  /**
   * Detect from an already opened probe, leaving it open for the parser.
   */
  detectProbe(probe: InputProbe, hints: DetectionHints, label: string): Promise<DetectionResult> {
    return this.detector.detect(probe, hints, label);
  }

  // ==========================================================================
  // Components
  // ==========================================================================

  async getParser(formatName: string): Promise<Parser> {
    const metadata = this.requireFormat(formatName);
    return this.resolveComponent(metadata, "parser", metadata.parser, isParser);
  }

  async getRenderer(formatName: string): Promise<Renderer> {
    const metadata = this.requireFormat(formatName);
    return this.resolveComponent(metadata, "renderer", metadata.renderer, isRenderer);
  }

  async checkDependencies(formatName: string, role: ComponentRole): Promise<MissingDependencyInfo[]> {
    const metadata = this.requireFormat(formatName);
    const specs = role === "parser" ? metadata.parserDependencies : metadata.rendererDependencies;
    return checkDependencies(specs, this.moduleProbe);
  }

  async ensureDependencies(formatName: string, role: ComponentRole): Promise<void> {
    const missing = await this.checkDependencies(formatName, role);
    if (missing.length > 0) {
      throw new DependencyError(formatName, missing, formatRemediation(missing));
    }
  }

  private requireFormat(formatName: string): ConverterMetadata {
    const metadata = this.converters.get(formatName);
    if (!metadata) {
      throw new FormatDetectionError(formatName, `Format '${formatName}' is not registered`);
    }
    return metadata;
  }

  private async resolveComponent<T>(
    metadata: ConverterMetadata,
    role: ComponentRole,
    reference: ComponentReference<T> | undefined,
    guard: (value: unknown) => value is T
  ): Promise<T> {
    const format = metadata.formatName;
    if (reference === undefined) {
      throw new ConfigurationError(`Format '${format}' has no ${role}`, { format });
    }
    if (typeof reference !== "string") {
      return reference;
    }

    const cacheKey = `${format}::${role}::${reference}`;
    const cached = this.loaded.get(cacheKey);
    if (guard(cached)) {
      return cached;
    }

    const component = reference.includes("#")
      ? await this.importComponent(format, reference)
      : this.components.get(`${format}/${reference}`);

    if (component === undefined) {
      throw new ConfigurationError(`No ${role} named '${reference}' was provided for format '${format}'`, {
        format,
        reference,
      });
    }
    if (!guard(component)) {
      throw new ConfigurationError(`'${reference}' does not implement the ${role} contract`, {
        format,
        reference,
      });
    }
    this.loaded.set(cacheKey, component);
    return component;
  }

  private async importComponent(format: string, reference: string): Promise<unknown> {
    const separator = reference.lastIndexOf("#");
    const specifier = reference.slice(0, separator);
    const exportName = reference.slice(separator + 1);
    if (!specifier || !exportName) {
      throw new ConfigurationError(`Malformed component reference '${reference}'`, { format, reference });
    }

    let moduleRecord: unknown;
    try {
      moduleRecord = await this.importModule(specifier);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load module '${specifier}' for format '${format}'`,
        { format, reference },
        { cause: error }
      );
    }
    if (!isRecord(moduleRecord) || !(exportName in moduleRecord)) {
      throw new ConfigurationError(`Module '${specifier}' has no export '${exportName}'`, {
        format,
        reference,
      });
    }
    return moduleRecord[exportName];
  }

  private dropLoaded(formatName: string): void {
    for (const key of Array.from(this.loaded.keys())) {
      if (key.startsWith(`${formatName}::`)) {
        this.loaded.delete(key);
      }
    }
  }
}

/**
 * Checked, normalized form of a registration. Throws ValidationError.
 */
export function normalizeRegistration(registration: ConverterRegistration): ConverterMetadata {
  const formatName = registration.formatName.trim();
  if (!formatName) {
    throw new ValidationError("converter", "Converter format name must not be empty", "formatName");
  }
  const priority = registration.priority ?? 0;
  if (!Number.isInteger(priority)) {
    throw new ValidationError("converter", `Priority of '${formatName}' must be an integer`, "priority");
  }

  return {
    formatName,
    extensions: new Set((registration.extensions ?? []).map(normalizeExtension)),
    mimeTypes: new Set((registration.mimeTypes ?? []).map((mime) => mime.trim().toLowerCase())),
    magicBytes: (registration.magicBytes ?? []).map(normalizeMagicPattern),
    contentDetector: registration.contentDetector,
    parser: registration.parser,
    renderer: registration.renderer,
    parserDependencies: registration.parserDependencies ?? [],
    rendererDependencies: registration.rendererDependencies ?? [],
    priority,
    description: registration.description ?? "",
  };
}

function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}
