/**
 * Docweave Runtime
 *
 * Composition root owning one converter registry and one transform registry.
 * Initialization (built-ins, then configured plugins) runs once; concurrent
 * callers share the same pass.
 */

import type { Document } from "@docweave/ast";
import {
  ConverterRegistry,
  type DocumentInput,
  type ModuleImporter,
  type ModuleProbe,
  registerBuiltinConverters,
} from "@docweave/converters";
import {
  DEFAULT_CONFIG,
  type DocweaveConfig,
  type RuntimeLogger,
  createRuntimeLogger,
  resolveConfig,
} from "@docweave/shared";
import { TransformRegistry } from "@docweave/transforms";
import {
  ConversionPipeline,
  type ConvertOptions,
  type ParseDocumentOptions,
  type ProgressCallback,
  type RenderDocumentOptions,
  type TransformSpec,
} from "./pipeline";
import { type DiscoveryReport, discoverPlugins } from "./plugins";

export interface DocweaveRuntimeOptions {
  config?: DocweaveConfig;
  logger?: RuntimeLogger;
  /** Loader for plugin modules and `<module>#<export>` component references */
  importModule?: ModuleImporter;
  moduleProbe?: ModuleProbe;
}

export class DocweaveRuntime {
  readonly config: DocweaveConfig;
  readonly converters: ConverterRegistry;
  readonly transforms: TransformRegistry;
  readonly pipeline: ConversionPipeline;
  private readonly logger: RuntimeLogger;
  private readonly importModule?: ModuleImporter;
  private initialization: Promise<DiscoveryReport> | null = null;
  private lifecycle = new AbortController();

  constructor(options: DocweaveRuntimeOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger =
      options.logger ?? createRuntimeLogger({ level: this.config.logLevel, pretty: this.config.logPretty });
    this.importModule = options.importModule;
    this.converters = new ConverterRegistry({
      logger: this.logger.child({ module: "converter-registry" }),
      detection: this.config.detection,
      moduleProbe: options.moduleProbe,
      importModule: options.importModule,
    });
    this.transforms = new TransformRegistry({ logger: this.logger.child({ module: "transform-registry" }) });
    this.pipeline = new ConversionPipeline({
      converters: this.converters,
      transforms: this.transforms,
      logger: this.logger.child({ module: "pipeline" }),
    });
  }

  /**
   * Register built-ins and load configured plugins. Repeated and concurrent
   * calls return the same report.
   */
  initialize(): Promise<DiscoveryReport> {
    if (!this.initialization) {
      this.initialization = this.runInitialization();
    }
    return this.initialization;
  }

  private async runInitialization(): Promise<DiscoveryReport> {
    const { signal } = this.lifecycle;
    registerBuiltinConverters(this.converters);
    this.transforms.initialize();
    const report = await discoverPlugins(
      this.config.plugins,
      { converters: this.converters, transforms: this.transforms, logger: this.logger.child({ module: "plugins" }) },
      this.importModule,
      signal
    );
    if (signal.aborted) {
      this.logger.debug("Initialization stopped by dispose", { pluginsLoaded: report.loaded });
      return report;
    }
    this.logger.info("Runtime initialized", {
      converters: this.converters.list().length,
      transforms: this.transforms.list().length,
      pluginsLoaded: report.loaded,
      pluginsFailed: report.failed,
    });
    return report;
  }

  /**
   * Clear both registries. The next call re-initializes; an initialization
   * still in flight stops loading plugins.
   */
  dispose(): void {
    this.lifecycle.abort();
    this.lifecycle = new AbortController();
    this.converters.clear();
    this.transforms.clear();
    this.initialization = null;
  }

  // ==========================================================================
  // Conversion
  // ==========================================================================

  async parseDocument(input: DocumentInput, options?: ParseDocumentOptions): Promise<Document> {
    await this.initialize();
    return this.pipeline.parseDocument(input, options);
  }

  async renderDocument(document: Document, options: RenderDocumentOptions): Promise<string | undefined> {
    await this.initialize();
    return this.pipeline.renderDocument(document, options);
  }

  async convert(input: DocumentInput, options: ConvertOptions): Promise<string | undefined> {
    await this.initialize();
    return this.pipeline.convert(input, options);
  }

  async applyTransforms(
    document: Document,
    specs: readonly TransformSpec[],
    onProgress?: ProgressCallback
  ): Promise<Document> {
    await this.initialize();
    return this.pipeline.applyTransforms(document, specs, onProgress);
  }
}

// ============================================================================
// Process-wide default
// ============================================================================

let defaultRuntime: DocweaveRuntime | null = null;

/**
 * Lazily created runtime configured from the environment. Throws
 * ValidationError when a `DOCWEAVE_*` variable is invalid; the conversion
 * functions below report that as a rejected promise.
 */
export function getDefaultRuntime(): DocweaveRuntime {
  if (!defaultRuntime) {
    defaultRuntime = new DocweaveRuntime({ config: resolveConfig({}, {}, process.env) });
  }
  return defaultRuntime;
}

export function resetDefaultRuntime(): void {
  defaultRuntime?.dispose();
  defaultRuntime = null;
}

export async function parseDocument(input: DocumentInput, options?: ParseDocumentOptions): Promise<Document> {
  return getDefaultRuntime().parseDocument(input, options);
}

export async function renderDocument(
  document: Document,
  options: RenderDocumentOptions
): Promise<string | undefined> {
  return getDefaultRuntime().renderDocument(document, options);
}

export async function convert(input: DocumentInput, options: ConvertOptions): Promise<string | undefined> {
  return getDefaultRuntime().convert(input, options);
}

export async function applyTransforms(
  document: Document,
  specs: readonly TransformSpec[],
  onProgress?: ProgressCallback
): Promise<Document> {
  return getDefaultRuntime().applyTransforms(document, specs, onProgress);
}
