/**
 * Conversion Pipeline
 *
 * detect -> parse -> transforms -> render over one converter registry and one
 * transform registry. Every requested transform is instantiated (and its
 * parameters validated) before the first one runs.
 */

import { PassThrough } from "node:stream";
import { text as streamText } from "node:stream/consumers";
import type { Document } from "@docweave/ast";
import {
  type ConverterRegistry,
  type DetectionHints,
  type DocumentInput,
  type ParseOptions,
  type RenderTarget,
  type Renderer,
  describeInput,
  openProbe,
  writeOutputText,
} from "@docweave/converters";
import { ConfigurationError, type RuntimeLogger, TransformError, ValidationError, getLogger } from "@docweave/shared";
import type { TransformRegistry, Transformer } from "@docweave/transforms";

// ============================================================================
// Types
// ============================================================================

export type PipelineStage = "detect" | "parse" | "transform" | "render";
export type ProgressStatus = "started" | "completed" | "failed";

export interface ProgressEvent {
  stage: PipelineStage;
  status: ProgressStatus;
  /** Source format for detect/parse, target format for render */
  format?: string;
  /** Transform name for the transform stage */
  transform?: string;
  /** Set on completed and failed events */
  durationMs?: number;
}

export type ProgressCallback = (event: ProgressEvent) => void;

/** A transform by name, optionally with parameters */
export type TransformSpec = string | { name: string; params?: Record<string, unknown> };

export interface ParseDocumentOptions {
  /** Skip detection and use this format */
  sourceFormat?: string;
  /** Filename for extension matching when the input has none */
  filename?: string;
  mimeType?: string;
  parserOptions?: ParseOptions;
  onProgress?: ProgressCallback;
}

export interface RenderDocumentOptions {
  targetFormat: string;
  /** Path or stream to write to; without one the rendered text is returned */
  output?: RenderTarget;
  onProgress?: ProgressCallback;
}

export interface ConvertOptions extends ParseDocumentOptions {
  targetFormat: string;
  output?: RenderTarget;
  transforms?: readonly TransformSpec[];
}

export interface PipelineServices {
  converters: ConverterRegistry;
  transforms: TransformRegistry;
  logger?: RuntimeLogger;
}

type ProgressDetails = Pick<ProgressEvent, "format" | "transform">;

// ============================================================================
// Pipeline
// ============================================================================

export class ConversionPipeline {
  private readonly converters: ConverterRegistry;
  private readonly transforms: TransformRegistry;
  private readonly logger: RuntimeLogger;

  constructor(services: PipelineServices) {
    this.converters = services.converters;
    this.transforms = services.transforms;
    this.logger = services.logger ?? getLogger().child({ module: "pipeline" });
  }

  /**
   * Detect the source format, check parser dependencies and parse.
   */
  async parseDocument(input: DocumentInput, options: ParseDocumentOptions = {}): Promise<Document> {
    const { onProgress } = options;
    const hints: DetectionHints = {
      filename: options.filename,
      mimeType: options.mimeType,
      format: options.sourceFormat,
    };

    const probe = await openProbe(input, this.converters.limits);
    try {
      const label = describeInput(input, options.filename ?? probe.filename);
      const detection = await this.track(
        "detect",
        {},
        onProgress,
        () => this.converters.detectProbe(probe, hints, label),
        (result) => ({ format: result.format })
      );
      const format = detection.format;
      this.logger.debug("Detected source format", { input: label, format, signals: detection.signals });

      return await this.track("parse", { format }, onProgress, async () => {
        await this.converters.ensureDependencies(format, "parser");
        const parser = await this.converters.getParser(format);
        return parser.parse(probe.handoff(), options.parserOptions);
      });
    } finally {
      await probe.close();
    }
  }

  /**
   * Render to the given output, or to a string when there is none.
   */
  async renderDocument(document: Document, options: RenderDocumentOptions): Promise<string | undefined> {
    const format = options.targetFormat;
    return this.track("render", { format }, options.onProgress, async () => {
      await this.converters.ensureDependencies(format, "renderer");
      const renderer = await this.converters.getRenderer(format);
      return options.output === undefined
        ? renderToText(renderer, document, format)
        : renderToTarget(renderer, document, options.output, format);
    });
  }

  /**
   * Parse, transform and render. Returns the rendered text when no output is
   * given.
   */
  async convert(input: DocumentInput, options: ConvertOptions): Promise<string | undefined> {
    const parsed = await this.parseDocument(input, options);
    const transformed = await this.applyTransforms(parsed, options.transforms ?? [], options.onProgress);
    return this.renderDocument(transformed, {
      targetFormat: options.targetFormat,
      output: options.output,
      onProgress: options.onProgress,
    });
  }

  /**
   * Run the requested transforms and their dependencies in resolved order.
   * The input document is never modified.
   */
  async applyTransforms(
    document: Document,
    specs: readonly TransformSpec[],
    onProgress?: ProgressCallback
  ): Promise<Document> {
    if (specs.length === 0) {
      return document;
    }

    const params = new Map<string, Record<string, unknown>>();
    for (const spec of specs) {
      const name = typeof spec === "string" ? spec : spec.name;
      params.set(name, typeof spec === "string" ? (params.get(name) ?? {}) : (spec.params ?? {}));
    }

    const order = this.transforms.resolveDependencies(Array.from(params.keys()));
    const instances: Array<{ name: string; transformer: Transformer }> = order.map((name) => ({
      name,
      transformer: this.transforms.getTransform(name, params.get(name) ?? {}),
    }));
    this.logger.debug("Applying transforms", { order });

    let current = structuredClone(document);
    for (const { name, transformer } of instances) {
      const input = current;
      current = await this.track("transform", { transform: name }, onProgress, async () =>
        runTransformer(name, transformer, input)
      );
    }
    return current;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async track<T>(
    stage: PipelineStage,
    details: ProgressDetails,
    onProgress: ProgressCallback | undefined,
    run: () => Promise<T>,
    summarize?: (result: T) => ProgressDetails
  ): Promise<T> {
    const startedAt = Date.now();
    onProgress?.({ stage, status: "started", ...details });
    try {
      const result = await run();
      onProgress?.({
        stage,
        status: "completed",
        ...details,
        ...summarize?.(result),
        durationMs: Date.now() - startedAt,
      });
      return result;
    } catch (error) {
      onProgress?.({ stage, status: "failed", ...details, durationMs: Date.now() - startedAt });
      throw error;
    }
  }
}

function runTransformer(name: string, transformer: Transformer, document: Document): Document {
  let result: Document;
  try {
    result = transformer.transform(document);
  } catch (error) {
    throw new TransformError(name, { cause: error });
  }
  if (typeof result !== "object" || result === null || result.type !== "document") {
    throw new TransformError(name, {
      cause: new ValidationError(name, "Transformer did not return a document", "type"),
    });
  }
  return result;
}

async function renderToText(renderer: Renderer, document: Document, format: string): Promise<string> {
  if (renderer.renderToString) {
    return renderer.renderToString(document);
  }
  if (renderer.render) {
    const sink = new PassThrough();
    const collected = streamText(sink);
    await renderer.render(document, sink);
    sink.end();
    return collected;
  }
  throw new ConfigurationError(`Renderer for format '${format}' has no render method`, { format });
}

async function renderToTarget(
  renderer: Renderer,
  document: Document,
  output: RenderTarget,
  format: string
): Promise<undefined> {
  if (renderer.render) {
    await renderer.render(document, output);
    return undefined;
  }
  if (renderer.renderToString) {
    await writeOutputText(output, await renderer.renderToString(document));
    return undefined;
  }
  throw new ConfigurationError(`Renderer for format '${format}' has no render method`, { format });
}
