/**
 * @docweave/pipeline
 *
 * Conversion entry points and the runtime that wires the registries together.
 */

export { ConversionPipeline } from "./pipeline";
export type {
  ConvertOptions,
  ParseDocumentOptions,
  PipelineServices,
  PipelineStage,
  ProgressCallback,
  ProgressEvent,
  ProgressStatus,
  RenderDocumentOptions,
  TransformSpec,
} from "./pipeline";
export { discoverPlugins } from "./plugins";
export type { DiscoveryReport, PluginContext, PluginLoadResult } from "./plugins";
export {
  DocweaveRuntime,
  applyTransforms,
  convert,
  getDefaultRuntime,
  parseDocument,
  renderDocument,
  resetDefaultRuntime,
} from "./runtime";
export type { DocweaveRuntimeOptions } from "./runtime";
