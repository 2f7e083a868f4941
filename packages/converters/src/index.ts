/**
 * @docweave/converters
 *
 * Converter metadata, bounded format detection and the converter registry.
 */

export { listZipEntries, zipEntryPrefixDetector, zipMimetypeDetector } from "./archive";
export type { ZipEntry } from "./archive";
export { AST_FORMAT, AST_MIME_TYPE, astConverter, astParser, astRenderer, registerBuiltinConverters } from "./builtinFormats";
export { ConverterRegistry, isParser, isRenderer, normalizeRegistration } from "./converterRegistry";
export type { ConverterRegistryOptions, ModuleImporter } from "./converterRegistry";
export { NodeModuleProbe, checkDependencies, formatRemediation, packageRoot } from "./dependencyChecker";
export type { ModuleProbe, ModuleProbeResult } from "./dependencyChecker";
export { FormatDetector } from "./formatDetector";
export { readInputBytes, readInputText, writeOutputText } from "./io";
export { DEFAULT_DETECTION_LIMITS, describeInput, isReadable, openProbe } from "./probe";
export type { InputProbe } from "./probe";
export { SIGNATURES, matchesMagic, normalizeMagicPattern } from "./signatures";
export type {
  BoundedReader,
  ComponentReference,
  ComponentRole,
  ContentDetector,
  ConverterMetadata,
  ConverterRegistration,
  DependencySpec,
  DetectionHints,
  DetectionResult,
  DetectionSignal,
  DocumentInput,
  MagicPattern,
  NormalizedMagicPattern,
  ParseOptions,
  Parser,
  RenderTarget,
  Renderer,
  StreamRenderer,
  StringRenderer,
} from "./types";
export { satisfiesVersion } from "./versionRange";
