/**
 * Converter Types
 *
 * Contracts between the registry and format parsers/renderers, plus the
 * metadata a format registers under.
 */

import type { Readable, Writable } from "node:stream";
import type { Document, DocumentMetadata } from "@docweave/ast";

// ============================================================================
// Inputs
// ============================================================================

/** File path, in-memory bytes or a readable stream */
export type DocumentInput = string | Uint8Array | Readable;

export interface DetectionHints {
  /** Filename used for extension matching when the input carries none */
  filename?: string;
  /** Declared media type; parameters after `;` are ignored */
  mimeType?: string;
  /** Explicit format name; bypasses detection */
  format?: string;
}

/**
 * Bounded view of an input's leading bytes.
 */
export interface BoundedReader {
  /** Leading bytes, at most the configured prefix size */
  readonly prefix: Uint8Array;
  /** Read up to maxBytes from the start of the input, capped by the inspect limit */
  read(maxBytes: number): Promise<Uint8Array>;
}

// ============================================================================
// Detection
// ============================================================================

export interface MagicPattern {
  /** Bytes, or a latin1 string such as "%PDF-" */
  pattern: Uint8Array | string;
  offset: number;
}

export interface ContentDetector {
  matches(reader: BoundedReader): boolean | Promise<boolean>;
}

export type DetectionSignal = "explicit" | "extension" | "mime" | "magic" | "content";

export interface DetectionResult {
  format: string;
  signals: DetectionSignal[];
  /** Surviving candidates, best first */
  candidates: string[];
}

// ============================================================================
// Parsers and renderers
// ============================================================================

export type ParseOptions = Record<string, unknown>;

export interface Parser {
  parse(input: DocumentInput, options?: ParseOptions): Promise<Document>;
  extractMetadata?(input: DocumentInput): Promise<DocumentMetadata>;
}

/** Output path or writable stream */
export type RenderTarget = string | Writable;

export interface StreamRenderer {
  render(document: Document, output: RenderTarget): Promise<void>;
  renderToString?(document: Document): Promise<string>;
}

export interface StringRenderer {
  render?(document: Document, output: RenderTarget): Promise<void>;
  renderToString(document: Document): Promise<string>;
}

export type Renderer = StreamRenderer | StringRenderer;

/**
 * A component given directly, by a name provided to the registry, or as
 * `<module>#<export>` loaded on first use.
 */
export type ComponentReference<T> = T | string;

export type ComponentRole = "parser" | "renderer";

// ============================================================================
// Metadata
// ============================================================================

export interface DependencySpec {
  /** Package name used in install hints */
  packageName: string;
  /** Module specifier resolved at run time */
  moduleName: string;
  /** Accepted version range; empty accepts any */
  versionRange: string;
}

export interface ConverterRegistration {
  formatName: string;
  extensions?: readonly string[];
  mimeTypes?: readonly string[];
  magicBytes?: readonly MagicPattern[];
  contentDetector?: ContentDetector;
  parser?: ComponentReference<Parser>;
  renderer?: ComponentReference<Renderer>;
  parserDependencies?: readonly DependencySpec[];
  rendererDependencies?: readonly DependencySpec[];
  priority?: number;
  description?: string;
}

/**
 * Registration with normalized extension and MIME sets and resolved defaults.
 */
export interface ConverterMetadata {
  readonly formatName: string;
  readonly extensions: ReadonlySet<string>;
  readonly mimeTypes: ReadonlySet<string>;
  readonly magicBytes: readonly NormalizedMagicPattern[];
  readonly contentDetector?: ContentDetector;
  readonly parser?: ComponentReference<Parser>;
  readonly renderer?: ComponentReference<Renderer>;
  readonly parserDependencies: readonly DependencySpec[];
  readonly rendererDependencies: readonly DependencySpec[];
  readonly priority: number;
  readonly description: string;
}

export interface NormalizedMagicPattern {
  readonly pattern: Uint8Array;
  readonly offset: number;
}
