/**
 * Built-in `ast` format: the JSON serialization of the document tree.
 */

import { deserializeDocument, serializeDocument } from "@docweave/ast";
import type { ConverterRegistry } from "./converterRegistry";
import { readInputText, writeOutputText } from "./io";
import type { ContentDetector, ConverterRegistration, Parser, StreamRenderer } from "./types";

export const AST_FORMAT = "ast";
export const AST_MIME_TYPE = "application/vnd.docweave.ast+json";

const astContentDetector: ContentDetector = {
  matches: (reader) => {
    const head = Buffer.from(reader.prefix).toString("utf8");
    return /^\s*\{/.test(head) && head.includes('"schema_version"');
  },
};

export const astParser: Parser = {
  parse: async (input) => deserializeDocument(await readInputText(input)),
  extractMetadata: async (input) => deserializeDocument(await readInputText(input)).metadata,
};

export const astRenderer: StreamRenderer = {
  render: async (document, output) => writeOutputText(output, serializeDocument(document, { indent: 2 })),
  renderToString: async (document) => serializeDocument(document, { indent: 2 }),
};

export const astConverter: ConverterRegistration = {
  formatName: AST_FORMAT,
  extensions: [".ast.json"],
  mimeTypes: [AST_MIME_TYPE],
  contentDetector: astContentDetector,
  parser: astParser,
  renderer: astRenderer,
  description: "Serialized document tree (JSON)",
};

export function registerBuiltinConverters(registry: ConverterRegistry): void {
  registry.register(astConverter);
}
