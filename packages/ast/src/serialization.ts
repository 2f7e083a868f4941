/**
 * JSON Serialization
 *
 * Payload layout: an integer `schema_version` at the root and a PascalCase
 * `node_type` on every node; all other fields keep their AST names. Reading
 * checks the version first, then the root variant, then each node's fields.
 */

import { ParsingError, ValidationError, isPlainRecord } from "@docweave/shared";
import { z } from "zod";
import type {
  Document,
  DocumentMetadata,
  JsonValue,
  Node,
  NodeMap,
  NodeMetadata,
  NodeType,
  SourceLocation,
} from "./nodes";
import { NODE_TYPES, isHeadingLevel, isNodeOfType, isNodeType } from "./nodes";

export const SCHEMA_VERSION = 1;

export const PAYLOAD_NODE_NAMES: Record<NodeType, string> = {
  document: "Document",
  heading: "Heading",
  paragraph: "Paragraph",
  codeBlock: "CodeBlock",
  blockQuote: "BlockQuote",
  list: "List",
  listItem: "ListItem",
  table: "Table",
  tableRow: "TableRow",
  tableCell: "TableCell",
  thematicBreak: "ThematicBreak",
  htmlBlock: "HTMLBlock",
  mathBlock: "MathBlock",
  definitionList: "DefinitionList",
  definitionTerm: "DefinitionTerm",
  definitionDescription: "DefinitionDescription",
  footnoteDefinition: "FootnoteDefinition",
  text: "Text",
  strong: "Strong",
  emphasis: "Emphasis",
  code: "Code",
  link: "Link",
  image: "Image",
  lineBreak: "LineBreak",
  strikethrough: "Strikethrough",
  underline: "Underline",
  superscript: "Superscript",
  subscript: "Subscript",
  htmlInline: "HTMLInline",
  mathInline: "MathInline",
  footnoteReference: "FootnoteReference",
};

export type DocumentPayload = Record<string, unknown> & { schema_version: number; node_type: string };

export interface SerializeOptions {
  /** Spaces of indentation; omit for compact output */
  indent?: number;
}

// Writing

/**
 * Rejects trees that could not be read back, such as a heading level outside
 * 1-6 built without the builders.
 */
export function toPayload(document: Document): DocumentPayload {
  return { schema_version: SCHEMA_VERSION, ...encodeNode(document, []), node_type: PAYLOAD_NODE_NAMES.document };
}

export function serializeDocument(document: Document, options: SerializeOptions = {}): string {
  return JSON.stringify(toPayload(document), null, options.indent);
}

function encodeNode(node: Record<string, unknown>, path: Path): Record<string, unknown> {
  if (node.type === "heading" && !isHeadingLevel(node.level)) {
    throw new ValidationError(
      "document",
      `Heading level must be an integer from 1 to 6, got ${String(node.level)}`,
      fieldName(at(path, "level"))
    );
  }
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (value === undefined) {
      continue;
    }
    if (key === "type" && typeof value === "string" && isNodeType(value)) {
      payload.node_type = PAYLOAD_NODE_NAMES[value];
    } else if (key === "metadata" || key === "sourceLocation") {
      payload[key] = value;
    } else {
      payload[key] = encodeValue(value, at(path, key));
    }
  }
  return payload;
}

function encodeValue(value: unknown, path: Path): unknown {
  if (Array.isArray(value)) {
    return value.map((entry, index) => encodeValue(entry, at(path, index)));
  }
  if (isPlainRecord(value)) {
    return encodeNode(value, path);
  }
  return value;
}

// Reading

type Path = (string | number)[];

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const sourceLocationSchema = z.object({
  format: z.string(),
  page: z.number().int().optional(),
  line: z.number().int().optional(),
  column: z.number().int().optional(),
  elementId: z.string().optional(),
});

const baseShape = {
  metadata: z.record(jsonValueSchema).optional(),
  sourceLocation: sourceLocationSchema.optional(),
};

const documentMetadataSchema = z
  .object({
    title: z.string().optional(),
    author: z.string().optional(),
    date: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    language: z.string().optional(),
    custom: z.record(jsonValueSchema).optional(),
  })
  .catchall(jsonValueSchema);

const nodeList = z.array(z.unknown());
const alignmentSchema = z.enum(["left", "center", "right"]);
const notationSchema = z.enum(["latex", "mathml", "html"]).default("latex");

const contentOnly = z.object({ ...baseShape, content: nodeList });
const childrenOnly = z.object({ ...baseShape, children: nodeList });
const literalOnly = z.object({ ...baseShape, content: z.string() });

const schemas = {
  document: z.object({
    children: nodeList,
    metadata: documentMetadataSchema.default({}),
    sourceLocation: sourceLocationSchema.optional(),
  }),
  heading: z.object({ ...baseShape, level: z.number().int().min(1).max(6), content: nodeList }),
  codeBlock: z.object({ ...baseShape, content: z.string(), language: z.string().optional() }),
  list: z.object({
    ...baseShape,
    ordered: z.boolean(),
    start: z.number().int().default(1),
    tight: z.boolean().default(true),
    items: nodeList,
  }),
  listItem: z.object({ ...baseShape, children: nodeList, taskStatus: z.enum(["checked", "unchecked"]).optional() }),
  table: z.object({
    ...baseShape,
    header: z.unknown().optional(),
    rows: nodeList,
    alignments: z.array(alignmentSchema.nullable()).default([]),
    caption: z.string().optional(),
  }),
  tableRow: z.object({ ...baseShape, cells: nodeList, isHeader: z.boolean().default(false) }),
  tableCell: z.object({
    ...baseShape,
    content: nodeList,
    colspan: z.number().int().positive().default(1),
    rowspan: z.number().int().positive().default(1),
    alignment: alignmentSchema.optional(),
  }),
  thematicBreak: z.object(baseShape),
  math: z.object({ ...baseShape, content: z.string(), notation: notationSchema }),
  definitionList: z.object({
    ...baseShape,
    items: z.array(z.object({ term: z.unknown(), descriptions: nodeList })),
  }),
  footnoteDefinition: z.object({ ...baseShape, identifier: z.string(), children: nodeList }),
  link: z.object({ ...baseShape, url: z.string(), title: z.string().optional(), content: nodeList }),
  image: z.object({
    ...baseShape,
    url: z.string(),
    altText: z.string().default(""),
    title: z.string().optional(),
    width: z.number().int().nonnegative().optional(),
    height: z.number().int().nonnegative().optional(),
  }),
  lineBreak: z.object({ ...baseShape, soft: z.boolean().default(false) }),
  footnoteReference: z.object({ ...baseShape, identifier: z.string() }),
};

function at(path: Path, ...segments: (string | number)[]): Path {
  return [...path, ...segments];
}

function fieldName(path: Path): string {
  return path.length > 0 ? path.join(".") : "(root)";
}

function parseFields<S extends z.ZodTypeAny>(schema: S, raw: Record<string, unknown>, path: Path): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = fieldName(at(path, ...(issue ? issue.path : [])));
    throw new ParsingError(`Invalid field ${field}: ${issue ? issue.message : result.error.message}`, field);
  }
  return result.data;
}

type BaseFields = { metadata?: NodeMetadata; sourceLocation?: SourceLocation };

function base(data: z.output<z.ZodObject<typeof baseShape>>): BaseFields {
  const fields: BaseFields = {};
  if (data.metadata !== undefined) {
    fields.metadata = data.metadata;
  }
  if (data.sourceLocation !== undefined) {
    fields.sourceLocation = data.sourceLocation;
  }
  return fields;
}

function decodeList(values: unknown[], path: Path): Node[] {
  return values.map((value, index) => decodeNode(value, at(path, index)));
}

function decodeSlot<K extends NodeType>(values: unknown[], path: Path, type: K): NodeMap[K][] {
  return values.map((value, index) => decodeVariant(value, at(path, index), type));
}

function decodeVariant<K extends NodeType>(value: unknown, path: Path, type: K): NodeMap[K] {
  const node = decodeNode(value, path);
  if (!isNodeOfType(node, type)) {
    const field = fieldName(at(path, "node_type"));
    throw new ParsingError(
      `Expected ${PAYLOAD_NODE_NAMES[type]} at ${fieldName(path)}, got ${PAYLOAD_NODE_NAMES[node.type]}`,
      field
    );
  }
  return node;
}

type Decoders = { [K in NodeType]: (raw: Record<string, unknown>, path: Path) => NodeMap[K] };

const decoders: Decoders = {
  document: (raw, path) => {
    const data = parseFields(schemas.document, raw, path);
    const metadata: DocumentMetadata = data.metadata;
    const node: Document = { type: "document", children: decodeList(data.children, at(path, "children")), metadata };
    if (data.sourceLocation !== undefined) {
      node.sourceLocation = data.sourceLocation;
    }
    return node;
  },
  heading: (raw, path) => {
    const data = parseFields(schemas.heading, raw, path);
    return { type: "heading", level: data.level, content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  paragraph: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "paragraph", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  codeBlock: (raw, path) => {
    const data = parseFields(schemas.codeBlock, raw, path);
    const node: NodeMap["codeBlock"] = { type: "codeBlock", content: data.content, ...base(data) };
    if (data.language !== undefined) {
      node.language = data.language;
    }
    return node;
  },
  blockQuote: (raw, path) => {
    const data = parseFields(childrenOnly, raw, path);
    return { type: "blockQuote", children: decodeList(data.children, at(path, "children")), ...base(data) };
  },
  list: (raw, path) => {
    const data = parseFields(schemas.list, raw, path);
    return {
      type: "list",
      ordered: data.ordered,
      start: data.start,
      tight: data.tight,
      items: decodeSlot(data.items, at(path, "items"), "listItem"),
      ...base(data),
    };
  },
  listItem: (raw, path) => {
    const data = parseFields(schemas.listItem, raw, path);
    const node: NodeMap["listItem"] = {
      type: "listItem",
      children: decodeList(data.children, at(path, "children")),
      ...base(data),
    };
    if (data.taskStatus !== undefined) {
      node.taskStatus = data.taskStatus;
    }
    return node;
  },
  table: (raw, path) => {
    const data = parseFields(schemas.table, raw, path);
    const node: NodeMap["table"] = {
      type: "table",
      rows: decodeSlot(data.rows, at(path, "rows"), "tableRow"),
      alignments: data.alignments,
      ...base(data),
    };
    if (data.header !== undefined && data.header !== null) {
      node.header = decodeVariant(data.header, at(path, "header"), "tableRow");
    }
    if (data.caption !== undefined) {
      node.caption = data.caption;
    }
    return node;
  },
  tableRow: (raw, path) => {
    const data = parseFields(schemas.tableRow, raw, path);
    return {
      type: "tableRow",
      cells: decodeSlot(data.cells, at(path, "cells"), "tableCell"),
      isHeader: data.isHeader,
      ...base(data),
    };
  },
  tableCell: (raw, path) => {
    const data = parseFields(schemas.tableCell, raw, path);
    const node: NodeMap["tableCell"] = {
      type: "tableCell",
      content: decodeList(data.content, at(path, "content")),
      colspan: data.colspan,
      rowspan: data.rowspan,
      ...base(data),
    };
    if (data.alignment !== undefined) {
      node.alignment = data.alignment;
    }
    return node;
  },
  thematicBreak: (raw, path) => ({ type: "thematicBreak", ...base(parseFields(schemas.thematicBreak, raw, path)) }),
  htmlBlock: (raw, path) => {
    const data = parseFields(literalOnly, raw, path);
    return { type: "htmlBlock", content: data.content, ...base(data) };
  },
  mathBlock: (raw, path) => {
    const data = parseFields(schemas.math, raw, path);
    return { type: "mathBlock", content: data.content, notation: data.notation, ...base(data) };
  },
  definitionList: (raw, path) => {
    const data = parseFields(schemas.definitionList, raw, path);
    return {
      type: "definitionList",
      items: data.items.map((item, index) => ({
        term: decodeVariant(item.term, at(path, "items", index, "term"), "definitionTerm"),
        descriptions: decodeSlot(
          item.descriptions,
          at(path, "items", index, "descriptions"),
          "definitionDescription"
        ),
      })),
      ...base(data),
    };
  },
  definitionTerm: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "definitionTerm", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  definitionDescription: (raw, path) => {
    const data = parseFields(childrenOnly, raw, path);
    return { type: "definitionDescription", children: decodeList(data.children, at(path, "children")), ...base(data) };
  },
  footnoteDefinition: (raw, path) => {
    const data = parseFields(schemas.footnoteDefinition, raw, path);
    return {
      type: "footnoteDefinition",
      identifier: data.identifier,
      children: decodeList(data.children, at(path, "children")),
      ...base(data),
    };
  },
  text: (raw, path) => {
    const data = parseFields(literalOnly, raw, path);
    return { type: "text", content: data.content, ...base(data) };
  },
  strong: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "strong", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  emphasis: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "emphasis", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  code: (raw, path) => {
    const data = parseFields(literalOnly, raw, path);
    return { type: "code", content: data.content, ...base(data) };
  },
  link: (raw, path) => {
    const data = parseFields(schemas.link, raw, path);
    const node: NodeMap["link"] = {
      type: "link",
      url: data.url,
      content: decodeList(data.content, at(path, "content")),
      ...base(data),
    };
    if (data.title !== undefined) {
      node.title = data.title;
    }
    return node;
  },
  image: (raw, path) => {
    const data = parseFields(schemas.image, raw, path);
    const node: NodeMap["image"] = { type: "image", url: data.url, altText: data.altText, ...base(data) };
    if (data.title !== undefined) {
      node.title = data.title;
    }
    if (data.width !== undefined) {
      node.width = data.width;
    }
    if (data.height !== undefined) {
      node.height = data.height;
    }
    return node;
  },
  lineBreak: (raw, path) => {
    const data = parseFields(schemas.lineBreak, raw, path);
    return { type: "lineBreak", soft: data.soft, ...base(data) };
  },
  strikethrough: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "strikethrough", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  underline: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "underline", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  superscript: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "superscript", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  subscript: (raw, path) => {
    const data = parseFields(contentOnly, raw, path);
    return { type: "subscript", content: decodeList(data.content, at(path, "content")), ...base(data) };
  },
  htmlInline: (raw, path) => {
    const data = parseFields(literalOnly, raw, path);
    return { type: "htmlInline", content: data.content, ...base(data) };
  },
  mathInline: (raw, path) => {
    const data = parseFields(schemas.math, raw, path);
    return { type: "mathInline", content: data.content, notation: data.notation, ...base(data) };
  },
  footnoteReference: (raw, path) => {
    const data = parseFields(schemas.footnoteReference, raw, path);
    return { type: "footnoteReference", identifier: data.identifier, ...base(data) };
  },
};

function lookupNodeType(name: string): NodeType | undefined {
  return NODE_TYPES.find((type) => PAYLOAD_NODE_NAMES[type] === name);
}

function decodeNode(value: unknown, path: Path): Node {
  if (!isPlainRecord(value)) {
    throw new ParsingError(`Expected a node object at ${fieldName(path)}`, fieldName(path));
  }
  const name = value.node_type;
  if (typeof name !== "string") {
    const field = fieldName(at(path, "node_type"));
    throw new ParsingError(`Missing node_type at ${field}`, field);
  }
  const type = lookupNodeType(name);
  if (!type) {
    const field = fieldName(at(path, "node_type"));
    throw new ParsingError(`Unknown node_type '${name}' at ${field}`, field);
  }
  return decoders[type](value, path);
}

export function fromPayload(payload: unknown): Document {
  if (!isPlainRecord(payload)) {
    throw new ParsingError("Serialized document must be a JSON object");
  }
  const version = payload.schema_version;
  if (version === undefined) {
    throw new ParsingError("Serialized document has no schema_version", "schema_version");
  }
  if (version !== SCHEMA_VERSION) {
    throw new ParsingError(
      `Unsupported schema_version ${JSON.stringify(version)}; expected ${SCHEMA_VERSION}`,
      "schema_version"
    );
  }
  if (payload.node_type !== PAYLOAD_NODE_NAMES.document) {
    throw new ParsingError(
      `Root node must be a Document, got ${JSON.stringify(payload.node_type ?? null)}`,
      "node_type"
    );
  }
  return decodeVariant(payload, [], "document");
}

export function deserializeDocument(json: string): Document {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    throw new ParsingError("Serialized document is not valid JSON", undefined, { cause: error });
  }
  return fromPayload(payload);
}
