/**
 * Node builders used by parsers and tests. Optional fields are only set when
 * a value is given so built trees compare equal to deserialized ones.
 */

import { ValidationError } from "@docweave/shared";
import type {
  Alignment,
  BlockQuote,
  Code,
  CodeBlock,
  DefinitionDescription,
  DefinitionItem,
  DefinitionList,
  DefinitionTerm,
  Document,
  DocumentMetadata,
  Emphasis,
  FootnoteDefinition,
  FootnoteReference,
  Heading,
  HtmlBlock,
  HtmlInline,
  Image,
  LineBreak,
  Link,
  List,
  ListItem,
  MathBlock,
  MathInline,
  MathNotation,
  Node,
  Paragraph,
  Strikethrough,
  Strong,
  Subscript,
  Superscript,
  Table,
  TableCell,
  TableRow,
  TaskStatus,
  Text,
  ThematicBreak,
  Underline,
} from "./nodes";
import { isHeadingLevel } from "./nodes";

type Content = Node[] | string;

function inline(content: Content): Node[] {
  return typeof content === "string" ? [text(content)] : content;
}

export function document(children: Node[] = [], metadata: DocumentMetadata = {}): Document {
  return { type: "document", children, metadata };
}

export function heading(level: number, content: Content): Heading {
  if (!isHeadingLevel(level)) {
    throw new ValidationError("heading", `Heading level must be an integer from 1 to 6, got ${level}`, "level");
  }
  return { type: "heading", level, content: inline(content) };
}

export function paragraph(content: Content): Paragraph {
  return { type: "paragraph", content: inline(content) };
}

export function codeBlock(content: string, language?: string): CodeBlock {
  return language === undefined ? { type: "codeBlock", content } : { type: "codeBlock", content, language };
}

export function blockQuote(children: Node[]): BlockQuote {
  return { type: "blockQuote", children };
}

export interface ListOptions {
  ordered?: boolean;
  start?: number;
  tight?: boolean;
}

export function list(items: ListItem[], options: ListOptions = {}): List {
  return {
    type: "list",
    ordered: options.ordered ?? false,
    start: options.start ?? 1,
    tight: options.tight ?? true,
    items,
  };
}

export function listItem(children: Node[], taskStatus?: TaskStatus): ListItem {
  return taskStatus === undefined
    ? { type: "listItem", children }
    : { type: "listItem", children, taskStatus };
}

export interface TableOptions {
  header?: TableRow;
  alignments?: (Alignment | null)[];
  caption?: string;
}

export function table(rows: TableRow[], options: TableOptions = {}): Table {
  const node: Table = { type: "table", rows, alignments: options.alignments ?? [] };
  if (options.header) {
    node.header = options.header;
  }
  if (options.caption !== undefined) {
    node.caption = options.caption;
  }
  return node;
}

export function tableRow(cells: TableCell[], isHeader = false): TableRow {
  return { type: "tableRow", cells, isHeader };
}

export interface TableCellOptions {
  colspan?: number;
  rowspan?: number;
  alignment?: Alignment;
}

export function tableCell(content: Content, options: TableCellOptions = {}): TableCell {
  const node: TableCell = {
    type: "tableCell",
    content: inline(content),
    colspan: options.colspan ?? 1,
    rowspan: options.rowspan ?? 1,
  };
  if (options.alignment) {
    node.alignment = options.alignment;
  }
  return node;
}

export function thematicBreak(): ThematicBreak {
  return { type: "thematicBreak" };
}

export function htmlBlock(content: string): HtmlBlock {
  return { type: "htmlBlock", content };
}

export function mathBlock(content: string, notation: MathNotation = "latex"): MathBlock {
  return { type: "mathBlock", content, notation };
}

export function definitionList(items: DefinitionItem[]): DefinitionList {
  return { type: "definitionList", items };
}

export function definitionItem(term: Content, descriptions: Node[][]): DefinitionItem {
  return {
    term: definitionTerm(term),
    descriptions: descriptions.map((children) => definitionDescription(children)),
  };
}

export function definitionTerm(content: Content): DefinitionTerm {
  return { type: "definitionTerm", content: inline(content) };
}

export function definitionDescription(children: Node[]): DefinitionDescription {
  return { type: "definitionDescription", children };
}

export function footnoteDefinition(identifier: string, children: Node[]): FootnoteDefinition {
  return { type: "footnoteDefinition", identifier, children };
}

export function text(content: string): Text {
  return { type: "text", content };
}

export function strong(content: Content): Strong {
  return { type: "strong", content: inline(content) };
}

export function emphasis(content: Content): Emphasis {
  return { type: "emphasis", content: inline(content) };
}

export function code(content: string): Code {
  return { type: "code", content };
}

export function link(url: string, content: Content, title?: string): Link {
  const node: Link = { type: "link", url, content: inline(content) };
  if (title !== undefined) {
    node.title = title;
  }
  return node;
}

export interface ImageOptions {
  title?: string;
  width?: number;
  height?: number;
}

export function image(url: string, altText = "", options: ImageOptions = {}): Image {
  const node: Image = { type: "image", url, altText };
  if (options.title !== undefined) {
    node.title = options.title;
  }
  if (options.width !== undefined) {
    node.width = options.width;
  }
  if (options.height !== undefined) {
    node.height = options.height;
  }
  return node;
}

export function lineBreak(soft = false): LineBreak {
  return { type: "lineBreak", soft };
}

export function strikethrough(content: Content): Strikethrough {
  return { type: "strikethrough", content: inline(content) };
}

export function underline(content: Content): Underline {
  return { type: "underline", content: inline(content) };
}

export function superscript(content: Content): Superscript {
  return { type: "superscript", content: inline(content) };
}

export function subscript(content: Content): Subscript {
  return { type: "subscript", content: inline(content) };
}

export function htmlInline(content: string): HtmlInline {
  return { type: "htmlInline", content };
}

export function mathInline(content: string, notation: MathNotation = "latex"): MathInline {
  return { type: "mathInline", content, notation };
}

export function footnoteReference(identifier: string): FootnoteReference {
  return { type: "footnoteReference", identifier };
}
