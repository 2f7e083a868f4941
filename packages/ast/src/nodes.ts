/**
 * Document AST
 *
 * Closed tagged union of every node a parser may produce. Container slots that
 * hold arbitrary content are typed as Node[]; structural slots (list items,
 * table rows and cells, definition items) only take their own variant.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type NodeMetadata = Record<string, JsonValue>;

export type SourceLocation = {
  format: string;
  page?: number;
  line?: number;
  column?: number;
  elementId?: string;
};

type NodeBase = {
  metadata?: NodeMetadata;
  sourceLocation?: SourceLocation;
};

export type Alignment = "left" | "center" | "right";
export type TaskStatus = "checked" | "unchecked";
export type MathNotation = "latex" | "mathml" | "html";

export type DocumentMetadata = {
  title?: string;
  author?: string;
  date?: string;
  keywords?: string[];
  language?: string;
  custom?: Record<string, JsonValue>;
  [key: string]: JsonValue | undefined;
};

// Block nodes

export type Document = {
  type: "document";
  children: Node[];
  metadata: DocumentMetadata;
  sourceLocation?: SourceLocation;
};

export type Heading = NodeBase & { type: "heading"; level: number; content: Node[] };
export type Paragraph = NodeBase & { type: "paragraph"; content: Node[] };
export type CodeBlock = NodeBase & { type: "codeBlock"; content: string; language?: string };
export type BlockQuote = NodeBase & { type: "blockQuote"; children: Node[] };

export type List = NodeBase & {
  type: "list";
  ordered: boolean;
  start: number;
  tight: boolean;
  items: ListItem[];
};

export type ListItem = NodeBase & { type: "listItem"; children: Node[]; taskStatus?: TaskStatus };

export type Table = NodeBase & {
  type: "table";
  header?: TableRow;
  rows: TableRow[];
  alignments: (Alignment | null)[];
  caption?: string;
};

export type TableRow = NodeBase & { type: "tableRow"; cells: TableCell[]; isHeader: boolean };

export type TableCell = NodeBase & {
  type: "tableCell";
  content: Node[];
  colspan: number;
  rowspan: number;
  alignment?: Alignment;
};

export type ThematicBreak = NodeBase & { type: "thematicBreak" };
export type HtmlBlock = NodeBase & { type: "htmlBlock"; content: string };
export type MathBlock = NodeBase & { type: "mathBlock"; content: string; notation: MathNotation };

export type DefinitionItem = {
  term: DefinitionTerm;
  descriptions: DefinitionDescription[];
};

export type DefinitionList = NodeBase & { type: "definitionList"; items: DefinitionItem[] };
export type DefinitionTerm = NodeBase & { type: "definitionTerm"; content: Node[] };
export type DefinitionDescription = NodeBase & { type: "definitionDescription"; children: Node[] };

export type FootnoteDefinition = NodeBase & {
  type: "footnoteDefinition";
  identifier: string;
  children: Node[];
};

// Inline nodes

export type Text = NodeBase & { type: "text"; content: string };
export type Strong = NodeBase & { type: "strong"; content: Node[] };
export type Emphasis = NodeBase & { type: "emphasis"; content: Node[] };
export type Code = NodeBase & { type: "code"; content: string };
export type Link = NodeBase & { type: "link"; url: string; title?: string; content: Node[] };

export type Image = NodeBase & {
  type: "image";
  url: string;
  altText: string;
  title?: string;
  width?: number;
  height?: number;
};

export type LineBreak = NodeBase & { type: "lineBreak"; soft: boolean };
export type Strikethrough = NodeBase & { type: "strikethrough"; content: Node[] };
export type Underline = NodeBase & { type: "underline"; content: Node[] };
export type Superscript = NodeBase & { type: "superscript"; content: Node[] };
export type Subscript = NodeBase & { type: "subscript"; content: Node[] };
export type HtmlInline = NodeBase & { type: "htmlInline"; content: string };
export type MathInline = NodeBase & { type: "mathInline"; content: string; notation: MathNotation };
export type FootnoteReference = NodeBase & { type: "footnoteReference"; identifier: string };

export type BlockNode =
  | Document
  | Heading
  | Paragraph
  | CodeBlock
  | BlockQuote
  | List
  | ListItem
  | Table
  | TableRow
  | TableCell
  | ThematicBreak
  | HtmlBlock
  | MathBlock
  | DefinitionList
  | DefinitionTerm
  | DefinitionDescription
  | FootnoteDefinition;

export type InlineNode =
  | Text
  | Strong
  | Emphasis
  | Code
  | Link
  | Image
  | LineBreak
  | Strikethrough
  | Underline
  | Superscript
  | Subscript
  | HtmlInline
  | MathInline
  | FootnoteReference;

export type Node = BlockNode | InlineNode;

export type NodeType = Node["type"];

/** Variant lookup by discriminant. */
export type NodeMap = { [K in NodeType]: Extract<Node, { type: K }> };

export const NODE_TYPES = [
  "document",
  "heading",
  "paragraph",
  "codeBlock",
  "blockQuote",
  "list",
  "listItem",
  "table",
  "tableRow",
  "tableCell",
  "thematicBreak",
  "htmlBlock",
  "mathBlock",
  "definitionList",
  "definitionTerm",
  "definitionDescription",
  "footnoteDefinition",
  "text",
  "strong",
  "emphasis",
  "code",
  "link",
  "image",
  "lineBreak",
  "strikethrough",
  "underline",
  "superscript",
  "subscript",
  "htmlInline",
  "mathInline",
  "footnoteReference",
] as const satisfies readonly NodeType[];

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.some((type) => type === value);
}

export function isNodeOfType<K extends NodeType>(node: Node, type: K): node is NodeMap[K] {
  return node.type === type;
}

/** Heading levels run from 1 to 6 */
export function isHeadingLevel(level: unknown): level is number {
  return typeof level === "number" && Number.isInteger(level) && level >= 1 && level <= 6;
}
