/**
 * @docweave/ast
 *
 * Document tree every parser produces and every renderer consumes.
 */

export * from "./builders";
export type {
  Alignment,
  BlockNode,
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
  InlineNode,
  JsonValue,
  LineBreak,
  Link,
  List,
  ListItem,
  MathBlock,
  MathInline,
  MathNotation,
  Node,
  NodeMap,
  NodeMetadata,
  NodeType,
  Paragraph,
  SourceLocation,
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
export { NODE_TYPES, isHeadingLevel, isNodeOfType, isNodeType } from "./nodes";
export {
  PAYLOAD_NODE_NAMES,
  SCHEMA_VERSION,
  deserializeDocument,
  fromPayload,
  serializeDocument,
  toPayload,
} from "./serialization";
export type { DocumentPayload, SerializeOptions } from "./serialization";
export {
  childNodes,
  collectNodes,
  countNodes,
  findNodes,
  mapTree,
  nodeTypeSequence,
  textContent,
  walk,
} from "./visitor";
export type { MapHandlers, NodeHandlers, Visitor, WalkContext } from "./visitor";
