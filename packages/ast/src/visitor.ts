/**
 * Tree traversal and rebuilding.
 *
 * Handler maps are keyed by node type, so callers only name the variants they
 * care about; childNodes is the single exhaustive switch over the union.
 */

import { ValidationError, assertNever } from "@docweave/shared";
import type { DefinitionItem, Document, Node, NodeMap, NodeType, TableRow } from "./nodes";
import { isNodeOfType } from "./nodes";

export interface WalkContext {
  parent: Node | null;
  depth: number;
}

export type NodeHandlers<R> = {
  [K in NodeType]?: (node: NodeMap[K], context: WalkContext) => R;
};

/**
 * Returning false from a handler skips the node's descendants.
 */
export type Visitor = NodeHandlers<boolean | void> & {
  enter?: (node: Node, context: WalkContext) => boolean | void;
};

export function childNodes(node: Node): Node[] {
  switch (node.type) {
    case "document":
    case "blockQuote":
    case "listItem":
    case "definitionDescription":
    case "footnoteDefinition":
      return node.children;
    case "heading":
    case "paragraph":
    case "tableCell":
    case "definitionTerm":
    case "strong":
    case "emphasis":
    case "link":
    case "strikethrough":
    case "underline":
    case "superscript":
    case "subscript":
      return node.content;
    case "list":
      return node.items;
    case "table":
      return node.header ? [node.header, ...node.rows] : node.rows;
    case "tableRow":
      return node.cells;
    case "definitionList":
      return node.items.flatMap((item) => [item.term, ...item.descriptions]);
    case "codeBlock":
    case "thematicBreak":
    case "htmlBlock":
    case "mathBlock":
    case "text":
    case "code":
    case "image":
    case "lineBreak":
    case "htmlInline":
    case "mathInline":
    case "footnoteReference":
      return [];
    default:
      return assertNever(node, "node type");
  }
}

function invoke<K extends NodeType, R>(
  handlers: NodeHandlers<R>,
  type: K,
  node: NodeMap[K],
  context: WalkContext
): R | undefined {
  const handler = handlers[type];
  return handler ? handler(node, context) : undefined;
}

/**
 * Depth-first pre-order traversal. The type-specific handler runs when one is
 * registered, otherwise `enter`.
 */
export function walk(root: Node, visitor: Visitor): void {
  const visit = (node: Node, context: WalkContext): void => {
    const result = visitor[node.type]
      ? invoke(visitor, node.type, node, context)
      : visitor.enter?.(node, context);
    if (result === false) {
      return;
    }
    const childContext: WalkContext = { parent: node, depth: context.depth + 1 };
    for (const child of childNodes(node)) {
      visit(child, childContext);
    }
  };
  visit(root, { parent: null, depth: 0 });
}

/**
 * A handler returns a replacement node, null to remove the node, or undefined
 * to keep the rebuilt node.
 */
export type MapHandlers = NodeHandlers<Node | null | undefined>;

/**
 * Rebuild the tree bottom-up without touching the input.
 */
export function mapTree(root: Document, handlers: MapHandlers): Document {
  const mapped = mapNode(root, handlers, { parent: null, depth: 0 });
  if (!mapped || mapped.type !== "document") {
    throw new ValidationError("ast", "The root of a mapped tree must remain a document", "root");
  }
  return mapped;
}

function mapNode(node: Node, handlers: MapHandlers, context: WalkContext): Node | null {
  const rebuilt = rebuildChildren(node, handlers, { parent: node, depth: context.depth + 1 });
  const replacement = invoke(handlers, rebuilt.type, rebuilt, context);
  return replacement === undefined ? rebuilt : replacement;
}

function rebuildChildren(node: Node, handlers: MapHandlers, context: WalkContext): Node {
  const mapList = (nodes: Node[]): Node[] => {
    const result: Node[] = [];
    for (const child of nodes) {
      const mapped = mapNode(child, handlers, context);
      if (mapped) {
        result.push(mapped);
      }
    }
    return result;
  };

  const mapSlot = <K extends NodeType>(nodes: NodeMap[K][], type: K, slot: string): NodeMap[K][] => {
    const result: NodeMap[K][] = [];
    for (const child of nodes) {
      const mapped = mapNode(child, handlers, context);
      if (mapped) {
        result.push(expectVariant(mapped, type, slot));
      }
    }
    return result;
  };

  switch (node.type) {
    case "document":
    case "blockQuote":
    case "listItem":
    case "definitionDescription":
    case "footnoteDefinition":
      return { ...node, children: mapList(node.children) };
    case "heading":
    case "paragraph":
    case "tableCell":
    case "definitionTerm":
    case "strong":
    case "emphasis":
    case "link":
    case "strikethrough":
    case "underline":
    case "superscript":
    case "subscript":
      return { ...node, content: mapList(node.content) };
    case "list":
      return { ...node, items: mapSlot(node.items, "listItem", "list.items") };
    case "table": {
      const { header, ...rest } = node;
      const rows = mapSlot(node.rows, "tableRow", "table.rows");
      const mappedHeader = header ? mapHeader(header, handlers, context) : null;
      return mappedHeader ? { ...rest, header: mappedHeader, rows } : { ...rest, rows };
    }
    case "tableRow":
      return { ...node, cells: mapSlot(node.cells, "tableCell", "tableRow.cells") };
    case "definitionList":
      return { ...node, items: mapDefinitionItems(node.items, handlers, context) };
    case "codeBlock":
    case "thematicBreak":
    case "htmlBlock":
    case "mathBlock":
    case "text":
    case "code":
    case "image":
    case "lineBreak":
    case "htmlInline":
    case "mathInline":
    case "footnoteReference":
      return { ...node };
    default:
      return assertNever(node, "node type");
  }
}

function mapHeader(header: TableRow, handlers: MapHandlers, context: WalkContext): TableRow | null {
  const mapped = mapNode(header, handlers, context);
  return mapped ? expectVariant(mapped, "tableRow", "table.header") : null;
}

function mapDefinitionItems(
  items: DefinitionItem[],
  handlers: MapHandlers,
  context: WalkContext
): DefinitionItem[] {
  const result: DefinitionItem[] = [];
  for (const item of items) {
    const term = mapNode(item.term, handlers, context);
    if (!term) {
      continue;
    }
    const descriptions: DefinitionItem["descriptions"] = [];
    for (const description of item.descriptions) {
      const mapped = mapNode(description, handlers, context);
      if (mapped) {
        descriptions.push(expectVariant(mapped, "definitionDescription", "definitionList.descriptions"));
      }
    }
    result.push({ term: expectVariant(term, "definitionTerm", "definitionList.term"), descriptions });
  }
  return result;
}

function expectVariant<K extends NodeType>(node: Node, type: K, slot: string): NodeMap[K] {
  if (isNodeOfType(node, type)) {
    return node;
  }
  throw new ValidationError("ast", `Slot ${slot} only accepts ${type} nodes, got ${node.type}`, slot);
}

// Query helpers

export function collectNodes(root: Node, predicate: (node: Node) => boolean = () => true): Node[] {
  const found: Node[] = [];
  walk(root, {
    enter: (node) => {
      if (predicate(node)) {
        found.push(node);
      }
    },
  });
  return found;
}

export function findNodes<K extends NodeType>(root: Node, type: K): NodeMap[K][] {
  const found: NodeMap[K][] = [];
  walk(root, {
    enter: (node) => {
      if (isNodeOfType(node, type)) {
        found.push(node);
      }
    },
  });
  return found;
}

/**
 * Concatenated text of every text-bearing leaf below the node.
 */
export function textContent(root: Node, separator = ""): string {
  const parts: string[] = [];
  walk(root, {
    enter: (node) => {
      switch (node.type) {
        case "text":
        case "code":
        case "codeBlock":
        case "mathInline":
        case "mathBlock":
          parts.push(node.content);
          break;
        default:
          break;
      }
    },
  });
  return parts.join(separator);
}

export function nodeTypeSequence(root: Node): NodeType[] {
  return collectNodes(root).map((node) => node.type);
}

export function countNodes(root: Node, type?: NodeType): number {
  return collectNodes(root, type ? (node) => node.type === type : undefined).length;
}
