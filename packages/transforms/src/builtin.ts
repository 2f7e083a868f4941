/**
 * Built-in Transforms
 *
 * AST -> AST transforms registered by TransformRegistry.initialize(). Each
 * returns a new document and leaves its input untouched.
 */

import {
  type Document,
  type Heading,
  type ListItem,
  type MapHandlers,
  type Node,
  findNodes,
  heading,
  isNodeType,
  link,
  list,
  listItem,
  mapTree,
  paragraph,
  text,
} from "@docweave/ast";
import {
  type TransformMetadata,
  type Transformer,
  defineTransform,
  readNumber,
  readString,
  readStringList,
} from "./metadata";

// ============================================================================
// Helpers
// ============================================================================

/** Concatenated content of every text node below the given nodes */
function plainText(nodes: readonly Node[]): string {
  return nodes.map((node) => findNodes(node, "text").map((leaf) => leaf.content).join("")).join("");
}

function isValidRegExp(source: string): boolean | string {
  try {
    new RegExp(source);
    return true;
  } catch (error) {
    return error instanceof Error ? error.message : `invalid regular expression ${source}`;
  }
}

function trimChars(value: string, chars: string): string {
  if (!chars) {
    return value;
  }
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value.charAt(start))) {
    start++;
  }
  while (end > start && chars.includes(value.charAt(end - 1))) {
    end--;
  }
  return value.slice(start, end);
}

// ============================================================================
// Content removal
// ============================================================================

export class RemoveImagesTransform implements Transformer {
  transform(document: Document): Document {
    return mapTree(document, { image: () => null });
  }
}

export class RemoveNodesTransform implements Transformer {
  private readonly handlers: MapHandlers = {};

  constructor(nodeTypes: readonly string[]) {
    for (const type of nodeTypes) {
      if (isNodeType(type)) {
        this.handlers[type] = () => null;
      }
    }
  }

  transform(document: Document): Document {
    return mapTree(document, this.handlers);
  }
}

export const DEFAULT_BOILERPLATE_PATTERNS: readonly string[] = [
  "^CONFIDENTIAL$",
  "^Page \\d+ of \\d+$",
  "^Internal Use Only$",
  "^\\[DRAFT\\]$",
  "^Copyright \\d{4}",
  "^Printed on \\d{4}-\\d{2}-\\d{2}$",
];

/**
 * Drops paragraphs whose trimmed text matches one of the patterns
 * (case-insensitive).
 */
export class RemoveBoilerplateTransform implements Transformer {
  private readonly patterns: RegExp[];

  constructor(patterns: readonly string[] = DEFAULT_BOILERPLATE_PATTERNS) {
    this.patterns = patterns.map((pattern) => new RegExp(pattern, "i"));
  }

  transform(document: Document): Document {
    return mapTree(document, {
      paragraph: (node) => {
        const content = plainText(node.content).trim();
        return this.patterns.some((pattern) => pattern.test(content)) ? null : undefined;
      },
    });
  }
}

// ============================================================================
// Rewriting
// ============================================================================

export class HeadingOffsetTransform implements Transformer {
  constructor(private readonly offset: number) {}

  transform(document: Document): Document {
    return mapTree(document, {
      heading: (node) => ({ ...node, level: Math.min(6, Math.max(1, node.level + this.offset)) }),
    });
  }
}

/**
 * Rewrites link URLs with a regular expression. The replacement uses
 * String.prototype.replace syntax ($1, $<name>).
 */
export class LinkRewriterTransform implements Transformer {
  private readonly pattern: RegExp;

  constructor(
    pattern: string,
    private readonly replacement: string
  ) {
    this.pattern = new RegExp(pattern, "g");
  }

  transform(document: Document): Document {
    return mapTree(document, {
      link: (node) => ({ ...node, url: node.url.replace(this.pattern, this.replacement) }),
    });
  }
}

export class TextReplacerTransform implements Transformer {
  constructor(
    private readonly find: string,
    private readonly replace: string
  ) {}

  transform(document: Document): Document {
    return mapTree(document, {
      text: (node) => ({ ...node, content: node.content.split(this.find).join(this.replace) }),
    });
  }
}

// ============================================================================
// Headings
// ============================================================================

export function slugify(value: string, separator = "-"): string {
  const slug = value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/[\s_]+/g, separator);
  return trimChars(slug, separator) || "heading";
}

/**
 * Stores a slug of each heading's text in `metadata.id`. A slug already in use
 * gets a counter suffix starting at 2; ids within one document are unique.
 */
export class AddHeadingIdsTransform implements Transformer {
  constructor(
    private readonly idPrefix = "",
    private readonly separator = "-"
  ) {}

  transform(document: Document): Document {
    const used = new Set<string>();
    const nextSuffix = new Map<string, number>();
    return mapTree(document, {
      heading: (node) => {
        const base = slugify(plainText(node.content), this.separator);
        let slug = base;
        let suffix = nextSuffix.get(base) ?? 2;
        while (used.has(slug)) {
          slug = `${base}${this.separator}${suffix}`;
          suffix++;
        }
        used.add(slug);
        nextSuffix.set(base, suffix);
        return { ...node, metadata: { ...node.metadata, id: `${this.idPrefix}${slug}` } };
      },
    });
  }
}

type TocEntry = {
  level: number;
  label: string;
  id?: string;
  children: TocEntry[];
};

export type TocPosition = "top" | "bottom";

/**
 * Builds a nested list of the document's headings, linking entries to
 * heading ids where present.
 */
export class GenerateTocTransform implements Transformer {
  constructor(
    private readonly title = "Table of Contents",
    private readonly maxDepth = 3,
    private readonly position: TocPosition = "top"
  ) {}

  transform(document: Document): Document {
    const headings = document.children.filter(
      (child): child is Heading => child.type === "heading" && child.level <= this.maxDepth
    );
    if (headings.length === 0) {
      return document;
    }

    const roots: TocEntry[] = [];
    const stack: TocEntry[] = [];
    for (const node of headings) {
      const id = node.metadata?.id;
      const entry: TocEntry = {
        level: node.level,
        label: plainText(node.content),
        id: typeof id === "string" ? id : undefined,
        children: [],
      };
      while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= entry.level) {
        stack.pop();
      }
      const parent = stack[stack.length - 1];
      if (parent) {
        parent.children.push(entry);
      } else {
        roots.push(entry);
      }
      stack.push(entry);
    }

    const toc: Node[] = [heading(2, this.title), list(roots.map(toListItem))];
    const children =
      this.position === "top" ? [...toc, ...document.children] : [...document.children, ...toc];
    return { ...document, children };
  }
}

function toListItem(entry: TocEntry): ListItem {
  const label = entry.id ? link(`#${entry.id}`, entry.label) : text(entry.label);
  const children: Node[] = [paragraph([label])];
  if (entry.children.length > 0) {
    children.push(list(entry.children.map(toListItem)));
  }
  return listItem(children);
}

// ============================================================================
// Metadata
// ============================================================================

export type TimestampFormat = "iso" | "unix";

export class AddConversionTimestampTransform implements Transformer {
  constructor(
    private readonly fieldName = "conversion_timestamp",
    private readonly format: TimestampFormat = "iso"
  ) {}

  transform(document: Document): Document {
    const now = new Date();
    const timestamp = this.format === "unix" ? String(Math.floor(now.getTime() / 1000)) : now.toISOString();
    return { ...document, metadata: { ...document.metadata, [this.fieldName]: timestamp } };
  }
}

/**
 * Counts whitespace-separated words and characters over all text nodes,
 * joined by single spaces.
 */
export class CalculateWordCountTransform implements Transformer {
  constructor(
    private readonly wordField = "word_count",
    private readonly charField = "char_count"
  ) {}

  transform(document: Document): Document {
    const content = findNodes(document, "text")
      .map((node) => node.content)
      .join(" ");
    const words = content.split(/\s+/).filter(Boolean).length;
    return {
      ...document,
      metadata: { ...document.metadata, [this.wordField]: words, [this.charField]: content.length },
    };
  }
}

// ============================================================================
// Registration
// ============================================================================

export const BUILTIN_TRANSFORMS: readonly TransformMetadata[] = [
  defineTransform({
    name: "remove-images",
    description: "Remove every image node",
    tags: ["cleanup", "images"],
    create: () => new RemoveImagesTransform(),
  }),
  defineTransform({
    name: "remove-nodes",
    description: "Remove nodes of the given types",
    tags: ["cleanup"],
    parameters: {
      nodeTypes: {
        type: "list",
        elementType: "string",
        required: true,
        help: "Node types to remove, e.g. image, table",
        validate: (value) => {
          const types = Array.isArray(value) ? value : [value];
          for (const type of types) {
            if (typeof type !== "string" || !isNodeType(type)) {
              return `unknown node type ${JSON.stringify(type)}`;
            }
            if (type === "document") {
              return "the document root cannot be removed";
            }
          }
          return true;
        },
      },
    },
    create: (params) => new RemoveNodesTransform(readStringList(params, "nodeTypes")),
  }),
  defineTransform({
    name: "heading-offset",
    description: "Shift heading levels, clamped to 1-6",
    tags: ["headings"],
    parameters: {
      offset: { type: "integer", default: 1, help: "Levels to add (negative to promote)" },
    },
    create: (params) => new HeadingOffsetTransform(readNumber(params, "offset")),
  }),
  defineTransform({
    name: "link-rewriter",
    description: "Rewrite link URLs with a regular expression",
    tags: ["links"],
    parameters: {
      pattern: {
        type: "string",
        required: true,
        help: "Regular expression matched against each URL",
        validate: (value) => (typeof value === "string" ? isValidRegExp(value) : "must be a string"),
      },
      replacement: { type: "string", required: true, help: "Replacement, may reference groups as $1" },
    },
    create: (params) => new LinkRewriterTransform(readString(params, "pattern"), readString(params, "replacement")),
  }),
  defineTransform({
    name: "text-replacer",
    description: "Replace literal text in text nodes",
    tags: ["text"],
    parameters: {
      find: {
        type: "string",
        required: true,
        validate: (value) => value !== "" || "must not be empty",
      },
      replace: { type: "string", required: true },
    },
    create: (params) => new TextReplacerTransform(readString(params, "find"), readString(params, "replace")),
  }),
  defineTransform({
    name: "add-heading-ids",
    description: "Add slug ids to heading metadata",
    tags: ["headings", "metadata"],
    parameters: {
      idPrefix: { type: "string", default: "" },
      separator: { type: "string", default: "-" },
    },
    create: (params) => new AddHeadingIdsTransform(readString(params, "idPrefix"), readString(params, "separator")),
  }),
  defineTransform({
    name: "remove-boilerplate",
    description: "Remove paragraphs that match boilerplate patterns",
    tags: ["cleanup"],
    parameters: {
      patterns: {
        type: "list",
        elementType: "string",
        default: DEFAULT_BOILERPLATE_PATTERNS,
        validate: (value) => {
          const patterns = Array.isArray(value) ? value : [value];
          for (const pattern of patterns) {
            const verdict = isValidRegExp(String(pattern));
            if (verdict !== true) {
              return verdict;
            }
          }
          return true;
        },
      },
    },
    create: (params) => new RemoveBoilerplateTransform(readStringList(params, "patterns")),
  }),
  defineTransform({
    name: "add-conversion-timestamp",
    description: "Record the conversion time in document metadata",
    tags: ["metadata"],
    priority: 200,
    parameters: {
      fieldName: { type: "string", default: "conversion_timestamp" },
      format: { type: "string", default: "iso", choices: ["iso", "unix"] },
    },
    create: (params) =>
      new AddConversionTimestampTransform(
        readString(params, "fieldName"),
        readString(params, "format") === "unix" ? "unix" : "iso"
      ),
  }),
  defineTransform({
    name: "calculate-word-count",
    description: "Record word and character counts in document metadata",
    tags: ["metadata"],
    priority: 200,
    parameters: {
      wordField: { type: "string", default: "word_count" },
      charField: { type: "string", default: "char_count" },
    },
    create: (params) =>
      new CalculateWordCountTransform(readString(params, "wordField"), readString(params, "charField")),
  }),
  defineTransform({
    name: "generate-toc",
    description: "Insert a table of contents built from top-level headings",
    tags: ["headings", "navigation"],
    dependencies: ["add-heading-ids"],
    priority: 150,
    parameters: {
      title: { type: "string", default: "Table of Contents" },
      maxDepth: {
        type: "integer",
        default: 3,
        validate: (value) => (typeof value === "number" && value >= 1 && value <= 6) || "must be between 1 and 6",
      },
      position: { type: "string", default: "top", choices: ["top", "bottom"] },
    },
    create: (params) =>
      new GenerateTocTransform(
        readString(params, "title"),
        readNumber(params, "maxDepth"),
        readString(params, "position") === "bottom" ? "bottom" : "top"
      ),
  }),
];
