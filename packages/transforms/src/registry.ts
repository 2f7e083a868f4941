/**
 * Transform Registry
 *
 * Holds transform metadata by name, instantiates transformers from validated
 * parameters and orders a requested set by its dependency closure.
 */

import { DependencyResolutionError, type RuntimeLogger, ValidationError, getLogger } from "@docweave/shared";
import { BUILTIN_TRANSFORMS } from "./builtin";
import { type TransformMetadata, type Transformer, validateMetadata, validateParams } from "./metadata";

// ============================================================================
// Types
// ============================================================================

export interface TransformRegistryOptions {
  logger?: RuntimeLogger;
  /** Transforms registered by initialize(); defaults to the built-in set */
  builtins?: readonly TransformMetadata[];
}

interface DependencyGraph {
  /** Transform names in discovery order */
  transforms: Set<string>;

  /** Adjacency list: transform -> dependencies */
  dependencies: Map<string, string[]>;

  /** Reverse adjacency: transform -> dependents */
  dependents: Map<string, Set<string>>;
}

// ============================================================================
// Transform Registry
// ============================================================================

export class TransformRegistry {
  private readonly transforms = new Map<string, TransformMetadata>();
  private readonly logger: RuntimeLogger;
  private readonly builtins: readonly TransformMetadata[];
  private initialized = false;

  constructor(options: TransformRegistryOptions = {}) {
    this.logger = options.logger ?? getLogger().child({ module: "transform-registry" });
    this.builtins = options.builtins ?? BUILTIN_TRANSFORMS;
  }

  /**
   * Register the built-in transforms. Later calls are no-ops.
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }
    for (const metadata of this.builtins) {
      this.register(metadata);
    }
    this.initialized = true;
    this.logger.debug("Transform registry initialized", { count: this.transforms.size });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  register(metadata: TransformMetadata): void {
    validateMetadata(metadata);
    if (this.transforms.has(metadata.name)) {
      this.logger.warn("Transform already registered; replacing", { transform: metadata.name });
    }
    this.transforms.set(metadata.name, metadata);
  }

  unregister(name: string): boolean {
    return this.transforms.delete(name);
  }

  has(name: string): boolean {
    return this.transforms.has(name);
  }

  getMetadata(name: string): TransformMetadata | undefined {
    return this.transforms.get(name);
  }

  /**
   * Validate parameters and create a transformer.
   */
  getTransform(name: string, params: Record<string, unknown> = {}): Transformer {
    const metadata = this.transforms.get(name);
    if (!metadata) {
      throw new ValidationError("transform", `Transform '${name}' is not registered`, "name");
    }
    return metadata.create(validateParams(metadata, params));
  }

  /**
   * Registered names, sorted. With tags, only transforms carrying at least one.
   */
  list(tags?: readonly string[]): string[] {
    const names: string[] = [];
    for (const metadata of this.transforms.values()) {
      if (!tags || tags.length === 0 || metadata.tags.some((tag) => tags.includes(tag))) {
        names.push(metadata.name);
      }
    }
    return names.sort();
  }

  clear(): void {
    this.transforms.clear();
    this.initialized = false;
  }

  // ==========================================================================
  // Dependency Resolution
  // ==========================================================================

  /**
   * Order the requested transforms and everything they depend on so that each
   * transform runs after its dependencies. Among transforms that are ready at
   * the same time, lower priority runs first, then registration order.
   */
  resolveDependencies(names: readonly string[]): string[] {
    const graph = this.buildDependencyGraph(names);

    const cycle = this.findCycle(graph);
    if (cycle) {
      const first = cycle[0] ?? "";
      throw new DependencyResolutionError(
        first,
        `Circular dependency between transforms: ${cycle.join(" -> ")}`,
        cycle
      );
    }

    return this.topologicalSort(graph);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private buildDependencyGraph(names: readonly string[]): DependencyGraph {
    const graph: DependencyGraph = {
      transforms: new Set(),
      dependencies: new Map(),
      dependents: new Map(),
    };

    const toProcess: Array<{ name: string; requiredBy?: string }> = names.map((name) => ({ name }));
    while (toProcess.length > 0) {
      const next = toProcess.shift();
      if (!next || graph.transforms.has(next.name)) {
        continue;
      }

      const metadata = this.transforms.get(next.name);
      if (!metadata) {
        const message = next.requiredBy
          ? `Transform '${next.requiredBy}' depends on '${next.name}', which is not registered`
          : `Transform '${next.name}' is not registered`;
        throw new DependencyResolutionError(next.name, message);
      }

      graph.transforms.add(next.name);
      graph.dependencies.set(next.name, [...metadata.dependencies]);

      for (const dependency of metadata.dependencies) {
        const dependents = graph.dependents.get(dependency) ?? new Set<string>();
        dependents.add(next.name);
        graph.dependents.set(dependency, dependents);

        if (!graph.transforms.has(dependency)) {
          toProcess.push({ name: dependency, requiredBy: next.name });
        }
      }
    }

    return graph;
  }

  private findCycle(graph: DependencyGraph): string[] | null {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const path: string[] = [];

    const dfs = (node: string): string[] | null => {
      visited.add(node);
      recursionStack.add(node);
      path.push(node);

      for (const dep of graph.dependencies.get(node) ?? []) {
        if (recursionStack.has(dep)) {
          return [...path.slice(path.indexOf(dep)), dep];
        }
        if (!visited.has(dep)) {
          const found = dfs(dep);
          if (found) {
            return found;
          }
        }
      }

      path.pop();
      recursionStack.delete(node);
      return null;
    };

    for (const transform of graph.transforms) {
      if (!visited.has(transform)) {
        const found = dfs(transform);
        if (found) {
          return found;
        }
      }
    }
    return null;
  }

  private topologicalSort(graph: DependencyGraph): string[] {
    const order = new Map<string, number>();
    for (const name of this.transforms.keys()) {
      order.set(name, order.size);
    }

    const remaining = new Map<string, number>();
    const ready: string[] = [];
    for (const transform of graph.transforms) {
      const count = new Set(graph.dependencies.get(transform)).size;
      remaining.set(transform, count);
      if (count === 0) {
        ready.push(transform);
      }
    }

    const rank = (name: string): [number, number] => [
      this.transforms.get(name)?.priority ?? 0,
      order.get(name) ?? Number.MAX_SAFE_INTEGER,
    ];
    const compare = (a: string, b: string): number => {
      const [priorityA, indexA] = rank(a);
      const [priorityB, indexB] = rank(b);
      return priorityA - priorityB || indexA - indexB;
    };

    const result: string[] = [];
    while (ready.length > 0) {
      ready.sort(compare);
      const node = ready.shift();
      if (node === undefined) {
        break;
      }
      result.push(node);

      for (const dependent of graph.dependents.get(node) ?? []) {
        const count = (remaining.get(dependent) ?? 1) - 1;
        remaining.set(dependent, count);
        if (count === 0) {
          ready.push(dependent);
        }
      }
    }

    return result;
  }
}
