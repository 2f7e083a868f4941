/**
 * Transform registry tests: registration, dependency ordering and parameter
 * validation at instantiation.
 */

import { document } from "@docweave/ast";
import { DependencyResolutionError, ValidationError, createRuntimeLogger } from "@docweave/shared";
import { describe, expect, it, vi } from "vitest";
import { BUILTIN_TRANSFORMS } from "../builtin";
import { type TransformParams, type Transformer, defineTransform } from "../metadata";
import { TransformRegistry } from "../registry";

const silentLogger = createRuntimeLogger({ level: "silent" });

function createFakeLogger() {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

const identity = (): Transformer => ({ transform: (doc) => doc });

function stub(name: string, dependencies: string[] = [], priority?: number, tags: string[] = []) {
  return defineTransform({ name, description: name, dependencies, priority, tags, create: identity });
}

function registryWith(...names: Array<ReturnType<typeof stub>>): TransformRegistry {
  const registry = new TransformRegistry({ logger: silentLogger, builtins: [] });
  for (const metadata of names) {
    registry.register(metadata);
  }
  return registry;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("TransformRegistry", () => {
  describe("registration", () => {
    it("replaces a duplicate and warns", () => {
      const logger = createFakeLogger();
      const registry = new TransformRegistry({ logger, builtins: [] });
      registry.register(stub("a", [], 10));
      registry.register(stub("a", [], 20));

      expect(registry.getMetadata("a")?.priority).toBe(20);
      expect(logger.warn).toHaveBeenCalledWith("Transform already registered; replacing", { transform: "a" });
    });

    it("lists sorted names, filtered by any matching tag", () => {
      const registry = registryWith(
        stub("zeta", [], undefined, ["cleanup"]),
        stub("alpha", [], undefined, ["links"]),
        stub("mid", [], undefined, ["cleanup", "links"])
      );

      expect(registry.list()).toEqual(["alpha", "mid", "zeta"]);
      expect(registry.list(["cleanup"])).toEqual(["mid", "zeta"]);
      expect(registry.list(["links", "cleanup"])).toEqual(["alpha", "mid", "zeta"]);
      expect(registry.list(["unused"])).toEqual([]);
    });

    it("unregisters by name", () => {
      const registry = registryWith(stub("a"));
      expect(registry.unregister("a")).toBe(true);
      expect(registry.unregister("a")).toBe(false);
      expect(registry.has("a")).toBe(false);
    });
  });

  describe("initialize", () => {
    it("registers the built-ins exactly once", () => {
      const logger = createFakeLogger();
      const registry = new TransformRegistry({ logger });

      registry.initialize();
      registry.initialize();

      expect(registry.isInitialized()).toBe(true);
      expect(registry.list()).toHaveLength(BUILTIN_TRANSFORMS.length);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("starts over after clear", () => {
      const registry = new TransformRegistry({ logger: silentLogger });
      registry.initialize();
      registry.clear();

      expect(registry.isInitialized()).toBe(false);
      expect(registry.list()).toEqual([]);

      registry.initialize();
      expect(registry.has("remove-images")).toBe(true);
    });
  });

  describe("resolveDependencies", () => {
    it("orders a chain so dependencies run first", () => {
      const registry = registryWith(stub("a"), stub("b", ["a"]), stub("c", ["b"]));
      expect(registry.resolveDependencies(["c"])).toEqual(["a", "b", "c"]);
    });

    it("places a shared dependency once, before its dependents", () => {
      const registry = registryWith(stub("base"), stub("left", ["base"]), stub("right", ["base"]));
      expect(registry.resolveDependencies(["right", "left"])).toEqual(["base", "left", "right"]);
    });

    it("runs lower priority first among ready transforms", () => {
      const registry = registryWith(stub("late", [], 300), stub("early", [], 10));
      expect(registry.resolveDependencies(["late", "early"])).toEqual(["early", "late"]);
    });

    it("breaks priority ties by registration order", () => {
      const registry = registryWith(stub("first"), stub("second"), stub("third"));
      expect(registry.resolveDependencies(["third", "first", "second"])).toEqual(["first", "second", "third"]);
    });

    it("drops duplicated requests", () => {
      const registry = registryWith(stub("a"), stub("b", ["a"]));
      expect(registry.resolveDependencies(["a", "b", "a", "b"])).toEqual(["a", "b"]);
    });

    it("returns an empty order for an empty request", () => {
      expect(registryWith(stub("a")).resolveDependencies([])).toEqual([]);
    });

    it("reports a cycle with its full path", () => {
      const registry = registryWith(stub("a", ["b"]), stub("b", ["a"]));
      const error = captureError(() => registry.resolveDependencies(["a"]));

      expect(error).toBeInstanceOf(DependencyResolutionError);
      expect(error).toMatchObject({
        message: "Circular dependency between transforms: a -> b -> a",
        transform: "a",
        cycle: ["a", "b", "a"],
      });
    });

    it("reports a cycle that does not include the requested transform", () => {
      const registry = registryWith(stub("x", ["y"]), stub("y", ["z"]), stub("z", ["y"]));
      const error = captureError(() => registry.resolveDependencies(["x"]));

      expect(error).toMatchObject({ cycle: ["y", "z", "y"] });
    });

    it("rejects a missing dependency and names who required it", () => {
      const registry = registryWith(stub("a", ["ghost"]));
      const error = captureError(() => registry.resolveDependencies(["a"]));

      expect(error).toBeInstanceOf(DependencyResolutionError);
      expect(error).toMatchObject({
        message: "Transform 'a' depends on 'ghost', which is not registered",
        transform: "ghost",
      });
    });

    it("rejects an unknown requested transform", () => {
      expect(() => registryWith().resolveDependencies(["nope"])).toThrow("Transform 'nope' is not registered");
    });
  });

  describe("getTransform", () => {
    const create = vi.fn((_params: TransformParams): Transformer => ({ transform: (doc) => doc }));
    const scale = defineTransform({
      name: "scale",
      description: "Requires an integer",
      parameters: { value: { type: "integer", required: true } },
      create,
    });

    it("rejects a missing required parameter before creating the transformer", () => {
      create.mockClear();
      const registry = registryWith(scale);
      const error = captureError(() => registry.getTransform("scale", {}));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Invalid parameter 'value' for transform 'scale': parameter is required",
        field: "value",
        subject: "scale",
      });
      expect(create).not.toHaveBeenCalled();
    });

    it("rejects a value of the wrong type", () => {
      const registry = registryWith(scale);
      const error = captureError(() => registry.getTransform("scale", { value: "20" }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "value" });
    });

    it("rejects a fractional integer", () => {
      const registry = registryWith(scale);
      expect(() => registry.getTransform("scale", { value: 2.5 })).toThrow(ValidationError);
    });

    it("passes valid parameters to the factory", () => {
      create.mockClear();
      const registry = registryWith(scale);
      const transformer = registry.getTransform("scale", { value: 20 });

      expect(create).toHaveBeenCalledWith({ value: 20 });
      const doc = document();
      expect(transformer.transform(doc)).toBe(doc);
    });

    it("rejects an unknown parameter", () => {
      const registry = registryWith(scale);
      const error = captureError(() => registry.getTransform("scale", { value: 1, extra: true }));

      expect(error).toMatchObject({
        message: "Invalid parameter 'extra' for transform 'scale': unknown parameter",
        field: "extra",
      });
    });

    it("rejects an unknown transform", () => {
      expect(() => registryWith().getTransform("nope")).toThrow(
        new ValidationError("transform", "Transform 'nope' is not registered", "name")
      );
    });
  });
});
