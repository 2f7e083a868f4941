/**
 * Runtime tests: memoized initialization, plugin discovery and the lazy
 * process-wide default.
 */

import { document, heading } from "@docweave/ast";
import { DEFAULT_CONFIG, type DocweaveConfig, ValidationError } from "@docweave/shared";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { PluginContext } from "../plugins";
import { DocweaveRuntime, applyTransforms, getDefaultRuntime, resetDefaultRuntime } from "../runtime";
import { createFakeLogger, installedProbe, silentLogger, textConverter } from "./fixtures";

const registerMarkdown = vi.fn((context: PluginContext) => {
  context.converters.register({ formatName: "md", extensions: [".md"] });
});

const pluginModules: Record<string, unknown> = {
  "good-plugin": {
    converters: [{ formatName: "csv", extensions: [".csv"], parser: textConverter.parser }],
    transforms: [{ name: "noop", description: "Does nothing", create: () => ({ transform: (doc: unknown) => doc }) }],
  },
  "conflict-plugin": { converters: [{ formatName: "ast" }] },
  "empty-plugin": {},
  "default-plugin": { default: { register: registerMarkdown } },
  "partial-plugin": { converters: [{ formatName: "good" }, { formatName: "bad", priority: 1.5 }] },
  "throwing-plugin": {
    converters: [{ formatName: "tsv", extensions: [".tsv"] }],
    transforms: [{ name: "shout", description: "Upper-cases text", create: () => ({ transform: (doc: unknown) => doc }) }],
    register: (context: PluginContext) => {
      context.converters.register({ formatName: "half" });
      throw new Error("register exploded");
    },
  },
};

const importModule = vi.fn(async (specifier: string): Promise<unknown> => {
  if (!(specifier in pluginModules)) {
    throw new Error(`Cannot find module '${specifier}'`);
  }
  return pluginModules[specifier];
});

function configWith(plugins: string[]): DocweaveConfig {
  return { ...DEFAULT_CONFIG, plugins };
}

afterEach(() => {
  vi.unstubAllEnvs();
  importModule.mockClear();
  registerMarkdown.mockClear();
  resetDefaultRuntime();
});

describe("DocweaveRuntime", () => {
  it("shares one initialization between concurrent callers", async () => {
    const runtime = new DocweaveRuntime({
      config: configWith(["good-plugin"]),
      logger: silentLogger,
      importModule,
    });

    const [first, second] = await Promise.all([runtime.initialize(), runtime.initialize()]);

    expect(first).toBe(second);
    expect(importModule).toHaveBeenCalledTimes(1);
    expect(runtime.converters.has("ast")).toBe(true);
    expect(runtime.transforms.has("remove-images")).toBe(true);
  });

  it("isolates plugin failures and reports every plugin", async () => {
    const logger = createFakeLogger();
    const runtime = new DocweaveRuntime({
      config: configWith(["good-plugin", "missing-plugin", "conflict-plugin", "empty-plugin", "default-plugin"]),
      logger,
      importModule,
    });

    const report = await runtime.initialize();

    expect(report.loaded).toBe(3);
    expect(report.failed).toBe(2);
    expect(report.plugins.map((plugin) => [plugin.specifier, plugin.status])).toEqual([
      ["good-plugin", "loaded"],
      ["missing-plugin", "failed"],
      ["conflict-plugin", "loaded"],
      ["empty-plugin", "failed"],
      ["default-plugin", "loaded"],
    ]);
    expect(report.plugins[0]).toMatchObject({ converters: ["csv"], transforms: ["noop"], skipped: [] });
    expect(report.plugins[2]).toMatchObject({ converters: [], skipped: ["ast"] });
    expect(report.plugins[3]?.error).toBe(
      "Plugin 'empty-plugin' exports no converters, transforms or register function"
    );

    expect(runtime.converters.has("csv")).toBe(true);
    expect(runtime.transforms.has("noop")).toBe(true);
    expect(runtime.converters.has("md")).toBe(true);
    expect(registerMarkdown).toHaveBeenCalledTimes(1);

    expect(logger.error).toHaveBeenCalledWith("Plugin failed to load", {
      plugin: "missing-plugin",
      error: "Cannot find module 'missing-plugin'",
    });
    expect(logger.warn).toHaveBeenCalledWith("Plugin converter conflicts with a registered format; skipping", {
      plugin: "conflict-plugin",
      format: "ast",
    });
  });

  it("registers nothing from a plugin with an invalid entry", async () => {
    const runtime = new DocweaveRuntime({ config: configWith(["partial-plugin"]), logger: silentLogger, importModule });

    const report = await runtime.initialize();

    expect(report.plugins[0]).toMatchObject({
      status: "failed",
      converters: [],
      error: "Priority of 'bad' must be an integer",
    });
    expect(runtime.converters.has("good")).toBe(false);
    expect(runtime.converters.has("bad")).toBe(false);
  });

  it("removes what a plugin registered before its register function threw", async () => {
    const runtime = new DocweaveRuntime({ config: configWith(["throwing-plugin"]), logger: silentLogger, importModule });

    const report = await runtime.initialize();

    expect(report.plugins[0]).toMatchObject({
      status: "failed",
      converters: [],
      transforms: [],
      error: "register exploded",
    });
    expect(runtime.converters.has("tsv")).toBe(false);
    expect(runtime.converters.has("half")).toBe(false);
    expect(runtime.transforms.has("shout")).toBe(false);
    expect(runtime.converters.list()).toEqual(["ast"]);
    expect(runtime.transforms.has("remove-images")).toBe(true);
  });

  it("stops an initialization that is still running when disposed", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowImport = vi.fn(async (specifier: string): Promise<unknown> => {
      await gate;
      return pluginModules[specifier];
    });
    const logger = createFakeLogger();
    const runtime = new DocweaveRuntime({ config: configWith(["good-plugin"]), logger, importModule: slowImport });

    const pending = runtime.initialize();
    runtime.dispose();
    release();

    const stale = await pending;
    expect(stale.plugins).toEqual([]);
    expect(runtime.converters.list()).toEqual([]);
    expect(runtime.transforms.has("noop")).toBe(false);

    const report = await runtime.initialize();
    expect(report.loaded).toBe(1);
    expect(runtime.converters.list()).toEqual(["ast", "csv"]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("re-initializes after dispose", async () => {
    const runtime = new DocweaveRuntime({ config: configWith(["good-plugin"]), logger: silentLogger, importModule });
    await runtime.initialize();

    runtime.dispose();
    expect(runtime.converters.list()).toEqual([]);
    expect(runtime.transforms.isInitialized()).toBe(false);

    await runtime.initialize();
    expect(importModule).toHaveBeenCalledTimes(2);
    expect(runtime.converters.list()).toEqual(["ast", "csv"]);
  });

  it("initializes on first conversion", async () => {
    const runtime = new DocweaveRuntime({ logger: silentLogger, moduleProbe: installedProbe });
    const doc = document([heading(2, "Section")]);

    const transformed = await runtime.applyTransforms(doc, [{ name: "heading-offset", params: { offset: 2 } }]);

    expect(transformed.children[0]).toEqual(heading(4, "Section"));
  });
});

describe("default runtime", () => {
  it("is created once and replaced after reset", () => {
    const first = getDefaultRuntime();
    expect(getDefaultRuntime()).toBe(first);

    resetDefaultRuntime();
    expect(getDefaultRuntime()).not.toBe(first);
  });

  it("rejects conversions when the environment configuration is invalid", async () => {
    vi.stubEnv("DOCWEAVE_LOG_LEVEL", "loud");
    resetDefaultRuntime();

    const applying = applyTransforms(document(), []);

    await expect(applying).rejects.toBeInstanceOf(ValidationError);
    await expect(applying).rejects.toMatchObject({ field: "logLevel" });
  });
});
