/**
 * Plugin Discovery
 *
 * Loads plugin modules by specifier and registers what they export. A plugin
 * module exports any of:
 *
 * - `converters`: converter registrations
 * - `transforms`: transform definitions
 * - `register(context)`: called with both registries
 *
 * A failing plugin is logged, reported and leaves no registrations behind; the
 * remaining plugins still load.
 */

import {
  type ConverterRegistration,
  type ConverterRegistry,
  type ModuleImporter,
  normalizeRegistration,
} from "@docweave/converters";
import {
  ConfigurationError,
  type RuntimeLogger,
  formatErrorMessage,
  isNonEmptyString,
  isRecord,
} from "@docweave/shared";
import {
  type TransformDefinition,
  type TransformMetadata,
  type TransformRegistry,
  defineTransform,
} from "@docweave/transforms";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export interface PluginContext {
  converters: ConverterRegistry;
  transforms: TransformRegistry;
  logger: RuntimeLogger;
}

export interface PluginLoadResult {
  specifier: string;
  status: "loaded" | "failed";
  /** Formats registered by the plugin's `converters` export */
  converters: string[];
  /** Transforms registered by the plugin's `transforms` export */
  transforms: string[];
  /** Entries left out because the name was already registered */
  skipped: string[];
  error?: string;
}

export interface DiscoveryReport {
  plugins: PluginLoadResult[];
  loaded: number;
  failed: number;
}

const pluginModuleSchema = z
  .object({
    converters: z.array(z.unknown()).optional(),
    transforms: z.array(z.unknown()).optional(),
    register: z
      .custom<(context: PluginContext) => unknown>((value) => typeof value === "function", {
        message: "register must be a function",
      })
      .optional(),
  })
  .passthrough();

type PluginModule = z.infer<typeof pluginModuleSchema>;

// ============================================================================
// Discovery
// ============================================================================

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

/**
 * Load each plugin in order. A plugin that fails leaves nothing registered:
 * every entry is checked before the first registration, and whatever it did
 * register is removed again. Once `signal` is aborted no further plugin is
 * loaded.
 */
export async function discoverPlugins(
  specifiers: readonly string[],
  context: PluginContext,
  importModule: ModuleImporter = defaultImporter,
  signal?: AbortSignal
): Promise<DiscoveryReport> {
  const plugins: PluginLoadResult[] = [];

  for (const specifier of specifiers) {
    if (signal?.aborted) {
      break;
    }
    const result: PluginLoadResult = {
      specifier,
      status: "loaded",
      converters: [],
      transforms: [],
      skipped: [],
    };
    const before = snapshotNames(context);
    try {
      const moduleRecord = await importModule(specifier);
      if (signal?.aborted) {
        break;
      }
      await loadPlugin(readPluginModule(specifier, moduleRecord), context, result);
      context.logger.info("Loaded plugin", {
        plugin: specifier,
        converters: result.converters,
        transforms: result.transforms,
      });
    } catch (error) {
      rollback(context, before, specifier);
      result.status = "failed";
      result.converters = [];
      result.transforms = [];
      result.error = formatErrorMessage(error);
      context.logger.error("Plugin failed to load", { plugin: specifier, error: result.error });
    }
    plugins.push(result);
  }

  const failed = plugins.filter((plugin) => plugin.status === "failed").length;
  return { plugins, loaded: plugins.length - failed, failed };
}

function readPluginModule(specifier: string, moduleRecord: unknown): PluginModule {
  const candidate =
    isRecord(moduleRecord) && !hasPluginExports(moduleRecord) && isRecord(moduleRecord.default)
      ? moduleRecord.default
      : moduleRecord;

  const parsed = pluginModuleSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "module";
    throw new ConfigurationError(
      `Plugin '${specifier}' has an invalid ${field}: ${issue?.message ?? parsed.error.message}`,
      { reference: specifier }
    );
  }
  if (!hasPluginExports(parsed.data)) {
    throw new ConfigurationError(`Plugin '${specifier}' exports no converters, transforms or register function`, {
      reference: specifier,
    });
  }
  return parsed.data;
}

function hasPluginExports(value: Record<string, unknown>): boolean {
  return value.converters !== undefined || value.transforms !== undefined || value.register !== undefined;
}

// ============================================================================
// Loading
// ============================================================================

interface PreparedPlugin {
  converters: ConverterRegistration[];
  transforms: TransformMetadata[];
}

/**
 * Check and normalize every entry without registering anything. Entries whose
 * name is already taken are recorded as skipped.
 */
function preparePlugin(plugin: PluginModule, context: PluginContext, result: PluginLoadResult): PreparedPlugin {
  const prepared: PreparedPlugin = { converters: [], transforms: [] };

  for (const entry of plugin.converters ?? []) {
    if (!isConverterRegistration(entry)) {
      throw new ConfigurationError("Converter entries need a formatName", { reference: result.specifier });
    }
    normalizeRegistration(entry);
    if (context.converters.has(entry.formatName)) {
      context.logger.warn("Plugin converter conflicts with a registered format; skipping", {
        plugin: result.specifier,
        format: entry.formatName,
      });
      result.skipped.push(entry.formatName);
      continue;
    }
    prepared.converters.push(entry);
  }

  for (const entry of plugin.transforms ?? []) {
    if (!isTransformDefinition(entry)) {
      throw new ConfigurationError("Transform entries need a name, a description and a create function", {
        reference: result.specifier,
      });
    }
    const metadata = defineTransform(entry);
    if (context.transforms.has(metadata.name)) {
      context.logger.warn("Plugin transform conflicts with a registered transform; skipping", {
        plugin: result.specifier,
        transform: metadata.name,
      });
      result.skipped.push(metadata.name);
      continue;
    }
    prepared.transforms.push(metadata);
  }

  return prepared;
}

async function loadPlugin(plugin: PluginModule, context: PluginContext, result: PluginLoadResult): Promise<void> {
  const prepared = preparePlugin(plugin, context, result);

  for (const entry of prepared.converters) {
    context.converters.register(entry);
    result.converters.push(entry.formatName);
  }
  for (const metadata of prepared.transforms) {
    context.transforms.register(metadata);
    result.transforms.push(metadata.name);
  }

  if (plugin.register) {
    await plugin.register(context);
  }
}

interface RegisteredNames {
  converters: Set<string>;
  transforms: Set<string>;
}

function snapshotNames(context: PluginContext): RegisteredNames {
  return {
    converters: new Set(context.converters.list()),
    transforms: new Set(context.transforms.list()),
  };
}

/** Remove names registered since the snapshot */
function rollback(context: PluginContext, before: RegisteredNames, specifier: string): void {
  const converters = context.converters.list().filter((name) => !before.converters.has(name));
  const transforms = context.transforms.list().filter((name) => !before.transforms.has(name));
  for (const name of converters) {
    context.converters.unregister(name);
  }
  for (const name of transforms) {
    context.transforms.unregister(name);
  }
  if (converters.length > 0 || transforms.length > 0) {
    context.logger.debug("Removed registrations of failed plugin", { plugin: specifier, converters, transforms });
  }
}

function isConverterRegistration(value: unknown): value is ConverterRegistration {
  return isRecord(value) && isNonEmptyString(value.formatName);
}

function isTransformDefinition(value: unknown): value is TransformDefinition {
  return (
    isRecord(value) &&
    isNonEmptyString(value.name) &&
    typeof value.description === "string" &&
    typeof value.create === "function"
  );
}
