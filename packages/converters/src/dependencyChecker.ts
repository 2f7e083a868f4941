/**
 * Dependency Checker
 *
 * Probes the modules a parser or renderer needs before it is loaded.
 */

import * as fs from "node:fs/promises";
import { createRequire } from "node:module";
import * as path from "node:path";
import { type MissingDependencyInfo, isPlainRecord } from "@docweave/shared";
import type { DependencySpec } from "./types";
import { satisfiesVersion } from "./versionRange";

export interface ModuleProbeResult {
  installed: boolean;
  /** Installed package version, when it could be read */
  version?: string;
}

export interface ModuleProbe {
  probe(moduleName: string, packageName: string): Promise<ModuleProbeResult>;
}

/**
 * Resolves modules the way Node would from `baseDir` and reads the version
 * from the manifest of the package that owns the resolved file. Packages
 * that only export an `import` condition are found through their package
 * directory on the `node_modules` lookup path.
 */
export class NodeModuleProbe implements ModuleProbe {
  private readonly require: NodeRequire;

  constructor(baseDir: string = process.cwd()) {
    this.require = createRequire(path.join(baseDir, "package.json"));
  }

  async probe(moduleName: string, _packageName: string): Promise<ModuleProbeResult> {
    const location = await this.locate(moduleName);
    if (!location) {
      return { installed: false };
    }
    const version = await findOwningVersion(location);
    return version ? { installed: true, version } : { installed: true };
  }

  private async locate(moduleName: string): Promise<string | undefined> {
    const resolved = this.resolveWithRequire(moduleName);
    if (resolved) {
      return resolved;
    }
    const root = packageRoot(moduleName);
    for (const dir of this.require.resolve.paths(moduleName) ?? []) {
      const manifestPath = path.join(dir, root, "package.json");
      if (await readManifest(manifestPath)) {
        return manifestPath;
      }
    }
    return undefined;
  }

  private resolveWithRequire(moduleName: string): string | undefined {
    try {
      return this.require.resolve(moduleName);
    } catch {
      return undefined;
    }
  }
}

/** `pkg/sub/path` -> `pkg`, `@scope/pkg/sub` -> `@scope/pkg` */
export function packageRoot(moduleName: string): string {
  const segments = moduleName.split("/");
  return moduleName.startsWith("@") ? segments.slice(0, 2).join("/") : (segments[0] ?? moduleName);
}

/**
 * Version of the first manifest with a `name` above the resolved file.
 * Nested manifests without a name (`{"type": "module"}`) are skipped.
 */
async function findOwningVersion(resolvedPath: string): Promise<string | undefined> {
  let dir = path.dirname(resolvedPath);
  while (true) {
    const manifest = await readManifest(path.join(dir, "package.json"));
    if (manifest && typeof manifest.name === "string") {
      return typeof manifest.version === "string" ? manifest.version : undefined;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
}

/** Parsed manifest, or null when it is missing or not a JSON object */
async function readManifest(file: string): Promise<Record<string, unknown> | null> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(file, "utf8"));
  } catch {
    return null;
  }
  return isPlainRecord(data) ? data : null;
}

function constrainsVersion(range: string): boolean {
  const trimmed = range.trim();
  return trimmed !== "" && trimmed !== "*";
}

/**
 * A declared version range fails when the installed version cannot be read.
 */
export async function checkDependencies(
  specs: readonly DependencySpec[],
  probe: ModuleProbe
): Promise<MissingDependencyInfo[]> {
  const missing: MissingDependencyInfo[] = [];
  for (const spec of specs) {
    const result = await probe.probe(spec.moduleName, spec.packageName);
    if (!result.installed) {
      missing.push({ ...spec, reason: "not-installed" });
      continue;
    }
    if (!constrainsVersion(spec.versionRange)) {
      continue;
    }
    if (result.version === undefined) {
      missing.push({ ...spec, reason: "version-mismatch" });
    } else if (!satisfiesVersion(result.version, spec.versionRange)) {
      missing.push({ ...spec, reason: "version-mismatch", installedVersion: result.version });
    }
  }
  return missing;
}

/**
 * Install hint naming each missing package once.
 */
export function formatRemediation(missing: readonly MissingDependencyInfo[]): string {
  const args = new Map<string, string>();
  for (const dep of missing) {
    if (!args.has(dep.packageName)) {
      args.set(dep.packageName, dep.versionRange ? `${dep.packageName}@"${dep.versionRange}"` : dep.packageName);
    }
  }
  return `Install with: npm install ${Array.from(args.values()).join(" ")}`;
}
