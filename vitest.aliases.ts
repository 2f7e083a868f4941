/**
 * Vitest alias configuration for workspace packages.
 *
 * Each package resolves to its TypeScript entry so tests run without a build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

const packages = ["shared", "ast", "converters", "transforms", "pipeline"] as const;

export const aliases: AliasEntry[] = packages.map((name) => ({
  find: `@docweave/${name}`,
  replacement: path.resolve(__dirname, `packages/${name}/src/index.ts`),
}));
