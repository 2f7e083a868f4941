import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "../config";
import { ValidationError } from "../errors";

describe("configuration", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tempDirs.length = 0;
  });

  async function writeConfigFile(name: string, content: string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docweave-config-"));
    tempDirs.push(dir);
    const file = path.join(dir, name);
    await fs.writeFile(file, content, "utf8");
    return file;
  }

  it("returns defaults when no source sets anything", async () => {
    const config = await loadConfig({ env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("reads YAML files and merges nested detection limits", async () => {
    const file = await writeConfigFile(
      "docweave.yaml",
      ["logLevel: debug", "detection:", "  prefixBytes: 4096", "plugins:", "  - ./plugins/sample.js"].join("\n")
    );

    const config = await loadConfig({ env: {}, file });

    expect(config.logLevel).toBe("debug");
    expect(config.detection).toEqual({ prefixBytes: 4096, inspectBytes: 256 * 1024 });
    expect(config.plugins).toEqual(["./plugins/sample.js"]);
  });

  it("reads JSON files through the same loader", async () => {
    const file = await writeConfigFile("docweave.json", JSON.stringify({ logPretty: true }));
    const config = await loadConfig({ env: {}, file });
    expect(config.logPretty).toBe(true);
  });

  it("lets environment variables override file values", () => {
    const config = resolveConfig(
      { logLevel: "debug" },
      {},
      {
        DOCWEAVE_LOG_LEVEL: "warn",
        DOCWEAVE_DETECTION_PREFIX_BYTES: "2048",
        DOCWEAVE_PLUGINS: "first-plugin, second-plugin ,",
      }
    );

    expect(config.logLevel).toBe("warn");
    expect(config.detection.prefixBytes).toBe(2048);
    expect(config.plugins).toEqual(["first-plugin", "second-plugin"]);
  });

  it("names the offending field for invalid values", () => {
    const attempt = () => resolveConfig({}, {}, { DOCWEAVE_DETECTION_PREFIX_BYTES: "lots" });

    expect(attempt).toThrow(ValidationError);
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe("detection.prefixBytes");
      }
    }
  });

  it("rejects an inspect window smaller than the prefix", () => {
    expect(() =>
      resolveConfig({ detection: { prefixBytes: 4096, inspectBytes: 1024 } }, {}, {})
    ).toThrow(/detection\.inspectBytes/);
  });

  it("rejects unknown keys", () => {
    expect(() => resolveConfig({ colour: "blue" }, {}, {})).toThrow(ValidationError);
  });

  it("rejects a file that is not a mapping", async () => {
    const file = await writeConfigFile("list.yaml", "- one\n- two\n");
    await expect(loadConfig({ env: {}, file })).rejects.toThrow(/must contain a mapping/);
  });
});
