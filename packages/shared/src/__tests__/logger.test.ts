import { describe, expect, it } from "vitest";
import { createRuntimeLogger, isLogLevel } from "../logger";

function captureLines() {
  const lines: Record<string, unknown>[] = [];
  const destination = {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
  return { lines, destination };
}

describe("runtime logger", () => {
  it("writes structured lines with module bindings", () => {
    const { lines, destination } = captureLines();
    const logger = createRuntimeLogger({ level: "debug", destination, module: "registry" });

    logger.warn("Converter already registered", { format: "ast" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Converter already registered",
      format: "ast",
      module: "registry",
      service: "docweave",
    });
  });

  it("drops lines below the configured level", () => {
    const { lines, destination } = captureLines();
    const logger = createRuntimeLogger({ level: "warn", destination });

    logger.info("ignored");
    logger.error("kept", new Error("boom"));

    expect(lines).toHaveLength(1);
    expect(lines[0]?.msg).toBe("kept");
    expect(lines[0]).toHaveProperty("err");
  });

  it("carries child bindings", () => {
    const { lines, destination } = captureLines();
    const logger = createRuntimeLogger({ level: "info", destination }).child({ plugin: "sample" });

    logger.info("loaded");

    expect(lines[0]).toMatchObject({ plugin: "sample", msg: "loaded" });
  });

  it("recognizes log level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
