import { type Document, document, paragraph, textContent } from "@docweave/ast";
import {
  ConverterRegistry,
  type ConverterRegistration,
  type ModuleProbe,
  readInputText,
  registerBuiltinConverters,
} from "@docweave/converters";
import { type RuntimeLogger, createRuntimeLogger } from "@docweave/shared";
import { TransformRegistry } from "@docweave/transforms";
import { vi } from "vitest";
import { ConversionPipeline } from "../pipeline";

export const silentLogger: RuntimeLogger = createRuntimeLogger({ level: "silent" });

/**
 * Logger whose calls can be asserted; child loggers share the same mocks.
 */
export function createFakeLogger() {
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

/** Every module counts as installed at version 1.0.0 */
export const installedProbe: ModuleProbe = {
  probe: async () => ({ installed: true, version: "1.0.0" }),
};

/**
 * Plain text: one paragraph per line, rendered back as lines.
 */
export const textConverter: ConverterRegistration = {
  formatName: "txt",
  extensions: [".txt"],
  mimeTypes: ["text/plain"],
  parser: {
    parse: async (input) =>
      document(
        (await readInputText(input))
          .split("\n")
          .filter((line) => line.length > 0)
          .map((line) => paragraph(line))
      ),
  },
  renderer: {
    renderToString: async (doc: Document) => doc.children.map((child) => textContent(child)).join("\n"),
  },
};

export function createPipeline() {
  const converters = new ConverterRegistry({ logger: silentLogger, moduleProbe: installedProbe });
  registerBuiltinConverters(converters);
  converters.register(textConverter);

  const transforms = new TransformRegistry({ logger: silentLogger });
  transforms.initialize();

  const pipeline = new ConversionPipeline({ converters, transforms, logger: silentLogger });
  return { converters, transforms, pipeline };
}
