/**
 * Helpers for parsers and renderers that work on whole documents.
 */

import * as fs from "node:fs/promises";
import { buffer } from "node:stream/consumers";
import { isReadable } from "./probe";
import type { DocumentInput, RenderTarget } from "./types";

export async function readInputBytes(input: DocumentInput): Promise<Uint8Array> {
  if (typeof input === "string") {
    return fs.readFile(input);
  }
  if (isReadable(input)) {
    return buffer(input);
  }
  return input;
}

export async function readInputText(input: DocumentInput): Promise<string> {
  return Buffer.from(await readInputBytes(input)).toString("utf8");
}

/**
 * Write text to a path, or to a stream without ending it.
 */
export async function writeOutputText(output: RenderTarget, text: string): Promise<void> {
  if (typeof output === "string") {
    await fs.writeFile(output, text, "utf8");
    return;
  }
  await new Promise<void>((resolve, reject) => {
    output.write(text, "utf8", (error) => (error ? reject(error) : resolve()));
  });
}
