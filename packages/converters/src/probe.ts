/**
 * Bounded Input Probing
 *
 * Detection only ever sees the leading bytes of an input. Paths are read with
 * positioned reads, streams are peeked and replayed so the parser still gets
 * every byte.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { DEFAULT_INSPECT_BYTES, DEFAULT_PREFIX_BYTES, type DetectionLimits } from "@docweave/shared";
import type { BoundedReader, DocumentInput } from "./types";

export const DEFAULT_DETECTION_LIMITS: DetectionLimits = {
  prefixBytes: DEFAULT_PREFIX_BYTES,
  inspectBytes: DEFAULT_INSPECT_BYTES,
};

export interface InputProbe {
  readonly reader: BoundedReader;
  /** Basename of the path or stream source, when known */
  readonly filename?: string;
  /** Input to hand to a parser once probing is done */
  handoff(): DocumentInput;
  close(): Promise<void>;
}

export function isReadable(input: DocumentInput): input is Readable {
  return input instanceof Readable;
}

/**
 * Name used in error messages for an input.
 */
export function describeInput(input: DocumentInput, filename?: string): string {
  if (typeof input === "string") {
    return input;
  }
  if (filename) {
    return filename;
  }
  return isReadable(input) ? "<stream>" : `<${input.byteLength} bytes>`;
}

export async function openProbe(
  input: DocumentInput,
  limits: DetectionLimits = DEFAULT_DETECTION_LIMITS
): Promise<InputProbe> {
  if (typeof input === "string") {
    return openFileProbe(input, limits);
  }
  if (isReadable(input)) {
    return openStreamProbe(input, limits);
  }
  return openBytesProbe(input, limits);
}

function openBytesProbe(bytes: Uint8Array, limits: DetectionLimits): InputProbe {
  return {
    reader: {
      prefix: bytes.subarray(0, limits.prefixBytes),
      read: async (maxBytes) => bytes.subarray(0, Math.min(maxBytes, limits.inspectBytes)),
    },
    handoff: () => bytes,
    close: async () => undefined,
  };
}

async function openFileProbe(filePath: string, limits: DetectionLimits): Promise<InputProbe> {
  const handle = await fs.open(filePath, "r");
  let closed = false;

  const readHead = async (length: number): Promise<Uint8Array> => {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  };

  try {
    const prefix = await readHead(limits.prefixBytes);
    let inspected: Uint8Array = prefix;

    return {
      reader: {
        prefix,
        read: async (maxBytes) => {
          const length = Math.min(maxBytes, limits.inspectBytes);
          if (length > inspected.byteLength && inspected.byteLength >= limits.prefixBytes) {
            inspected = await readHead(length);
          }
          return inspected.subarray(0, length);
        },
      },
      filename: path.basename(filePath),
      handoff: () => filePath,
      close: async () => {
        if (!closed) {
          closed = true;
          await handle.close();
        }
      },
    };
  } catch (error) {
    await handle.close();
    throw error;
  }
}

async function openStreamProbe(stream: Readable, limits: DetectionLimits): Promise<InputProbe> {
  const peeker = new StreamPeeker(stream);
  await peeker.fill(limits.prefixBytes);
  const prefix = peeker.head(limits.prefixBytes);
  let replayed: Readable | null = null;

  return {
    reader: {
      prefix,
      read: async (maxBytes) => {
        const length = Math.min(maxBytes, limits.inspectBytes);
        await peeker.fill(length);
        return peeker.head(length);
      },
    },
    filename: streamFilename(stream),
    handoff: () => {
      if (!replayed) {
        replayed = peeker.replay();
      }
      return replayed;
    },
    close: async () => undefined,
  };
}

function streamFilename(stream: Readable): string | undefined {
  if ("path" in stream) {
    const source = stream.path;
    if (typeof source === "string") {
      return path.basename(source);
    }
    if (Buffer.isBuffer(source)) {
      return path.basename(source.toString());
    }
  }
  return undefined;
}

/**
 * Pulls chunks off a paused stream without consuming it for good.
 */
class StreamPeeker {
  private readonly chunks: Uint8Array[] = [];
  private buffered = 0;
  private ended = false;

  constructor(private readonly stream: Readable) {}

  async fill(target: number): Promise<void> {
    while (this.buffered < target && !this.ended) {
      if (this.stream.readableEnded) {
        this.ended = true;
        break;
      }
      const chunk: unknown = this.stream.read();
      if (chunk === null) {
        await this.waitForData();
        continue;
      }
      const bytes = toBytes(chunk);
      this.chunks.push(bytes);
      this.buffered += bytes.byteLength;
    }
  }

  head(length: number): Uint8Array {
    return Buffer.concat(this.chunks).subarray(0, length);
  }

  replay(): Readable {
    const chunks = [...this.chunks];
    const rest = this.stream;
    const ended = this.ended;
    async function* generate(): AsyncGenerator<Uint8Array> {
      for (const chunk of chunks) {
        yield chunk;
      }
      if (!ended) {
        for await (const chunk of rest) {
          yield toBytes(chunk);
        }
      }
    }
    return Readable.from(generate(), { objectMode: false });
  }

  private waitForData(): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        this.stream.off("readable", onReadable);
        this.stream.off("end", onEnd);
        this.stream.off("error", onError);
      };
      const onReadable = () => {
        cleanup();
        resolve();
      };
      const onEnd = () => {
        cleanup();
        this.ended = true;
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      this.stream.once("readable", onReadable);
      this.stream.once("end", onEnd);
      this.stream.once("error", onError);
    });
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk, "utf8");
  }
  throw new TypeError("Document streams must yield bytes or strings");
}
