import { type RuntimeLogger, createRuntimeLogger } from "@docweave/shared";
import { vi } from "vitest";

export interface ZipFixtureEntry {
  name: string;
  data: string;
  method?: number;
  /** Write sizes in a trailing data descriptor instead of the header */
  dataDescriptor?: boolean;
}

/**
 * Build an archive of local file headers (no compression) followed by an
 * end-of-central-directory marker.
 */
export function buildZip(entries: ZipFixtureEntry[]): Buffer {
  const parts: Buffer[] = [];
  for (const entry of entries) {
    const name = Buffer.from(entry.name, "utf8");
    const data = Buffer.from(entry.data, "latin1");
    const header = Buffer.alloc(30);
    header.writeUInt32LE(0x04034b50, 0);
    header.writeUInt16LE(20, 4);
    header.writeUInt16LE(entry.dataDescriptor ? 0x0008 : 0, 6);
    header.writeUInt16LE(entry.method ?? 0, 8);
    header.writeUInt32LE(entry.dataDescriptor ? 0 : data.length, 18);
    header.writeUInt32LE(entry.dataDescriptor ? 0 : data.length, 22);
    header.writeUInt16LE(name.length, 26);
    header.writeUInt16LE(0, 28);
    parts.push(header, name, data);
    if (entry.dataDescriptor) {
      const descriptor = Buffer.alloc(16);
      descriptor.writeUInt32LE(0x08074b50, 0);
      descriptor.writeUInt32LE(data.length, 8);
      descriptor.writeUInt32LE(data.length, 12);
      parts.push(descriptor);
    }
  }
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  parts.push(end);
  return Buffer.concat(parts);
}

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

export const silentLogger: RuntimeLogger = createRuntimeLogger({ level: "silent" });
