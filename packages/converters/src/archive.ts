/**
 * ZIP-aware content detectors.
 *
 * Only local file headers inside the inspected window are read; nothing is
 * inflated. OOXML and ODF/EPUB packages share the ZIP signature, so these
 * detectors tell them apart by entry names or the stored `mimetype` entry.
 */

import { SIGNATURES, matchesMagic, normalizeMagicPattern } from "./signatures";
import type { BoundedReader, ContentDetector } from "./types";

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const LOCAL_HEADER_SIZE = 30;
const DATA_DESCRIPTOR_FLAG = 0x0008;
const UTF8_NAME_FLAG = 0x0800;
const METHOD_STORED = 0;

const ZIP_MAGIC = normalizeMagicPattern(SIGNATURES.zip);

export interface ZipEntry {
  name: string;
  method: number;
  compressedSize: number;
  /** Offset of the entry data from the start of the archive */
  dataOffset: number;
}

/**
 * Walk local file headers from the start of the buffer. Stops at the first
 * header that does not fit in the window.
 */
export function listZipEntries(bytes: Uint8Array): ZipEntry[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const entries: ZipEntry[] = [];
  let offset = 0;

  while (offset + LOCAL_HEADER_SIZE <= bytes.byteLength) {
    if (view.getUint32(offset, true) !== LOCAL_HEADER_SIGNATURE) {
      break;
    }
    const flags = view.getUint16(offset + 6, true);
    const method = view.getUint16(offset + 8, true);
    const compressedSize = view.getUint32(offset + 18, true);
    const nameLength = view.getUint16(offset + 26, true);
    const extraLength = view.getUint16(offset + 28, true);
    const nameStart = offset + LOCAL_HEADER_SIZE;
    if (nameStart + nameLength > bytes.byteLength) {
      break;
    }

    const nameBytes = bytes.subarray(nameStart, nameStart + nameLength);
    const name = Buffer.from(nameBytes).toString(flags & UTF8_NAME_FLAG ? "utf8" : "latin1");
    const dataOffset = nameStart + nameLength + extraLength;
    entries.push({ name, method, compressedSize, dataOffset });

    if (flags & DATA_DESCRIPTOR_FLAG) {
      // Sizes live after the data; resume at the next local header.
      const next = indexOfSignature(bytes, dataOffset);
      if (next < 0) {
        break;
      }
      offset = next;
    } else {
      offset = dataOffset + compressedSize;
    }
  }

  return entries;
}

function indexOfSignature(bytes: Uint8Array, from: number): number {
  for (let i = from; i + 4 <= bytes.byteLength; i++) {
    if (bytes[i] === 0x50 && bytes[i + 1] === 0x4b && bytes[i + 2] === 0x03 && bytes[i + 3] === 0x04) {
      return i;
    }
  }
  return -1;
}

async function readArchiveWindow(reader: BoundedReader): Promise<Uint8Array | null> {
  if (!matchesMagic(reader.prefix, ZIP_MAGIC)) {
    return null;
  }
  return reader.read(Number.POSITIVE_INFINITY);
}

/**
 * Matches ZIP packages containing an entry under the given directory prefix
 * (e.g. `word/` for DOCX).
 */
export function zipEntryPrefixDetector(entryPrefix: string): ContentDetector {
  return {
    matches: async (reader) => {
      const window = await readArchiveWindow(reader);
      return window ? listZipEntries(window).some((entry) => entry.name.startsWith(entryPrefix)) : false;
    },
  };
}

/**
 * Matches ODF/EPUB packages whose first entry is a stored `mimetype` file
 * holding the given media type.
 */
export function zipMimetypeDetector(mimeType: string): ContentDetector {
  return {
    matches: async (reader) => {
      const window = await readArchiveWindow(reader);
      if (!window) {
        return false;
      }
      const [first] = listZipEntries(window);
      if (!first || first.name !== "mimetype" || first.method !== METHOD_STORED) {
        return false;
      }
      const end = first.dataOffset + first.compressedSize;
      if (end > window.byteLength) {
        return false;
      }
      return Buffer.from(window.subarray(first.dataOffset, end)).toString("latin1").trim() === mimeType;
    },
  };
}
