/**
 * Magic byte signatures for common container and document formats.
 */

import type { MagicPattern, NormalizedMagicPattern } from "./types";

export const SIGNATURES = {
  pdf: { pattern: "%PDF-", offset: 0 },
  zip: { pattern: "PK\x03\x04", offset: 0 },
  rtf: { pattern: "{\\rtf", offset: 0 },
  gzip: { pattern: new Uint8Array([0x1f, 0x8b]), offset: 0 },
  png: { pattern: new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), offset: 0 },
  jpeg: { pattern: new Uint8Array([0xff, 0xd8, 0xff]), offset: 0 },
  gif: { pattern: "GIF8", offset: 0 },
  ole2: { pattern: new Uint8Array([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]), offset: 0 },
  tar: { pattern: "ustar", offset: 257 },
} satisfies Record<string, MagicPattern>;

export function normalizeMagicPattern(magic: MagicPattern): NormalizedMagicPattern {
  const pattern = typeof magic.pattern === "string" ? Buffer.from(magic.pattern, "latin1") : magic.pattern;
  return { pattern, offset: magic.offset };
}

/**
 * True when the pattern lies entirely inside the prefix at its offset.
 */
export function matchesMagic(prefix: Uint8Array, magic: NormalizedMagicPattern): boolean {
  const { pattern, offset } = magic;
  if (pattern.byteLength === 0 || offset < 0 || offset + pattern.byteLength > prefix.byteLength) {
    return false;
  }
  for (let i = 0; i < pattern.byteLength; i++) {
    if (prefix[offset + i] !== pattern[i]) {
      return false;
    }
  }
  return true;
}
