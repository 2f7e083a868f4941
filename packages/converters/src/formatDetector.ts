/**
 * Format Detector
 *
 * Narrows registered converters to one format using the filename, the
 * declared media type and magic bytes, then asks content detectors to break
 * ties. Only the bounded probe is ever read.
 */

import { FormatDetectionError, type RuntimeLogger, getLogger } from "@docweave/shared";
import type { InputProbe } from "./probe";
import { matchesMagic } from "./signatures";
import type { ConverterMetadata, DetectionHints, DetectionResult, DetectionSignal } from "./types";

type NameSignal = Extract<DetectionSignal, "extension" | "mime" | "magic">;

export class FormatDetector {
  private readonly logger: RuntimeLogger;

  /**
   * @param entries - registered converters in registration order
   */
  constructor(
    private readonly entries: () => readonly ConverterMetadata[],
    logger?: RuntimeLogger
  ) {
    this.logger = logger ?? getLogger().child({ module: "format-detector" });
  }

  async detect(probe: InputProbe, hints: DetectionHints, label: string): Promise<DetectionResult> {
    const converters = this.entries();

    if (hints.format) {
      const explicit = converters.find((entry) => entry.formatName === hints.format);
      if (!explicit) {
        throw new FormatDetectionError(label, `Unknown format '${hints.format}' requested for ${label}`);
      }
      return { format: explicit.formatName, signals: ["explicit"], candidates: [explicit.formatName] };
    }

    const filename = hints.filename ?? probe.filename;
    const signalSets: Array<[NameSignal, Set<string>]> = [
      ["extension", filename ? this.matchExtension(converters, filename) : new Set()],
      ["mime", hints.mimeType ? this.matchMime(converters, hints.mimeType) : new Set()],
      ["magic", this.matchMagic(converters, probe.reader.prefix)],
    ];
    const fired = signalSets.filter(([, set]) => set.size > 0);

    let signals: DetectionSignal[];
    let candidates: ConverterMetadata[];
    if (fired.length === 0) {
      signals = [];
      candidates = converters.filter((entry) => entry.contentDetector !== undefined);
    } else {
      const agreed = converters.filter((entry) => fired.every(([, set]) => set.has(entry.formatName)));
      if (agreed.length > 0) {
        signals = fired.map(([signal]) => signal);
        candidates = agreed;
      } else {
        const [winner, set] = pickConflictWinner(fired);
        this.logger.debug("Detection signals disagree", {
          input: label,
          signals: fired.map(([signal, names]) => ({ signal, formats: Array.from(names) })),
          winner,
        });
        signals = [winner];
        candidates = converters.filter((entry) => set.has(entry.formatName));
      }
    }

    if (candidates.length > 1 || fired.length === 0) {
      const before = candidates.length;
      candidates = await this.filterByContent(candidates, probe, label);
      if (candidates.length > 0 && (fired.length === 0 || candidates.length < before)) {
        signals = [...signals, "content"];
      }
    }

    if (candidates.length === 0) {
      throw new FormatDetectionError(label, undefined, fired.flatMap(([, set]) => Array.from(set)));
    }

    const order = new Map(converters.map((entry, index) => [entry.formatName, index]));
    const ranked = [...candidates].sort(
      (a, b) => b.priority - a.priority || (order.get(a.formatName) ?? 0) - (order.get(b.formatName) ?? 0)
    );
    const names = ranked.map((entry) => entry.formatName);
    const [format = ""] = names;

    this.logger.debug("Detected format", { input: label, format, signals, candidates: names });
    return { format, signals, candidates: names };
  }

  private matchExtension(converters: readonly ConverterMetadata[], filename: string): Set<string> {
    const lower = filename.toLowerCase();
    return new Set(
      converters
        .filter((entry) => Array.from(entry.extensions).some((ext) => lower.endsWith(ext)))
        .map((entry) => entry.formatName)
    );
  }

  private matchMime(converters: readonly ConverterMetadata[], mimeType: string): Set<string> {
    const essence = (mimeType.split(";")[0] ?? "").trim().toLowerCase();
    return new Set(
      converters.filter((entry) => entry.mimeTypes.has(essence)).map((entry) => entry.formatName)
    );
  }

  private matchMagic(converters: readonly ConverterMetadata[], prefix: Uint8Array): Set<string> {
    return new Set(
      converters
        .filter((entry) => entry.magicBytes.some((magic) => matchesMagic(prefix, magic)))
        .map((entry) => entry.formatName)
    );
  }

  private async filterByContent(
    candidates: readonly ConverterMetadata[],
    probe: InputProbe,
    label: string
  ): Promise<ConverterMetadata[]> {
    const survivors: ConverterMetadata[] = [];
    for (const entry of candidates) {
      if (!entry.contentDetector) {
        survivors.push(entry);
        continue;
      }
      try {
        if (await entry.contentDetector.matches(probe.reader)) {
          survivors.push(entry);
        }
      } catch (error) {
        this.logger.warn("Content detector failed; treating as no match", {
          input: label,
          format: entry.formatName,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return survivors;
  }
}

/**
 * Conflict order: magic bytes, then extension, then media type.
 */
function pickConflictWinner(fired: Array<[NameSignal, Set<string>]>): [NameSignal, Set<string>] {
  for (const signal of ["magic", "extension", "mime"] as const) {
    const match = fired.find(([name]) => name === signal);
    if (match) {
      return match;
    }
  }
  return ["magic", new Set()];
}
