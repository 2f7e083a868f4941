/**
 * Bounded probing of paths, bytes and streams.
 */

import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { afterEach, describe, expect, it } from "vitest";
import { describeInput, isReadable, openProbe } from "../probe";

const limits = { prefixBytes: 4, inspectBytes: 8 };

describe("openProbe", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tempDirs.length = 0;
  });

  it("slices in-memory bytes to the configured limits", async () => {
    const probe = await openProbe(Buffer.from("0123456789abcdef"), limits);

    expect(Buffer.from(probe.reader.prefix).toString()).toBe("0123");
    expect(Buffer.from(await probe.reader.read(100)).toString()).toBe("01234567");
    expect(Buffer.from(await probe.reader.read(6)).toString()).toBe("012345");
  });

  it("reads files with positioned reads and keeps the path for parsers", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docweave-probe-"));
    tempDirs.push(dir);
    const file = path.join(dir, "sample.txt");
    await fs.writeFile(file, "0123456789abcdef");

    const probe = await openProbe(file, limits);
    try {
      expect(probe.filename).toBe("sample.txt");
      expect(Buffer.from(probe.reader.prefix).toString()).toBe("0123");
      expect(Buffer.from(await probe.reader.read(100)).toString()).toBe("01234567");
      expect(probe.handoff()).toBe(file);
    } finally {
      await probe.close();
    }
  });

  it("replays peeked stream chunks ahead of the rest", async () => {
    const stream = Readable.from([Buffer.from("abc"), Buffer.from("def"), Buffer.from("ghi")]);

    const probe = await openProbe(stream, limits);
    expect(Buffer.from(probe.reader.prefix).toString()).toBe("abcd");

    const replay = probe.handoff();
    expect(isReadable(replay)).toBe(true);
    if (isReadable(replay)) {
      expect((await buffer(replay)).toString()).toBe("abcdefghi");
    }
  });

  it("handles streams shorter than the prefix", async () => {
    const probe = await openProbe(Readable.from([Buffer.from("ab")]), limits);
    expect(Buffer.from(probe.reader.prefix).toString()).toBe("ab");

    const replay = probe.handoff();
    if (isReadable(replay)) {
      expect((await buffer(replay)).toString()).toBe("ab");
    }
  });

  it("takes the filename from file streams", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docweave-probe-"));
    tempDirs.push(dir);
    const file = path.join(dir, "streamed.md");
    await fs.writeFile(file, "# Title\n");

    const stream = createReadStream(file);
    const probe = await openProbe(stream, limits);

    expect(probe.filename).toBe("streamed.md");
    stream.destroy();
  });

  it("describes inputs for error messages", () => {
    expect(describeInput("/tmp/a.pdf")).toBe("/tmp/a.pdf");
    expect(describeInput(Buffer.alloc(3))).toBe("<3 bytes>");
    expect(describeInput(Readable.from([]), "upload.docx")).toBe("upload.docx");
  });
});
