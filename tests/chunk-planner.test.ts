import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { InvalidChunkSizeError, planChunks } from "../src/chunk-planner";
import { makeTempDir, removeDir } from "./helpers";

describe("planChunks", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("planner-");
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  function write(name: string, content: string): { file: string; size: number } {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return { file, size: Buffer.byteLength(content) };
  }

  it("returns a single chunk when the file fits in one", async () => {
    const { file, size } = write("small.log", "one\ntwo\n");
    expect(await planChunks(file, size, 1024)).toEqual([
      { filePath: file, startOffset: 0, endOffset: 8, sequenceIndex: 0 },
    ]);
  });

  it("returns no chunks for an empty file", async () => {
    const { file } = write("empty.log", "");
    expect(await planChunks(file, 0, 10)).toEqual([]);
  });

  it("keeps boundaries that already sit on line starts", async () => {
    const { file, size } = write("even.log", "aaaa\nbbbb\ncccc\n");
    const chunks = await planChunks(file, size, 5);
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 5],
      [5, 10],
      [10, 15],
    ]);
  });

  it("moves boundaries forward to the next line start and drops collapsed ones", async () => {
    const { file, size } = write("uneven.log", "ab\ncdefghij\nk\n");
    const chunks = await planChunks(file, size, 5);
    expect(chunks.map((c) => [c.startOffset, c.endOffset, c.sequenceIndex])).toEqual([
      [0, 12, 0],
      [12, 14, 1],
    ]);
  });

  it("partitions the file into line-aligned ranges for any chunk size", async () => {
    let content = "";
    for (let i = 0; i < 400; i++) content += `${"x".repeat((i * 7) % 23)}${i}\n`;
    const { file, size } = write("mixed.log", content);
    const bytes = fs.readFileSync(file);

    for (const min of [7, 50, 100, 333, 1000, 4096]) {
      const chunks = await planChunks(file, size, min);
      expect(chunks[0].startOffset).toBe(0);
      expect(chunks[chunks.length - 1].endOffset).toBe(size);
      chunks.forEach((c, i) => {
        expect(c.sequenceIndex).toBe(i);
        expect(c.startOffset).toBeLessThan(c.endOffset);
        if (i > 0) {
          expect(c.startOffset).toBe(chunks[i - 1].endOffset);
          expect(bytes[c.startOffset - 1]).toBe(0x0a);
        }
      });
      const rebuilt = Buffer.concat(chunks.map((c) => bytes.subarray(c.startOffset, c.endOffset)));
      expect(rebuilt.equals(bytes)).toBe(true);
    }
  });

  it("falls back to byte-exact boundaries when a line exceeds the probe cap", async () => {
    const { file, size } = write("oneline.log", "x".repeat(1000));
    const chunks = await planChunks(file, size, 300, { probeCapBytes: 16 });
    expect(chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 250],
      [250, 500],
      [500, 750],
      [750, 1000],
    ]);
  });

  it("folds an unterminated tail into the last chunk when the probe reaches EOF", async () => {
    const { file, size } = write("oneline.log", "x".repeat(1000));
    const chunks = await planChunks(file, size, 300, { probeCapBytes: 1024 * 1024 });
    expect(chunks).toEqual([{ filePath: file, startOffset: 0, endOffset: 1000, sequenceIndex: 0 }]);
  });

  it("degrades to one whole-file chunk when probing fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const missing = path.join(dir, "gone.log");
    expect(await planChunks(missing, 1000, 100)).toEqual([
      { filePath: missing, startOffset: 0, endOffset: 1000, sequenceIndex: 0 },
    ]);
  });

  it("rejects a non-positive minimum chunk size", async () => {
    const { file, size } = write("any.log", "a\n");
    await expect(planChunks(file, size, 0)).rejects.toBeInstanceOf(InvalidChunkSizeError);
  });
});
