import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import {
  LineIndexStore,
  buildLineIndex,
  defaultInterval,
  findCheckpoint,
  isIndexValid,
  linesForOffsets,
  lookupLine,
  parseIndex,
  serializeIndex,
} from "../src/line-index";
import { makeTempDir, numberedLines, removeDir } from "./helpers";

describe("line index", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("line-index-");
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it("records checkpoints and statistics in a single pass", async () => {
    const file = write("mixed.txt", "a\n\nbcd\r\nef");
    const index = await buildLineIndex(file, 1);

    expect(index.checkpoints).toEqual([
      { lineNumber: 0, byteOffset: 0 },
      { lineNumber: 1, byteOffset: 2 },
      { lineNumber: 2, byteOffset: 3 },
      { lineNumber: 3, byteOffset: 8 },
    ]);
    expect(index.lineCount).toBe(4);
    expect(index.stats).toEqual({
      lineCount: 4,
      emptyLineCount: 1,
      lineLengthMax: 3,
      lineLengthMaxAt: 2,
      lineLengthAvg: 1.5,
      lineEnding: "mixed",
    });
    expect(await lookupLine(index, file, 3)).toBe(8);
    expect(await lookupLine(index, file, 4)).toBeNull();
  });

  it("does not treat the position after a final newline as a line", async () => {
    const file = write("ten.txt", numberedLines(10));
    const index = await buildLineIndex(file, 5);
    expect(index.lineCount).toBe(10);
    expect(index.checkpoints).toEqual([
      { lineNumber: 0, byteOffset: 0 },
      { lineNumber: 5, byteOffset: 35 },
    ]);
    expect(index.stats.lineEnding).toBe("LF");
  });

  it("resolves every line to its exact start offset", async () => {
    const file = write("ten.txt", numberedLines(10));
    const index = await buildLineIndex(file, 3);
    expect(index.checkpoints.map((c) => c.lineNumber)).toEqual([0, 3, 6, 9]);
    for (let n = 0; n < 10; n++) {
      expect(await lookupLine(index, file, n)).toBe(n * 7);
    }
    expect(await lookupLine(index, file, 10)).toBeNull();
    expect(await lookupLine(index, file, -1)).toBeNull();
  });

  it("indexes an empty file as zero lines", async () => {
    const file = write("empty.txt", "");
    const index = await buildLineIndex(file);
    expect(index.lineCount).toBe(0);
    expect(index.checkpoints).toEqual([]);
    expect(await lookupLine(index, file, 0)).toBeNull();
  });

  it("covers a million-line file with 100 checkpoints at interval 10,000", async () => {
    const content = numberedLines(1_000_000);
    const file = write("million.txt", content);
    const index = await buildLineIndex(file, 10_000);

    expect(index.lineCount).toBe(1_000_000);
    expect(index.checkpoints).toHaveLength(100);
    expect(index.checkpoints[0]).toEqual({ lineNumber: 0, byteOffset: 0 });
    expect(index.checkpoints[99].lineNumber).toBe(990_000);

    const target = 500_123;
    expect(findCheckpoint(index.checkpoints, target)?.lineNumber).toBe(500_000);
    const expected = content.indexOf(`\nline-${target}\n`) + 1;
    expect(await lookupLine(index, file, target)).toBe(expected);
  });

  it("translates byte offsets to line numbers", async () => {
    const file = write("ten.txt", numberedLines(10));
    const index = await buildLineIndex(file, 3);
    const lines = await linesForOffsets(index, file, [69, 0, 8, 36, 8]);
    expect([...lines.entries()].sort((a, b) => a[0] - b[0])).toEqual([
      [0, 0],
      [8, 1],
      [36, 5],
      [69, 9],
    ]);
  });

  it("validates against the file's size and mtime", async () => {
    const file = write("grow.txt", numberedLines(5));
    const index = await buildLineIndex(file);
    expect(await isIndexValid(index, file)).toBe(true);
    fs.appendFileSync(file, "more\n");
    expect(await isIndexValid(index, file)).toBe(false);
    fs.rmSync(file);
    expect(await isIndexValid(index, file)).toBe(false);
  });

  it("serialises deterministically and round-trips through parseIndex", async () => {
    const file = write("ten.txt", numberedLines(10));
    const a = await buildLineIndex(file, 3);
    const b = await buildLineIndex(file, 3);
    expect(serializeIndex(a)).toBe(serializeIndex(b));
    expect(parseIndex(JSON.parse(serializeIndex(a)))).toEqual(a);
  });

  it("rejects persisted checkpoints that are not strictly increasing", async () => {
    const file = write("ten.txt", numberedLines(10));
    const raw: Record<string, unknown> = JSON.parse(serializeIndex(await buildLineIndex(file, 3)));
    expect(parseIndex(raw)).not.toBeNull();
    const checkpoints = [
      [0, 0],
      [3, 21],
      [3, 21],
    ];
    expect(parseIndex({ ...raw, checkpoints })).toBeNull();
  });

  it("scales the default interval with file size", () => {
    expect(defaultInterval(0)).toBe(1000);
    expect(defaultInterval(6_400_000_000)).toBe(1000);
    expect(defaultInterval(12_800_000_000)).toBe(2000);
  });

  describe("LineIndexStore", () => {
    it("names index files after the basename and a path digest", () => {
      const store = new LineIndexStore(path.join(dir, "idx"));
      const p = store.pathFor("/var/log/app server.log");
      expect(path.dirname(p)).toBe(path.join(dir, "idx"));
      expect(path.basename(p)).toMatch(/^app_server\.log_[0-9a-f]{16}\.json$/);
    });

    it("builds once and reuses the persisted index while the file is unchanged", async () => {
      const file = write("app.log", numberedLines(50));
      const store = new LineIndexStore(path.join(dir, "idx"), { interval: 10 });

      const first = await store.getOrBuild(file);
      expect(first.rebuilt).toBe(true);
      const persisted = fs.readFileSync(store.pathFor(file), "utf8");

      const second = await store.getOrBuild(file);
      expect(second.rebuilt).toBe(false);
      expect(second.index).toEqual(first.index);

      const forced = await store.getOrBuild(file, { force: true });
      expect(forced.rebuilt).toBe(true);
      expect(fs.readFileSync(store.pathFor(file), "utf8")).toBe(persisted);
    });

    it("rebuilds a stale index", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const file = write("app.log", numberedLines(50));
      const store = new LineIndexStore(path.join(dir, "idx"), { interval: 10 });
      await store.getOrBuild(file);
      fs.appendFileSync(file, numberedLines(20, "extra-"));

      const { index, rebuilt } = await store.getOrBuild(file);
      expect(rebuilt).toBe(true);
      expect(index.lineCount).toBe(70);
    });

    it("shares one build between concurrent callers", async () => {
      const file = write("app.log", numberedLines(50));
      const store = new LineIndexStore(path.join(dir, "idx"));
      const [a, b] = await Promise.all([store.getOrBuild(file), store.getOrBuild(file)]);
      expect(a).toBe(b);
    });

    it("rebuilds for a forced caller that arrives during a running build", async () => {
      const file = write("app.log", numberedLines(50));
      const store = new LineIndexStore(path.join(dir, "idx"), { interval: 10 });
      const [plain, forced] = await Promise.all([
        store.getOrBuild(file),
        store.getOrBuild(file, { force: true }),
      ]);
      expect(plain.rebuilt).toBe(true);
      expect(forced.rebuilt).toBe(true);
      expect(forced).not.toBe(plain);
      expect(forced.index).toEqual(plain.index);

      // The forced build is now the one joined by later callers.
      const [again, joined] = await Promise.all([
        store.getOrBuild(file, { force: true }),
        store.getOrBuild(file),
      ]);
      expect(joined).toBe(again);
    });

    it("keeps the previous index when a rebuild fails to persist", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const file = write("app.log", numberedLines(50));
      const idxDir = path.join(dir, "idx");
      const store = new LineIndexStore(idxDir, { interval: 10 });
      await store.getOrBuild(file);
      const before = fs.readFileSync(store.pathFor(file));

      fs.appendFileSync(file, numberedLines(20, "extra-"));
      vi.spyOn(fsp, "rename").mockRejectedValueOnce(new Error("EIO: i/o error, rename"));
      await expect(store.getOrBuild(file)).rejects.toThrow("EIO: i/o error, rename");

      expect(fs.readFileSync(store.pathFor(file))).toEqual(before);
      expect(fs.readdirSync(idxDir)).toEqual([path.basename(store.pathFor(file))]);
    });

    it("keeps the previous index when the source disappears before a rebuild", async () => {
      const file = write("app.log", numberedLines(50));
      const idxDir = path.join(dir, "idx");
      const store = new LineIndexStore(idxDir, { interval: 10 });
      await store.getOrBuild(file);
      const before = fs.readFileSync(store.pathFor(file));

      fs.rmSync(file);
      await expect(store.getOrBuild(file, { force: true })).rejects.toThrow(/ENOENT/);

      expect(fs.readFileSync(store.pathFor(file))).toEqual(before);
      expect(fs.readdirSync(idxDir)).toEqual([path.basename(store.pathFor(file))]);
    });

    it("ignores a malformed index file and rebuilds", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      const file = write("app.log", numberedLines(5));
      const store = new LineIndexStore(path.join(dir, "idx"));
      fs.mkdirSync(path.join(dir, "idx"), { recursive: true });
      fs.writeFileSync(store.pathFor(file), "{ not json");

      expect(await store.load(file)).toBeNull();
      const { rebuilt, index } = await store.getOrBuild(file);
      expect(rebuilt).toBe(true);
      expect(index.lineCount).toBe(5);
    });
  });
});
