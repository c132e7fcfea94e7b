/**
 * Sparse line-number ↔ byte-offset index for files too large to rescan per query.
 *
 * An index holds a checkpoint `(line, offset)` every `interval` lines plus the file's
 * fingerprint. Translating line `n` is a binary search over the checkpoints followed by
 * a forward scan of at most `interval` lines, so cost is O(log checkpoints + interval)
 * instead of O(file size).
 *
 * Line numbers here are 0-based: line `n` starts right after the n-th `\n`. Tool-facing
 * code converts to 1-based numbers at the edge.
 *
 * On disk (one JSON file per source file, see {@link LineIndexStore}):
 * {
 *   "version": 1,
 *   "sourcePath": "/abs/path/app.log",
 *   "fingerprint": { "size": 1048576, "mtimeMs": 1700000000000 },
 *   "interval": 1000,
 *   "lineCount": 52311,
 *   "stats": { ... },
 *   "checkpoints": [[0, 0], [1000, 20480], ...]
 * }
 * Serialisation is deterministic so rebuilding an unchanged file yields identical bytes.
 */
import fs, { type FileHandle } from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import type { Fingerprint, IndexCheckpoint } from "./types";
import {
  fingerprintOf,
  isErrnoException,
  isFingerprint,
  sameFingerprint,
  writeFileAtomic,
} from "./fs-utils";
import { statusManager } from "./status";

const LF = 0x0a;
const CR = 0x0d;
const SCAN_BLOCK = 64 * 1024;
const INDEX_FORMAT_VERSION = 1;

export type LineEnding = "LF" | "CRLF" | "mixed" | "none";

export interface IndexStats {
  lineCount: number;
  emptyLineCount: number;
  /** Longest line in bytes, terminator excluded. */
  lineLengthMax: number;
  /** 0-based line holding the longest line. */
  lineLengthMaxAt: number;
  lineLengthAvg: number;
  lineEnding: LineEnding;
}

export interface LineIndex {
  version: number;
  sourcePath: string;
  fingerprint: Fingerprint;
  interval: number;
  lineCount: number;
  stats: IndexStats;
  /** Strictly increasing in both fields; always starts with `(0, 0)` for non-empty files. */
  checkpoints: IndexCheckpoint[];
}

/** Interval that keeps the checkpoint count near 100k for multi-GB files. */
export function defaultInterval(fileSize: number): number {
  return Math.max(1000, Math.ceil(fileSize / (100_000 * 64)));
}

/**
 * Stream `filePath` once, recording a checkpoint every `interval` lines.
 * A line start that falls exactly on EOF (file ends with `\n`) is not a line.
 */
export async function buildLineIndex(filePath: string, interval?: number): Promise<LineIndex> {
  const fingerprint = await fingerprintOf(filePath);
  const size = fingerprint.size;
  const step = interval ?? defaultInterval(size);
  if (!Number.isInteger(step) || step <= 0) {
    throw new RangeError(`Checkpoint interval must be a positive integer, got ${step}`);
  }

  const checkpoints: IndexCheckpoint[] = size > 0 ? [{ lineNumber: 0, byteOffset: 0 }] : [];
  let newlines = 0;
  let crlf = 0;
  let lineStart = 0;
  let emptyLines = 0;
  let maxLen = 0;
  let maxLenAt = 0;
  let totalLen = 0;
  let prevByte = -1;
  let base = 0;

  const closeLine = (end: number, endsWithCr: boolean) => {
    const len = end - lineStart - (endsWithCr ? 1 : 0);
    if (len === 0) emptyLines++;
    if (len > maxLen) {
      maxLen = len;
      maxLenAt = newlines;
    }
    totalLen += len;
  };

  if (size > 0) {
    const stream = fsSync.createReadStream(filePath, {
      start: 0,
      end: size - 1,
      highWaterMark: 1024 * 1024,
    });
    for await (const data of stream) {
      const buf = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      let idx = buf.indexOf(LF);
      while (idx !== -1) {
        const abs = base + idx;
        const before = idx > 0 ? buf[idx - 1] : prevByte;
        const isCrlf = before === CR;
        if (isCrlf) crlf++;
        closeLine(abs, isCrlf);
        newlines++;
        lineStart = abs + 1;
        if (newlines % step === 0 && lineStart < size) {
          checkpoints.push({ lineNumber: newlines, byteOffset: lineStart });
        }
        idx = buf.indexOf(LF, idx + 1);
      }
      if (buf.length > 0) prevByte = buf[buf.length - 1];
      base += buf.length;
    }
  }

  // Unterminated final line.
  const trailing = size > lineStart;
  if (trailing) closeLine(size, false);
  const lineCount = newlines + (trailing ? 1 : 0);

  const lineEnding: LineEnding =
    newlines === 0 ? "none" : crlf === 0 ? "LF" : crlf === newlines ? "CRLF" : "mixed";

  return {
    version: INDEX_FORMAT_VERSION,
    sourcePath: filePath,
    fingerprint,
    interval: step,
    lineCount,
    stats: {
      lineCount,
      emptyLineCount: emptyLines,
      lineLengthMax: maxLen,
      lineLengthMaxAt: maxLenAt,
      lineLengthAvg: lineCount > 0 ? Math.round((totalLen / lineCount) * 100) / 100 : 0,
      lineEnding,
    },
    checkpoints,
  };
}

/** Checkpoint with the largest `lineNumber <= line`, or null for an empty index. */
export function findCheckpoint(
  checkpoints: readonly IndexCheckpoint[],
  line: number,
): IndexCheckpoint | null {
  let lo = 0;
  let hi = checkpoints.length;
  // bisect right on lineNumber, then step back one
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (checkpoints[mid].lineNumber <= line) lo = mid + 1;
    else hi = mid;
  }
  return lo > 0 ? checkpoints[lo - 1] : null;
}

function findCheckpointByOffset(
  checkpoints: readonly IndexCheckpoint[],
  offset: number,
): IndexCheckpoint | null {
  let lo = 0;
  let hi = checkpoints.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (checkpoints[mid].byteOffset <= offset) lo = mid + 1;
    else hi = mid;
  }
  return lo > 0 ? checkpoints[lo - 1] : null;
}

/**
 * Exact byte offset where 0-based `line` starts, or null when the file has no such line.
 * The caller is responsible for checking {@link isIndexValid} first.
 */
export async function lookupLine(
  index: LineIndex,
  filePath: string,
  line: number,
): Promise<number | null> {
  if (!Number.isInteger(line) || line < 0 || line >= index.lineCount) return null;
  const cp = findCheckpoint(index.checkpoints, line);
  if (!cp) return null;
  if (cp.lineNumber === line) return cp.byteOffset;

  const fh = await fs.open(filePath, "r");
  try {
    return await skipLines(fh, cp.byteOffset, line - cp.lineNumber, index.fingerprint.size);
  } finally {
    await fh.close();
  }
}

/** Offset just past the `count`-th `\n` at or after `from`; null if EOF comes first. */
async function skipLines(
  fh: FileHandle,
  from: number,
  count: number,
  limit: number,
): Promise<number | null> {
  const buf = Buffer.alloc(SCAN_BLOCK);
  let pos = from;
  let remaining = count;
  while (pos < limit) {
    const { bytesRead } = await fh.read(buf, 0, Math.min(buf.length, limit - pos), pos);
    if (bytesRead === 0) break;
    let idx = buf.indexOf(LF, 0);
    while (idx !== -1 && idx < bytesRead) {
      remaining--;
      if (remaining === 0) {
        const offset = pos + idx + 1;
        return offset < limit ? offset : null;
      }
      idx = buf.indexOf(LF, idx + 1);
    }
    pos += bytesRead;
  }
  return null;
}

async function countNewlines(fh: FileHandle, from: number, to: number): Promise<number> {
  const buf = Buffer.alloc(SCAN_BLOCK);
  let pos = from;
  let count = 0;
  while (pos < to) {
    const { bytesRead } = await fh.read(buf, 0, Math.min(buf.length, to - pos), pos);
    if (bytesRead === 0) break;
    let idx = buf.indexOf(LF, 0);
    while (idx !== -1 && idx < bytesRead) {
      count++;
      idx = buf.indexOf(LF, idx + 1);
    }
    pos += bytesRead;
  }
  return count;
}

/**
 * Translate byte offsets into 0-based line numbers. Offsets are processed in ascending
 * order so each checkpoint window is scanned at most once.
 */
export async function linesForOffsets(
  index: LineIndex,
  filePath: string,
  offsets: readonly number[],
): Promise<Map<number, number>> {
  const result = new Map<number, number>();
  const sorted = [...new Set(offsets)].filter((o) => o >= 0).sort((a, b) => a - b);
  if (sorted.length === 0 || index.checkpoints.length === 0) return result;

  const fh = await fs.open(filePath, "r");
  try {
    let cursorLine = 0;
    let cursorPos = -1;
    for (const offset of sorted) {
      const cp = findCheckpointByOffset(index.checkpoints, offset);
      if (!cp) continue;
      // Jump forward when a later checkpoint is closer than the running cursor.
      if (cp.byteOffset > cursorPos) {
        cursorLine = cp.lineNumber;
        cursorPos = cp.byteOffset;
      }
      cursorLine += await countNewlines(fh, cursorPos, offset);
      cursorPos = offset;
      result.set(offset, cursorLine);
    }
  } finally {
    await fh.close();
  }
  return result;
}

/** True when the file's current size and mtime equal the index fingerprint. */
export async function isIndexValid(index: LineIndex, filePath: string): Promise<boolean> {
  try {
    return sameFingerprint(index.fingerprint, await fingerprintOf(filePath));
  } catch {
    // File vanished or became unreadable: the index describes nothing that exists.
    return false;
  }
}

export function serializeIndex(index: LineIndex): string {
  return JSON.stringify({
    version: index.version,
    sourcePath: index.sourcePath,
    fingerprint: { size: index.fingerprint.size, mtimeMs: index.fingerprint.mtimeMs },
    interval: index.interval,
    lineCount: index.lineCount,
    stats: {
      lineCount: index.stats.lineCount,
      emptyLineCount: index.stats.emptyLineCount,
      lineLengthMax: index.stats.lineLengthMax,
      lineLengthMaxAt: index.stats.lineLengthMaxAt,
      lineLengthAvg: index.stats.lineLengthAvg,
      lineEnding: index.stats.lineEnding,
    },
    checkpoints: index.checkpoints.map((c) => [c.lineNumber, c.byteOffset]),
  });
}

function isNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function isLineEnding(v: unknown): v is LineEnding {
  return v === "LF" || v === "CRLF" || v === "mixed" || v === "none";
}

function parseStats(v: unknown): IndexStats | null {
  if (typeof v !== "object" || v === null) return null;
  if (
    !("lineCount" in v && isNumber(v.lineCount)) ||
    !("emptyLineCount" in v && isNumber(v.emptyLineCount)) ||
    !("lineLengthMax" in v && isNumber(v.lineLengthMax)) ||
    !("lineLengthMaxAt" in v && isNumber(v.lineLengthMaxAt)) ||
    !("lineLengthAvg" in v && isNumber(v.lineLengthAvg)) ||
    !("lineEnding" in v && isLineEnding(v.lineEnding))
  ) {
    return null;
  }
  return {
    lineCount: v.lineCount,
    emptyLineCount: v.emptyLineCount,
    lineLengthMax: v.lineLengthMax,
    lineLengthMaxAt: v.lineLengthMaxAt,
    lineLengthAvg: v.lineLengthAvg,
    lineEnding: v.lineEnding,
  };
}

/** Parse persisted JSON; null for anything malformed or from another format version. */
export function parseIndex(raw: unknown): LineIndex | null {
  if (typeof raw !== "object" || raw === null) return null;
  const version = "version" in raw ? raw.version : undefined;
  const sourcePath = "sourcePath" in raw ? raw.sourcePath : undefined;
  const fingerprint = "fingerprint" in raw ? raw.fingerprint : undefined;
  const interval = "interval" in raw ? raw.interval : undefined;
  const lineCount = "lineCount" in raw ? raw.lineCount : undefined;
  const rawCheckpoints = "checkpoints" in raw ? raw.checkpoints : undefined;
  if (version !== INDEX_FORMAT_VERSION || typeof sourcePath !== "string") return null;
  if (!isFingerprint(fingerprint) || !isNumber(interval) || interval <= 0) return null;
  if (!isNumber(lineCount) || !Array.isArray(rawCheckpoints)) return null;
  const stats = "stats" in raw ? parseStats(raw.stats) : null;
  if (!stats) return null;

  const checkpoints: IndexCheckpoint[] = [];
  for (const entry of rawCheckpoints) {
    if (!Array.isArray(entry) || entry.length !== 2) return null;
    const [lineNumber, byteOffset]: unknown[] = entry;
    if (!isNumber(lineNumber) || !isNumber(byteOffset)) return null;
    const prev = checkpoints[checkpoints.length - 1];
    if (prev && (lineNumber <= prev.lineNumber || byteOffset <= prev.byteOffset)) return null;
    checkpoints.push({ lineNumber, byteOffset });
  }

  return {
    version: INDEX_FORMAT_VERSION,
    sourcePath,
    fingerprint: { size: fingerprint.size, mtimeMs: fingerprint.mtimeMs },
    interval,
    lineCount,
    stats,
    checkpoints,
  };
}

export interface IndexStoreOptions {
  /** Fixed interval; undefined scales with file size. */
  interval?: number;
  verbose?: boolean;
}

export interface IndexResult {
  index: LineIndex;
  /** True when this call built the index rather than reusing a valid one. */
  rebuilt: boolean;
}

/**
 * Persisted indexes under one directory, keyed by absolute source path.
 * Concurrent requests for the same file share a single in-flight build; a forced
 * request waits for it and then builds again.
 */
export class LineIndexStore {
  private readonly dir: string;
  private readonly interval: number | undefined;
  private readonly verbose: boolean;
  private readonly inFlight = new Map<string, Promise<IndexResult>>();

  public constructor(dir: string, opts: IndexStoreOptions = {}) {
    this.dir = dir;
    this.interval = opts.interval;
    this.verbose = opts.verbose ?? false;
  }

  /** `<dir>/<safe basename>_<sha256(abs path)[0:16]>.json` */
  public pathFor(filePath: string): string {
    const abs = path.resolve(filePath);
    const digest = createHash("sha256").update(abs).digest("hex").slice(0, 16);
    const safe = path.basename(abs).replace(/[^A-Za-z0-9._-]/g, "_");
    return path.join(this.dir, `${safe}_${digest}.json`);
  }

  /** Load a persisted index. Missing or malformed files yield null. */
  public async load(filePath: string): Promise<LineIndex | null> {
    const abs = path.resolve(filePath);
    let json: string;
    try {
      json = await fs.readFile(this.pathFor(abs), "utf8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return null;
      throw e;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch {
      console.error(`[index] Ignoring unparseable index for ${path.basename(abs)}`);
      return null;
    }
    const index = parseIndex(raw);
    if (!index || index.sourcePath !== abs) {
      console.error(`[index] Ignoring malformed index for ${path.basename(abs)}`);
      return null;
    }
    return index;
  }

  public async save(index: LineIndex): Promise<void> {
    await writeFileAtomic(this.pathFor(index.sourcePath), serializeIndex(index));
  }

  /**
   * Return a valid index for `filePath`, building and persisting one when none exists,
   * the stored one is stale, or `force` is set.
   */
  public async getOrBuild(filePath: string, opts: { force?: boolean } = {}): Promise<IndexResult> {
    const abs = path.resolve(filePath);
    const force = opts.force ?? false;
    const pending = this.inFlight.get(abs);
    if (pending && !force) return pending;

    // A forced build queues behind the running one and rebuilds whatever it produced.
    // The running build's own caller receives its rejection.
    const ready = pending
      ? pending.then(
          () => undefined,
          () => undefined,
        )
      : Promise.resolve();
    const work: Promise<IndexResult> = ready
      .then(() => this.resolve(abs, force))
      .finally(() => {
        if (this.inFlight.get(abs) === work) this.inFlight.delete(abs);
      });
    this.inFlight.set(abs, work);
    return work;
  }

  private async resolve(abs: string, force: boolean): Promise<IndexResult> {
    if (!force) {
      const existing = await this.load(abs);
      if (existing && (await isIndexValid(existing, abs))) {
        if (this.verbose) console.error(`[index][verbose] Reusing index for ${path.basename(abs)}`);
        return { index: existing, rebuilt: false };
      }
      if (existing) {
        console.error(`[index] Index for ${path.basename(abs)} is stale; performing full rebuild`);
      }
    }
    const started = Date.now();
    const index = await buildLineIndex(abs, this.interval);
    await this.save(index);
    statusManager.incIndexBuilds();
    if (this.verbose) {
      console.error(
        `[index][verbose] Built index for ${path.basename(abs)}: ${index.lineCount} lines, ${index.checkpoints.length} checkpoints in ${Date.now() - started}ms`,
      );
    }
    return { index, rebuilt: true };
  }
}
