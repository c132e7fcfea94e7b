import fsSync from "node:fs";
import readline from "node:readline";
import { type LineIndex, linesForOffsets, lookupLine } from "./line-index";

/** Context lines on each side when a request names none. */
export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Up to `count` lines starting at 0-based `firstLine`, without terminators.
 * Seeks to the line through the index instead of reading from the file start.
 */
export async function readLines(
  index: LineIndex,
  filePath: string,
  firstLine: number,
  count: number,
): Promise<string[]> {
  const offset = await lookupLine(index, filePath, firstLine);
  const lines: string[] = [];
  if (offset === null || count <= 0) return lines;
  const stream = fsSync.createReadStream(filePath, { start: offset });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      lines.push(line);
      if (lines.length >= count) break;
    }
  } finally {
    rl.close();
    stream.destroy();
  }
  return lines;
}

export type SampleTargets =
  | { kind: "offsets"; byteOffsets: readonly number[] }
  | { kind: "lines"; /** 1-based. */ lines: readonly number[] };

export interface Sample {
  /** The requested byte offset or line number. */
  target: number;
  /** 1-based line holding the target; null when the target lies outside the file. */
  line: number | null;
  /** Byte offset where that line starts. */
  lineOffset: number | null;
  /** 1-based number of `lines[0]`. */
  firstLine: number | null;
  lines: string[];
}

/**
 * Context windows around byte offsets (e.g. search matches) or line numbers, one per
 * target in request order. The window is clipped at both ends of the file.
 */
export async function collectSamples(
  index: LineIndex,
  filePath: string,
  targets: SampleTargets,
  before: number,
  after: number,
): Promise<Sample[]> {
  const size = index.fingerprint.size;
  const located: { target: number; line: number | null }[] = [];
  if (targets.kind === "offsets") {
    const inside = targets.byteOffsets.filter((o) => Number.isInteger(o) && o >= 0 && o < size);
    const lines = await linesForOffsets(index, filePath, inside);
    for (const o of targets.byteOffsets) located.push({ target: o, line: lines.get(o) ?? null });
  } else {
    for (const n of targets.lines) {
      const inside = Number.isInteger(n) && n >= 1 && n <= index.lineCount;
      located.push({ target: n, line: inside ? n - 1 : null });
    }
  }

  const samples: Sample[] = [];
  for (const { target, line } of located) {
    if (line === null) {
      samples.push({ target, line: null, lineOffset: null, firstLine: null, lines: [] });
      continue;
    }
    const first = Math.max(0, line - before);
    samples.push({
      target,
      line: line + 1,
      lineOffset: await lookupLine(index, filePath, line),
      firstLine: first + 1,
      lines: await readLines(index, filePath, first, line - first + after + 1),
    });
  }
  return samples;
}
