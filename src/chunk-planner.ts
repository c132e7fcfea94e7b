import fs, { type FileHandle } from "node:fs/promises";
import type { ChunkDescriptor } from "./types";

const LF = 0x0a;
const PROBE_BLOCK = 64 * 1024;

export interface PlanOptions {
  /** Max bytes scanned past a candidate boundary looking for a line terminator. */
  probeCapBytes?: number;
  verbose?: boolean;
}

/** Raised when no valid chunk layout can be derived. Fatal for the whole request. */
export class InvalidChunkSizeError extends Error {
  public constructor(value: number) {
    super(`Minimum chunk size must be a positive integer, got ${value}`);
    this.name = "InvalidChunkSizeError";
  }
}

/**
 * Split `[0, fileSize)` into line-aligned byte ranges of roughly `minChunkBytes`.
 *
 * Every boundary except the final end is moved forward to just after the next `\n`.
 * A line longer than `probeCapBytes` keeps its byte-exact boundary, so a match that
 * spans that single boundary can be missed. A failed probe degrades to one whole-file
 * chunk.
 */
export async function planChunks(
  filePath: string,
  fileSize: number,
  minChunkBytes: number,
  opts: PlanOptions = {},
): Promise<ChunkDescriptor[]> {
  if (!Number.isInteger(minChunkBytes) || minChunkBytes <= 0) {
    throw new InvalidChunkSizeError(minChunkBytes);
  }
  if (fileSize <= 0) return [];
  if (fileSize <= minChunkBytes) return [wholeFile(filePath, fileSize)];

  const probeCap = Math.max(1, opts.probeCapBytes ?? 1024 * 1024);
  const pieces = Math.ceil(fileSize / minChunkBytes);

  let boundaries: number[];
  try {
    boundaries = await alignBoundaries(filePath, fileSize, pieces, probeCap, opts.verbose ?? false);
  } catch (e) {
    console.error(
      `[search] Boundary probe failed for ${filePath}, searching it as a single chunk:`,
      e instanceof Error ? e.message : e,
    );
    return [wholeFile(filePath, fileSize)];
  }

  const chunks: ChunkDescriptor[] = [];
  let start = 0;
  for (const b of [...boundaries, fileSize]) {
    chunks.push({ filePath, startOffset: start, endOffset: b, sequenceIndex: chunks.length });
    start = b;
  }
  return chunks;
}

function wholeFile(filePath: string, fileSize: number): ChunkDescriptor {
  return { filePath, startOffset: 0, endOffset: fileSize, sequenceIndex: 0 };
}

/** Interior boundaries, strictly increasing and strictly inside `(0, fileSize)`. */
async function alignBoundaries(
  filePath: string,
  fileSize: number,
  pieces: number,
  probeCap: number,
  verbose: boolean,
): Promise<number[]> {
  const fh = await fs.open(filePath, "r");
  try {
    const out: number[] = [];
    let prev = 0;
    for (let i = 1; i < pieces; i++) {
      const candidate = Math.floor((i * fileSize) / pieces);
      if (candidate <= prev) continue;
      let aligned = await nextLineStart(fh, candidate, fileSize, probeCap);
      if (aligned === null) {
        if (verbose) {
          console.error(
            `[search][verbose] No line end within ${probeCap} bytes of ${candidate} in ${filePath}; using byte-exact boundary`,
          );
        }
        aligned = candidate;
      }
      if (aligned >= fileSize || aligned <= prev) continue;
      out.push(aligned);
      prev = aligned;
    }
    return out;
  } finally {
    await fh.close();
  }
}

/**
 * Offset just past the first `\n` at or after `candidate - 1`. A candidate that already
 * sits on a line start is returned unchanged. Null when the cap is hit first.
 */
async function nextLineStart(
  fh: FileHandle,
  candidate: number,
  fileSize: number,
  probeCap: number,
): Promise<number | null> {
  const from = candidate - 1;
  const limit = Math.min(fileSize, from + probeCap);
  const buf = Buffer.alloc(Math.min(PROBE_BLOCK, probeCap));
  let pos = from;
  while (pos < limit) {
    const want = Math.min(buf.length, limit - pos);
    const { bytesRead } = await fh.read(buf, 0, want, pos);
    if (bytesRead === 0) break;
    const idx = buf.subarray(0, bytesRead).indexOf(LF);
    if (idx !== -1) return pos + idx + 1;
    pos += bytesRead;
  }
  // Ran into EOF without a terminator: the remainder belongs to the last chunk.
  return limit >= fileSize ? fileSize : null;
}
