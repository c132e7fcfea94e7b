import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import fg from "fast-glob";
import type { Fingerprint, SkipReason } from "./types";
import { readRange } from "./fs-utils";
import { type CompressionFormat, detectCompression, isCompoundArchive } from "./decompress";

const BINARY_SAMPLE = 8192;

export type FileClass =
  | { readonly kind: "text"; readonly fingerprint: Fingerprint }
  | {
      readonly kind: "compressed";
      readonly format: CompressionFormat;
      readonly fingerprint: Fingerprint;
    }
  | { readonly kind: "skip"; readonly reason: SkipReason };

/**
 * Expand one canonical path into the files it covers. A file yields itself; a directory
 * yields every regular file below it, dotfiles and excluded folders pruned, sorted.
 * Null for a missing path or one that is neither file nor directory.
 */
export async function discoverFiles(
  absPath: string,
  excludedFolders: readonly string[],
): Promise<string[] | null> {
  let st: Stats;
  try {
    st = await fs.stat(absPath);
  } catch {
    return null;
  }
  if (st.isFile()) return [absPath];
  if (!st.isDirectory()) return null;

  const files = await fg("**/*", {
    cwd: absPath,
    dot: false,
    absolute: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: excludedFolders.map((f) => `**/${f}/**`),
  });
  return files.sort();
}

/** NUL byte within the first 8 KiB. */
export async function isBinaryFile(absPath: string): Promise<boolean> {
  const head = await readRange(absPath, 0, BINARY_SAMPLE);
  return head.includes(0);
}

/** Decide how a discovered file is searched, or why it is skipped. */
export async function classifyFile(absPath: string): Promise<FileClass> {
  try {
    const st = await fs.stat(absPath);
    if (!st.isFile()) return { kind: "skip", reason: "not-a-file" };
    const fingerprint = { size: st.size, mtimeMs: st.mtimeMs };
    if (isCompoundArchive(absPath)) return { kind: "skip", reason: "archive" };
    const format = await detectCompression(absPath);
    if (format !== "none") return { kind: "compressed", format, fingerprint };
    if (await isBinaryFile(absPath)) return { kind: "skip", reason: "binary" };
    return { kind: "text", fingerprint };
  } catch (e) {
    console.error(`[search] Cannot read ${absPath}, skipping:`, e instanceof Error ? e.message : e);
    return { kind: "skip", reason: "unreadable" };
  }
}
