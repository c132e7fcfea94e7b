import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { Fingerprint } from "./types";

/** Current size + mtime of a file. Throws if the file cannot be stat'ed. */
export async function fingerprintOf(filePath: string): Promise<Fingerprint> {
  const st = await fs.stat(filePath);
  return { size: st.size, mtimeMs: st.mtimeMs };
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return a.size === b.size && a.mtimeMs === b.mtimeMs;
}

export function isFingerprint(v: unknown): v is Fingerprint {
  if (typeof v !== "object" || v === null) return false;
  return (
    "size" in v &&
    typeof v.size === "number" &&
    "mtimeMs" in v &&
    typeof v.mtimeMs === "number"
  );
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Write `data` to a sibling temp file and rename it over `target`.
 * Readers observe either the previous content or the new one, never a partial file.
 * On failure the temp file is removed and the previous target stays untouched.
 */
export async function writeFileAtomic(target: string, data: string | Uint8Array): Promise<void> {
  const dir = path.dirname(target);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(
    dir,
    `.${path.basename(target)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`,
  );
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, target);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

/** Read up to `length` bytes starting at `position`. Returns fewer bytes at EOF. */
export async function readRange(
  filePath: string,
  position: number,
  length: number,
): Promise<Buffer> {
  const fh = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(length);
    const { bytesRead } = await fh.read(buf, 0, length, position);
    return buf.subarray(0, bytesRead);
  } finally {
    await fh.close();
  }
}
