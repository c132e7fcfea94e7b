/**
 * Compressed-input support: format detection plus decompression through external tools
 * into private temp files that the search path then treats as plain text.
 */
import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { isErrnoException, readRange } from "./fs-utils";

export type CompressionFormat = "gzip" | "zstd" | "xz" | "bz2" | "none";

const EXTENSIONS: Record<string, CompressionFormat> = {
  ".gz": "gzip",
  ".gzip": "gzip",
  ".zst": "zstd",
  ".zstd": "zstd",
  ".xz": "xz",
  ".bz2": "bz2",
  ".bzip2": "bz2",
};

const MAGIC: readonly { format: CompressionFormat; bytes: readonly number[] }[] = [
  { format: "gzip", bytes: [0x1f, 0x8b] },
  { format: "zstd", bytes: [0x28, 0xb5, 0x2f, 0xfd] },
  { format: "xz", bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] },
  { format: "bz2", bytes: [0x42, 0x5a, 0x68] },
];

// Archives hold many files; decompressing them yields a tar stream, not text.
const COMPOUND_ARCHIVE_SUFFIXES = [
  ".tar.gz",
  ".tgz",
  ".tar.xz",
  ".txz",
  ".tar.bz2",
  ".tbz2",
  ".tbz",
  ".tar.zst",
  ".tzst",
];

const COMMANDS: Record<Exclude<CompressionFormat, "none">, readonly string[]> = {
  gzip: ["gzip", "-d", "-c"],
  zstd: ["zstd", "-d", "-c", "-q"],
  xz: ["xz", "-d", "-c"],
  bz2: ["bzip2", "-d", "-c"],
};

export function isCompoundArchive(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return COMPOUND_ARCHIVE_SUFFIXES.some((s) => lower.endsWith(s));
}

export function formatFromExtension(filePath: string): CompressionFormat {
  if (isCompoundArchive(filePath)) return "none";
  return EXTENSIONS[path.extname(filePath).toLowerCase()] ?? "none";
}

export function formatFromMagic(header: Uint8Array): CompressionFormat {
  for (const { format, bytes } of MAGIC) {
    if (header.length >= bytes.length && bytes.every((b, i) => header[i] === b)) return format;
  }
  return "none";
}

/** Extension first, then magic bytes. Compound archives are never reported compressed. */
export async function detectCompression(filePath: string): Promise<CompressionFormat> {
  if (isCompoundArchive(filePath)) return "none";
  const byExt = formatFromExtension(filePath);
  if (byExt !== "none") return byExt;
  return formatFromMagic(await readRange(filePath, 0, 6));
}

/** Argument vector that writes the decompressed bytes of `filePath` to stdout. */
export function getDecompressorCommand(format: CompressionFormat, filePath: string): string[] {
  if (format === "none") throw new Error(`No decompressor for uncompressed file ${filePath}`);
  return [...COMMANDS[format], filePath];
}

/** The target filesystem ran out of space while writing the decompressed copy. */
export class OutOfSpaceError extends Error {
  public constructor(filePath: string, detail: string) {
    super(`Out of space decompressing ${filePath}: ${detail}`);
    this.name = "OutOfSpaceError";
  }
}

export class DecompressionError extends Error {
  public constructor(filePath: string, detail: string) {
    super(`Failed to decompress ${filePath}: ${detail}`);
    this.name = "DecompressionError";
  }
}

/** Executes a decompression command, streaming its stdout into `outputPath`. */
export interface DecompressRunner {
  run(command: readonly string[], outputPath: string, signal?: AbortSignal): Promise<void>;
}

const NO_SPACE = /no space left on device/i;

function isOutOfSpace(e: unknown): boolean {
  if (e instanceof OutOfSpaceError) return true;
  if (isErrnoException(e) && e.code === "ENOSPC") return true;
  return e instanceof Error && NO_SPACE.test(e.message);
}

/** Spawns the real tool. Rejects with the tool's stderr on a non-zero exit. */
export class ProcessDecompressRunner implements DecompressRunner {
  public run(command: readonly string[], outputPath: string, signal?: AbortSignal): Promise<void> {
    const [bin, ...args] = command;
    return new Promise<void>((resolve, reject) => {
      const out = fsSync.createWriteStream(outputPath, { flags: "wx" });
      const child = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"], signal });
      let stderr = "";
      let writeError: Error | null = null;
      let exited: { code: number | null; sig: NodeJS.Signals | null } | null = null;
      let flushed = false;

      const settle = () => {
        if (!exited || !flushed) return;
        if (writeError) return reject(writeError);
        if (exited.code === 0) return resolve();
        const detail = stderr.trim() || `exit ${exited.code ?? exited.sig}`;
        reject(new Error(detail));
      };

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (d: string) => {
        if (stderr.length < 4096) stderr += d;
      });
      out.on("error", (e) => {
        writeError = e;
        child.kill("SIGKILL");
        flushed = true;
        settle();
      });
      out.on("finish", () => {
        flushed = true;
        settle();
      });
      child.stdout.pipe(out);
      child.on("error", (e) => {
        // The output may still be opening; reject once its fd is closed so the caller's
        // cleanup finds the file.
        if (out.closed) return reject(e);
        out.once("close", () => reject(e));
        out.destroy();
      });
      child.on("close", (code, sig) => {
        exited = { code, sig };
        settle();
      });
    });
  }
}

/**
 * Decompresses into fresh temp files under `tempDir`. The temp file is removed on any
 * failure; successful outputs belong to the caller.
 */
export class Decompressor {
  private readonly tempDir: string;
  private readonly runner: DecompressRunner;

  public constructor(tempDir: string, runner: DecompressRunner = new ProcessDecompressRunner()) {
    this.tempDir = tempDir;
    this.runner = runner;
  }

  public async decompressToTemp(
    filePath: string,
    format: CompressionFormat,
    signal?: AbortSignal,
  ): Promise<string> {
    const command = getDecompressorCommand(format, filePath);
    await fs.mkdir(this.tempDir, { recursive: true });
    const stem = path.basename(filePath, path.extname(filePath)).replace(/[^A-Za-z0-9._-]/g, "_");
    const tmp = path.join(this.tempDir, `${randomUUID()}-${stem}`);
    try {
      await this.runner.run(command, tmp, signal);
      return tmp;
    } catch (e) {
      await fs.rm(tmp, { force: true });
      const detail = e instanceof Error ? e.message : String(e);
      if (isOutOfSpace(e)) throw new OutOfSpaceError(filePath, detail);
      throw new DecompressionError(filePath, detail);
    }
  }
}
