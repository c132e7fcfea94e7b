import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { SearchEngine } from "../src/ripgrep";
import type { ChunkOutcome, MatchRecord, SearchTask } from "../src/types";
import type { DecompressRunner } from "../src/decompress";

export function makeTempDir(prefix = "chunked-search-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Lines `line-0` .. `line-(n-1)`, each followed by `\n`. */
export function numberedLines(n: number, prefix = "line-"): string {
  let out = "";
  for (let i = 0; i < n; i++) out += `${prefix}${i}\n`;
  return out;
}

function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve(false);
    const t = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    const onAbort = () => {
      clearTimeout(t);
      resolve(false);
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export interface FakeEngineOptions {
  /** Delay per task, by sequence index. */
  delayMs?: (task: SearchTask) => number;
  /** Return an error outcome for these tasks. */
  failWhen?: (task: SearchTask) => boolean;
}

/**
 * In-process stand-in for ripgrep: reads the chunk's bytes and runs a JS RegExp over
 * them decoded as latin1, so string indexes equal byte offsets.
 */
export class FakeEngine implements SearchEngine {
  public readonly calls: SearchTask[] = [];
  public maxConcurrent = 0;
  private active = 0;
  private readonly opts: FakeEngineOptions;

  public constructor(opts: FakeEngineOptions = {}) {
    this.opts = opts;
  }

  public async search(task: SearchTask, signal: AbortSignal): Promise<ChunkOutcome> {
    this.calls.push(task);
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    try {
      const delay = this.opts.delayMs?.(task) ?? 0;
      if (delay > 0 && !(await sleep(delay, signal))) return { kind: "cancelled" };
      if (signal.aborted) return { kind: "cancelled" };
      if (this.opts.failWhen?.(task)) return { kind: "error", cause: "simulated failure" };

      const { descriptor } = task;
      const length = descriptor.endOffset - descriptor.startOffset;
      const buf = Buffer.alloc(length);
      const fd = fs.openSync(descriptor.filePath, "r");
      try {
        fs.readSync(fd, buf, 0, length, descriptor.startOffset);
      } finally {
        fs.closeSync(fd);
      }
      const text = buf.toString("latin1");
      const re = new RegExp(task.pattern, task.passthroughFlags.includes("-i") ? "gi" : "g");
      const matches: MatchRecord[] = [];
      for (const m of text.matchAll(re)) {
        matches.push({
          filePath: task.sourcePath,
          byteOffset: descriptor.startOffset + (m.index ?? 0),
          text: m[0],
        });
      }
      return matches.length > 0 ? { kind: "matches", matches } : { kind: "no-match" };
    } finally {
      this.active--;
    }
  }
}

/** Writes plain bytes as the "decompressed" output, or fails the way it is told to. */
export class FakeDecompressRunner implements DecompressRunner {
  public readonly commands: (readonly string[])[] = [];
  private readonly content: string;
  private readonly failure: "none" | "enospc" | "corrupt";

  public constructor(content: string, failure: "none" | "enospc" | "corrupt" = "none") {
    this.content = content;
    this.failure = failure;
  }

  public async run(command: readonly string[], outputPath: string): Promise<void> {
    this.commands.push(command);
    // Partial output lands on disk before the failure, like a real full disk.
    fs.writeFileSync(outputPath, this.content.slice(0, Math.ceil(this.content.length / 2)));
    if (this.failure === "enospc") {
      throw Object.assign(new Error("ENOSPC: no space left on device, write"), {
        code: "ENOSPC",
      });
    }
    if (this.failure === "corrupt") throw new Error("gzip: stdin: not in gzip format");
    fs.writeFileSync(outputPath, this.content);
  }
}
