import { spawn } from "node:child_process";
import fsSync from "node:fs";
import readline from "node:readline";
import type { ChunkOutcome, MatchRecord, SearchTask } from "./types";
import { isErrnoException } from "./fs-utils";

/** Anything able to search one chunk. The production engine shells out to ripgrep. */
export interface SearchEngine {
  search(task: SearchTask, signal: AbortSignal): Promise<ChunkOutcome>;
}

/**
 * Flags every invocation carries: absolute byte offsets, no file/line headers,
 * matched text only, no color. Passthrough flags are appended after these.
 */
export const RG_FIXED_FLAGS: readonly string[] = [
  "--byte-offset",
  "--no-heading",
  "--no-filename",
  "--no-line-number",
  "--only-matching",
  "--color=never",
];

/** ripgrep exits 1 when it ran fine and found nothing. */
export const RG_EXIT_NO_MATCH = 1;

const MAX_STDERR = 4096;

/** Argument vector for searching stdin. */
export function buildRgArgs(pattern: string, passthroughFlags: readonly string[] = []): string[] {
  return [...RG_FIXED_FLAGS, ...passthroughFlags, "-e", pattern, "-"];
}

/** Parse one `offset:text` output line. Offsets are relative to the bytes fed on stdin. */
export function parseRgLine(line: string): { offset: number; text: string } | null {
  const m = /^(\d+):(.*)$/s.exec(line);
  if (!m) return null;
  const offset = Number(m[1]);
  if (!Number.isSafeInteger(offset)) return null;
  return { offset, text: m[2] };
}

export interface RipgrepOptions {
  rgPath?: string;
  verbose?: boolean;
}

/**
 * Runs one `rg` process per chunk and streams the chunk's byte range into its stdin.
 * Reported offsets are rebased onto the chunk's start so they are absolute in the file.
 */
export class RipgrepEngine implements SearchEngine {
  private readonly rgPath: string;
  private readonly verbose: boolean;

  public constructor(opts: RipgrepOptions = {}) {
    this.rgPath = opts.rgPath ?? "rg";
    this.verbose = opts.verbose ?? false;
  }

  public search(task: SearchTask, signal: AbortSignal): Promise<ChunkOutcome> {
    if (signal.aborted) return Promise.resolve({ kind: "cancelled" });
    const { descriptor } = task;

    return new Promise<ChunkOutcome>((resolve) => {
      const child = spawn(this.rgPath, buildRgArgs(task.pattern, task.passthroughFlags), {
        stdio: ["pipe", "pipe", "pipe"],
      });
      const matches: MatchRecord[] = [];
      let stderr = "";
      let inputError: Error | null = null;
      let settled = false;

      const finish = (outcome: ChunkOutcome) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      const onAbort = () => {
        // Output produced so far is discarded.
        child.kill("SIGKILL");
        finish({ kind: "cancelled" });
      };
      signal.addEventListener("abort", onAbort, { once: true });

      const input = fsSync.createReadStream(descriptor.filePath, {
        start: descriptor.startOffset,
        end: descriptor.endOffset - 1,
      });
      input.on("error", (e) => {
        inputError = e;
        child.kill("SIGKILL");
      });
      child.stdin.on("error", (e) => {
        // rg closing its stdin early (killed, or exited on a bad pattern) surfaces as EPIPE.
        const code = isErrnoException(e) ? e.code : undefined;
        if (code !== "EPIPE" && code !== "ECONNRESET") inputError = e;
        input.destroy();
      });
      input.pipe(child.stdin);

      const rl = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
      rl.on("line", (line) => {
        const parsed = parseRgLine(line);
        if (!parsed) return;
        matches.push({
          filePath: task.sourcePath,
          byteOffset: descriptor.startOffset + parsed.offset,
          text: parsed.text,
        });
      });

      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (d: string) => {
        if (stderr.length < MAX_STDERR) stderr += d;
      });

      child.on("error", (e) => {
        input.destroy();
        finish({ kind: "error", cause: `failed to start ${this.rgPath}: ${e.message}` });
      });

      // 'close' fires after stdout is drained, so every line has been parsed.
      child.on("close", (code, sig) => {
        if (signal.aborted) return finish({ kind: "cancelled" });
        if (inputError) {
          return finish({ kind: "error", cause: `read failed: ${inputError.message}` });
        }
        if (code === 0) {
          return finish(matches.length > 0 ? { kind: "matches", matches } : { kind: "no-match" });
        }
        if (code === RG_EXIT_NO_MATCH) return finish({ kind: "no-match" });
        const detail = stderr.trim().slice(0, MAX_STDERR) || (sig ? `killed by ${sig}` : "");
        if (this.verbose) {
          console.error(
            `[search][verbose] rg exited ${code ?? sig} on ${task.sourcePath} [${descriptor.startOffset}, ${descriptor.endOffset})`,
          );
        }
        finish({ kind: "error", cause: `rg exited with code ${code ?? "null"}: ${detail}` });
      });
    });
  }
}

/** True when `rgPath --version` runs and exits 0. */
export function checkRipgrepAvailable(rgPath = "rg"): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn(rgPath, ["--version"], { stdio: "ignore" });
    child.on("error", () => resolve(false));
    child.on("close", (code) => resolve(code === 0));
  });
}
