/**
 * Request orchestration: the dispatch path from requested paths to the final summary.
 *
 *   sandbox → expand + classify → decompress → result cache → plan → dispatch
 *     → aggregate → cache write → line numbers → completion handlers
 *
 * Everything before dispatch is pre-flight: a file dropped there lands in
 * `skippedFiles` and never produces a task. Only a sandbox violation or an
 * impossible chunk layout rejects the request as a whole.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import type {
  Fingerprint,
  MatchRecord,
  SearchRequest,
  SearchSummary,
  SearchTask,
} from "./types";
import { PathOutsideRootError, PathSandbox } from "./path-security";
import { type FileClass, classifyFile, discoverFiles } from "./files";
import { type CompressionFormat, Decompressor, OutOfSpaceError } from "./decompress";
import { AnalysisCache, type SearchCachePayload } from "./analysis-cache";
import { planChunks } from "./chunk-planner";
import { SearchDispatcher } from "./dispatcher";
import type { SearchEngine } from "./ripgrep";
import { ResultAggregator } from "./aggregator";
import { WorkerPool } from "./worker-pool";
import { type LineIndex, LineIndexStore, buildLineIndex, linesForOffsets } from "./line-index";
import { type SearchHandler, runCompleteHandlers, runFileHandlers } from "./handlers";
import { statusManager } from "./status";
import { analyzePattern } from "./pattern-complexity";

export interface SearchServiceOptions {
  sandbox: PathSandbox;
  engine: SearchEngine;
  decompressor: Decompressor;
  maxWorkers: number;
  minChunkBytes: number;
  probeCapBytes: number;
  /** Files at or above this size get their complete results cached. */
  largeFileBytes: number;
  excludedFolders: readonly string[];
  resultCache?: AnalysisCache<SearchCachePayload>;
  indexStore?: LineIndexStore;
  handlers?: readonly SearchHandler[];
  /** Applied when a request carries no timeout of its own; 0 disables it. */
  defaultTimeoutMs?: number;
  verbose?: boolean;
}

/** A file that made it through pre-flight. */
interface SearchableFile {
  /** Path reported to callers. */
  sourcePath: string;
  /** Path whose bytes are searched (a temp copy for compressed input). */
  readPath: string;
  size: number;
  fingerprint: Fingerprint;
  compressed: boolean;
}

/** Cache sub-key: the pattern plus every passthrough flag, since flags change results. */
export function patternKey(pattern: string, flags: readonly string[]): string {
  return createHash("sha256")
    .update(JSON.stringify([pattern, ...flags]))
    .digest("hex")
    .slice(0, 16);
}

export class SearchService {
  private readonly opts: SearchServiceOptions;
  private readonly dispatcher: SearchDispatcher;
  private readonly handlers: readonly SearchHandler[];

  public constructor(opts: SearchServiceOptions) {
    this.opts = opts;
    this.dispatcher = new SearchDispatcher(opts.engine, opts.maxWorkers);
    this.handlers = opts.handlers ?? [];
  }

  public async search(req: SearchRequest): Promise<SearchSummary> {
    const started = Date.now();
    if (req.pattern.length === 0) throw new RangeError("Pattern must not be empty");
    const budget = req.maxResults;
    if (budget !== undefined && (!Number.isInteger(budget) || budget < 0)) {
      throw new RangeError(`maxResults must be a non-negative integer, got ${req.maxResults}`);
    }
    const complexity = analyzePattern(req.pattern);
    if (complexity.level === "dangerous") {
      console.error(
        `[search] Pattern ${JSON.stringify(req.pattern)} scores ${complexity.score} (${complexity.level}); chunks may run slowly`,
      );
    }
    // Request-fatal: nothing is scheduled when any requested path escapes the roots.
    const requested = await this.opts.sandbox.resolveAll(req.paths);
    statusManager.incSearches();

    const flags = req.passthroughFlags ?? [];
    const key = patternKey(req.pattern, flags);
    const controller = new AbortController();
    const timeoutMs = req.timeoutMs ?? this.opts.defaultTimeoutMs ?? 0;
    let timer =
      timeoutMs > 0
        ? setTimeout(() => {
            controller.abort(new Error(`search timed out after ${timeoutMs}ms`));
          }, timeoutMs)
        : null;
    // Set only when the timeout actually cut work short, not when it fires during handlers.
    let timedOut = false;

    const aggregator = new ResultAggregator(budget);
    const tempFiles: string[] = [];
    try {
      const candidates = await this.expand(requested, aggregator);
      const prepared = await this.prepare(candidates, aggregator, tempFiles, controller.signal);
      const searchable = prepared.files;
      if (prepared.cancelled > 0) timedOut = true;

      // Result cache: consulted before planning, written after aggregation.
      const toPlan: SearchableFile[] = [];
      const cacheable = new Set<string>();
      for (const file of searchable) {
        if (!this.isCacheable(file)) {
          toPlan.push(file);
          continue;
        }
        cacheable.add(file.sourcePath);
        const hit = await this.cacheLookup(file, key);
        if (hit) {
          const report = aggregator.addCachedFile(file.sourcePath, hit);
          await runFileHandlers(this.handlers, report);
        } else {
          toPlan.push(file);
        }
      }

      const plans = await Promise.all(
        toPlan.map((f) =>
          planChunks(f.readPath, f.size, this.opts.minChunkBytes, {
            probeCapBytes: this.opts.probeCapBytes,
            verbose: this.opts.verbose,
          }),
        ),
      );
      const tasks: SearchTask[] = [];
      for (let i = 0; i < toPlan.length; i++) {
        const file = toPlan[i];
        const chunks = plans[i];
        const emptyReport = aggregator.addFile(file.sourcePath, chunks.length);
        if (emptyReport) await runFileHandlers(this.handlers, emptyReport);
        for (const descriptor of chunks) {
          tasks.push({
            descriptor,
            pattern: req.pattern,
            passthroughFlags: flags,
            sourcePath: file.sourcePath,
          });
        }
      }

      // Raw per-file results of complete scans, for the cache write below.
      const rawMatches = new Map<string, MatchRecord[]>();
      const incomplete = new Set<string>();
      if (!aggregator.budgetExhausted && controller.signal.aborted) {
        // Timed out during pre-flight: planned chunks never ran.
        if (tasks.length > 0) timedOut = true;
      } else if (!aggregator.budgetExhausted) {
        const events = this.dispatcher.dispatch(tasks, {
          resultBudget: aggregator.remainingBudget,
          signal: controller.signal,
        });
        for await (const ev of events) {
          const src = ev.task.sourcePath;
          if (ev.outcome.kind === "matches" && cacheable.has(src)) {
            const list = rawMatches.get(src) ?? [];
            list.push(...ev.outcome.matches);
            rawMatches.set(src, list);
          } else if (ev.outcome.kind === "error" || ev.outcome.kind === "cancelled") {
            incomplete.add(src);
            if (ev.outcome.kind === "cancelled" && controller.signal.aborted) timedOut = true;
          }
          const { completedFile } = aggregator.accept(ev);
          if (completedFile) await runFileHandlers(this.handlers, completedFile);
        }
      }

      if (timer) {
        clearTimeout(timer);
        timer = null;
      }

      const result = aggregator.finalize();
      await this.cacheStore(toPlan, result.files, cacheable, incomplete, rawMatches, key);

      const matches = req.lineNumbers
        ? await this.annotateLines(result.matches, searchable)
        : result.matches;

      const summary: SearchSummary = {
        ...result,
        matches,
        truncated: result.truncated || timedOut,
        timedOut,
        elapsedMs: Date.now() - started,
      };
      await runCompleteHandlers(this.handlers, summary);
      return summary;
    } finally {
      if (timer) clearTimeout(timer);
      await Promise.all(tempFiles.map((t) => fs.rm(t, { force: true })));
    }
  }

  /** Expand requested paths into a deduplicated, ordered list of candidate files. */
  private async expand(
    requested: readonly string[],
    aggregator: ResultAggregator,
  ): Promise<string[]> {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const abs of requested) {
      const files = await discoverFiles(abs, this.opts.excludedFolders);
      if (files === null) {
        aggregator.skipFile(abs, "unreadable");
        continue;
      }
      for (const f of files) {
        let real: string;
        try {
          real = await this.opts.sandbox.resolve(f);
        } catch (e) {
          if (!(e instanceof PathOutsideRootError)) throw e;
          // A symlink inside a directory scan that leads out of the roots.
          aggregator.skipFile(f, "outside-root");
          continue;
        }
        if (seen.has(real)) continue;
        seen.add(real);
        out.push(real);
      }
    }
    return out;
  }

  /**
   * Classify candidates and decompress compressed ones. Returns files in input order and
   * the number of decompressions the signal cancelled.
   */
  private async prepare(
    candidates: readonly string[],
    aggregator: ResultAggregator,
    tempFiles: string[],
    signal: AbortSignal,
  ): Promise<{ files: SearchableFile[]; cancelled: number }> {
    const classes: { abs: string; cls: FileClass }[] = [];
    for (const abs of candidates) classes.push({ abs, cls: await classifyFile(abs) });

    const compressed: { abs: string; format: CompressionFormat }[] = [];
    for (const { abs, cls } of classes) {
      if (cls.kind === "compressed") compressed.push({ abs, format: cls.format });
    }
    const decompressed = new Map<string, string>();
    let cancelled = 0;
    if (compressed.length > 0) {
      const pool = new WorkerPool<{ abs: string; format: CompressionFormat }, string>(
        this.opts.maxWorkers,
        (t, sig) => this.opts.decompressor.decompressToTemp(t.abs, t.format, sig),
      );
      for (const r of await pool.runAll(compressed, signal)) {
        if (r.status === "done") {
          tempFiles.push(r.value);
          decompressed.set(r.task.abs, r.value);
        } else if (r.status === "failed" && r.error instanceof OutOfSpaceError) {
          console.error(`[decompress] ${r.error.message}; skipping file`);
          aggregator.skipFile(r.task.abs, "out-of-space");
        } else if (r.status === "failed") {
          const cause = r.error instanceof Error ? r.error.message : String(r.error);
          console.error(`[decompress] ${cause}`);
          aggregator.recordFileError(r.task.abs, cause);
        } else {
          cancelled++;
          aggregator.recordFileError(r.task.abs, "cancelled before decompression finished");
        }
      }
    }

    const out: SearchableFile[] = [];
    for (const { abs, cls } of classes) {
      if (cls.kind === "skip") {
        aggregator.skipFile(abs, cls.reason);
      } else if (cls.kind === "text") {
        out.push({
          sourcePath: abs,
          readPath: abs,
          size: cls.fingerprint.size,
          fingerprint: cls.fingerprint,
          compressed: false,
        });
      } else {
        const tmp = decompressed.get(abs);
        if (tmp === undefined) continue;
        const st = await fs.stat(tmp);
        out.push({
          sourcePath: abs,
          readPath: tmp,
          size: st.size,
          fingerprint: cls.fingerprint,
          compressed: true,
        });
      }
    }
    return { files: out, cancelled };
  }

  private isCacheable(file: SearchableFile): boolean {
    return (
      this.opts.resultCache !== undefined &&
      !file.compressed &&
      file.size > 0 &&
      file.size >= this.opts.largeFileBytes
    );
  }

  private async cacheLookup(file: SearchableFile, key: string): Promise<MatchRecord[] | null> {
    const cache = this.opts.resultCache;
    if (!cache) return null;
    try {
      const payload = await cache.get(file.sourcePath, file.fingerprint);
      const hit = payload?.[key] ?? null;
      statusManager.recordCacheLookup(hit !== null);
      return hit;
    } catch (e) {
      console.error(`[cache] Lookup failed for ${file.sourcePath}, searching instead:`, e);
      statusManager.recordCacheLookup(false);
      return null;
    }
  }

  /** Persist complete scans of cacheable files. Failures are logged, results still returned. */
  private async cacheStore(
    planned: readonly SearchableFile[],
    reports: SearchSummary["files"],
    cacheable: ReadonlySet<string>,
    incomplete: ReadonlySet<string>,
    rawMatches: ReadonlyMap<string, MatchRecord[]>,
    key: string,
  ): Promise<void> {
    const cache = this.opts.resultCache;
    if (!cache) return;
    const finished = new Set(
      reports
        .filter((r) => r.status === "matched" || r.status === "no-match")
        .map((r) => r.filePath),
    );
    for (const file of planned) {
      const src = file.sourcePath;
      if (!cacheable.has(src) || incomplete.has(src) || !finished.has(src)) continue;
      const matches = [...(rawMatches.get(src) ?? [])].sort((a, b) => a.byteOffset - b.byteOffset);
      try {
        const existing = (await cache.get(src, file.fingerprint)) ?? {};
        await cache.set(src, file.fingerprint, { ...existing, [key]: matches });
      } catch (e) {
        console.error(`[cache] Failed to store results for ${src}:`, e);
      }
    }
  }

  /** Attach 1-based line numbers through each file's line index. */
  private async annotateLines(
    matches: readonly MatchRecord[],
    files: readonly SearchableFile[],
  ): Promise<MatchRecord[]> {
    const byFile = new Map<string, number[]>();
    for (const m of matches) {
      const list = byFile.get(m.filePath) ?? [];
      list.push(m.byteOffset);
      byFile.set(m.filePath, list);
    }
    const readPaths = new Map(files.map((f) => [f.sourcePath, f] as const));

    const lines = new Map<string, Map<number, number>>();
    for (const [src, offsets] of byFile) {
      const file = readPaths.get(src);
      if (!file) continue;
      try {
        let index: LineIndex;
        if (file.compressed || !this.opts.indexStore) {
          // Temp copies are deleted after the request, so their index is never persisted.
          index = await buildLineIndex(file.readPath);
        } else {
          index = (await this.opts.indexStore.getOrBuild(file.readPath)).index;
        }
        lines.set(src, await linesForOffsets(index, file.readPath, offsets));
      } catch (e) {
        console.error(`[index] Could not resolve line numbers for ${path.basename(src)}:`, e);
      }
    }

    return matches.map((m) => {
      const line = lines.get(m.filePath)?.get(m.byteOffset);
      return line === undefined ? m : { ...m, lineNumber: line + 1 };
    });
  }
}
