/**
 * Merges completion-order chunk events into a deterministic, file-ordered result.
 *
 * Ordering policy: strict in-order release. A chunk's matches are held until every
 * lower `sequenceIndex` of the same file has reported, so released matches are always
 * in ascending byte order per file. A chunk that reports `cancelled` or `error` counts
 * as reported and does not block its successors. Chunks that never report (the consumer
 * stopped early) leave gaps; {@link ResultAggregator.finalize} flushes whatever is
 * buffered behind them in sequence order.
 *
 * The global budget is applied at release time, so exactly `budget` matches are
 * returned whenever at least that many were produced.
 */
import type {
  ChunkEvent,
  FailedRange,
  FileReport,
  FileStatus,
  MatchRecord,
  SearchSummary,
  SkipReason,
  SkippedFile,
} from "./types";

interface FileState {
  readonly filePath: string;
  readonly chunkCount: number;
  readonly fromCache: boolean;
  readonly pending: Map<number, readonly MatchRecord[]>;
  nextSeq: number;
  reported: number;
  errors: number;
  cancelled: number;
  /** Matches produced but cut by the budget. */
  dropped: number;
  released: MatchRecord[];
  report: FileReport | null;
}

export interface AcceptResult {
  /** Matches that became releasable with this event, in file order. */
  released: MatchRecord[];
  /** Set when this event was the last outstanding chunk of its file. */
  completedFile: FileReport | null;
}

export type AggregateResult = Omit<SearchSummary, "timedOut" | "elapsedMs">;

export class ResultAggregator {
  private readonly budget: number | undefined;
  private readonly files = new Map<string, FileState>();
  private readonly skipped: SkippedFile[] = [];
  private readonly failed: FailedRange[] = [];
  private readonly fileErrors: { filePath: string; cause: string }[] = [];
  private releasedTotal = 0;
  private truncated = false;

  public constructor(budget?: number) {
    this.budget = budget;
  }

  /** Matches still allowed before the budget is exhausted; undefined when unbounded. */
  public get remainingBudget(): number | undefined {
    return this.budget === undefined ? undefined : Math.max(0, this.budget - this.releasedTotal);
  }

  public get budgetExhausted(): boolean {
    return this.budget !== undefined && this.releasedTotal >= this.budget;
  }

  /**
   * Register a file that will produce `chunkCount` chunk events. A file with no chunks
   * (empty file) is complete immediately and its report is returned.
   */
  public addFile(filePath: string, chunkCount: number): FileReport | null {
    const st = this.register(filePath, chunkCount, false);
    return chunkCount === 0 ? this.complete(st) : null;
  }

  /** Register a file answered from the result cache. */
  public addCachedFile(filePath: string, matches: readonly MatchRecord[]): FileReport {
    const st = this.register(filePath, 1, true);
    st.pending.set(0, [...matches].sort(byOffset));
    st.reported = 1;
    this.flush(st);
    return this.complete(st);
  }

  public skipFile(filePath: string, reason: SkipReason): void {
    this.skipped.push({ filePath, reason });
  }

  /** A file that could not be prepared for searching (e.g. decompression failed). */
  public recordFileError(filePath: string, cause: string): void {
    this.fileErrors.push({ filePath, cause });
  }

  public accept(event: ChunkEvent): AcceptResult {
    const { task, outcome } = event;
    const st = this.files.get(task.sourcePath);
    if (!st) throw new Error(`Chunk event for unregistered file ${task.sourcePath}`);
    const seq = task.descriptor.sequenceIndex;
    if (st.report || seq < st.nextSeq || st.pending.has(seq)) {
      throw new Error(`Duplicate chunk event ${task.sourcePath}#${seq}`);
    }

    switch (outcome.kind) {
      case "matches":
        st.pending.set(seq, [...outcome.matches].sort(byOffset));
        break;
      case "no-match":
        st.pending.set(seq, []);
        break;
      case "error":
        st.errors++;
        st.pending.set(seq, []);
        this.failed.push({
          filePath: task.sourcePath,
          sequenceIndex: seq,
          startOffset: task.descriptor.startOffset,
          endOffset: task.descriptor.endOffset,
          cause: outcome.cause,
        });
        break;
      case "cancelled":
        st.cancelled++;
        this.truncated = true;
        st.pending.set(seq, []);
        break;
    }
    st.reported++;

    const released = this.flush(st);
    const completedFile = st.reported === st.chunkCount ? this.complete(st) : null;
    return { released, completedFile };
  }

  /**
   * Close out every file. Buffered chunks stuck behind a chunk that never reported are
   * released in sequence order, and such files count as truncated.
   */
  public finalize(): AggregateResult {
    for (const st of this.files.values()) {
      if (st.report) continue;
      this.truncated = true;
      const seqs = [...st.pending.keys()].sort((a, b) => a - b);
      for (const seq of seqs) {
        this.release(st, st.pending.get(seq) ?? []);
        st.pending.delete(seq);
      }
      this.complete(st);
    }

    const reports: FileReport[] = [];
    const matches: MatchRecord[] = [];
    for (const st of this.files.values()) {
      if (st.report) reports.push(st.report);
      matches.push(...st.released);
    }

    return {
      matches,
      scannedFiles: reports.filter((r) => r.status !== "cancelled").map((r) => r.filePath),
      skippedFiles: [...this.skipped],
      truncated: this.truncated,
      failedChunks: [...this.failed],
      fileErrors: [...this.fileErrors],
      files: reports,
    };
  }

  private register(filePath: string, chunkCount: number, fromCache: boolean): FileState {
    if (this.files.has(filePath)) throw new Error(`File registered twice: ${filePath}`);
    const st: FileState = {
      filePath,
      chunkCount,
      fromCache,
      pending: new Map(),
      nextSeq: 0,
      reported: 0,
      errors: 0,
      cancelled: 0,
      dropped: 0,
      released: [],
      report: null,
    };
    this.files.set(filePath, st);
    return st;
  }

  /** Release every contiguous buffered chunk starting at `nextSeq`. */
  private flush(st: FileState): MatchRecord[] {
    const out: MatchRecord[] = [];
    for (;;) {
      const chunk = st.pending.get(st.nextSeq);
      if (chunk === undefined) break;
      st.pending.delete(st.nextSeq);
      st.nextSeq++;
      out.push(...this.release(st, chunk));
    }
    return out;
  }

  private release(st: FileState, chunk: readonly MatchRecord[]): readonly MatchRecord[] {
    if (chunk.length === 0) return chunk;
    const room = this.budget === undefined ? chunk.length : this.budget - this.releasedTotal;
    const taken = room >= chunk.length ? chunk : chunk.slice(0, Math.max(0, room));
    if (taken.length < chunk.length) {
      this.truncated = true;
      st.dropped += chunk.length - taken.length;
    }
    st.released.push(...taken);
    this.releasedTotal += taken.length;
    return taken;
  }

  private complete(st: FileState): FileReport {
    let status: FileStatus;
    if (st.released.length > 0) status = "matched";
    else if (st.errors > 0) status = "error";
    else if (st.cancelled > 0 || st.dropped > 0 || st.reported < st.chunkCount) {
      status = "cancelled";
    } else status = "no-match";

    st.report = {
      filePath: st.filePath,
      status,
      matchCount: st.released.length,
      chunkCount: st.chunkCount,
      failedChunks: st.errors,
      fromCache: st.fromCache,
    };
    return st.report;
  }
}

function byOffset(a: MatchRecord, b: MatchRecord): number {
  return a.byteOffset - b.byteOffset;
}
