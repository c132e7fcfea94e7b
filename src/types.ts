/**
 * Shared data model for the chunked search pipeline.
 * Offsets are byte offsets into the searched file; ranges are half-open `[start, end)`.
 */

/** File identity used to validate indexes and cache entries without rereading content. */
export interface Fingerprint {
  readonly size: number;
  readonly mtimeMs: number;
}

/** A contiguous byte range of one file searched by exactly one task. */
export interface ChunkDescriptor {
  readonly filePath: string;
  readonly startOffset: number;
  readonly endOffset: number;
  /** Position in file order. Used for re-ordering results, never for scheduling. */
  readonly sequenceIndex: number;
}

/** Unit of work submitted to the worker pool. */
export interface SearchTask {
  readonly descriptor: ChunkDescriptor;
  readonly pattern: string;
  readonly passthroughFlags: readonly string[];
  /**
   * Path reported to callers. Differs from `descriptor.filePath` when the bytes are
   * read from a decompressed temp copy.
   */
  readonly sourcePath: string;
}

export interface MatchRecord {
  readonly filePath: string;
  /** Absolute offset within the searched (decompressed) stream. */
  readonly byteOffset: number;
  readonly text: string | null;
  /** 1-based, only present when line numbers were requested. */
  readonly lineNumber?: number;
}

export interface IndexCheckpoint {
  readonly lineNumber: number;
  readonly byteOffset: number;
}

export type ChunkOutcome =
  | { readonly kind: "matches"; readonly matches: readonly MatchRecord[] }
  | { readonly kind: "no-match" }
  | { readonly kind: "error"; readonly cause: string }
  | { readonly kind: "cancelled" };

/** One completed task, in completion order. */
export interface ChunkEvent {
  readonly task: SearchTask;
  readonly outcome: ChunkOutcome;
}

export interface FailedRange {
  readonly filePath: string;
  readonly sequenceIndex: number;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly cause: string;
}

export type FileStatus = "matched" | "no-match" | "error" | "cancelled";

export interface FileReport {
  readonly filePath: string;
  readonly status: FileStatus;
  readonly matchCount: number;
  readonly chunkCount: number;
  readonly failedChunks: number;
  readonly fromCache: boolean;
}

export type SkipReason =
  | "binary"
  | "archive"
  | "unreadable"
  | "out-of-space"
  | "not-a-file"
  | "outside-root";

export interface SkippedFile {
  readonly filePath: string;
  readonly reason: SkipReason;
}

export interface SearchRequest {
  /** Files or directories, each must resolve inside a search root. */
  readonly paths: readonly string[];
  readonly pattern: string;
  /** Global result budget; undefined means unbounded. */
  readonly maxResults?: number;
  readonly passthroughFlags?: readonly string[];
  /** Annotate matches with 1-based line numbers through the line index. */
  readonly lineNumbers?: boolean;
  /** Wall-clock budget; 0 or undefined disables it. */
  readonly timeoutMs?: number;
}

export interface SearchSummary {
  readonly matches: readonly MatchRecord[];
  readonly scannedFiles: readonly string[];
  readonly skippedFiles: readonly SkippedFile[];
  readonly truncated: boolean;
  readonly timedOut: boolean;
  readonly failedChunks: readonly FailedRange[];
  readonly fileErrors: readonly { readonly filePath: string; readonly cause: string }[];
  readonly files: readonly FileReport[];
  readonly elapsedMs: number;
}
