import path from "node:path";
import type { FileReport, SearchSummary } from "./types";

/**
 * Observer of search progress. Handlers run in list order; a handler that throws or
 * rejects is logged and skipped, never failing the search.
 */
export interface SearchHandler {
  readonly name: string;
  onFile?(report: FileReport): void | Promise<void>;
  onComplete?(summary: SearchSummary): void | Promise<void>;
}

export async function runFileHandlers(
  handlers: readonly SearchHandler[],
  report: FileReport,
): Promise<void> {
  for (const h of handlers) {
    if (!h.onFile) continue;
    try {
      await h.onFile(report);
    } catch (e) {
      console.error(`[search] Handler ${h.name} failed in onFile:`, e);
    }
  }
}

export async function runCompleteHandlers(
  handlers: readonly SearchHandler[],
  summary: SearchSummary,
): Promise<void> {
  for (const h of handlers) {
    if (!h.onComplete) continue;
    try {
      await h.onComplete(summary);
    } catch (e) {
      console.error(`[search] Handler ${h.name} failed in onComplete:`, e);
    }
  }
}

/** Verbose one-line progress per file and per request. */
export class LoggingHandler implements SearchHandler {
  public readonly name = "logging";

  public onFile(report: FileReport): void {
    console.error(
      `[search][verbose] ${path.basename(report.filePath)}: ${report.status}, ${report.matchCount} matches over ${report.chunkCount} chunk(s)${report.fromCache ? " (cached)" : ""}`,
    );
  }

  public onComplete(summary: SearchSummary): void {
    console.error(
      `[search][verbose] Done in ${summary.elapsedMs}ms: ${summary.matches.length} matches, ${summary.scannedFiles.length} scanned, ${summary.skippedFiles.length} skipped${summary.truncated ? ", truncated" : ""}${summary.timedOut ? ", timed out" : ""}`,
    );
  }
}

export interface WebhookOptions {
  onFileUrl?: string;
  onCompleteUrl?: string;
  timeoutMs?: number;
}

/**
 * Fires an HTTP GET per event with the event's fields as query parameters.
 * Non-2xx answers and timeouts reject, which the handler runner logs.
 */
export class WebhookHandler implements SearchHandler {
  public readonly name = "webhook";
  private readonly onFileUrl: string | undefined;
  private readonly onCompleteUrl: string | undefined;
  private readonly timeoutMs: number;

  public constructor(opts: WebhookOptions) {
    this.onFileUrl = opts.onFileUrl;
    this.onCompleteUrl = opts.onCompleteUrl;
    this.timeoutMs = opts.timeoutMs ?? 3000;
  }

  public async onFile(report: FileReport): Promise<void> {
    if (!this.onFileUrl) return;
    await this.call(this.onFileUrl, {
      event: "file",
      path: report.filePath,
      status: report.status,
      matches: String(report.matchCount),
      chunks: String(report.chunkCount),
      failed_chunks: String(report.failedChunks),
    });
  }

  public async onComplete(summary: SearchSummary): Promise<void> {
    if (!this.onCompleteUrl) return;
    await this.call(this.onCompleteUrl, {
      event: "complete",
      matches: String(summary.matches.length),
      scanned_files: String(summary.scannedFiles.length),
      skipped_files: String(summary.skippedFiles.length),
      failed_chunks: String(summary.failedChunks.length),
      truncated: String(summary.truncated),
      timed_out: String(summary.timedOut),
      elapsed_ms: String(summary.elapsedMs),
    });
  }

  private async call(base: string, params: Record<string, string>): Promise<void> {
    const url = new URL(base);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    const res = await fetch(url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) throw new Error(`${url.origin}${url.pathname} answered ${res.status}`);
  }
}
