import { APP_VERSION } from "./config";

/**
 * Monotonic counters describing work done since startup.
 * All values are non-negative integers updated in-place.
 */
export interface SearchCounters {
  /** Search requests accepted (sandbox violations are not counted). */
  searches: number;
  /** Chunk tasks handed to the worker pool. */
  chunksDispatched: number;
  /** Chunk tasks that ended in an engine error. */
  chunksFailed: number;
  /** Line indexes built or rebuilt. */
  indexBuilds: number;
  cacheHits: number;
  cacheMisses: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + search activity.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Roots the sandbox allows searches under. */
  searchRoots: string[];
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** Whether the regex engine binary answered a version probe at startup. */
  ripgrepAvailable: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  counters: SearchCounters;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      searchRoots: initial?.searchRoots ?? [],
      transport: initial?.transport ?? "unknown",
      ripgrepAvailable: initial?.ripgrepAvailable ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      counters: initial?.counters ?? {
        searches: 0,
        chunksDispatched: 0,
        chunksFailed: 0,
        indexBuilds: 0,
        cacheHits: 0,
        cacheMisses: 0,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setSearchRoots(roots: string[]) {
    this.data.searchRoots = [...roots];
  }

  public setRipgrepAvailable(ok: boolean) {
    this.data.ripgrepAvailable = ok;
  }

  public incSearches() {
    this.data.counters.searches++;
  }

  public incChunksDispatched(count = 1) {
    this.data.counters.chunksDispatched += count;
  }

  public incChunksFailed(count = 1) {
    this.data.counters.chunksFailed += count;
  }

  public incIndexBuilds() {
    this.data.counters.indexBuilds++;
  }

  public recordCacheLookup(hit: boolean) {
    if (hit) this.data.counters.cacheHits++;
    else this.data.counters.cacheMisses++;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (search service, transports, health checks).
export const statusManager = new StatusManager();
