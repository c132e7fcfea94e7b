/**
 * Fingerprint-validated result cache.
 *
 * All entries live in a single JSON file, loaded lazily on first use:
 *   {
 *     "version": 1,
 *     "entries": {
 *       "/absolute/path/to/file.log": {
 *         "fingerprint": { "size": 73400320, "mtimeMs": 1700000000000 },
 *         "payload": { ... }
 *       }
 *     }
 *   }
 *
 * An entry is valid when its stored fingerprint equals the file's current one. Payloads
 * are typed values checked by a caller-supplied guard on the way in from disk. There is
 * no eviction: stale entries are overwritten by the next `set` for the same key.
 */
import fs from "node:fs/promises";
import path from "node:path";
import type { Fingerprint, MatchRecord } from "./types";
import { isErrnoException, isFingerprint, sameFingerprint, writeFileAtomic } from "./fs-utils";

const CACHE_FORMAT_VERSION = 1;

interface CacheEntry<T> {
  fingerprint: Fingerprint;
  payload: T;
}

interface CacheStore<T> {
  version: number;
  entries: Record<string, CacheEntry<T>>;
}

export type PayloadGuard<T> = (v: unknown) => v is T;

export class AnalysisCache<T> {
  private readonly cacheFilePath: string;
  private readonly isPayload: PayloadGuard<T>;
  private readonly verbose: boolean;
  private store: CacheStore<T> | null = null;
  private loading: Promise<CacheStore<T>> | null = null;
  // Saves are chained so concurrent writers never interleave.
  private saving: Promise<void> = Promise.resolve();

  public constructor(cacheFilePath: string, isPayload: PayloadGuard<T>, verbose = false) {
    this.cacheFilePath = cacheFilePath;
    this.isPayload = isPayload;
    this.verbose = verbose;
  }

  /** Payload for `key` when present and its fingerprint still matches, else null. */
  public async get(key: string, fingerprint: Fingerprint): Promise<T | null> {
    const store = await this.load();
    const entry = store.entries[key];
    if (!entry) {
      if (this.verbose) console.error(`[cache][verbose] Miss for ${path.basename(key)}`);
      return null;
    }
    if (!sameFingerprint(entry.fingerprint, fingerprint)) {
      if (this.verbose) console.error(`[cache][verbose] Stale entry for ${path.basename(key)}`);
      return null;
    }
    if (this.verbose) console.error(`[cache][verbose] Hit for ${path.basename(key)}`);
    return entry.payload;
  }

  public async set(key: string, fingerprint: Fingerprint, payload: T): Promise<void> {
    const store = await this.load();
    store.entries[key] = { fingerprint: { ...fingerprint }, payload };
    await this.persist();
  }

  public async delete(key: string): Promise<boolean> {
    const store = await this.load();
    if (!(key in store.entries)) return false;
    delete store.entries[key];
    await this.persist();
    return true;
  }

  private load(): Promise<CacheStore<T>> {
    if (this.store) return Promise.resolve(this.store);
    this.loading ??= this.readStore().then(
      (s) => {
        this.store = s;
        return s;
      },
      (e: unknown) => {
        this.loading = null;
        throw e;
      },
    );
    return this.loading;
  }

  private async readStore(): Promise<CacheStore<T>> {
    const empty: CacheStore<T> = { version: CACHE_FORMAT_VERSION, entries: {} };
    let json: string;
    try {
      json = await fs.readFile(this.cacheFilePath, "utf8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return empty;
      throw e;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch {
      console.error(`[cache] Corrupt cache file ${this.cacheFilePath}; starting fresh`);
      return empty;
    }
    if (typeof raw !== "object" || raw === null || !("entries" in raw)) return empty;
    if (!("version" in raw) || raw.version !== CACHE_FORMAT_VERSION) return empty;
    const entries = raw.entries;
    if (typeof entries !== "object" || entries === null) return empty;

    let dropped = 0;
    const pairs: [string, unknown][] = Object.entries(entries);
    for (const [key, value] of pairs) {
      if (
        typeof value === "object" &&
        value !== null &&
        "fingerprint" in value &&
        isFingerprint(value.fingerprint) &&
        "payload" in value &&
        this.isPayload(value.payload)
      ) {
        empty.entries[key] = { fingerprint: value.fingerprint, payload: value.payload };
      } else {
        dropped++;
      }
    }
    if (dropped > 0) console.error(`[cache] Dropped ${dropped} malformed cache entries`);
    return empty;
  }

  private persist(): Promise<void> {
    const next = this.saving.then(async () => {
      if (!this.store) return;
      await writeFileAtomic(this.cacheFilePath, JSON.stringify(this.store));
    });
    // A failed write must not poison later ones; the caller still sees this rejection.
    this.saving = next.catch((e: unknown) => {
      console.error(`[cache] Failed to save ${this.cacheFilePath}:`, e);
    });
    return next;
  }
}

/** Search-result payload: pattern key → matches of a complete scan. */
export type SearchCachePayload = Record<string, MatchRecord[]>;

function isMatchRecord(v: unknown): v is MatchRecord {
  return (
    typeof v === "object" &&
    v !== null &&
    "filePath" in v &&
    typeof v.filePath === "string" &&
    "byteOffset" in v &&
    typeof v.byteOffset === "number" &&
    "text" in v &&
    (typeof v.text === "string" || v.text === null)
  );
}

export function isSearchCachePayload(v: unknown): v is SearchCachePayload {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const lists: unknown[] = Object.values(v);
  return lists.every((list) => Array.isArray(list) && list.every(isMatchRecord));
}
