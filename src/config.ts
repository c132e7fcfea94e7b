import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env next to package.json, otherwise use the default lookup.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[MCP] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;
/** Package name, also used for the default cache directory. */
export const APP_NAME: string = pkg.name;

const MB = 1024 * 1024;

export interface Config {
  SEARCH_ROOTS: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  MAX_WORKERS: number;
  MIN_CHUNK_BYTES: number;
  PROBE_CAP_BYTES: number;
  LARGE_FILE_BYTES: number;
  /** Fixed checkpoint interval; undefined means "scale with file size". */
  INDEX_INTERVAL: number | undefined;
  CACHE_DIR: string;
  RG_PATH: string;
  REQUEST_TIMEOUT_MS: number;
  HOOK_ON_FILE_URL: string | undefined;
  HOOK_ON_COMPLETE_URL: string | undefined;
  MCP_TRANSPORT: string;
}

/** Parse a positive integer env var, clamped to [min, max]; falls back on junk. */
function intEnv(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min) return fallback;
  return Math.min(max, Math.floor(n));
}

function listEnv(name: string): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  const items = raw
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
}

export function getConfig(): Config {
  // Directories a search may touch. Everything else is rejected by the sandbox.
  const SEARCH_ROOTS = (listEnv("SEARCH_ROOTS") ?? [process.cwd()]).map((r) => path.resolve(r));

  // Folder names (not globs) pruned during directory expansion.
  const EXCLUDED_FOLDERS = listEnv("EXCLUDED_FOLDERS") ?? [
    "node_modules",
    ".git",
    ".svn",
    ".hg",
    "__pycache__",
    ".cache",
  ];

  // Verbosity toggle with tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (process.env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  const MAX_WORKERS = intEnv("MAX_WORKERS", 20, 1, 256);

  // Files at or below this size are searched by a single task.
  const MIN_CHUNK_BYTES = intEnv("MIN_CHUNK_MB", 20, 1, 4096) * MB;

  const PROBE_CAP_BYTES = intEnv("PROBE_CAP_KB", 1024, 1, 1024 * 1024) * 1024;

  const LARGE_FILE_BYTES = intEnv("LARGE_FILE_MB", 50, 0, 1024 * 1024) * MB;

  const INDEX_INTERVAL = (() => {
    const n = intEnv("INDEX_INTERVAL", 0, 1, 100_000_000);
    return n > 0 ? n : undefined;
  })();

  const CACHE_DIR = path.resolve(
    process.env.CACHE_DIR?.trim() || path.join(process.cwd(), ".cache", APP_NAME),
  );

  const RG_PATH = process.env.RG_PATH?.trim() || "rg";

  // 0 disables the per-request wall-clock budget.
  const REQUEST_TIMEOUT_MS = intEnv("REQUEST_TIMEOUT_MS", 0, 0, 24 * 60 * 60 * 1000);

  const HOOK_ON_FILE_URL = process.env.HOOK_ON_FILE_URL?.trim() || undefined;
  const HOOK_ON_COMPLETE_URL = process.env.HOOK_ON_COMPLETE_URL?.trim() || undefined;

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (process.env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    SEARCH_ROOTS,
    EXCLUDED_FOLDERS,
    VERBOSE,
    MAX_WORKERS,
    MIN_CHUNK_BYTES,
    PROBE_CAP_BYTES,
    LARGE_FILE_BYTES,
    INDEX_INTERVAL,
    CACHE_DIR,
    RG_PATH,
    REQUEST_TIMEOUT_MS,
    HOOK_ON_FILE_URL,
    HOOK_ON_COMPLETE_URL,
    MCP_TRANSPORT,
  };
}
