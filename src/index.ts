/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (dotenv, see config.ts).
 * 2. Build the search roots sandbox and probe for the ripgrep binary.
 * 3. Wire the search service: ripgrep engine, decompressor, line-index store,
 *    result cache and the handler list (verbose logging, optional webhooks).
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): adds /health.
 *
 * Exposed tools:
 *  - search        : Chunked, parallel regex search over files / directories.
 *  - read_lines    : Line range retrieval that seeks through the line-offset index.
 *  - samples       : Context lines around byte offsets or line numbers.
 *  - index_file    : Build / validate a line-offset index and report file statistics.
 *  - check_pattern : Backtracking cost estimate for a regex.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - SEARCH_ROOTS         Comma list of directories searches may touch (default: cwd).
 *  - EXCLUDED_FOLDERS     Comma list of folder names pruned from directory scans.
 *  - VERBOSE              '1'/'true'/etc enables per-file and per-request logging.
 *  - MAX_WORKERS          Concurrent ripgrep / decompression processes (default 20).
 *  - MIN_CHUNK_MB         Files above this are split into chunks (default 20).
 *  - PROBE_CAP_KB         Max bytes scanned for a line end at a chunk boundary (default 1024).
 *  - LARGE_FILE_MB        Results for files at or above this size are cached (default 50).
 *  - INDEX_INTERVAL       Fixed line-index checkpoint interval (default scales with size).
 *  - CACHE_DIR            Index, result cache and temp-file directory.
 *  - RG_PATH              ripgrep binary (default 'rg').
 *  - REQUEST_TIMEOUT_MS   Default per-search wall-clock budget (0 = none).
 *  - HOOK_ON_FILE_URL     GET per finished file.
 *  - HOOK_ON_COMPLETE_URL GET per finished search.
 *  - MCP_TRANSPORT        'stdio' (default) or 'http'/'streamable-http'.
 */
import path from "node:path";
import { getConfig, type Config } from "./config";
import { statusManager } from "./status";
import { PathSandbox } from "./path-security";
import { RipgrepEngine, checkRipgrepAvailable } from "./ripgrep";
import { Decompressor } from "./decompress";
import { LineIndexStore } from "./line-index";
import { AnalysisCache, isSearchCachePayload } from "./analysis-cache";
import { LoggingHandler, type SearchHandler, WebhookHandler } from "./handlers";
import { SearchService } from "./search";
import { createServerFactory } from "./server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();
const {
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
} = config;

const sandbox = await PathSandbox.create(SEARCH_ROOTS);
statusManager.setSearchRoots([...sandbox.getRoots()]);

// Missing ripgrep is not fatal at startup: searches report per-chunk errors instead.
const rgOk = await checkRipgrepAvailable(RG_PATH);
statusManager.setRipgrepAvailable(rgOk);
if (!rgOk) console.error(`[MCP] '${RG_PATH}' not found or not runnable; search will fail`);

const handlers: SearchHandler[] = [];
if (VERBOSE) handlers.push(new LoggingHandler());
if (HOOK_ON_FILE_URL || HOOK_ON_COMPLETE_URL) {
  handlers.push(
    new WebhookHandler({ onFileUrl: HOOK_ON_FILE_URL, onCompleteUrl: HOOK_ON_COMPLETE_URL }),
  );
}

const indexStore = new LineIndexStore(path.join(CACHE_DIR, "indexes"), {
  interval: INDEX_INTERVAL,
  verbose: VERBOSE,
});

const search = new SearchService({
  sandbox,
  engine: new RipgrepEngine({ rgPath: RG_PATH, verbose: VERBOSE }),
  decompressor: new Decompressor(path.join(CACHE_DIR, "tmp")),
  maxWorkers: MAX_WORKERS,
  minChunkBytes: MIN_CHUNK_BYTES,
  probeCapBytes: PROBE_CAP_BYTES,
  largeFileBytes: LARGE_FILE_BYTES,
  excludedFolders: EXCLUDED_FOLDERS,
  resultCache: new AnalysisCache(
    path.join(CACHE_DIR, "search-cache.json"),
    isSearchCachePayload,
    VERBOSE,
  ),
  indexStore,
  handlers,
  defaultTimeoutMs: REQUEST_TIMEOUT_MS,
  verbose: VERBOSE,
});

if (VERBOSE) {
  console.error(
    `[MCP] Roots: ${sandbox.getRoots().join(", ")}; workers=${MAX_WORKERS}; min chunk=${MIN_CHUNK_BYTES} bytes; cache=${CACHE_DIR}`,
  );
}

const createServer = createServerFactory({ search, sandbox, indexStore });

// Choose transport: stdio (default) or streamable HTTP via MCP_TRANSPORT=http|stdio
const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(createServer);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer);
}
