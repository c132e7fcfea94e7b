/**
 * MCP tool surface.
 *
 * Tool contracts:
 *  search
 *    Input:  { paths?: string[], path?: string, pattern: string, max_results?: number,
 *              rg_flags?: string[], line_numbers?: boolean, timeout_ms?: number }
 *    Output: search summary (matches, scannedFiles, skippedFiles, truncated, timedOut,
 *            failedChunks, fileErrors, files, elapsedMs)
 *    Errors: InvalidParams on malformed arguments; InvalidRequest on a sandbox violation.
 *
 *  read_lines
 *    Input:  { path: string, startLine: number, endLine?: number }   (1-based, inclusive)
 *    Output: { path, startLine, endLine, totalLines, lines }
 *    Seeks through the file's line index, so cost does not grow with the line number.
 *
 *  samples
 *    Input:  { path: string, byte_offsets?: number[], lines?: number[], context?: number,
 *              before?: number, after?: number }   (exactly one of byte_offsets / lines)
 *    Output: { path, beforeContext, afterContext, samples: [{ target, line, lineOffset,
 *              firstLine, lines }] }
 *
 *  index_file
 *    Input:  { path: string, force?: boolean }
 *    Output: { path, rebuilt, fingerprint, interval, lineCount, checkpoints, stats }
 *
 *  check_pattern
 *    Input:  { pattern: string }
 *    Output: { pattern, score, level, risk, warnings, details, patternLength }
 */
import { type CallToolResult, ErrorCode, McpError, type Tool } from "./mcp-sdk";
import { SearchService } from "./search";
import { PathOutsideRootError, PathSandbox } from "./path-security";
import type { LineIndexStore } from "./line-index";
import { InvalidChunkSizeError } from "./chunk-planner";
import { classifyFile } from "./files";
import { DEFAULT_CONTEXT_LINES, type SampleTargets, collectSamples, readLines } from "./samples";
import { analyzePattern } from "./pattern-complexity";

/** Hard cap on lines returned by one read_lines call. */
export const MAX_READ_LINES = 2000;
const DEFAULT_MAX_RESULTS = 1000;
const MAX_RESULTS_CAP = 100_000;
/** Per-call caps for samples. */
export const MAX_SAMPLE_TARGETS = 100;
export const MAX_CONTEXT_LINES = 500;

export interface ToolServices {
  search: SearchService;
  sandbox: PathSandbox;
  indexStore: LineIndexStore;
}

export function toolDefinitions(roots: readonly string[]): Tool[] {
  const where = roots.join(", ");
  return [
    {
      name: "search",
      description: `Regex search over files or directories under ${where}. Large files are split into line-aligned chunks searched in parallel; matches come back ordered by file and byte offset.`,
      inputSchema: {
        type: "object",
        properties: {
          paths: {
            type: "array",
            items: { type: "string" },
            description: "Files or directories to search (absolute, or relative to the first root).",
          },
          path: { type: "string", description: "Single file or directory; alternative to paths." },
          pattern: { type: "string", description: "Regular expression (ripgrep syntax)." },
          max_results: {
            type: "number",
            description: `Stop after this many matches (default ${DEFAULT_MAX_RESULTS}).`,
            minimum: 1,
            maximum: MAX_RESULTS_CAP,
          },
          rg_flags: {
            type: "array",
            items: { type: "string" },
            description: "Extra ripgrep flags forwarded verbatim, e.g. ['-i'].",
          },
          line_numbers: {
            type: "boolean",
            description: "Annotate matches with 1-based line numbers (builds line indexes).",
          },
          timeout_ms: {
            type: "number",
            description: "Wall-clock budget; unfinished chunks are cancelled and the result is marked truncated.",
            minimum: 1,
          },
        },
        required: ["pattern"],
      },
    },
    {
      name: "read_lines",
      description: `Read a 1-based inclusive line range from a text file under ${where} (at most ${MAX_READ_LINES} lines).`,
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string", description: "File to read." },
          startLine: { type: "number", description: "First line (1-based).", minimum: 1 },
          endLine: { type: "number", description: "Last line (inclusive).", minimum: 1 },
        },
        required: ["path", "startLine"],
      },
    },
    {
      name: "samples",
      description: `Lines of context around byte offsets (as returned by search) or 1-based line numbers in a text file under ${where}.`,
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string", description: "File to sample." },
          byte_offsets: {
            type: "array",
            items: { type: "number" },
            description: `Byte offsets to centre samples on (at most ${MAX_SAMPLE_TARGETS}).`,
          },
          lines: {
            type: "array",
            items: { type: "number" },
            description: `1-based line numbers; alternative to byte_offsets (at most ${MAX_SAMPLE_TARGETS}).`,
          },
          context: {
            type: "number",
            description: `Lines before and after each target (default ${DEFAULT_CONTEXT_LINES}).`,
            minimum: 0,
            maximum: MAX_CONTEXT_LINES,
          },
          before: { type: "number", description: "Lines before; overrides context.", minimum: 0 },
          after: { type: "number", description: "Lines after; overrides context.", minimum: 0 },
        },
        required: ["path"],
      },
    },
    {
      name: "index_file",
      description: `Build or validate the line-offset index of a file under ${where} and report its statistics.`,
      inputSchema: {
        type: "object",
        properties: {
          path: { type: "string", description: "File to index." },
          force: { type: "boolean", description: "Rebuild even when the stored index is valid." },
        },
        required: ["path"],
      },
    },
    {
      name: "check_pattern",
      description: "Score a regular expression for backtracking cost before searching with it.",
      inputSchema: {
        type: "object",
        properties: {
          pattern: { type: "string", description: "Regular expression to analyse." },
        },
        required: ["pattern"],
      },
    },
  ];
}

// -------------------- Argument parsing --------------------

type Args = Record<string, unknown>;

function invalid(message: string): McpError {
  return new McpError(ErrorCode.InvalidParams, message);
}

function optString(args: Args, key: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw invalid(`${key} must be a string`);
  return v;
}

function reqString(args: Args, key: string): string {
  const v = optString(args, key);
  if (v === undefined || v.length === 0) throw invalid(`Missing ${key}`);
  return v;
}

function optInt(args: Args, key: string, min: number, max: number): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw invalid(`${key} must be an integer in [${min}, ${max}]`);
  }
  return v;
}

function optBool(args: Args, key: string): boolean | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "boolean") throw invalid(`${key} must be a boolean`);
  return v;
}

function optStringArray(args: Args, key: string): string[] | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === "string")) {
    throw invalid(`${key} must be an array of strings`);
  }
  return v;
}

function optIntArray(args: Args, key: string, min: number, maxItems: number): number[] | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (
    !Array.isArray(v) ||
    v.length === 0 ||
    v.length > maxItems ||
    !v.every((n): n is number => typeof n === "number" && Number.isInteger(n) && n >= min)
  ) {
    throw invalid(`${key} must be 1 to ${maxItems} integers >= ${min}`);
  }
  return v;
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

// -------------------- Tool implementations --------------------

async function searchTool(svc: ToolServices, args: Args): Promise<CallToolResult> {
  const pattern = reqString(args, "pattern");
  const paths = optStringArray(args, "paths") ?? [];
  const single = optString(args, "path");
  if (single) paths.push(single);
  if (paths.length === 0) throw invalid("Provide path or paths");

  const summary = await svc.search.search({
    paths,
    pattern,
    maxResults: optInt(args, "max_results", 1, MAX_RESULTS_CAP) ?? DEFAULT_MAX_RESULTS,
    passthroughFlags: optStringArray(args, "rg_flags") ?? [],
    lineNumbers: optBool(args, "line_numbers") ?? false,
    timeoutMs: optInt(args, "timeout_ms", 1, 24 * 60 * 60 * 1000),
  });
  return jsonResult(summary);
}

/** Sandbox-resolve `rel` and require an uncompressed text file. */
async function resolveTextFile(svc: ToolServices, rel: string): Promise<string> {
  const abs = await svc.sandbox.resolve(rel);
  const cls = await classifyFile(abs);
  if (cls.kind !== "text") {
    const why = cls.kind === "skip" ? cls.reason : `${cls.format}-compressed`;
    throw new McpError(ErrorCode.InvalidRequest, `Cannot read lines of ${rel}: ${why}`);
  }
  return abs;
}

async function readLinesTool(svc: ToolServices, args: Args): Promise<CallToolResult> {
  const rel = reqString(args, "path");
  const startLine = optInt(args, "startLine", 1, Number.MAX_SAFE_INTEGER);
  if (startLine === undefined) throw invalid("Missing startLine");
  const endLine = optInt(args, "endLine", startLine, Number.MAX_SAFE_INTEGER);
  const last = Math.min(endLine ?? startLine + MAX_READ_LINES - 1, startLine + MAX_READ_LINES - 1);

  const abs = await resolveTextFile(svc, rel);
  const { index } = await svc.indexStore.getOrBuild(abs);
  const lines = await readLines(index, abs, startLine - 1, last - startLine + 1);

  return jsonResult({
    path: abs,
    startLine,
    endLine: lines.length > 0 ? startLine + lines.length - 1 : null,
    totalLines: index.lineCount,
    lines,
  });
}

async function samplesTool(svc: ToolServices, args: Args): Promise<CallToolResult> {
  const rel = reqString(args, "path");
  const byteOffsets = optIntArray(args, "byte_offsets", 0, MAX_SAMPLE_TARGETS);
  const lines = optIntArray(args, "lines", 1, MAX_SAMPLE_TARGETS);
  let targets: SampleTargets;
  if (byteOffsets && lines) throw invalid("Provide byte_offsets or lines, not both");
  else if (byteOffsets) targets = { kind: "offsets", byteOffsets };
  else if (lines) targets = { kind: "lines", lines };
  else throw invalid("Provide byte_offsets or lines");

  const context = optInt(args, "context", 0, MAX_CONTEXT_LINES) ?? DEFAULT_CONTEXT_LINES;
  const before = optInt(args, "before", 0, MAX_CONTEXT_LINES) ?? context;
  const after = optInt(args, "after", 0, MAX_CONTEXT_LINES) ?? context;

  const abs = await resolveTextFile(svc, rel);
  const { index } = await svc.indexStore.getOrBuild(abs);
  return jsonResult({
    path: abs,
    beforeContext: before,
    afterContext: after,
    samples: await collectSamples(index, abs, targets, before, after),
  });
}

async function indexFileTool(svc: ToolServices, args: Args): Promise<CallToolResult> {
  const rel = reqString(args, "path");
  const force = optBool(args, "force") ?? false;
  const abs = await svc.sandbox.resolve(rel);
  const { index, rebuilt } = await svc.indexStore.getOrBuild(abs, { force });
  return jsonResult({
    path: abs,
    rebuilt,
    fingerprint: index.fingerprint,
    interval: index.interval,
    lineCount: index.lineCount,
    checkpoints: index.checkpoints.length,
    stats: index.stats,
  });
}

/**
 * Execute a tool by name. Domain errors are translated into MCP errors; anything else
 * propagates and is reported by the SDK as an internal error.
 */
export async function callTool(
  svc: ToolServices,
  name: string,
  args: Args | undefined,
): Promise<CallToolResult> {
  const a = args ?? {};
  try {
    switch (name) {
      case "search":
        return await searchTool(svc, a);
      case "read_lines":
        return await readLinesTool(svc, a);
      case "samples":
        return await samplesTool(svc, a);
      case "index_file":
        return await indexFileTool(svc, a);
      case "check_pattern":
        return jsonResult(analyzePattern(reqString(a, "pattern")));
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    if (e instanceof PathOutsideRootError) throw new McpError(ErrorCode.InvalidRequest, e.message);
    if (e instanceof InvalidChunkSizeError || e instanceof RangeError) {
      throw new McpError(ErrorCode.InvalidParams, e.message);
    }
    throw e;
  }
}
