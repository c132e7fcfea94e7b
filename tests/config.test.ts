import { describe, it, expect, afterEach, vi } from "vitest";
import path from "node:path";
import { APP_NAME, getConfig } from "../src/config";

const VARS = [
  "SEARCH_ROOTS",
  "EXCLUDED_FOLDERS",
  "VERBOSE",
  "MAX_WORKERS",
  "MIN_CHUNK_MB",
  "PROBE_CAP_KB",
  "LARGE_FILE_MB",
  "INDEX_INTERVAL",
  "CACHE_DIR",
  "RG_PATH",
  "REQUEST_TIMEOUT_MS",
  "HOOK_ON_FILE_URL",
  "HOOK_ON_COMPLETE_URL",
  "MCP_TRANSPORT",
];

describe("getConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function clearEnv(): void {
    for (const name of VARS) vi.stubEnv(name, "");
  }

  it("falls back to defaults", () => {
    clearEnv();
    const cfg = getConfig();
    expect(cfg.SEARCH_ROOTS).toEqual([process.cwd()]);
    expect(cfg.EXCLUDED_FOLDERS).toContain("node_modules");
    expect(cfg.VERBOSE).toBe(false);
    expect(cfg.MAX_WORKERS).toBe(20);
    expect(cfg.MIN_CHUNK_BYTES).toBe(20 * 1024 * 1024);
    expect(cfg.PROBE_CAP_BYTES).toBe(1024 * 1024);
    expect(cfg.LARGE_FILE_BYTES).toBe(50 * 1024 * 1024);
    expect(cfg.INDEX_INTERVAL).toBeUndefined();
    expect(cfg.CACHE_DIR).toBe(path.join(process.cwd(), ".cache", APP_NAME));
    expect(cfg.RG_PATH).toBe("rg");
    expect(cfg.REQUEST_TIMEOUT_MS).toBe(0);
    expect(cfg.HOOK_ON_FILE_URL).toBeUndefined();
    expect(cfg.MCP_TRANSPORT).toBe("");
  });

  it("reads overrides from the environment", () => {
    clearEnv();
    vi.stubEnv("SEARCH_ROOTS", "/srv/logs, /var/log");
    vi.stubEnv("EXCLUDED_FOLDERS", "archive;tmp");
    vi.stubEnv("VERBOSE", "Yes");
    vi.stubEnv("MAX_WORKERS", "8");
    vi.stubEnv("MIN_CHUNK_MB", "4");
    vi.stubEnv("PROBE_CAP_KB", "64");
    vi.stubEnv("INDEX_INTERVAL", "5000");
    vi.stubEnv("CACHE_DIR", "/tmp/chunked-cache");
    vi.stubEnv("REQUEST_TIMEOUT_MS", "30000");
    vi.stubEnv("HOOK_ON_COMPLETE_URL", "http://hooks.test/done");
    vi.stubEnv("MCP_TRANSPORT", "HTTP");

    const cfg = getConfig();
    expect(cfg.SEARCH_ROOTS).toEqual(["/srv/logs", "/var/log"]);
    expect(cfg.EXCLUDED_FOLDERS).toEqual(["archive", "tmp"]);
    expect(cfg.VERBOSE).toBe(true);
    expect(cfg.MAX_WORKERS).toBe(8);
    expect(cfg.MIN_CHUNK_BYTES).toBe(4 * 1024 * 1024);
    expect(cfg.PROBE_CAP_BYTES).toBe(64 * 1024);
    expect(cfg.INDEX_INTERVAL).toBe(5000);
    expect(cfg.CACHE_DIR).toBe("/tmp/chunked-cache");
    expect(cfg.REQUEST_TIMEOUT_MS).toBe(30000);
    expect(cfg.HOOK_ON_COMPLETE_URL).toBe("http://hooks.test/done");
    expect(cfg.MCP_TRANSPORT).toBe("http");
  });

  it("ignores junk and clamps out-of-range numbers", () => {
    clearEnv();
    vi.stubEnv("MAX_WORKERS", "lots");
    vi.stubEnv("MIN_CHUNK_MB", "0");
    vi.stubEnv("PROBE_CAP_KB", "-5");
    expect(getConfig().MAX_WORKERS).toBe(20);
    expect(getConfig().MIN_CHUNK_BYTES).toBe(20 * 1024 * 1024);
    expect(getConfig().PROBE_CAP_BYTES).toBe(1024 * 1024);

    vi.stubEnv("MAX_WORKERS", "1000");
    expect(getConfig().MAX_WORKERS).toBe(256);
  });
});
