import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig, readVectorDefaults } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

// ============================================================================
// config.get / config.set Tests
// ============================================================================

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("checks")).toBe(false);
    expect(config.get("cache.line")).toBe(64);
    expect(config.get("sort.depth")).toBe(64);
    expect(config.get("index.width")).toBe(32);
  });

  it("should set simple values", () => {
    config.set({ debug: true });
    expect(config.get("debug")).toBe(true);
    expect(config.has("debug")).toBe(true);
  });

  it("should merge nested values", () => {
    config.set({ cache: { line: 128 } });
    expect(config.get("cache.line")).toBe(128);
    expect(config.get("sort.depth")).toBe(64);
  });

  it("should return undefined for unknown paths", () => {
    expect(config.get("nope.nothing")).toBeUndefined();
    expect(config.has("nope")).toBe(false);
  });

  it("should read VECTA_ environment variables", () => {
    vi.stubEnv("VECTA_DEBUG", "1");
    vi.stubEnv("VECTA_CACHE_LINE", "128");
    vi.stubEnv("VECTA_INDEX_WIDTH", "16");
    config.reset();

    expect(config.get("debug")).toBe(true);
    expect(config.get("cache.line")).toBe(128);
    expect(config.get("index.width")).toBe(16);
  });

  it("should let programmatic values override the environment", () => {
    vi.stubEnv("VECTA_SORT_DEPTH", "8");
    config.reset();
    expect(config.get("sort.depth")).toBe(8);

    config.set({ sort: { depth: 16 } });
    expect(config.get("sort.depth")).toBe(16);
  });

  it("getAll returns the merged configuration", () => {
    config.set({ sort: { depth: 8 } });
    expect(config.getAll()).toMatchObject({
      debug: false,
      checks: false,
      cache: { line: 64 },
      sort: { depth: 8 },
      index: { width: 32 },
    });
  });

  it("defineConfig returns its argument", () => {
    const value = defineConfig({ checks: true });
    expect(value).toEqual({ checks: true });
  });
});

// ============================================================================
// readVectorDefaults Tests
// ============================================================================

describe("readVectorDefaults", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return the defaults", () => {
    expect(readVectorDefaults()).toEqual({
      cacheLineSize: 64,
      sortStackDepth: 64,
      indexWidth: 32,
    });
  });

  it("should reflect overrides", () => {
    config.set({ cache: { line: 32 }, index: { width: 53 } });
    expect(readVectorDefaults()).toEqual({
      cacheLineSize: 32,
      sortStackDepth: 64,
      indexWidth: 53,
    });
  });

  it("should reject unsupported index widths", () => {
    config.set({ index: { width: 24 } });
    expect(() => readVectorDefaults()).toThrow(ConfigError);
    expect(() => readVectorDefaults()).toThrow("index.width must be one of 16, 32, 53, got 24");
  });

  it("should reject non-positive sizes", () => {
    config.set({ sort: { depth: 0 } });
    expect(() => readVectorDefaults()).toThrow("sort.depth must be a positive integer, got 0");
  });
});

// ============================================================================
// Config file Tests
// ============================================================================

describe("config files", () => {
  const home = process.cwd();
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vecta-config-"));
    process.chdir(dir);
    config.reset();
  });

  afterEach(() => {
    process.chdir(home);
    rmSync(dir, { recursive: true, force: true });
    config.reset();
  });

  it("loads defaults when no config file exists", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(readVectorDefaults()).toEqual({
      cacheLineSize: 64,
      sortStackDepth: 64,
      indexWidth: 32,
    });
  });

  it("loads .vectarc.json", () => {
    writeFileSync(join(dir, ".vectarc.json"), JSON.stringify({ cache: { line: 128 }, checks: true }));
    expect(config.getConfigFilePath()).toBe(join(dir, ".vectarc.json"));
    expect(config.get("cache.line")).toBe(128);
    expect(config.has("checks")).toBe(true);
    expect(config.get("sort.depth")).toBe(64);
  });

  it("reads the vecta key of package.json", () => {
    writeFileSync(join(dir, "package.json"), JSON.stringify({ name: "app", vecta: { sort: { depth: 16 } } }));
    expect(config.getConfigFilePath()).toBe(join(dir, "package.json"));
    expect(readVectorDefaults().sortStackDepth).toBe(16);
  });

  it("wraps unreadable files in ConfigError", () => {
    writeFileSync(join(dir, ".vectarc.json"), "{ not json");
    expect(() => config.get("debug")).toThrow(ConfigError);
  });
});
