import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, saveConfig, parsePositiveInt, resolveLimit } from "../../src/utils/config.js";
import { ConfigurationError } from "../../src/core/errors.js";
import { CONFIG_FILENAME, DEFAULT_LIMIT } from "../../src/core/schema.js";
import { createTmpDir, cleanupTmpDir, createFile } from "../helpers.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(tmpDir);
});

describe("loadConfig / saveConfig", () => {
  it("returns null when no config exists", async () => {
    expect(await loadConfig(tmpDir)).toBeNull();
  });

  it("round-trips a config file", async () => {
    await saveConfig(tmpDir, { limit: 3, echo: true, shell: "/bin/bash" });
    expect(await loadConfig(tmpDir)).toEqual({ limit: 3, echo: true, shell: "/bin/bash" });
  });

  it("treats an invalid file as no config", async () => {
    await createFile(tmpDir, CONFIG_FILENAME, "limit: 0\n");
    expect(await loadConfig(tmpDir)).toBeNull();
  });

  it("refuses to save an invalid config", async () => {
    await expect(saveConfig(tmpDir, { limit: -2 })).rejects.toThrow();
    expect(await loadConfig(tmpDir)).toBeNull();
  });
});

describe("parsePositiveInt", () => {
  it("accepts positive integers", () => {
    expect(parsePositiveInt("4")).toBe(4);
    expect(parsePositiveInt(" 12 ")).toBe(12);
  });

  it.each(["0", "-1", "2.5", "abc", "", "3x"])("rejects %j", (raw) => {
    expect(parsePositiveInt(raw)).toBeUndefined();
  });

  it("rejects values beyond the safe integer range", () => {
    expect(parsePositiveInt("9".repeat(400))).toBeUndefined();
    expect(parsePositiveInt("9007199254740993")).toBeUndefined();
    expect(parsePositiveInt("9007199254740991")).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe("resolveLimit", () => {
  it("prefers the flag", () => {
    expect(resolveLimit(2, { limit: 8 }, { BGJOBS_LIMIT: "5" })).toBe(2);
  });

  it("falls back to BGJOBS_LIMIT", () => {
    expect(resolveLimit(undefined, { limit: 8 }, { BGJOBS_LIMIT: "5" })).toBe(5);
  });

  it("falls back to the config file", () => {
    expect(resolveLimit(undefined, { limit: 8 }, {})).toBe(8);
  });

  it("falls back to the default", () => {
    expect(resolveLimit(undefined, null, {})).toBe(DEFAULT_LIMIT);
    expect(resolveLimit(undefined, {}, { BGJOBS_LIMIT: "" })).toBe(DEFAULT_LIMIT);
  });

  it("rejects an invalid flag", () => {
    expect(() => resolveLimit(0, null, {})).toThrow(ConfigurationError);
  });

  it("rejects an oversized BGJOBS_LIMIT", () => {
    expect(() => resolveLimit(undefined, null, { BGJOBS_LIMIT: "9".repeat(400) }))
      .toThrow(ConfigurationError);
  });

  it("rejects an invalid BGJOBS_LIMIT", () => {
    expect(() => resolveLimit(undefined, null, { BGJOBS_LIMIT: "many" }))
      .toThrow('BGJOBS_LIMIT must be a positive integer, got "many"');
  });
});
