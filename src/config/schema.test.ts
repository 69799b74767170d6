import { describe, expect, it } from "vitest";
import { CONFIG_KEYS, configSchema, isConfigKey } from "./schema.js";

describe("configSchema", () => {
  it("parses empty object with defaults", () => {
    const result = configSchema.parse({});
    expect(result).toEqual({
      outputDir: "~/Downloads/hlsgrab",
      concurrency: 4,
      maxHops: 5,
      retryAttempts: 2,
      probeTimeoutMs: 10000,
      transferTimeoutMs: 30000,
      segmentFilter: "heuristic",
      ffmpegPath: "ffmpeg",
    });
  });

  it("accepts valid config values", () => {
    const input = {
      outputDir: "/custom/path",
      concurrency: 8,
      maxHops: 3,
      retryAttempts: 0,
      probeTimeoutMs: 2000,
      transferTimeoutMs: 60000,
      userAgent: "test-agent/1.0",
      segmentFilter: "grammar" as const,
      ffmpegPath: "/opt/bin/ffmpeg",
    };
    const result = configSchema.parse(input);
    expect(result).toEqual(input);
  });

  it("rejects an unknown segment filter", () => {
    expect(() => configSchema.parse({ segmentFilter: "regex" })).toThrow();
  });

  it("rejects concurrency outside valid range", () => {
    expect(() => configSchema.parse({ concurrency: 0 })).toThrow();
    expect(() => configSchema.parse({ concurrency: 17 })).toThrow();
    expect(() => configSchema.parse({ concurrency: 2.5 })).toThrow();
  });

  it("rejects hop limits outside valid range", () => {
    expect(() => configSchema.parse({ maxHops: 0 })).toThrow();
    expect(() => configSchema.parse({ maxHops: 11 })).toThrow();
  });

  it("rejects retry attempts outside valid range", () => {
    expect(() => configSchema.parse({ retryAttempts: -1 })).toThrow();
    expect(() => configSchema.parse({ retryAttempts: 11 })).toThrow();
  });

  it("rejects empty tool paths", () => {
    expect(() => configSchema.parse({ ffmpegPath: "" })).toThrow();
  });
});

describe("isConfigKey", () => {
  it("accepts every schema key", () => {
    for (const key of CONFIG_KEYS) {
      expect(isConfigKey(key)).toBe(true);
    }
  });

  it("rejects unknown keys", () => {
    expect(isConfigKey("videoQuality")).toBe(false);
    expect(isConfigKey("")).toBe(false);
  });
});
