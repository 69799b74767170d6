import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { APP_DIR, CONFIG_FILE, expandPath, resolveOutputPath } from "./paths.js";

/** Normalize path to POSIX format for cross-platform test assertions */
const toPosix = (p: string) => p.replace(/\\/g, "/");

describe("expandPath", () => {
  it("expands ~ to home directory", () => {
    const result = toPosix(expandPath("~/Downloads/hlsgrab"));
    expect(result).toBe(`${toPosix(homedir())}/Downloads/hlsgrab`);
  });

  it("returns absolute paths unchanged", () => {
    expect(expandPath("/usr/local/bin")).toBe("/usr/local/bin");
  });

  it("returns relative paths unchanged", () => {
    expect(expandPath("relative/path")).toBe("relative/path");
  });

  it("handles just ~ correctly", () => {
    expect(expandPath("~")).toBe(homedir());
  });
});

describe("resolveOutputPath", () => {
  it("places the file name inside the expanded output directory", () => {
    const result = toPosix(resolveOutputPath("~/videos", "talk.mp4"));
    expect(result).toBe(`${toPosix(homedir())}/videos/talk.mp4`);
  });

  it("prefers an explicit output path", () => {
    expect(resolveOutputPath("~/videos", "talk.mp4", "/tmp/custom.mp4")).toBe("/tmp/custom.mp4");
  });

  it("expands ~ in an explicit output path", () => {
    const result = toPosix(resolveOutputPath("/ignored", "talk.mp4", "~/clip.mp4"));
    expect(result).toBe(`${toPosix(homedir())}/clip.mp4`);
  });
});

describe("APP_DIR", () => {
  it("lives in the home directory and holds the config file", () => {
    expect(toPosix(APP_DIR)).toBe(`${toPosix(homedir())}/.hlsgrab`);
    expect(toPosix(CONFIG_FILE)).toBe(`${toPosix(APP_DIR)}/config.json`);
  });
});
