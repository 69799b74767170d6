import { describe, expect, it } from "vitest";
import { deriveOutputName, slugify } from "./slug.js";

describe("slugify", () => {
  it("lowercases and joins words with dashes", () => {
    expect(slugify("Lecture one")).toBe("lecture-one");
  });

  it("truncates very long names", () => {
    expect(slugify("a".repeat(150))).toHaveLength(100);
  });
});

describe("deriveOutputName", () => {
  it("uses the playlist file name when it is descriptive", () => {
    expect(deriveOutputName("https://cdn.example.com/videos/lecture-one.m3u8")).toBe(
      "lecture-one.mp4"
    );
  });

  it("skips generic playlist names and uses the parent directory", () => {
    expect(deriveOutputName("https://cdn.example.com/lectures/week-3-intro/index.m3u8")).toBe(
      "week-3-intro.mp4"
    );
  });

  it("decodes percent-encoded names", () => {
    expect(deriveOutputName("https://cdn.example.com/videos/lecture%20one.m3u8")).toBe(
      "lecture-one.mp4"
    );
  });

  it("treats plus signs as spaces", () => {
    expect(deriveOutputName("https://cdn.example.com/videos/my+talk.m3u8")).toBe("my-talk.mp4");
  });

  it("ignores the query string", () => {
    expect(deriveOutputName("https://cdn.example.com/talk/master.m3u8?token=abc")).toBe(
      "talk.mp4"
    );
  });

  it("falls back to video when nothing meaningful remains", () => {
    expect(deriveOutputName("https://cdn.example.com/index.m3u8")).toBe("video.mp4");
    expect(deriveOutputName("not a url")).toBe("video.mp4");
  });

  it("accepts a different extension", () => {
    expect(deriveOutputName("https://cdn.example.com/videos/talk.m3u8", ".ts")).toBe("talk.ts");
  });
});
