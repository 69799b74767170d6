import { describe, expect, it } from "vitest";
import { getBaseUrl, getUrlPath, isAbsoluteUrl, isPlaylistUrl, resolveUrl } from "./url.js";

describe("getBaseUrl", () => {
  it("extracts base URL up to last slash", () => {
    expect(getBaseUrl("https://cdn.example.com/videos/playlist.m3u8")).toBe(
      "https://cdn.example.com/videos/"
    );
  });

  it("drops query params", () => {
    expect(getBaseUrl("https://cdn.example.com/path/index.m3u8?token=abc")).toBe(
      "https://cdn.example.com/path/"
    );
  });

  it("handles root URL", () => {
    expect(getBaseUrl("https://example.com/")).toBe("https://example.com/");
  });

  it("enforces a trailing slash for URLs without a path", () => {
    expect(getBaseUrl("https://example.com")).toBe("https://example.com/");
  });

  it("handles deeply nested paths", () => {
    expect(getBaseUrl("https://cdn.com/a/b/c/d/file.m3u8")).toBe("https://cdn.com/a/b/c/d/");
  });
});

describe("resolveUrl", () => {
  it("returns absolute URL unchanged", () => {
    expect(resolveUrl("https://other.com/file.ts", "https://cdn.com/index.m3u8")).toBe(
      "https://other.com/file.ts"
    );
  });

  it("resolves a nested relative path against the playlist directory", () => {
    expect(resolveUrl("chunk/001.ts", "https://host/path/index.m3u8")).toBe(
      "https://host/path/chunk/001.ts"
    );
  });

  it("resolves a root-relative path against the origin", () => {
    expect(resolveUrl("/media/seg_1.ts", "https://host/path/index.m3u8")).toBe(
      "https://host/media/seg_1.ts"
    );
  });

  it("resolves parent directory references", () => {
    expect(resolveUrl("../720p/index.m3u8", "https://host/a/master/index.m3u8")).toBe(
      "https://host/a/720p/index.m3u8"
    );
  });

  it("does not carry the playlist query string to the segment", () => {
    expect(resolveUrl("seg_1.ts", "https://host/path/index.m3u8?token=abc")).toBe(
      "https://host/path/seg_1.ts"
    );
  });

  it("keeps the segment's own query string", () => {
    expect(resolveUrl("seg_1.ts?sig=xyz", "https://host/path/index.m3u8")).toBe(
      "https://host/path/seg_1.ts?sig=xyz"
    );
  });
});

describe("isAbsoluteUrl", () => {
  it("detects http and https URLs", () => {
    expect(isAbsoluteUrl("http://a.com/x")).toBe(true);
    expect(isAbsoluteUrl("HTTPS://a.com/x")).toBe(true);
  });

  it("rejects relative paths", () => {
    expect(isAbsoluteUrl("seg.ts")).toBe(false);
    expect(isAbsoluteUrl("/seg.ts")).toBe(false);
    expect(isAbsoluteUrl("httpfoo/seg.ts")).toBe(false);
  });
});

describe("isPlaylistUrl", () => {
  it("accepts .m3u8 URLs with and without query", () => {
    expect(isPlaylistUrl("https://cdn.example.com/master.m3u8")).toBe(true);
    expect(isPlaylistUrl("https://cdn.example.com/master.m3u8?token=abc")).toBe(true);
    expect(isPlaylistUrl("https://cdn.example.com/entryId/1_abc/format/applehttp/a.m3u8")).toBe(
      true
    );
  });

  it("rejects page URLs", () => {
    expect(isPlaylistUrl("https://mediaspace.example.com/media/Lecture+1/1_abc")).toBe(false);
    expect(isPlaylistUrl("https://example.com/watch?src=video.m3u8")).toBe(false);
  });

  it("rejects invalid URLs", () => {
    expect(isPlaylistUrl("not-a-url")).toBe(false);
    expect(isPlaylistUrl("")).toBe(false);
  });
});

describe("getUrlPath", () => {
  it("strips query and fragment from URLs", () => {
    expect(getUrlPath("https://a.com/x/seg.ts?t=1#f")).toBe("/x/seg.ts");
  });

  it("strips query from relative references", () => {
    expect(getUrlPath("chunk/001.ts?t=1")).toBe("chunk/001.ts");
  });
});
