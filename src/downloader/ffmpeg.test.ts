import { describe, expect, it } from "vitest";
import { buildConcatManifest, createFfmpegRemuxer, remuxCommand } from "./ffmpeg.js";

describe("buildConcatManifest", () => {
  it("writes one quoted file line per segment in order", () => {
    expect(buildConcatManifest(["/tmp/w/segment_00001.ts", "/tmp/w/segment_00003.ts"])).toBe(
      "file '/tmp/w/segment_00001.ts'\nfile '/tmp/w/segment_00003.ts'\n"
    );
  });

  it("escapes single quotes in paths", () => {
    expect(buildConcatManifest(["/tmp/it's here/a.ts"])).toBe("file '/tmp/it'\\''s here/a.ts'\n");
  });

  it("returns an empty manifest for no segments", () => {
    expect(buildConcatManifest([])).toBe("");
  });
});

describe("remuxCommand", () => {
  it("suggests an mp4 next to the raw file", () => {
    expect(remuxCommand("/videos/talk.ts")).toBe(
      'ffmpeg -i "/videos/talk.ts" -c copy "/videos/talk.mp4"'
    );
  });

  it("uses a custom ffmpeg path", () => {
    expect(remuxCommand("clip.ts", "/opt/ffmpeg")).toBe(
      '/opt/ffmpeg -i "clip.ts" -c copy "clip.mp4"'
    );
  });
});

describe("createFfmpegRemuxer", () => {
  it("reports a tool that cannot start as exit code -1", async () => {
    const tool = createFfmpegRemuxer("/nonexistent/ffmpeg-for-tests");

    const outcome = await tool.concat("/nonexistent/concat.txt", "/nonexistent/out.mp4");

    expect(tool.name).toBe("ffmpeg");
    expect(outcome.exitCode).toBe(-1);
  });
});
