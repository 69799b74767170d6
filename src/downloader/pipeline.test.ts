import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PipelineEvent } from "../shared/events.js";
import { MemoryTransport } from "../shared/memoryTransport.js";
import type { RemuxOutcome, RemuxTool } from "./ffmpeg.js";
import { describeOutcome, downloadPlaylist } from "./pipeline.js";
import type { PlaylistDownloadResult } from "./types.js";

const MASTER_URL = "https://cdn.test/course/master.m3u8";

/**
 * Records each manifest and writes the listed files' contents as the output.
 */
class RecordingRemuxer implements RemuxTool {
  readonly name = "recording";
  manifests: string[] = [];

  async concat(manifestPath: string, outputPath: string): Promise<RemuxOutcome> {
    const manifest = await readFile(manifestPath, "utf8");
    this.manifests.push(manifest);
    const files = manifest
      .split("\n")
      .map((line) => /^file '(.*)'$/.exec(line)?.[1])
      .filter((file): file is string => file !== undefined);
    const parts = await Promise.all(files.map((file) => readFile(file, "utf8")));
    await writeFile(outputPath, parts.join(""));
    return { exitCode: 0, stderr: "" };
  }
}

function mediaPlaylist(count: number): string {
  const lines = ["#EXTM3U", "#EXT-X-TARGETDURATION:4"];
  for (let i = 1; i <= count; i++) {
    lines.push("#EXTINF:4,", `seg_${i}.ts`);
  }
  lines.push("#EXT-X-ENDLIST");
  return lines.join("\n");
}

function courseTransport(count: number): MemoryTransport {
  const transport = new MemoryTransport({
    [MASTER_URL]: `#EXTM3U
#EXT-X-STREAM-INF:BANDWIDTH=800000
low/index.m3u8
#EXT-X-STREAM-INF:BANDWIDTH=3000000
high/index.m3u8`,
    "https://cdn.test/course/high/index.m3u8": mediaPlaylist(count),
  });
  for (let i = 1; i <= count; i++) {
    transport.route(`https://cdn.test/course/high/seg_${i}.ts`, `<${i}>`);
  }
  return transport;
}

describe("downloadPlaylist", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "pipeline-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("downloads the best variant into one remuxed file", async () => {
    const transport = courseTransport(3);
    const remuxTool = new RecordingRemuxer();
    const outputPath = path.join(root, "lecture.mp4");

    const result = await downloadPlaylist(MASTER_URL, outputPath, { transport, remuxTool });

    expect(result).toMatchObject({
      success: true,
      status: "complete",
      outputPath,
      muxed: true,
      strategy: "remux",
      playlistLocation: "https://cdn.test/course/high/index.m3u8",
      totalSegments: 3,
      failedSegments: 0,
      missingOrdinals: [],
    });
    expect(await readFile(outputPath, "utf8")).toBe("<1><2><3>");
    expect(transport.fetchedUrls).not.toContain("https://cdn.test/course/low/index.m3u8");
  });

  it("reports a degraded success when one segment fails", async () => {
    const transport = courseTransport(10);
    transport.route("https://cdn.test/course/high/seg_5.ts", { status: 500 });
    const remuxTool = new RecordingRemuxer();
    const outputPath = path.join(root, "lecture.mp4");

    const result = await downloadPlaylist(MASTER_URL, outputPath, {
      transport,
      remuxTool,
      concurrency: 3,
    });

    expect(remuxTool.manifests[0]?.trimEnd().split("\n")).toHaveLength(9);
    expect(result).toMatchObject({
      success: true,
      status: "degraded",
      muxed: true,
      failedSegments: 1,
      missingOrdinals: [5],
    });
    expect(describeOutcome(result)).toBe("degraded success, 1/10 segments missing");
    expect(await readFile(outputPath, "utf8")).toBe("<1><2><3><4><6><7><8><9><10>");
  });

  it("falls back to a raw .ts file without a remux tool", async () => {
    const transport = courseTransport(2);
    const outputPath = path.join(root, "lecture.mp4");

    const result = await downloadPlaylist(MASTER_URL, outputPath, { transport });

    expect(result).toMatchObject({
      success: true,
      status: "complete",
      outputPath: path.join(root, "lecture.ts"),
      muxed: false,
      strategy: "concat",
    });
    expect(await readFile(path.join(root, "lecture.ts"), "utf8")).toBe("<1><2>");
    expect(describeOutcome(result)).toBe("complete, 2/2 segments, needs remux");
  });

  it("leaves no workspace behind", async () => {
    const transport = courseTransport(2);
    transport.route("https://cdn.test/course/high/seg_2.ts", { status: 404 });

    await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), {
      transport,
      remuxTool: new RecordingRemuxer(),
    });

    expect(await readdir(root)).toEqual(["a.mp4"]);
  });

  it("registers workspace cleanup with the caller", async () => {
    const cleanups: Array<() => Promise<void>> = [];

    await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), {
      transport: courseTransport(1),
      registerCleanup: (fn) => cleanups.push(fn),
    });

    expect(cleanups).toHaveLength(1);
  });

  it("returns an error result when resolution fails", async () => {
    const transport = new MemoryTransport();

    const result = await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), { transport });

    expect(result).toEqual({
      success: false,
      error: "Playlist returned HTTP 404",
      errorCode: "PLAYLIST_FETCH_ERROR",
      location: MASTER_URL,
      hop: 1,
      statusCode: 404,
    });
    expect(await readdir(root)).toEqual([]);
  });

  it("returns ASSEMBLY_FAILURE when every segment fails", async () => {
    const transport = new MemoryTransport({
      [MASTER_URL]: mediaPlaylist(2),
    });

    const result = await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), { transport });

    expect(result).toMatchObject({ success: false, errorCode: "ASSEMBLY_FAILURE" });
    expect(await readdir(root)).toEqual([]);
  });

  it("rejects locations that are not URLs", async () => {
    const result = await downloadPlaylist("not a url", path.join(root, "a.mp4"), {
      transport: new MemoryTransport(),
    });

    expect(result).toMatchObject({ success: false, errorCode: "INVALID_URL" });
  });

  it("returns CANCELLED when shutdown is requested mid-run", async () => {
    const transport = courseTransport(4);
    let cancelled = false;

    const result = await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), {
      transport,
      concurrency: 1,
      shouldContinue: () => !cancelled,
      onEvent: (event) => {
        if (event.type === "segment-fetched" && event.ordinal === 2) cancelled = true;
      },
    });

    expect(result).toMatchObject({
      success: false,
      errorCode: "CANCELLED",
      details: "2/4 segments fetched before cancellation",
    });
    expect(await readdir(root)).toEqual([]);
  });

  it("emits events from every stage in order", async () => {
    const events: PipelineEvent[] = [];

    await downloadPlaylist(MASTER_URL, path.join(root, "a.mp4"), {
      transport: courseTransport(2),
      remuxTool: new RecordingRemuxer(),
      concurrency: 1,
      onEvent: (event) => events.push(event),
    });

    expect(events.map((e) => e.type)).toEqual([
      "playlist-fetched",
      "variant-selected",
      "playlist-fetched",
      "segments-resolved",
      "segment-fetched",
      "segment-fetched",
      "remux-started",
      "assembled",
    ]);
  });
});

describe("describeOutcome", () => {
  it("formats failures with their code", () => {
    const result: PlaylistDownloadResult = {
      success: false,
      error: "No segments found in media playlist",
      errorCode: "NO_SEGMENTS_FOUND",
    };

    expect(describeOutcome(result)).toBe(
      "failed: No segments found in media playlist (NO_SEGMENTS_FOUND)"
    );
  });
});
