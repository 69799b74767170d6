export { assembleSegments, rawOutputPath } from "./assembler.js";
export type { AssemblerOptions } from "./assembler.js";
export {
  buildConcatManifest,
  checkFfmpeg,
  createFfmpegRemuxer,
  FFMPEG_INSTALL_HINTS,
  remuxCommand,
} from "./ffmpeg.js";
export type { RemuxOutcome, RemuxTool } from "./ffmpeg.js";
export { describeOutcome, downloadPlaylist } from "./pipeline.js";
export type { DownloadPlaylistOptions } from "./pipeline.js";
export { DEFAULT_CONCURRENCY, fetchSegments, segmentFileName } from "./segmentFetcher.js";
export type { SegmentFetcherOptions } from "./segmentFetcher.js";
export { createWorkspace, withWorkspace } from "./workspace.js";
export type { Workspace } from "./workspace.js";
export type * from "./types.js";
