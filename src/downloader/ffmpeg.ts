/**
 * FFmpeg integration: availability check and concat-demuxer remuxing.
 */
import { execa } from "execa";

// ============================================================================
// Remux Tool
// ============================================================================

export interface RemuxOutcome {
  /** Process exit code; -1 when the tool could not be started or was killed */
  exitCode: number;
  /** Last lines of diagnostic output, if any */
  stderr: string;
}

/**
 * External program that stitches the segments listed in a concat manifest
 * into one container file.
 */
export interface RemuxTool {
  readonly name: string;
  concat(manifestPath: string, outputPath: string): Promise<RemuxOutcome>;
}

const STDERR_TAIL_LINES = 5;

/**
 * Remux tool backed by an ffmpeg binary.
 */
export function createFfmpegRemuxer(ffmpegPath = "ffmpeg"): RemuxTool {
  return {
    name: "ffmpeg",
    async concat(manifestPath, outputPath) {
      const result = await execa(
        ffmpegPath,
        [
          "-y",
          "-nostdin",
          "-hide_banner",
          "-loglevel",
          "error",
          "-f",
          "concat",
          "-safe",
          "0",
          "-i",
          manifestPath,
          "-c",
          "copy",
          outputPath,
        ],
        { reject: false, stdin: "ignore" }
      );

      const stderr = typeof result.stderr === "string" ? result.stderr : "";
      return {
        exitCode: result.exitCode ?? -1,
        stderr: stderr.split("\n").slice(-STDERR_TAIL_LINES).join("\n").trim(),
      };
    },
  };
}

// ============================================================================
// FFmpeg Availability
// ============================================================================

/**
 * Checks if ffmpeg is available on the system.
 */
/* v8 ignore next 8 */
export async function checkFfmpeg(ffmpegPath = "ffmpeg"): Promise<boolean> {
  try {
    await execa(ffmpegPath, ["-version"]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Install hints shown when ffmpeg is missing.
 */
export const FFMPEG_INSTALL_HINTS: readonly string[] = [
  "macOS:   brew install ffmpeg",
  "Debian:  sudo apt install ffmpeg",
  "Windows: winget install ffmpeg",
];

// ============================================================================
// Concat Manifest
// ============================================================================

/**
 * Builds a concat-demuxer list file. Paths are single-quoted; a quote inside
 * a path is closed, escaped and reopened as the demuxer expects.
 */
export function buildConcatManifest(segmentPaths: readonly string[]): string {
  return segmentPaths.map((p) => `file '${p.replaceAll("'", "'\\''")}'\n`).join("");
}

/**
 * Command that turns a raw-concatenated transport stream into an MP4 later.
 */
export function remuxCommand(rawPath: string, ffmpegPath = "ffmpeg"): string {
  const target = rawPath.replace(/\.ts$/i, "") + ".mp4";
  return `${ffmpegPath} -i "${rawPath}" -c copy "${target}"`;
}
