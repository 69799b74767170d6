/**
 * End-to-end download: resolve the playlist, fetch its segments, stitch them.
 */
import { PlaylistResolver } from "../playlist/resolver.js";
import type { SegmentFilter } from "../playlist/types.js";
import { errorMessage, isPipelineError, PipelineError } from "../shared/errors.js";
import type { PipelineEventHandler } from "../shared/events.js";
import type { Transport } from "../shared/http.js";
import { assembleSegments } from "./assembler.js";
import type { RemuxTool } from "./ffmpeg.js";
import { fetchSegments } from "./segmentFetcher.js";
import type { PlaylistDownloadResult } from "./types.js";
import { withWorkspace } from "./workspace.js";

export interface DownloadPlaylistOptions {
  transport: Transport;
  /** Null or omitted skips remuxing and writes a raw `.ts` file */
  remuxTool?: RemuxTool | null | undefined;
  concurrency?: number | undefined;
  maxHops?: number | undefined;
  segmentFilter?: SegmentFilter | undefined;
  /** Cancellation token, e.g. from the shutdown manager */
  shouldContinue?: (() => boolean) | undefined;
  /** Lets a signal handler remove the workspace if the process is interrupted */
  registerCleanup?: ((fn: () => Promise<void>) => void) | undefined;
  onEvent?: PipelineEventHandler | undefined;
}

/**
 * Downloads the playlist at `location` into `outputPath`.
 *
 * Never throws for pipeline failures; they come back as an error result.
 * Missing segments do not fail the run but mark it as degraded.
 */
export async function downloadPlaylist(
  location: string,
  outputPath: string,
  options: DownloadPlaylistOptions
): Promise<PlaylistDownloadResult> {
  const { transport, shouldContinue, onEvent } = options;

  if (!URL.canParse(location)) {
    return new PipelineError("Invalid playlist URL", "INVALID_URL", {
      location,
      details: "Expected an absolute http(s) URL",
    }).toResult();
  }

  try {
    const resolver = new PlaylistResolver({
      transport,
      maxHops: options.maxHops,
      segmentFilter: options.segmentFilter,
      onEvent,
    });
    const playlist = await resolver.resolve(location);

    return await withWorkspace(outputPath, async (workspace) => {
      options.registerCleanup?.(() => workspace.dispose());

      const results = await fetchSegments(playlist.segments, {
        transport,
        workspace,
        concurrency: options.concurrency,
        shouldContinue,
        onEvent,
      });

      if (shouldContinue && !shouldContinue()) {
        const fetched = results.filter((r) => r.success).length;
        throw new PipelineError("Download cancelled", "CANCELLED", {
          details: `${fetched}/${results.length} segments fetched before cancellation`,
        });
      }

      const assembly = await assembleSegments(results, outputPath, {
        workspace,
        remuxTool: options.remuxTool,
        onEvent,
      });

      return {
        success: true,
        status: assembly.missingOrdinals.length === 0 ? "complete" : "degraded",
        outputPath: assembly.outputPath,
        muxed: assembly.muxed,
        strategy: assembly.strategy,
        playlistLocation: playlist.location,
        totalSegments: results.length,
        failedSegments: assembly.missingOrdinals.length,
        missingOrdinals: assembly.missingOrdinals,
        bytes: assembly.bytes,
        variant: playlist.variant,
      };
    });
  } catch (error) {
    if (isPipelineError(error)) {
      return error.toResult();
    }
    return {
      success: false,
      error: errorMessage(error),
      errorCode: "UNKNOWN_ERROR",
      location,
    };
  }
}

/**
 * One-line summary of a download result, e.g.
 * `degraded success, 1/10 segments missing`.
 */
export function describeOutcome(result: PlaylistDownloadResult): string {
  if (!result.success) {
    return `failed: ${result.error} (${result.errorCode})`;
  }
  const container = result.muxed ? "" : ", needs remux";
  if (result.status === "complete") {
    return `complete, ${result.totalSegments}/${result.totalSegments} segments${container}`;
  }
  return `degraded success, ${result.failedSegments}/${result.totalSegments} segments missing${container}`;
}
