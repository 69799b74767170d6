/**
 * Downloads resolved segments into a workspace with a bounded worker pool.
 *
 * Results land in a slot array indexed by playlist position, so the returned
 * order is playlist order no matter which request finishes first. A failed
 * segment is recorded in its slot and never stops the run.
 */
import { open } from "node:fs/promises";
import * as path from "node:path";
import PQueue from "p-queue";
import type { Segment } from "../playlist/types.js";
import { errorMessage, PipelineError } from "../shared/errors.js";
import type { PipelineEventHandler } from "../shared/events.js";
import { removeFile } from "../shared/fs.js";
import type { Transport } from "../shared/http.js";
import { getUrlPath } from "../shared/url.js";
import type { FetchResult } from "./types.js";
import type { Workspace } from "./workspace.js";

export const DEFAULT_CONCURRENCY = 4;

export const CANCELLED_ERROR = "cancelled";

const SEGMENT_FILE_EXTENSIONS = new Set([".ts", ".aac", ".m4s", ".mp4"]);

export interface SegmentFetcherOptions {
  transport: Transport;
  workspace: Workspace;
  /** Parallel downloads; 1 fetches strictly one after another */
  concurrency?: number | undefined;
  /** Checked before each segment starts; false stops scheduling new ones */
  shouldContinue?: (() => boolean) | undefined;
  onEvent?: PipelineEventHandler | undefined;
}

/**
 * File name for a segment inside the workspace, e.g. `segment_00007.ts`.
 */
export function segmentFileName(segment: Segment): string {
  const extension = path.extname(getUrlPath(segment.location)).toLowerCase();
  const suffix = SEGMENT_FILE_EXTENSIONS.has(extension) ? extension : ".ts";
  return `segment_${String(segment.ordinal).padStart(5, "0")}${suffix}`;
}

/**
 * Fetches every segment and returns one result per segment, in input order.
 *
 * @throws PipelineError FETCH_ABORTED for an empty segment list or a
 *   concurrency below 1
 */
export async function fetchSegments(
  segments: readonly Segment[],
  options: SegmentFetcherOptions
): Promise<FetchResult[]> {
  const { transport, workspace, shouldContinue, onEvent } = options;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  if (segments.length === 0) {
    throw new PipelineError("No segments to fetch", "FETCH_ABORTED");
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new PipelineError(`Invalid concurrency: ${concurrency}`, "FETCH_ABORTED", {
      details: "Concurrency must be a whole number of at least 1",
    });
  }

  const total = segments.length;
  // Slots start out as "never started"; each task overwrites its own
  const slots: FetchResult[] = segments.map((segment) => ({
    segment,
    localPath: workspace.pathFor(segmentFileName(segment)),
    success: false,
    bytes: 0,
    error: CANCELLED_ERROR,
  }));
  let completed = 0;

  const queue = new PQueue({ concurrency });

  await queue.addAll(
    slots.map((slot, index) => async () => {
      if (shouldContinue && !shouldContinue()) return;

      const result = await fetchSegment(transport, slot.segment, slot.localPath);
      slots[index] = result;
      completed++;

      if (result.success) {
        onEvent?.({
          type: "segment-fetched",
          ordinal: result.segment.ordinal,
          total,
          completed,
          bytes: result.bytes,
        });
      } else {
        onEvent?.({
          type: "segment-failed",
          ordinal: result.segment.ordinal,
          total,
          completed,
          error: result.error ?? "unknown error",
        });
      }
    })
  );

  return slots;
}

async function fetchSegment(
  transport: Transport,
  segment: Segment,
  localPath: string
): Promise<FetchResult> {
  try {
    const response = await transport.stream(segment.location);

    if (!response.ok) {
      await response.body?.cancel();
      throw new PipelineError(`HTTP ${response.status}`, "SEGMENT_FETCH_ERROR", {
        location: segment.location,
        statusCode: response.status,
      });
    }
    if (!response.body) {
      throw new PipelineError("No response body", "SEGMENT_FETCH_ERROR", {
        location: segment.location,
      });
    }

    const bytes = await writeBody(response.body, localPath);
    return { segment, localPath, success: true, bytes };
  } catch (error) {
    await removeFile(localPath);
    return { segment, localPath, success: false, bytes: 0, error: errorMessage(error) };
  }
}

/**
 * Streams a response body to disk chunk by chunk.
 * @returns Number of bytes written
 */
async function writeBody(body: ReadableStream<Uint8Array>, filePath: string): Promise<number> {
  const file = await open(filePath, "w");
  const reader = body.getReader();
  let written = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      await file.write(value);
      written += value.byteLength;
    }
  } finally {
    reader.releaseLock();
    await file.close();
  }

  return written;
}
