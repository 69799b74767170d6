/**
 * Shared types for segment fetching, assembly and the download pipeline.
 */
import type { Segment, Variant } from "../playlist/types.js";
import type { ErrorResult } from "../shared/errors.js";

// ============================================================================
// Fetch Results
// ============================================================================

/**
 * Outcome of one segment slot. Failed slots keep their place so the
 * assembler can report exactly which ordinals are missing.
 */
export interface FetchResult {
  segment: Segment;
  /** Where the segment was (or would have been) written */
  localPath: string;
  success: boolean;
  bytes: number;
  error?: string | undefined;
}

// ============================================================================
// Assembly
// ============================================================================

export type AssemblyStrategy = "remux" | "concat";

export interface AssemblyResult {
  outputPath: string;
  /** False when the output is a raw byte concatenation that still needs remuxing */
  muxed: boolean;
  strategy: AssemblyStrategy;
  includedOrdinals: number[];
  missingOrdinals: number[];
  bytes: number;
}

// ============================================================================
// Pipeline Results
// ============================================================================

export type DownloadStatus = "complete" | "degraded";

export interface PlaylistDownloadSuccess {
  success: true;
  /** "degraded" when at least one segment is missing from the output */
  status: DownloadStatus;
  outputPath: string;
  muxed: boolean;
  strategy: AssemblyStrategy;
  /** Media playlist the segments came from */
  playlistLocation: string;
  totalSegments: number;
  failedSegments: number;
  missingOrdinals: number[];
  bytes: number;
  variant?: Variant | undefined;
}

export type PlaylistDownloadResult = PlaylistDownloadSuccess | ErrorResult;
