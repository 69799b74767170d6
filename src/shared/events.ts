/**
 * Diagnostic events emitted by the pipeline.
 * The core only emits them; the CLI decides how to render them.
 */
import type { Variant } from "../playlist/types.js";

export type PipelineEvent =
  | { type: "playlist-fetched"; hop: number; location: string; bytes: number }
  | { type: "variant-selected"; hop: number; variant: Variant; candidates: number }
  | { type: "segments-resolved"; hop: number; location: string; count: number }
  | { type: "segment-fetched"; ordinal: number; total: number; completed: number; bytes: number }
  | { type: "segment-failed"; ordinal: number; total: number; completed: number; error: string }
  | { type: "remux-started"; tool: string; segments: number }
  | { type: "remux-failed"; reason: string }
  | { type: "concat-started"; outputPath: string; segments: number }
  | { type: "assembled"; outputPath: string; muxed: boolean; bytes: number };

export type PipelineEventType = PipelineEvent["type"];

export type PipelineEventHandler = (event: PipelineEvent) => void;
