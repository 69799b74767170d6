/**
 * Stitches fetched segments into one output file.
 *
 * Remuxing through the concat demuxer is tried first. When no remux tool is
 * available or it fails, the segment bytes are concatenated as-is into a
 * `.ts` file, which plays in most players but is reported as not muxed.
 */
import { open, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, PipelineError } from "../shared/errors.js";
import type { PipelineEventHandler } from "../shared/events.js";
import { ensureDir, getFileSize, removeFile } from "../shared/fs.js";
import { buildConcatManifest, type RemuxTool } from "./ffmpeg.js";
import type { AssemblyResult, FetchResult } from "./types.js";
import type { Workspace } from "./workspace.js";

export const CONCAT_MANIFEST_NAME = "concat.txt";

export const RAW_EXTENSION = ".ts";

export interface AssemblerOptions {
  workspace: Workspace;
  /** Omit (or pass null) to go straight to raw concatenation */
  remuxTool?: RemuxTool | null | undefined;
  onEvent?: PipelineEventHandler | undefined;
}

/**
 * Output path used by the raw-concatenation fallback.
 */
export function rawOutputPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}${RAW_EXTENSION}`);
}

/**
 * Assembles the successful slots, in ordinal order, into `outputPath`.
 *
 * @throws PipelineError ASSEMBLY_FAILURE when no segment was fetched or
 *   nothing could be written
 */
export async function assembleSegments(
  results: readonly FetchResult[],
  outputPath: string,
  options: AssemblerOptions
): Promise<AssemblyResult> {
  const { workspace, remuxTool, onEvent } = options;

  const ordered = [...results].sort((a, b) => a.segment.ordinal - b.segment.ordinal);
  const included = ordered.filter((r) => r.success);
  const missingOrdinals = ordered.filter((r) => !r.success).map((r) => r.segment.ordinal);
  const includedOrdinals = included.map((r) => r.segment.ordinal);

  if (included.length === 0) {
    throw new PipelineError("No segments were downloaded", "ASSEMBLY_FAILURE", {
      details: `All ${results.length} segments failed`,
    });
  }

  await ensureDir(path.dirname(outputPath));

  if (remuxTool) {
    const remuxed = await tryRemux(remuxTool, included, outputPath, workspace, onEvent);
    if (remuxed !== null) {
      return {
        outputPath,
        muxed: true,
        strategy: "remux",
        includedOrdinals,
        missingOrdinals,
        bytes: remuxed,
      };
    }
  } else {
    onEvent?.({ type: "remux-failed", reason: "No remux tool available" });
  }

  const rawPath = rawOutputPath(outputPath);
  onEvent?.({ type: "concat-started", outputPath: rawPath, segments: included.length });
  const bytes = await concatenate(included, rawPath);
  onEvent?.({ type: "assembled", outputPath: rawPath, muxed: false, bytes });

  return {
    outputPath: rawPath,
    muxed: false,
    strategy: "concat",
    includedOrdinals,
    missingOrdinals,
    bytes,
  };
}

/**
 * Runs the remux tool. Returns the output size on success, null when the
 * caller should fall back.
 */
async function tryRemux(
  tool: RemuxTool,
  included: readonly FetchResult[],
  outputPath: string,
  workspace: Workspace,
  onEvent: PipelineEventHandler | undefined
): Promise<number | null> {
  const manifestPath = workspace.pathFor(CONCAT_MANIFEST_NAME);
  await writeFile(
    manifestPath,
    buildConcatManifest(included.map((r) => path.resolve(r.localPath)))
  );

  onEvent?.({ type: "remux-started", tool: tool.name, segments: included.length });

  let reason: string;
  try {
    const outcome = await tool.concat(manifestPath, outputPath);
    const size = await getFileSize(outputPath);
    if (outcome.exitCode === 0 && size !== null && size > 0) {
      onEvent?.({ type: "assembled", outputPath, muxed: true, bytes: size });
      return size;
    }
    reason =
      outcome.exitCode === 0
        ? `${tool.name} produced no output`
        : `${tool.name} exited with code ${outcome.exitCode}${outcome.stderr ? `: ${outcome.stderr}` : ""}`;
  } catch (error) {
    reason = `${tool.name} could not run: ${errorMessage(error)}`;
  }

  await removeFile(outputPath);
  onEvent?.({ type: "remux-failed", reason });
  return null;
}

/**
 * Appends segment files to `target` in order through one file handle.
 * @returns Bytes written
 */
async function concatenate(included: readonly FetchResult[], target: string): Promise<number> {
  let written = 0;

  try {
    const file = await open(target, "w");
    try {
      for (const result of included) {
        const data = await readFile(result.localPath);
        await file.write(data);
        written += data.byteLength;
      }
    } finally {
      await file.close();
    }
  } catch (error) {
    await removeFile(target);
    throw new PipelineError(`Raw concatenation failed: ${errorMessage(error)}`, "ASSEMBLY_FAILURE", {
      location: target,
      cause: error,
    });
  }

  if (written === 0) {
    await removeFile(target);
    throw new PipelineError("Downloaded segments are all empty", "ASSEMBLY_FAILURE", {
      location: target,
    });
  }

  return written;
}
