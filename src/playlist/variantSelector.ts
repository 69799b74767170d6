/**
 * Variant selection for master playlists.
 */
import { PipelineError } from "../shared/errors.js";
import { resolveUrl } from "../shared/url.js";
import type { DirectiveLine, PlaylistLine, Resolution, Variant } from "./types.js";

export const STREAM_INF_TAG = "EXT-X-STREAM-INF";

const SUBTITLE_URI_MARKER = /caption|subtitle/i;

/**
 * A playlist is a master playlist when it declares any stream variant.
 */
export function isMasterPlaylist(lines: readonly PlaylistLine[]): boolean {
  return lines.some((line) => line.kind === "directive" && line.name === STREAM_INF_TAG);
}

/**
 * Collects variants from stream-variant tags that are directly followed by a
 * URI line. Tags followed by another tag are ignored.
 */
export function collectVariants(lines: readonly PlaylistLine[], playlistUrl: string): Variant[] {
  const variants: Variant[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line?.kind !== "directive" || line.name !== STREAM_INF_TAG) continue;

    const next = lines[i + 1];
    if (next?.kind !== "uri") continue;

    variants.push(toVariant(line, next.uri, playlistUrl));
    i++;
  }

  return variants;
}

function toVariant(directive: DirectiveLine, uri: string, playlistUrl: string): Variant {
  const { BANDWIDTH: bandwidth, RESOLUTION: resolution } = directive.attributes;

  return {
    bandwidth: parseBandwidth(bandwidth),
    resolution: parseResolution(resolution),
    uri: resolveUrl(uri, playlistUrl),
    isSubtitle: isSubtitleVariant(directive, uri),
  };
}

/**
 * Parses BANDWIDTH, treating absent or unusable values as 0.
 */
export function parseBandwidth(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value)) return 0;
  return parseInt(value, 10);
}

/**
 * Parses a `WIDTHxHEIGHT` resolution string.
 */
export function parseResolution(value: string | undefined): Resolution | undefined {
  const match = value ? /^(\d+)x(\d+)$/i.exec(value) : null;
  if (!match?.[1] || !match[2]) return undefined;
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

/**
 * Subtitle tracks are marked either by a TYPE attribute or by their URI.
 */
export function isSubtitleVariant(directive: DirectiveLine, uri: string): boolean {
  return directive.attributes.TYPE?.toUpperCase() === "SUBTITLES" || SUBTITLE_URI_MARKER.test(uri);
}

/**
 * Picks the non-subtitle variant with the highest bandwidth.
 * Ties go to the variant declared first.
 *
 * @throws PipelineError NO_ELIGIBLE_VARIANT when every variant is a subtitle track
 */
export function selectVariant(variants: readonly Variant[]): Variant {
  let best: Variant | undefined;

  for (const variant of variants) {
    if (variant.isSubtitle) continue;
    if (!best || variant.bandwidth > best.bandwidth) {
      best = variant;
    }
  }

  if (!best) {
    throw new PipelineError(
      `No eligible variant among ${variants.length} stream(s)`,
      "NO_ELIGIBLE_VARIANT",
      { details: "Master playlist lists only subtitle tracks or no streams at all" }
    );
  }

  return best;
}

/**
 * Short human-readable description of a variant, e.g. "1280x720 @ 2800000 bps".
 */
export function describeVariant(variant: Variant): string {
  const resolution = variant.resolution
    ? `${variant.resolution.width}x${variant.resolution.height}`
    : "unknown";
  return `${resolution} @ ${variant.bandwidth} bps`;
}
