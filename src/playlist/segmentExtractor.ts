/**
 * Segment extraction for media playlists.
 *
 * Which URI lines count as segments is decided by a swappable filter: the
 * default heuristic looks at URI shapes, the grammar filter asks hls-parser
 * which URIs the playlist declares as media segments.
 */
import * as HLS from "hls-parser";
import { errorMessage, PipelineError } from "../shared/errors.js";
import { getUrlPath, resolveUrl } from "../shared/url.js";
import type { PlaylistLine, Segment, SegmentFilter, SegmentPredicate } from "./types.js";

export const SEGMENT_EXTENSION = ".ts";

/** A path component starting with segment, chunk or seg- */
const SEGMENT_PATH_COMPONENT = /(^|\/)(segment|chunk|seg-)/;

/** A numbered token such as seg_12 or chunk_003 */
const NUMBERED_SEGMENT_TOKEN = /(seg|chunk)_\d+/;

/**
 * Default classification by URI shape. Playlists in the wild do not always
 * tag every segment with a duration, so the shape is what we go by.
 */
export const heuristicSegmentPredicate: SegmentPredicate = (uri) => {
  const path = getUrlPath(uri).toLowerCase();
  return (
    path.endsWith(SEGMENT_EXTENSION) ||
    SEGMENT_PATH_COMPONENT.test(path) ||
    NUMBERED_SEGMENT_TOKEN.test(path)
  );
};

/**
 * Builds a predicate that accepts exactly the URIs hls-parser reads as media
 * segments of this playlist.
 *
 * @throws PipelineError MALFORMED_PLAYLIST when the text is not a valid playlist
 */
export function createGrammarPredicate(playlistText: string): SegmentPredicate {
  let playlist: ReturnType<typeof HLS.parse>;
  try {
    playlist = HLS.parse(playlistText);
  } catch (error) {
    throw new PipelineError(
      `Playlist does not follow the HLS grammar: ${errorMessage(error)}`,
      "MALFORMED_PLAYLIST",
      { cause: error }
    );
  }

  const uris = new Set("segments" in playlist ? playlist.segments.map((s) => s.uri) : []);
  return (uri) => uris.has(uri);
}

export type SegmentFilterName = "heuristic" | "grammar";

export const SEGMENT_FILTERS: Record<SegmentFilterName, SegmentFilter> = {
  heuristic: () => heuristicSegmentPredicate,
  grammar: createGrammarPredicate,
};

/**
 * Extracts segments from a media playlist in document order.
 * Relative URIs resolve against the playlist's directory. Returns an empty
 * array when nothing qualifies; the caller decides whether that is fatal.
 */
export function extractSegments(
  lines: readonly PlaylistLine[],
  playlistUrl: string,
  isSegment: SegmentPredicate = heuristicSegmentPredicate
): Segment[] {
  const segments: Segment[] = [];

  for (const line of lines) {
    if (line.kind !== "uri" || !isSegment(line.uri)) continue;
    segments.push({
      location: resolveUrl(line.uri, playlistUrl),
      ordinal: segments.length + 1,
    });
  }

  return segments;
}
