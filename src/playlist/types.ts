/**
 * Playlist data model shared by the parser, selector, extractor and resolver.
 */

// ============================================================================
// Parsed Lines
// ============================================================================

/**
 * A tag line such as `#EXT-X-STREAM-INF:BANDWIDTH=800000`.
 */
export interface DirectiveLine {
  kind: "directive";
  /** Tag name without the leading `#`, e.g. "EXT-X-STREAM-INF" */
  name: string;
  /** Parsed `KEY=VALUE` pairs; empty for tags whose value is not an attribute list */
  attributes: Readonly<Record<string, string>>;
  /** Everything after the first `:` exactly as written */
  rawAttributes: string;
  /** 1-based line number in the source text */
  lineNumber: number;
}

/**
 * A non-tag line referencing another playlist or a media segment.
 */
export interface UriLine {
  kind: "uri";
  uri: string;
  lineNumber: number;
}

export type PlaylistLine = DirectiveLine | UriLine;

// ============================================================================
// Variants & Segments
// ============================================================================

export interface Resolution {
  width: number;
  height: number;
}

/**
 * One alternative encoding referenced from a master playlist.
 */
export interface Variant {
  /** Bits per second from BANDWIDTH (0 when absent) */
  bandwidth: number;
  resolution?: Resolution | undefined;
  /** Absolute URL of the variant playlist */
  uri: string;
  /** Subtitle/caption renditions are never selected */
  isSubtitle: boolean;
}

/**
 * One media segment in playback order.
 */
export interface Segment {
  /** Absolute URL */
  location: string;
  /** 1-based position in playback order, authoritative over file names */
  ordinal: number;
}

/**
 * Terminal output of the resolver. Frozen once built.
 */
export interface ResolvedPlaylist {
  /** Location of the media playlist the segments came from */
  location: string;
  segments: readonly Segment[];
  /** Number of playlist documents fetched to get here */
  hops: number;
  /** Variant chosen on the way, if a master playlist was involved */
  variant?: Variant | undefined;
}

// ============================================================================
// Segment Classification
// ============================================================================

/**
 * Decides whether a URI line of a media playlist is a segment.
 */
export type SegmentPredicate = (uri: string) => boolean;

/**
 * Builds a predicate for one playlist document. Lets grammar-based filters
 * look at the whole text while the heuristic one ignores it.
 */
export type SegmentFilter = (playlistText: string) => SegmentPredicate;
