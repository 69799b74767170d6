export { findDirectives, parseAttributeList, parsePlaylist } from "./parser.js";
export { DEFAULT_MAX_HOPS, PlaylistResolver, resolvePlaylist } from "./resolver.js";
export type { PlaylistResolverOptions } from "./resolver.js";
export {
  createGrammarPredicate,
  extractSegments,
  heuristicSegmentPredicate,
  SEGMENT_FILTERS,
} from "./segmentExtractor.js";
export type { SegmentFilterName } from "./segmentExtractor.js";
export {
  collectVariants,
  describeVariant,
  isMasterPlaylist,
  selectVariant,
} from "./variantSelector.js";
export type * from "./types.js";
