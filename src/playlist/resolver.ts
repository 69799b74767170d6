/**
 * Playlist resolution: location in, ordered segment list out.
 *
 * A master playlist is followed to its best variant, which is fetched and
 * resolved the same way. Every fetch counts as a hop and the number of hops
 * is capped, so a variant that points back at a master cannot loop forever.
 */
import { errorMessage, isPipelineError, PipelineError } from "../shared/errors.js";
import type { PipelineEventHandler } from "../shared/events.js";
import type { Transport } from "../shared/http.js";
import { parsePlaylist } from "./parser.js";
import { heuristicSegmentPredicate, extractSegments } from "./segmentExtractor.js";
import type { ResolvedPlaylist, SegmentFilter, Variant } from "./types.js";
import { collectVariants, isMasterPlaylist, selectVariant } from "./variantSelector.js";

export const DEFAULT_MAX_HOPS = 5;

export interface PlaylistResolverOptions {
  transport: Transport;
  /** Maximum number of playlist documents fetched per resolution */
  maxHops?: number | undefined;
  /** Segment classification; defaults to the URI-shape heuristic */
  segmentFilter?: SegmentFilter | undefined;
  onEvent?: PipelineEventHandler | undefined;
}

interface FetchedPlaylist {
  text: string;
  /** Final location after redirects; relative URIs resolve against it */
  url: string;
  bytes: number;
}

export class PlaylistResolver {
  private readonly transport: Transport;
  private readonly maxHops: number;
  private readonly segmentFilter: SegmentFilter;
  private readonly onEvent: PipelineEventHandler | undefined;
  private readonly decoder = new TextDecoder();

  constructor(options: PlaylistResolverOptions) {
    this.transport = options.transport;
    this.maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
    this.segmentFilter = options.segmentFilter ?? (() => heuristicSegmentPredicate);
    this.onEvent = options.onEvent;
  }

  /**
   * Resolves a playlist location to its ordered segments.
   *
   * @throws PipelineError PLAYLIST_FETCH_ERROR, MALFORMED_PLAYLIST,
   *   NO_ELIGIBLE_VARIANT, NO_SEGMENTS_FOUND or PLAYLIST_LOOP_DETECTED,
   *   each carrying the hop and location that failed
   */
  async resolve(location: string): Promise<ResolvedPlaylist> {
    return this.resolveHop(location, 1, undefined);
  }

  private async resolveHop(
    location: string,
    hop: number,
    variant: Variant | undefined
  ): Promise<ResolvedPlaylist> {
    if (hop > this.maxHops) {
      throw new PipelineError(
        `Still no media playlist after ${this.maxHops} hops`,
        "PLAYLIST_LOOP_DETECTED",
        { location, hop, details: "Variant playlists keep pointing at further master playlists" }
      );
    }

    const playlist = await this.fetchPlaylist(location, hop);
    this.onEvent?.({ type: "playlist-fetched", hop, location: playlist.url, bytes: playlist.bytes });

    try {
      const lines = parsePlaylist(playlist.text);

      if (isMasterPlaylist(lines)) {
        const variants = collectVariants(lines, playlist.url);
        const selected = selectVariant(variants);
        this.onEvent?.({
          type: "variant-selected",
          hop,
          variant: selected,
          candidates: variants.length,
        });
        return await this.resolveHop(selected.uri, hop + 1, selected);
      }

      const segments = extractSegments(lines, playlist.url, this.segmentFilter(playlist.text));
      if (segments.length === 0) {
        throw new PipelineError("No segments found in media playlist", "NO_SEGMENTS_FOUND");
      }

      this.onEvent?.({
        type: "segments-resolved",
        hop,
        location: playlist.url,
        count: segments.length,
      });

      return Object.freeze({
        location: playlist.url,
        segments: Object.freeze(segments.map((segment) => Object.freeze(segment))),
        hops: hop,
        variant,
      });
    } catch (error) {
      if (isPipelineError(error)) {
        throw error.withContext({ location: playlist.url, hop });
      }
      throw error;
    }
  }

  private async fetchPlaylist(location: string, hop: number): Promise<FetchedPlaylist> {
    let response: Awaited<ReturnType<Transport["fetch"]>>;
    try {
      response = await this.transport.fetch(location);
    } catch (error) {
      throw new PipelineError(
        `Failed to fetch playlist: ${errorMessage(error)}`,
        "PLAYLIST_FETCH_ERROR",
        { location, hop, cause: error }
      );
    }

    if (!response.ok) {
      throw new PipelineError(`Playlist returned HTTP ${response.status}`, "PLAYLIST_FETCH_ERROR", {
        location,
        hop,
        statusCode: response.status,
      });
    }

    return {
      text: this.decoder.decode(response.body),
      url: response.url || location,
      bytes: response.body.byteLength,
    };
  }
}

/**
 * Convenience wrapper for one-off resolutions.
 */
export async function resolvePlaylist(
  location: string,
  options: PlaylistResolverOptions
): Promise<ResolvedPlaylist> {
  return new PlaylistResolver(options).resolve(location);
}
