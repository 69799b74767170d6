import chalk from "chalk";
import ora from "ora";
import { PlaylistResolver } from "../../playlist/resolver.js";
import { SEGMENT_FILTERS } from "../../playlist/segmentExtractor.js";
import type { ResolvedPlaylist } from "../../playlist/types.js";
import { describeVariant } from "../../playlist/variantSelector.js";
import { errorMessage, isPipelineError } from "../../shared/errors.js";
import { isPlaylistUrl } from "../../shared/url.js";
import { formatEvent } from "../reporter.js";
import { createTransportFromConfig, resolveSettings } from "../settings.js";
import { printNotAPlaylist } from "./download.js";

export interface ResolveOptions {
  debug?: boolean;
  maxHops?: number;
  segmentFilter?: string;
  all?: boolean;
  probe?: boolean;
}

const SEGMENT_PREVIEW = 10;

/**
 * Resolves a playlist and prints the chosen variant and its segments
 * without downloading anything.
 */
export async function resolveCommand(url: string, options: ResolveOptions): Promise<void> {
  if (!isPlaylistUrl(url)) {
    printNotAPlaylist(url);
    process.exit(1);
  }

  const config = resolveSettings(options);
  const transport = createTransportFromConfig(config);
  const debug = options.debug ?? false;

  const spinner = debug ? undefined : ora("Resolving playlist...").start();
  const resolver = new PlaylistResolver({
    transport,
    maxHops: config.maxHops,
    segmentFilter: SEGMENT_FILTERS[config.segmentFilter],
    onEvent: debug ? (event) => console.log(chalk.gray(`   ${formatEvent(event)}`)) : undefined,
  });

  let playlist: ResolvedPlaylist;
  try {
    playlist = await resolver.resolve(url);
    spinner?.succeed(`Resolved in ${playlist.hops} hop${playlist.hops === 1 ? "" : "s"}`);
  } catch (error) {
    spinner?.fail("Could not resolve playlist");
    console.log(chalk.red(`\n❌ ${errorMessage(error)}`));
    if (isPipelineError(error)) {
      if (error.details) console.log(chalk.gray(`   ${error.details}`));
      if (error.location) {
        const hop = error.hop === undefined ? "" : ` (hop ${error.hop})`;
        console.log(chalk.gray(`   At: ${error.location}${hop}`));
      }
      console.log(chalk.gray(`   Code: ${error.code}`));
    }
    console.log();
    process.exit(1);
  }

  console.log();
  if (playlist.variant) {
    console.log(`   ${chalk.cyan("Variant")}: ${describeVariant(playlist.variant)}`);
  }
  console.log(`   ${chalk.cyan("Media playlist")}: ${playlist.location}`);
  console.log(`   ${chalk.cyan("Segments")}: ${playlist.segments.length}\n`);

  const shown = options.all ? playlist.segments : playlist.segments.slice(0, SEGMENT_PREVIEW);
  for (const segment of shown) {
    console.log(chalk.gray(`   ${String(segment.ordinal).padStart(5)}  ${segment.location}`));
  }
  if (shown.length < playlist.segments.length) {
    console.log(chalk.gray(`   ... and ${playlist.segments.length - shown.length} more (--all)`));
  }

  const [first] = playlist.segments;
  if (options.probe && first) {
    try {
      const response = await transport.probe(first.location);
      const color = response.ok ? chalk.green : chalk.red;
      const status = color(`HTTP ${response.status}`);
      console.log(`\n   ${chalk.cyan("First segment")}: ${status}`);
    } catch (error) {
      console.log(`\n   ${chalk.cyan("First segment")}: ${chalk.red(errorMessage(error))}`);
    }
  }
  console.log();
}
