import chalk from "chalk";
import { resolveOutputPath } from "../../config/paths.js";
import {
  checkFfmpeg,
  createFfmpegRemuxer,
  FFMPEG_INSTALL_HINTS,
  remuxCommand,
} from "../../downloader/ffmpeg.js";
import { describeOutcome, downloadPlaylist } from "../../downloader/pipeline.js";
import { SEGMENT_FILTERS } from "../../playlist/segmentExtractor.js";
import { describeVariant } from "../../playlist/variantSelector.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { deriveOutputName } from "../../shared/slug.js";
import { isPlaylistUrl } from "../../shared/url.js";
import { createReporter } from "../reporter.js";
import { createTransportFromConfig, resolveSettings } from "../settings.js";

export interface DownloadOptions {
  debug?: boolean;
  outputDir?: string;
  concurrency?: number;
  maxHops?: number;
  segmentFilter?: string;
}

/**
 * Prints the hint shown for URLs that are not playlists.
 */
export function printNotAPlaylist(url: string): void {
  console.log(chalk.red("\n❌ Not a playlist URL"));
  console.log(chalk.gray(`   ${url}`));
  console.log(chalk.gray("   Pass the .m3u8 address itself. To find it, open the page with your"));
  console.log(chalk.gray("   browser's developer tools and filter network requests by \"m3u8\".\n"));
}

/**
 * Downloads a playlist into a single video file.
 */
export async function downloadCommand(
  url: string,
  output: string | undefined,
  options: DownloadOptions
): Promise<void> {
  if (!isPlaylistUrl(url)) {
    printNotAPlaylist(url);
    process.exit(1);
  }

  const config = resolveSettings(options);
  const outputPath = resolveOutputPath(config.outputDir, deriveOutputName(url), output);

  const shutdown = createShutdownManager();
  shutdown.setup();

  console.log(chalk.blue("\n🎬 Downloading playlist\n"));
  console.log(chalk.gray(`   Source: ${url}`));
  console.log(chalk.gray(`   Output: ${outputPath}\n`));

  const hasFfmpeg = await checkFfmpeg(config.ffmpegPath);
  if (!hasFfmpeg) {
    console.log(chalk.yellow("   ⚠️  ffmpeg not found; segments will be joined as a raw .ts file."));
    console.log(chalk.gray("   Install ffmpeg to get an .mp4:"));
    for (const hint of FFMPEG_INSTALL_HINTS) {
      console.log(chalk.gray(`     ${hint}`));
    }
    console.log();
  }

  const reporter = createReporter({ debug: options.debug ?? false });
  const result = await downloadPlaylist(url, outputPath, {
    transport: createTransportFromConfig(config),
    remuxTool: hasFfmpeg ? createFfmpegRemuxer(config.ffmpegPath) : null,
    concurrency: config.concurrency,
    maxHops: config.maxHops,
    segmentFilter: SEGMENT_FILTERS[config.segmentFilter],
    shouldContinue: shutdown.shouldContinue,
    registerCleanup: shutdown.registerCleanup,
    onEvent: reporter.onEvent,
  });
  reporter.stop();

  if (!result.success) {
    console.log(chalk.red(`\n❌ ${result.error}`));
    if (result.details) console.log(chalk.gray(`   ${result.details}`));
    if (result.location) {
      const hop = result.hop === undefined ? "" : ` (hop ${result.hop})`;
      console.log(chalk.gray(`   At: ${result.location}${hop}`));
    }
    console.log(chalk.gray(`   Code: ${result.errorCode}\n`));
    process.exit(1);
  }

  const summary = describeOutcome(result);
  console.log();
  if (result.status === "complete") {
    console.log(chalk.green(`   ✓ ${summary}`));
  } else {
    console.log(chalk.yellow(`   ⚠️  ${summary}`));
    console.log(chalk.gray(`   Missing segments: ${result.missingOrdinals.join(", ")}`));
  }
  if (result.variant) {
    console.log(chalk.gray(`   Variant: ${describeVariant(result.variant)}`));
  }
  console.log(chalk.white(`   Saved to ${result.outputPath}`));

  if (!result.muxed) {
    console.log(chalk.yellow("\n   The file is a raw transport stream. To remux it later, run:"));
    console.log(chalk.cyan(`   ${remuxCommand(result.outputPath, config.ffmpegPath)}`));
  }
  console.log();
}
