/**
 * Terminal rendering of pipeline events.
 * Normal runs get a spinner and a segment progress bar; --debug prints every
 * event as a line instead.
 */
import chalk from "chalk";
import cliProgress from "cli-progress";
import ora, { type Ora } from "ora";
import { describeVariant } from "../playlist/variantSelector.js";
import type { PipelineEvent, PipelineEventHandler } from "../shared/events.js";

export interface EventReporter {
  onEvent: PipelineEventHandler;
  /** Stops any spinner or bar still running */
  stop: () => void;
}

/**
 * One-line description of an event.
 */
export function formatEvent(event: PipelineEvent): string {
  switch (event.type) {
    case "playlist-fetched":
      return `hop ${event.hop}: fetched ${event.location} (${event.bytes} bytes)`;
    case "variant-selected":
      return `hop ${event.hop}: selected ${describeVariant(event.variant)} of ${event.candidates} variants -> ${event.variant.uri}`;
    case "segments-resolved":
      return `hop ${event.hop}: ${event.count} segments in ${event.location}`;
    case "segment-fetched":
      return `Downloaded segment ${event.completed}/${event.total} (#${event.ordinal}, ${event.bytes} bytes)`;
    case "segment-failed":
      return `Segment #${event.ordinal} failed: ${event.error}`;
    case "remux-started":
      return `Remuxing ${event.segments} segments with ${event.tool}`;
    case "remux-failed":
      return `Remux failed: ${event.reason}`;
    case "concat-started":
      return `Concatenating ${event.segments} segments into ${event.outputPath}`;
    case "assembled":
      return `Wrote ${event.outputPath} (${event.bytes} bytes, ${event.muxed ? "muxed" : "raw, needs remux"})`;
  }
}

function createDebugReporter(): EventReporter {
  return {
    onEvent: (event) => {
      const line = `   ${formatEvent(event)}`;
      console.log(event.type === "segment-failed" ? chalk.yellow(line) : chalk.gray(line));
    },
    stop: () => undefined,
  };
}

function createInteractiveReporter(): EventReporter {
  let spinner: Ora | undefined = ora("Resolving playlist...").start();
  let bar: cliProgress.SingleBar | undefined;
  let failed = 0;

  const stopBar = () => {
    bar?.stop();
    bar = undefined;
  };

  return {
    onEvent: (event) => {
      switch (event.type) {
        case "playlist-fetched":
          if (spinner) spinner.text = `Resolving playlist (hop ${event.hop})...`;
          break;
        case "variant-selected":
          if (spinner) spinner.text = `Selected ${describeVariant(event.variant)}`;
          break;
        case "segments-resolved":
          spinner?.succeed(`Found ${event.count} segments`);
          spinner = undefined;
          bar = new cliProgress.SingleBar(
            {
              format: "   {bar} {percentage}% | {value}/{total} | {status}",
              barCompleteChar: "█",
              barIncompleteChar: "░",
              barsize: 30,
              hideCursor: true,
            },
            cliProgress.Presets.shades_grey
          );
          bar.start(event.count, 0, { status: "Downloading segments..." });
          break;
        case "segment-fetched":
          bar?.update(event.completed, { status: failed > 0 ? `${failed} failed` : "" });
          break;
        case "segment-failed":
          failed++;
          bar?.update(event.completed, { status: chalk.yellow(`${failed} failed`) });
          break;
        case "remux-started":
          stopBar();
          spinner = ora(`Remuxing with ${event.tool}...`).start();
          break;
        case "remux-failed":
          stopBar();
          if (spinner) {
            spinner.warn(`Remux failed: ${event.reason}`);
            spinner = undefined;
          } else {
            console.log(chalk.yellow(`   ⚠️  ${event.reason}`));
          }
          break;
        case "concat-started":
          spinner = ora("Concatenating raw segments...").start();
          break;
        case "assembled":
          spinner?.succeed(event.muxed ? "Remuxed into one file" : "Concatenated raw segments");
          spinner = undefined;
          break;
      }
    },
    stop: () => {
      stopBar();
      spinner?.stop();
      spinner = undefined;
    },
  };
}

export function createReporter(options: { debug: boolean }): EventReporter {
  return options.debug ? createDebugReporter() : createInteractiveReporter();
}
