import chalk from "chalk";
import { z } from "zod";
import { loadConfig } from "../config/configManager.js";
import { type Config, configSchema } from "../config/schema.js";
import { createTransport, type Transport } from "../shared/http.js";

/**
 * Per-run overrides collected from command-line flags.
 */
export interface SettingsOverrides {
  outputDir?: string | undefined;
  concurrency?: number | undefined;
  maxHops?: number | undefined;
  segmentFilter?: string | undefined;
}

/**
 * Commander option parser for whole numbers.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : NaN;
}

/**
 * Merges flag overrides into the stored config and validates the result.
 * Prints the problems and exits on invalid values.
 */
export function resolveSettings(overrides: SettingsOverrides): Config {
  const flags = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = configSchema.safeParse({ ...loadConfig(), ...flags });

  if (!result.success) {
    console.log(chalk.red("\n❌ Invalid options"));
    console.log(chalk.gray(z.prettifyError(result.error).replace(/^/gm, "   ")));
    console.log();
    process.exit(1);
  }

  return result.data;
}

export function createTransportFromConfig(config: Config): Transport {
  return createTransport({
    probeTimeoutMs: config.probeTimeoutMs,
    transferTimeoutMs: config.transferTimeoutMs,
    retryAttempts: config.retryAttempts,
    userAgent: config.userAgent,
  });
}
