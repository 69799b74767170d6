import { z } from "zod";

/**
 * How URI lines of a media playlist are classified as segments.
 */
export const SEGMENT_FILTER_NAMES = ["heuristic", "grammar"] as const;

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  outputDir: z.string().default("~/Downloads/hlsgrab"),
  concurrency: z.number().int().min(1).max(16).default(4),
  maxHops: z.number().int().min(1).max(10).default(5),
  retryAttempts: z.number().int().min(0).max(10).default(2),
  probeTimeoutMs: z.number().int().min(100).default(10_000),
  transferTimeoutMs: z.number().int().min(100).default(30_000),
  userAgent: z.string().min(1).optional(),
  segmentFilter: z.enum(SEGMENT_FILTER_NAMES).default("heuristic"),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
});

export type Config = z.infer<typeof configSchema>;

export type ConfigKey = keyof Config;

export const CONFIG_KEYS = configSchema.keyof().options;

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}
