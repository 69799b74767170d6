/**
 * Shared slugification utilities.
 * Uses @sindresorhus/slugify for proper Unicode transliteration.
 */
import slugifyLib from "@sindresorhus/slugify";

/**
 * Playlist file names that say nothing about the video itself.
 */
const GENERIC_PLAYLIST_NAMES =
  /^(index|playlist|master|main|manifest|a|prog_index|chunklist(_\w+)?|media(_\d+)?)$/i;

/**
 * Creates a filesystem-safe slug from a string.
 * Handles Unicode characters, special symbols, and edge cases.
 */
export function slugify(name: string): string {
  return slugifyLib(name, {
    lowercase: true,
    separator: "-",
  }).substring(0, 100);
}

/**
 * Derives an output file name from a playlist or page URL.
 * Uses the last meaningful path component, skipping generic playlist names.
 *
 * @example
 * deriveOutputName("https://cdn.example.com/lectures/week-3-intro/index.m3u8")
 * // => "week-3-intro.mp4"
 */
export function deriveOutputName(url: string, extension = ".mp4"): string {
  let parts: string[];
  try {
    parts = new URL(url).pathname.split("/").filter(Boolean);
  } catch {
    parts = [];
  }

  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (!part) continue;

    const name = safeDecode(part)
      .replace(/\.m3u8$/i, "")
      .replace(/\+/g, " ");
    if (GENERIC_PLAYLIST_NAMES.test(name)) continue;

    const slug = slugify(name);
    if (slug) {
      return `${slug}${extension}`;
    }
  }

  return `video${extension}`;
}

function safeDecode(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}
