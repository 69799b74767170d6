import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.hlsgrab/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".hlsgrab");
export const CONFIG_FILE = join(APP_DIR, "config.json");

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}

/**
 * Resolves where a download is written: an explicit output wins, a bare file
 * name lands in the output directory.
 */
export function resolveOutputPath(outputDir: string, fileName: string, explicit?: string): string {
  if (explicit) {
    return expandPath(explicit);
  }
  return join(expandPath(outputDir), fileName);
}
