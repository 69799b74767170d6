/**
 * Generic URL utilities for playlist and segment locations.
 */

/**
 * Gets the directory of a playlist location (everything up to and including
 * the last slash of the path). Query string and fragment are dropped.
 *
 * @example
 * getBaseUrl("https://example.com/videos/playlist.m3u8?token=abc")
 * // => "https://example.com/videos/"
 */
export function getBaseUrl(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname;
  const dir = path.substring(0, path.lastIndexOf("/") + 1) || "/";
  return `${parsed.origin}${dir}`;
}

/**
 * Resolves a potentially relative URI against the directory of a playlist.
 * Absolute URIs (any scheme) are returned unchanged.
 *
 * @example
 * resolveUrl("chunk/001.ts", "https://host/path/index.m3u8")
 * // => "https://host/path/chunk/001.ts"
 */
export function resolveUrl(uri: string, playlistUrl: string): string {
  if (isAbsoluteUrl(uri)) {
    return uri;
  }
  return new URL(uri, getBaseUrl(playlistUrl)).href;
}

/**
 * Checks whether a URI carries its own scheme.
 */
export function isAbsoluteUrl(uri: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(uri);
}

/**
 * Checks if a URL points directly at a playlist document rather than a page
 * that embeds one.
 */
export function isPlaylistUrl(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return pathname.endsWith(".m3u8");
}

/**
 * Returns the path of a URL without query string or fragment.
 * Falls back to the raw input for strings that are not URLs.
 */
export function getUrlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    const end = url.search(/[?#]/);
    return end === -1 ? url : url.substring(0, end);
  }
}
