/**
 * Playlist document parser.
 * Turns playlist text into ordered tag and URI lines without interpreting them.
 * Unknown tags pass through untouched since encoders disagree on details.
 */
import { PipelineError } from "../shared/errors.js";
import type { DirectiveLine, PlaylistLine } from "./types.js";

const DIRECTIVE_PREFIX = "#EXT";

/**
 * A tag value counts as an attribute list when it starts with `KEY=`.
 */
const ATTRIBUTE_LIST_START = /^[A-Z0-9-]+=/i;

/**
 * Parses playlist text into ordered lines.
 * Blank lines and plain `#` comments are dropped.
 *
 * @throws PipelineError MALFORMED_PLAYLIST when the text is empty
 */
export function parsePlaylist(text: string): PlaylistLine[] {
  const content = text.replace(/^\uFEFF/, "");
  if (content.trim() === "") {
    throw new PipelineError("Playlist is empty", "MALFORMED_PLAYLIST");
  }

  const lines: PlaylistLine[] = [];
  const rawLines = content.split(/\r\n|\r|\n/);

  for (let i = 0; i < rawLines.length; i++) {
    const line = rawLines[i]?.trim();
    if (!line) continue;

    if (line.startsWith(DIRECTIVE_PREFIX)) {
      lines.push(parseDirective(line, i + 1));
    } else if (!line.startsWith("#")) {
      lines.push({ kind: "uri", uri: line, lineNumber: i + 1 });
    }
  }

  return lines;
}

function parseDirective(line: string, lineNumber: number): DirectiveLine {
  const colon = line.indexOf(":");
  const name = (colon === -1 ? line : line.substring(0, colon)).substring(1);
  const rawAttributes = colon === -1 ? "" : line.substring(colon + 1);

  return {
    kind: "directive",
    name,
    attributes: ATTRIBUTE_LIST_START.test(rawAttributes) ? parseAttributeList(rawAttributes) : {},
    rawAttributes,
    lineNumber,
  };
}

/**
 * Parses a comma-separated `KEY=VALUE` list. Quoted values keep their commas
 * and lose their quotes; entries without `=` are skipped.
 *
 * @example
 * parseAttributeList('BANDWIDTH=800000,CODECS="avc1.4d401e,mp4a.40.2"')
 * // => { BANDWIDTH: "800000", CODECS: "avc1.4d401e,mp4a.40.2" }
 */
export function parseAttributeList(raw: string): Record<string, string> {
  const entries: [string, string][] = [];
  let current = "";
  let inQuotes = false;

  const flush = () => {
    const eq = current.indexOf("=");
    if (eq > 0) {
      const key = current.substring(0, eq).trim();
      let value = current.substring(eq + 1).trim();
      if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        value = value.slice(1, -1);
      }
      if (key) {
        entries.push([key, value]);
      }
    }
    current = "";
  };

  for (const char of raw) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "," && !inQuotes) {
      flush();
      continue;
    }
    current += char;
  }
  flush();

  return Object.fromEntries(entries);
}

/**
 * Returns the directives with the given tag name, in document order.
 */
export function findDirectives(lines: readonly PlaylistLine[], name: string): DirectiveLine[] {
  return lines.filter((line): line is DirectiveLine => line.kind === "directive" && line.name === name);
}
