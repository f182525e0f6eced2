import XRegExp from "xregexp";
import type { TrackRecord } from "../api/spotifyTypes";
import { DEFAULT_FILENAME_TEMPLATE } from "../settings/config";
import type { AudioFormat } from "./tagWriters/tagWriter";

/**
 * Regex for characters that are not allowed in filenames on Windows and other OS.
 */
// eslint-disable-next-line no-control-regex
export const INVALID_FILENAME_CHARS_REGEX = /[\x00-\x1f\x7f<>:"/\\|?*]/g;

// letters, numbers, spaces and the punctuation that reads well in a filename
const DISALLOWED_FILENAME_CHARS = XRegExp("[^\\p{L}\\p{N}\\p{Zs}_+.,()&'-]", "g");

export function sanitizeFilename(input: string) {
  let sanitized = input.replace(INVALID_FILENAME_CHARS_REGEX, "");
  sanitized = sanitized.replace(/^\.*/, "");
  sanitized = sanitized.replace(/\.*$/, "");
  sanitized = XRegExp.replace(sanitized, DISALLOWED_FILENAME_CHARS, "");

  return sanitized.replace(/\s{2,}/g, " ").trim();
}

const pad2 = (value: number) => value.toString().padStart(2, "0");

function templateValues(track: TrackRecord): Record<string, string> {
  return {
    artist: track.artists[0]?.name ?? "",
    artists: track.artists.map(artist => artist.name).join(", "),
    title: track.name,
    album: "album" in track ? track.album.name : "",
    track: pad2(track.track_number),
    disc: track.disc_number.toString(),
    id: track.id ?? "",
  };
}

/**
 * Expands `{artist}`, `{artists}`, `{title}`, `{album}`, `{track}`, `{disc}` and `{id}`
 * and appends the container extension. Unknown placeholders are left as written.
 */
export function buildTrackFilename(track: TrackRecord, format: AudioFormat, template: string = DEFAULT_FILENAME_TEMPLATE): string {
  const values = templateValues(track);
  const expanded = template.replace(/\{(\w+)\}/g, (placeholder, name: string) => (Object.hasOwn(values, name) ? values[name] : placeholder));

  const name = sanitizeFilename(expanded) || track.id || "track";
  return `${name}.${format}`;
}
