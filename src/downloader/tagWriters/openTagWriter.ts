import { extname } from "node:path";
import { UnsupportedFormatError } from "../../errors";
import type { Id3Version } from "./tagWriter";
import { Id3TagWriter } from "./id3TagWriter";
import { OggTagWriter } from "./oggTagWriter";
import { supportedFormats } from "./tagWriter";
import type { AudioFormat, TagWriter } from "./tagWriter";

export interface OpenTagWriterOptions {
  /** Only consulted for mp3 files. */
  id3Version?: Id3Version;
  separator?: string;
}

export function isSupportedFormat(format: string): format is AudioFormat {
  return (supportedFormats as readonly string[]).includes(format);
}

const extensionFormats: Partial<Record<string, AudioFormat>> = {
  ".mp3": "mp3",
  ".ogg": "ogg",
  ".oga": "ogg",
};

/** Guesses the container from the file extension; null when it is not one we tag. */
export function formatFromPath(path: string): AudioFormat | null {
  return extensionFormats[extname(path).toLowerCase()] ?? null;
}

/**
 * Opens the tag structure matching the container. Unsupported formats are
 * rejected before the file is touched.
 */
export async function openTagWriter(path: string, format: string, options: OpenTagWriterOptions = {}): Promise<TagWriter> {
  if (!isSupportedFormat(format)) throw new UnsupportedFormatError(format);

  const writer: TagWriter = format === "mp3"
    ? await Id3TagWriter.open(path, { version: options.id3Version })
    : await OggTagWriter.open(path);

  if (options.separator !== undefined) writer.setSeparator(options.separator);
  return writer;
}
