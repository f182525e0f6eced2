import { randomBytes } from "node:crypto";
import { chmod, copyFile, rename, stat, unlink } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { File, ReadStyle } from "node-taglib-sharp";
import { TagEncodingError, errorMessage } from "../../errors";
import { Logger } from "../../utils/logger";
import { parseTimestamp } from "./timestamp";
import type { Timestamp } from "./timestamp";

const logger = Logger.create("TagWriter");

export type AudioFormat = "mp3" | "ogg";

export const supportedFormats: readonly AudioFormat[] = ["mp3", "ogg"];

/** ID3v2 minor version written on save. */
export type Id3Version = 3 | 4;

/** Namespace under which the source track id is stored. */
export const UNIQUE_FILE_IDENTIFIER_OWNER = "spotify.com";

export const COVER_DESCRIPTION = "cover";

export enum TagField {
  Title = "title",
  Artist = "artist",
  Album = "album",
  TrackNumber = "trackNumber",
  DiscNumber = "discNumber",
  AlbumArtist = "albumArtist",
  Genre = "genre",
  Label = "label",
}

export type TagWriterState = "opened" | "mutated" | "saved" | "discarded";

export interface CoverArt {
  mime: string;
  data: Uint8Array;
}

export interface TagWriter {
  readonly format: AudioFormat;
  readonly path: string;
  readonly state: TagWriterState;

  /** String used to join multi-valued inputs. Defaults to "". */
  setSeparator(separator: string): void;
  setField(field: TagField, values: string[]): void;
  /** Stores under a caller supplied native key (ID3 text frame id or Vorbis comment name). */
  setRaw(key: string, values: string[]): void;
  setReleaseDate(date: string): void;
  addCover(mime: string, data: Uint8Array): void;
  addUniqueFileIdentifier(trackId: string): void;

  getRaw(key: string): string | undefined;
  getCover(): CoverArt | undefined;
  getUniqueFileIdentifier(): string | undefined;

  /** Writes every pending change at once. Calling it again on a saved writer does nothing. */
  save(): Promise<void>;
  /** Drops pending changes and leaves the file as it was. */
  discard(): Promise<void>;
}

/** A private copy of the target that the tagging library edits in place. */
export interface WorkingCopy<T> {
  path: string;
  file: File;
  tag: T;
}

function workingPathFor(path: string): string {
  // keeps the extension so the copy is recognised as the same container
  return join(dirname(path), `.${randomBytes(6).toString("hex")}.${basename(path)}`);
}

async function removeWorkingCopy(workingPath: string): Promise<void> {
  await unlink(workingPath).catch((error: unknown) => {
    logger.logDebug(`Could not remove working copy ${workingPath}: ${errorMessage(error)}`);
  });
}

/**
 * Copies `path` next to itself and opens the copy. `selectTag` picks (or creates)
 * the tag structure to edit; returning undefined means the container has none.
 */
export async function openWorkingCopy<T>(path: string, mimeType: string, selectTag: (file: File) => T | undefined): Promise<WorkingCopy<T>> {
  const workingPath = workingPathFor(path);
  try {
    await copyFile(path, workingPath);
  } catch (error) {
    throw new TagEncodingError(`Failed to read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let file: File | undefined;
  try {
    file = File.createFromPath(workingPath, mimeType, ReadStyle.None);
    const tag = selectTag(file);
    if (tag === undefined) throw new Error(`no ${mimeType} tag structure`);
    return { path: workingPath, file, tag };
  } catch (error) {
    file?.dispose();
    await removeWorkingCopy(workingPath);
    throw new TagEncodingError(`Failed to open ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Moves the finished working copy over the target, keeping the target's permission bits.
 * A failed move leaves the original file as it was.
 */
export async function replaceFile(workingPath: string, path: string): Promise<void> {
  try {
    const { mode } = await stat(path);
    await chmod(workingPath, mode & 0o7777);
    await rename(workingPath, path);
  } catch (error) {
    await removeWorkingCopy(workingPath);
    throw new TagEncodingError(`Failed to write ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Shared bookkeeping for both encoders: separator, the opened/mutated/saved lifecycle
 * and the atomic file replacement. Subclasses only map values onto the library's tag.
 */
export abstract class BaseTagWriter<T> implements TagWriter {
  abstract readonly format: AudioFormat;
  protected separator = "";
  protected readonly file: File;
  protected readonly tag: T;
  private readonly workingPath: string;
  private _state: TagWriterState = "opened";

  protected constructor(readonly path: string, workingCopy: WorkingCopy<T>) {
    this.workingPath = workingCopy.path;
    this.file = workingCopy.file;
    this.tag = workingCopy.tag;
  }

  get state(): TagWriterState {
    return this._state;
  }

  setSeparator(separator: string): void {
    this.assertWritable("setSeparator");
    this.separator = separator;
  }

  setField(field: TagField, values: string[]): void {
    this.setRaw(this.fieldKey(field), values);
  }

  setRaw(key: string, values: string[]): void {
    this.assertWritable("setRaw");
    this.writeText(key, values.join(this.separator));
    this._state = "mutated";
  }

  setReleaseDate(date: string): void {
    this.assertWritable("setReleaseDate");
    this.writeReleaseDate(parseTimestamp(date));
    this._state = "mutated";
  }

  addCover(mime: string, data: Uint8Array): void {
    this.assertWritable("addCover");
    if (!mime) throw new TagEncodingError("Invalid value for cover MIME type");
    if (data.byteLength < 1) throw new TagEncodingError("Invalid value for cover data");

    this.writeCover(mime, data);
    this._state = "mutated";
  }

  addUniqueFileIdentifier(trackId: string): void {
    this.assertWritable("addUniqueFileIdentifier");
    if (!trackId) throw new TagEncodingError("Invalid value for unique file identifier");

    this.writeUniqueFileIdentifier(trackId);
    this._state = "mutated";
  }

  abstract getRaw(key: string): string | undefined;
  abstract getCover(): CoverArt | undefined;
  abstract getUniqueFileIdentifier(): string | undefined;

  async save(): Promise<void> {
    if (this._state === "saved") {
      logger.logDebug(`save() called again for ${this.path}; already written`);
      return;
    }
    this.assertWritable("save");

    try {
      this.commit();
    } catch (error) {
      await this.discard();
      if (error instanceof TagEncodingError) throw error;
      throw new TagEncodingError(`Failed to encode ${this.format} tags for ${this.path}: ${errorMessage(error)}`, { cause: error });
    }

    this.file.dispose();
    this._state = "saved";
    await replaceFile(this.workingPath, this.path);
    logger.logDebug(`Saved ${this.format} tags to ${this.path}`);
  }

  async discard(): Promise<void> {
    if (this._state === "saved" || this._state === "discarded") return;

    this.file.dispose();
    this._state = "discarded";
    await removeWorkingCopy(this.workingPath);
  }

  protected abstract fieldKey(field: TagField): string;
  protected abstract writeText(key: string, value: string): void;
  protected abstract writeReleaseDate(timestamp: Timestamp): void;
  protected abstract writeCover(mime: string, data: Uint8Array): void;
  protected abstract writeUniqueFileIdentifier(trackId: string): void;
  /** Renders the tag into the working copy. */
  protected abstract commit(): void;

  private assertWritable(operation: string): void {
    if (this._state === "saved" || this._state === "discarded") {
      throw new TagEncodingError(`${operation}: tags for ${this.path} were already ${this._state}`);
    }
  }
}
