import {
  ByteVector,
  Id3v2FrameIdentifiers,
  Id3v2Tag,
  Id3v2UniqueFileIdentifierFrame,
  Picture,
  PictureType,
  TagTypes,
} from "node-taglib-sharp";
import { TagEncodingError } from "../../errors";
import { Logger } from "../../utils/logger";
import { BaseTagWriter, COVER_DESCRIPTION, TagField, UNIQUE_FILE_IDENTIFIER_OWNER, openWorkingCopy } from "./tagWriter";
import type { AudioFormat, CoverArt, Id3Version, WorkingCopy } from "./tagWriter";
import { formatTimestamp } from "./timestamp";
import type { Timestamp } from "./timestamp";

const logger = Logger.create("Id3TagWriter");

const MIME_TYPE = "audio/mpeg";

type FrameIdentifier = Parameters<Id3v2Tag["getTextAsString"]>[0];

const frameIdentifiers: Readonly<Record<string, FrameIdentifier | undefined>> = Id3v2FrameIdentifiers;

const frameIds: Record<TagField, string> = {
  [TagField.Title]: "TIT2",
  [TagField.Artist]: "TPE1",
  [TagField.Album]: "TALB",
  [TagField.TrackNumber]: "TRCK",
  [TagField.DiscNumber]: "TPOS",
  [TagField.Genre]: "TCON",
  [TagField.Label]: "TPUB",
  [TagField.AlbumArtist]: "TPE2",
};

const RELEASE_DATE_FRAME = "TDRL";
const RECORDING_TIME_FRAME = "TDRC";
const YEAR_FRAME = "TYER";
// date frames of ID3v2.3 that ID3v2.4 folds into TDRC or drops
const VERSION_3_DATE_FRAMES = ["TYER", "TDAT", "TIME", "TRDA", "TSIZ"];
const TEXT_FRAME_ID = /^T[0-9A-Z]{3}$/;
// UFID identifiers are limited to 64 bytes
const MAX_UFID_IDENTIFIER_LENGTH = 64;

export interface Id3TagWriterOptions {
  /** ID3v2 minor version written on save. Defaults to 3. */
  version?: Id3Version;
}

function identifier(key: string): FrameIdentifier {
  const ident = TEXT_FRAME_ID.test(key) && key !== "TXXX" ? frameIdentifiers[key] : undefined;
  if (!ident) throw new TagEncodingError(`'${key}' is not an ID3 text frame id`);
  return ident;
}

export class Id3TagWriter extends BaseTagWriter<Id3v2Tag> {
  readonly format: AudioFormat = "mp3";
  private version: Id3Version;

  private constructor(path: string, workingCopy: WorkingCopy<Id3v2Tag>, version: Id3Version) {
    super(path, workingCopy);
    this.version = version;
  }

  /** A file without an ID3v2 tag opens with an empty one. */
  static async open(path: string, options: Id3TagWriterOptions = {}): Promise<Id3TagWriter> {
    const workingCopy = await openWorkingCopy(path, MIME_TYPE, file => {
      if (!file.getTag(TagTypes.Id3v2, false)) logger.logDebug(`No ID3v2 tag in ${path}; starting with an empty tag`);

      const tag = file.getTag(TagTypes.Id3v2, true);
      return tag instanceof Id3v2Tag ? tag : undefined;
    });

    logger.logDebug(`Read ID3v2.${workingCopy.tag.version} tag with ${workingCopy.tag.frames.length} frames from ${path}`);
    return new Id3TagWriter(path, workingCopy, options.version ?? 3);
  }

  get id3Version(): Id3Version {
    return this.version;
  }

  useId3v24(enabled: boolean): void {
    this.version = enabled ? 4 : 3;
  }

  getRaw(key: string): string | undefined {
    return this.tag.getTextAsString(identifier(key)) || undefined;
  }

  getCover(): CoverArt | undefined {
    const picture = this.tag.pictures.find(candidate => candidate.type === PictureType.FrontCover);
    return picture && { mime: picture.mimeType, data: new Uint8Array(picture.data.toByteArray()) };
  }

  getUniqueFileIdentifier(owner: string = UNIQUE_FILE_IDENTIFIER_OWNER): string | undefined {
    const frame = this.uniqueFileIdentifierFrames(owner)[0];
    return frame && Buffer.from(frame.identifier.toByteArray()).toString("latin1");
  }

  protected fieldKey(field: TagField): string {
    return frameIds[field];
  }

  protected writeText(key: string, value: string): void {
    this.tag.setTextFrame(identifier(key), value);
  }

  protected writeReleaseDate(timestamp: Timestamp): void {
    this.tag.setTextFrame(identifier(RELEASE_DATE_FRAME), formatTimestamp(timestamp));
  }

  protected writeCover(mime: string, data: Uint8Array): void {
    const cover = Picture.fromFullData(ByteVector.fromByteArray(data), PictureType.FrontCover, mime, COVER_DESCRIPTION);
    this.tag.pictures = [...this.tag.pictures.filter(picture => picture.type !== PictureType.FrontCover), cover];
  }

  protected writeUniqueFileIdentifier(trackId: string): void {
    const identifierBytes = Buffer.from(trackId, "latin1");
    if (identifierBytes.length > MAX_UFID_IDENTIFIER_LENGTH) {
      throw new TagEncodingError(`Unique file identifier is longer than ${MAX_UFID_IDENTIFIER_LENGTH} bytes: '${trackId}'`);
    }

    for (const frame of this.uniqueFileIdentifierFrames(UNIQUE_FILE_IDENTIFIER_OWNER)) this.tag.removeFrame(frame);
    this.tag.addFrame(Id3v2UniqueFileIdentifierFrame.fromData(UNIQUE_FILE_IDENTIFIER_OWNER, ByteVector.fromByteArray(identifierBytes)));
  }

  protected commit(): void {
    if (this.version === 4) this.upgradeDateFrames();
    this.tag.version = this.version;
    this.file.save();
  }

  /** Moves a v2.3 year into TDRC and removes the date frames ID3v2.4 does not define. */
  private upgradeDateFrames(): void {
    const recordingTime = identifier(RECORDING_TIME_FRAME);
    const yearIdentifier = frameIdentifiers[YEAR_FRAME];
    const year = yearIdentifier ? this.tag.getTextAsString(yearIdentifier) : undefined;
    const recorded = this.tag.getTextAsString(recordingTime) || year;

    for (const key of VERSION_3_DATE_FRAMES) {
      const ident = frameIdentifiers[key];
      if (ident) this.tag.removeFrames(ident);
    }
    if (recorded && !this.tag.getTextAsString(recordingTime)) {
      logger.logDebug(`Moving ${YEAR_FRAME} '${recorded}' of ${this.path} into ${RECORDING_TIME_FRAME}`);
      this.tag.setTextFrame(recordingTime, recorded);
    }
  }

  private uniqueFileIdentifierFrames(owner: string): Id3v2UniqueFileIdentifierFrame[] {
    return this.tag.frames.filter(
      (frame): frame is Id3v2UniqueFileIdentifierFrame => frame instanceof Id3v2UniqueFileIdentifierFrame && frame.owner === owner
    );
  }
}
