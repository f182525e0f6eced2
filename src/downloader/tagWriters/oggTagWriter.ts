import { ByteVector, Picture, PictureType, TagTypes, XiphComment } from "node-taglib-sharp";
import { TagEncodingError } from "../../errors";
import { Logger } from "../../utils/logger";
import { BaseTagWriter, COVER_DESCRIPTION, TagField, UNIQUE_FILE_IDENTIFIER_OWNER, openWorkingCopy } from "./tagWriter";
import type { AudioFormat, CoverArt, WorkingCopy } from "./tagWriter";
import { formatTimestamp } from "./timestamp";
import type { Timestamp } from "./timestamp";

const logger = Logger.create("OggTagWriter");

const MIME_TYPE = "audio/ogg";

const commentKeys: Record<TagField, string> = {
  [TagField.Title]: "TITLE",
  [TagField.Artist]: "ARTIST",
  [TagField.Album]: "ALBUM",
  [TagField.TrackNumber]: "TRACKNUMBER",
  [TagField.DiscNumber]: "DISCNUMBER",
  [TagField.Genre]: "GENRE",
  [TagField.Label]: "LABEL",
  [TagField.AlbumArtist]: "ALBUMARTIST",
};

const RELEASE_DATE_KEY = "DATE";
const UNIQUE_FILE_IDENTIFIER_KEY = "UFID";

// printable ASCII except '='
const COMMENT_KEY_PATTERN = /^[\x20-\x3c\x3e-\x7d]+$/;

export class OggTagWriter extends BaseTagWriter<XiphComment> {
  readonly format: AudioFormat = "ogg";

  private constructor(path: string, workingCopy: WorkingCopy<XiphComment>) {
    super(path, workingCopy);
  }

  /** Every Vorbis stream carries a comment header, so there is always a tag to edit. */
  static async open(path: string): Promise<OggTagWriter> {
    const workingCopy = await openWorkingCopy(path, MIME_TYPE, file => {
      const tag = file.getTag(TagTypes.Xiph, true);
      return tag instanceof XiphComment ? tag : undefined;
    });

    logger.logDebug(`Read ${workingCopy.tag.fieldNames.length} Vorbis comment names from ${path} (vendor '${workingCopy.tag.vendorId}')`);
    return new OggTagWriter(path, workingCopy);
  }

  get vendor(): string {
    return this.tag.vendorId;
  }

  /** Every value stored under `key`, in file order. */
  getValues(key: string): string[] {
    return this.tag.getField(key.toUpperCase());
  }

  getRaw(key: string): string | undefined {
    return this.getValues(key)[0];
  }

  getCover(): CoverArt | undefined {
    const picture = this.tag.pictures.find(candidate => candidate.type === PictureType.FrontCover);
    return picture && { mime: picture.mimeType, data: new Uint8Array(picture.data.toByteArray()) };
  }

  getUniqueFileIdentifier(owner: string = UNIQUE_FILE_IDENTIFIER_OWNER): string | undefined {
    const prefix = `${owner}:`;
    return this.getValues(UNIQUE_FILE_IDENTIFIER_KEY).find(value => value.startsWith(prefix))?.substring(prefix.length);
  }

  protected fieldKey(field: TagField): string {
    return commentKeys[field];
  }

  protected writeText(key: string, value: string): void {
    if (!COMMENT_KEY_PATTERN.test(key)) throw new TagEncodingError(`'${key}' is not a valid Vorbis comment name`);

    this.tag.setFieldAsStrings(key.toUpperCase(), value);
  }

  protected writeReleaseDate(timestamp: Timestamp): void {
    this.tag.setFieldAsStrings(RELEASE_DATE_KEY, formatTimestamp(timestamp));
  }

  protected writeCover(mime: string, data: Uint8Array): void {
    const cover = Picture.fromFullData(ByteVector.fromByteArray(data), PictureType.FrontCover, mime, COVER_DESCRIPTION);
    this.tag.pictures = [...this.tag.pictures.filter(picture => picture.type !== PictureType.FrontCover), cover];
  }

  protected writeUniqueFileIdentifier(trackId: string): void {
    const prefix = `${UNIQUE_FILE_IDENTIFIER_OWNER}:`;
    const others = this.getValues(UNIQUE_FILE_IDENTIFIER_KEY).filter(value => !value.startsWith(prefix));
    this.tag.setFieldAsStrings(UNIQUE_FILE_IDENTIFIER_KEY, ...others, `${prefix}${trackId}`);
  }

  protected commit(): void {
    this.file.save();
  }
}
