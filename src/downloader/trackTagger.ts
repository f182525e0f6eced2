import { extname } from "node:path";
import type { SpotifyApi } from "../api/spotifyApi";
import type { Album, Image, SimplifiedAlbum, TrackRecord } from "../api/spotifyTypes";
import { UnsupportedFormatError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";
import { formatFromPath, openTagWriter } from "./tagWriters/openTagWriter";
import { TagField } from "./tagWriters/tagWriter";
import type { CoverArt, Id3Version, TagWriter } from "./tagWriters/tagWriter";

const logger = Logger.create("TrackTagger");

export interface TrackTagExtras {
  /** Full album for genres and label; falls back to the album embedded in a full track. */
  album?: Album | SimplifiedAlbum;
  cover?: CoverArt;
}

export interface TagTrackFileOptions extends TrackTagExtras {
  /** Container format; guessed from the extension when omitted. */
  format?: string;
  id3Version?: Id3Version;
  separator?: string;
}

/** Maps a track record onto the canonical fields. Nothing is written until save(). */
export function applyTrackTags(writer: TagWriter, track: TrackRecord, extras: TrackTagExtras = {}): void {
  const album = extras.album ?? ("album" in track ? track.album : undefined);

  writer.setField(TagField.Title, [track.name]);
  writer.setField(TagField.Artist, track.artists.map(artist => artist.name));
  writer.setField(TagField.TrackNumber, [track.track_number.toString()]);
  writer.setField(TagField.DiscNumber, [track.disc_number.toString()]);

  if (album) {
    writer.setField(TagField.Album, [album.name]);
    if (album.artists.length > 0) writer.setField(TagField.AlbumArtist, album.artists.map(artist => artist.name));
    if (album.release_date) writer.setReleaseDate(album.release_date);
    if ("genres" in album && album.genres.length > 0) writer.setField(TagField.Genre, album.genres);
    if ("label" in album && album.label) writer.setField(TagField.Label, [album.label]);
  } else {
    logger.logDebug(`No album information for '${track.name}'; album fields left untouched`);
  }

  if (extras.cover) writer.addCover(extras.cover.mime, extras.cover.data);
  if (track.id) {
    writer.addUniqueFileIdentifier(track.id);
  } else {
    logger.logDebug(`Track '${track.name}' has no catalog id; unique file identifier left untouched`);
  }
}

/** Opens the file, applies the track's tags and saves in one go. */
export async function tagTrackFile(path: string, track: TrackRecord, options: TagTrackFileOptions = {}): Promise<TagWriter> {
  const format = options.format ?? formatFromPath(path);
  if (format === null) throw new UnsupportedFormatError(extname(path).replace(/^\./, "") || path);

  const writer = await openTagWriter(path, format, { id3Version: options.id3Version, separator: options.separator });
  try {
    applyTrackTags(writer, track, options);
  } catch (error) {
    await writer.discard();
    throw error;
  }
  await writer.save();

  logger.logInfo(`Tagged ${path} with '${track.name}' (${track.id ?? "local"})`);
  return writer;
}

/** Largest image by pixel area; images without dimensions rank last. */
export function selectCoverImage(images: Image[]): Image | undefined {
  const area = (image: Image) => (image.width ?? 0) * (image.height ?? 0);
  return images.reduce<Image | undefined>((best, image) => (!best || area(image) > area(best) ? image : best), undefined);
}

/** Downloads the album's largest cover. Failures are logged and yield undefined. */
export async function fetchCoverArt(api: SpotifyApi, album: SimplifiedAlbum): Promise<CoverArt | undefined> {
  const image = selectCoverImage(album.images);
  if (!image) {
    logger.logDebug(`Album ${album.id} has no images`);
    return undefined;
  }

  try {
    return await api.downloadImage(image.url);
  } catch (error) {
    logger.logWarn(`Failed to fetch cover for album ${album.id}: ${errorMessage(error)}`);
    return undefined;
  }
}
