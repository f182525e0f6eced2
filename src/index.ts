import { SpotifyApi } from "./api/spotifyApi";
import { ClientCredentialsAuth, StaticTokenProvider } from "./api/spotifyAuth";
import type { AccessTokenProvider } from "./api/spotifyAuth";
import type { TrackRecord } from "./api/spotifyTypes";
import { CatalogExpander } from "./catalog/catalogExpander";
import { MetadataClient } from "./catalog/metadataClient";
import { buildTrackFilename } from "./downloader/download";
import type { AudioFormat, TagWriter } from "./downloader/tagWriters/tagWriter";
import { tagTrackFile } from "./downloader/trackTagger";
import type { TagTrackFileOptions } from "./downloader/trackTagger";
import { ConfigurationError } from "./errors";
import type { Configuration } from "./settings/config";

export * from "./errors";
export * from "./api/spotifyApi";
export * from "./api/spotifyAuth";
export type * from "./api/spotifyTypes";
export * from "./catalog/uriResolver";
export * from "./catalog/metadataClient";
export * from "./catalog/catalogExpander";
export * from "./downloader/download";
export * from "./downloader/trackTagger";
export * from "./downloader/tagWriters/tagWriter";
export * from "./downloader/tagWriters/timestamp";
export * from "./downloader/tagWriters/openTagWriter";
export { Id3TagWriter } from "./downloader/tagWriters/id3TagWriter";
export type { Id3TagWriterOptions } from "./downloader/tagWriters/id3TagWriter";
export { OggTagWriter } from "./downloader/tagWriters/oggTagWriter";
export * from "./settings/config";
export { Logger, LogLevel } from "./utils/logger";

/** Local file operations bound to the configured separator, ID3 version and filename template. */
export interface Tagger {
  tagFile(path: string, track: TrackRecord, options?: TagTrackFileOptions): Promise<TagWriter>;
  filenameFor(track: TrackRecord, format: AudioFormat): string;
}

export interface Catalog {
  api: SpotifyApi;
  metadata: MetadataClient;
  expander: CatalogExpander;
  tagger: Tagger;
}

export function createTokenProvider(config: Configuration): AccessTokenProvider {
  if (config.accessToken) return new StaticTokenProvider(config.accessToken);
  if (config.clientId && config.clientSecret) return new ClientCredentialsAuth(config.clientId, config.clientSecret);

  throw new ConfigurationError("Set SPOTIFY_ACCESS_TOKEN or SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET");
}

export function createTagger(config: Configuration): Tagger {
  return {
    tagFile: (path, track, options = {}) =>
      tagTrackFile(path, track, {
        ...options,
        separator: options.separator ?? config.tagSeparator,
        id3Version: options.id3Version ?? config.id3Version,
      }),
    filenameFor: (track, format) => buildTrackFilename(track, format, config.filenameTemplate),
  };
}

export function createCatalog(config: Configuration): Catalog {
  const api = new SpotifyApi(createTokenProvider(config));
  return {
    api,
    metadata: new MetadataClient(api, config.market),
    expander: new CatalogExpander(api, { market: config.market, followPlaylistPages: config.followPlaylistPages }),
    tagger: createTagger(config),
  };
}
