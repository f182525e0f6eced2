import type { SpotifyApi } from "../api/spotifyApi";
import type { Album, Artist, Playlist, Track } from "../api/spotifyTypes";
import { RemoteServiceError } from "../errors";
import { Logger } from "../utils/logger";
import { parseUri } from "./uriResolver";
import type { CanonicalReference } from "./uriResolver";

const logger = Logger.create("MetadataClient");

export const SEARCH_LIMIT = 50;

export type ResolvedItem =
  | { kind: "track"; track: Track }
  | { kind: "album"; album: Album }
  | { kind: "playlist"; playlist: Playlist }
  | { kind: "artist"; artist: Artist }
  | { kind: "other"; uri: string };

export class MetadataClient {
  constructor(private readonly api: SpotifyApi, readonly market?: string) { }

  /**
   * Fetches the single item a reference points at. Playlists come back with only
   * the first page of their items embedded.
   */
  async resolve(reference: CanonicalReference): Promise<ResolvedItem> {
    switch (reference.kind) {
      case "track":
        return { kind: "track", track: await this.api.getTrack(reference.id, this.market) };
      case "playlist":
        return { kind: "playlist", playlist: await this.api.getPlaylist(reference.id, this.market) };
      case "album":
        return { kind: "album", album: await this.api.getAlbum(reference.id, this.market) };
      case "artist":
        return { kind: "artist", artist: await this.api.getArtist(reference.id) };
      case "other":
        logger.logWarn(`Unsupported reference, nothing fetched: ${reference.uri}`);
        return { kind: "other", uri: reference.uri };
    }
  }

  resolveInput(input: string): Promise<ResolvedItem> {
    return this.resolve(parseUri(input));
  }

  async search(query: string): Promise<Track[]> {
    const result = await this.api.searchTracks(query, {
      market: this.market,
      limit: SEARCH_LIMIT,
      offset: 0,
      includeExternal: "audio",
    });
    if (result.tracks === undefined) return [];
    if (!Array.isArray(result.tracks.items)) {
      throw new RemoteServiceError(`Malformed search results for "${query}": expected an items array`);
    }
    return result.tracks.items;
  }
}
