import { MAX_PAGE_SIZE } from "../api/spotifyApi";
import type { PageRequest, SpotifyApi } from "../api/spotifyApi";
import type { Page, PlaylistItem, SimplifiedAlbum, SimplifiedTrack, Track, TrackRecord } from "../api/spotifyTypes";
import { RemoteServiceError } from "../errors";
import { Logger } from "../utils/logger";
import type { CanonicalReference } from "./uriResolver";

const logger = Logger.create("CatalogExpander");

export interface CatalogExpanderOptions {
  market?: string;
  /**
   * Playlists are expanded from the first page of items only unless this is set,
   * in which case the remaining pages are requested as well.
   */
  followPlaylistPages?: boolean;
  pageSize?: number;
}

type PageFetcher<T> = (request: PageRequest) => Promise<Page<T>>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function assertPage(value: unknown, context: string): void {
  if (!isObject(value) || !Array.isArray(value.items)) {
    throw new RemoteServiceError(`Malformed page of ${context}: expected an items array`);
  }
}

function isTrack(item: PlaylistItem["track"]): item is Track {
  return item !== null && item.type === "track";
}

// local files carry no catalog id and cannot be looked up or identified
function playlistTracks(items: PlaylistItem[]): Track[] {
  const tracks = items.map(item => item.track).filter(isTrack);
  const catalogTracks = tracks.filter(track => !track.is_local && track.id !== null);
  if (catalogTracks.length < tracks.length) {
    logger.logDebug(`Skipped ${tracks.length - catalogTracks.length} local playlist tracks`);
  }
  return catalogTracks;
}

/**
 * Turns playlists, albums and artists into flat, ordered track lists.
 * Pages are fetched one after another; any failing page aborts the whole expansion.
 */
export class CatalogExpander {
  readonly market?: string;
  private readonly followPlaylistPages: boolean;
  private readonly pageSize: number;

  constructor(private readonly api: SpotifyApi, options: CatalogExpanderOptions = {}) {
    this.market = options.market;
    this.followPlaylistPages = options.followPlaylistPages ?? false;
    this.pageSize = options.pageSize ?? MAX_PAGE_SIZE;
  }

  async expand(reference: CanonicalReference): Promise<TrackRecord[]> {
    switch (reference.kind) {
      case "track":
        return [await this.api.getTrack(reference.id, this.market)];
      case "playlist":
        return this.expandPlaylist(reference.id);
      case "album":
        return this.expandAlbum(reference.id);
      case "artist":
        return this.expandArtist(reference.id);
      case "other":
        logger.logWarn(`Nothing to expand for unsupported reference ${reference.uri}`);
        return [];
    }
  }

  async expandPlaylist(id: string): Promise<Track[]> {
    const playlist = await this.api.getPlaylist(id, this.market);
    assertPage(isObject(playlist) ? playlist.tracks : undefined, `playlist ${id} items`);
    const tracks = playlistTracks(playlist.tracks.items);

    if (!this.followPlaylistPages || playlist.tracks.next === null) {
      if (playlist.tracks.next !== null) {
        logger.logInfo(`Playlist ${id} has ${playlist.tracks.total} items; only the first ${playlist.tracks.items.length} were expanded`);
      }
      return tracks;
    }

    const remaining = await this.collectPages<PlaylistItem>(
      request => this.api.getPlaylistItems(id, request),
      `playlist ${id} items`,
      playlist.tracks.offset + playlist.tracks.items.length
    );
    return tracks.concat(playlistTracks(remaining));
  }

  expandAlbum(id: string): Promise<SimplifiedTrack[]> {
    return this.collectPages<SimplifiedTrack>(request => this.api.getAlbumTracks(id, request), `album ${id} tracks`);
  }

  async expandArtist(id: string): Promise<SimplifiedTrack[]> {
    const albums = await this.collectPages<SimplifiedAlbum>(request => this.api.getArtistAlbums(id, request), `artist ${id} albums`);
    logger.logDebug(`Artist ${id} lists ${albums.length} albums`);

    const tracks: SimplifiedTrack[] = [];
    for (const album of albums) {
      const albumTracks = await this.expandAlbum(album.id);
      tracks.push(...albumTracks);
    }
    return tracks;
  }

  private async collectPages<T>(fetchPage: PageFetcher<T>, context: string, startOffset: number = 0): Promise<T[]> {
    const items: T[] = [];
    let offset = startOffset;

    while (true) {
      const page = await fetchPage({ market: this.market, limit: this.pageSize, offset });
      assertPage(page, context);
      items.push(...page.items);
      offset += page.items.length;

      if (!page.next || page.items.length === 0) break;
    }

    return items;
  }
}
