import { RemoteServiceError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";
import type { AccessTokenProvider } from "./spotifyAuth";
import type {
  Album,
  Artist,
  Page,
  Playlist,
  PlaylistItem,
  SimplifiedAlbum,
  SimplifiedTrack,
  Track,
  TrackSearchResponse,
} from "./spotifyTypes";

type QueryValue = string | number | undefined;
type Query = Record<string, QueryValue>;

export interface PageRequest {
  limit?: number;
  offset?: number;
  market?: string;
}

export interface SearchRequest extends PageRequest {
  includeExternal?: "audio";
}

export interface DownloadedImage {
  mime: string;
  data: Uint8Array;
}

// the largest page the Web API hands out for albums, artist albums and playlist items
export const MAX_PAGE_SIZE = 50;

/**
 * Thin request/response layer over the Spotify Web API. Every method is one HTTP
 * round trip; nothing here retries, pages or caches.
 */
export class SpotifyApi {
  readonly baseUrl: string;
  private logger: Logger;

  constructor(private readonly auth: AccessTokenProvider, baseUrl: string = "https://api.spotify.com/v1") {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.logger = Logger.create("SpotifyApi");
  }

  getTrack(id: string, market?: string) {
    return this._fetchJsonInternal<Track>(`/tracks/${encodeURIComponent(id)}`, { market });
  }

  getPlaylist(id: string, market?: string) {
    return this._fetchJsonInternal<Playlist>(`/playlists/${encodeURIComponent(id)}`, { market });
  }

  getPlaylistItems(id: string, request: PageRequest = {}) {
    return this._fetchJsonInternal<Page<PlaylistItem>>(`/playlists/${encodeURIComponent(id)}/tracks`, {
      market: request.market,
      limit: request.limit ?? MAX_PAGE_SIZE,
      offset: request.offset ?? 0,
    });
  }

  getAlbum(id: string, market?: string) {
    return this._fetchJsonInternal<Album>(`/albums/${encodeURIComponent(id)}`, { market });
  }

  getAlbumTracks(id: string, request: PageRequest = {}) {
    return this._fetchJsonInternal<Page<SimplifiedTrack>>(`/albums/${encodeURIComponent(id)}/tracks`, {
      market: request.market,
      limit: request.limit ?? MAX_PAGE_SIZE,
      offset: request.offset ?? 0,
    });
  }

  // The artist endpoint takes no market parameter.
  getArtist(id: string) {
    return this._fetchJsonInternal<Artist>(`/artists/${encodeURIComponent(id)}`);
  }

  getArtistAlbums(id: string, request: PageRequest = {}) {
    return this._fetchJsonInternal<Page<SimplifiedAlbum>>(`/artists/${encodeURIComponent(id)}/albums`, {
      market: request.market,
      limit: request.limit ?? MAX_PAGE_SIZE,
      offset: request.offset ?? 0,
    });
  }

  searchTracks(query: string, request: SearchRequest = {}) {
    return this._fetchJsonInternal<TrackSearchResponse>("/search", {
      q: query,
      type: "track",
      market: request.market,
      limit: request.limit ?? MAX_PAGE_SIZE,
      offset: request.offset ?? 0,
      include_external: request.includeExternal,
    });
  }

  /** Fetches cover art from the image CDN. No bearer token is sent there. */
  async downloadImage(url: string): Promise<DownloadedImage> {
    let response: Response;
    try {
      response = await fetch(url);
    } catch (networkError) {
      this.logger.logError(`[downloadImage] Network error for ${url}: ${errorMessage(networkError)}`);
      throw new RemoteServiceError(`Network error: ${errorMessage(networkError)}`, undefined, { cause: networkError });
    }

    if (!response.ok) {
      throw new RemoteServiceError(`HTTP error ${response.status} ${response.statusText} for GET ${url}`, response.status);
    }

    const data = new Uint8Array(await response.arrayBuffer());
    const mime = response.headers.get("Content-Type")?.split(";")[0].trim() || "image/jpeg";
    this.logger.logDebug(`[downloadImage] Fetched ${data.byteLength} bytes (${mime}) from ${url}`);

    return { mime, data };
  }

  buildUrl(path: string, query: Query = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async _fetchJsonInternal<T>(path: string, query: Query = {}): Promise<T> {
    const url = this.buildUrl(path, query);
    const token = await this.auth.getAccessToken();

    let response: Response;
    try {
      this.logger.logDebug(`[API Fetch] GET ${url}`);
      response = await fetch(url, {
        method: "GET",
        headers: {
          "Accept": "application/json",
          "Authorization": `Bearer ${token}`,
        },
      });
    } catch (networkError) {
      this.logger.logError(`[API Fetch] Network error for GET ${url}: ${errorMessage(networkError)}`);
      throw new RemoteServiceError(`Network error: ${errorMessage(networkError)}`, undefined, { cause: networkError });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => `Failed to read error response body for status ${response.status}`);
      const errorMsg = `HTTP error ${response.status} ${response.statusText} for GET ${url}. Response: ${errorText.substring(0, 200)}`;
      this.logger.logError(errorMsg);
      throw new RemoteServiceError(errorMsg, response.status);
    }

    const responseText = await response.text();
    if (!responseText) {
      throw new RemoteServiceError(`Empty response body for GET ${url} (status ${response.status})`, response.status);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch (parseError) {
      this.logger.logError(`[API Fetch] Failed to parse JSON from GET ${url}: "${responseText.substring(0, 100)}"`);
      throw new RemoteServiceError(`JSON parsing error: ${errorMessage(parseError)}`, response.status, { cause: parseError });
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      this.logger.logError(`[API Fetch] Expected a JSON object from GET ${url}: "${responseText.substring(0, 100)}"`);
      throw new RemoteServiceError(`Malformed response for GET ${url}: expected a JSON object`, response.status);
    }
    return parsed as T;
  }
}
