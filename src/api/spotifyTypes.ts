// Subset of the Spotify Web API object model this package reads.

export interface ExternalUrls {
  spotify?: string;
}

export interface ExternalIds {
  isrc?: string;
  ean?: string;
  upc?: string;
}

export interface Image {
  url: string;
  height: number | null;
  width: number | null;
}

export interface Copyright {
  text: string;
  type: string;
}

export interface SimplifiedArtist {
  id: string;
  name: string;
  type: "artist";
  uri: string;
  external_urls?: ExternalUrls;
}

export interface Artist extends SimplifiedArtist {
  genres: string[];
  images: Image[];
  popularity: number;
  followers?: { total: number };
}

export type AlbumType = "album" | "single" | "compilation";
export type ReleaseDatePrecision = "year" | "month" | "day";

export interface SimplifiedAlbum {
  id: string;
  name: string;
  type: "album";
  uri: string;
  album_type: AlbumType;
  album_group?: AlbumType | "appears_on";
  artists: SimplifiedArtist[];
  images: Image[];
  release_date: string;
  release_date_precision: ReleaseDatePrecision;
  total_tracks: number;
  external_urls?: ExternalUrls;
}

export interface SimplifiedTrack {
  /** null for local files added to a playlist. */
  id: string | null;
  name: string;
  type: "track";
  uri: string;
  artists: SimplifiedArtist[];
  disc_number: number;
  track_number: number;
  duration_ms: number;
  explicit: boolean;
  is_local?: boolean;
  is_playable?: boolean;
  external_urls?: ExternalUrls;
}

export interface Track extends SimplifiedTrack {
  album: SimplifiedAlbum;
  external_ids: ExternalIds;
  popularity: number;
}

export interface Episode {
  id: string;
  name: string;
  type: "episode";
  uri: string;
  duration_ms: number;
}

export interface Page<T> {
  href: string;
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
  previous: string | null;
}

export interface Album extends SimplifiedAlbum {
  genres: string[];
  label: string;
  popularity: number;
  copyrights: Copyright[];
  external_ids: ExternalIds;
  tracks: Page<SimplifiedTrack>;
}

export interface PlaylistItem {
  added_at: string | null;
  is_local: boolean;
  track: Track | Episode | null;
}

export interface Playlist {
  id: string;
  name: string;
  type: "playlist";
  uri: string;
  description: string | null;
  collaborative: boolean;
  public: boolean | null;
  snapshot_id: string;
  owner: { id: string; display_name?: string | null };
  images: Image[];
  tracks: Page<PlaylistItem>;
}

export interface TrackSearchResponse {
  tracks?: Page<Track>;
}

/** A track-level record produced by expansion: full tracks from playlists, simplified ones from albums. */
export type TrackRecord = Track | SimplifiedTrack;
