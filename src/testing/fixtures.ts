import { vi } from "vitest";
import type { Album, Page, SimplifiedAlbum, SimplifiedArtist, SimplifiedTrack, Track } from "../api/spotifyTypes";

// Factories and a fetch stub shared by the unit tests.

export function artist(name: string, id: string = name.toLowerCase().replace(/\W+/g, "")): SimplifiedArtist {
  return { id, name, type: "artist", uri: `spotify:artist:${id}` };
}

export function simplifiedAlbum(id: string, overrides: Partial<SimplifiedAlbum> = {}): SimplifiedAlbum {
  return {
    id,
    name: `Album ${id}`,
    type: "album",
    uri: `spotify:album:${id}`,
    album_type: "album",
    artists: [artist("Test Artist")],
    images: [],
    release_date: "2020-01-01",
    release_date_precision: "day",
    total_tracks: 1,
    ...overrides,
  };
}

export function album(id: string, overrides: Partial<Album> = {}): Album {
  return {
    ...simplifiedAlbum(id),
    genres: [],
    label: "",
    popularity: 0,
    copyrights: [],
    external_ids: {},
    tracks: page<SimplifiedTrack>([], 0, 0),
    ...overrides,
  };
}

export function simplifiedTrack(id: string, overrides: Partial<SimplifiedTrack> = {}): SimplifiedTrack {
  return {
    id,
    name: `Track ${id}`,
    type: "track",
    uri: `spotify:track:${id}`,
    artists: [artist("Test Artist")],
    disc_number: 1,
    track_number: 1,
    duration_ms: 180000,
    explicit: false,
    ...overrides,
  };
}

export function track(id: string, overrides: Partial<Track> = {}): Track {
  return {
    ...simplifiedTrack(id),
    album: simplifiedAlbum(`album-of-${id}`),
    external_ids: {},
    popularity: 0,
    ...overrides,
  };
}

/** A page whose `next` is set while `offset + items.length < total`. */
export function page<T>(items: T[], offset: number, total: number, limit: number = 50): Page<T> {
  const end = offset + items.length;
  return {
    href: "https://api.spotify.com/v1/page",
    items,
    limit,
    offset,
    total,
    next: end < total ? `https://api.spotify.com/v1/page?offset=${end}&limit=${limit}` : null,
    previous: null,
  };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

export function createFetchMock() {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => jsonResponse({}));
}

export type FetchMock = ReturnType<typeof createFetchMock>;

/** Answers each request with whatever the handler returns for its URL; plain values become JSON. */
export function routeFetch(fetchMock: FetchMock, handler: (url: URL) => unknown): void {
  fetchMock.mockImplementation(async (input: string | URL | Request) => {
    const body = handler(new URL(String(input)));
    return body instanceof Response ? body : jsonResponse(body);
  });
}

export function requestedUrls(fetchMock: FetchMock): string[] {
  return fetchMock.mock.calls.map(([input]) => String(input));
}
