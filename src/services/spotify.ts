import type { FetchLike } from "../lib/fetch";
import { sleep } from "../lib/fetch";
import { asArray, asNumber, asString, isRecord } from "../lib/json";
import { log } from "../lib/logger";
import { withRetry } from "../lib/retry";
import type { LibraryArtist, LibraryTrack, SpotifyUser } from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const SAVED_TRACKS_PAGE_SIZE = 50;
export const ARTIST_BATCH_SIZE = 50;
export const PLAYLIST_ADD_BATCH_SIZE = 100;
const DEFAULT_REQUEST_DELAY_MS = 500;
const REQUEST_TIMEOUT_MS = 15000;

export class SpotifyApiError extends Error {
  readonly status: number;
  readonly endpoint: string;

  constructor(status: number, endpoint: string) {
    super(`Spotify API ${status} (${endpoint})`);
    this.name = "SpotifyApiError";
    this.status = status;
    this.endpoint = endpoint;
  }
}

export type SpotifyClientOptions = {
  accessToken: string;
  fetchFn?: FetchLike;
  baseUrl?: string;
  /** Pause between batched calls (artist lookups, playlist adds). */
  requestDelayMs?: number;
};

export type SavedTracksPage = {
  items: LibraryTrack[];
  /** Raw items on the page, including any that could not be parsed. */
  received: number;
  total: number;
  next: string | null;
};

export type SpotifyArtist = {
  id: string;
  name: string;
  genres: string[];
};

function parseArtist(value: unknown): LibraryArtist | null {
  if (!isRecord(value)) return null;
  const name = asString(value.name);
  if (name === null) return null;
  return { id: asString(value.id), name };
}

/**
 * Maps one `GET /me/tracks` item to a library track.
 * Local files come back with a null id; they are kept and later skipped
 * when no playable URI can be built.
 */
export function parseSavedTrack(item: unknown): LibraryTrack | null {
  if (!isRecord(item) || !isRecord(item.track)) return null;
  const track = item.track;
  const name = asString(track.name);
  if (name === null) return null;

  const artists: LibraryArtist[] = [];
  for (const raw of asArray(track.artists)) {
    const artist = parseArtist(raw);
    if (artist) artists.push(artist);
  }

  return {
    id: asString(track.id),
    name,
    artists,
    album: isRecord(track.album) ? asString(track.album.name) : null,
    duration_ms: asNumber(track.duration_ms),
    popularity: asNumber(track.popularity),
    added_at: asString(item.added_at),
  };
}

export function trackUri(track: Pick<LibraryTrack, "id">): string | null {
  return track.id ? `spotify:track:${track.id}` : null;
}

export class SpotifyClient {
  private readonly accessToken: string;
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly requestDelayMs: number;
  private lastBatchTime = 0;

  constructor(options: SpotifyClientOptions) {
    this.accessToken = options.accessToken;
    this.fetchImpl = options.fetchFn ?? fetch;
    this.baseUrl = (options.baseUrl ?? SPOTIFY_API_BASE).replace(/\/+$/, "");
    this.requestDelayMs = options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
  }

  /**
   * Keeps batched calls (artist lookups, playlist adds) at least
   * `requestDelayMs` apart, across calls as well as within one.
   */
  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastBatchTime;
    if (elapsed < this.requestDelayMs) {
      await sleep(this.requestDelayMs - elapsed);
    }
    this.lastBatchTime = Date.now();
  }

  private async request(
    method: "GET" | "POST",
    endpoint: string,
    body?: unknown
  ): Promise<unknown> {
    const url = endpoint.startsWith("http") ? endpoint : `${this.baseUrl}${endpoint}`;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.accessToken}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const response = await withRetry(
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
        try {
          return await this.fetchImpl(url, {
            method,
            headers,
            signal: controller.signal,
            ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
          });
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          throw new Error(`Spotify network error: ${msg} (${endpoint})`);
        } finally {
          clearTimeout(timeout);
        }
      },
      { label: `spotify ${method} ${endpoint}` }
    );

    if (!response.ok) {
      throw new SpotifyApiError(response.status, endpoint);
    }
    return response.json();
  }

  async getCurrentUser(): Promise<SpotifyUser> {
    const data = await this.request("GET", "/me");
    const id = isRecord(data) ? asString(data.id) : null;
    if (!isRecord(data) || id === null) {
      throw new Error("Spotify /me response did not include a user id");
    }
    return { id, display_name: asString(data.display_name) };
  }

  async getSavedTracks(
    limit = SAVED_TRACKS_PAGE_SIZE,
    offset = 0
  ): Promise<SavedTracksPage> {
    const query = new URLSearchParams({ limit: String(limit), offset: String(offset) });
    const data = await this.request("GET", `/me/tracks?${query}`);
    if (!isRecord(data)) {
      return { items: [], received: 0, total: 0, next: null };
    }

    const rawItems = asArray(data.items);
    const items: LibraryTrack[] = [];
    for (const raw of rawItems) {
      const track = parseSavedTrack(raw);
      if (track) items.push(track);
    }
    return {
      items,
      received: rawItems.length,
      total: asNumber(data.total) ?? items.length,
      next: asString(data.next),
    };
  }

  /**
   * Pages through the whole library, newest saves first.
   */
  async getAllSavedTracks(
    onPage?: (fetched: number, total: number) => void
  ): Promise<LibraryTrack[]> {
    const all: LibraryTrack[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.getSavedTracks(SAVED_TRACKS_PAGE_SIZE, offset);
      all.push(...page.items);
      offset += SAVED_TRACKS_PAGE_SIZE;
      onPage?.(Math.min(offset, page.total), page.total);

      if (page.received === 0 || page.next === null) break;
    }

    return all;
  }

  /**
   * Looks up artists by id in batches of 50. Unknown ids are simply absent
   * from the result.
   */
  async getArtists(ids: string[]): Promise<SpotifyArtist[]> {
    const artists: SpotifyArtist[] = [];

    for (let i = 0; i < ids.length; i += ARTIST_BATCH_SIZE) {
      await this.throttle();
      const chunk = ids.slice(i, i + ARTIST_BATCH_SIZE);
      const query = new URLSearchParams({ ids: chunk.join(",") });
      const data = await this.request("GET", `/artists?${query}`);

      for (const raw of isRecord(data) ? asArray(data.artists) : []) {
        if (!isRecord(raw)) continue;
        const id = asString(raw.id);
        if (id === null) continue;
        artists.push({
          id,
          name: asString(raw.name) ?? "",
          genres: asArray(raw.genres)
            .filter((g): g is string => typeof g === "string")
            .map((g) => g.toLowerCase()),
        });
      }
    }

    return artists;
  }

  async createPlaylist(
    userId: string,
    name: string,
    description: string,
    isPublic = false
  ): Promise<string> {
    const data = await this.request(
      "POST",
      `/users/${encodeURIComponent(userId)}/playlists`,
      { name, description, public: isPublic }
    );
    const id = isRecord(data) ? asString(data.id) : null;
    if (id === null) {
      throw new Error(`Spotify did not return an id for playlist "${name}"`);
    }
    return id;
  }

  /**
   * Appends URIs in batches of 100 (the API maximum), pausing between batches.
   */
  async addTracksToPlaylist(playlistId: string, uris: string[]): Promise<number> {
    let added = 0;
    for (let i = 0; i < uris.length; i += PLAYLIST_ADD_BATCH_SIZE) {
      await this.throttle();
      const batch = uris.slice(i, i + PLAYLIST_ADD_BATCH_SIZE);
      await this.request(
        "POST",
        `/playlists/${encodeURIComponent(playlistId)}/tracks`,
        { uris: batch }
      );
      added += batch.length;
      log(`[create] added ${added}/${uris.length} tracks to ${playlistId}`);
    }
    return added;
  }
}
