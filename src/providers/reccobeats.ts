/**
 * ReccoBeats provider: audio features for Spotify tracks.
 *
 * Endpoints:
 *   GET /v1/track?ids=SPOTIFY_ID,...           → ReccoBeats tracks (href ends in the Spotify id)
 *   GET /v1/track/{id}/audio-features          → valence, energy, tempo, ...
 *
 * Rate limits: not documented, using 500ms between calls.
 */

import type { FetchLike, FetchResponse } from "../lib/fetch";
import { sleep } from "../lib/fetch";
import { asArray, asString, isRecord } from "../lib/json";
import type { AudioFeatures } from "../services/types";

// --- Types ---

export type ReccoBeatsClientOptions = {
  baseUrl?: string;
  fetchFn?: FetchLike;
  rateLimitMs?: number;
};

export type ReccoBeatsClient = {
  lookupTracks(spotifyIds: string[]): Promise<Map<string, string>>;
  getAudioFeatures(reccobeatsId: string): Promise<AudioFeatures | null>;
};

// --- Constants ---

const RECCOBEATS_BASE = "https://api.reccobeats.com";
const DEFAULT_RATE_LIMIT_MS = 500;
export const RECCOBEATS_BATCH_SIZE = 40;

/** Last path segment of an open.spotify.com track link. */
export function spotifyIdFromHref(href: string): string | null {
  const segment = href.split("?")[0]?.split("/").filter((part) => part.length > 0).pop();
  return segment ?? null;
}

export function parseAudioFeatures(payload: unknown): AudioFeatures | null {
  if (!isRecord(payload)) return null;
  const features: AudioFeatures = {};
  for (const [name, value] of Object.entries(payload)) {
    if (typeof value === "number" && Number.isFinite(value)) {
      features[name] = value;
    }
  }
  return Object.keys(features).length > 0 ? features : null;
}

// --- Client ---

export function createReccoBeatsClient(
  options: ReccoBeatsClientOptions = {}
): ReccoBeatsClient {
  const baseUrl = (options.baseUrl ?? RECCOBEATS_BASE).replace(/\/+$/, "");
  const fetchFn = options.fetchFn ?? fetch;
  const rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
  let lastRequestTime = 0;

  async function reccoFetch(endpoint: string): Promise<FetchResponse> {
    const elapsed = Date.now() - lastRequestTime;
    if (elapsed < rateLimitMs) {
      await sleep(rateLimitMs - elapsed);
    }
    lastRequestTime = Date.now();

    const url = `${baseUrl}${endpoint}`;
    try {
      return await fetchFn(url, { headers: { Accept: "application/json" } });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`ReccoBeats network error: ${msg} (${url})`);
    }
  }

  /**
   * Resolves up to 40 Spotify ids to ReccoBeats ids. Tracks ReccoBeats does
   * not know are missing from the returned map.
   */
  async function lookupTracks(spotifyIds: string[]): Promise<Map<string, string>> {
    const resolved = new Map<string, string>();
    if (spotifyIds.length === 0) return resolved;
    if (spotifyIds.length > RECCOBEATS_BATCH_SIZE) {
      throw new Error(`ReccoBeats lookup takes at most ${RECCOBEATS_BATCH_SIZE} ids`);
    }

    const query = new URLSearchParams({ ids: spotifyIds.join(",") });
    const endpoint = `/v1/track?${query}`;
    const response = await reccoFetch(endpoint);
    if (!response.ok) {
      throw new Error(`ReccoBeats API ${response.status} (/v1/track)`);
    }

    const data = await response.json();
    const wanted = new Set(spotifyIds);
    for (const item of isRecord(data) ? asArray(data.content) : []) {
      if (!isRecord(item)) continue;
      const id = asString(item.id);
      const href = asString(item.href);
      if (id === null || href === null) continue;
      const spotifyId = spotifyIdFromHref(href);
      if (spotifyId !== null && wanted.has(spotifyId)) {
        resolved.set(spotifyId, id);
      }
    }
    return resolved;
  }

  /**
   * Returns null when ReccoBeats has no analysis for the track (404).
   */
  async function getAudioFeatures(reccobeatsId: string): Promise<AudioFeatures | null> {
    const endpoint = `/v1/track/${encodeURIComponent(reccobeatsId)}/audio-features`;
    const response = await reccoFetch(endpoint);
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new Error(`ReccoBeats API ${response.status} (${endpoint})`);
    }
    return parseAudioFeatures(await response.json());
  }

  return {
    lookupTracks,
    getAudioFeatures,
  };
}
