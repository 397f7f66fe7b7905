import type { LibraryTrack } from "../services/types";
import type { AudioFeatures } from "../services/types";
import type { SpotifyArtist } from "../services/spotify";
import { ARTIST_BATCH_SIZE } from "../services/spotify";
import { RECCOBEATS_BATCH_SIZE } from "../providers/reccobeats";
import type { EnrichmentCache, CachedFeatures } from "./cache";
import { sleep } from "../lib/fetch";
import { errorMessage, log } from "../lib/logger";

const MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 2000;

/**
 * Retry an async function with exponential backoff.
 */
async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  baseDelayMs: number
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt === MAX_RETRIES) {
        throw err;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log(`[enrich] ${label} failed (${errorMessage(err)}), retrying in ${delayMs / 1000}s...`);
      await sleep(delayMs);
    }
  }
}

export type EnrichmentStats = {
  tracks: number;
  uniqueArtists: number;
  genres: {
    cacheHits: number;
    cacheMisses: number;
    apiCalls: number;
    notFound: number;
    errors: number;
  };
  features: {
    eligible: number; // tracks with a Spotify id and no features yet
    cacheHits: number;
    lookups: number;
    resolved: number;
    found: number;
    notFound: number;
    errors: number;
  };
};

export type ArtistGenreSource = {
  getArtists(ids: string[]): Promise<SpotifyArtist[]>;
};

export type AudioFeatureSource = {
  lookupTracks(spotifyIds: string[]): Promise<Map<string, string>>;
  getAudioFeatures(reccobeatsId: string): Promise<AudioFeatures | null>;
};

export type EnrichmentOptions = {
  cache: EnrichmentCache;
  artistSource?: ArtistGenreSource | undefined;
  featureSource?: AudioFeatureSource | undefined;
  onProgress?: ((stage: "genres" | "features", done: number, total: number) => void) | undefined;
  retryDelayMs?: number | undefined;
};

function emptyStats(tracks: number): EnrichmentStats {
  return {
    tracks,
    uniqueArtists: 0,
    genres: { cacheHits: 0, cacheMisses: 0, apiCalls: 0, notFound: 0, errors: 0 },
    features: {
      eligible: 0,
      cacheHits: 0,
      lookups: 0,
      resolved: 0,
      found: 0,
      notFound: 0,
      errors: 0,
    },
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

async function resolveGenres(
  tracks: LibraryTrack[],
  options: EnrichmentOptions,
  stats: EnrichmentStats
): Promise<Map<string, string[]>> {
  const { cache, artistSource, onProgress } = options;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const genreMap = new Map<string, string[]>();

  // Dedupe artists, one lookup per Spotify artist id
  const uniqueIds = [
    ...new Set(
      tracks.flatMap((t) => t.artists.map((a) => a.id)).filter((id): id is string => id !== null)
    ),
  ];
  stats.uniqueArtists = uniqueIds.length;

  const toFetch: string[] = [];
  for (const id of uniqueIds) {
    const cached = cache.getArtistGenres(id);
    if (cached === null) {
      toFetch.push(id);
      stats.genres.cacheMisses++;
      continue;
    }
    stats.genres.cacheHits++;
    if (cached !== "not_found") genreMap.set(id, cached);
  }

  if (!artistSource) return genreMap;

  const batches = chunk(toFetch, ARTIST_BATCH_SIZE);
  let done = stats.genres.cacheHits;
  for (let i = 0; i < batches.length; i++) {
    const batch = batches[i] ?? [];

    try {
      stats.genres.apiCalls++;
      const artists = await withRetry(
        () => artistSource.getArtists(batch),
        `artists batch ${i + 1}/${batches.length}`,
        retryDelayMs
      );

      const returned = new Set<string>();
      for (const artist of artists) {
        returned.add(artist.id);
        cache.setArtistGenres(artist.id, artist.name, artist.genres);
        genreMap.set(artist.id, artist.genres);
      }
      for (const id of batch) {
        if (!returned.has(id)) {
          cache.setArtistNotFound(id);
          stats.genres.notFound++;
        }
      }
    } catch (err) {
      stats.genres.errors++;
      log(`[enrich] artists batch ${i + 1} failed after retries: ${errorMessage(err)}`);
      // Don't cache errors: transient failures should be retried next run
    }

    done += batch.length;
    onProgress?.("genres", done, uniqueIds.length);
  }

  return genreMap;
}

async function resolveFeatures(
  tracks: LibraryTrack[],
  options: EnrichmentOptions,
  stats: EnrichmentStats
): Promise<Map<string, CachedFeatures>> {
  const { cache, featureSource, onProgress } = options;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const featureMap = new Map<string, CachedFeatures>();

  const eligible = [
    ...new Set(
      tracks
        .filter((t) => t.audio_features === undefined)
        .map((t) => t.id)
        .filter((id): id is string => id !== null)
    ),
  ];
  stats.features.eligible = eligible.length;

  const toFetch: string[] = [];
  for (const id of eligible) {
    const cached = cache.getFeatures(id);
    if (cached === null) {
      toFetch.push(id);
      continue;
    }
    stats.features.cacheHits++;
    if (cached === "not_found") {
      stats.features.notFound++;
    } else {
      featureMap.set(id, cached);
      stats.features.found++;
    }
  }

  if (!featureSource) return featureMap;

  let done = stats.features.cacheHits;
  for (const batch of chunk(toFetch, RECCOBEATS_BATCH_SIZE)) {
    let resolved: Map<string, string>;
    try {
      stats.features.lookups++;
      resolved = await withRetry(
        () => featureSource.lookupTracks(batch),
        `track lookup (${batch.length} ids)`,
        retryDelayMs
      );
    } catch (err) {
      stats.features.errors += batch.length;
      done += batch.length;
      log(`[enrich] track lookup failed after retries: ${errorMessage(err)}`);
      continue;
    }

    for (const trackId of batch) {
      done++;
      onProgress?.("features", done, eligible.length);

      const reccobeatsId = resolved.get(trackId);
      if (reccobeatsId === undefined) {
        cache.setFeaturesNotFound(trackId, null);
        stats.features.notFound++;
        continue;
      }
      stats.features.resolved++;

      try {
        const features = await withRetry(
          () => featureSource.getAudioFeatures(reccobeatsId),
          `features ${trackId}`,
          retryDelayMs
        );
        if (features === null) {
          cache.setFeaturesNotFound(trackId, reccobeatsId);
          stats.features.notFound++;
          continue;
        }
        const data: CachedFeatures = { reccobeatsId, features };
        cache.setFeatures(trackId, data);
        featureMap.set(trackId, data);
        stats.features.found++;
      } catch (err) {
        stats.features.errors++;
        log(`[enrich] features failed for ${trackId}: ${errorMessage(err)}`);
      }
    }
  }

  return featureMap;
}

/**
 * Attach artist genres and audio features to library tracks.
 * Cache-first; each external source is optional, in which case only
 * cached data is applied.
 */
export async function enrichTracks(
  tracks: LibraryTrack[],
  options: EnrichmentOptions
): Promise<{ tracks: LibraryTrack[]; stats: EnrichmentStats }> {
  const stats = emptyStats(tracks.length);

  // Step 1: artist genres
  const genreMap = await resolveGenres(tracks, options, stats);

  // Step 2: audio features
  const featureMap = await resolveFeatures(tracks, options, stats);

  // Step 3: apply to tracks (input objects are left untouched)
  const enriched = tracks.map((track): LibraryTrack => {
    const artists = track.artists.map((artist) => {
      const genres = artist.id !== null ? genreMap.get(artist.id) : undefined;
      return genres !== undefined ? { ...artist, genres } : artist;
    });

    const features = track.id !== null ? featureMap.get(track.id) : undefined;
    if (features === undefined) {
      return { ...track, artists };
    }
    return {
      ...track,
      artists,
      reccobeats_id: features.reccobeatsId,
      audio_features: features.features,
    };
  });

  return { tracks: enriched, stats };
}

export function formatEnrichmentStats(stats: EnrichmentStats): string {
  const lines = [
    `Enriched ${stats.tracks} tracks (${stats.uniqueArtists} unique artists)`,
    `  Genres: ${stats.genres.cacheHits} cached, ${stats.genres.cacheMisses} missed, ` +
      `${stats.genres.apiCalls} API calls, ${stats.genres.notFound} not found, ` +
      `${stats.genres.errors} errors`,
    `  Features: ${stats.features.eligible} eligible, ${stats.features.cacheHits} cached, ` +
      `${stats.features.lookups} lookups, ${stats.features.resolved} resolved, ` +
      `${stats.features.found} found, ${stats.features.notFound} not found, ` +
      `${stats.features.errors} errors`,
  ];
  return lines.join("\n");
}
