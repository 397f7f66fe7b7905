import type Database from "better-sqlite3";
import type { AudioFeatures } from "../services/types";

/**
 * TTL constants for cache entries.
 */
export const CACHE_TTL = {
  /** Successful lookups: 30 days */
  FOUND_DAYS: 30,
  /** "Not found" lookups: 7 days (the analysis service adds tracks over time) */
  NOT_FOUND_DAYS: 7,
};

// --- Schema ---

export const enrichmentSchemaStatements = [
  `
CREATE TABLE IF NOT EXISTS artist_genres (
  artist_id TEXT PRIMARY KEY,
  artist_name TEXT,
  genres_json TEXT,
  found INTEGER NOT NULL DEFAULT 1,
  fetched_at TEXT NOT NULL
);
  `,
  // Audio features: keyed by Spotify track id, ReccoBeats id kept for reference
  `
CREATE TABLE IF NOT EXISTS track_features (
  track_id TEXT PRIMARY KEY,
  reccobeats_id TEXT,
  features_json TEXT,
  found INTEGER NOT NULL DEFAULT 1,
  fetched_at TEXT NOT NULL
);
  `,
  `CREATE INDEX IF NOT EXISTS idx_track_features_reccobeats
   ON track_features(reccobeats_id);`,
];

// --- Types ---

export type CachedFeatures = {
  reccobeatsId: string;
  features: AudioFeatures;
};

export type CacheTableStats = { total: number; found: number; notFound: number };

// --- Cache Operations ---

export type EnrichmentCache = {
  getArtistGenres(artistId: string): string[] | "not_found" | null;
  setArtistGenres(artistId: string, name: string, genres: string[]): void;
  setArtistNotFound(artistId: string): void;

  getFeatures(trackId: string): CachedFeatures | "not_found" | null;
  setFeatures(trackId: string, data: CachedFeatures): void;
  setFeaturesNotFound(trackId: string, reccobeatsId: string | null): void;

  stats(): { artists: CacheTableStats; features: CacheTableStats };
  clear(): { artists: number; features: number };
};

type ArtistRow = {
  genres_json: string | null;
  found: number;
  fetched_at: string;
};

type FeatureRow = {
  reccobeats_id: string | null;
  features_json: string | null;
  found: number;
  fetched_at: string;
};

type StatsRow = { total: number; found: number; not_found: number };

function parseStringArray(json: string | null): string[] {
  const parsed: unknown = JSON.parse(json ?? "[]");
  return Array.isArray(parsed)
    ? parsed.filter((item): item is string => typeof item === "string")
    : [];
}

function parseFeatureMap(json: string | null): AudioFeatures {
  const parsed: unknown = JSON.parse(json ?? "{}");
  const features: AudioFeatures = {};
  if (typeof parsed === "object" && parsed !== null) {
    for (const [name, value] of Object.entries(parsed)) {
      if (typeof value === "number") features[name] = value;
    }
  }
  return features;
}

export function createEnrichmentCache(db: Database.Database): EnrichmentCache {
  // Apply schema
  for (const stmt of enrichmentSchemaStatements) {
    db.exec(stmt);
  }

  // --- Artist genre (Spotify) prepared statements ---

  const getArtistStmt = db.prepare<[string], ArtistRow>(
    `SELECT genres_json, found, fetched_at
     FROM artist_genres WHERE artist_id = ?`
  );

  const upsertArtistStmt = db.prepare(
    `INSERT INTO artist_genres (artist_id, artist_name, genres_json, found, fetched_at)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(artist_id) DO UPDATE SET
       artist_name = COALESCE(excluded.artist_name, artist_genres.artist_name),
       genres_json = excluded.genres_json,
       found = excluded.found,
       fetched_at = excluded.fetched_at`
  );

  // --- Audio feature (ReccoBeats) prepared statements ---

  const getFeaturesStmt = db.prepare<[string], FeatureRow>(
    `SELECT reccobeats_id, features_json, found, fetched_at
     FROM track_features WHERE track_id = ?`
  );

  const upsertFeaturesStmt = db.prepare(
    `INSERT INTO track_features (track_id, reccobeats_id, features_json, found, fetched_at)
     VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(track_id) DO UPDATE SET
       reccobeats_id = excluded.reccobeats_id,
       features_json = excluded.features_json,
       found = excluded.found,
       fetched_at = excluded.fetched_at`
  );

  function isExpired(fetchedAt: string, found: boolean): boolean {
    const ttlDays = found ? CACHE_TTL.FOUND_DAYS : CACHE_TTL.NOT_FOUND_DAYS;
    const fetchedMs = new Date(fetchedAt).getTime();
    const ttlMs = ttlDays * 24 * 60 * 60 * 1000;
    return Date.now() - fetchedMs > ttlMs;
  }

  function tableStats(table: "artist_genres" | "track_features"): CacheTableStats {
    const row = db
      .prepare<[], StatsRow>(
        `SELECT
           COUNT(*) as total,
           COALESCE(SUM(CASE WHEN found = 1 THEN 1 ELSE 0 END), 0) as found,
           COALESCE(SUM(CASE WHEN found = 0 THEN 1 ELSE 0 END), 0) as not_found
         FROM ${table}`
      )
      .get();
    return {
      total: row?.total ?? 0,
      found: row?.found ?? 0,
      notFound: row?.not_found ?? 0,
    };
  }

  return {
    getArtistGenres(artistId: string): string[] | "not_found" | null {
      const row = getArtistStmt.get(artistId);

      if (!row) return null; // No cache entry at all

      if (isExpired(row.fetched_at, row.found === 1)) {
        return null; // Expired, treat as cache miss
      }

      if (row.found === 0) return "not_found";

      return parseStringArray(row.genres_json);
    },

    setArtistGenres(artistId: string, name: string, genres: string[]): void {
      upsertArtistStmt.run(
        artistId,
        name,
        JSON.stringify(genres),
        1,
        new Date().toISOString()
      );
    },

    setArtistNotFound(artistId: string): void {
      upsertArtistStmt.run(artistId, null, null, 0, new Date().toISOString());
    },

    // --- Feature cache ---

    getFeatures(trackId: string): CachedFeatures | "not_found" | null {
      const row = getFeaturesStmt.get(trackId);

      if (!row) return null;

      if (isExpired(row.fetched_at, row.found === 1)) {
        return null; // Expired
      }

      if (row.found === 0 || row.reccobeats_id === null) return "not_found";

      return {
        reccobeatsId: row.reccobeats_id,
        features: parseFeatureMap(row.features_json),
      };
    },

    setFeatures(trackId: string, data: CachedFeatures): void {
      upsertFeaturesStmt.run(
        trackId,
        data.reccobeatsId,
        JSON.stringify(data.features),
        1,
        new Date().toISOString()
      );
    },

    setFeaturesNotFound(trackId: string, reccobeatsId: string | null): void {
      upsertFeaturesStmt.run(trackId, reccobeatsId, null, 0, new Date().toISOString());
    },

    // --- Stats ---

    stats(): { artists: CacheTableStats; features: CacheTableStats } {
      return {
        artists: tableStats("artist_genres"),
        features: tableStats("track_features"),
      };
    },

    clear(): { artists: number; features: number } {
      const clearAll = db.transaction(() => ({
        artists: db.prepare("DELETE FROM artist_genres").run().changes,
        features: db.prepare("DELETE FROM track_features").run().changes,
      }));
      return clearAll();
    },
  };
}
