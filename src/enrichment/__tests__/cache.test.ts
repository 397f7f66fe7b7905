import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createEnrichmentCache, type EnrichmentCache } from "../cache";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("EnrichmentCache", () => {
  let db: Database.Database;
  let cache: EnrichmentCache;

  beforeEach(() => {
    db = new Database(":memory:");
    cache = createEnrichmentCache(db);
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  it("returns null for artists never looked up", () => {
    expect(cache.getArtistGenres("a1")).toBeNull();
  });

  it("stores artist genres", () => {
    cache.setArtistGenres("a1", "Artist", ["folk", "indie folk"]);
    expect(cache.getArtistGenres("a1")).toEqual(["folk", "indie folk"]);
  });

  it("remembers artists that were not found", () => {
    cache.setArtistNotFound("a1");
    expect(cache.getArtistGenres("a1")).toBe("not_found");
  });

  it("overwrites a not-found entry once genres arrive", () => {
    cache.setArtistNotFound("a1");
    cache.setArtistGenres("a1", "Artist", ["rock"]);
    expect(cache.getArtistGenres("a1")).toEqual(["rock"]);
  });

  it("expires found entries after 30 days", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
    cache.setArtistGenres("a1", "Artist", ["rock"]);

    vi.setSystemTime(new Date(Date.parse("2024-01-01T00:00:00Z") + 29 * DAY_MS));
    expect(cache.getArtistGenres("a1")).toEqual(["rock"]);

    vi.setSystemTime(new Date(Date.parse("2024-01-01T00:00:00Z") + 31 * DAY_MS));
    expect(cache.getArtistGenres("a1")).toBeNull();
  });

  it("expires not-found entries after 7 days", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
    cache.setFeaturesNotFound("t1", null);

    vi.setSystemTime(new Date(Date.parse("2024-01-01T00:00:00Z") + 6 * DAY_MS));
    expect(cache.getFeatures("t1")).toBe("not_found");

    vi.setSystemTime(new Date(Date.parse("2024-01-01T00:00:00Z") + 8 * DAY_MS));
    expect(cache.getFeatures("t1")).toBeNull();
  });

  it("stores audio features with their ReccoBeats id", () => {
    cache.setFeatures("t1", { reccobeatsId: "rb-1", features: { valence: 0.3, tempo: 120 } });
    expect(cache.getFeatures("t1")).toEqual({
      reccobeatsId: "rb-1",
      features: { valence: 0.3, tempo: 120 },
    });
  });

  it("counts and clears entries", () => {
    cache.setArtistGenres("a1", "One", ["rock"]);
    cache.setArtistNotFound("a2");
    cache.setFeatures("t1", { reccobeatsId: "rb-1", features: { energy: 0.5 } });

    expect(cache.stats()).toEqual({
      artists: { total: 2, found: 1, notFound: 1 },
      features: { total: 1, found: 1, notFound: 0 },
    });
    expect(cache.clear()).toEqual({ artists: 2, features: 1 });
    expect(cache.stats()).toEqual({
      artists: { total: 0, found: 0, notFound: 0 },
      features: { total: 0, found: 0, notFound: 0 },
    });
  });
});
