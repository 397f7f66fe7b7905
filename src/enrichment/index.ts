export { createEnrichmentCache, CACHE_TTL } from "./cache";
export type { EnrichmentCache, CachedFeatures, CacheTableStats } from "./cache";
export { enrichTracks, formatEnrichmentStats } from "./orchestrator";
export type {
  ArtistGenreSource,
  AudioFeatureSource,
  EnrichmentOptions,
  EnrichmentStats,
} from "./orchestrator";
