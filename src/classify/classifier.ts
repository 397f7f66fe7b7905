import {
  OTHER,
  RULE_TABLE,
  type BucketName,
  type FeatureCondition,
  type FeatureValues,
  type PlaylistName,
  type RuleBucket,
  type RuleTable,
} from "./rules";

export type ArtistGenres = {
  genres?: readonly string[] | null | undefined;
};

export type TrackRecord = {
  id: string | null;
  features?: FeatureValues | null | undefined;
  artists: readonly ArtistGenres[];
};

export type ClassificationPath = "features" | "genres" | "none";

export type Classification = {
  playlist: PlaylistName;
  path: ClassificationPath;
};

/**
 * Reads one measurement. An absent (or null) feature reads as 0.
 *
 * FIXME: zero is a poor stand-in for "unknown": a track with only valence
 * passes every low upper bound (energy <= 0.5, tempo <= 110). Changing it
 * reshuffles existing playlists, so it waits on a product decision.
 */
export function featureValue(features: FeatureValues, condition: FeatureCondition): number {
  const value = features[condition.feature];
  return typeof value === "number" ? value : 0;
}

export function conditionPasses(condition: FeatureCondition, features: FeatureValues): boolean {
  const value = featureValue(features, condition);
  switch (condition.kind) {
    case "at_most":
      return value <= condition.threshold;
    case "at_least":
      return value >= condition.threshold;
    case "in_range":
      return condition.low <= value && value <= condition.high;
  }
}

/**
 * How far a value sits outside a condition's bound; 0 when it passes.
 * NaN compares false everywhere, so it fails the condition and adds nothing.
 */
export function conditionDeviation(condition: FeatureCondition, features: FeatureValues): number {
  const value = featureValue(features, condition);
  switch (condition.kind) {
    case "at_most":
      return value > condition.threshold ? value - condition.threshold : 0;
    case "at_least":
      return value < condition.threshold ? condition.threshold - value : 0;
    case "in_range":
      if (value < condition.low) return condition.low - value;
      if (value > condition.high) return value - condition.high;
      return 0;
  }
}

export function countPassing<N extends string>(
  bucket: RuleBucket<N>,
  features: FeatureValues
): number {
  return bucket.conditions.filter((c) => conditionPasses(c, features)).length;
}

export function totalDeviation<N extends string>(
  bucket: RuleBucket<N>,
  features: FeatureValues
): number {
  return bucket.conditions.reduce((sum, c) => sum + conditionDeviation(c, features), 0);
}

/**
 * Picks a bucket from audio features:
 *   1. the first bucket (table order) whose conditions all pass;
 *   2. otherwise the bucket passing the most conditions;
 *   3. ties go to the smallest total deviation, then to table order.
 * Always returns one of the table's buckets, never "Other".
 */
export function classifyByFeatures(features: FeatureValues): BucketName;
export function classifyByFeatures<N extends string>(
  features: FeatureValues,
  table: RuleTable<N>
): N;
export function classifyByFeatures(
  features: FeatureValues,
  table: RuleTable<string> = RULE_TABLE
): string {
  for (const bucket of table) {
    if (bucket.conditions.every((c) => conditionPasses(c, features))) {
      return bucket.name;
    }
  }

  let maxPassing = -1;
  let leaders: RuleBucket<string>[] = [];
  for (const bucket of table) {
    const passing = countPassing(bucket, features);
    if (passing > maxPassing) {
      maxPassing = passing;
      leaders = [bucket];
    } else if (passing === maxPassing) {
      leaders.push(bucket);
    }
  }

  const [first] = table;
  let best = leaders[0] ?? first;
  if (leaders.length === 1) {
    return best.name;
  }

  let minDeviation = Number.POSITIVE_INFINITY;
  for (const bucket of leaders) {
    const deviation = totalDeviation(bucket, features);
    // Strict comparison keeps the earlier bucket on equal totals.
    if (deviation < minDeviation) {
      minDeviation = deviation;
      best = bucket;
    }
  }
  return best.name;
}

export function collectGenres(artists: readonly ArtistGenres[]): Set<string> {
  const genres = new Set<string>();
  for (const artist of artists) {
    for (const genre of artist.genres ?? []) {
      genres.add(genre.toLowerCase());
    }
  }
  return genres;
}

/**
 * Genre fallback for tracks without audio features: the first bucket in
 * priority order sharing any genre with the track, else "Other".
 */
export function classifyByGenres(genres: Iterable<string>): PlaylistName;
export function classifyByGenres<N extends string>(
  genres: Iterable<string>,
  table: RuleTable<N>
): N | typeof OTHER;
export function classifyByGenres(
  genres: Iterable<string>,
  table: RuleTable<string> = RULE_TABLE
): string {
  const tags = new Set<string>();
  for (const genre of genres) {
    tags.add(genre.toLowerCase());
  }
  for (const bucket of table) {
    for (const tag of tags) {
      if (bucket.genres.has(tag)) {
        return bucket.name;
      }
    }
  }
  return OTHER;
}

export function hasFeatures(
  features: FeatureValues | null | undefined
): features is FeatureValues {
  return features !== null && features !== undefined && Object.keys(features).length > 0;
}

export function classifyTrack(track: TrackRecord): Classification {
  if (hasFeatures(track.features)) {
    return { playlist: classifyByFeatures(track.features), path: "features" };
  }
  const genres = collectGenres(track.artists);
  if (genres.size === 0) {
    return { playlist: OTHER, path: "none" };
  }
  return { playlist: classifyByGenres(genres), path: "genres" };
}
