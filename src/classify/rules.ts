import genreSets from "./genres.json";

export const FEATURE_NAMES = [
  "valence",
  "energy",
  "danceability",
  "acousticness",
  "tempo",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

/**
 * Audio-feature measurements for one track. valence, energy, danceability
 * and acousticness are in [0, 1]; tempo is in BPM. Any of them may be absent.
 */
export type FeatureValues = Readonly<Partial<Record<FeatureName, number | null>>>;

export type FeatureCondition =
  | { kind: "at_most"; feature: FeatureName; threshold: number }
  | { kind: "at_least"; feature: FeatureName; threshold: number }
  | { kind: "in_range"; feature: FeatureName; low: number; high: number };

export const BUCKET_NAMES = [
  "Chill Vibes",
  "Sad & Moody",
  "Feel-Good",
  "Party Mode",
  "Training & High Energy",
  "Driving Mix",
] as const;

export type BucketName = (typeof BUCKET_NAMES)[number];

export const OTHER = "Other";

export type PlaylistName = BucketName | typeof OTHER;

export type RuleBucket<N extends string = BucketName> = {
  readonly name: N;
  readonly description: string;
  readonly conditions: readonly FeatureCondition[];
  readonly genres: ReadonlySet<string>;
};

/** Rule tables are never empty, so classification always has an answer. */
export type RuleTable<N extends string = BucketName> = readonly [
  RuleBucket<N>,
  ...RuleBucket<N>[],
];

export function atMost(feature: FeatureName, threshold: number): FeatureCondition {
  return { kind: "at_most", feature, threshold };
}

export function atLeast(feature: FeatureName, threshold: number): FeatureCondition {
  return { kind: "at_least", feature, threshold };
}

export function inRange(feature: FeatureName, low: number, high: number): FeatureCondition {
  return { kind: "in_range", feature, low, high };
}

export const PLAYLIST_DESCRIPTIONS: Readonly<Record<PlaylistName, string>> = {
  "Chill Vibes":
    "Soft, mellow, and relaxing tracks. Ideal for winding down or background ambiance.",
  "Feel-Good": "Happy, upbeat, and energizing songs that lift your mood.",
  "Sad & Moody":
    "Emotional, introspective, or melancholic songs. For reflective moments or sad vibes.",
  "Party Mode": "High-energy, danceable tracks. Perfect for getting the party started.",
  "Training & High Energy":
    "Fast-paced, energetic tracks to keep you moving during runs or cardio sessions.",
  "Driving Mix":
    "Songs with a balanced, rhythmic feel, great for road trips or long drives.",
  Other: "A catch-all playlist for songs that don't have audio features or genre information.",
};

const GENRES_BY_BUCKET: Readonly<Record<BucketName, readonly string[]>> = genreSets;

const CONDITIONS_BY_BUCKET: Readonly<Record<BucketName, readonly FeatureCondition[]>> = {
  "Chill Vibes": [
    atMost("valence", 0.5),
    atMost("energy", 0.5),
    atLeast("acousticness", 0.3),
    atMost("tempo", 110),
    atMost("danceability", 0.7),
  ],
  "Sad & Moody": [
    atMost("valence", 0.4),
    atMost("energy", 0.6),
    atLeast("acousticness", 0.2),
    atMost("tempo", 120),
  ],
  "Feel-Good": [
    atLeast("valence", 0.6),
    atLeast("energy", 0.5),
    atLeast("danceability", 0.5),
    inRange("tempo", 85, 140),
    atMost("acousticness", 0.5),
  ],
  "Party Mode": [
    atLeast("energy", 0.6),
    atLeast("danceability", 0.7),
    atLeast("valence", 0.5),
    atLeast("tempo", 100),
    atMost("acousticness", 0.4),
  ],
  "Training & High Energy": [
    atLeast("energy", 0.75),
    atLeast("tempo", 120),
    atLeast("danceability", 0.5),
    atMost("acousticness", 0.3),
  ],
  "Driving Mix": [
    inRange("tempo", 90, 150),
    inRange("energy", 0.5, 0.9),
    atLeast("danceability", 0.5),
    atMost("acousticness", 0.5),
  ],
};

function buildBucket(name: BucketName): RuleBucket {
  return Object.freeze({
    name,
    description: PLAYLIST_DESCRIPTIONS[name],
    conditions: Object.freeze(CONDITIONS_BY_BUCKET[name].map((c) => Object.freeze({ ...c }))),
    genres: new Set(GENRES_BY_BUCKET[name].map((g) => g.toLowerCase())),
  });
}

/**
 * Order matters twice: it is the full-match search order and the
 * genre-priority order.
 */
export const RULE_TABLE: RuleTable = Object.freeze([
  buildBucket("Chill Vibes"),
  buildBucket("Sad & Moody"),
  buildBucket("Feel-Good"),
  buildBucket("Party Mode"),
  buildBucket("Training & High Energy"),
  buildBucket("Driving Mix"),
] as const);

export function isBucketName(value: string): value is BucketName {
  return BUCKET_NAMES.some((name) => name === value);
}

export function isPlaylistName(value: string): value is PlaylistName {
  return value === OTHER || isBucketName(value);
}
