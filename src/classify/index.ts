export {
  BUCKET_NAMES,
  FEATURE_NAMES,
  OTHER,
  PLAYLIST_DESCRIPTIONS,
  RULE_TABLE,
  atLeast,
  atMost,
  inRange,
  isBucketName,
  isPlaylistName,
} from "./rules";
export type {
  BucketName,
  FeatureCondition,
  FeatureName,
  FeatureValues,
  PlaylistName,
  RuleBucket,
  RuleTable,
} from "./rules";
export {
  classifyByFeatures,
  classifyByGenres,
  classifyTrack,
  collectGenres,
  conditionDeviation,
  conditionPasses,
  countPassing,
  hasFeatures,
  totalDeviation,
} from "./classifier";
export type {
  ArtistGenres,
  Classification,
  ClassificationPath,
  TrackRecord,
} from "./classifier";
