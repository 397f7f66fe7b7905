import { Command } from "commander";
import { openDatabase } from "../db";
import { createEnrichmentCache, enrichTracks, formatEnrichmentStats } from "../enrichment";
import type { EnrichmentStats } from "../enrichment";
import { loadConfig } from "../lib/config";
import { readJsonInput } from "../lib/input";
import { log } from "../lib/logger";
import { enrichedTracksPath, likedSongsPath } from "../lib/paths";
import { createReccoBeatsClient } from "../providers/reccobeats";
import { writeTrackFile } from "../pipeline/store";
import { extractTracks } from "../pipeline/tracks";
import { createSpotifyClient } from "./spotify";

type EnrichOptions = {
  output?: string;
  genres: boolean;
  features: boolean;
};

export function enrichmentCounts(stats: EnrichmentStats, tracks: number, withFeatures: number) {
  return {
    tracks_with_features: withFeatures,
    tracks_without_features: tracks - withFeatures,
    artists: stats.uniqueArtists,
    feature_errors: stats.features.errors,
  };
}

export async function runEnrich(
  inputPath: string | undefined,
  options: EnrichOptions
): Promise<void> {
  const config = loadConfig();
  const payload = await readJsonInput(inputPath, likedSongsPath(config.data.dir));
  const tracks = extractTracks(payload);
  if (tracks.length === 0) {
    throw new Error("No tracks found in input.");
  }

  const artistSource = options.genres ? await createSpotifyClient(config) : undefined;
  const featureSource = options.features
    ? createReccoBeatsClient({
        baseUrl: config.reccobeats.base_url,
        rateLimitMs: config.reccobeats.rate_limit_ms,
      })
    : undefined;

  const db = openDatabase(config.database.path);
  try {
    const cache = createEnrichmentCache(db);
    let lastStage = "";
    const result = await enrichTracks(tracks, {
      cache,
      artistSource,
      featureSource,
      onProgress: (stage, done, total) => {
        if (stage !== lastStage || done === total || done % 25 === 0) {
          log(`[enrich] ${stage}: ${done}/${total}`);
          lastStage = stage;
        }
      },
    });

    const withFeatures = result.tracks.filter((t) => t.audio_features !== undefined).length;
    const filePath = options.output ?? enrichedTracksPath(config.data.dir);
    writeTrackFile(
      filePath,
      result.tracks,
      enrichmentCounts(result.stats, result.tracks.length, withFeatures)
    );

    console.log(formatEnrichmentStats(result.stats));
    console.log(`Saved ${result.tracks.length} tracks to ${filePath}`);
  } finally {
    db.close();
  }
}

export function registerEnrichCommand(program: Command): void {
  program
    .command("enrich")
    .description("Add artist genres and audio features to liked songs")
    .argument("[input]", "Liked-songs JSON file (or stdin)")
    .option("--output <file>", "Where to write the enriched tracks JSON")
    .option("--no-genres", "Skip Spotify artist genre lookups (cached genres still apply)")
    .option("--no-features", "Skip ReccoBeats lookups (cached features still apply)")
    .action(async (input: string | undefined, options: EnrichOptions) => {
      await runEnrich(input, options);
    });
}
