import { Command } from "commander";
import { loadConfig, type MoodsortConfig } from "../lib/config";
import { readJsonInput } from "../lib/input";
import { enrichedTracksPath } from "../lib/paths";
import {
  DryRunPlaylistSink,
  SpotifyPlaylistSink,
  materializePlaylists,
  organizeTracks,
  type MaterializeResult,
  type OrganizedTrack,
  type PlaylistSink,
} from "../pipeline/organize";
import { extractTracks, formatArtists } from "../pipeline/tracks";
import { createSpotifyClient } from "./spotify";

type CreateOptions = {
  dryRun?: boolean;
  public?: boolean;
  prefix?: string;
};

export function formatCreateResults(
  results: MaterializeResult[],
  skipped: OrganizedTrack[],
  dryRun: boolean
): string {
  const lines: string[] = [];
  if (results.length === 0) {
    lines.push("No playlists to create.");
  }
  for (const result of results) {
    if (result.error !== null) {
      lines.push(`  !! ${result.name}: ${result.error}`);
    } else if (dryRun) {
      lines.push(`  -- ${result.name}: would add ${result.added} tracks`);
    } else {
      lines.push(`  OK ${result.name}: ${result.added} tracks (${result.playlistId ?? "?"})`);
    }
  }
  if (skipped.length > 0) {
    lines.push("");
    lines.push(`Skipped ${skipped.length} tracks without a Spotify id:`);
    for (const { track } of skipped) {
      lines.push(`  ${formatArtists(track)} - ${track.name}`);
    }
  }
  return lines.join("\n");
}

async function buildSink(config: MoodsortConfig, options: CreateOptions): Promise<PlaylistSink> {
  if (options.dryRun) {
    return new DryRunPlaylistSink();
  }
  const client = await createSpotifyClient(config);
  const user = await client.getCurrentUser();
  return new SpotifyPlaylistSink(client, user.id, options.public ?? false);
}

export async function runCreate(
  inputPath: string | undefined,
  options: CreateOptions
): Promise<void> {
  const config = loadConfig();
  const payload = await readJsonInput(inputPath, enrichedTracksPath(config.data.dir));
  const organized = organizeTracks(extractTracks(payload));

  const sink = await buildSink(config, options);
  const results = await materializePlaylists(organized, sink, { prefix: options.prefix });

  console.log(formatCreateResults(results, organized.skipped, sink.dryRun));

  const failed = results.filter((r) => r.error !== null).length;
  if (failed > 0) {
    throw new Error(`${failed} of ${results.length} playlists failed.`);
  }
}

export function registerCreateCommand(program: Command): void {
  program
    .command("create")
    .description("Create one Spotify playlist per mood bucket")
    .argument("[input]", "Enriched tracks JSON file (or stdin)")
    .option("--dry-run", "Show what would be created without touching Spotify")
    .option("--public", "Make the playlists public")
    .option("--prefix <prefix>", "Prefix for playlist names", "")
    .action(async (input: string | undefined, options: CreateOptions) => {
      await runCreate(input, options);
    });
}
