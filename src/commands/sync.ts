import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { log } from "../lib/logger";
import { likedSongsPath } from "../lib/paths";
import { writeTrackFile } from "../pipeline/store";
import type { SpotifyClient } from "../services/spotify";
import type { LibraryTrack } from "../services/types";
import { createSpotifyClient } from "./spotify";

type SyncOptions = {
  output?: string;
  dryRun?: boolean;
};

export function formatSyncSummary(tracks: LibraryTrack[]): string {
  const local = tracks.filter((t) => t.id === null).length;
  const artists = new Set(
    tracks.flatMap((t) => t.artists.map((a) => a.id ?? a.name))
  ).size;
  const lines = [`  OK Liked songs: ${tracks.length} tracks, ${artists} artists`];
  if (local > 0) {
    lines.push(`  !! ${local} local files without a Spotify id`);
  }
  return lines.join("\n");
}

export async function fetchLibrary(client: SpotifyClient): Promise<LibraryTrack[]> {
  return client.getAllSavedTracks((fetched, total) => {
    log(`[sync] fetched ${fetched}/${total} liked songs`);
  });
}

export async function runSync(options: SyncOptions): Promise<void> {
  const config = loadConfig();
  const client = await createSpotifyClient(config);

  const output: string[] = [];
  output.push("Syncing liked songs from Spotify...");

  const tracks = await fetchLibrary(client);
  output.push(formatSyncSummary(tracks));

  if (options.dryRun) {
    output.push("Dry run: no data written.");
    console.log(output.join("\n"));
    return;
  }

  const filePath = options.output ?? likedSongsPath(config.data.dir);
  writeTrackFile(filePath, tracks);
  output.push(`Sync complete. Saved ${tracks.length} tracks to ${filePath}`);
  console.log(output.join("\n"));
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync")
    .description("Fetch your liked songs from Spotify")
    .option("--output <file>", "Where to write the liked-songs JSON")
    .option("--dry-run", "Fetch and summarize without writing")
    .action(async (options: SyncOptions) => {
      await runSync(options);
    });
}
