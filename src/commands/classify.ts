import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { readJsonInput } from "../lib/input";
import { enrichedTracksPath } from "../lib/paths";
import { PLAYLIST_ORDER, organizeTracks, type OrganizeResult } from "../pipeline/organize";
import { extractTracks, formatArtists } from "../pipeline/tracks";
import type { LibraryTrack } from "../services/types";

type ClassifyOptions = {
  format?: string;
};

type ClassifyFormat = "json" | "text" | "summary";

export function normalizeFormat(value: string | undefined): ClassifyFormat {
  const normalized = (value ?? "summary").toLowerCase();
  if (normalized === "json" || normalized === "text" || normalized === "summary") {
    return normalized;
  }
  throw new Error("Unsupported format. Use json, text, or summary.");
}

export function formatClassifyJson(result: OrganizeResult): string {
  const buckets: Record<string, LibraryTrack[]> = {};
  let count = 0;
  for (const playlist of PLAYLIST_ORDER) {
    const tracks = result.buckets[playlist].map((entry) => entry.track);
    buckets[playlist] = tracks;
    count += tracks.length;
  }
  return JSON.stringify({ count, buckets }, null, 2);
}

export function formatClassifyText(result: OrganizeResult): string {
  const lines: string[] = [];
  for (const playlist of PLAYLIST_ORDER) {
    for (const { track } of result.buckets[playlist]) {
      lines.push(`${playlist}\t${formatArtists(track)} - ${track.name}`);
    }
  }
  return lines.join("\n");
}

export function formatClassifySummary(result: OrganizeResult): string {
  const lines: string[] = [];
  let total = 0;
  for (const playlist of PLAYLIST_ORDER) {
    const count = result.buckets[playlist].length;
    total += count;
    lines.push(`${playlist.padEnd(24)} ${count}`);
  }
  lines.push("");
  lines.push(
    `${total} tracks: ${result.paths.features} by audio features, ` +
      `${result.paths.genres} by genre, ${result.paths.none} with neither`
  );
  if (result.skipped.length > 0) {
    lines.push(`${result.skipped.length} tracks have no Spotify id and cannot be added`);
  }
  return lines.join("\n");
}

export async function runClassify(
  inputPath: string | undefined,
  options: ClassifyOptions
): Promise<void> {
  const format = normalizeFormat(options.format);
  const config = loadConfig();
  const payload = await readJsonInput(inputPath, enrichedTracksPath(config.data.dir));
  const result = organizeTracks(extractTracks(payload));

  if (format === "json") {
    console.log(formatClassifyJson(result));
  } else if (format === "text") {
    console.log(formatClassifyText(result));
  } else {
    console.log(formatClassifySummary(result));
  }
}

export function registerClassifyCommand(program: Command): void {
  program
    .command("classify")
    .description("Sort enriched tracks into mood playlists (no changes on Spotify)")
    .argument("[input]", "Enriched tracks JSON file (or stdin)")
    .option("--format <format>", "Output format (summary|text|json)", "summary")
    .action(async (input: string | undefined, options: ClassifyOptions) => {
      await runClassify(input, options);
    });
}
