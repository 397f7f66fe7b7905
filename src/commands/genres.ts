import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { readJsonInput } from "../lib/input";
import { enrichedTracksPath } from "../lib/paths";
import { buildGenreReport, formatGenreReport } from "../pipeline/report";
import { extractTracks } from "../pipeline/tracks";

type GenresOptions = {
  format?: string;
  limit?: number;
};

export async function runGenres(
  inputPath: string | undefined,
  options: GenresOptions
): Promise<void> {
  const format = (options.format ?? "text").toLowerCase();
  if (format !== "text" && format !== "json") {
    throw new Error("Unsupported format. Use text or json.");
  }
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
    throw new Error("--limit must be a positive integer.");
  }

  const config = loadConfig();
  const payload = await readJsonInput(inputPath, enrichedTracksPath(config.data.dir));
  const report = buildGenreReport(extractTracks(payload));

  if (report.uniqueGenres === 0) {
    console.log("No genres found. Run `moodsort enrich` first.");
    return;
  }

  if (format === "json") {
    const genres =
      options.limit !== undefined ? report.genres.slice(0, options.limit) : report.genres;
    console.log(JSON.stringify({ ...report, genres }, null, 2));
  } else {
    console.log(formatGenreReport(report, options.limit));
  }
}

export function registerGenresCommand(program: Command): void {
  program
    .command("genres")
    .description("Show how often each genre appears in your library")
    .argument("[input]", "Enriched tracks JSON file (or stdin)")
    .option("--format <format>", "Output format (text|json)", "text")
    .option("--limit <count>", "Only show the top genres", (v) => Number.parseInt(v, 10))
    .action(async (input: string | undefined, options: GenresOptions) => {
      await runGenres(input, options);
    });
}
