import type { LibraryTrack } from "../services/types";

export type GenreCount = {
  genre: string;
  count: number;
  percentage: number;
};

export type GenreReport = {
  genres: GenreCount[];
  uniqueGenres: number;
  totalOccurrences: number;
};

/**
 * Counts every genre occurrence across all artists of all tracks, most
 * frequent first (ties by name). Percentages are of total occurrences,
 * rounded to one decimal.
 */
export function buildGenreReport(tracks: LibraryTrack[]): GenreReport {
  const counts = new Map<string, number>();
  for (const track of tracks) {
    for (const artist of track.artists) {
      for (const genre of artist.genres ?? []) {
        counts.set(genre, (counts.get(genre) ?? 0) + 1);
      }
    }
  }

  let totalOccurrences = 0;
  for (const count of counts.values()) totalOccurrences += count;

  const genres = [...counts.entries()]
    .sort((a, b) => (a[1] !== b[1] ? b[1] - a[1] : a[0].localeCompare(b[0])))
    .map(([genre, count]) => ({
      genre,
      count,
      percentage: Math.round((count / totalOccurrences) * 1000) / 10,
    }));

  return { genres, uniqueGenres: genres.length, totalOccurrences };
}

export function formatGenreReport(report: GenreReport, limit?: number): string {
  const shown = limit !== undefined ? report.genres.slice(0, limit) : report.genres;
  const rule = "-".repeat(50);
  const lines = [
    "Genre Statistics:",
    rule,
    `${"Genre".padEnd(30)} ${"Count".padEnd(10)} Percentage`,
    rule,
    ...shown.map(
      (g) => `${g.genre.padEnd(30)} ${String(g.count).padEnd(10)} ${g.percentage.toFixed(1)}%`
    ),
    "",
    "Summary:",
    `Total unique genres: ${report.uniqueGenres}`,
    `Total genre occurrences: ${report.totalOccurrences}`,
  ];
  return lines.join("\n");
}
