import { describe, expect, it } from "vitest";
import { buildGenreReport, formatGenreReport } from "../report";
import type { LibraryTrack } from "../../services/types";

function track(genreLists: string[][]): LibraryTrack {
  return {
    id: "t",
    name: "Song",
    artists: genreLists.map((genres, i) => ({ id: `a${i}`, name: `A${i}`, genres })),
    album: null,
    duration_ms: null,
    popularity: null,
    added_at: null,
  };
}

describe("buildGenreReport", () => {
  it("counts every occurrence, most frequent first", () => {
    const report = buildGenreReport([
      track([["rock", "pop"], ["rock"]]),
      track([["jazz"]]),
      track([]),
    ]);

    expect(report.genres).toEqual([
      { genre: "rock", count: 2, percentage: 50 },
      { genre: "jazz", count: 1, percentage: 25 },
      { genre: "pop", count: 1, percentage: 25 },
    ]);
    expect(report.uniqueGenres).toBe(3);
    expect(report.totalOccurrences).toBe(4);
  });

  it("rounds percentages to one decimal", () => {
    const report = buildGenreReport([track([["a", "b", "c"]])]);
    expect(report.genres.map((g) => g.percentage)).toEqual([33.3, 33.3, 33.3]);
  });
});

describe("formatGenreReport", () => {
  it("prints a table and a summary", () => {
    const report = buildGenreReport([track([["rock", "pop"], ["rock"]])]);
    const lines = formatGenreReport(report, 1).split("\n");

    expect(lines).toEqual([
      "Genre Statistics:",
      "-".repeat(50),
      `${"Genre".padEnd(30)} ${"Count".padEnd(10)} Percentage`,
      "-".repeat(50),
      `${"rock".padEnd(30)} ${"2".padEnd(10)} 66.7%`,
      "",
      "Summary:",
      "Total unique genres: 2",
      "Total genre occurrences: 3",
    ]);
  });
});
