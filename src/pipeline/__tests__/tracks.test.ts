import { describe, expect, it } from "vitest";
import { extractTracks, formatArtists, parseLibraryTrack, toTrackRecord } from "../tracks";

describe("parseLibraryTrack", () => {
  it("reads a stored enriched track", () => {
    const track = parseLibraryTrack({
      id: "t1",
      name: "Song",
      artists: [{ id: "a1", name: "One", genres: ["Folk", 3] }],
      album: "Album",
      duration_ms: 180000,
      popularity: 12,
      added_at: "2024-02-03T04:05:06Z",
      reccobeats_id: "rb-1",
      audio_features: { valence: 0.4, key: 5, id: "rb-1" },
    });

    expect(track).toEqual({
      id: "t1",
      name: "Song",
      artists: [{ id: "a1", name: "One", genres: ["folk"] }],
      album: "Album",
      duration_ms: 180000,
      popularity: 12,
      added_at: "2024-02-03T04:05:06Z",
      reccobeats_id: "rb-1",
      audio_features: { valence: 0.4, key: 5 },
    });
  });

  it("accepts plain artist names, album objects and spotify_id", () => {
    const track = parseLibraryTrack({
      spotify_id: "t9",
      name: "Song",
      artists: ["Solo"],
      album: { name: "Record" },
    });

    expect(track?.id).toBe("t9");
    expect(track?.artists).toEqual([{ id: null, name: "Solo" }]);
    expect(track?.album).toBe("Record");
    expect(track?.audio_features).toBeUndefined();
  });
});

describe("extractTracks", () => {
  it("accepts an envelope, a data dump or an array", () => {
    const item = { id: "t1", name: "Song", artists: [] };
    expect(extractTracks({ metadata: {}, tracks: [item] })).toHaveLength(1);
    expect(extractTracks({ data: [item, item] })).toHaveLength(2);
    expect(extractTracks([item, "junk"])).toHaveLength(1);
  });

  it("rejects anything else", () => {
    expect(() => extractTracks({ songs: [] })).toThrow(
      "Input JSON must be an array or an object with 'tracks'."
    );
  });
});

describe("toTrackRecord", () => {
  it("keeps only the classifier features", () => {
    const [track] = extractTracks([
      { id: "t1", name: "Song", artists: [], audio_features: { valence: 0.5, loudness: -6 } },
    ]);
    expect(track && toTrackRecord(track).features).toEqual({ valence: 0.5 });
  });

  it("has null features when none were fetched", () => {
    const [track] = extractTracks([{ id: "t1", name: "Song", artists: [] }]);
    expect(track && toTrackRecord(track).features).toBeNull();
  });
});

describe("formatArtists", () => {
  it("joins artist names", () => {
    const [track] = extractTracks([{ id: "t1", name: "Song", artists: ["A", "B"] }]);
    expect(track && formatArtists(track)).toBe("A, B");
  });
});
