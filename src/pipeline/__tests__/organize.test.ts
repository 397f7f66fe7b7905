import { describe, expect, it } from "vitest";
import {
  DryRunPlaylistSink,
  materializePlaylists,
  organizeTracks,
  type PlaylistSink,
} from "../organize";
import type { LibraryTrack } from "../../services/types";

function track(id: string | null, extra: Partial<LibraryTrack> = {}): LibraryTrack {
  return {
    id,
    name: `Song ${id ?? "local"}`,
    artists: [],
    album: null,
    duration_ms: null,
    popularity: null,
    added_at: null,
    ...extra,
  };
}

const chill = { valence: 0.2, energy: 0.3, acousticness: 0.8, tempo: 80, danceability: 0.4 };

const library = [
  track("t1", { audio_features: chill }),
  track("t2", { artists: [{ id: "a1", name: "One", genres: ["reggaeton"] }] }),
  track("t3"),
  track(null, { audio_features: chill }),
];

class RecordingSink implements PlaylistSink {
  readonly dryRun = false;
  readonly created: string[] = [];
  readonly added = new Map<string, string[]>();

  constructor(private readonly failOn: string | null = null) {}

  async createPlaylist(name: string): Promise<string> {
    if (name === this.failOn) throw new Error("quota exceeded");
    this.created.push(name);
    return `id-${this.created.length}`;
  }

  async addTracks(playlistId: string, uris: string[]): Promise<number> {
    this.added.set(playlistId, uris);
    return uris.length;
  }
}

describe("organizeTracks", () => {
  it("buckets every track and counts the decision path", () => {
    const result = organizeTracks(library);

    expect(result.buckets["Chill Vibes"].map((e) => e.track.id)).toEqual(["t1", null]);
    expect(result.buckets["Party Mode"].map((e) => e.track.id)).toEqual(["t2"]);
    expect(result.buckets.Other.map((e) => e.track.id)).toEqual(["t3"]);
    expect(result.paths).toEqual({ features: 2, genres: 1, none: 1 });
  });

  it("lists tracks without a URI as skipped", () => {
    const result = organizeTracks(library);
    expect(result.skipped.map((e) => e.track.name)).toEqual(["Song local"]);
  });
});

describe("materializePlaylists", () => {
  it("creates one playlist per non-empty bucket", async () => {
    const sink = new RecordingSink();

    const results = await materializePlaylists(organizeTracks(library), sink, {
      prefix: "Mood: ",
    });

    expect(sink.created).toEqual(["Mood: Chill Vibes", "Mood: Party Mode", "Mood: Other"]);
    expect(sink.added.get("id-1")).toEqual(["spotify:track:t1"]);
    expect(results.map((r) => [r.name, r.added, r.error])).toEqual([
      ["Mood: Chill Vibes", 1, null],
      ["Mood: Party Mode", 1, null],
      ["Mood: Other", 1, null],
    ]);
  });

  it("keeps going when one playlist fails", async () => {
    const sink = new RecordingSink("Party Mode");

    const results = await materializePlaylists(organizeTracks(library), sink);

    expect(results.map((r) => r.error)).toEqual([null, "quota exceeded", null]);
    expect(sink.created).toEqual(["Chill Vibes", "Other"]);
  });

  it("only pretends in dry-run mode", async () => {
    const results = await materializePlaylists(
      organizeTracks(library),
      new DryRunPlaylistSink()
    );
    expect(results[0]).toEqual({
      playlist: "Chill Vibes",
      name: "Chill Vibes",
      playlistId: "dry_run_Chill Vibes",
      added: 1,
      error: null,
    });
  });
});
