import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ENVELOPE_VERSION, buildEnvelope, readTrackFile, writeTrackFile } from "../store";
import type { LibraryTrack } from "../../services/types";

const song: LibraryTrack = {
  id: "t1",
  name: "Song",
  artists: [{ id: "a1", name: "One" }],
  album: "Album",
  duration_ms: 1000,
  popularity: null,
  added_at: null,
};

describe("buildEnvelope", () => {
  it("stamps counts and times", () => {
    const envelope = buildEnvelope([song], { artists: 1 }, null, new Date("2024-03-01T00:00:00Z"));
    expect(envelope.metadata).toEqual({
      artists: 1,
      created_at: "2024-03-01T00:00:00.000Z",
      updated_at: "2024-03-01T00:00:00.000Z",
      version: ENVELOPE_VERSION,
      total_tracks: 1,
    });
  });
});

describe("track files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "moodsort-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes and reads back tracks, creating directories", () => {
    const file = path.join(dir, "processed", "tracks.json");
    writeTrackFile(file, [song]);
    expect(readTrackFile(file)).toEqual([song]);
    expect(fs.readFileSync(file, "utf8").endsWith("}\n")).toBe(true);
  });

  it("keeps created_at when rewriting", () => {
    const file = path.join(dir, "tracks.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ metadata: { created_at: "2020-01-01T00:00:00.000Z" }, tracks: [] })
    );

    const envelope = writeTrackFile(file, [song]);

    expect(envelope.metadata.created_at).toBe("2020-01-01T00:00:00.000Z");
    expect(envelope.metadata.updated_at).not.toBe("2020-01-01T00:00:00.000Z");
  });

  it("replaces an unreadable previous file", () => {
    const file = path.join(dir, "tracks.json");
    fs.writeFileSync(file, "{not json");

    const envelope = writeTrackFile(file, [song]);

    expect(envelope.metadata.created_at).toBe(envelope.metadata.updated_at);
  });

  it("reports a missing file", () => {
    const file = path.join(dir, "missing.json");
    expect(() => readTrackFile(file)).toThrow(`Track file not found: ${file}`);
  });
});
