import { describe, expect, it } from "vitest";
import {
  createReccoBeatsClient,
  parseAudioFeatures,
  spotifyIdFromHref,
} from "../reccobeats";
import { fakeFetch, jsonResponse } from "../../lib/__tests__/fakeFetch";
import type { FetchResponse } from "../../lib/fetch";

function client(responses: FetchResponse[]) {
  const fake = fakeFetch(responses);
  return {
    reccobeats: createReccoBeatsClient({ fetchFn: fake.fetchFn, rateLimitMs: 0 }),
    calls: fake.calls,
  };
}

describe("spotifyIdFromHref", () => {
  it("takes the last path segment", () => {
    expect(spotifyIdFromHref("https://open.spotify.com/track/abc123")).toBe("abc123");
    expect(spotifyIdFromHref("https://open.spotify.com/track/abc123?si=x")).toBe("abc123");
  });
});

describe("parseAudioFeatures", () => {
  it("keeps numeric fields only", () => {
    expect(parseAudioFeatures({ id: "rb1", valence: 0.4, tempo: 98.5, energy: "high" })).toEqual({
      valence: 0.4,
      tempo: 98.5,
    });
  });

  it("returns null when nothing numeric is left", () => {
    expect(parseAudioFeatures({ id: "rb1" })).toBeNull();
    expect(parseAudioFeatures(null)).toBeNull();
  });
});

describe("ReccoBeats client", () => {
  it("maps Spotify ids to ReccoBeats ids", async () => {
    const { reccobeats, calls } = client([
      jsonResponse(200, {
        content: [
          { id: "rb-1", href: "https://open.spotify.com/track/sp1" },
          { id: "rb-9", href: "https://open.spotify.com/track/sp9" },
        ],
      }),
    ]);

    const resolved = await reccobeats.lookupTracks(["sp1", "sp2"]);

    expect([...resolved.entries()]).toEqual([["sp1", "rb-1"]]);
    expect(calls[0]?.url).toBe("https://api.reccobeats.com/v1/track?ids=sp1%2Csp2");
  });

  it("refuses more than 40 ids per lookup", async () => {
    const { reccobeats } = client([]);
    const ids = Array.from({ length: 41 }, (_, i) => `sp${i}`);
    await expect(reccobeats.lookupTracks(ids)).rejects.toThrow("at most 40 ids");
  });

  it("returns null features for an unknown track", async () => {
    const { reccobeats } = client([jsonResponse(404, { error: "not found" })]);
    await expect(reccobeats.getAudioFeatures("rb-1")).resolves.toBeNull();
  });

  it("fetches audio features", async () => {
    const { reccobeats, calls } = client([
      jsonResponse(200, { id: "rb-1", valence: 0.7, energy: 0.8 }),
    ]);
    await expect(reccobeats.getAudioFeatures("rb-1")).resolves.toEqual({
      valence: 0.7,
      energy: 0.8,
    });
    expect(calls[0]?.url).toBe("https://api.reccobeats.com/v1/track/rb-1/audio-features");
  });

  it("throws on server errors", async () => {
    const { reccobeats } = client([jsonResponse(500, null)]);
    await expect(reccobeats.getAudioFeatures("rb-1")).rejects.toThrow(
      "ReccoBeats API 500 (/v1/track/rb-1/audio-features)"
    );
  });
});
