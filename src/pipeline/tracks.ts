import { FEATURE_NAMES, type FeatureName, type TrackRecord } from "../classify";
import { asArray, asNumber, asString, isRecord } from "../lib/json";
import { parseAudioFeatures } from "../providers/reccobeats";
import type { LibraryArtist, LibraryTrack } from "../services/types";

function parseArtist(value: unknown): LibraryArtist | null {
  if (typeof value === "string" && value.length > 0) {
    return { id: null, name: value };
  }
  if (!isRecord(value)) return null;

  const artist: LibraryArtist = {
    id: asString(value.id),
    name: asString(value.name) ?? "Unknown",
  };
  if (Array.isArray(value.genres)) {
    artist.genres = value.genres
      .filter((g): g is string => typeof g === "string")
      .map((g) => g.toLowerCase());
  }
  return artist;
}

/**
 * Reads a stored track. Artists may be plain names or objects; the id may
 * sit under `spotify_id` for tracks that never got an analysis id.
 */
export function parseLibraryTrack(value: unknown): LibraryTrack | null {
  if (!isRecord(value)) return null;

  const artists: LibraryArtist[] = [];
  for (const raw of asArray(value.artists)) {
    const artist = parseArtist(raw);
    if (artist) artists.push(artist);
  }

  const track: LibraryTrack = {
    id: asString(value.id) ?? asString(value.spotify_id),
    name: asString(value.name) ?? "Unknown",
    artists,
    album: isRecord(value.album) ? asString(value.album.name) : asString(value.album),
    duration_ms: asNumber(value.duration_ms),
    popularity: asNumber(value.popularity),
    added_at: asString(value.added_at),
  };

  const reccobeatsId = asString(value.reccobeats_id);
  if (reccobeatsId !== null) track.reccobeats_id = reccobeatsId;

  const features = parseAudioFeatures(value.audio_features);
  if (features !== null) track.audio_features = features;

  return track;
}

/**
 * Accepts a saved envelope (`{ tracks }`), a raw `{ data }` dump or a bare array.
 */
export function extractTracks(payload: unknown): LibraryTrack[] {
  let collection: unknown;
  if (Array.isArray(payload)) {
    collection = payload;
  } else if (isRecord(payload)) {
    collection = Array.isArray(payload.tracks) ? payload.tracks : payload.data;
  }

  if (!Array.isArray(collection)) {
    throw new Error("Input JSON must be an array or an object with 'tracks'.");
  }

  const tracks: LibraryTrack[] = [];
  for (const item of collection) {
    const track = parseLibraryTrack(item);
    if (track) tracks.push(track);
  }
  return tracks;
}

export function toTrackRecord(track: LibraryTrack): TrackRecord {
  let features: Partial<Record<FeatureName, number>> | null = null;
  if (track.audio_features !== undefined) {
    features = {};
    for (const name of FEATURE_NAMES) {
      const value = track.audio_features[name];
      if (value !== undefined) features[name] = value;
    }
  }
  return { id: track.id, features, artists: track.artists };
}

export function formatArtists(track: LibraryTrack): string {
  return track.artists.map((a) => a.name).join(", ") || "Unknown";
}
