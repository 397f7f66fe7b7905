import fs from "fs";
import path from "path";
import { asString, isRecord } from "../lib/json";
import type { LibraryTrack } from "../services/types";
import { extractTracks } from "./tracks";

export const ENVELOPE_VERSION = 1;

export type EnvelopeMetadata = {
  created_at: string;
  updated_at: string;
  version: number;
  total_tracks: number;
  [count: string]: string | number;
};

export type TrackEnvelope = {
  metadata: EnvelopeMetadata;
  tracks: LibraryTrack[];
};

function readCreatedAt(filePath: string): string | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const existing: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    if (isRecord(existing) && isRecord(existing.metadata)) {
      return asString(existing.metadata.created_at);
    }
  } catch (err) {
    // An unreadable previous file is replaced; its creation time is lost.
    if (!(err instanceof SyntaxError)) throw err;
  }
  return null;
}

export function buildEnvelope(
  tracks: LibraryTrack[],
  counts: Record<string, number>,
  createdAt: string | null,
  now: Date = new Date()
): TrackEnvelope {
  const updatedAt = now.toISOString();
  return {
    metadata: {
      ...counts,
      created_at: createdAt ?? updatedAt,
      updated_at: updatedAt,
      version: ENVELOPE_VERSION,
      total_tracks: tracks.length,
    },
    tracks,
  };
}

/**
 * Writes tracks wrapped in a metadata envelope. Overwriting keeps the
 * original `created_at`.
 */
export function writeTrackFile(
  filePath: string,
  tracks: LibraryTrack[],
  counts: Record<string, number> = {}
): TrackEnvelope {
  const envelope = buildEnvelope(tracks, counts, readCreatedAt(filePath));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(envelope, null, 2)}\n`, "utf8");
  return envelope;
}

export function readTrackFile(filePath: string): LibraryTrack[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Track file not found: ${filePath}`);
  }
  const payload: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return extractTracks(payload);
}
