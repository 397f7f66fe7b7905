import {
  BUCKET_NAMES,
  OTHER,
  PLAYLIST_DESCRIPTIONS,
  classifyTrack,
  type Classification,
  type ClassificationPath,
  type PlaylistName,
} from "../classify";
import { errorMessage, log } from "../lib/logger";
import { trackUri, type SpotifyClient } from "../services/spotify";
import type { LibraryTrack } from "../services/types";
import { toTrackRecord } from "./tracks";

export const PLAYLIST_ORDER: readonly PlaylistName[] = [...BUCKET_NAMES, OTHER];

export type OrganizedTrack = {
  track: LibraryTrack;
  uri: string | null;
  classification: Classification;
};

export type OrganizeResult = {
  buckets: Record<PlaylistName, OrganizedTrack[]>;
  /** Tracks with no playable URI; classified but never added to a playlist. */
  skipped: OrganizedTrack[];
  paths: Record<ClassificationPath, number>;
};

export type UriResolver = (track: LibraryTrack) => string | null;

function emptyBuckets(): Record<PlaylistName, OrganizedTrack[]> {
  return {
    "Chill Vibes": [],
    "Sad & Moody": [],
    "Feel-Good": [],
    "Party Mode": [],
    "Training & High Energy": [],
    "Driving Mix": [],
    Other: [],
  };
}

export function organizeTracks(
  tracks: LibraryTrack[],
  resolveUri: UriResolver = trackUri
): OrganizeResult {
  const buckets = emptyBuckets();
  const skipped: OrganizedTrack[] = [];
  const paths: Record<ClassificationPath, number> = { features: 0, genres: 0, none: 0 };

  for (const track of tracks) {
    const classification = classifyTrack(toTrackRecord(track));
    const entry: OrganizedTrack = { track, uri: resolveUri(track), classification };
    paths[classification.path]++;
    buckets[classification.playlist].push(entry);
    if (entry.uri === null) {
      skipped.push(entry);
    }
  }

  return { buckets, skipped, paths };
}

export function bucketUris(result: OrganizeResult, playlist: PlaylistName): string[] {
  return result.buckets[playlist]
    .map((entry) => entry.uri)
    .filter((uri): uri is string => uri !== null);
}

// --- Materialization ---

export interface PlaylistSink {
  readonly dryRun: boolean;
  createPlaylist(name: string, description: string): Promise<string>;
  addTracks(playlistId: string, uris: string[]): Promise<number>;
}

export class SpotifyPlaylistSink implements PlaylistSink {
  readonly dryRun = false;

  constructor(
    private readonly client: SpotifyClient,
    private readonly userId: string,
    private readonly isPublic = false
  ) {}

  createPlaylist(name: string, description: string): Promise<string> {
    return this.client.createPlaylist(this.userId, name, description, this.isPublic);
  }

  addTracks(playlistId: string, uris: string[]): Promise<number> {
    return this.client.addTracksToPlaylist(playlistId, uris);
  }
}

export class DryRunPlaylistSink implements PlaylistSink {
  readonly dryRun = true;

  async createPlaylist(name: string, description: string): Promise<string> {
    log(`[dry-run] Would create playlist: ${name}`);
    log(`[dry-run] Description: ${description}`);
    return `dry_run_${name}`;
  }

  async addTracks(playlistId: string, uris: string[]): Promise<number> {
    log(`[dry-run] Would add ${uris.length} tracks to playlist ${playlistId}`);
    return uris.length;
  }
}

export type MaterializeResult = {
  playlist: PlaylistName;
  name: string;
  playlistId: string | null;
  added: number;
  error: string | null;
};

export type MaterializeOptions = {
  prefix?: string | undefined;
};

/**
 * Creates one playlist per non-empty bucket and fills it. A failure on one
 * playlist is recorded and the remaining playlists still run.
 */
export async function materializePlaylists(
  result: OrganizeResult,
  sink: PlaylistSink,
  options: MaterializeOptions = {}
): Promise<MaterializeResult[]> {
  const prefix = options.prefix ?? "";
  const results: MaterializeResult[] = [];

  for (const playlist of PLAYLIST_ORDER) {
    const uris = bucketUris(result, playlist);
    if (uris.length === 0) continue;

    const name = `${prefix}${playlist}`;
    let playlistId: string | null = null;
    try {
      log(`[create] ${name}: ${uris.length} tracks`);
      playlistId = await sink.createPlaylist(name, PLAYLIST_DESCRIPTIONS[playlist]);
      const added = await sink.addTracks(playlistId, uris);
      results.push({ playlist, name, playlistId, added, error: null });
    } catch (err) {
      const message = errorMessage(err);
      log(`[create] ${name} failed: ${message}`);
      results.push({ playlist, name, playlistId, added: 0, error: message });
    }
  }

  return results;
}
