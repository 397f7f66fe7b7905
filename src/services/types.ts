export interface LibraryArtist {
  id: string | null;
  name: string;
  genres?: string[] | undefined;
}

/**
 * Numeric measurements from the analysis service, keyed by name
 * (valence, energy, danceability, acousticness, tempo, loudness, ...).
 */
export type AudioFeatures = Record<string, number>;

export interface LibraryTrack {
  id: string | null;
  name: string;
  artists: LibraryArtist[];
  album: string | null;
  duration_ms: number | null;
  popularity: number | null;
  added_at: string | null;
  reccobeats_id?: string | undefined;
  audio_features?: AudioFeatures | undefined;
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}
