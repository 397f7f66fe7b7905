import type { MoodsortConfig } from "../lib/config";
import { SpotifyClient } from "../services/spotify";
import { resolveAccessToken } from "../services/spotifyAuth";

export async function createSpotifyClient(config: MoodsortConfig): Promise<SpotifyClient> {
  const accessToken = await resolveAccessToken(config.spotify);
  return new SpotifyClient({ accessToken });
}
