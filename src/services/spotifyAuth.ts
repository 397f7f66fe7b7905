import type { FetchLike, FetchResponse } from "../lib/fetch";
import { asString, isRecord } from "../lib/json";
import type { MoodsortConfig } from "../lib/config";

const SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";

/**
 * Returns a bearer token for the Web API. A configured access token is used
 * as is; otherwise the refresh token is exchanged for a fresh one.
 */
export async function resolveAccessToken(
  spotify: MoodsortConfig["spotify"],
  fetchFn: FetchLike = fetch
): Promise<string> {
  if (spotify.access_token) {
    return spotify.access_token;
  }

  const { refresh_token, client_id, client_secret } = spotify;
  if (!refresh_token || !client_id || !client_secret) {
    throw new Error(
      "No Spotify credentials. Set SPOTIFY_ACCESS_TOKEN, or SPOTIFY_REFRESH_TOKEN " +
        "with SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET."
    );
  }

  const basic = Buffer.from(`${client_id}:${client_secret}`).toString("base64");
  const body = new URLSearchParams({
    grant_type: "refresh_token",
    refresh_token,
  }).toString();

  let response: FetchResponse;
  try {
    response = await fetchFn(SPOTIFY_TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${basic}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body,
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Spotify token refresh failed: ${msg}`);
  }

  if (!response.ok) {
    throw new Error(`Spotify token refresh returned ${response.status}`);
  }

  const payload = await response.json();
  const token = isRecord(payload) ? asString(payload.access_token) : null;
  if (token === null) {
    throw new Error("Spotify token response did not include an access_token");
  }
  return token;
}
