import SpotifyWebApi from "spotify-web-api-node";
import type { SpotifyCredentials } from "./config.js";
import type { PlaybackApi } from "./playback.js";
import type { SpotifyAuthApi } from "./spotifyAuth.js";

export type SpotifyClients = Readonly<{
  api: SpotifyWebApi;
  auth: SpotifyAuthApi;
  playback: PlaybackApi;
}>;

// The client's methods are overloaded with callback forms; pin the promise ones.
export const createSpotifyClients = (
  creds: SpotifyCredentials,
): SpotifyClients => {
  const api = new SpotifyWebApi({
    clientId: creds.clientId,
    clientSecret: creds.clientSecret,
    redirectUri: creds.redirectUri,
  });

  const auth: SpotifyAuthApi = {
    createAuthorizeURL: (scopes, state) =>
      api.createAuthorizeURL([...scopes], state),
    authorizationCodeGrant: (code) => api.authorizationCodeGrant(code),
    refreshAccessToken: () => api.refreshAccessToken(),
    setAccessToken: (token) => api.setAccessToken(token),
    setRefreshToken: (token) => api.setRefreshToken(token),
  };

  const playback: PlaybackApi = {
    play: (options) => api.play(options),
  };

  return { api, auth, playback };
};
