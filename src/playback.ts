import { errorMessage } from "./errors.js";
import { toPlayRequest } from "./mappings.js";
import type { SpotifySession } from "./spotifyAuth.js";
import type { PlayRequest, TriggerResult } from "./types.js";

// spotifyClient.ts pins spotify-web-api-node's promise form of `play` to this.
export type PlaybackApi = {
  play(options: PlayRequest): Promise<unknown>;
};

export type PlaybackClient = Readonly<{
  trigger: (label: string) => Promise<TriggerResult>;
}>;

export type PlaybackClientDeps = Readonly<{
  session: SpotifySession;
  api: PlaybackApi;
  mappings: ReadonlyMap<string, string>;
}>;

export const createPlaybackClient = (
  deps: PlaybackClientDeps,
): PlaybackClient => {
  const trigger = async (label: string): Promise<TriggerResult> => {
    const uri = deps.mappings.get(label);
    if (uri === undefined) return { kind: "no-mapping", label };

    const request = toPlayRequest(uri);
    try {
      await deps.session.ensureFresh();
      await deps.api.play(request);
      return { kind: "played", label, uri, request };
    } catch (e: unknown) {
      return { kind: "failed", label, uri, error: errorMessage(e) };
    }
  };

  return { trigger };
};

export const describeTrigger = (r: TriggerResult): string => {
  switch (r.kind) {
    case "played":
      return `Started playback for ${r.label}: ${r.uri}`;
    case "no-mapping":
      return `No mapping found for ${r.label}; skipping playback`;
    case "failed":
      return `Spotify API error for ${r.label}: ${r.error}`;
  }
};
