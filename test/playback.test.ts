import test from "node:test";
import assert from "node:assert/strict";
import { createPlaybackClient, describeTrigger } from "../src/playback.js";
import type { PlaybackApi } from "../src/playback.js";
import type { SpotifySession } from "../src/spotifyAuth.js";
import type { PlayRequest } from "../src/types.js";

const session = (ensureFresh: () => Promise<void> = async () => undefined): SpotifySession => ({
  state: () => "authenticated",
  authenticate: async () => "cache",
  ensureFresh,
});

const recordingApi = (
  fail?: Error,
): PlaybackApi & { calls: PlayRequest[] } => {
  const calls: PlayRequest[] = [];
  return {
    calls,
    play: async (options) => {
      calls.push(options);
      if (fail) throw fail;
      return {};
    },
  };
};

const mappings = new Map([
  ["Alice", "spotify:track:123"],
  ["Bob", "spotify:playlist:456"],
]);

test("a track mapping starts playback with an explicit track list", async () => {
  const api = recordingApi();
  const client = createPlaybackClient({ session: session(), api, mappings });

  const r = await client.trigger("Alice");

  assert.deepEqual(api.calls, [{ uris: ["spotify:track:123"] }]);
  assert.deepEqual(r, {
    kind: "played",
    label: "Alice",
    uri: "spotify:track:123",
    request: { uris: ["spotify:track:123"] },
  });
});

test("a playlist mapping starts playback with a context URI", async () => {
  const api = recordingApi();
  const client = createPlaybackClient({ session: session(), api, mappings });

  await client.trigger("Bob");

  assert.deepEqual(api.calls, [{ context_uri: "spotify:playlist:456" }]);
});

test("unmapped names never reach the API", async () => {
  const api = recordingApi();
  const client = createPlaybackClient({ session: session(), api, mappings });

  for (const name of ["Zoe", "", "toString", "__proto__", "constructor"]) {
    assert.deepEqual(await client.trigger(name), { kind: "no-mapping", label: name });
  }
  assert.deepEqual(api.calls, []);
});

test("API failures are returned, not thrown", async () => {
  const api = recordingApi(new Error("Player command failed: No active device found"));
  const client = createPlaybackClient({ session: session(), api, mappings });

  const r = await client.trigger("Alice");

  assert.deepEqual(r, {
    kind: "failed",
    label: "Alice",
    uri: "spotify:track:123",
    error: "Player command failed: No active device found",
  });
});

test("a failed token refresh skips the play call", async () => {
  const api = recordingApi();
  const client = createPlaybackClient({
    session: session(async () => {
      throw new Error("invalid_grant");
    }),
    api,
    mappings,
  });

  const r = await client.trigger("Bob");

  assert.equal(r.kind, "failed");
  assert.deepEqual(api.calls, []);
});

test("trigger outcomes read as operator messages", () => {
  assert.equal(
    describeTrigger({ kind: "no-mapping", label: "Zoe" }),
    "No mapping found for Zoe; skipping playback",
  );
  assert.equal(
    describeTrigger({
      kind: "played",
      label: "Bob",
      uri: "spotify:playlist:456",
      request: { context_uri: "spotify:playlist:456" },
    }),
    "Started playback for Bob: spotify:playlist:456",
  );
  assert.equal(
    describeTrigger({ kind: "failed", label: "Alice", uri: "spotify:track:123", error: "offline" }),
    "Spotify API error for Alice: offline",
  );
});
