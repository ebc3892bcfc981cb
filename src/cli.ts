import path from "node:path";
import { openCamera } from "./camera.js";
import { getConfig, requireSpotifyCredentials } from "./config.js";
import type { AppConfig } from "./config.js";
import { createCooldown } from "./cooldown.js";
import { errorMessage } from "./errors.js";
import { faceApiBackend } from "./faceBackend.js";
import type { BackendProvider } from "./faceBackend.js";
import {
  distinctNames,
  loadKnownFaces,
  summarizeOutcomes,
} from "./knownFaces.js";
import type { KnownFacesLoad } from "./knownFaces.js";
import { runRecognitionLoop } from "./loop.js";
import { loadMappings } from "./mappings.js";
import { createPlaybackClient } from "./playback.js";
import type { PlaybackApi } from "./playback.js";
import { recognizeFaces } from "./recognize.js";
import { createSpotifySession } from "./spotifyAuth.js";
import type { SpotifySession } from "./spotifyAuth.js";
import { createSpotifyClients } from "./spotifyClient.js";
import { openInBrowser, promptLine, watchForQuit } from "./terminal.js";
import { formatVerify, verify, verifyPassed } from "./verify.js";

export const runCli = async (argv: readonly string[]): Promise<void> => {
  const cfg = getConfig();
  const [cmd] = argv;

  switch (cmd) {
    case "run": {
      await cmdRun(cfg);
      break;
    }

    case "faces": {
      const backend = faceApiBackend(cfg.face);
      const loaded = await loadFaces(cfg, backend);
      for (const o of loaded.outcomes) {
        const rel = path.relative(cfg.knownFacesDir, o.path);
        console.log(
          o.kind === "encoded"
            ? `✅ ${rel}`
            : `⏭️  ${rel} — ${o.reason}${o.detail ? `: ${o.detail}` : ""}`,
        );
      }
      break;
    }

    case "auth": {
      const { session } = connectSpotify(cfg);
      const source = await session.authenticate();
      console.log(`Spotify session: ${session.state()} (${source})`);
      console.log(`Token cache: ${cfg.spotify.tokenCachePath}`);
      break;
    }

    case "verify": {
      const lines = await verify(cfg);
      console.log(formatVerify(lines));
      if (!verifyPassed(lines)) process.exit(2);
      break;
    }

    default: {
      console.log(`face-playback

Commands:
  run       recognize faces on the webcam and start their music
  faces     load known faces and show what each image contributed
  auth      authorize with Spotify and cache the token
  verify    check configuration, files and tools

While running: type q + Enter (or Ctrl+C) to stop.

Environment (.env is read):
  SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET, SPOTIFY_REDIRECT_URI (required for run/auth)
  KNOWN_FACES_DIR=known_faces      MAPPINGS_FILE=mappings.json
  COOLDOWN_SECONDS=10              FACE_TOLERANCE=0.5
  FACE_MIN_CONFIDENCE=0.5          FACE_MODELS_DIR=node_modules/@vladmandic/face-api/model
  CAMERA_DEVICE, CAMERA_WIDTH=640, CAMERA_HEIGHT=480
  SPOTIFY_TOKEN_CACHE=.cache       SPOTIFY_OPEN_BROWSER=true
`);
    }
  }
};

const cmdRun = async (cfg: AppConfig): Promise<void> => {
  const backend = faceApiBackend(cfg.face);
  const { known } = await loadFaces(cfg, backend);

  const { session, playbackApi } = connectSpotify(cfg);
  const source = await session.authenticate();
  console.log(`Spotify session: ${session.state()} (${source})`);

  const mappings = await loadMappings(cfg.mappingsPath);
  console.log(
    mappings.status === "loaded"
      ? `Mappings: ${mappings.mappings.size} entries`
      : `Mappings: ${mappings.status} (${cfg.mappingsPath}); nothing will play`,
  );

  const playback = createPlaybackClient({
    session,
    api: playbackApi,
    mappings: mappings.mappings,
  });

  const opened = await openCamera(cfg.camera);
  if (!opened.ok) {
    console.log(`Could not open webcam (${opened.reason}). Exiting.`);
    return;
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    console.log("Stopped by user");
    controller.abort();
  };
  process.once("SIGINT", onSigint);
  const stopWatching = watchForQuit(() => controller.abort());

  try {
    const summary = await runRecognitionLoop({
      camera: opened.camera,
      recognize: async (frame) =>
        await recognizeFaces(frame, known, backend, cfg.tolerance),
      trigger: playback.trigger,
      cooldown: createCooldown(cfg.cooldownMs),
      signal: controller.signal,
      report: (line) => console.log(line),
    });
    console.log(
      `Stopped (${summary.stopReason}) after ${summary.frames} frames, ${summary.triggers} playback triggers.`,
    );
  } finally {
    process.off("SIGINT", onSigint);
    stopWatching();
  }
};

const loadFaces = async (
  cfg: AppConfig,
  backend: BackendProvider,
): Promise<KnownFacesLoad> => {
  console.log(`Loading known faces from ${cfg.knownFacesDir}...`);
  const loaded = await loadKnownFaces(cfg.knownFacesDir, { backend });
  const summary = summarizeOutcomes(loaded.outcomes);
  const people = distinctNames(loaded.known);

  console.log(
    `Loaded ${loaded.known.names.length} encodings for ${people.length} people: ${people.length > 0 ? people.join(", ") : "(none)"}`,
  );
  const skippedTotal =
    summary.skipped["unsupported-format"] +
    summary.skipped.unreadable +
    summary.skipped["no-face"];
  if (skippedTotal > 0)
    console.log(
      `Skipped ${skippedTotal} files: ${summary.skipped["no-face"]} without a face, ${summary.skipped.unreadable} unreadable, ${summary.skipped["unsupported-format"]} unsupported`,
    );
  return loaded;
};

const connectSpotify = (
  cfg: AppConfig,
): Readonly<{ session: SpotifySession; playbackApi: PlaybackApi }> => {
  const { auth, playback } = createSpotifyClients(
    requireSpotifyCredentials(cfg.spotify),
  );

  const session = createSpotifySession(auth, {
    cachePath: cfg.spotify.tokenCachePath,
    scopes: cfg.spotify.scopes,
    prompt: promptLine,
    announce: (line) => console.log(line),
    ...(cfg.spotify.openBrowser ? { openUrl: openInBrowser } : {}),
  });

  return { session, playbackApi: playback };
};

// Allow running via `tsx src/cli.ts <cmd>` directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runCli(process.argv.slice(2)).catch((e: unknown) => {
    // eslint-disable-next-line no-console
    console.error(errorMessage(e));
    process.exit(1);
  });
}
