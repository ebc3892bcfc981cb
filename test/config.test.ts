import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { getConfig, requireSpotifyCredentials } from "../src/config.js";

test("defaults apply when the environment is empty", () => {
  const cfg = getConfig({}, "linux");

  assert.equal(cfg.knownFacesDir, path.resolve(process.cwd(), "known_faces"));
  assert.equal(cfg.mappingsPath, path.resolve(process.cwd(), "mappings.json"));
  assert.equal(cfg.cooldownMs, 10_000);
  assert.equal(cfg.tolerance, 0.5);
  assert.deepEqual(cfg.camera, {
    platform: "linux",
    device: "/dev/video0",
    width: 640,
    height: 480,
  });
  assert.equal(cfg.spotify.openBrowser, true);
  assert.equal(cfg.spotify.clientId, undefined);
  assert.equal(cfg.spotify.tokenCachePath, path.resolve(process.cwd(), ".cache"));
});

test("environment values override the defaults", () => {
  const cfg = getConfig(
    {
      KNOWN_FACES_DIR: "/srv/faces",
      COOLDOWN_SECONDS: "2.5",
      FACE_TOLERANCE: "0.6",
      CAMERA_DEVICE: "FaceTime HD Camera",
      CAMERA_WIDTH: "1280",
      CAMERA_HEIGHT: "720",
      SPOTIFY_OPEN_BROWSER: "false",
      SPOTIFY_CLIENT_ID: "test-client",
    },
    "win32",
  );

  assert.equal(cfg.knownFacesDir, "/srv/faces");
  assert.equal(cfg.cooldownMs, 2_500);
  assert.equal(cfg.tolerance, 0.6);
  assert.deepEqual(cfg.camera, {
    platform: "win32",
    device: "FaceTime HD Camera",
    width: 1280,
    height: 720,
  });
  assert.equal(cfg.spotify.openBrowser, false);
  assert.equal(cfg.spotify.clientId, "test-client");
});

test("malformed numbers fall back to the defaults", () => {
  const cfg = getConfig(
    { COOLDOWN_SECONDS: "soon", FACE_TOLERANCE: "-1", CAMERA_WIDTH: "12.5" },
    "darwin",
  );
  assert.equal(cfg.cooldownMs, 10_000);
  assert.equal(cfg.tolerance, 0.5);
  assert.equal(cfg.camera.width, 640);
  assert.equal(cfg.camera.device, "0");
});

test("windows has no default camera device", () => {
  assert.equal(getConfig({}, "win32").camera.device, undefined);
});

test("missing Spotify credentials are fatal", () => {
  const cfg = getConfig({ SPOTIFY_CLIENT_ID: "test-client", SPOTIFY_CLIENT_SECRET: "test-secret" }, "linux");
  assert.throws(
    () => requireSpotifyCredentials(cfg.spotify),
    /Set SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET and SPOTIFY_REDIRECT_URI in \.env/,
  );
});

test("complete Spotify credentials are returned", () => {
  const cfg = getConfig(
    {
      SPOTIFY_CLIENT_ID: "test-client",
      SPOTIFY_CLIENT_SECRET: "test-secret",
      SPOTIFY_REDIRECT_URI: "http://127.0.0.1:8888/callback",
    },
    "linux",
  );
  assert.deepEqual(requireSpotifyCredentials(cfg.spotify), {
    clientId: "test-client",
    clientSecret: "test-secret",
    redirectUri: "http://127.0.0.1:8888/callback",
  });
});
