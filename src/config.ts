import path from "node:path";

export type FaceModelConfig = Readonly<{
  modelsDir: string;
  minConfidence: number;
}>;

export type CameraConfig = Readonly<{
  platform: NodeJS.Platform;
  device?: string;
  width: number;
  height: number;
}>;

export type SpotifyConfig = Readonly<{
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  tokenCachePath: string;
  openBrowser: boolean;
  scopes: readonly string[];
}>;

export type AppConfig = Readonly<{
  knownFacesDir: string;
  mappingsPath: string;
  cooldownMs: number;
  tolerance: number;
  face: FaceModelConfig;
  camera: CameraConfig;
  spotify: SpotifyConfig;
}>;

export type SpotifyCredentials = Readonly<{
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}>;

export const DEFAULT_COOLDOWN_SECONDS = 10;
export const DEFAULT_TOLERANCE = 0.5;

const SPOTIFY_SCOPES = [
  "user-modify-playback-state",
  "user-read-playback-state",
] as const;

export const getConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): AppConfig => {
  const projectRoot = process.cwd();
  const device = nonEmpty(env.CAMERA_DEVICE) ?? defaultCameraDevice(platform);
  const clientId = nonEmpty(env.SPOTIFY_CLIENT_ID);
  const clientSecret = nonEmpty(env.SPOTIFY_CLIENT_SECRET);
  const redirectUri = nonEmpty(env.SPOTIFY_REDIRECT_URI);

  return {
    knownFacesDir: path.resolve(
      projectRoot,
      nonEmpty(env.KNOWN_FACES_DIR) ?? "known_faces",
    ),
    mappingsPath: path.resolve(
      projectRoot,
      nonEmpty(env.MAPPINGS_FILE) ?? "mappings.json",
    ),
    cooldownMs:
      parseNumberOr(DEFAULT_COOLDOWN_SECONDS, env.COOLDOWN_SECONDS) * 1000,
    tolerance: parseNumberOr(DEFAULT_TOLERANCE, env.FACE_TOLERANCE),
    face: {
      modelsDir: path.resolve(
        projectRoot,
        nonEmpty(env.FACE_MODELS_DIR) ??
          path.join("node_modules", "@vladmandic", "face-api", "model"),
      ),
      minConfidence: parseNumberOr(0.5, env.FACE_MIN_CONFIDENCE),
    },
    camera: {
      platform,
      ...(device === undefined ? {} : { device }),
      width: parsePositiveIntOr(640, env.CAMERA_WIDTH),
      height: parsePositiveIntOr(480, env.CAMERA_HEIGHT),
    },
    spotify: {
      ...(clientId === undefined ? {} : { clientId }),
      ...(clientSecret === undefined ? {} : { clientSecret }),
      ...(redirectUri === undefined ? {} : { redirectUri }),
      tokenCachePath: path.resolve(
        projectRoot,
        nonEmpty(env.SPOTIFY_TOKEN_CACHE) ?? ".cache",
      ),
      openBrowser: env.SPOTIFY_OPEN_BROWSER?.trim().toLowerCase() !== "false",
      scopes: SPOTIFY_SCOPES,
    },
  };
};

export const requireSpotifyCredentials = (
  cfg: SpotifyConfig,
): SpotifyCredentials => {
  const { clientId, clientSecret, redirectUri } = cfg;
  if (!clientId || !clientSecret || !redirectUri)
    throw new Error(
      "Set SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET and SPOTIFY_REDIRECT_URI in .env",
    );
  return { clientId, clientSecret, redirectUri };
};

// Windows (dshow) needs a device name, so there is no default there.
const defaultCameraDevice = (
  platform: NodeJS.Platform,
): string | undefined => {
  if (platform === "linux") return "/dev/video0";
  if (platform === "darwin") return "0";
  return undefined;
};

const nonEmpty = (v: string | undefined): string | undefined => {
  if (typeof v !== "string" || v.trim() === "") return undefined;
  return v.trim();
};

const parseNumberOr = (fallback: number, v: string | undefined): number => {
  if (typeof v !== "string" || v.trim() === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
};

const parsePositiveIntOr = (fallback: number, v: string | undefined): number => {
  const n = parseNumberOr(fallback, v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
};
