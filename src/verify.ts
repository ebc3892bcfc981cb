import type { AppConfig } from "./config.js";
import { commandAvailable } from "./exec.js";
import { fileExists, isDirectory, listDirs } from "./fsUtils.js";
import { loadMappings } from "./mappings.js";
import { loadTokenCache } from "./tokenCache.js";

export type VerifyLine = Readonly<{
  ok: boolean;
  label: string;
  detail?: string;
  // A failing optional line does not fail the run.
  optional?: boolean;
}>;

export type VerifyTools = Readonly<{
  commandAvailable: (cmd: string) => Promise<boolean>;
}>;

export const verify = async (
  cfg: AppConfig,
  tools: VerifyTools = { commandAvailable: (cmd) => commandAvailable(cmd) },
): Promise<readonly VerifyLine[]> => {
  const knownOk = await isDirectory(cfg.knownFacesDir);
  const people = knownOk ? await listDirs(cfg.knownFacesDir) : [];

  const mappings = await loadMappings(cfg.mappingsPath);
  const unmapped = people.filter((p) => !mappings.mappings.has(p));

  const s = cfg.spotify;
  const credsOk =
    s.clientId !== undefined &&
    s.clientSecret !== undefined &&
    s.redirectUri !== undefined;
  const token = await loadTokenCache(s.tokenCachePath);

  const lines: VerifyLine[] = [
    {
      ok: knownOk && people.length > 0,
      label: "Known faces: directory with person folders",
      detail: knownOk
        ? `${cfg.knownFacesDir} (${people.length} people)`
        : `${cfg.knownFacesDir} missing`,
    },
    {
      ok: mappings.status === "loaded" && mappings.mappings.size > 0,
      label: "Mappings: name -> URI file",
      detail:
        mappings.status === "loaded"
          ? `${mappings.mappings.size} entries`
          : `${mappings.status}${mappings.detail ? `: ${mappings.detail}` : ""}`,
    },
    {
      ok: unmapped.length === 0,
      label: "Mappings: every known person has a URI",
      ...(unmapped.length > 0 ? { detail: `unmapped: ${unmapped.join(", ")}` } : {}),
    },
    {
      ok: credsOk,
      label: "Spotify: client id, secret and redirect URI set",
    },
    {
      ok: token !== null,
      label: "Spotify: cached token (created by auth)",
      detail: s.tokenCachePath,
      optional: true,
    },
    {
      ok: await fileExists(cfg.face.modelsDir),
      label: "Face models: directory exists",
      detail: cfg.face.modelsDir,
    },
    {
      ok: await tools.commandAvailable("ffmpeg"),
      label: "Tools: ffmpeg on PATH",
    },
    {
      ok: await tools.commandAvailable("ffprobe"),
      label: "Tools: ffprobe on PATH",
    },
  ];

  return lines;
};

export const verifyPassed = (lines: readonly VerifyLine[]): boolean =>
  lines.every((l) => l.ok || l.optional === true);

export const formatVerify = (lines: readonly VerifyLine[]): string => {
  const icon = (ok: boolean): string => (ok ? "✅" : "❌");
  const rows = lines.map(
    (l) => `${icon(l.ok)} ${l.label}${l.detail ? ` — ${l.detail}` : ""}`,
  );
  return rows.join("\n");
};
