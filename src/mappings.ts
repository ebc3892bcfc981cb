import { errorMessage } from "./errors.js";
import { fileExists, readText, safeJson } from "./fsUtils.js";
import type { PlayRequest } from "./types.js";

export const TRACK_PREFIX = "spotify:track:";

export type MappingsLoad = Readonly<{
  mappings: ReadonlyMap<string, string>;
  status: "loaded" | "missing" | "invalid";
  detail?: string;
}>;

// Person label -> Spotify URI. Missing or malformed files give an empty map.
export const loadMappings = async (p: string): Promise<MappingsLoad> => {
  if (!(await fileExists(p)))
    return { mappings: new Map<string, string>(), status: "missing" };

  let raw: string;
  try {
    raw = await readText(p);
  } catch (e: unknown) {
    return {
      mappings: new Map<string, string>(),
      status: "invalid",
      detail: errorMessage(e),
    };
  }

  const parsed = safeJson(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed))
    return {
      mappings: new Map<string, string>(),
      status: "invalid",
      detail: "expected a JSON object of name -> URI",
    };

  const mappings = new Map<string, string>();
  for (const [name, uri] of Object.entries(parsed)) {
    if (typeof uri === "string" && uri.trim() !== "")
      mappings.set(name, uri.trim());
  }
  return { mappings, status: "loaded" };
};

export const toPlayRequest = (uri: string): PlayRequest =>
  uri.startsWith(TRACK_PREFIX) ? { uris: [uri] } : { context_uri: uri };
