import { fileExists, readText, safeJson, writeJson } from "./fsUtils.js";

export type TokenCache = Readonly<{
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
  scope: string;
}>;

export const EXPIRY_MARGIN_MS = 60_000;

export const loadTokenCache = async (p: string): Promise<TokenCache | null> => {
  if (!(await fileExists(p))) return null;
  const parsed = safeJson(await readText(p));
  return isTokenCache(parsed) ? parsed : null;
};

export const saveTokenCache = async (
  p: string,
  token: TokenCache,
): Promise<void> => {
  await writeJson(p, token);
};

export const isFresh = (token: TokenCache, now: number): boolean =>
  token.expiresAt - now > EXPIRY_MARGIN_MS;

const isTokenCache = (v: unknown): v is TokenCache => {
  if (typeof v !== "object" || v === null) return false;
  const rec = v as Record<string, unknown>;
  return (
    typeof rec["accessToken"] === "string" &&
    typeof rec["refreshToken"] === "string" &&
    typeof rec["expiresAt"] === "number" &&
    typeof rec["scope"] === "string"
  );
};
