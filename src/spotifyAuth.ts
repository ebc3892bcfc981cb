import crypto from "node:crypto";
import { isFresh, loadTokenCache, saveTokenCache } from "./tokenCache.js";
import type { TokenCache } from "./tokenCache.js";

export type TokenGrant = Readonly<{
  access_token: string;
  refresh_token: string;
  expires_in: number;
  scope: string;
}>;

export type TokenRefresh = Readonly<{
  access_token: string;
  refresh_token?: string | undefined;
  expires_in: number;
  scope: string;
}>;

// The subset of spotify-web-api-node the session drives.
export type SpotifyAuthApi = {
  createAuthorizeURL(scopes: readonly string[], state: string): string;
  authorizationCodeGrant(code: string): Promise<{ body: TokenGrant }>;
  refreshAccessToken(): Promise<{ body: TokenRefresh }>;
  setAccessToken(accessToken: string): void;
  setRefreshToken(refreshToken: string): void;
};

export type SessionState = "unauthenticated" | "authenticated";
export type AuthSource = "cache" | "refresh" | "authorization";

export type SpotifySession = Readonly<{
  state: () => SessionState;
  authenticate: () => Promise<AuthSource>;
  ensureFresh: () => Promise<void>;
}>;

export type SessionOptions = Readonly<{
  cachePath: string;
  scopes: readonly string[];
  prompt: (question: string) => Promise<string>;
  announce: (line: string) => void;
  openUrl?: (url: string) => Promise<boolean>;
  now?: () => number;
  newState?: () => string;
}>;

export type AuthorizationResponse = Readonly<{
  code: string;
  state?: string;
}>;

// authenticate(): cached token, else refresh a stale one, else the code flow.
export const createSpotifySession = (
  api: SpotifyAuthApi,
  opts: SessionOptions,
): SpotifySession => {
  const now = opts.now ?? Date.now;
  const newState =
    opts.newState ?? ((): string => crypto.randomBytes(16).toString("hex"));

  let state: SessionState = "unauthenticated";
  let source: AuthSource | undefined;
  let token: TokenCache | undefined;

  const apply = (t: TokenCache): void => {
    token = t;
    api.setAccessToken(t.accessToken);
    api.setRefreshToken(t.refreshToken);
  };

  const refresh = async (current: TokenCache): Promise<TokenCache> => {
    api.setRefreshToken(current.refreshToken);
    const { body } = await api.refreshAccessToken();
    const next: TokenCache = {
      accessToken: body.access_token,
      refreshToken: body.refresh_token ?? current.refreshToken,
      expiresAt: now() + body.expires_in * 1000,
      scope: body.scope,
    };
    await saveTokenCache(opts.cachePath, next);
    return next;
  };

  const authorize = async (): Promise<TokenCache> => {
    const expected = newState();
    const url = api.createAuthorizeURL(opts.scopes, expected);
    opts.announce(`Please navigate here to authorize the app: ${url}`);
    if (opts.openUrl) await opts.openUrl(url);

    const answer = await opts.prompt(
      "Enter the URL you were redirected to after approval: ",
    );
    const response = parseAuthorizationResponse(answer);
    if (response.state !== undefined && response.state !== expected)
      throw new Error("OAuth state mismatch; start the authorization again.");

    const { body } = await api.authorizationCodeGrant(response.code);
    const next: TokenCache = {
      accessToken: body.access_token,
      refreshToken: body.refresh_token,
      expiresAt: now() + body.expires_in * 1000,
      scope: body.scope,
    };
    await saveTokenCache(opts.cachePath, next);
    return next;
  };

  const authenticate = async (): Promise<AuthSource> => {
    if (state === "authenticated" && source) return source;

    const cached = await loadTokenCache(opts.cachePath);
    let next: AuthSource;
    if (cached && isFresh(cached, now())) {
      apply(cached);
      next = "cache";
    } else if (cached) {
      apply(await refresh(cached));
      next = "refresh";
    } else {
      apply(await authorize());
      next = "authorization";
    }

    state = "authenticated";
    source = next;
    return next;
  };

  const ensureFresh = async (): Promise<void> => {
    if (state !== "authenticated" || !token)
      throw new Error("Spotify session is not authenticated.");
    if (isFresh(token, now())) return;
    apply(await refresh(token));
  };

  return { state: () => state, authenticate, ensureFresh };
};

// Accepts the full redirect URL or a bare authorization code.
export const parseAuthorizationResponse = (
  input: string,
): AuthorizationResponse => {
  const trimmed = input.trim();
  if (trimmed === "") throw new Error("No authorization response entered.");
  if (!/^https?:\/\//i.test(trimmed)) return { code: trimmed };

  const url = new URL(trimmed);
  const error = url.searchParams.get("error");
  if (error !== null) throw new Error(`Authorization was denied: ${error}`);

  const code = url.searchParams.get("code");
  if (code === null || code === "")
    throw new Error("Redirect URL has no code parameter.");

  const state = url.searchParams.get("state");
  return state === null ? { code } : { code, state };
};
