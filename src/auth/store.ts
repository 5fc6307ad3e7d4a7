import { readJsonFile, writeJsonFile } from "../lib/fs.ts";
import { readJsonBody, type FetchLike } from "../lib/http.ts";
import { isRecord } from "../lib/object-type-guards.ts";
import { WORKOS_AUTH_URL } from "./paths.ts";
import {
  AccessTokenClaimsSchema,
  AuthFileSchema,
  RefreshResponseSchema,
  WorkosTokensSchema,
  type WorkosTokens,
} from "./schema.ts";

// Refresh when less than this much lifetime remains.
const REFRESH_MARGIN_MS = 5 * 60 * 1000;
const DEFAULT_EXPIRES_IN_S = 21599;

export async function loadAuthTokens(authPath: string): Promise<WorkosTokens> {
  const raw = await readJsonFile(authPath);
  if (raw === null) {
    throw new Error(
      `Auth file not found at ${authPath}. Sign in to the Granola desktop app first (or set GRANOLA_AUTH_PATH).`,
    );
  }
  const file = AuthFileSchema.safeParse(raw);
  if (!file.success) {
    throw new Error(`Auth file ${authPath} has no workos_tokens entry`);
  }

  let inner: unknown;
  try {
    inner = JSON.parse(file.data.workos_tokens);
  } catch {
    throw new Error(`workos_tokens in ${authPath} is not valid JSON`);
  }
  const tokens = WorkosTokensSchema.safeParse(inner);
  if (!tokens.success) {
    throw new Error(`workos_tokens in ${authPath} is missing access or refresh token fields`);
  }
  return tokens.data;
}

/**
 * Writes rotated tokens back into the desktop app's auth file so the app and
 * later runs keep working; the old refresh token is no longer valid.
 */
export async function saveAuthTokens(authPath: string, tokens: WorkosTokens): Promise<void> {
  const raw = await readJsonFile(authPath);
  const file = isRecord(raw) ? raw : {};
  await writeJsonFile(authPath, { ...file, workos_tokens: JSON.stringify(tokens) });
}

export function tokenExpiresAt(tokens: WorkosTokens): number {
  return tokens.obtained_at + tokens.expires_in * 1000;
}

export function needsRefresh(tokens: WorkosTokens, now: number = Date.now()): boolean {
  return now > tokenExpiresAt(tokens) - REFRESH_MARGIN_MS;
}

/** Client id is the last path segment of the access token's `iss` claim. */
export function clientIdFromAccessToken(accessToken: string): string {
  const payload = accessToken.split(".")[1];
  if (!payload) {
    throw new Error("Access token is not a JWT");
  }
  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  } catch {
    throw new Error("Access token payload is not valid JSON");
  }
  const parsed = AccessTokenClaimsSchema.safeParse(claims);
  if (!parsed.success) {
    throw new Error("Access token has no iss claim");
  }
  const clientId = parsed.data.iss.replace(/\/+$/, "").split("/").pop();
  if (!clientId) {
    throw new Error(`Cannot derive client id from issuer ${parsed.data.iss}`);
  }
  return clientId;
}

export async function refreshAccessToken(input: {
  tokens: WorkosTokens;
  authPath: string;
  fetchImpl?: FetchLike;
  now?: () => number;
}): Promise<WorkosTokens> {
  const fetchImpl = input.fetchImpl ?? fetch;
  const response = await fetchImpl(WORKOS_AUTH_URL, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      client_id: clientIdFromAccessToken(input.tokens.access_token),
      grant_type: "refresh_token",
      refresh_token: input.tokens.refresh_token,
    }),
  });
  if (!response.ok) {
    throw new Error(`Token refresh failed (HTTP ${response.status})`);
  }
  const result = RefreshResponseSchema.safeParse(await readJsonBody(response));
  if (!result.success) {
    throw new Error("Token refresh response did not include new tokens");
  }

  const next: WorkosTokens = {
    ...input.tokens,
    access_token: result.data.access_token,
    refresh_token: result.data.refresh_token,
    expires_in: result.data.expires_in ?? DEFAULT_EXPIRES_IN_S,
    obtained_at: (input.now ?? Date.now)(),
  };
  await saveAuthTokens(input.authPath, next);
  return next;
}

export async function ensureValidToken(input: {
  tokens: WorkosTokens;
  authPath: string;
  fetchImpl?: FetchLike;
  now?: () => number;
}): Promise<WorkosTokens> {
  const now = input.now ?? Date.now;
  if (!needsRefresh(input.tokens, now())) {
    return input.tokens;
  }
  console.log("Access token expired, refreshing...");
  const refreshed = await refreshAccessToken(input);
  console.log("Token refreshed successfully.");
  return refreshed;
}
