import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { WorkosTokens } from "../src/auth/schema.ts";
import {
  clientIdFromAccessToken,
  ensureValidToken,
  loadAuthTokens,
  needsRefresh,
  refreshAccessToken,
} from "../src/auth/store.ts";

function fakeJwt(claims: Record<string, unknown>): string {
  return `header.${Buffer.from(JSON.stringify(claims)).toString("base64url")}.signature`;
}

const accessToken = fakeJwt({ iss: "https://api.workos.com/user_management/client_TEST123/" });

function tokens(overrides: Partial<WorkosTokens> = {}): WorkosTokens {
  return {
    access_token: accessToken,
    refresh_token: "old-refresh",
    expires_in: 3600,
    obtained_at: 1_000_000,
    ...overrides,
  };
}

describe("token helpers", () => {
  test("client id is the last segment of the issuer", () => {
    expect(clientIdFromAccessToken(accessToken)).toBe("client_TEST123");
    expect(() => clientIdFromAccessToken("not-a-jwt")).toThrow("not a JWT");
    expect(() => clientIdFromAccessToken(fakeJwt({ sub: "x" }))).toThrow("no iss claim");
  });

  test("refresh is due five minutes before expiry", () => {
    expect(needsRefresh(tokens(), 4_300_000)).toBe(false);
    expect(needsRefresh(tokens(), 4_300_001)).toBe(true);
  });
});

describe("auth file", () => {
  let dir: string;
  let authPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "granola-md-auth-"));
    authPath = join(dir, "supabase.json");
    await writeFile(
      authPath,
      JSON.stringify({ workos_tokens: JSON.stringify(tokens()), session_id: "s1" }),
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("loads the nested token JSON", async () => {
    expect(await loadAuthTokens(authPath)).toEqual(tokens());
  });

  test("explains a missing auth file", async () => {
    await expect(loadAuthTokens(join(dir, "nope.json"))).rejects.toThrow("Auth file not found");
  });

  test("refresh posts the rotation grant and persists the new tokens", async () => {
    const requests: { url: string; body: unknown }[] = [];
    const fetchImpl = vi.fn(async (url: string, init?: RequestInit) => {
      requests.push({ url, body: JSON.parse(String(init?.body)) });
      return new Response(
        JSON.stringify({ access_token: "new-access", refresh_token: "new-refresh", expires_in: 7200 }),
      );
    });

    const next = await refreshAccessToken({
      tokens: tokens(),
      authPath,
      fetchImpl,
      now: () => 5_000_000,
    });

    expect(requests).toEqual([
      {
        url: "https://api.workos.com/user_management/authenticate",
        body: {
          client_id: "client_TEST123",
          grant_type: "refresh_token",
          refresh_token: "old-refresh",
        },
      },
    ]);
    expect(next).toEqual({
      access_token: "new-access",
      refresh_token: "new-refresh",
      expires_in: 7200,
      obtained_at: 5_000_000,
    });
    expect(await loadAuthTokens(authPath)).toEqual(next);
    const file = JSON.parse(await readFile(authPath, "utf8")) as Record<string, unknown>;
    expect(file.session_id).toBe("s1");
  });

  test("a failed refresh leaves the file untouched", async () => {
    const fetchImpl = vi.fn(async () => new Response("nope", { status: 401 }));
    await expect(refreshAccessToken({ tokens: tokens(), authPath, fetchImpl })).rejects.toThrow(
      "Token refresh failed (HTTP 401)",
    );
    expect(await loadAuthTokens(authPath)).toEqual(tokens());
  });

  test("ensureValidToken only refreshes expiring tokens", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const fetchImpl = vi.fn(
      async () =>
        new Response(JSON.stringify({ access_token: "fresh", refresh_token: "fresh-refresh" })),
    );

    const current = await ensureValidToken({
      tokens: tokens(),
      authPath,
      fetchImpl,
      now: () => 2_000_000,
    });
    expect(current).toEqual(tokens());
    expect(fetchImpl).not.toHaveBeenCalled();

    const refreshed = await ensureValidToken({
      tokens: tokens(),
      authPath,
      fetchImpl,
      now: () => 9_000_000,
    });
    expect(refreshed.access_token).toBe("fresh");
    expect(refreshed.expires_in).toBe(21599);
    expect(refreshed.obtained_at).toBe(9_000_000);
  });
});
