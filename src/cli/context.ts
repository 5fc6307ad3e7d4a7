import { readFile } from "node:fs/promises";
import { resolveApiUrl, resolveAuthPath, resolveCachePath, resolveOutputDir } from "../auth/paths.ts";
import type { WorkosTokens } from "../auth/schema.ts";
import { ensureValidToken, loadAuthTokens, refreshAccessToken } from "../auth/store.ts";
import { loadCache, type CacheState } from "../granola/cache.ts";
import { GranolaApiClient } from "../granola/client.ts";
import type { FetchLike } from "../lib/http.ts";

export type CliContext = {
  errorMessage: (err: unknown) => string;
  resolveCachePath: (flag?: string) => string;
  resolveOutputDir: (flag?: string) => string;
  authPath: () => string;
  loadCache: (path: string) => Promise<CacheState>;
  loadTokens: () => Promise<WorkosTokens>;
  ensureValidToken: (tokens: WorkosTokens) => Promise<WorkosTokens>;
  refreshTokens: (tokens: WorkosTokens) => Promise<WorkosTokens>;
  createApiClient: (accessToken: string) => GranolaApiClient;
  fetchImpl: FetchLike;
  /** Contents of `file`, or all of stdin when no file is given. */
  readInput: (file?: string) => Promise<string>;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function readInput(file?: string): Promise<string> {
  if (!file || file === "-") {
    return readStdin();
  }
  return readFile(file, "utf8");
}

export function createCliContext(): CliContext {
  return {
    errorMessage,
    resolveCachePath,
    resolveOutputDir,
    authPath: resolveAuthPath,
    loadCache,
    loadTokens: () => loadAuthTokens(resolveAuthPath()),
    ensureValidToken: (tokens) => ensureValidToken({ tokens, authPath: resolveAuthPath() }),
    refreshTokens: (tokens) => refreshAccessToken({ tokens, authPath: resolveAuthPath() }),
    createApiClient: (accessToken) => new GranolaApiClient(accessToken, { baseUrl: resolveApiUrl() }),
    fetchImpl: (input, init) => fetch(input, init),
    readInput,
  };
}
