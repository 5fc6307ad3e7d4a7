import { join } from "node:path";
import { getGranolaDataDir } from "../lib/app-dir.ts";

export const GRANOLA_API_URL = "https://api.granola.ai";
export const WORKOS_AUTH_URL = "https://api.workos.com/user_management/authenticate";

export function resolveCachePath(flag?: string): string {
  return (
    flag?.trim() ||
    process.env.GRANOLA_CACHE_PATH?.trim() ||
    join(getGranolaDataDir(), "cache-v3.json")
  );
}

export function resolveAuthPath(): string {
  return process.env.GRANOLA_AUTH_PATH?.trim() || join(getGranolaDataDir(), "supabase.json");
}

export function resolveApiUrl(): string {
  return (process.env.GRANOLA_API_URL?.trim() || GRANOLA_API_URL).replace(/\/$/, "");
}

export function resolveOutputDir(flag?: string): string {
  return (
    flag?.trim() || process.env.GRANOLA_OUTPUT_DIR?.trim() || join(process.cwd(), "granola-backup")
  );
}
