import { z } from "zod";
import { readJsonFile } from "../lib/fs.ts";

const CacheFileSchema = z.object({
  // Current app versions store the cache as a JSON string inside the file.
  cache: z.union([z.string(), z.record(z.unknown())]),
});

const CacheStateSchema = z
  .object({
    documents: z.record(z.unknown()).default({}),
    transcripts: z.record(z.unknown()).default({}),
    documentPanels: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type CacheState = z.infer<typeof CacheStateSchema>;

export function parseCache(raw: unknown, source = "cache"): CacheState {
  const file = CacheFileSchema.safeParse(raw);
  if (!file.success) {
    throw new Error(`Unrecognized cache format in ${source}: missing "cache" field`);
  }

  let inner: unknown = file.data.cache;
  if (typeof inner === "string") {
    try {
      inner = JSON.parse(inner);
    } catch {
      throw new Error(`Unrecognized cache format in ${source}: "cache" is not valid JSON`);
    }
  }

  const state = z.object({ state: CacheStateSchema }).safeParse(inner);
  if (!state.success) {
    throw new Error(`Unrecognized cache format in ${source}: missing "state"`);
  }
  return state.data.state;
}

export async function loadCache(path: string): Promise<CacheState> {
  const raw = await readJsonFile(path);
  if (raw === null) {
    throw new Error(
      `Granola cache not found at ${path}. Make sure Granola is installed and has been used at least once.`,
    );
  }
  return parseCache(raw, path);
}
