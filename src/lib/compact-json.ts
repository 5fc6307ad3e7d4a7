import { isRecord } from "./object-type-guards.ts";

type Pruned = string | number | boolean | Pruned[] | { [key: string]: Pruned };

/**
 * Drops null, undefined, blank strings and containers left empty after
 * pruning, so CLI JSON output only shows fields that carry something.
 */
export function pruneEmpty(value: unknown): Pruned | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === "string") {
    return value.trim() === "" ? undefined : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    const items = value.map(pruneEmpty).filter((v): v is Pruned => v !== undefined);
    return items.length === 0 ? undefined : items;
  }
  if (isRecord(value)) {
    const out: { [key: string]: Pruned } = {};
    for (const [key, child] of Object.entries(value)) {
      const next = pruneEmpty(child);
      if (next !== undefined) {
        out[key] = next;
      }
    }
    return Object.keys(out).length === 0 ? undefined : out;
  }
  return undefined;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(pruneEmpty(value) ?? {}, null, 2));
}
