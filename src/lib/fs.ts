import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { isRecord } from "./object-type-guards.ts";

/**
 * Reads and parses a JSON file. Returns null when the file does not exist;
 * malformed JSON is reported with the offending path.
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) {
      return null;
    }
    throw err;
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${path}: ${reason}`);
  }
}

export async function writeJsonFile(
  path: string,
  data: unknown,
  options?: { mode?: number },
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, { mode: options?.mode ?? 0o600 });
}

export async function writeTextFile(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, "utf8");
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return isRecord(err) && err.code === code;
}
