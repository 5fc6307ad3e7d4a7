import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

let cachedVersion: string | undefined;

export function getPackageVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  const envVersion = process.env.npm_package_version?.trim();
  if (envVersion) {
    cachedVersion = envVersion;
    return cachedVersion;
  }

  // Walk up from src/lib until the nearest package.json.
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 6; i++) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      cachedVersion = readVersionField(candidate);
      return cachedVersion;
    }
    const next = dirname(dir);
    if (next === dir) {
      break;
    }
    dir = next;
  }
  cachedVersion = "0.0.0";
  return cachedVersion;
}

function readVersionField(path: string): string {
  try {
    const pkg = JSON.parse(readFileSync(path, "utf8")) as { version?: unknown };
    const v = typeof pkg.version === "string" ? pkg.version.trim() : "";
    return v || "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export function getUserAgent(): string {
  return `granola-md/${getPackageVersion()}`;
}
