import { homedir } from "node:os";
import { join } from "node:path";

/** Directory the desktop app keeps its cache and auth files in. */
export function getGranolaDataDir(): string {
  const home = homedir();
  if (process.platform === "darwin") {
    return join(home, "Library", "Application Support", "Granola");
  }

  if (process.platform === "win32") {
    const appData = process.env.APPDATA?.trim();
    return join(appData || join(home, "AppData", "Roaming"), "Granola");
  }

  const xdg = process.env.XDG_CONFIG_HOME?.trim();
  return join(xdg || join(home, ".config"), "Granola");
}
