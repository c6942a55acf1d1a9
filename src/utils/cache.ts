import * as os from "os";
import * as path from "path";

export function getCacheDirectory(): string {
  const platform = os.platform();
  const homedir = os.homedir();

  switch (platform) {
    case "win32":
      return process.env.LOCALAPPDATA || path.join(homedir, "AppData", "Local");
    case "darwin":
      return path.join(homedir, "Library", "Caches");
    case "linux":
    default:
      return process.env.XDG_CACHE_HOME || path.join(homedir, ".cache");
  }
}

/**
 * Maps the `:cache:` placeholder to the per-user vector database file.
 * Any other value (including `:memory:`) passes through untouched.
 */
export function resolveCachePath(dbPath: string): string {
  if (dbPath === ":cache:") {
    return path.join(getCacheDirectory(), "course-rag", "vectors.db");
  }
  return dbPath;
}
