import path from "path";
import { logInfo } from "@cli/utils/logger";
import { loadEmbundleConfig } from "@cli/utils/config";
import { DEFAULT_CACHE_DIR, clearCache } from "@core/cache";

export interface CleanOptions {
  cwd?: string;
  config?: string;
}

/** Removes the cache root of the project, both modes included. */
export async function runCleanCommand(options: CleanOptions = {}): Promise<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const loaded = await loadEmbundleConfig(cwd, { configFile: options.config, mode: "production" });
  let cacheRoot = path.join(cwd, DEFAULT_CACHE_DIR);
  if (loaded) {
    const root = path.resolve(path.dirname(loaded.path), loaded.config.root ?? ".");
    cacheRoot = path.resolve(root, loaded.config.cacheDir ?? DEFAULT_CACHE_DIR);
  }
  clearCache(cacheRoot);
  logInfo(`Removed ${cacheRoot}`);
  return cacheRoot;
}
