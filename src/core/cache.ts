import fs from "fs";
import path from "path";
import crypto from "crypto";
import { logDebug } from "@cli/utils/logger";
import { CacheError } from "@core/errors";
import type { BuildMode, CompiledModule, ModuleIdentity } from "@core/types/pipeline";

const CACHE_VERSION = 1;

export const DEFAULT_CACHE_DIR = ".embundle";

const MODE_DIRS: Record<BuildMode, string> = {
  development: "dev",
  production: "prod",
};

/** Everything a cached module must agree on to be reused. */
export interface CacheKey {
  compiler: string;
  identity: ModuleIdentity;
  sourcePath: string;
  mtimeMs: number;
  foreignPath: string | null;
  foreignMtimeMs: number | null;
}

interface CacheRecord extends CacheKey {
  version: typeof CACHE_VERSION;
}

/** Deterministic content hash, used for artifact names and manifests. */
export function getCacheKey(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

/** Readable directory name for a route, suffixed with a hash so distinct routes never share one. */
export function routeSlug(route: string): string {
  const readable = route.replace(/^\/+/, "").replace(/[^A-Za-z0-9._-]+/g, "_") || "_";
  return `${readable}-${getCacheKey(route).slice(0, 12)}`;
}

export function modeCacheDir(cacheRoot: string, mode: BuildMode): string {
  return path.join(cacheRoot, MODE_DIRS[mode]);
}

export function routeCacheDir(cacheRoot: string, mode: BuildMode, route: string): string {
  return path.join(modeCacheDir(cacheRoot, mode), routeSlug(route));
}

function sameKey(record: CacheRecord, key: CacheKey): boolean {
  return (
    record.version === CACHE_VERSION &&
    record.compiler === key.compiler &&
    record.identity === key.identity &&
    record.sourcePath === key.sourcePath &&
    record.mtimeMs === key.mtimeMs &&
    record.foreignPath === key.foreignPath &&
    record.foreignMtimeMs === key.foreignMtimeMs
  );
}

function parseRecord(raw: string): CacheRecord | null {
  const value: unknown = JSON.parse(raw);
  if (!value || typeof value !== "object") return null;
  const record: Partial<Record<keyof CacheRecord, unknown>> = value;
  if (
    record.version !== CACHE_VERSION ||
    typeof record.compiler !== "string" ||
    typeof record.identity !== "string" ||
    typeof record.sourcePath !== "string" ||
    typeof record.mtimeMs !== "number"
  ) {
    return null;
  }
  const foreignPath = typeof record.foreignPath === "string" ? record.foreignPath : null;
  const foreignMtimeMs = typeof record.foreignMtimeMs === "number" ? record.foreignMtimeMs : null;
  return {
    version: CACHE_VERSION,
    compiler: record.compiler,
    identity: record.identity,
    sourcePath: record.sourcePath,
    mtimeMs: record.mtimeMs,
    foreignPath,
    foreignMtimeMs,
  };
}

/**
 * Per-module compiler output for one route in one build mode, laid out as
 * `<cacheRoot>/<dev|prod>/<route>/<Module>/{index.js,foreign.js,cache.json}`.
 */
export class BuildCache {
  readonly dir: string;

  constructor(cacheRoot: string, readonly mode: BuildMode, route: string) {
    this.dir = routeCacheDir(cacheRoot, mode, route);
  }

  private moduleDir(identity: ModuleIdentity): string {
    return path.join(this.dir, identity);
  }

  /** Creates the directory when missing; existing entries are kept. */
  ensure() {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
    } catch (err) {
      throw new CacheError(this.dir, err);
    }
  }

  /** Wipes every entry and recreates an empty directory. */
  reset() {
    try {
      fs.rmSync(this.dir, { recursive: true, force: true });
      fs.mkdirSync(this.dir, { recursive: true });
    } catch (err) {
      throw new CacheError(this.dir, err);
    }
  }

  entries(): ModuleIdentity[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs
      .readdirSync(this.dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  lookup(key: CacheKey): CompiledModule | null {
    const dir = this.moduleDir(key.identity);
    const recordFile = path.join(dir, "cache.json");
    if (!fs.existsSync(recordFile)) return null;
    let record: CacheRecord | null;
    try {
      record = parseRecord(fs.readFileSync(recordFile, "utf8"));
    } catch (err) {
      logDebug(`Ignoring unreadable cache record for ${key.identity}: ${String(err)}`);
      return null;
    }
    if (!record || !sameKey(record, key)) return null;

    const codeFile = path.join(dir, "index.js");
    const foreignFile = path.join(dir, "foreign.js");
    if (!fs.existsSync(codeFile)) return null;
    const compiled: CompiledModule = {
      identity: key.identity,
      generatedCode: fs.readFileSync(codeFile, "utf8"),
      sourcePath: key.sourcePath,
    };
    if (fs.existsSync(foreignFile)) {
      compiled.foreignCode = fs.readFileSync(foreignFile, "utf8");
    }
    return compiled;
  }

  /** Replaces whatever was stored for the module's identity. */
  store(key: CacheKey, compiled: CompiledModule) {
    const dir = this.moduleDir(key.identity);
    const record: CacheRecord = { version: CACHE_VERSION, ...key };
    try {
      fs.rmSync(dir, { recursive: true, force: true });
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(path.join(dir, "index.js"), compiled.generatedCode, "utf8");
      if (compiled.foreignCode !== undefined) {
        fs.writeFileSync(path.join(dir, "foreign.js"), compiled.foreignCode, "utf8");
      }
      // Written last so a half-written entry never looks valid.
      fs.writeFileSync(path.join(dir, "cache.json"), JSON.stringify(record, null, 2), "utf8");
    } catch (err) {
      throw new CacheError(dir, err);
    }
  }

  /** Drops entries for modules that are no longer part of the build. */
  prune(keep: Set<ModuleIdentity>): ModuleIdentity[] {
    const removed: ModuleIdentity[] = [];
    for (const identity of this.entries()) {
      if (keep.has(identity)) continue;
      try {
        fs.rmSync(this.moduleDir(identity), { recursive: true, force: true });
      } catch (err) {
        throw new CacheError(this.moduleDir(identity), err);
      }
      removed.push(identity);
    }
    return removed;
  }
}

/** Removes the whole cache root, both modes included. */
export function clearCache(cacheRoot: string) {
  if (fs.existsSync(cacheRoot)) {
    fs.rmSync(cacheRoot, { recursive: true, force: true });
  }
}
