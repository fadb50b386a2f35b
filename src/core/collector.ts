import fs from "fs";
import path from "path";
import fg from "fast-glob";
import { logWarn } from "@cli/utils/logger";
import { CollectionError } from "@core/errors";
import type { SourceFile, SourceKind } from "@core/types/pipeline";

export interface CollectOptions {
  root: string;
  sourceDirectory: string;
  sourceExtension: string;
  foreignExtension: string;
  dependencySrcGlobs: string[];
  dependencyForeignGlobs: string[];
}

export interface SourceCollection {
  primary: SourceFile[];
  dependency: SourceFile[];
  foreign: SourceFile[];
}

function readSourceFile(filePath: string, kind: SourceKind): SourceFile {
  try {
    const stat = fs.statSync(filePath);
    const content = fs.readFileSync(filePath, "utf8");
    return { path: filePath, content, kind, mtimeMs: stat.mtimeMs };
  } catch (err) {
    throw new CollectionError(filePath, err);
  }
}

/** Recursively lists files below `dir`, sorted by path. */
export function walkDirectory(dir: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new CollectionError(dir, err);
  }
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name === "." || entry.name === "..") continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkDirectory(full));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files.sort();
}

function expandGlobs(patterns: string[], root: string): string[] {
  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = fg.sync(pattern, { cwd: root, absolute: true, onlyFiles: true, unique: true });
    if (!matches.length) {
      logWarn(`Dependency pattern matched no files: ${pattern}`);
    }
    for (const match of matches) files.add(path.resolve(match));
  }
  return Array.from(files).sort();
}

/**
 * Reads every primary source and foreign companion below the source directory, plus the
 * dependency files matched by the configured globs. A file matched more than once keeps
 * the kind it was first collected as.
 */
export function collectSources(options: CollectOptions): SourceCollection {
  const sourceDir = path.resolve(options.root, options.sourceDirectory);
  const seen = new Set<string>();
  const collection: SourceCollection = { primary: [], dependency: [], foreign: [] };

  const take = (filePath: string, kind: SourceKind) => {
    if (seen.has(filePath)) return;
    seen.add(filePath);
    const file = readSourceFile(filePath, kind);
    collection[kind].push(file);
  };

  for (const file of walkDirectory(sourceDir)) {
    if (file.endsWith(options.sourceExtension)) take(file, "primary");
    else if (file.endsWith(options.foreignExtension)) take(file, "foreign");
  }
  for (const file of expandGlobs(options.dependencySrcGlobs, options.root)) {
    take(file, "dependency");
  }
  for (const file of expandGlobs(options.dependencyForeignGlobs, options.root)) {
    take(file, "foreign");
  }

  for (const list of [collection.primary, collection.dependency, collection.foreign]) {
    list.sort((a, b) => a.path.localeCompare(b.path));
  }
  return collection;
}
