import path from "path";
import type { EmbundleBundleConfig } from "../types/config";
import type { RootSet } from "@core/types/pipeline";
import { DEFAULT_NAMESPACE } from "@core/bundler";

export interface ResolvedTarget {
  route: string;
  root: string;
  sourceDirectory: string;
  sourceExtension: string;
  foreignExtension: string;
  dependencySrcGlobs: string[];
  dependencyForeignGlobs: string[];
  roots: RootSet;
  namespace: string;
  noPrelude: boolean;
}

/**
 * Defaults follow a bower layout:
 *
 * - project modules and their foreign JavaScript live in `purescript/`
 * - dependencies come from `bower_components/purescript-*\/src/`
 * - every module of the source directory is a dead code elimination root, so
 *   dependency code they cannot reach is left out
 */
export const DEFAULT_TARGET: Omit<ResolvedTarget, "route" | "root"> = {
  sourceDirectory: "purescript",
  sourceExtension: ".purs",
  foreignExtension: ".js",
  dependencySrcGlobs: ["bower_components/purescript-*/src/**/*.purs"],
  dependencyForeignGlobs: ["bower_components/purescript-*/src/**/*.js"],
  roots: { kind: "all-primary" },
  namespace: DEFAULT_NAMESPACE,
  noPrelude: false,
};

export function toRootSet(value: EmbundleBundleConfig["deadCodeElim"]): RootSet {
  if (Array.isArray(value)) return { kind: "explicit", modules: [...value] };
  return { kind: "all-primary" };
}

export function resolveTarget(config: EmbundleBundleConfig, root: string): ResolvedTarget {
  return {
    route: config.route,
    root: path.resolve(root),
    sourceDirectory: config.sourceDirectory ?? DEFAULT_TARGET.sourceDirectory,
    sourceExtension: config.sourceExtension ?? DEFAULT_TARGET.sourceExtension,
    foreignExtension: config.foreignExtension ?? DEFAULT_TARGET.foreignExtension,
    dependencySrcGlobs: config.dependencySrcGlobs ?? [...DEFAULT_TARGET.dependencySrcGlobs],
    dependencyForeignGlobs: config.dependencyForeignGlobs ?? [...DEFAULT_TARGET.dependencyForeignGlobs],
    roots: config.deadCodeElim === undefined ? DEFAULT_TARGET.roots : toRootSet(config.deadCodeElim),
    namespace: config.namespace ?? DEFAULT_TARGET.namespace,
    noPrelude: config.noPrelude ?? DEFAULT_TARGET.noPrelude,
  };
}
