import type { BuildMode, Minifier, ModuleCompiler } from "../core/types/pipeline";
import type { MinifierChoice } from "../cli/utils/minifier";

/**
 * Roots for dead code elimination.
 * - "all-source-modules": every module found in the bundle's source directory
 * - string[]: the listed module names
 */
export type EmbundleModuleRoots = "all-source-modules" | string[];

export interface EmbundleBundleConfig {
  /** Route the artifact is served under, e.g. "js/app.js". */
  route: string;
  /**
   * Directory holding the project's own modules. Every file below it ending in
   * `sourceExtension` is a source module and every file ending in `foreignExtension`
   * is a foreign companion.
   * @default "purescript"
   */
  sourceDirectory?: string;
  /** @default ".purs" */
  sourceExtension?: string;
  /** @default ".js" */
  foreignExtension?: string;
  /** @default ["bower_components/purescript-*\/src/**\/*.purs"] */
  dependencySrcGlobs?: string[];
  /** @default ["bower_components/purescript-*\/src/**\/*.js"] */
  dependencyForeignGlobs?: string[];
  /** @default "all-source-modules" */
  deadCodeElim?: EmbundleModuleRoots;
  /**
   * Global the bundle publishes its modules under.
   * @default "PS"
   */
  namespace?: string;
  /**
   * Minifier for production output. Never used in development.
   * Falls back to the top-level `minifier`.
   */
  minifier?: MinifierChoice | Minifier;
  /** Passed through to the compiler. */
  noPrelude?: boolean;
}

export interface EmbundleConfig {
  root?: string;
  /** @default ".embundle" */
  cacheDir?: string;
  /** @default "dist" */
  outDir?: string;
  mode?: BuildMode;
  /**
   * Select which minifier to use for production output.
   * - 'auto' (default): esbuild
   * - 'esbuild': esbuild's minifier
   * - 'swc': @swc/core's minifier
   * - 'none': ship the bundle as linked
   */
  minifier?: MinifierChoice;
  compiler: ModuleCompiler;
  bundles: EmbundleBundleConfig[];
}

export type EmbundleConfigExport = EmbundleConfig | Promise<EmbundleConfig>;

export interface ConfigEnv {
  mode: BuildMode;
}

export type EmbundleConfigFn = (env: ConfigEnv) => EmbundleConfigExport;
