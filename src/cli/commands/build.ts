import fs from "fs";
import path from "path";
import { logInfo, logWarn } from "@cli/utils/logger";
import { loadEmbundleConfig } from "@cli/utils/config";
import { selectMinifier } from "@cli/utils/minifier";
import { resolveBuildMode } from "@cli/utils/mode";
import type { BuildReport } from "@core/analyzer";
import { DEFAULT_CACHE_DIR } from "@core/cache";
import { embedBundle } from "@core/generator";
import { EmbeddedStatic, type Manifest } from "@core/registry";
import { resolveTarget } from "@core/target";
import type { BuildMode } from "@core/types/pipeline";

export interface BuildOptions {
  cwd?: string;
  config?: string;
  outDir?: string;
  mode?: string;
  minifier?: string;
}

export interface BuildSummary {
  mode: BuildMode;
  outDir: string;
  manifest: Manifest;
  reports: BuildReport[];
}

export async function runBuildCommand(options: BuildOptions = {}): Promise<BuildSummary> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const modeOptions = {
    cliFlag: options.mode,
    envMode: process.env.EMBUNDLE_MODE,
    nodeEnv: process.env.NODE_ENV,
  };
  const loaded = await loadEmbundleConfig(cwd, {
    configFile: options.config,
    mode: resolveBuildMode(undefined, modeOptions),
  });
  if (!loaded) {
    throw new Error(`No embundle.config.* found in ${cwd}`);
  }
  const { config } = loaded;
  const configDir = path.dirname(loaded.path);
  const mode = resolveBuildMode(config.mode, modeOptions);
  const root = path.resolve(configDir, config.root ?? ".");
  const cacheRoot = path.resolve(root, config.cacheDir ?? DEFAULT_CACHE_DIR);
  const outDir = path.resolve(cwd, options.outDir ?? config.outDir ?? "dist");

  const reports: BuildReport[] = [];
  const registry = new EmbeddedStatic(mode);
  for (const bundle of config.bundles) {
    const minifier = selectMinifier(bundle.minifier, config.minifier, {
      cliFlag: options.minifier,
      envVar: process.env.EMBUNDLE_MINIFIER,
    });
    registry.register(
      embedBundle(resolveTarget(bundle, root), {
        compiler: config.compiler,
        cacheRoot,
        minifier,
        onReport: (report) => reports.push(report),
      })
    );
  }

  logInfo(`Building ${config.bundles.length} bundle(s) in ${mode} mode`);
  const manifest = await registry.writeTo(outDir);
  fs.writeFileSync(
    path.join(outDir, "build.stats.json"),
    JSON.stringify({ mode, reports }, null, 2),
    "utf8"
  );

  const failed = reports.filter((report) => report.status === "failed");
  for (const report of failed) {
    logWarn(`${report.route} failed while ${report.failedStage ?? "building"}; its output holds the diagnostics`);
  }
  logInfo(`Output written to ${path.relative(cwd, outDir) || "."}`);
  return { mode, outDir, manifest, reports };
}
