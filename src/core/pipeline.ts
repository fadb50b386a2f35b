import { logError, logInfo, logWarn } from "@cli/utils/logger";
import { BuildAnalyzer, type BuildReport } from "@core/analyzer";
import { bundle, resolveRoots } from "@core/bundler";
import { BuildCache } from "@core/cache";
import { collectSources } from "@core/collector";
import { formatDiagnostics } from "@core/diagnostics";
import {
  BundleError,
  CollectionError,
  CompileError,
  MinifyError,
  PipelineError,
  type PipelineStage,
} from "@core/errors";
import { runMake } from "@core/make";
import type { ResolvedTarget } from "@core/target";
import type {
  BuildArtifact,
  BuildMode,
  CompileOptions,
  Diagnostic,
  Minifier,
  ModuleCompiler,
} from "@core/types/pipeline";

export const JAVASCRIPT_MIME_TYPE = "application/javascript";

export type BuildState =
  | { status: "idle" }
  | { status: "collecting" }
  | { status: "compiling" }
  | { status: "bundling" }
  | { status: "minifying" }
  | { status: "done"; artifact: BuildArtifact }
  | { status: "failed"; stage: PipelineStage; diagnostics: Diagnostic[] };

export interface BuildPipelineOptions {
  target: ResolvedTarget;
  mode: BuildMode;
  compiler: ModuleCompiler;
  cacheRoot: string;
  /** Production only; development never minifies. */
  minifier?: Minifier | null;
  onTransition?: (state: BuildState) => void;
}

export interface BuildOutcome {
  artifact: BuildArtifact;
  report: BuildReport;
}

export function compileOptionsFor(mode: BuildMode, noPrelude = false): CompileOptions {
  if (mode === "development") {
    return { noOptimizations: true, verboseErrors: true, noPrelude };
  }
  return { noOptimizations: false, verboseErrors: false, noPrelude };
}

export function createArtifact(route: string, bytes: Buffer): BuildArtifact {
  return Object.freeze({ bytes, mimeType: JAVASCRIPT_MIME_TYPE, route });
}

function toPipelineError(stage: PipelineStage, err: unknown, target: ResolvedTarget): PipelineError {
  if (err instanceof PipelineError) return err;
  switch (stage) {
    case "collecting":
      return new CollectionError(target.sourceDirectory, err);
    case "compiling":
      return CompileError.fromThrown(err);
    case "bundling":
      return new BundleError(target.route, `Bundling failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    case "minifying":
      return new MinifyError(err);
  }
}

/**
 * Runs collect → compile → bundle → (minify) for one route in one mode. A failed
 * production build throws; a failed development build resolves to an artifact whose
 * body is the diagnostic text, so a page reload shows the error.
 */
export class BuildPipeline {
  private current: BuildState = { status: "idle" };

  constructor(private readonly options: BuildPipelineOptions) {}

  get state(): BuildState {
    return this.current;
  }

  get mode(): BuildMode {
    return this.options.mode;
  }

  private transition(next: BuildState) {
    this.current = next;
    this.options.onTransition?.(next);
  }

  async run(): Promise<BuildOutcome> {
    const status = this.current.status;
    if (status !== "idle" && status !== "done" && status !== "failed") {
      throw new Error(`Build of ${this.options.target.route} is already ${status}`);
    }
    if (status !== "idle") this.transition({ status: "idle" });

    const { target, mode, compiler } = this.options;
    const analyzer = new BuildAnalyzer(target.route, mode);
    const warnings: Diagnostic[] = [];
    let stage: PipelineStage = "collecting";
    logInfo(`Compiling ${target.route} (${mode})`);

    try {
      this.transition({ status: "collecting" });
      const sources = collectSources({
        root: target.root,
        sourceDirectory: target.sourceDirectory,
        sourceExtension: target.sourceExtension,
        foreignExtension: target.foreignExtension,
        dependencySrcGlobs: target.dependencySrcGlobs,
        dependencyForeignGlobs: target.dependencyForeignGlobs,
      });
      analyzer.recordSources([...sources.primary, ...sources.dependency, ...sources.foreign]);

      stage = "compiling";
      this.transition({ status: "compiling" });
      const cache = new BuildCache(this.options.cacheRoot, mode, target.route);
      // Production output must not depend on whatever earlier builds left behind.
      if (mode === "production") cache.reset();
      else cache.ensure();
      const made = await runMake({
        sources: [...sources.primary, ...sources.dependency],
        foreign: sources.foreign,
        compiler,
        cache,
        options: compileOptionsFor(mode, target.noPrelude),
        warnings,
      });
      analyzer.recordMake(made.compiled, made.reused);

      stage = "bundling";
      this.transition({ status: "bundling" });
      const primary = made.units.filter((unit) => unit.source.kind === "primary").map((unit) => unit.identity);
      const bundled = await bundle({
        modules: made.modules,
        roots: resolveRoots(target.roots, primary),
        namespace: target.namespace,
      });
      let bytes: Buffer = Buffer.from(bundled.code, "utf8");
      analyzer.recordBundle(bundled.kept, bundled.dropped, bytes.length);

      const minifier = this.options.minifier;
      if (mode === "production" && minifier) {
        stage = "minifying";
        this.transition({ status: "minifying" });
        try {
          bytes = await minifier(bytes);
        } catch (err) {
          throw new MinifyError(err);
        }
      }

      const artifact = createArtifact(target.route, bytes);
      const report = analyzer.finalize(bytes.length);
      this.transition({ status: "done", artifact });
      logInfo(
        `Built ${target.route} in ${report.duration}ms: ` +
          `${bundled.kept.length}/${report.modules.total} modules kept, ` +
          `${made.compiled.length} compiled, ${made.reused.length} cached ` +
          `(${analyzer.getCacheEfficiency().toFixed(0)}% from cache), ${bytes.length} bytes`
      );
      return { artifact, report };
    } catch (err) {
      const failure = toPipelineError(stage, err, target);
      analyzer.recordFailure(failure.stage);
      this.transition({ status: "failed", stage: failure.stage, diagnostics: failure.diagnostics });
      const text = formatDiagnostics(failure.diagnostics);
      logError(`Failed to build ${target.route} while ${failure.stage}:\n${text}`);
      if (mode === "production") throw failure;
      const artifact = createArtifact(target.route, Buffer.from(text, "utf8"));
      return { artifact, report: analyzer.finalize(artifact.bytes.length) };
    } finally {
      if (warnings.length) logWarn(formatDiagnostics(warnings));
    }
  }
}
