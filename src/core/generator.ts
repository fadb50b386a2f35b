import path from "path";
import type { BuildReport } from "@core/analyzer";
import { DEFAULT_CACHE_DIR, routeCacheDir } from "@core/cache";
import { BuildLock } from "@core/lock";
import { BuildPipeline, JAVASCRIPT_MIME_TYPE, type BuildState } from "@core/pipeline";
import type { ResolvedTarget } from "@core/target";
import type { BuildArtifact, BuildMode, Minifier, ModuleCompiler } from "@core/types/pipeline";

export interface EmbedContext {
  compiler: ModuleCompiler;
  /** Defaults to `<target.root>/.embundle`. */
  cacheRoot?: string;
  /** Used by the production producer only. */
  minifier?: Minifier | null;
  /** Builds sharing a lock never overlap on the same cache directory. */
  lock?: BuildLock;
  onTransition?: (mode: BuildMode, state: BuildState) => void;
  onReport?: (report: BuildReport) => void;
}

/** What a host static-asset registry receives for one route. */
export interface EmbeddedBundle {
  readonly route: string;
  readonly mimeType: string;
  /** One-shot production build; a failure rejects. */
  productionContent(): Promise<BuildArtifact>;
  /** Fresh development build per call; failures resolve to the diagnostic text. */
  develReload(): Promise<BuildArtifact>;
}

const sharedLock = new BuildLock();

export function embedBundle(target: ResolvedTarget, context: EmbedContext): EmbeddedBundle {
  const lock = context.lock ?? sharedLock;
  const cacheRoot = context.cacheRoot ?? path.join(target.root, DEFAULT_CACHE_DIR);
  const pipelines = new Map<BuildMode, BuildPipeline>();

  const pipelineFor = (mode: BuildMode) => {
    let pipeline = pipelines.get(mode);
    if (!pipeline) {
      pipeline = new BuildPipeline({
        target,
        mode,
        compiler: context.compiler,
        cacheRoot,
        minifier: mode === "production" ? context.minifier ?? null : null,
        onTransition: (state) => context.onTransition?.(mode, state),
      });
      pipelines.set(mode, pipeline);
    }
    return pipeline;
  };

  const produce = (mode: BuildMode) =>
    lock.run(routeCacheDir(cacheRoot, mode, target.route), async () => {
      const { artifact, report } = await pipelineFor(mode).run();
      context.onReport?.(report);
      return artifact;
    });

  return {
    route: target.route,
    mimeType: JAVASCRIPT_MIME_TYPE,
    productionContent: () => produce("production"),
    develReload: () => produce("development"),
  };
}
