export * from "./types";
export { embedBundle, type EmbedContext, type EmbeddedBundle } from "./core/generator";
export { EmbeddedStatic, type Manifest, type ManifestEntry, type StaticAssetRegistry } from "./core/registry";
export { BuildPipeline, compileOptionsFor, JAVASCRIPT_MIME_TYPE, type BuildOutcome, type BuildState } from "./core/pipeline";
export { resolveTarget, DEFAULT_TARGET, type ResolvedTarget } from "./core/target";
export { bundle, DEFAULT_NAMESPACE } from "./core/bundler";
export { BuildLock } from "./core/lock";
export { clearCache, DEFAULT_CACHE_DIR } from "./core/cache";
export { formatDiagnostic, formatDiagnostics } from "./core/diagnostics";
export {
  BundleError,
  CacheError,
  CollectionError,
  CompileError,
  MinifyError,
  ParseError,
  PipelineError,
  type PipelineStage,
} from "./core/errors";
export type { BuildReport } from "./core/analyzer";
export { esbuildMinifier, swcMinifier, type MinifierChoice } from "./cli/utils/minifier";
