export type BuildMode = "development" | "production";

export type SourceKind = "primary" | "dependency" | "foreign";

export interface SourceFile {
  path: string;          // absolute path
  content: string;
  kind: SourceKind;
  mtimeMs: number;
}

/** Module name read from a source file's module declaration, e.g. `Data.Maybe`. */
export type ModuleIdentity = string;

export interface CompiledModule {
  identity: ModuleIdentity;
  generatedCode: string;
  foreignCode?: string;
  sourcePath: string;
}

export type RootSet =
  | { kind: "all-primary" }
  | { kind: "explicit"; modules: ModuleIdentity[] };

export interface BuildArtifact {
  readonly bytes: Buffer;
  readonly mimeType: string;
  readonly route: string;
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  code?: string;
  module?: ModuleIdentity;
  file?: string;
  line?: number;
  column?: number;
}

export interface CompileOptions {
  noOptimizations: boolean;
  verboseErrors: boolean;
  noPrelude: boolean;
}

export type CapabilityResult<T> =
  | { ok: true; value: T; warnings?: Diagnostic[] }
  | { ok: false; stage?: "parse" | "compile"; diagnostics: Diagnostic[]; warnings?: Diagnostic[] };

type MaybePromise<T> = T | Promise<T>;

/**
 * Front end for the source language. embundle never parses sources itself: it asks the
 * compiler for each file's module name and hands stale files over for compilation.
 */
export interface ModuleCompiler {
  /** Part of every cache key; bump it when the compiler's output changes. */
  readonly name: string;
  /**
   * Reads the module declaration of a source file, or the module a foreign companion
   * belongs to. Failures are reported as parse errors.
   */
  identify(file: SourceFile): MaybePromise<CapabilityResult<ModuleIdentity>>;
  /**
   * Compiles the given source files. Foreign companions of those files are included in
   * `files` with kind `"foreign"`.
   */
  compile(files: SourceFile[], options: CompileOptions): MaybePromise<CapabilityResult<CompiledModule[]>>;
}

export type Minifier = (code: Buffer) => MaybePromise<Buffer>;
