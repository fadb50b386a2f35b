import type { Diagnostic, ModuleIdentity } from "./types/pipeline";

export type PipelineStage = "collecting" | "compiling" | "bundling" | "minifying";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Base of every error that ends a build attempt. */
export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;

  constructor(
    message: string,
    public readonly diagnostics: Diagnostic[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CollectionError extends PipelineError {
  readonly stage = "collecting";

  constructor(public readonly path: string, cause: unknown) {
    const message = `Unable to read ${path}: ${describe(cause)}`;
    super(message, [{ severity: "error", code: "CollectionError", file: path, message: describe(cause) }], { cause });
    this.name = "CollectionError";
  }
}

export class ParseError extends PipelineError {
  readonly stage = "compiling";

  constructor(diagnostics: Diagnostic[]) {
    super(`Error parsing sources (${diagnostics.length} diagnostic(s))`, diagnostics);
    this.name = "ParseError";
  }
}

export class CompileError extends PipelineError {
  readonly stage = "compiling";

  constructor(diagnostics: Diagnostic[], options?: { cause?: unknown }) {
    super(`Error compiling sources (${diagnostics.length} diagnostic(s))`, diagnostics, options);
    this.name = "CompileError";
  }

  static fromThrown(err: unknown): CompileError {
    return new CompileError([{ severity: "error", code: "CompileError", message: describe(err) }], { cause: err });
  }
}

export class CacheError extends PipelineError {
  readonly stage = "compiling";

  constructor(public readonly directory: string, cause: unknown) {
    const message = `Build cache at ${directory} is unusable: ${describe(cause)}`;
    super(message, [{ severity: "error", code: "CacheError", file: directory, message: describe(cause) }], { cause });
    this.name = "CacheError";
  }
}

export class BundleError extends PipelineError {
  readonly stage = "bundling";

  constructor(public readonly identifier: ModuleIdentity, message: string, options?: { cause?: unknown }) {
    super(message, [{ severity: "error", code: "BundleError", module: identifier, message }], options);
    this.name = "BundleError";
  }
}

export class MinifyError extends PipelineError {
  readonly stage = "minifying";

  constructor(cause: unknown) {
    const message = `Minifier failed: ${describe(cause)}`;
    super(message, [{ severity: "error", code: "MinifyError", message: describe(cause) }], { cause });
    this.name = "MinifyError";
  }
}
