import { logDebug } from "@cli/utils/logger";
import type { BuildCache, CacheKey } from "@core/cache";
import { CompileError, ParseError } from "@core/errors";
import type {
  CapabilityResult,
  CompileOptions,
  CompiledModule,
  Diagnostic,
  ModuleCompiler,
  ModuleIdentity,
  SourceFile,
} from "@core/types/pipeline";

export interface MakeInput {
  sources: SourceFile[];   // primary and dependency files
  foreign: SourceFile[];
  compiler: ModuleCompiler;
  cache: BuildCache;
  options: CompileOptions;
  /** Receives compiler warnings, including those of a failed attempt. */
  warnings?: Diagnostic[];
}

export interface ModuleUnit {
  identity: ModuleIdentity;
  source: SourceFile;
  foreign: SourceFile | null;
}

export interface MakeResult {
  modules: CompiledModule[];
  units: ModuleUnit[];
  compiled: ModuleIdentity[];
  reused: ModuleIdentity[];
  warnings: Diagnostic[];
}

export function isValidIdentity(identity: string): boolean {
  return identity.length > 0 && identity !== "." && identity !== ".." && !/[\\/]/.test(identity);
}

function failureToError(result: Extract<CapabilityResult<unknown>, { ok: false }>, fallback: "parse" | "compile") {
  const stage = result.stage ?? fallback;
  return stage === "parse" ? new ParseError(result.diagnostics) : new CompileError(result.diagnostics);
}

async function identifyAll(compiler: ModuleCompiler, files: SourceFile[], warnings: Diagnostic[]) {
  const identities = new Map<SourceFile, ModuleIdentity>();
  const errors: Diagnostic[] = [];
  for (const file of files) {
    let result: CapabilityResult<ModuleIdentity>;
    try {
      result = await compiler.identify(file);
    } catch (err) {
      throw CompileError.fromThrown(err);
    }
    if (result.warnings) warnings.push(...result.warnings);
    if (!result.ok) {
      if (result.stage === "compile") throw failureToError(result, "compile");
      errors.push(...result.diagnostics);
      continue;
    }
    if (!isValidIdentity(result.value)) {
      errors.push({ severity: "error", code: "InvalidModuleName", file: file.path, message: `Invalid module name "${result.value}"` });
      continue;
    }
    identities.set(file, result.value);
  }
  if (errors.length) throw new ParseError(errors);
  return identities;
}

/** Pairs every module with its source file and foreign companion. */
export async function resolveUnits(
  compiler: ModuleCompiler,
  sources: SourceFile[],
  foreign: SourceFile[],
  warnings: Diagnostic[] = []
): Promise<ModuleUnit[]> {
  const sourceIds = await identifyAll(compiler, sources, warnings);
  const foreignIds = await identifyAll(compiler, foreign, warnings);

  const units = new Map<ModuleIdentity, ModuleUnit>();
  const errors: Diagnostic[] = [];
  for (const [file, identity] of sourceIds) {
    const existing = units.get(identity);
    if (existing) {
      errors.push({
        severity: "error",
        code: "DuplicateModule",
        module: identity,
        file: file.path,
        message: `Module ${identity} is also defined in ${existing.source.path}`,
      });
      continue;
    }
    units.set(identity, { identity, source: file, foreign: null });
  }

  for (const [file, identity] of foreignIds) {
    const unit = units.get(identity);
    if (!unit) {
      warnings.push({
        severity: "warning",
        code: "UnnecessaryForeignModule",
        module: identity,
        file: file.path,
        message: `Foreign module for ${identity} has no matching source module`,
      });
      continue;
    }
    if (unit.foreign) {
      errors.push({
        severity: "error",
        code: "MultipleForeignModules",
        module: identity,
        file: file.path,
        message: `Module ${identity} already has a foreign module at ${unit.foreign.path}`,
      });
      continue;
    }
    unit.foreign = file;
  }
  if (errors.length) throw new CompileError(errors);

  return Array.from(units.values()).sort((a, b) => a.identity.localeCompare(b.identity));
}

function keyFor(compiler: ModuleCompiler, unit: ModuleUnit): CacheKey {
  return {
    compiler: compiler.name,
    identity: unit.identity,
    sourcePath: unit.source.path,
    mtimeMs: unit.source.mtimeMs,
    foreignPath: unit.foreign?.path ?? null,
    foreignMtimeMs: unit.foreign?.mtimeMs ?? null,
  };
}

/**
 * Serves unchanged modules from the cache and hands the rest to the compiler in one
 * call. The compiler is not invoked when every module is fresh.
 */
export async function runMake(input: MakeInput): Promise<MakeResult> {
  const { compiler, cache } = input;
  const warnings = input.warnings ?? [];
  const units = await resolveUnits(compiler, input.sources, input.foreign, warnings);

  const modules = new Map<ModuleIdentity, CompiledModule>();
  const stale: ModuleUnit[] = [];
  const reused: ModuleIdentity[] = [];
  for (const unit of units) {
    const cached = cache.lookup(keyFor(compiler, unit));
    if (cached) {
      logDebug(`cache hit ${unit.identity}`);
      modules.set(unit.identity, cached);
      reused.push(unit.identity);
    } else {
      logDebug(`cache miss ${unit.identity}`);
      stale.push(unit);
    }
  }

  if (stale.length) {
    const files: SourceFile[] = [];
    for (const unit of stale) {
      files.push(unit.source);
      if (unit.foreign) files.push(unit.foreign);
    }

    let result: CapabilityResult<CompiledModule[]>;
    try {
      result = await compiler.compile(files, input.options);
    } catch (err) {
      throw CompileError.fromThrown(err);
    }
    if (result.warnings) warnings.push(...result.warnings);
    if (!result.ok) throw failureToError(result, "compile");

    const produced = new Map(result.value.map((mod) => [mod.identity, mod]));
    const missing: Diagnostic[] = [];
    for (const unit of stale) {
      const mod = produced.get(unit.identity);
      if (!mod) {
        missing.push({
          severity: "error",
          code: "MissingOutput",
          module: unit.identity,
          file: unit.source.path,
          message: `Compiler ${compiler.name} produced no output for ${unit.identity}`,
        });
        continue;
      }
      const compiled: CompiledModule = {
        identity: unit.identity,
        generatedCode: mod.generatedCode,
        sourcePath: unit.source.path,
      };
      const foreignCode = mod.foreignCode ?? unit.foreign?.content;
      if (foreignCode !== undefined) compiled.foreignCode = foreignCode;
      cache.store(keyFor(compiler, unit), compiled);
      modules.set(unit.identity, compiled);
    }
    if (missing.length) throw new CompileError(missing);
  }

  cache.prune(new Set(units.map((unit) => unit.identity)));

  return {
    modules: units.flatMap((unit) => {
      const mod = modules.get(unit.identity);
      return mod ? [mod] : [];
    }),
    units,
    compiled: stale.map((unit) => unit.identity),
    reused,
    warnings,
  };
}
