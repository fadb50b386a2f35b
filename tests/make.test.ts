import fs from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { BuildCache } from "../src/core/cache";
import { CompileError, ParseError } from "../src/core/errors";
import { isValidIdentity, resolveUnits, runMake } from "../src/core/make";
import type { Diagnostic, SourceFile } from "../src/core/types/pipeline";
import { ToyCompiler, makeTempProject } from "./helpers/toy-compiler";

const OPTIONS = { noOptimizations: true, verboseErrors: true, noPrelude: false };

function file(filePath: string, content: string, kind: SourceFile["kind"] = "primary", mtimeMs = 1): SourceFile {
  return { path: filePath, content, kind, mtimeMs };
}

describe("resolveUnits", () => {
  it("pairs modules with their foreign companions", async () => {
    const units = await resolveUnits(
      new ToyCompiler(),
      [file("/p/Util.purs", "module Util\n"), file("/p/Main.purs", "module Main\n")],
      [file("/p/Main.js", "// module Main\n", "foreign")]
    );

    expect(units.map((unit) => [unit.identity, unit.foreign?.path ?? null])).toEqual([
      ["Main", "/p/Main.js"],
      ["Util", null],
    ]);
  });

  it("rejects two files declaring the same module", async () => {
    const run = resolveUnits(
      new ToyCompiler(),
      [file("/p/A/Main.purs", "module Main\n"), file("/p/B/Main.purs", "module Main\n")],
      []
    );

    await expect(run).rejects.toBeInstanceOf(CompileError);
    await expect(run).rejects.toMatchObject({
      diagnostics: [{ code: "DuplicateModule", module: "Main", file: "/p/B/Main.purs" }],
    });
  });

  it("warns about a foreign module without a source module", async () => {
    const warnings: Diagnostic[] = [];
    await resolveUnits(new ToyCompiler(), [], [file("/p/Orphan.js", "// module Orphan\n", "foreign")], warnings);

    expect(warnings).toEqual([
      {
        severity: "warning",
        code: "UnnecessaryForeignModule",
        module: "Orphan",
        file: "/p/Orphan.js",
        message: "Foreign module for Orphan has no matching source module",
      },
    ]);
  });

  it("reports a missing module header as a parse error", async () => {
    await expect(resolveUnits(new ToyCompiler(), [file("/p/Bad.purs", "import Main\n")], [])).rejects.toBeInstanceOf(
      ParseError
    );
  });

  it("accepts dotted module names but not paths", () => {
    expect(isValidIdentity("Data.Maybe")).toBe(true);
    expect(isValidIdentity("../Main")).toBe(false);
    expect(isValidIdentity("")).toBe(false);
  });
});

describe("runMake", () => {
  let root = "";

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("compiles stale modules in one call and reuses the rest", async () => {
    root = makeTempProject();
    const compiler = new ToyCompiler();
    const cache = new BuildCache(root, "development", "js/app.js");
    cache.ensure();
    const sources = [file("/p/Main.purs", "module Main\nimport Util\n"), file("/p/Util.purs", "module Util\n")];
    const foreign = [file("/p/Main.js", "// module Main\nexports.x = 1;\n", "foreign")];

    const first = await runMake({ sources, foreign, compiler, cache, options: OPTIONS });
    expect(first.compiled).toEqual(["Main", "Util"]);
    expect(first.reused).toEqual([]);
    expect(first.modules.find((mod) => mod.identity === "Main")?.foreignCode).toBe("// module Main\nexports.x = 1;\n");

    const second = await runMake({ sources, foreign, compiler, cache, options: OPTIONS });
    expect(compiler.compileCalls).toBe(1);
    expect(second.compiled).toEqual([]);
    expect(second.reused).toEqual(["Main", "Util"]);
    expect(second.modules).toEqual(first.modules);
  });

  it("drops cache entries of modules that disappeared", async () => {
    root = makeTempProject();
    const compiler = new ToyCompiler();
    const cache = new BuildCache(root, "development", "js/app.js");
    cache.ensure();

    await runMake({
      sources: [file("/p/Main.purs", "module Main\n"), file("/p/Old.purs", "module Old\n")],
      foreign: [],
      compiler,
      cache,
      options: OPTIONS,
    });
    await runMake({ sources: [file("/p/Main.purs", "module Main\n")], foreign: [], compiler, cache, options: OPTIONS });

    expect(cache.entries()).toEqual(["Main"]);
    expect(fs.existsSync(path.join(cache.dir, "Old"))).toBe(false);
  });

  it("wraps a compiler that throws", async () => {
    root = makeTempProject();
    const cache = new BuildCache(root, "development", "js/app.js");
    cache.ensure();
    const compiler = new ToyCompiler();
    compiler.compile = () => {
      throw new Error("compiler crashed");
    };

    await expect(
      runMake({ sources: [file("/p/Main.purs", "module Main\n")], foreign: [], compiler, cache, options: OPTIONS })
    ).rejects.toMatchObject({
      diagnostics: [{ severity: "error", code: "CompileError", message: "compiler crashed" }],
    });
  });
});
