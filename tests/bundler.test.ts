import vm from "node:vm";
import { describe, expect, it } from "vitest";
import { bundle, classifySpecifier, resolveRoots, scanRequires } from "../src/core/bundler";
import { BundleError } from "../src/core/errors";
import type { CompiledModule } from "../src/core/types/pipeline";

function compiled(identity: string, generatedCode: string, foreignCode?: string): CompiledModule {
  const mod: CompiledModule = { identity, generatedCode, sourcePath: `/project/${identity}.purs` };
  if (foreignCode !== undefined) mod.foreignCode = foreignCode;
  return mod;
}

/** Runs a bundle in a fresh context and returns its namespace as plain data. */
function evaluate(code: string, namespace = "PS"): unknown {
  const json: unknown = vm.runInNewContext(`${code}JSON.stringify(${namespace});`);
  return JSON.parse(String(json));
}

const util = compiled("Util", `exports.name = "util";\n`);
const main = compiled("Main", `var Util = require("../Util/index.js");\nexports.greeting = "hello " + Util.name;\n`);
const unused = compiled("Unused", `exports.value = 1;\n`);

describe("bundle", () => {
  it("links reachable modules under the namespace", async () => {
    const result = await bundle({ modules: [main, unused, util], roots: ["Main"] });

    expect(result.kept).toEqual(["Util", "Main"]);
    expect(result.dropped).toEqual(["Unused"]);
    expect(result.code).toBe(
      [
        `var PS = {};`,
        `// Util`,
        `(function($PS) {`,
        `"use strict";`,
        `var module = { exports: {} };`,
        `var exports = module.exports;`,
        `exports.name = "util";`,
        `$PS["Util"] = module.exports;`,
        `})(PS);`,
        `// Main`,
        `(function($PS) {`,
        `"use strict";`,
        `function require(id) {`,
        `switch (id) {`,
        `case "../Util/index.js": return $PS["Util"];`,
        `}`,
        `throw new Error("Cannot find module " + id);`,
        `}`,
        `var module = { exports: {} };`,
        `var exports = module.exports;`,
        `var Util = require("../Util/index.js");`,
        `exports.greeting = "hello " + Util.name;`,
        `$PS["Main"] = module.exports;`,
        `})(PS);`,
      ].join("\n") + "\n"
    );
    expect(evaluate(result.code)).toEqual({ Util: { name: "util" }, Main: { greeting: "hello util" } });
  });

  it("evaluates the foreign companion before its module", async () => {
    const withForeign = compiled(
      "Main",
      `var $foreign = require("./foreign.js");\nexports.answer = $foreign.answer * 2;\n`,
      `exports.answer = 21;\n`
    );
    const result = await bundle({ modules: [withForeign], roots: ["Main"], namespace: "App" });

    expect(evaluate(result.code, "App")).toEqual({ Main: { answer: 42 } });
  });

  it("converts ES module output to CommonJS before linking", async () => {
    const esm = compiled(
      "Shout",
      `import * as Util from "../Util/index.js";\nexport const shout = Util.name.toUpperCase();\n`
    );
    const result = await bundle({ modules: [esm, util], roots: ["Shout"] });

    expect(result.kept).toEqual(["Util", "Shout"]);
    expect(evaluate(result.code)).toEqual({ Util: { name: "util" }, Shout: { shout: "UTIL" } });
  });

  it("leaves require text inside strings and comments alone", async () => {
    const doc = compiled(
      "Main",
      `// require("../Gone/index.js") was inlined\nexports.doc = "call require('../Help') to load";\n`
    );
    const result = await bundle({ modules: [doc], roots: ["Main"] });

    expect(result.code).toContain(`exports.doc = "call require('../Help') to load";`);
    expect(result.code).not.toContain("function require(id)");
    expect(evaluate(result.code)).toEqual({ Main: { doc: "call require('../Help') to load" } });
  });

  it("hands bare specifiers to the host require", async () => {
    const host = compiled(
      "Main",
      `var Util = require("../Util/index.js");\nvar path = require("path");\nexports.joined = path.join(Util.name, "x");\n`
    );
    const result = await bundle({ modules: [host, util], roots: ["Main"] });
    const fakeRequire = (id: string) => {
      if (id === "path") return { join: (a: string, b: string) => `${a}/${b}` };
      throw new Error(`unexpected ${id}`);
    };

    expect(result.code).toContain(`})(PS, typeof require === "function" ? require : undefined);`);
    const json: unknown = vm.runInNewContext(`${result.code}JSON.stringify(PS.Main);`, { require: fakeRequire });
    expect(JSON.parse(String(json))).toEqual({ joined: "util/x" });
  });

  it("never calls main", async () => {
    const throwing = compiled("Main", `exports.main = function () { throw new Error("main ran"); };\nexports.ready = true;\n`);
    const result = await bundle({ modules: [throwing], roots: ["Main"] });

    expect(evaluate(result.code)).toEqual({ Main: { ready: true } });
  });

  it("fails on a reference to a module that was not compiled", async () => {
    const broken = compiled("Main", `var Missing = require("../Missing/index.js");\n`);

    await expect(bundle({ modules: [broken], roots: ["Main"] })).rejects.toThrow(
      "Unable to resolve module Missing required by Main"
    );
  });

  it("fails when a module wants a foreign companion it does not have", async () => {
    const broken = compiled("Main", `var $foreign = require("./foreign.js");\n`);

    await expect(bundle({ modules: [broken], roots: ["Main"] })).rejects.toThrow(
      "Module Main requires a foreign module, but none was supplied"
    );
  });

  it("rejects a namespace that is not an identifier", async () => {
    await expect(bundle({ modules: [util], roots: ["Util"], namespace: "my-app" })).rejects.toBeInstanceOf(BundleError);
  });

  it("rejects a module supplied twice", async () => {
    await expect(bundle({ modules: [util, util], roots: ["Util"] })).rejects.toThrow(
      "Module Util was supplied more than once"
    );
  });
});

describe("link helpers", () => {
  it("classifies require specifiers", () => {
    expect(classifySpecifier("../Data.Maybe/index.js")).toEqual({ kind: "module", identity: "Data.Maybe" });
    expect(classifySpecifier("../Data.Maybe")).toEqual({ kind: "module", identity: "Data.Maybe" });
    expect(classifySpecifier("./foreign")).toEqual({ kind: "foreign" });
    expect(classifySpecifier("fs")).toEqual({ kind: "external", specifier: "fs" });
    expect(classifySpecifier("./helpers.js")).toBeNull();
  });

  it("scans real require calls only", async () => {
    const code = `var b = require('./foreign.js');\nvar a = require("../A");\nvar s = "require('../B')";\n/* require("../C") */\n`;
    expect(await scanRequires(code, "Main", "Main/index.js")).toEqual(["../A", "./foreign.js"]);
  });

  it("reports generated code that does not parse", async () => {
    await expect(scanRequires(`var = ;`, "Main", "Main/index.js")).rejects.toBeInstanceOf(BundleError);
  });

  it("resolves roots to a sorted unique list", () => {
    expect(resolveRoots({ kind: "all-primary" }, ["Main", "App"])).toEqual(["App", "Main"]);
    expect(resolveRoots({ kind: "explicit", modules: ["B", "A", "B"] }, ["Main"])).toEqual(["A", "B"]);
  });
});
