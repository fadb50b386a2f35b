import { init, parse } from "es-module-lexer";
import { build, transform, type Plugin } from "esbuild";
import { BundleError } from "@core/errors";
import { ModuleGraph } from "@core/graph";
import type { CompiledModule, ModuleIdentity, RootSet } from "@core/types/pipeline";

export const DEFAULT_NAMESPACE = "PS";

const IDENTIFIER_RE = /^[A-Za-z_$][\w$]*$/;
const MODULE_SPEC_RE = /^\.\.\/([^/]+?)(?:\/index(?:\.js)?)?$/;
const FOREIGN_SPEC_RE = /^\.\/foreign(?:\.js)?$/;
const MODULE_SYNTAX_RE = /\b(?:import|export)\b/;

// Local name of a module's evaluated foreign companion inside its wrapper.
const FOREIGN_VAR = "__foreign";
const HOST_REQUIRE = "__require";

export interface BundleInput {
  modules: CompiledModule[];
  roots: ModuleIdentity[];
  namespace?: string;
}

export interface BundleResult {
  code: string;
  kept: ModuleIdentity[];      // in output order
  dropped: ModuleIdentity[];
}

export type ModuleReference =
  | { kind: "module"; identity: ModuleIdentity }
  | { kind: "foreign" }
  | { kind: "external"; specifier: string };

interface PreparedModule {
  identity: ModuleIdentity;
  code: string;
  foreignCode?: string;
  /** Specifier → expression for every module or foreign reference. */
  links: Map<string, string>;
  hasExternal: boolean;
}

interface ModuleLinks {
  deps: ModuleIdentity[];
  links: Map<string, string>;
  hasExternal: boolean;
}

export function resolveRoots(rootSet: RootSet, primary: ModuleIdentity[]): ModuleIdentity[] {
  const roots = rootSet.kind === "all-primary" ? primary : rootSet.modules;
  return Array.from(new Set(roots)).sort();
}

/** Returns null for relative paths that do not name a module or the foreign companion. */
export function classifySpecifier(specifier: string): ModuleReference | null {
  if (FOREIGN_SPEC_RE.test(specifier)) return { kind: "foreign" };
  const match = MODULE_SPEC_RE.exec(specifier);
  if (match?.[1]) return { kind: "module", identity: match[1] };
  if (!specifier.startsWith(".") && !specifier.startsWith("/")) {
    return { kind: "external", specifier };
  }
  return null;
}

/**
 * Specifiers of the `require` calls in `code`, sorted and unique. The code is parsed, so
 * text in strings and comments is never taken for a call.
 */
export async function scanRequires(code: string, identity: ModuleIdentity, label: string): Promise<string[]> {
  const specifiers = new Set<string>();
  const collect: Plugin = {
    name: "embundle-scan-requires",
    setup(pluginBuild) {
      pluginBuild.onResolve({ filter: /.*/ }, (args) => {
        if (args.kind === "require-call") specifiers.add(args.path);
        return { path: args.path, external: true };
      });
    },
  };
  try {
    await build({
      stdin: { contents: code, loader: "js", sourcefile: label },
      bundle: true,
      write: false,
      format: "cjs",
      logLevel: "silent",
      plugins: [collect],
    });
  } catch (err) {
    throw new BundleError(identity, `Unable to parse generated code in ${label}: ${String(err)}`, { cause: err });
  }
  return Array.from(specifiers).sort();
}

/**
 * Links are made through CommonJS `require` calls, so generated code with ES module
 * syntax is converted first.
 */
export async function toCommonJs(code: string, identity: ModuleIdentity, label: string): Promise<string> {
  if (!MODULE_SYNTAX_RE.test(code)) return code;
  await init;
  let hasModuleSyntax: boolean;
  try {
    const [imports, exports] = parse(code, label);
    hasModuleSyntax = imports.some((entry) => entry.d === -1) || exports.length > 0;
  } catch (err) {
    throw new BundleError(identity, `Unable to parse generated code in ${label}: ${String(err)}`, { cause: err });
  }
  if (!hasModuleSyntax) return code;
  try {
    const result = await transform(code, {
      loader: "js",
      format: "cjs",
      sourcefile: label,
      logLevel: "silent",
    });
    return result.code;
  } catch (err) {
    throw new BundleError(identity, `Unable to convert ${label} to CommonJS: ${String(err)}`, { cause: err });
  }
}

async function moduleLinks(
  code: string,
  identity: ModuleIdentity,
  label: string,
  hasForeign: boolean,
  known: Set<ModuleIdentity>,
  into: ModuleLinks
): Promise<void> {
  for (const specifier of await scanRequires(code, identity, label)) {
    const ref = classifySpecifier(specifier);
    if (!ref) {
      throw new BundleError(identity, `Unsupported require path "${specifier}" in module ${identity}`);
    }
    switch (ref.kind) {
      case "foreign":
        if (!hasForeign) {
          throw new BundleError(identity, `Module ${identity} requires a foreign module, but none was supplied`);
        }
        into.links.set(specifier, FOREIGN_VAR);
        break;
      case "module":
        if (!known.has(ref.identity)) {
          throw new BundleError(ref.identity, `Unable to resolve module ${ref.identity} required by ${identity}`);
        }
        into.deps.push(ref.identity);
        into.links.set(specifier, `$PS[${JSON.stringify(ref.identity)}]`);
        break;
      case "external":
        into.hasExternal = true;
        break;
    }
  }
}

function trimEnd(code: string): string {
  return code.replace(/\s+$/, "");
}

/**
 * Shadows `require` inside the wrapper so linked specifiers resolve to the namespace;
 * anything else falls through to the host's `require`, passed in as `__require`.
 */
function localRequire(mod: PreparedModule): string[] {
  const cases = Array.from(mod.links)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([specifier, target]) => `case ${JSON.stringify(specifier)}: return ${target};`);
  return [
    `function require(id) {`,
    `switch (id) {`,
    ...cases,
    `}`,
    mod.hasExternal ? `return ${HOST_REQUIRE}(id);` : `throw new Error("Cannot find module " + id);`,
    `}`,
  ];
}

function wrapModule(mod: PreparedModule, namespace: string): string {
  const passHost = mod.links.size > 0 && mod.hasExternal;
  const lines = [`// ${mod.identity}`, passHost ? `(function($PS, ${HOST_REQUIRE}) {` : `(function($PS) {`, `"use strict";`];
  if (mod.links.size > 0) lines.push(...localRequire(mod));
  if (mod.foreignCode !== undefined) {
    lines.push(
      `var ${FOREIGN_VAR} = (function() {`,
      `var module = { exports: {} };`,
      `var exports = module.exports;`,
      trimEnd(mod.foreignCode),
      `return module.exports;`,
      `})();`
    );
  }
  lines.push(
    `var module = { exports: {} };`,
    `var exports = module.exports;`,
    trimEnd(mod.code),
    `$PS[${JSON.stringify(mod.identity)}] = module.exports;`,
    passHost ? `})(${namespace}, typeof require === "function" ? require : undefined);` : `})(${namespace});`
  );
  return lines.join("\n");
}

/**
 * Links the modules reachable from `roots` into one script. Every kept module is
 * published as `<namespace>["<Module>"]`; nothing is invoked on load.
 */
export async function bundle(input: BundleInput): Promise<BundleResult> {
  const namespace = input.namespace ?? DEFAULT_NAMESPACE;
  if (!IDENTIFIER_RE.test(namespace)) {
    throw new BundleError(namespace, `Namespace "${namespace}" is not a valid JavaScript identifier`);
  }

  const known = new Set<ModuleIdentity>();
  for (const mod of input.modules) {
    if (known.has(mod.identity)) {
      throw new BundleError(mod.identity, `Module ${mod.identity} was supplied more than once`);
    }
    known.add(mod.identity);
  }

  const graph = new ModuleGraph();
  const prepared = new Map<ModuleIdentity, PreparedModule>();
  for (const mod of input.modules) {
    const label = `${mod.identity}/index.js`;
    const code = await toCommonJs(mod.generatedCode, mod.identity, label);
    const found: ModuleLinks = { deps: [], links: new Map(), hasExternal: false };
    await moduleLinks(code, mod.identity, label, mod.foreignCode !== undefined, known, found);
    const entry: PreparedModule = { identity: mod.identity, code, links: found.links, hasExternal: found.hasExternal };
    if (mod.foreignCode !== undefined) {
      const foreignLabel = `${mod.identity}/foreign.js`;
      entry.foreignCode = await toCommonJs(mod.foreignCode, mod.identity, foreignLabel);
      await moduleLinks(entry.foreignCode, mod.identity, foreignLabel, false, known, found);
      entry.hasExternal = found.hasExternal;
    }
    graph.addModule(mod.identity, found.deps);
    prepared.set(mod.identity, entry);
  }

  const reachable = graph.collectReachable(input.roots);
  const kept = graph.topologicalOrder(reachable);
  const blocks = kept.flatMap((id) => {
    const mod = prepared.get(id);
    return mod ? [wrapModule(mod, namespace)] : [];
  });
  const dropped = graph.ids().filter((id) => !reachable.has(id));

  return {
    code: [`var ${namespace} = {};`, ...blocks].join("\n") + "\n",
    kept,
    dropped,
  };
}
