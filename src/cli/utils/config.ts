import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { build, type Plugin } from "esbuild";
import type { EmbundleBundleConfig, EmbundleConfig } from "../../types/config";
import type { BuildMode, ModuleCompiler } from "@core/types/pipeline";
import { logInfo } from "./logger";

export const CONFIG_BASENAMES = [
  "embundle.config.ts",
  "embundle.config.mts",
  "embundle.config.js",
  "embundle.config.mjs",
  "embundle.config.cjs",
];

// Config files import `defineConfig` from "embundle"; serve it from memory so the
// project does not need the package resolvable from its own directory.
const inlineEmbundlePlugin: Plugin = {
  name: "inline-embundle",
  setup(pluginBuild) {
    pluginBuild.onResolve({ filter: /^embundle$/ }, () => ({
      path: "embundle-virtual",
      namespace: "embundle-ns",
    }));
    pluginBuild.onLoad({ filter: /.*/, namespace: "embundle-ns" }, () => ({
      contents: `
        export function defineConfig(config) {
          return config;
        }
      `,
      loader: "js",
    }));
  },
};

// Bundle the config file into a single ESM string that can be `import()`ed.
async function bundleConfig(entry: string) {
  const absDir = path.dirname(entry);
  const result = await build({
    entryPoints: [entry],
    bundle: true,
    platform: "node",
    format: "esm",
    sourcemap: "inline",
    write: false,
    target: "node20",
    logLevel: "silent",
    absWorkingDir: absDir,
    plugins: [inlineEmbundlePlugin],
  });
  const output = result.outputFiles?.[0];
  if (!output) throw new Error("Failed to bundle embundle config");

  let contents = output.text;
  if (contents.includes("import.meta.url")) {
    contents = contents.replace(/import\.meta\.url/g, "__EMBUNDLE_IMPORT_META_URL");
    contents = `const __EMBUNDLE_IMPORT_META_URL = ${JSON.stringify(pathToFileURL(entry).href)};\n${contents}`;
  }
  const preamble =
    `const __dirname = ${JSON.stringify(absDir)};\n` +
    `const __filename = ${JSON.stringify(entry)};\n`;
  return preamble + contents;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_BASENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isModuleCompiler(value: unknown): value is ModuleCompiler {
  return (
    isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.identify === "function" &&
    typeof value.compile === "function"
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new Error(`${field} must be a string`);
  return value;
}

function optionalStrings(value: unknown, field: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!isStringArray(value)) throw new Error(`${field} must be an array of strings`);
  return value;
}

function validateBundle(value: unknown, index: number): EmbundleBundleConfig {
  const at = `bundles[${index}]`;
  if (!isRecord(value)) throw new Error(`${at} must be an object`);
  if (typeof value.route !== "string" || !value.route) {
    throw new Error(`${at}.route must be a non-empty string`);
  }
  const bundle: EmbundleBundleConfig = { route: value.route };
  bundle.sourceDirectory = optionalString(value.sourceDirectory, `${at}.sourceDirectory`);
  bundle.sourceExtension = optionalString(value.sourceExtension, `${at}.sourceExtension`);
  bundle.foreignExtension = optionalString(value.foreignExtension, `${at}.foreignExtension`);
  bundle.dependencySrcGlobs = optionalStrings(value.dependencySrcGlobs, `${at}.dependencySrcGlobs`);
  bundle.dependencyForeignGlobs = optionalStrings(value.dependencyForeignGlobs, `${at}.dependencyForeignGlobs`);
  bundle.namespace = optionalString(value.namespace, `${at}.namespace`);

  const roots = value.deadCodeElim;
  if (roots === "all-source-modules" || isStringArray(roots)) {
    bundle.deadCodeElim = roots;
  } else if (roots !== undefined) {
    throw new Error(`${at}.deadCodeElim must be "all-source-modules" or a list of module names`);
  }

  const minifier = value.minifier;
  if (minifier === "esbuild" || minifier === "swc" || minifier === "none" || minifier === "auto") {
    bundle.minifier = minifier;
  } else if (typeof minifier === "function") {
    bundle.minifier = async (code: Buffer) => {
      const out: unknown = await minifier(code);
      if (!Buffer.isBuffer(out)) throw new Error(`Minifier for ${bundle.route} did not return a Buffer`);
      return out;
    };
  } else if (minifier !== undefined) {
    throw new Error(`${at}.minifier must be a minifier name or function`);
  }

  if (value.noPrelude !== undefined) {
    if (typeof value.noPrelude !== "boolean") throw new Error(`${at}.noPrelude must be a boolean`);
    bundle.noPrelude = value.noPrelude;
  }
  return bundle;
}

/** Narrows whatever the config module exported into an EmbundleConfig. */
export function validateConfig(value: unknown): EmbundleConfig {
  if (!isRecord(value)) throw new Error("Config did not export an object");
  if (!isModuleCompiler(value.compiler)) {
    throw new Error("config.compiler must provide name, identify() and compile()");
  }
  if (!Array.isArray(value.bundles) || value.bundles.length === 0) {
    throw new Error("config.bundles must list at least one bundle");
  }
  const config: EmbundleConfig = {
    compiler: value.compiler,
    bundles: value.bundles.map((bundle: unknown, index) => validateBundle(bundle, index)),
  };
  config.root = optionalString(value.root, "config.root");
  config.cacheDir = optionalString(value.cacheDir, "config.cacheDir");
  config.outDir = optionalString(value.outDir, "config.outDir");
  if (value.mode === "development" || value.mode === "production") {
    config.mode = value.mode;
  } else if (value.mode !== undefined) {
    throw new Error(`config.mode must be "development" or "production"`);
  }
  const minifier = value.minifier;
  if (minifier === "esbuild" || minifier === "swc" || minifier === "none" || minifier === "auto") {
    config.minifier = minifier;
  } else if (minifier !== undefined) {
    throw new Error("config.minifier must be one of esbuild, swc, none, auto");
  }
  return config;
}

export interface LoadConfigOptions {
  /** Explicit config path; otherwise the first embundle.config.* in cwd. */
  configFile?: string;
  /** Passed to config functions. */
  mode: BuildMode;
}

export interface LoadedConfig {
  config: EmbundleConfig;
  path: string;
}

export async function loadEmbundleConfig(cwd: string, options: LoadConfigOptions): Promise<LoadedConfig | null> {
  const configPath = options.configFile ? path.resolve(cwd, options.configFile) : findConfigFile(cwd);
  if (!configPath) return null;
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const bundled = await bundleConfig(configPath);
  const dataUrl = `data:text/javascript;base64,${Buffer.from(bundled).toString("base64")}`;
  const imported: unknown = await import(dataUrl);
  // Support both default export and module export patterns.
  let resolved: unknown = imported;
  if (isRecord(imported)) resolved = imported.default ?? imported.config ?? imported;

  if (typeof resolved === "function") {
    resolved = resolved({ mode: options.mode });
  }
  resolved = await resolved;

  const config = validateConfig(resolved);
  logInfo(`Loaded embundle config from ${path.relative(cwd, configPath) || configPath}`);
  return { config, path: configPath };
}
