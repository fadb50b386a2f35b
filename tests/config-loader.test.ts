import fs from "fs";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { findConfigFile, loadEmbundleConfig, validateConfig } from "../src/cli/utils/config";
import { writeConfig } from "./helpers/config";
import { ToyCompiler, makeTempProject } from "./helpers/toy-compiler";

describe("loadEmbundleConfig", () => {
  let root = "";

  afterEach(() => {
    vi.restoreAllMocks();
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("loads a config function with the requested mode", async () => {
    root = makeTempProject();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    writeConfig(
      root,
      `export default defineConfig(({ mode }) => ({
        compiler: new ToyCompiler(),
        mode,
        cacheDir: ".cache/" + mode,
        bundles: [{ route: "js/app.js", deadCodeElim: ["Main"], minifier: "none" }],
      }));`
    );

    const loaded = await loadEmbundleConfig(root, { mode: "development" });

    expect(loaded?.path).toBe(path.join(root, "embundle.config.ts"));
    expect(loaded?.config.mode).toBe("development");
    expect(loaded?.config.cacheDir).toBe(".cache/development");
    expect(loaded?.config.compiler.name).toBe("toy-1");
    expect(loaded?.config.bundles).toEqual([
      {
        route: "js/app.js",
        deadCodeElim: ["Main"],
        minifier: "none",
      },
    ]);
  });

  it("loads a plain object from an explicit path", async () => {
    root = makeTempProject();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    writeConfig(
      root,
      `export default { compiler: new ToyCompiler(), bundles: [{ route: "app.js", namespace: "App" }] };`,
      "custom.config.mjs"
    );

    const loaded = await loadEmbundleConfig(root, { configFile: "custom.config.mjs", mode: "production" });

    expect(loaded?.config.bundles[0]?.namespace).toBe("App");
    expect(loaded?.config.mode).toBeUndefined();
  });

  it("returns null when the project has no config", async () => {
    root = makeTempProject();
    expect(findConfigFile(root)).toBeNull();
    await expect(loadEmbundleConfig(root, { mode: "production" })).resolves.toBeNull();
  });

  it("rejects a config without bundles", async () => {
    root = makeTempProject();
    writeConfig(root, `export default defineConfig({ compiler: new ToyCompiler(), bundles: [] });`);

    await expect(loadEmbundleConfig(root, { mode: "production" })).rejects.toThrow(
      "config.bundles must list at least one bundle"
    );
  });
});

describe("validateConfig", () => {
  const compiler = new ToyCompiler();

  it("requires a module compiler", () => {
    expect(() => validateConfig({ bundles: [{ route: "app.js" }] })).toThrow(
      "config.compiler must provide name, identify() and compile()"
    );
  });

  it("checks bundle fields", () => {
    expect(() => validateConfig({ compiler, bundles: [{ route: "" }] })).toThrow(
      "bundles[0].route must be a non-empty string"
    );
    expect(() => validateConfig({ compiler, bundles: [{ route: "app.js", deadCodeElim: "everything" }] })).toThrow(
      'bundles[0].deadCodeElim must be "all-source-modules" or a list of module names'
    );
    expect(() => validateConfig({ compiler, bundles: [{ route: "app.js", dependencySrcGlobs: "src/*.purs" }] })).toThrow(
      "bundles[0].dependencySrcGlobs must be an array of strings"
    );
    expect(() => validateConfig({ compiler, mode: "staging", bundles: [{ route: "app.js" }] })).toThrow(
      'config.mode must be "development" or "production"'
    );
  });

  it("wraps a minifier function so it must return a Buffer", async () => {
    const config = validateConfig({ compiler, bundles: [{ route: "app.js", minifier: () => "not a buffer" }] });
    const minifier = config.bundles[0]?.minifier;
    if (typeof minifier !== "function") throw new Error("expected a minifier function");

    await expect(Promise.resolve(minifier(Buffer.from("x")))).rejects.toThrow("Minifier for app.js did not return a Buffer");
  });
});
