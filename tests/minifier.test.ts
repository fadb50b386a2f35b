import { describe, expect, it } from "vitest";
import {
  createMinifier,
  esbuildMinifier,
  normalizeMinifier,
  resolveMinifier,
  selectMinifier,
  swcMinifier,
} from "../src/cli/utils/minifier";
import { normalizeMode, resolveBuildMode } from "../src/cli/utils/mode";

describe("minifier resolution", () => {
  it("normalizes names", () => {
    expect(normalizeMinifier("SWC")).toBe("swc");
    expect(normalizeMinifier("uglify")).toBeNull();
    expect(normalizeMinifier(undefined)).toBeNull();
  });

  it("prefers the CLI flag, then the env var, then the config", () => {
    expect(resolveMinifier(["swc"], { cliFlag: "none", envVar: "esbuild" })).toBe("none");
    expect(resolveMinifier(["swc"], { envVar: "esbuild" })).toBe("esbuild");
    expect(resolveMinifier([undefined, "swc"])).toBe("swc");
    expect(resolveMinifier(["bogus"])).toBe("auto");
  });

  it("maps choices to minifiers", () => {
    expect(createMinifier("none")).toBeNull();
    expect(createMinifier("auto")).toBe(esbuildMinifier);
    expect(createMinifier("esbuild")).toBe(esbuildMinifier);
    expect(createMinifier("swc")).toBe(swcMinifier);
  });

  it("lets a bundle supply its own minifier unless the CLI forces one", () => {
    const custom = (code: Buffer) => code;
    expect(selectMinifier(custom, "swc")).toBe(custom);
    expect(selectMinifier(custom, "swc", { cliFlag: "none" })).toBeNull();
    expect(selectMinifier("none", "swc")).toBeNull();
    expect(selectMinifier(undefined, "swc")).toBe(swcMinifier);
    expect(selectMinifier(undefined, undefined, { envVar: "swc" })).toBe(swcMinifier);
  });

  it("minifies with esbuild", async () => {
    const input = Buffer.from("function add(first, second) {\n  return first + second;\n}\nconsole.log(add(1, 2));\n");
    const output = (await esbuildMinifier(input)).toString("utf8");

    expect(output.length).toBeLessThan(input.length);
    expect(output).toContain("console.log(add(1,2))");
    expect(output).not.toContain("second");
  });
});

describe("mode resolution", () => {
  it("normalizes mode names", () => {
    expect(normalizeMode("dev")).toBe("development");
    expect(normalizeMode("PRODUCTION")).toBe("production");
    expect(normalizeMode("test")).toBeNull();
  });

  it("applies CLI > EMBUNDLE_MODE > NODE_ENV > config > production", () => {
    expect(resolveBuildMode("production", { cliFlag: "dev", envMode: "production" })).toBe("development");
    expect(resolveBuildMode("production", { envMode: "development", nodeEnv: "production" })).toBe("development");
    expect(resolveBuildMode("production", { nodeEnv: "development" })).toBe("development");
    expect(resolveBuildMode("development", { nodeEnv: "test" })).toBe("development");
    expect(resolveBuildMode(undefined)).toBe("production");
  });
});
