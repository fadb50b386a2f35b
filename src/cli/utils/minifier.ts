import { transform } from "esbuild";
import type { Minifier } from "@core/types/pipeline";

export type MinifierChoice = 'esbuild' | 'swc' | 'none' | 'auto';

export function normalizeMinifier(value: unknown): MinifierChoice | null {
  if (typeof value !== 'string') return null;
  const v = value.toLowerCase();
  if (v === 'esbuild' || v === 'swc' || v === 'none' || v === 'auto') return v;
  return null;
}

export interface ResolveMinifierOptions {
  cliFlag?: string | undefined; // e.g., from --minifier
  envVar?: string | undefined; // e.g., process.env.EMBUNDLE_MINIFIER
}

/**
 * Precedence: CLI flag > Env var > bundle target > embundle.config.ts > default ('auto').
 */
export function resolveMinifier(
  configured: Array<unknown>,
  opts: ResolveMinifierOptions = {}
): MinifierChoice {
  const fromCli = normalizeMinifier(opts.cliFlag);
  if (fromCli) return fromCli;
  const fromEnv = normalizeMinifier(opts.envVar);
  if (fromEnv) return fromEnv;
  for (const value of configured) {
    const fromConfig = normalizeMinifier(value);
    if (fromConfig) return fromConfig;
  }
  return 'auto';
}

export const esbuildMinifier: Minifier = async (code) => {
  const result = await transform(code.toString("utf8"), {
    loader: "js",
    minify: true,
    logLevel: "silent",
  });
  return Buffer.from(result.code, "utf8");
};

export const swcMinifier: Minifier = async (code) => {
  const swc = await import("@swc/core");
  const result = await swc.minify(code.toString("utf8"), { compress: true, mangle: true });
  return Buffer.from(result.code, "utf8");
};

/** 'auto' picks esbuild; 'none' disables minification. */
export function createMinifier(choice: MinifierChoice): Minifier | null {
  switch (choice) {
    case 'none':
      return null;
    case 'swc':
      return swcMinifier;
    case 'esbuild':
    case 'auto':
      return esbuildMinifier;
  }
}

/**
 * Picks the production minifier for one bundle. A CLI flag or env var overrides
 * everything, including a minifier function set on the bundle.
 */
export function selectMinifier(
  bundleMinifier: MinifierChoice | Minifier | undefined,
  configMinifier: MinifierChoice | undefined,
  opts: ResolveMinifierOptions = {}
): Minifier | null {
  const forced = normalizeMinifier(opts.cliFlag) ?? normalizeMinifier(opts.envVar);
  if (forced) return createMinifier(forced);
  if (typeof bundleMinifier === 'function') return bundleMinifier;
  return createMinifier(resolveMinifier([bundleMinifier, configMinifier]));
}
