import type { BuildMode } from "@core/types/pipeline";

export function normalizeMode(value: unknown): BuildMode | null {
  if (typeof value !== "string") return null;
  switch (value.toLowerCase()) {
    case "development":
    case "dev":
      return "development";
    case "production":
    case "prod":
      return "production";
    default:
      return null;
  }
}

export interface ResolveModeOptions {
  cliFlag?: string | undefined;
  envMode?: string | undefined;   // EMBUNDLE_MODE
  nodeEnv?: string | undefined;   // NODE_ENV
}

/**
 * Precedence: CLI flag > EMBUNDLE_MODE > NODE_ENV > config > 'production'.
 */
export function resolveBuildMode(configMode: unknown, opts: ResolveModeOptions = {}): BuildMode {
  return (
    normalizeMode(opts.cliFlag) ??
    normalizeMode(opts.envMode) ??
    normalizeMode(opts.nodeEnv) ??
    normalizeMode(configMode) ??
    "production"
  );
}
