export * from "./types/config";
export type * from "./core/types/pipeline";

import type { EmbundleConfig, EmbundleConfigFn } from "./types/config";

export function defineConfig(config: EmbundleConfig): EmbundleConfig;
export function defineConfig(config: EmbundleConfigFn): EmbundleConfigFn;
export function defineConfig(config: EmbundleConfig | EmbundleConfigFn): EmbundleConfig | EmbundleConfigFn {
  return config;
}
