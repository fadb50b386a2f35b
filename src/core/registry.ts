import fs from "fs";
import path from "path";
import { logInfo } from "@cli/utils/logger";
import { getCacheKey } from "@core/cache";
import type { EmbeddedBundle } from "@core/generator";
import type { BuildArtifact, BuildMode } from "@core/types/pipeline";

/** The host side: something that serves registered bundles under their routes. */
export interface StaticAssetRegistry {
  register(bundle: EmbeddedBundle): void;
}

export interface ManifestEntry {
  file: string;
  mimeType: string;
  size: number;
  hash: string;
}

export interface Manifest {
  routes: Record<string, ManifestEntry>;
}

export function normalizeRoute(route: string): string {
  const normalized = path.posix.normalize(route.replace(/\\/g, "/")).replace(/^\/+/, "");
  if (!normalized || normalized === "." || normalized.split("/").includes("..")) {
    throw new Error(`Invalid route "${route}"`);
  }
  return normalized;
}

/**
 * In-process registry. In production every producer runs once and the frozen artifacts
 * are served from then on; in development each lookup rebuilds through the reload
 * producer.
 */
export class EmbeddedStatic implements StaticAssetRegistry {
  private bundles = new Map<string, EmbeddedBundle>();
  private artifacts = new Map<string, BuildArtifact>();
  private building: Promise<void> | null = null;

  constructor(readonly mode: BuildMode) {}

  register(bundle: EmbeddedBundle) {
    const route = normalizeRoute(bundle.route);
    if (this.bundles.has(route)) {
      throw new Error(`Route "${route}" is already registered`);
    }
    this.bundles.set(route, bundle);
  }

  routes(): string[] {
    return [...this.bundles.keys()].sort();
  }

  private async runProducers() {
    for (const route of this.routes()) {
      const bundle = this.bundles.get(route);
      if (!bundle) continue;
      const artifact = await bundle.productionContent();
      this.artifacts.set(route, Object.freeze({ ...artifact }));
    }
  }

  /**
   * Runs every production producer once, in route order. Concurrent and later calls
   * share that run; a failed run may be retried.
   */
  async buildProduction(): Promise<BuildArtifact[]> {
    if (!this.building) {
      const building = this.runProducers();
      this.building = building;
      void building.catch(() => {
        if (this.building === building) this.building = null;
      });
    }
    await this.building;
    return this.routes().flatMap((route) => {
      const artifact = this.artifacts.get(route);
      return artifact ? [artifact] : [];
    });
  }

  async lookup(route: string): Promise<BuildArtifact | undefined> {
    const key = normalizeRoute(route);
    if (this.mode === "development") {
      return this.bundles.has(key) ? this.reload(key) : undefined;
    }
    await this.buildProduction();
    return this.artifacts.get(key);
  }

  reload(route: string): Promise<BuildArtifact> {
    const key = normalizeRoute(route);
    const bundle = this.bundles.get(key);
    if (!bundle) {
      return Promise.reject(new Error(`No bundle registered for route "${key}"`));
    }
    return bundle.develReload();
  }

  private async developmentArtifacts(): Promise<BuildArtifact[]> {
    const artifacts: BuildArtifact[] = [];
    for (const route of this.routes()) {
      artifacts.push(await this.reload(route));
    }
    return artifacts;
  }

  /** Writes one artifact per route and a manifest.json describing them. */
  async writeTo(outDir: string): Promise<Manifest> {
    const artifacts =
      this.mode === "production" ? await this.buildProduction() : await this.developmentArtifacts();
    const manifest: Manifest = { routes: {} };
    for (const artifact of artifacts) {
      const route = normalizeRoute(artifact.route);
      const file = path.join(outDir, route);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, artifact.bytes);
      manifest.routes[route] = {
        file: route,
        mimeType: artifact.mimeType,
        size: artifact.bytes.length,
        hash: getCacheKey(artifact.bytes),
      };
      logInfo(`Wrote ${route} (${artifact.bytes.length} bytes)`);
    }
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, "manifest.json"), JSON.stringify(manifest, null, 2), "utf8");
    return manifest;
  }
}
