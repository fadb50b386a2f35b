import { BundleError } from "@core/errors";
import type { ModuleIdentity } from "@core/types/pipeline";

export interface ModuleNode {
  id: ModuleIdentity;
  deps: ModuleIdentity[];   // sorted, unique
}

/**
 * Module dependency graph inferred from the references in generated code. A module and
 * its foreign companion share one node.
 */
export class ModuleGraph {
  private nodes: Map<ModuleIdentity, ModuleNode> = new Map();

  addModule(id: ModuleIdentity, deps: ModuleIdentity[]) {
    this.nodes.set(id, { id, deps: Array.from(new Set(deps)).sort() });
  }

  has(id: ModuleIdentity): boolean {
    return this.nodes.has(id);
  }

  getDeps(id: ModuleIdentity): ModuleIdentity[] {
    return this.nodes.get(id)?.deps ?? [];
  }

  ids(): ModuleIdentity[] {
    return Array.from(this.nodes.keys()).sort();
  }

  /** Everything reachable from `roots`, roots included (breadth-first). */
  collectReachable(roots: ModuleIdentity[]): Set<ModuleIdentity> {
    const result = new Set<ModuleIdentity>();
    const queue: ModuleIdentity[] = [];
    for (const root of roots) {
      if (!this.nodes.has(root)) {
        throw new BundleError(root, `Root module ${root} was not found among the compiled modules`);
      }
      if (!result.has(root)) {
        result.add(root);
        queue.push(root);
      }
    }
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      for (const dep of this.getDeps(current)) {
        if (!result.has(dep)) {
          result.add(dep);
          queue.push(dep);
        }
      }
    }
    return result;
  }

  /**
   * Orders the selected modules so every module comes after its dependencies. Visits
   * modules and edges in sorted order, so the result is deterministic.
   */
  topologicalOrder(selected: Set<ModuleIdentity>): ModuleIdentity[] {
    const visited = new Set<ModuleIdentity>();
    const temp: ModuleIdentity[] = [];
    const ordered: ModuleIdentity[] = [];
    const dfs = (id: ModuleIdentity) => {
      if (visited.has(id)) return;
      const onStack = temp.indexOf(id);
      if (onStack !== -1) {
        const cycle = [...temp.slice(onStack), id].join(" -> ");
        throw new BundleError(id, `Module dependency cycle: ${cycle}`);
      }
      temp.push(id);
      for (const dep of this.getDeps(id)) {
        if (selected.has(dep)) dfs(dep);
      }
      temp.pop();
      visited.add(id);
      ordered.push(id);
    };
    for (const id of Array.from(selected).sort()) {
      dfs(id);
    }
    return ordered;
  }
}
