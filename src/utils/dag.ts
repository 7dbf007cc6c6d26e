/** Recipe dependency graph -- cycle detection, Kahn ordering and parallel group extraction. */

import { CircularDependencyError, MissingDependencyError } from './errors.js';

export class DependencyGraph {
  /** node -> nodes it depends on, in declaration order. */
  private graph: Map<string, string[]> = new Map();

  addNode(name: string, dependencies: string[] = []): void {
    this.graph.set(name, [...new Set(dependencies)]);
  }

  has(name: string): boolean {
    return this.graph.has(name);
  }

  get nodes(): string[] {
    return [...this.graph.keys()];
  }

  /** Direct dependencies of a node. */
  getDeps(name: string): string[] {
    return this.graph.get(name) ?? [];
  }

  /** Nodes that depend directly on `name`. */
  getDependents(name: string): string[] {
    const dependents: string[] = [];
    for (const [node, deps] of this.graph) {
      if (deps.includes(name)) dependents.push(node);
    }
    return dependents;
  }

  /** Throws MissingDependencyError for the first edge pointing outside the graph. */
  checkComplete(): void {
    for (const [node, deps] of this.graph) {
      for (const dep of deps) {
        if (!this.graph.has(dep)) throw new MissingDependencyError(node, dep);
      }
    }
  }

  /**
   * Depth-first search with three colours. Returns the first cycle found as a path
   * that starts and ends on the same node, or null when the graph is acyclic.
   */
  findCycle(): string[] | null {
    const WHITE = 0;
    const GREY = 1;
    const BLACK = 2;
    const colour = new Map<string, number>();
    const stack: string[] = [];

    const visit = (node: string): string[] | null => {
      colour.set(node, GREY);
      stack.push(node);
      for (const dep of this.getDeps(node)) {
        if (!this.graph.has(dep)) continue;
        const c = colour.get(dep) ?? WHITE;
        if (c === GREY) {
          return [...stack.slice(stack.indexOf(dep)), dep];
        }
        if (c === WHITE) {
          const found = visit(dep);
          if (found) return found;
        }
      }
      stack.pop();
      colour.set(node, BLACK);
      return null;
    };

    for (const node of this.graph.keys()) {
      if ((colour.get(node) ?? WHITE) === WHITE) {
        const cycle = visit(node);
        if (cycle) return cycle;
      }
    }
    return null;
  }

  /** Return nodes in topological order (dependencies first). Throws on cycles. */
  getOrder(): string[] {
    const cycle = this.findCycle();
    if (cycle) throw new CircularDependencyError(cycle);

    const inDegree = new Map<string, number>();
    const adjacency = new Map<string, string[]>();
    for (const node of this.graph.keys()) {
      inDegree.set(node, 0);
      adjacency.set(node, []);
    }
    for (const [node, deps] of this.graph) {
      for (const dep of deps) {
        const out = adjacency.get(dep);
        if (!out) continue;
        out.push(node);
        inDegree.set(node, (inDegree.get(node) ?? 0) + 1);
      }
    }

    const queue: string[] = [];
    for (const [node, deg] of inDegree) {
      if (deg === 0) queue.push(node);
    }

    const result: string[] = [];
    for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
      result.push(node);
      for (const neighbor of adjacency.get(node) ?? []) {
        const newDeg = (inDegree.get(neighbor) ?? 1) - 1;
        inDegree.set(neighbor, newDeg);
        if (newDeg === 0) queue.push(neighbor);
      }
    }
    return result;
  }

  /**
   * Repeatedly remove every node whose dependencies have all been removed.
   * Each removal round is one group; groups preserve insertion order.
   */
  getParallelGroups(): string[][] {
    const cycle = this.findCycle();
    if (cycle) throw new CircularDependencyError(cycle);

    const removed = new Set<string>();
    const groups: string[][] = [];
    while (removed.size < this.graph.size) {
      const group = this.nodes.filter(
        (node) => !removed.has(node)
          && this.getDeps(node).every((dep) => removed.has(dep) || !this.graph.has(dep)),
      );
      for (const node of group) removed.add(node);
      groups.push(group);
    }
    return groups;
  }

  /** All nodes reachable by following dependency edges from `name`. */
  transitiveDeps(name: string): string[] {
    return this.walk(name, (node) => this.getDeps(node));
  }

  /** All nodes that depend on `name`, directly or indirectly. */
  transitiveDependents(name: string): string[] {
    return this.walk(name, (node) => this.getDependents(node));
  }

  private walk(start: string, next: (node: string) => string[]): string[] {
    const seen = new Set<string>();
    const queue = [...next(start)];
    for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
      if (seen.has(node) || node === start) continue;
      seen.add(node);
      queue.push(...next(node));
    }
    return [...seen];
  }
}
