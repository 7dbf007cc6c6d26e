/** Builds the recipe dependency graph and derives build order and parallel groups. */

import type { Recipe } from '../models/recipe.js';
import { DependencyGraph } from '../utils/dag.js';

export interface Resolution {
  graph: DependencyGraph;
  /** Total topological order, dependencies first. */
  order: string[];
  /** Groups with no edges inside a group; group i depends only on groups < i. */
  groups: string[][];
}

export interface ImpactAnalysis {
  recipe: string;
  directDependencies: string[];
  allDependencies: string[];
  directDependents: string[];
  allDependents: string[];
}

export interface ExecutionPlan {
  order: string[];
  groups: string[][];
  totalRecipes: number;
  maxParallelism: number;
}

export class DependencyResolver {
  /**
   * Fails with MissingDependencyError or CircularDependencyError before
   * returning anything; a Resolution is always acyclic and closed.
   */
  resolve(recipes: Map<string, Recipe>): Resolution {
    const graph = new DependencyGraph();
    for (const recipe of recipes.values()) {
      graph.addNode(recipe.name, recipe.metadata.dependencies);
    }
    graph.checkComplete();
    return { graph, order: graph.getOrder(), groups: graph.getParallelGroups() };
  }

  analyzeImpact(resolution: Resolution, name: string): ImpactAnalysis {
    const { graph } = resolution;
    return {
      recipe: name,
      directDependencies: graph.getDeps(name),
      allDependencies: graph.transitiveDeps(name),
      directDependents: graph.getDependents(name),
      allDependents: graph.transitiveDependents(name),
    };
  }

  executionPlan(resolution: Resolution): ExecutionPlan {
    return {
      order: resolution.order,
      groups: resolution.groups,
      totalRecipes: resolution.order.length,
      maxParallelism: Math.max(0, ...resolution.groups.map((g) => g.length)),
    };
  }
}
