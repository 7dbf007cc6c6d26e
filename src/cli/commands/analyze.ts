/** `recipe-forge analyze`: complexity, separation, dependency and cache report without building. */

import type { Recipe } from '../../models/recipe.js';
import type { ComplexityScore } from '../../services/complexityEvaluator.js';
import type { ImpactAnalysis } from '../../services/dependencyResolver.js';
import type { SeparationReport } from '../../services/separationValidator.js';
import type { RebuildDecision } from '../../services/buildCache.js';
import { reportError } from './build.js';
import { createEnvironment, type CommonOptions, type EnvironmentFactories } from './environment.js';

export interface AnalyzeOptions extends CommonOptions {
  json?: boolean;
}

export interface RecipeAnalysis {
  name: string;
  type: Recipe['metadata']['type'];
  requirements: number;
  mustRequirements: number;
  complexity: ComplexityScore;
  separation: SeparationReport;
  impact: ImpactAnalysis;
  rebuild: RebuildDecision;
}

export interface CollectionAnalysis {
  recipes: RecipeAnalysis[];
  order: string[];
  groups: string[][];
  maxParallelism: number;
}

function render(analysis: CollectionAnalysis): string {
  const lines: string[] = [];
  for (const r of analysis.recipes) {
    lines.push(`${r.name} (${r.type}): ${r.requirements} requirements, ${r.mustRequirements} MUST`);
    lines.push(`  complexity ${r.complexity.score.toFixed(2)}${r.complexity.exceedsBoundary ? ' (will be decomposed)' : ''}`
      + `; areas: ${r.complexity.functionalAreas.join(', ') || 'none'}`);
    lines.push(`  depends on: ${r.impact.directDependencies.join(', ') || 'nothing'}; `
      + `dependents: ${r.impact.allDependents.join(', ') || 'none'}`);
    lines.push(`  rebuild: ${r.rebuild.rebuild ? 'yes' : 'no'} (${r.rebuild.reason})`);
    for (const v of r.separation.violations) {
      lines.push(`  separation: ${v.artifact}:${v.line} [${v.rule}] "${v.text}"`);
    }
  }
  lines.push('');
  analysis.groups.forEach((group, i) => lines.push(`Group ${i + 1}: ${group.join(', ')}`));
  lines.push(`Max parallelism: ${analysis.maxParallelism}`);
  return lines.join('\n');
}

export function analyzeCollection(
  location: string,
  options: AnalyzeOptions,
  factories: EnvironmentFactories = {},
): CollectionAnalysis {
  const { orchestrator } = createEnvironment(options, async () => {}, factories);
  const recipes = orchestrator.store.load(location);
  const resolution = orchestrator.resolver.resolve(recipes);
  const plan = orchestrator.resolver.executionPlan(resolution);
  return {
    recipes: resolution.order.flatMap((name) => {
      const recipe = recipes.get(name);
      if (!recipe) return [];
      return [{
        name,
        type: recipe.metadata.type,
        requirements: recipe.requirements.requirements.length,
        mustRequirements: recipe.requirements.requirements.filter((r) => r.priority === 'MUST').length,
        complexity: orchestrator.complexity.evaluate(recipe),
        separation: orchestrator.separation.validate(recipe),
        impact: orchestrator.resolver.analyzeImpact(resolution, name),
        rebuild: orchestrator.cache.evaluate(recipe, false, (dep) => recipes.get(dep)),
      }];
    }),
    order: plan.order,
    groups: plan.groups,
    maxParallelism: plan.maxParallelism,
  };
}

export async function runAnalyze(location: string, options: AnalyzeOptions): Promise<void> {
  try {
    const analysis = analyzeCollection(location, options);
    process.stdout.write((options.json ? JSON.stringify(analysis, null, 2) : render(analysis)) + '\n');
  } catch (err) {
    reportError(err, options.json);
  }
}
