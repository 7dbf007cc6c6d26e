/** Orchestrator: per-recipe pipeline and group-sequential, intra-group-parallel collection builds. */

import path from 'node:path';
import type {
  ArtifactSet,
  BuildResult,
  ComplianceMatrix,
  RecipeError,
  SingleBuildResult,
  TestRunResult,
} from '../models/build.js';
import { isAggregate, type Recipe, type Requirement } from '../models/recipe.js';
import type { BuildLogger } from '../utils/buildLogger.js';
import type { OrchestratorConfig } from '../utils/config.js';
import { isRecipeForgeError, errorMessage } from '../utils/errors.js';
import { writeRecipeOutput } from './artifactWorkspace.js';
import { BuildCache, type RebuildDecision } from './buildCache.js';
import { ComplexityEvaluator } from './complexityEvaluator.js';
import { DependencyResolver, type Resolution } from './dependencyResolver.js';
import type { GenerationOracle } from './oracle.js';
import { CompliancePhase } from './phases/compliancePhase.js';
import { GeneratePhase } from './phases/generatePhase.js';
import { QualityGatePhase } from './phases/qualityGatePhase.js';
import { ReviewPhase } from './phases/reviewPhase.js';
import type { PhaseContext, SendEvent } from './phases/types.js';
import type { QualityTools } from './qualityTools.js';
import { RecipeStore } from './recipeStore.js';
import { SeparationValidator } from './separationValidator.js';

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  oracle: GenerationOracle;
  tools: QualityTools;
  store?: RecipeStore;
  cache?: BuildCache;
  logger?: BuildLogger | null;
  send?: SendEvent;
}

export interface CollectionOptions {
  force?: boolean;
  dryRun?: boolean;
  /** Write successful artifacts to `<outputDir>/<recipe>`. */
  writeOutputs?: boolean;
  abortSignal?: AbortSignal;
}

export interface VerificationResult {
  artifacts: ArtifactSet;
  testRun: TestRunResult;
  compliance: ComplianceMatrix;
  requirements: Requirement[];
}

export interface PlannedRecipe {
  recipe: string;
  decision: RebuildDecision;
}

export interface DryRunPlan {
  order: string[];
  groups: string[][];
  recipes: PlannedRecipe[];
}

const noopSend: SendEvent = async () => {};

function toRecipeError(err: unknown): RecipeError {
  return {
    name: err instanceof Error ? err.name : 'Error',
    message: errorMessage(err),
    phase: isRecipeForgeError(err) ? err.phase : null,
    diagnostic: isRecipeForgeError(err) ? err.diagnostic : null,
  };
}

export class Orchestrator {
  readonly config: OrchestratorConfig;
  readonly store: RecipeStore;
  readonly cache: BuildCache;
  readonly resolver = new DependencyResolver();
  readonly separation: SeparationValidator;
  readonly complexity: ComplexityEvaluator;
  private logger: BuildLogger | null;
  private send: SendEvent;
  private generatePhase: GeneratePhase;
  private reviewPhase: ReviewPhase;
  private gatePhase: QualityGatePhase;
  private compliancePhase = new CompliancePhase();

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.logger = deps.logger ?? null;
    this.send = deps.send ?? noopSend;
    this.store = deps.store ?? new RecipeStore();
    this.cache = deps.cache ?? new BuildCache(deps.config.cacheDir, this.logger);
    this.separation = new SeparationValidator({
      oracle: deps.oracle,
      store: this.store,
      logger: this.logger,
      oracleTimeoutMs: deps.config.oracleTimeoutMs,
    });
    this.complexity = new ComplexityEvaluator(deps.config.complexity, this.store, this.logger);
    this.generatePhase = new GeneratePhase({ oracle: deps.oracle, testRunner: deps.tools.testRunner });
    this.reviewPhase = new ReviewPhase(deps.oracle);
    this.gatePhase = new QualityGatePhase(deps.tools);
  }

  private context(recipe: Recipe, abortSignal: AbortSignal): PhaseContext {
    return { recipe, send: this.send, logger: this.logger, config: this.config, abortSignal };
  }

  /**
   * Generate, review, gate and audit one recipe, in that order. The first failure
   * ends the pipeline; the result carries the error instead of throwing it.
   */
  async executeRecipe(recipe: Recipe, abortSignal: AbortSignal = new AbortController().signal): Promise<SingleBuildResult> {
    const start = Date.now();
    if (isAggregate(recipe)) {
      return { recipe: recipe.name, status: 'succeeded', reason: 'aggregate of its dependencies', elapsedMs: 0 };
    }
    await this.send({ type: 'recipe_started', recipe: recipe.name });
    const done = this.logger?.recipeStart(recipe.name);
    const ctx = this.context(recipe, abortSignal);

    try {
      const generated = await this.generatePhase.execute(ctx);
      const reviewed = await this.reviewPhase.execute(ctx, generated.artifacts, generated.tests);
      const verified = await this.verifyWith(ctx, reviewed.artifacts);
      done?.();
      const elapsedMs = Date.now() - start;
      return {
        recipe: recipe.name,
        status: 'succeeded',
        artifacts: verified.artifacts,
        compliance: verified.compliance,
        requirements: verified.requirements,
        suggestions: reviewed.suggestions,
        elapsedMs,
      };
    } catch (err) {
      const error = toRecipeError(err);
      this.logger?.recipeFailed(recipe.name, error.message, error.phase);
      await this.send({ type: 'recipe_failed', recipe: recipe.name, error: error.message, phase: error.phase });
      return { recipe: recipe.name, status: 'failed', error, elapsedMs: Date.now() - start };
    }
  }

  /** Quality gates then compliance over an existing artifact set. Throws on the first failure. */
  verify(recipe: Recipe, artifacts: ArtifactSet, abortSignal: AbortSignal = new AbortController().signal): Promise<VerificationResult> {
    return this.verifyWith(this.context(recipe, abortSignal), artifacts);
  }

  private async verifyWith(ctx: PhaseContext, artifacts: ArtifactSet): Promise<VerificationResult> {
    const gated = await this.gatePhase.execute(ctx, artifacts);
    const compliance = await this.compliancePhase.execute(ctx, gated.artifacts);
    return { artifacts: gated.artifacts, testRun: gated.testRun, compliance: compliance.matrix, requirements: compliance.requirements };
  }

  /**
   * Separation check then decomposition to a fixed point, before any resolution.
   * A dry run only reports violations: no correction request, nothing written back.
   */
  async prepare(recipes: Map<string, Recipe>, dryRun = false): Promise<Map<string, Recipe>> {
    const policy = dryRun ? 'warn' : this.config.separationPolicy;
    const checked = new Map<string, Recipe>();
    for (const recipe of recipes.values()) {
      const enforced = await this.separation.enforce(recipe, policy);
      checked.set(enforced.name, enforced);
    }
    return this.complexity.expandAll(checked);
  }

  /** What a build would do, without generating anything. */
  plan(recipes: Map<string, Recipe>, force = false): DryRunPlan {
    const resolution = this.resolver.resolve(recipes);
    return {
      order: resolution.order,
      groups: resolution.groups,
      recipes: resolution.order.map((name) => ({
        recipe: name,
        decision: this.decide(recipes, name, force),
      })),
    };
  }

  private decide(recipes: Map<string, Recipe>, name: string, force: boolean): RebuildDecision {
    const recipe = recipes.get(name);
    if (!recipe) return { rebuild: true, reason: 'no-record' };
    return this.cache.evaluate(recipe, force, (dep) => recipes.get(dep));
  }

  /**
   * Resolve, then build group by group. Within a group, up-to-date recipes are skipped,
   * dependents of failed recipes are never attempted, and the rest run concurrently up
   * to `maxWorkers`.
   */
  async executeCollection(recipes: Map<string, Recipe>, options: CollectionOptions = {}): Promise<BuildResult> {
    const start = Date.now();
    const resolution: Resolution = this.resolver.resolve(recipes);
    const abortSignal = options.abortSignal ?? new AbortController().signal;
    const results: Record<string, SingleBuildResult> = {};
    const failed = new Set<string>();

    await this.send({
      type: 'build_started',
      recipes: resolution.order.length,
      groups: resolution.groups,
      dry_run: options.dryRun ?? false,
    });

    for (const [index, group] of resolution.groups.entries()) {
      if (abortSignal.aborted) {
        await this.send({ type: 'error', message: 'Build cancelled', recoverable: false });
        for (const name of group) {
          results[name] = { recipe: name, status: 'skipped', reason: 'build cancelled', elapsedMs: 0 };
        }
        continue;
      }
      await this.send({ type: 'group_started', index, recipes: group });

      const runnable: Recipe[] = [];
      for (const name of group) {
        const recipe = recipes.get(name);
        if (!recipe) continue;
        const failedDep = resolution.graph.getDeps(name).find((dep) => failed.has(dep));
        if (failedDep) {
          failed.add(name);
          results[name] = await this.skip(name, 'skipped-due-to-dependency-failure', `dependency '${failedDep}' failed`);
          continue;
        }
        const decision = this.decide(recipes, name, options.force ?? false);
        if (!decision.rebuild) {
          results[name] = await this.skip(name, 'skipped', 'up to date');
          continue;
        }
        if (options.dryRun) {
          results[name] = await this.skip(name, 'skipped', `dry run (would rebuild: ${decision.reason})`);
          continue;
        }
        runnable.push(recipe);
      }

      await this.runBounded(runnable, async (recipe) => {
        let result: SingleBuildResult;
        try {
          result = await this.executeRecipe(recipe, abortSignal);
        } catch (err) {
          result = { recipe: recipe.name, status: 'failed', error: toRecipeError(err), elapsedMs: 0 };
        }
        results[recipe.name] = result;
        if (result.status === 'failed') failed.add(recipe.name);
        await this.cache.record(recipe, result.status === 'succeeded' ? 'success' : 'failure');
        if (result.status === 'succeeded') await this.finish(recipe, result, options);
      });
    }

    const statuses = Object.values(results).map((r) => r.status);
    const succeeded = statuses.filter((s) => s === 'succeeded').length;
    const failedCount = statuses.filter((s) => s === 'failed').length;
    const skipped = statuses.length - succeeded - failedCount;
    const success = failed.size === 0 && !abortSignal.aborted;
    const elapsedMs = Date.now() - start;
    this.logger?.buildSummary(succeeded, failedCount, skipped, statuses.length);
    await this.send({ type: 'build_complete', success, succeeded, failed: failedCount, skipped, elapsed_ms: elapsedMs });
    return { success, order: resolution.order, groups: resolution.groups, results, elapsedMs };
  }

  /** Load, prepare and build everything reachable from `location`. */
  async run(location: string, options: CollectionOptions = {}): Promise<BuildResult> {
    const loaded = this.store.load(location);
    const prepared = await this.prepare(loaded, options.dryRun ?? false);
    return this.executeCollection(prepared, options);
  }

  private async finish(recipe: Recipe, result: SingleBuildResult, options: CollectionOptions): Promise<void> {
    let outputDir: string | undefined;
    if (options.writeOutputs && result.artifacts) {
      outputDir = writeRecipeOutput(path.resolve(this.config.outputDir), recipe.name, result.artifacts, result.compliance ?? []);
      this.logger?.info('Wrote recipe output', { recipe: recipe.name, outputDir });
    }
    await this.send({
      type: 'recipe_completed',
      recipe: recipe.name,
      elapsed_ms: result.elapsedMs,
      ...(outputDir ? { output_dir: outputDir } : {}),
    });
  }

  private async skip(
    name: string,
    status: 'skipped' | 'skipped-due-to-dependency-failure',
    reason: string,
  ): Promise<SingleBuildResult> {
    this.logger?.info(`Recipe skipped: ${name}`, { reason });
    await this.send({ type: 'recipe_skipped', recipe: name, status, reason });
    return { recipe: name, status, reason, elapsedMs: 0 };
  }

  /** Run `work` over `items` with at most `maxWorkers` in flight; resolves when all settle. */
  private async runBounded<T extends { name: string }>(items: T[], work: (item: T) => Promise<void>): Promise<void> {
    const inFlight = new Map<string, Promise<void>>();
    const queue = [...items];
    const maxWorkers = Math.max(1, this.config.maxWorkers);

    const launch = (item: T) => {
      const promise = (async () => {
        try {
          await work(item);
        } catch (err) {
          this.logger?.error('Worker crashed', { recipe: item.name, error: errorMessage(err) });
          await this.send({ type: 'error', message: `${item.name}: ${errorMessage(err)}`, recoverable: true });
        } finally {
          inFlight.delete(item.name);
        }
      })();
      inFlight.set(item.name, promise);
    };

    while (queue.length > 0 || inFlight.size > 0) {
      while (inFlight.size < maxWorkers) {
        const next = queue.shift();
        if (!next) break;
        launch(next);
      }
      if (inFlight.size > 0) {
        await Promise.race(inFlight.values());
      }
    }
  }
}
