/** Shared types for per-recipe pipeline phases. */

import type { ArtifactSet } from '../../models/build.js';
import { mergeArtifacts } from '../../models/build.js';
import type { Recipe } from '../../models/recipe.js';
import type { BuildLogger } from '../../utils/buildLogger.js';
import type { OrchestratorConfig } from '../../utils/config.js';
import { ORACLE_RETRY_MAX_MS } from '../../utils/constants.js';
import { errorMessage, type GateName } from '../../utils/errors.js';
import { withTimeout } from '../../utils/withTimeout.js';
import type { OracleCallContext } from '../oracle.js';

export type GenerationState =
  | 'NOT_STARTED'
  | 'TESTS_GENERATED'
  | 'TESTS_CONFIRMED_FAILING'
  | 'IMPLEMENTATION_GENERATED'
  | 'TESTS_PASSING'
  | 'FIX_EXHAUSTED';

export type PipelinePhase = 'generate' | 'review' | 'quality-gates' | 'compliance';

/** Discriminated union for every event the orchestrator reports while building. */
export type BuildEvent =
  | { type: 'build_started'; recipes: number; groups: string[][]; dry_run: boolean }
  | { type: 'group_started'; index: number; recipes: string[] }
  | { type: 'recipe_started'; recipe: string }
  | { type: 'recipe_skipped'; recipe: string; status: 'skipped' | 'skipped-due-to-dependency-failure'; reason: string }
  | { type: 'phase_changed'; recipe: string; phase: PipelinePhase; state?: GenerationState }
  | { type: 'oracle_call'; recipe: string; operation: string; elapsed_ms: number; ok: boolean }
  | { type: 'test_result'; recipe: string; stage: string; passed: number; failed: number; total: number; coverage_pct: number | null }
  | { type: 'gate_result'; recipe: string; gate: GateName; passed: boolean }
  | { type: 'review_findings'; recipe: string; iteration: number; critical: number; suggestions: number }
  | { type: 'recipe_completed'; recipe: string; elapsed_ms: number; output_dir?: string }
  | { type: 'recipe_failed'; recipe: string; error: string; phase: string | null }
  | { type: 'build_complete'; success: boolean; succeeded: number; failed: number; skipped: number; elapsed_ms: number }
  | { type: 'error'; message: string; recoverable: boolean };

export type SendEvent = (event: BuildEvent) => Promise<void>;

export interface PhaseContext {
  recipe: Recipe;
  send: SendEvent;
  logger: BuildLogger | null;
  config: OrchestratorConfig;
  abortSignal: AbortSignal;
}

/**
 * Run one oracle request under the configured deadline. The request's signal is
 * aborted when the deadline passes or the build is cancelled.
 */
export async function callOracle<T>(
  ctx: PhaseContext,
  operation: string,
  fn: (callCtx: OracleCallContext) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  ctx.abortSignal.addEventListener('abort', onAbort);
  const start = Date.now();
  let ok = false;
  try {
    const result = await withTimeout(
      fn({ recipe: ctx.recipe.name, signal: controller.signal }),
      ctx.config.oracleTimeoutMs,
      { label: `oracle ${operation}` },
    );
    ok = true;
    return result;
  } finally {
    controller.abort();
    ctx.abortSignal.removeEventListener('abort', onAbort);
    const elapsed = Date.now() - start;
    ctx.logger?.oracleCall(ctx.recipe.name, operation, elapsed, ok);
    await ctx.send({ type: 'oracle_call', recipe: ctx.recipe.name, operation, elapsed_ms: elapsed, ok });
  }
}

/**
 * `callOracle` with up to `maxOracleRetries` further attempts and exponential backoff,
 * for requests that no repair or review round would otherwise retry. The last error is
 * rethrown; a cancelled build stops retrying at once.
 */
export async function callOracleWithRetry<T>(
  ctx: PhaseContext,
  operation: string,
  fn: (callCtx: OracleCallContext) => Promise<T>,
): Promise<T> {
  const retries = ctx.config.maxOracleRetries;
  for (let attempt = 0; ; attempt++) {
    try {
      return await callOracle(ctx, operation, fn);
    } catch (err) {
      if (attempt >= retries || ctx.abortSignal.aborted) throw err;
      const delay = Math.min(ctx.config.oracleRetryBaseMs * 2 ** attempt, ORACLE_RETRY_MAX_MS);
      ctx.logger?.warn('Oracle request failed, retrying', {
        recipe: ctx.recipe.name,
        operation,
        attempt: attempt + 1,
        delay_ms: delay,
        error: errorMessage(err),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

/** Layer `update` over `base`, then restore the fixed test files unchanged. */
export function withFixedTests(base: ArtifactSet, update: ArtifactSet, tests: ArtifactSet): ArtifactSet {
  return mergeArtifacts(mergeArtifacts(base, update), tests);
}
