/** Generate phase: test-first generation, red-phase confirmation, bounded repair loop, stub scan. */

import { createArtifactSet, type ArtifactSet, type TestRunResult } from '../../models/build.js';
import { mustRequirements } from '../../models/recipe.js';
import { GenerationError, TestFailureError, ValidationError, errorMessage } from '../../utils/errors.js';
import type { FailureReport, GenerationOracle } from '../oracle.js';
import type { TestRunner } from '../qualityTools.js';
import { detectStubs, formatStubReport } from '../stubDetector.js';
import { callOracle, callOracleWithRetry, withFixedTests, type GenerationState, type PhaseContext } from './types.js';

export interface GenerateResult {
  artifacts: ArtifactSet;
  /** The test contract produced in the red phase. */
  tests: ArtifactSet;
  state: GenerationState;
  repairAttempts: number;
  testRun: TestRunResult;
}

export interface GenerateDeps {
  oracle: GenerationOracle;
  testRunner: TestRunner;
}

export class GeneratePhase {
  private deps: GenerateDeps;

  constructor(deps: GenerateDeps) {
    this.deps = deps;
  }

  async execute(ctx: PhaseContext): Promise<GenerateResult> {
    const { recipe } = ctx;
    ctx.logger?.phase(recipe.name, 'generate');
    await this.transition(ctx, 'NOT_STARTED');

    const tests = await this.generateTests(ctx);
    await this.transition(ctx, 'TESTS_GENERATED');

    const red = await this.runTests(ctx, tests, 'red');
    if (red.total === 0 || red.failed === 0) {
      throw new ValidationError(
        red.total === 0
          ? `Generated tests for '${recipe.name}' ran no test cases`
          : `Generated tests for '${recipe.name}' pass without an implementation`,
        { recipe: recipe.name, phase: 'generate', diagnostic: red.output },
      );
    }
    await this.transition(ctx, 'TESTS_CONFIRMED_FAILING');

    let implementation: ArtifactSet;
    try {
      implementation = await callOracleWithRetry(ctx, 'generateImplementation', (c) =>
        this.deps.oracle.generateImplementation(recipe.requirements, recipe.design, tests, c));
    } catch (err) {
      throw new GenerationError(`Implementation generation failed for '${recipe.name}': ${errorMessage(err)}`, {
        recipe: recipe.name,
        phase: 'generate',
      });
    }
    let artifacts = withFixedTests(createArtifactSet({}), implementation, tests);
    await this.transition(ctx, 'IMPLEMENTATION_GENERATED');

    let run = await this.runTests(ctx, artifacts, 'green');
    let attempts = 0;
    while (run.failed > 0 || run.total === 0) {
      if (attempts >= ctx.config.maxFixIterations) {
        await this.transition(ctx, 'FIX_EXHAUSTED');
        throw new TestFailureError(recipe.name, attempts, run.tests.filter((t) => !t.passed), run.output);
      }
      attempts++;
      const report: FailureReport = {
        kind: 'test-failure',
        summary: `${run.failed} of ${run.total} tests failing (repair ${attempts}/${ctx.config.maxFixIterations})`,
        failures: run.tests.filter((t) => !t.passed),
        output: run.output,
        protectedPaths: Object.keys(tests.files),
      };
      let patch: ArtifactSet;
      try {
        patch = await callOracle(ctx, 'repair', (c) => this.deps.oracle.repair(artifacts, report, c));
      } catch (err) {
        // A failed or timed-out repair still spends one attempt.
        ctx.logger?.warn('Repair request failed', { recipe: recipe.name, attempt: attempts, error: errorMessage(err) });
        continue;
      }
      artifacts = withFixedTests(artifacts, patch, tests);
      run = await this.runTests(ctx, artifacts, `repair-${attempts}`);
    }
    await this.transition(ctx, 'TESTS_PASSING');

    artifacts = await this.remediateStubs(ctx, artifacts, tests);
    return { artifacts, tests, state: 'TESTS_PASSING', repairAttempts: attempts, testRun: run };
  }

  private async generateTests(ctx: PhaseContext): Promise<ArtifactSet> {
    const { recipe } = ctx;
    let tests: ArtifactSet;
    try {
      tests = await callOracleWithRetry(ctx, 'generateTests', (c) =>
        this.deps.oracle.generateTests(recipe.requirements, recipe.design, c));
    } catch (err) {
      throw new GenerationError(`Test generation failed for '${recipe.name}': ${errorMessage(err)}`, {
        recipe: recipe.name,
        phase: 'generate',
      });
    }
    if (Object.keys(tests.files).length === 0) {
      throw new GenerationError(`Test generation for '${recipe.name}' returned no files`, {
        recipe: recipe.name,
        phase: 'generate',
      });
    }
    const uncovered = mustRequirements(recipe)
      .filter((req) => !Object.values(tests.files).some((content) => content.includes(req.id)))
      .map((req) => req.id);
    if (uncovered.length > 0) {
      ctx.logger?.warn('Generated tests do not reference every MUST requirement', { recipe: recipe.name, uncovered });
    }
    return tests;
  }

  /**
   * Ask the oracle to remove unfinished-work markers from the implementation, keeping
   * only patches that leave the tests green.
   */
  private async remediateStubs(ctx: PhaseContext, artifacts: ArtifactSet, tests: ArtifactSet): Promise<ArtifactSet> {
    const { recipe } = ctx;
    const scan = (set: ArtifactSet) => detectStubs(createArtifactSet(
      Object.fromEntries(Object.entries(set.files).filter(([file]) => !(file in tests.files))),
    ));

    let current = artifacts;
    let findings = scan(current);
    for (let round = 1; findings.length > 0 && round <= ctx.config.maxStubRemediations; round++) {
      ctx.logger?.warn('Unfinished code found', { recipe: recipe.name, round, count: findings.length });
      const report: FailureReport = {
        kind: 'stub',
        summary: `${findings.length} unfinished-work markers must be replaced with real code`,
        failures: [],
        output: formatStubReport(findings),
        protectedPaths: Object.keys(tests.files),
      };
      let candidate: ArtifactSet;
      try {
        const patch = await callOracle(ctx, 'repair', (c) => this.deps.oracle.repair(current, report, c));
        candidate = withFixedTests(current, patch, tests);
      } catch (err) {
        ctx.logger?.warn('Stub remediation request failed', { recipe: recipe.name, round, error: errorMessage(err) });
        continue;
      }
      const run = await this.runTests(ctx, candidate, `stub-${round}`);
      if (run.failed > 0 || run.total === 0) {
        ctx.logger?.warn('Stub remediation broke the tests; discarded', { recipe: recipe.name, round });
        continue;
      }
      current = candidate;
      findings = scan(current);
    }

    if (findings.length > 0) {
      throw new GenerationError(`Unfinished code remains in '${recipe.name}' (${findings.length} markers)`, {
        recipe: recipe.name,
        phase: 'generate',
        diagnostic: formatStubReport(findings),
      });
    }
    return current;
  }

  private async runTests(ctx: PhaseContext, artifacts: ArtifactSet, stage: string): Promise<TestRunResult> {
    const result = await this.deps.testRunner.run(artifacts, `${ctx.recipe.name}-${stage}`);
    ctx.logger?.testResults(ctx.recipe.name, result.passed, result.failed, result.total, result.coveragePct);
    await ctx.send({
      type: 'test_result',
      recipe: ctx.recipe.name,
      stage,
      passed: result.passed,
      failed: result.failed,
      total: result.total,
      coverage_pct: result.coveragePct,
    });
    return result;
  }

  private async transition(ctx: PhaseContext, state: GenerationState): Promise<void> {
    ctx.logger?.debug('Generation state', { recipe: ctx.recipe.name, state });
    await ctx.send({ type: 'phase_changed', recipe: ctx.recipe.name, phase: 'generate', state });
  }
}
