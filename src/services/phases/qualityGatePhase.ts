/** Quality gate phase: type check, lint with auto-fix, tests, coverage. All must pass, in order. */

import type { ArtifactSet, TestRunResult } from '../../models/build.js';
import { QualityGateFailure, errorMessage, type GateName } from '../../utils/errors.js';
import type { QualityTools, ToolResult } from '../qualityTools.js';
import type { PhaseContext } from './types.js';

export interface QualityGateResult {
  /** Artifacts after lint auto-fixes. */
  artifacts: ArtifactSet;
  testRun: TestRunResult;
}

export class QualityGatePhase {
  private tools: QualityTools;

  constructor(tools: QualityTools) {
    this.tools = tools;
  }

  async execute(ctx: PhaseContext, artifacts: ArtifactSet): Promise<QualityGateResult> {
    const { recipe } = ctx;
    ctx.logger?.phase(recipe.name, 'quality-gates');
    await ctx.send({ type: 'phase_changed', recipe: recipe.name, phase: 'quality-gates' });

    const typecheck = await this.invoke(ctx, 'typecheck', () => this.tools.typeChecker.check(artifacts, recipe.name));
    await this.report(ctx, 'typecheck', typecheck.passed, typecheck.output);
    if (!typecheck.passed) {
      throw new QualityGateFailure(recipe.name, 'typecheck', 'type errors reported', typecheck.output);
    }

    const lint = await this.invoke(ctx, 'lint', () => this.tools.linter.lint(artifacts, recipe.name));
    await this.report(ctx, 'lint', lint.passed, lint.output);
    if (!lint.passed) {
      throw new QualityGateFailure(recipe.name, 'lint', 'issues remain after auto-fix', lint.output);
    }
    const fixed = lint.artifacts;

    const testRun = await this.invoke(ctx, 'test', () => this.tools.testRunner.run(fixed, `${recipe.name}-gate`));
    ctx.logger?.testResults(recipe.name, testRun.passed, testRun.failed, testRun.total, testRun.coveragePct);
    await ctx.send({
      type: 'test_result',
      recipe: recipe.name,
      stage: 'gate',
      passed: testRun.passed,
      failed: testRun.failed,
      total: testRun.total,
      coverage_pct: testRun.coveragePct,
    });
    const testsPassed = testRun.failed === 0 && testRun.total > 0;
    await this.report(ctx, 'test', testsPassed, testRun.output);
    if (!testsPassed) {
      throw new QualityGateFailure(
        recipe.name,
        'test',
        testRun.total === 0 ? 'no tests ran' : `${testRun.failed} of ${testRun.total} tests failing`,
        testRun.output,
      );
    }

    const minimum = ctx.config.coverageMinimum;
    if (minimum > 0) {
      const pct = testRun.coveragePct;
      const covered = pct !== null && pct >= minimum;
      await this.report(ctx, 'coverage', covered, testRun.output);
      if (!covered) {
        throw new QualityGateFailure(
          recipe.name,
          'coverage',
          pct === null ? 'no coverage report produced' : `coverage ${pct}% below minimum ${minimum}%`,
          testRun.output,
        );
      }
    }

    return { artifacts: fixed, testRun };
  }

  /** Tool crashes and timeouts fail the gate they belong to. */
  private async invoke<T extends ToolResult | TestRunResult>(ctx: PhaseContext, gate: GateName, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      await this.report(ctx, gate, false, errorMessage(err));
      throw new QualityGateFailure(ctx.recipe.name, gate, 'tool did not complete', errorMessage(err));
    }
  }

  private async report(ctx: PhaseContext, gate: GateName, passed: boolean, output: string): Promise<void> {
    ctx.logger?.gateResult(ctx.recipe.name, gate, passed, passed ? undefined : output);
    await ctx.send({ type: 'gate_result', recipe: ctx.recipe.name, gate, passed });
  }
}
