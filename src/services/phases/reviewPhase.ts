/** Review phase: structured review with a bounded revise loop for critical findings. */

import type { ArtifactSet, ReviewFinding, ReviewReport } from '../../models/build.js';
import { GenerationError, ReviewError, errorMessage } from '../../utils/errors.js';
import type { GenerationOracle } from '../oracle.js';
import { callOracle, callOracleWithRetry, withFixedTests, type PhaseContext } from './types.js';

export interface ReviewResult {
  artifacts: ArtifactSet;
  /** Non-blocking findings collected across every review round. */
  suggestions: ReviewFinding[];
  revisions: number;
}

export class ReviewPhase {
  private oracle: GenerationOracle;

  constructor(oracle: GenerationOracle) {
    this.oracle = oracle;
  }

  async execute(ctx: PhaseContext, artifacts: ArtifactSet, tests: ArtifactSet): Promise<ReviewResult> {
    const { recipe } = ctx;
    ctx.logger?.phase(recipe.name, 'review');
    await ctx.send({ type: 'phase_changed', recipe: recipe.name, phase: 'review' });

    const suggestions = new Map<string, ReviewFinding>();
    let current = artifacts;
    let report = await this.review(ctx, current, 0);
    let revisions = 0;

    for (;;) {
      for (const finding of report.findings.filter((f) => f.severity === 'SUGGESTION')) {
        suggestions.set(`${finding.file ?? ''}:${finding.message}`, finding);
      }
      const critical = report.findings.filter((f) => f.severity === 'CRITICAL');
      if (critical.length === 0) break;
      if (revisions >= ctx.config.maxReviewIterations) {
        throw new ReviewError(recipe.name, revisions, critical);
      }
      revisions++;
      try {
        const revised = await callOracle(ctx, 'reviseForReview', (c) => this.oracle.reviseForReview(current, critical, c));
        current = withFixedTests(current, revised, tests);
      } catch (err) {
        // Spends the round; the same findings carry into the next one.
        ctx.logger?.warn('Revision request failed', { recipe: recipe.name, revision: revisions, error: errorMessage(err) });
        continue;
      }
      try {
        report = await this.review(ctx, current, revisions, false);
      } catch (err) {
        // Also spends the round; the previous report's findings stand.
        ctx.logger?.warn('Re-review request failed', { recipe: recipe.name, revision: revisions, error: errorMessage(err) });
      }
    }

    return { artifacts: current, suggestions: [...suggestions.values()], revisions };
  }

  private async review(ctx: PhaseContext, artifacts: ArtifactSet, iteration: number, retry = true): Promise<ReviewReport> {
    const { recipe } = ctx;
    const call: typeof callOracle = retry ? callOracleWithRetry : callOracle;
    let report: ReviewReport;
    try {
      report = await call(ctx, 'review', (c) => this.oracle.review(artifacts, recipe.requirements, c));
    } catch (err) {
      throw new GenerationError(`Review request failed for '${recipe.name}': ${errorMessage(err)}`, {
        recipe: recipe.name,
        phase: 'review',
      });
    }
    const critical = report.findings.filter((f) => f.severity === 'CRITICAL').length;
    await ctx.send({
      type: 'review_findings',
      recipe: recipe.name,
      iteration,
      critical,
      suggestions: report.findings.length - critical,
    });
    return report;
  }
}
