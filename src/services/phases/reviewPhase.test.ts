/** Unit tests for ReviewPhase. */

import { describe, it, expect, beforeEach } from 'vitest';
import { createArtifactSet, type ReviewReport } from '../../models/build.js';
import { GenerationError, ReviewError } from '../../utils/errors.js';
import { ScriptedOracle, eventsOfType, makeRecipe, phaseContext } from '../../tests/helpers.js';
import { ReviewPhase } from './reviewPhase.js';

const recipe = makeRecipe({ name: 'calc' });
const tests = createArtifactSet({ 'src/calc.test.ts': "it('calc-r1', () => {});" });
const artifacts = createArtifactSet({ ...tests.files, 'src/calc.ts': '// calc-r1\nexport const v = 1;' });

const critical: ReviewReport = {
  summary: 'overflow unchecked',
  findings: [{ severity: 'CRITICAL', file: 'src/calc.ts', message: 'overflow unchecked' }],
};
const suggestion: ReviewReport = {
  summary: 'naming',
  findings: [{ severity: 'SUGGESTION', file: 'src/calc.ts', message: 'rename v' }],
};

describe('ReviewPhase', () => {
  let oracle: ScriptedOracle;
  let phase: ReviewPhase;

  beforeEach(() => {
    oracle = new ScriptedOracle();
    phase = new ReviewPhase(oracle);
  });

  it('passes artifacts through when the review is clean', async () => {
    const { ctx } = phaseContext(recipe);
    const result = await phase.execute(ctx, artifacts, tests);
    expect(result).toEqual({ artifacts, suggestions: [], revisions: 0 });
  });

  it('collects suggestions without blocking', async () => {
    oracle.reviews.push(suggestion);
    const { ctx, events } = phaseContext(recipe);
    const result = await phase.execute(ctx, artifacts, tests);
    expect(result.suggestions).toEqual(suggestion.findings);
    expect(eventsOfType(events, 'review_findings')).toEqual([
      { type: 'review_findings', recipe: 'calc', iteration: 0, critical: 0, suggestions: 1 },
    ]);
  });

  it('revises for critical findings and keeps the tests fixed', async () => {
    oracle.reviews.push(critical, suggestion);
    oracle.revisions.push(createArtifactSet({ 'src/calc.ts': '// calc-r1\nexport const v = 2;', 'src/calc.test.ts': 'gone' }));
    const { ctx } = phaseContext(recipe);

    const result = await phase.execute(ctx, artifacts, tests);

    expect(result.revisions).toBe(1);
    expect(result.artifacts.files).toEqual({
      'src/calc.test.ts': "it('calc-r1', () => {});",
      'src/calc.ts': '// calc-r1\nexport const v = 2;',
    });
    expect(result.suggestions).toEqual(suggestion.findings);
  });

  it('fails when critical findings outlast the revision bound', async () => {
    oracle.reviews.push(critical, critical, critical);
    const { ctx } = phaseContext(recipe, { maxReviewIterations: 2 });

    const err = await phase.execute(ctx, artifacts, tests).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReviewError);
    expect((err as ReviewError).message).toBe("Critical review findings remain for 'calc' after 2 revisions");
    expect((err as ReviewError).diagnostic).toBe('src/calc.ts: overflow unchecked');
    expect(oracle.callsTo('reviseForReview')).toBe(2);
  });

  it('spends a round when a revision request fails', async () => {
    oracle.reviews.push(critical, { summary: 'ok', findings: [] });
    oracle.revisions.push(new Error('timeout'));
    const { ctx } = phaseContext(recipe);

    const result = await phase.execute(ctx, artifacts, tests);

    expect(result.revisions).toBe(2);
    expect(oracle.callsTo('review')).toBe(2);
  });

  it('fails the recipe when the review request fails on every attempt', async () => {
    oracle.reviews.push(new Error('overloaded'), new Error('overloaded'), new Error('overloaded'));
    const { ctx } = phaseContext(recipe);
    const err = await phase.execute(ctx, artifacts, tests).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect((err as GenerationError).message).toBe("Review request failed for 'calc': overloaded");
    expect((err as GenerationError).phase).toBe('review');
    expect(oracle.callsTo('review')).toBe(3);
  });

  it('retries a transient failure of the first review', async () => {
    oracle.reviews.push(new Error('overloaded'), { summary: 'ok', findings: [] });
    const { ctx } = phaseContext(recipe);

    const result = await phase.execute(ctx, artifacts, tests);

    expect(result.revisions).toBe(0);
    expect(oracle.callsTo('review')).toBe(2);
  });

  it('spends a round when a re-review request fails', async () => {
    oracle.reviews.push(critical, new Error('overloaded'), { summary: 'ok', findings: [] });
    const { ctx } = phaseContext(recipe);

    const result = await phase.execute(ctx, artifacts, tests);

    expect(result.revisions).toBe(2);
    expect(oracle.callsTo('reviseForReview')).toBe(2);
    expect(oracle.callsTo('review')).toBe(3);
  });

  it('fails when re-reviews keep failing until the revision bound', async () => {
    oracle.reviews.push(critical, new Error('overloaded'), new Error('overloaded'));
    const { ctx } = phaseContext(recipe, { maxReviewIterations: 2 });

    const err = await phase.execute(ctx, artifacts, tests).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReviewError);
    expect((err as ReviewError).diagnostic).toBe('src/calc.ts: overflow unchecked');
    expect(oracle.callsTo('review')).toBe(3);
  });
});
