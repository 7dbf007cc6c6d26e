/** Generation oracle interface: the external capability that turns recipes into source artifacts. */

import type { ArtifactSet, ReviewFinding, ReviewReport, TestCaseResult } from '../models/build.js';
import type { Design, RequirementSet } from '../models/recipe.js';
import type { SeparationViolation } from '../utils/errors.js';

export interface OracleCallContext {
  recipe: string;
  /** Aborted when the caller's deadline passes. */
  signal?: AbortSignal;
}

export type FailureKind = 'test-failure' | 'stub';

export interface FailureReport {
  kind: FailureKind;
  summary: string;
  failures: TestCaseResult[];
  /** Raw tool output or stub scan listing. */
  output: string;
  /** Paths the repair must not touch (the test contract). */
  protectedPaths: string[];
}

export interface CorrectedSources {
  requirements: string;
  design: string;
}

/**
 * Every call is request/response and may fail or time out; the oracle is not
 * expected to retry. Each call returns a new ArtifactSet.
 */
export interface GenerationOracle {
  generateTests(requirements: RequirementSet, designHints: Design, ctx: OracleCallContext): Promise<ArtifactSet>;
  generateImplementation(
    requirements: RequirementSet,
    design: Design,
    fixedTests: ArtifactSet,
    ctx: OracleCallContext,
  ): Promise<ArtifactSet>;
  repair(artifacts: ArtifactSet, failureReport: FailureReport, ctx: OracleCallContext): Promise<ArtifactSet>;
  review(artifacts: ArtifactSet, requirements: RequirementSet, ctx: OracleCallContext): Promise<ReviewReport>;
  reviseForReview(artifacts: ArtifactSet, criticalFindings: ReviewFinding[], ctx: OracleCallContext): Promise<ArtifactSet>;
  correctSeparation(
    sources: CorrectedSources,
    violations: SeparationViolation[],
    ctx: OracleCallContext,
  ): Promise<CorrectedSources>;
}
