/** Compliance phase: per-requirement evidence matrix; any MUST requirement without evidence fails the build. */

import { isTestPath, type ArtifactSet, type ComplianceMatrix } from '../../models/build.js';
import type { Requirement } from '../../models/recipe.js';
import { ComplianceError } from '../../utils/errors.js';
import type { PhaseContext } from './types.js';

export interface ComplianceResult {
  matrix: ComplianceMatrix;
  /** Copies of the recipe's requirements with `implemented` set. */
  requirements: Requirement[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Build the matrix: a requirement is satisfied when its id appears in implementation and test files. */
export function buildComplianceMatrix(requirements: Requirement[], artifacts: ArtifactSet): ComplianceMatrix {
  const files = Object.entries(artifacts.files);
  return requirements.map((req) => {
    const token = new RegExp(`(^|[^\\w-])${escapeRegExp(req.id)}(?![\\w-])`);
    const matching = files.filter(([, content]) => token.test(content)).map(([file]) => file);
    const implementation = matching.filter((file) => !isTestPath(file));
    const tests = matching.filter((file) => isTestPath(file));
    return {
      requirementId: req.id,
      priority: req.priority,
      evidence: { implementation, tests },
      satisfied: implementation.length > 0 && tests.length > 0,
    };
  });
}

export class CompliancePhase {
  async execute(ctx: PhaseContext, artifacts: ArtifactSet): Promise<ComplianceResult> {
    const { recipe } = ctx;
    ctx.logger?.phase(recipe.name, 'compliance');
    await ctx.send({ type: 'phase_changed', recipe: recipe.name, phase: 'compliance' });

    const matrix = buildComplianceMatrix(recipe.requirements.requirements, artifacts);
    const satisfied = new Set(matrix.filter((r) => r.satisfied).map((r) => r.requirementId));
    const requirements = recipe.requirements.requirements.map((req) => ({ ...req, implemented: satisfied.has(req.id) }));

    const optionalGaps = matrix.filter((r) => !r.satisfied && r.priority !== 'MUST').map((r) => r.requirementId);
    if (optionalGaps.length > 0) {
      ctx.logger?.warn('Optional requirements without evidence', { recipe: recipe.name, requirements: optionalGaps });
    }
    const unmet = matrix.filter((r) => !r.satisfied && r.priority === 'MUST').map((r) => r.requirementId);
    if (unmet.length > 0) {
      throw new ComplianceError(recipe.name, unmet);
    }
    return { matrix, requirements };
  }
}
