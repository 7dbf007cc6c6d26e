/** Error taxonomy. Every error carries the recipe, phase and raw diagnostic it arose from. */

import type { ReviewFinding, TestCaseResult } from '../models/build.js';

export type ErrorCategory = 'input' | 'build';

export interface ErrorContext {
  recipe?: string | null;
  phase?: string | null;
  diagnostic?: string | null;
}

export abstract class RecipeForgeError extends Error {
  abstract readonly category: ErrorCategory;
  readonly recipe: string | null;
  readonly phase: string | null;
  readonly diagnostic: string | null;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.recipe = context.recipe ?? null;
    this.phase = context.phase ?? null;
    this.diagnostic = context.diagnostic ?? null;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recipe: this.recipe,
      phase: this.phase,
      diagnostic: this.diagnostic,
    };
  }
}

export class ParseError extends RecipeForgeError {
  readonly category = 'input';
  readonly artifact: string;
  readonly line: number | null;
  /** The message without the artifact:line prefix. */
  readonly detail: string;

  constructor(artifact: string, detail: string, line: number | null = null, context: ErrorContext = {}) {
    super(`${artifact}${line !== null ? `:${line}` : ''}: ${detail}`, { phase: 'parse', ...context });
    this.artifact = artifact;
    this.line = line;
    this.detail = detail;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), artifact: this.artifact, line: this.line };
  }
}

export interface SeparationViolation {
  artifact: 'requirements' | 'design';
  line: number;
  rule: string;
  text: string;
  message: string;
}

export class ValidationError extends RecipeForgeError {
  readonly category = 'input';
  readonly violations: SeparationViolation[];

  constructor(message: string, context: ErrorContext = {}, violations: SeparationViolation[] = []) {
    super(message, context);
    this.violations = violations;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), violations: this.violations };
  }
}

export class ComplexityExceededError extends RecipeForgeError {
  readonly category = 'input';
  readonly depth: number;

  constructor(recipe: string, depth: number, score: number) {
    super(`Recipe '${recipe}' is still too complex (score ${score.toFixed(2)}) at decomposition depth ${depth}`, {
      recipe,
      phase: 'decompose',
    });
    this.depth = depth;
  }
}

export class CircularDependencyError extends RecipeForgeError {
  readonly category = 'input';
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular dependency: ${cycle.join(' -> ')}`, { phase: 'resolve' });
    this.cycle = cycle;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), cycle: this.cycle };
  }
}

export class MissingDependencyError extends RecipeForgeError {
  readonly category = 'input';
  readonly dependent: string;
  readonly missing: string;

  constructor(dependent: string, missing: string) {
    super(`Recipe '${dependent}' depends on unknown recipe '${missing}'`, { recipe: dependent, phase: 'resolve' });
    this.dependent = dependent;
    this.missing = missing;
  }
}

export class GenerationError extends RecipeForgeError {
  readonly category = 'build';
}

export class TestFailureError extends RecipeForgeError {
  readonly category = 'build';
  readonly attempts: number;
  readonly failures: TestCaseResult[];

  constructor(recipe: string, attempts: number, failures: TestCaseResult[], diagnostic: string | null) {
    super(`Tests still failing for '${recipe}' after ${attempts} repair attempts (${failures.length} failing)`, {
      recipe,
      phase: 'generate',
      diagnostic,
    });
    this.attempts = attempts;
    this.failures = failures;
  }
}

export class ReviewError extends RecipeForgeError {
  readonly category = 'build';
  readonly findings: ReviewFinding[];

  constructor(recipe: string, iterations: number, findings: ReviewFinding[]) {
    super(`Critical review findings remain for '${recipe}' after ${iterations} revisions`, {
      recipe,
      phase: 'review',
      diagnostic: findings.map((f) => `${f.file ? `${f.file}: ` : ''}${f.message}`).join('\n'),
    });
    this.findings = findings;
  }
}

export type GateName = 'typecheck' | 'lint' | 'test' | 'coverage';

export class QualityGateFailure extends RecipeForgeError {
  readonly category = 'build';
  readonly gate: GateName;
  readonly output: string;

  constructor(recipe: string, gate: GateName, message: string, output: string) {
    super(`Quality gate '${gate}' failed for '${recipe}': ${message}`, { recipe, phase: 'quality-gates', diagnostic: output });
    this.gate = gate;
    this.output = output;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), gate: this.gate };
  }
}

export class ComplianceError extends RecipeForgeError {
  readonly category = 'build';
  readonly unmet: string[];

  constructor(recipe: string, unmet: string[]) {
    super(`MUST requirements without evidence in '${recipe}': ${unmet.join(', ')}`, { recipe, phase: 'compliance' });
    this.unmet = unmet;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), unmet: this.unmet };
  }
}

export type SelfHostingStage = 'completeness' | 'verification' | 'reproduction';

export class SelfHostingError extends RecipeForgeError {
  readonly category = 'build';
  readonly stage: SelfHostingStage;

  constructor(recipe: string, stage: SelfHostingStage, message: string, diagnostic: string | null = null) {
    super(`Self-hosting ${stage} check failed for '${recipe}': ${message}`, { recipe, phase: 'self-host', diagnostic });
    this.stage = stage;
  }
}

export function isRecipeForgeError(err: unknown): err is RecipeForgeError {
  return err instanceof RecipeForgeError;
}

/** Process exit code for an error escaping the CLI: 2 for bad input, 1 for everything else. */
export function exitCodeFor(err: unknown): number {
  return isRecipeForgeError(err) && err.category === 'input' ? 2 : 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
