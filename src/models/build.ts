/** Build-side data model: artifact sets, cache records, per-recipe and collection results. */

import type { Priority, Requirement } from './recipe.js';

/** Relative path -> file content. Never mutated; every repair or revision yields a new set. */
export interface ArtifactSet {
  readonly files: Readonly<Record<string, string>>;
  readonly generatedAt: string;
}

export type BuildOutcome = 'success' | 'failure';

export interface BuildRecord {
  lastChecksum: string;
  lastOutcome: BuildOutcome;
  lastBuildTimestamp: string;
  /** Set on every record; dependents built before `sequence` must rebuild. */
  changedSinceLastRebuildOfDependents: boolean;
  /** Monotonic build counter, used to order a record against its dependents' records. */
  sequence: number;
  dependencies: string[];
}

export interface ComplianceEvidence {
  implementation: string[];
  tests: string[];
}

export interface ComplianceRecord {
  requirementId: string;
  priority: Priority;
  evidence: ComplianceEvidence;
  satisfied: boolean;
}

export type ComplianceMatrix = ComplianceRecord[];

export type ReviewSeverity = 'CRITICAL' | 'SUGGESTION';

export interface ReviewFinding {
  severity: ReviewSeverity;
  file?: string;
  message: string;
}

export interface ReviewReport {
  findings: ReviewFinding[];
  summary: string;
}

export interface TestCaseResult {
  name: string;
  passed: boolean;
  details: string;
}

export interface TestRunResult {
  tests: TestCaseResult[];
  passed: number;
  failed: number;
  total: number;
  coveragePct: number | null;
  output: string;
}

export type RecipeStatus =
  | 'succeeded'
  | 'failed'
  | 'skipped'
  | 'skipped-due-to-dependency-failure';

export interface RecipeError {
  name: string;
  message: string;
  phase: string | null;
  diagnostic: string | null;
}

export interface SingleBuildResult {
  recipe: string;
  status: RecipeStatus;
  /** Why a recipe was skipped, or which dependency failed. */
  reason?: string;
  artifacts?: ArtifactSet;
  compliance?: ComplianceMatrix;
  /** The recipe's requirements with `implemented` set from the compliance matrix. */
  requirements?: Requirement[];
  suggestions?: ReviewFinding[];
  error?: RecipeError;
  elapsedMs: number;
}

export interface BuildResult {
  success: boolean;
  order: string[];
  groups: string[][];
  results: Record<string, SingleBuildResult>;
  elapsedMs: number;
}

export function createArtifactSet(files: Record<string, string>, generatedAt = new Date().toISOString()): ArtifactSet {
  return Object.freeze({ files: Object.freeze({ ...files }), generatedAt });
}

/** New set with `updates` layered over `base`. */
export function mergeArtifacts(base: ArtifactSet, updates: ArtifactSet): ArtifactSet {
  return createArtifactSet({ ...base.files, ...updates.files }, updates.generatedAt);
}

export function isTestPath(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, '/');
  return /\.(test|spec)\.[cm]?[jt]sx?$/.test(normalized)
    || /(^|\/)(tests?|__tests__)\//.test(normalized);
}
