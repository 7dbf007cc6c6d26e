/** Test helpers: recipe fixtures, a scripted oracle, and in-process quality tools. */

import fs from 'node:fs';
import path from 'node:path';
import {
  createArtifactSet,
  isTestPath,
  type ArtifactSet,
  type ReviewFinding,
  type ReviewReport,
  type TestRunResult,
} from '../models/build.js';
import type { ComponentType, Design, Recipe, RequirementSet } from '../models/recipe.js';
import type { CorrectedSources, FailureReport, GenerationOracle, OracleCallContext } from '../services/oracle.js';
import type { QualityTools, TestRunner } from '../services/qualityTools.js';
import type { BuildEvent, PhaseContext } from '../services/phases/types.js';
import { RecipeStore } from '../services/recipeStore.js';
import { parseConfig, type ConfigInput, type OrchestratorConfig } from '../utils/config.js';
import type { SeparationViolation } from '../utils/errors.js';

// -- Recipe fixtures --

export interface RecipeFixture {
  name: string;
  type?: ComponentType;
  dependencies?: string[];
  requirements?: string[];
  components?: string[];
  metadata?: Record<string, unknown>;
  architecture?: string;
}

export function requirementsMarkdown(title: string, requirements: string[]): string {
  return [
    `# ${title}`,
    '',
    '## Purpose',
    `Provides ${title}.`,
    '',
    '## Functional Requirements',
    ...requirements.map((r) => `- ${r}`),
    '',
  ].join('\n');
}

export function designMarkdown(components: string[], architecture = 'A small module with one entry point.'): string {
  const lines = ['# Design', '', '## Architecture', architecture, '', '## Components', ''];
  for (const component of components) {
    lines.push(`### ${component}`, `Handles ${component.toLowerCase()}.`, '');
  }
  return lines.join('\n');
}

export function fixtureSources(fixture: RecipeFixture) {
  return {
    requirements: requirementsMarkdown(fixture.name, fixture.requirements ?? [`[${fixture.name}-r1] MUST return a value`]),
    design: designMarkdown(fixture.components ?? ['Core'], fixture.architecture),
    metadata: JSON.stringify({
      name: fixture.name,
      type: fixture.type ?? 'library',
      dependencies: fixture.dependencies ?? [],
      metadata: fixture.metadata ?? {},
    }, null, 2),
  };
}

export function makeRecipe(fixture: RecipeFixture): Recipe {
  return new RecipeStore().fromSources(`/recipes/${fixture.name}`, fixtureSources(fixture));
}

export function recipeMap(...recipes: Recipe[]): Map<string, Recipe> {
  return new Map(recipes.map((r) => [r.name, r]));
}

/** Write a recipe directory under `root/<dir>`; returns its path. */
export function writeRecipe(root: string, fixture: RecipeFixture, dir = fixture.name): string {
  const location = path.join(root, dir);
  const sources = fixtureSources(fixture);
  fs.mkdirSync(location, { recursive: true });
  fs.writeFileSync(path.join(location, 'requirements.md'), sources.requirements);
  fs.writeFileSync(path.join(location, 'design.md'), sources.design);
  fs.writeFileSync(path.join(location, 'components.json'), sources.metadata);
  return location;
}

// -- Config --

export function testConfig(overrides: ConfigInput = {}): OrchestratorConfig {
  return parseConfig({
    maxWorkers: 2,
    coverageMinimum: 80,
    oracleTimeoutMs: 1000,
    gateTimeoutMs: 1000,
    oracleRetryBaseMs: 1,
    cacheDir: '/tmp/recipe-forge-test-cache',
    outputDir: '/tmp/recipe-forge-test-output',
    ...overrides,
  });
}

// -- Event capture --

export interface EventCapture {
  events: BuildEvent[];
  send: (event: BuildEvent) => Promise<void>;
}

export function createEventCapture(): EventCapture {
  const events: BuildEvent[] = [];
  const send = async (event: BuildEvent) => {
    events.push(event);
  };
  return { events, send };
}

export function eventsOfType<T extends BuildEvent['type']>(events: BuildEvent[], type: T): Extract<BuildEvent, { type: T }>[] {
  return events.filter((e): e is Extract<BuildEvent, { type: T }> => e.type === type);
}

/** A phase context over `recipe` that records every event it is sent. */
export function phaseContext(recipe: Recipe, overrides: ConfigInput = {}): { ctx: PhaseContext; events: BuildEvent[] } {
  const { events, send } = createEventCapture();
  return {
    ctx: { recipe, send, logger: null, config: testConfig(overrides), abortSignal: new AbortController().signal },
    events,
  };
}

// -- Scripted oracle --

type Step<T> = T | Error;

/** Marker the fake test runner looks for: an implementation containing it fails its tests. */
export const BROKEN = 'BROKEN';

function requirementIds(requirements: RequirementSet): string[] {
  return requirements.requirements.map((r) => r.id);
}

/**
 * Deterministic oracle. Each operation answers from its queue when one is scripted,
 * otherwise with a default that cites every requirement id in both tests and code.
 */
export class ScriptedOracle implements GenerationOracle {
  readonly calls: Array<{ operation: string; recipe: string }> = [];
  readonly repairReports: FailureReport[] = [];
  tests: Step<ArtifactSet>[] = [];
  implementations: Step<ArtifactSet>[] = [];
  repairs: Step<ArtifactSet>[] = [];
  reviews: Step<ReviewReport>[] = [];
  revisions: Step<ArtifactSet>[] = [];
  corrections: Step<CorrectedSources>[] = [];
  /** Delay per call, for concurrency tests. */
  delayMs = 0;
  inFlight = 0;
  maxInFlight = 0;

  private async answer<T>(operation: string, ctx: OracleCallContext, queue: Step<T>[], fallback: () => T): Promise<T> {
    this.calls.push({ operation, recipe: ctx.recipe });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? fallback();
    } finally {
      this.inFlight--;
    }
  }

  callsTo(operation: string): number {
    return this.calls.filter((c) => c.operation === operation).length;
  }

  generateTests(requirements: RequirementSet, _design: Design, ctx: OracleCallContext): Promise<ArtifactSet> {
    return this.answer('generateTests', ctx, this.tests, () => createArtifactSet({
      'src/module.test.ts': requirementIds(requirements).map((id) => `it('${id}', () => {});`).join('\n'),
    }));
  }

  generateImplementation(
    requirements: RequirementSet,
    _design: Design,
    _fixedTests: ArtifactSet,
    ctx: OracleCallContext,
  ): Promise<ArtifactSet> {
    return this.answer('generateImplementation', ctx, this.implementations, () => createArtifactSet({
      'src/module.ts': requirementIds(requirements).map((id) => `// ${id}\nexport const value = 1;`).join('\n'),
    }));
  }

  repair(artifacts: ArtifactSet, report: FailureReport, ctx: OracleCallContext): Promise<ArtifactSet> {
    this.repairReports.push(report);
    return this.answer('repair', ctx, this.repairs, () => createArtifactSet(Object.fromEntries(
      Object.entries(artifacts.files)
        .filter(([file]) => !isTestPath(file))
        .map(([file, content]) => [file, content.split(BROKEN).join('')]),
    )));
  }

  review(_artifacts: ArtifactSet, _requirements: RequirementSet, ctx: OracleCallContext): Promise<ReviewReport> {
    return this.answer('review', ctx, this.reviews, () => ({ findings: [], summary: 'Looks good' }));
  }

  reviseForReview(artifacts: ArtifactSet, _critical: ReviewFinding[], ctx: OracleCallContext): Promise<ArtifactSet> {
    return this.answer('reviseForReview', ctx, this.revisions, () => createArtifactSet({}));
  }

  correctSeparation(
    sources: CorrectedSources,
    _violations: SeparationViolation[],
    ctx: OracleCallContext,
  ): Promise<CorrectedSources> {
    return this.answer('correctSeparation', ctx, this.corrections, () => sources);
  }
}

// -- In-process quality tools --

/**
 * Two test cases per run. With no implementation files, or an implementation
 * containing BROKEN, both fail; otherwise both pass.
 */
export class FakeTestRunner implements TestRunner {
  readonly labels: string[] = [];
  coveragePct: number | null = 90;
  /** Runs answered before the default rule applies. */
  scripted: Array<TestRunResult | Error> = [];

  async run(artifacts: ArtifactSet, label: string): Promise<TestRunResult> {
    this.labels.push(label);
    const next = this.scripted.shift();
    if (next instanceof Error) throw next;
    if (next) return next;
    const implementation = Object.entries(artifacts.files).filter(([file]) => !isTestPath(file));
    const passing = implementation.length > 0 && implementation.every(([, content]) => !content.includes(BROKEN));
    return testRun(passing ? 2 : 0, passing ? 0 : 2, this.coveragePct);
  }
}

export function testRun(passed: number, failed: number, coveragePct: number | null = 90): TestRunResult {
  const tests = [
    ...Array.from({ length: passed }, (_, i) => ({ name: `case ${i + 1}`, passed: true, details: 'PASSED' })),
    ...Array.from({ length: failed }, (_, i) => ({ name: `case ${passed + i + 1}`, passed: false, details: 'FAILED' })),
  ];
  return { tests, passed, failed, total: passed + failed, coveragePct, output: `${passed} passed, ${failed} failed` };
}

export interface FakeTools extends QualityTools {
  testRunner: FakeTestRunner;
}

export function createFakeTools(): FakeTools {
  return {
    typeChecker: { check: async () => ({ passed: true, output: '' }) },
    linter: { lint: async (artifacts) => ({ passed: true, output: '', artifacts }) },
    testRunner: new FakeTestRunner(),
  };
}
