/** Flags implementation detail in requirements and requirement language in design documents. */

import fs from 'node:fs';
import path from 'node:path';
import type { Recipe } from '../models/recipe.js';
import type { BuildLogger } from '../utils/buildLogger.js';
import type { SeparationPolicy } from '../utils/config.js';
import { DESIGN_FILE, REQUIREMENTS_FILE } from '../utils/constants.js';
import { ValidationError, errorMessage, type SeparationViolation } from '../utils/errors.js';
import { withTimeout } from '../utils/withTimeout.js';
import type { CorrectedSources, GenerationOracle } from './oracle.js';
import type { RecipeStore } from './recipeStore.js';

interface SeparationRule {
  id: string;
  pattern: RegExp;
  message: string;
}

const REQUIREMENT_RULES: SeparationRule[] = [
  {
    id: 'named-storage',
    pattern: /\b(postgres(?:ql)?|mysql|sqlite|mongo(?:db)?|redis|dynamodb|cassandra|elasticsearch)\b/i,
    message: 'names a storage technology',
  },
  {
    id: 'named-framework',
    pattern: /\b(?:with|using|in|on) (flask|django|fastapi|express|react|angular|vue|spring|rails|nestjs|next\.js)\b/i,
    message: 'names a framework',
  },
  {
    id: 'named-language',
    pattern: /\b(?:written|implemented|coded) in (python|typescript|javascript|java|go|rust|c\+\+|c#|ruby|kotlin)\b/i,
    message: 'names an implementation language',
  },
  { id: 'implementation-phrase', pattern: /\bimplement(?:ed)? (?:using|with|via)\b/i, message: 'prescribes how to implement' },
  {
    id: 'concurrency-primitive',
    pattern: /\busing (asyncio|threads?|threading|worker threads|mutex(?:es)?|semaphores?|locks?)\b/i,
    message: 'prescribes a concurrency mechanism',
  },
  {
    id: 'class-structure',
    pattern: /\b(inherits? from|extends? (?:the )?\w+ class|subclass(?:es)? of)\b/i,
    message: 'prescribes a class structure',
  },
  {
    id: 'integration-call',
    pattern: /\bcall(?:s|ing)? (?:the )?[\w.-]+ (?:API|endpoint|SDK)\b/i,
    message: 'names a specific integration call',
  },
  { id: 'named-model', pattern: /\busing (claude|gpt-?[\w.]*|openai)\b/i, message: 'names a generation backend' },
  {
    id: 'named-algorithm',
    pattern: /\b(?:using|via|with) (?:an? )?(dfs|bfs|depth-first search|breadth-first search|kahn'?s algorithm|dijkstra'?s algorithm|quicksort|md5)\b/i,
    message: 'names an algorithm',
  },
];

const DESIGN_RULES: SeparationRule[] = [
  { id: 'priority-token', pattern: /\b(MUST|SHALL|SHOULD|COULD)\b/, message: 'uses a requirement priority token' },
  { id: 'system-shall', pattern: /\bthe system (?:shall|must|should)\b/i, message: 'states a system obligation' },
  { id: 'user-capability', pattern: /\busers? (?:can|must|shall|should be able to)\b/i, message: 'states a user capability' },
  { id: 'business-rule', pattern: /\b(?:is|are) required to\b/i, message: 'states a business rule' },
];

export interface SeparationReport {
  recipe: string;
  violations: SeparationViolation[];
  clean: boolean;
}

function scan(artifact: SeparationViolation['artifact'], text: string, rules: SeparationRule[]): SeparationViolation[] {
  const violations: SeparationViolation[] = [];
  let inFence = false;
  text.split(/\r?\n/).forEach((line, index) => {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      return;
    }
    if (inFence || /^\s*#/.test(line)) return;
    for (const rule of rules) {
      const match = line.match(rule.pattern);
      if (match) {
        violations.push({ artifact, line: index + 1, rule: rule.id, text: match[0], message: rule.message });
        break;
      }
    }
  });
  return violations;
}

export interface SeparationDeps {
  oracle: GenerationOracle | null;
  store: RecipeStore;
  logger: BuildLogger | null;
  oracleTimeoutMs: number;
}

export class SeparationValidator {
  private deps: SeparationDeps;

  constructor(deps: SeparationDeps) {
    this.deps = deps;
  }

  validate(recipe: Recipe): SeparationReport {
    const violations = [
      ...scan('requirements', recipe.sources.requirements, REQUIREMENT_RULES),
      ...scan('design', recipe.sources.design, DESIGN_RULES),
    ];
    return { recipe: recipe.name, violations, clean: violations.length === 0 };
  }

  /** Ask the oracle for corrected texts. Never applies them. */
  async requestCorrection(recipe: Recipe, report: SeparationReport): Promise<CorrectedSources> {
    const { oracle } = this.deps;
    if (!oracle) {
      throw new ValidationError(`No generation oracle available to correct '${recipe.name}'`, {
        recipe: recipe.name,
        phase: 'separation',
      }, report.violations);
    }
    const controller = new AbortController();
    try {
      return await withTimeout(
        oracle.correctSeparation(
          { requirements: recipe.sources.requirements, design: recipe.sources.design },
          report.violations,
          { recipe: recipe.name, signal: controller.signal },
        ),
        this.deps.oracleTimeoutMs,
        { label: 'correctSeparation' },
      );
    } finally {
      controller.abort();
    }
  }

  /**
   * Apply `policy` to a recipe's separation report. Returns the recipe to build:
   * unchanged when clean or warned, re-parsed from corrected texts under auto-apply.
   */
  async enforce(recipe: Recipe, policy: SeparationPolicy): Promise<Recipe> {
    const report = this.validate(recipe);
    if (report.clean) return recipe;

    const summary = report.violations
      .map((v) => `${v.artifact}:${v.line} [${v.rule}] "${v.text}" ${v.message}`)
      .join('\n');
    this.deps.logger?.warn('Separation violations', { recipe: recipe.name, count: report.violations.length, content: summary });
    if (policy === 'warn') return recipe;

    let corrected: CorrectedSources;
    try {
      corrected = await this.requestCorrection(recipe, report);
    } catch (err) {
      throw new ValidationError(
        `Recipe '${recipe.name}' mixes requirements and design (${report.violations.length} violations); correction unavailable: ${errorMessage(err)}`,
        { recipe: recipe.name, phase: 'separation', diagnostic: summary },
        report.violations,
      );
    }

    if (policy === 'fail') {
      throw new ValidationError(
        `Recipe '${recipe.name}' mixes requirements and design (${report.violations.length} violations)`,
        {
          recipe: recipe.name,
          phase: 'separation',
          diagnostic: `${summary}\n\n--- proposed ${REQUIREMENTS_FILE} ---\n${corrected.requirements}\n--- proposed ${DESIGN_FILE} ---\n${corrected.design}`,
        },
        report.violations,
      );
    }

    const updated = this.deps.store.fromSources(recipe.location, { ...recipe.sources, ...corrected });
    const recheck = this.validate(updated);
    if (!recheck.clean) {
      throw new ValidationError(
        `Corrected texts for '${recipe.name}' still have ${recheck.violations.length} separation violations`,
        { recipe: recipe.name, phase: 'separation' },
        recheck.violations,
      );
    }
    this.writeBack(updated);
    this.deps.logger?.info('Applied separation correction', { recipe: recipe.name });
    return updated;
  }

  private writeBack(recipe: Recipe): void {
    if (!fs.existsSync(path.join(recipe.location, REQUIREMENTS_FILE))) return;
    fs.writeFileSync(path.join(recipe.location, REQUIREMENTS_FILE), recipe.sources.requirements);
    fs.writeFileSync(path.join(recipe.location, DESIGN_FILE), recipe.sources.design);
  }
}
