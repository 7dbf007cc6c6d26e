import type { BuildEvent } from '../services/phases/types.js';

export function formatNdjsonLine(event: BuildEvent): string {
  return JSON.stringify(event) + '\n';
}

/** One human line per event, or null for events only worth showing in NDJSON. */
export function formatHumanReadable(event: BuildEvent): string | null {
  switch (event.type) {
    case 'build_started':
      return `Building ${event.recipes} recipes in ${event.groups.length} groups${event.dry_run ? ' (dry run)' : ''}`;
    case 'group_started':
      return `Group ${event.index + 1}: ${event.recipes.join(', ')}`;
    case 'recipe_started':
      return `Starting: ${event.recipe}`;
    case 'recipe_skipped':
      return `Skipped: ${event.recipe} (${event.reason})`;
    case 'phase_changed':
      return event.state ? `[${event.recipe}] ${event.phase}: ${event.state}` : `[${event.recipe}] ${event.phase}`;
    case 'oracle_call':
      return event.ok ? null : `[${event.recipe}] oracle ${event.operation} failed after ${event.elapsed_ms}ms`;
    case 'test_result':
      return `[${event.recipe}] Tests (${event.stage}): ${event.passed} passed, ${event.failed} failed`
        + (event.coverage_pct !== null ? `, ${event.coverage_pct}% coverage` : '');
    case 'gate_result':
      return `[${event.recipe}] Gate ${event.gate}: ${event.passed ? 'passed' : 'FAILED'}`;
    case 'review_findings':
      return `[${event.recipe}] Review ${event.iteration}: ${event.critical} critical, ${event.suggestions} suggestions`;
    case 'recipe_completed':
      return `Completed: ${event.recipe}${event.output_dir ? ` -> ${event.output_dir}` : ''}`;
    case 'recipe_failed':
      return `Failed: ${event.recipe}${event.phase ? ` [${event.phase}]` : ''}: ${event.error}`;
    case 'build_complete':
      return `${event.success ? 'Build succeeded' : 'Build failed'}: `
        + `${event.succeeded} succeeded, ${event.failed} failed, ${event.skipped} skipped`;
    case 'error':
      return `Error: ${event.message}`;
  }
}

export interface BuildSummary {
  recipesSucceeded: number;
  recipesFailed: number;
  recipesSkipped: number;
  testsPassed: number;
  testsFailed: number;
  success: boolean;
  events: BuildEvent[];
}

export function collectSummary() {
  const events: BuildEvent[] = [];
  let recipesSucceeded = 0;
  let recipesFailed = 0;
  let recipesSkipped = 0;
  let testsPassed = 0;
  let testsFailed = 0;
  let success = false;

  return {
    push(event: BuildEvent) {
      events.push(event);
      if (event.type === 'recipe_completed') recipesSucceeded++;
      if (event.type === 'recipe_failed') recipesFailed++;
      if (event.type === 'recipe_skipped') recipesSkipped++;
      if (event.type === 'test_result' && event.stage === 'gate') {
        testsPassed += event.passed;
        testsFailed += event.failed;
      }
      if (event.type === 'build_complete') success = event.success;
    },
    getSummary(): BuildSummary {
      return { recipesSucceeded, recipesFailed, recipesSkipped, testsPassed, testsFailed, success, events };
    },
  };
}
