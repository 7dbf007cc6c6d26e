/** Quality-gate tool interfaces and their command-line implementations. */

import fs from 'node:fs';
import path from 'node:path';
import type { ArtifactSet, TestCaseResult, TestRunResult } from '../models/build.js';
import type { OrchestratorConfig, ToolCommand } from '../utils/config.js';
import { runCommand, type CommandResult } from '../utils/runCommand.js';
import { TimeoutError } from '../utils/withTimeout.js';
import { ArtifactWorkspace, readBack } from './artifactWorkspace.js';

export interface ToolResult {
  passed: boolean;
  output: string;
}

export interface LintResult extends ToolResult {
  /** Artifacts after auto-fixes were applied. */
  artifacts: ArtifactSet;
}

export interface TypeChecker {
  check(artifacts: ArtifactSet, label: string): Promise<ToolResult>;
}

export interface Linter {
  lint(artifacts: ArtifactSet, label: string): Promise<LintResult>;
}

export interface TestRunner {
  run(artifacts: ArtifactSet, label: string): Promise<TestRunResult>;
}

export interface QualityTools {
  typeChecker: TypeChecker;
  linter: Linter;
  testRunner: TestRunner;
}

function combined(result: CommandResult): string {
  return [result.spawnError, result.stdout, result.stderr].filter(Boolean).join('\n').trim();
}

/** Parse test stdout for PASS/FAIL lines and TAP `ok` / `not ok` lines. */
export function parseTestOutput(stdout: string): TestCaseResult[] {
  const results: TestCaseResult[] = [];
  for (const line of stdout.split('\n')) {
    const passFail = line.match(/^\s*(PASS|FAIL):\s*(.+)/i);
    if (passFail) {
      const passed = passFail[1].toUpperCase() === 'PASS';
      results.push({ name: passFail[2].trim(), passed, details: passed ? 'PASSED' : 'FAILED' });
      continue;
    }
    const tap = line.match(/^\s*(not ok|ok)\s+\d+\s*[-:]?\s*(.*)/);
    if (tap) {
      const passed = tap[1] === 'ok';
      const name = tap[2].replace(/\s+#\s*(time|SKIP|TODO).*$/i, '').trim() || 'unnamed';
      results.push({ name, passed, details: passed ? 'PASSED' : 'FAILED' });
    }
  }
  return results;
}

/** Line coverage from an istanbul `coverage-summary.json`, if the run produced one. */
export function readCoveragePct(workDir: string): number | null {
  const summaryPath = path.join(workDir, 'coverage', 'coverage-summary.json');
  if (!fs.existsSync(summaryPath)) return null;
  const raw: unknown = JSON.parse(fs.readFileSync(summaryPath, 'utf-8'));
  if (typeof raw !== 'object' || raw === null || !('total' in raw)) return null;
  const total = raw.total;
  if (typeof total !== 'object' || total === null || !('lines' in total)) return null;
  const lines = total.lines;
  if (typeof lines !== 'object' || lines === null || !('pct' in lines)) return null;
  return typeof lines.pct === 'number' ? lines.pct : null;
}

abstract class CommandTool {
  protected command: ToolCommand;
  protected workspace: ArtifactWorkspace;
  protected timeoutMs: number;

  constructor(command: ToolCommand, workspace: ArtifactWorkspace, timeoutMs: number) {
    this.command = command;
    this.workspace = workspace;
    this.timeoutMs = timeoutMs;
  }

  protected exec(dir: string): Promise<CommandResult> {
    return runCommand(this.command.command, this.command.args, dir, this.timeoutMs);
  }
}

export class CommandTypeChecker extends CommandTool implements TypeChecker {
  check(artifacts: ArtifactSet, label: string): Promise<ToolResult> {
    return this.workspace.withMaterialized(`${label}-typecheck`, artifacts, async (dir) => {
      const result = await this.exec(dir);
      return { passed: result.exitCode === 0, output: combined(result) };
    });
  }
}

export class CommandLinter extends CommandTool implements Linter {
  lint(artifacts: ArtifactSet, label: string): Promise<LintResult> {
    return this.workspace.withMaterialized(`${label}-lint`, artifacts, async (dir) => {
      const result = await this.exec(dir);
      return { passed: result.exitCode === 0, output: combined(result), artifacts: readBack(dir, artifacts) };
    });
  }
}

export class CommandTestRunner extends CommandTool implements TestRunner {
  run(artifacts: ArtifactSet, label: string): Promise<TestRunResult> {
    return this.workspace.withMaterialized(`${label}-test`, artifacts, async (dir) => {
      let result: CommandResult;
      try {
        result = await this.exec(dir);
      } catch (err) {
        if (!(err instanceof TimeoutError)) throw err;
        return {
          tests: [{ name: 'test run', passed: false, details: err.message }],
          passed: 0, failed: 1, total: 1, coveragePct: null, output: err.message,
        };
      }
      const output = combined(result);
      let tests = parseTestOutput(result.stdout);
      if (tests.length === 0) {
        // No granular output: the whole run counts as one test.
        const passed = result.exitCode === 0;
        tests = [{ name: 'test run', passed, details: passed ? 'PASSED' : output.slice(0, 2000) }];
      }
      if (result.exitCode !== 0 && tests.every((t) => t.passed)) {
        tests.push({ name: 'test run', passed: false, details: `exited with code ${result.exitCode ?? 'n/a'}` });
      }
      const passed = tests.filter((t) => t.passed).length;
      const failed = tests.length - passed;
      return { tests, passed, failed, total: tests.length, coveragePct: readCoveragePct(dir), output };
    });
  }
}

/** Command-backed tools as configured; tool workspaces live under `<cacheDir>/workspaces`. */
export function createCommandTools(config: OrchestratorConfig): QualityTools {
  const workspace = new ArtifactWorkspace(path.join(config.cacheDir, 'workspaces'));
  return {
    typeChecker: new CommandTypeChecker(config.tools.typecheck, workspace, config.gateTimeoutMs),
    linter: new CommandLinter(config.tools.lint, workspace, config.gateTimeoutMs),
    testRunner: new CommandTestRunner(config.tools.test, workspace, config.gateTimeoutMs),
  };
}
