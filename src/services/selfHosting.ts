/** Self-hosting bootstrap: rebuild the orchestrator from its own recipe and check the result can do the same. */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { isTestPath, type ArtifactSet, type ComplianceMatrix } from '../models/build.js';
import type { Recipe } from '../models/recipe.js';
import type { BuildLogger } from '../utils/buildLogger.js';
import type { OrchestratorConfig } from '../utils/config.js';
import { SelfHostingError, errorMessage, isRecipeForgeError } from '../utils/errors.js';
import { runCommand } from '../utils/runCommand.js';
import { safeEnv } from '../utils/safeEnv.js';
import { ArtifactWorkspace } from './artifactWorkspace.js';
import type { Orchestrator, VerificationResult } from './orchestrator.js';

const SOURCE_EXT_RE = /\.(?:[cm]?[jt]sx?)$/;

/** `build-cache.ts` and `buildCache.js` both normalize to `buildcache`. */
export function componentKey(filePath: string): string {
  return path.posix.basename(filePath.replace(/\\/g, '/')).replace(SOURCE_EXT_RE, '').toLowerCase().replace(/[^a-z0-9]/g, '');
}

function isComponentFile(filePath: string): boolean {
  return SOURCE_EXT_RE.test(filePath)
    && !filePath.endsWith('.d.ts')
    && !isTestPath(filePath)
    && !/(^|\/)index\.[cm]?[jt]sx?$/.test(filePath);
}

/** Component keys of a generated artifact set's source files. */
export function artifactRegistry(artifacts: ArtifactSet): string[] {
  return [...new Set(Object.keys(artifacts.files).filter(isComponentFile).map(componentKey))].sort();
}

/** Component keys of the running implementation: source modules under the given directories. */
export function sourceTreeRegistry(srcRoot: string, dirs: string[] = ['services', 'utils']): string[] {
  const keys = new Set<string>();
  const walk = (relDir: string) => {
    const dir = path.join(srcRoot, relDir);
    if (!fs.existsSync(dir)) return;
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const rel = path.posix.join(relDir.replace(/\\/g, '/'), entry.name);
      if (entry.isDirectory()) walk(rel);
      else if (isComponentFile(rel)) keys.add(componentKey(entry.name));
    }
  };
  for (const dir of dirs) walk(dir);
  return [...keys].sort();
}

/** Root of this package's compiled or source tree. */
export function currentSourceRoot(): string {
  return fileURLToPath(new URL('..', import.meta.url));
}

/** Dependencies installed for this package, which a generated orchestrator imports too. */
export function packageModulesDir(): string {
  return path.resolve(currentSourceRoot(), '..', 'node_modules');
}

/** The generated orchestrator calls the oracle itself, so it keeps the key other tools never see. */
function launchEnv(): NodeJS.ProcessEnv {
  const env = safeEnv();
  if (process.env.ANTHROPIC_API_KEY) env.ANTHROPIC_API_KEY = process.env.ANTHROPIC_API_KEY;
  return env;
}

export interface LaunchResult {
  exitCode: number | null;
  /** Component keys of what the launched orchestrator generated. */
  components: string[];
  output: string;
}

/** Starts a generated orchestrator against a recipe and reports what it produced. */
export interface GeneratedOrchestratorLauncher {
  launch(orchestrator: ArtifactSet, recipe: Recipe): Promise<LaunchResult>;
}

/**
 * Materializes the generated orchestrator with this package's `node_modules` linked in,
 * runs the configured command there with `<recipe location> --output <dir>`, then reads
 * the registry of what it wrote. The default command runs the generated TypeScript entry
 * point through the `tsx` loader.
 */
export class CommandLauncher implements GeneratedOrchestratorLauncher {
  private config: OrchestratorConfig;
  private workspace: ArtifactWorkspace;
  private modulesDir: string;

  constructor(config: OrchestratorConfig, modulesDir: string = packageModulesDir()) {
    this.config = config;
    this.workspace = new ArtifactWorkspace(path.join(config.cacheDir, 'workspaces'));
    this.modulesDir = modulesDir;
  }

  launch(orchestrator: ArtifactSet, recipe: Recipe): Promise<LaunchResult> {
    return this.workspace.withMaterialized(`${recipe.name}-third-generation`, orchestrator, async (dir) => {
      const linked = path.join(dir, 'node_modules');
      if (fs.existsSync(this.modulesDir) && !fs.existsSync(linked)) {
        fs.symlinkSync(this.modulesDir, linked, 'junction');
      }
      const outputDir = path.join(dir, '.third-generation');
      const { launchCommand, launchArgs } = this.config.selfHosting;
      const result = await runCommand(
        launchCommand,
        [...launchArgs, path.resolve(recipe.location), '--output', outputDir],
        dir,
        this.config.oracleTimeoutMs * 4,
        launchEnv(),
      );
      const generatedDir = path.join(outputDir, recipe.name);
      const components = fs.existsSync(generatedDir) ? sourceTreeRegistry(generatedDir, ['.']) : [];
      return {
        exitCode: result.exitCode,
        components,
        output: [result.spawnError, result.stdout, result.stderr].filter(Boolean).join('\n'),
      };
    });
  }
}

export interface SelfHostingReport {
  recipe: string;
  currentComponents: string[];
  secondGeneration: { components: string[]; compliance: ComplianceMatrix };
  thirdGeneration: { components: string[] };
}

export interface SelfHostingDeps {
  orchestrator: Orchestrator;
  launcher: GeneratedOrchestratorLauncher;
  /** Component keys the current implementation lists. */
  currentComponents: string[];
  logger?: BuildLogger | null;
}

/**
 * Runs the ordinary per-recipe pipeline on the orchestrator's own recipe, then checks
 * completeness against the current implementation, re-verifies the result, and launches
 * the generated orchestrator to build a third generation.
 */
export class SelfHostingBootstrap {
  private deps: SelfHostingDeps;

  constructor(deps: SelfHostingDeps) {
    this.deps = deps;
  }

  async run(recipe: Recipe): Promise<SelfHostingReport> {
    const { orchestrator, launcher, currentComponents } = this.deps;
    const logger = this.deps.logger ?? null;
    logger?.info('Self-hosting bootstrap started', { recipe: recipe.name, currentComponents: currentComponents.length });

    const built = await orchestrator.executeRecipe(recipe);
    if (built.status !== 'succeeded' || !built.artifacts) {
      throw new SelfHostingError(
        recipe.name,
        'verification',
        `second generation did not build: ${built.error?.message ?? built.status}`,
        built.error?.diagnostic ?? null,
      );
    }

    const generated = artifactRegistry(built.artifacts);
    const missing = currentComponents.filter((c) => !generated.includes(c));
    if (missing.length > 0) {
      throw new SelfHostingError(recipe.name, 'completeness', `generated orchestrator lacks components: ${missing.join(', ')}`);
    }

    let verified: VerificationResult;
    try {
      verified = await orchestrator.verify(recipe, built.artifacts);
    } catch (err) {
      throw new SelfHostingError(
        recipe.name,
        'verification',
        errorMessage(err),
        isRecipeForgeError(err) ? err.diagnostic : null,
      );
    }

    let third: LaunchResult;
    try {
      third = await launcher.launch(verified.artifacts, recipe);
    } catch (err) {
      throw new SelfHostingError(recipe.name, 'reproduction', `could not launch generated orchestrator: ${errorMessage(err)}`);
    }
    if (third.exitCode !== 0) {
      throw new SelfHostingError(recipe.name, 'reproduction', `generated orchestrator exited with ${third.exitCode ?? 'no exit code'}`, third.output);
    }
    const regressed = currentComponents.filter((c) => !third.components.includes(c));
    if (third.components.length < currentComponents.length || regressed.length > 0) {
      throw new SelfHostingError(
        recipe.name,
        'reproduction',
        `third generation has ${third.components.length} components, current implementation lists ${currentComponents.length}`,
        regressed.length > 0 ? `missing: ${regressed.join(', ')}` : null,
      );
    }

    logger?.info('Self-hosting bootstrap passed', { recipe: recipe.name, components: generated.length });
    return {
      recipe: recipe.name,
      currentComponents,
      secondGeneration: { components: generated, compliance: verified.compliance },
      thirdGeneration: { components: third.components },
    };
  }
}
