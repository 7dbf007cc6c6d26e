/** Unit tests for the self-hosting bootstrap and component registries. */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createArtifactSet, type ArtifactSet } from '../models/build.js';
import type { Recipe } from '../models/recipe.js';
import { SelfHostingError } from '../utils/errors.js';
import { ScriptedOracle, createFakeTools, makeRecipe, testConfig } from '../tests/helpers.js';
import { Orchestrator } from './orchestrator.js';
import {
  CommandLauncher,
  SelfHostingBootstrap,
  artifactRegistry,
  componentKey,
  sourceTreeRegistry,
  type GeneratedOrchestratorLauncher,
  type LaunchResult,
} from './selfHosting.js';

describe('componentKey', () => {
  it('normalizes case, separators and extensions', () => {
    expect(componentKey('src/services/build-cache.ts')).toBe('buildcache');
    expect(componentKey('buildCache.js')).toBe('buildcache');
    expect(componentKey('C:\\forge\\Dag.mts')).toBe('dag');
  });
});

describe('artifactRegistry', () => {
  it('lists source modules and leaves out tests, indexes and declarations', () => {
    const artifacts = createArtifactSet({
      'src/a.ts': '',
      'src/a.test.ts': '',
      'src/index.ts': '',
      'src/types.d.ts': '',
      'README.md': '',
      'tests/helper.ts': '',
      'lib/b-c.js': '',
    });
    expect(artifactRegistry(artifacts)).toEqual(['a', 'bc']);
  });
});

describe('sourceTreeRegistry', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-registry-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('walks the given directories recursively', () => {
    const write = (rel: string) => {
      fs.mkdirSync(path.dirname(path.join(tmpDir, rel)), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, rel), '');
    };
    write('services/phases/deep.ts');
    write('services/shallow.test.ts');
    write('utils/y.ts');
    write('other/w.ts');

    expect(sourceTreeRegistry(tmpDir)).toEqual(['deep', 'y']);
  });

  it('skips directories that do not exist', () => {
    expect(sourceTreeRegistry(tmpDir, ['missing'])).toEqual([]);
  });
});

class FakeLauncher implements GeneratedOrchestratorLauncher {
  launched: ArtifactSet[] = [];
  result: LaunchResult | Error = { exitCode: 0, components: ['buildcache', 'dag'], output: '' };

  async launch(orchestrator: ArtifactSet, _recipe: Recipe): Promise<LaunchResult> {
    this.launched.push(orchestrator);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('SelfHostingBootstrap', () => {
  let tmpDir: string;
  let oracle: ScriptedOracle;
  let launcher: FakeLauncher;
  let orchestrator: Orchestrator;
  const recipe = makeRecipe({ name: 'forge', metadata: { selfHosting: true } });

  const implementation = () => createArtifactSet({
    'src/services/buildCache.ts': '// forge-r1\nexport const cache = 1;',
    'src/utils/dag.ts': 'export const dag = 1;',
  });

  const bootstrap = (currentComponents = ['buildcache', 'dag']) =>
    new SelfHostingBootstrap({ orchestrator, launcher, currentComponents });

  const failure = (promise: Promise<unknown>) => promise.then(() => null, (e: unknown) => e as SelfHostingError);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-selfhost-'));
    oracle = new ScriptedOracle();
    oracle.implementations = [implementation()];
    launcher = new FakeLauncher();
    orchestrator = new Orchestrator({ config: testConfig({ cacheDir: tmpDir }), oracle, tools: createFakeTools() });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reports both generations when every check passes', async () => {
    const report = await bootstrap().run(recipe);

    expect(report.recipe).toBe('forge');
    expect(report.secondGeneration.components).toEqual(['buildcache', 'dag']);
    expect(report.secondGeneration.compliance.map((r) => r.satisfied)).toEqual([true]);
    expect(report.thirdGeneration.components).toEqual(['buildcache', 'dag']);
    expect(Object.keys(launcher.launched[0].files).sort()).toEqual([
      'src/module.test.ts',
      'src/services/buildCache.ts',
      'src/utils/dag.ts',
    ]);
  });

  it('fails the completeness check when a current component was not generated', async () => {
    const err = await failure(bootstrap(['buildcache', 'dag', 'recipestore']).run(recipe));

    expect(err).toBeInstanceOf(SelfHostingError);
    expect(err?.stage).toBe('completeness');
    expect(err?.message).toBe("Self-hosting completeness check failed for 'forge': generated orchestrator lacks components: recipestore");
    expect(launcher.launched).toEqual([]);
  });

  it('fails verification when the second generation does not build', async () => {
    oracle.tests = [1, 2, 3].map(() => new Error('oracle down'));
    const err = await failure(bootstrap().run(recipe));

    expect(err?.stage).toBe('verification');
    expect(err?.message).toBe(
      "Self-hosting verification check failed for 'forge': second generation did not build: Test generation failed for 'forge': oracle down",
    );
  });

  it('fails verification when the re-run gates fail', async () => {
    vi.spyOn(orchestrator, 'verify').mockRejectedValue(new Error('coverage dropped'));
    const err = await failure(bootstrap().run(recipe));

    expect(err?.stage).toBe('verification');
    expect(err?.message).toBe("Self-hosting verification check failed for 'forge': coverage dropped");
    expect(launcher.launched).toEqual([]);
  });

  it('fails reproduction when the generated orchestrator cannot be launched', async () => {
    launcher.result = new Error('spawn failed');
    const err = await failure(bootstrap().run(recipe));

    expect(err?.stage).toBe('reproduction');
    expect(err?.message).toBe("Self-hosting reproduction check failed for 'forge': could not launch generated orchestrator: spawn failed");
  });

  it('fails reproduction on a non-zero exit and keeps the output as the diagnostic', async () => {
    launcher.result = { exitCode: 3, components: [], output: 'stack trace' };
    const err = await failure(bootstrap().run(recipe));

    expect(err?.message).toBe("Self-hosting reproduction check failed for 'forge': generated orchestrator exited with 3");
    expect(err?.diagnostic).toBe('stack trace');
  });

  it('fails reproduction when the third generation has fewer components', async () => {
    launcher.result = { exitCode: 0, components: ['dag'], output: '' };
    const err = await failure(bootstrap().run(recipe));

    expect(err?.message).toBe(
      "Self-hosting reproduction check failed for 'forge': third generation has 1 components, current implementation lists 2",
    );
    expect(err?.diagnostic).toBe('missing: buildcache');
  });
});

describe('CommandLauncher', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-launcher-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('passes the oracle key to the generated orchestrator but no other secret', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    const script = 'process.stdout.write(JSON.stringify([process.env.ANTHROPIC_API_KEY, process.env.OPENAI_API_KEY ?? null]))';
    const config = testConfig({
      cacheDir: tmpDir,
      selfHosting: { launchCommand: process.execPath, launchArgs: ['-e', script, '--'] },
    });

    const result = await new CommandLauncher(config).launch(createArtifactSet({}), makeRecipe({ name: 'forge' }));

    expect(result.output).toBe('["test-secret",null]');
  });

  it('runs the launch command and reads the registry of what it wrote', async () => {
    const script = [
      "const fs = require('fs');",
      "const path = require('path');",
      "const dir = path.join(process.argv[3], 'forge', 'services');",
      'fs.mkdirSync(dir, { recursive: true });',
      "fs.writeFileSync(path.join(dir, 'dag.ts'), 'export {};');",
      "fs.writeFileSync(path.join(dir, 'dag.test.ts'), '');",
    ].join('\n');
    const config = testConfig({
      cacheDir: tmpDir,
      selfHosting: { launchCommand: process.execPath, launchArgs: ['-e', script, '--'] },
    });

    const result = await new CommandLauncher(config).launch(createArtifactSet({ 'cli.js': '' }), makeRecipe({ name: 'forge' }));

    expect(result.exitCode).toBe(0);
    expect(result.components).toEqual(['dag']);
  });

  it('reports no components when the command writes nothing', async () => {
    const config = testConfig({
      cacheDir: tmpDir,
      selfHosting: { launchCommand: process.execPath, launchArgs: ['-e', 'process.exit(4)', '--'] },
    });

    const result = await new CommandLauncher(config).launch(createArtifactSet({}), makeRecipe({ name: 'forge' }));

    expect(result).toMatchObject({ exitCode: 4, components: [] });
  });

  it('links the package dependencies into the launch directory', async () => {
    const modulesDir = path.join(tmpDir, 'deps');
    fs.mkdirSync(path.join(modulesDir, 'recipe-dep'), { recursive: true });
    fs.writeFileSync(path.join(modulesDir, 'recipe-dep', 'index.js'), "module.exports = 'buildcache';");
    const script = [
      "const fs = require('fs');",
      "const path = require('path');",
      "const name = require('recipe-dep');",
      "const dir = path.join(process.argv[3], 'forge');",
      'fs.mkdirSync(dir, { recursive: true });',
      "fs.writeFileSync(path.join(dir, name + '.ts'), 'export {};');",
    ].join('\n');
    const config = testConfig({
      cacheDir: path.join(tmpDir, 'cache'),
      selfHosting: { launchCommand: process.execPath, launchArgs: ['-e', script, '--'] },
    });

    const result = await new CommandLauncher(config, modulesDir).launch(createArtifactSet({}), makeRecipe({ name: 'forge' }));

    expect(result.exitCode).toBe(0);
    expect(result.components).toEqual(['buildcache']);
    expect(fs.existsSync(path.join(modulesDir, 'recipe-dep', 'index.js'))).toBe(true);
  });

  it('runs the generated TypeScript entry point with the default launch command', async () => {
    const entry = [
      "import fs from 'node:fs';",
      "import path from 'node:path';",
      "import { z } from 'zod';",
      '',
      'const args: string[] = process.argv.slice(2);',
      "const output: string = z.string().parse(args[args.indexOf('--output') + 1]);",
      "const dir = path.join(output, 'forge', 'services');",
      'fs.mkdirSync(dir, { recursive: true });',
      "fs.writeFileSync(path.join(dir, 'dag.ts'), 'export {};');",
      "process.stdout.write(JSON.stringify({ command: args[0], force: args.includes('--force') }));",
    ].join('\n');
    const config = testConfig({ cacheDir: tmpDir, oracleTimeoutMs: 15_000 });

    const result = await new CommandLauncher(config).launch(
      createArtifactSet({ 'src/cli/cli.ts': entry }),
      makeRecipe({ name: 'forge' }),
    );

    expect(result.exitCode).toBe(0);
    expect(result.components).toEqual(['dag']);
    expect(result.output.split('\n')[0]).toBe('{"command":"build","force":true}');
  }, 30_000);
});
