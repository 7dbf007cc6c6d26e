import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, parseConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('fills defaults for an empty input', () => {
    const config = parseConfig({});
    expect(config.maxFixIterations).toBe(5);
    expect(config.maxReviewIterations).toBe(3);
    expect(config.maxStubRemediations).toBe(2);
    expect(config.maxOracleRetries).toBe(2);
    expect(config.oracleRetryBaseMs).toBe(1000);
    expect(config.coverageMinimum).toBe(80);
    expect(config.separationPolicy).toBe('fail');
    expect(config.cacheDir).toBe('.recipe-build');
    expect(config.outputDir).toBe('generated');
    expect(config.maxWorkers).toBe(os.availableParallelism());
    expect(config.complexity.boundary).toBe(3);
    expect(config.tools.typecheck).toEqual({ command: 'npx', args: ['tsc', '--noEmit'] });
  });

  it('rejects unknown keys and out-of-range values', () => {
    expect(() => parseConfig({ maxWorkers: 0 })).toThrow(ValidationError);
    expect(() => parseConfig({ coverageMinimum: 120 })).toThrow(/coverageMinimum/);
    expect(() => parseConfig({ colour: 'blue' })).toThrow(/Invalid configuration/);
  });

  it('reads recipe-forge.config.json from the working directory', () => {
    fs.writeFileSync(
      path.join(tmpDir, 'recipe-forge.config.json'),
      JSON.stringify({ maxWorkers: 3, separationPolicy: 'warn' }),
    );
    const config = loadConfig({ cwd: tmpDir, env: {} });
    expect(config.maxWorkers).toBe(3);
    expect(config.separationPolicy).toBe('warn');
  });

  it('lets environment variables override the file and overrides win over both', () => {
    fs.writeFileSync(path.join(tmpDir, 'recipe-forge.config.json'), JSON.stringify({ maxWorkers: 3, model: 'file-model' }));
    const config = loadConfig({
      cwd: tmpDir,
      env: { RECIPE_FORGE_MAX_WORKERS: '6', CLAUDE_MODEL: 'env-model', RECIPE_FORGE_CACHE_DIR: '/tmp/cache' },
      overrides: { maxWorkers: 9, model: undefined },
    });
    expect(config.maxWorkers).toBe(9);
    expect(config.model).toBe('env-model');
    expect(config.cacheDir).toBe('/tmp/cache');
  });

  it('reads the oracle retry bound from the environment', () => {
    const config = loadConfig({ cwd: tmpDir, env: { RECIPE_FORGE_MAX_ORACLE_RETRIES: '0' } });
    expect(config.maxOracleRetries).toBe(0);
  });

  it('reports a non-numeric environment value', () => {
    expect(() => loadConfig({ cwd: tmpDir, env: { RECIPE_FORGE_MAX_FIX_ITERATIONS: 'many' } }))
      .toThrow('RECIPE_FORGE_MAX_FIX_ITERATIONS must be a number, got "many"');
  });

  it('reports a config file that is not JSON', () => {
    fs.writeFileSync(path.join(tmpDir, 'recipe-forge.config.json'), '{ nope');
    expect(() => loadConfig({ cwd: tmpDir, env: {} })).toThrow(/recipe-forge.config.json is not valid JSON/);
  });
});
