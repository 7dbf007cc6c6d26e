import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { makeRecipe, recipeMap } from '../tests/helpers.js';
import { BuildCache } from './buildCache.js';

describe('BuildCache', () => {
  let tmpDir: string;
  const lib = makeRecipe({ name: 'lib' });
  const app = makeRecipe({ name: 'app', dependencies: ['lib'] });
  const recipes = recipeMap(lib, app);
  const lookup = (name: string) => recipes.get(name);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recipe-cache-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('rebuilds a recipe it has never seen', () => {
    expect(new BuildCache(tmpDir).evaluate(lib)).toEqual({ rebuild: true, reason: 'no-record' });
  });

  it('skips a recipe whose last build succeeded with the same checksum', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'success');
    expect(cache.evaluate(lib)).toEqual({ rebuild: false, reason: 'up-to-date' });
    expect(cache.needsRebuild(lib, true)).toBe(true);
  });

  it('rebuilds when the recipe content changed', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'success');
    const edited = makeRecipe({ name: 'lib', requirements: ['[lib-r1] MUST return two values'] });
    expect(cache.evaluate(edited).reason).toBe('checksum-changed');
  });

  it('rebuilds after a failure', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'failure');
    expect(cache.evaluate(lib).reason).toBe('previous-failure');
  });

  it('rebuilds a dependent when a dependency was rebuilt after it', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'success');
    await cache.record(app, 'success');
    expect(cache.evaluate(app, false, lookup).rebuild).toBe(false);

    await cache.record(lib, 'success');
    expect(cache.evaluate(app, false, lookup)).toEqual({ rebuild: true, reason: 'dependency-changed', dependency: 'lib' });
  });

  it('rebuilds a dependent when a dependency itself needs a rebuild', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'success');
    await cache.record(app, 'success');
    const editedLib = makeRecipe({ name: 'lib', requirements: ['[lib-r1] MUST return two values'] });
    const decision = cache.evaluate(app, false, (name) => (name === 'lib' ? editedLib : undefined));
    expect(decision).toEqual({ rebuild: true, reason: 'dependency-changed', dependency: 'lib' });
  });

  it('persists records across instances', async () => {
    const first = new BuildCache(tmpDir);
    await first.record(lib, 'success');
    const raw = JSON.parse(fs.readFileSync(path.join(tmpDir, 'state.json'), 'utf-8'));
    expect(raw.version).toBe(1);
    expect(raw.records.lib.lastChecksum).toBe(lib.contentChecksum);

    const second = new BuildCache(tmpDir);
    expect(second.get('lib')?.sequence).toBe(1);
    expect(second.evaluate(lib).reason).toBe('up-to-date');
  });

  it('starts empty when the state file is unreadable', () => {
    fs.writeFileSync(path.join(tmpDir, 'state.json'), 'not json');
    expect(new BuildCache(tmpDir).stats().total).toBe(0);
  });

  it('serializes concurrent writes and assigns increasing sequences', async () => {
    const cache = new BuildCache(tmpDir);
    await Promise.all([cache.record(lib, 'success'), cache.record(app, 'failure')]);
    expect(cache.get('lib')?.sequence).toBe(1);
    expect(cache.get('app')?.sequence).toBe(2);
    const reloaded = new BuildCache(tmpDir);
    expect(reloaded.stats()).toMatchObject({ total: 2, succeeded: 1, failed: 1 });
  });

  it('clears one record or all of them', async () => {
    const cache = new BuildCache(tmpDir);
    await cache.record(lib, 'success');
    await cache.record(app, 'success');
    await expect(cache.clear('lib')).resolves.toBe(1);
    await expect(cache.clear('lib')).resolves.toBe(0);
    await expect(cache.clear()).resolves.toBe(1);
    expect(new BuildCache(tmpDir).stats()).toEqual({ total: 0, succeeded: 0, failed: 0, lastBuild: null });
  });
});
