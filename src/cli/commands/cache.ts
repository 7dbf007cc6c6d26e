/** `recipe-forge cache stats|clear`. */

import { BuildCache } from '../../services/buildCache.js';
import { reportError } from './build.js';
import { loadCliConfig, type CommonOptions } from './environment.js';

export interface CacheOptions extends CommonOptions {
  json?: boolean;
}

function openCache(options: CacheOptions): BuildCache {
  return new BuildCache(loadCliConfig(options).cacheDir);
}

export async function runCacheStats(options: CacheOptions): Promise<void> {
  try {
    const stats = openCache(options).stats();
    if (options.json) {
      process.stdout.write(JSON.stringify(stats, null, 2) + '\n');
    } else {
      process.stdout.write(
        `${stats.total} recipes cached: ${stats.succeeded} succeeded, ${stats.failed} failed`
        + `${stats.lastBuild ? `; last build ${stats.lastBuild}` : ''}\n`,
      );
    }
  } catch (err) {
    reportError(err, options.json);
  }
}

export async function runCacheClear(name: string | undefined, options: CacheOptions): Promise<void> {
  try {
    const removed = await openCache(options).clear(name);
    process.stdout.write(options.json
      ? JSON.stringify({ removed }) + '\n'
      : `Removed ${removed} cache record${removed === 1 ? '' : 's'}\n`);
  } catch (err) {
    reportError(err, options.json);
  }
}
