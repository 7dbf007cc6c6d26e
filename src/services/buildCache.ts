/** Persistent build state: decides what needs rebuilding and records build outcomes. */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { BuildOutcome, BuildRecord } from '../models/build.js';
import type { Recipe } from '../models/recipe.js';
import type { BuildLogger } from '../utils/buildLogger.js';
import { CACHE_VERSION } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';

const BuildRecordSchema = z.object({
  lastChecksum: z.string(),
  lastOutcome: z.enum(['success', 'failure']),
  lastBuildTimestamp: z.string(),
  changedSinceLastRebuildOfDependents: z.boolean(),
  sequence: z.number().int().nonnegative(),
  dependencies: z.array(z.string()).default([]),
});

const CacheFileSchema = z.object({
  version: z.literal(CACHE_VERSION),
  records: z.record(z.string(), BuildRecordSchema),
});

export type RebuildReason =
  | 'forced'
  | 'no-record'
  | 'checksum-changed'
  | 'previous-failure'
  | 'dependency-changed'
  | 'up-to-date';

export interface RebuildDecision {
  rebuild: boolean;
  reason: RebuildReason;
  /** Dependency that triggered a `dependency-changed` decision. */
  dependency?: string;
}

export interface CacheStats {
  total: number;
  succeeded: number;
  failed: number;
  lastBuild: string | null;
}

/** Looks up a recipe by name so dependency records can be re-evaluated. */
export type RecipeLookup = (name: string) => Recipe | undefined;

export class BuildCache {
  private filePath: string;
  private records = new Map<string, BuildRecord>();
  private writeChain: Promise<void> = Promise.resolve();
  private logger: BuildLogger | null;

  constructor(cacheDir: string, logger: BuildLogger | null = null) {
    this.filePath = path.join(cacheDir, 'state.json');
    this.logger = logger;
    this.load();
  }

  get file(): string {
    return this.filePath;
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) return;
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      this.logger?.warn('Build cache unreadable, starting empty', { file: this.filePath, error: errorMessage(err) });
      return;
    }
    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn('Build cache has an unknown format, starting empty', { file: this.filePath });
      return;
    }
    for (const [name, record] of Object.entries(parsed.data.records)) {
      this.records.set(name, record);
    }
  }

  get(name: string): BuildRecord | undefined {
    return this.records.get(name);
  }

  /**
   * The single authority on skip/rebuild. A recipe rebuilds when forced, never built,
   * changed, previously failed, when any dependency itself needs a rebuild, or when a
   * dependency was recorded after this recipe's last build.
   */
  evaluate(recipe: Recipe, force = false, lookup: RecipeLookup = () => undefined): RebuildDecision {
    return this.evaluateWith(recipe, force, lookup, new Set());
  }

  needsRebuild(recipe: Recipe, force = false, lookup?: RecipeLookup): boolean {
    return this.evaluate(recipe, force, lookup).rebuild;
  }

  private evaluateWith(recipe: Recipe, force: boolean, lookup: RecipeLookup, visiting: Set<string>): RebuildDecision {
    if (force) return { rebuild: true, reason: 'forced' };
    const record = this.records.get(recipe.name);
    if (!record) return { rebuild: true, reason: 'no-record' };
    if (record.lastChecksum !== recipe.contentChecksum) return { rebuild: true, reason: 'checksum-changed' };
    if (record.lastOutcome === 'failure') return { rebuild: true, reason: 'previous-failure' };

    visiting.add(recipe.name);
    try {
      for (const depName of recipe.metadata.dependencies) {
        const depRecord = this.records.get(depName);
        if (depRecord?.changedSinceLastRebuildOfDependents && depRecord.sequence > record.sequence) {
          return { rebuild: true, reason: 'dependency-changed', dependency: depName };
        }
        const dep = lookup(depName);
        if (!dep || visiting.has(depName)) continue;
        if (this.evaluateWith(dep, false, lookup, visiting).rebuild) {
          return { rebuild: true, reason: 'dependency-changed', dependency: depName };
        }
      }
    } finally {
      visiting.delete(recipe.name);
    }
    return { rebuild: false, reason: 'up-to-date' };
  }

  /**
   * Upsert the recipe's record and flag it changed so dependents built earlier are
   * invalidated. Writes are serialized; reads see the new record immediately.
   */
  record(recipe: Recipe, outcome: BuildOutcome): Promise<void> {
    const sequence = Math.max(0, ...[...this.records.values()].map((r) => r.sequence)) + 1;
    this.records.set(recipe.name, {
      lastChecksum: recipe.contentChecksum,
      lastOutcome: outcome,
      lastBuildTimestamp: new Date().toISOString(),
      changedSinceLastRebuildOfDependents: true,
      sequence,
      dependencies: [...recipe.metadata.dependencies],
    });
    return this.flush();
  }

  /** Remove one record, or every record when no name is given. */
  clear(name?: string): Promise<number> {
    let removed = 0;
    if (name === undefined) {
      removed = this.records.size;
      this.records.clear();
    } else if (this.records.delete(name)) {
      removed = 1;
    }
    return this.flush().then(() => removed);
  }

  stats(): CacheStats {
    const records = [...this.records.values()];
    const timestamps = records.map((r) => r.lastBuildTimestamp).sort();
    return {
      total: records.length,
      succeeded: records.filter((r) => r.lastOutcome === 'success').length,
      failed: records.filter((r) => r.lastOutcome === 'failure').length,
      lastBuild: timestamps.length > 0 ? timestamps[timestamps.length - 1] : null,
    };
  }

  /** Queue a snapshot write behind any write already in flight. */
  private flush(): Promise<void> {
    const next = this.writeChain.then(() => this.writeSnapshot());
    this.writeChain = next.catch((err: unknown) => {
      this.logger?.error('Build cache write failed', { file: this.filePath, error: errorMessage(err) });
    });
    return next;
  }

  private async writeSnapshot(): Promise<void> {
    const data = {
      version: CACHE_VERSION,
      records: Object.fromEntries(this.records),
    };
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmp, JSON.stringify(data, null, 2));
    await fs.promises.rename(tmp, this.filePath);
  }
}
