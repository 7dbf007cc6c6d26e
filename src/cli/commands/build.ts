/** `recipe-forge build`: load, prepare and build a recipe or collection. */

import type { BuildResult } from '../../models/build.js';
import type { BuildEvent } from '../../services/phases/types.js';
import { errorMessage, exitCodeFor, isRecipeForgeError } from '../../utils/errors.js';
import { collectSummary, formatHumanReadable, formatNdjsonLine } from '../eventStream.js';
import { createEnvironment, type CommonOptions, type EnvironmentFactories } from './environment.js';

export interface BuildOptions extends CommonOptions {
  force?: boolean;
  dryRun?: boolean;
  stream?: boolean;
  json?: boolean;
}

/** JSON-safe view of a build result: artifact contents are replaced by their paths. */
export function summarizeResult(result: BuildResult): Record<string, unknown> {
  return {
    success: result.success,
    order: result.order,
    groups: result.groups,
    elapsedMs: result.elapsedMs,
    results: Object.fromEntries(Object.entries(result.results).map(([name, r]) => [name, {
      status: r.status,
      ...(r.reason ? { reason: r.reason } : {}),
      ...(r.error ? { error: r.error } : {}),
      ...(r.artifacts ? { files: Object.keys(r.artifacts.files) } : {}),
      ...(r.compliance ? { compliance: r.compliance } : {}),
      ...(r.requirements ? {
        requirements: r.requirements.map((req) => ({ id: req.id, priority: req.priority, implemented: req.implemented })),
      } : {}),
      ...(r.suggestions?.length ? { suggestions: r.suggestions } : {}),
      elapsedMs: r.elapsedMs,
    }])),
  };
}

export function reportError(err: unknown, json: boolean | undefined): void {
  if (json) {
    const payload = isRecipeForgeError(err) ? err.toJSON() : { name: 'Error', message: errorMessage(err) };
    process.stdout.write(JSON.stringify({ success: false, error: payload }, null, 2) + '\n');
  } else {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    if (isRecipeForgeError(err) && err.diagnostic) {
      process.stderr.write(err.diagnostic + '\n');
    }
  }
  process.exitCode = exitCodeFor(err);
}

export async function runBuild(
  location: string,
  options: BuildOptions,
  factories: EnvironmentFactories = {},
): Promise<void> {
  const summary = collectSummary();
  const send = async (event: BuildEvent) => {
    summary.push(event);
    if (options.stream) {
      process.stdout.write(formatNdjsonLine(event));
    } else if (!options.json) {
      const msg = formatHumanReadable(event);
      if (msg) process.stderr.write(msg + '\n');
    }
  };

  try {
    const { orchestrator } = createEnvironment(options, send, factories);
    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);
    let result: BuildResult;
    try {
      result = await orchestrator.run(location, {
        force: options.force,
        dryRun: options.dryRun,
        writeOutputs: !options.dryRun,
        abortSignal: controller.signal,
      });
    } finally {
      process.removeListener('SIGINT', onSigint);
    }

    if (options.json) {
      process.stdout.write(JSON.stringify(summarizeResult(result), null, 2) + '\n');
    }
    process.exitCode = result.success ? 0 : 1;
  } catch (err) {
    reportError(err, options.json);
  }
}
