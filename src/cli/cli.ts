#!/usr/bin/env node

import { Command } from 'commander';

function addCommonOptions(command: Command): Command {
  return command
    .option('--cache-dir <dir>', 'Build cache and log directory')
    .option('--workers <n>', 'Max recipes built concurrently within a group')
    .option('--model <model>', 'Override the generation model')
    .option('--log-level <level>', 'Console log level: debug, info, warn, error')
    .option('--verbose', 'Shorthand for --log-level debug')
    .option('--json', 'Output the final result as JSON');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('recipe-forge')
    .description('Recipe-driven build orchestrator: turns requirement/design recipes into verified code')
    .version('0.1.0');

  addCommonOptions(
    program
      .command('build <location>')
      .description('Build a recipe, or every recipe in a collection directory')
      .option('--force', 'Rebuild even when the cache says up to date')
      .option('--dry-run', 'Resolve and report what would build without generating')
      .option('--output <dir>', 'Directory generated recipes are written to')
      .option('--stream', 'Stream events to stdout as NDJSON'),
  ).action(async (location: string, options) => {
    const { runBuild } = await import('./commands/build.js');
    await runBuild(location, options);
  });

  addCommonOptions(
    program
      .command('analyze <location>')
      .description('Report complexity, separation, dependencies and cache state without building'),
  ).action(async (location: string, options) => {
    const { runAnalyze } = await import('./commands/analyze.js');
    await runAnalyze(location, options);
  });

  addCommonOptions(
    program
      .command('self-host <location>')
      .description("Rebuild the orchestrator from its own recipe and verify the result can do the same")
      .option('--output <dir>', 'Directory generated recipes are written to'),
  ).action(async (location: string, options) => {
    const { runSelfHost } = await import('./commands/selfHost.js');
    await runSelfHost(location, options);
  });

  const cache = program.command('cache').description('Inspect or reset the build cache');

  addCommonOptions(cache.command('stats').description('Show cached build records')).action(async (options) => {
    const { runCacheStats } = await import('./commands/cache.js');
    await runCacheStats(options);
  });

  addCommonOptions(
    cache.command('clear [name]').description('Remove one recipe record, or all records'),
  ).action(async (name: string | undefined, options) => {
    const { runCacheClear } = await import('./commands/cache.js');
    await runCacheClear(name, options);
  });

  return program;
}

const isDirectRun = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isDirectRun) {
  await createProgram().parseAsync();
}
