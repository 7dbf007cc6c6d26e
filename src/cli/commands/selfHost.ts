import { isSelfHosting } from '../../models/recipe.js';
import {
  CommandLauncher,
  SelfHostingBootstrap,
  currentSourceRoot,
  sourceTreeRegistry,
  type GeneratedOrchestratorLauncher,
} from '../../services/selfHosting.js';
import type { BuildEvent } from '../../services/phases/types.js';
import { formatHumanReadable } from '../eventStream.js';
import { reportError } from './build.js';
import { createEnvironment, type CommonOptions, type EnvironmentFactories } from './environment.js';

export interface SelfHostOptions extends CommonOptions {
  json?: boolean;
}

export interface SelfHostFactories extends EnvironmentFactories {
  launcher?: GeneratedOrchestratorLauncher;
  currentComponents?: string[];
}

export async function runSelfHost(location: string, options: SelfHostOptions, factories: SelfHostFactories = {}): Promise<void> {
  const send = async (event: BuildEvent) => {
    if (options.json) return;
    const msg = formatHumanReadable(event);
    if (msg) process.stderr.write(msg + '\n');
  };

  try {
    const { config, logger, orchestrator } = createEnvironment(options, send, factories);
    const recipe = orchestrator.store.loadOne(location);
    if (!isSelfHosting(recipe)) {
      logger.warn('Recipe is not marked self_hosting; running the bootstrap anyway', { recipe: recipe.name });
    }
    const bootstrap = new SelfHostingBootstrap({
      orchestrator,
      launcher: factories.launcher ?? new CommandLauncher(config),
      currentComponents: factories.currentComponents ?? sourceTreeRegistry(currentSourceRoot()),
      logger,
    });
    const report = await bootstrap.run(recipe);
    if (options.json) {
      process.stdout.write(JSON.stringify({ success: true, ...report }, null, 2) + '\n');
    } else {
      process.stderr.write(
        `Self-hosting passed: ${report.secondGeneration.components.length} components generated, `
        + `third generation produced ${report.thirdGeneration.components.length}\n`,
      );
    }
    process.exitCode = 0;
  } catch (err) {
    reportError(err, options.json);
  }
}
