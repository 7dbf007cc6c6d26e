/** Builds config, logger and orchestrator from command-line options. */

import { AnthropicOracle } from '../../services/anthropicOracle.js';
import { BuildCache } from '../../services/buildCache.js';
import type { GenerationOracle } from '../../services/oracle.js';
import { Orchestrator } from '../../services/orchestrator.js';
import type { SendEvent } from '../../services/phases/types.js';
import { createCommandTools, type QualityTools } from '../../services/qualityTools.js';
import { BuildLogger, isLogLevel, type LogLevel } from '../../utils/buildLogger.js';
import { loadConfig, type ConfigInput, type OrchestratorConfig } from '../../utils/config.js';
import { ValidationError } from '../../utils/errors.js';

export interface CommonOptions {
  cacheDir?: string;
  output?: string;
  workers?: string;
  model?: string;
  logLevel?: string;
  verbose?: boolean;
}

export interface Environment {
  config: OrchestratorConfig;
  logger: BuildLogger;
  orchestrator: Orchestrator;
}

/** Overridable for tests. */
export interface EnvironmentFactories {
  oracle?: (config: OrchestratorConfig) => GenerationOracle;
  tools?: (config: OrchestratorConfig) => QualityTools;
}

export function parseWorkers(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const workers = Number.parseInt(value, 10);
  if (Number.isNaN(workers) || workers <= 0) {
    throw new ValidationError(`Invalid --workers value: "${value}". Must be a positive integer.`, { phase: 'config' });
  }
  return workers;
}

export function resolveLogLevel(options: CommonOptions): LogLevel {
  if (options.verbose) return 'debug';
  if (options.logLevel === undefined) return 'info';
  if (!isLogLevel(options.logLevel)) {
    throw new ValidationError(`Invalid --log-level value: "${options.logLevel}". Use debug, info, warn or error.`, {
      phase: 'config',
    });
  }
  return options.logLevel;
}

export function loadCliConfig(options: CommonOptions): OrchestratorConfig {
  const overrides: ConfigInput = {
    cacheDir: options.cacheDir,
    outputDir: options.output,
    maxWorkers: parseWorkers(options.workers),
    model: options.model,
  };
  return loadConfig({ overrides });
}

export function createEnvironment(
  options: CommonOptions,
  send: SendEvent,
  factories: EnvironmentFactories = {},
): Environment {
  const config = loadCliConfig(options);
  const logger = new BuildLogger(config.cacheDir, { consoleLevel: resolveLogLevel(options) });
  const oracle = factories.oracle?.(config) ?? new AnthropicOracle({ model: config.model });
  const tools = factories.tools?.(config) ?? createCommandTools(config);
  const orchestrator = new Orchestrator({
    config,
    oracle,
    tools,
    cache: new BuildCache(config.cacheDir, logger),
    logger,
    send,
  });
  return { config, logger, orchestrator };
}
