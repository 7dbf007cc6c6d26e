/** Orchestrator configuration: defaults, optional JSON file, environment, then explicit overrides. */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import {
  CONFIG_FILE_NAME,
  COVERAGE_MINIMUM,
  DEFAULT_CACHE_DIR,
  DEFAULT_MODEL,
  DEFAULT_OUTPUT_DIR,
  GATE_TIMEOUT_MS,
  MAX_DECOMPOSITION_DEPTH,
  MAX_FIX_ITERATIONS,
  MAX_ORACLE_RETRIES,
  MAX_REVIEW_ITERATIONS,
  MAX_STUB_REMEDIATIONS,
  ORACLE_RETRY_BASE_MS,
  ORACLE_TIMEOUT_MS,
} from './constants.js';
import { ValidationError } from './errors.js';

const CommandSchema = z.object({
  command: z.string().min(1).max(200),
  args: z.array(z.string().max(500)).max(50).default([]),
}).strict();

const ComplexitySchema = z.object({
  componentThreshold: z.number().int().nonnegative().default(5),
  mustThreshold: z.number().int().nonnegative().default(10),
  areaThreshold: z.number().int().nonnegative().default(2),
  componentWeight: z.number().nonnegative().default(1.0),
  mustWeight: z.number().nonnegative().default(0.5),
  areaWeight: z.number().nonnegative().default(1.0),
  boundary: z.number().positive().default(3),
  maxDepth: z.number().int().positive().default(MAX_DECOMPOSITION_DEPTH),
}).strict();

export const ConfigSchema = z.object({
  maxFixIterations: z.number().int().positive().default(MAX_FIX_ITERATIONS),
  maxReviewIterations: z.number().int().nonnegative().default(MAX_REVIEW_ITERATIONS),
  maxStubRemediations: z.number().int().nonnegative().default(MAX_STUB_REMEDIATIONS),
  maxWorkers: z.number().int().positive().default(() => os.availableParallelism()),
  coverageMinimum: z.number().min(0).max(100).default(COVERAGE_MINIMUM),
  oracleTimeoutMs: z.number().int().positive().default(ORACLE_TIMEOUT_MS),
  gateTimeoutMs: z.number().int().positive().default(GATE_TIMEOUT_MS),
  maxOracleRetries: z.number().int().nonnegative().default(MAX_ORACLE_RETRIES),
  oracleRetryBaseMs: z.number().int().nonnegative().default(ORACLE_RETRY_BASE_MS),
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  model: z.string().min(1).default(DEFAULT_MODEL),
  separationPolicy: z.enum(['fail', 'warn', 'auto-apply']).default('fail'),
  complexity: ComplexitySchema.default({}),
  tools: z.object({
    typecheck: CommandSchema.default({ command: 'npx', args: ['tsc', '--noEmit'] }),
    lint: CommandSchema.default({ command: 'npx', args: ['eslint', '--fix', '.'] }),
    test: CommandSchema.default({
      command: 'npx',
      args: ['vitest', 'run', '--coverage', '--coverage.reporter=json-summary', '--reporter=tap-flat'],
    }),
  }).strict().default({}),
  selfHosting: z.object({
    launchCommand: z.string().min(1).default('node'),
    launchArgs: z.array(z.string()).default(['--import', 'tsx', 'src/cli/cli.ts', 'build', '--json', '--force']),
  }).strict().default({}),
}).strict();

export type OrchestratorConfig = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ComplexityConfig = OrchestratorConfig['complexity'];
export type SeparationPolicy = OrchestratorConfig['separationPolicy'];
export type ToolCommand = z.output<typeof CommandSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigInput;
}

const ENV_INTEGER_KEYS = {
  RECIPE_FORGE_MAX_WORKERS: 'maxWorkers',
  RECIPE_FORGE_MAX_FIX_ITERATIONS: 'maxFixIterations',
  RECIPE_FORGE_MAX_REVIEW_ITERATIONS: 'maxReviewIterations',
  RECIPE_FORGE_COVERAGE_MINIMUM: 'coverageMinimum',
  RECIPE_FORGE_MAX_ORACLE_RETRIES: 'maxOracleRetries',
} as const;

function readEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const fromEnv: ConfigInput = {};
  for (const [variable, key] of Object.entries(ENV_INTEGER_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${variable} must be a number, got "${raw}"`, { phase: 'config' });
    }
    fromEnv[key] = value;
  }
  if (env.RECIPE_FORGE_CACHE_DIR) fromEnv.cacheDir = env.RECIPE_FORGE_CACHE_DIR;
  if (env.CLAUDE_MODEL) fromEnv.model = env.CLAUDE_MODEL;
  return fromEnv;
}

function readConfigFile(cwd: string): unknown {
  const file = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(file)) return {};
  try {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ValidationError(`${CONFIG_FILE_NAME} is not valid JSON: ${String(err)}`, { phase: 'config' });
  }
}

export function parseConfig(input: unknown): OrchestratorConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`, { phase: 'config', diagnostic: issues });
  }
  return parsed.data;
}

export function loadConfig(options: LoadConfigOptions = {}): OrchestratorConfig {
  const cwd = options.cwd ?? process.cwd();
  const fileConfig = readConfigFile(cwd);
  const base = typeof fileConfig === 'object' && fileConfig !== null ? fileConfig : {};
  return parseConfig({
    ...base,
    ...readEnv(options.env ?? process.env),
    ...definedOnly(options.overrides ?? {}),
  });
}

function definedOnly(input: ConfigInput): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
