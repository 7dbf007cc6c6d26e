/** Public API. */

export * from './models/recipe.js';
export * from './models/build.js';
export * from './utils/errors.js';
export { loadConfig, parseConfig, ConfigSchema } from './utils/config.js';
export type { OrchestratorConfig, ConfigInput, SeparationPolicy, ComplexityConfig, ToolCommand } from './utils/config.js';
export { BuildLogger, type LogLevel } from './utils/buildLogger.js';
export { DependencyGraph } from './utils/dag.js';
export { RecipeStore, parseRequirements, parseDesign, parseMetadata, computeChecksum } from './services/recipeStore.js';
export { SeparationValidator, type SeparationReport } from './services/separationValidator.js';
export { ComplexityEvaluator, type ComplexityScore, type Decomposition } from './services/complexityEvaluator.js';
export { DependencyResolver, type Resolution, type ImpactAnalysis, type ExecutionPlan } from './services/dependencyResolver.js';
export { BuildCache, type RebuildDecision, type RebuildReason, type CacheStats } from './services/buildCache.js';
export type { GenerationOracle, OracleCallContext, FailureReport, CorrectedSources } from './services/oracle.js';
export { AnthropicOracle } from './services/anthropicOracle.js';
export { createCommandTools, type QualityTools, type TypeChecker, type Linter, type TestRunner } from './services/qualityTools.js';
export { detectStubs, type StubFinding } from './services/stubDetector.js';
export { Orchestrator, type OrchestratorDeps, type CollectionOptions, type DryRunPlan } from './services/orchestrator.js';
export { SelfHostingBootstrap, CommandLauncher, type SelfHostingReport } from './services/selfHosting.js';
export type { BuildEvent, SendEvent } from './services/phases/types.js';
