/** Shared constants for defaults used across the orchestrator. */

/** Default Claude model used by the generation oracle. */
export const DEFAULT_MODEL = 'claude-sonnet-4-5';

/** Max tokens per oracle response. */
export const ORACLE_MAX_TOKENS = 16_384;

/** Oracle call timeout in milliseconds. */
export const ORACLE_TIMEOUT_MS = 300_000;

/** Extra attempts for a failed oracle request outside any repair or review loop. */
export const MAX_ORACLE_RETRIES = 2;

/** First retry delay in milliseconds; doubles per attempt. */
export const ORACLE_RETRY_BASE_MS = 1_000;

/** Upper bound on a single retry delay. */
export const ORACLE_RETRY_MAX_MS = 30_000;

/** Quality gate (type check, lint, test) timeout in milliseconds. */
export const GATE_TIMEOUT_MS = 120_000;

/** Repair requests allowed after the first implementation before the fix loop gives up. */
export const MAX_FIX_ITERATIONS = 5;

/** Revise/re-review rounds allowed while critical findings remain. */
export const MAX_REVIEW_ITERATIONS = 3;

/** Oracle requests allowed to remove unfinished-work markers. */
export const MAX_STUB_REMEDIATIONS = 2;

/** Minimum line coverage percentage required by the coverage gate. */
export const COVERAGE_MINIMUM = 80;

/** Build cache and log directory, relative to the working directory. */
export const DEFAULT_CACHE_DIR = '.recipe-build';

/** Default directory generated recipes are written to. */
export const DEFAULT_OUTPUT_DIR = 'generated';

/** Optional configuration file read from the working directory. */
export const CONFIG_FILE_NAME = 'recipe-forge.config.json';

/** Recipe artifact file names. */
export const REQUIREMENTS_FILE = 'requirements.md';
export const DESIGN_FILE = 'design.md';
export const METADATA_FILE = 'components.json';

/** Maximum nesting depth for recipe decomposition. */
export const MAX_DECOMPOSITION_DEPTH = 3;

/** Cache file format version. */
export const CACHE_VERSION = 1;
