/** Generation oracle backed by the Anthropic Messages API. */

import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { createArtifactSet, type ArtifactSet, type ReviewFinding, type ReviewReport } from '../models/build.js';
import type { Design, RequirementSet } from '../models/recipe.js';
import * as prompts from '../prompts/generation.js';
import { getAnthropicClient } from '../utils/anthropicClient.js';
import { DEFAULT_MODEL, ORACLE_MAX_TOKENS } from '../utils/constants.js';
import type { SeparationViolation } from '../utils/errors.js';
import type { CorrectedSources, FailureReport, GenerationOracle, OracleCallContext } from './oracle.js';

const FilesResponseSchema = z.object({
  files: z.record(z.string().min(1).max(500), z.string()),
});

const ReviewResponseSchema = z.object({
  summary: z.string().default(''),
  findings: z.array(z.object({
    severity: z.enum(['CRITICAL', 'SUGGESTION']),
    file: z.string().optional(),
    message: z.string(),
  })).default([]),
});

const SeparationResponseSchema = z.object({
  requirements: z.string().min(1),
  design: z.string().min(1),
});

export interface AnthropicOracleOptions {
  model?: string;
  maxTokens?: number;
}

export class AnthropicOracle implements GenerationOracle {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: AnthropicOracleOptions = {}) {
    this.client = getAnthropicClient();
    this.model = options.model ?? process.env.CLAUDE_MODEL ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? ORACLE_MAX_TOKENS;
  }

  async generateTests(requirements: RequirementSet, designHints: Design, ctx: OracleCallContext): Promise<ArtifactSet> {
    const data = await this.request(prompts.TEST_SYSTEM_PROMPT, prompts.testsUser(requirements, designHints), FilesResponseSchema, ctx);
    return createArtifactSet(data.files);
  }

  async generateImplementation(
    requirements: RequirementSet,
    design: Design,
    fixedTests: ArtifactSet,
    ctx: OracleCallContext,
  ): Promise<ArtifactSet> {
    const data = await this.request(
      prompts.IMPLEMENTATION_SYSTEM_PROMPT,
      prompts.implementationUser(requirements, design, fixedTests),
      FilesResponseSchema,
      ctx,
    );
    return createArtifactSet(data.files);
  }

  async repair(artifacts: ArtifactSet, failureReport: FailureReport, ctx: OracleCallContext): Promise<ArtifactSet> {
    const data = await this.request(prompts.REPAIR_SYSTEM_PROMPT, prompts.repairUser(artifacts, failureReport), FilesResponseSchema, ctx);
    return createArtifactSet(data.files);
  }

  async review(artifacts: ArtifactSet, requirements: RequirementSet, ctx: OracleCallContext): Promise<ReviewReport> {
    const data = await this.request(prompts.REVIEW_SYSTEM_PROMPT, prompts.reviewUser(artifacts, requirements), ReviewResponseSchema, ctx);
    const findings: ReviewFinding[] = data.findings.map((f) => ({
      severity: f.severity,
      message: f.message,
      ...(f.file ? { file: f.file } : {}),
    }));
    return { summary: data.summary, findings };
  }

  async reviseForReview(artifacts: ArtifactSet, criticalFindings: ReviewFinding[], ctx: OracleCallContext): Promise<ArtifactSet> {
    const data = await this.request(prompts.REVISE_SYSTEM_PROMPT, prompts.reviseUser(artifacts, criticalFindings), FilesResponseSchema, ctx);
    return createArtifactSet(data.files);
  }

  async correctSeparation(
    sources: CorrectedSources,
    violations: SeparationViolation[],
    ctx: OracleCallContext,
  ): Promise<CorrectedSources> {
    return this.request(prompts.SEPARATION_SYSTEM_PROMPT, prompts.separationUser(sources, violations), SeparationResponseSchema, ctx);
  }

  /** One JSON request with an assistant prefill, re-asking once if the reply does not parse. */
  private async request<S extends z.ZodTypeAny>(
    system: string,
    user: string,
    schema: S,
    ctx: OracleCallContext,
  ): Promise<z.output<S>> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        system,
        messages: [
          { role: 'user', content: user },
          { role: 'assistant', content: '{' },
        ],
        max_tokens: this.maxTokens,
      },
      { signal: ctx.signal },
    );
    const text = '{' + this.extractText(response);
    const parsed = schema.safeParse(this.parseJson(text));
    if (parsed.success) return parsed.data;
    return this.retryParse(system, user, text, schema, ctx);
  }

  private async retryParse<S extends z.ZodTypeAny>(
    system: string,
    originalUserMsg: string,
    badResponse: string,
    schema: S,
    ctx: OracleCallContext,
  ): Promise<z.output<S>> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        system,
        messages: [
          { role: 'user', content: originalUserMsg },
          { role: 'assistant', content: badResponse },
          {
            role: 'user',
            content:
              'Your response was not valid JSON in the required shape. ' +
              'Please output ONLY the JSON object with no markdown code fences ' +
              'or commentary. Just the raw JSON.',
          },
        ],
        max_tokens: this.maxTokens,
      },
      { signal: ctx.signal },
    );
    const parsed = schema.safeParse(this.parseJson(this.extractText(response)));
    if (!parsed.success) {
      throw new Error(`Oracle reply for '${ctx.recipe}' was not valid JSON after retry: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private extractText(response: Anthropic.Message): string {
    for (const block of response.content) {
      if (block.type === 'text') return block.text;
    }
    throw new Error('No text content in oracle response');
  }

  private parseJson(text: string): unknown {
    let cleaned = text.trim();
    const fenceMatch = cleaned.match(/```(?:json)?\s*\n?(.*?)```/s);
    if (fenceMatch) {
      cleaned = fenceMatch[1].trim();
    }
    try {
      return JSON.parse(cleaned);
    } catch {
      return null;
    }
  }
}
