import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createArtifactSet } from '../models/build.js';
import { makeRecipe } from '../tests/helpers.js';

const mockCreate = vi.fn();

vi.mock('../utils/anthropicClient.js', () => ({
  getAnthropicClient: () => ({
    messages: { create: mockCreate },
  }),
}));

import { AnthropicOracle } from './anthropicOracle.js';

const reply = (text: string) => ({ content: [{ type: 'text', text }] });
const recipe = makeRecipe({ name: 'auth', requirements: ['[auth-1] MUST issue tokens'] });
const ctx = { recipe: 'auth' };

describe('AnthropicOracle', () => {
  let oracle: AnthropicOracle;

  beforeEach(() => {
    mockCreate.mockReset();
    oracle = new AnthropicOracle({ model: 'test-model', maxTokens: 1000 });
  });

  it('sends a prefilled request and continues the JSON reply', async () => {
    mockCreate.mockResolvedValueOnce(reply('"files": {"src/auth.test.ts": "it(\'auth-1\')"}}'));

    const tests = await oracle.generateTests(recipe.requirements, recipe.design, ctx);

    expect(tests.files).toEqual({ 'src/auth.test.ts': "it('auth-1')" });
    const [params, options] = mockCreate.mock.calls[0];
    expect(params.model).toBe('test-model');
    expect(params.max_tokens).toBe(1000);
    expect(params.messages[1]).toEqual({ role: 'assistant', content: '{' });
    expect(params.messages[0].content).toContain('auth-1');
    expect(options).toEqual({ signal: undefined });
  });

  it('passes the abort signal through to the transport', async () => {
    const controller = new AbortController();
    mockCreate.mockResolvedValueOnce(reply('"summary": "fine", "findings": []}'));
    await oracle.review(createArtifactSet({}), recipe.requirements, { recipe: 'auth', signal: controller.signal });
    expect(mockCreate.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it('asks again once when the reply does not parse', async () => {
    mockCreate
      .mockResolvedValueOnce(reply('not json at all'))
      .mockResolvedValueOnce(reply('```json\n{"files": {"src/auth.ts": "// auth-1"}}\n```'));

    const impl = await oracle.generateImplementation(recipe.requirements, recipe.design, createArtifactSet({}), ctx);

    expect(impl.files).toEqual({ 'src/auth.ts': '// auth-1' });
    expect(mockCreate).toHaveBeenCalledTimes(2);
    const retryMessages = mockCreate.mock.calls[1][0].messages;
    expect(retryMessages[1]).toEqual({ role: 'assistant', content: '{not json at all' });
    expect(retryMessages[2].content).toMatch(/not valid JSON/);
  });

  it('fails after the retry also misses the shape', async () => {
    mockCreate
      .mockResolvedValueOnce(reply('"oops": 1}'))
      .mockResolvedValueOnce(reply('{"oops": 2}'));
    await expect(oracle.repair(createArtifactSet({}), {
      kind: 'test-failure',
      summary: '1 of 2 tests failing',
      failures: [],
      output: '',
      protectedPaths: [],
    }, ctx)).rejects.toThrow(/Oracle reply for 'auth' was not valid JSON after retry/);
  });

  it('maps review findings and drops empty file fields', async () => {
    mockCreate.mockResolvedValueOnce(reply(
      '"summary": "one issue", "findings": [{"severity": "CRITICAL", "message": "auth-1 unmet"}, '
      + '{"severity": "SUGGESTION", "file": "src/auth.ts", "message": "rename"}]}',
    ));
    const report = await oracle.review(createArtifactSet({}), recipe.requirements, ctx);
    expect(report).toEqual({
      summary: 'one issue',
      findings: [
        { severity: 'CRITICAL', message: 'auth-1 unmet' },
        { severity: 'SUGGESTION', file: 'src/auth.ts', message: 'rename' },
      ],
    });
  });

  it('returns corrected recipe texts', async () => {
    mockCreate.mockResolvedValueOnce(reply('"requirements": "# R", "design": "# D"}'));
    await expect(oracle.correctSeparation({ requirements: 'r', design: 'd' }, [], ctx))
      .resolves.toEqual({ requirements: '# R', design: '# D' });
  });

  it('fails when the reply has no text block', async () => {
    mockCreate.mockResolvedValueOnce({ content: [] });
    await expect(oracle.generateTests(recipe.requirements, recipe.design, ctx))
      .rejects.toThrow('No text content in oracle response');
  });
});
