/**
 * Tests for plan parsing and the fix LLM client.
 */

import { FixLLMClient, LLMRequestError } from '@core/llm/fix-client';
import { parsePlanResponse, planForPrompt } from '@core/llm/plan';
import { LLMRunner, StubLLMProvider } from '@core/llm/runner';
import type { LLMProvider } from '@core/llm/types';

const fastRetry = { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, retryOn: [] };

describe('parsePlanResponse', () => {
  it('should parse a JSON plan and fill missing keys', () => {
    const result = parsePlanResponse('{"analysis": "off by one", "proposed_changes": [{"file": "a.py", "change": "fix"}]}');

    expect(result).toEqual({
      kind: 'parsed',
      plan: {
        analysis: 'off by one',
        proposed_changes: [{ file: 'a.py', change: 'fix' }],
        tests: ''
      }
    });
  });

  it('should keep extra keys the model adds', () => {
    const result = parsePlanResponse('{"analysis": "a", "risk": "low"}');

    expect(result.kind).toBe('parsed');
    expect(result.kind !== 'unstructured' && result.plan).toMatchObject({ risk: 'low' });
  });

  it('should recover JSON wrapped in prose', () => {
    const result = parsePlanResponse('Here is the plan:\n```json\n{"analysis": "x", "tests": ["t1"]}\n```\nDone.');

    expect(result).toEqual({
      kind: 'partial',
      plan: { analysis: 'x', proposed_changes: [], tests: ['t1'] }
    });
  });

  it('should fall back to raw text', () => {
    expect(parsePlanResponse('just fix the bug')).toEqual({ kind: 'unstructured', raw: 'just fix the bug' });
  });

  it('should treat JSON of the wrong shape as unstructured', () => {
    expect(parsePlanResponse('{"analysis": 3}').kind).toBe('unstructured');
  });
});

describe('planForPrompt', () => {
  it('should wrap raw text as the analysis', () => {
    expect(planForPrompt({ kind: 'unstructured', raw: '  fix it \n' })).toEqual({
      analysis: 'fix it',
      proposed_changes: [],
      tests: ''
    });
  });
});

describe('FixLLMClient', () => {
  it('should run each request under its own role', async () => {
    const stub = new StubLLMProvider();
    stub.setResponses('planner', ['{"analysis": "a"}']);
    stub.setResponses('patcher', ['  patch  \n']);
    stub.setResponses('refiner', ['refined']);
    stub.setResponses('rewriter', ['rewritten']);
    const client = new FixLLMClient(new LLMRunner({ provider: stub }));

    const plan = await client.generatePlan('issue', 'clean');
    const planValue = planForPrompt(plan);

    expect(plan.kind).toBe('parsed');
    expect(await client.proposePatch('issue', planValue, 'ctx')).toBe('patch');
    expect(await client.refinePatch('issue', planValue, 'ctx', 'old', 'err')).toBe('refined');
    expect(await client.rewriteFile('issue', planValue, 'a.py', 'text')).toBe('rewritten');
    expect(stub.calls.map((c) => c.role)).toEqual(['planner', 'patcher', 'refiner', 'rewriter']);
    expect(stub.calls[2].messages[1].content).toContain('The previous patch failed to apply with error:\nerr');
  });

  it('should throw when the provider fails', async () => {
    const provider: LLMProvider = {
      name: 'down',
      modelId: 'm',
      call: async (input) => ({
        success: false,
        error: 'invalid api key',
        usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
        metadata: {
          requestId: 'r',
          model: 'm',
          promptVersion: input.promptVersion,
          role: input.role,
          latencyMs: 0,
          retryCount: 0,
          timestamp: new Date(0)
        }
      })
    };
    const client = new FixLLMClient(new LLMRunner({ provider, retryConfig: fastRetry }));

    const error = await client.proposePatch('issue', planForPrompt({ kind: 'unstructured', raw: 'x' }), '').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMRequestError);
    expect(error).toMatchObject({
      role: 'patcher',
      message: 'LLM patcher request failed: PROVIDER_ERROR: invalid api key'
    });
  });
});
